import { defineSerializer } from "../../defineSerializer";
import type { SerializerFluentBuilder } from "./fluent-builder.interface";
import type { BuilderState } from "./types";
import { appendFields, clone } from "./utils";

/**
 * Creates a SerializerFluentBuilder from the given state.
 */
export function makeSerializerBuilder<TSource>(
  state: BuilderState<TSource>,
): SerializerFluentBuilder<TSource> {
  const builder: SerializerFluentBuilder<TSource> = {
    id: state.id,

    extends(...parents) {
      const next = clone(state, { parents: [...state.parents, ...parents] });
      return makeSerializerBuilder(next);
    },

    field(name, spec) {
      const next = clone(state, {
        fields: appendFields(state.fields, [[name, spec]]),
      });
      return makeSerializerBuilder(next);
    },

    fields(declarations) {
      const next = clone(state, {
        fields: appendFields(state.fields, declarations),
      });
      return makeSerializerBuilder(next);
    },

    meta(policy) {
      const next = clone(state, { meta: policy });
      return makeSerializerBuilder(next);
    },

    build() {
      return defineSerializer<TSource>({
        id: state.id,
        extends: state.parents,
        fields: state.fields,
        meta: state.meta,
      });
    },
  };

  return builder;
}
