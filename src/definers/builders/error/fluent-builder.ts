import type { DefaultErrorType } from "../../../defs";
import { defineError } from "../../defineError";
import type { ErrorFluentBuilder } from "./fluent-builder.interface";
import type { BuilderState } from "./types";
import { clone } from "./utils";

/**
 * Creates an ErrorFluentBuilder from the given state.
 */
export function makeErrorBuilder<TData extends DefaultErrorType>(
  state: BuilderState<TData>,
): ErrorFluentBuilder<TData> {
  const builder: ErrorFluentBuilder<TData> = {
    id: state.id,

    format(fn: (data: TData) => string) {
      const next = clone(state, { format: fn });
      return makeErrorBuilder(next);
    },

    remediation(advice: string | ((data: TData) => string)) {
      const next = clone(state, { remediation: advice });
      return makeErrorBuilder(next);
    },

    build() {
      return Object.freeze(
        defineError<TData>({
          id: state.id,
          format: state.format,
          remediation: state.remediation,
        }),
      );
    },
  };

  return builder;
}
