import { makeSerializerBuilder } from "./fluent-builder";
import type { SerializerFluentBuilder } from "./fluent-builder.interface";
import type { BuilderState } from "./types";

export * from "./fluent-builder.interface";
export * from "./fluent-builder";
export * from "./types";
export * from "./utils";

/**
 * Entry point for creating a serializer builder.
 *
 * @example
 * const orderSerializer = serializer<Order>("orders.detail")
 *   .field("id", fields.int())
 *   .field("placedAt", fields.dateTime())
 *   .build();
 */
export function serializerBuilder<TSource = unknown>(
  id: string,
): SerializerFluentBuilder<TSource> {
  const initial: BuilderState<TSource> = Object.freeze({
    id,
    parents: Object.freeze([]),
    fields: Object.freeze([]),
  });

  return makeSerializerBuilder(initial);
}

export const serializer = serializerBuilder;
