import type {
  FieldList,
  IMetaPolicy,
  ISerializerDefinition,
} from "../../../defs";

/**
 * Internal state for the SerializerFluentBuilder.
 * Kept immutable and frozen.
 */
export type BuilderState<TSource> = Readonly<{
  id: string;
  parents: ReadonlyArray<ISerializerDefinition<TSource>>;
  fields: FieldList<TSource>;
  meta?: IMetaPolicy;
}>;
