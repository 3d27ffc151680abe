import type {
  FieldDeclarations,
  IFieldSpec,
  IMetaPolicy,
  ISerializerDefinition,
} from "../../../defs";

export interface SerializerFluentBuilder<TSource = unknown> {
  id: string;
  /**
   * Definitions whose declared fields come first. Repeated calls append.
   */
  extends(
    ...parents: Array<ISerializerDefinition<TSource>>
  ): SerializerFluentBuilder<TSource>;
  field(name: string, spec: IFieldSpec<TSource>): SerializerFluentBuilder<TSource>;
  fields(declarations: FieldDeclarations<TSource>): SerializerFluentBuilder<TSource>;
  meta(policy: IMetaPolicy): SerializerFluentBuilder<TSource>;
  build(): ISerializerDefinition<TSource>;
}
