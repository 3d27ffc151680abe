import type { Logger } from "../models/Logger";
import type { IAttributeAccessor } from "../tools/getAttribute";
import type {
  FieldDeclarations,
  FieldList,
  IFieldDescription,
  OutputMapping,
  SerializerContext,
} from "./field";
import type { symbolSerializer } from "./symbols";

/**
 * Allow-list or deny-list narrowing the declared fields. Only one of them may
 * be non-empty.
 */
export interface IMetaPolicy {
  fields?: readonly string[];
  exclude?: readonly string[];
}

export interface ISerializerDefinitionInput<TSource = unknown> {
  id: string;
  fields: FieldDeclarations<TSource>;
  /** Definitions whose declared fields come first, in the given order */
  extends?:
    | ISerializerDefinition<TSource>
    | ReadonlyArray<ISerializerDefinition<TSource>>;
  meta?: IMetaPolicy;
}

export interface ISerializeOptions {
  context?: SerializerContext;
  /** Maximum nesting of nested fields before RecursionLimitError */
  maxDepth?: number;
  logger?: Logger;
  accessor?: IAttributeAccessor;
}

export interface ISerializerOptions extends ISerializeOptions {
  many?: boolean;
}

export type SerializedData = OutputMapping | Array<OutputMapping | null> | null;

export interface ISerializerDefinition<TSource = unknown> {
  id: string;
  /** Own and inherited fields, before the meta policy is applied */
  declaredFields: FieldList<TSource>;
  /** The fields actually applied, in output order */
  effectiveFields: FieldList<TSource>;
  meta: IMetaPolicy;
  [symbolSerializer]: true;
  serialize(
    source: TSource | null | undefined,
    options?: ISerializeOptions,
  ): OutputMapping | null;
  serializeMany(
    sources: Iterable<TSource | null | undefined>,
    options?: ISerializeOptions,
  ): Array<OutputMapping | null>;
  describe(): IFieldDescription[];
}
