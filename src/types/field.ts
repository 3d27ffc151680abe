import type { ISerializerDefinition } from "./serializer";

export type OutputPrimitive = string | number | boolean | null;

/**
 * The only thing a serializer produces. Always JSON-compatible.
 */
export type OutputValue = OutputPrimitive | OutputValue[] | OutputMapping;

export interface OutputMapping {
  [key: string]: OutputValue;
}

/**
 * Free-form values handed to method fields together with the source object.
 */
export type SerializerContext = Readonly<Record<string, unknown>>;

export type FieldKind =
  | "char"
  | "int"
  | "float"
  | "decimal"
  | "bool"
  | "uuid"
  | "dict"
  | "list"
  | "date"
  | "dateTime"
  | "method"
  | "nested";

export interface IFieldOptions {
  /**
   * Attribute read from the source object. Defaults to the field name.
   * Dotted paths (`"profile.city"`) walk nested attributes.
   */
  source?: string;
  /**
   * When false, a missing attribute serializes as null instead of failing.
   * @default true
   */
  required?: boolean;
  label?: string;
  helpText?: string;
}

export interface ICharField extends IFieldOptions {
  kind: "char";
}

export interface IIntField extends IFieldOptions {
  kind: "int";
}

export interface IFloatField extends IFieldOptions {
  kind: "float";
}

/**
 * Serialized as a decimal string so no precision is lost.
 */
export interface IDecimalField extends IFieldOptions {
  kind: "decimal";
}

export interface IBoolField extends IFieldOptions {
  kind: "bool";
}

export interface IUuidField extends IFieldOptions {
  kind: "uuid";
}

export interface IDictField extends IFieldOptions {
  kind: "dict";
}

export interface IDateField extends IFieldOptions {
  kind: "date";
  /** strftime-style pattern, or "iso-8601" */
  format?: string;
}

export interface IDateTimeField extends IFieldOptions {
  kind: "dateTime";
  /** strftime-style pattern, or "iso-8601" */
  format?: string;
}

export interface IListField extends IFieldOptions {
  kind: "list";
  /** Applied to each element. Generic conversion is used when omitted. */
  child?: ValueFieldSpec;
}

/**
 * Lets a definition nest itself (trees, threads). Called on every use.
 */
export type SerializerThunk = () => ISerializerDefinition<unknown>;

export interface INestedField extends IFieldOptions {
  kind: "nested";
  serializer: ISerializerDefinition<unknown> | SerializerThunk;
  many?: boolean;
}

/**
 * Method fields read nothing from the source, so they take no `source` or
 * `required`.
 */
export interface IMethodField<TSource = unknown>
  extends Pick<IFieldOptions, "label" | "helpText"> {
  kind: "method";
  resolve(source: TSource, context: SerializerContext): unknown;
}

/**
 * Every field that reads an attribute and coerces what it found.
 */
export type ValueFieldSpec =
  | ICharField
  | IIntField
  | IFloatField
  | IDecimalField
  | IBoolField
  | IUuidField
  | IDictField
  | IListField
  | IDateField
  | IDateTimeField
  | INestedField;

export type IFieldSpec<TSource = unknown> =
  | ValueFieldSpec
  | IMethodField<TSource>;

export type FieldEntry<TSource = unknown> = readonly [
  name: string,
  spec: IFieldSpec<TSource>,
];

export type FieldList<TSource = unknown> = ReadonlyArray<FieldEntry<TSource>>;

/**
 * Fields can be declared as an object literal (insertion order) or as an
 * explicit list of `[name, spec]` pairs.
 */
export type FieldDeclarations<TSource = unknown> =
  | Readonly<Record<string, IFieldSpec<TSource>>>
  | FieldList<TSource>;

export interface IFieldDescription {
  name: string;
  kind: FieldKind;
  type: string;
  required: boolean;
  label?: string;
  helpText?: string;
  many?: boolean;
}
