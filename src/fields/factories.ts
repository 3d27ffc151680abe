import type {
  FieldKind,
  IBoolField,
  ICharField,
  IDateField,
  IDateTimeField,
  IDecimalField,
  IDictField,
  IFieldOptions,
  IFloatField,
  IIntField,
  IListField,
  IMethodField,
  INestedField,
  IUuidField,
  SerializerContext,
  ValueFieldSpec,
} from "../types/field";
import type { ISerializerDefinition } from "../types/serializer";

export interface IFormatOptions extends IFieldOptions {
  format?: string;
}

export interface INestedOptions extends IFieldOptions {
  many?: boolean;
}

const make = <T extends { kind: FieldKind }>(spec: T): Readonly<T> =>
  Object.freeze(spec);

export const char = (options: IFieldOptions = {}): ICharField =>
  make<ICharField>({ ...options, kind: "char" });

export const int = (options: IFieldOptions = {}): IIntField =>
  make<IIntField>({ ...options, kind: "int" });

export const float = (options: IFieldOptions = {}): IFloatField =>
  make<IFloatField>({ ...options, kind: "float" });

export const decimal = (options: IFieldOptions = {}): IDecimalField =>
  make<IDecimalField>({ ...options, kind: "decimal" });

export const bool = (options: IFieldOptions = {}): IBoolField =>
  make<IBoolField>({ ...options, kind: "bool" });

export const uuid = (options: IFieldOptions = {}): IUuidField =>
  make<IUuidField>({ ...options, kind: "uuid" });

export const dict = (options: IFieldOptions = {}): IDictField =>
  make<IDictField>({ ...options, kind: "dict" });

/**
 * A sequence field. `child` coerces every element; without it elements go
 * through the generic conversion.
 */
export const list = (
  child?: ValueFieldSpec,
  options: IFieldOptions = {},
): IListField => make<IListField>({ ...options, kind: "list", child });

export const date = (options: IFormatOptions = {}): IDateField =>
  make<IDateField>({ ...options, kind: "date" });

export const dateTime = (options: IFormatOptions = {}): IDateTimeField =>
  make<IDateTimeField>({ ...options, kind: "dateTime" });

/**
 * A derived value computed from the whole source object.
 *
 * @example
 * fields.method((user: User) => `${user.firstName} ${user.lastName}`)
 */
export function method<TSource>(
  resolve: (source: TSource, context: SerializerContext) => unknown,
  options: Pick<IFieldOptions, "label" | "helpText"> = {},
): IMethodField<TSource> {
  return make<IMethodField<TSource>>({ ...options, kind: "method", resolve });
}

/**
 * Delegates to another serializer definition. With `many: true` the
 * attribute must be iterable and every element is serialized. Pass a
 * function returning the definition to reference a serializer that is not
 * defined yet, including the one being defined.
 */
export function nested<TNested>(
  serializer:
    | ISerializerDefinition<TNested>
    | (() => ISerializerDefinition<TNested>),
  options: INestedOptions = {},
): INestedField {
  return make<INestedField>({ ...options, kind: "nested", serializer });
}
