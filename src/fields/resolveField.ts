import {
  coercionError,
  missingAttributeError,
  recursionLimitError,
} from "../errors";
import { assembleCollection, assembleObject } from "../models/OutputAssembler";
import { readSource, type IAttributeAccessor } from "../tools/getAttribute";
import type {
  FieldList,
  IFieldSpec,
  INestedField,
  OutputMapping,
  OutputValue,
  SerializerContext,
  ValueFieldSpec,
} from "../types/field";
import type { ISerializerDefinition } from "../types/serializer";
import {
  checkOutputValue,
  coerceBool,
  coerceChar,
  coerceDate,
  coerceDateTime,
  coerceDecimal,
  coerceDict,
  coerceFloat,
  coerceInt,
  coerceUuid,
  describeValue,
  isCollection,
  toOutputArray,
  toOutputValue,
  type Coerced,
} from "./coerce";

/**
 * Everything a field needs besides the source object. One per object being
 * serialized; nested objects get a child with a longer path and depth + 1.
 */
export interface IResolutionContext {
  definition: string;
  path: string;
  depth: number;
  maxDepth: number;
  /** Index of the element in a top-level collection */
  index?: number;
  context: SerializerContext;
  accessor: IAttributeAccessor;
}

export const joinPath = (path: string, name: string): string =>
  path === "" ? name : `${path}.${name}`;

export const indexPath = (path: string, index: number): string =>
  `${path}[${index}]`;

const callSite = (ctx: IResolutionContext, field: string) => ({
  definition: ctx.definition,
  field,
  path: joinPath(ctx.path, field),
  ...(ctx.index === undefined ? {} : { index: ctx.index }),
});

/**
 * Applies an effective field list to one source object.
 */
export function resolveObject<TSource>(
  fieldList: FieldList<TSource>,
  source: TSource,
  ctx: IResolutionContext,
): OutputMapping {
  return assembleObject(fieldList, (name, spec) =>
    resolveField(name, spec, source, ctx),
  );
}

export function resolveField<TSource>(
  name: string,
  spec: IFieldSpec<TSource>,
  source: TSource,
  ctx: IResolutionContext,
): OutputValue {
  if (spec.kind === "method") {
    const checked = checkOutputValue(spec.resolve(source, ctx.context));
    return unwrap(checked, ctx, name, spec.kind);
  }

  const read = readSource(source, spec.source ?? name, ctx.accessor);
  if (!read.found) {
    if (spec.required === false) {
      return null;
    }
    return missingAttributeError.throw({
      ...callSite(ctx, name),
      attribute: read.attribute,
    });
  }

  return coerceValue(name, spec, read.value, ctx);
}

/**
 * Coerces a value that was already read from the source. Used for fields and
 * for the elements of list fields.
 */
export function coerceValue(
  name: string,
  spec: ValueFieldSpec,
  value: unknown,
  ctx: IResolutionContext,
): OutputValue {
  if (value === null || value === undefined) {
    return null;
  }

  switch (spec.kind) {
    case "char":
      return unwrap(coerceChar(value), ctx, name, spec.kind);
    case "int":
      return unwrap(coerceInt(value), ctx, name, spec.kind);
    case "float":
      return unwrap(coerceFloat(value), ctx, name, spec.kind);
    case "decimal":
      return unwrap(coerceDecimal(value), ctx, name, spec.kind);
    case "bool":
      return unwrap(coerceBool(value), ctx, name, spec.kind);
    case "uuid":
      return unwrap(coerceUuid(value), ctx, name, spec.kind);
    case "dict":
      return unwrap(coerceDict(value), ctx, name, spec.kind);
    case "date":
      return unwrap(coerceDate(value, spec.format), ctx, name, spec.kind);
    case "dateTime":
      return unwrap(coerceDateTime(value, spec.format), ctx, name, spec.kind);
    case "list":
      return resolveList(name, spec.child, value, ctx);
    case "nested":
      return resolveNested(name, spec, value, ctx);
    default:
      return assertNever(spec);
  }
}

function resolveList(
  name: string,
  child: ValueFieldSpec | undefined,
  value: unknown,
  ctx: IResolutionContext,
): OutputValue {
  if (typeof value === "string" || !isCollection(value)) {
    return coercionError.throw({
      ...callSite(ctx, name),
      kind: "list",
      reason: `${describeValue(value)} is not iterable`,
    });
  }
  if (child === undefined) {
    return unwrap(
      toOutputArray(value, (item) => toOutputValue(item)),
      ctx,
      name,
      "list",
    );
  }
  const items: OutputValue[] = [];
  let position = 0;
  for (const item of value) {
    items.push(coerceValue(`${name}[${position}]`, child, item, ctx));
    position++;
  }
  return items;
}

function resolveNested(
  name: string,
  spec: INestedField,
  value: unknown,
  ctx: IResolutionContext,
): OutputValue {
  if (ctx.depth >= ctx.maxDepth) {
    return recursionLimitError.throw({
      ...callSite(ctx, name),
      maxDepth: ctx.maxDepth,
    });
  }

  const definition =
    typeof spec.serializer === "function" ? spec.serializer() : spec.serializer;
  const child: IResolutionContext = {
    ...ctx,
    definition: definition.id,
    path: joinPath(ctx.path, name),
    depth: ctx.depth + 1,
  };

  if (!spec.many) {
    return resolveObject(definition.effectiveFields, value, child);
  }

  if (typeof value === "string" || !isCollection(value)) {
    return coercionError.throw({
      ...callSite(ctx, name),
      kind: "nested",
      reason: `${describeValue(value)} is not iterable`,
    });
  }
  return resolveCollection(definition, value, child);
}

/**
 * Serializes every element of a collection with the same definition.
 * Null elements stay null.
 */
export function resolveCollection<TSource>(
  definition: ISerializerDefinition<TSource>,
  items: Iterable<TSource | null | undefined>,
  ctx: IResolutionContext,
): Array<OutputMapping | null> {
  return assembleCollection(items, (item, index) =>
    item === null || item === undefined
      ? null
      : resolveObject(definition.effectiveFields, item, {
          ...ctx,
          path: indexPath(ctx.path, index),
        }),
  );
}

function unwrap(
  result: Coerced,
  ctx: IResolutionContext,
  name: string,
  kind: string,
): OutputValue {
  if (result.ok) {
    return result.value;
  }
  return coercionError.throw({
    ...callSite(ctx, name),
    kind,
    reason: result.reason,
  });
}

function assertNever(spec: never): never {
  throw new TypeError(`Unknown field kind: ${JSON.stringify(spec)}`);
}
