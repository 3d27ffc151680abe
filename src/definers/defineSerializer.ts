import { invalidDefinitionError } from "../errors";
import { describeField } from "../fields/describe";
import { getDefaultLogger } from "../logger";
import { serializeMany, serializeOne } from "../models/Serializer";
import { collectFields } from "../registry/collectFields";
import { resolveMeta } from "../registry/resolveMeta";
import {
  definitionIdSchema,
  describeIssues,
  fieldNameSchema,
  fieldSpecSchema,
  metaPolicySchema,
} from "../registry/schemas";
import { deepFreeze } from "../tools/deepFreeze";
import type {
  FieldDeclarations,
  FieldEntry,
  FieldList,
} from "../types/field";
import type {
  IMetaPolicy,
  ISerializerDefinition,
  ISerializerDefinitionInput,
} from "../types/serializer";
import { symbolSerializer } from "../types/symbols";

export function isSerializerDefinition(
  value: unknown,
): value is ISerializerDefinition<unknown> {
  return (
    typeof value === "object" && value !== null && symbolSerializer in value
  );
}

export function toFieldList<TSource>(
  declarations: FieldDeclarations<TSource>,
): FieldList<TSource> {
  return isFieldList(declarations)
    ? declarations
    : Object.entries(declarations);
}

function isFieldList<TSource>(
  declarations: FieldDeclarations<TSource>,
): declarations is FieldList<TSource> {
  return Array.isArray(declarations);
}

function normalizeFields<TSource>(
  id: string,
  declarations: FieldDeclarations<TSource>,
): FieldList<TSource> {
  const entries = toFieldList(declarations);
  const seen = new Set<string>();
  const normalized: Array<FieldEntry<TSource>> = [];

  for (const [name, spec] of entries) {
    const nameCheck = fieldNameSchema.safeParse(name);
    if (!nameCheck.success) {
      invalidDefinitionError.throw({
        definition: id,
        reason: `field "${name}": ${describeIssues(nameCheck.error)}`,
      });
    }
    if (seen.has(name)) {
      invalidDefinitionError.throw({
        definition: id,
        reason: `field "${name}" is declared more than once`,
      });
    }
    const specCheck = fieldSpecSchema.safeParse(spec);
    if (!specCheck.success) {
      invalidDefinitionError.throw({
        definition: id,
        reason: `field "${name}": ${describeIssues(specCheck.error)}`,
      });
    }
    seen.add(name);
    normalized.push([name, spec]);
  }

  return normalized;
}

function normalizeMeta(id: string, meta: IMetaPolicy | undefined): IMetaPolicy {
  const parsed = metaPolicySchema.safeParse(meta ?? {});
  if (!parsed.success) {
    return invalidDefinitionError.throw({
      definition: id,
      reason: `meta: ${describeIssues(parsed.error)}`,
    });
  }
  return parsed.data;
}

function parentFields<TSource>(
  id: string,
  parents: ISerializerDefinitionInput<TSource>["extends"],
): Array<FieldList<TSource>> {
  const list: ReadonlyArray<ISerializerDefinition<TSource>> =
    parents === undefined ? [] : isParentList(parents) ? parents : [parents];
  return list.map((parent) => {
    if (!isSerializerDefinition(parent)) {
      return invalidDefinitionError.throw({
        definition: id,
        reason: "extends must only contain serializer definitions",
      });
    }
    return parent.declaredFields;
  });
}

function isParentList<TSource>(
  parents: NonNullable<ISerializerDefinitionInput<TSource>["extends"]>,
): parents is ReadonlyArray<ISerializerDefinition<TSource>> {
  return Array.isArray(parents);
}

/**
 * Builds an immutable serializer definition. Declared fields are collected
 * from `extends` (in order) and then `fields`; the meta policy is resolved
 * right away so definition mistakes surface here, not on first use.
 *
 * @example
 * const userSerializer = defineSerializer({
 *   id: "users.summary",
 *   fields: { email: fields.char(), username: fields.char() },
 *   meta: { exclude: ["username"] },
 * });
 */
export function defineSerializer<TSource = unknown>(
  input: ISerializerDefinitionInput<TSource>,
): ISerializerDefinition<TSource> {
  const idCheck = definitionIdSchema.safeParse(input.id);
  if (!idCheck.success) {
    return invalidDefinitionError.throw({
      definition: String(input.id),
      reason: describeIssues(idCheck.error),
    });
  }
  const id = idCheck.data;

  const declaredFields = collectFields([
    ...parentFields(id, input.extends),
    normalizeFields(id, input.fields),
  ]);
  const meta = normalizeMeta(id, input.meta);
  const effectiveFields = resolveMeta(id, declaredFields, meta);

  const definition: ISerializerDefinition<TSource> = {
    id,
    declaredFields,
    effectiveFields,
    meta,
    [symbolSerializer]: true,
    serialize(source, options) {
      return serializeOne(definition, source, options);
    },
    serializeMany(sources, options) {
      return serializeMany(definition, sources, options);
    },
    describe() {
      return effectiveFields.map(([name, spec]) => describeField(name, spec));
    },
  };

  getDefaultLogger().debug("Serializer defined", {
    source: "fieldmap.registry",
    data: {
      id,
      declared: declaredFields.map(([name]) => name),
      effective: effectiveFields.map(([name]) => name),
    },
  });

  return deepFreeze(definition);
}
