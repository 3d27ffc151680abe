import { conflictingMetaError, unknownFieldError } from "../errors";
import type { FieldList } from "../types/field";
import type { IMetaPolicy } from "../types/serializer";

const unknownNames = (names: readonly string[], declared: Set<string>) =>
  names.filter((name) => !declared.has(name));

/**
 * Narrows declared fields by the meta policy. Output order is always the
 * declaration order, whether an allow-list or a deny-list is used.
 */
export function resolveMeta<TSource>(
  definition: string,
  declaredFields: FieldList<TSource>,
  meta: IMetaPolicy = {},
): FieldList<TSource> {
  const allow = meta.fields ?? [];
  const deny = meta.exclude ?? [];

  if (allow.length > 0 && deny.length > 0) {
    conflictingMetaError.throw({
      definition,
      fields: [...allow],
      exclude: [...deny],
    });
  }

  const declaredNames = declaredFields.map(([name]) => name);
  const declared = new Set(declaredNames);

  if (allow.length > 0) {
    const unknown = unknownNames(allow, declared);
    if (unknown.length > 0) {
      unknownFieldError.throw({
        definition,
        option: "fields",
        names: unknown,
        declared: declaredNames,
      });
    }
    const kept = new Set(allow);
    return declaredFields.filter(([name]) => kept.has(name));
  }

  if (deny.length > 0) {
    const unknown = unknownNames(deny, declared);
    if (unknown.length > 0) {
      unknownFieldError.throw({
        definition,
        option: "exclude",
        names: unknown,
        declared: declaredNames,
      });
    }
    const dropped = new Set(deny);
    return declaredFields.filter(([name]) => !dropped.has(name));
  }

  return declaredFields;
}
