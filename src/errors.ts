import { error } from "./definers/builders/error";
import type { DefaultErrorType } from "./types/error";

type CallSite = {
  /** Id of the serializer definition that owns the field */
  definition: string;
  field: string;
  /** Location in the output tree, e.g. `[2].author.email` */
  path: string;
  /** Element index when serializing a collection */
  index?: number;
} & DefaultErrorType;

const where = ({ definition, path }: CallSite) =>
  `"${path}" (serializer "${definition}")`;

// Definition time

export const conflictingMetaError = error<
  { definition: string; fields: string[]; exclude: string[] } & DefaultErrorType
>("fieldmap.errors.conflictingMeta")
  .format(
    ({ definition, fields, exclude }) =>
      `Serializer "${definition}" declares both meta.fields [${fields.join(", ")}] and meta.exclude [${exclude.join(", ")}].`,
  )
  .remediation("Use either an allow-list (fields) or a deny-list (exclude).")
  .build();

export const unknownFieldError = error<
  {
    definition: string;
    option: "fields" | "exclude";
    names: string[];
    declared: string[];
  } & DefaultErrorType
>("fieldmap.errors.unknownField")
  .format(
    ({ definition, option, names, declared }) =>
      `Serializer "${definition}" lists unknown field(s) in meta.${option}: ${names.join(", ")}. Declared fields: ${declared.join(", ") || "(none)"}.`,
  )
  .build();

export const invalidDefinitionError = error<
  { definition: string; reason: string } & DefaultErrorType
>("fieldmap.errors.invalidDefinition")
  .format(
    ({ definition, reason }) =>
      `Invalid serializer definition "${definition}": ${reason}`,
  )
  .build();

export const invalidConfigError = error<
  { key: string; reason: string } & DefaultErrorType
>("fieldmap.errors.invalidConfig")
  .format(({ key, reason }) => `Invalid configuration for ${key}: ${reason}`)
  .build();

// Call time

export const missingAttributeError = error<
  CallSite & { attribute: string }
>("fieldmap.errors.missingAttribute")
  .format(
    (data) =>
      `Cannot read attribute "${data.attribute}" for field ${where(data)}.`,
  )
  .remediation(
    "Declare the field with `required: false` if the attribute is optional, or point `source` at an existing attribute.",
  )
  .build();

export const coercionError = error<CallSite & { kind: string; reason: string }>(
  "fieldmap.errors.coercion",
)
  .format(
    (data) =>
      `Cannot coerce value for ${data.kind} field ${where(data)}: ${data.reason}`,
  )
  .build();

export const recursionLimitError = error<CallSite & { maxDepth: number }>(
  "fieldmap.errors.recursionLimit",
)
  .format(
    (data) =>
      `Nesting deeper than ${data.maxDepth} levels at field ${where(data)}. The source graph is probably cyclic.`,
  )
  .remediation(
    "Break the cycle with a method field, or raise maxDepth (option or FIELDMAP_MAX_DEPTH) for deep but finite graphs.",
  )
  .build();

export type { IErrorHelper } from "./types/error";
