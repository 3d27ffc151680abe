import { z } from "zod";
import { symbolSerializer } from "../types/symbols";

const ARRAY_INDEX = /^(0|[1-9]\d*)$/;

/**
 * Object keys that look like array indices are enumerated before all other
 * keys, so they could not keep their declared position in the output.
 */
export const fieldNameSchema = z
  .string()
  .min(1, "field names must not be empty")
  .refine((name) => !ARRAY_INDEX.test(name), {
    message: "field names must not look like array indices",
  })
  .refine((name) => name !== "__proto__", {
    message: '"__proto__" cannot be used as a field name',
  });

export const metaPolicySchema = z
  .object({
    fields: z.array(fieldNameSchema).optional(),
    exclude: z.array(fieldNameSchema).optional(),
  })
  .strict();

const FIELD_KINDS = [
  "char",
  "int",
  "float",
  "decimal",
  "bool",
  "uuid",
  "dict",
  "list",
  "date",
  "dateTime",
  "method",
  "nested",
] as const;

const isSerializerLike = (value: unknown): boolean =>
  typeof value === "object" &&
  value !== null &&
  symbolSerializer in value;

const fieldOptionsShape = {
  source: z.string().min(1).optional(),
  required: z.boolean().optional(),
  label: z.string().optional(),
  helpText: z.string().optional(),
};

const baseFieldSchema = z.object({
  ...fieldOptionsShape,
  kind: z.enum(FIELD_KINDS),
});

/**
 * Structural checks for one field spec, including the pieces each kind
 * depends on at call time.
 */
export const fieldSpecSchema = baseFieldSchema
  .passthrough()
  .superRefine((spec, ctx) => {
    switch (spec.kind) {
      case "method":
        if (typeof spec.resolve !== "function") {
          ctx.addIssue({
            code: z.ZodIssueCode.custom,
            message: "method fields need a resolve function",
          });
        }
        if (spec.source !== undefined || spec.required !== undefined) {
          ctx.addIssue({
            code: z.ZodIssueCode.custom,
            message: "method fields take no source or required option",
          });
        }
        break;
      case "nested":
        if (
          !isSerializerLike(spec.serializer) &&
          typeof spec.serializer !== "function"
        ) {
          ctx.addIssue({
            code: z.ZodIssueCode.custom,
            message: "nested fields need a serializer definition",
          });
        }
        break;
      case "date":
      case "dateTime":
        if (spec.format !== undefined && typeof spec.format !== "string") {
          ctx.addIssue({
            code: z.ZodIssueCode.custom,
            message: "format must be a string",
          });
        }
        break;
      case "list":
        if (spec.child !== undefined) {
          const child = baseFieldSchema.safeParse(spec.child);
          if (!child.success || child.data.kind === "method") {
            ctx.addIssue({
              code: z.ZodIssueCode.custom,
              message: "list children must be value fields",
            });
          }
        }
        break;
    }
  });

export const definitionIdSchema = z.string().min(1, "id must not be empty");

/**
 * Joins zod issues into one line for error messages.
 */
export function describeIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) =>
      issue.path.length > 0
        ? `${issue.path.join(".")}: ${issue.message}`
        : issue.message,
    )
    .join("; ");
}
