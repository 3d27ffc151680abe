import type { FieldKind, IFieldDescription, IFieldSpec } from "../types/field";

const TYPE_LABELS: Readonly<Record<FieldKind, string>> = {
  char: "string",
  int: "integer",
  float: "float",
  decimal: "decimal",
  bool: "boolean",
  uuid: "string",
  dict: "dict",
  list: "list",
  date: "date",
  dateTime: "datetime",
  method: "method",
  nested: "object",
};

export function describeField<TSource>(
  name: string,
  spec: IFieldSpec<TSource>,
): IFieldDescription {
  const description: IFieldDescription = {
    name,
    kind: spec.kind,
    type: TYPE_LABELS[spec.kind],
    required: spec.kind === "method" ? true : spec.required !== false,
  };
  if (spec.label) description.label = spec.label;
  if (spec.helpText) description.helpText = spec.helpText;
  if (spec.kind === "nested") description.many = spec.many === true;
  return description;
}
