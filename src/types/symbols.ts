/**
 * Internal brand symbols used to tag created objects at runtime and help with
 * type-narrowing. Prefer the `isSerializerDefinition`/`isFieldmapError`
 * helpers instead of touching these directly.
 * @internal
 */
export const symbolSerializer: unique symbol = Symbol.for(
  "fieldmap.serializer",
);
export const symbolError: unique symbol = Symbol.for("fieldmap.error");
