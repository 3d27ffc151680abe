import type { FieldEntry, FieldList } from "../types/field";

/**
 * Folds field lists left to right. A later entry with a known name replaces
 * the earlier spec but keeps the earlier position; new names are appended.
 */
export function collectFields<TSource>(
  sources: ReadonlyArray<FieldList<TSource>>,
): FieldList<TSource> {
  const slots = new Map<string, number>();
  const collected: Array<FieldEntry<TSource>> = [];

  for (const fieldList of sources) {
    for (const entry of fieldList) {
      const [name] = entry;
      const slot = slots.get(name);
      if (slot === undefined) {
        slots.set(name, collected.length);
        collected.push(entry);
      } else {
        collected[slot] = entry;
      }
    }
  }

  return collected;
}
