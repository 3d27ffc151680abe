import type { FieldList, IFieldSpec, OutputMapping, OutputValue } from "../types/field";

/**
 * Builds one mapping with keys in field-list order.
 */
export function assembleObject<TSource>(
  fieldList: FieldList<TSource>,
  resolveEntry: (name: string, spec: IFieldSpec<TSource>) => OutputValue,
): OutputMapping {
  const mapping: OutputMapping = {};
  for (const [name, spec] of fieldList) {
    mapping[name] = resolveEntry(name, spec);
  }
  return mapping;
}

/**
 * Builds one entry per item, in input order. Nothing is returned unless every
 * item succeeds.
 */
export function assembleCollection<TItem, TEntry>(
  items: Iterable<TItem>,
  assembleItem: (item: TItem, index: number) => TEntry,
): TEntry[] {
  const entries: TEntry[] = [];
  let index = 0;
  for (const item of items) {
    entries.push(assembleItem(item, index));
    index++;
  }
  return entries;
}
