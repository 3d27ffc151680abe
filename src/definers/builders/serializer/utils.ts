import type { FieldDeclarations, FieldList } from "../../../defs";
import { toFieldList } from "../../defineSerializer";
import type { BuilderState } from "./types";

/**
 * Clones and patches the builder state immutably.
 */
export function clone<TSource>(
  s: BuilderState<TSource>,
  patch: Partial<BuilderState<TSource>>,
): BuilderState<TSource> {
  return Object.freeze({
    ...s,
    ...patch,
  });
}

export function appendFields<TSource>(
  current: FieldList<TSource>,
  declarations: FieldDeclarations<TSource>,
): FieldList<TSource> {
  return Object.freeze([...current, ...toFieldList(declarations)]);
}
