export type AttributeRead =
  | { found: true; value: unknown }
  | { found: false };

/**
 * Reads one named attribute of a source object.
 */
export interface IAttributeAccessor {
  read(target: unknown, name: string): AttributeRead;
}

const MISSING: AttributeRead = Object.freeze({ found: false });

/**
 * Own properties, plus anything defined along the prototype chain below
 * `Object.prototype` (class getters and methods). Inherited `Object` members
 * such as `constructor` or `toString` are never treated as attributes.
 */
function findHolder(target: object, name: string): object | undefined {
  let current: object | null = target;
  while (current !== null && current !== Object.prototype) {
    if (Object.prototype.hasOwnProperty.call(current, name)) {
      return current;
    }
    current = Object.getPrototypeOf(current);
  }
  return undefined;
}

export const defaultAccessor: IAttributeAccessor = Object.freeze({
  read(target: unknown, name: string): AttributeRead {
    if (target === null || target === undefined) {
      return MISSING;
    }
    if (target instanceof Map) {
      return target.has(name)
        ? { found: true, value: target.get(name) }
        : MISSING;
    }
    const boxed: object = Object(target);
    if (findHolder(boxed, name) === undefined) {
      return MISSING;
    }
    return { found: true, value: Reflect.get(boxed, name) };
  },
});

/**
 * Convenience wrapper around the default accessor.
 * Returns `undefined` for absent attributes; use `hasAttribute` to tell the
 * two apart.
 */
export function getAttribute(target: unknown, name: string): unknown {
  const result = defaultAccessor.read(target, name);
  return result.found ? result.value : undefined;
}

export function hasAttribute(target: unknown, name: string): boolean {
  return defaultAccessor.read(target, name).found;
}

// Classes report no parameters too, but cannot be called without `new`.
const isSimpleCallable = (value: unknown): value is () => unknown =>
  typeof value === "function" &&
  value.length === 0 &&
  !Function.prototype.toString.call(value).startsWith("class");

export type SourceRead =
  | { found: true; value: unknown }
  | { found: false; attribute: string };

/**
 * Walks a dotted source path. A null or undefined value part-way through the
 * path ends the walk with null. A function taking no arguments is called
 * with its holder as `this` and its result is used instead; classes are
 * returned as they are.
 */
export function readSource(
  target: unknown,
  source: string,
  accessor: IAttributeAccessor = defaultAccessor,
): SourceRead {
  let current: unknown = target;
  for (const segment of source.split(".")) {
    if (current === null || current === undefined) {
      return { found: true, value: null };
    }
    const result = accessor.read(current, segment);
    if (!result.found) {
      return { found: false, attribute: segment };
    }
    const holder = current;
    current = result.value;
    if (isSimpleCallable(current)) {
      current = Reflect.apply(current, holder, []);
    }
  }
  return { found: true, value: current };
}
