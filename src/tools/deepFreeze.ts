const isPlainObject = (value: object): boolean => {
  const prototype = Object.getPrototypeOf(value);
  return prototype === Object.prototype || prototype === null;
};

const shouldFreezeRecursively = (value: object): boolean =>
  Array.isArray(value) || isPlainObject(value);

/**
 * Recursively freezes arrays and plain objects. Class instances and functions
 * (method field closures, nested definitions' helpers) are left as they are
 * below the root. Handles cycles via WeakSet.
 */
export function deepFreeze<T>(
  value: T,
  seen = new WeakSet<object>(),
  depth = 0,
): T {
  if (typeof value !== "object" || value === null) {
    return value;
  }

  if (depth > 0 && !shouldFreezeRecursively(value)) {
    return value;
  }

  if (seen.has(value)) {
    return value;
  }
  seen.add(value);

  for (const key of Reflect.ownKeys(value)) {
    const descriptor = Object.getOwnPropertyDescriptor(value, key);
    if (descriptor && "value" in descriptor) {
      deepFreeze(descriptor.value, seen, depth + 1);
    }
  }

  Object.freeze(value);
  return value;
}
