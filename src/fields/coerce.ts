import type { OutputMapping, OutputValue } from "../types/field";
import { formatIsoDate, formatIsoDateTime, isIsoFormat, strftime } from "./strftime";

export type Coerced =
  | { ok: true; value: OutputValue }
  | { ok: false; reason: string };

const ok = (value: OutputValue): Coerced => ({ ok: true, value });
const fail = (reason: string): Coerced => ({ ok: false, reason });

const UUID_PATTERN =
  /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/i;
const INTEGER_PATTERN = /^[+-]?\d+$/;
const DECIMAL_PATTERN = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;
const TRUE_STRINGS = new Set(["true", "1", "yes"]);
const FALSE_STRINGS = new Set(["false", "0", "no"]);

/**
 * Assigns an own enumerable key, including "__proto__", which plain
 * assignment would treat as a prototype change.
 */
export function setEntry(
  mapping: OutputMapping,
  key: string,
  value: OutputValue,
): void {
  Object.defineProperty(mapping, key, {
    value,
    enumerable: true,
    writable: true,
    configurable: true,
  });
}

export function describeValue(value: unknown): string {
  if (value === null) return "null";
  if (Array.isArray(value)) return "array";
  if (value instanceof Date) return "Date";
  if (typeof value === "object") {
    const ctor = Object.getPrototypeOf(value)?.constructor;
    return typeof ctor === "function" && ctor.name ? ctor.name : "object";
  }
  return typeof value;
}

export const isPlainObject = (
  value: unknown,
): value is Record<string, unknown> => {
  if (typeof value !== "object" || value === null) return false;
  const prototype = Object.getPrototypeOf(value);
  return prototype === Object.prototype || prototype === null;
};

export const isValidDate = (value: unknown): value is Date =>
  value instanceof Date && !Number.isNaN(value.getTime());

const hasOwnToString = (value: object): boolean =>
  !Array.isArray(value) &&
  !isPlainObject(value) &&
  value.toString !== Object.prototype.toString;

const isIterable = (value: unknown): value is Iterable<unknown> =>
  typeof value === "object" &&
  value !== null &&
  Symbol.iterator in value;

export function coerceChar(value: unknown): Coerced {
  if (typeof value === "string") {
    return ok(value);
  }
  if (typeof value === "number") {
    return Number.isFinite(value)
      ? ok(String(value))
      : fail(`${value} has no string form`);
  }
  if (typeof value === "bigint" || typeof value === "boolean") {
    return ok(String(value));
  }
  if (value === null) {
    return ok(null);
  }
  if (value instanceof Date) {
    return isValidDate(value)
      ? ok(formatIsoDateTime(value))
      : fail("invalid Date");
  }
  if (typeof value === "object" && hasOwnToString(value)) {
    return ok(String(value));
  }
  return fail(`${describeValue(value)} has no string form`);
}

export function coerceInt(value: unknown): Coerced {
  if (typeof value === "number") {
    return Number.isFinite(value)
      ? ok(Math.trunc(value) || 0)
      : fail(`${value} is not a finite number`);
  }
  if (typeof value === "boolean") {
    return ok(value ? 1 : 0);
  }
  if (typeof value === "bigint") {
    return value >= BigInt(Number.MIN_SAFE_INTEGER) &&
      value <= BigInt(Number.MAX_SAFE_INTEGER)
      ? ok(Number(value))
      : fail(`${value} is outside the safe integer range`);
  }
  if (typeof value === "string" && INTEGER_PATTERN.test(value.trim())) {
    const parsed = Number(value.trim());
    return Number.isSafeInteger(parsed)
      ? ok(parsed)
      : fail(`"${value}" is outside the safe integer range`);
  }
  return fail(`${describeValue(value)} is not an integer`);
}

export function coerceFloat(value: unknown): Coerced {
  if (typeof value === "number") {
    return Number.isFinite(value)
      ? ok(value)
      : fail(`${value} is not a finite number`);
  }
  if (typeof value === "boolean") {
    return ok(value ? 1 : 0);
  }
  if (typeof value === "bigint") {
    const converted = Number(value);
    return Number.isFinite(converted)
      ? ok(converted)
      : fail(`${value} is outside the float range`);
  }
  if (typeof value === "string" && value.trim() !== "") {
    const parsed = Number(value);
    if (Number.isFinite(parsed)) {
      return ok(parsed);
    }
  }
  return fail(`${describeValue(value)} is not a number`);
}

/**
 * Numbers, bigints, numeric strings and decimal objects (anything whose own
 * `toString` yields a number) become their decimal text, untouched.
 */
export function coerceDecimal(value: unknown): Coerced {
  if (typeof value === "number") {
    return Number.isFinite(value)
      ? ok(String(value))
      : fail(`${value} is not a finite number`);
  }
  if (typeof value === "bigint") {
    return ok(String(value));
  }
  const text =
    typeof value === "string"
      ? value.trim()
      : typeof value === "object" && value !== null && hasOwnToString(value)
        ? String(value)
        : undefined;
  if (text !== undefined && DECIMAL_PATTERN.test(text)) {
    return ok(text);
  }
  return fail(`${describeValue(value)} is not a decimal`);
}

export function coerceBool(value: unknown): Coerced {
  if (typeof value === "boolean") {
    return ok(value);
  }
  if (value === 0 || value === 1) {
    return ok(value === 1);
  }
  if (typeof value === "string") {
    const normalized = value.trim().toLowerCase();
    if (TRUE_STRINGS.has(normalized)) return ok(true);
    if (FALSE_STRINGS.has(normalized)) return ok(false);
    return fail(`"${value}" is not a boolean`);
  }
  return fail(`${describeValue(value)} is not a boolean`);
}

export function coerceUuid(value: unknown): Coerced {
  const text =
    typeof value === "string"
      ? value
      : typeof value === "object" && value !== null && hasOwnToString(value)
        ? String(value)
        : undefined;
  if (text !== undefined && UUID_PATTERN.test(text)) {
    return ok(text.toLowerCase());
  }
  return fail(`${describeValue(value)} is not a UUID`);
}

export function coerceDate(value: unknown, format?: string): Coerced {
  if (!isValidDate(value)) {
    return fail(`expected a valid Date, got ${describeValue(value)}`);
  }
  return format === undefined || isIsoFormat(format)
    ? ok(formatIsoDate(value))
    : strftime(value, format);
}

export function coerceDateTime(value: unknown, format?: string): Coerced {
  if (!isValidDate(value)) {
    return fail(`expected a valid Date, got ${describeValue(value)}`);
  }
  return format === undefined || isIsoFormat(format)
    ? ok(formatIsoDateTime(value))
    : strftime(value, format);
}

/**
 * Lenient conversion used by dict and list fields: iterables become arrays,
 * plain objects and string-keyed Maps become mappings, Dates become
 * date-time strings.
 */
export function toOutputValue(
  value: unknown,
  ancestors: WeakSet<object> = new WeakSet(),
): Coerced {
  if (value === null || value === undefined) return ok(null);
  if (typeof value === "string" || typeof value === "boolean") {
    return ok(value);
  }
  if (typeof value === "number") {
    return Number.isFinite(value)
      ? ok(value)
      : fail(`${value} is not a finite number`);
  }
  if (typeof value !== "object") {
    return fail(`${describeValue(value)} cannot be serialized`);
  }
  if (value instanceof Date) {
    return isValidDate(value) ? ok(formatIsoDateTime(value)) : fail("invalid Date");
  }
  if (ancestors.has(value)) {
    return fail("circular structure");
  }
  ancestors.add(value);
  try {
    if (value instanceof Map || isPlainObject(value)) {
      return toOutputMapping(value, ancestors);
    }
    if (isIterable(value)) {
      return toOutputArray(value, (item) => toOutputValue(item, ancestors));
    }
    return fail(`${describeValue(value)} cannot be serialized`);
  } finally {
    ancestors.delete(value);
  }
}

export function toOutputMapping(
  value: Map<unknown, unknown> | Record<string, unknown>,
  ancestors: WeakSet<object> = new WeakSet(),
): Coerced {
  const entries =
    value instanceof Map ? [...value.entries()] : Object.entries(value);
  const mapping: OutputMapping = {};
  for (const [key, item] of entries) {
    if (typeof key !== "string") {
      return fail(`mapping key ${describeValue(key)} is not a string`);
    }
    const converted = toOutputValue(item, ancestors);
    if (!converted.ok) return converted;
    setEntry(mapping, key, converted.value);
  }
  return ok(mapping);
}

export function toOutputArray(
  items: Iterable<unknown>,
  convert: (item: unknown) => Coerced,
): Coerced {
  const out: OutputValue[] = [];
  for (const item of items) {
    const converted = convert(item);
    if (!converted.ok) return converted;
    out.push(converted.value);
  }
  return ok(out);
}

export function coerceDict(value: unknown): Coerced {
  if (value instanceof Map || isPlainObject(value)) {
    return toOutputValue(value);
  }
  return fail(`${describeValue(value)} is not a mapping`);
}

export const isCollection = (value: unknown): value is Iterable<unknown> =>
  isIterable(value);

/**
 * Method results must already be JSON-compatible: primitives, arrays and
 * plain objects of those.
 */
export function checkOutputValue(
  value: unknown,
  ancestors: WeakSet<object> = new WeakSet(),
): Coerced {
  if (value === null) return ok(null);
  if (typeof value === "string" || typeof value === "boolean") {
    return ok(value);
  }
  if (typeof value === "number") {
    return Number.isFinite(value)
      ? ok(value)
      : fail(`${value} is not a finite number`);
  }
  if (typeof value !== "object") {
    return fail(`method returned ${describeValue(value)}`);
  }
  if (!Array.isArray(value) && !isPlainObject(value)) {
    return fail(`method returned ${describeValue(value)}`);
  }
  if (ancestors.has(value)) {
    return fail("method returned a circular structure");
  }
  ancestors.add(value);
  try {
    if (Array.isArray(value)) {
      return toOutputArray(value, (item) => checkOutputValue(item, ancestors));
    }
    const mapping: OutputMapping = {};
    for (const [key, item] of Object.entries(value)) {
      const checked = checkOutputValue(item, ancestors);
      if (!checked.ok) return checked;
      setEntry(mapping, key, checked.value);
    }
    return ok(mapping);
  } finally {
    ancestors.delete(value);
  }
}
