import { describe, it, expect } from "@jest/globals";
import { defineSerializer, errors, fields } from "../../index";
import type { IFieldSpec } from "../../index";
import { catchError } from "../test-utils";

let counter = 0;

/**
 * Serializes `{ value }` with a single field named "value".
 */
const one = (spec: IFieldSpec, value: unknown) =>
  defineSerializer({
    id: `test.fields.${++counter}`,
    fields: { value: spec },
  }).serialize({ value });

const coercionReason = (spec: IFieldSpec, value: unknown): string => {
  const error = catchError(() => one(spec, value));
  if (!errors.coercionError.is(error)) throw error;
  return error.data.reason;
};

class Money {
  constructor(private readonly cents: number) {}
  toString() {
    return `$${(this.cents / 100).toFixed(2)}`;
  }
}

describe("fields", () => {
  describe("char", () => {
    it("passes strings and stringifies primitives", () => {
      expect(one(fields.char(), "123")).toEqual({ value: "123" });
      expect(one(fields.char(), 42)).toEqual({ value: "42" });
      expect(one(fields.char(), false)).toEqual({ value: "false" });
      expect(one(fields.char(), BigInt(10))).toEqual({ value: "10" });
    });

    it("uses toString of class instances and the canonical form of dates", () => {
      expect(one(fields.char(), new Money(1250))).toEqual({ value: "$12.50" });
      expect(
        one(fields.char(), new Date(Date.UTC(2020, 4, 17, 8, 5, 9, 120))),
      ).toEqual({ value: "2020-05-17T08:05:09.120Z" });
    });

    it("rejects plain objects", () => {
      expect(coercionReason(fields.char(), { a: 1 })).toBe(
        "Object has no string form",
      );
    });

    it("rejects classes instead of calling them", () => {
      class Widget {}
      expect(coercionReason(fields.char(), Widget)).toBe(
        "function has no string form",
      );
    });
  });

  describe("int", () => {
    it("coerces numeric input", () => {
      expect(one(fields.int(), 7)).toEqual({ value: 7 });
      expect(one(fields.int(), 7.9)).toEqual({ value: 7 });
      expect(one(fields.int(), -7.9)).toEqual({ value: -7 });
      expect(one(fields.int(), " 20 ")).toEqual({ value: 20 });
      expect(one(fields.int(), true)).toEqual({ value: 1 });
    });

    it("rejects non-integer strings", () => {
      expect(coercionReason(fields.int(), "2.5")).toBe("string is not an integer");
      expect(coercionReason(fields.int(), Number.NaN)).toBe(
        "NaN is not a finite number",
      );
    });
  });

  describe("float", () => {
    it("coerces numeric input", () => {
      expect(one(fields.float(), "2.5")).toEqual({ value: 2.5 });
      expect(one(fields.float(), 0.1)).toEqual({ value: 0.1 });
    });

    it("rejects empty strings", () => {
      expect(coercionReason(fields.float(), "")).toBe("string is not a number");
    });

    it("converts bigints only within the float range", () => {
      expect(one(fields.float(), BigInt(2) ** BigInt(60))).toEqual({
        value: 1152921504606846976,
      });
      expect(coercionReason(fields.float(), BigInt(10) ** BigInt(400))).toBe(
        `1${"0".repeat(400)} is outside the float range`,
      );
    });
  });

  describe("decimal", () => {
    class Amount {
      constructor(private readonly text: string) {}
      toString() {
        return this.text;
      }
    }

    it("keeps the full precision as text", () => {
      expect(one(fields.decimal(), "12345678901234567890.0001")).toEqual({
        value: "12345678901234567890.0001",
      });
      expect(one(fields.decimal(), " -0.50 ")).toEqual({ value: "-0.50" });
      expect(one(fields.decimal(), 2.5)).toEqual({ value: "2.5" });
      expect(one(fields.decimal(), BigInt(10) ** BigInt(20))).toEqual({
        value: "100000000000000000000",
      });
      expect(one(fields.decimal(), new Amount("19.99"))).toEqual({
        value: "19.99",
      });
    });

    it("rejects non-numeric input", () => {
      expect(coercionReason(fields.decimal(), "1,5")).toBe(
        "string is not a decimal",
      );
      expect(coercionReason(fields.decimal(), true)).toBe(
        "boolean is not a decimal",
      );
      expect(coercionReason(fields.decimal(), Number.POSITIVE_INFINITY)).toBe(
        "Infinity is not a finite number",
      );
    });

    it("is described as a decimal", () => {
      const definition = defineSerializer({
        id: "test.decimal.describe",
        fields: { price: fields.decimal() },
      });

      expect(definition.describe()).toEqual([
        { name: "price", kind: "decimal", type: "decimal", required: true },
      ]);
    });
  });

  describe("bool", () => {
    it("accepts booleans, 0/1 and common words", () => {
      expect(one(fields.bool(), true)).toEqual({ value: true });
      expect(one(fields.bool(), 0)).toEqual({ value: false });
      expect(one(fields.bool(), "Yes")).toEqual({ value: true });
      expect(one(fields.bool(), "false")).toEqual({ value: false });
    });

    it("rejects other values", () => {
      expect(coercionReason(fields.bool(), "maybe")).toBe(
        '"maybe" is not a boolean',
      );
      expect(coercionReason(fields.bool(), 2)).toBe("number is not a boolean");
    });
  });

  describe("uuid", () => {
    it("lower-cases canonical UUIDs", () => {
      expect(
        one(fields.uuid(), "A3A99FBA-CCB5-4616-95B8-205DD0CFB84A"),
      ).toEqual({ value: "a3a99fba-ccb5-4616-95b8-205dd0cfb84a" });
    });

    it("rejects malformed identifiers", () => {
      expect(coercionReason(fields.uuid(), "not-a-uuid")).toBe(
        "string is not a UUID",
      );
    });
  });

  describe("dict", () => {
    it("converts plain objects and maps recursively", () => {
      expect(
        one(fields.dict(), {
          id: "123",
          tags: new Set(["a", "b"]),
          at: new Date(Date.UTC(2014, 0, 1)),
        }),
      ).toEqual({
        value: { id: "123", tags: ["a", "b"], at: "2014-01-01T00:00:00Z" },
      });
      expect(one(fields.dict(), new Map([["k", 1]]))).toEqual({
        value: { k: 1 },
      });
    });

    it("rejects arrays and circular structures", () => {
      expect(coercionReason(fields.dict(), ["a"])).toBe("array is not a mapping");
      const loop: Record<string, unknown> = {};
      loop.self = loop;
      expect(coercionReason(fields.dict(), loop)).toBe("circular structure");
    });

    it("keeps __proto__ as a plain key", () => {
      const raw: unknown = JSON.parse('{"__proto__": {"admin": true}}');
      const data = one(fields.dict(), raw);

      expect(JSON.stringify(data)).toBe('{"value":{"__proto__":{"admin":true}}}');
    });
  });

  describe("list", () => {
    it("converts iterables with the generic conversion", () => {
      expect(one(fields.list(), ["123", "456"])).toEqual({
        value: ["123", "456"],
      });
    });

    it("applies a child field to each element", () => {
      expect(one(fields.list(fields.int()), ["1", 2.7, null])).toEqual({
        value: [1, 2, null],
      });
    });

    it("names the failing element", () => {
      const error = catchError(() =>
        one(fields.list(fields.int()), ["1", "x"]),
      );
      if (!errors.coercionError.is(error)) throw error;
      expect(error.data.field).toBe("value[1]");
      expect(error.data.path).toBe("value[1]");
    });

    it("rejects strings", () => {
      expect(coercionReason(fields.list(), "abc")).toBe("string is not iterable");
    });
  });

  describe("date and dateTime", () => {
    const at = new Date(Date.UTC(2014, 0, 1, 10, 30));

    it("defaults to ISO-8601", () => {
      expect(one(fields.date(), at)).toEqual({ value: "2014-01-01" });
      expect(one(fields.dateTime(), at)).toEqual({
        value: "2014-01-01T10:30:00Z",
      });
      expect(one(fields.dateTime({ format: "ISO-8601" }), at)).toEqual({
        value: "2014-01-01T10:30:00Z",
      });
    });

    it("uses strftime patterns", () => {
      expect(one(fields.date({ format: "%d/%m/%y" }), at)).toEqual({
        value: "01/01/14",
      });
      expect(
        one(fields.dateTime({ format: "%Y-%m-%dT%H:%M:%SZ" }), at),
      ).toEqual({ value: "2014-01-01T10:30:00Z" });
    });

    it("requires a valid Date", () => {
      expect(coercionReason(fields.date(), "2014-01-01")).toBe(
        "expected a valid Date, got string",
      );
      expect(coercionReason(fields.dateTime(), new Date(Number.NaN))).toBe(
        "expected a valid Date, got Date",
      );
    });

    it("reports unknown directives", () => {
      expect(coercionReason(fields.date({ format: "%Q" }), at)).toBe(
        'unsupported format directive "%Q" in "%Q"',
      );
    });
  });

  describe("method", () => {
    it("requires JSON-compatible results", () => {
      const spec = fields.method(() => new Date(0));
      expect(coercionReason(spec, null)).toBe("method returned Date");
      expect(one(fields.method(() => ({ a: [1, "b"] })), null)).toEqual({
        value: { a: [1, "b"] },
      });
    });
  });

  describe("extraction", () => {
    it("serializes null attribute values as null", () => {
      expect(one(fields.int(), null)).toEqual({ value: null });
      const empty = defineSerializer({ id: "test.empty", fields: {} });
      expect(one(fields.nested(empty), undefined)).toEqual({ value: null });
    });

    it("walks dotted sources", () => {
      const serializer = defineSerializer({
        id: "test.dotted",
        fields: { city: fields.char({ source: "profile.address.city" }) },
      });

      expect(
        serializer.serialize({ profile: { address: { city: "Oslo" } } }),
      ).toEqual({ city: "Oslo" });
      expect(serializer.serialize({ profile: null })).toEqual({ city: null });
    });

    it("returns null for optional missing attributes", () => {
      const serializer = defineSerializer({
        id: "test.optional",
        fields: { nickname: fields.char({ required: false }) },
      });

      expect(serializer.serialize({})).toEqual({ nickname: null });
    });

    it("calls zero-argument methods and getters on the source", () => {
      class Account {
        constructor(
          private readonly first: string,
          private readonly last: string,
        ) {}
        get initials() {
          return `${this.first[0]}${this.last[0]}`;
        }
        displayName() {
          return `${this.first} ${this.last}`;
        }
      }
      const serializer = defineSerializer({
        id: "test.account",
        fields: { initials: fields.char(), displayName: fields.char() },
      });

      expect(serializer.serialize(new Account("Ada", "Lovelace"))).toEqual({
        initials: "AL",
        displayName: "Ada Lovelace",
      });
    });

    it("does not treat Object.prototype members as attributes", () => {
      const error = catchError(() =>
        one(fields.char({ source: "toString" }), 1),
      );
      if (!errors.missingAttributeError.is(error)) throw error;
      expect(error.data.attribute).toBe("toString");
    });
  });
});
