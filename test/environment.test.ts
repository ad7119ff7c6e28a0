import { Option } from "effect";
import { describe, expect, test } from "vitest";

import { EMPTY, Environment, KindMismatchError, Value } from "../src/index.js";

describe("Environment", () => {
  const args = Environment.fromValues({
    count: Value.Integer({ value: 3 }),
    ratio: Value.Float({ value: 0.5 }),
    label: Value.String({ value: "north" }),
    enabled: Value.Boolean({ value: true }),
  });

  test("looks up declared names", () => {
    expect(Option.getOrThrow(args.lookup("count"))).toEqual(Value.Integer({ value: 3 }));
    expect(Environment.get(args, "ratio", "Float")).toEqual(Option.some(0.5));
    expect(Environment.get(args, "label", "String")).toEqual(Option.some("north"));
    expect(Environment.get(args, "enabled", "Boolean")).toEqual(Option.some(true));
  });

  test("unknown names are not found, not errors", () => {
    expect(Option.isNone(args.lookup("missing"))).toBe(true);
    expect(Option.isNone(Environment.get(args, "missing", "Integer"))).toBe(true);
  });

  test("names inherited from Object.prototype are not found", () => {
    expect(Option.isNone(args.lookup("toString"))).toBe(true);
  });

  test("lists names in declaration order", () => {
    expect(args.names()).toEqual(["count", "ratio", "label", "enabled"]);
  });

  test("empty environment finds nothing", () => {
    expect(Option.isNone(EMPTY.lookup("count"))).toBe(true);
    expect(EMPTY.names()).toEqual([]);
    expect(Environment.toRecord(EMPTY)).toEqual({});
  });

  test("extracting the wrong kind throws KindMismatchError", () => {
    expect(() => Environment.get(args, "count", "String")).toThrow(KindMismatchError);

    try {
      Environment.get(args, "count", "Float");
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(KindMismatchError);
      if (error instanceof KindMismatchError) {
        expect(error._tag).toBe("KindMismatchError");
        expect(error.expected).toBe("Float");
        expect(error.actual).toBe("Integer");
        expect(error.field).toBe("count");
      }
    }
  });

  test("typed extractors", () => {
    expect(Environment.asInteger(Value.Integer({ value: 7 }))).toBe(7);
    expect(Environment.asString(Value.String({ value: "x" }))).toBe("x");
    expect(Environment.asBoolean(Value.Boolean({ value: false }))).toBe(false);
    expect(Environment.asFloat(Value.Float({ value: 1.5 }))).toBe(1.5);
    expect(() => Environment.asBoolean(Value.String({ value: "true" }))).toThrow(
      KindMismatchError,
    );
  });

  test("snapshot environments do not see later changes to the source record", () => {
    const source: Record<string, Value> = { a: Value.Integer({ value: 1 }) };
    const env = Environment.fromValues(source);
    source.a = Value.Integer({ value: 2 });
    source.b = Value.Integer({ value: 3 });

    expect(Environment.get(env, "a", "Integer")).toEqual(Option.some(1));
    expect(Option.isNone(env.lookup("b"))).toBe(true);
  });

  test("accessor environments read live values", () => {
    let counter = 1;
    const env = Environment.fromAccessors({ counter: () => Value.Integer({ value: counter }) });

    expect(Environment.get(env, "counter", "Integer")).toEqual(Option.some(1));
    counter = 5;
    expect(Environment.get(env, "counter", "Integer")).toEqual(Option.some(5));
  });

  test("toRecord gives a plain view", () => {
    expect(Environment.toRecord(args)).toEqual({
      count: 3,
      ratio: 0.5,
      label: "north",
      enabled: true,
    });
  });

  test("fromPlain infers kinds", () => {
    expect(Environment.fromPlain(4)._tag).toBe("Integer");
    expect(Environment.fromPlain(4.25)._tag).toBe("Float");
    expect(Environment.fromPlain("a")._tag).toBe("String");
    expect(Environment.fromPlain(false)._tag).toBe("Boolean");
  });
});
