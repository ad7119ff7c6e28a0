/**
 * Environments expose event arguments, state arguments and state/domain variables
 * by name, without observers knowing the concrete generated types.
 *
 * Values are a closed tagged union over the DSL's value kinds. Looking up an unknown
 * name is not an error (`Option.none()`); extracting a value as the wrong kind is a
 * fault and throws {@link KindMismatchError}.
 *
 * @example
 * ```ts
 * import { Environment, Value } from "hsm-runtime"
 *
 * const args = Environment.fromValues({ arg: Value.Integer({ value: 3 }) })
 *
 * Environment.get(args, "arg", "Integer") // Option.some(3)
 * Environment.get(args, "missing", "Integer") // Option.none()
 * Environment.get(args, "arg", "String") // throws KindMismatchError
 * ```
 *
 * @module
 */
import { Data, Option } from "effect";

import { KindMismatchError } from "./errors.js";

// ============================================================================
// Values
// ============================================================================

export type Value = Data.TaggedEnum<{
  Boolean: { readonly value: boolean };
  Integer: { readonly value: number };
  Float: { readonly value: number };
  String: { readonly value: string };
}>;

export const Value = Data.taggedEnum<Value>();

/** Name of a value kind */
export type ValueKind = Value["_tag"];

/** Plain TypeScript type carried by each kind */
export interface KindType {
  readonly Boolean: boolean;
  readonly Integer: number;
  readonly Float: number;
  readonly String: string;
}

/** Any plain value an environment can carry */
export type Plain = KindType[ValueKind];

/**
 * Infer the kind of a plain value. Safe integers are `Integer`, every other number
 * is `Float`.
 */
export const fromPlain = (value: Plain): Value => {
  if (typeof value === "boolean") return Value.Boolean({ value });
  if (typeof value === "string") return Value.String({ value });
  return Number.isSafeInteger(value) ? Value.Integer({ value }) : Value.Float({ value });
};

const mismatch = (expected: ValueKind, value: Value, field?: string): KindMismatchError =>
  new KindMismatchError({ expected, actual: value._tag, field });

export const asBoolean = (value: Value, field?: string): boolean => {
  if (value._tag === "Boolean") return value.value;
  throw mismatch("Boolean", value, field);
};

export const asInteger = (value: Value, field?: string): number => {
  if (value._tag === "Integer") return value.value;
  throw mismatch("Integer", value, field);
};

export const asFloat = (value: Value, field?: string): number => {
  if (value._tag === "Float") return value.value;
  throw mismatch("Float", value, field);
};

export const asString = (value: Value, field?: string): string => {
  if (value._tag === "String") return value.value;
  throw mismatch("String", value, field);
};

const extractors: { readonly [K in ValueKind]: (value: Value, field?: string) => KindType[K] } = {
  Boolean: asBoolean,
  Integer: asInteger,
  Float: asFloat,
  String: asString,
};

/** Extract the plain value, throwing {@link KindMismatchError} if the kind differs. */
export const extract = <K extends ValueKind>(value: Value, kind: K, field?: string): KindType[K] => {
  const extractor: (value: Value, field?: string) => KindType[K] = extractors[kind];
  return extractor(value, field);
};

// ============================================================================
// Environments
// ============================================================================

/**
 * Closed, read-only set of named values.
 */
export interface Environment {
  readonly lookup: (name: string) => Option.Option<Value>;
  /** Declared names, in declaration order */
  readonly names: () => ReadonlyArray<string>;
}

/** Shared environment for parameterless states and events */
export const EMPTY: Environment = Object.freeze({
  lookup: () => Option.none(),
  names: () => [],
});

/**
 * Environment over a fixed snapshot of values.
 */
export const fromValues = (values: Readonly<Record<string, Value>>): Environment => {
  const snapshot = { ...values };
  const names = Object.freeze(Object.keys(snapshot));
  return Object.freeze({
    lookup: (name: string) =>
      Object.hasOwn(snapshot, name) ? Option.some(snapshot[name]) : Option.none(),
    names: () => names,
  });
};

/**
 * Environment that reads live values on every lookup.
 * Used for state and domain variables, which handlers mutate while the state is live.
 */
export const fromAccessors = (accessors: Readonly<Record<string, () => Value>>): Environment => {
  const table = { ...accessors };
  const names = Object.freeze(Object.keys(table));
  return Object.freeze({
    lookup: (name: string) =>
      Object.hasOwn(table, name) ? Option.some(table[name]()) : Option.none(),
    names: () => names,
  });
};

/**
 * Look up `name` and extract it as `kind`.
 * Absent names yield `Option.none()`; a present value of another kind throws.
 */
export const get = <K extends ValueKind>(
  env: Environment,
  name: string,
  kind: K,
): Option.Option<KindType[K]> =>
  Option.map(env.lookup(name), (value) => extract(value, kind, name));

/** Plain-object view of every declared name, for display and assertions. */
export const toRecord = (env: Environment): Record<string, Plain> => {
  const record: Record<string, Plain> = {};
  for (const name of env.names()) {
    const value = env.lookup(name);
    if (Option.isSome(value)) {
      record[name] = value.value.value;
    }
  }
  return record;
};
