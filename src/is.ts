/**
 * Tests a predicate applies to the value of its `when` path, and for
 * binary tests to the value of its `than` path as well.
 */

export interface UndefinedTest {
  readonly kind: "undefined";
  readonly name: string;
}

export interface UnaryTest {
  readonly kind: "unary";
  readonly name: string;
  test(x: unknown): boolean;
}

export interface BinaryTest {
  readonly kind: "binary";
  readonly name: string;
  test(x: unknown, y: unknown): boolean;
}

export type IsTest = UndefinedTest | UnaryTest | BinaryTest;

/** No test. Only valid for a predicate without a `when` path. */
export const UNDEFINED: UndefinedTest = Object.freeze({
  kind: "undefined",
  name: "UNDEFINED",
});

export function unary(name: string, test: (x: unknown) => boolean): UnaryTest {
  return Object.freeze({ kind: "unary", name, test });
}

export function binary(
  name: string,
  test: (x: unknown, y: unknown) => boolean,
): BinaryTest {
  return Object.freeze({ kind: "binary", name, test });
}

/** `x.equals(y)` when `x` has such a method, otherwise SameValueZero. */
function equal(x: unknown, y: unknown): boolean {
  if (x === y || (Number.isNaN(x) && Number.isNaN(y))) return true;
  if (typeof x === "object" && x !== null && "equals" in x) {
    const { equals } = x;
    if (typeof equals === "function") return Reflect.apply(equals, x, [y]) === true;
  }
  if (x instanceof Date && y instanceof Date) return x.getTime() === y.getTime();
  return false;
}

function compare(x: unknown, y: unknown): number | null {
  if (x instanceof Date && y instanceof Date) return x.getTime() - y.getTime();
  if (
    (typeof x === "number" || typeof x === "bigint") &&
    (typeof y === "number" || typeof y === "bigint")
  ) {
    return x < y ? -1 : x > y ? 1 : x == y ? 0 : null;
  }
  if (typeof x === "string" && typeof y === "string") {
    return x < y ? -1 : x > y ? 1 : 0;
  }
  return null;
}

export const isNull = unary("NULL", (x) => x == null);
export const isNotNull = unary("NOT_NULL", (x) => x != null);
export const isEqual = binary("EQUAL", equal);
export const isNotEqual = binary("NOT_EQUAL", (x, y) => !equal(x, y));
/** Identity rather than equality. */
export const isSame = binary("SAME", (x, y) => x === y);
export const isGreaterThan = binary("GREATER_THAN", (x, y) => (compare(x, y) ?? 0) > 0);
export const isLessThan = binary("LESS_THAN", (x, y) => (compare(x, y) ?? 0) < 0);
/** `x` is an element of the array `y`. */
export const isIn = binary(
  "IN",
  (x, y) => Array.isArray(y) && y.some((item) => equal(x, item)),
);
