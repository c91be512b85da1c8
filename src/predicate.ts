/**
 * Predicates over path expressions.
 *
 * `when` is evaluated on the first root, `than` on the second, and `is`
 * decides:
 *
 *   PathExpressionPredicate.of("name", isEqual, "class(example.Person)NAME", DENY_ALL)
 *
 * A method node taking the argument key `rootObj` receives the root its
 * side is evaluated on, unless the caller passes its own argument map.
 */

import { defaultCompiler, type PathCompiler } from "./compiler.ts";
import { InvalidArgumentError } from "./errors.ts";
import type { InstanceFactory } from "./instance-factory.ts";
import { UNDEFINED, type IsTest } from "./is.ts";
import type { PathExpression } from "./path-expression.ts";
import { isConstructor, type Args } from "./types.ts";

export const ROOT_OBJ_KEY = "rootObj";

/**
 * The argument map to evaluate `path` with: `args` when given, otherwise a
 * map binding `rootObj` to `root` if `path` uses that key.
 */
export function rootArgs(
  path: PathExpression,
  root: unknown,
  args: Args | undefined,
): Args | undefined {
  if (args !== undefined) return args;
  return path.argumentKeys.includes(ROOT_OBJ_KEY)
    ? { [ROOT_OBJ_KEY]: root }
    : undefined;
}

/**
 * Static paths are evaluated from their own root type; a class passed as
 * the root selects static evaluation against that class.
 */
function evaluateSide(
  path: PathExpression,
  root: unknown,
  args: Args | undefined,
  factory: InstanceFactory | undefined,
): unknown {
  if (path.isStatic) return path.getStaticValue({ args, factory });
  if (isConstructor(root)) return path.getStaticValue({ type: root, args, factory });
  return path.getValue(root, { args, factory });
}

export class PathExpressionPredicate {
  static readonly ACCEPT_ALL = new PathExpressionPredicate(null, UNDEFINED, null, true);
  static readonly DENY_ALL = new PathExpressionPredicate(null, UNDEFINED, null, false);

  private constructor(
    readonly when: PathExpression | null,
    readonly is: IsTest,
    readonly than: PathExpression | null,
    /** Result of a predicate without a `when` path. */
    readonly defaultValue: boolean,
  ) {}

  /**
   * Build a predicate, or return `defaultPredicate` itself when `when`,
   * `is` and `than` are all empty. Throws `InvalidArgumentError` for an
   * inconsistent combination.
   */
  static of<D extends PathExpressionPredicate | null>(
    when: string,
    is: IsTest,
    than: string,
    defaultPredicate: D,
    compiler: PathCompiler = defaultCompiler,
  ): PathExpressionPredicate | D {
    const hasWhen = when.trim() !== "";
    const hasThan = than.trim() !== "";
    if (!hasWhen) {
      if (is.kind !== "undefined") {
        throw new InvalidArgumentError(
          "The [is] predicate cannot be defined if the [when] path expression is not specified.",
        );
      }
      if (hasThan) {
        throw new InvalidArgumentError(
          "The [than] path expression cannot be specified if the [when] path expression is not specified.",
        );
      }
      return defaultPredicate;
    }
    if (is.kind === "undefined") {
      throw new InvalidArgumentError(
        "The [is] predicate cannot be undefined if the [when] path expression is specified.",
      );
    }
    if (is.kind === "binary" && !hasThan) {
      throw new InvalidArgumentError(
        `The [than] path expression must be specified because the [${is.name}] predicate requires two values.`,
      );
    }
    if (is.kind === "unary" && hasThan) {
      throw new InvalidArgumentError(
        `The [than] path expression cannot be specified because the [${is.name}] predicate requires only one value.`,
      );
    }
    return new PathExpressionPredicate(
      compiler.compile(when),
      is,
      is.kind === "binary" ? compiler.compile(than) : null,
      false,
    );
  }

  get needsArguments(): boolean {
    return Boolean(this.when?.needsArguments || this.than?.needsArguments);
  }

  /** True when the only argument key either side uses is `rootObj`, or none is used. */
  hasOnlyRootObjKey(): boolean {
    return [...(this.when?.argumentKeys ?? []), ...(this.than?.argumentKeys ?? [])]
      .every((key) => key === ROOT_OBJ_KEY);
  }

  /**
   * Evaluate `when` on `rootA` and, for a binary test, `than` on `rootB`,
   * then apply the test.
   */
  test(
    rootA: unknown,
    rootB: unknown = rootA,
    args?: Args,
    factory?: InstanceFactory,
  ): boolean {
    if (!this.when) return this.defaultValue;
    const x = evaluateSide(this.when, rootA, rootArgs(this.when, rootA, args), factory);
    const is = this.is;
    switch (is.kind) {
      case "undefined":
        return this.defaultValue;
      case "unary":
        return is.test(x);
      case "binary": {
        if (!this.than) return this.defaultValue;
        const y = evaluateSide(this.than, rootB, rootArgs(this.than, rootB, args), factory);
        return is.test(x, y);
      }
    }
  }

  equals(other: unknown): boolean {
    return (
      other instanceof PathExpressionPredicate &&
      sameSource(this.when, other.when) &&
      this.is === other.is &&
      sameSource(this.than, other.than) &&
      this.defaultValue === other.defaultValue
    );
  }

  toString(): string {
    if (!this.when) return `PathExpressionPredicate(${this.defaultValue})`;
    const parts = [this.when.source, this.is.name];
    if (this.than) parts.push(this.than.source);
    return `PathExpressionPredicate(${parts.join(" ")})`;
  }
}

function sameSource(a: PathExpression | null, b: PathExpression | null): boolean {
  return a === b || (a !== null && a.equals(b));
}

export const { ACCEPT_ALL, DENY_ALL } = PathExpressionPredicate;
