/**
 * A compiled path expression: an immutable, non-empty node list plus the
 * source text it was compiled from. Expressions are cached by their
 * compiler, so equal sources give the same object.
 */

import type { PathCompiler } from "./compiler.ts";
import {
  InvalidArgumentError,
  InvalidExpressionError,
  UnsupportedOperationError,
} from "./errors.ts";
import { getStaticValue, getValue, setStaticValue, setValue } from "./evaluate.ts";
import type { PathNode } from "./nodes.ts";
import { memberType, type Member } from "./resolve.ts";
import { toNonStaticExpression } from "./expression-text.ts";
import {
  elementType,
  typeName,
  type Args,
  type Constructor,
  type EvaluateOptions,
  type StaticEvaluateOptions,
} from "./types.ts";

export class PathExpression {
  readonly #first: PathNode;
  readonly #last: PathNode;
  readonly #argumentKeys: readonly string[];

  constructor(
    /** The compiler that produced this expression and caches it. */
    readonly compiler: PathCompiler,
    readonly source: string,
    readonly nodes: readonly PathNode[],
    /** Root type of a static expression; null otherwise. */
    readonly rootType: Constructor | null,
  ) {
    const first = nodes[0];
    const last = nodes.at(-1);
    if (!first || !last) {
      throw new InvalidExpressionError(source, "expression has no nodes");
    }
    this.#first = first;
    this.#last = last;
    this.#argumentKeys = Object.freeze([
      ...new Set(nodes.flatMap((node) => node.argumentKeys)),
    ]);
  }

  get isStatic(): boolean {
    return this.rootType !== null;
  }

  get length(): number {
    return this.nodes.length;
  }

  get firstNode(): PathNode {
    return this.#first;
  }

  get lastNode(): PathNode {
    return this.#last;
  }

  /** Distinct argument keys of every node, in order of first use. */
  get argumentKeys(): readonly string[] {
    return this.#argumentKeys;
  }

  get needsArguments(): boolean {
    return this.#argumentKeys.length > 0;
  }

  /**
   * The expression made of nodes `begin` (inclusive) to `end` (exclusive).
   * A slice starting at the first node keeps the static root type.
   */
  subPath(begin: number, end: number = this.nodes.length): PathExpression {
    if (begin === 0 && end === this.nodes.length) return this;
    this.#checkRange("begin", begin, false);
    this.#checkRange("end", end, true);
    if (end <= begin) {
      throw new InvalidArgumentError(
        `end (${end}) must be greater than begin (${begin})`,
      );
    }
    const text = this.nodes
      .slice(begin, end)
      .map((node) => node.text)
      .join(".");
    return begin === 0 && this.rootType
      ? this.compiler.compile(this.rootType, text)
      : this.compiler.compile(text);
  }

  /** Drop the first `count` nodes. */
  moveForward(count = 1): PathExpression {
    return this.subPath(count, this.nodes.length);
  }

  /** Drop the last `count` nodes. */
  moveBackward(count = 1): PathExpression {
    return this.subPath(0, this.nodes.length - count);
  }

  /**
   * Append `other`. Only the non-static part of `other` is used; this
   * expression's root type, if any, is kept.
   */
  concat(other: PathExpression): PathExpression {
    return this.compiler.compile(
      `${this.source}.${other.toNonStaticExpression().source}`,
    );
  }

  toStaticExpression(type: Constructor): PathExpression {
    return this.compiler.compile(type, this.source);
  }

  toNonStaticExpression(): PathExpression {
    return this.isStatic
      ? this.compiler.compile(toNonStaticExpression(this.source))
      : this;
  }

  /**
   * The member node `index` names, found by walking declared types from
   * `owner` (the root type by default). Arrays are stepped through to their
   * element type. Null when that node indexes its target directly.
   */
  getMemberOf(index: number, owner?: Constructor, args?: Args): Member | null {
    this.#checkRange("index", index, false);
    let type = this.#owner(owner);
    for (const [i, node] of this.nodes.entries()) {
      const scope = i === 0 && this.isStatic ? "static" : "instance";
      const member = node.getMember(type, args, scope);
      if (i === index) return member;
      if (member) type = elementType(memberType(member));
    }
    return null;
  }

  getLastMember(owner?: Constructor, args?: Args): Member | null {
    return this.getMemberOf(this.nodes.length - 1, owner, args);
  }

  getValue(root: unknown, options?: EvaluateOptions): unknown {
    return getValue(this, root, options);
  }

  setValue(root: unknown, value: unknown, options?: EvaluateOptions): void {
    setValue(this, root, value, options);
  }

  getStaticValue(options?: StaticEvaluateOptions): unknown {
    return getStaticValue(this, options);
  }

  setStaticValue(value: unknown, options?: StaticEvaluateOptions): void {
    setStaticValue(this, value, options);
  }

  equals(other: unknown): boolean {
    return other instanceof PathExpression && other.source === this.source;
  }

  toString(): string {
    return this.source;
  }

  #owner(owner: Constructor | undefined): Constructor {
    if (this.rootType) {
      if (owner !== undefined && owner !== this.rootType) {
        throw new UnsupportedOperationError(
          `${this.source} only supports ${typeName(this.rootType)} as its root type`,
        );
      }
      return this.rootType;
    }
    if (owner === undefined) {
      throw new UnsupportedOperationError(
        `${this.source} is not a static expression; pass the owner type`,
      );
    }
    return owner;
  }

  #checkRange(name: string, index: number, exclusive: boolean): void {
    const size = this.nodes.length;
    if (
      !Number.isInteger(index) ||
      index < 0 ||
      (exclusive ? index > size : index >= size)
    ) {
      throw new RangeError(`${name}: ${index}, size: ${size}`);
    }
  }
}
