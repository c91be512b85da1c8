/**
 * Expression nodes: the segments of a compiled path.
 *
 *   name          FieldNode
 *   getName()     MethodNode (argument keys inside the parentheses)
 *   items[0]      ArrayNode, with `items` as its inner node
 *   [0]           ArrayNode indexing the current target itself
 *
 * A node is identified by its text. Nodes are interned per NodeTable and
 * never mutated; they hold no target data.
 */

import {
  InvalidExpressionError,
  MissingArgumentError,
  UnsupportedOperationError,
  UnsupportedWriteError,
} from "./errors.ts";
import { IS_IDENT } from "./format.ts";
import { produce, type InstanceFactory } from "./instance-factory.ts";
import type { Member, MemberResolver, MethodMember } from "./resolve.ts";
import {
  arrayOf,
  ArrayType,
  hasArgument,
  typeName,
  typeOf,
  type Args,
  type Constructor,
  type Scope,
  type Target,
  type Type,
} from "./types.ts";

const INDEX = /^\d+$/;
const NO_KEYS: readonly string[] = Object.freeze([]);

export abstract class ExpressionNode {
  abstract readonly kind: "field" | "method" | "array";

  constructor(
    readonly text: string,
    protected readonly resolver: MemberResolver,
  ) {}

  /** Keys this node reads from the argument map, in call order. */
  get argumentKeys(): readonly string[] {
    return NO_KEYS;
  }

  get needsArguments(): boolean {
    return this.argumentKeys.length > 0;
  }

  abstract getValue(target: Target, args?: Args): unknown;

  /**
   * Write `value` through this node. Returns false when the write could not
   * happen because an intermediate array was missing and `factory` could
   * not supply one.
   */
  abstract setValue(
    target: Target,
    value: unknown,
    args?: Args,
    factory?: InstanceFactory,
  ): boolean;

  /** The type this node reads or writes on `target`. */
  abstract getNodeType(target: Target, args?: Args): Type;

  abstract getStaticValue(type: Constructor, args?: Args): unknown;

  abstract setStaticValue(
    type: Constructor,
    value: unknown,
    args?: Args,
    factory?: InstanceFactory,
  ): boolean;

  abstract getStaticNodeType(type: Constructor, args?: Args): Type;

  /**
   * The member this node names on `owner`, for type walks that have no
   * instance. Null for an array node that indexes its target directly.
   */
  abstract getMember(
    owner: Constructor,
    args: Args | undefined,
    scope: Scope,
  ): Member | null;

  equals(other: unknown): boolean {
    return other instanceof ExpressionNode && other.text === this.text;
  }

  toString(): string {
    return this.text;
  }
}

export class FieldNode extends ExpressionNode {
  readonly kind = "field";

  constructor(
    readonly name: string,
    resolver: MemberResolver,
  ) {
    super(name, resolver);
  }

  getValue(target: Target, _args?: Args): unknown {
    return this.#field(target).get(target);
  }

  setValue(
    target: Target,
    value: unknown,
    _args?: Args,
    _factory?: InstanceFactory,
  ): boolean {
    this.#field(target).set(target, value);
    return true;
  }

  getNodeType(target: Target, _args?: Args): Type {
    return this.#field(target).type;
  }

  getStaticValue(type: Constructor, _args?: Args): unknown {
    return this.resolver.resolveField(type, this.name, "static").get(type);
  }

  setStaticValue(
    type: Constructor,
    value: unknown,
    _args?: Args,
    _factory?: InstanceFactory,
  ): boolean {
    this.resolver.resolveField(type, this.name, "static").set(type, value);
    return true;
  }

  getStaticNodeType(type: Constructor, _args?: Args): Type {
    return this.resolver.resolveField(type, this.name, "static").type;
  }

  getMember(owner: Constructor, _args: Args | undefined, scope: Scope): Member {
    return this.resolver.resolveField(owner, this.name, scope);
  }

  #field(target: Target) {
    return this.resolver.resolveField(typeOf(target), this.name, "instance", target);
  }
}

export class MethodNode extends ExpressionNode {
  readonly kind = "method";
  /** `setX` for a `getX` method; null when the method cannot be written through. */
  readonly setterName: string | null;
  readonly #keys: readonly string[];

  constructor(
    text: string,
    readonly name: string,
    keys: readonly string[],
    resolver: MemberResolver,
  ) {
    super(text, resolver);
    this.#keys = Object.freeze([...keys]);
    this.setterName = name.startsWith("get") ? `set${name.slice(3)}` : null;
  }

  override get argumentKeys(): readonly string[] {
    return this.#keys;
  }

  /**
   * Look up this node's arguments in `args`, in key order. Methods without
   * keys never consult the map.
   */
  argumentValues(args?: Args): unknown[] {
    if (this.#keys.length === 0) return [];
    if (args === undefined || Object.keys(args).length === 0) {
      throw new MissingArgumentError(this.text);
    }
    return this.#keys.map((key) => {
      if (!hasArgument(args, key)) throw new MissingArgumentError(this.text, key);
      return args[key];
    });
  }

  getValue(target: Target, args?: Args): unknown {
    const values = this.argumentValues(args);
    return this.resolver
      .resolveMethod(typeOf(target), this.name, values, "instance", target)
      .invoke(target, values);
  }

  setValue(
    target: Target,
    value: unknown,
    _args?: Args,
    _factory?: InstanceFactory,
  ): boolean {
    const setter = this.#setter();
    this.resolver
      .resolveMethod(typeOf(target), setter, [value], "instance", target)
      .invoke(target, [value]);
    return true;
  }

  getNodeType(target: Target, args?: Args): Type {
    const values = this.argumentValues(args);
    return this.resolver.resolveMethod(
      typeOf(target),
      this.name,
      values,
      "instance",
      target,
    ).returnType;
  }

  getStaticValue(type: Constructor, args?: Args): unknown {
    const values = this.argumentValues(args);
    return this.resolver
      .resolveMethod(type, this.name, values, "static")
      .invoke(type, values);
  }

  setStaticValue(
    type: Constructor,
    value: unknown,
    _args?: Args,
    _factory?: InstanceFactory,
  ): boolean {
    const setter = this.#setter();
    this.resolver.resolveMethod(type, setter, [value], "static").invoke(type, [value]);
    return true;
  }

  getStaticNodeType(type: Constructor, args?: Args): Type {
    return this.getMember(type, args, "static").returnType;
  }

  getMember(owner: Constructor, args: Args | undefined, scope: Scope): MethodMember {
    return this.resolver.resolveMethod(owner, this.name, this.argumentValues(args), scope);
  }

  #setter(): string {
    if (this.setterName === null) throw new UnsupportedWriteError(this.text);
    return this.setterName;
  }
}

export class ArrayNode extends ExpressionNode {
  readonly kind = "array";

  constructor(
    text: string,
    readonly index: number,
    /** Node producing the array; undefined when the target itself is indexed. */
    readonly inner: PathNode | undefined,
    resolver: MemberResolver,
  ) {
    super(text, resolver);
  }

  override get argumentKeys(): readonly string[] {
    return this.inner ? this.inner.argumentKeys : NO_KEYS;
  }

  getValue(target: Target, args?: Args): unknown {
    const array = this.inner ? this.inner.getValue(target, args) : target;
    return this.#load(array);
  }

  setValue(
    target: Target,
    value: unknown,
    args?: Args,
    factory?: InstanceFactory,
  ): boolean {
    let array: unknown = target;
    if (this.inner) {
      array = this.inner.getValue(target, args);
      if (array == null) {
        if (!factory) return false;
        array = produce(factory, arrayTypeOf(this.inner.getNodeType(target, args)), args);
        if (array == null) return false;
        this.inner.setValue(target, array, args, factory);
      }
    }
    this.#store(array, value);
    return true;
  }

  getNodeType(target: Target, args?: Args): Type {
    return this.inner ? componentOf(this.inner.getNodeType(target, args)) : Object;
  }

  getStaticValue(type: Constructor, args?: Args): unknown {
    return this.#load(this.#staticInner(type).getStaticValue(type, args));
  }

  setStaticValue(
    type: Constructor,
    value: unknown,
    args?: Args,
    factory?: InstanceFactory,
  ): boolean {
    const inner = this.#staticInner(type);
    let array = inner.getStaticValue(type, args);
    if (array == null) {
      if (!factory) return false;
      array = produce(factory, arrayTypeOf(inner.getStaticNodeType(type, args)), args);
      if (array == null) return false;
      inner.setStaticValue(type, array, args, factory);
    }
    this.#store(array, value);
    return true;
  }

  getStaticNodeType(type: Constructor, args?: Args): Type {
    return componentOf(this.#staticInner(type).getStaticNodeType(type, args));
  }

  getMember(owner: Constructor, args: Args | undefined, scope: Scope): Member | null {
    return this.inner ? this.inner.getMember(owner, args, scope) : null;
  }

  #staticInner(type: Constructor): PathNode {
    if (!this.inner) {
      throw new UnsupportedOperationError(
        `${this.text} indexes its target, which cannot be the type ${typeName(type)}`,
      );
    }
    return this.inner;
  }

  #load(array: unknown): unknown {
    if (array == null) return null;
    return this.#items(array)[this.index];
  }

  #store(array: unknown, value: unknown): void {
    this.#items(array)[this.index] = value;
  }

  #items(array: unknown): unknown[] {
    if (!Array.isArray(array)) {
      const type =
        typeof array === "object" && array !== null
          ? typeName(typeOf(array))
          : typeof array;
      throw new UnsupportedOperationError(`${this.text}: ${type} is not an array`);
    }
    const items: unknown[] = array;
    return items;
  }
}

export type PathNode = FieldNode | MethodNode | ArrayNode;

function componentOf(type: Type): Type {
  return type instanceof ArrayType ? type.componentType : Object;
}

/** The array type to request for an empty slot declared as `type`. */
function arrayTypeOf(type: Type): Type {
  return type === Object ? arrayOf(Object) : type;
}

/**
 * Per-compiler node cache. Parsing the same segment text twice returns the
 * same node.
 */
export class NodeTable {
  readonly #nodes = new Map<string, PathNode>();

  constructor(readonly resolver: MemberResolver) {}

  get size(): number {
    return this.#nodes.size;
  }

  /** Parse one segment, throwing `InvalidExpressionError` on bad syntax. */
  node(text: string): PathNode {
    let node = this.#nodes.get(text);
    if (!node) {
      node = this.#parse(text);
      this.#nodes.set(text, node);
    }
    return node;
  }

  clear(): void {
    this.#nodes.clear();
  }

  #parse(text: string): PathNode {
    if (text.endsWith(")")) return this.#method(text);
    if (text.endsWith("]")) return this.#array(text);
    if (!IS_IDENT.test(text)) {
      throw new InvalidExpressionError(text, "field name is not an identifier");
    }
    return new FieldNode(text, this.resolver);
  }

  #method(text: string): MethodNode {
    const open = text.indexOf("(");
    const name = text.slice(0, open);
    if (open < 0 || !IS_IDENT.test(name)) {
      throw new InvalidExpressionError(text, "method name is not an identifier");
    }
    const inside = text.slice(open + 1, -1).trim();
    const keys = inside === "" ? [] : inside.split(",").map((key) => key.trim());
    for (const key of keys) {
      if (!IS_IDENT.test(key)) {
        throw new InvalidExpressionError(
          text,
          `argument key ${JSON.stringify(key)} is not an identifier`,
        );
      }
    }
    return new MethodNode(text, name, keys, this.resolver);
  }

  #array(text: string): ArrayNode {
    const open = text.lastIndexOf("[");
    const indexText = open < 0 ? "" : text.slice(open + 1, -1).trim();
    const index = Number(indexText);
    if (!INDEX.test(indexText) || !Number.isSafeInteger(index)) {
      throw new InvalidExpressionError(text, "index is not a non-negative integer");
    }
    const prefix = text.slice(0, open);
    const inner = prefix === "" ? undefined : this.node(prefix);
    return new ArrayNode(text, index, inner, this.resolver);
  }
}
