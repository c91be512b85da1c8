/**
 * Path evaluation: reads, writes and autovivification.
 *
 * A read walks the nodes in order and returns null as soon as a value is
 * missing. When the caller passes an instance factory, a missing value at a
 * non-terminal node is produced by the factory and written back first, so
 * reads with a factory can change the graph.
 *
 * A write always autovivifies, using the compiler's factory when the caller
 * passes none. If the factory cannot produce a value the write is
 * abandoned: the `abandonedWrite` event fires, and with `strictWrites` an
 * `InstantiationError` is thrown.
 */

import {
  InstantiationError,
  UnsupportedOperationError,
} from "./errors.ts";
import { produce, type InstanceFactory } from "./instance-factory.ts";
import type { PathNode } from "./nodes.ts";
import type { PathExpression } from "./path-expression.ts";
import {
  arrayOf,
  typeName,
  type Args,
  type Constructor,
  type EvaluateOptions,
  type StaticEvaluateOptions,
  type Target,
  type Type,
} from "./types.ts";

type Position =
  | { readonly static: true; readonly type: Constructor }
  | { readonly static: false; readonly target: Target };

type Walk =
  | { readonly at: Position }
  | { readonly at: null; readonly index: number; readonly type: Type | null };

function read(node: PathNode, at: Position, args: Args | undefined): unknown {
  return at.static
    ? node.getStaticValue(at.type, args)
    : node.getValue(at.target, args);
}

function nodeType(node: PathNode, at: Position, args: Args | undefined): Type {
  return at.static
    ? node.getStaticNodeType(at.type, args)
    : node.getNodeType(at.target, args);
}

function write(
  node: PathNode,
  at: Position,
  value: unknown,
  args: Args | undefined,
  factory: InstanceFactory | undefined,
): boolean {
  return at.static
    ? node.setStaticValue(at.type, value, args, factory)
    : node.setValue(at.target, value, args, factory);
}

/**
 * Walk every node but the last. Empty slots are filled from `factory` when
 * one is given; otherwise the walk stops at the first empty slot.
 */
function walk(
  path: PathExpression,
  start: Position,
  args: Args | undefined,
  factory: InstanceFactory | undefined,
): Walk {
  let at = start;
  for (const [index, node] of path.nodes.slice(0, -1).entries()) {
    let next = read(node, at, args);
    if (next == null) {
      if (!factory) return { at: null, index, type: null };
      const type = nodeType(node, at, args);
      next = produce(factory, type, args);
      if (next == null || !write(node, at, next, args, factory)) {
        return { at: null, index, type };
      }
      path.compiler.emit("autovivify", {
        expression: path.source,
        index,
        node: node.text,
        type: typeName(type),
        value: next,
      });
    }
    at = { static: false, target: next };
  }
  return { at };
}

function evaluate(
  path: PathExpression,
  start: Position,
  { args, factory }: EvaluateOptions,
): unknown {
  const result = walk(path, start, args, factory);
  if (!result.at) return null;
  return read(path.lastNode, result.at, args) ?? null;
}

function assign(
  path: PathExpression,
  start: Position,
  value: unknown,
  { args, factory = path.compiler.factory }: EvaluateOptions,
): void {
  const result = walk(path, start, args, factory);
  if (!result.at) {
    abandon(path, result.index, result.type ?? Object);
    return;
  }
  const last = path.lastNode;
  if (!write(last, result.at, value, args, factory)) {
    // Only an array node refuses a write: its inner array could not be made.
    abandon(path, path.nodes.length - 1, arrayOf(nodeType(last, result.at, args)));
  }
}

function abandon(path: PathExpression, index: number, type: Type): void {
  path.compiler.emit("abandonedWrite", {
    expression: path.source,
    index,
    node: path.nodes[index]?.text ?? "",
    type: typeName(type),
  });
  if (path.compiler.strictWrites) throw new InstantiationError(typeName(type));
}

function staticRoot(path: PathExpression, type: Constructor | undefined): Position {
  if (path.rootType) {
    if (type !== undefined && type !== path.rootType) {
      throw new UnsupportedOperationError(
        `${path.source} is bound to ${typeName(path.rootType)}, not ${typeName(type)}`,
      );
    }
    return { static: true, type: path.rootType };
  }
  if (type === undefined) {
    throw new UnsupportedOperationError(
      `${path.source} is not a static expression; pass the root type`,
    );
  }
  return { static: true, type };
}

/** Read `path` from `root`. Returns null for a null root or any missing value. */
export function getValue(
  path: PathExpression,
  root: unknown,
  options: EvaluateOptions = {},
): unknown {
  if (root == null) return null;
  if (path.isStatic) {
    throw new UnsupportedOperationError(
      `${path.source} is a static expression and does not accept a root object`,
    );
  }
  return evaluate(path, { static: false, target: root }, options);
}

/**
 * Write `value` at `path` under `root`, creating missing intermediate values.
 * A null root abandons the write.
 */
export function setValue(
  path: PathExpression,
  root: unknown,
  value: unknown,
  options: EvaluateOptions = {},
): void {
  if (path.isStatic) {
    throw new UnsupportedOperationError(
      `${path.source} is a static expression and does not accept a root object`,
    );
  }
  if (root == null) {
    abandon(path, 0, Object);
    return;
  }
  assign(path, { static: false, target: root }, value, options);
}

/**
 * Read `path` starting from static members: of its own root type, or of
 * `options.type` for a non-static expression.
 */
export function getStaticValue(
  path: PathExpression,
  options: StaticEvaluateOptions = {},
): unknown {
  return evaluate(path, staticRoot(path, options.type), options);
}

export function setStaticValue(
  path: PathExpression,
  value: unknown,
  options: StaticEvaluateOptions = {},
): void {
  assign(path, staticRoot(path, options.type), value, options);
}
