/**
 * Path compiler: turns text into cached `PathExpression`s.
 *
 * Each compiler owns its caches, its node table and its event handlers, so
 * separate compilers never share state. `defaultCompiler` backs the free
 * `compile` function.
 */

import { InvalidExpressionError } from "./errors.ts";
import { parseStatic, splitSegments, toStaticExpression } from "./expression-text.ts";
import type {
  CompilerEvent,
  CompilerEventInfo,
  CompilerEventMap,
} from "./hooks.ts";
import {
  defaultInstanceFactory,
  type InstanceFactory,
} from "./instance-factory.ts";
import { NodeTable, type PathNode } from "./nodes.ts";
import { PathExpression } from "./path-expression.ts";
import { defaultResolver, type MemberResolver } from "./resolve.ts";
import { defaultTypeRegistry, type TypeRegistry } from "./type-registry.ts";
import type { CompilerOptions, Constructor } from "./types.ts";

const DEFAULT_MAX_NODES = 64;

type HandlerSets = {
  [E in CompilerEvent]: Set<CompilerEventMap[E]>;
};

export class PathCompiler {
  readonly resolver: MemberResolver;
  readonly registry: TypeRegistry;
  /** Factory for writes that do not pass one. */
  readonly factory: InstanceFactory;
  readonly maxNodes: number;
  readonly strictWrites: boolean;

  readonly #expressions = new Map<string, PathExpression>();
  readonly #nodes: NodeTable;
  readonly #handlers: HandlerSets = {
    compile: new Set(),
    autovivify: new Set(),
    abandonedWrite: new Set(),
  };

  constructor(options: CompilerOptions = {}) {
    this.resolver = options.resolver ?? defaultResolver;
    this.registry = options.registry ?? defaultTypeRegistry;
    this.factory = options.factory ?? defaultInstanceFactory;
    this.maxNodes = options.maxNodes ?? DEFAULT_MAX_NODES;
    this.strictWrites = options.strictWrites ?? false;
    this.#nodes = new NodeTable(this.resolver);
  }

  /** Number of cached expressions. */
  get size(): number {
    return this.#expressions.size;
  }

  /**
   * Compile `text`, or bind it to `rootType` as a static expression.
   * Repeated calls with the same trimmed text return the same object.
   */
  compile(text: string): PathExpression;
  compile(rootType: Constructor | null | undefined, text: string): PathExpression;
  compile(
    first: string | Constructor | null | undefined,
    text?: string,
  ): PathExpression {
    if (typeof first === "string") return this.#compile(first);
    if (text === undefined) {
      throw new InvalidExpressionError("", "expression is missing");
    }
    if (first == null) return this.#compile(text);
    let name: string;
    try {
      name = this.registry.nameOf(first);
    } catch (err) {
      throw new InvalidExpressionError(text, "cannot name the root type", {
        cause: err,
      });
    }
    return this.#compile(toStaticExpression(name, text));
  }

  /** Drop every cached expression and node. */
  clear(): void {
    this.#expressions.clear();
    this.#nodes.clear();
  }

  on<E extends CompilerEvent>(event: E, handler: CompilerEventMap[E]): void {
    this.#handlers[event].add(handler);
  }

  off<E extends CompilerEvent>(event: E, handler: CompilerEventMap[E]): void {
    this.#handlers[event].delete(handler);
  }

  /** @internal Called by the evaluator. */
  emit<E extends CompilerEvent>(event: E, info: CompilerEventInfo[E]): void {
    for (const handler of this.#handlers[event]) handler(info);
  }

  #compile(raw: string): PathExpression {
    if (typeof raw !== "string" || raw.trim() === "") {
      throw new InvalidExpressionError(String(raw).trim(), "expression is empty");
    }
    const source = raw.trim();
    const cached = this.#expressions.get(source);
    if (cached) return cached;

    const parts = parseStatic(source);
    let rootType: Constructor | null = null;
    if (parts) {
      try {
        rootType = this.registry.resolve(parts.typeName);
      } catch (err) {
        throw new InvalidExpressionError(source, `unknown type "${parts.typeName}"`, {
          cause: err,
        });
      }
    }

    const segments = splitSegments(source, parts ? parts.body : source);
    if (segments.length > this.maxNodes) {
      throw new InvalidExpressionError(
        source,
        `more than ${this.maxNodes} nodes (${segments.length})`,
      );
    }
    const nodes = segments.map((segment) => this.#node(source, segment));
    const expression = new PathExpression(this, source, nodes, rootType);

    if (rootType) {
      // Method matching needs argument values, so the walk stops before the
      // first node that takes arguments.
      const open = nodes.findIndex((node) => node.needsArguments);
      try {
        if (open < 0) expression.getLastMember();
        else if (open > 0) expression.getMemberOf(open - 1);
      } catch (err) {
        throw new InvalidExpressionError(
          source,
          `does not resolve against ${parts?.typeName}`,
          { cause: err },
        );
      }
    }

    this.#expressions.set(source, expression);
    this.emit("compile", {
      expression: source,
      nodes: nodes.length,
      rootType: parts ? parts.typeName : null,
    });
    return expression;
  }

  #node(source: string, segment: string): PathNode {
    try {
      return this.#nodes.node(segment);
    } catch (err) {
      if (!(err instanceof InvalidExpressionError)) throw err;
      throw new InvalidExpressionError(
        source,
        `invalid segment ${JSON.stringify(segment)}`,
        { cause: err },
      );
    }
  }
}

export function createCompiler(options?: CompilerOptions): PathCompiler {
  return new PathCompiler(options);
}

export const defaultCompiler = new PathCompiler();

/** Compile with `defaultCompiler`. */
export function compile(text: string): PathExpression;
export function compile(
  rootType: Constructor | null | undefined,
  text: string,
): PathExpression;
export function compile(
  first: string | Constructor | null | undefined,
  text?: string,
): PathExpression {
  if (typeof first === "string") return defaultCompiler.compile(first);
  if (text === undefined) {
    throw new InvalidExpressionError("", "expression is missing");
  }
  return defaultCompiler.compile(first, text);
}
