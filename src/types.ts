/**
 * Runtime type model.
 *
 * A type is either a class constructor or an `ArrayType` describing an
 * array of some component type. `Object` is the open type: members of a
 * plain record are not known ahead of time, so any name resolves on it.
 */

import type { MemberResolver } from "./resolve.ts";
import type { InstanceFactory } from "./instance-factory.ts";
import type { TypeRegistry } from "./type-registry.ts";

export type Constructor<T = unknown> = new (...args: any[]) => T;

export class ArrayType {
  constructor(readonly componentType: Type) {}

  get name(): string {
    return `${typeName(this.componentType)}[]`;
  }
}

export type Type = Constructor | ArrayType;

/** Any value a path can step through: everything except null and undefined. */
export type Target = NonNullable<unknown>;

/** Argument map consulted by method nodes, keyed by argument key. */
export type Args = Readonly<Record<string, unknown>>;

export type Scope = "instance" | "static";

const arrayTypes = new Map<Type, ArrayType>();

/** Array type of `componentType`. Repeated calls return the same object. */
export function arrayOf(componentType: Type): ArrayType {
  let type = arrayTypes.get(componentType);
  if (!type) {
    type = new ArrayType(componentType);
    arrayTypes.set(componentType, type);
  }
  return type;
}

export function isConstructor(value: unknown): value is Constructor {
  return typeof value === "function" && value.prototype !== undefined;
}

export function typeName(type: Type): string {
  return type instanceof ArrayType ? type.name : type.name || "<anonymous>";
}

/** The runtime type of a value, following its constructor. */
export function typeOf(value: Target): Constructor {
  if (Array.isArray(value)) return Array;
  const ctor: unknown = Object(value).constructor;
  return isConstructor(ctor) ? ctor : Object;
}

/** Strip array dimensions, e.g. `Address[][]` → `Address`. */
export function elementType(type: Type): Constructor {
  let current = type;
  while (current instanceof ArrayType) current = current.componentType;
  return current;
}

export function hasArgument(args: Args | undefined, key: string): boolean {
  return args !== undefined && Object.hasOwn(args, key);
}

// -- Compiler options --

export interface CompilerOptions {
  /** Member lookup used by every node this compiler creates. */
  resolver?: MemberResolver;
  /** Names usable inside `class(...)` prefixes. */
  registry?: TypeRegistry;
  /** Factory used by writes when the caller passes none. */
  factory?: InstanceFactory;
  /** Maximum number of top-level segments in one expression (default 64). */
  maxNodes?: number;
  /** Throw instead of abandoning a write whose intermediate value cannot be produced. */
  strictWrites?: boolean;
}

export interface EvaluateOptions {
  args?: Args;
  factory?: InstanceFactory;
}

export interface StaticEvaluateOptions extends EvaluateOptions {
  /** Root type for a non-static expression. Must match a static expression's own root type. */
  type?: Constructor;
}
