/**
 * Raw get/set/invoke/construct primitives. No type checking happens here;
 * callers resolve members first.
 */

import { InstantiationError } from "./errors.ts";
import { typeName, type Constructor, type Target } from "./types.ts";

export const BLOCKED_NAMES: ReadonlySet<string> = new Set([
  "constructor",
  "__proto__",
  "prototype",
]);

/**
 * Find a property descriptor on `obj` or its prototype chain, stopping before
 * `stopAt` (exclusive).
 */
export function findDescriptor(
  obj: object,
  name: string,
  stopAt: object | null = null,
): PropertyDescriptor | undefined {
  let current: object | null = obj;
  while (current && current !== stopAt) {
    const descriptor = Object.getOwnPropertyDescriptor(current, name);
    if (descriptor) return descriptor;
    current = Object.getPrototypeOf(current);
  }
  return undefined;
}

export function readProperty(target: Target, name: string): unknown {
  return Reflect.get(Object(target), name);
}

export function writeProperty(
  target: Target,
  name: string,
  value: unknown,
): void {
  if (typeof target !== "object" && typeof target !== "function") {
    throw new TypeError(`Cannot assign '${name}' on a ${typeof target}`);
  }
  if (!Reflect.set(target, name, value)) {
    throw new TypeError(`Cannot assign to read only property '${name}'`);
  }
}

export function invoke(
  receiver: unknown,
  fn: Function,
  args: readonly unknown[],
): unknown {
  return Reflect.apply(fn, receiver, args);
}

/** Construct `type`, wrapping any failure in `InstantiationError`. */
export function newInstance<T>(
  type: Constructor<T>,
  args: readonly unknown[] = [],
): T {
  try {
    return new type(...args);
  } catch (err) {
    throw new InstantiationError(typeName(type), { cause: err });
  }
}
