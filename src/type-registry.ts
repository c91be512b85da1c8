/**
 * Type names for static path expressions.
 *
 * `class(example.Person)count` names its root type in text, so each name
 * must map to exactly one constructor and back.
 */

import type { Constructor } from "./types.ts";

export class UnknownTypeError extends Error {
  constructor(readonly typeName: string) {
    super(`Type not found: ${typeName}`);
    this.name = "UnknownTypeError";
  }
}

export class TypeRegistry {
  readonly #byName = new Map<string, Constructor>();
  readonly #byType = new Map<Constructor, string>();

  /**
   * Bind `name` to `type`. Re-registering the same pair is a no-op; binding
   * a taken name or an already named type to something else throws.
   */
  register(name: string, type: Constructor): this {
    const existing = this.#byName.get(name);
    if (existing === type) return this;
    if (existing) {
      throw new Error(`Type name ${name} is already bound to ${existing.name}`);
    }
    const existingName = this.#byType.get(type);
    if (existingName !== undefined) {
      throw new Error(`${type.name} is already registered as ${existingName}`);
    }
    this.#byName.set(name, type);
    this.#byType.set(type, name);
    return this;
  }

  /** Look up a type by name, throwing `UnknownTypeError` when absent. */
  resolve(name: string): Constructor {
    const type = this.#byName.get(name);
    if (!type) throw new UnknownTypeError(name);
    return type;
  }

  /**
   * The registered name of `type`. An unregistered type is registered under
   * its class name first.
   */
  nameOf(type: Constructor): string {
    const name = this.#byType.get(type);
    if (name !== undefined) return name;
    if (!type.name) {
      throw new Error("Anonymous classes must be registered explicitly");
    }
    this.register(type.name, type);
    return type.name;
  }

  has(name: string): boolean {
    return this.#byName.has(name);
  }
}

export const defaultTypeRegistry = new TypeRegistry();
