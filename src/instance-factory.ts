/**
 * Instance factories supply the values autovivification writes into empty
 * intermediate slots.
 */

import { InstantiationError } from "./errors.ts";
import { defaultResolver, type MemberResolver } from "./resolve.ts";
import { ArrayType, typeName, type Args, type Type } from "./types.ts";

export interface InstanceFactory {
  /** Produce a value of `type`. May return null when no value can be made. */
  get(type: Type, args?: Args): unknown;
}

/** Producer for one type; receives the argument map of the evaluation. */
export type Producer<T = unknown> = (args?: Args) => T;

/**
 * Factory that delegates to a producer registered per type and falls back
 * to default construction: `new Array()` for array types, the resolver's
 * `construct` for classes.
 */
export class DelegatedInstanceFactory implements InstanceFactory {
  readonly #producers = new Map<Type, Producer>();
  readonly #resolver: MemberResolver;

  constructor(resolver: MemberResolver = defaultResolver) {
    this.#resolver = resolver;
  }

  get(type: Type, args?: Args): unknown {
    const producer = this.#producers.get(type);
    if (producer) return producer(args);
    if (type instanceof ArrayType) return [];
    return this.#resolver.construct(type);
  }

  /** Register `producer` for `type`, replacing any previous one. */
  put<T>(type: Type, producer: Producer<T>): this {
    this.#producers.set(type, producer);
    return this;
  }

  /** Revert `type` to default construction. */
  remove(type: Type): this {
    this.#producers.delete(type);
    return this;
  }

  has(type: Type): boolean {
    return this.#producers.has(type);
  }
}

/**
 * A factory whose producers for the primitive wrappers return the canonical
 * zero value instead of allocating a boxed object.
 */
export function createDefaultInstanceFactory(
  resolver?: MemberResolver,
): DelegatedInstanceFactory {
  return new DelegatedInstanceFactory(resolver)
    .put(Number, () => 0)
    .put(Boolean, () => false)
    .put(String, () => "");
}

export const defaultInstanceFactory = createDefaultInstanceFactory();

/** Ask `factory` for a `type`, attributing a thrown error to that type. */
export function produce(
  factory: InstanceFactory,
  type: Type,
  args: Args | undefined,
): unknown {
  try {
    return factory.get(type, args);
  } catch (err) {
    if (err instanceof InstantiationError) throw err;
    throw new InstantiationError(typeName(type), { cause: err });
  }
}
