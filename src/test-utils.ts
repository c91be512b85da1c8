/**
 * Test fixtures: a small decorated object graph.
 *
 * Each test file gets a fresh module instance, so the @named registrations
 * below happen once per file.
 */

import { z } from "zod";
import { field, method, named } from "./decorators.ts";
import { createCompiler } from "./compiler.ts";
import type { CompilerEvent, CompilerEventInfo } from "./hooks.ts";
import { DelegatedInstanceFactory } from "./instance-factory.ts";
import { TypeRegistry } from "./type-registry.ts";
import { arrayOf, type CompilerOptions } from "./types.ts";

@named("example.Address")
export class Address {
  @field(String) state: string | null = null;
  @field(String) country: string | null = null;
}

@named("example.Person")
export class Person {
  @field(String) static NAME = "foo";
  @field(String) static NULL: string | null = null;
  @field(Address) static ADDRESS = new Address();
  static count = 0;

  @field(String) name: string | null;
  @field(arrayOf(Address)) addresses: Address[] | null;
  @field(Address) home: Address | null = null;
  nickname = "";
  #phones: string[] | null = null;

  constructor(name: string | null = null, addresses: Address[] | null = null) {
    this.name = name;
    this.addresses = addresses;
  }

  @method(String)
  getName(): string | null {
    return this.name;
  }

  setName(name: string | null): void {
    this.name = name;
  }

  @method(arrayOf(String))
  getPhones(): string[] | null {
    return this.#phones;
  }

  setPhones(phones: string[] | null): void {
    this.#phones = phones;
  }

  @method(Boolean, z.string())
  hasPhone(phone: string): boolean {
    return this.#phones?.includes(phone) ?? false;
  }

  @method(String, z.string())
  greet(greeting: string): string {
    return `${greeting}, ${this.name}`;
  }

  @method(Address)
  primaryAddress(): Address | null {
    return this.addresses?.[0] ?? null;
  }

  @method(String)
  static getDefaultName(): string {
    return Person.NAME;
  }

  static setDefaultName(name: string): void {
    Person.NAME = name;
  }

  @method(String, z.instanceof(Person).nullable())
  static lowercaseName(person: Person | null): string | null {
    return person?.name?.toLowerCase() ?? null;
  }
}

@named("example.Grid")
export class Grid {
  @field(arrayOf(arrayOf(Number))) cells: number[][] | null = null;
  @field(Object) meta: Record<string, unknown> | null = null;
}

/** A class whose constructor requires an argument. */
export class Strict {
  constructor(readonly id: string) {
    if (typeof id !== "string") throw new TypeError("id is required");
  }
}

/** Factory that gives `Address[]` slots a fixed length of `size`. */
export function sizedAddressFactory(size = 5): DelegatedInstanceFactory {
  return new DelegatedInstanceFactory().put(arrayOf(Address), () =>
    Array.from({ length: size }, () => null),
  );
}

/**
 * A compiler with its own registry (holding the fixtures) and a recorder of
 * every event it emits.
 */
export function isolatedCompiler(options: CompilerOptions = {}) {
  const registry = new TypeRegistry()
    .register("example.Person", Person)
    .register("example.Address", Address)
    .register("example.Grid", Grid);
  const compiler = createCompiler({ registry, ...options });
  const events: { [E in CompilerEvent]: CompilerEventInfo[E][] } = {
    compile: [],
    autovivify: [],
    abandonedWrite: [],
  };
  compiler.on("compile", (info) => events.compile.push(info));
  compiler.on("autovivify", (info) => events.autovivify.push(info));
  compiler.on("abandonedWrite", (info) => events.abandonedWrite.push(info));
  return { compiler, registry, events };
}
