/**
 * Legacy TypeScript decorators: @field, @method, @named
 *
 * Runtime values carry no declared types, so the members a path walks
 * through record them here:
 *   (target, propertyKey, descriptor?)
 *
 * `target` is the prototype for instance members and the constructor for
 * static members. Metadata is stored via WeakMaps keyed by constructor
 * identity and inherited along the constructor chain.
 * Parameter schemas use Standard Schema (https://standardschema.dev/).
 */

import type { StandardSchemaV1 } from "@standard-schema/spec";
import { defaultTypeRegistry } from "./type-registry.ts";
import {
  ArrayType,
  isConstructor,
  type Constructor,
  type Scope,
  type Type,
} from "./types.ts";

export interface FieldMeta {
  name: string;
  type: Type;
  static: boolean;
}

export interface MethodMeta {
  name: string;
  returnType: Type;
  schemas: StandardSchemaV1[];
  static: boolean;
}

export type MemberDecorator = (
  target: object,
  propertyKey: string,
  descriptor?: PropertyDescriptor,
) => void;

// -- Metadata storage (WeakMaps keyed by constructor) --

type Store<V> = WeakMap<Function, Map<string, V>>;

const fieldStores: Record<Scope, Store<FieldMeta>> = {
  instance: new WeakMap(),
  static: new WeakMap(),
};

const methodStores: Record<Scope, Store<MethodMeta>> = {
  instance: new WeakMap(),
  static: new WeakMap(),
};

function getOrCreate<V>(ctor: Function, store: Store<V>): Map<string, V> {
  let map = store.get(ctor);
  if (!map) {
    map = new Map();
    store.set(ctor, map);
  }
  return map;
}

/** Merge metadata from `cls` and its ancestors; the nearest declaration wins. */
function collectFromChain<V>(cls: Function, store: Store<V>): Map<string, V> {
  const result = new Map<string, V>();
  let current: unknown = cls;
  while (typeof current === "function" && current !== Function.prototype) {
    const own = store.get(current);
    if (own) {
      for (const [name, val] of own) {
        if (!result.has(name)) result.set(name, val);
      }
    }
    current = Object.getPrototypeOf(current);
  }
  return result;
}

export function getFields(
  cls: Constructor,
  scope: Scope = "instance",
): Map<string, FieldMeta> {
  return collectFromChain(cls, fieldStores[scope]);
}

export function getMethods(
  cls: Constructor,
  scope: Scope = "instance",
): Map<string, MethodMeta> {
  return collectFromChain(cls, methodStores[scope]);
}

// -- Helpers --

function isStandardSchema(v: unknown): v is StandardSchemaV1 {
  return (
    typeof v === "object" &&
    v !== null &&
    "~standard" in v &&
    typeof v["~standard"] === "object"
  );
}

function isType(v: unknown): v is Type {
  return v instanceof ArrayType || isConstructor(v);
}

/** Owning constructor and scope of a decorated member. */
function ownerOf(target: object): [Function, Scope] {
  return typeof target === "function"
    ? [target, "static"]
    : [target.constructor, "instance"];
}

// -- @field decorator --

/**
 * @field(Type) declares the type a property (or accessor) holds.
 *
 * Usage:
 *   @field(String) name?: string;
 *   @field(arrayOf(Address)) addresses?: Address[];
 *   @field(Address) static HEADQUARTERS = new Address();
 */
export function field(type: Type): MemberDecorator {
  if (!isType(type)) {
    throw new Error("@field requires a type as its argument");
  }
  return (target, propertyKey) => {
    const [ctor, scope] = ownerOf(target);
    getOrCreate(ctor, fieldStores[scope]).set(propertyKey, {
      name: propertyKey,
      type,
      static: scope === "static",
    });
  };
}

// -- @method decorator --

function applyMethod(
  returnType: Type,
  schemas: StandardSchemaV1[],
  target: object,
  propertyKey: string,
) {
  const [ctor, scope] = ownerOf(target);
  getOrCreate(ctor, methodStores[scope]).set(propertyKey, {
    name: propertyKey,
    returnType,
    schemas,
    static: scope === "static",
  });
}

/**
 * @method declares a method's return type and, optionally, one schema per
 * parameter. Methods with schemas only match calls whose arguments pass them.
 *
 * Usage:
 *   @method getName(): string { ... }
 *   @method(Address) getAddress(): Address { ... }
 *   @method(Boolean, z.string()) hasPhone(phone: string): boolean { ... }
 */
export function method(
  target: object,
  propertyKey: string,
  descriptor: PropertyDescriptor,
): void;
export function method(
  returnType?: Type,
  ...schemas: StandardSchemaV1[]
): MemberDecorator;
export function method(...args: unknown[]): MemberDecorator | undefined {
  // Case 1: @method (no arguments), on a method or a getter
  const [target, propertyKey, descriptor] = args;
  if (
    args.length === 3 &&
    (typeof target === "object" || typeof target === "function") &&
    target !== null &&
    typeof propertyKey === "string" &&
    typeof descriptor === "object" &&
    descriptor !== null &&
    ("value" in descriptor || "get" in descriptor)
  ) {
    applyMethod(Object, [], target, propertyKey);
    return undefined;
  }
  // Case 2: @method(ReturnType, schema1, ...)
  const returnType = isType(target) ? target : Object;
  const schemas = args.filter(isStandardSchema);
  return (decorated, key) => {
    applyMethod(returnType, schemas, decorated, key);
  };
}

// -- @named decorator --

/**
 * @named("example.Person") registers a class in the default type registry
 * so static expressions can refer to it as `class(example.Person)...`.
 */
export function named(name: string) {
  return <T extends Constructor>(ctor: T): void => {
    defaultTypeRegistry.register(name, ctor);
  };
}

// -- Argument compatibility --

export type ArgsCheck =
  | { value: unknown[]; issues?: undefined }
  | { issues: string[] };

/**
 * Check call arguments against a method's parameter schemas. Undeclared
 * parameters accept anything; declared ones require one argument per schema.
 * Asynchronous schemas cannot take part in path evaluation.
 */
export function checkArgs(
  schemas: StandardSchemaV1[],
  args: readonly unknown[],
): ArgsCheck {
  if (schemas.length === 0) return { value: [...args] };
  if (args.length !== schemas.length) {
    return {
      issues: [
        `Expected ${schemas.length} argument${schemas.length === 1 ? "" : "s"}, got ${args.length}`,
      ],
    };
  }
  const validated: unknown[] = [];
  const issues: string[] = [];
  schemas.forEach((schema, i) => {
    const result = schema["~standard"].validate(args[i]);
    if (result instanceof Promise) {
      issues.push(`arg${i}: asynchronous schemas are not supported`);
      return;
    }
    if (result.issues) {
      for (const issue of result.issues) {
        issues.push(`arg${i}: ${issue.message}`);
      }
      return;
    }
    validated.push(result.value);
  });
  return issues.length > 0 ? { issues } : { value: validated };
}
