/**
 * Member resolution: find the field or method a node names on a type, and
 * the declared type it produces.
 *
 * Resolution order for a name on `owner`:
 *   1. @field / @method metadata (declared type, parameter schemas)
 *   2. Accessors and methods on the prototype chain (instance scope) or the
 *      constructor chain (static scope)
 *   3. Properties present on the instance, when one is supplied
 *   4. `Object`, the open type, which accepts any name
 *
 * Undeclared members report `Object` as their type.
 *
 * Security properties:
 *   - JS builtins (constructor, __proto__, prototype) are never members
 *   - A field is never a function-valued property, a method always is
 */

import type { StandardSchemaV1 } from "@standard-schema/spec";
import { checkArgs, getFields, getMethods } from "./decorators.ts";
import { MemberNotFoundError } from "./errors.ts";
import { formatArgs } from "./format.ts";
import {
  BLOCKED_NAMES,
  findDescriptor,
  invoke,
  newInstance,
  readProperty,
  writeProperty,
} from "./reflect.ts";
import {
  typeName,
  typeOf,
  type Constructor,
  type Scope,
  type Target,
  type Type,
} from "./types.ts";

export interface FieldMember {
  readonly kind: "field";
  readonly name: string;
  readonly owner: Constructor;
  readonly type: Type;
  readonly static: boolean;
  /** Whether the type came from @field rather than the open-type fallback. */
  readonly declared: boolean;
  get(target: Target): unknown;
  set(target: Target, value: unknown): void;
}

export interface MethodMember {
  readonly kind: "method";
  readonly name: string;
  readonly owner: Constructor;
  readonly returnType: Type;
  readonly static: boolean;
  readonly declared: boolean;
  invoke(target: Target, args: readonly unknown[]): unknown;
}

export type Member = FieldMember | MethodMember;

/**
 * Member lookup used by expression nodes. `instance`, when given, is the
 * value the member will be applied to; it lets undeclared properties of that
 * particular value resolve.
 */
export interface MemberResolver {
  resolveField(
    owner: Constructor,
    name: string,
    scope: Scope,
    instance?: Target,
  ): FieldMember;
  resolveMethod(
    owner: Constructor,
    name: string,
    args: readonly unknown[],
    scope: Scope,
    instance?: Target,
  ): MethodMember;
  /** Every field and method of `owner`, including inherited ones. */
  listMembers(owner: Constructor, scope?: Scope): Member[];
  construct<T>(type: Constructor<T>, args?: readonly unknown[]): T;
}

const STATIC_BUILTINS = new Set(["length", "name", "prototype"]);

function isPlainRecord(value: Target): boolean {
  if (typeof value !== "object") return false;
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === null || proto === Object.prototype;
}

function fieldMember(
  owner: Constructor,
  name: string,
  type: Type,
  scope: Scope,
  declared: boolean,
): FieldMember {
  return {
    kind: "field",
    name,
    owner,
    type,
    static: scope === "static",
    declared,
    get: (target) => readProperty(target, name),
    set: (target, value) => writeProperty(target, name, value),
  };
}

function methodMember(
  owner: Constructor,
  name: string,
  fn: Function,
  returnType: Type,
  schemas: StandardSchemaV1[],
  scope: Scope,
  declared: boolean,
): MethodMember {
  return {
    kind: "method",
    name,
    owner,
    returnType,
    static: scope === "static",
    declared,
    invoke: (target, args) => {
      const checked = checkArgs(schemas, args);
      if (checked.issues) {
        throw incompatible(owner, name, args, checked.issues);
      }
      return invoke(target, fn, checked.value);
    },
  };
}

function incompatible(
  owner: Constructor,
  name: string,
  args: readonly unknown[],
  issues: string[],
): MemberNotFoundError {
  return new MemberNotFoundError(
    "Method",
    typeName(owner),
    name,
    `no match for ${formatArgs(args)}: ${issues.join(", ")}`,
  );
}

/** Where a member of the given scope lives: the prototype or the constructor. */
function holderOf(owner: Constructor, scope: Scope): object {
  return scope === "static" ? owner : owner.prototype;
}

function stopOf(scope: Scope): object {
  return scope === "static" ? Function.prototype : Object.prototype;
}

export class DecoratorMemberResolver implements MemberResolver {
  resolveField(
    owner: Constructor,
    name: string,
    scope: Scope,
    instance?: Target,
  ): FieldMember {
    if (BLOCKED_NAMES.has(name)) {
      throw new MemberNotFoundError("Field", typeName(owner), name);
    }

    const meta = getFields(owner, scope).get(name);
    if (meta) return fieldMember(owner, name, meta.type, scope, true);

    const descriptor = findDescriptor(
      holderOf(owner, scope),
      name,
      stopOf(scope),
    );
    if (descriptor) {
      if (typeof descriptor.value !== "function") {
        return fieldMember(owner, name, Object, scope, false);
      }
      throw new MemberNotFoundError("Field", typeName(owner), name, "is a method");
    }

    if (scope === "instance") {
      if (instance !== undefined) {
        const value = readProperty(instance, name);
        if (name in Object(instance) && typeof value !== "function") {
          return fieldMember(owner, name, Object, scope, false);
        }
        if (isPlainRecord(instance)) {
          return fieldMember(owner, name, Object, scope, false);
        }
      } else if (owner === Object) {
        return fieldMember(owner, name, Object, scope, false);
      }
    }

    throw new MemberNotFoundError("Field", typeName(owner), name);
  }

  resolveMethod(
    owner: Constructor,
    name: string,
    args: readonly unknown[],
    scope: Scope,
    instance?: Target,
  ): MethodMember {
    if (BLOCKED_NAMES.has(name)) {
      throw new MemberNotFoundError("Method", typeName(owner), name);
    }

    const meta = getMethods(owner, scope).get(name);
    const fn =
      scope === "instance" && instance !== undefined
        ? readProperty(instance, name)
        : readProperty(holderOf(owner, scope), name);

    if (typeof fn !== "function") {
      if (scope === "instance" && instance === undefined && owner === Object) {
        // Open type: the method can only be checked once a value exists.
        return {
          kind: "method",
          name,
          owner,
          returnType: Object,
          static: false,
          declared: false,
          invoke: (target, callArgs) =>
            this.resolveMethod(typeOf(target), name, callArgs, "instance", target)
              .invoke(target, callArgs),
        };
      }
      throw new MemberNotFoundError("Method", typeName(owner), name);
    }

    if (meta) {
      const checked = checkArgs(meta.schemas, args);
      if (checked.issues) throw incompatible(owner, name, args, checked.issues);
      return methodMember(owner, name, fn, meta.returnType, meta.schemas, scope, true);
    }
    return methodMember(owner, name, fn, Object, [], scope, false);
  }

  listMembers(owner: Constructor, scope: Scope = "instance"): Member[] {
    const members = new Map<string, Member>();
    for (const meta of getFields(owner, scope).values()) {
      members.set(meta.name, fieldMember(owner, meta.name, meta.type, scope, true));
    }

    const methods = getMethods(owner, scope);
    let current: object | null = holderOf(owner, scope);
    const stop = stopOf(scope);
    while (current && current !== stop) {
      for (const name of Object.getOwnPropertyNames(current)) {
        if (members.has(name) || BLOCKED_NAMES.has(name)) continue;
        if (scope === "static" && STATIC_BUILTINS.has(name)) continue;
        const descriptor = Object.getOwnPropertyDescriptor(current, name);
        const fn: unknown = descriptor?.value;
        if (typeof fn !== "function") {
          members.set(name, fieldMember(owner, name, Object, scope, false));
          continue;
        }
        const meta = methods.get(name);
        members.set(
          name,
          meta
            ? methodMember(owner, name, fn, meta.returnType, meta.schemas, scope, true)
            : methodMember(owner, name, fn, Object, [], scope, false),
        );
      }
      current = Object.getPrototypeOf(current);
    }

    return [...members.values()].sort((a, b) =>
      a.name < b.name ? -1 : a.name > b.name ? 1 : 0,
    );
  }

  construct<T>(type: Constructor<T>, args: readonly unknown[] = []): T {
    return newInstance(type, args);
  }
}

export const defaultResolver: MemberResolver = new DecoratorMemberResolver();

/** The type a member yields: a field's type or a method's return type. */
export function memberType(member: Member): Type {
  return member.kind === "field" ? member.type : member.returnType;
}
