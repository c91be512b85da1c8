/**
 * Human-readable formatting for values and types.
 *
 * Produces unambiguous strings like `{a: 1, b: "hello"}` or `Person[]`
 * for error messages, debugging and logging. Class instances are shown
 * by their type only, since their fields may be large or cyclic.
 */

import { typeName } from "./types.ts";

export const IS_IDENT = /^[A-Za-z_$][A-Za-z0-9_$]*$/;

export function formatValue(value: unknown): string {
  return fmt(value, new Map());
}

/** Type name as shown in messages, e.g. `Address[]`. */
export { typeName as formatType };

/** Format an argument list, e.g. `("a", 1)`. */
export function formatArgs(args: readonly unknown[]): string {
  const seen = new Map<object, number>();
  return "(" + args.map((a) => fmt(a, seen)).join(", ") + ")";
}

function fmt(thing: unknown, seen: Map<object, number>): string {
  if (thing === undefined) return "undefined";
  if (thing === null) return "null";

  switch (typeof thing) {
    case "string":
      return JSON.stringify(thing);
    case "number":
      if (Object.is(thing, -0)) return "-0";
      return String(thing);
    case "boolean":
      return String(thing);
    case "bigint":
      return thing + "n";
    case "symbol":
      return (
        "Symbol(" +
        (thing.description !== undefined
          ? JSON.stringify(thing.description)
          : "") +
        ")"
      );
    case "function":
      return thing.name ? `[class ${thing.name}]` : "[Function]";
  }

  if (typeof thing !== "object" || thing === null) return String(thing);

  // Objects: circular reference tracking
  const obj: object = thing;
  const ref = seen.get(obj);
  if (ref !== undefined) return "$" + ref;
  seen.set(obj, seen.size);

  if (thing instanceof Date) {
    return isNaN(thing.getTime())
      ? "Date(Invalid)"
      : "Date(" + JSON.stringify(thing.toISOString()) + ")";
  }

  if (Array.isArray(thing)) {
    const items: string[] = [];
    for (let i = 0; i < thing.length; i++) {
      items.push(i in thing ? fmt(thing[i], seen) : "<hole>");
    }
    return "[" + items.join(", ") + "]";
  }

  const proto: unknown = Object.getPrototypeOf(thing);
  if (proto === null || proto === Object.prototype) {
    const entries: string[] = [];
    for (const [key, value] of Object.entries(thing)) {
      const fmtKey = IS_IDENT.test(key) ? key : JSON.stringify(key);
      entries.push(fmtKey + ": " + fmt(value, seen));
    }
    return "{" + entries.join(", ") + "}";
  }

  const name: unknown = obj.constructor?.name;
  return "[" + (typeof name === "string" && name ? name : "object") + "]";
}
