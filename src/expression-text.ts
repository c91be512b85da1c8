/**
 * Text-level handling of path expressions.
 *
 * Static expressions name their root type in a prefix:
 *   class(example.Person)addresses[0].state
 */

import { InvalidExpressionError } from "./errors.ts";

export const STATIC_PREFIX = "class(";

export interface StaticParts {
  typeName: string;
  body: string;
}

/**
 * Split a static expression into its type name and the expression after
 * the prefix. Returns null for text without the prefix.
 */
export function parseStatic(text: string): StaticParts | null {
  if (!text.startsWith(STATIC_PREFIX)) return null;
  const close = text.indexOf(")");
  if (close <= STATIC_PREFIX.length) {
    throw new InvalidExpressionError(text, "static expression has no type name");
  }
  const body = text.slice(close + 1);
  if (body === "") {
    throw new InvalidExpressionError(text, "static expression has no nodes");
  }
  return { typeName: text.slice(STATIC_PREFIX.length, close), body };
}

/** `text` without its static prefix, if it has one. */
export function toNonStaticExpression(text: string): string {
  const trimmed = text.trim();
  return parseStatic(trimmed)?.body ?? trimmed;
}

/** `text` bound to the type registered as `typeName`. */
export function toStaticExpression(typeName: string, text: string): string {
  return `${STATIC_PREFIX}${typeName})${toNonStaticExpression(text)}`;
}

/**
 * Split on dots outside brackets and parentheses, e.g.
 * `a.get(x).b[0]` → `a`, `get(x)`, `b[0]`.
 */
export function splitSegments(expression: string, body: string): string[] {
  const segments: string[] = [];
  let depth = 0;
  let start = 0;
  for (let i = 0; i < body.length; i++) {
    const ch = body.charAt(i);
    if (ch === "(" || ch === "[") {
      depth++;
    } else if (ch === ")" || ch === "]") {
      if (--depth < 0) {
        throw new InvalidExpressionError(expression, `unbalanced "${ch}"`);
      }
    } else if (ch === "." && depth === 0) {
      segments.push(body.slice(start, i));
      start = i + 1;
    }
  }
  if (depth !== 0) {
    throw new InvalidExpressionError(expression, "unclosed bracket or parenthesis");
  }
  segments.push(body.slice(start));
  if (segments.includes("")) {
    throw new InvalidExpressionError(expression, "empty segment");
  }
  return segments;
}
