/**
 * Read or write many path expressions against one root.
 */

import { defaultCompiler, type PathCompiler } from "./compiler.ts";
import type { EvaluateOptions } from "./types.ts";

export interface BulkOptions extends EvaluateOptions {
  compiler?: PathCompiler;
}

/** Value of every expression in `texts`, keyed by its text. */
export function getAll(
  root: unknown,
  texts: Iterable<string>,
  { compiler = defaultCompiler, ...options }: BulkOptions = {},
): Map<string, unknown> {
  const values = new Map<string, unknown>();
  for (const text of texts) {
    values.set(text, compiler.compile(text).getValue(root, options));
  }
  return values;
}

/**
 * Write each `text → value` pair in iteration order, so earlier entries
 * can create what later ones write into. Returns `root`.
 */
export function setAll<T>(
  root: T,
  values: Iterable<readonly [string, unknown]> | Readonly<Record<string, unknown>>,
  { compiler = defaultCompiler, ...options }: BulkOptions = {},
): T {
  const entries = isIterable(values) ? values : Object.entries(values);
  for (const [text, value] of entries) {
    compiler.compile(text).setValue(root, value, options);
  }
  return root;
}

function isIterable<T>(value: Iterable<T> | object): value is Iterable<T> {
  return Symbol.iterator in value;
}
