/**
 * Types for compiler events.
 *
 * The compiler does no logging of its own. Subscribe with
 * `compiler.on(event, handler)` and forward to whatever logger the
 * application uses.
 */

export interface CompileInfo {
  /** Trimmed source text, the cache key. */
  expression: string;
  /** Number of top-level nodes. */
  nodes: number;
  /** Registered name of the root type of a static expression. */
  rootType: string | null;
}

export interface AutovivifyInfo {
  expression: string;
  /** Position of the node whose empty value was filled. */
  index: number;
  node: string;
  /** Type requested from the instance factory, e.g. `Address[]`. */
  type: string;
  value: unknown;
}

export interface AbandonedWriteInfo {
  expression: string;
  /** Position of the node whose value could not be produced. */
  index: number;
  node: string;
  type: string;
}

export interface CompilerEventInfo {
  compile: CompileInfo;
  autovivify: AutovivifyInfo;
  abandonedWrite: AbandonedWriteInfo;
}

export type CompilerEvent = keyof CompilerEventInfo;

export type CompilerEventMap = {
  [E in CompilerEvent]: (info: CompilerEventInfo[E]) => void;
};
