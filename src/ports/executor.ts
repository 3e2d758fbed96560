import type { Namespace } from "./types";

/**
 * A complete unit of snippet source, ready to compile.
 */
export interface SourceUnit {
  /** Prologue and code joined into one program */
  source: string;

  /** Synthetic file tag, `<cog FILE:LINE>`, used in stack frames */
  filename: string;
}

/**
 * Executor port interface.
 * Compiles and runs snippet source against a namespace. The state machine
 * only talks to this port, so the backend can be swapped freely.
 */
export interface SnippetExecutor {
  /**
   * Run `unit` with `namespace` as its global scope.
   * Anything the snippet throws propagates unchanged.
   */
  run(unit: SourceUnit, namespace: Namespace): void;
}
