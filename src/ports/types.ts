/**
 * Mutable variable scope snippets run against. One per processed file.
 */
export type Namespace = Record<string, unknown>;

/**
 * Trace event types for run logging.
 */
export type TraceEvent =
  | { tag: "E_SnippetRun"; id: string; filename: string; durationMs: number; ok: boolean }
  | { tag: "E_FileProcessed"; id: string; file: string; regions: number; durationMs: number };

/**
 * Trace sink for logging events.
 */
export interface TraceSink {
  emit(event: TraceEvent): void;
}
