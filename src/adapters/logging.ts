import type { SnippetExecutor, SourceUnit } from "../ports/executor";
import type { Namespace, TraceEvent, TraceSink } from "../ports/types";

function makeId(kind: string): string {
  const random = Math.random().toString(36).slice(2);
  return `${kind}:${Date.now()}:${random}`;
}

/**
 * Wrap executor port with logging.
 */
export function loggingExecutor(inner: SnippetExecutor, trace: TraceSink): SnippetExecutor {
  return {
    run(unit: SourceUnit, namespace: Namespace): void {
      const id = makeId("snippet");
      const start = Date.now();
      try {
        inner.run(unit, namespace);
        trace.emit({ tag: "E_SnippetRun", id, filename: unit.filename, durationMs: Date.now() - start, ok: true });
      } catch (error) {
        trace.emit({ tag: "E_SnippetRun", id, filename: unit.filename, durationMs: Date.now() - start, ok: false });
        throw error;
      }
    },
  };
}

/**
 * Record that a whole file went through the processor.
 */
export function traceFileProcessed(trace: TraceSink, file: string, regions: number, durationMs: number): void {
  trace.emit({ tag: "E_FileProcessed", id: makeId("file"), file, regions, durationMs });
}

/**
 * Render a trace event as one line of text.
 */
export function formatTraceEvent(event: TraceEvent): string {
  switch (event.tag) {
    case "E_SnippetRun":
      return `Trace: ran ${event.filename} in ${event.durationMs}ms${event.ok ? "" : " (failed)"}`;
    case "E_FileProcessed":
      return `Trace: processed ${event.file} (${event.regions} regions) in ${event.durationMs}ms`;
  }
}
