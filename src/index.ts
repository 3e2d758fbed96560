// src/index.ts
// cogwheel - Public API
//
// Entry points for build scripts and tools that run generators in-process.

// ═══════════════════════════════════════════════════════════════════════════════
// ENGINE
// ═══════════════════════════════════════════════════════════════════════════════

export { CogApp, type CogAppDeps } from "./app/cogApp";
export { parseArgs, shellSplit } from "./app/args";
export { USAGE, getVersion } from "./app/usage";

// ═══════════════════════════════════════════════════════════════════════════════
// FILE PROCESSING
// ═══════════════════════════════════════════════════════════════════════════════

export {
  FileProcessor,
  type FileNames,
  type FileProcessorDeps,
  type ProcessFileResult,
} from "./core/processor/fileProcessor";
export { MarkerMatcher } from "./core/processor/markers";
export { SnippetGenerator, type EvaluateContext, type GeneratorOptions } from "./core/generator/snippetGenerator";
export { type CogSideChannel, type EmitOptions, type RegionState } from "./core/generator/sideChannel";
export {
  HashHandler,
  HashMismatchError,
  computeHash,
  computeLinesHash,
  hexToBase64Hash,
  type ExtractedHash,
  type HashKind,
} from "./core/hash/hashHandler";
export { whitePrefix, commonPrefix, reindentBlock } from "./core/text/whitespace";

// ═══════════════════════════════════════════════════════════════════════════════
// CONFIGURATION
// ═══════════════════════════════════════════════════════════════════════════════

export {
  DEFAULT_MARKERS,
  DEFAULT_OPTIONS,
  defaultOptions,
  cloneOptions,
  parseMarkers,
  configFromEnv,
  configFromFile,
  configFromObject,
  mergeConfigs,
  loadConfig,
  validateConfig,
  type CogOptions,
  type ConfigValidation,
  type Markers,
} from "./core/config/config";

// ═══════════════════════════════════════════════════════════════════════════════
// ERRORS
// ═══════════════════════════════════════════════════════════════════════════════

export {
  CogError,
  CogUsageError,
  CogTamperError,
  CogGeneratedError,
  CogUserException,
  CogCheckFailed,
  type CogErrorCode,
} from "./core/errors";

// ═══════════════════════════════════════════════════════════════════════════════
// PORTS & ADAPTERS
// ═══════════════════════════════════════════════════════════════════════════════

export type { SnippetExecutor, SourceUnit } from "./ports/executor";
export type { OutputPort, TextWriter } from "./ports/output";
export type { Namespace, TraceEvent, TraceSink } from "./ports/types";
export { VmExecutor, vmExecutor } from "./adapters/vmExecutor";
export { consoleOutput, StringOutput } from "./adapters/consoleOutput";
export { loggingExecutor, formatTraceEvent } from "./adapters/logging";
