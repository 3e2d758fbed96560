// src/core/errors.ts
// Error taxonomy for a cogwheel run

export type CogErrorCode =
  | "STRUCTURE"
  | "USAGE"
  | "TAMPERED"
  | "GENERATOR_ERROR"
  | "USER_EXCEPTION"
  | "CHECK_FAILED";

export type CogErrorLocation = {
  file?: string;
  line?: number;
};

/**
 * Any error raised by cogwheel. When a file is known the message is
 * prefixed with `file(line): `.
 */
export class CogError extends Error {
  readonly code: CogErrorCode;
  readonly file?: string;
  readonly line?: number;
  /** The message without the location prefix */
  readonly detail: string;

  constructor(message: string, location: CogErrorLocation = {}, code: CogErrorCode = "STRUCTURE") {
    super(location.file ? `${location.file}(${location.line ?? 0}): ${message}` : message);
    this.name = "CogError";
    this.code = code;
    this.file = location.file;
    this.line = location.line;
    this.detail = message;
  }
}

/**
 * Bad command-line arguments or options, reported before a file is touched.
 */
export class CogUsageError extends CogError {
  constructor(message: string) {
    super(message, {}, "USAGE");
    this.name = "CogUsageError";
  }
}

/**
 * The output region no longer matches the checksum recorded on its end line.
 */
export class CogTamperError extends CogError {
  constructor(message: string, location: CogErrorLocation) {
    super(message, location, "TAMPERED");
    this.name = "CogTamperError";
  }
}

/**
 * Raised by a snippet calling `cog.error()`. Shown without a trace.
 */
export class CogGeneratedError extends CogError {
  constructor(message: string) {
    super(message, {}, "GENERATOR_ERROR");
    this.name = "CogGeneratedError";
  }
}

/**
 * An exception escaped snippet code. `traceback` holds the remapped trace.
 */
export class CogUserException extends CogError {
  readonly traceback: string;

  constructor(traceback: string) {
    super(traceback, {}, "USER_EXCEPTION");
    this.name = "CogUserException";
    this.traceback = traceback;
  }
}

/**
 * A `--check` run found files that would change.
 */
export class CogCheckFailed extends CogError {
  constructor(message: string) {
    super(message, {}, "CHECK_FAILED");
    this.name = "CogCheckFailed";
  }
}
