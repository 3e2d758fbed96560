// src/core/generator/sideChannel.ts
// The `cog` object every snippet sees in its scope

import { CogGeneratedError } from "../errors";
import { reindentBlock } from "../text/whitespace";

export type EmitOptions = {
  /** Re-indent the text to column zero before appending */
  dedent?: boolean;
  /** Drop a leading and a trailing all-blank line from multi-line text */
  trimBlankLines?: boolean;
};

/**
 * Per-region state shown to a snippet.
 */
export type RegionState = {
  previousOutput: string;
  firstLineNumber: number;
  inFile: string;
  outFile: string;
  includePath: readonly string[];
};

export interface CogSideChannel extends Readonly<RegionState> {
  emit(text?: unknown, options?: EmitOptions): void;
  emitLine(text?: unknown, options?: EmitOptions): void;
  message(text: unknown): void;
  error(message?: unknown): never;
}

export const DEFAULT_ERROR_MESSAGE = "Error raised by cog generator.";

export function trimBlankLines(text: string): string {
  if (!text.includes("\n")) return text;
  const lines = text.split("\n");
  if (lines[0].trim() === "") {
    lines.shift();
  }
  if (lines.length > 0 && lines[lines.length - 1].trim() === "") {
    lines.pop();
  }
  return lines.join("\n") + "\n";
}

/**
 * Accumulates what a snippet emits. One buffer per evaluated region.
 */
export class OutputBuffer {
  private text = "";

  append(raw: unknown = "", options: EmitOptions = {}): void {
    let s = String(raw);
    if (options.trimBlankLines) {
      s = trimBlankLines(s);
    }
    if (options.dedent) {
      s = reindentBlock(s);
    }
    this.text += s;
  }

  get value(): string {
    return this.text;
  }
}

/**
 * Build the side channel for one region. `onMessage` receives the text of
 * `cog.message()` calls.
 */
export function createSideChannel(
  buffer: OutputBuffer,
  state: RegionState,
  onMessage: (text: string) => void
): CogSideChannel {
  return Object.freeze({
    ...state,
    includePath: Object.freeze([...state.includePath]),
    emit(text?: unknown, options?: EmitOptions): void {
      buffer.append(text, options);
    },
    emitLine(text?: unknown, options?: EmitOptions): void {
      buffer.append(text, options);
      buffer.append("\n");
    },
    message(text: unknown): void {
      onMessage(String(text));
    },
    error(message: unknown = DEFAULT_ERROR_MESSAGE): never {
      throw new CogGeneratedError(String(message));
    },
  });
}
