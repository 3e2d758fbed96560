// src/core/exec/traceback.ts
// Stack frames for snippet failures, mapped back onto real source lines.
//
// Snippets run under a synthetic file tag `<cog FILE:LINE>`, where LINE is
// the line of the region's begin marker. Script line numbers count the
// prologue first, then the extracted code. Remapping turns them into
// either `<prologue>` lines or lines of FILE.

import { types } from "util";

export type StackFrame = {
  file: string;
  line: number;
  column?: number;
  func: string;
  source?: string;
};

/**
 * What the engine knows about one evaluated region.
 */
export type RegionSource = {
  file: string;
  /** Line in `file` holding the first code line */
  codeStartLine: number;
  /** Code lines as captured from the file */
  codeLines: readonly string[];
  prologueLines: readonly string[];
};

export type SourceLocator = (tag: string) => RegionSource | undefined;

export const PROLOGUE_FILE = "<prologue>";
export const TOP_LEVEL = "<top level>";

const TAG_RE = /^<cog (.+):(\d+)>$/;
const FRAME_WITH_FUNC_RE = /^\s*at (.+?) \((.+):(\d+):(\d+)\)$/;
const FRAME_BARE_RE = /^\s*at (.+):(\d+):(\d+)$/;
const COMPILE_LOCATION_RE = /^(<cog .+:\d+>):(\d+)$/;

export function regionTag(file: string, firstLine: number): string {
  return `<cog ${file}:${firstLine}>`;
}

export function isRegionTag(file: string): boolean {
  return TAG_RE.test(file);
}

/**
 * Parse the `at ...` lines of a V8 stack trace, most recent call first.
 */
export function parseStack(stack: string): StackFrame[] {
  const frames: StackFrame[] = [];
  for (const raw of stack.split("\n")) {
    const withFunc = FRAME_WITH_FUNC_RE.exec(raw);
    if (withFunc) {
      frames.push({
        func: withFunc[1],
        file: withFunc[2],
        line: Number(withFunc[3]),
        column: Number(withFunc[4]),
      });
      continue;
    }
    const bare = FRAME_BARE_RE.exec(raw);
    if (bare) {
      frames.push({ func: TOP_LEVEL, file: bare[1], line: Number(bare[2]), column: Number(bare[3]) });
    }
  }
  return frames;
}

/**
 * Keep only the frames that belong to snippet code: everything up to and
 * including the outermost region frame. The engine's own frames below it
 * are dropped.
 */
export function trimToSnippetFrames(frames: readonly StackFrame[]): StackFrame[] {
  let last = -1;
  frames.forEach((frame, i) => {
    if (isRegionTag(frame.file)) last = i;
  });
  return last === -1 ? [] : frames.slice(0, last + 1);
}

/**
 * Rewrite region frames to prologue or file locations, filling in source text.
 */
export function remapFrames(frames: readonly StackFrame[], locate: SourceLocator): StackFrame[] {
  return frames.map(frame => {
    if (!isRegionTag(frame.file)) return frame;
    const region = locate(frame.file);
    if (!region) return frame;

    const prologueCount = region.prologueLines.length;
    if (frame.line <= prologueCount) {
      return {
        ...frame,
        file: PROLOGUE_FILE,
        source: region.prologueLines[frame.line - 1]?.trim(),
      };
    }

    const codeIndex = frame.line - prologueCount - 1;
    return {
      ...frame,
      file: region.file,
      line: region.codeStartLine + codeIndex,
      source: region.codeLines[codeIndex]?.trim(),
    };
  });
}

/**
 * One-line summary of whatever was thrown.
 */
export function describeThrown(thrown: unknown): string {
  if (types.isNativeError(thrown)) {
    return `${thrown.name}: ${thrown.message}`;
  }
  return `Uncaught ${String(thrown)}`;
}

/**
 * Structured frames for something thrown out of snippet code. Errors from
 * other realms (the snippet's own `Error`) are recognized too.
 */
export function framesOf(thrown: unknown): StackFrame[] {
  if (!types.isNativeError(thrown) || typeof thrown.stack !== "string") return [];

  const frames = trimToSnippetFrames(parseStack(thrown.stack));

  // A compile error reports its location on the first line instead of a frame.
  const compileAt = COMPILE_LOCATION_RE.exec(thrown.stack.split("\n")[0]);
  if (compileAt && thrown.name === "SyntaxError") {
    frames.unshift({ func: "<compile>", file: compileAt[1], line: Number(compileAt[2]) });
  }
  return frames;
}

export function formatFrames(frames: readonly StackFrame[]): string {
  return frames
    .map(frame => {
      const at = `  at ${frame.func} (${frame.file}:${frame.line})\n`;
      return frame.source ? `${at}    ${frame.source}\n` : at;
    })
    .join("");
}

/**
 * Full trace text for a snippet failure: remapped frames, then the summary.
 */
export function formatSnippetFailure(thrown: unknown, locate: SourceLocator): string {
  const frames = remapFrames(framesOf(thrown), locate);
  return formatFrames(frames) + describeThrown(thrown);
}
