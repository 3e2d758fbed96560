// src/core/processor/fileProcessor.ts
// The line-oriented state machine that finds code regions and rewrites their output

import * as path from "path";
import { cloneOptions, type CogOptions } from "../config/config";
import { CogError, CogTamperError } from "../errors";
import { createSnippetRequire } from "../exec/snippetRequire";
import { regionTag, type RegionSource } from "../exec/traceback";
import { SnippetGenerator } from "../generator/snippetGenerator";
import { HashHandler, HashMismatchError } from "../hash/hashHandler";
import { LineReader } from "../io/lineReader";
import { makeDiagnostic } from "../../outcome/codes";
import type { DiagnosticSink } from "../../outcome/diagnostic";
import type { SnippetExecutor } from "../../ports/executor";
import type { TextWriter } from "../../ports/output";
import type { Namespace, TraceSink } from "../../ports/types";
import { traceFileProcessed } from "../../adapters/logging";
import { MarkerMatcher } from "./markers";

export type FileProcessorDeps = {
  executor: SnippetExecutor;
  /** Where snippet `console.log` goes outside print mode */
  stdout: TextWriter;
  stderr: TextWriter;
  /** Receives `cog.message()` text and warnings */
  diagnostics: DiagnosticSink;
  trace?: TraceSink;
};

export type FileNames = {
  /** Name used in messages and shown to snippets as `cog.inFile` */
  inFile?: string;
  /** Shown to snippets as `cog.outFile`; defaults to `inFile` */
  outFile?: string;
  /** Directory snippet `require` looks in first; defaults to `inFile`'s */
  dir?: string;
};

export type ProcessFileResult = {
  /** Number of code regions found */
  regions: number;
};

type ScanState =
  | { kind: "scanning-for-begin" }
  | { kind: "in-code-block"; gen: SnippetGenerator; firstLineNum: number }
  | { kind: "scanning-for-end-output"; gen: SnippetGenerator; firstLineNum: number; codeStartLine: number; previous: string[] };

// A non-blank line, used to apply the suffix.
const NON_EMPTY_LINE_RE = /^\s*\S+.*$/gm;

export class FileProcessor {
  private readonly options: CogOptions;
  private readonly matcher: MarkerMatcher;
  private readonly hashHandler: HashHandler;

  constructor(options: Readonly<CogOptions>, private readonly deps: FileProcessorDeps) {
    this.options = cloneOptions(options);
    this.matcher = new MarkerMatcher(this.options.markers);
    this.hashHandler = new HashHandler(this.options.markers.endOutput);
  }

  /**
   * Process `input`, writing the result to `out`.
   *
   * `globals` becomes the file's namespace; defines are copied into it first.
   * Every region in the file shares it. Pass nothing to get a fresh one.
   */
  processFile(input: string, out: TextWriter, names: FileNames = {}, globals: Namespace = {}): ProcessFileResult {
    const started = Date.now();
    const inFile = names.inFile ?? "";
    const outFile = names.outFile ?? inFile;
    const { markers, deleteCode, eofCanBeEnd } = this.options;

    const reader = new LineReader(input);
    const namespace = this.prepareNamespace(globals, names.dir ?? path.dirname(path.resolve(inFile || ".")));
    const sources = new Map<string, RegionSource>();
    const unexpected = (token: string) =>
      new CogError(`Unexpected '${token}'`, { file: inFile, line: reader.lineNumber });

    let regions = 0;
    let state: ScanState = { kind: "scanning-for-begin" };

    for (;;) {
      const line = reader.readLine();

      switch (state.kind) {
        case "scanning-for-begin": {
          if (!line) {
            if (regions === 0 && this.options.warnEmpty) {
              this.deps.diagnostics(makeDiagnostic("W0001", { file: inFile }, { file: inFile }));
            }
            if (this.deps.trace) {
              traceFileProcessed(this.deps.trace, inFile, regions, Date.now() - started);
            }
            return { regions };
          }
          if (!this.matcher.isBeginSpec(line)) {
            if (this.matcher.isEndSpec(line)) throw unexpected(markers.endSpec);
            if (this.matcher.isEndOutput(line)) throw unexpected(markers.endOutput);
            out.write(line);
            break;
          }

          if (!deleteCode) out.write(line);
          const gen = new SnippetGenerator(this.options);
          gen.parseMarker(line);
          const firstLineNum = reader.lineNumber;

          if (this.matcher.isEndSpec(line)) {
            // Single-line form: the code sits between the two tokens.
            const beg = line.indexOf(markers.beginSpec);
            const end = line.indexOf(markers.endSpec);
            if (beg > end) {
              throw new CogError("Cog code markers inverted", { file: inFile, line: firstLineNum });
            }
            gen.parseLine(line.slice(beg + markers.beginSpec.length, end).trim());
            state = { kind: "scanning-for-end-output", gen, firstLineNum, codeStartLine: firstLineNum, previous: [] };
          } else {
            state = { kind: "in-code-block", gen, firstLineNum };
          }
          break;
        }

        case "in-code-block": {
          if (!line) {
            throw new CogError("Cog block begun but never ended.", { file: inFile, line: state.firstLineNum });
          }
          if (this.matcher.isEndSpec(line)) {
            if (!deleteCode) out.write(line);
            state.gen.parseMarker(line);
            state = {
              kind: "scanning-for-end-output",
              gen: state.gen,
              firstLineNum: state.firstLineNum,
              codeStartLine: state.firstLineNum + 1,
              previous: [],
            };
            break;
          }
          if (this.matcher.isBeginSpec(line)) throw unexpected(markers.beginSpec);
          if (this.matcher.isEndOutput(line)) throw unexpected(markers.endOutput);
          if (!deleteCode) out.write(line);
          state.gen.parseLine(line);
          break;
        }

        case "scanning-for-end-output": {
          if (line && !this.matcher.isEndOutput(line)) {
            if (this.matcher.isBeginSpec(line)) throw unexpected(markers.beginSpec);
            if (this.matcher.isEndSpec(line)) throw unexpected(markers.endSpec);
            state.previous.push(line);
            break;
          }
          if (!line && !eofCanBeEnd) {
            throw new CogError(`Missing '${markers.endOutput}' before end of file.`, {
              file: inFile,
              line: reader.lineNumber,
            });
          }

          const endLine = this.finishRegion(state, line, out, {
            inFile,
            outFile,
            namespace,
            sources,
            lineNumber: reader.lineNumber,
          });
          if (!deleteCode) out.write(endLine);
          regions++;
          state = { kind: "scanning-for-begin" };

          // At end of input the end line was implied; there is nothing more to read.
          if (!line) {
            if (this.deps.trace) {
              traceFileProcessed(this.deps.trace, inFile, regions, Date.now() - started);
            }
            return { regions };
          }
          break;
        }
      }
    }
  }

  /**
   * Append the configured suffix to every non-blank line of `text`.
   */
  suffixLines(text: string): string {
    const suffix = this.options.suffix;
    if (!suffix) return text;
    return text.replace(NON_EMPTY_LINE_RE, match => match + suffix);
  }

  private prepareNamespace(globals: Namespace, dir: string): Namespace {
    Object.assign(globals, { ...this.options.defines });
    const searchDirs = [dir, ...this.options.includePath, process.cwd()];
    globals.require = createSnippetRequire(searchDirs);
    return globals;
  }

  // Generate a region's new output and produce its end-output line.
  private finishRegion(
    state: Extract<ScanState, { kind: "scanning-for-end-output" }>,
    endLine: string,
    out: TextWriter,
    ctx: { inFile: string; outFile: string; namespace: Namespace; sources: Map<string, RegionSource>; lineNumber: number }
  ): string {
    const curHash = this.hashHandler.computeLinesHash(state.previous);

    let generated = "";
    if (!this.options.noGenerate) {
      const { firstLineNum } = state;
      generated = state.gen.evaluate({
        executor: this.deps.executor,
        namespace: ctx.namespace,
        filename: regionTag(ctx.inFile, firstLineNum),
        state: {
          previousOutput: state.previous.join(""),
          firstLineNumber: firstLineNum,
          inFile: ctx.inFile,
          outFile: ctx.outFile,
          includePath: this.options.includePath,
        },
        codeStartLine: state.codeStartLine,
        stdout: this.deps.stdout,
        stderr: this.deps.stderr,
        onMessage: text =>
          this.deps.diagnostics(makeDiagnostic("I0001", { text }, { file: ctx.inFile, line: firstLineNum })),
        registerSource: (tag, source) => ctx.sources.set(tag, source),
        locate: tag => ctx.sources.get(tag),
      });
      generated = this.suffixLines(generated);
      out.write(generated);
    }
    const newHash = this.hashHandler.computeHash(generated);

    if (!this.options.hashOutput) {
      return this.hashHandler.formatEndLine(endLine, newHash, { addHash: false });
    }

    try {
      this.hashHandler.validateHash(endLine, curHash);
    } catch (e) {
      if (e instanceof HashMismatchError) {
        throw new CogTamperError(e.message, { file: ctx.inFile, line: ctx.lineNumber });
      }
      throw e;
    }
    return this.hashHandler.formatEndLine(endLine, newHash, { preserveFormat: this.options.check });
  }
}
