// src/core/generator/snippetGenerator.ts
// One code region: its marker and code lines, and turning them into output

import { format } from "util";
import { CogError, CogUserException } from "../errors";
import { formatSnippetFailure, type RegionSource, type SourceLocator } from "../exec/traceback";
import { commonPrefix, reindentBlock, whitePrefix } from "../text/whitespace";
import type { Markers } from "../config/config";
import type { SnippetExecutor } from "../../ports/executor";
import type { TextWriter } from "../../ports/output";
import type { Namespace } from "../../ports/types";
import { createSideChannel, OutputBuffer, type RegionState } from "./sideChannel";

export type GeneratorOptions = {
  markers: Markers;
  /** Source run once per namespace, ahead of the first region's code */
  prologue: string;
  /** Capture `console.log` output instead of `cog.emit` output */
  printOutput: boolean;
};

export type EvaluateContext = {
  executor: SnippetExecutor;
  namespace: Namespace;
  /** Synthetic file tag for the compiled unit */
  filename: string;
  state: RegionState;
  /** Line of the input file holding the first code line */
  codeStartLine: number;
  /** Where `console.log` goes when output is not being captured */
  stdout: TextWriter;
  stderr: TextWriter;
  onMessage: (text: string) => void;
  /** Records this region so failures anywhere in the file can be remapped */
  registerSource: (tag: string, source: RegionSource) => void;
  locate: SourceLocator;
};

// Namespaces that have already run the prologue.
const primed = new WeakSet<Namespace>();

export class SnippetGenerator {
  private readonly markers: string[] = [];
  private readonly lines: string[] = [];

  constructor(private readonly options: GeneratorOptions) {}

  parseMarker(line: string): void {
    this.markers.push(line);
  }

  parseLine(line: string): void {
    this.lines.push(line.replace(/^\n+|\n+$/g, ""));
  }

  /**
   * Extract the executable code from the region.
   *
   * The marker tokens are removed from the marker lines first. If what is
   * left of the markers and all the code lines share a prefix (line-comment
   * characters, say), that prefix is removed from the code lines. The code
   * is then dedented to column zero.
   */
  getCode(): string {
    const { beginSpec, endSpec } = this.options.markers;
    const bareMarkers = this.markers.map(m => m.replace(beginSpec, "").replace(endSpec, ""));

    const prefix = commonPrefix([...bareMarkers, ...this.lines]);
    const lines = prefix ? this.lines.map(l => l.slice(prefix.length)) : this.lines;

    return reindentBlock(lines, "");
  }

  evaluate(ctx: EvaluateContext): string {
    // Output lines up with the markers themselves.
    const outPrefix = whitePrefix(this.markers);

    const code = this.getCode();
    if (!code) return "";

    const prologue = this.options.prologue && !primed.has(ctx.namespace) ? this.options.prologue : "";
    if (prologue) primed.add(ctx.namespace);
    const prologueLines = prologue ? prologue.split("\n") : [];
    const source = prologue ? `${prologue}\n${code}` : code;

    ctx.registerSource(ctx.filename, {
      file: ctx.state.inFile,
      codeStartLine: ctx.codeStartLine,
      codeLines: [...this.lines],
      prologueLines,
    });

    const emitted = new OutputBuffer();
    let printed = "";
    const toStdout = (...args: unknown[]) => {
      if (this.options.printOutput) {
        printed += renderLogLine(args);
      } else {
        ctx.stdout.write(renderLogLine(args));
      }
    };
    const toStderr = (...args: unknown[]) => {
      ctx.stderr.write(renderLogLine(args));
    };

    ctx.namespace.cog = createSideChannel(emitted, ctx.state, ctx.onMessage);
    ctx.namespace.console = { log: toStdout, info: toStdout, debug: toStdout, warn: toStderr, error: toStderr };

    try {
      ctx.executor.run({ source, filename: ctx.filename }, ctx.namespace);
    } catch (e) {
      if (e instanceof CogError) throw e;
      throw new CogUserException(formatSnippetFailure(e, ctx.locate));
    }

    let output = this.options.printOutput ? printed : emitted.value;

    // Without a final newline the output would run into the end-output line.
    if (output && !output.endsWith("\n")) {
      output += "\n";
    }

    return reindentBlock(output, outPrefix);
  }
}

// What console.log would print for `args`.
function renderLogLine(args: unknown[]): string {
  if (args.length === 0) return "\n";
  const [first, ...rest] = args;
  return format(first, ...rest) + "\n";
}
