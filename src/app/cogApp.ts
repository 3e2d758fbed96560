// src/app/cogApp.ts
// The cogwheel engine: files, file lists, check and replace modes, exit codes

import { execSync } from "child_process";
import { createTwoFilesPatch } from "diff";
import * as fs from "fs";
import * as os from "os";
import * as path from "path";
import { consoleOutput } from "../adapters/consoleOutput";
import { formatTraceEvent, loggingExecutor } from "../adapters/logging";
import { vmExecutor } from "../adapters/vmExecutor";
import { assertValidConfig, cloneOptions, defaultOptions, type CogOptions } from "../core/config/config";
import {
  CogCheckFailed,
  CogError,
  CogGeneratedError,
  CogUsageError,
  CogUserException,
} from "../core/errors";
import { FileProcessor, type FileNames, type ProcessFileResult } from "../core/processor/fileProcessor";
import { makeDiagnostic } from "../outcome/codes";
import { formatDiagnostic, type Diagnostic } from "../outcome/diagnostic";
import type { SnippetExecutor } from "../ports/executor";
import type { OutputPort, TextWriter } from "../ports/output";
import type { Namespace, TraceSink } from "../ports/types";
import { parseArgs, shellSplit } from "./args";
import { getVersion, USAGE } from "./usage";

/**
 * Run `cmd` in a shell and return what it printed. A failing command is not
 * an error here; the caller checks whether it had the intended effect.
 */
export function runShellCommand(cmd: string): string {
  try {
    return execSync(cmd, { encoding: "utf8", stdio: ["ignore", "pipe", "inherit"] });
  } catch (e) {
    if (e instanceof Error && "stdout" in e) {
      const { stdout } = e;
      if (typeof stdout === "string") return stdout;
      if (Buffer.isBuffer(stdout)) return stdout.toString("utf8");
    }
    return "";
  }
}

export type CogAppDeps = {
  output?: OutputPort;
  executor?: SnippetExecutor;
  /** Reads all of standard input, for the `-` file name */
  readStdin?: () => Buffer;
  /** Runs the make-writable command and returns what it printed */
  runCommand?: (cmd: string) => string;
  /** Directory relative file names resolve against */
  cwd?: string;
  version?: string;
};

export class CogApp {
  options: CogOptions;
  private checkFailed = false;

  private readonly baseOptions: CogOptions;
  private readonly output: OutputPort;
  private readonly executor: SnippetExecutor;
  private readonly readStdin: () => Buffer;
  private readonly runCommand: (cmd: string) => string;
  private readonly cwd: string;
  private readonly version: string;
  private readonly traceSink: TraceSink;

  constructor(options: Readonly<CogOptions> = defaultOptions(), deps: CogAppDeps = {}) {
    this.baseOptions = cloneOptions(options);
    this.options = cloneOptions(options);
    this.output = deps.output ?? consoleOutput();
    this.executor = deps.executor ?? vmExecutor;
    this.readStdin = deps.readStdin ?? (() => fs.readFileSync(0));
    this.runCommand = deps.runCommand ?? runShellCommand;
    this.cwd = deps.cwd ?? process.cwd();
    this.version = deps.version ?? getVersion();
    this.traceSink = { emit: event => this.prout(formatTraceEvent(event)) };
  }

  // =========================================================================
  // Output helpers
  // =========================================================================

  private prout(text: string, end = "\n"): void {
    this.output.stdout.write(text + end);
  }

  private prerr(text: string, end = "\n"): void {
    this.output.stderr.write(text + end);
  }

  private report(diag: Diagnostic): void {
    this.prout(formatDiagnostic(diag));
  }

  // =========================================================================
  // Processing text
  // =========================================================================

  private createProcessor(): FileProcessor {
    const trace = this.options.verbosity >= 3 ? this.traceSink : undefined;
    return new FileProcessor(this.options, {
      executor: trace ? loggingExecutor(this.executor, trace) : this.executor,
      stdout: this.output.stdout,
      stderr: this.output.stderr,
      diagnostics: diag => this.report(diag),
      trace,
    });
  }

  /**
   * Process text through the current options, writing to `out`.
   */
  processFile(input: string, out: TextWriter, names: FileNames = {}, globals?: Namespace): ProcessFileResult {
    return this.createProcessor().processFile(input, out, names, globals);
  }

  /**
   * Process `input` and return the result.
   */
  processString(input: string, fname?: string, dir?: string): string {
    let result = "";
    this.processFile(input, { write: text => { result += text; } }, { inFile: fname, dir });
    return result;
  }

  // =========================================================================
  // Files
  // =========================================================================

  private readText(file: string): string {
    const raw = file === "-" ? this.readStdin() : fs.readFileSync(file);
    return raw.toString(this.options.encoding).replace(/\r\n/g, "\n");
  }

  private writeText(file: string, text: string): void {
    const eol = this.options.newline ?? os.EOL;
    const converted = eol === "\n" ? text : text.replace(/\n/g, eol);
    fs.writeFileSync(file, converted, { encoding: this.options.encoding });
  }

  private isWritable(file: string): boolean {
    try {
      fs.accessSync(file, fs.constants.W_OK);
      return true;
    } catch {
      return false;
    }
  }

  /**
   * Replace the file at `filePath` with `text`, making it writable first if
   * a command for that was configured.
   */
  replaceFile(filePath: string, text: string, displayName = filePath): void {
    if (!this.isWritable(filePath)) {
      const cmd = this.options.makeWritableCmd;
      if (!cmd) {
        throw new CogError(`Can't overwrite ${displayName}`);
      }
      this.output.stdout.write(this.runCommand(cmd.split("%s").join(filePath)));
      if (!this.isWritable(filePath)) {
        throw new CogError(`Couldn't make ${displayName} writable`);
      }
    }
    this.writeText(filePath, text);
  }

  /**
   * Process one file, sending the output where the options say.
   */
  processOneFile(file: string, baseDir = this.cwd): void {
    const filePath = file === "-" ? file : path.resolve(baseDir, file);
    const dir = file === "-" ? baseDir : path.dirname(filePath);

    if (this.options.outputName) {
      const text = this.processString(this.readText(filePath), file, dir);
      this.writeText(path.resolve(baseDir, this.options.outputName), text);
      return;
    }

    if (!this.options.replace && !this.options.check) {
      this.processFile(this.readText(filePath), this.output.stdout, { inFile: file, dir });
      return;
    }

    // Print the file name and "(changed)" on one line, but make sure the
    // line is ended before any error is reported.
    const verb = this.options.replace ? "Cogging" : "Checking";
    let needNewline = false;
    if (this.options.verbosity >= 2) {
      this.prout(`${verb} ${file}`, "");
      needNewline = true;
    }

    try {
      const oldText = this.readText(filePath);
      const newText = this.processString(oldText, file, dir);
      if (oldText === newText) return;

      if (this.options.verbosity >= 1) {
        if (this.options.verbosity < 2) {
          this.prout(`${verb} ${file}`, "");
        }
        this.prout("  (changed)");
        needNewline = false;
      }
      if (this.options.check && this.options.diff) {
        this.output.stdout.write(createTwoFilesPatch(`${file} (old)`, `${file} (new)`, oldText, newText));
      }
      if (this.options.replace) {
        this.replaceFile(filePath, newText, file);
      } else {
        this.checkFailed = true;
      }
    } finally {
      if (needNewline) {
        this.prout("");
      }
    }
  }

  /**
   * Process every line of a file list. Each line is a file name (or another
   * list) followed by options that apply to it alone.
   */
  processFileList(listFile: string, baseDir = this.cwd): void {
    const text = this.readText(path.resolve(baseDir, listFile));
    for (const line of text.split("\n")) {
      const args = shellSplit(line);
      if (args.length > 0) {
        this.processArguments(args, baseDir);
      }
    }
  }

  /**
   * Process one command line: a file or file list, then options that refine
   * a clone of the current options for its duration.
   */
  processArguments(args: readonly string[], baseDir = this.cwd): void {
    const saved = this.options;
    this.options = cloneOptions(saved);
    try {
      parseArgs(args.slice(1), this.options);
      assertValidConfig(this.options);

      const [target] = args;
      if (target.startsWith("@")) {
        if (this.options.outputName) {
          throw new CogUsageError("Can't use -o with @file");
        }
        this.processFileList(target.slice(1), baseDir);
      } else if (target.startsWith("&")) {
        if (this.options.outputName) {
          throw new CogUsageError("Can't use -o with &file");
        }
        const listPath = path.resolve(baseDir, target.slice(1));
        this.processFileList(path.basename(listPath), path.dirname(listPath));
      } else {
        this.processOneFile(target, baseDir);
      }
    } finally {
      this.options = saved;
    }
  }

  // =========================================================================
  // Command line
  // =========================================================================

  /**
   * All of the command line, throwing instead of returning an exit status.
   */
  callableMain(argv: readonly string[]): void {
    this.options = cloneOptions(this.baseOptions);
    this.checkFailed = false;

    // Help wins wherever it appears, even beside arguments that would not parse.
    if (argv.includes("-h") || argv.includes("-?") || argv.includes("--help")) {
      this.prerr(USAGE, "");
      return;
    }

    parseArgs(argv, this.options);
    if (this.options.showHelp) {
      this.prerr(USAGE, "");
      return;
    }
    const { warnings } = assertValidConfig(this.options);
    for (const text of warnings) {
      this.report(makeDiagnostic("W0002", { text }));
    }

    if (this.options.showVersion) {
      this.prout(`cogwheel version ${this.version}`);
      return;
    }

    const files = this.options.args;
    if (files.length === 0) {
      throw new CogUsageError("No files to process");
    }
    for (const file of files) {
      this.processArguments([file]);
    }

    if (this.checkFailed) {
      const msg = this.options.checkFailMsg;
      throw new CogCheckFailed(msg ? `Check failed: ${msg}` : "Check failed");
    }
  }

  /**
   * Run a command line and return the process exit status.
   */
  main(argv: readonly string[]): number {
    try {
      this.callableMain(argv);
      return 0;
    } catch (err) {
      if (err instanceof CogUsageError) {
        this.prerr(err.message);
        this.prerr("(for help use -h)");
        return 2;
      }
      if (err instanceof CogGeneratedError) {
        this.prerr(`Error: ${err.message}`);
        return 3;
      }
      if (err instanceof CogUserException) {
        this.prerr("Traceback (most recent call first):");
        this.prerr(err.traceback);
        return 4;
      }
      if (err instanceof CogCheckFailed) {
        this.prerr(err.message);
        return 5;
      }
      if (err instanceof CogError) {
        this.prerr(err.message);
        return 1;
      }
      throw err;
    }
  }
}
