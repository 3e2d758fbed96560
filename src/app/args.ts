// src/app/args.ts
// Command-line option parsing onto CogOptions, and file-list line splitting

import * as path from "path";
import { isEncoding, parseMarkers, type CogOptions } from "../core/config/config";
import { CogUsageError } from "../core/errors";

// =========================================================================
// Option Tables
// =========================================================================

type Flag = "-c" | "-d" | "-e" | "-P" | "-r" | "-U" | "-x" | "-z" | "-v" | "-h" | "-?";
type ValueOption = "-D" | "-I" | "-n" | "-o" | "-p" | "-s" | "-w";

const FLAGS: Record<Flag, (o: CogOptions) => void> = {
  "-c": o => { o.hashOutput = true; },
  "-d": o => { o.deleteCode = true; },
  "-e": o => { o.warnEmpty = true; },
  "-P": o => { o.printOutput = true; },
  "-r": o => { o.replace = true; },
  "-U": o => { o.newline = "\n"; },
  "-x": o => { o.noGenerate = true; },
  "-z": o => { o.eofCanBeEnd = true; },
  "-v": o => { o.showVersion = true; },
  "-h": o => { o.showHelp = true; },
  "-?": o => { o.showHelp = true; },
};

const VALUE_OPTIONS: Record<ValueOption, (o: CogOptions, value: string) => void> = {
  "-D": (o, value) => {
    const eq = value.indexOf("=");
    if (eq < 0) throw new CogUsageError("-D takes a name=value argument");
    o.defines[value.slice(0, eq)] = value.slice(eq + 1);
  },
  "-I": (o, value) => {
    o.includePath.push(...value.split(path.delimiter).filter(Boolean).map(p => path.resolve(p)));
  },
  "-n": (o, value) => {
    if (!isEncoding(value)) throw new CogUsageError(`Unknown encoding: ${value}`);
    o.encoding = value;
  },
  "-o": (o, value) => { o.outputName = value; },
  "-p": (o, value) => { o.prologue = value; },
  "-s": (o, value) => { o.suffix = value; },
  "-w": (o, value) => { o.makeWritableCmd = value; },
};

const LONG_FLAGS: Record<string, (o: CogOptions) => void> = {
  "--check": o => { o.check = true; },
  "--diff": o => { o.diff = true; },
  "--help": o => { o.showHelp = true; },
};

const LONG_VALUE_OPTIONS: Record<string, (o: CogOptions, value: string) => void> = {
  "--check-fail-msg": (o, value) => { o.checkFailMsg = value; },
  "--markers": (o, value) => { o.markers = parseMarkers(value); },
  "--verbosity": (o, value) => {
    if (!/^-?\d+$/.test(value)) {
      throw new CogUsageError(`--verbosity takes an integer, got ${JSON.stringify(value)}`);
    }
    o.verbosity = parseInt(value, 10);
  },
};

function isFlag(opt: string): opt is Flag {
  return Object.prototype.hasOwnProperty.call(FLAGS, opt);
}

function isValueOption(opt: string): opt is ValueOption {
  return Object.prototype.hasOwnProperty.call(VALUE_OPTIONS, opt);
}

// =========================================================================
// Argument Parsing
// =========================================================================

/**
 * Apply `argv` to `options` in place. Non-option words are appended to
 * `options.args`. Short flags combine (`-cr`) and short options take their
 * value attached (`-Dx=1`) or as the next word.
 */
export function parseArgs(argv: readonly string[], options: CogOptions): CogOptions {
  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];

    if (arg === "--") {
      options.args.push(...argv.slice(i + 1));
      break;
    }

    if (arg.startsWith("--")) {
      const eq = arg.indexOf("=");
      const name = eq < 0 ? arg : arg.slice(0, eq);
      const flag = LONG_FLAGS[name];
      const valued = LONG_VALUE_OPTIONS[name];
      if (flag && eq < 0) {
        flag(options);
      } else if (valued) {
        if (eq >= 0) {
          valued(options, arg.slice(eq + 1));
        } else if (i + 1 < argv.length) {
          valued(options, argv[++i]);
        } else {
          throw new CogUsageError(`option ${name} requires argument`);
        }
      } else {
        throw new CogUsageError(`option ${name} not recognized`);
      }
      continue;
    }

    if (arg.startsWith("-") && arg !== "-") {
      // A cluster of short options: flags until one that takes a value.
      for (let j = 1; j < arg.length; j++) {
        const opt = `-${arg[j]}`;
        if (isFlag(opt)) {
          FLAGS[opt](options);
        } else if (isValueOption(opt)) {
          const attached = arg.slice(j + 1);
          if (attached) {
            VALUE_OPTIONS[opt](options, attached);
          } else if (i + 1 < argv.length) {
            VALUE_OPTIONS[opt](options, argv[++i]);
          } else {
            throw new CogUsageError(`option ${opt} requires argument`);
          }
          break;
        } else {
          throw new CogUsageError(`option ${opt} not recognized`);
        }
      }
      continue;
    }

    options.args.push(arg);
  }

  return options;
}

// =========================================================================
// File-list Lines
// =========================================================================

/**
 * Split one file-list line into words the way a POSIX shell would, without
 * backslash escapes so Windows paths survive. An unquoted `#` starts a
 * comment.
 */
export function shellSplit(line: string): string[] {
  const words: string[] = [];
  let word = "";
  let inWord = false;
  let quote: '"' | "'" | null = null;

  for (const ch of line) {
    if (quote) {
      if (ch === quote) {
        quote = null;
      } else {
        word += ch;
      }
      continue;
    }
    if (ch === '"' || ch === "'") {
      quote = ch;
      inWord = true;
    } else if (/\s/.test(ch)) {
      if (inWord) {
        words.push(word);
        word = "";
        inWord = false;
      }
    } else if (ch === "#") {
      break;
    } else {
      word += ch;
      inWord = true;
    }
  }

  if (quote) {
    throw new CogUsageError(`No closing quotation in file list line: ${line.trim()}`);
  }
  if (inWord) words.push(word);
  return words;
}
