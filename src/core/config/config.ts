// src/core/config/config.ts
// Run options for cogwheel: defaults, environment, config files, validation

import * as fs from "fs";
import * as path from "path";
import { CogUsageError } from "../errors";

// =========================================================================
// Configuration Types
// =========================================================================

export type Markers = {
  /** Token that opens a code region, e.g. `[[[cog` */
  beginSpec: string;
  /** Token that closes the code and opens the output, e.g. `]]]` */
  endSpec: string;
  /** Token that closes the output, e.g. `[[[end]]]` */
  endOutput: string;
};

export type CogOptions = {
  /** Files (or @lists, &lists) left over after option parsing */
  args: string[];
  /** Extra directories snippets may `require` from */
  includePath: string[];
  /** Globals copied into every file's namespace */
  defines: Record<string, string>;
  showVersion: boolean;
  showHelp: boolean;
  /** Command to make a read-only file writable; `%s` is the file name */
  makeWritableCmd?: string;
  /** Rewrite input files in place */
  replace: boolean;
  /** Remove generated output without running snippets */
  noGenerate: boolean;
  outputName?: string;
  warnEmpty: boolean;
  /** Protect generated output with a checksum on the end-output line */
  hashOutput: boolean;
  /** Drop marker and code lines from the output */
  deleteCode: boolean;
  /** End of file may stand in for a missing end-output line */
  eofCanBeEnd: boolean;
  /** Appended to every non-blank generated line */
  suffix?: string;
  /** Line ending to write; the platform's when unset */
  newline?: string;
  encoding: BufferEncoding;
  /** 0 lists no files, 1 changed files, 2 all files, 3 adds trace lines */
  verbosity: number;
  prologue: string;
  /** Capture `console.log` instead of `cog.emit` */
  printOutput: boolean;
  check: boolean;
  checkFailMsg?: string;
  diff: boolean;
  markers: Markers;
};

// =========================================================================
// Default Configuration
// =========================================================================

export const DEFAULT_MARKERS: Markers = {
  beginSpec: "[[[cog",
  endSpec: "]]]",
  endOutput: "[[[end]]]",
};

export const DEFAULT_OPTIONS: Readonly<CogOptions> = Object.freeze({
  args: [],
  includePath: [],
  defines: {},
  showVersion: false,
  showHelp: false,
  replace: false,
  noGenerate: false,
  warnEmpty: false,
  hashOutput: false,
  deleteCode: false,
  eofCanBeEnd: false,
  encoding: "utf8",
  verbosity: 2,
  prologue: "",
  printOutput: false,
  check: false,
  diff: false,
  markers: DEFAULT_MARKERS,
});

/**
 * Fresh, independently mutable default options.
 */
export function defaultOptions(): CogOptions {
  return cloneOptions(DEFAULT_OPTIONS);
}

/**
 * Deep copy, so a refined clone never reaches back into its parent.
 */
export function cloneOptions(options: Readonly<CogOptions>): CogOptions {
  return structuredClone(options);
}

/**
 * Parse `'START END END-OUTPUT'` into markers.
 */
export function parseMarkers(arg: string): Markers {
  const parts = arg.split(" ");
  if (parts.length !== 3) {
    throw new CogUsageError(`--markers requires 3 values separated by spaces, could not parse ${JSON.stringify(arg)}`);
  }
  const [beginSpec, endSpec, endOutput] = parts;
  return { beginSpec, endSpec, endOutput };
}

export function isEncoding(value: string): value is BufferEncoding {
  return Buffer.isEncoding(value);
}

// =========================================================================
// Configuration Loading
// =========================================================================

/**
 * Load configuration from environment variables.
 */
export function configFromEnv(prefix = "COGWHEEL", env: NodeJS.ProcessEnv = process.env): Partial<CogOptions> {
  const config: Partial<CogOptions> = {};

  const markers = env[`${prefix}_MARKERS`];
  if (markers) config.markers = parseMarkers(markers);

  const verbosity = parseInt(env[`${prefix}_VERBOSITY`] || "", 10);
  if (!Number.isNaN(verbosity)) config.verbosity = verbosity;

  const encoding = env[`${prefix}_ENCODING`];
  if (encoding) {
    if (!isEncoding(encoding)) throw new CogUsageError(`Unknown encoding: ${encoding}`);
    config.encoding = encoding;
  }

  const prologue = env[`${prefix}_PROLOGUE`];
  if (prologue) config.prologue = prologue;

  const include = env[`${prefix}_INCLUDE`];
  if (include) config.includePath = include.split(path.delimiter).filter(Boolean).map(p => path.resolve(p));

  return config;
}

/**
 * Load configuration from a JSON or YAML file.
 */
export function configFromFile(filePath: string): Partial<CogOptions> {
  if (!fs.existsSync(filePath)) {
    throw new CogUsageError(`Config file not found: ${filePath}`);
  }

  const content = fs.readFileSync(filePath, "utf8");
  const ext = path.extname(filePath).toLowerCase();

  let data: unknown;

  if (ext === ".json") {
    data = JSON.parse(content);
  } else if (ext === ".yaml" || ext === ".yml") {
    // Simple YAML parser for basic configs
    data = parseSimpleYaml(content);
  } else {
    throw new CogUsageError(`Unsupported config file format: ${ext}`);
  }

  if (!isRecord(data)) {
    throw new CogUsageError(`Config file must hold an object: ${filePath}`);
  }
  return configFromObject(data, path.dirname(path.resolve(filePath)));
}

/**
 * Create configuration from a plain object (e.g., from parsed JSON/YAML).
 * Keys may be camelCase or snake_case. Relative include paths resolve
 * against `baseDir`.
 */
export function configFromObject(data: Record<string, unknown>, baseDir = process.cwd()): Partial<CogOptions> {
  const config: Partial<CogOptions> = {};
  const pick = (camel: string, snake: string): unknown => data[camel] ?? data[snake];

  const markers = data.markers;
  if (typeof markers === "string") {
    config.markers = parseMarkers(markers);
  } else if (isRecord(markers)) {
    config.markers = {
      beginSpec: stringOr(markers.beginSpec ?? markers.begin_spec, DEFAULT_MARKERS.beginSpec),
      endSpec: stringOr(markers.endSpec ?? markers.end_spec, DEFAULT_MARKERS.endSpec),
      endOutput: stringOr(markers.endOutput ?? markers.end_output, DEFAULT_MARKERS.endOutput),
    };
  }

  const defines = data.defines;
  if (isRecord(defines)) {
    config.defines = Object.fromEntries(Object.entries(defines).map(([k, v]) => [k, String(v)]));
  }

  const includePath = pick("includePath", "include_path");
  if (Array.isArray(includePath)) {
    config.includePath = includePath.map(p => path.resolve(baseDir, String(p)));
  } else if (typeof includePath === "string") {
    config.includePath = [path.resolve(baseDir, includePath)];
  }

  const encoding = data.encoding;
  if (typeof encoding === "string") {
    if (!isEncoding(encoding)) throw new CogUsageError(`Unknown encoding: ${encoding}`);
    config.encoding = encoding;
  }

  const newline = data.newline;
  if (newline === "lf" || newline === "\n") config.newline = "\n";
  else if (newline === "crlf" || newline === "\r\n") config.newline = "\r\n";

  const prologue = data.prologue;
  if (typeof prologue === "string") config.prologue = prologue;

  const suffix = data.suffix;
  if (typeof suffix === "string") config.suffix = suffix;

  const verbosity = data.verbosity;
  if (typeof verbosity === "number") config.verbosity = verbosity;

  const checkFailMsg = pick("checkFailMsg", "check_fail_msg");
  if (typeof checkFailMsg === "string") config.checkFailMsg = checkFailMsg;

  const flags = [
    ["hashOutput", "hash_output"],
    ["warnEmpty", "warn_empty"],
    ["eofCanBeEnd", "eof_can_be_end"],
    ["printOutput", "print_output"],
  ] as const;
  for (const [camel, snake] of flags) {
    const value = pick(camel, snake);
    if (typeof value === "boolean") config[camel] = value;
  }

  return config;
}

/**
 * Merge configs with later ones overriding earlier ones. Defines merge
 * key by key; every other field is replaced whole.
 */
export function mergeConfigs(...configs: Partial<CogOptions>[]): CogOptions {
  const result = defaultOptions();

  for (const cfg of configs) {
    const layer = structuredClone(cfg);
    const defines = { ...result.defines, ...layer.defines };
    Object.assign(result, layer, { defines });
  }

  return result;
}

export const DEFAULT_CONFIG_FILES = ["cogwheel.config.json", "cogwheel.config.yaml", "cogwheel.config.yml"];

/**
 * Auto-detect and load configuration.
 * Priority: CLI args > config file > environment > defaults
 */
export function loadConfig(options?: {
  configFile?: string;
  overrides?: Partial<CogOptions>;
  cwd?: string;
  env?: NodeJS.ProcessEnv;
}): CogOptions {
  const cwd = options?.cwd ?? process.cwd();
  const layers: Partial<CogOptions>[] = [configFromEnv("COGWHEEL", options?.env)];

  if (options?.configFile) {
    layers.push(configFromFile(path.resolve(cwd, options.configFile)));
  } else {
    for (const name of DEFAULT_CONFIG_FILES) {
      const p = path.join(cwd, name);
      if (fs.existsSync(p)) {
        layers.push(configFromFile(p));
        break;
      }
    }
  }

  if (options?.overrides) {
    layers.push(options.overrides);
  }

  return mergeConfigs(...layers);
}

// =========================================================================
// Simple YAML Parser (for basic configs only)
// =========================================================================

export function parseSimpleYaml(content: string): Record<string, unknown> {
  const result: Record<string, unknown> = {};
  const stack: Array<{ obj: Record<string, unknown>; indent: number }> = [{ obj: result, indent: -1 }];

  for (const rawLine of content.split("\n")) {
    // Skip empty lines and comments
    const trimmed = rawLine.trim();
    if (!trimmed || trimmed.startsWith("#")) continue;

    const indent = rawLine.search(/\S/);

    // Pop stack to find parent at correct indent level
    while (stack.length > 1 && stack[stack.length - 1].indent >= indent) {
      stack.pop();
    }
    const parent = stack[stack.length - 1].obj;

    const colonIdx = trimmed.indexOf(":");
    if (colonIdx < 0) continue;

    const key = trimmed.slice(0, colonIdx).trim();
    const value = trimmed.slice(colonIdx + 1).trim();

    if (value === "") {
      // Nested object
      const nested: Record<string, unknown> = {};
      parent[key] = nested;
      stack.push({ obj: nested, indent });
    } else {
      parent[key] = parseScalar(value);
    }
  }

  return result;
}

function parseScalar(value: string): unknown {
  if (value === "true") return true;
  if (value === "false") return false;
  if (value === "null") return null;
  if (/^-?\d+$/.test(value)) return parseInt(value, 10);
  if (/^-?\d+\.\d+$/.test(value)) return parseFloat(value);
  if ((value.startsWith('"') && value.endsWith('"')) || (value.startsWith("'") && value.endsWith("'"))) {
    return value.slice(1, -1);
  }
  if (value.startsWith("[") && value.endsWith("]")) {
    const inner = value.slice(1, -1).trim();
    return inner ? inner.split(",").map(item => parseScalar(item.trim())) : [];
  }
  return value;
}

// =========================================================================
// Config Validation
// =========================================================================

export type ConfigValidation = {
  valid: boolean;
  errors: string[];
  warnings: string[];
};

export function validateConfig(config: CogOptions): ConfigValidation {
  const errors: string[] = [];
  const warnings: string[] = [];

  if (config.replace && config.deleteCode) {
    errors.push("Can't use -d with -r (or you would delete all your source!)");
  }
  if (config.replace && config.outputName) {
    errors.push("Can't use -o with -r (they are opposites)");
  }
  if (config.diff && !config.check) {
    errors.push("Can't use --diff without --check");
  }

  const { beginSpec, endSpec, endOutput } = config.markers;
  if (!beginSpec || !endSpec || !endOutput) {
    errors.push("Markers can't be empty");
  } else if (new Set([beginSpec, endSpec, endOutput]).size !== 3) {
    errors.push("Markers must be three distinct tokens");
  }

  if (config.verbosity < 0 || config.verbosity > 3) {
    warnings.push(`verbosity ${config.verbosity} is outside 0-3`);
  }

  return {
    valid: errors.length === 0,
    errors,
    warnings,
  };
}

/**
 * Throw a usage error for the first validation error, if any.
 */
export function assertValidConfig(config: CogOptions): ConfigValidation {
  const validation = validateConfig(config);
  if (!validation.valid) {
    throw new CogUsageError(validation.errors[0]);
  }
  return validation;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function stringOr(value: unknown, fallback: string): string {
  return typeof value === "string" ? value : fallback;
}
