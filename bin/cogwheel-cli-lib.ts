// bin/cogwheel-cli-lib.ts
// Shared CLI utilities for the cogwheel command
// Exported functions for testing

import * as fs from "fs";
import * as path from "path";
import { CogApp, type CogAppDeps } from "../src/app/cogApp";
import { loadConfig } from "../src/core/config/config";
import { CogUsageError } from "../src/core/errors";

// ═══════════════════════════════════════════════════════════════════════════════
// TYPE DEFINITIONS
// ═══════════════════════════════════════════════════════════════════════════════

export type CliEnvironment = {
  cwd: string;
  env: NodeJS.ProcessEnv;
  deps?: Omit<CogAppDeps, "cwd">;
};

// ═══════════════════════════════════════════════════════════════════════════════
// ARGUMENT PRE-PARSING
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Pull `--config FILE` / `--config=FILE` out of argv. Everything else is
 * left for the engine's own parser.
 */
export function extractConfigFlag(argv: readonly string[]): { configFile?: string; rest: string[] } {
  const rest: string[] = [];
  let configFile: string | undefined;

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (arg === "--config") {
      if (i + 1 >= argv.length) throw new CogUsageError("option --config requires argument");
      configFile = argv[++i];
    } else if (arg.startsWith("--config=")) {
      configFile = arg.slice("--config=".length);
    } else {
      rest.push(arg);
    }
  }

  return { configFile, rest };
}

// ═══════════════════════════════════════════════════════════════════════════════
// ENVIRONMENT SETUP
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Copy `NAME=value` lines from `<cwd>/.env` into `env`, without overriding
 * variables that are already set.
 */
export function loadEnvFile(cwd: string, env: NodeJS.ProcessEnv): void {
  const envPath = path.join(cwd, ".env");
  if (!fs.existsSync(envPath)) return;

  const envContent = fs.readFileSync(envPath, "utf8");
  for (const line of envContent.split("\n")) {
    const match = line.match(/^([^=#]+)=(.*)$/);
    if (match && !env[match[1].trim()]) {
      env[match[1].trim()] = match[2].trim();
    }
  }
}

// ═══════════════════════════════════════════════════════════════════════════════
// RUNNING
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Build the engine from defaults, environment and config file, then run
 * the command line. Returns the exit status.
 */
export function runCli(argv: readonly string[], environment: CliEnvironment): number {
  const { cwd, env, deps } = environment;

  try {
    const { configFile, rest } = extractConfigFlag(argv);
    loadEnvFile(cwd, env);
    const app = new CogApp(loadConfig({ configFile, cwd, env }), { ...deps, cwd });
    return app.main(rest);
  } catch (err) {
    // The engine reports its own usage errors; these come from configuration.
    if (!(err instanceof CogUsageError)) throw err;
    const stderr = deps?.output?.stderr ?? { write: (text: string) => { process.stderr.write(text); } };
    stderr.write(`${err.message}\n(for help use -h)\n`);
    return 2;
  }
}
