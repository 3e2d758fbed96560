#!/usr/bin/env npx tsx
// bin/cogwheel.ts
// cogwheel command line: run embedded generators in text files
//
// Run:  npx tsx bin/cogwheel.ts [options] [INFILE | @FILELIST | &FILELIST] ...

import { runCli } from "./cogwheel-cli-lib";

// ═══════════════════════════════════════════════════════════════════════════════
// MAIN ENTRY POINT
// ═══════════════════════════════════════════════════════════════════════════════

function main(): void {
  process.exitCode = runCli(process.argv.slice(2), { cwd: process.cwd(), env: process.env });
}

try {
  main();
} catch (err) {
  console.error("Fatal error:", err);
  process.exit(1);
}
