// src/core/exec/snippetRequire.ts
// `require` for snippet code, searching a list of directories in order

import { createRequire } from "module";
import * as path from "path";

export type SnippetRequire = (id: string) => unknown;

/**
 * Build a `require` that resolves `id` against each directory in turn. The
 * first directory that can resolve it wins; failures while loading the
 * resolved module propagate unchanged.
 */
export function createSnippetRequire(searchDirs: readonly string[]): SnippetRequire {
  const requirers = searchDirs.map(dir => createRequire(path.join(path.resolve(dir), "__cogwheel__.js")));

  return (id: string): unknown => {
    let lastError: unknown = new Error(`Cannot find module '${id}'`);
    for (const req of requirers) {
      let resolved: string;
      try {
        resolved = req.resolve(id);
      } catch (e) {
        lastError = e;
        continue;
      }
      return req(resolved);
    }
    throw lastError;
  };
}
