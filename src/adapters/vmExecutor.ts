// src/adapters/vmExecutor.ts
// Default snippet backend: JavaScript run in a node:vm context

import vm from "vm";
import type { SnippetExecutor, SourceUnit } from "../ports/executor";
import type { Namespace } from "../ports/types";

/**
 * Runs each source unit as a script in the namespace's context. The
 * namespace object is contextified on first use, so top-level `var`,
 * `let`, `const` and function declarations persist for later units.
 */
export class VmExecutor implements SnippetExecutor {
  run(unit: SourceUnit, namespace: Namespace): void {
    const context = vm.isContext(namespace) ? namespace : vm.createContext(namespace);
    const script = new vm.Script(unit.source, { filename: unit.filename });
    script.runInContext(context);
  }
}

export const vmExecutor: SnippetExecutor = new VmExecutor();
