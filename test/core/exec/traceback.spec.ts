// test/core/exec/traceback.spec.ts
// Tests for stack frame parsing and remapping

import { describe, it, expect } from "vitest";
import {
  describeThrown,
  formatFrames,
  isRegionTag,
  parseStack,
  PROLOGUE_FILE,
  regionTag,
  remapFrames,
  trimToSnippetFrames,
  type RegionSource,
  type StackFrame,
} from "../../../src/core/exec/traceback";

const TAG = regionTag("gen.txt", 10);

const STACK = [
  "Error: kaboom",
  `    at inner (${TAG}:2:9)`,
  `    at ${TAG}:4:1`,
  "    at Script.runInContext (node:vm:286:10)",
  "    at VmExecutor.run (/work/src/adapters/vmExecutor.ts:17:12)",
].join("\n");

describe("region tags", () => {
  it("names the file and the begin line", () => {
    expect(TAG).toBe("<cog gen.txt:10>");
    expect(isRegionTag(TAG)).toBe(true);
    expect(isRegionTag("gen.txt")).toBe(false);
  });
});

describe("parseStack", () => {
  it("reads frames with and without function names", () => {
    expect(parseStack(STACK)).toEqual([
      { func: "inner", file: TAG, line: 2, column: 9 },
      { func: "<top level>", file: TAG, line: 4, column: 1 },
      { func: "Script.runInContext", file: "node:vm", line: 286, column: 10 },
      { func: "VmExecutor.run", file: "/work/src/adapters/vmExecutor.ts", line: 17, column: 12 },
    ]);
  });

  it("skips lines that are not frames", () => {
    expect(parseStack("TypeError: nope\n    something else")).toEqual([]);
  });
});

describe("trimToSnippetFrames", () => {
  it("drops the engine's frames below the outermost region frame", () => {
    const frames = trimToSnippetFrames(parseStack(STACK));
    expect(frames.map(f => f.func)).toEqual(["inner", "<top level>"]);
  });

  it("keeps library frames called from snippet code", () => {
    const frames: StackFrame[] = [
      { func: "helper", file: "/lib/helper.js", line: 3 },
      { func: "<top level>", file: TAG, line: 1 },
      { func: "run", file: "/engine.ts", line: 9 },
    ];
    expect(trimToSnippetFrames(frames).map(f => f.file)).toEqual(["/lib/helper.js", TAG]);
  });

  it("is empty when no region frame is present", () => {
    expect(trimToSnippetFrames([{ func: "run", file: "/engine.ts", line: 9 }])).toEqual([]);
  });
});

describe("remapFrames", () => {
  const source: RegionSource = {
    file: "gen.txt",
    codeStartLine: 11,
    codeLines: ["  // function inner() {", "  //   return boom;", "  // }", "  // inner();"],
    prologueLines: [],
  };
  const locate = (tag: string) => (tag === TAG ? source : undefined);

  it("maps script lines onto file lines", () => {
    const frames = remapFrames(trimToSnippetFrames(parseStack(STACK)), locate);
    expect(frames).toEqual([
      { func: "inner", file: "gen.txt", line: 12, column: 9, source: "//   return boom;" },
      { func: "<top level>", file: "gen.txt", line: 14, column: 1, source: "// inner();" },
    ]);
  });

  it("maps the first lines onto the prologue", () => {
    const withPrologue: RegionSource = { ...source, prologueLines: ["var a = 1;", "  var b = 2;"] };
    const frames = remapFrames(
      [
        { func: "<top level>", file: TAG, line: 2 },
        { func: "<top level>", file: TAG, line: 3 },
      ],
      () => withPrologue
    );
    expect(frames[0]).toEqual({ func: "<top level>", file: PROLOGUE_FILE, line: 2, source: "var b = 2;" });
    expect(frames[1]).toEqual({ func: "<top level>", file: "gen.txt", line: 11, source: "// function inner() {" });
  });

  it("leaves unknown regions and other files alone", () => {
    const frames: StackFrame[] = [
      { func: "x", file: "<cog other.txt:1>", line: 1 },
      { func: "y", file: "/lib/y.js", line: 5 },
    ];
    expect(remapFrames(frames, locate)).toEqual(frames);
  });
});

describe("formatting", () => {
  it("prints each frame with its source line", () => {
    const text = formatFrames([
      { func: "inner", file: "gen.txt", line: 12, source: "return boom;" },
      { func: "y", file: "/lib/y.js", line: 5 },
    ]);
    expect(text).toBe("  at inner (gen.txt:12)\n    return boom;\n  at y (/lib/y.js:5)\n");
  });

  it("summarizes what was thrown", () => {
    expect(describeThrown(new RangeError("too far"))).toBe("RangeError: too far");
    expect(describeThrown(42)).toBe("Uncaught 42");
  });
});
