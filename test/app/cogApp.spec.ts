// test/app/cogApp.spec.ts
// Tests for the cogwheel engine over real files in a scratch directory

import * as fs from "fs";
import * as os from "os";
import * as path from "path";
import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { StringOutput } from "../../src/adapters/consoleOutput";
import { CogApp, runShellCommand, type CogAppDeps } from "../../src/app/cogApp";
import { USAGE } from "../../src/app/usage";
import { defaultOptions } from "../../src/core/config/config";
import { CogError } from "../../src/core/errors";

const HELLO = '//[[[cog\ncog.emitLine("hello");\n//]]]\n//[[[end]]]\n';
const HELLO_DONE = '//[[[cog\ncog.emitLine("hello");\n//]]]\nhello\n//[[[end]]]\n';
const WHO = "//[[[cog cog.emitLine(typeof who === 'undefined' ? 'nobody' : who); ]]]\n//[[[end]]]\n";

const node = JSON.stringify(process.execPath);

describe("runShellCommand", () => {
  it("returns what the command printed", () => {
    expect(runShellCommand(`${node} -e "process.stdout.write('done')"`)).toBe("done");
  });

  it("returns partial output from a failing command", () => {
    expect(runShellCommand(`${node} -e "process.stdout.write('partial'); process.exit(1)"`)).toBe("partial");
  });
});

describe("CogApp", () => {
  let dir = "";
  let output: StringOutput;

  const write = (name: string, content: string | Buffer) => {
    const file = path.join(dir, name);
    fs.mkdirSync(path.dirname(file), { recursive: true });
    fs.writeFileSync(file, content);
  };
  const read = (name: string) => fs.readFileSync(path.join(dir, name), "utf8");
  const app = (deps: CogAppDeps = {}) => new CogApp(defaultOptions(), { output, cwd: dir, version: "9.9.9", ...deps });
  const stdout = () => output.stdout.getValue();
  const stderr = () => output.stderr.getValue();

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), "cogwheel-app-"));
    output = new StringOutput();
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  describe("command line", () => {
    it("prints the version", () => {
      expect(app().main(["-v"])).toBe(0);
      expect(stdout()).toBe("cogwheel version 9.9.9\n");
    });

    it("prints help to stderr wherever -h appears", () => {
      expect(app().main(["-c", "missing.txt", "-h"])).toBe(0);
      expect(stderr()).toBe(USAGE);
      expect(stdout()).toBe("");
    });

    it("prints help before rejecting other arguments", () => {
      expect(app().main(["-j", "--help"])).toBe(0);
      expect(stderr()).toBe(USAGE);
    });

    it("prints help for -h inside a flag cluster", () => {
      expect(app().main(["-ch"])).toBe(0);
      expect(stderr()).toBe(USAGE);
      expect(stdout()).toBe("");
    });

    it("needs at least one file", () => {
      expect(app().main([])).toBe(2);
      expect(stderr()).toBe("No files to process\n(for help use -h)\n");
    });

    it("rejects unknown options", () => {
      expect(app().main(["-j"])).toBe(2);
      expect(stderr()).toBe("option -j not recognized\n(for help use -h)\n");
    });

    it("rejects conflicting options", () => {
      expect(app().main(["-r", "-d", "x.txt"])).toBe(2);
      expect(stderr()).toBe("Can't use -d with -r (or you would delete all your source!)\n(for help use -h)\n");
    });

    it("warns about odd settings before running", () => {
      expect(app().main(["--verbosity=7", "-v"])).toBe(0);
      expect(stdout()).toBe("Warning: verbosity 7 is outside 0-3\ncogwheel version 9.9.9\n");
    });

    it("starts every run from the options it was built with", () => {
      write("who.cog", WHO);
      const cog = app();
      expect(cog.main(["-D", "who=first", "who.cog"])).toBe(0);
      expect(cog.main(["who.cog"])).toBe(0);
      expect(stdout()).toBe(WHO.replace("\n", "\nfirst\n") + WHO.replace("\n", "\nnobody\n"));
    });
  });

  describe("printing", () => {
    it("writes processed files to stdout", () => {
      write("test.cog", HELLO);
      expect(app().main(["test.cog"])).toBe(0);
      expect(stdout()).toBe(HELLO_DONE);
      expect(read("test.cog")).toBe(HELLO);
    });

    it("reads standard input for -", () => {
      expect(app({ readStdin: () => Buffer.from(HELLO) }).main(["-"])).toBe(0);
      expect(stdout()).toBe(HELLO_DONE);
    });

    it("normalizes CRLF input", () => {
      write("dos.txt", "one\r\ntwo\r\n");
      expect(app().main(["dos.txt"])).toBe(0);
      expect(stdout()).toBe("one\ntwo\n");
    });

    it("decodes with the chosen encoding", () => {
      write("latin.txt", Buffer.from("café\n", "latin1"));
      expect(app().main(["-n", "latin1", "latin.txt"])).toBe(0);
      expect(stdout()).toBe("café\n");
    });

    it("shows snippet messages", () => {
      write("msg.cog", "//[[[cog cog.message('hi'); ]]]\n//[[[end]]]\n");
      expect(app().main(["msg.cog"])).toBe(0);
      expect(stdout()).toBe("//[[[cog cog.message('hi'); ]]]\nMessage: hi\n//[[[end]]]\n");
    });

    it("warns about files without code under -e", () => {
      write("plain.txt", "plain text\n");
      expect(app().main(["-e", "plain.txt"])).toBe(0);
      expect(stdout()).toBe("plain text\nWarning: no cog code found in plain.txt\n");
    });

    it("traces files at verbosity 3", () => {
      write("t.cog", HELLO);
      expect(app().main(["--verbosity=3", "t.cog"])).toBe(0);
      expect(stdout()).toMatch(/^Trace: ran <cog t\.cog:1> in \d+ms$/m);
      expect(stdout()).toMatch(/^Trace: processed t\.cog \(1 regions\) in \d+ms$/m);
    });
  });

  describe("output files", () => {
    it("writes to -o", () => {
      write("test.cog", HELLO);
      expect(app().main(["-U", "-o", "out.txt", "test.cog"])).toBe(0);
      expect(stdout()).toBe("");
      expect(read("out.txt")).toBe(HELLO_DONE);
    });

    it("writes Windows newlines on request", () => {
      write("test.cog", HELLO);
      const cog = new CogApp({ ...defaultOptions(), newline: "\r\n" }, { output, cwd: dir, version: "9.9.9" });
      expect(cog.main(["-o", "out.txt", "test.cog"])).toBe(0);
      expect(read("out.txt")).toBe(HELLO_DONE.replace(/\n/g, "\r\n"));
    });

    it("encodes with the chosen encoding", () => {
      write("latin.cog", Buffer.from("//[[[cog cog.emitLine('naïve'); ]]]\n//[[[end]]]\n", "latin1"));
      expect(app().main(["-U", "-n", "latin1", "-o", "out.txt", "latin.cog"])).toBe(0);
      expect(fs.readFileSync(path.join(dir, "out.txt")).toString("latin1")).toBe(
        "//[[[cog cog.emitLine('naïve'); ]]]\nnaïve\n//[[[end]]]\n"
      );
    });
  });

  describe("replace mode", () => {
    it("rewrites changed files and lists them", () => {
      write("test.cog", HELLO);
      expect(app().main(["-r", "-U", "test.cog"])).toBe(0);
      expect(read("test.cog")).toBe(HELLO_DONE);
      expect(stdout()).toBe("Cogging test.cog  (changed)\n");
    });

    it("lists unchanged files at verbosity 2 only", () => {
      write("test.cog", HELLO_DONE);
      expect(app().main(["-r", "test.cog"])).toBe(0);
      expect(app().main(["-r", "--verbosity=1", "test.cog"])).toBe(0);
      expect(stdout()).toBe("Cogging test.cog\n");
    });

    it("protects output with checksums", () => {
      write("test.cog", HELLO);
      expect(app().main(["-r", "-U", "-c", "test.cog"])).toBe(0);
      expect(read("test.cog")).toBe(HELLO_DONE.replace("//[[[end]]]", "//[[[end]]] (sum: sZRqySSS0j)"));
    });

    it("refuses to overwrite edited output", () => {
      write("test.cog", HELLO_DONE.replace("hello\n", "hellO\n").replace("//[[[end]]]", "//[[[end]]] (sum: sZRqySSS0j)"));
      expect(app().main(["-r", "-c", "test.cog"])).toBe(1);
      expect(stdout()).toBe("Cogging test.cog\n");
      expect(stderr()).toBe("test.cog(5): Output has been edited! Delete old checksum to unprotect.\n");
    });

    it("refuses a file it can't write without -w", () => {
      expect(() => app().replaceFile(path.join(dir, "missing.txt"), "x", "missing.txt")).toThrow(
        new CogError("Can't overwrite missing.txt")
      );
    });

    it("reports a -w command that fails", () => {
      const cog = app();
      cog.options.makeWritableCmd = `${node} -e "process.exit(1)"`;
      expect(() => cog.replaceFile(path.join(dir, "missing.txt"), "x", "missing.txt")).toThrow(
        new CogError("Couldn't make missing.txt writable")
      );
    });

    it("runs the -w command on the file and writes it", () => {
      const cog = app();
      cog.options.makeWritableCmd = `${node} -e "require('fs').writeFileSync(process.argv[1], '')" "%s"`;
      cog.replaceFile(path.join(dir, "made.txt"), "x", "made.txt");
      expect(read("made.txt")).toBe("x");
    });

    it("excises output under -x", () => {
      write("test.cog", HELLO_DONE);
      expect(app().main(["-r", "-U", "-x", "test.cog"])).toBe(0);
      expect(read("test.cog")).toBe(HELLO);
    });
  });

  describe("check mode", () => {
    beforeEach(() => {
      write("unchanged.cog", HELLO_DONE);
      write("changed.cog", HELLO);
    });

    it("lists every file at verbosity 2", () => {
      expect(app().main(["--check", "unchanged.cog", "changed.cog"])).toBe(5);
      expect(stdout()).toBe("Checking unchanged.cog\nChecking changed.cog  (changed)\n");
      expect(stderr()).toBe("Check failed\n");
      expect(read("changed.cog")).toBe(HELLO);
    });

    it("lists changed files at verbosity 1", () => {
      expect(app().main(["--check", "--verbosity=1", "unchanged.cog", "changed.cog"])).toBe(5);
      expect(stdout()).toBe("Checking changed.cog  (changed)\n");
    });

    it("lists nothing at verbosity 0", () => {
      expect(app().main(["--check", "--verbosity=0", "unchanged.cog", "changed.cog"])).toBe(5);
      expect(stdout()).toBe("");
      expect(stderr()).toBe("Check failed\n");
    });

    it("passes when nothing would change", () => {
      expect(app().main(["--check", "unchanged.cog"])).toBe(0);
      expect(stderr()).toBe("");
    });

    it("adds the configured hint", () => {
      expect(app().main(["--check", "--check-fail-msg=run cogwheel -r", "changed.cog"])).toBe(5);
      expect(stderr()).toBe("Check failed: run cogwheel -r\n");
    });

    it("shows a diff on request", () => {
      expect(app().main(["--check", "--diff", "--verbosity=1", "changed.cog"])).toBe(5);
      expect(stdout()).toContain("Checking changed.cog  (changed)\n");
      expect(stdout()).toContain("--- changed.cog (old)\n+++ changed.cog (new)\n");
      expect(stdout()).toContain('\n cog.emitLine("hello");\n //]]]\n+hello\n //[[[end]]]\n');
    });

    it("needs --check for --diff", () => {
      expect(app().main(["--diff", "changed.cog"])).toBe(2);
      expect(stderr()).toBe("Can't use --diff without --check\n(for help use -h)\n");
    });
  });

  describe("failures", () => {
    it("reports structural errors with their location", () => {
      write("bad.cog", "text\n//]]]\n");
      expect(app().main(["bad.cog"])).toBe(1);
      expect(stderr()).toBe("bad.cog(2): Unexpected ']]]'\n");
    });

    it("reports cog.error without a trace", () => {
      write("err.cog", "//[[[cog cog.error('nope'); ]]]\n//[[[end]]]\n");
      expect(app().main(["err.cog"])).toBe(3);
      expect(stderr()).toBe("Error: nope\n");
    });

    it("reports snippet exceptions with a trace", () => {
      write("boom.cog", "//[[[cog\nthrow new Error('bad');\n//]]]\n//[[[end]]]\n");
      expect(app().main(["boom.cog"])).toBe(4);
      expect(stderr()).toBe(
        "Traceback (most recent call first):\n  at <top level> (boom.cog:2)\n    throw new Error('bad');\nError: bad\n"
      );
    });

    it("reports missing files", () => {
      expect(() => app().main(["missing.cog"])).toThrow(/ENOENT/);
    });
  });

  describe("file lists", () => {
    it("processes @lists with per-line options", () => {
      write("a.cog", WHO);
      write("sub/b.cog", WHO);
      write("c.cog", WHO);
      write("files.txt", "a.cog -D who=alpha\n# a comment line\n\nsub/b.cog -D who=beta  # trailing comment\nc.cog\n");
      expect(app().main(["-r", "-U", "@files.txt"])).toBe(0);
      expect(read("a.cog")).toBe(WHO.replace("\n", "\nalpha\n"));
      expect(read("sub/b.cog")).toBe(WHO.replace("\n", "\nbeta\n"));
      expect(read("c.cog")).toBe(WHO.replace("\n", "\nnobody\n"));
      expect(stdout()).toBe("Cogging a.cog  (changed)\nCogging sub/b.cog  (changed)\nCogging c.cog  (changed)\n");
    });

    it("resolves &lists relative to the list", () => {
      write("sub/b.cog", WHO);
      write("sub/list.txt", "b.cog -D who=gamma\n");
      expect(app().main(["-r", "-U", "&sub/list.txt"])).toBe(0);
      expect(read("sub/b.cog")).toBe(WHO.replace("\n", "\ngamma\n"));
      expect(stdout()).toBe("Cogging b.cog  (changed)\n");
    });

    it("follows nested lists", () => {
      write("a.cog", WHO);
      write("inner.txt", "a.cog -D who=nested\n");
      write("outer.txt", "@inner.txt\n");
      expect(app().main(["-r", "-U", "@outer.txt"])).toBe(0);
      expect(read("a.cog")).toBe(WHO.replace("\n", "\nnested\n"));
    });

    it("rejects -o with a list", () => {
      write("files.txt", "a.cog\n");
      expect(app().main(["-o", "out.txt", "@files.txt"])).toBe(2);
      expect(stderr()).toBe("Can't use -o with @file\n(for help use -h)\n");
      expect(app().main(["-o", "out.txt", "&files.txt"])).toBe(2);
    });

    it("rejects unbalanced quotes", () => {
      write("files.txt", "'a.cog\n");
      expect(app().main(["@files.txt"])).toBe(2);
      expect(stderr()).toBe("No closing quotation in file list line: 'a.cog\n(for help use -h)\n");
    });
  });

  describe("processString", () => {
    it("returns the processed text", () => {
      expect(app().processString(HELLO, "s.txt")).toBe(HELLO_DONE);
    });
  });
});
