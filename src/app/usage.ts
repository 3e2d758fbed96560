// src/app/usage.ts
// Help text and version for the cogwheel command

import * as fs from "fs";
import * as path from "path";

export const USAGE = `\
cogwheel - generate content with inlined JavaScript code.

cogwheel [OPTIONS] [INFILE | @FILELIST | &FILELIST] ...

INFILE is the name of an input file, '-' will read from stdin.
FILELIST is the name of a text file containing file names or
other @FILELISTs.

For @FILELIST, paths in the file list are relative to the working
directory where cogwheel was called.  For &FILELIST, paths in the file
list are relative to the file list location.

OPTIONS:
    -c          Checksum the output to protect it against accidental change.
    -d          Delete the generator code from the output file.
    -D name=val Define a global string available to your generator code.
    -e          Warn if a file has no cog code in it.
    -I PATH     Add PATH to the list of directories for data files and modules.
    -n ENCODING Use ENCODING when reading and writing files.
    -o OUTNAME  Write the output to OUTNAME.
    -p PROLOGUE Run PROLOGUE once per file, before its first generator. Useful
                to bring in a module. Example: -p "const path = require('path');"
    -P          Use console.log() instead of cog.emitLine() for code output.
    -r          Replace the input file with the output.
    -s STRING   Suffix all generated output lines with STRING.
    -U          Write the output with Unix newlines (only LF line-endings).
    -w CMD      Use CMD if the output file needs to be made writable.
                    A %s in the CMD will be filled with the filename.
    -x          Excise all the generated output without running the generators.
    -z          The end-output marker can be omitted, and is assumed at eof.
    -v          Print the version of cogwheel and exit.
    --config=FILE
                Read default options from FILE (.json or .yaml) instead of
                cogwheel.config.json or cogwheel.config.yaml.
    --check     Check that the files would not change if run again.
    --check-fail-msg=MSG
                If --check fails, include MSG in the output to help devs
                understand how to run cogwheel in your project.
    --diff      With --check, show a diff of what failed the check.
    --markers='START END END-OUTPUT'
                The patterns surrounding cog inline instructions. Should
                include three values separated by spaces, the start, end,
                and end-output markers. Defaults to '[[[cog ]]] [[[end]]]'.
    --verbosity=VERBOSITY
                Control the amount of output. 2 (the default) lists all files,
                1 lists only changed files, 0 lists no files, 3 adds timings.
    -h          Print this help.
`;

/**
 * Version from package.json, found from either the source tree or dist/.
 */
export function getVersion(): string {
  const candidates = [
    path.join(__dirname, "..", "..", "package.json"),
    path.join(__dirname, "..", "..", "..", "package.json"),
  ];
  for (const pkgPath of candidates) {
    if (!fs.existsSync(pkgPath)) continue;
    const pkg: unknown = JSON.parse(fs.readFileSync(pkgPath, "utf8"));
    if (typeof pkg === "object" && pkg !== null && "version" in pkg && typeof pkg.version === "string") {
      return pkg.version;
    }
  }
  return "0.0.0";
}
