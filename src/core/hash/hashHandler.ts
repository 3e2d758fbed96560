// src/core/hash/hashHandler.ts
// Checksums on end-output lines: computing, validating, and formatting them.
//
// Two annotation formats are recognized on the end-output line:
//   [[[end]]] (checksum: <32 hex digits>)   legacy
//   [[[end]]] (sum: <10 base64 chars>)      current
// New annotations are always written in the current format unless an
// existing one is being preserved.

import { createHash } from "crypto";

export type HashKind = "hex" | "base64";

export type ExtractedHash = {
  kind: HashKind;
  value: string;
};

export type FormatEndLineOptions = {
  /** Write an annotation; when false any existing one is removed */
  addHash?: boolean;
  /** Keep the format of an existing annotation instead of upgrading it */
  preserveFormat?: boolean;
};

export const EDITED_OUTPUT_MESSAGE = "Output has been edited! Delete old checksum to unprotect.";

export class HashMismatchError extends Error {
  constructor(
    public readonly kind: HashKind,
    public readonly found: string,
    public readonly expected: string
  ) {
    super(EDITED_OUTPUT_MESSAGE);
    this.name = "HashMismatchError";
  }
}

export function escapeRegExp(s: string): string {
  return s.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

/**
 * MD5 hex digest of `content`, hashed as UTF-8.
 */
export function computeHash(content: string): string {
  return createHash("md5").update(content, "utf8").digest("hex");
}

/**
 * MD5 hex digest of the concatenation of `lines`.
 */
export function computeLinesHash(lines: readonly string[]): string {
  const hasher = createHash("md5");
  for (const line of lines) {
    hasher.update(line, "utf8");
  }
  return hasher.digest("hex");
}

/**
 * Shorten a 32-digit hex digest to the 10-character base64 form.
 */
export function hexToBase64Hash(hexHash: string): string {
  return Buffer.from(hexHash, "hex").toString("base64").slice(0, 10);
}

export class HashHandler {
  readonly endOutput: string;
  private readonly endOutputWithHash: RegExp;

  constructor(endOutput: string) {
    this.endOutput = endOutput;
    this.endOutputWithHash = new RegExp(
      escapeRegExp(endOutput) +
        String.raw`(?<hashsect> *\((?:checksum: (?<hex>[a-f0-9]{32})|sum: (?<b64>[A-Za-z0-9+/]{10}))\))`
    );
  }

  computeHash(content: string): string {
    return computeHash(content);
  }

  computeLinesHash(lines: readonly string[]): string {
    return computeLinesHash(lines);
  }

  extractHashFromLine(line: string): ExtractedHash | null {
    const groups = this.endOutputWithHash.exec(line)?.groups;
    if (!groups) return null;
    if (groups.hex) return { kind: "hex", value: groups.hex };
    return { kind: "base64", value: groups.b64 };
  }

  /**
   * Check the annotation on `line` (if any) against `expectedHex`, comparing
   * in whichever format the annotation was written.
   */
  validateHash(line: string, expectedHex: string): void {
    const found = this.extractHashFromLine(line);
    if (!found) return;

    const expected = found.kind === "hex" ? expectedHex : hexToBase64Hash(expectedHex);
    if (found.value !== expected) {
      throw new HashMismatchError(found.kind, found.value, expected);
    }
  }

  formatEndLine(line: string, newHex: string, options: FormatEndLineOptions = {}): string {
    const { addHash = true, preserveFormat = false } = options;
    const match = this.endOutputWithHash.exec(line);

    if (!addHash) {
      const hashsect = match?.groups?.hashsect;
      return hashsect ? line.replace(hashsect, "") : line;
    }

    const existing = this.extractHashFromLine(line);
    const annotation =
      preserveFormat && existing?.kind === "hex"
        ? ` (checksum: ${newHex})`
        : ` (sum: ${hexToBase64Hash(newHex)})`;

    const separator = match ? match[0] : this.endOutput;
    return joinOnce(line, separator, this.endOutput + annotation);
  }
}

// Replace the first occurrence of `separator` in `line` with `replacement`.
function joinOnce(line: string, separator: string, replacement: string): string {
  const idx = line.indexOf(separator);
  if (idx === -1) return line;
  return line.slice(0, idx) + replacement + line.slice(idx + separator.length);
}
