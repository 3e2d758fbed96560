// src/core/text/whitespace.ts
// Indentation utilities shared by code extraction and output re-indenting

// Leading whitespace of a text line.
const LEADING_SPACE = /^\s*/;

// Leading whitespace of a line of bytes: ASCII only, so 0xA0 and 0x85 stay content.
const LEADING_ASCII_SPACE = /^[ \t\n\r\f\v]*/;

/**
 * Find the whitespace prefix common to the non-blank lines in `lines`.
 * `leading` matches what counts as whitespace at the start of a line.
 */
export function whitePrefix(lines: readonly string[], leading: RegExp = LEADING_SPACE): string {
  const indentOf = (s: string) => leading.exec(s)?.[0] ?? "";
  const nonBlank = lines.filter(s => indentOf(s).length < s.length);
  if (nonBlank.length === 0) return "";

  // The first line's leading whitespace is the best we can hope for.
  let prefix = indentOf(nonBlank[0]);

  for (const s of nonBlank) {
    for (let i = 0; i < prefix.length; i++) {
      if (prefix[i] !== s[i]) {
        prefix = prefix.slice(0, i);
        break;
      }
    }
  }
  return prefix;
}

/**
 * Find the longest string that is a prefix of all of `strings`.
 * An empty string anywhere in the input means there is no common prefix.
 */
export function commonPrefix(strings: readonly string[]): string {
  if (strings.length === 0) return "";

  let prefix = strings[0];
  for (const s of strings) {
    if (s.length < prefix.length) {
      prefix = prefix.slice(0, s.length);
    }
    if (!prefix) return "";
    for (let i = 0; i < prefix.length; i++) {
      if (prefix[i] !== s[i]) {
        prefix = prefix.slice(0, i);
        break;
      }
    }
  }
  return prefix;
}

/**
 * Re-indent a block of text.
 *
 * Removes the common whitespace indentation of the block, then prefixes
 * `newIndent` onto every non-empty line. Blank lines are never padded.
 * A Buffer is treated byte for byte and a Buffer comes back.
 */
export function reindentBlock(block: Buffer, newIndent?: string): Buffer;
export function reindentBlock(block: string | readonly string[], newIndent?: string): string;
export function reindentBlock(block: string | readonly string[] | Buffer, newIndent = ""): string | Buffer {
  if (Buffer.isBuffer(block)) {
    // latin1 maps every byte to exactly one code unit, so the round trip is lossless.
    const text = reindentLines(block.toString("latin1").split("\n"), newIndent, LEADING_ASCII_SPACE);
    return Buffer.from(text, "latin1");
  }

  return reindentLines(typeof block === "string" ? block.split("\n") : block, newIndent, LEADING_SPACE);
}

function reindentLines(lines: readonly string[], newIndent: string, leading: RegExp): string {
  const oldIndent = whitePrefix(lines, leading);

  return lines
    .map(line => {
      let out = line;
      if (oldIndent && out.startsWith(oldIndent)) {
        out = out.slice(oldIndent.length);
      }
      if (out && newIndent) {
        out = newIndent + out;
      }
      return out;
    })
    .join("\n");
}
