import type { OutputPort, TextWriter } from "../ports/output";

/**
 * Output port bound to the process streams.
 */
export function consoleOutput(): OutputPort {
  return {
    stdout: { write: (text: string) => { process.stdout.write(text); } },
    stderr: { write: (text: string) => { process.stderr.write(text); } },
  };
}

class StringWriter implements TextWriter {
  private readonly chunks: string[] = [];

  write(text: string): void {
    this.chunks.push(text);
  }

  getValue(): string {
    return this.chunks.join("");
  }
}

/**
 * Output port that keeps everything in memory.
 */
export class StringOutput implements OutputPort {
  readonly stdout = new StringWriter();
  readonly stderr = new StringWriter();
}
