/**
 * Something text can be written to.
 */
export interface TextWriter {
  write(text: string): void;
}

/**
 * Output port interface.
 * Normal output (generated files, progress, messages) goes to stdout;
 * errors and help go to stderr.
 */
export interface OutputPort {
  stdout: TextWriter;
  stderr: TextWriter;
}
