/** Minimal writable surface, satisfied by `process.stdout`. */
export interface LineStream {
  write(chunk: string): unknown;
}

/**
 * A single status line rewritten in place with `\r`.
 *
 * Call `finish()` before printing anything else on the same stream so the next
 * output starts on a fresh line.
 */
export class ProgressLine {
  private readonly stream: LineStream;
  private width = 0;
  private pending = false;

  constructor(stream: LineStream) {
    this.stream = stream;
  }

  update(line: string): void {
    // pad over the tail of a longer previous line
    this.stream.write(`\r${line.padEnd(this.width)}`);
    this.width = Math.max(this.width, line.length);
    this.pending = true;
  }

  finish(): void {
    if (!this.pending) return;
    this.stream.write('\n');
    this.pending = false;
    this.width = 0;
  }
}
