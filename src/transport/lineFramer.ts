export const MAX_LINE_LENGTH = 256;

/**
 * Splits a byte stream into lines on CR, LF or CRLF. Chunks may end
 * anywhere; empty lines are dropped and an unterminated line longer than
 * MAX_LINE_LENGTH is thrown away up to its next terminator.
 */
export class LineFramer {
  private buffer = "";
  private discarding = false;

  push(chunk: string): string[] {
    const lines: string[] = [];
    for (const char of chunk) {
      if (char === "\r" || char === "\n") {
        if (!this.discarding && this.buffer.length > 0) {
          lines.push(this.buffer);
        }
        this.buffer = "";
        this.discarding = false;
        continue;
      }
      if (this.discarding) continue;
      this.buffer += char;
      if (this.buffer.length > MAX_LINE_LENGTH) {
        console.error(`[SERIAL] Discarding line longer than ${MAX_LINE_LENGTH} characters`);
        this.buffer = "";
        this.discarding = true;
      }
    }
    return lines;
  }

  reset() {
    this.buffer = "";
    this.discarding = false;
  }
}
