/**
 * Textual IPKCP codec (stream transport)
 *
 * Requests and responses are single lines terminated by `\n`.
 */

const NEWLINE = 0x0a;

/**
 * Farewell request sent before closing a stream session
 */
export const FAREWELL = 'BYE';

export function encodeLine(text: string): Buffer {
  return Buffer.from(`${text}\n`, 'utf8');
}

/**
 * Splits an incoming byte stream into newline-terminated responses
 *
 * Works on bytes so a multi-byte character split across chunks is not mangled.
 */
export class LineFramer {
  private buffer: Buffer = Buffer.alloc(0);

  push(chunk: Buffer): void {
    this.buffer = this.buffer.length === 0 ? chunk : Buffer.concat([this.buffer, chunk]);
  }

  /**
   * Next complete line including its `\n`, or null if none is buffered yet
   */
  next(): string | null {
    const idx = this.buffer.indexOf(NEWLINE);
    if (idx === -1) {
      return null;
    }
    const line = this.buffer.subarray(0, idx + 1).toString('utf8');
    this.buffer = this.buffer.subarray(idx + 1);
    return line;
  }

  /**
   * Whatever is left after the last newline; empties the buffer
   */
  drain(): string {
    const rest = this.buffer.toString('utf8');
    this.buffer = Buffer.alloc(0);
    return rest;
  }
}
