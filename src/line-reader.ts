/**
 * Line-at-a-time reader over an input stream
 *
 * read() can be woken by an AbortSignal so an interrupt does not have to wait
 * for the user to finish typing.
 */

import * as readline from 'readline';
import type { Readable } from 'stream';

export class LineReader {
  private rl: readline.Interface;
  private lines: string[] = [];
  private closed = false;
  private waiter: (() => void) | null = null;

  constructor(input: Readable) {
    this.rl = readline.createInterface({ input, terminal: false, crlfDelay: Infinity });

    this.rl.on('line', (line) => {
      this.lines.push(line);
      this.wake();
    });

    this.rl.on('close', () => {
      this.closed = true;
      this.wake();
    });
  }

  /**
   * True once the input is exhausted and every line has been read
   */
  get ended(): boolean {
    return this.closed && this.lines.length === 0;
  }

  private wake(): void {
    const waiter = this.waiter;
    this.waiter = null;
    waiter?.();
  }

  /**
   * Next line without its terminator, or null on end of input or abort
   */
  async read(signal?: AbortSignal): Promise<string | null> {
    for (;;) {
      const line = this.lines.shift();
      if (line !== undefined) {
        return line;
      }
      if (this.closed || signal?.aborted) {
        return null;
      }

      await new Promise<void>((resolve) => {
        const onAbort = () => {
          this.waiter = null;
          resolve();
        };
        signal?.addEventListener('abort', onAbort, { once: true });
        this.waiter = () => {
          signal?.removeEventListener('abort', onAbort);
          resolve();
        };
      });
    }
  }

  close(): void {
    this.rl.close();
  }
}
