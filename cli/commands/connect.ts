/**
 * Default command - open a session and relay stdin to the server
 */

import type { Readable } from 'stream';
import { Session } from '../../src/session.js';
import { LineReader } from '../../src/line-reader.js';
import { CancellationSignal } from '../../src/cancellation.js';
import { runInteractiveLoop } from '../../src/interactive-loop.js';
import type { OutputSink } from '../../src/interactive-loop.js';
import { SessionState } from '../../src/types.js';
import { OutputFormatter } from '../formatter.js';
import type { ClientOptions } from '../options.js';

export interface CommandIO {
  input: Readable;
  output: OutputSink;
  errors: OutputSink;
  /** Where SIGINT is delivered; the process unless a test swaps it */
  signals?: NodeJS.EventEmitter;
}

/**
 * @returns Process exit code: 0 only when the session ended DOWN
 */
export async function connect(options: ClientOptions, io: CommandIO): Promise<number> {
  const formatter = new OutputFormatter(io.errors);

  const session = new Session({
    host: options.host,
    port: options.port,
    kind: options.mode,
    receiveTimeout: options.timeout,
    onTransition: options.verbose
      ? (from, to) => formatter.transition(from, to)
      : undefined
  });

  // Bound before connect so an interrupt during connect is seen by the loop
  const cancellation = new CancellationSignal();
  const unbind = cancellation.bindToProcess(io.signals ?? process);

  try {
    if (!(await session.connect())) {
      formatter.error(session.lastError);
      return 1;
    }

    const reader = new LineReader(io.input);
    try {
      const state = await runInteractiveLoop({
        session,
        reader,
        output: io.output,
        cancellation
      });

      if (state !== SessionState.DOWN) {
        formatter.error(session.lastError);
        return 1;
      }
      return 0;
    } finally {
      reader.close();
      session.release();
    }
  } finally {
    unbind();
  }
}
