/**
 * Interactive loop - relay input lines to the session until told to stop
 */

import type { Session } from './session.js';
import type { LineReader } from './line-reader.js';
import type { CancellationSignal } from './cancellation.js';
import { SessionState } from './types.js';

export interface OutputSink {
  write(chunk: string): unknown;
}

export interface InteractiveLoopOptions {
  session: Session;
  reader: LineReader;
  output: OutputSink;
  cancellation: CancellationSignal;
}

/**
 * Run one session end to end
 *
 * End of input counts as a cancellation request. Cancellation is checked
 * after the line is read and before anything is sent, so no request leaves
 * once it has been observed. A request already waiting on receive() is not
 * interrupted.
 *
 * @returns The session state the loop ended in
 */
export async function runInteractiveLoop(options: InteractiveLoopOptions): Promise<SessionState> {
  const { session, reader, output, cancellation } = options;

  while (session.state === SessionState.UP) {
    const line = reader.ended ? null : await reader.read(cancellation.signal);

    if (cancellation.cancelled || line === null) {
      output.write(await session.disconnect());
      break;
    }

    // Empty input is never forwarded
    if (line === '') {
      continue;
    }

    if (await session.send(line) < 0) {
      break;
    }

    const response = await session.receive();
    if (!response) {
      break;
    }

    output.write(response);
  }

  return session.state;
}
