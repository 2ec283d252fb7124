/**
 * IPKCP Client - interactive calculator protocol client
 *
 * One session per process, over TCP (textual protocol) or UDP (binary
 * protocol). Lines from the input become requests; responses are printed as
 * they arrive.
 *
 * @version 0.1.0
 */

// Session state machine
export { Session } from './session.js';

// Interactive loop and its collaborators
export { runInteractiveLoop } from './interactive-loop.js';
export { LineReader } from './line-reader.js';
export { CancellationSignal } from './cancellation.js';

// Transport endpoints
export {
  BaseTransport,
  StreamTransport,
  DatagramTransport,
  createTransport
} from './transports/index.js';

// Wire codecs
export {
  FAREWELL,
  LineFramer,
  encodeLine,
  Opcode,
  MAX_PAYLOAD,
  encodeRequest,
  decodeResponse,
  formatResponse
} from './protocol/index.js';

export { TransportError, TransportErrorType } from './errors.js';
export { SessionState, TransportKind, ResponseStatus } from './types.js';

export type {
  SessionOptions,
  TransportOptions,
  TransitionListener,
  DatagramResponse
} from './types.js';

export type { InteractiveLoopOptions, OutputSink } from './interactive-loop.js';
