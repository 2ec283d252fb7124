/**
 * Transport-level errors
 *
 * Endpoints reject with these; the Session turns them into state + message.
 */

export enum TransportErrorType {
  ConnectFailed = 'connect_failed',
  SendFailed = 'send_failed',
  ReceiveFailed = 'receive_failed',
  Protocol = 'protocol',
  NotConnected = 'not_connected'
}

export class TransportError extends Error {
  constructor(
    public readonly type: TransportErrorType,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'TransportError';
    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * Describe any rejection value as a single line
 */
export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
