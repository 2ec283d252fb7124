/**
 * Command-line option validation
 */

import { TransportKind } from '../src/types.js';
import { MissingArgumentsError, InvalidParamsError } from './errors.js';

/**
 * Options as commander hands them over
 */
export type RawOptions = {
  host?: string;
  port?: string;
  mode?: string;
  timeout?: string;
  verbose?: boolean;
};

export interface ClientOptions {
  host: string;
  port: number;
  mode: TransportKind;
  /** UDP receive timeout in milliseconds; 0 waits forever */
  timeout: number;
  verbose: boolean;
}

const MAX_PORT = 65535;

function parseMode(mode: string): TransportKind | null {
  switch (mode) {
    case TransportKind.STREAM:
      return TransportKind.STREAM;
    case TransportKind.DATAGRAM:
      return TransportKind.DATAGRAM;
    default:
      return null;
  }
}

/**
 * Check the raw options in the order they are listed in the usage line
 *
 * @throws MissingArgumentsError | InvalidParamsError
 */
export function resolveOptions(raw: RawOptions): ClientOptions {
  if (!raw.host) {
    throw new MissingArgumentsError('host');
  }

  if (!raw.port) {
    throw new MissingArgumentsError('port');
  }
  const port = /^\d+$/.test(raw.port) ? parseInt(raw.port, 10) : NaN;
  if (!(port >= 1 && port <= MAX_PORT)) {
    throw new InvalidParamsError('port', `expected an integer between 1 and ${MAX_PORT}`);
  }

  if (!raw.mode) {
    throw new MissingArgumentsError('mode');
  }
  const mode = parseMode(raw.mode);
  if (!mode) {
    throw new InvalidParamsError('mode', 'expected tcp or udp');
  }

  let timeout = 0;
  if (raw.timeout !== undefined) {
    if (!/^\d+$/.test(raw.timeout)) {
      throw new InvalidParamsError('timeout', 'expected a non-negative number of milliseconds');
    }
    timeout = parseInt(raw.timeout, 10);
  }

  return {
    host: raw.host,
    port,
    mode,
    timeout,
    verbose: raw.verbose ?? false
  };
}
