/**
 * Transport layer module
 */

import { BaseTransport } from './base.js';
import { StreamTransport } from './stream.js';
import { DatagramTransport } from './datagram.js';
import { TransportKind } from '../types.js';
import type { TransportOptions } from '../types.js';

export { BaseTransport, StreamTransport, DatagramTransport };

/**
 * Pick the endpoint variant for a transport kind
 */
export function createTransport(kind: TransportKind, options: TransportOptions = {}): BaseTransport {
  switch (kind) {
    case TransportKind.STREAM:
      return new StreamTransport();
    case TransportKind.DATAGRAM:
      return new DatagramTransport(options);
  }
}
