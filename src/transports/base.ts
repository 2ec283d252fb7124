/**
 * Transport abstract base class
 * Both endpoint variants (stream, datagram) implement this contract
 */

import { TransportKind } from '../types.js';

export abstract class BaseTransport {
  abstract readonly kind: TransportKind;

  /** Why the most recent receive() resolved to '' */
  protected endReason = 'No more data from server';

  getEndReason(): string {
    return this.endReason;
  }

  /**
   * Resolve the address and establish the handle
   */
  abstract connect(host: string, port: number): Promise<void>;

  /**
   * Encode and write one request
   *
   * @returns Number of bytes written
   */
  abstract send(text: string): Promise<number>;

  /**
   * Wait for one response
   *
   * @returns Decoded response, or '' when no more data will arrive
   */
  abstract receive(): Promise<string>;

  /**
   * Farewell exchange (if the variant has one), then close
   *
   * Never rejects; resolves to a status line for the user.
   */
  abstract disconnect(): Promise<string>;

  /**
   * Release the handle; safe to call more than once
   */
  abstract close(): void;
}
