/**
 * Datagram Transport Implementation
 * Talks binary IPKCP to the server over UDP
 *
 * connect() only resolves the host and fixes the peer address. There is no
 * handshake, so an unreachable server goes unnoticed until the first exchange
 * fails or comes back empty. A zero-length datagram and a receive timeout both
 * resolve to '', which callers cannot tell apart from an orderly end.
 */

import * as dgram from 'dgram';
import { promises as dns } from 'dns';
import { BaseTransport } from './base.js';
import { TransportKind } from '../types.js';
import type { TransportOptions } from '../types.js';
import { TransportError, TransportErrorType, describeError } from '../errors.js';
import { decodeResponse, encodeRequest, formatResponse } from '../protocol/datagram-codec.js';

export class DatagramTransport extends BaseTransport {
  readonly kind = TransportKind.DATAGRAM;
  private socket: dgram.Socket | null = null;
  private inbox: Buffer[] = [];
  private failure: Error | null = null;
  private closed = false;
  private waiter: (() => void) | null = null;
  private receiveTimeout: number;

  constructor(options: TransportOptions = {}) {
    super();
    this.receiveTimeout = options.receiveTimeout ?? 0;
  }

  async connect(host: string, port: number): Promise<void> {
    if (this.socket) {
      throw new TransportError(TransportErrorType.ConnectFailed, 'Already connected');
    }

    let resolved: { address: string; family: number };
    try {
      resolved = await dns.lookup(host);
    } catch (error) {
      throw new TransportError(
        TransportErrorType.ConnectFailed,
        `Failed to resolve ${host}: ${describeError(error)}`,
        { cause: error }
      );
    }

    const socket = dgram.createSocket(resolved.family === 6 ? 'udp6' : 'udp4');

    await new Promise<void>((resolve, reject) => {
      const onError = (err: Error) => {
        socket.close();
        reject(new TransportError(
          TransportErrorType.ConnectFailed,
          `Failed to connect to ${host}:${port}: ${err.message}`,
          { cause: err }
        ));
      };

      socket.once('error', onError);
      socket.connect(port, resolved.address, () => {
        socket.off('error', onError);
        resolve();
      });
    });

    this.socket = socket;
    this.setupSocket(socket);
  }

  private setupSocket(socket: dgram.Socket): void {
    socket.on('message', (msg: Buffer) => {
      this.inbox.push(msg);
      this.wake();
    });

    // ICMP port unreachable on a connected socket lands here
    socket.on('error', (err) => {
      this.failure = err;
      this.wake();
    });

    socket.on('close', () => {
      this.closed = true;
      this.wake();
    });
  }

  private wake(): void {
    const waiter = this.waiter;
    this.waiter = null;
    waiter?.();
  }

  private requireSocket(): dgram.Socket {
    if (!this.socket) {
      throw new TransportError(TransportErrorType.NotConnected, 'Not connected to server');
    }
    return this.socket;
  }

  async send(text: string): Promise<number> {
    const socket = this.requireSocket();
    const data = encodeRequest(text);

    if (this.failure) {
      throw new TransportError(
        TransportErrorType.SendFailed,
        `Failed to send request: ${this.failure.message}`,
        { cause: this.failure }
      );
    }

    return new Promise((resolve, reject) => {
      socket.send(data, (err, bytes) => {
        if (err) {
          reject(new TransportError(
            TransportErrorType.SendFailed,
            `Failed to send request: ${err.message}`,
            { cause: err }
          ));
        } else {
          resolve(bytes);
        }
      });
    });
  }

  async receive(): Promise<string> {
    this.requireSocket();

    const datagram = await this.nextDatagram();
    if (datagram === null) {
      return '';
    }
    if (datagram.length === 0) {
      this.endReason = 'Empty response from server';
      return '';
    }
    return formatResponse(decodeResponse(datagram));
  }

  private async nextDatagram(): Promise<Buffer | null> {
    let timedOut = false;
    const timer = this.receiveTimeout > 0
      ? setTimeout(() => {
          timedOut = true;
          this.wake();
        }, this.receiveTimeout)
      : null;

    try {
      for (;;) {
        const datagram = this.inbox.shift();
        if (datagram !== undefined) {
          return datagram;
        }

        if (this.failure) {
          throw new TransportError(
            TransportErrorType.ReceiveFailed,
            `Failed to receive response: ${this.failure.message}`,
            { cause: this.failure }
          );
        }

        if (timedOut) {
          this.endReason = `No response from server within ${this.receiveTimeout} ms`;
          return null;
        }
        if (this.closed) {
          this.endReason = 'Socket closed';
          return null;
        }

        await new Promise<void>((resolve) => {
          this.waiter = resolve;
        });
      }
    } finally {
      if (timer) {
        clearTimeout(timer);
      }
    }
  }

  /**
   * No farewell message exists for datagrams; just release the socket
   */
  async disconnect(): Promise<string> {
    this.close();
    return 'Disconnected\n';
  }

  close(): void {
    if (this.socket) {
      this.socket.close();
      this.socket = null;
    }
    this.closed = true;
    this.wake();
  }
}
