/**
 * Stream Transport Implementation
 * Talks textual IPKCP to the server over a TCP connection
 */

import * as net from 'net';
import { BaseTransport } from './base.js';
import { TransportKind } from '../types.js';
import { TransportError, TransportErrorType, describeError } from '../errors.js';
import { FAREWELL, LineFramer, encodeLine } from '../protocol/stream-codec.js';

export class StreamTransport extends BaseTransport {
  readonly kind = TransportKind.STREAM;
  private socket: net.Socket | null = null;
  private framer = new LineFramer();
  private ended = false;
  private failure: Error | null = null;
  private waiter: (() => void) | null = null;

  async connect(host: string, port: number): Promise<void> {
    if (this.socket) {
      throw new TransportError(TransportErrorType.ConnectFailed, 'Already connected');
    }

    return new Promise((resolve, reject) => {
      const socket = net.createConnection({ host, port });

      const onError = (err: Error) => {
        socket.destroy();
        reject(new TransportError(
          TransportErrorType.ConnectFailed,
          `Failed to connect to ${host}:${port}: ${err.message}`,
          { cause: err }
        ));
      };

      socket.once('error', onError);
      socket.once('connect', () => {
        socket.off('error', onError);
        this.socket = socket;
        this.setupSocket(socket);
        resolve();
      });
    });
  }

  private setupSocket(socket: net.Socket): void {
    socket.on('data', (chunk: Buffer) => {
      this.framer.push(chunk);
      this.wake();
    });

    socket.on('end', () => {
      this.ended = true;
      this.wake();
    });

    socket.on('close', () => {
      this.ended = true;
      this.wake();
    });

    socket.on('error', (err) => {
      this.failure = err;
      this.wake();
    });
  }

  private wake(): void {
    const waiter = this.waiter;
    this.waiter = null;
    waiter?.();
  }

  private requireSocket(): net.Socket {
    if (!this.socket) {
      throw new TransportError(TransportErrorType.NotConnected, 'Not connected to server');
    }
    return this.socket;
  }

  async send(text: string): Promise<number> {
    const socket = this.requireSocket();

    if (this.failure) {
      throw new TransportError(
        TransportErrorType.SendFailed,
        `Failed to send request: ${this.failure.message}`,
        { cause: this.failure }
      );
    }
    if (this.ended || !socket.writable) {
      throw new TransportError(TransportErrorType.SendFailed, 'Failed to send request: connection closed by server');
    }

    const data = encodeLine(text);
    return new Promise((resolve, reject) => {
      socket.write(data, (err) => {
        if (err) {
          reject(new TransportError(
            TransportErrorType.SendFailed,
            `Failed to send request: ${err.message}`,
            { cause: err }
          ));
        } else {
          resolve(data.length);
        }
      });
    });
  }

  async receive(): Promise<string> {
    this.requireSocket();

    for (;;) {
      const line = this.framer.next();
      if (line !== null) {
        return line;
      }

      if (this.failure) {
        throw new TransportError(
          TransportErrorType.ReceiveFailed,
          `Failed to receive response: ${this.failure.message}`,
          { cause: this.failure }
        );
      }

      if (this.ended) {
        // Unterminated tail, or '' once the server has closed
        const rest = this.framer.drain();
        if (!rest) {
          this.endReason = 'Connection closed by server';
        }
        return rest;
      }

      await new Promise<void>((resolve) => {
        this.waiter = resolve;
      });
    }
  }

  async disconnect(): Promise<string> {
    let status: string;
    try {
      await this.send(FAREWELL);
      status = await this.receive();
    } catch (error) {
      status = `Connection closed without farewell: ${describeError(error)}\n`;
    } finally {
      this.close();
    }
    return status || 'Connection closed\n';
  }

  close(): void {
    if (this.socket) {
      this.socket.destroy();
      this.socket = null;
    }
    this.ended = true;
    this.wake();
  }
}
