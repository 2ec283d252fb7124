/**
 * Session - IPKCP client session state machine
 *
 * Sequences Transport Endpoint calls and translates their failures into
 * state + message. Nothing thrown by the endpoint escapes this class:
 * - connect() resolves false
 * - send() resolves -1
 * - receive() resolves ''
 *
 * An empty receive() is not a failure. The session stays UP and records why
 * nothing arrived in lastError, so a caller that stops there without
 * disconnecting still ends with a non-DOWN state and a message to report.
 */

import { createTransport } from './transports/index.js';
import type { BaseTransport } from './transports/index.js';
import { SessionState, TransportKind } from './types.js';
import type { SessionOptions } from './types.js';
import { describeError } from './errors.js';

export class Session {
  private _state: SessionState = SessionState.INIT;
  private _lastError = '';
  private options: SessionOptions;
  private transport: BaseTransport;

  constructor(options: SessionOptions, transport?: BaseTransport) {
    this.options = options;
    this.transport = transport ?? createTransport(options.kind, {
      receiveTimeout: options.receiveTimeout
    });
  }

  get state(): SessionState {
    return this._state;
  }

  get lastError(): string {
    return this._lastError;
  }

  get kind(): TransportKind {
    return this.transport.kind;
  }

  private transition(to: SessionState): void {
    const from = this._state;
    this._state = to;
    this.options.onTransition?.(from, to);
  }

  /**
   * Record a failure, release the endpoint and enter ERRORED
   */
  private abort(error: unknown): void {
    this._lastError = describeError(error);
    this.transport.close();
    this.transition(SessionState.ERRORED);
  }

  /**
   * Misuse is reported, not performed; the state is left alone
   */
  private requireUp(operation: string): boolean {
    if (this._state === SessionState.UP) {
      return true;
    }
    this._lastError = `${operation}() is only valid in state UP (current: ${this._state})`;
    return false;
  }

  async connect(): Promise<boolean> {
    if (this._state !== SessionState.INIT) {
      this._lastError = `connect() is only valid in state INIT (current: ${this._state})`;
      return false;
    }

    try {
      await this.transport.connect(this.options.host, this.options.port);
    } catch (error) {
      this.abort(error);
      return false;
    }

    this.transition(SessionState.UP);
    return true;
  }

  /**
   * @returns Bytes written, or -1 on failure
   */
  async send(text: string): Promise<number> {
    if (!this.requireUp('send')) {
      return -1;
    }

    try {
      return await this.transport.send(text);
    } catch (error) {
      this.abort(error);
      return -1;
    }
  }

  /**
   * @returns The response, or '' when no more communication is possible
   */
  async receive(): Promise<string> {
    if (!this.requireUp('receive')) {
      return '';
    }

    try {
      const response = await this.transport.receive();
      if (!response) {
        this._lastError = this.transport.getEndReason();
      }
      return response;
    } catch (error) {
      this.abort(error);
      return '';
    }
  }

  /**
   * Farewell, close, enter DOWN
   *
   * Only the first call from UP does anything. Later calls, and calls after an
   * error, resolve '' and leave the state as it is.
   *
   * @returns Status line to show the user
   */
  async disconnect(): Promise<string> {
    if (this._state === SessionState.DOWN || this._state === SessionState.ERRORED) {
      return '';
    }
    if (!this.requireUp('disconnect')) {
      return '';
    }

    const status = await this.transport.disconnect();
    this.transition(SessionState.DOWN);
    return status;
  }

  /**
   * Drop the endpoint handle without a farewell or a state change
   *
   * For callers that treat an empty receive() as the end. Any later send() or
   * receive() fails and moves the session to ERRORED.
   */
  release(): void {
    this.transport.close();
  }
}
