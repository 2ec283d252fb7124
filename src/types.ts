/**
 * IPKCP client type definitions
 */

/**
 * Transport kind, as accepted by `-m <mode>`
 */
export enum TransportKind {
  STREAM = "tcp",
  DATAGRAM = "udp"
}

/**
 * Session lifecycle state
 *
 * Transitions only move forward: INIT -> UP -> DOWN | ERRORED, or INIT -> ERRORED.
 */
export enum SessionState {
  INIT = "INIT",
  UP = "UP",
  DOWN = "DOWN",
  ERRORED = "ERRORED"
}

/**
 * Transport settings shared by both endpoint variants
 */
export interface TransportOptions {
  /** Datagram receive timeout in milliseconds; 0 waits indefinitely */
  receiveTimeout?: number;
}

/**
 * Called on every session state change
 */
export type TransitionListener = (from: SessionState, to: SessionState) => void;

/**
 * Session configuration
 */
export interface SessionOptions extends TransportOptions {
  host: string;
  port: number;
  kind: TransportKind;
  onTransition?: TransitionListener;
}

/**
 * Decoded datagram response status
 */
export enum ResponseStatus {
  OK = 0,
  ERR = 1
}

/**
 * Decoded datagram response
 */
export interface DatagramResponse {
  status: ResponseStatus;
  payload: string;
}
