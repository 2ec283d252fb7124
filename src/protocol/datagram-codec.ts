/**
 * Binary IPKCP codec (datagram transport)
 *
 * Request:  opcode(0x00) | length | payload
 * Response: opcode(0x01) | status | length | payload
 */

import { TransportError, TransportErrorType } from '../errors.js';
import { ResponseStatus } from '../types.js';
import type { DatagramResponse } from '../types.js';

export enum Opcode {
  REQUEST = 0,
  RESPONSE = 1
}

/** Largest payload a single length byte can describe */
export const MAX_PAYLOAD = 255;

const RESPONSE_HEADER = 3;

export function encodeRequest(text: string): Buffer {
  const payload = Buffer.from(text, 'utf8');
  if (payload.length > MAX_PAYLOAD) {
    throw new TransportError(
      TransportErrorType.Protocol,
      `Request too long: ${payload.length} bytes (max ${MAX_PAYLOAD})`
    );
  }
  return Buffer.concat([Buffer.from([Opcode.REQUEST, payload.length]), payload]);
}

export function decodeResponse(datagram: Buffer): DatagramResponse {
  if (datagram.length < RESPONSE_HEADER) {
    throw new TransportError(
      TransportErrorType.Protocol,
      `Response too short: ${datagram.length} bytes`
    );
  }

  const opcode = datagram[0];
  if (opcode !== Opcode.RESPONSE) {
    throw new TransportError(TransportErrorType.Protocol, `Unexpected opcode in response: ${opcode}`);
  }

  const status = datagram[1];
  if (status !== ResponseStatus.OK && status !== ResponseStatus.ERR) {
    throw new TransportError(TransportErrorType.Protocol, `Unknown response status: ${status}`);
  }

  const length = datagram[2];
  const available = datagram.length - RESPONSE_HEADER;
  if (length > available) {
    throw new TransportError(
      TransportErrorType.Protocol,
      `Response payload truncated: declared ${length} bytes, received ${available}`
    );
  }

  return {
    status,
    payload: datagram.subarray(RESPONSE_HEADER, RESPONSE_HEADER + length).toString('utf8')
  };
}

/**
 * Render a decoded response the way it is shown to the user
 */
export function formatResponse(response: DatagramResponse): string {
  const label = response.status === ResponseStatus.OK ? 'OK' : 'ERR';
  return `${label}:${response.payload}\n`;
}
