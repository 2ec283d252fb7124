/**
 * IPKCP wire codecs
 */

export { FAREWELL, encodeLine, LineFramer } from './stream-codec.js';
export {
  Opcode,
  MAX_PAYLOAD,
  encodeRequest,
  decodeResponse,
  formatResponse
} from './datagram-codec.js';
