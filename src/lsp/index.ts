/**
 * LSP framing and reassembly, shared by both relay directions.
 *
 * @module
 */

export {
  type ChunkMeta,
  calculateChunks,
  encodeMessage,
  HEADER_DELIMITER,
  HeaderParseError,
  MAX_DATAGRAM_SIZE,
  parseContentLength,
  splitDatagrams
} from './framing.js'
export { Reassembler } from './reassembler.js'
