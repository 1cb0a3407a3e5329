/**
 * LSP message framing shared by the stdio and UDP sides.
 *
 * Message structure:
 * - header: `Content-Length: <decimal byte count>`
 * - delimiter: `\r\n\r\n`
 * - body: UTF-8 bytes, exactly `Content-Length` of them
 *
 * On the UDP side a framed message may be split across several datagrams of
 * at most MAX_DATAGRAM_SIZE bytes. Chunks carry no framing of their own and
 * no sequence number; the message header is the only framing.
 *
 * @module
 */

/**
 * Maximum datagram size in bytes.
 * 508 is the largest UDP payload guaranteed not to be fragmented on any path
 * (576-byte minimum reassembly buffer minus IP and UDP headers).
 */
export const MAX_DATAGRAM_SIZE = 508

/**
 * Header/body delimiter.
 */
export const HEADER_DELIMITER = Buffer.from('\r\n\r\n', 'ascii')

/**
 * Matches the declared body length anywhere in a header block.
 */
const CONTENT_LENGTH_PATTERN = /Content-Length: (\d+)/

/**
 * Error thrown when a header block has no parseable Content-Length.
 */
export class HeaderParseError extends Error {
  constructor(public readonly header: string) {
    super(`Invalid header received: ${JSON.stringify(header.slice(0, 200))}`)
    this.name = 'HeaderParseError'
  }
}

/**
 * Extract the declared body length from a header block.
 *
 * @param header - Header text without the trailing delimiter
 * @returns The declared body length in bytes
 * @throws HeaderParseError if no Content-Length field is present
 */
export function parseContentLength(header: string): number {
  const match = CONTENT_LENGTH_PATTERN.exec(header)
  if (!match) {
    throw new HeaderParseError(header)
  }
  return Number.parseInt(match[1], 10)
}

/**
 * Frame a body as a complete LSP message.
 * The declared length is the UTF-8 byte length of the body.
 */
export function encodeMessage(body: string | Uint8Array): Buffer {
  const bodyBytes = typeof body === 'string' ? Buffer.from(body, 'utf-8') : body
  const header = Buffer.from(`Content-Length: ${bodyBytes.length}\r\n\r\n`, 'ascii')
  return Buffer.concat([header, bodyBytes])
}

/**
 * Offsets of a single datagram-sized chunk (without data).
 */
export interface ChunkMeta {
  readonly offset: number
  readonly length: number
}

/**
 * Calculate chunk layout for a payload.
 * An empty payload has no chunks.
 *
 * @param totalSize - Payload size in bytes
 * @param maxSize - Maximum chunk size (default MAX_DATAGRAM_SIZE)
 */
export function calculateChunks(totalSize: number, maxSize: number = MAX_DATAGRAM_SIZE): ChunkMeta[] {
  if (!Number.isInteger(maxSize) || maxSize < 1) {
    throw new RangeError(`maxSize must be a positive integer, got ${maxSize}`)
  }

  const chunks: ChunkMeta[] = []
  let offset = 0

  while (offset < totalSize) {
    const length = Math.min(totalSize - offset, maxSize)
    chunks.push({ offset, length })
    offset += length
  }

  return chunks
}

/**
 * Generator that yields datagram-sized views of a payload, in byte order.
 * Views share memory with `data`; nothing is copied.
 */
export function* splitDatagrams(
  data: Uint8Array,
  maxSize: number = MAX_DATAGRAM_SIZE
): Generator<Uint8Array, void, unknown> {
  for (const chunk of calculateChunks(data.length, maxSize)) {
    yield data.subarray(chunk.offset, chunk.offset + chunk.length)
  }
}
