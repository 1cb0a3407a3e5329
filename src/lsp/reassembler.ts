/**
 * Reassembler: turns a stream of datagrams back into framed LSP messages.
 *
 * State is either "awaiting header" (`contentLength === null`) or "awaiting
 * N body bytes". Datagrams are processed in arrival order; nothing is
 * reordered. One datagram may complete zero, one or several messages.
 *
 * @module
 */
import type { Logger } from '../logger.js'
import { encodeMessage, HEADER_DELIMITER, HeaderParseError, parseContentLength } from './framing.js'

const utf8 = new TextDecoder('utf-8', { fatal: true, ignoreBOM: true })

export class Reassembler {
  private buffer: Buffer = Buffer.alloc(0)
  private contentLength: number | null = null

  constructor(private readonly logger: Logger) {}

  /** Bytes held but not yet emitted. */
  get pendingBytes(): number {
    return this.buffer.length
  }

  /** Declared body length of the message in progress, or null. */
  get declaredLength(): number | null {
    return this.contentLength
  }

  /**
   * Append a datagram and extract every message it completes.
   *
   * @returns Reconstructed messages (header + body), in completion order
   */
  push(datagram: Uint8Array): Buffer[] {
    this.buffer = this.buffer.length === 0 ? Buffer.from(datagram) : Buffer.concat([this.buffer, datagram])

    const messages: Buffer[] = []
    for (;;) {
      let length = this.contentLength
      if (length === null) {
        const delimiterAt = this.buffer.indexOf(HEADER_DELIMITER)
        if (delimiterAt === -1) {
          // Header incomplete, wait for more data
          break
        }

        const header = this.buffer.subarray(0, delimiterAt).toString('ascii')
        this.buffer = this.buffer.subarray(delimiterAt + HEADER_DELIMITER.length)

        try {
          length = parseContentLength(header)
        } catch (err) {
          if (!(err instanceof HeaderParseError)) throw err
          this.logger.error('Invalid header received')
          this.logger.debug(err.message)
          break
        }
        this.contentLength = length
      }

      if (this.buffer.length < length) {
        // Body incomplete, wait for another datagram
        break
      }

      const body = this.buffer.subarray(0, length)
      this.buffer = this.buffer.subarray(length)
      this.contentLength = null

      const message = this.reconstruct(body)
      if (message) {
        messages.push(message)
      }
    }

    return messages
  }

  /**
   * Verify the body decodes as UTF-8 and re-synthesize its header.
   * Returns null (after logging) for an invalid body.
   */
  private reconstruct(body: Buffer): Buffer | null {
    let text: string
    try {
      text = utf8.decode(body)
    } catch {
      this.logger.error(`Invalid UTF-8 body received (${body.length} bytes), dropping message`)
      return null
    }
    return encodeMessage(text)
  }
}
