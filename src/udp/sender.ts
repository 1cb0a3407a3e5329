/**
 * UdpSender: chunks outbound messages into datagrams for the child process.
 *
 * Each chunk is sent best-effort and independently: a failure on one chunk
 * is logged and the remaining chunks are still sent. No framing or sequence
 * number is added; the LSP header inside the message is the only framing.
 *
 * @module
 */
import { createSocket } from 'node:dgram'
import { MAX_DATAGRAM_SIZE, splitDatagrams } from '../lsp/framing.js'
import { errorMessage, type Logger } from '../logger.js'
import { type DatagramSocket, LOCALHOST } from './socket.js'

export interface UdpSenderOptions {
  readonly socket: DatagramSocket
  readonly logger: Logger
  readonly remotePort: number
  /** Remote host (default: 127.0.0.1) */
  readonly remoteAddress?: string
  /** Maximum datagram size (default: MAX_DATAGRAM_SIZE) */
  readonly maxDatagramSize?: number
}

export class UdpSender {
  readonly remoteAddress: string
  readonly remotePort: number
  private readonly socket: DatagramSocket
  private readonly logger: Logger
  private readonly maxDatagramSize: number
  private closed = false

  constructor(options: UdpSenderOptions) {
    this.socket = options.socket
    this.logger = options.logger
    this.remotePort = options.remotePort
    this.remoteAddress = options.remoteAddress ?? LOCALHOST
    this.maxDatagramSize = options.maxDatagramSize ?? MAX_DATAGRAM_SIZE
  }

  get isClosed(): boolean {
    return this.closed
  }

  /**
   * Send a message as one or more datagrams, in byte order.
   * After close() this logs a warning and performs no I/O.
   */
  send(message: string | Uint8Array): void {
    if (this.closed) {
      this.logger.warn('Attempted to send data on a closed UDPSender')
      return
    }

    const bytes = typeof message === 'string' ? Buffer.from(message, 'utf-8') : message
    for (const chunk of splitDatagrams(bytes, this.maxDatagramSize)) {
      try {
        this.socket.send(chunk, this.remotePort, this.remoteAddress, this.onSent)
      } catch (err) {
        this.logger.error(`Error sending chunk: ${errorMessage(err)}`)
      }
    }
  }

  /**
   * Close the socket. Idempotent.
   */
  close(): void {
    if (this.closed) return
    this.closed = true
    this.socket.close()
    this.logger.info('UDPSender closed')
  }

  private readonly onSent = (err: Error | null): void => {
    if (err) {
      this.logger.error(`Error sending chunk: ${err.message}`)
    }
  }
}

/**
 * Open an unbound udp4 socket and wrap it in a sender targeting `remotePort`.
 * Socket-level errors are logged and never escape as uncaught exceptions.
 */
export function createUdpSender(
  options: Omit<UdpSenderOptions, 'socket'>
): UdpSender {
  const socket = createSocket('udp4')
  socket.on('error', (err) => {
    options.logger.error(`UDP sender error: ${err.message}`)
  })
  const sender = new UdpSender({ ...options, socket })
  options.logger.info(
    `UDP Sender running on ${sender.remoteAddress}:${sender.remotePort}`
  )
  return sender
}
