/**
 * UdpReceiver: reassembles datagrams from the child and writes complete
 * messages to the output sink.
 *
 * No error raised while handling a datagram escapes the receiver: malformed
 * data and socket errors are logged and processing continues with the next
 * datagram.
 *
 * @module
 */
import { createSocket } from 'node:dgram'
import { Reassembler } from '../lsp/reassembler.js'
import { errorMessage, type Logger } from '../logger.js'
import { type DatagramSocket, LOCALHOST } from './socket.js'

/**
 * Destination for reassembled messages. Each call is one atomic write.
 */
export interface MessageSink {
  write(message: Buffer): Promise<void>
}

export interface UdpReceiverOptions {
  readonly socket: Pick<DatagramSocket, 'close'>
  readonly sink: MessageSink
  readonly logger: Logger
}

export class UdpReceiver {
  private readonly socket: Pick<DatagramSocket, 'close'>
  private readonly sink: MessageSink
  private readonly logger: Logger
  private readonly reassembler: Reassembler
  private closed = false

  constructor(options: UdpReceiverOptions) {
    this.socket = options.socket
    this.sink = options.sink
    this.logger = options.logger
    this.reassembler = new Reassembler(options.logger)
  }

  get isClosed(): boolean {
    return this.closed
  }

  /** Called once the socket is bound. */
  handleListening(): void {
    this.logger.info('UDP connection made')
  }

  /**
   * Process one inbound datagram. Messages it completes are written to the
   * sink in completion order.
   */
  handleDatagram(data: Buffer): void {
    let messages: Buffer[]
    try {
      messages = this.reassembler.push(data)
    } catch (err) {
      this.logger.error(`Error processing datagram: ${errorMessage(err)}`)
      return
    }

    for (const message of messages) {
      this.sink.write(message).catch((err: unknown) => {
        this.logger.error(`Error writing message: ${errorMessage(err)}`)
      })
    }
  }

  handleError(err: Error): void {
    this.logger.error(`UDP error: ${err.message}`)
  }

  /**
   * Close the socket. Idempotent.
   */
  close(): void {
    if (this.closed) return
    this.closed = true
    this.socket.close()
    this.logger.info('UDPReceiver closed')
  }
}

export interface CreateUdpReceiverOptions {
  readonly port: number
  /** Bind address (default: 127.0.0.1) */
  readonly address?: string
  readonly sink: MessageSink
  readonly logger: Logger
}

/**
 * Bind a udp4 socket and attach a receiver to it.
 *
 * @returns The receiver, once the socket is listening
 * @throws Error if the socket cannot be bound (e.g. port in use)
 */
export function createUdpReceiver(options: CreateUdpReceiverOptions): Promise<UdpReceiver> {
  const address = options.address ?? LOCALHOST
  const socket = createSocket('udp4')
  const receiver = new UdpReceiver({ socket, sink: options.sink, logger: options.logger })

  return new Promise<UdpReceiver>((resolve, reject) => {
    const onBindError = (err: Error): void => {
      socket.close()
      reject(err)
    }

    socket.once('error', onBindError)
    socket.bind(options.port, address, () => {
      socket.off('error', onBindError)
      socket.on('error', (err) => receiver.handleError(err))
      socket.on('message', (msg) => receiver.handleDatagram(msg))
      receiver.handleListening()
      options.logger.info(`UDP receiver running on ${address}:${options.port}`)
      resolve(receiver)
    })
  })
}
