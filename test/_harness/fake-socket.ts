/**
 * Fake datagram socket for testing.
 *
 * Capabilities:
 * - Record every send with its payload copied
 * - Throw synchronously on the Nth send (1-indexed)
 * - Report an asynchronous error through the callback on the Nth send
 * - Count close() calls
 *
 * No assertions. No test logic.
 */
import type { DatagramSocket } from '../../src/udp/socket.js'

export interface SentDatagram {
  readonly data: Buffer
  readonly port: number
  readonly address: string
}

export interface FakeDatagramSocketOptions {
  /** Throw from send() on the Nth call (1-indexed). */
  throwOnSend?: number
  /** Pass an error to the send callback on the Nth call (1-indexed). */
  callbackErrorOnSend?: number
  /** Error used for injected failures. */
  failureError?: Error
}

export class FakeDatagramSocket implements DatagramSocket {
  readonly sent: SentDatagram[] = []
  closeCount = 0
  private sendCount = 0

  constructor(private readonly options: FakeDatagramSocketOptions = {}) {}

  send(
    msg: Uint8Array,
    port: number,
    address: string,
    callback?: (error: Error | null, bytes: number) => void
  ): void {
    this.sendCount++
    const failure = this.options.failureError ?? new Error('injected send failure')
    if (this.sendCount === this.options.throwOnSend) {
      throw failure
    }
    this.sent.push({ data: Buffer.from(msg), port, address })
    if (this.sendCount === this.options.callbackErrorOnSend) {
      callback?.(failure, 0)
      return
    }
    callback?.(null, msg.length)
  }

  close(callback?: () => void): void {
    this.closeCount++
    callback?.()
  }

  /** Concatenation of every payload sent, in order. */
  get bytes(): Buffer {
    return Buffer.concat(this.sent.map((d) => d.data))
  }
}
