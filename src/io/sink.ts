/**
 * StdoutSink: owns the editor-facing output stream.
 *
 * - One message is one `write()` call, so a message is never split or
 *   interleaved with another on the stream.
 * - Writes form a queue: a message is handed to the stream only once the
 *   previous one has been flushed, so at most one message is buffered in the
 *   stream at a time.
 * - close() ends the stream only after the queue is empty. The receiver does
 *   not await its writes, so messages completed just before shutdown are
 *   still in the queue when the child exits.
 *
 * @module
 */
import type { Writable } from 'node:stream'
import { finished } from 'node:stream/promises'
import type { MessageSink } from '../udp/receiver.js'

/**
 * Error for a write attempted on a destroyed or ended output stream.
 */
export class StreamClosedError extends Error {
  constructor(reason: 'destroyed' | 'ended') {
    super(`Output stream unavailable: ${reason}`)
    this.name = 'StreamClosedError'
  }
}

export class StdoutSink implements MessageSink {
  private tail: Promise<void> = Promise.resolve()
  /** First error the stream emitted; every later write fails with it. */
  private failure: Error | null = null

  constructor(private readonly output: Writable = process.stdout) {
    // An unhandled 'error' on stdout (editor gone, EPIPE) would crash the process
    output.on('error', (err) => {
      if (this.failure === null) {
        this.failure = err
      }
    })
  }

  /**
   * Queue one complete message.
   * Resolves once the stream has flushed it. A failed write rejects its own
   * promise only; later messages are still attempted.
   */
  write(message: Buffer): Promise<void> {
    const result = this.tail.then(() => this.writeNow(message))
    this.tail = result.catch(() => undefined)
    return result
  }

  /**
   * Resolves once every message queued so far has been written or has failed.
   */
  idle(): Promise<void> {
    return this.tail
  }

  /**
   * Wait for the queue to empty, then end the stream and wait for it to
   * finish. Resolves at once if the stream is already ended or destroyed.
   */
  async close(): Promise<void> {
    await this.idle()
    if (this.output.destroyed || this.output.writableEnded) return

    this.output.end()
    await finished(this.output, { readable: false })
  }

  private writeNow(message: Buffer): Promise<void> {
    const unavailable = this.unavailable()
    if (unavailable) {
      return Promise.reject(unavailable)
    }
    return new Promise<void>((resolve, reject) => {
      this.output.write(message, (err) => {
        if (err) reject(err)
        else resolve()
      })
    })
  }

  private unavailable(): Error | null {
    if (this.failure) return this.failure
    if (this.output.destroyed) return new StreamClosedError('destroyed')
    if (this.output.writableEnded) return new StreamClosedError('ended')
    return null
  }
}
