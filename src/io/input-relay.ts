/**
 * InputRelay: forwards bytes from the editor's stdin to a callback.
 *
 * The stream is consumed in paused mode: each `readable` notification is
 * drained with non-blocking `read()` calls and every chunk is handed to the
 * callback as soon as it is read, with no batching. The event loop only
 * wakes the relay when bytes are pending, so an idle stdin costs nothing.
 *
 * The callback is the only channel out of the relay; it shares no other
 * state with the sender.
 *
 * Lifecycle:
 * 1. Construct with a readable stream (stdin) and a callback
 * 2. Call start() to begin reading
 * 3. Call stop() to detach; await it to know the relay has finished
 *
 * @module
 */
import type { Readable } from 'node:stream'
import { errorMessage, type Logger } from '../logger.js'

/** Default bound on how long stop() waits for an in-progress drain. */
export const DEFAULT_STOP_TIMEOUT_MS = 5_000

export type InputRelayState = 'idle' | 'reading' | 'stopped'

export class InputRelay {
  private state: InputRelayState = 'idle'
  private draining = false
  private finished: Promise<void>
  private markFinished: () => void = () => {}

  constructor(
    private readonly input: Readable,
    private readonly onData: (chunk: Buffer) => void,
    private readonly logger: Logger
  ) {
    this.finished = new Promise<void>((resolve) => {
      this.markFinished = resolve
    })
  }

  get currentState(): InputRelayState {
    return this.state
  }

  /**
   * Attach to the stream and deliver anything already buffered.
   */
  start(): void {
    if (this.state !== 'idle') return
    this.state = 'reading'
    this.input.on('readable', this.onReadable)
    this.input.on('end', this.onEnd)
    this.input.on('error', this.onError)
    this.onReadable()
  }

  /**
   * Detach from the stream.
   *
   * Resolves once any drain in progress has returned, or after `timeoutMs`,
   * whichever comes first. Safe to call more than once.
   */
  stop(timeoutMs: number = DEFAULT_STOP_TIMEOUT_MS): Promise<void> {
    this.finish()

    let timer: NodeJS.Timeout | undefined
    const timeout = new Promise<void>((resolve) => {
      timer = setTimeout(() => {
        this.logger.warn(`Input relay did not finish within ${timeoutMs}ms`)
        resolve()
      }, timeoutMs)
    })
    return Promise.race([this.finished, timeout]).finally(() => clearTimeout(timer))
  }

  private readonly onReadable = (): void => {
    if (this.state !== 'reading' || this.draining) return
    this.draining = true
    try {
      while (this.state === 'reading') {
        const chunk: unknown = this.input.read()
        if (chunk === null) break
        this.deliver(chunk)
      }
    } finally {
      this.draining = false
      if (this.currentState === 'stopped') {
        this.markFinished()
      }
    }
  }

  private deliver(chunk: unknown): void {
    const data = Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk), 'utf-8')
    if (data.length === 0) return
    try {
      this.onData(data)
    } catch (err) {
      this.logger.error(`Error forwarding input: ${errorMessage(err)}`)
    }
  }

  private readonly onEnd = (): void => {
    this.logger.info('Input stream ended')
    this.finish()
  }

  private readonly onError = (err: Error): void => {
    this.logger.error(`Input stream error: ${err.message}`)
    this.finish()
  }

  private finish(): void {
    if (this.state === 'stopped') return
    this.state = 'stopped'
    this.detach()
    if (!this.draining) {
      this.markFinished()
    }
  }

  /** The error listener stays attached so a late stream error is still logged. */
  private detach(): void {
    this.input.off('readable', this.onReadable)
    this.input.off('end', this.onEnd)
  }
}
