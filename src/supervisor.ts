/**
 * Supervisor: runs sclang and relays its UDP LSP server over stdio.
 *
 * States: idle → starting → running → stopped
 *
 * - idle → starting: start() spawns sclang with the LSP environment.
 * - starting → running: the first output line containing the readiness
 *   marker brings up the receiver, the sender and the input relay, once.
 * - → stopped: the child exits, or stop() is called (signal handler).
 *
 * Stop order: sender, receiver, input relay (bounded wait), then SIGTERM to
 * the child if it is still running. stop() does not wait for the child to
 * exit; start() does, and resolves with its exit code.
 *
 * @module
 */
import { type ChildProcess, spawn } from 'node:child_process'
import { constants } from 'node:os'
import { createInterface } from 'node:readline'
import type { Readable } from 'node:stream'
import type { RelayPorts } from './config.js'
import { DEFAULT_STOP_TIMEOUT_MS, InputRelay } from './io/input-relay.js'
import { errorMessage, type Logger } from './logger.js'
import { DEFAULT_READY_MARKER, ReadinessLatch } from './readiness.js'
import { createUdpReceiver, type MessageSink } from './udp/receiver.js'
import { createUdpSender } from './udp/sender.js'

export type SupervisorState = 'idle' | 'starting' | 'running' | 'stopped'

/** Log level requested from the LanguageServer quark. */
export type ServerLogLevel = 'debug' | 'info' | 'warning' | 'error'

/**
 * Error thrown when the configured executable cannot be found.
 */
export class ExecutableNotFoundError extends Error {
  constructor(
    public readonly executable: string,
    cause: unknown
  ) {
    super(`The specified sclang path does not exist: ${executable}`, { cause })
    this.name = 'ExecutableNotFoundError'
  }
}

/** Outbound half of the relay. */
export interface RelaySender {
  send(message: string | Uint8Array): void
  close(): void
}

/** Inbound half of the relay. */
export interface RelayReceiver {
  close(): void
}

/** Stdin watcher feeding the sender. */
export interface RelayInput {
  start(): void
  stop(timeoutMs?: number): Promise<void>
}

/**
 * Constructors for the relay components, replaceable in tests.
 */
export interface RelayFactories {
  createReceiver(options: { port: number; sink: MessageSink; logger: Logger }): Promise<RelayReceiver>
  createSender(options: { remotePort: number; logger: Logger }): RelaySender
  createInputRelay(input: Readable, onData: (chunk: Buffer) => void, logger: Logger): RelayInput
}

const defaultFactories: RelayFactories = {
  createReceiver: (options) => createUdpReceiver(options),
  createSender: (options) => createUdpSender(options),
  createInputRelay: (input, onData, logger) => new InputRelay(input, onData, logger)
}

export interface SupervisorOptions {
  readonly logger: Logger
  /** Path or command name of the sclang executable */
  readonly executable: string
  /** Passed to sclang as `-i <ideName>` */
  readonly ideName: string
  readonly ports: RelayPorts
  readonly serverLogLevel: ServerLogLevel
  /** Where reassembled messages go (stdout) */
  readonly sink: MessageSink
  /** Where editor input comes from (stdin) */
  readonly input: Readable
  /** Readiness line to wait for (default: DEFAULT_READY_MARKER) */
  readonly readyMarker?: string
  /** Bound on the input relay's stop (default: DEFAULT_STOP_TIMEOUT_MS) */
  readonly relayStopTimeoutMs?: number
  /** Base environment for the child (default: process.env) */
  readonly env?: NodeJS.ProcessEnv
  readonly factories?: Partial<RelayFactories>
}

/**
 * Environment variables that enable the LanguageServer quark's UDP server.
 */
export function lspEnvironment(ports: RelayPorts, serverLogLevel: ServerLogLevel): Record<string, string> {
  return {
    SCLANG_LSP_ENABLE: '1',
    SCLANG_LSP_LOGLEVEL: serverLogLevel,
    SCLANG_LSP_CLIENTPORT: String(ports.sendPort),
    SCLANG_LSP_SERVERPORT: String(ports.receivePort)
  }
}

/**
 * Map a child's close status to a process exit code.
 * A signal death maps to 128 + signal number, as shells report it.
 */
export function exitCodeOf(code: number | null, signal: NodeJS.Signals | null): number {
  if (code !== null) return code
  const signo = Object.entries(constants.signals).find(([name]) => name === signal)?.[1]
  return signo === undefined ? 1 : 128 + signo
}

function isErrnoException(err: unknown): err is NodeJS.ErrnoException {
  return err instanceof Error && 'code' in err
}

/** Resolve once the child has spawned; reject if spawning failed. */
function waitForSpawn(child: ChildProcess): Promise<void> {
  return new Promise<void>((resolve, reject) => {
    const onSpawn = (): void => {
      child.off('error', onError)
      resolve()
    }
    const onError = (err: Error): void => {
      child.off('spawn', onSpawn)
      reject(err)
    }
    child.once('spawn', onSpawn)
    child.once('error', onError)
  })
}

/** Resolve with the exit code once the child has exited and its stdio closed. */
function waitForClose(child: ChildProcess): Promise<number> {
  return new Promise<number>((resolve) => {
    child.once('close', (code, signal) => resolve(exitCodeOf(code, signal)))
  })
}

export class Supervisor {
  private readonly logger: Logger
  private readonly options: SupervisorOptions
  private readonly factories: RelayFactories
  private readonly latch: ReadinessLatch
  private state: SupervisorState = 'idle'
  private child: ChildProcess | null = null
  private sender: RelaySender | null = null
  private receiver: RelayReceiver | null = null
  private inputRelay: RelayInput | null = null
  private relayStartup: Promise<void> | null = null
  private stopping: Promise<void> | null = null

  constructor(options: SupervisorOptions) {
    this.options = options
    this.logger = options.logger
    this.factories = { ...defaultFactories, ...options.factories }
    this.latch = new ReadinessLatch(options.readyMarker ?? DEFAULT_READY_MARKER)
  }

  get currentState(): SupervisorState {
    return this.state
  }

  /** True once the readiness marker has been observed. */
  get isReady(): boolean {
    return this.latch.isFired
  }

  /**
   * Settles once the relay components triggered by readiness are up
   * (or have failed and been logged). Null before readiness.
   */
  get relayReady(): Promise<void> | null {
    return this.relayStartup
  }

  /**
   * Spawn sclang and supervise it until it exits.
   *
   * @param extraArgs - Passed through to sclang after `-i <ideName>`
   * @returns The child's exit code
   * @throws ExecutableNotFoundError if the executable does not exist
   */
  async start(extraArgs: readonly string[] = []): Promise<number> {
    if (this.state !== 'idle') {
      throw new Error(`Supervisor cannot start from state "${this.state}"`)
    }
    this.state = 'starting'

    const { executable, ideName, ports, serverLogLevel } = this.options
    const overrides = lspEnvironment(ports, serverLogLevel)
    this.logger.info(`SC env vars: ${JSON.stringify(overrides)}`)

    const args = ['-i', ideName, ...extraArgs]
    this.logger.info(`RUNNER: Launching SC with cmd: '${[executable, ...args].join(' ')}'`)

    // stdin is piped, never inherited: the editor's stdin belongs to the relay.
    const child = spawn(executable, args, {
      stdio: ['pipe', 'pipe', 'pipe'],
      env: { ...(this.options.env ?? process.env), ...overrides }
    })
    this.child = child
    const closed = waitForClose(child)

    try {
      await waitForSpawn(child)
    } catch (err) {
      this.state = 'stopped'
      if (isErrnoException(err) && err.code === 'ENOENT') {
        throw new ExecutableNotFoundError(executable, err)
      }
      throw err
    }

    child.on('error', (err) => {
      this.logger.error(`sclang process error: ${err.message}`)
    })
    this.receiveOutput(child.stdout, 'SC:STDOUT')
    this.receiveOutput(child.stderr, 'SC:STDERR')

    const exitCode = await closed
    this.logger.info(`sclang exited with code ${exitCode}`)
    await this.stop()
    return exitCode
  }

  /**
   * Stop the relay and terminate the child. Safe to call repeatedly and from
   * any state; later calls return the first call's promise.
   */
  stop(): Promise<void> {
    if (this.stopping) return this.stopping
    this.logger.info('Stopping SCRunner')
    this.state = 'stopped'
    this.stopping = this.runStopSequence()
    return this.stopping
  }

  private async runStopSequence(): Promise<void> {
    this.sender?.close()
    this.receiver?.close()
    if (this.inputRelay) {
      await this.inputRelay.stop(this.options.relayStopTimeoutMs ?? DEFAULT_STOP_TIMEOUT_MS)
    }
    this.terminateChild()
  }

  private terminateChild(): void {
    const child = this.child
    if (!child || child.pid === undefined) return
    if (child.exitCode !== null || child.signalCode !== null) return
    child.kill('SIGTERM')
  }

  /**
   * Log each non-empty line of a child output stream and watch it for the
   * readiness marker.
   */
  private receiveOutput(stream: Readable | null, prefix: string): void {
    if (!stream) return
    const lines = createInterface({ input: stream, crlfDelay: Number.POSITIVE_INFINITY })
    lines.on('line', (line) => {
      const output = line.trimEnd()
      if (output) {
        this.logger.info(`${prefix}: ${output}`)
      }
      if (this.latch.observe(output)) {
        this.onReady()
      }
    })
  }

  private onReady(): void {
    this.logger.info('ready message received')
    if (this.state !== 'starting') return
    this.state = 'running'
    this.relayStartup = Promise.all([this.startCommunicationFromSc(), this.startCommunicationToSc()]).then(
      () => undefined
    )
  }

  /** Receiver: child → stdout. */
  private async startCommunicationFromSc(): Promise<void> {
    const logger = this.logger.child('UDP receive')
    let receiver: RelayReceiver
    try {
      receiver = await this.factories.createReceiver({
        port: this.options.ports.receivePort,
        sink: this.options.sink,
        logger
      })
    } catch (err) {
      this.logger.error(`Failed to start UDP receiver: ${errorMessage(err)}`)
      return
    }

    if (this.state === 'stopped') {
      // stop() ran while the socket was binding
      receiver.close()
      return
    }
    this.receiver = receiver
  }

  /** Sender and input relay: stdin → child. */
  private async startCommunicationToSc(): Promise<void> {
    let sender: RelaySender
    try {
      sender = this.factories.createSender({ remotePort: this.options.ports.sendPort, logger: this.logger })
    } catch (err) {
      this.logger.error(`Failed to start UDP sender: ${errorMessage(err)}`)
      return
    }
    this.sender = sender

    const relay = this.factories.createInputRelay(
      this.options.input,
      (chunk) => sender.send(chunk),
      this.logger.child('stdin')
    )
    this.inputRelay = relay
    relay.start()
  }
}
