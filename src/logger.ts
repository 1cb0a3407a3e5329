/**
 * Logger: explicitly constructed logging context.
 *
 * One root logger is created by the CLI and handed to every component at
 * construction time; components derive named children with `child()`.
 * Children share the root's destination and level.
 *
 * stdout carries protocol traffic, so it is never a log destination.
 *
 * @module
 */
import { createWriteStream } from 'node:fs'

export type LogLevel = 'debug' | 'info' | 'warn' | 'error'

const LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3
}

/**
 * The part of a Writable the logger writes to.
 */
export interface LogStream {
  write(line: string): boolean
  end(callback?: () => void): unknown
  readonly writableEnded: boolean
}

/**
 * Shared state between a root logger and its children.
 */
interface LogDestination {
  readonly stream: LogStream
  readonly level: LogLevel
  /** True when the logger opened the stream and must close it. */
  readonly owned: boolean
}

export interface LoggerOptions {
  /** Minimum level written (default: 'info') */
  readonly level?: LogLevel
  /** Destination stream (default: process.stderr) */
  readonly stream?: LogStream
  /** Clock for timestamps, injectable for tests */
  readonly now?: () => Date
}

export class Logger {
  private readonly now: () => Date

  private constructor(
    readonly name: string,
    private readonly destination: LogDestination,
    now?: () => Date
  ) {
    this.now = now ?? (() => new Date())
  }

  /**
   * Create a root logger writing to a stream (stderr by default).
   */
  static create(name: string, options: LoggerOptions = {}): Logger {
    return new Logger(
      name,
      {
        stream: options.stream ?? process.stderr,
        level: options.level ?? 'info',
        owned: false
      },
      options.now
    )
  }

  /**
   * Create a root logger writing to a file, truncating it first.
   */
  static toFile(name: string, path: string, level: LogLevel): Logger {
    const stream = createWriteStream(path, { flags: 'w' })
    stream.on('error', (err) => {
      process.stderr.write(`[sclang-lsp] log file error: ${err.message}\n`)
    })
    return new Logger(name, { stream, level, owned: true })
  }

  get level(): LogLevel {
    return this.destination.level
  }

  /**
   * Derive a logger named `<parent>.<suffix>` sharing this destination.
   */
  child(suffix: string): Logger {
    return new Logger(`${this.name}.${suffix}`, this.destination, this.now)
  }

  isEnabled(level: LogLevel): boolean {
    return LEVEL_PRIORITY[level] >= LEVEL_PRIORITY[this.destination.level]
  }

  debug(message: string): void {
    this.log('debug', message)
  }

  info(message: string): void {
    this.log('info', message)
  }

  warn(message: string): void {
    this.log('warn', message)
  }

  error(message: string): void {
    this.log('error', message)
  }

  /**
   * Flush and close the destination if this logger opened it.
   * A no-op for borrowed streams such as stderr.
   */
  close(): Promise<void> {
    const { stream, owned } = this.destination
    if (!owned || stream.writableEnded) {
      return Promise.resolve()
    }
    return new Promise<void>((resolve) => {
      stream.end(() => resolve())
    })
  }

  private log(level: LogLevel, message: string): void {
    if (!this.isEnabled(level)) return
    if (this.destination.stream.writableEnded) return

    const line = `${this.now().toISOString()} [${this.name}] ${level.toUpperCase()}: ${message}\n`
    this.destination.stream.write(line)
  }
}

export interface RootLoggerOptions {
  /** Log file path; without it only errors are logged, to stderr */
  readonly logFile?: string
  readonly verbose: boolean
}

/**
 * Create the session's root logger.
 *
 * - with a log file: debug level when verbose, warn level otherwise
 * - without: error level on stderr
 */
export function createRootLogger(name: string, options: RootLoggerOptions): Logger {
  if (options.logFile !== undefined) {
    return Logger.toFile(name, options.logFile, options.verbose ? 'debug' : 'warn')
  }
  return Logger.create(name, { level: 'error' })
}

/**
 * Normalize an unknown thrown value to a message string.
 */
export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err)
}
