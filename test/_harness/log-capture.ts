/**
 * In-memory log destination for asserting on what components log.
 */
import { type LogLevel, Logger, type LogStream } from '../../src/logger.js'

export const FIXED_TIME = new Date('2024-01-01T00:00:00.000Z')

export interface LogRecord {
  readonly name: string
  readonly level: LogLevel
  readonly message: string
}

const LEVELS: Readonly<Record<string, LogLevel | undefined>> = {
  DEBUG: 'debug',
  INFO: 'info',
  WARN: 'warn',
  ERROR: 'error'
}

const LINE_PATTERN = /^\S+ \[(.+?)\] (DEBUG|INFO|WARN|ERROR): (.*)\n$/

export class LogCapture implements LogStream {
  readonly lines: string[] = []
  writableEnded = false

  write(line: string): boolean {
    this.lines.push(line)
    return true
  }

  end(callback?: () => void): void {
    this.writableEnded = true
    callback?.()
  }

  /** Parsed records, optionally filtered by level. */
  records(level?: LogLevel): LogRecord[] {
    const parsed: LogRecord[] = []
    for (const line of this.lines) {
      const match = LINE_PATTERN.exec(line)
      const recordLevel = match ? LEVELS[match[2]] : undefined
      if (!match || recordLevel === undefined) continue
      const record: LogRecord = { name: match[1], level: recordLevel, message: match[3] }
      if (level === undefined || record.level === level) {
        parsed.push(record)
      }
    }
    return parsed
  }

  /** Messages logged at the given level, in order. */
  messages(level: LogLevel): string[] {
    return this.records(level).map((record) => record.message)
  }
}

/**
 * A debug-level logger writing to a fresh capture, with a fixed clock.
 */
export function captureLogger(name = 'test', level: LogLevel = 'debug'): { logger: Logger; capture: LogCapture } {
  const capture = new LogCapture()
  const logger = Logger.create(name, { stream: capture, level, now: () => FIXED_TIME })
  return { logger, capture }
}
