/**
 * Structured JSON logger — lightweight, zero-dependency.
 *
 * Usage:
 *   import { logger } from './logger'
 *   logger.debug('Deductions computed', { taxYear: 2025, netPay: 239045 })
 *
 * Output (one JSON object per line):
 *   {"timestamp":"2025-06-01T12:00:00.000Z","level":"debug","message":"Deductions computed","taxYear":2025,"netPay":239045}
 *
 * Configure via LOG_LEVEL env var (default: "info").
 * Levels in ascending severity: debug, info, warn, error
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error'

export type LogContext = Record<string, unknown>

const LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
}

function isLogLevel(value: string): value is LogLevel {
  return Object.hasOwn(LEVEL_PRIORITY, value)
}

export function resolveLevel(env: string | undefined): LogLevel {
  const raw = (env ?? 'info').toLowerCase()
  return isLogLevel(raw) ? raw : 'info'
}

export interface LogEntry {
  timestamp: string
  level: LogLevel
  message: string
  [key: string]: unknown
}

/** What the calculator needs from a logger; any implementation can be injected. */
export interface PayrollLogger {
  debug(message: string, context?: LogContext): void
  info(message: string, context?: LogContext): void
  warn(message: string, context?: LogContext): void
  error(message: string, context?: LogContext): void
  child(defaults: LogContext): PayrollLogger
}

export class Logger implements PayrollLogger {
  private threshold: number

  constructor(level?: LogLevel) {
    const effective = level ?? resolveLevel(process.env.LOG_LEVEL)
    this.threshold = LEVEL_PRIORITY[effective]
  }

  private write(level: LogLevel, message: string, context?: LogContext): void {
    if (LEVEL_PRIORITY[level] < this.threshold) return

    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      message,
      ...context,
    }

    const line = JSON.stringify(entry)

    if (level === 'error') {
      process.stderr.write(line + '\n')
    } else {
      process.stdout.write(line + '\n')
    }
  }

  debug(message: string, context?: LogContext): void {
    this.write('debug', message, context)
  }

  info(message: string, context?: LogContext): void {
    this.write('info', message, context)
  }

  warn(message: string, context?: LogContext): void {
    this.write('warn', message, context)
  }

  error(message: string, context?: LogContext): void {
    this.write('error', message, context)
  }

  /** Create a child logger that injects fixed context fields into every log line. */
  child(defaults: LogContext): PayrollLogger {
    return new ChildLogger(this, defaults)
  }
}

export class ChildLogger implements PayrollLogger {
  constructor(
    private parent: PayrollLogger,
    private defaults: LogContext,
  ) {}

  debug(message: string, context?: LogContext): void {
    this.parent.debug(message, { ...this.defaults, ...context })
  }

  info(message: string, context?: LogContext): void {
    this.parent.info(message, { ...this.defaults, ...context })
  }

  warn(message: string, context?: LogContext): void {
    this.parent.warn(message, { ...this.defaults, ...context })
  }

  error(message: string, context?: LogContext): void {
    this.parent.error(message, { ...this.defaults, ...context })
  }

  child(defaults: LogContext): PayrollLogger {
    return new ChildLogger(this.parent, { ...this.defaults, ...defaults })
  }
}

/** Singleton logger instance for the library. */
export const logger = new Logger()
