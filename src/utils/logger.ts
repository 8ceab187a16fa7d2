/**
 * Structured JSON logger: lightweight, zero-dependency.
 *
 * Usage:
 *   const log = new Logger('info').child({ component: 'fill-engine' })
 *   log.warn('Primary strategy failed', { strategy: 'acroform' })
 *
 * Output (one JSON object per line):
 *   {"timestamp":"2026-01-01T12:00:00.000Z","level":"warn","message":"Primary strategy failed","component":"fill-engine","strategy":"acroform"}
 *
 * Levels in ascending severity: debug, info, warn, error. `silent` drops everything.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error'
export type LogThreshold = LogLevel | 'silent'

const LEVEL_PRIORITY: Record<LogThreshold, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: 4,
}

export const LOG_THRESHOLDS = ['debug', 'info', 'warn', 'error', 'silent'] as const satisfies readonly LogThreshold[]

export function isLogThreshold(value: string): value is LogThreshold {
  return Object.hasOwn(LEVEL_PRIORITY, value)
}

export function resolveLevel(env: string | undefined): LogThreshold {
  const raw = (env ?? 'info').toLowerCase()
  return isLogThreshold(raw) ? raw : 'info'
}

export interface LogEntry {
  timestamp: string
  level: LogLevel
  message: string
  [key: string]: unknown
}

/** What components depend on: the root logger and its children both fit. */
export interface Log {
  debug(message: string, context?: Record<string, unknown>): void
  info(message: string, context?: Record<string, unknown>): void
  warn(message: string, context?: Record<string, unknown>): void
  error(message: string, context?: Record<string, unknown>): void
  child(defaults: Record<string, unknown>): Log
}

export class Logger implements Log {
  private threshold: number

  constructor(level?: LogThreshold) {
    const effective = level ?? resolveLevel(process.env.LOG_LEVEL)
    this.threshold = LEVEL_PRIORITY[effective]
  }

  private write(level: LogLevel, message: string, context?: Record<string, unknown>): void {
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

  debug(message: string, context?: Record<string, unknown>): void {
    this.write('debug', message, context)
  }

  info(message: string, context?: Record<string, unknown>): void {
    this.write('info', message, context)
  }

  warn(message: string, context?: Record<string, unknown>): void {
    this.write('warn', message, context)
  }

  error(message: string, context?: Record<string, unknown>): void {
    this.write('error', message, context)
  }

  /** Create a child logger that injects fixed context fields into every log line. */
  child(defaults: Record<string, unknown>): Log {
    return new ChildLogger(this, defaults)
  }
}

class ChildLogger implements Log {
  constructor(
    private parent: Log,
    private defaults: Record<string, unknown>,
  ) {}

  debug(message: string, context?: Record<string, unknown>): void {
    this.parent.debug(message, { ...this.defaults, ...context })
  }

  info(message: string, context?: Record<string, unknown>): void {
    this.parent.info(message, { ...this.defaults, ...context })
  }

  warn(message: string, context?: Record<string, unknown>): void {
    this.parent.warn(message, { ...this.defaults, ...context })
  }

  error(message: string, context?: Record<string, unknown>): void {
    this.parent.error(message, { ...this.defaults, ...context })
  }

  child(defaults: Record<string, unknown>): Log {
    return new ChildLogger(this, defaults)
  }
}
