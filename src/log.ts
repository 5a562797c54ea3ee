/**
 * Log - Structured Logging Builder
 *
 * Leveled logging with context propagation. Setup stages log their
 * diagnostics here; progress for humans goes through ./ui.
 *
 * @example
 * ```typescript
 * const logger = Log
 *   .create('db-setup')
 *   .level('debug')
 *   .prettyPrint()
 *   .build()
 *
 * const redisLogger = logger.child({ store: 'redis' })
 * redisLogger.info('Key prefixes stored', { count: 6 })
 * ```
 */

import { c } from './ui/terminal'

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'fatal'

export const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  fatal: 50,
}

export interface LogEntry {
  level: LogLevel
  message: string
  timestamp: string
  service: string
  [key: string]: unknown
}

export interface LogTransport {
  write(entry: LogEntry): void
}

export interface LoggerInstance {
  readonly name: string
  debug(message: string, context?: Record<string, unknown>): void
  info(message: string, context?: Record<string, unknown>): void
  warn(message: string, context?: Record<string, unknown>): void
  error(message: string, context?: Record<string, unknown>): void
  fatal(message: string, context?: Record<string, unknown>): void
  child(context: Record<string, unknown>): LoggerInstance
}

/**
 * Console transport - writes to stdout/stderr
 */
class ConsoleTransport implements LogTransport {
  private pretty: boolean

  constructor(pretty: boolean = false) {
    this.pretty = pretty
  }

  write(entry: LogEntry): void {
    const output = this.pretty ? formatPretty(entry) : JSON.stringify(entry)
    if (entry.level === 'error' || entry.level === 'fatal') {
      console.error(output)
    } else {
      console.log(output)
    }
  }
}

const LEVEL_COLORS: Record<LogLevel, string> = {
  debug: c.cyan,
  info: c.green,
  warn: c.yellow,
  error: c.red,
  fatal: c.magenta,
}

/**
 * Single-line human readable rendering of an entry
 */
export function formatPretty(entry: LogEntry): string {
  const { level, message, timestamp, service, ...rest } = entry
  const time = timestamp.split('T')[1]?.replace('Z', '') || timestamp
  let output = `${LEVEL_COLORS[level]}${level.toUpperCase().padEnd(5)}${c.reset} ${c.dim}[${time}]${c.reset} ${message}`

  if (Object.keys(rest).length > 0) {
    output += ` ${c.dim}${JSON.stringify(rest)}${c.reset}`
  }

  return output
}

/**
 * Log builder with fluent API
 */
class LogBuilder {
  private serviceName: string
  private minLevel: LogLevel = 'info'
  private transports: LogTransport[] = []
  private defaultContext: Record<string, unknown> = {}
  private pretty: boolean = false

  constructor(name: string) {
    this.serviceName = name
  }

  /**
   * Set minimum log level
   */
  level(level: LogLevel): this {
    this.minLevel = level
    return this
  }

  /**
   * Enable pretty console output
   */
  prettyPrint(): this {
    this.pretty = true
    return this
  }

  /**
   * Add console transport
   */
  console(): this {
    this.transports.push(new ConsoleTransport(this.pretty))
    return this
  }

  /**
   * Add custom transport
   */
  transport(transport: LogTransport): this {
    this.transports.push(transport)
    return this
  }

  /**
   * Set default context for all log entries
   */
  context(ctx: Record<string, unknown>): this {
    this.defaultContext = { ...this.defaultContext, ...ctx }
    return this
  }

  build(): LoggerInstance {
    // Add console transport if none specified
    if (this.transports.length === 0) {
      this.transports.push(new ConsoleTransport(this.pretty))
    }

    return new LoggerImpl(
      this.serviceName,
      this.minLevel,
      this.transports,
      this.defaultContext
    )
  }
}

class LoggerImpl implements LoggerInstance {
  readonly name: string
  private minLevel: LogLevel
  private transports: LogTransport[]
  private context: Record<string, unknown>

  constructor(
    name: string,
    minLevel: LogLevel,
    transports: LogTransport[],
    context: Record<string, unknown>
  ) {
    this.name = name
    this.minLevel = minLevel
    this.transports = transports
    this.context = context
  }

  private shouldLog(level: LogLevel): boolean {
    return LOG_LEVELS[level] >= LOG_LEVELS[this.minLevel]
  }

  private log(level: LogLevel, message: string, extra?: Record<string, unknown>): void {
    if (!this.shouldLog(level)) return

    const entry: LogEntry = {
      ...this.context,
      ...extra,
      level,
      message,
      timestamp: new Date().toISOString(),
      service: this.name,
    }

    for (const transport of this.transports) {
      try {
        transport.write(entry)
      } catch (error) {
        console.error('[LOG] Transport error:', error)
      }
    }
  }

  debug(message: string, context?: Record<string, unknown>): void {
    this.log('debug', message, context)
  }

  info(message: string, context?: Record<string, unknown>): void {
    this.log('info', message, context)
  }

  warn(message: string, context?: Record<string, unknown>): void {
    this.log('warn', message, context)
  }

  error(message: string, context?: Record<string, unknown>): void {
    this.log('error', message, context)
  }

  fatal(message: string, context?: Record<string, unknown>): void {
    this.log('fatal', message, context)
  }

  child(additionalContext: Record<string, unknown>): LoggerInstance {
    return new LoggerImpl(
      this.name,
      this.minLevel,
      this.transports,
      { ...this.context, ...additionalContext }
    )
  }
}

/**
 * Log entry point
 */
export const Log = {
  create(name: string): LogBuilder {
    return new LogBuilder(name)
  },
}
