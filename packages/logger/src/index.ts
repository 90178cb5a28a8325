/**
 * @homescan/logger
 *
 * Structured logging shared by the crawler workspaces.
 *
 * Environment variables:
 * - LOG_LEVEL: minimum level (debug, info, warn, error, fatal). Default: info
 * - LOG_FORMAT: json or pretty. Default: json in production, pretty elsewhere
 *
 * `setLogLevel` overrides LOG_LEVEL at runtime (the CLI's --verbose flag).
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'fatal'

export type LogFormat = 'json' | 'pretty'

export interface LogContext {
  [key: string]: unknown
}

interface SerializedError {
  name: string
  message: string
  code?: string
  stack?: string
}

interface LogRecord {
  timestamp: string
  level: LogLevel
  service: string
  component?: string
  message: string
  error?: SerializedError
  [key: string]: unknown
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  fatal: 50,
}

const LEVEL_COLORS: Record<LogLevel, string> = {
  debug: '\x1b[90m',
  info: '\x1b[36m',
  warn: '\x1b[33m',
  error: '\x1b[31m',
  fatal: '\x1b[41m\x1b[37m',
}

const RESET = '\x1b[0m'
const DIM = '\x1b[2m'

let levelOverride: LogLevel | null = null

function isLogLevel(value: string | undefined): value is LogLevel {
  return value !== undefined && Object.prototype.hasOwnProperty.call(LEVEL_ORDER, value)
}

/**
 * Force a minimum level regardless of LOG_LEVEL. Pass null to go back to the
 * environment setting.
 */
export function setLogLevel(level: LogLevel | null): void {
  levelOverride = level
}

export function currentLogLevel(): LogLevel {
  if (levelOverride) return levelOverride
  const fromEnv = process.env.LOG_LEVEL?.trim().toLowerCase()
  return isLogLevel(fromEnv) ? fromEnv : 'info'
}

export function currentLogFormat(): LogFormat {
  const fromEnv = process.env.LOG_FORMAT?.trim().toLowerCase()
  if (fromEnv === 'json' || fromEnv === 'pretty') {
    return fromEnv
  }
  return process.env.NODE_ENV === 'production' ? 'json' : 'pretty'
}

function isEnabled(level: LogLevel): boolean {
  return LEVEL_ORDER[level] >= LEVEL_ORDER[currentLogLevel()]
}

function serializeError(error: unknown): SerializedError {
  if (error instanceof Error) {
    const code = 'code' in error && typeof error.code === 'string' ? error.code : undefined
    return {
      name: error.name,
      message: error.message,
      ...(code ? { code } : {}),
      ...(error.stack ? { stack: error.stack } : {}),
    }
  }
  return { name: 'NonError', message: String(error) }
}

function renderPretty(record: LogRecord): string {
  const { timestamp, level, service, component, message, error, ...fields } = record
  const scope = component ? `${service}:${component}` : service
  const extra = Object.keys(fields).length > 0 ? ` ${DIM}${JSON.stringify(fields)}${RESET}` : ''
  const failure = error ? `\n  ${DIM}${error.stack ?? `${error.name}: ${error.message}`}${RESET}` : ''
  const label = `${LEVEL_COLORS[level]}${level.toUpperCase().padEnd(5)}${RESET}`
  return `${DIM}${timestamp}${RESET} ${label} ${DIM}[${scope}]${RESET} ${message}${extra}${failure}`
}

function emit(record: LogRecord): void {
  const line = currentLogFormat() === 'json' ? JSON.stringify(record) : renderPretty(record)

  if (record.level === 'debug') {
    console.debug(line)
  } else if (record.level === 'info') {
    console.info(line)
  } else if (record.level === 'warn') {
    console.warn(line)
  } else {
    console.error(line)
  }
}

export interface ILogger {
  debug(message: string, meta?: LogContext): void
  info(message: string, meta?: LogContext): void
  warn(message: string, meta?: LogContext, error?: unknown): void
  error(message: string, meta?: LogContext, error?: unknown): void
  fatal(message: string, meta?: LogContext, error?: unknown): void
  /**
   * Derive a logger for a sub-component. Component names nest with ':'
   * (`crawler:walker:centanet`); bindings are merged into every entry.
   */
  child(component: string, bindings?: LogContext): ILogger
}

export class Logger implements ILogger {
  constructor(
    private readonly service: string,
    private readonly component?: string,
    private readonly bindings: LogContext = {}
  ) {}

  private write(level: LogLevel, message: string, meta?: LogContext, error?: unknown): void {
    if (!isEnabled(level)) return

    const record: LogRecord = {
      timestamp: new Date().toISOString(),
      level,
      service: this.service,
      ...(this.component ? { component: this.component } : {}),
      message,
      ...this.bindings,
      ...meta,
    }

    if (error !== undefined) {
      record.error = serializeError(error)
    }

    emit(record)
  }

  debug(message: string, meta?: LogContext): void {
    this.write('debug', message, meta)
  }

  info(message: string, meta?: LogContext): void {
    this.write('info', message, meta)
  }

  warn(message: string, meta?: LogContext, error?: unknown): void {
    this.write('warn', message, meta, error)
  }

  error(message: string, meta?: LogContext, error?: unknown): void {
    this.write('error', message, meta, error)
  }

  fatal(message: string, meta?: LogContext, error?: unknown): void {
    this.write('fatal', message, meta, error)
  }

  child(component: string, bindings: LogContext = {}): ILogger {
    const nested = this.component ? `${this.component}:${component}` : component
    return new Logger(this.service, nested, { ...this.bindings, ...bindings })
  }
}

/**
 * Create the root logger for a service.
 *
 * @example
 * ```ts
 * const log = createLogger('crawler').child('walker')
 * log.info('List page fetched', { siteId: 'centanet', page: 2 })
 * ```
 */
export function createLogger(service: string): ILogger {
  return new Logger(service)
}
