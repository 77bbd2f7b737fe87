/**
 * logger.ts
 * ----------
 * Small scoped logger for the RPC client (Node & browser).
 * - Levels: trace, debug, info, warn, error, silent
 * - ISO timestamps
 * - Hierarchical prefixes via logger.child("scope")
 * - Global level (env NEAR_RPC_LOG_LEVEL, default "warn") and a replaceable sink
 */

export type LogLevelName = 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'silent'

export const LEVELS: Record<LogLevelName, number> = {
  trace: 10,
  debug: 20,
  info: 30,
  warn: 40,
  error: 50,
  silent: 99
}

export interface LogMeta {
  ts: Date
  level: LogLevelName
  prefix: string[]
}

export type LogHandler = (meta: LogMeta, ...args: unknown[]) => void

export function isLogLevel(v: unknown): v is LogLevelName {
  return typeof v === 'string' && Object.prototype.hasOwnProperty.call(LEVELS, v)
}

function readEnvLevel(): LogLevelName {
  const raw = typeof process !== 'undefined' ? process.env?.NEAR_RPC_LOG_LEVEL : undefined
  const v = raw?.trim().toLowerCase()
  return isLogLevel(v) ? v : 'warn'
}

let currentLevel: LogLevelName = readEnvLevel()

function tsISO(d: Date): string {
  return d.toISOString().replace(/\.\d{3}Z$/, 'Z')
}

/* ------------------------------- Default Sink ------------------------------ */

const consoleHandler: LogHandler = (meta, ...args) => {
  const tag = meta.prefix.length ? `[${meta.prefix.join(':')}]` : ''
  const head = `${tsISO(meta.ts)} ${meta.level.toUpperCase()}`
  const line = tag ? `${head} ${tag}` : head

  switch (meta.level) {
    case 'trace':
    case 'debug':
      console.debug(line, ...args)
      break
    case 'info':
      console.info(line, ...args)
      break
    case 'warn':
      console.warn(line, ...args)
      break
    case 'error':
      console.error(line, ...args)
      break
    case 'silent':
      break
  }
}

let handler: LogHandler = consoleHandler

/* --------------------------------- Logger --------------------------------- */

export interface ILogger {
  level(): LogLevelName

  trace(...args: unknown[]): void
  debug(...args: unknown[]): void
  info(...args: unknown[]): void
  warn(...args: unknown[]): void
  error(...args: unknown[]): void

  /** Create a child logger with an extra prefix scope segment. */
  child(scope: string): ILogger

  /** Start a timer; call the returned fn to log elapsed time at debug. */
  time(label?: string): () => void
}

class Logger implements ILogger {
  private readonly prefix: string[]

  constructor(prefix?: string[]) {
    this.prefix = prefix ? [...prefix] : []
  }

  level(): LogLevelName {
    return currentLevel
  }

  private emit(level: LogLevelName, args: unknown[]) {
    if (LEVELS[level] < LEVELS[currentLevel]) return
    handler({ ts: new Date(), level, prefix: this.prefix }, ...args)
  }

  trace = (...args: unknown[]) => this.emit('trace', args)
  debug = (...args: unknown[]) => this.emit('debug', args)
  info = (...args: unknown[]) => this.emit('info', args)
  warn = (...args: unknown[]) => this.emit('warn', args)
  error = (...args: unknown[]) => this.emit('error', args)

  child(scope: string): ILogger {
    return new Logger(scope ? [...this.prefix, scope] : this.prefix)
  }

  time(label = 'timer'): () => void {
    const t0 = performance.now()
    return () => {
      this.debug(`${label} +${(performance.now() - t0).toFixed(2)}ms`)
    }
  }
}

/* ----------------------------- Global Controls ---------------------------- */

export function setGlobalLogLevel(lvl: LogLevelName): void {
  currentLevel = lvl
}

export function getGlobalLogLevel(): LogLevelName {
  return currentLevel
}

/** Replace the sink; pass null to restore the console sink. */
export function setLogHandler(h: LogHandler | null): void {
  handler = h ?? consoleHandler
}

/* --------------------------------- Factory -------------------------------- */

const rootLogger: ILogger = new Logger(['near-rpc'])

/** Scoped child of the library root logger. */
export function logger(scope?: string): ILogger {
  return scope ? rootLogger.child(scope) : rootLogger
}
