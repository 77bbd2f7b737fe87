/**
 * @packageDocumentation
 * Public entry for near-typed-rpc: client, method descriptors, error
 * resolution, auth providers, sandbox helpers and the method catalog.
 */

export { version, userAgent } from './version'
export * from './errors'
export * from './auth'
export * from './config'

// RPC core
export * from './rpc/index'
export * from './rpc/method'
export * from './rpc/any'
export * from './rpc/resolve'
export * from './rpc/transport'
export * from './rpc/client'

// Catalog
export * as methods from './methods/index'

// Sandbox
export * from './sandbox'

// Shared utilities
export { logger, setGlobalLogLevel, getGlobalLogLevel, setLogHandler } from './utils/logger'
export type { ILogger, LogHandler, LogLevelName, LogMeta } from './utils/logger'
export { AbortError, sleep, pollUntil } from './utils/retry'
export type { PollOptions, PollOutcome } from './utils/retry'
export { JsonSchema, formatZodError, type Schema } from './utils/schema'
