/**
 * Typed errors for the NEAR JSON-RPC client.
 * - Construction errors (InvalidEndpointError, AuthConfigError)
 * - Call errors (TransportError, ProtocolError, DecodeError, ServerError)
 * - Sandbox polling errors (PollTimeoutError)
 *
 * Server-reported errors are classified into a ResolvedError; see rpc/resolve.
 */

import type { JsonRpcId } from './rpc/index'

export const JSON_RPC_ERROR_CODES = {
  PARSE_ERROR: -32700,
  INVALID_REQUEST: -32600,
  METHOD_NOT_FOUND: -32601,
  INVALID_PARAMS: -32602,
  INTERNAL_ERROR: -32603,
  // -32000..-32099 reserved for server errors; nearcore reports handler errors as -32000
  SERVER_ERROR: -32000
} as const

/** Narrow error-like shapes without forcing instanceof checks across realms. */
export function isErrorLike(x: unknown): x is { message: string } {
  return typeof x === 'object' && x !== null && 'message' in x && typeof x.message === 'string'
}

/** Coerce unknown into an Error with best-effort message. */
export function ensureError(e: unknown, fallback = 'Unknown error'): Error {
  if (e instanceof Error) return e
  if (isErrorLike(e)) return new Error(e.message)
  try {
    return new Error(typeof e === 'string' ? e : JSON.stringify(e))
  } catch {
    return new Error(fallback)
  }
}

export interface BaseErrorOptions {
  code?: number
  data?: unknown
  cause?: unknown
  context?: Record<string, unknown>
}

/** Base error with optional machine-readable fields. */
export class BaseError extends Error {
  /** Optional numeric code (JSON-RPC error code or HTTP status). */
  readonly code?: number
  /** Arbitrary structured data. */
  readonly data?: unknown
  /** Additional context fields (safe to log). */
  readonly context?: Record<string, unknown>

  constructor(message: string, opts: BaseErrorOptions = {}) {
    super(message, opts.cause === undefined ? undefined : { cause: opts.cause })
    this.name = new.target.name
    this.code = opts.code
    this.data = opts.data
    this.context = opts.context
  }
}

/** The endpoint given to connect() is not an http(s) URL. */
export class InvalidEndpointError extends BaseError {
  readonly input: unknown

  constructor(input: unknown, reason: string) {
    super(`Invalid endpoint: ${reason}`, { data: input })
    this.input = input
  }
}

/** Misuse of auth configuration (second provider, or auth-only method on a plain client). */
export class AuthConfigError extends BaseError {}

// ──────────────────────────────────────────────────────────────────────────────
// Resolved server errors
// ──────────────────────────────────────────────────────────────────────────────

/** `{name, info}` wrapper nearcore nests around handler errors. */
export interface ErrorCause {
  name: string
  info?: unknown
}

/** Where a handler error was decoded from. */
export type HandlerErrorSource = 'cause-info' | 'cause' | 'data'

interface ResolvedBase {
  /** `error.data`, or the whole `error` value when `data` is absent. */
  raw: unknown
  /** The complete `error` member of the response, untouched. */
  envelope: unknown
}

export interface HandlerResolvedError<E> extends ResolvedBase {
  kind: 'handler'
  error: E
  source: HandlerErrorSource
  code?: number
  message?: string
}

export interface GenericResolvedError extends ResolvedBase {
  kind: 'generic'
  code: number
  message: string
  data: unknown
  name?: string
  cause?: ErrorCause
}

export interface UnrecognizedResolvedError extends ResolvedBase {
  kind: 'unrecognized'
}

export type ResolvedError<E> = HandlerResolvedError<E> | GenericResolvedError | UnrecognizedResolvedError

// ──────────────────────────────────────────────────────────────────────────────
// Call errors
// ──────────────────────────────────────────────────────────────────────────────

export type CallErrorKind = 'transport' | 'protocol' | 'decode' | 'server'

interface CallErrorOptions extends BaseErrorOptions {
  method: string
  id?: JsonRpcId
}

/** Base for every failure a `call` can reject with. */
export abstract class CallError extends BaseError {
  abstract readonly kind: CallErrorKind
  readonly method: string
  readonly requestId: JsonRpcId | undefined

  constructor(message: string, opts: CallErrorOptions) {
    super(message, opts)
    this.method = opts.method
    this.requestId = opts.id
  }
}

export type TransportErrorKind =
  | 'network'
  | 'timeout'
  | 'aborted'
  | 'bad-request'
  | 'request-timeout'
  | 'internal-server-error'
  | 'service-unavailable'
  | 'http-status'

/** Map a non-2xx HTTP status to its transport error kind. */
export function transportKindForStatus(status: number): TransportErrorKind {
  switch (status) {
    case 400:
      return 'bad-request'
    case 408:
      return 'request-timeout'
    case 500:
      return 'internal-server-error'
    case 503:
      return 'service-unavailable'
    default:
      return 'http-status'
  }
}

/** The request never produced a 2xx response. */
export class TransportError extends CallError {
  readonly kind = 'transport'
  readonly transportKind: TransportErrorKind
  readonly status?: number
  readonly statusText?: string
  readonly body?: string

  constructor(
    message: string,
    opts: CallErrorOptions & { transportKind: TransportErrorKind; status?: number; statusText?: string; body?: string }
  ) {
    super(message, { ...opts, code: opts.code ?? opts.status })
    this.transportKind = opts.transportKind
    this.status = opts.status
    this.statusText = opts.statusText
    this.body = opts.body
  }
}

/** 2xx response whose body is not a well-formed JSON-RPC response envelope. */
export class ProtocolError extends CallError {
  readonly kind = 'protocol'
  readonly body: string

  constructor(message: string, opts: CallErrorOptions & { body: string }) {
    super(message, opts)
    this.body = opts.body
  }
}

/** `result` was present but did not match the method's result schema. */
export class DecodeError extends CallError {
  readonly kind = 'decode'
  readonly expected: string
  readonly raw: unknown
  readonly issues: string

  constructor(opts: CallErrorOptions & { expected: string; raw: unknown; issues: string }) {
    super(`Failed to decode ${opts.method} result as ${opts.expected}: ${opts.issues}`, { ...opts, data: opts.raw })
    this.expected = opts.expected
    this.raw = opts.raw
    this.issues = opts.issues
  }
}

/** The server answered with a JSON-RPC `error`. */
export class ServerError<E = unknown> extends CallError {
  readonly kind = 'server'
  readonly resolved: ResolvedError<E>

  constructor(resolved: ResolvedError<E>, opts: CallErrorOptions) {
    super(describeResolved(opts.method, resolved), {
      ...opts,
      code: resolved.kind === 'unrecognized' ? undefined : resolved.code,
      data: resolved.raw
    })
    this.resolved = resolved
  }

  /** The typed handler error, when the resolver found one. */
  handlerError(): E | undefined {
    return this.resolved.kind === 'handler' ? this.resolved.error : undefined
  }
}

function describeResolved(method: string, r: ResolvedError<unknown>): string {
  switch (r.kind) {
    case 'handler': {
      const name = isErrorLike(r.error) ? r.error.message : handlerName(r.error)
      return `${method}: handler error${name ? ` ${name}` : ''}`
    }
    case 'generic':
      return `${method}: ${r.message} (code ${r.code})`
    case 'unrecognized':
      return `${method}: unrecognized error payload`
  }
}

function handlerName(e: unknown): string | undefined {
  if (typeof e === 'object' && e !== null && 'name' in e && typeof e.name === 'string') return e.name
  return undefined
}

/** Sandbox polling ran out of attempts before the node reached the target height. */
export class PollTimeoutError extends BaseError {
  readonly targetHeight: number
  readonly lastHeight: number | undefined
  readonly attempts: number

  constructor(opts: { targetHeight: number; lastHeight?: number; attempts: number; cause?: unknown }) {
    super(
      `Node did not reach height ${opts.targetHeight} after ${opts.attempts} attempts` +
        (opts.lastHeight !== undefined ? ` (last seen ${opts.lastHeight})` : ''),
      { cause: opts.cause }
    )
    this.targetHeight = opts.targetHeight
    this.lastHeight = opts.lastHeight
    this.attempts = opts.attempts
  }
}

/** Type guard for any call failure. */
export function isCallError(e: unknown): e is CallError {
  return e instanceof CallError
}

/** Type guard for server-reported errors. */
export function isServerError(e: unknown): e is ServerError {
  return e instanceof ServerError
}

/**
 * Human-friendly stringification of an error for logs.
 */
export function formatError(e: unknown): string {
  if (e instanceof CallError) {
    const parts = [e.name, e.message, `method=${e.method}`]
    if (e.requestId !== undefined) parts.push(`id=${String(e.requestId)}`)
    if (e.code !== undefined) parts.push(`code=${e.code}`)
    return parts.join(' | ')
  }
  if (e instanceof BaseError) {
    return e.code !== undefined ? `${e.name}: ${e.message} | code=${e.code}` : `${e.name}: ${e.message}`
  }
  const err = ensureError(e)
  return `${err.name}: ${err.message}`
}
