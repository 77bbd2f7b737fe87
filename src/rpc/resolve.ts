/**
 * Layered classification of JSON-RPC `error` members.
 *
 * Servers evolve their error schemas independently of clients and sometimes
 * send partially-serialised errors, so resolution falls back in order:
 *
 *   1. handler  – the method's own error decoder, tried against the `cause`
 *                 wrapper ({name, info}) and the flat `data` payload
 *   2. generic  – the documented `{code, message, data?}` shape, data untyped
 *   3. unrecognized – anything else, kept verbatim
 *
 * resolveError never throws.
 */

import type {
  ErrorCause,
  GenericResolvedError,
  HandlerErrorSource,
  ResolvedError
} from '../errors'
import { isJsonRpcErrorObject, isRecord } from './index'
import type { MethodDescriptor } from './method'
import { logger, type ILogger } from '../utils/logger'

/** Which handler payload is tried first when both a `cause` wrapper and flat `data` exist. */
export type ErrorPrecedence = 'cause-first' | 'data-first'

export interface ResolveOptions {
  precedence?: ErrorPrecedence
  logger?: ILogger
}

interface Candidate {
  source: HandlerErrorSource
  payload: unknown
}

const log = logger('resolve')

function isCause(x: unknown): x is ErrorCause {
  return isRecord(x) && typeof x.name === 'string'
}

/** The `{name, info}` wrapper, from `error.data.cause` or (nearcore style) `error.cause`. */
export function findCause(error: Record<string, unknown>): ErrorCause | undefined {
  const data = error.data
  if (isRecord(data) && isCause(data.cause)) return data.cause
  if (isCause(error.cause)) return error.cause
  return undefined
}

/** `error.data` when present, the error value itself otherwise. */
export function rawPayloadOf(error: unknown): unknown {
  return isRecord(error) && 'data' in error ? error.data : error
}

function handlerCandidates(error: unknown, precedence: ErrorPrecedence): Candidate[] {
  const wrapped: Candidate[] = []
  const cause = isRecord(error) ? findCause(error) : undefined
  if (cause) {
    if (cause.info !== undefined) wrapped.push({ source: 'cause-info', payload: cause.info })
    wrapped.push({ source: 'cause', payload: cause })
  }

  const flat: Candidate[] = []
  const raw = rawPayloadOf(error)
  if (raw !== null && raw !== undefined) flat.push({ source: 'data', payload: raw })

  return precedence === 'cause-first' ? [...wrapped, ...flat] : [...flat, ...wrapped]
}

function tryDecode<E>(
  descriptor: Pick<MethodDescriptor<unknown, E>, 'method' | 'decodeHandlerError'>,
  candidate: Candidate,
  l: ILogger
): E | undefined {
  try {
    return descriptor.decodeHandlerError(candidate.payload)
  } catch (e) {
    l.debug(`${descriptor.method}: handler error decoder threw on ${candidate.source} payload`, e)
    return undefined
  }
}

/**
 * Classify the `error` member of a response envelope for `descriptor`.
 * The untouched value is kept on every variant as `envelope`.
 */
export function resolveError<E>(
  descriptor: Pick<MethodDescriptor<unknown, E>, 'method' | 'decodeHandlerError'>,
  error: unknown,
  opts: ResolveOptions = {}
): ResolvedError<E> {
  const l = opts.logger ?? log
  const raw = rawPayloadOf(error)

  for (const candidate of handlerCandidates(error, opts.precedence ?? 'cause-first')) {
    const decoded = tryDecode(descriptor, candidate, l)
    if (decoded === undefined) continue
    return isJsonRpcErrorObject(error)
      ? { kind: 'handler', error: decoded, source: candidate.source, code: error.code, message: error.message, raw, envelope: error }
      : { kind: 'handler', error: decoded, source: candidate.source, raw, envelope: error }
  }

  if (isJsonRpcErrorObject(error)) {
    const resolved: GenericResolvedError = {
      kind: 'generic',
      code: error.code,
      message: error.message,
      data: error.data,
      raw,
      envelope: error
    }
    if (typeof error.name === 'string') resolved.name = error.name
    const cause = findCause(error)
    if (cause) resolved.cause = cause
    return resolved
  }

  l.warn(`${descriptor.method}: unrecognized error payload`, error)
  return { kind: 'unrecognized', raw, envelope: error }
}
