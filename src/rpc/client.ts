/**
 * JSON-RPC client bound to one endpoint.
 *
 * Usage:
 *   import { connect, methods } from 'near-typed-rpc'
 *   const client = connect('https://rpc.testnet.near.org')
 *   const status = await client.call(methods.status())
 *
 * A client is immutable: `withHeader` / `withAuth` return new handles that
 * share the transport and the id counter with their parent.
 */

import { makeRequest, parseResponseEnvelope, type JsonRpcId } from './index'
import type { CallOptions, MethodCaller, MethodDescriptor } from './method'
import { resolveError, type ErrorPrecedence } from './resolve'
import { HttpTransport, TransportTimeoutError, type Transport, type TransportResponse } from './transport'
import {
  AuthConfigError,
  DecodeError,
  ProtocolError,
  ServerError,
  TransportError,
  ensureError,
  formatError,
  transportKindForStatus
} from '../errors'
import {
  UNAUTHENTICATED,
  authenticatedWith,
  type AuthProvider,
  type AuthState,
  type Authenticated,
  type Unauthenticated
} from '../auth'
import { parseEndpoint, resolveTimeoutMs, type EndpointLike } from '../config'
import { isAbortLike } from '../utils/retry'
import { logger, type ILogger } from '../utils/logger'
import { userAgent } from '../version'

export type IdFactory = () => string | number

/** Incrementing integer ids. */
export function sequentialIds(start = 1): IdFactory {
  let next = start
  return () => next++
}

export interface ClientOptions {
  /** Extra headers sent with every request. Names are case-insensitive; auth headers are rejected (use `auth`). */
  headers?: Record<string, string>
  /** Defaults to an HttpTransport. */
  transport?: Transport
  /** Deadline for the default HttpTransport; ignored when `transport` is given. */
  timeoutMs?: number
  idFactory?: IdFactory
  logger?: ILogger
  /** Order in which the resolver tries `cause` and flat `data` payloads. Default 'cause-first'. */
  errorPrecedence?: ErrorPrecedence
}

export interface ConnectOptions extends ClientOptions {
  auth?: AuthProvider
}

export type CallFailure<E> = TransportError | ProtocolError | DecodeError | ServerError<E>

export type CallResult<R, E = never> = { ok: true; value: R } | { ok: false; error: CallFailure<E> }

interface ClientState {
  readonly url: URL
  readonly headers: ReadonlyMap<string, string>
  readonly transport: Transport
  readonly nextId: IdFactory
  readonly log: ILogger
  readonly precedence: ErrorPrecedence
}

/** Header names only an AuthProvider may set. */
const AUTH_HEADERS: ReadonlySet<string> = new Set(['authorization', 'x-api-key'])

function setHeader(headers: Map<string, string>, name: string, value: string, fromProvider = false): void {
  const key = name.trim().toLowerCase()
  if (!key) throw new TypeError('Header name must not be empty')
  if (!fromProvider && AUTH_HEADERS.has(key)) {
    throw new AuthConfigError(`"${key}" is an auth header; connect with { auth } or use withAuth`)
  }
  headers.set(key, value)
}

export class JsonRpcClient<A extends AuthState = AuthState> implements MethodCaller {
  /** Whether an auth provider was attached, and which scheme. */
  readonly auth: A
  private readonly state: ClientState

  private constructor(state: ClientState, auth: A) {
    this.state = state
    this.auth = auth
  }

  /** Unauthenticated client; see `connect` for the auth-aware entry point. */
  static create(endpoint: EndpointLike, opts: ClientOptions = {}): JsonRpcClient<Unauthenticated> {
    const url = parseEndpoint(endpoint)
    const headers = new Map<string, string>([
      ['content-type', 'application/json'],
      ['accept', 'application/json'],
      ['user-agent', userAgent()]
    ])
    for (const [name, value] of Object.entries(opts.headers ?? {})) setHeader(headers, name, value)

    const timeoutMs = resolveTimeoutMs(opts.timeoutMs)
    return new JsonRpcClient<Unauthenticated>(
      {
        url,
        headers,
        transport: opts.transport ?? new HttpTransport({ timeoutMs }),
        nextId: opts.idFactory ?? sequentialIds(),
        log: opts.logger ?? logger('client'),
        precedence: opts.errorPrecedence ?? 'cause-first'
      },
      UNAUTHENTICATED
    )
  }

  get url(): URL {
    return new URL(this.state.url.href)
  }

  /** Header entries in the order they are sent. */
  get headers(): Array<[string, string]> {
    return [...this.state.headers]
  }

  header(name: string): string | undefined {
    return this.state.headers.get(name.toLowerCase())
  }

  /** New client with `name: value` merged in (last write wins). Auth headers go through `withAuth`. */
  withHeader(name: string, value: string): JsonRpcClient<A> {
    const headers = new Map(this.state.headers)
    setHeader(headers, name, value)
    return new JsonRpcClient({ ...this.state, headers }, this.auth)
  }

  /** New client carrying the provider's header. Only one provider per client. */
  withAuth(this: JsonRpcClient<Unauthenticated>, provider: AuthProvider): JsonRpcClient<Authenticated> {
    if (this.auth.authenticated) {
      throw new AuthConfigError('Client already has an auth provider attached; connect() again to use other credentials')
    }
    const [name, value] = provider.header()
    const headers = new Map(this.state.headers)
    setHeader(headers, name, value, true)
    return new JsonRpcClient({ ...this.state, headers }, authenticatedWith(provider))
  }

  /** Execute `method`; rejects with a CallError subclass on failure. */
  async call<R, E>(method: MethodDescriptor<R, E>, opts: CallOptions = {}): Promise<R> {
    const r = await this.callSafe(method, opts)
    if (r.ok) return r.value
    throw r.error
  }

  /** Like `call`, but call failures are returned instead of thrown. */
  async callSafe<R, E>(method: MethodDescriptor<R, E>, opts: CallOptions = {}): Promise<CallResult<R, E>> {
    if (method.requiresAuth && !this.auth.authenticated) {
      throw new AuthConfigError(`${method.method} requires an authenticated client (connect with { auth } or use withAuth)`)
    }

    const { log } = this.state
    const id = this.state.nextId()
    const request = makeRequest(method.method, method.encodeParams(), id)
    log.debug(`${method.method} #${id}`)

    let res: TransportResponse
    const stop = log.time(`${method.method} #${id}`)
    try {
      res = await this.state.transport.send({
        url: this.state.url.href,
        body: JSON.stringify(request),
        headers: Object.fromEntries(this.state.headers),
        signal: opts.signal
      })
    } catch (err) {
      return this.fail(transportFailure(method.method, id, err, opts.signal))
    } finally {
      stop()
    }

    if (res.status < 200 || res.status > 299) {
      return this.fail(
        new TransportError(`${method.method}: HTTP ${res.status}${res.statusText ? ` ${res.statusText}` : ''}`, {
          method: method.method,
          id,
          transportKind: transportKindForStatus(res.status),
          status: res.status,
          statusText: res.statusText,
          body: res.body
        })
      )
    }

    const envelope = parseResponseEnvelope(res.body, id)
    switch (envelope.kind) {
      case 'invalid':
        return this.fail(
          new ProtocolError(`${method.method}: malformed response (${envelope.reason})`, {
            method: method.method,
            id,
            body: res.body
          })
        )
      case 'error': {
        const resolved = resolveError(method, envelope.error, { precedence: this.state.precedence, logger: log })
        const error = new ServerError<E>(resolved, { method: method.method, id })
        log.debug(formatError(error))
        return { ok: false, error }
      }
      case 'result': {
        const decoded = method.decodeResult(envelope.result)
        if (decoded.ok) return { ok: true, value: decoded.value }
        return this.fail(
          new DecodeError({
            method: method.method,
            id,
            expected: decoded.expected,
            raw: envelope.result,
            issues: decoded.issues
          })
        )
      }
    }
  }

  private fail(error: TransportError | ProtocolError | DecodeError): { ok: false; error: CallFailure<never> } {
    this.state.log.warn(formatError(error))
    return { ok: false, error }
  }
}

function transportFailure(method: string, id: JsonRpcId, err: unknown, signal?: AbortSignal): TransportError {
  if (err instanceof TransportTimeoutError) {
    return new TransportError(`${method}: ${err.message}`, { method, id, transportKind: 'timeout', cause: err })
  }
  if (signal?.aborted || isAbortLike(err)) {
    return new TransportError(`${method}: request aborted`, { method, id, transportKind: 'aborted', cause: err })
  }
  return new TransportError(`${method}: ${ensureError(err).message}`, { method, id, transportKind: 'network', cause: err })
}

/**
 * Build a client for `endpoint`. With `auth`, the client is typed as
 * Authenticated and carries exactly one auth header.
 */
export function connect(endpoint: EndpointLike, opts: ConnectOptions & { auth: AuthProvider }): JsonRpcClient<Authenticated>
export function connect(endpoint: EndpointLike, opts?: ClientOptions & { auth?: undefined }): JsonRpcClient<Unauthenticated>
export function connect(endpoint: EndpointLike, opts?: ConnectOptions): JsonRpcClient<AuthState>
export function connect(endpoint: EndpointLike, opts: ConnectOptions = {}): JsonRpcClient<AuthState> {
  const { auth, ...rest } = opts
  const client = JsonRpcClient.create(endpoint, rest)
  return auth ? client.withAuth(auth) : client
}
