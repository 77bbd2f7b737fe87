/**
 * Method descriptors: the contract every request type implements, and the
 * schema-driven implementation used by the method catalog.
 *
 * Usage:
 *   const block = defineMethod({
 *     method: 'block',
 *     params: (ref: BlockReference) => encodeBlockReference(ref),
 *     result: BlockView,
 *     error: RpcBlockError
 *   })
 *   const view = await client.call(block({ finality: 'final' }))
 */

import type { JsonValue } from './index'
import { formatZodError, type Schema } from '../utils/schema'

/** Outcome of decoding a `result` value. */
export type Decoded<R> = { ok: true; value: R } | { ok: false; expected: string; issues: string }

export interface MethodDescriptor<R, E = never> {
  /** Wire method name. */
  readonly method: string
  /** Only callable through a client that carries an auth header. */
  readonly requiresAuth?: boolean
  /** Request params exactly as the server expects them; `null` for zero-argument methods. */
  encodeParams(): JsonValue
  decodeResult(value: unknown): Decoded<R>
  /** Best-effort parse of a handler error payload; `undefined` when the shape does not match. */
  decodeHandlerError(payload: unknown): E | undefined
}

export interface CallOptions {
  /** Abandon the request; the transport releases the connection. */
  signal?: AbortSignal
}

/** Anything that can execute a descriptor (a client, or a wrapper around one). */
export interface MethodCaller {
  call<R, E>(method: MethodDescriptor<R, E>, opts?: CallOptions): Promise<R>
}

export interface MethodSchemas<R, E> {
  result: Schema<R>
  error?: Schema<E>
  /** Human-readable name of the result type, used in DecodeError messages. */
  resultName?: string
}

/** A descriptor whose decoding is driven by zod schemas. */
export class SchemaMethod<R, E = never> implements MethodDescriptor<R, E> {
  readonly method: string
  readonly requiresAuth: boolean
  private readonly params: JsonValue
  private readonly schemas: MethodSchemas<R, E>

  constructor(method: string, params: JsonValue, schemas: MethodSchemas<R, E>, requiresAuth = false) {
    this.method = method
    this.params = params
    this.schemas = schemas
    this.requiresAuth = requiresAuth
  }

  encodeParams(): JsonValue {
    return this.params
  }

  decodeResult(value: unknown): Decoded<R> {
    const r = this.schemas.result.safeParse(value)
    if (r.success) return { ok: true, value: r.data }
    return {
      ok: false,
      expected: this.schemas.resultName ?? `${this.method} result`,
      issues: formatZodError(r.error)
    }
  }

  decodeHandlerError(payload: unknown): E | undefined {
    if (!this.schemas.error) return undefined
    const r = this.schemas.error.safeParse(payload)
    return r.success ? r.data : undefined
  }

  /** Drive `client` with this descriptor; same as `client.call(this)`. */
  callOn(client: MethodCaller, opts?: CallOptions): Promise<R> {
    return client.call(this, opts)
  }
}

/** Free-function form of the descriptor-driven call. */
export function callOn<R, E>(method: MethodDescriptor<R, E>, client: MethodCaller, opts?: CallOptions): Promise<R> {
  return client.call(method, opts)
}

export interface MethodDefinition<A extends unknown[], R, E> {
  method: string
  /** Params encoder. Omit for zero-argument methods (params are sent as `null`). */
  params?: (...args: A) => JsonValue
  result: Schema<R>
  error?: Schema<E>
  resultName?: string
  requiresAuth?: boolean
}

export type MethodFactory<A extends unknown[], R, E> = ((...args: A) => SchemaMethod<R, E>) & {
  readonly method: string
}

/**
 * Declare a catalog method once; the returned factory builds immutable
 * descriptors from typed params.
 */
export function defineMethod<A extends unknown[] = [], R = unknown, E = never>(
  def: MethodDefinition<A, R, E>
): MethodFactory<A, R, E> {
  const encode: (...args: A) => JsonValue = def.params ?? (() => null)
  const schemas: MethodSchemas<R, E> = { result: def.result, error: def.error, resultName: def.resultName }
  const factory = (...args: A) => new SchemaMethod<R, E>(def.method, encode(...args), schemas, def.requiresAuth ?? false)
  return Object.assign(factory, { method: def.method })
}
