/**
 * @module rpc
 * JSON-RPC 2.0 envelope shapes and validation.
 *
 * - Typed request/response envelopes
 * - Guards for success/failure responses
 * - Strict response envelope parsing (exactly one of result/error, echoed id)
 */

export type JsonValue =
  | null
  | boolean
  | number
  | string
  | JsonValue[]
  | { [k: string]: JsonValue }

export type JsonRpcId = string | number | null

export interface JsonRpcRequest<P extends JsonValue = JsonValue> {
  jsonrpc: '2.0'
  id: JsonRpcId
  method: string
  params: P
}

export interface JsonRpcErrorObject<D = unknown> {
  code: number
  message: string
  data?: D
}

export interface JsonRpcSuccess<R = unknown> {
  jsonrpc: '2.0'
  id: JsonRpcId
  result: R
}

/** `error` is left untyped: servers do not always send `{code, message}`. */
export interface JsonRpcFailure {
  jsonrpc: '2.0'
  id: JsonRpcId
  error: unknown
}

export type JsonRpcResponse<R = unknown> = JsonRpcSuccess<R> | JsonRpcFailure

export function isRecord(x: unknown): x is Record<string, unknown> {
  return typeof x === 'object' && x !== null && !Array.isArray(x)
}

/** Guard for JSON-RPC failure responses */
export function isJsonRpcFailure(x: unknown): x is JsonRpcFailure {
  return isRecord(x) && x.jsonrpc === '2.0' && 'error' in x && !('result' in x)
}

/** Guard for JSON-RPC success responses */
export function isJsonRpcSuccess(x: unknown): x is JsonRpcSuccess {
  return isRecord(x) && x.jsonrpc === '2.0' && 'result' in x && !('error' in x)
}

/** Guard for the documented `{code, message, data?}` error object. */
export function isJsonRpcErrorObject(x: unknown): x is JsonRpcErrorObject & Record<string, unknown> {
  return isRecord(x) && typeof x.code === 'number' && Number.isInteger(x.code) && typeof x.message === 'string'
}

function isJsonRpcId(x: unknown): x is JsonRpcId {
  return x === null || typeof x === 'string' || typeof x === 'number'
}

export function makeRequest(method: string, params: JsonValue, id: JsonRpcId): JsonRpcRequest {
  return { jsonrpc: '2.0', id, method, params }
}

export type ParsedEnvelope =
  | { kind: 'result'; id: JsonRpcId; result: unknown }
  | { kind: 'error'; id: JsonRpcId; error: unknown }
  | { kind: 'invalid'; reason: string }

/**
 * Parse a response body against the request id it answers.
 * An error envelope may carry `id: null` (the server could not read the request id).
 */
export function parseResponseEnvelope(body: string, expectedId: JsonRpcId): ParsedEnvelope {
  let json: unknown
  try {
    json = JSON.parse(body)
  } catch (e) {
    return { kind: 'invalid', reason: `body is not valid JSON (${e instanceof Error ? e.message : String(e)})` }
  }

  if (!isRecord(json)) return { kind: 'invalid', reason: 'response is not a JSON object' }
  if (json.jsonrpc !== '2.0') return { kind: 'invalid', reason: 'missing or wrong "jsonrpc" version' }

  const hasResult = 'result' in json
  const hasError = 'error' in json
  if (hasResult && hasError) return { kind: 'invalid', reason: 'response carries both "result" and "error"' }
  if (!hasResult && !hasError) return { kind: 'invalid', reason: 'response carries neither "result" nor "error"' }

  const id = json.id
  if (!isJsonRpcId(id)) return { kind: 'invalid', reason: 'response "id" is missing or not a string/number/null' }

  if (hasError) {
    if (id !== null && id !== expectedId) {
      return { kind: 'invalid', reason: `response id ${String(id)} does not match request id ${String(expectedId)}` }
    }
    return { kind: 'error', id, error: json.error }
  }

  if (id !== expectedId) {
    return { kind: 'invalid', reason: `response id ${String(id)} does not match request id ${String(expectedId)}` }
  }
  return { kind: 'result', id, result: json.result }
}
