import { describe, expect, test } from 'vitest'
import {
  AuthConfigError,
  DecodeError,
  JSON_RPC_ERROR_CODES,
  PollTimeoutError,
  ProtocolError,
  ServerError,
  TransportError,
  ensureError,
  formatError,
  isCallError,
  isServerError,
  transportKindForStatus
} from '../src/errors'

describe('call errors', () => {
  test('guards', () => {
    const server = new ServerError(
      {
        kind: 'generic',
        code: JSON_RPC_ERROR_CODES.METHOD_NOT_FOUND,
        message: 'Method not found',
        data: undefined,
        raw: null,
        envelope: {}
      },
      { method: 'nope', id: 1 }
    )
    const protocol = new ProtocolError('status: malformed response (x)', { method: 'status', id: 2, body: 'x' })

    expect(isCallError(server)).toBe(true)
    expect(isServerError(server)).toBe(true)
    expect(isCallError(protocol)).toBe(true)
    expect(isServerError(protocol)).toBe(false)
    expect(isCallError(new AuthConfigError('x'))).toBe(false)
    expect(server.code).toBe(-32601)
    expect(server.message).toBe('nope: Method not found (code -32601)')
  })

  test('standard JSON-RPC codes', () => {
    expect(JSON_RPC_ERROR_CODES).toEqual({
      PARSE_ERROR: -32700,
      INVALID_REQUEST: -32600,
      METHOD_NOT_FOUND: -32601,
      INVALID_PARAMS: -32602,
      INTERNAL_ERROR: -32603,
      SERVER_ERROR: -32000
    })
  })

  test('error names follow the class', () => {
    expect(new TransportError('m', { method: 'status', transportKind: 'network' }).name).toBe('TransportError')
    expect(new PollTimeoutError({ targetHeight: 2, attempts: 1 }).name).toBe('PollTimeoutError')
  })

  test('unrecognized server errors carry no code', () => {
    const e = new ServerError({ kind: 'unrecognized', raw: 'boom', envelope: 'boom' }, { method: 'block', id: 3 })
    expect(e.code).toBeUndefined()
    expect(e.data).toBe('boom')
    expect(e.message).toBe('block: unrecognized error payload')
    expect(e.handlerError()).toBeUndefined()
  })

  test('decode errors keep the raw result', () => {
    const e = new DecodeError({ method: 'status', id: 1, expected: 'StatusView', raw: { a: 1 }, issues: 'chain_id: Required' })
    expect(e.message).toBe('Failed to decode status result as StatusView: chain_id: Required')
    expect(e.raw).toEqual({ a: 1 })
    expect(e.data).toEqual({ a: 1 })
  })

  test.each([
    [400, 'bad-request'],
    [408, 'request-timeout'],
    [500, 'internal-server-error'],
    [503, 'service-unavailable'],
    [429, 'http-status'],
    [302, 'http-status']
  ])('HTTP %i is %s', (status, kind) => {
    expect(transportKindForStatus(status)).toBe(kind)
  })
})

describe('formatError', () => {
  test('call errors list method, id and code', () => {
    const e = new TransportError('status: HTTP 503 Service Unavailable', {
      method: 'status',
      id: 4,
      transportKind: 'service-unavailable',
      status: 503
    })
    expect(formatError(e)).toBe('TransportError | status: HTTP 503 Service Unavailable | method=status | id=4 | code=503')
  })

  test('other errors', () => {
    expect(formatError(new AuthConfigError('second provider'))).toBe('AuthConfigError: second provider')
    expect(formatError('plain')).toBe('Error: plain')
    expect(formatError({ message: 'shaped' })).toBe('Error: shaped')
  })

  test('ensureError', () => {
    const e = new RangeError('r')
    expect(ensureError(e)).toBe(e)
    expect(ensureError({ n: 1 }).message).toBe('{"n":1}')
  })
})
