import { afterEach, describe, expect, test, vi } from 'vitest'
import { z } from 'zod'
import { resolveError, findCause } from '../src/rpc/resolve'
import { anyMethod } from '../src/rpc/any'
import { defineMethod } from '../src/rpc/method'
import { JSON_RPC_ERROR_CODES } from '../src/errors'
import { getGlobalLogLevel, setGlobalLogLevel, setLogHandler } from '../src/utils/logger'

const UnknownAccount = z.object({
  name: z.literal('UNKNOWN_ACCOUNT'),
  info: z.object({ requested_account_id: z.string() })
})

const viewAccount = defineMethod({
  method: 'query',
  params: (accountId: string) => ({ request_type: 'view_account', account_id: accountId, finality: 'final' }),
  result: z.unknown(),
  error: UnknownAccount
})

/** Same method, but the handler error schema describes only the `info` part. */
const viewAccountInfo = defineMethod({
  method: 'query',
  result: z.unknown(),
  error: z.object({ requested_account_id: z.string() })
})

describe('handler attempt', () => {
  test('nearcore top-level cause decodes as the whole {name, info}', () => {
    const error = {
      code: -32000,
      message: 'Server error',
      name: 'HANDLER_ERROR',
      cause: { name: 'UNKNOWN_ACCOUNT', info: { requested_account_id: 'alice.near' } },
      data: 'account alice.near does not exist while viewing'
    }
    const r = resolveError(viewAccount('alice.near'), error)

    expect(r).toEqual({
      kind: 'handler',
      error: { name: 'UNKNOWN_ACCOUNT', info: { requested_account_id: 'alice.near' } },
      source: 'cause',
      code: -32000,
      message: 'Server error',
      raw: 'account alice.near does not exist while viewing',
      envelope: error
    })
  })

  test('cause nested under data, info-shaped schema', () => {
    const error = {
      code: -32000,
      message: 'Server error',
      data: { cause: { name: 'UNKNOWN_ACCOUNT', info: { requested_account_id: 'bob.near' } } }
    }
    const r = resolveError(viewAccountInfo(), error)

    expect(r).toMatchObject({ kind: 'handler', source: 'cause-info', error: { requested_account_id: 'bob.near' } })
  })

  test('flat data payload', () => {
    const data = { name: 'UNKNOWN_ACCOUNT', info: { requested_account_id: 'carol.near' } }
    const r = resolveError(viewAccount('carol.near'), { code: -32000, message: 'Server error', data })

    expect(r).toMatchObject({ kind: 'handler', source: 'data', error: data, raw: data })
  })

  test('handler match on a value that is not a {code, message} object carries no code', () => {
    const legacy = { name: 'UNKNOWN_ACCOUNT', info: { requested_account_id: 'dave.near' } }
    const r = resolveError(viewAccount('dave.near'), legacy)

    expect(r).toEqual({ kind: 'handler', error: legacy, source: 'data', raw: legacy, envelope: legacy })
  })

  test('precedence decides between cause and data', () => {
    const named = anyMethod('lookup', null, { result: z.unknown(), error: z.object({ name: z.string() }) })
    const error = { code: -32000, message: 'Server error', data: { name: 'FROM_DATA' }, cause: { name: 'FROM_CAUSE' } }

    expect(resolveError(named, error)).toMatchObject({ source: 'cause', error: { name: 'FROM_CAUSE' } })
    expect(resolveError(named, error, { precedence: 'cause-first' })).toMatchObject({ source: 'cause' })
    expect(resolveError(named, error, { precedence: 'data-first' })).toMatchObject({
      source: 'data',
      error: { name: 'FROM_DATA' }
    })
  })
})

describe('generic attempt', () => {
  test('documented {code, message} without data', () => {
    const error = { code: JSON_RPC_ERROR_CODES.METHOD_NOT_FOUND, message: 'Method not found' }
    const r = resolveError(viewAccount('x.near'), error)

    expect(r).toEqual({ kind: 'generic', code: -32601, message: 'Method not found', data: undefined, raw: error, envelope: error })
  })

  test('unmatched cause and server name are kept', () => {
    const error = {
      code: JSON_RPC_ERROR_CODES.SERVER_ERROR,
      message: 'Server error',
      name: 'HANDLER_ERROR',
      cause: { name: 'SOMETHING_NEW', info: { detail: 1 } },
      data: 'newer node'
    }
    const r = resolveError(viewAccount('x.near'), error)

    expect(r).toEqual({
      kind: 'generic',
      code: -32000,
      message: 'Server error',
      data: 'newer node',
      name: 'HANDLER_ERROR',
      cause: { name: 'SOMETHING_NEW', info: { detail: 1 } },
      raw: 'newer node',
      envelope: error
    })
  })

  test('any method without an error schema never matches a handler error', () => {
    const data = { name: 'UNKNOWN_ACCOUNT', info: { requested_account_id: 'x.near' } }
    const r = resolveError(anyMethod('query'), { code: -32000, message: 'Server error', data })

    expect(r).toMatchObject({ kind: 'generic', data })
  })
})

describe('unrecognized', () => {
  test.each([
    ['a string', 'boom'],
    ['an array', [1, 2]],
    ['a number', 42],
    ['null', null],
    ['an object without code', { message: 'no code' }],
    ['a non-integer code', { code: 1.5, message: 'x' }],
    ['a non-string message', { code: 1, message: 7 }]
  ])('%s is kept verbatim', (_label, error) => {
    const r = resolveError(viewAccount('x.near'), error)
    expect(r.kind).toBe('unrecognized')
    expect(r.envelope).toBe(error)
  })

  test('raw keeps data when present', () => {
    const error = { data: { anything: true } }
    expect(resolveError(viewAccount('x.near'), error)).toEqual({
      kind: 'unrecognized',
      raw: { anything: true },
      envelope: error
    })
  })
})

describe('decoder failures', () => {
  const level = getGlobalLogLevel()
  afterEach(() => {
    setLogHandler(null)
    setGlobalLogLevel(level)
  })

  test('a throwing decoder counts as a mismatch and is logged at debug', () => {
    const handler = vi.fn()
    setLogHandler(handler)
    setGlobalLogLevel('debug')

    const exploding = {
      method: 'explode',
      decodeHandlerError: (): never => {
        throw new Error('decoder bug')
      }
    }
    const r = resolveError(exploding, { code: 1, message: 'm', data: { x: 1 } })

    expect(r.kind).toBe('generic')
    expect(handler).toHaveBeenCalledTimes(1)
    expect(handler.mock.calls[0][0]).toMatchObject({ level: 'debug', prefix: ['near-rpc', 'resolve'] })
    expect(handler.mock.calls[0][1]).toBe('explode: handler error decoder threw on data payload')
  })
})

describe('findCause', () => {
  test('prefers data.cause over error.cause', () => {
    expect(findCause({ data: { cause: { name: 'A' } }, cause: { name: 'B' } })).toEqual({ name: 'A' })
    expect(findCause({ cause: { name: 'B', info: 1 } })).toEqual({ name: 'B', info: 1 })
    expect(findCause({ cause: 'not an object' })).toBeUndefined()
  })
})
