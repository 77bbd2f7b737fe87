import { describe, expect, test } from 'vitest'
import { parseEndpoint, resolvePollSettings, DEFAULT_POLL_ATTEMPTS, DEFAULT_POLL_INTERVAL_MS } from '../src/config'
import { apiKey, bearer } from '../src/auth'
import { connect } from '../src/rpc/client'
import { InvalidEndpointError } from '../src/errors'
import { FakeTransport, httpResponse } from './helpers'

describe('parseEndpoint', () => {
  test('accepts strings, URLs and {url}', () => {
    expect(parseEndpoint('  https://rpc.testnet.near.org  ').href).toBe('https://rpc.testnet.near.org/')
    expect(parseEndpoint(new URL('http://127.0.0.1:3030')).href).toBe('http://127.0.0.1:3030/')
    expect(parseEndpoint({ url: 'https://rpc.mainnet.near.org/path' }).href).toBe('https://rpc.mainnet.near.org/path')
  })

  test.each(['ftp://rpc.testnet.near.org', 'not a url', ''])('rejects %j', (input) => {
    expect(() => parseEndpoint(input)).toThrow(InvalidEndpointError)
  })

  test('keeps the rejected input', () => {
    try {
      parseEndpoint('ws://node.local')
      expect.unreachable()
    } catch (e) {
      expect(e).toBeInstanceOf(InvalidEndpointError)
      if (e instanceof InvalidEndpointError) {
        expect(e.input).toBe('ws://node.local')
        expect(e.message).toBe('Invalid endpoint: (root): expected http(s) URL')
      }
    }
  })

  test('connect fails before any request on a bad endpoint', () => {
    const transport = new FakeTransport(() => httpResponse(''))
    expect(() => connect('file:///etc/hosts', { transport })).toThrow(InvalidEndpointError)
    expect(transport.requests).toHaveLength(0)
  })
})

describe('options', () => {
  test('timeoutMs must be a non-negative integer', () => {
    expect(() => connect('http://127.0.0.1:3030', { timeoutMs: -1 })).toThrow(TypeError)
    expect(() => connect('http://127.0.0.1:3030', { timeoutMs: 1.5 })).toThrow(/^timeoutMs invalid: /)
    expect(() => connect('http://127.0.0.1:3030', { timeoutMs: 1000 })).not.toThrow()
  })

  test('poll settings defaults and bounds', () => {
    expect(resolvePollSettings()).toEqual({ intervalMs: DEFAULT_POLL_INTERVAL_MS, maxAttempts: DEFAULT_POLL_ATTEMPTS })
    expect(resolvePollSettings({ intervalMs: 0, maxAttempts: 1 })).toEqual({ intervalMs: 0, maxAttempts: 1 })
    expect(() => resolvePollSettings({ maxAttempts: 0 })).toThrow(TypeError)
    expect(() => resolvePollSettings({ intervalMs: -5 })).toThrow(/^poll options invalid: intervalMs/)
  })

  test('header names are case-insensitive', () => {
    const client = connect('http://127.0.0.1:3030', {
      transport: new FakeTransport(() => httpResponse('')),
      headers: { 'X-Request-Source': 'tests' }
    })
    expect(client.header('x-request-source')).toBe('tests')
    expect(client.headers.map(([name]) => name)).toEqual(['content-type', 'accept', 'user-agent', 'x-request-source'])
    expect(() => client.withHeader('  ', 'x')).toThrow(TypeError)
  })

  test('url is a copy', () => {
    const client = connect('http://127.0.0.1:3030', { transport: new FakeTransport(() => httpResponse('')) })
    client.url.pathname = '/changed'
    expect(client.url.href).toBe('http://127.0.0.1:3030/')
  })
})

describe('auth providers', () => {
  test('each provider yields exactly one header', () => {
    expect(bearer('test-token').header()).toEqual(['authorization', 'Bearer test-token'])
    expect(apiKey('test-key').header()).toEqual(['x-api-key', 'test-key'])
    expect(bearer('t').scheme).toBe('bearer')
    expect(apiKey('k').scheme).toBe('api-key')
  })

  test('clients carry an auth marker', () => {
    const transport = new FakeTransport(() => httpResponse(''))
    expect(connect('http://127.0.0.1:3030', { transport }).auth).toEqual({ authenticated: false })
    expect(connect('http://127.0.0.1:3030', { transport, auth: apiKey('test-key') }).auth).toEqual({
      authenticated: true,
      scheme: 'api-key'
    })
    const later = connect('http://127.0.0.1:3030', { transport }).withAuth(bearer('test-token'))
    expect(later.auth).toEqual({ authenticated: true, scheme: 'bearer' })
    expect(later.header('authorization')).toBe('Bearer test-token')
  })

  test('withHeader keeps the auth marker', () => {
    const client = connect('http://127.0.0.1:3030', {
      transport: new FakeTransport(() => httpResponse('')),
      auth: apiKey('test-key')
    }).withHeader('x-trace', '1')
    expect(client.auth.authenticated).toBe(true)
    expect(client.header('x-api-key')).toBe('test-key')
  })
})
