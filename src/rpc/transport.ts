/**
 * HTTP transport capability for the JSON-RPC client.
 *
 * The client only needs `send(request) -> response | failure`; anything that
 * implements `Transport` can stand in (tests use an in-memory fake).
 *
 * Usage:
 *   const transport = new HttpTransport({ timeoutMs: 10_000 })
 *   const client = connect('https://rpc.testnet.near.org', { transport })
 */

import { fetch, type Dispatcher } from 'undici'
import { AbortError } from '../utils/retry'

export interface TransportRequest {
  url: string
  /** Serialized JSON-RPC request envelope. */
  body: string
  /** Header names are lower-case; insertion order is kept. */
  headers: Record<string, string>
  signal?: AbortSignal
}

/** Any HTTP exchange that produced a status line, 2xx or not. */
export interface TransportResponse {
  status: number
  statusText: string
  body: string
}

export interface Transport {
  /**
   * Rejects only when no response was received: `TransportTimeoutError` when
   * the transport deadline passed, an `AbortError` when the caller's signal
   * fired, anything else for connection-level failures.
   */
  send(req: TransportRequest): Promise<TransportResponse>
}

/** The transport's own deadline passed before a response arrived. */
export class TransportTimeoutError extends Error {
  readonly timeoutMs: number

  constructor(timeoutMs: number) {
    super(`Request timed out after ${timeoutMs}ms`)
    this.name = 'TimeoutError'
    this.timeoutMs = timeoutMs
  }
}

export interface HttpTransportOptions {
  /** Per-request deadline (ms). No deadline when omitted or 0. */
  timeoutMs?: number
  /** undici dispatcher (connection pool, proxy agent, ...). Global dispatcher by default. */
  dispatcher?: Dispatcher
}

/** POSTs each envelope with undici's fetch. */
export class HttpTransport implements Transport {
  readonly timeoutMs: number
  private readonly dispatcher?: Dispatcher

  constructor(opts: HttpTransportOptions = {}) {
    this.timeoutMs = opts.timeoutMs ?? 0
    this.dispatcher = opts.dispatcher
  }

  async send(req: TransportRequest): Promise<TransportResponse> {
    if (req.signal?.aborted) throw new AbortError()

    const ctl = new AbortController()
    const cleanups: Array<() => void> = []
    let timedOut = false

    const onAbort = () => ctl.abort(new AbortError())
    if (req.signal) {
      req.signal.addEventListener('abort', onAbort)
      cleanups.push(() => req.signal?.removeEventListener('abort', onAbort))
    }
    if (this.timeoutMs > 0) {
      const t = setTimeout(() => {
        timedOut = true
        ctl.abort(new TransportTimeoutError(this.timeoutMs))
      }, this.timeoutMs)
      cleanups.push(() => clearTimeout(t))
    }

    try {
      const res = await fetch(req.url, {
        method: 'POST',
        headers: req.headers,
        body: req.body,
        signal: ctl.signal,
        dispatcher: this.dispatcher
      })
      // The body read is covered by the same deadline and signal.
      const body = await res.text()
      return { status: res.status, statusText: res.statusText, body }
    } catch (err) {
      if (timedOut) throw new TransportTimeoutError(this.timeoutMs)
      if (req.signal?.aborted) throw new AbortError()
      throw err
    } finally {
      cleanups.forEach((f) => f())
    }
  }
}
