/**
 * In-memory JSON-RPC stand-ins shared by the client tests.
 */

import { z } from 'zod'
import type { Transport, TransportRequest, TransportResponse } from '../src/rpc/transport'
import type { CallFailure, CallResult } from '../src/rpc/client'
import { AbortError } from '../src/utils/retry'

const RequestEnvelope = z.object({
  jsonrpc: z.literal('2.0'),
  id: z.union([z.string(), z.number(), z.null()]),
  method: z.string(),
  params: z.unknown()
})
export type RequestEnvelope = z.infer<typeof RequestEnvelope>

export interface RecordedRequest {
  url: string
  headers: Record<string, string>
  envelope: RequestEnvelope
}

export type Responder = (req: RecordedRequest) => TransportResponse | Promise<TransportResponse>

/** Records every request and answers through `responder`. */
export class FakeTransport implements Transport {
  readonly requests: RecordedRequest[] = []
  private readonly responder: Responder

  constructor(responder: Responder) {
    this.responder = responder
  }

  async send(req: TransportRequest): Promise<TransportResponse> {
    if (req.signal?.aborted) throw new AbortError()
    const recorded = { url: req.url, headers: req.headers, envelope: RequestEnvelope.parse(JSON.parse(req.body)) }
    this.requests.push(recorded)
    return this.responder(recorded)
  }
}

export function httpResponse(body: unknown, status = 200, statusText = 'OK'): TransportResponse {
  return { status, statusText, body: typeof body === 'string' ? body : JSON.stringify(body) }
}

/** 200 response carrying a JSON-RPC result for `id`. */
export function resultFor(id: RequestEnvelope['id'], result: unknown): TransportResponse {
  return httpResponse({ jsonrpc: '2.0', id, result })
}

/** 200 response carrying a JSON-RPC error for `id`. */
export function errorFor(id: RequestEnvelope['id'], error: unknown): TransportResponse {
  return httpResponse({ jsonrpc: '2.0', id, error })
}

export function statusView(height: number) {
  return {
    chain_id: 'sandbox',
    protocol_version: 70,
    version: { version: '2.0.0', build: 'test' },
    sync_info: {
      latest_block_hash: `hash-${height}`,
      latest_block_height: height,
      syncing: false
    },
    validators: []
  }
}

/** The error of a failed CallResult; throws when the call succeeded. */
export function failureOf<R, E>(r: CallResult<R, E>): CallFailure<E> {
  if (r.ok) throw new Error(`expected the call to fail, got ${JSON.stringify(r.value)}`)
  return r.error
}
