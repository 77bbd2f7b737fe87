/**
 * Client configuration: endpoint parsing, option validation and defaults.
 * Nothing is required from the environment; NEAR_RPC_LOG_LEVEL only tunes
 * the library logger (see utils/logger).
 */

import { z } from 'zod'
import { InvalidEndpointError } from './errors'
import { formatZodError, parseOrThrow } from './utils/schema'

export const DEFAULT_POLL_INTERVAL_MS = 500
export const DEFAULT_POLL_ATTEMPTS = 60

/** Anything `connect` accepts as an endpoint. */
export type EndpointLike = string | URL | { url: string | URL }

/** Safe URL (http/https) */
export const HttpUrl = z
  .string()
  .trim()
  .url()
  .refine((u) => /^https?:\/\//i.test(u), { message: 'expected http(s) URL' })

export function parseEndpoint(input: EndpointLike): URL {
  const raw = typeof input === 'string' ? input : input instanceof URL ? input.href : String(input.url)
  const r = HttpUrl.safeParse(raw)
  if (!r.success) throw new InvalidEndpointError(input, formatZodError(r.error))
  return new URL(r.data)
}

export const TimeoutMs = z.number().int().nonnegative()

export const PollSettings = z.object({
  intervalMs: z.number().int().nonnegative().default(DEFAULT_POLL_INTERVAL_MS),
  maxAttempts: z.number().int().positive().default(DEFAULT_POLL_ATTEMPTS)
})
export type PollSettings = z.infer<typeof PollSettings>

export function resolvePollSettings(input: { intervalMs?: number; maxAttempts?: number } = {}): PollSettings {
  return parseOrThrow<PollSettings>(PollSettings, input, 'poll options')
}

export function resolveTimeoutMs(v: number | undefined): number | undefined {
  return v === undefined ? undefined : parseOrThrow<number>(TimeoutMs, v, 'timeoutMs')
}
