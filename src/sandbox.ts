/**
 * Sandbox helpers (test/sandbox nodes only).
 *
 * Usage:
 *   const client = connect('http://127.0.0.1:3030')
 *   const { height } = await fastForward(client, 1_000)
 */

import { z } from 'zod'
import { PollTimeoutError } from './errors'
import { resolvePollSettings, type PollSettings } from './config'
import { status } from './methods/chain'
import { sandboxFastForward } from './methods/sandbox'
import type { MethodCaller } from './rpc/method'
import { AbortError, isAbortLike, pollUntil } from './utils/retry'
import { logger, type ILogger } from './utils/logger'
import { parseOrThrow } from './utils/schema'

export interface FastForwardOptions {
  /** Delay between status polls (ms). Default 500. */
  intervalMs?: number
  /** Status polls before giving up. Default 60. */
  maxAttempts?: number
  signal?: AbortSignal
  logger?: ILogger
}

export interface FastForwardResult {
  startHeight: number
  targetHeight: number
  /** Height reported by the poll that reached the target. */
  height: number
  attempts: number
}

const DeltaHeight = z.number().int().positive()

/**
 * Advance a sandbox node by `deltaHeight` blocks and wait until its status
 * reports the target height. Polls at a fixed interval; throws
 * PollTimeoutError once `maxAttempts` polls have not reached it, and
 * AbortError whenever `signal` fires.
 */
export async function fastForward(
  client: MethodCaller,
  deltaHeight: number,
  opts: FastForwardOptions = {}
): Promise<FastForwardResult> {
  const delta = parseOrThrow<number>(DeltaHeight, deltaHeight, 'deltaHeight')
  const settings = resolvePollSettings({ intervalMs: opts.intervalMs, maxAttempts: opts.maxAttempts })
  try {
    return await advance(client, delta, settings, opts)
  } catch (err) {
    if (opts.signal?.aborted && !isAbortLike(err)) throw new AbortError(undefined, { cause: err })
    throw err
  }
}

async function advance(
  client: MethodCaller,
  delta: number,
  { intervalMs, maxAttempts }: PollSettings,
  opts: FastForwardOptions
): Promise<FastForwardResult> {
  const log = opts.logger ?? logger('sandbox')
  const callOpts = { signal: opts.signal }

  const readHeight = async () => (await client.call(status(), callOpts)).sync_info.latest_block_height

  const startHeight = await readHeight()
  const targetHeight = startHeight + delta
  await client.call(sandboxFastForward(delta), callOpts)
  log.debug(`fast-forward ${startHeight} -> ${targetHeight}`)

  const outcome = await pollUntil(readHeight, (height) => height >= targetHeight, {
    intervalMs,
    maxAttempts,
    signal: opts.signal,
    onAttempt: ({ attempt, value, error }) =>
      log.trace(`poll ${attempt}/${maxAttempts}`, error === undefined ? { height: value } : { error })
  })

  if (!outcome.done) {
    throw new PollTimeoutError({
      targetHeight,
      lastHeight: outcome.last,
      attempts: outcome.attempts,
      cause: outcome.lastError
    })
  }
  return { startHeight, targetHeight, height: outcome.value, attempts: outcome.attempts }
}
