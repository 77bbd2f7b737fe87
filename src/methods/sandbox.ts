/**
 * Sandbox control-plane methods. Only nodes started in sandbox mode answer
 * them; everywhere else they fail with METHOD_NOT_FOUND.
 */

import { z } from 'zod'
import { defineMethod } from '../rpc/method'
import type { JsonValue } from '../rpc/index'
import { InternalError } from './schemas'

/** A state record as nearcore dumps it, e.g. `{ Account: { account_id, account } }`. */
export type StateRecord = { [kind: string]: JsonValue }

export const RpcSandboxPatchStateError = InternalError
export type RpcSandboxPatchStateError = z.infer<typeof RpcSandboxPatchStateError>

/** Both methods answer with an empty object. */
const Empty = z.object({}).passthrough()

export const sandboxPatchState = defineMethod({
  method: 'sandbox_patch_state',
  params: (records: StateRecord[]) => ({ records }),
  result: Empty,
  error: RpcSandboxPatchStateError,
  resultName: 'empty object'
})

export const RpcSandboxFastForwardError = InternalError
export type RpcSandboxFastForwardError = z.infer<typeof RpcSandboxFastForwardError>

/** Ask the node to produce `deltaHeight` blocks; see `fastForward` for the waiting part. */
export const sandboxFastForward = defineMethod({
  method: 'sandbox_fast_forward',
  params: (deltaHeight: number) => ({ delta_height: deltaHeight }),
  result: Empty,
  error: RpcSandboxFastForwardError,
  resultName: 'empty object'
})
