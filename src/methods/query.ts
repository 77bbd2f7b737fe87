/**
 * `query`: account, contract code, contract state, access keys and view calls
 * at a given block.
 *
 *   const account = await client.call(
 *     query({ request_type: 'view_account', account_id: 'alice.testnet', finality: 'final' })
 *   )
 */

import { z } from 'zod'
import { defineMethod } from '../rpc/method'
import {
  AccountId,
  Balance,
  BlockHeight,
  CryptoHash,
  InternalError,
  compact,
  errorVariant,
  errorVariantWith,
  type BlockReference
} from './schemas'

export type QueryRequest =
  | { request_type: 'view_account'; account_id: string }
  | { request_type: 'view_code'; account_id: string }
  | { request_type: 'view_state'; account_id: string; prefix_base64: string; include_proof?: boolean }
  | { request_type: 'view_access_key'; account_id: string; public_key: string }
  | { request_type: 'view_access_key_list'; account_id: string }
  | { request_type: 'call_function'; account_id: string; method_name: string; args_base64: string }

/** The block reference and the request travel flattened into one object. */
export type QueryParams = QueryRequest & BlockReference

/** Fields common to every query response; the rest depends on `request_type`. */
export const QueryResponse = z
  .object({
    block_hash: CryptoHash,
    block_height: BlockHeight
  })
  .passthrough()
export type QueryResponse = z.infer<typeof QueryResponse>

export const AccountView = QueryResponse.extend({
  amount: Balance,
  locked: Balance,
  code_hash: CryptoHash,
  storage_usage: z.number().int().nonnegative()
})
export type AccountView = z.infer<typeof AccountView>

export const FunctionCallResult = QueryResponse.extend({
  result: z.array(z.number().int().min(0).max(255)),
  logs: z.array(z.string())
})
export type FunctionCallResult = z.infer<typeof FunctionCallResult>

const AtBlock = { block_height: BlockHeight, block_hash: CryptoHash }

export const RpcQueryError = z.union([
  errorVariant('NO_SYNCED_BLOCKS'),
  errorVariantWith('UNAVAILABLE_SHARD', { requested_shard_id: z.number() }),
  errorVariantWith('GARBAGE_COLLECTED_BLOCK', AtBlock),
  errorVariantWith('UNKNOWN_BLOCK', { block_reference: z.unknown() }),
  errorVariantWith('INVALID_ACCOUNT', { requested_account_id: z.string(), ...AtBlock }),
  errorVariantWith('UNKNOWN_ACCOUNT', { requested_account_id: AccountId, ...AtBlock }),
  errorVariantWith('NO_CONTRACT_CODE', { contract_account_id: AccountId, ...AtBlock }),
  errorVariantWith('TOO_LARGE_CONTRACT_STATE', { contract_account_id: AccountId, ...AtBlock }),
  errorVariantWith('UNKNOWN_ACCESS_KEY', { public_key: z.string(), ...AtBlock }),
  errorVariantWith('CONTRACT_EXECUTION_ERROR', { vm_error: z.string(), ...AtBlock }),
  InternalError
])
export type RpcQueryError = z.infer<typeof RpcQueryError>

function encodeQuery(params: QueryParams) {
  return compact({ ...params })
}

export const query = defineMethod({
  method: 'query',
  params: encodeQuery,
  result: QueryResponse,
  error: RpcQueryError,
  resultName: 'QueryResponse'
})

/** `view_account` with the result narrowed to AccountView. */
export const viewAccount = defineMethod({
  method: 'query',
  params: (accountId: string, ref: BlockReference = { finality: 'final' }) =>
    encodeQuery({ request_type: 'view_account', account_id: accountId, ...ref }),
  result: AccountView,
  error: RpcQueryError,
  resultName: 'AccountView'
})

/** `call_function` (view call) with base64-encoded JSON args. */
export const callFunction = defineMethod({
  method: 'query',
  params: (accountId: string, methodName: string, argsBase64: string = '', ref: BlockReference = { finality: 'final' }) =>
    encodeQuery({
      request_type: 'call_function',
      account_id: accountId,
      method_name: methodName,
      args_base64: argsBase64,
      ...ref
    }),
  result: FunctionCallResult,
  error: RpcQueryError,
  resultName: 'FunctionCallResult'
})
