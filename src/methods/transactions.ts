/**
 * Transaction submission and lookup.
 *
 * Signing and borsh serialisation are out of scope: submission methods take an
 * already signed transaction, base64 encoded.
 */

import { z } from 'zod'
import { defineMethod } from '../rpc/method'
import type { JsonValue } from '../rpc/index'
import {
  CryptoHash,
  InternalError,
  UnknownBlock,
  TransactionResult,
  compact,
  errorVariant,
  errorVariantWith,
  type TxExecutionStatus
} from './schemas'

/** Look a transaction up by hash and sender, or by the signed transaction itself. */
export type TransactionLookup =
  | { tx_hash: string; sender_account_id: string; wait_until?: TxExecutionStatus }
  | { signed_tx_base64: string; wait_until?: TxExecutionStatus }

const InvalidTransaction = errorVariantWith('INVALID_TRANSACTION', { context: z.unknown() })

/** Pre-structured nodes report invalid transactions as a bare `{TxExecutionError: {InvalidTxError}}`. */
const LegacyInvalidTransaction = z
  .object({ TxExecutionError: z.object({ InvalidTxError: z.unknown() }) })
  .transform((legacy) => ({
    name: 'INVALID_TRANSACTION' as const,
    info: { context: legacy.TxExecutionError.InvalidTxError }
  }))

export const RpcTransactionError = z.union([
  InvalidTransaction,
  LegacyInvalidTransaction,
  errorVariant('DOES_NOT_TRACK_SHARD'),
  errorVariantWith('REQUEST_ROUTED', { transaction_hash: CryptoHash }),
  errorVariantWith('UNKNOWN_TRANSACTION', { requested_transaction_hash: CryptoHash }),
  errorVariantWith('INTERNAL_ERROR', { debug_info: z.string() }),
  errorVariant('TIMEOUT_ERROR')
])
export type RpcTransactionError = z.infer<typeof RpcTransactionError>

function encodeLookup(lookup: TransactionLookup) {
  return 'tx_hash' in lookup
    ? compact({ tx_hash: lookup.tx_hash, sender_account_id: lookup.sender_account_id, wait_until: lookup.wait_until })
    : compact({ signed_tx_base64: lookup.signed_tx_base64, wait_until: lookup.wait_until })
}

/** Status of a transaction, waiting server-side until `wait_until` is reached. */
export const tx = defineMethod({
  method: 'tx',
  params: encodeLookup,
  result: TransactionResult,
  error: RpcTransactionError,
  resultName: 'TransactionResult'
})

export const sendTx = defineMethod({
  method: 'send_tx',
  params: (signedTxBase64: string, waitUntil?: TxExecutionStatus) =>
    compact({ signed_tx_base64: signedTxBase64, wait_until: waitUntil }),
  result: TransactionResult,
  error: RpcTransactionError,
  resultName: 'TransactionResult'
})

/** Returns the transaction hash immediately; no handler errors are defined. */
export const broadcastTxAsync = defineMethod({
  method: 'broadcast_tx_async',
  params: (signedTxBase64: string) => [signedTxBase64],
  result: CryptoHash,
  resultName: 'CryptoHash'
})

export const broadcastTxCommit = defineMethod({
  method: 'broadcast_tx_commit',
  params: (signedTxBase64: string) => [signedTxBase64],
  result: TransactionResult,
  error: RpcTransactionError,
  resultName: 'TransactionResult'
})

/* ------------------------------ light client ------------------------------ */

export type LightClientProofRequest =
  | { type: 'transaction'; transaction_hash: string; sender_id: string; light_client_head: string }
  | { type: 'receipt'; receipt_id: string; receiver_id: string; light_client_head: string }

export const LightClientProof = z
  .object({
    outcome_proof: z.record(z.unknown()),
    outcome_root_proof: z.array(z.unknown()),
    block_header_lite: z.record(z.unknown()),
    block_proof: z.array(z.unknown())
  })
  .passthrough()
export type LightClientProof = z.infer<typeof LightClientProof>

export const RpcLightClientProofError = z.union([
  UnknownBlock,
  errorVariantWith('INCONSISTENT_STATE', { number_or_shards: z.number(), execution_outcome_shard_id: z.number() }),
  errorVariantWith('NOT_CONFIRMED', { transaction_or_receipt_id: CryptoHash }),
  errorVariantWith('UNKNOWN_TRANSACTION_OR_RECEIPT', { transaction_or_receipt_id: CryptoHash }),
  errorVariantWith('UNAVAILABLE_SHARD', { shard_id: z.number() }),
  InternalError
])
export type RpcLightClientProofError = z.infer<typeof RpcLightClientProofError>

export const lightClientProof = defineMethod({
  method: 'light_client_proof',
  params: (req: LightClientProofRequest): JsonValue =>
    req.type === 'transaction'
      ? {
          type: req.type,
          transaction_hash: req.transaction_hash,
          sender_id: req.sender_id,
          light_client_head: req.light_client_head
        }
      : {
          type: req.type,
          receipt_id: req.receipt_id,
          receiver_id: req.receiver_id,
          light_client_head: req.light_client_head
        },
  result: LightClientProof,
  error: RpcLightClientProofError,
  resultName: 'LightClientProof'
})

const LightClientBlockView = z
  .object({
    prev_block_hash: CryptoHash,
    inner_lite: z.object({ height: z.number().int() }).passthrough()
  })
  .passthrough()

/** `null` when the node has no block newer than `last_block_hash` (sent as `{}` or `null`). */
export const LightClientBlock = z.union([
  LightClientBlockView,
  z.object({}).strict().transform(() => null),
  z.null()
])
export type LightClientBlock = z.infer<typeof LightClientBlock>

export const RpcLightClientNextBlockError = z.union([
  UnknownBlock,
  errorVariantWith('EPOCH_OUT_OF_BOUNDS', { epoch_id: CryptoHash }),
  InternalError
])
export type RpcLightClientNextBlockError = z.infer<typeof RpcLightClientNextBlockError>

export const nextLightClientBlock = defineMethod({
  method: 'next_light_client_block',
  params: (lastBlockHash: string) => ({ last_block_hash: lastBlockHash }),
  result: LightClientBlock,
  error: RpcLightClientNextBlockError,
  resultName: 'LightClientBlock'
})
