/**
 * Shared request shapes and zod schemas for the method catalog.
 *
 * Result schemas validate only what callers commonly rely on and pass every
 * other field through untouched, so node upgrades that add fields never break
 * decoding.
 */

import { z } from 'zod'
import type { JsonValue } from '../rpc/index'

/* ─────────────────────────────── Primitives ─────────────────────────────── */

export const CryptoHash = z.string().min(1)
export const AccountId = z.string().min(1)
export const BlockHeight = z.number().int().nonnegative()
/** yoctoNEAR and gas amounts travel as decimal strings. */
export const Balance = z.string().regex(/^\d+$/, 'expected a decimal string')

export type CryptoHash = string
export type AccountId = string
export type BlockId = number | CryptoHash

export type Finality = 'optimistic' | 'near-final' | 'final'
export type SyncCheckpoint = 'genesis' | 'earliest_available'

export type BlockReference = { finality: Finality } | { block_id: BlockId } | { sync_checkpoint: SyncCheckpoint }

export type TxExecutionStatus =
  | 'NONE'
  | 'INCLUDED'
  | 'EXECUTED_OPTIMISTIC'
  | 'INCLUDED_FINAL'
  | 'EXECUTED'
  | 'FINAL'

/** Drop `undefined` members so optional fields are omitted on the wire. */
export function compact(obj: Record<string, JsonValue | undefined>): { [k: string]: JsonValue } {
  const out: { [k: string]: JsonValue } = {}
  for (const [k, v] of Object.entries(obj)) {
    if (v !== undefined) out[k] = v
  }
  return out
}

export function encodeBlockReference(ref: BlockReference): { [k: string]: JsonValue } {
  return compact({ ...ref })
}

/* ────────────────────────────── Handler errors ──────────────────────────── */

/** `{name, info?}` variant whose info is not inspected. */
export function errorVariant<N extends string>(name: N) {
  return z.object({ name: z.literal(name), info: z.record(z.unknown()).optional() })
}

/** `{name, info}` variant with the listed info fields checked. */
export function errorVariantWith<N extends string, S extends z.ZodRawShape>(name: N, info: S) {
  return z.object({ name: z.literal(name), info: z.object(info).passthrough() })
}

const ErrorMessage = { error_message: z.string() }

export const InternalError = errorVariantWith('INTERNAL_ERROR', ErrorMessage)

/** Older nodes omit `error_message` on UNKNOWN_BLOCK; it decodes as ''. */
export const UnknownBlock = z.object({
  name: z.literal('UNKNOWN_BLOCK'),
  info: z.object({ error_message: z.string().default('') }).passthrough().default({})
})

/* ──────────────────────────────── Views ─────────────────────────────────── */

export const BlockHeaderView = z
  .object({
    height: BlockHeight,
    hash: CryptoHash,
    prev_hash: CryptoHash,
    epoch_id: CryptoHash,
    timestamp: z.number(),
    gas_price: Balance
  })
  .passthrough()

export const ChunkHeaderView = z
  .object({
    chunk_hash: CryptoHash,
    shard_id: z.number().int().nonnegative(),
    height_created: BlockHeight,
    height_included: BlockHeight
  })
  .passthrough()

export const ExecutionOutcomeWithId = z
  .object({
    id: CryptoHash,
    block_hash: CryptoHash,
    outcome: z.object({ status: z.unknown() }).passthrough()
  })
  .passthrough()

/** Transaction status as returned by tx / send_tx / broadcast_tx_commit. */
export const TransactionResult = z
  .object({
    final_execution_status: z.string().optional(),
    status: z.union([z.string(), z.record(z.unknown())]).optional(),
    transaction: z.object({ hash: CryptoHash, signer_id: AccountId }).passthrough().optional(),
    transaction_outcome: ExecutionOutcomeWithId.optional(),
    receipts_outcome: z.array(ExecutionOutcomeWithId).optional()
  })
  .passthrough()
export type TransactionResult = z.infer<typeof TransactionResult>

export const StateChangeView = z
  .object({
    type: z.string(),
    cause: z.record(z.unknown()).optional(),
    change: z.record(z.unknown()).optional()
  })
  .passthrough()
