/**
 * Chain and node state: blocks, chunks, gas price, node status, validators.
 *
 *   const head = await client.call(block({ finality: 'final' }))
 *   const { sync_info } = await client.call(status())
 */

import { z } from 'zod'
import { defineMethod } from '../rpc/method'
import type { JsonValue } from '../rpc/index'
import {
  AccountId,
  Balance,
  BlockHeaderView,
  BlockHeight,
  ChunkHeaderView,
  CryptoHash,
  InternalError,
  UnknownBlock,
  encodeBlockReference,
  errorVariant,
  errorVariantWith,
  type BlockId,
  type BlockReference
} from './schemas'

/* ---------------------------------- block --------------------------------- */

export const BlockView = z
  .object({
    author: AccountId,
    header: BlockHeaderView,
    chunks: z.array(ChunkHeaderView)
  })
  .passthrough()
export type BlockView = z.infer<typeof BlockView>

export const RpcBlockError = z.union([UnknownBlock, errorVariant('NOT_SYNCED_YET'), InternalError])
export type RpcBlockError = z.infer<typeof RpcBlockError>

export const block = defineMethod({
  method: 'block',
  params: (ref: BlockReference) => encodeBlockReference(ref),
  result: BlockView,
  error: RpcBlockError,
  resultName: 'BlockView'
})

/* ---------------------------------- chunk --------------------------------- */

export type ChunkReference = { chunk_id: CryptoHash } | { block_id: BlockId; shard_id: number }

export const ChunkView = z
  .object({
    author: AccountId,
    header: ChunkHeaderView,
    transactions: z.array(z.record(z.unknown())),
    receipts: z.array(z.record(z.unknown()))
  })
  .passthrough()
export type ChunkView = z.infer<typeof ChunkView>

export const RpcChunkError = z.union([
  UnknownBlock,
  errorVariantWith('INVALID_SHARD_ID', { shard_id: z.number() }),
  errorVariantWith('UNKNOWN_CHUNK', { chunk_hash: CryptoHash }),
  InternalError
])
export type RpcChunkError = z.infer<typeof RpcChunkError>

export const chunk = defineMethod({
  method: 'chunk',
  params: (ref: ChunkReference): JsonValue => ('chunk_id' in ref ? { chunk_id: ref.chunk_id } : { block_id: ref.block_id, shard_id: ref.shard_id }),
  result: ChunkView,
  error: RpcChunkError,
  resultName: 'ChunkView'
})

/* -------------------------------- gas_price ------------------------------- */

export const GasPriceView = z.object({ gas_price: Balance }).passthrough()
export type GasPriceView = z.infer<typeof GasPriceView>

export const RpcGasPriceError = z.union([UnknownBlock, InternalError])
export type RpcGasPriceError = z.infer<typeof RpcGasPriceError>

/** Gas price at `blockId`, or at the latest block when omitted. */
export const gasPrice = defineMethod({
  method: 'gas_price',
  params: (blockId: BlockId | null = null) => [blockId],
  result: GasPriceView,
  error: RpcGasPriceError,
  resultName: 'GasPriceView'
})

/* ----------------------------- health / status ---------------------------- */

export const RpcStatusError = z.union([
  errorVariant('NODE_IS_SYNCING'),
  errorVariantWith('NO_NEW_BLOCKS', { elapsed: z.unknown() }),
  errorVariantWith('EPOCH_OUT_OF_BOUNDS', { epoch_id: CryptoHash }),
  InternalError
])
export type RpcStatusError = z.infer<typeof RpcStatusError>

/** A healthy node answers with `null`. */
export const health = defineMethod({
  method: 'health',
  result: z.null(),
  error: RpcStatusError
})

export const StatusView = z
  .object({
    chain_id: z.string(),
    protocol_version: z.number().int(),
    version: z.object({ version: z.string(), build: z.string() }).passthrough(),
    sync_info: z
      .object({
        latest_block_hash: CryptoHash,
        latest_block_height: BlockHeight,
        syncing: z.boolean()
      })
      .passthrough()
  })
  .passthrough()
export type StatusView = z.infer<typeof StatusView>

export const status = defineMethod({
  method: 'status',
  result: StatusView,
  error: RpcStatusError,
  resultName: 'StatusView'
})

/* ------------------------------ network_info ------------------------------ */

export const NetworkInfoView = z
  .object({
    num_active_peers: z.number().int().nonnegative(),
    active_peers: z.array(z.object({ id: z.string() }).passthrough()),
    known_producers: z.array(z.object({ account_id: AccountId }).passthrough())
  })
  .passthrough()
export type NetworkInfoView = z.infer<typeof NetworkInfoView>

export const RpcNetworkInfoError = InternalError
export type RpcNetworkInfoError = z.infer<typeof RpcNetworkInfoError>

export const networkInfo = defineMethod({
  method: 'network_info',
  result: NetworkInfoView,
  error: RpcNetworkInfoError,
  resultName: 'NetworkInfoView'
})

/* -------------------------------- validators ------------------------------ */

/** `'latest'` asks for the current epoch. */
export type EpochReference = 'latest' | { epoch_id: CryptoHash } | { block_id: BlockId }

export const ValidatorStakeView = z
  .object({
    account_id: AccountId,
    public_key: z.string(),
    stake: Balance
  })
  .passthrough()

export const EpochValidatorInfo = z
  .object({
    current_validators: z.array(ValidatorStakeView),
    next_validators: z.array(ValidatorStakeView),
    epoch_start_height: BlockHeight
  })
  .passthrough()
export type EpochValidatorInfo = z.infer<typeof EpochValidatorInfo>

export const RpcValidatorError = z.union([
  errorVariant('UNKNOWN_EPOCH'),
  errorVariant('VALIDATOR_INFO_UNAVAILABLE'),
  InternalError
])
export type RpcValidatorError = z.infer<typeof RpcValidatorError>

export const validators = defineMethod({
  method: 'validators',
  params: (epoch: EpochReference = 'latest'): JsonValue =>
    epoch === 'latest' ? [null] : 'epoch_id' in epoch ? { epoch_id: epoch.epoch_id } : { block_id: epoch.block_id },
  result: EpochValidatorInfo,
  error: RpcValidatorError,
  resultName: 'EpochValidatorInfo'
})
