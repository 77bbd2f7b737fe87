/**
 * `EXPERIMENTAL_*` methods. Their shapes change between node releases more
 * often than the stable ones; `anyMethod` is the fallback when these lag.
 */

import { z } from 'zod'
import { defineMethod } from '../rpc/method'
import {
  AccountId,
  BlockHeight,
  CryptoHash,
  InternalError,
  StateChangeView,
  TransactionResult,
  UnknownBlock,
  compact,
  encodeBlockReference,
  errorVariant,
  errorVariantWith,
  type BlockId,
  type BlockReference,
  type TxExecutionStatus
} from './schemas'
import { RpcTransactionError } from './transactions'
import { RpcValidatorError, ValidatorStakeView } from './chain'

/* --------------------------------- changes -------------------------------- */

export type StateChangesRequest =
  | { changes_type: 'account_changes'; account_ids: string[] }
  | { changes_type: 'single_access_key_changes'; keys: Array<{ account_id: string; public_key: string }> }
  | { changes_type: 'all_access_key_changes'; account_ids: string[] }
  | { changes_type: 'contract_code_changes'; account_ids: string[] }
  | { changes_type: 'data_changes'; account_ids: string[]; key_prefix_base64: string }

export const RpcStateChangesError = z.union([UnknownBlock, errorVariant('NOT_SYNCED_YET'), InternalError])
export type RpcStateChangesError = z.infer<typeof RpcStateChangesError>

export const StateChanges = z
  .object({
    block_hash: CryptoHash,
    changes: z.array(StateChangeView)
  })
  .passthrough()
export type StateChanges = z.infer<typeof StateChanges>

export const changes = defineMethod({
  method: 'EXPERIMENTAL_changes',
  params: (ref: BlockReference, request: StateChangesRequest) => compact({ ...ref, ...request }),
  result: StateChanges,
  error: RpcStateChangesError,
  resultName: 'StateChanges'
})

export const StateChangesInBlock = z
  .object({
    block_hash: CryptoHash,
    changes: z.array(z.object({ type: z.string() }).passthrough())
  })
  .passthrough()
export type StateChangesInBlock = z.infer<typeof StateChangesInBlock>

export const changesInBlock = defineMethod({
  method: 'EXPERIMENTAL_changes_in_block',
  params: (ref: BlockReference) => encodeBlockReference(ref),
  result: StateChangesInBlock,
  error: RpcStateChangesError,
  resultName: 'StateChangesInBlock'
})

/* --------------------------------- config --------------------------------- */

export const GenesisConfig = z
  .object({
    chain_id: z.string(),
    genesis_height: BlockHeight,
    protocol_version: z.number().int(),
    epoch_length: z.number().int().positive()
  })
  .passthrough()
export type GenesisConfig = z.infer<typeof GenesisConfig>

export const RpcGenesisConfigError = InternalError
export type RpcGenesisConfigError = z.infer<typeof RpcGenesisConfigError>

export const genesisConfig = defineMethod({
  method: 'EXPERIMENTAL_genesis_config',
  result: GenesisConfig,
  error: RpcGenesisConfigError,
  resultName: 'GenesisConfig'
})

export const ProtocolConfig = z
  .object({
    chain_id: z.string(),
    protocol_version: z.number().int(),
    runtime_config: z.record(z.unknown())
  })
  .passthrough()
export type ProtocolConfig = z.infer<typeof ProtocolConfig>

export const RpcProtocolConfigError = z.union([UnknownBlock, InternalError])
export type RpcProtocolConfigError = z.infer<typeof RpcProtocolConfigError>

export const protocolConfig = defineMethod({
  method: 'EXPERIMENTAL_protocol_config',
  params: (ref: BlockReference) => encodeBlockReference(ref),
  result: ProtocolConfig,
  error: RpcProtocolConfigError,
  resultName: 'ProtocolConfig'
})

/* --------------------------------- receipts ------------------------------- */

export const ReceiptView = z
  .object({
    receipt_id: CryptoHash,
    predecessor_id: AccountId,
    receiver_id: AccountId,
    receipt: z.record(z.unknown())
  })
  .passthrough()
export type ReceiptView = z.infer<typeof ReceiptView>

export const RpcReceiptError = z.union([
  errorVariantWith('UNKNOWN_RECEIPT', { receipt_id: CryptoHash }),
  InternalError
])
export type RpcReceiptError = z.infer<typeof RpcReceiptError>

export const receipt = defineMethod({
  method: 'EXPERIMENTAL_receipt',
  params: (receiptId: string) => ({ receipt_id: receiptId }),
  result: ReceiptView,
  error: RpcReceiptError,
  resultName: 'ReceiptView'
})

/* ------------------------------ tx status ------------------------------- */

/** Like `tx`, with every receipt included in the outcome. */
export const txStatus = defineMethod({
  method: 'EXPERIMENTAL_tx_status',
  params: (txHash: string, senderAccountId: string, waitUntil?: TxExecutionStatus) =>
    compact({ tx_hash: txHash, sender_account_id: senderAccountId, wait_until: waitUntil }),
  result: TransactionResult.and(z.object({ receipts: z.array(z.record(z.unknown())).optional() })),
  error: RpcTransactionError,
  resultName: 'TransactionResult'
})

/* ---------------------------- validators ordered -------------------------- */

export const validatorsOrdered = defineMethod({
  method: 'EXPERIMENTAL_validators_ordered',
  params: (blockId: BlockId | null = null) => ({ block_id: blockId }),
  result: z.array(ValidatorStakeView),
  error: RpcValidatorError,
  resultName: 'ValidatorStakeView[]'
})
