/**
 * @module methods
 * Catalog of NEAR JSON-RPC methods. Each export is a factory that builds a
 * method descriptor from typed params:
 *
 *   import { methods } from 'near-typed-rpc'
 *   await client.call(methods.block({ finality: 'final' }))
 */

export * from './schemas'
export * from './chain'
export * from './query'
export * from './transactions'
export * from './experimental'
export * from './sandbox'
