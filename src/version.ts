/**
 * Library version & runtime banner.
 * The version should match package.json.
 */

export const version = '0.1.0'

const detectRuntime = (): string => {
  if (typeof process !== 'undefined' && typeof process.versions?.node === 'string') return `node ${process.versions.node}`
  return 'unknown runtime'
}

export const buildMeta = {
  version,
  runtime: detectRuntime()
}

/** Compact UA-style banner sent as the default `user-agent` header. */
export function userAgent(): string {
  return `near-typed-rpc/${version} (${buildMeta.runtime})`
}
