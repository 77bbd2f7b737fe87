/**
 * Auth providers turn a credential into exactly one HTTP header. A client
 * takes at most one, when it is built; see `connect({ auth })` and
 * `JsonRpcClient.withAuth`.
 *
 *   const client = connect(url, { auth: apiKey('test-key') })
 */

export type AuthScheme = 'bearer' | 'api-key'

export interface AuthProvider {
  readonly scheme: AuthScheme
  /** `[lower-case header name, value]` */
  header(): readonly [string, string]
}

/** `authorization: Bearer <token>` */
export function bearer(token: string): AuthProvider {
  return {
    scheme: 'bearer',
    header: () => ['authorization', `Bearer ${token}`]
  }
}

/** `x-api-key: <key>`, as accepted by hosted NEAR RPC providers. */
export function apiKey(key: string): AuthProvider {
  return {
    scheme: 'api-key',
    header: () => ['x-api-key', key]
  }
}

/* Client auth markers */

export interface Unauthenticated {
  readonly authenticated: false
}

export interface Authenticated {
  readonly authenticated: true
  readonly scheme: AuthScheme
}

export type AuthState = Unauthenticated | Authenticated

export const UNAUTHENTICATED: Unauthenticated = { authenticated: false }

export function authenticatedWith(provider: AuthProvider): Authenticated {
  return { authenticated: true, scheme: provider.scheme }
}
