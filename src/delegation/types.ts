/**
 * Delegation Layer Types
 *
 * Architecture: Core → Delegation → MCP
 * Delegation layer CAN import from Core, but NOT from MCP
 */

import type { AuditSink, Clock } from '../core/types.js';

// ============================================================================
// Token Exchange Types
// ============================================================================

/** RFC 8693 token exchange grant */
export const TOKEN_EXCHANGE_GRANT = 'urn:ietf:params:oauth:grant-type:token-exchange';

/** RFC 7523 JWT bearer grant, used by the Microsoft identity platform for OBO */
export const JWT_BEARER_GRANT = 'urn:ietf:params:oauth:grant-type:jwt-bearer';

export const ACCESS_TOKEN_TYPE = 'urn:ietf:params:oauth:token-type:access_token';

/**
 * Request convention used against the token endpoint
 *
 * - `token-exchange`: `subject_token` + `subject_token_type` (RFC 8693)
 * - `jwt-bearer`: `assertion` + `requested_token_use=on_behalf_of`
 */
export type ExchangeGrantType = 'token-exchange' | 'jwt-bearer';

export interface ExchangeClientConfig {
  /** IDP token endpoint URL */
  tokenEndpoint: string;

  /** This service's own client credential */
  clientId: string;
  clientSecret: string;

  grantType: ExchangeGrantType;

  /** Bound on the provider call (ms) */
  timeoutMs: number;
}

export interface ExchangeClientDeps {
  /** HTTP implementation (defaults to global fetch) */
  fetch?: typeof fetch;
  audit?: AuditSink;
  clock?: Clock;
}

export interface ExchangeOptions {
  /** Caller cancellation; coalesced exchanges only abort when every waiter has */
  signal?: AbortSignal;
}

// ============================================================================
// Credentials & Cache
// ============================================================================

/**
 * Where a downstream credential came from
 */
export type CredentialSource = 'exchange' | 'cache' | 'pass-through';

/**
 * Credential handed to tool bodies. Never logged, never persisted.
 */
export interface DownstreamCredential {
  accessToken: string;
  tokenType: string;

  /** Expiry (ms since epoch) when known */
  expiresAt?: number;

  scope?: string;
  source: CredentialSource;
}

export interface ExchangeCacheEntry {
  accessToken: string;
  tokenType: string;
  scope?: string;

  /** Expiry reported by the provider (ms since epoch) */
  expiresAt: number;

  /** When the exchange completed (ms since epoch) */
  issuedAt: number;
}

export interface ExchangeCacheOptions {
  /** Entries are dropped this long before their expiry (ms) */
  safetyMarginMs: number;

  /** Upper bound on stored entries; the oldest is evicted first */
  maxEntries: number;

  clock?: Clock;
}

export interface ExchangeMetrics {
  hits: number;
  misses: number;
  exchanges: number;
  coalesced: number;
  failures: number;
  entries: number;
}
