/**
 * Core Types
 *
 * Claim sets, validation outcomes and audit entries. Nothing in this file
 * depends on the delegation or MCP layers.
 *
 * Architectural Rule: Core → Delegation → MCP
 * Files in src/core/ MUST NOT import from src/delegation/ or src/mcp/
 */

import type { GateSecurityError } from '../utils/errors.js';

// ============================================================================
// Credentials & Claims
// ============================================================================

/**
 * Structured view of a bearer credential, extracted without trusting it.
 */
export interface ClaimSet {
  /** Expiry instant (seconds since epoch) */
  expiresAt: number;

  /** Audience values (a string `aud` is normalized to a one-element array) */
  audience: string[];

  /** Issuer identifier */
  issuer: string;

  /** Granted scopes, split from the space-delimited `scp`/`scope` claim */
  scopes: string[];

  /** Opaque subject identifier (`sub`, falling back to `oid`) */
  subject: string;

  /** Client the credential was issued to (`appid` or `azp`), if present */
  clientId?: string;

  /** Untouched payload */
  raw: Record<string, unknown>;
}

/**
 * Protected header fields the engine cares about
 */
export interface CredentialHeader {
  alg?: string;
  kid?: string;
  typ?: string;

  /**
   * True when the header carries a proof-of-possession `nonce`, which makes
   * the signature unverifiable by anyone but the issuer's own resource.
   */
  hasNonce: boolean;
}

export interface ParsedCredential {
  header: CredentialHeader;
  claims: ClaimSet;
}

// ============================================================================
// Validation
// ============================================================================

/**
 * Enumerable rejection reasons, reported verbatim by the gate
 */
export type RejectionReason =
  | 'malformed'
  | 'expired'
  | 'wrong-audience'
  | 'wrong-issuer'
  | 'missing-scope'
  | 'signature-invalid';

export type ValidationOutcome =
  | { accepted: true; claims: ClaimSet }
  | { accepted: false; reason: RejectionReason; error: GateSecurityError };

export type ValidationMode = 'signature' | 'claims-only';

export interface EvaluateOptions {
  /** Cancels key-set fetches made on behalf of this evaluation */
  signal?: AbortSignal;
}

/**
 * A validation strategy. Exactly one runs per deployment.
 */
export interface ValidationPolicy {
  readonly kind: ValidationMode;
  evaluate(
    parsed: ParsedCredential,
    rawCredential: string,
    options?: EvaluateOptions
  ): Promise<ValidationOutcome>;
}

/**
 * Expected claim values, resolved from configuration at startup
 */
export interface ClaimExpectations {
  audience: string;

  /** Issuer URLs with `{tenantId}` already substituted */
  issuers: string[];

  requiredScopes: string[];

  /** Prefix applied to short scope names before the scope check */
  scopePrefix?: string;
}

/** Millisecond clock, injectable for tests */
export type Clock = () => number;

// ============================================================================
// Audit Types
// ============================================================================

/**
 * AuditEntry represents a single audit log entry.
 *
 * Entries never contain credentials, only subjects and reasons.
 */
export interface AuditEntry {
  /** Timestamp when the event occurred */
  timestamp: Date;

  /** Origin of the entry (e.g., 'gate:authorize', 'delegation:token-exchange') */
  source: string;

  /** Subject associated with the event (if known) */
  userId?: string;

  /** Action that was performed */
  action: string;

  /** Whether the action succeeded */
  success: boolean;

  /** Reason code for the result */
  reason?: string;

  /** Internal cause if the action failed */
  error?: string;

  /** Additional metadata about the event */
  metadata?: Record<string, unknown>;
}

/**
 * Anything that accepts audit entries (AuditService or a test fake)
 */
export interface AuditSink {
  log(entry: AuditEntry): Promise<void>;
}
