/**
 * Delegation Gate
 *
 * The single entry point run before any tool body:
 *
 *   Start → Parsed → Validated → (Exchanged | PassThrough) → Ready
 *
 * Any step can end in Denied, which is terminal. `authorize()` never throws;
 * every failure collapses to one of the enumerated reasons with a fixed
 * message, and the underlying cause only reaches the audit trail and logs.
 */

import { parseCredential } from '../core/credential-parser.js';
import { safeAudit } from '../core/audit-service.js';
import type {
  AuditSink,
  ClaimSet,
  ParsedCredential,
  RejectionReason,
  ValidationPolicy,
} from '../core/types.js';
import type { DownstreamCredential, ExchangeOptions } from '../delegation/types.js';
import { describeCause, isSecurityError, sanitizeError } from '../utils/errors.js';

export type DenialReason = RejectionReason | 'exchange-failed';

export type GateMode = 'exchanged' | 'pass-through';

export interface GateReady {
  status: 'ready';
  credential: DownstreamCredential;
  claims: ClaimSet;
  mode: GateMode;
}

export interface GateDenied {
  status: 'denied';
  reason: DenialReason;
  message: string;
}

export type GateResult = GateReady | GateDenied;

/**
 * Capability the gate needs from the exchange client
 */
export interface CredentialExchanger {
  exchange(
    claims: ClaimSet,
    rawCredential: string,
    targetScope: string,
    options?: ExchangeOptions
  ): Promise<DownstreamCredential>;
}

export interface DelegationGateOptions {
  policy: ValidationPolicy;

  /** Present when the deployment exchanges credentials; absent means pass-through */
  exchange?: {
    client: CredentialExchanger;
    targetScope: string;
  };

  audit?: AuditSink;
}

export interface AuthorizeOptions {
  signal?: AbortSignal;
}

/**
 * Outward messages. One per reason, carrying no provider or claim detail.
 */
export const DENIAL_MESSAGES: Readonly<Record<DenialReason, string>> = {
  malformed: 'Unauthorized: Malformed credential',
  expired: 'Unauthorized: Token has expired',
  'wrong-audience': 'Unauthorized: Token audience is not accepted',
  'wrong-issuer': 'Unauthorized: Token issuer is not trusted',
  'missing-scope': 'Forbidden: Token is missing required scopes',
  'signature-invalid': 'Unauthorized: Invalid token signature',
  'exchange-failed': 'Forbidden: Delegated token exchange failed',
};

/**
 * HTTP status conventionally paired with each reason (RFC 6750 §3.1)
 */
export function denialStatusCode(reason: DenialReason): number {
  return reason === 'missing-scope' || reason === 'exchange-failed' ? 403 : 401;
}

export class DelegationGate {
  private readonly policy: ValidationPolicy;
  private readonly exchangeTarget?: DelegationGateOptions['exchange'];
  private readonly audit?: AuditSink;

  constructor(options: DelegationGateOptions) {
    this.policy = options.policy;
    this.exchangeTarget = options.exchange;
    this.audit = options.audit;
  }

  get mode(): GateMode {
    return this.exchangeTarget ? 'exchanged' : 'pass-through';
  }

  get policyKind(): ValidationPolicy['kind'] {
    return this.policy.kind;
  }

  async authorize(rawCredential: string, options: AuthorizeOptions = {}): Promise<GateResult> {
    // Start → Parsed
    let parsed: ParsedCredential;
    try {
      parsed = parseCredential(rawCredential);
    } catch (error) {
      return this.deny('malformed', error);
    }

    // Parsed → Validated
    let claims: ClaimSet;
    try {
      const outcome = await this.policy.evaluate(parsed, rawCredential, { signal: options.signal });
      if (!outcome.accepted) {
        return this.deny(outcome.reason, outcome.error, parsed.claims.subject);
      }
      claims = outcome.claims;
    } catch (error) {
      // Indeterminate validation state is a denial
      return this.deny('malformed', error, parsed.claims.subject);
    }

    // Validated → PassThrough
    if (!this.exchangeTarget) {
      return this.ready(claims, {
        accessToken: rawCredential,
        tokenType: 'Bearer',
        expiresAt: claims.expiresAt * 1000,
        source: 'pass-through',
      });
    }

    // Validated → Exchanged
    try {
      const credential = await this.exchangeTarget.client.exchange(
        claims,
        rawCredential,
        this.exchangeTarget.targetScope,
        { signal: options.signal }
      );
      return this.ready(claims, credential);
    } catch (error) {
      return this.deny('exchange-failed', error, claims.subject);
    }
  }

  private async ready(claims: ClaimSet, credential: DownstreamCredential): Promise<GateReady> {
    console.log('[DelegationGate] ✓ Authorized', {
      mode: this.mode,
      policy: this.policy.kind,
      source: credential.source,
    });

    await safeAudit(this.audit, {
      timestamp: new Date(),
      source: 'gate:authorize',
      userId: claims.subject,
      action: 'authorize',
      success: true,
      metadata: { mode: this.mode, policy: this.policy.kind, credentialSource: credential.source },
    });

    return { status: 'ready', credential, claims, mode: this.mode };
  }

  private async deny(reason: DenialReason, cause: unknown, subject?: string): Promise<GateDenied> {
    console.log(`[DelegationGate] ❌ Denied (${reason}):`, sanitizeError(cause));

    await safeAudit(this.audit, {
      timestamp: new Date(),
      source: 'gate:authorize',
      userId: subject,
      action: 'authorize',
      success: false,
      reason,
      error: describeCause(cause),
      metadata: {
        mode: this.mode,
        policy: this.policy.kind,
        code: isSecurityError(cause) ? cause.code : undefined,
      },
    });

    return { status: 'denied', reason, message: DENIAL_MESSAGES[reason] };
  }
}

/**
 * Error thrown by tool wrappers when the gate denied the call
 */
export class AuthorizationDeniedError extends Error {
  readonly statusCode: number;

  constructor(readonly reason: DenialReason) {
    super(DENIAL_MESSAGES[reason]);
    this.name = 'AuthorizationDeniedError';
    this.statusCode = denialStatusCode(reason);
  }
}

/**
 * Narrow a gate result to Ready or throw the structured denial
 */
export function requireReady(result: GateResult): GateReady {
  if (result.status === 'denied') {
    throw new AuthorizationDeniedError(result.reason);
  }
  return result;
}
