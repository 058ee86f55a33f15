/**
 * Validation Policy
 *
 * Two strategies behind one `evaluate` capability, picked once at startup:
 *
 * - `SignatureVerifiedPolicy`: verifies the JWS against the issuer's key set,
 *   then applies the claim checks.
 * - `ClaimsOnlyPolicy`: claim checks only. For issuers that embed a
 *   proof-of-possession `nonce` in the header (Microsoft Graph access tokens),
 *   which no third party can verify. Never used as a fallback.
 *
 * Claim checks run in a fixed order and stop at the first failure:
 * expiry, audience, issuer, scope.
 */

import { GateSecurityError, SecurityErrors } from '../utils/errors.js';
import type { SigningKeyStore } from './signing-key-store.js';
import type {
  ClaimExpectations,
  ClaimSet,
  Clock,
  EvaluateOptions,
  ParsedCredential,
  RejectionReason,
  ValidationOutcome,
  ValidationPolicy,
} from './types.js';

export const TENANT_PLACEHOLDER = '{tenantId}';

/**
 * Substitute the tenant identifier into issuer templates
 *
 * @example
 * resolveIssuers(['https://sts.windows.net/{tenantId}/'], 'T')
 * // ['https://sts.windows.net/T/']
 */
export function resolveIssuers(templates: string[], tenantId: string): string[] {
  return templates.map((template) => template.split(TENANT_PLACEHOLDER).join(tenantId));
}

/**
 * Qualify short scope names (`access_as_user`) with a resource prefix
 * (`api://client-id/access_as_user`). Names that already contain `/` are kept.
 */
export function qualifyScopes(scopes: string[], scopePrefix?: string): string[] {
  if (!scopePrefix) {
    return scopes;
  }
  const prefix = scopePrefix.replace(/\/+$/, '');
  return scopes.map((scope) => (scope.includes('/') ? scope : `${prefix}/${scope}`));
}

function reject(reason: RejectionReason, error: GateSecurityError): ValidationOutcome {
  return { accepted: false, reason, error };
}

/**
 * Apply the ordered claim checks shared by both policies
 */
export function checkClaims(
  claims: ClaimSet,
  expectations: ClaimExpectations,
  now: number
): ValidationOutcome {
  // 1. Expiry: reaching the expiry instant is already too late
  if (now >= claims.expiresAt * 1000) {
    return reject('expired', SecurityErrors.TOKEN_EXPIRED({ exp: claims.expiresAt }));
  }

  // 2. Audience
  if (!claims.audience.includes(expectations.audience)) {
    return reject('wrong-audience', SecurityErrors.WRONG_AUDIENCE({ aud: claims.audience }));
  }

  // 3. Issuer
  if (!expectations.issuers.includes(claims.issuer)) {
    return reject('wrong-issuer', SecurityErrors.WRONG_ISSUER({ iss: claims.issuer }));
  }

  // 4. Scope (AND logic)
  const granted = new Set(qualifyScopes(claims.scopes, expectations.scopePrefix));
  const missing = expectations.requiredScopes.filter((scope) => !granted.has(scope));
  if (missing.length > 0) {
    return reject('missing-scope', SecurityErrors.MISSING_SCOPE({ missing }));
  }

  return {
    accepted: true,
    claims: { ...claims, scopes: Array.from(granted) },
  };
}

export class ClaimsOnlyPolicy implements ValidationPolicy {
  readonly kind = 'claims-only' as const;

  constructor(
    private readonly expectations: ClaimExpectations,
    private readonly clock: Clock = Date.now
  ) {}

  async evaluate(parsed: ParsedCredential): Promise<ValidationOutcome> {
    return checkClaims(parsed.claims, this.expectations, this.clock());
  }
}

export class SignatureVerifiedPolicy implements ValidationPolicy {
  readonly kind = 'signature' as const;
  private nonceWarned = false;

  constructor(
    private readonly keys: SigningKeyStore,
    private readonly expectations: ClaimExpectations,
    private readonly clock: Clock = Date.now
  ) {}

  async evaluate(
    parsed: ParsedCredential,
    rawCredential: string,
    options?: EvaluateOptions
  ): Promise<ValidationOutcome> {
    try {
      await this.keys.verify(rawCredential, options?.signal);
    } catch (error) {
      const cause =
        error instanceof GateSecurityError
          ? error
          : SecurityErrors.SIGNATURE_INVALID({ cause: String(error) });
      if (parsed.header.hasNonce && !this.nonceWarned) {
        this.nonceWarned = true;
        console.warn(
          '[ValidationPolicy] Token header carries a proof-of-possession nonce; ' +
            'such tokens cannot be signature-verified by third parties'
        );
      }
      return reject('signature-invalid', cause);
    }

    return checkClaims(parsed.claims, this.expectations, this.clock());
  }
}
