/**
 * Credential Parser
 *
 * Structural decoding only. A credential that parses is still untrusted: the
 * signature segment is never inspected here, so tokens whose signature cannot
 * be verified locally (proof-of-possession `nonce` headers) parse normally.
 */

import { decodeJwt, decodeProtectedHeader } from 'jose';
import { z } from 'zod';
import { SecurityErrors } from '../utils/errors.js';
import type { ClaimSet, CredentialHeader, ParsedCredential } from './types.js';

const ScopeClaimSchema = z.union([z.string(), z.array(z.string())]);

/**
 * Required claim shape. Anything missing or mistyped fails closed.
 */
const ClaimShapeSchema = z
  .object({
    exp: z.number().finite(),
    iss: z.string().min(1),
    aud: z.union([z.string().min(1), z.array(z.string().min(1)).min(1)]),
    sub: z.string().min(1).optional(),
    oid: z.string().min(1).optional(),
    scp: ScopeClaimSchema.optional(),
    scope: ScopeClaimSchema.optional(),
  })
  .passthrough();

function splitScopes(value: string | string[] | undefined): string[] {
  if (value === undefined) {
    return [];
  }
  const items = Array.isArray(value) ? value : value.split(' ');
  return items.map((scope) => scope.trim()).filter((scope) => scope.length > 0);
}

function optionalString(value: unknown): string | undefined {
  return typeof value === 'string' && value.length > 0 ? value : undefined;
}

/**
 * Decode a bearer credential into header fields and a claim set.
 *
 * @throws {GateSecurityError} `MALFORMED_CREDENTIAL` for anything that is not a
 *   three-segment JWT with the required claims
 */
export function parseCredential(rawCredential: string): ParsedCredential {
  if (typeof rawCredential !== 'string' || rawCredential.trim() === '') {
    throw SecurityErrors.MALFORMED_CREDENTIAL({ cause: 'empty credential' });
  }

  const segments = rawCredential.split('.');
  if (segments.length !== 3) {
    throw SecurityErrors.MALFORMED_CREDENTIAL({
      cause: `expected 3 segments, found ${segments.length}`,
    });
  }

  let payload: Record<string, unknown>;
  let header: CredentialHeader;
  try {
    const protectedHeader = decodeProtectedHeader(rawCredential);
    payload = decodeJwt(rawCredential);
    header = {
      alg: protectedHeader.alg,
      kid: protectedHeader.kid,
      typ: protectedHeader.typ,
      hasNonce: 'nonce' in protectedHeader,
    };
  } catch (error) {
    throw SecurityErrors.MALFORMED_CREDENTIAL({
      cause: error instanceof Error ? error.message : 'undecodable credential',
    });
  }

  const shape = ClaimShapeSchema.safeParse(payload);
  if (!shape.success) {
    throw SecurityErrors.MALFORMED_CREDENTIAL({
      cause: 'invalid claims',
      issues: shape.error.issues.map((issue) => issue.path.join('.') || issue.message),
    });
  }

  const subject = shape.data.sub ?? shape.data.oid;
  if (!subject) {
    throw SecurityErrors.MALFORMED_CREDENTIAL({ cause: 'missing subject claim' });
  }

  const claims: ClaimSet = {
    expiresAt: shape.data.exp,
    audience: Array.isArray(shape.data.aud) ? shape.data.aud : [shape.data.aud],
    issuer: shape.data.iss,
    scopes: splitScopes(shape.data.scp ?? shape.data.scope),
    subject,
    clientId: optionalString(payload.appid) ?? optionalString(payload.azp),
    raw: payload,
  };

  return { header, claims };
}
