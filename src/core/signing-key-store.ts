/**
 * Signing Key Store
 *
 * Holds the issuer's JSON Web Key Set and verifies compact JWS signatures
 * against it. The remote variant is backed by jose's `createRemoteJWKSet`,
 * which caches the key set across requests, refreshes it at most every
 * `cacheMaxAge`, re-fetches on an unknown `kid` no more often than
 * `cooldownDuration`, and bounds each fetch with `timeoutDuration`.
 */

import { compactVerify, createRemoteJWKSet, errors, type CompactVerifyGetKey } from 'jose';
import { GateSecurityError, SecurityErrors } from '../utils/errors.js';

export interface RemoteKeyStoreOptions {
  /** Fetch timeout in milliseconds */
  timeoutMs: number;

  /** Maximum age of the cached key set before a refresh (ms) */
  cacheMaxAgeMs: number;

  /** Minimum interval between refreshes triggered by unknown key ids (ms) */
  cooldownMs: number;
}

/**
 * Map a jose (or transport) failure onto the engine's error taxonomy.
 *
 * Key-set problems keep their own code so the audit trail can tell an
 * unreachable issuer from a forged token; both still reject the credential.
 */
export function classifyVerificationError(error: unknown): GateSecurityError {
  if (error instanceof GateSecurityError) {
    return error;
  }

  if (error instanceof errors.JOSEError) {
    switch (error.code) {
      case 'ERR_JWKS_TIMEOUT':
        return new GateSecurityError('TIMEOUT', 'Signing key fetch timed out', 504, {
          operation: 'key-fetch',
          cause: error.message,
        });
      case 'ERR_JWKS_INVALID':
      case 'ERR_JOSE_GENERIC':
        return SecurityErrors.KEY_FETCH_FAILED({ cause: error.message, joseCode: error.code });
      default:
        return SecurityErrors.SIGNATURE_INVALID({ cause: error.message, joseCode: error.code });
    }
  }

  // Anything outside jose (DNS, socket reset, TLS) came from fetching the key set
  return SecurityErrors.KEY_FETCH_FAILED({
    cause: error instanceof Error ? error.message : String(error),
  });
}

export class SigningKeyStore {
  constructor(
    private readonly resolveKey: CompactVerifyGetKey,
    private readonly algorithms: string[],
    readonly source: string = 'local'
  ) {}

  /**
   * Create a store that fetches keys from a JWKS URI
   */
  static remote(
    jwksUri: string,
    algorithms: string[],
    options: RemoteKeyStoreOptions
  ): SigningKeyStore {
    const jwks = createRemoteJWKSet(new URL(jwksUri), {
      timeoutDuration: options.timeoutMs,
      cacheMaxAge: options.cacheMaxAgeMs,
      cooldownDuration: options.cooldownMs,
    });
    return new SigningKeyStore(jwks, algorithms, jwksUri);
  }

  /**
   * Verify the credential's signature against the key matching its `kid`.
   *
   * @throws {GateSecurityError} `SIGNATURE_INVALID`, `KEY_FETCH_FAILED`,
   *   `TIMEOUT` or `ABORTED`
   */
  async verify(rawCredential: string, signal?: AbortSignal): Promise<void> {
    if (signal?.aborted) {
      throw abortedError();
    }

    const verification = compactVerify(rawCredential, this.resolveKey, {
      algorithms: this.algorithms,
    });

    try {
      await (signal ? raceAbort(verification, signal) : verification);
    } catch (error) {
      throw classifyVerificationError(error);
    }
  }
}

/**
 * Stop waiting when the caller aborts. The key-set fetch itself is shared
 * with other requests and runs to its own timeout.
 */
function raceAbort<T>(promise: Promise<T>, signal: AbortSignal): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    const onAbort = () => reject(abortedError());
    signal.addEventListener('abort', onAbort, { once: true });
    promise.then(
      (value) => {
        signal.removeEventListener('abort', onAbort);
        resolve(value);
      },
      (error: unknown) => {
        signal.removeEventListener('abort', onAbort);
        reject(error);
      }
    );
  });
}

function abortedError(): GateSecurityError {
  return new GateSecurityError('ABORTED', 'Request was cancelled', 499);
}
