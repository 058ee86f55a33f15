/**
 * Token Exchange Client (on-behalf-of delegation)
 *
 * Exchanges a validated inbound credential for a narrower-scoped credential
 * usable against the downstream API.
 *
 * - Cache first, keyed by (subject, target scope)
 * - At most one provider call in flight per key; concurrent callers share it
 * - Bounded by a timeout; never retried within a request
 * - Provider errors are kept for the audit trail, never returned to callers
 *
 * Architecture: Core → Delegation → MCP
 *
 * @see https://datatracker.ietf.org/doc/html/rfc8693
 * @see https://learn.microsoft.com/entra/identity-platform/v2-oauth2-on-behalf-of-flow
 */

import { z } from 'zod';
import type { AuditSink, ClaimSet, Clock } from '../core/types.js';
import { safeAudit } from '../core/audit-service.js';
import { GateSecurityError, SecurityErrors, isSecurityError } from '../utils/errors.js';
import { ExchangeCache } from './exchange-cache.js';
import {
  ACCESS_TOKEN_TYPE,
  JWT_BEARER_GRANT,
  TOKEN_EXCHANGE_GRANT,
  type DownstreamCredential,
  type ExchangeCacheEntry,
  type ExchangeClientConfig,
  type ExchangeClientDeps,
  type ExchangeMetrics,
  type ExchangeOptions,
} from './types.js';

const TokenResponseSchema = z
  .object({
    access_token: z.string().min(1),
    token_type: z.string().optional(),
    expires_in: z.coerce.number().positive().optional(),
    scope: z.string().optional(),
  })
  .passthrough();

const ErrorResponseSchema = z
  .object({
    error: z.string(),
    error_description: z.string().optional(),
  })
  .passthrough();

/**
 * Provider result before it is cached. `expiresAt` is absent when the
 * provider did not report a lifetime, in which case nothing is cached.
 */
interface IssuedToken {
  accessToken: string;
  tokenType: string;
  scope?: string;
  expiresAt?: number;
  issuedAt: number;
}

interface InFlightExchange {
  key: string;
  promise: Promise<IssuedToken>;
  controller: AbortController;
  waiters: number;
  settled: boolean;
}

export class TokenExchangeClient {
  private readonly inFlight = new Map<string, InFlightExchange>();
  private readonly clock: Clock;
  private readonly audit?: AuditSink;
  private readonly fetchImpl?: typeof fetch;
  private counters = { hits: 0, misses: 0, exchanges: 0, coalesced: 0, failures: 0 };

  constructor(
    private readonly config: ExchangeClientConfig,
    private readonly cache: ExchangeCache,
    deps: ExchangeClientDeps = {}
  ) {
    this.validateConfig(config);
    this.clock = deps.clock ?? Date.now;
    this.audit = deps.audit;
    this.fetchImpl = deps.fetch;
  }

  /**
   * Obtain a downstream credential for the credential's subject
   *
   * @throws {GateSecurityError} `EXCHANGE_FAILED`, or `ABORTED` when the
   *   caller's signal fires first
   */
  async exchange(
    claims: ClaimSet,
    rawCredential: string,
    targetScope: string,
    options: ExchangeOptions = {}
  ): Promise<DownstreamCredential> {
    const cached = this.cache.get(claims.subject, targetScope);
    if (cached) {
      this.counters.hits++;
      console.log('[TokenExchange] CACHE HIT - using cached downstream token');
      return toCredential(cached, 'cache');
    }
    this.counters.misses++;

    const key = ExchangeCache.key(claims.subject, targetScope);
    let flight = this.inFlight.get(key);
    if (flight) {
      this.counters.coalesced++;
      console.log('[TokenExchange] Joining in-flight exchange for the same subject and scope');
    } else {
      flight = this.startExchange(key, claims, rawCredential, targetScope);
    }

    const issued = await this.waitFor(flight, options.signal);
    return toCredential(issued, 'exchange');
  }

  getMetrics(): ExchangeMetrics {
    return { ...this.counters, entries: this.cache.size };
  }

  /**
   * Forget every cached downstream credential of a subject
   */
  clearSubject(subject: string): number {
    return this.cache.clearSubject(subject);
  }

  /**
   * Abort in-flight exchanges and drop the cache
   */
  destroy(): void {
    for (const flight of this.inFlight.values()) {
      flight.controller.abort();
    }
    this.inFlight.clear();
    this.cache.clear();
  }

  // ==========================================================================
  // Private Methods
  // ==========================================================================

  private startExchange(
    key: string,
    claims: ClaimSet,
    rawCredential: string,
    targetScope: string
  ): InFlightExchange {
    const controller = new AbortController();
    const flight: InFlightExchange = {
      key,
      controller,
      waiters: 0,
      settled: false,
      promise: Promise.resolve().then(async () => {
        try {
          const issued = await this.requestToken(claims, rawCredential, targetScope, controller);
          if (issued.expiresAt !== undefined) {
            const entry: ExchangeCacheEntry = {
              accessToken: issued.accessToken,
              tokenType: issued.tokenType,
              scope: issued.scope,
              expiresAt: issued.expiresAt,
              issuedAt: issued.issuedAt,
            };
            this.cache.set(claims.subject, targetScope, entry);
          }
          return issued;
        } finally {
          flight.settled = true;
          this.release(flight);
        }
      }),
    };

    this.inFlight.set(key, flight);
    return flight;
  }

  /**
   * Await a shared exchange on behalf of one caller. When the caller aborts it
   * stops waiting; the provider call is only aborted once nobody is waiting.
   */
  private waitFor(flight: InFlightExchange, signal?: AbortSignal): Promise<IssuedToken> {
    if (signal?.aborted) {
      return Promise.reject(abortedError());
    }

    flight.waiters++;

    return new Promise<IssuedToken>((resolve, reject) => {
      const onAbort = () => {
        flight.waiters--;
        if (flight.waiters === 0 && !flight.settled) {
          console.log('[TokenExchange] All waiters cancelled - aborting provider call');
          // Later callers for the key must start a fresh exchange
          this.release(flight);
          flight.controller.abort();
        }
        reject(abortedError());
      };
      signal?.addEventListener('abort', onAbort, { once: true });

      flight.promise.then(
        (issued) => {
          signal?.removeEventListener('abort', onAbort);
          resolve(issued);
        },
        (error: unknown) => {
          signal?.removeEventListener('abort', onAbort);
          reject(error);
        }
      );
    });
  }

  private release(flight: InFlightExchange): void {
    if (this.inFlight.get(flight.key) === flight) {
      this.inFlight.delete(flight.key);
    }
  }

  private async requestToken(
    claims: ClaimSet,
    rawCredential: string,
    targetScope: string,
    controller: AbortController
  ): Promise<IssuedToken> {
    const startTime = this.clock();
    let timedOut = false;
    const timer = setTimeout(() => {
      timedOut = true;
      controller.abort();
    }, this.config.timeoutMs);

    this.counters.exchanges++;
    console.log('[TokenExchange] Making token exchange request to IDP:', {
      tokenEndpoint: this.config.tokenEndpoint,
      grantType: this.config.grantType,
      targetScope,
      clientId: this.config.clientId,
    });

    try {
      const fetchImpl = this.fetchImpl ?? fetch;
      const response = await fetchImpl(this.config.tokenEndpoint, {
        method: 'POST',
        headers: {
          'Content-Type': 'application/x-www-form-urlencoded',
          Accept: 'application/json',
        },
        body: new URLSearchParams(this.buildRequestBody(rawCredential, targetScope)).toString(),
        signal: controller.signal,
      });

      console.log('[TokenExchange] IDP response status:', response.status);

      const bodyText = await response.text();
      let body: unknown;
      try {
        body = JSON.parse(bodyText);
      } catch {
        throw SecurityErrors.EXCHANGE_FAILED({
          cause: 'malformed_response',
          httpStatus: response.status,
        });
      }

      if (!response.ok) {
        const providerError = ErrorResponseSchema.safeParse(body);
        throw SecurityErrors.EXCHANGE_FAILED({
          cause: providerError.success ? providerError.data.error : 'provider_error',
          description: providerError.success ? providerError.data.error_description : undefined,
          httpStatus: response.status,
        });
      }

      const token = TokenResponseSchema.safeParse(body);
      if (!token.success) {
        throw SecurityErrors.EXCHANGE_FAILED({
          cause: 'malformed_response',
          httpStatus: response.status,
        });
      }

      const issuedAt = this.clock();
      const issued: IssuedToken = {
        accessToken: token.data.access_token,
        tokenType: token.data.token_type ?? 'Bearer',
        scope: token.data.scope,
        issuedAt,
        expiresAt:
          token.data.expires_in !== undefined ? issuedAt + token.data.expires_in * 1000 : undefined,
      };

      console.log('[TokenExchange] Token exchange SUCCESS - received downstream token');
      await safeAudit(this.audit, {
        timestamp: new Date(issuedAt),
        source: 'delegation:token-exchange',
        userId: claims.subject,
        action: 'token_exchange',
        success: true,
        metadata: {
          targetScope,
          tokenEndpoint: this.config.tokenEndpoint,
          durationMs: issuedAt - startTime,
          cacheable: issued.expiresAt !== undefined,
        },
      });

      return issued;
    } catch (error) {
      const failure = this.toExchangeFailure(error, timedOut, controller.signal.aborted);
      this.counters.failures++;
      console.error('[TokenExchange] Token exchange FAILED:', failure.details);

      await safeAudit(this.audit, {
        timestamp: new Date(),
        source: 'delegation:token-exchange',
        userId: claims.subject,
        action: 'token_exchange',
        success: false,
        reason: failure.code,
        error: typeof failure.details?.cause === 'string' ? failure.details.cause : failure.message,
        metadata: {
          targetScope,
          tokenEndpoint: this.config.tokenEndpoint,
          durationMs: this.clock() - startTime,
        },
      });

      throw failure;
    } finally {
      clearTimeout(timer);
    }
  }

  private toExchangeFailure(
    error: unknown,
    timedOut: boolean,
    aborted: boolean
  ): GateSecurityError {
    if (timedOut) {
      return SecurityErrors.EXCHANGE_FAILED({
        cause: 'timeout',
        code: 'TIMEOUT',
        timeoutMs: this.config.timeoutMs,
      });
    }
    if (aborted) {
      return abortedError();
    }
    if (isSecurityError(error)) {
      return error;
    }
    return SecurityErrors.EXCHANGE_FAILED({
      cause: 'request_failed',
      description: error instanceof Error ? error.message : String(error),
    });
  }

  /**
   * Build the form body for the configured grant convention
   */
  private buildRequestBody(rawCredential: string, targetScope: string): Record<string, string> {
    const common = {
      client_id: this.config.clientId,
      client_secret: this.config.clientSecret,
      scope: targetScope,
    };

    if (this.config.grantType === 'jwt-bearer') {
      return {
        grant_type: JWT_BEARER_GRANT,
        assertion: rawCredential,
        requested_token_use: 'on_behalf_of',
        ...common,
      };
    }

    return {
      grant_type: TOKEN_EXCHANGE_GRANT,
      subject_token: rawCredential,
      subject_token_type: ACCESS_TOKEN_TYPE,
      requested_token_type: ACCESS_TOKEN_TYPE,
      ...common,
    };
  }

  private validateConfig(config: ExchangeClientConfig): void {
    if (!config.tokenEndpoint) {
      throw SecurityErrors.CONFIGURATION_ERROR('token exchange config missing tokenEndpoint');
    }
    if (!config.clientId || !config.clientSecret) {
      throw SecurityErrors.CONFIGURATION_ERROR(
        'token exchange config missing clientId or clientSecret'
      );
    }

    // Allow HTTP in development/test mode only
    const isDev = process.env.NODE_ENV === 'development' || process.env.NODE_ENV === 'test';
    if (!isDev && !config.tokenEndpoint.startsWith('https://')) {
      throw SecurityErrors.CONFIGURATION_ERROR('token endpoint must use HTTPS in production');
    }
  }
}

function toCredential(
  token: IssuedToken | ExchangeCacheEntry,
  source: 'exchange' | 'cache'
): DownstreamCredential {
  return {
    accessToken: token.accessToken,
    tokenType: token.tokenType,
    expiresAt: token.expiresAt,
    scope: token.scope,
    source,
  };
}

function abortedError(): GateSecurityError {
  return new GateSecurityError('ABORTED', 'Request was cancelled', 499);
}
