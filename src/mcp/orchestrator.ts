/**
 * Gate Orchestrator
 *
 * Builds the engine from validated configuration: the one validation policy
 * of this deployment, the exchange cache and client, the gate itself, and the
 * downstream client handed to tools. The policy is selected here, once, and
 * never changes while the process runs.
 */

import { AuditService } from '../core/audit-service.js';
import { fetchOpenIdConfiguration } from '../core/discovery.js';
import { SigningKeyStore } from '../core/signing-key-store.js';
import type { AuditEntry, ClaimExpectations, Clock, ValidationPolicy } from '../core/types.js';
import {
  ClaimsOnlyPolicy,
  SignatureVerifiedPolicy,
  TENANT_PLACEHOLDER,
  resolveIssuers,
} from '../core/validation-policy.js';
import type { GateConfig } from '../config/schemas.js';
import { DEFAULT_DISCOVERY_TEMPLATE } from '../config/schemas.js';
import { ExchangeCache } from '../delegation/exchange-cache.js';
import { TokenExchangeClient } from '../delegation/token-exchange.js';
import { SecurityErrors } from '../utils/errors.js';
import { DelegationGate } from './delegation-gate.js';
import { GraphClient } from './tools/graph-client.js';

export interface GateContext {
  config: GateConfig;
  audit: AuditService;
  policy: ValidationPolicy;
  exchangeClient?: TokenExchangeClient;
  gate: DelegationGate;
  graph: GraphClient;
}

export interface OrchestratorOptions {
  config: GateConfig;

  /** HTTP implementation for the token endpoint and downstream API */
  fetch?: typeof fetch;

  clock?: Clock;

  /** Key store to use instead of the configured remote JWKS */
  keyStore?: SigningKeyStore;

  onAuditOverflow?: (entries: AuditEntry[]) => void;
}

/**
 * @example
 * ```typescript
 * const config = new ConfigManager().fromEnvironment();
 * const context = await new GateOrchestrator({ config }).buildContext();
 * const result = await context.gate.authorize(bearer);
 * ```
 */
export class GateOrchestrator {
  constructor(private readonly options: OrchestratorOptions) {}

  async buildContext(): Promise<GateContext> {
    const { config } = this.options;

    const audit = new AuditService({
      enabled: config.audit.enabled,
      maxEntries: config.audit.maxEntries,
      onOverflow: this.options.onAuditOverflow,
    });

    const policy = await this.createPolicy();
    const exchange = this.createExchange(audit);

    const gate = new DelegationGate({ policy, audit, exchange });

    const graph = new GraphClient({
      baseUrl: config.downstream.baseUrl,
      timeoutMs: config.downstream.timeoutMs,
      fetch: this.options.fetch,
    });

    console.log('[GateOrchestrator] Engine ready', {
      policy: policy.kind,
      mode: gate.mode,
      audit: audit.isEnabled(),
    });

    return {
      config,
      audit,
      policy,
      exchangeClient: exchange?.client,
      gate,
      graph,
    } satisfies GateContext;
  }

  /**
   * Select the deployment's validation policy
   */
  async createPolicy(): Promise<ValidationPolicy> {
    const { config } = this.options;
    const expectations: ClaimExpectations = {
      audience: config.audience,
      issuers: resolveIssuers(config.issuers, config.tenantId),
      requiredScopes: config.requiredScopes,
      scopePrefix: config.scopePrefix,
    };

    if (config.validation.mode === 'claims-only') {
      console.warn(
        '[GateOrchestrator] ⚠ Validation mode is claims-only: token signatures are NOT verified. ' +
          'Tokens whose header carries a proof-of-possession nonce cannot be verified by this ' +
          'service; rely on the upstream gateway having verified them.'
      );
      return new ClaimsOnlyPolicy(expectations, this.options.clock);
    }

    const keyStore = this.options.keyStore ?? (await this.createRemoteKeyStore());
    console.log(`[GateOrchestrator] Signature verification against ${keyStore.source}`);
    return new SignatureVerifiedPolicy(keyStore, expectations, this.options.clock);
  }

  /**
   * The JWKS URI from configuration, or from the issuer's discovery document
   */
  async resolveJwksUri(): Promise<string> {
    const { config } = this.options;
    if (config.validation.jwksUri) {
      return config.validation.jwksUri;
    }

    const discoveryUrl = (config.validation.discoveryUrl ?? DEFAULT_DISCOVERY_TEMPLATE)
      .split(TENANT_PLACEHOLDER)
      .join(config.tenantId);
    console.log(`[GateOrchestrator] Discovering signing keys from ${discoveryUrl}`);
    const document = await fetchOpenIdConfiguration(discoveryUrl, config.timeouts.keyFetchMs);
    return document.jwks_uri;
  }

  static async destroyContext(context: GateContext): Promise<void> {
    context.exchangeClient?.destroy();
  }

  private async createRemoteKeyStore(): Promise<SigningKeyStore> {
    const { config } = this.options;
    const jwksUri = await this.resolveJwksUri();
    return SigningKeyStore.remote(jwksUri, config.validation.algorithms, {
      timeoutMs: config.timeouts.keyFetchMs,
      cacheMaxAgeMs: config.validation.keyCacheMaxAgeMs,
      cooldownMs: config.validation.keyCooldownMs,
    });
  }

  private createExchange(
    audit: AuditService
  ): { client: TokenExchangeClient; targetScope: string } | undefined {
    const { exchange, timeouts } = this.options.config;
    if (!exchange.enabled) {
      return undefined;
    }

    if (
      !exchange.tokenEndpoint ||
      !exchange.clientId ||
      !exchange.clientSecret ||
      !exchange.targetScope
    ) {
      throw SecurityErrors.CONFIGURATION_ERROR(
        'exchange is enabled but tokenEndpoint, clientId, clientSecret or targetScope is missing'
      );
    }

    const cache = new ExchangeCache({
      safetyMarginMs: exchange.safetyMarginSeconds * 1000,
      maxEntries: exchange.maxEntries,
      clock: this.options.clock,
    });

    const client = new TokenExchangeClient(
      {
        tokenEndpoint: exchange.tokenEndpoint,
        clientId: exchange.clientId,
        clientSecret: exchange.clientSecret,
        grantType: exchange.grantType,
        timeoutMs: timeouts.exchangeMs,
      },
      cache,
      { fetch: this.options.fetch, audit, clock: this.options.clock }
    );
    return { client, targetScope: exchange.targetScope };
  }
}
