/**
 * Delegation Gate Tests
 *
 * End-to-end authorize() behaviour over the real parser, policies, exchange
 * client and cache, with an in-process token endpoint and an injected clock.
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { AuditService, InMemoryAuditStorage } from '../../../src/core/audit-service.js';
import { SigningKeyStore } from '../../../src/core/signing-key-store.js';
import type { ClaimExpectations, ValidationPolicy } from '../../../src/core/types.js';
import {
  ClaimsOnlyPolicy,
  SignatureVerifiedPolicy,
} from '../../../src/core/validation-policy.js';
import { ExchangeCache } from '../../../src/delegation/exchange-cache.js';
import { TokenExchangeClient } from '../../../src/delegation/token-exchange.js';
import {
  AuthorizationDeniedError,
  DENIAL_MESSAGES,
  DelegationGate,
  denialStatusCode,
  requireReady,
  type CredentialExchanger,
  type GateResult,
} from '../../../src/mcp/delegation-gate.js';
import {
  TEST_AUDIENCE,
  TEST_ISSUER,
  TEST_TARGET_SCOPE,
  TEST_TOKEN_ENDPOINT,
  createFakeTokenEndpoint,
  createTestCredential,
  createTestSigningKit,
  type FakeTokenEndpoint,
} from '../../../src/testing/index.js';

const T0 = Date.UTC(2025, 0, 1);

const expectations: ClaimExpectations = {
  audience: TEST_AUDIENCE,
  issuers: [TEST_ISSUER],
  requiredScopes: ['access_as_user'],
};

function expectDenied(result: GateResult, reason: keyof typeof DENIAL_MESSAGES): void {
  expect(result).toEqual({ status: 'denied', reason, message: DENIAL_MESSAGES[reason] });
}

describe('DelegationGate', () => {
  let now: number;
  const clock = () => now;

  beforeEach(() => {
    now = T0;
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
    vi.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  describe('Pass-through variant', () => {
    let gate: DelegationGate;

    beforeEach(() => {
      gate = new DelegationGate({ policy: new ClaimsOnlyPolicy(expectations, clock) });
    });

    it('should report its mode and policy', () => {
      expect(gate.mode).toBe('pass-through');
      expect(gate.policyKind).toBe('claims-only');
    });

    it('should hand the original credential to the tool unchanged', async () => {
      const policy = new ClaimsOnlyPolicy(
        { audience: 'X', issuers: ['https://issuer/T'], requiredScopes: ['A'] },
        clock
      );
      const scenarioGate = new DelegationGate({ policy });
      const raw = createTestCredential(
        { aud: 'X', iss: 'https://issuer/T', scp: 'A B' },
        { now: T0 }
      );

      const result = await scenarioGate.authorize(raw);

      expect(result.status).toBe('ready');
      if (result.status === 'ready') {
        expect(result.mode).toBe('pass-through');
        expect(result.credential).toEqual({
          accessToken: raw,
          tokenType: 'Bearer',
          expiresAt: (T0 / 1000 + 3600) * 1000,
          source: 'pass-through',
        });
        expect(result.claims.scopes).toEqual(['A', 'B']);
      }
    });

    it('should deny the same credential when scope C is also required', async () => {
      const policy = new ClaimsOnlyPolicy(
        { audience: 'X', issuers: ['https://issuer/T'], requiredScopes: ['A', 'C'] },
        clock
      );
      const scenarioGate = new DelegationGate({ policy });
      const raw = createTestCredential(
        { aud: 'X', iss: 'https://issuer/T', scp: 'A B' },
        { now: T0 }
      );

      expectDenied(await scenarioGate.authorize(raw), 'missing-scope');
    });

    it('should deny a malformed credential', async () => {
      expectDenied(await gate.authorize('not-a-token'), 'malformed');
      expectDenied(await gate.authorize(''), 'malformed');
    });

    it('should deny an expired credential regardless of its other claims', async () => {
      const raw = createTestCredential(
        { exp: T0 / 1000 - 1, aud: 'wrong', iss: 'https://wrong', scp: 'nothing' },
        { now: T0 }
      );

      expectDenied(await gate.authorize(raw), 'expired');
    });

    it('should deny a credential for another audience', async () => {
      const raw = createTestCredential({ aud: 'api://someone-else' }, { now: T0 });

      expectDenied(await gate.authorize(raw), 'wrong-audience');
    });

    it('should deny a credential from an untrusted issuer', async () => {
      const raw = createTestCredential({ iss: 'https://evil.example/v2.0' }, { now: T0 });

      expectDenied(await gate.authorize(raw), 'wrong-issuer');
    });

    it('should deny a credential missing a required scope', async () => {
      const raw = createTestCredential({ scp: 'User.Read' }, { now: T0 });

      expectDenied(await gate.authorize(raw), 'missing-scope');
    });

    it('should deny when the policy itself fails', async () => {
      const broken: ValidationPolicy = {
        kind: 'claims-only',
        evaluate: () => Promise.reject(new Error('unexpected')),
      };
      const brokenGate = new DelegationGate({ policy: broken });

      expectDenied(await brokenGate.authorize(createTestCredential({}, { now: T0 })), 'malformed');
    });
  });

  describe('Signature policy', () => {
    it('should authorize a correctly signed credential', async () => {
      const kit = await createTestSigningKit();
      const gate = new DelegationGate({
        policy: new SignatureVerifiedPolicy(kit.keyStore, expectations, clock),
      });
      const raw = await kit.sign({
        sub: 'user-1',
        aud: TEST_AUDIENCE,
        iss: TEST_ISSUER,
        scp: 'access_as_user',
        exp: T0 / 1000 + 3600,
      });

      const result = await gate.authorize(raw);

      expect(result.status).toBe('ready');
    });

    it('should never be ready when the signing keys cannot be fetched', async () => {
      const unreachable = new SigningKeyStore(
        async () => {
          throw new Error('getaddrinfo ENOTFOUND login.example.test');
        },
        ['RS256']
      );
      const kit = await createTestSigningKit();
      const gate = new DelegationGate({
        policy: new SignatureVerifiedPolicy(unreachable, expectations, clock),
      });
      const raw = await kit.sign({
        sub: 'user-1',
        aud: TEST_AUDIENCE,
        iss: TEST_ISSUER,
        scp: 'access_as_user',
        exp: T0 / 1000 + 3600,
      });

      const results = await Promise.all([gate.authorize(raw), gate.authorize(raw)]);

      for (const result of results) {
        expectDenied(result, 'signature-invalid');
      }
    });
  });

  describe('Exchange variant', () => {
    let endpoint: FakeTokenEndpoint;
    let gate: DelegationGate;

    beforeEach(() => {
      endpoint = createFakeTokenEndpoint();
      const cache = new ExchangeCache({ safetyMarginMs: 300_000, maxEntries: 100, clock });
      const client = new TokenExchangeClient(
        {
          tokenEndpoint: TEST_TOKEN_ENDPOINT,
          clientId: 'test-client',
          clientSecret: 'test-secret',
          grantType: 'jwt-bearer',
          timeoutMs: 5000,
        },
        cache,
        { fetch: endpoint.fetch, clock }
      );
      gate = new DelegationGate({
        policy: new ClaimsOnlyPolicy(expectations, clock),
        exchange: { client, targetScope: TEST_TARGET_SCOPE },
      });
    });

    it('should report exchanged mode', () => {
      expect(gate.mode).toBe('exchanged');
    });

    it('should hand the exchanged credential to the tool', async () => {
      const result = requireReady(await gate.authorize(createTestCredential({}, { now: T0 })));

      expect(result.mode).toBe('exchanged');
      expect(result.credential.accessToken).toBe('downstream-token');
      expect(result.credential.source).toBe('exchange');
    });

    it('should not call the provider for a credential that fails validation', async () => {
      const raw = createTestCredential({ aud: 'wrong' }, { now: T0 });

      expectDenied(await gate.authorize(raw), 'wrong-audience');
      expect(endpoint.requests).toHaveLength(0);
    });

    it('should make one provider call for two sequential authorizations', async () => {
      const raw = createTestCredential({}, { now: T0 });

      const first = requireReady(await gate.authorize(raw));
      const second = requireReady(await gate.authorize(raw));

      expect(endpoint.requests).toHaveLength(1);
      expect(first.credential.source).toBe('exchange');
      expect(second.credential.source).toBe('cache');
      expect(second.credential.accessToken).toBe(first.credential.accessToken);
    });

    it('should make one provider call for concurrent authorizations', async () => {
      const raw = createTestCredential({}, { now: T0 });
      endpoint.hold();

      const pending = Array.from({ length: 5 }, () => gate.authorize(raw));
      await vi.waitFor(() => expect(endpoint.pending).toBe(1));
      endpoint.release();
      const results = (await Promise.all(pending)).map(requireReady);

      expect(endpoint.requests).toHaveLength(1);
      expect(new Set(results.map((r) => r.credential.accessToken))).toEqual(
        new Set(['downstream-token'])
      );
    });

    it('should reuse the cached credential until the safety margin, then exchange again', async () => {
      const raw = createTestCredential({}, { now: T0 });

      const first = requireReady(await gate.authorize(raw));
      expect(first.credential.source).toBe('exchange');
      expect(endpoint.requests).toHaveLength(1);

      now = T0 + 3000 * 1000;
      const second = requireReady(await gate.authorize(raw));
      expect(second.credential.source).toBe('cache');
      expect(endpoint.requests).toHaveLength(1);

      now = T0 + 3400 * 1000;
      const third = requireReady(await gate.authorize(raw));
      expect(third.credential.source).toBe('exchange');
      expect(endpoint.requests).toHaveLength(2);
    });

    it('should deny with a fixed message when the provider refuses', async () => {
      endpoint.respondWith({
        status: 400,
        body: { error: 'invalid_grant', error_description: 'AADSTS65001: consent required' },
      });

      const result = await gate.authorize(createTestCredential({}, { now: T0 }));

      expectDenied(result, 'exchange-failed');
    });
  });

  describe('Cancellation', () => {
    it('should forward the caller signal to the exchanger', async () => {
      const exchange = vi.fn<CredentialExchanger['exchange']>().mockResolvedValue({
        accessToken: 'downstream-token',
        tokenType: 'Bearer',
        source: 'exchange',
      });
      const gate = new DelegationGate({
        policy: new ClaimsOnlyPolicy(expectations, clock),
        exchange: { client: { exchange }, targetScope: TEST_TARGET_SCOPE },
      });
      const controller = new AbortController();
      const raw = createTestCredential({}, { now: T0 });

      await gate.authorize(raw, { signal: controller.signal });

      expect(exchange).toHaveBeenCalledWith(
        expect.objectContaining({ subject: 'user-1' }),
        raw,
        TEST_TARGET_SCOPE,
        { signal: controller.signal }
      );
    });
  });

  describe('Audit trail', () => {
    it('should record denials with the reason and internal code but no credential', async () => {
      const storage = new InMemoryAuditStorage();
      const gate = new DelegationGate({
        policy: new ClaimsOnlyPolicy(expectations, clock),
        audit: new AuditService({ enabled: true, storage }),
      });
      const raw = createTestCredential({ aud: 'wrong' }, { now: T0 });

      await gate.authorize(raw);

      const [entry] = storage.getEntries();
      expect(entry).toMatchObject({
        source: 'gate:authorize',
        action: 'authorize',
        userId: 'user-1',
        success: false,
        reason: 'wrong-audience',
        error: 'WRONG_AUDIENCE: Unauthorized: Token audience is not accepted',
        metadata: { mode: 'pass-through', policy: 'claims-only', code: 'WRONG_AUDIENCE' },
      });
      expect(JSON.stringify(entry)).not.toContain(raw);
    });

    it('should record successful authorizations with the credential source', async () => {
      const storage = new InMemoryAuditStorage();
      const gate = new DelegationGate({
        policy: new ClaimsOnlyPolicy(expectations, clock),
        audit: new AuditService({ enabled: true, storage }),
      });

      await gate.authorize(createTestCredential({}, { now: T0 }));

      expect(storage.getEntries()).toEqual([
        expect.objectContaining({
          success: true,
          userId: 'user-1',
          metadata: { mode: 'pass-through', policy: 'claims-only', credentialSource: 'pass-through' },
        }),
      ]);
    });
  });
});

describe('requireReady', () => {
  it('should throw the structured denial', () => {
    const denied: GateResult = {
      status: 'denied',
      reason: 'missing-scope',
      message: DENIAL_MESSAGES['missing-scope'],
    };

    expect(() => requireReady(denied)).toThrow(AuthorizationDeniedError);
    try {
      requireReady(denied);
    } catch (error) {
      expect(error).toMatchObject({
        reason: 'missing-scope',
        statusCode: 403,
        message: 'Forbidden: Token is missing required scopes',
      });
    }
  });
});

describe('denialStatusCode', () => {
  it('should pair authentication failures with 401 and authorization failures with 403', () => {
    expect(denialStatusCode('malformed')).toBe(401);
    expect(denialStatusCode('expired')).toBe(401);
    expect(denialStatusCode('signature-invalid')).toBe(401);
    expect(denialStatusCode('missing-scope')).toBe(403);
    expect(denialStatusCode('exchange-failed')).toBe(403);
  });
});
