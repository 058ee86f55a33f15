/**
 * Core Module Public API
 *
 * All exports follow one-way dependency: Core → Delegation → MCP
 */

export { parseCredential } from './credential-parser.js';

export {
  ClaimsOnlyPolicy,
  SignatureVerifiedPolicy,
  checkClaims,
  qualifyScopes,
  resolveIssuers,
  TENANT_PLACEHOLDER,
} from './validation-policy.js';

export { SigningKeyStore, classifyVerificationError } from './signing-key-store.js';
export type { RemoteKeyStoreOptions } from './signing-key-store.js';

export { fetchOpenIdConfiguration } from './discovery.js';
export type { OpenIdConfiguration } from './discovery.js';

export { AuditService, InMemoryAuditStorage, safeAudit } from './audit-service.js';
export type { AuditServiceConfig, AuditStorage } from './audit-service.js';

export type {
  AuditEntry,
  AuditSink,
  ClaimExpectations,
  ClaimSet,
  Clock,
  CredentialHeader,
  EvaluateOptions,
  ParsedCredential,
  RejectionReason,
  ValidationMode,
  ValidationOutcome,
  ValidationPolicy,
} from './types.js';
