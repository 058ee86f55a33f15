/**
 * MCP Layer Public API
 */

export {
  AuthorizationDeniedError,
  DENIAL_MESSAGES,
  DelegationGate,
  denialStatusCode,
  requireReady,
  type AuthorizeOptions,
  type CredentialExchanger,
  type DelegationGateOptions,
  type DenialReason,
  type GateDenied,
  type GateMode,
  type GateReady,
  type GateResult,
} from './delegation-gate.js';

export {
  PROTECTED_RESOURCE_PATH,
  generateProtectedResourceMetadata,
  generateWWWAuthenticateHeader,
  resourceMetadataUrl,
  toProtectedResourceOption,
  type ProtectedResourceMetadata,
  type ProtectedResourceOption,
  type WWWAuthenticateOptions,
} from './oauth-metadata.js';

export {
  createMetadataServer,
  startHTTPServer,
  stopHTTPServer,
  type MetadataServerOptions,
} from './http-server.js';

export {
  createBearerAuthenticator,
  extractBearerToken,
  type BearerAuthOptions,
} from './middleware.js';

export { GateOrchestrator, type GateContext, type OrchestratorOptions } from './orchestrator.js';
export { DelegatedToolServer, createToolExecutor } from './server.js';

export * from './tools/index.js';

export type {
  ToolContext,
  ToolDependencies,
  ToolFactory,
  ToolHandler,
  ToolRegistration,
  ToolSession,
} from './types.js';
