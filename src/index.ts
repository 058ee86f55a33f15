/**
 * mcp-obo-gate
 *
 * Bearer credential validation and on-behalf-of delegation for MCP tool
 * servers.
 *
 * Architecture: Core → Delegation → MCP
 */

export * from './core/index.js';
export * from './delegation/index.js';
export * from './mcp/index.js';
export * from './config/index.js';

export {
  GateSecurityError,
  SecurityErrors,
  createSecurityError,
  describeCause,
  isSecurityError,
  sanitizeError,
  type SecurityErrorCode,
} from './utils/errors.js';
