/**
 * MCP Layer Types
 *
 * Architecture: Core → Delegation → MCP
 * MCP layer CAN import from Core and Delegation
 */

import type { z } from 'zod';
import type { ClaimSet } from '../core/types.js';
import type { DownstreamCredential } from '../delegation/types.js';
import type { GraphClient } from './tools/graph-client.js';

/**
 * Session attached by the transport's authenticate hook. Holds the raw bearer
 * credential only; it is validated by the gate on every tool call.
 */
export type ToolSession = {
  accessToken: string;
  [key: string]: unknown;
};

/**
 * What a tool body receives once the gate returned Ready
 */
export interface ToolContext {
  credential: DownstreamCredential;
  claims: ClaimSet;
}

export type ToolHandler = (context: ToolContext) => Promise<string>;

export interface ToolRegistration {
  /** Tool name (unique identifier) */
  name: string;

  /** Tool description for LLM */
  description: string;

  /** Parameter schema */
  schema: z.ZodObject<z.ZodRawShape>;

  handler: ToolHandler;
}

/**
 * Services injected into tool factories
 */
export interface ToolDependencies {
  graph: GraphClient;
}

export type ToolFactory = (deps: ToolDependencies) => ToolRegistration;
