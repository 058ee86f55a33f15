/**
 * MCP Tool Factories
 */

import { createHelloTool } from './hello.js';
import { createListJunkEmailsTool } from './list-junk-emails.js';
import type { ToolFactory } from '../types.js';

export { createHelloTool } from './hello.js';
export {
  createListJunkEmailsTool,
  formatJunkMessage,
  JUNK_MESSAGES_PATH,
  type JunkMessage,
} from './list-junk-emails.js';
export {
  DownstreamRequestError,
  GraphClient,
  type GraphClientOptions,
} from './graph-client.js';

/**
 * Get all available tool factories
 *
 * @example
 * ```typescript
 * const tools = getAllToolFactories().map((factory) => factory({ graph }));
 * ```
 */
export function getAllToolFactories(): ToolFactory[] {
  return [createHelloTool, createListJunkEmailsTool];
}
