/**
 * Resolves secrets from environment variables
 *
 * Fallback after FileSecretProvider. Startup loads `.env` through
 * `import 'dotenv/config'` before this provider is consulted.
 */

import type { ISecretProvider } from '../ISecretProvider.js';

export class EnvProvider implements ISecretProvider {
  constructor(private readonly env: NodeJS.ProcessEnv = process.env) {}

  async resolve(logicalName: string): Promise<string | undefined> {
    const value = this.env[logicalName]?.trim();
    return value ? value : undefined;
  }
}
