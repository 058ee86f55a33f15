/**
 * Secret Resolver
 *
 * Walks a parsed configuration document and replaces every
 * `{"$secret": "NAME"}` descriptor with the value returned by the first
 * provider in the chain that knows NAME. Resolution happens before schema
 * validation, so the schema only ever sees plain strings.
 *
 * ```typescript
 * const resolver = new SecretResolver();
 * resolver.addProvider(new FileSecretProvider('/run/secrets'));
 * resolver.addProvider(new EnvProvider());
 * const resolved = await resolver.resolveSecrets(JSON.parse(text));
 * ```
 */

import type { AuditSink } from '../../core/types.js';
import { safeAudit } from '../../core/audit-service.js';
import { type ISecretProvider, isSecretProvider } from './ISecretProvider.js';

export interface SecretResolverConfig {
  audit?: AuditSink;

  /** Throw when a descriptor cannot be resolved (default: true) */
  failFast?: boolean;
}

export interface SecretDescriptor {
  $secret: string;
}

export function isSecretDescriptor(value: unknown): value is SecretDescriptor {
  return (
    typeof value === 'object' &&
    value !== null &&
    !Array.isArray(value) &&
    Object.keys(value).length === 1 &&
    '$secret' in value &&
    typeof value.$secret === 'string' &&
    value.$secret.length > 0
  );
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export class SecretResolver {
  private providers: ISecretProvider[] = [];
  private readonly audit?: AuditSink;
  private readonly failFast: boolean;

  constructor(config: SecretResolverConfig = {}) {
    this.audit = config.audit;
    this.failFast = config.failFast ?? true;
  }

  /**
   * Append a provider; providers are queried in the order they were added
   */
  addProvider(provider: ISecretProvider): void {
    if (!isSecretProvider(provider)) {
      throw new Error('Provider must implement ISecretProvider interface');
    }
    this.providers.push(provider);
  }

  /**
   * Return a copy of the document with every secret descriptor resolved
   *
   * @throws {Error} when failFast is set and a descriptor cannot be resolved
   */
  async resolveSecrets(document: unknown): Promise<unknown> {
    return this.resolveNode(document, 'config');
  }

  getProviders(): ISecretProvider[] {
    return [...this.providers];
  }

  clearProviders(): void {
    this.providers = [];
  }

  private async resolveNode(node: unknown, path: string): Promise<unknown> {
    if (isSecretDescriptor(node)) {
      const value = await this.resolveSecret(node.$secret, path);
      if (value !== undefined) {
        return value;
      }

      const message = `Secret "${node.$secret}" at path "${path}" could not be resolved by any provider.`;
      if (this.failFast) {
        throw new Error(`[SecretResolver] ${message}`);
      }
      console.warn(`[SecretResolver] ${message}`);
      return node;
    }

    if (Array.isArray(node)) {
      const items: unknown[] = [];
      for (let i = 0; i < node.length; i++) {
        items.push(await this.resolveNode(node[i], `${path}[${i}]`));
      }
      return items;
    }

    if (isPlainObject(node)) {
      const result: Record<string, unknown> = {};
      for (const [key, child] of Object.entries(node)) {
        result[key] = await this.resolveNode(child, `${path}.${key}`);
      }
      return result;
    }

    return node;
  }

  private async resolveSecret(logicalName: string, path: string): Promise<string | undefined> {
    for (const provider of this.providers) {
      let value: string | undefined;
      try {
        value = await provider.resolve(logicalName);
      } catch (error) {
        console.warn(
          `[SecretResolver] Provider ${provider.constructor.name} failed to resolve "${logicalName}": ${
            error instanceof Error ? error.message : 'Unknown error'
          }`
        );
        continue;
      }

      if (value !== undefined) {
        await safeAudit(this.audit, {
          timestamp: new Date(),
          source: 'secret:resolution',
          userId: 'system',
          action: `resolve:${logicalName}`,
          success: true,
          metadata: { provider: provider.constructor.name, configPath: path },
        });
        return value;
      }
    }

    await safeAudit(this.audit, {
      timestamp: new Date(),
      source: 'secret:resolution',
      userId: 'system',
      action: `resolve:${logicalName}`,
      success: false,
      error: 'No provider could resolve this secret',
      metadata: { configPath: path },
    });
    return undefined;
  }
}
