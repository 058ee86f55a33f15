import { readFile } from 'fs/promises';
import { z } from 'zod';
import type { AuditSink } from '../core/types.js';
import { GateSecurityError, SecurityErrors } from '../utils/errors.js';
import {
  DEFAULT_DISCOVERY_TEMPLATE,
  DEFAULT_ISSUER_TEMPLATE,
  GateConfigSchema,
  type GateConfig,
  type GateConfigInput,
} from './schemas.js';
import { EnvProvider, FileSecretProvider, SecretResolver } from './secrets/index.js';

/** Application ID of Microsoft Graph, the audience of Graph-issued tokens */
export const GRAPH_RESOURCE_ID = '00000003-0000-0000-c000-000000000000';

export const GRAPH_DEFAULT_SCOPE = 'https://graph.microsoft.com/.default';

export type DeploymentMode = 'obo' | 'pass-through';

const EnvironmentSchema = z
  .object({
    AZURE_TENANT_ID: z.string().min(1),
    AZURE_CLIENT_ID: z.string().min(1).optional(),
    AZURE_CLIENT_SECRET: z.string().min(1).optional(),
    BASE_URL: z.string().url().default('http://localhost:8000'),
    SERVER_HOST: z.string().min(1).default('0.0.0.0'),
    SERVER_PORT: z.coerce.number().int().min(1).max(65535).default(8000),
    METADATA_PORT: z.coerce.number().int().min(1).max(65535).optional(),
    GATE_MODE: z.enum(['obo', 'pass-through']).default('obo'),
  })
  .superRefine((env, ctx) => {
    if (env.GATE_MODE === 'obo') {
      for (const name of ['AZURE_CLIENT_ID', 'AZURE_CLIENT_SECRET'] as const) {
        if (!env[name]) {
          ctx.addIssue({
            code: z.ZodIssueCode.custom,
            path: [name],
            message: `${name} is required when GATE_MODE is "obo"`,
          });
        }
      }
    }
  });

export function formatZodError(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.length > 0 ? issue.path.join('.') : '(root)'}: ${issue.message}`)
    .join('; ');
}

export interface ConfigManagerOptions {
  /** Receives secret-resolution entries */
  audit?: AuditSink;

  /** Directory for file-based secrets (default: '/run/secrets') */
  secretsDir?: string;

  env?: NodeJS.ProcessEnv;
}

export class ConfigManager {
  private config: GateConfig | null = null;
  private readonly env: NodeJS.ProcessEnv;
  private readonly secretResolver: SecretResolver;

  constructor(options: ConfigManagerOptions = {}) {
    this.env = options.env ?? process.env;

    this.secretResolver = new SecretResolver({ audit: options.audit, failFast: true });
    // Mounted secret files take priority over the environment
    this.secretResolver.addProvider(new FileSecretProvider(options.secretsDir ?? '/run/secrets'));
    this.secretResolver.addProvider(new EnvProvider(this.env));
  }

  /**
   * Load a JSON configuration file, resolving `{"$secret": NAME}` descriptors
   * before validation
   *
   * @throws {GateSecurityError} CONFIGURATION_ERROR
   */
  async loadConfig(configPath?: string): Promise<GateConfig> {
    if (this.config) {
      return this.config;
    }

    const path = configPath ?? this.env.CONFIG_PATH ?? './config/gate.json';
    console.log(`[ConfigManager] Loading configuration from: ${path}`);

    let text: string;
    try {
      text = await readFile(path, 'utf-8');
    } catch (error) {
      throw SecurityErrors.CONFIGURATION_ERROR(
        `cannot read ${path}: ${error instanceof Error ? error.message : String(error)}`
      );
    }

    let document: unknown;
    try {
      document = JSON.parse(text);
    } catch (error) {
      throw SecurityErrors.CONFIGURATION_ERROR(
        `invalid JSON in ${path}: ${error instanceof Error ? error.message : String(error)}`
      );
    }

    console.log('[ConfigManager] Resolving secrets...');
    let resolved: unknown;
    try {
      resolved = await this.secretResolver.resolveSecrets(document);
    } catch (error) {
      throw SecurityErrors.CONFIGURATION_ERROR(
        error instanceof Error ? error.message : String(error)
      );
    }

    this.config = this.validate(resolved);
    console.log('[ConfigManager] Configuration loaded and validated successfully');
    return this.config;
  }

  /**
   * Build the configuration from process environment variables
   *
   * `GATE_MODE=obo` (default) validates tokens issued for this application and
   * exchanges them on-behalf-of the user for a Graph token.
   * `GATE_MODE=pass-through` accepts Graph-audience tokens (claims only, since
   * they carry a proof-of-possession nonce) and forwards them unchanged.
   *
   * @throws {GateSecurityError} CONFIGURATION_ERROR
   */
  fromEnvironment(env: NodeJS.ProcessEnv = this.env): GateConfig {
    const parsed = EnvironmentSchema.safeParse(withoutEmptyValues(env));
    if (!parsed.success) {
      throw SecurityErrors.CONFIGURATION_ERROR(formatZodError(parsed.error));
    }

    const vars = parsed.data;
    const tenantId = vars.AZURE_TENANT_ID;
    const baseUrl = vars.BASE_URL.replace(/\/+$/, '');
    const server = {
      host: vars.SERVER_HOST,
      port: vars.SERVER_PORT,
      metadataPort: vars.METADATA_PORT ?? vars.SERVER_PORT + 1,
    };
    const authorizationServers = [`https://login.microsoftonline.com/${tenantId}/v2.0`];

    let input: GateConfigInput;
    if (vars.GATE_MODE === 'obo' && vars.AZURE_CLIENT_ID && vars.AZURE_CLIENT_SECRET) {
      const identifierUri = `api://${vars.AZURE_CLIENT_ID}`;
      const userScope = `${identifierUri}/access_as_user`;
      input = {
        tenantId,
        audience: vars.AZURE_CLIENT_ID,
        issuers: [DEFAULT_ISSUER_TEMPLATE],
        requiredScopes: [userScope],
        scopePrefix: identifierUri,
        validation: { mode: 'signature', discoveryUrl: DEFAULT_DISCOVERY_TEMPLATE },
        exchange: {
          enabled: true,
          tokenEndpoint: `https://login.microsoftonline.com/${tenantId}/oauth2/v2.0/token`,
          clientId: vars.AZURE_CLIENT_ID,
          clientSecret: vars.AZURE_CLIENT_SECRET,
          targetScope: GRAPH_DEFAULT_SCOPE,
          grantType: 'jwt-bearer',
        },
        metadata: {
          resource: baseUrl,
          authorizationServers,
          scopesSupported: [userScope],
          resourceName: 'Azure OAuth OBO Demo',
        },
        server: { ...server, name: 'Azure OAuth OBO Demo' },
      };
    } else {
      input = {
        tenantId,
        audience: GRAPH_RESOURCE_ID,
        issuers: ['https://sts.windows.net/{tenantId}/'],
        requiredScopes: ['User.Read', 'Mail.Read'],
        validation: { mode: 'claims-only' },
        exchange: { enabled: false },
        metadata: {
          resource: baseUrl,
          authorizationServers,
          scopesSupported: ['User.Read', 'Mail.Read'],
          resourceName: 'Azure OAuth Demo',
        },
        server: { ...server, name: 'Azure OAuth Demo' },
      };
    }

    this.config = this.validate(input);
    console.log(`[ConfigManager] Configuration built from environment (mode: ${vars.GATE_MODE})`);
    return this.config;
  }

  getConfig(): GateConfig {
    if (!this.config) {
      throw new Error('Configuration not loaded. Call loadConfig() or fromEnvironment() first.');
    }
    return this.config;
  }

  async reloadConfig(configPath?: string): Promise<GateConfig> {
    this.config = null;
    console.log('[ConfigManager] Reloading configuration...');
    return this.loadConfig(configPath);
  }

  getSecretResolver(): SecretResolver {
    return this.secretResolver;
  }

  private validate(input: unknown): GateConfig {
    const result = GateConfigSchema.safeParse(input);
    if (!result.success) {
      throw SecurityErrors.CONFIGURATION_ERROR(formatZodError(result.error));
    }

    return result.data;
  }
}

function withoutEmptyValues(env: NodeJS.ProcessEnv): Record<string, string> {
  const result: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined && value.trim() !== '') {
      result[key] = value.trim();
    }
  }
  return result;
}

export function isConfigurationError(error: unknown): error is GateSecurityError {
  return error instanceof GateSecurityError && error.code === 'CONFIGURATION_ERROR';
}
