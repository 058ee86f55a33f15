/**
 * Gate Configuration Schema
 *
 * One schema for the whole deployment: which validation policy runs, whether
 * credentials are exchanged, what the metadata document advertises, and where
 * the servers listen.
 */

import { z } from 'zod';

const isDevEnvironment = (): boolean =>
  process.env.NODE_ENV === 'development' || process.env.NODE_ENV === 'test';

const secureUrl = (label: string) =>
  z
    .string()
    .url()
    .refine((url) => isDevEnvironment() || url.startsWith('https://'), {
      message: `${label} must use HTTPS (HTTP allowed in development/test)`,
    });

export const DEFAULT_ISSUER_TEMPLATE = 'https://login.microsoftonline.com/{tenantId}/v2.0';
export const DEFAULT_DISCOVERY_TEMPLATE =
  'https://login.microsoftonline.com/{tenantId}/v2.0/.well-known/openid-configuration';

// ============================================================================
// Sections
// ============================================================================

export const ValidationConfigSchema = z.object({
  mode: z
    .enum(['signature', 'claims-only'])
    .default('signature')
    .describe('claims-only skips the cryptographic check and must be chosen explicitly'),
  jwksUri: secureUrl('JWKS URI').optional(),
  discoveryUrl: z
    .string()
    .min(1)
    .optional()
    .describe('OpenID configuration URL (may contain {tenantId}); used when jwksUri is absent'),
  algorithms: z.array(z.string().min(1)).min(1).default(['RS256']),
  keyCacheMaxAgeMs: z.number().int().positive().default(600_000),
  keyCooldownMs: z.number().int().nonnegative().default(30_000),
});

export const ExchangeConfigSchema = z.object({
  enabled: z.boolean().default(false),
  tokenEndpoint: secureUrl('Token endpoint').optional(),
  clientId: z.string().min(1).optional(),
  clientSecret: z.string().min(1).optional().describe('Use {"$secret": "NAME"} in JSON files'),
  targetScope: z.string().min(1).optional(),
  grantType: z.enum(['token-exchange', 'jwt-bearer']).default('token-exchange'),
  safetyMarginSeconds: z.number().int().nonnegative().default(300),
  maxEntries: z.number().int().positive().default(1000),
});

export const TimeoutsConfigSchema = z.object({
  keyFetchMs: z.number().int().positive().default(5000),
  exchangeMs: z.number().int().positive().default(10_000),
});

export const MetadataConfigSchema = z.object({
  resource: z.string().url(),
  authorizationServers: z.array(z.string().url()).min(1),
  scopesSupported: z.array(z.string().min(1)).default([]),
  resourceName: z.string().min(1).optional(),
});

export const ServerConfigSchema = z.object({
  host: z.string().min(1).default('0.0.0.0'),
  port: z.number().int().min(1).max(65535).default(8000),
  metadataPort: z.number().int().min(1).max(65535).default(8001),
  mcpPath: z
    .string()
    .regex(/^\/[^\s]*$/, 'mcpPath must start with "/"')
    .default('/mcp'),
  name: z.string().min(1).default('Delegated Tool Server'),
  version: z
    .string()
    .regex(/^\d+\.\d+\.\d+$/, 'version must be semver (x.y.z)')
    .default('1.0.0'),
});

export const DownstreamConfigSchema = z.object({
  baseUrl: z.string().url().default('https://graph.microsoft.com/v1.0'),
  timeoutMs: z.number().int().positive().default(30_000),
});

export const AuditConfigSchema = z.object({
  enabled: z.boolean().default(false),
  maxEntries: z.number().int().positive().default(10_000),
});

// ============================================================================
// Root
// ============================================================================

export const GateConfigSchema = z
  .object({
    tenantId: z.string().min(1),
    audience: z.string().min(1).describe('Exact audience the inbound credential must carry'),
    issuers: z
      .array(z.string().min(1))
      .min(1)
      .default([DEFAULT_ISSUER_TEMPLATE])
      .describe('Accepted issuers; {tenantId} is substituted'),
    requiredScopes: z.array(z.string().min(1)).default([]),
    scopePrefix: z
      .string()
      .min(1)
      .optional()
      .describe('Prefix applied to short scope names before the scope check'),
    validation: ValidationConfigSchema.default({}),
    exchange: ExchangeConfigSchema.default({}),
    timeouts: TimeoutsConfigSchema.default({}),
    metadata: MetadataConfigSchema,
    server: ServerConfigSchema.default({}),
    downstream: DownstreamConfigSchema.default({}),
    audit: AuditConfigSchema.default({}),
  })
  .superRefine((config, ctx) => {
    if (config.exchange.enabled) {
      const required = ['tokenEndpoint', 'clientId', 'clientSecret', 'targetScope'] as const;
      for (const field of required) {
        if (!config.exchange[field]) {
          ctx.addIssue({
            code: z.ZodIssueCode.custom,
            path: ['exchange', field],
            message: `exchange.${field} is required when exchange is enabled`,
          });
        }
      }
    }

    if (config.server.port === config.server.metadataPort) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['server', 'metadataPort'],
        message: 'server.metadataPort must differ from server.port',
      });
    }
  });

export type GateConfigInput = z.input<typeof GateConfigSchema>;
export type GateConfig = z.infer<typeof GateConfigSchema>;
export type ValidationConfig = z.infer<typeof ValidationConfigSchema>;
export type ExchangeConfig = z.infer<typeof ExchangeConfigSchema>;
export type TimeoutsConfig = z.infer<typeof TimeoutsConfigSchema>;
export type MetadataConfig = z.infer<typeof MetadataConfigSchema>;
export type ServerConfig = z.infer<typeof ServerConfigSchema>;
export type DownstreamConfig = z.infer<typeof DownstreamConfigSchema>;
export type AuditConfig = z.infer<typeof AuditConfigSchema>;
