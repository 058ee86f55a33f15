/**
 * Configuration Module - Public API
 */

export {
  ConfigManager,
  GRAPH_DEFAULT_SCOPE,
  GRAPH_RESOURCE_ID,
  formatZodError,
  isConfigurationError,
  type ConfigManagerOptions,
  type DeploymentMode,
} from './manager.js';

export {
  AuditConfigSchema,
  DEFAULT_DISCOVERY_TEMPLATE,
  DEFAULT_ISSUER_TEMPLATE,
  DownstreamConfigSchema,
  ExchangeConfigSchema,
  GateConfigSchema,
  MetadataConfigSchema,
  ServerConfigSchema,
  TimeoutsConfigSchema,
  ValidationConfigSchema,
  type AuditConfig,
  type DownstreamConfig,
  type ExchangeConfig,
  type GateConfig,
  type GateConfigInput,
  type MetadataConfig,
  type ServerConfig,
  type TimeoutsConfig,
  type ValidationConfig,
} from './schemas.js';

export {
  EnvProvider,
  FileSecretProvider,
  SecretResolver,
  isSecretDescriptor,
  isSecretProvider,
  type ISecretProvider,
  type SecretDescriptor,
  type SecretResolverConfig,
} from './secrets/index.js';
