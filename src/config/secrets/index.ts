/**
 * Secret Management Module
 */

export type { ISecretProvider } from './ISecretProvider.js';
export { isSecretProvider } from './ISecretProvider.js';
export {
  SecretResolver,
  isSecretDescriptor,
  type SecretDescriptor,
  type SecretResolverConfig,
} from './SecretResolver.js';

export { FileSecretProvider } from './providers/FileSecretProvider.js';
export { EnvProvider } from './providers/EnvProvider.js';
