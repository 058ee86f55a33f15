/**
 * Delegation Module Public API
 */

export { TokenExchangeClient } from './token-exchange.js';
export { ExchangeCache } from './exchange-cache.js';

export {
  ACCESS_TOKEN_TYPE,
  JWT_BEARER_GRANT,
  TOKEN_EXCHANGE_GRANT,
} from './types.js';

export type {
  CredentialSource,
  DownstreamCredential,
  ExchangeCacheEntry,
  ExchangeCacheOptions,
  ExchangeClientConfig,
  ExchangeClientDeps,
  ExchangeGrantType,
  ExchangeMetrics,
  ExchangeOptions,
} from './types.js';
