// Main service exports
export { VolumeAggregatorService, CURRENT_VOLUME_CACHE_KEY, historicalCacheKey } from './VolumeAggregatorService';

// Configuration exports
export { VolumeAggregatorConfigManager } from '../../config/VolumeAggregatorConfig';
export { SecretsManager, EnvCredentialProvider } from '../../config/secrets';

// Core service exports
export { CacheService } from './CacheService';
export { MemoryCacheStore } from './cache/MemoryCacheStore';
export { RedisCacheStore } from './cache/RedisCacheStore';
export { RateLimiter } from './RateLimiter';
export { paginate } from './PaginationEngine';
export { PriceService, CoinGeckoPriceSource } from './PriceService';
export { DataNormalizer } from './DataNormalizer';
export { HttpClient } from './HttpClient';
export * from './ErrorHandler';

// Signing
export { canonicalQuery, signRequest, hmacAuthHeaders } from './signing/hmacSigner';
export { buildAuthTypedData, signTypedData, verifyTypedData } from './signing/typedDataSigner';
export { ParadexAuthenticator } from './signing/ParadexAuthenticator';

// Connector exports
export { BaseExchangeConnector } from './connectors/ExchangeConnector';
export { BybitConnector } from './connectors/BybitConnector';
export { HyperliquidConnector } from './connectors/HyperliquidConnector';
export { WooXConnector } from './connectors/WooXConnector';
export { ParadexConnector } from './connectors/ParadexConnector';

// Persistence
export { SupabaseVolumeRepository, InMemoryVolumeRepository } from '../database/VolumeRepository';

// Type exports
export * from './types';
export type { ExchangeConnector, ConnectorDependencies, ConnectorSettings } from './connectors/ExchangeConnector';
export type { CacheStore } from './cache/CacheStore';
export type { PriceSource, PriceFallbackPolicy } from './PriceService';
export type { HttpFetch } from './HttpClient';
export type { CredentialProvider } from '../../config/secrets';
export type { HistoricalVolumeRepository } from '../database/VolumeRepository';
export type { VolumeAggregatorConfig, PlatformConfig } from '../../config/VolumeAggregatorConfig';

export { createVolumeAggregator } from './factory';
export type { VolumeAggregatorFactoryOptions } from './factory';
