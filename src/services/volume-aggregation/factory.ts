import logger from '../../utils/logger';
import { CredentialProvider, SecretsManager } from '../../config/secrets';
import { VolumeAggregatorConfig, VolumeAggregatorConfigManager } from '../../config/VolumeAggregatorConfig';
import {
  HistoricalVolumeRepository,
  InMemoryVolumeRepository,
  SupabaseVolumeRepository
} from '../database/VolumeRepository';
import { CacheService } from './CacheService';
import { CacheStore } from './cache/CacheStore';
import { MemoryCacheStore } from './cache/MemoryCacheStore';
import { RedisCacheStore } from './cache/RedisCacheStore';
import { BybitConnector } from './connectors/BybitConnector';
import { ConnectorDependencies, ExchangeConnector } from './connectors/ExchangeConnector';
import { HyperliquidConnector } from './connectors/HyperliquidConnector';
import { ParadexConnector } from './connectors/ParadexConnector';
import { WooXConnector } from './connectors/WooXConnector';
import { HttpClient, HttpFetch } from './HttpClient';
import { CoinGeckoPriceSource, PriceService, PriceSource } from './PriceService';
import { RateLimiter } from './RateLimiter';
import { ParadexAuthenticator } from './signing/ParadexAuthenticator';
import { Clock, PlatformId, Sleep } from './types';
import { VolumeAggregatorService } from './VolumeAggregatorService';

export interface VolumeAggregatorFactoryOptions {
  config?: VolumeAggregatorConfig;
  credentials?: CredentialProvider;
  repository?: HistoricalVolumeRepository;
  cacheStore?: CacheStore;
  priceSource?: PriceSource;
  fetch?: HttpFetch;
  clock?: Clock;
  sleep?: Sleep;
}

/**
 * Wires config, cache, credentials, persistence and the enabled connectors
 * into a ready VolumeAggregatorService.
 */
export function createVolumeAggregator(options: VolumeAggregatorFactoryOptions = {}): VolumeAggregatorService {
  const config = options.config ?? new VolumeAggregatorConfigManager().getConfiguration();
  const clock = options.clock ?? Date.now;

  const cacheStore =
    options.cacheStore ??
    (config.cache.redisUrl
      ? RedisCacheStore.fromUrl(config.cache.redisUrl)
      : new MemoryCacheStore({ maxSize: config.cache.maxSize, clock }));
  const cache = new CacheService(cacheStore, { ttl: config.cache.ttl });

  const repository =
    options.repository ??
    (config.database.supabaseUrl && config.database.supabaseKey
      ? new SupabaseVolumeRepository(config.database.supabaseUrl, config.database.supabaseKey)
      : new InMemoryVolumeRepository());

  const prices = new PriceService({
    source:
      options.priceSource ??
      new CoinGeckoPriceSource({ baseUrl: config.price.endpoint, apiKey: config.price.apiKey, timeoutMs: config.http.timeoutMs, clock }),
    cache,
    ttlSeconds: config.cache.ttl.price,
    fallbackPolicy: config.price.fallbackPolicy,
    clock
  });

  const rateLimiter = new RateLimiter({ clock, sleep: options.sleep });

  const dependencies = (platform: PlatformId): ConnectorDependencies => {
    const platformConfig = config.platforms[platform];
    rateLimiter.addLimit(platform, platformConfig.rateLimit);
    return {
      http: new HttpClient({
        name: platform,
        baseUrl: platformConfig.endpoint,
        timeoutMs: config.http.timeoutMs,
        fetch: options.fetch,
        rateLimiter
      }),
      prices,
      settings: {
        symbols: platformConfig.symbols,
        maxRetries: config.retry.maxRetries,
        retryDelayMs: config.retry.retryDelayMs,
        maxPages: config.retry.maxPages
      },
      clock,
      sleep: options.sleep
    };
  };

  const connectors: ExchangeConnector[] = [];
  const symbols: Partial<Record<PlatformId, string[]>> = {};

  if (config.platforms.bybit.enabled) {
    connectors.push(new BybitConnector(dependencies('bybit')));
  }
  if (config.platforms.hyperliquid.enabled) {
    connectors.push(new HyperliquidConnector(dependencies('hyperliquid')));
  }
  if (config.platforms.woox.enabled) {
    connectors.push(new WooXConnector(dependencies('woox'), config.woox.archiveBoundaryDays));
  }
  if (config.platforms.paradex.enabled) {
    const deps = dependencies('paradex');
    const authenticator = new ParadexAuthenticator({
      http: deps.http,
      cache,
      signatureTtlSeconds: config.paradex.signatureTtlSeconds,
      chainId: config.paradex.chainId,
      clock
    });
    connectors.push(new ParadexConnector(deps, authenticator));
  }

  for (const connector of connectors) {
    symbols[connector.platformName()] = config.platforms[connector.platformName()].symbols;
  }

  logger.info('Volume aggregator created', { platforms: connectors.map(connector => connector.platformName()) });

  return new VolumeAggregatorService({
    connectors,
    credentials: options.credentials ?? SecretsManager.getInstance(),
    repository,
    cache,
    symbols,
    platformTimeoutMs: config.aggregation.platformTimeoutMs,
    historicalFetchDays: config.aggregation.historicalFetchDays,
    rateLimiter,
    clock
  });
}
