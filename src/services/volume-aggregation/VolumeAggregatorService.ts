import { EventEmitter } from 'events';
import logger from '../../utils/logger';
import { CredentialProvider } from '../../config/secrets';
import { HistoricalVolumeRepository } from '../database/VolumeRepository';
import { CacheService, CacheStats } from './CacheService';
import { DAY_MS, compactDay, startOfUtcDay } from './DataNormalizer';
import {
  ParameterError,
  TransientNetworkError,
  VolumeAggregatorErrorHandler,
  errorMessage,
  toConnectorError,
  toVolumeAggregatorError
} from './ErrorHandler';
import { RateLimitStatus, RateLimiter } from './RateLimiter';
import { ExchangeConnector } from './connectors/ExchangeConnector';
import { aggregatedVolumeSchema, historicalPointsSchema } from './schemas';
import {
  AggregatedHistoricalPoint,
  AggregatedVolume,
  Clock,
  Credential,
  ExchangeVolumeInfo,
  FetchStatus,
  HistoricalFetchResult,
  PlatformFetchResult,
  PlatformId
} from './types';

export const CURRENT_VOLUME_CACHE_KEY = 'current_aggregated_volume';

export function historicalCacheKey(start: Date, end: Date): string {
  return `historical_aggregated_volume_${compactDay(start)}_${compactDay(end)}`;
}

export interface VolumeAggregatorServiceOptions {
  connectors: ExchangeConnector[];
  credentials: CredentialProvider;
  repository: HistoricalVolumeRepository;
  cache: CacheService;
  /** Markets to backfill per platform. */
  symbols: Partial<Record<PlatformId, string[]>>;
  platformTimeoutMs: number;
  historicalFetchDays: number;
  rateLimiter?: RateLimiter;
  clock?: Clock;
}

export interface VolumeAggregatorHealth {
  status: 'healthy' | 'degraded' | 'unhealthy';
  platforms: Array<{ platform: PlatformId; status: 'up' | 'down'; error?: string }>;
  cache: CacheStats;
  rateLimits: RateLimitStatus[];
}

/**
 * Fans requests out to every registered connector, turns per-platform
 * failures into data and memoizes the merged results.
 *
 * Events: `aggregate_refreshed` (AggregatedVolume), `backfill_completed`
 * (PlatformFetchResult[]).
 */
export class VolumeAggregatorService extends EventEmitter {
  private connectors: Map<PlatformId, ExchangeConnector> = new Map();
  private credentials: CredentialProvider;
  private repository: HistoricalVolumeRepository;
  private cache: CacheService;
  private errorHandler = new VolumeAggregatorErrorHandler();
  private readonly clock: Clock;
  private inFlightCurrent: Promise<AggregatedVolume> | null = null;
  private inFlightHistorical: Map<string, Promise<AggregatedHistoricalPoint[]>> = new Map();

  constructor(private readonly options: VolumeAggregatorServiceOptions) {
    super();
    for (const connector of options.connectors) {
      this.connectors.set(connector.platformName(), connector);
    }
    this.credentials = options.credentials;
    this.repository = options.repository;
    this.cache = options.cache;
    this.clock = options.clock ?? Date.now;
  }

  platforms(): PlatformId[] {
    return Array.from(this.connectors.keys());
  }

  /**
   * 24h volume across all platforms. Concurrent callers on a cold cache share
   * one fan-out.
   */
  async currentAggregate(): Promise<AggregatedVolume> {
    const cached = await this.cache.get(CURRENT_VOLUME_CACHE_KEY, aggregatedVolumeSchema);
    if (cached) {
      logger.debug('Returning cached aggregated volume');
      return cached;
    }

    if (!this.inFlightCurrent) {
      this.inFlightCurrent = this.computeCurrentAggregate().finally(() => {
        this.inFlightCurrent = null;
      });
    }
    return this.inFlightCurrent;
  }

  async refreshCurrentAggregate(): Promise<AggregatedVolume> {
    await this.cache.delete(CURRENT_VOLUME_CACHE_KEY);
    return this.currentAggregate();
  }

  async currentVolumeForPlatform(platform: PlatformId): Promise<ExchangeVolumeInfo> {
    const connector = this.connectors.get(platform);
    if (!connector) {
      return this.errorEntry(platform, new ParameterError(`No connector registered for ${platform}`));
    }
    const credential = await this.credentials.getCredential(platform);
    return this.settle(connector, credential);
  }

  async historicalAggregate(start: Date, end: Date): Promise<AggregatedHistoricalPoint[]> {
    if (start.getTime() > end.getTime()) {
      throw new ParameterError(`Start ${start.toISOString()} is after end ${end.toISOString()}`);
    }

    const key = historicalCacheKey(start, end);
    const cached = await this.cache.get(key, historicalPointsSchema);
    if (cached) {
      return cached;
    }

    const pending = this.inFlightHistorical.get(key);
    if (pending) {
      return pending;
    }

    const computation = this.computeHistoricalAggregate(key, start, end).finally(() => {
      this.inFlightHistorical.delete(key);
    });
    this.inFlightHistorical.set(key, computation);
    return computation;
  }

  /**
   * Backfills daily records for one platform, or for every registered one
   * concurrently. Rows already stored are left untouched.
   */
  async fetchAndStoreHistorical(
    platform: PlatformId | undefined,
    start: Date,
    end: Date
  ): Promise<PlatformFetchResult[]> {
    const targets = platform ? [platform] : this.platforms();
    logger.info(`Backfilling ${targets.join(', ')} from ${start.toISOString()} to ${end.toISOString()}`);

    // Credential store outages propagate; connector failures stay per platform
    const credentials = await Promise.all(targets.map(target => this.credentials.getCredential(target)));

    const settled = await Promise.allSettled(
      targets.map((target, index) => this.backfillPlatform(target, credentials[index], start, end))
    );

    const results = settled.map((outcome, index) => {
      if (outcome.status === 'fulfilled') {
        return outcome.value;
      }
      const message = errorMessage(outcome.reason);
      logger.error(`Backfill for ${targets[index]} failed:`, message);
      return this.fetchResult(targets[index], 'error', 0, 0, [message], message);
    });

    this.emit('backfill_completed', results);
    return results;
  }

  async fetchAndStoreHistoricalForPlatform(platform: PlatformId, start: Date, end: Date): Promise<PlatformFetchResult> {
    const credential = await this.credentials.getCredential(platform);
    return this.backfillPlatform(platform, credential, start, end);
  }

  private async backfillPlatform(
    platform: PlatformId,
    credential: Credential | null,
    start: Date,
    end: Date
  ): Promise<PlatformFetchResult> {
    const connector = this.connectors.get(platform);
    if (!connector) {
      return this.fetchResult(platform, 'error', 0, 0, [], `No connector registered for ${platform}`);
    }
    if (start.getTime() > end.getTime()) {
      return this.fetchResult(platform, 'error', 0, 0, [], 'Start date is after end date');
    }
    if (connector.requiresCredential && !credential) {
      return this.fetchResult(platform, 'error', 0, 0, [], `API key required for ${platform}`);
    }

    const symbols = this.options.symbols[platform] ?? [];
    if (symbols.length === 0) {
      return this.fetchResult(platform, 'success', 0, 0, [], 'No symbols configured');
    }

    let fetched = 0;
    let stored = 0;
    let succeeded = 0;
    const errors: string[] = [];

    for (const symbol of symbols) {
      const result = await this.fetchSymbolHistory(connector, symbol, start, end, credential);
      fetched += result.records.length;

      // Persist whatever arrived, even alongside an error
      let storeFailed = false;
      if (result.records.length > 0) {
        try {
          stored += await this.repository.insertOrIgnore(result.records);
        } catch (error) {
          storeFailed = true;
          errors.push(`${symbol}: failed to store records: ${errorMessage(error)}`);
        }
      }

      if (result.error) {
        this.errorHandler.record(platform, result.error, new Date(this.clock()));
        errors.push(`${symbol}: ${result.error.message}`);
      } else if (!storeFailed) {
        succeeded++;
      }
    }

    let status: FetchStatus = 'success';
    if (errors.length > 0) {
      status = succeeded > 0 || stored > 0 ? 'partial_success' : 'error';
    }

    logger.info(`Backfill for ${platform} finished: ${status}`, { fetched, stored, errors: errors.length });
    return this.fetchResult(platform, status, fetched, stored, errors);
  }

  /** A connector that throws instead of reporting is folded into that market's error. */
  private async fetchSymbolHistory(
    connector: ExchangeConnector,
    symbol: string,
    start: Date,
    end: Date,
    credential: Credential | null
  ): Promise<HistoricalFetchResult> {
    try {
      return await connector.fetchHistoricalDaily(symbol, start, end, credential);
    } catch (error) {
      return { records: [], error: toConnectorError(error) };
    }
  }

  /** Daily job: the trailing `historicalFetchDays` full UTC days up to yesterday. */
  async runDailyBackfill(now: number = this.clock()): Promise<PlatformFetchResult[]> {
    const todayStart = startOfUtcDay(now);
    const start = new Date(todayStart - this.options.historicalFetchDays * DAY_MS);
    const end = new Date(todayStart - 1);
    return this.fetchAndStoreHistorical(undefined, start, end);
  }

  async getHealthStatus(): Promise<VolumeAggregatorHealth> {
    const current = await this.currentAggregate();
    const platforms = current.platforms.map(entry => ({
      platform: entry.platform,
      status: entry.error ? ('down' as const) : ('up' as const),
      error: entry.error
    }));

    const up = platforms.filter(entry => entry.status === 'up').length;
    let status: VolumeAggregatorHealth['status'];
    if (up === platforms.length) status = 'healthy';
    else if (up > 0) status = 'degraded';
    else status = 'unhealthy';

    return {
      status,
      platforms,
      cache: this.cache.getStats(),
      rateLimits: this.options.rateLimiter ? this.options.rateLimiter.getStatus() : []
    };
  }

  getErrorStats(): ReturnType<VolumeAggregatorErrorHandler['getErrorStats']> {
    return this.errorHandler.getErrorStats();
  }

  async shutdown(): Promise<void> {
    logger.info('Shutting down VolumeAggregatorService...');
    try {
      await this.cache.shutdown();
    } finally {
      this.removeAllListeners();
    }
  }

  private async computeCurrentAggregate(): Promise<AggregatedVolume> {
    const connectors = Array.from(this.connectors.values());
    // Credential store outages propagate; only connector failures become data
    const credentials = await Promise.all(
      connectors.map(connector => this.credentials.getCredential(connector.platformName()))
    );

    const platforms = await Promise.all(
      connectors.map((connector, index) => this.settle(connector, credentials[index]))
    );

    // Failed platforms are listed but never counted
    const totalVolume24hUsd = platforms
      .filter(entry => !entry.error)
      .reduce((sum, entry) => sum + entry.volume24hUsd, 0);

    const aggregate: AggregatedVolume = {
      totalVolume24hUsd,
      lastUpdated: new Date(this.clock()),
      platforms
    };

    await this.cache.set(CURRENT_VOLUME_CACHE_KEY, aggregate, this.cache.config.ttl.current);

    const failed = platforms.filter(entry => entry.error).map(entry => entry.platform);
    logger.info(`Aggregated 24h volume across ${platforms.length} platforms`, {
      totalVolume24hUsd,
      failed
    });
    this.emit('aggregate_refreshed', aggregate);
    return aggregate;
  }

  private async computeHistoricalAggregate(
    key: string,
    start: Date,
    end: Date
  ): Promise<AggregatedHistoricalPoint[]> {
    const records = await this.repository.queryRange(start, end);

    // Sum every platform and market per day
    const totals = new Map<string, number>();
    for (const record of records) {
      totals.set(record.date, (totals.get(record.date) ?? 0) + record.volumeQuoteUsd);
    }

    const points = Array.from(totals.entries())
      .sort(([a], [b]) => a.localeCompare(b))
      .map(([date, totalVolumeUsd]) => ({ date, totalVolumeUsd }));

    await this.cache.set(key, points, this.cache.config.ttl.historical);
    return points;
  }

  /**
   * Runs one connector under the platform timeout. Whatever happens comes
   * back as an ExchangeVolumeInfo.
   */
  private async settle(connector: ExchangeConnector, credential: Credential | null): Promise<ExchangeVolumeInfo> {
    const platform = connector.platformName();
    let timer: NodeJS.Timeout | undefined;
    const timeout = new Promise<never>((_, reject) => {
      timer = setTimeout(
        () => reject(new TransientNetworkError(`${platform} timed out after ${this.options.platformTimeoutMs}ms`)),
        this.options.platformTimeoutMs
      );
    });

    try {
      const info = await Promise.race([connector.fetchLatest24h(credential), timeout]);
      if (info.error) {
        this.errorHandler.record(platform, { kind: info.errorKind ?? 'upstream_protocol', message: info.error });
      }
      return info;
    } catch (error) {
      return this.errorEntry(platform, error);
    } finally {
      clearTimeout(timer);
    }
  }

  private errorEntry(platform: PlatformId, error: unknown): ExchangeVolumeInfo {
    const normalized = toVolumeAggregatorError(error);
    logger.error(`Error fetching 24h volume for ${platform}:`, normalized.message);
    this.errorHandler.record(platform, toConnectorError(normalized), new Date(this.clock()));
    return {
      platform,
      symbol: 'N/A',
      volume24hUsd: 0,
      timestamp: new Date(this.clock()),
      error: normalized.message,
      errorKind: normalized.kind
    };
  }

  private fetchResult(
    platform: PlatformId,
    status: FetchStatus,
    fetched: number,
    stored: number,
    errors: string[],
    message?: string
  ): PlatformFetchResult {
    const result: PlatformFetchResult = { platform, status, fetched, stored, errors };
    if (message) {
      result.message = message;
    }
    return result;
  }
}
