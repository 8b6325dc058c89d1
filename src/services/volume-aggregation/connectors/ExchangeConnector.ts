import { z } from 'zod';
import logger from '../../../utils/logger';
import { DataNormalizer, startOfUtcDay } from '../DataNormalizer';
import { ParameterError, toConnectorError, toVolumeAggregatorError } from '../ErrorHandler';
import { HttpClient } from '../HttpClient';
import { PaginationOptions, PaginationResult, paginate } from '../PaginationEngine';
import { PriceService } from '../PriceService';
import {
  Clock,
  Credential,
  DailyVolumeRecord,
  ExchangeVolumeInfo,
  HistoricalFetchResult,
  PlatformId,
  Sleep
} from '../types';

export interface ExchangeConnector {
  /** Fills-style platforms need account credentials even for history. */
  readonly requiresCredential: boolean;

  platformName(): PlatformId;

  /**
   * One record per UTC day within [start, end]. Failures come back as
   * `error` alongside whatever was gathered before them.
   */
  fetchHistoricalDaily(
    symbol: string,
    start: Date,
    end: Date,
    credential?: Credential | null
  ): Promise<HistoricalFetchResult>;

  /** Never rejects: an unusable answer is zero volume with `error` set. */
  fetchLatest24h(credential?: Credential | null): Promise<ExchangeVolumeInfo>;
}

export interface ConnectorSettings {
  symbols: string[];
  maxRetries: number;
  retryDelayMs: number;
  maxPages: number;
}

export interface ConnectorDependencies {
  http: HttpClient;
  prices: PriceService;
  settings: ConnectorSettings;
  normalizer?: DataNormalizer;
  clock?: Clock;
  sleep?: Sleep;
}

type EngineOptions<TItem, TCursor> = Omit<
  PaginationOptions<TItem, TCursor>,
  'maxPages' | 'maxRetries' | 'retryDelayMs' | 'sleep'
>;

/**
 * HTTP, pagination and error plumbing shared by every platform. Subclasses
 * only speak their wire protocol.
 */
export abstract class BaseExchangeConnector implements ExchangeConnector {
  abstract readonly requiresCredential: boolean;

  protected readonly http: HttpClient;
  protected readonly prices: PriceService;
  protected readonly settings: ConnectorSettings;
  protected readonly normalizer: DataNormalizer;
  protected readonly clock: Clock;
  protected readonly sleep?: Sleep;

  constructor(deps: ConnectorDependencies) {
    this.http = deps.http;
    this.prices = deps.prices;
    this.settings = deps.settings;
    this.normalizer = deps.normalizer ?? new DataNormalizer();
    this.clock = deps.clock ?? Date.now;
    this.sleep = deps.sleep;
  }

  abstract platformName(): PlatformId;

  protected abstract fetchDaily(
    symbol: string,
    start: Date,
    end: Date,
    credential: Credential | null
  ): Promise<HistoricalFetchResult>;

  protected abstract fetch24h(credential: Credential | null): Promise<ExchangeVolumeInfo>;

  get symbols(): string[] {
    return this.settings.symbols;
  }

  async fetchHistoricalDaily(
    symbol: string,
    start: Date,
    end: Date,
    credential: Credential | null = null
  ): Promise<HistoricalFetchResult> {
    try {
      if (start.getTime() > end.getTime()) {
        throw new ParameterError(`Start ${start.toISOString()} is after end ${end.toISOString()}`);
      }
      return await this.fetchDaily(symbol, start, end, credential);
    } catch (error) {
      const connectorError = toConnectorError(error);
      logger.error(`Error fetching ${this.platformName()} history for ${symbol}:`, error);
      return { records: [], error: connectorError };
    }
  }

  async fetchLatest24h(credential: Credential | null = null): Promise<ExchangeVolumeInfo> {
    try {
      return await this.fetch24h(credential);
    } catch (error) {
      return this.failedInfo(this.scopeLabel(), error);
    }
  }

  /** Symbol reported on the 24h entry. */
  protected abstract scopeLabel(): string;

  protected paginate<TItem, TCursor>(options: EngineOptions<TItem, TCursor>): Promise<PaginationResult<TItem>> {
    return paginate({
      ...options,
      maxPages: this.settings.maxPages,
      maxRetries: this.settings.maxRetries,
      retryDelayMs: this.settings.retryDelayMs,
      sleep: this.sleep
    });
  }

  /** Parses rows one by one; malformed rows are logged and dropped. */
  protected parseItems<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, rows: unknown[], label: string): T[] {
    const items: T[] = [];
    rows.forEach((row, index) => {
      const parsed = schema.safeParse(row);
      if (parsed.success) {
        items.push(parsed.data);
      } else {
        const issue = parsed.error.issues[0];
        logger.warn(`${label}: skipping malformed item ${index}: ${issue ? issue.message : 'invalid'}`);
      }
    });
    return items;
  }

  /** USD value of one unit of the market's quote asset. */
  protected async quoteToUsd(symbol: string, asOf?: Date): Promise<number> {
    const { quote } = this.normalizer.parseMarket(this.platformName(), symbol);
    return this.prices.usdPrice(quote, asOf);
  }

  protected async convertRecords(
    records: DailyVolumeRecord[],
    asset: string,
    start: Date,
    end: Date
  ): Promise<DailyVolumeRecord[]> {
    const inRange = this.normalizer.filterRange(records, start, end);
    return this.normalizer.convertToUsd(inRange, asset, (symbol, asOf) => this.prices.usdPrice(symbol, asOf));
  }

  protected windowStart(start: Date): number {
    return startOfUtcDay(start.getTime());
  }

  protected volumeInfo(symbol: string, volume24hUsd: number, error?: unknown): ExchangeVolumeInfo {
    const info: ExchangeVolumeInfo = {
      platform: this.platformName(),
      symbol,
      volume24hUsd,
      timestamp: new Date(this.clock())
    };
    if (error !== undefined) {
      const normalized = toVolumeAggregatorError(error);
      info.error = normalized.message;
      info.errorKind = normalized.kind;
    }
    return info;
  }

  protected failedInfo(symbol: string, error: unknown): ExchangeVolumeInfo {
    logger.warn(`${this.platformName()} 24h volume unavailable:`, error);
    return this.volumeInfo(symbol, 0, error);
  }
}
