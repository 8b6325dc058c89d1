import axios, { AxiosInstance } from 'axios';
import logger from '../../utils/logger';
import { CacheService } from './CacheService';
import { DAY_MS, isUsdStablecoin, utcDay } from './DataNormalizer';
import { PriceUnavailableError, errorMessage } from './ErrorHandler';
import { coinGeckoHistorySchema, coinGeckoSimplePriceSchema, priceEntrySchema } from './schemas';
import { Clock } from './types';

export type PriceFallbackPolicy = 'default_to_one' | 'fail_fast';

export interface PriceSource {
  readonly name: string;
  /** Resolves null when the source does not know the asset. */
  fetchUsdPrice(symbol: string, asOf: Date): Promise<number | null>;
}

const COINGECKO_IDS: Record<string, string> = {
  BTC: 'bitcoin',
  WBTC: 'wrapped-bitcoin',
  ETH: 'ethereum',
  WETH: 'weth',
  SOL: 'solana',
  BNB: 'binancecoin',
  XRP: 'ripple',
  DOGE: 'dogecoin',
  ARB: 'arbitrum',
  OP: 'optimism',
  STRK: 'starknet',
  WOO: 'woo-network',
  HYPE: 'hyperliquid',
  USDT: 'tether',
  USDC: 'usd-coin'
};

export class CoinGeckoPriceSource implements PriceSource {
  readonly name = 'coingecko';
  private readonly http: AxiosInstance;
  private readonly clock: Clock;

  constructor(options: { baseUrl: string; apiKey?: string; timeoutMs?: number; http?: AxiosInstance; clock?: Clock }) {
    this.clock = options.clock ?? Date.now;
    this.http =
      options.http ??
      axios.create({
        baseURL: options.baseUrl,
        timeout: options.timeoutMs ?? 10000,
        headers: options.apiKey ? { 'x-cg-demo-api-key': options.apiKey } : {}
      });
  }

  coinId(symbol: string): string {
    return COINGECKO_IDS[symbol.toUpperCase()] ?? symbol.toLowerCase();
  }

  async fetchUsdPrice(symbol: string, asOf: Date): Promise<number | null> {
    const id = this.coinId(symbol);

    if (this.clock() - asOf.getTime() > DAY_MS) {
      // /coins/{id}/history takes dd-mm-yyyy
      const [year, month, day] = utcDay(asOf.getTime()).split('-');
      const response = await this.http.get(`/coins/${id}/history`, {
        params: { date: `${day}-${month}-${year}`, localization: false }
      });
      const parsed = coinGeckoHistorySchema.parse(response.data);
      return parsed.market_data?.current_price?.usd ?? null;
    }

    const response = await this.http.get('/simple/price', {
      params: { ids: id, vs_currencies: 'usd' }
    });
    const parsed = coinGeckoSimplePriceSchema.parse(response.data);
    return parsed[id]?.usd ?? null;
  }
}

export interface PriceServiceOptions {
  source: PriceSource;
  cache: CacheService;
  ttlSeconds: number;
  fallbackPolicy: PriceFallbackPolicy;
  clock?: Clock;
}

// Stale prices stay readable this long after their TTL, for outage fallback
const STALE_RETENTION_SECONDS = 7 * 24 * 60 * 60;

/**
 * USD price lookup for quote and base assets. Stablecoins are pinned at 1.0;
 * everything else goes through the source with cache and stale fallback.
 */
export class PriceService {
  private readonly clock: Clock;

  constructor(private readonly options: PriceServiceOptions) {
    this.clock = options.clock ?? Date.now;
  }

  get fallbackPolicy(): PriceFallbackPolicy {
    return this.options.fallbackPolicy;
  }

  async usdPrice(symbol: string, asOf: Date = new Date(this.clock())): Promise<number> {
    const asset = symbol.toUpperCase();
    if (isUsdStablecoin(asset)) {
      return 1.0;
    }

    const now = this.clock();
    const historical = now - asOf.getTime() > DAY_MS;
    const key = historical ? `price:usd:${asset}:${utcDay(asOf.getTime())}` : `price:usd:${asset}`;

    const cached = await this.options.cache.get(key, priceEntrySchema);
    if (cached && (historical || now - cached.fetchedAt < this.options.ttlSeconds * 1000)) {
      return cached.price;
    }

    let failure: string;
    try {
      const price = await this.options.source.fetchUsdPrice(asset, asOf);
      if (price !== null && price > 0) {
        await this.options.cache.set(
          key,
          { price, fetchedAt: now },
          this.options.ttlSeconds + STALE_RETENTION_SECONDS
        );
        return price;
      }
      failure = `${this.options.source.name} has no USD price`;
    } catch (error) {
      failure = errorMessage(error);
    }

    if (cached) {
      logger.warn(`Price lookup for ${asset} failed (${failure}), using stale price from ${new Date(cached.fetchedAt).toISOString()}`);
      return cached.price;
    }

    if (this.options.fallbackPolicy === 'fail_fast') {
      throw new PriceUnavailableError(asset, failure);
    }

    logger.warn(`Price lookup for ${asset} failed (${failure}), defaulting to 1.0`);
    return 1.0;
  }
}
