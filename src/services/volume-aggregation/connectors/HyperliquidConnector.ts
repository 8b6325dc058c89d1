import { DAY_MS, utcDay } from '../DataNormalizer';
import { UpstreamProtocolError, toConnectorError } from '../ErrorHandler';
import {
  HyperliquidCandle,
  hyperliquidAssetCtxSchema,
  hyperliquidCandleSchema,
  hyperliquidMetaAndCtxsSchema
} from '../schemas';
import { DailyVolumeRecord, ExchangeVolumeInfo, HistoricalFetchResult, PlatformId } from '../types';
import { BaseExchangeConnector } from './ExchangeConnector';

// The info endpoint returns at most this many candles per snapshot
const CANDLE_LIMIT = 5000;

export class HyperliquidConnector extends BaseExchangeConnector {
  readonly requiresCredential = false;

  platformName(): PlatformId {
    return 'hyperliquid';
  }

  protected scopeLabel(): string {
    return 'ALL_PERPETUALS';
  }

  protected async fetchDaily(symbol: string, start: Date, end: Date): Promise<HistoricalFetchResult> {
    const endMs = end.getTime();

    const result = await this.paginate<HyperliquidCandle, number>({
      label: `hyperliquid candles ${symbol}`,
      initialCursor: this.windowStart(start),
      pageSize: CANDLE_LIMIT,
      identity: candle => String(candle.t),
      timestamp: candle => candle.t,
      fetchPage: async cursor => {
        const raw = await this.http.requestJson({
          method: 'POST',
          path: '/info',
          body: {
            type: 'candleSnapshot',
            req: { coin: symbol, interval: '1d', startTime: cursor, endTime: endMs }
          }
        });
        if (!Array.isArray(raw)) {
          throw new UpstreamProtocolError(`Unexpected candleSnapshot payload for ${symbol}`);
        }

        const candles = this.parseItems(hyperliquidCandleSchema, raw, `hyperliquid candles ${symbol}`);
        const latest = Math.max(...candles.map(candle => candle.t));
        const next = latest + DAY_MS;
        return { items: candles, nextCursor: candles.length > 0 && next <= endMs ? next : null };
      }
    });

    // Candle volume is in the base coin; the open/close midpoint prices it in USD
    const records = result.items.map((candle): DailyVolumeRecord => ({
      platform: 'hyperliquid',
      symbol,
      date: utcDay(candle.t),
      open: candle.o,
      high: candle.h,
      low: candle.l,
      close: candle.c,
      volumeQuoteUsd: candle.v * ((candle.o + candle.c) / 2)
    }));

    const { quote } = this.normalizer.parseMarket('hyperliquid', symbol);
    const converted = await this.convertRecords(records, quote, start, end);
    return result.error ? { records: converted, error: toConnectorError(result.error) } : { records: converted };
  }

  protected async fetch24h(): Promise<ExchangeVolumeInfo> {
    const raw = await this.http.requestJson({
      method: 'POST',
      path: '/info',
      body: { type: 'metaAndAssetCtxs' }
    });
    const [, assetCtxs] = hyperliquidMetaAndCtxsSchema.parse(raw);

    const contexts = this.parseItems(hyperliquidAssetCtxSchema, assetCtxs, 'hyperliquid asset contexts');
    if (contexts.length === 0) {
      throw new UpstreamProtocolError('No asset contexts returned');
    }

    const total = contexts.reduce((sum, ctx) => sum + ctx.dayNtlVlm, 0);
    return this.volumeInfo(this.scopeLabel(), total);
  }
}
