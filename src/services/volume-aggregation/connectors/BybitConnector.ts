import { DAY_MS, utcDay } from '../DataNormalizer';
import {
  AuthError,
  ParameterError,
  RateLimitedError,
  UpstreamProtocolError,
  VolumeAggregatorError,
  toConnectorError
} from '../ErrorHandler';
import { BybitKline, bybitEnvelopeSchema, bybitKlineRowSchema, bybitTickerSchema } from '../schemas';
import {
  DailyVolumeRecord,
  ExchangeVolumeInfo,
  HistoricalFetchResult,
  PlatformId
} from '../types';
import { BaseExchangeConnector } from './ExchangeConnector';

const KLINE_LIMIT = 1000;

export type BybitCategory = 'linear' | 'inverse';

/** Maps a non-zero retCode onto the error taxonomy. */
export function bybitApiError(retCode: number, retMsg: string): VolumeAggregatorError {
  const message = `Bybit API error ${retCode}: ${retMsg}`;
  switch (retCode) {
    case 10001:
      return new ParameterError(message, 400);
    case 10003:
    case 10004:
    case 10005:
      return new AuthError(message, 401);
    case 10006:
    case 10018:
      return new RateLimitedError(message);
    case 10016:
      return new UpstreamProtocolError(message, 500);
    default:
      return new UpstreamProtocolError(message);
  }
}

/**
 * Public market data: daily klines for history, tickers for the 24h figure.
 */
export class BybitConnector extends BaseExchangeConnector {
  readonly requiresCredential = false;

  platformName(): PlatformId {
    return 'bybit';
  }

  protected scopeLabel(): string {
    return 'ALL_LINEAR_USD_PERPETUALS';
  }

  /** BTCUSD-style symbols are coin-margined inverse contracts. */
  category(symbol: string): BybitCategory {
    const upper = symbol.toUpperCase();
    return upper.endsWith('USD') ? 'inverse' : 'linear';
  }

  protected async fetchDaily(symbol: string, start: Date, end: Date): Promise<HistoricalFetchResult> {
    const category = this.category(symbol);
    const endMs = end.getTime();

    const result = await this.paginate<BybitKline, number>({
      label: `bybit kline ${symbol}`,
      initialCursor: this.windowStart(start),
      pageSize: KLINE_LIMIT,
      identity: kline => String(kline.start),
      timestamp: kline => kline.start,
      fetchPage: async cursor => {
        const raw = await this.http.requestJson({
          path: '/v5/market/kline',
          query: { category, symbol, interval: 'D', start: cursor, end: endMs, limit: KLINE_LIMIT }
        });
        const envelope = bybitEnvelopeSchema.parse(raw);
        if (envelope.retCode !== 0) {
          throw bybitApiError(envelope.retCode, envelope.retMsg);
        }

        const klines = this.parseItems(bybitKlineRowSchema, envelope.result?.list ?? [], `bybit kline ${symbol}`);
        // Rows arrive newest first
        const latest = Math.max(...klines.map(kline => kline.start));
        const next = latest + DAY_MS;
        return { items: klines, nextCursor: klines.length > 0 && next <= endMs ? next : null };
      }
    });

    const records = result.items.map((kline): DailyVolumeRecord => ({
      platform: 'bybit',
      symbol,
      date: utcDay(kline.start),
      open: kline.open,
      high: kline.high,
      low: kline.low,
      close: kline.close,
      volumeQuoteUsd: kline.turnover
    }));

    // Linear turnover is in the quote asset; inverse turnover is in the base coin
    const { base, quote } = this.normalizer.parseMarket('bybit', symbol);
    const asset = category === 'inverse' ? base : quote;
    const converted = await this.convertRecords(records, asset, start, end);

    return result.error ? { records: converted, error: toConnectorError(result.error) } : { records: converted };
  }

  protected async fetch24h(): Promise<ExchangeVolumeInfo> {
    const raw = await this.http.requestJson({
      path: '/v5/market/tickers',
      query: { category: 'linear' }
    });
    const envelope = bybitEnvelopeSchema.parse(raw);
    if (envelope.retCode !== 0) {
      throw bybitApiError(envelope.retCode, envelope.retMsg);
    }

    const tickers = this.parseItems(bybitTickerSchema, envelope.result?.list ?? [], 'bybit tickers');
    if (tickers.length === 0) {
      throw new UpstreamProtocolError('No ticker data found');
    }

    const total = tickers
      .filter(ticker => ticker.symbol.includes('USDT') || ticker.symbol.includes('USDC'))
      .reduce((sum, ticker) => sum + ticker.turnover24h, 0);

    return this.volumeInfo(this.scopeLabel(), total);
  }
}
