import { DailyVolumeRecord, PlatformId } from './types';

export const DAY_MS = 24 * 60 * 60 * 1000;

const USD_STABLECOINS = new Set(['USD', 'USDT', 'USDC', 'DAI', 'BUSD', 'TUSD', 'FDUSD', 'USDE', 'PYUSD', 'USDP']);

// Longest first so BTCUSDT resolves to USDT, not USD
const CONCATENATED_QUOTES = ['FDUSD', 'USDT', 'USDC', 'USDE', 'BUSD', 'USD', 'BTC', 'ETH', 'EUR'];

export interface PricedFill {
  price: number;
  size: number;
  /** ms since epoch */
  timestamp: number;
}

export interface MarketAssets {
  base: string;
  quote: string;
}

export function isUsdStablecoin(asset: string): boolean {
  return USD_STABLECOINS.has(asset.toUpperCase());
}

/** UTC calendar day of an instant, YYYY-MM-DD. */
export function utcDay(timestampMs: number): string {
  return new Date(timestampMs).toISOString().slice(0, 10);
}

export function startOfUtcDay(timestampMs: number): number {
  return Math.floor(timestampMs / DAY_MS) * DAY_MS;
}

export function compactDay(date: Date): string {
  return utcDay(date.getTime()).replace(/-/g, '');
}

/**
 * Converts exchange-specific payloads into DailyVolumeRecords.
 */
export class DataNormalizer {
  /**
   * Splits a market symbol into base and quote asset, following each platform's
   * naming scheme.
   */
  parseMarket(platform: PlatformId, symbol: string): MarketAssets {
    const upper = symbol.toUpperCase();

    switch (platform) {
      case 'woox': {
        // PERP_BTC_USDT, SPOT_ETH_BTC
        const parts = upper.split('_');
        if (parts.length >= 3) {
          return { base: parts[parts.length - 2], quote: parts[parts.length - 1] };
        }
        return { base: upper, quote: 'USDT' };
      }
      case 'paradex': {
        // BTC-USD-PERP
        const [base, quote] = upper.split('-');
        return { base, quote: quote || 'USD' };
      }
      case 'bybit': {
        const quote = CONCATENATED_QUOTES.find(candidate => upper.endsWith(candidate) && upper.length > candidate.length);
        if (quote) {
          return { base: upper.slice(0, upper.length - quote.length), quote };
        }
        return { base: upper, quote: 'USDT' };
      }
      case 'hyperliquid':
        return { base: upper, quote: 'USD' };
    }
  }

  /**
   * Buckets fills into one record per UTC day. Fills must be ordered by time:
   * the first fill of a day is its open and the last its close. Volume is
   * Σ price × size in the market's quote asset.
   */
  aggregateFillsByDay(platform: PlatformId, symbol: string, fills: PricedFill[]): DailyVolumeRecord[] {
    const days = new Map<string, DailyVolumeRecord>();

    for (const fill of fills) {
      const date = utcDay(fill.timestamp);
      const notional = fill.price * fill.size;
      const existing = days.get(date);

      if (!existing) {
        days.set(date, {
          platform,
          symbol,
          date,
          open: fill.price,
          high: fill.price,
          low: fill.price,
          close: fill.price,
          volumeQuoteUsd: notional
        });
        continue;
      }

      existing.high = Math.max(existing.high, fill.price);
      existing.low = Math.min(existing.low, fill.price);
      existing.close = fill.price;
      existing.volumeQuoteUsd += notional;
    }

    return Array.from(days.values()).sort((a, b) => a.date.localeCompare(b.date));
  }

  /** Keeps records whose day lies within the UTC days of [start, end]. */
  filterRange(records: DailyVolumeRecord[], start: Date, end: Date): DailyVolumeRecord[] {
    const first = utcDay(start.getTime());
    const last = utcDay(end.getTime());
    return records.filter(record => record.date >= first && record.date <= last);
  }

  /**
   * Multiplies each record's quote volume by the USD price of the quote asset
   * on that day. USD-quoted markets pass through untouched.
   */
  async convertToUsd(
    records: DailyVolumeRecord[],
    quoteAsset: string,
    usdPrice: (asset: string, asOf: Date) => Promise<number>
  ): Promise<DailyVolumeRecord[]> {
    if (isUsdStablecoin(quoteAsset)) {
      return records;
    }

    const converted: DailyVolumeRecord[] = [];
    for (const record of records) {
      const price = await usdPrice(quoteAsset, new Date(`${record.date}T00:00:00.000Z`));
      converted.push({ ...record, volumeQuoteUsd: record.volumeQuoteUsd * price });
    }
    return converted;
  }
}
