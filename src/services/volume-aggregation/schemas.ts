import { z } from 'zod';
import { CacheSchema } from './CacheService';
import {
  AggregatedHistoricalPoint,
  AggregatedVolume,
  DailyVolumeRecord,
  PLATFORM_IDS,
  PlatformId
} from './types';

/** Exchanges send numbers as strings about half the time. */
export const numeric = z
  .union([z.string(), z.number()])
  .transform(value => Number(value))
  .pipe(z.number().finite());

const platformIdSchema: z.ZodType<PlatformId, z.ZodTypeDef, unknown> = z
  .string()
  .refine((value): value is PlatformId => PLATFORM_IDS.some(platform => platform === value), {
    message: 'Unknown platform'
  });

const errorKindSchema = z.enum([
  'transient_network',
  'rate_limited',
  'upstream_protocol',
  'auth',
  'parameter',
  'serialization',
  'price_unavailable'
]);

// ---- cached values ----

export const exchangeVolumeInfoSchema = z.object({
  platform: platformIdSchema,
  symbol: z.string(),
  volume24hUsd: z.number(),
  timestamp: z.coerce.date(),
  error: z.string().optional(),
  errorKind: errorKindSchema.optional()
});

export const aggregatedVolumeSchema: CacheSchema<AggregatedVolume> = z.object({
  totalVolume24hUsd: z.number(),
  lastUpdated: z.coerce.date(),
  platforms: z.array(exchangeVolumeInfoSchema)
});

export const historicalPointsSchema: CacheSchema<AggregatedHistoricalPoint[]> = z.array(
  z.object({
    date: z.string(),
    totalVolumeUsd: z.number()
  })
);

export const priceEntrySchema = z.object({
  price: z.number().positive(),
  fetchedAt: z.number()
});

export type PriceEntry = z.infer<typeof priceEntrySchema>;

export const tokenEntrySchema = z.object({
  token: z.string().min(1),
  expiresAt: z.number()
});

export type TokenEntry = z.infer<typeof tokenEntrySchema>;

export const dailyVolumeRowSchema: z.ZodType<DailyVolumeRecord, z.ZodTypeDef, unknown> = z
  .object({
    platform: platformIdSchema,
    symbol: z.string(),
    date: z.string(),
    open: numeric,
    high: numeric,
    low: numeric,
    close: numeric,
    volume_quote_usd: numeric
  })
  .transform(row => ({
    platform: row.platform,
    symbol: row.symbol,
    date: row.date,
    open: row.open,
    high: row.high,
    low: row.low,
    close: row.close,
    volumeQuoteUsd: row.volume_quote_usd
  }));

// ---- Bybit ----

export const bybitEnvelopeSchema = z.object({
  retCode: z.number(),
  retMsg: z.string().default(''),
  result: z
    .object({
      list: z.array(z.unknown()).optional()
    })
    .passthrough()
    .nullish()
});

/** [startTime, open, high, low, close, volume, turnover] */
export const bybitKlineRowSchema = z
  .array(z.string())
  .min(7)
  .transform(row => ({
    start: Number(row[0]),
    open: Number(row[1]),
    high: Number(row[2]),
    low: Number(row[3]),
    close: Number(row[4]),
    volume: Number(row[5]),
    turnover: Number(row[6])
  }))
  .refine(kline => Object.values(kline).every(Number.isFinite), { message: 'Non-numeric kline field' });

export type BybitKline = z.infer<typeof bybitKlineRowSchema>;

export const bybitTickerSchema = z.object({
  symbol: z.string(),
  turnover24h: numeric
});

// ---- Hyperliquid ----

export const hyperliquidCandleSchema = z.object({
  t: z.number(),
  T: z.number(),
  s: z.string(),
  i: z.string(),
  o: numeric,
  c: numeric,
  h: numeric,
  l: numeric,
  v: numeric,
  n: z.number().optional()
});

export type HyperliquidCandle = z.infer<typeof hyperliquidCandleSchema>;

export const hyperliquidMetaAndCtxsSchema = z.tuple([
  z.object({
    universe: z.array(z.object({ name: z.string() }).passthrough())
  }).passthrough(),
  z.array(z.unknown())
]);

export const hyperliquidAssetCtxSchema = z
  .object({
    dayNtlVlm: numeric
  })
  .passthrough();

// ---- WOO X ----

export const wooxEnvelopeSchema = z.object({
  success: z.boolean(),
  code: z.union([z.number(), z.string()]).optional(),
  message: z.string().optional(),
  rows: z.array(z.unknown()).optional(),
  meta: z
    .object({
      total: z.number().optional(),
      records_per_page: z.number().optional(),
      current_page: z.number().optional(),
      total_page: z.number().optional()
    })
    .passthrough()
    .optional()
});

export const wooxTradeSchema = z.object({
  id: z.union([z.number(), z.string()]).transform(value => String(value)),
  symbol: z.string(),
  executed_price: numeric,
  executed_quantity: numeric,
  executed_timestamp: numeric
});

export type WooXTrade = z.infer<typeof wooxTradeSchema>;

// ---- Paradex ----

export const paradexFillsEnvelopeSchema = z.object({
  next: z.string().nullish(),
  results: z.array(z.unknown())
});

export const paradexFillSchema = z.object({
  id: z.string(),
  market: z.string(),
  price: numeric,
  size: numeric,
  created_at: z.number()
});

export type ParadexFill = z.infer<typeof paradexFillSchema>;

export const paradexAuthResponseSchema = z.object({
  jwt_token: z.string().min(1)
});

export const paradexSystemConfigSchema = z
  .object({
    starknet_chain_id: z.string().min(1)
  })
  .passthrough();

// ---- CoinGecko ----

export const coinGeckoSimplePriceSchema = z.record(
  z.string(),
  z.object({ usd: z.number().optional() }).passthrough()
);

export const coinGeckoHistorySchema = z
  .object({
    market_data: z
      .object({
        current_price: z.record(z.string(), z.number()).optional()
      })
      .passthrough()
      .optional()
  })
  .passthrough();
