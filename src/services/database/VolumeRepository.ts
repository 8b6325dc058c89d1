import { SupabaseClient, createClient } from '@supabase/supabase-js';
import logger from '../../utils/logger';
import { utcDay } from '../volume-aggregation/DataNormalizer';
import { dailyVolumeRowSchema } from '../volume-aggregation/schemas';
import { DailyVolumeRecord } from '../volume-aggregation/types';

export interface HistoricalVolumeRepository {
  /** Inserts records whose (platform, symbol, date) is new; returns how many were. */
  insertOrIgnore(records: DailyVolumeRecord[]): Promise<number>;
  /** Records whose date lies within the UTC days of [start, end]. */
  queryRange(start: Date, end: Date): Promise<DailyVolumeRecord[]>;
}

export interface SupabaseVolumeRepositoryOptions {
  /** Transport override, used by tests. */
  fetch?: typeof fetch;
}

const TABLE = 'historical_daily_volumes';
const PAGE_SIZE = 1000;

export class SupabaseVolumeRepository implements HistoricalVolumeRepository {
  private supabase: SupabaseClient;

  constructor(url: string, serviceRoleKey: string, options: SupabaseVolumeRepositoryOptions = {}) {
    this.supabase = createClient(url, serviceRoleKey, {
      auth: { persistSession: false, autoRefreshToken: false },
      global: options.fetch ? { fetch: options.fetch } : undefined
    });
  }

  async insertOrIgnore(records: DailyVolumeRecord[]): Promise<number> {
    if (records.length === 0) {
      return 0;
    }

    try {
      const { data, error } = await this.supabase
        .from(TABLE)
        .upsert(
          records.map(record => ({
            platform: record.platform,
            symbol: record.symbol,
            date: record.date,
            open: record.open,
            high: record.high,
            low: record.low,
            close: record.close,
            volume_quote_usd: record.volumeQuoteUsd
          })),
          { onConflict: 'platform,symbol,date', ignoreDuplicates: true }
        )
        .select('date');

      if (error) throw error;
      return Array.isArray(data) ? data.length : 0;
    } catch (error) {
      logger.error('Error storing historical volumes:', error);
      throw error;
    }
  }

  async queryRange(start: Date, end: Date): Promise<DailyVolumeRecord[]> {
    const records: DailyVolumeRecord[] = [];

    try {
      for (let offset = 0; ; offset += PAGE_SIZE) {
        const { data, error } = await this.supabase
          .from(TABLE)
          .select('platform,symbol,date,open,high,low,close,volume_quote_usd')
          .gte('date', utcDay(start.getTime()))
          .lte('date', utcDay(end.getTime()))
          // Offset paging needs a total order; date alone ties across markets
          .order('date', { ascending: true })
          .order('platform', { ascending: true })
          .order('symbol', { ascending: true })
          .range(offset, offset + PAGE_SIZE - 1);

        if (error) throw error;
        const rows: unknown[] = Array.isArray(data) ? data : [];

        for (const row of rows) {
          const parsed = dailyVolumeRowSchema.safeParse(row);
          if (parsed.success) {
            records.push(parsed.data);
          } else {
            logger.warn('Skipping malformed historical volume row', { issue: parsed.error.issues[0]?.message });
          }
        }

        if (rows.length < PAGE_SIZE) {
          return records;
        }
      }
    } catch (error) {
      logger.error('Error querying historical volumes:', error);
      throw error;
    }
  }
}

/**
 * Process-local repository used when no database is configured, and in tests.
 */
export class InMemoryVolumeRepository implements HistoricalVolumeRepository {
  private rows: Map<string, DailyVolumeRecord> = new Map();

  async insertOrIgnore(records: DailyVolumeRecord[]): Promise<number> {
    let inserted = 0;
    for (const record of records) {
      const key = `${record.platform}|${record.symbol}|${record.date}`;
      if (!this.rows.has(key)) {
        this.rows.set(key, { ...record });
        inserted++;
      }
    }
    return inserted;
  }

  async queryRange(start: Date, end: Date): Promise<DailyVolumeRecord[]> {
    const first = utcDay(start.getTime());
    const last = utcDay(end.getTime());
    return Array.from(this.rows.values())
      .filter(record => record.date >= first && record.date <= last)
      .sort(
        (a, b) =>
          a.date.localeCompare(b.date) || a.platform.localeCompare(b.platform) || a.symbol.localeCompare(b.symbol)
      );
  }

  get size(): number {
    return this.rows.size;
  }
}
