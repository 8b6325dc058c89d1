import logger from '../../../utils/logger';
import { DAY_MS } from '../DataNormalizer';
import {
  AuthError,
  ParameterError,
  RateLimitedError,
  UpstreamProtocolError,
  VolumeAggregatorError,
  errorMessage,
  toConnectorError,
  toVolumeAggregatorError
} from '../ErrorHandler';
import { PaginationResult } from '../PaginationEngine';
import { WooXTrade, wooxEnvelopeSchema, wooxTradeSchema } from '../schemas';
import { QueryParams, hmacAuthHeaders } from '../signing/hmacSigner';
import {
  Credential,
  ExchangeVolumeInfo,
  HistoricalFetchResult,
  PlatformId
} from '../types';
import { BaseExchangeConnector, ConnectorDependencies } from './ExchangeConnector';

const PAGE_SIZE = 500;

export interface WooXFill {
  id: string;
  price: number;
  size: number;
  timestamp: number;
}

export interface TimeWindow {
  start: number;
  end: number;
}

export interface WooXWindows {
  /** Served by /v1/client/hist_trades */
  archive?: TimeWindow;
  /** Served by /v1/client/trades */
  recent?: TimeWindow;
}

interface TradePage {
  rows: WooXTrade[];
  currentPage?: number;
  totalPages?: number;
}

interface ApiKeyPair {
  apiKey: string;
  apiSecret: string;
}

export function wooxApiError(code: number | string | undefined, message: string | undefined): VolumeAggregatorError {
  const text = `WOO X API error ${code ?? 'unknown'}: ${message ?? 'request failed'}`;
  switch (Number(code)) {
    case -1001:
    case -1002:
      return new AuthError(text, 401);
    case -1003:
      return new RateLimitedError(text);
    case -1004:
    case -1005:
      return new ParameterError(text, 400);
    default:
      return new UpstreamProtocolError(text);
  }
}

/** Timestamps come as seconds with a fractional part, e.g. "1575367268.476". */
function toMillis(timestamp: number): number {
  return Math.round(timestamp < 1e12 ? timestamp * 1000 : timestamp);
}

function toFill(trade: WooXTrade): WooXFill {
  return {
    id: trade.id,
    price: trade.executed_price,
    size: trade.executed_quantity,
    timestamp: toMillis(trade.executed_timestamp)
  };
}

/**
 * Account fills behind HMAC auth. Recent trades and archived trades live on
 * different endpoints split at a retention boundary.
 */
export class WooXConnector extends BaseExchangeConnector {
  readonly requiresCredential = true;

  constructor(deps: ConnectorDependencies, private readonly archiveBoundaryDays = 90) {
    super(deps);
  }

  platformName(): PlatformId {
    return 'woox';
  }

  /** The figure only covers configured markets; WOO X has no account-wide fills query here. */
  protected scopeLabel(): string {
    return 'WOOX_CONFIGURED_MARKETS';
  }

  /**
   * Splits [start, end] at the retention boundary. The archive window ends
   * one millisecond before the boundary so no instant is covered twice.
   */
  splitWindows(start: number, end: number, now: number = this.clock()): WooXWindows {
    const boundary = now - this.archiveBoundaryDays * DAY_MS;
    const windows: WooXWindows = {};

    if (start < boundary) {
      windows.archive = { start, end: Math.min(end, boundary - 1) };
    }
    if (end >= boundary) {
      windows.recent = { start: Math.max(start, boundary), end };
    }
    return windows;
  }

  async fetchFills(symbol: string, start: number, end: number, credential: ApiKeyPair): Promise<PaginationResult<WooXFill>> {
    const windows = this.splitWindows(start, end);
    const parts: PaginationResult<WooXFill>[] = [];

    if (windows.archive) {
      parts.push(await this.fetchArchivedFills(symbol, windows.archive, credential));
    }
    if (windows.recent) {
      parts.push(await this.fetchRecentFills(symbol, windows.recent, credential));
    }

    const merged = new Map<string, WooXFill>();
    for (const part of parts) {
      for (const fill of part.items) {
        if (!merged.has(fill.id)) {
          merged.set(fill.id, fill);
        }
      }
    }

    const failed = parts.find(part => part.error);
    const result: PaginationResult<WooXFill> = {
      items: Array.from(merged.values()).sort((a, b) => a.timestamp - b.timestamp),
      pages: parts.reduce((sum, part) => sum + part.pages, 0),
      stopReason: failed ? 'error' : parts.length > 0 ? parts[parts.length - 1].stopReason : 'exhausted'
    };
    if (failed && failed.error) {
      result.error = failed.error;
    }
    return result;
  }

  protected async fetchDaily(
    symbol: string,
    start: Date,
    end: Date,
    credential: Credential | null
  ): Promise<HistoricalFetchResult> {
    const keys = this.requireKeys(credential);
    const result = await this.fetchFills(symbol, this.windowStart(start), end.getTime(), keys);

    const records = this.normalizer.aggregateFillsByDay('woox', symbol, result.items);
    const { quote } = this.normalizer.parseMarket('woox', symbol);
    const converted = await this.convertRecords(records, quote, start, end);

    return result.error ? { records: converted, error: toConnectorError(result.error) } : { records: converted };
  }

  protected async fetch24h(credential: Credential | null): Promise<ExchangeVolumeInfo> {
    const keys = this.requireKeys(credential);
    if (this.symbols.length === 0) {
      throw new ParameterError('No WOO X markets configured');
    }

    const end = this.clock();
    const start = end - DAY_MS;
    let total = 0;
    const failures: string[] = [];
    let firstError: VolumeAggregatorError | undefined;

    for (const symbol of this.symbols) {
      try {
        const result = await this.fetchFills(symbol, start, end, keys);
        const notional = result.items.reduce((sum, fill) => sum + fill.price * fill.size, 0);
        total += notional * (await this.quoteToUsd(symbol));
        if (result.error) {
          failures.push(`${symbol}: ${result.error.message}`);
          firstError = firstError ?? result.error;
        }
      } catch (error) {
        failures.push(`${symbol}: ${errorMessage(error)}`);
        firstError = firstError ?? toVolumeAggregatorError(error);
      }
    }

    if (failures.length > 0) {
      logger.warn(`WOO X 24h volume incomplete: ${failures.join('; ')}`);
      const info = this.volumeInfo(this.scopeLabel(), total, firstError);
      info.error = failures.join('; ');
      return info;
    }
    // A zero here may just mean the trading happened on markets nobody configured
    if (total === 0) {
      return this.volumeInfo(
        this.scopeLabel(),
        0,
        new ParameterError(
          `No WOO X fills in the last 24h on configured markets (${this.symbols.join(', ')}); other markets are not queried`
        )
      );
    }
    return this.volumeInfo(this.scopeLabel(), total);
  }

  private requireKeys(credential: Credential | null): ApiKeyPair {
    if (!credential || !credential.apiKey || !credential.apiSecret) {
      throw new AuthError('WOO X API key and secret are required');
    }
    return { apiKey: credential.apiKey, apiSecret: credential.apiSecret };
  }

  private async signedGet(path: string, query: QueryParams, keys: ApiKeyPair): Promise<TradePage> {
    const timestamp = this.clock();
    const raw = await this.http.requestJson({
      path,
      query,
      headers: hmacAuthHeaders(keys.apiKey, keys.apiSecret, query, timestamp)
    });
    return this.parseTradePage(raw, path);
  }

  private parseTradePage(raw: unknown, path: string): TradePage {
    const envelope = wooxEnvelopeSchema.parse(raw);
    if (!envelope.success) {
      throw wooxApiError(envelope.code, envelope.message);
    }

    const rows = this.parseItems(wooxTradeSchema, envelope.rows ?? [], `woox ${path}`);
    const meta = envelope.meta;
    let totalPages = meta?.total_page;
    if (totalPages === undefined && meta?.total !== undefined && meta.records_per_page) {
      totalPages = Math.ceil(meta.total / meta.records_per_page);
    }
    return { rows, currentPage: meta?.current_page, totalPages };
  }

  private fetchRecentFills(symbol: string, window: TimeWindow, keys: ApiKeyPair): Promise<PaginationResult<WooXFill>> {
    return this.paginate<WooXFill, number>({
      label: `woox /v1/client/trades ${symbol}`,
      initialCursor: 1,
      pageSize: PAGE_SIZE,
      identity: fill => fill.id,
      timestamp: fill => fill.timestamp,
      fetchPage: async page => {
        const parsed = await this.signedGet(
          '/v1/client/trades',
          { symbol, start_t: window.start, end_t: window.end, page, size: PAGE_SIZE },
          keys
        );
        const current = parsed.currentPage ?? page;
        const hasMore = parsed.totalPages === undefined || current < parsed.totalPages;
        return { items: parsed.rows.map(toFill), nextCursor: hasMore ? current + 1 : null };
      }
    });
  }

  private fetchArchivedFills(symbol: string, window: TimeWindow, keys: ApiKeyPair): Promise<PaginationResult<WooXFill>> {
    return this.paginate<WooXFill, string | undefined>({
      label: `woox /v1/client/hist_trades ${symbol}`,
      initialCursor: undefined,
      pageSize: PAGE_SIZE,
      identity: fill => fill.id,
      timestamp: fill => fill.timestamp,
      fetchPage: async fromId => {
        const parsed = await this.signedGet(
          '/v1/client/hist_trades',
          { symbol, start_t: window.start, end_t: window.end, fromId, limit: PAGE_SIZE },
          keys
        );
        const fills = parsed.rows.map(toFill);
        const last = fills[fills.length - 1];
        return { items: fills, nextCursor: last ? last.id : null };
      }
    });
  }
}
