import logger from '../../utils/logger';
import { VolumeAggregatorError, toVolumeAggregatorError } from './ErrorHandler';
import { defaultSleep } from './RateLimiter';
import { Sleep } from './types';

export interface Page<TItem, TCursor> {
  items: TItem[];
  /** Cursor for the next request; null or undefined ends the run. */
  nextCursor?: TCursor | null;
}

export interface PaginationOptions<TItem, TCursor> {
  /** Used in log lines, e.g. "woox /v1/client/trades PERP_BTC_USDT". */
  label: string;
  initialCursor: TCursor;
  fetchPage: (cursor: TCursor) => Promise<Page<TItem, TCursor>>;
  identity: (item: TItem) => string;
  timestamp: (item: TItem) => number;
  /** A page with fewer items than this is the last one. */
  pageSize?: number;
  /** Stop once a page carries an item stamped after this instant (ms). */
  until?: number;
  maxRecords?: number;
  maxPages: number;
  /** Retries per page after the first attempt. */
  maxRetries: number;
  retryDelayMs: number;
  /** Gap between successive page requests. */
  pageDelayMs?: number;
  sleep?: Sleep;
}

export type StopReason =
  | 'exhausted'
  | 'empty_page'
  | 'short_page'
  | 'time_bound'
  | 'record_bound'
  | 'max_pages'
  | 'error';

export interface PaginationResult<TItem> {
  /** Deduplicated by identity, ascending by timestamp. */
  items: TItem[];
  pages: number;
  stopReason: StopReason;
  error?: VolumeAggregatorError;
}

/**
 * Drives a page-fetch function until the upstream runs dry or a bound is hit.
 * Retryable failures repeat the same cursor; anything else ends the run and
 * the items gathered so far are returned with the error.
 */
export async function paginate<TItem, TCursor>(
  options: PaginationOptions<TItem, TCursor>
): Promise<PaginationResult<TItem>> {
  const sleep = options.sleep ?? defaultSleep;
  const collected = new Map<string, TItem>();
  let cursor = options.initialCursor;
  let pages = 0;
  let stopReason: StopReason = 'exhausted';
  let error: VolumeAggregatorError | undefined;

  while (true) {
    // Check page budget
    if (pages >= options.maxPages) {
      logger.warn(`${options.label}: stopped after ${pages} pages (max pages reached)`);
      stopReason = 'max_pages';
      break;
    }
    if (pages > 0 && options.pageDelayMs) {
      await sleep(options.pageDelayMs);
    }

    const outcome = await fetchWithRetry(options, cursor, sleep);
    if (!outcome.ok) {
      error = outcome.error;
      stopReason = 'error';
      break;
    }

    const page = outcome.page;
    pages++;
    logger.debug(`${options.label}: page ${pages} returned ${page.items.length} items`);

    if (page.items.length === 0) {
      stopReason = 'empty_page';
      break;
    }

    // Merge by identity; first occurrence wins
    let passedBound = false;
    for (const item of page.items) {
      const id = options.identity(item);
      if (!collected.has(id)) {
        collected.set(id, item);
      }
      if (options.until !== undefined && options.timestamp(item) > options.until) {
        passedBound = true;
      }
    }

    // Stop conditions, most specific first
    if (passedBound) {
      stopReason = 'time_bound';
      break;
    }
    if (options.maxRecords !== undefined && collected.size >= options.maxRecords) {
      stopReason = 'record_bound';
      break;
    }
    if (options.pageSize !== undefined && page.items.length < options.pageSize) {
      stopReason = 'short_page';
      break;
    }
    if (page.nextCursor === null || page.nextCursor === undefined) {
      stopReason = 'exhausted';
      break;
    }
    cursor = page.nextCursor;
  }

  const items = Array.from(collected.values()).sort(
    (a, b) => options.timestamp(a) - options.timestamp(b)
  );

  const result: PaginationResult<TItem> = { items, pages, stopReason };
  if (error) {
    result.error = error;
  }
  return result;
}

type FetchOutcome<TItem, TCursor> =
  | { ok: true; page: Page<TItem, TCursor> }
  | { ok: false; error: VolumeAggregatorError };

async function fetchWithRetry<TItem, TCursor>(
  options: PaginationOptions<TItem, TCursor>,
  cursor: TCursor,
  sleep: Sleep
): Promise<FetchOutcome<TItem, TCursor>> {
  for (let attempt = 0; ; attempt++) {
    try {
      return { ok: true, page: await options.fetchPage(cursor) };
    } catch (caught) {
      const error = toVolumeAggregatorError(caught);

      // Client errors are final
      if (!error.retryable) {
        logger.warn(`${options.label}: non-retryable ${error.kind} error: ${error.message}`);
        return { ok: false, error };
      }
      if (attempt >= options.maxRetries) {
        logger.error(`${options.label}: giving up after ${attempt + 1} attempts: ${error.message}`);
        return { ok: false, error };
      }

      // Same cursor on the next attempt
      logger.warn(
        `${options.label}: attempt ${attempt + 1} failed (${error.kind}), retrying in ${options.retryDelayMs}ms`
      );
      await sleep(options.retryDelayMs);
    }
  }
}
