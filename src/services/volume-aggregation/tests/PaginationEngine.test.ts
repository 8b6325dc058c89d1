import { describe, it, expect } from '@jest/globals';
import { FetchError } from 'node-fetch';
import { classifyHttpError } from '../ErrorHandler';
import { Page, PaginationOptions, paginate } from '../PaginationEngine';

interface Row {
  id: string;
  ts: number;
}

const row = (id: string, ts: number): Row => ({ id, ts });

function options(
  fetchPage: (cursor: number) => Promise<Page<Row, number>>,
  overrides: Partial<PaginationOptions<Row, number>> = {}
): PaginationOptions<Row, number> {
  return {
    label: 'test',
    initialCursor: 0,
    fetchPage,
    identity: item => item.id,
    timestamp: item => item.ts,
    maxPages: 10,
    maxRetries: 2,
    retryDelayMs: 25,
    sleep: async () => undefined,
    ...overrides
  };
}

describe('paginate', () => {
  it('should follow cursors until the upstream returns none', async () => {
    const cursors: number[] = [];
    const pages: Record<number, Page<Row, number>> = {
      0: { items: [row('a', 3), row('b', 1)], nextCursor: 1 },
      1: { items: [row('c', 2)], nextCursor: null }
    };

    const result = await paginate(
      options(async cursor => {
        cursors.push(cursor);
        return pages[cursor];
      })
    );

    expect(cursors).toEqual([0, 1]);
    expect(result.pages).toBe(2);
    expect(result.stopReason).toBe('exhausted');
    expect(result.items.map(item => item.id)).toEqual(['b', 'c', 'a']);
  });

  it('should keep the first copy of duplicated items', async () => {
    const result = await paginate(
      options(async cursor =>
        cursor === 0
          ? { items: [row('a', 1), row('b', 2)], nextCursor: 1 }
          : { items: [row('b', 99), row('c', 3)], nextCursor: null }
      )
    );

    expect(result.items).toEqual([row('a', 1), row('b', 2), row('c', 3)]);
  });

  it('should stop at the page ceiling even when the upstream keeps paging', async () => {
    let calls = 0;
    const result = await paginate(
      options(
        async cursor => {
          calls++;
          return { items: [row(`item-${cursor}`, cursor)], nextCursor: cursor + 1 };
        },
        { maxPages: 3 }
      )
    );

    expect(calls).toBe(3);
    expect(result.pages).toBe(3);
    expect(result.stopReason).toBe('max_pages');
    expect(result.items).toHaveLength(3);
  });

  it('should retry a rate limited page on the same cursor', async () => {
    const cursors: number[] = [];
    const sleeps: number[] = [];
    let failures = 0;

    const result = await paginate(
      options(
        async cursor => {
          cursors.push(cursor);
          if (cursor === 1 && failures < 2) {
            failures++;
            throw classifyHttpError(429, '');
          }
          return cursor === 0
            ? { items: [row('a', 1)], nextCursor: 1 }
            : { items: [row('b', 2)], nextCursor: null };
        },
        {
          sleep: async ms => {
            sleeps.push(ms);
          }
        }
      )
    );

    expect(cursors).toEqual([0, 1, 1, 1]);
    expect(sleeps).toEqual([25, 25]);
    expect(result.stopReason).toBe('exhausted');
    expect(result.error).toBeUndefined();
    expect(result.items.map(item => item.id)).toEqual(['a', 'b']);
  });

  it('should retry network failures', async () => {
    let attempts = 0;
    const result = await paginate(
      options(async () => {
        attempts++;
        if (attempts === 1) {
          throw new FetchError('socket hang up', 'system');
        }
        return { items: [row('a', 1)] };
      })
    );

    expect(attempts).toBe(2);
    expect(result.items).toHaveLength(1);
  });

  it('should give up after the retry budget and return what it has', async () => {
    let attempts = 0;
    const result = await paginate(
      options(async cursor => {
        if (cursor === 0) {
          return { items: [row('a', 1)], nextCursor: 1 };
        }
        attempts++;
        throw classifyHttpError(502, 'bad gateway');
      })
    );

    expect(attempts).toBe(3);
    expect(result.stopReason).toBe('error');
    expect(result.error?.kind).toBe('upstream_protocol');
    expect(result.items).toEqual([row('a', 1)]);
    expect(result.pages).toBe(1);
  });

  it('should abort on a client error without retrying', async () => {
    let attempts = 0;
    const result = await paginate(
      options(async () => {
        attempts++;
        throw classifyHttpError(400, 'bad symbol');
      })
    );

    expect(attempts).toBe(1);
    expect(result.stopReason).toBe('error');
    expect(result.error?.kind).toBe('parameter');
    expect(result.items).toEqual([]);
    expect(result.pages).toBe(0);
  });

  it('should stop on an empty page', async () => {
    const result = await paginate(options(async () => ({ items: [], nextCursor: 5 })));

    expect(result.stopReason).toBe('empty_page');
    expect(result.pages).toBe(1);
  });

  it('should stop on a short page when a page size is given', async () => {
    let calls = 0;
    const result = await paginate(
      options(
        async () => {
          calls++;
          return { items: [row('a', 1)], nextCursor: 1 };
        },
        { pageSize: 2 }
      )
    );

    expect(calls).toBe(1);
    expect(result.stopReason).toBe('short_page');
  });

  it('should stop once items pass the time bound', async () => {
    let calls = 0;
    const result = await paginate(
      options(
        async cursor => {
          calls++;
          return { items: [row(`x${cursor}`, cursor * 100)], nextCursor: cursor + 1 };
        },
        { until: 150 }
      )
    );

    expect(calls).toBe(3);
    expect(result.stopReason).toBe('time_bound');
    expect(result.items.map(item => item.ts)).toEqual([0, 100, 200]);
  });

  it('should stop once enough records are collected', async () => {
    const result = await paginate(
      options(
        async cursor => ({ items: [row(`a${cursor}`, 1), row(`b${cursor}`, 2)], nextCursor: cursor + 1 }),
        { maxRecords: 3 }
      )
    );

    expect(result.stopReason).toBe('record_bound');
    expect(result.items).toHaveLength(4);
  });

  it('should wait between pages when a page delay is set', async () => {
    const sleeps: number[] = [];
    await paginate(
      options(
        async cursor => (cursor < 2 ? { items: [row(`r${cursor}`, cursor)], nextCursor: cursor + 1 } : { items: [] }),
        {
          pageDelayMs: 100,
          sleep: async ms => {
            sleeps.push(ms);
          }
        }
      )
    );

    expect(sleeps).toEqual([100, 100]);
  });
});
