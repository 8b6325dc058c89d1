import { describe, it, expect } from '@jest/globals';
import { BybitConnector, bybitApiError } from '../connectors/BybitConnector';
import { ManualClock, connectorDeps, createFetchStub } from './helpers';

const JAN_1 = Date.UTC(2024, 0, 1);
const JAN_2 = Date.UTC(2024, 0, 2);
const JAN_3 = Date.UTC(2024, 0, 3);
const JAN_3_END = Date.UTC(2024, 0, 3, 23, 59, 59, 999);

function kline(start: number, turnover: string): string[] {
  return [String(start), '42000', '43000', '41000', '42500', '100', turnover];
}

describe('BybitConnector', () => {
  const time = new ManualClock(Date.UTC(2024, 5, 1));

  it('should turn daily klines into ascending records', async () => {
    const { fetch, requests } = createFetchStub(() => ({
      body: {
        retCode: 0,
        retMsg: 'OK',
        result: { list: [kline(JAN_3, '4350000'), kline(JAN_2, '5100000'), kline(JAN_1, '3800000')] }
      }
    }));
    const connector = new BybitConnector(connectorDeps('bybit', fetch, { clock: time.clock }));

    const result = await connector.fetchHistoricalDaily('BTCUSDT', new Date(JAN_1), new Date(JAN_3_END));

    expect(result.error).toBeUndefined();
    expect(result.records.map(record => [record.date, record.volumeQuoteUsd])).toEqual([
      ['2024-01-01', 3800000],
      ['2024-01-02', 5100000],
      ['2024-01-03', 4350000]
    ]);
    expect(result.records[0]).toEqual({
      platform: 'bybit',
      symbol: 'BTCUSDT',
      date: '2024-01-01',
      open: 42000,
      high: 43000,
      low: 41000,
      close: 42500,
      volumeQuoteUsd: 3800000
    });

    expect(requests).toHaveLength(1);
    expect(requests[0].url.pathname).toBe('/v5/market/kline');
    expect(Object.fromEntries(requests[0].url.searchParams)).toEqual({
      category: 'linear',
      symbol: 'BTCUSDT',
      interval: 'D',
      start: String(JAN_1),
      end: String(JAN_3_END),
      limit: '1000'
    });
  });

  it('should price inverse turnover with the base coin', async () => {
    const { fetch, requests } = createFetchStub(() => ({
      body: { retCode: 0, retMsg: 'OK', result: { list: [kline(JAN_1, '2')] } }
    }));
    const connector = new BybitConnector(
      connectorDeps('bybit', fetch, { clock: time.clock, prices: { BTC: 50000 } })
    );

    const result = await connector.fetchHistoricalDaily('BTCUSD', new Date(JAN_1), new Date(JAN_1));

    expect(result.records.map(record => record.volumeQuoteUsd)).toEqual([100000]);
    expect(requests[0].url.searchParams.get('category')).toBe('inverse');
  });

  it('should surface a non-zero retCode as a parameter error', async () => {
    const { fetch } = createFetchStub(() => ({ body: { retCode: 10001, retMsg: 'params error' } }));
    const connector = new BybitConnector(connectorDeps('bybit', fetch, { clock: time.clock }));

    const result = await connector.fetchHistoricalDaily('BTCUSDT', new Date(JAN_1), new Date(JAN_3_END));

    expect(result).toEqual({
      records: [],
      error: { kind: 'parameter', message: 'Bybit API error 10001: params error', status: 400 }
    });
  });

  it('should retry server errors and then report them', async () => {
    const { fetch, requests } = createFetchStub(() => ({ status: 500, body: 'oops' }));
    const connector = new BybitConnector(connectorDeps('bybit', fetch, { clock: time.clock, maxRetries: 2 }));

    const result = await connector.fetchHistoricalDaily('BTCUSDT', new Date(JAN_1), new Date(JAN_3_END));

    expect(requests).toHaveLength(3);
    expect(result.error).toEqual({
      kind: 'upstream_protocol',
      message: 'bybit GET /v5/market/kline 500: oops',
      status: 500
    });
  });

  it('should reject an inverted range without calling the exchange', async () => {
    const { fetch, requests } = createFetchStub(() => ({ body: {} }));
    const connector = new BybitConnector(connectorDeps('bybit', fetch, { clock: time.clock }));

    const result = await connector.fetchHistoricalDaily('BTCUSDT', new Date(JAN_3), new Date(JAN_1));

    expect(result.error?.kind).toBe('parameter');
    expect(requests).toHaveLength(0);
  });

  it('should sum USDT and USDC linear turnover for the 24h figure', async () => {
    const { fetch, requests } = createFetchStub(() => ({
      body: {
        retCode: 0,
        retMsg: 'OK',
        result: {
          category: 'linear',
          list: [
            { symbol: 'BTCUSDT', turnover24h: '1000000.5' },
            { symbol: 'ETHUSDC', turnover24h: '500000' },
            { symbol: 'BTCPERP', turnover24h: '999' }
          ]
        }
      }
    }));
    const connector = new BybitConnector(connectorDeps('bybit', fetch, { clock: time.clock }));

    const info = await connector.fetchLatest24h();

    expect(info).toEqual({
      platform: 'bybit',
      symbol: 'ALL_LINEAR_USD_PERPETUALS',
      volume24hUsd: 1500000.5,
      timestamp: new Date(time.now)
    });
    expect(requests[0].url.search).toBe('?category=linear');
  });

  it('should report an empty ticker list as an error entry', async () => {
    const { fetch } = createFetchStub(() => ({ body: { retCode: 0, retMsg: 'OK', result: { list: [] } } }));
    const connector = new BybitConnector(connectorDeps('bybit', fetch, { clock: time.clock }));

    const info = await connector.fetchLatest24h();

    expect(info.volume24hUsd).toBe(0);
    expect(info.error).toBe('No ticker data found');
    expect(info.errorKind).toBe('upstream_protocol');
  });

  it('should classify Bybit return codes', () => {
    expect(bybitApiError(10003, 'invalid key').kind).toBe('auth');
    expect(bybitApiError(10006, 'too many visits').kind).toBe('rate_limited');
    expect(bybitApiError(10016, 'server error').retryable).toBe(true);
    expect(bybitApiError(99999, 'unknown').retryable).toBe(false);
  });
});
