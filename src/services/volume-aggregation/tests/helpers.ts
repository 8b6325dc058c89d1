import { Headers, RequestInit, Response } from 'node-fetch';
import { CacheService } from '../CacheService';
import { MemoryCacheStore } from '../cache/MemoryCacheStore';
import { ConnectorDependencies } from '../connectors/ExchangeConnector';
import { HttpClient, HttpFetch } from '../HttpClient';
import { PriceFallbackPolicy, PriceService, PriceSource } from '../PriceService';
import { Clock, PlatformId } from '../types';

export const TEST_BASE_URL = 'https://exchange.test';

export interface RecordedRequest {
  url: URL;
  method: string;
  headers: Record<string, string>;
  body?: string;
}

export interface StubResponse {
  status?: number;
  body: unknown;
  headers?: Record<string, string>;
}

export type StubHandler = (request: RecordedRequest) => StubResponse | Promise<StubResponse>;

/** In-process stand-in for node-fetch that records every request. */
export function createFetchStub(handler: StubHandler): { fetch: HttpFetch; requests: RecordedRequest[] } {
  const requests: RecordedRequest[] = [];

  const fetch: HttpFetch = async (url: string, init?: RequestInit) => {
    const headers: Record<string, string> = {};
    new Headers(init?.headers).forEach((value, key) => {
      headers[key] = value;
    });
    const request: RecordedRequest = {
      url: new URL(url),
      method: init?.method ?? 'GET',
      headers,
      body: typeof init?.body === 'string' ? init.body : undefined
    };
    requests.push(request);

    const reply = await handler(request);
    const text = typeof reply.body === 'string' ? reply.body : JSON.stringify(reply.body);
    return new Response(text, { status: reply.status ?? 200, headers: reply.headers });
  };

  return { fetch, requests };
}

export class ManualClock {
  constructor(public now: number) {}

  readonly clock: Clock = () => this.now;

  advance(ms: number): void {
    this.now += ms;
  }
}

export class FixedPriceSource implements PriceSource {
  readonly name = 'fixed';
  readonly calls: Array<{ symbol: string; asOf: Date }> = [];

  constructor(private readonly prices: Record<string, number>, private readonly failure?: Error) {}

  async fetchUsdPrice(symbol: string, asOf: Date): Promise<number | null> {
    this.calls.push({ symbol, asOf });
    if (this.failure) {
      throw this.failure;
    }
    return this.prices[symbol] ?? null;
  }
}

export const noSleep = async (_ms: number): Promise<void> => undefined;

export function createCache(clock: Clock): CacheService {
  return new CacheService(new MemoryCacheStore({ maxSize: 1000, clock }), {
    ttl: { current: 300, historical: 3600, price: 300 }
  });
}

export interface ConnectorHarnessOptions {
  symbols?: string[];
  clock?: Clock;
  prices?: Record<string, number>;
  fallbackPolicy?: PriceFallbackPolicy;
  maxPages?: number;
  maxRetries?: number;
}

export function connectorDeps(
  platform: PlatformId,
  fetch: HttpFetch,
  options: ConnectorHarnessOptions = {}
): ConnectorDependencies & { cache: CacheService } {
  const clock = options.clock ?? Date.now;
  const cache = createCache(clock);
  return {
    cache,
    http: new HttpClient({ name: platform, baseUrl: TEST_BASE_URL, timeoutMs: 5000, fetch }),
    prices: new PriceService({
      source: new FixedPriceSource(options.prices ?? {}),
      cache,
      ttlSeconds: 300,
      fallbackPolicy: options.fallbackPolicy ?? 'fail_fast',
      clock
    }),
    settings: {
      symbols: options.symbols ?? [],
      maxRetries: options.maxRetries ?? 2,
      retryDelayMs: 10,
      maxPages: options.maxPages ?? 50
    },
    clock,
    sleep: noSleep
  };
}
