import fetch, { RequestInit, Response } from 'node-fetch';
import logger from '../../utils/logger';
import { SerializationError, classifyHttpError, toVolumeAggregatorError } from './ErrorHandler';
import { RateLimiter } from './RateLimiter';
import { QueryParams, compactParams } from './signing/hmacSigner';

export type HttpFetch = (url: string, init?: RequestInit) => Promise<Response>;

export interface HttpRequest {
  method?: 'GET' | 'POST';
  path: string;
  query?: QueryParams;
  body?: unknown;
  headers?: Record<string, string>;
}

export interface HttpClientOptions {
  /** Prefix for log lines and error messages, usually the platform id. */
  name: string;
  baseUrl: string;
  timeoutMs: number;
  fetch?: HttpFetch;
  rateLimiter?: RateLimiter;
}

/**
 * JSON over node-fetch with a hard per-request timeout. Non-2xx statuses and
 * transport failures are raised as typed errors for the pagination engine.
 */
export class HttpClient {
  private readonly fetchImpl: HttpFetch;

  constructor(private readonly options: HttpClientOptions) {
    this.fetchImpl = options.fetch ?? fetch;
  }

  get name(): string {
    return this.options.name;
  }

  buildUrl(path: string, query: QueryParams = {}): string {
    const urlObj = new URL(path, this.options.baseUrl);
    for (const [key, value] of Object.entries(compactParams(query))) {
      urlObj.searchParams.set(key, value);
    }
    return urlObj.toString();
  }

  async requestJson(request: HttpRequest): Promise<unknown> {
    const method = request.method ?? 'GET';
    const url = this.buildUrl(request.path, request.query);
    const headers: Record<string, string> = { Accept: 'application/json', ...request.headers };
    const init: RequestInit = { method, headers, timeout: this.options.timeoutMs };

    if (request.body !== undefined) {
      headers['Content-Type'] = 'application/json';
      init.body = JSON.stringify(request.body);
    }

    // Wait for rate limit
    if (this.options.rateLimiter) {
      await this.options.rateLimiter.waitForToken(this.options.name);
    }

    let response: Response;
    try {
      logger.debug(`${this.options.name} ${method} ${url}`);
      response = await this.fetchImpl(url, init);
    } catch (error) {
      throw toVolumeAggregatorError(error);
    }

    const text = await response.text();
    if (!response.ok) {
      // Retry-After blocks every caller sharing this limiter
      if (response.status === 429 && this.options.rateLimiter) {
        const retryAfter = Number(response.headers.get('retry-after'));
        if (Number.isFinite(retryAfter) && retryAfter > 0) {
          this.options.rateLimiter.blockService(this.options.name, retryAfter * 1000);
        }
      }
      throw classifyHttpError(response.status, text, `${this.options.name} ${method} ${request.path}`);
    }

    if (text.trim() === '') {
      return null;
    }
    try {
      const data: unknown = JSON.parse(text);
      return data;
    } catch (error) {
      throw new SerializationError(`${this.options.name} ${request.path} returned invalid JSON`);
    }
  }
}
