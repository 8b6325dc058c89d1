import { FetchError } from 'node-fetch';
import { ZodError } from 'zod';
import { ConnectorError, ErrorKind, PlatformId } from './types';

export abstract class VolumeAggregatorError extends Error {
  abstract readonly kind: ErrorKind;
  readonly status?: number;

  constructor(message: string, status?: number) {
    super(message);
    this.name = new.target.name;
    this.status = status;
  }

  /** Whether the pagination engine may repeat the same request. */
  get retryable(): boolean {
    return false;
  }
}

export class TransientNetworkError extends VolumeAggregatorError {
  readonly kind = 'transient_network' as const;

  get retryable(): boolean {
    return true;
  }
}

export class RateLimitedError extends VolumeAggregatorError {
  readonly kind = 'rate_limited' as const;

  constructor(message: string) {
    super(message, 429);
  }

  get retryable(): boolean {
    return true;
  }
}

export class UpstreamProtocolError extends VolumeAggregatorError {
  readonly kind = 'upstream_protocol' as const;

  get retryable(): boolean {
    return this.status !== undefined && this.status >= 500;
  }
}

export class AuthError extends VolumeAggregatorError {
  readonly kind = 'auth' as const;
}

export class ParameterError extends VolumeAggregatorError {
  readonly kind = 'parameter' as const;
}

export class SerializationError extends VolumeAggregatorError {
  readonly kind = 'serialization' as const;
}

export class PriceUnavailableError extends VolumeAggregatorError {
  readonly kind = 'price_unavailable' as const;

  constructor(readonly symbol: string, reason: string) {
    super(`USD price unavailable for ${symbol}: ${reason}`);
  }
}

function describeBody(body: string): string {
  const trimmed = body.trim();
  return trimmed.length > 200 ? `${trimmed.slice(0, 200)}...` : trimmed;
}

/**
 * Maps a non-2xx HTTP status onto the error taxonomy.
 */
export function classifyHttpError(status: number, body: string, context = 'HTTP'): VolumeAggregatorError {
  const detail = body ? `: ${describeBody(body)}` : '';
  const message = `${context} ${status}${detail}`;

  if (status === 429) {
    return new RateLimitedError(message);
  }
  if (status >= 500) {
    return new UpstreamProtocolError(message, status);
  }
  if (status === 401 || status === 403) {
    return new AuthError(message, status);
  }
  if (status >= 400) {
    return new ParameterError(message, status);
  }
  return new UpstreamProtocolError(message, status);
}

export function toVolumeAggregatorError(error: unknown): VolumeAggregatorError {
  if (error instanceof VolumeAggregatorError) {
    return error;
  }
  if (error instanceof FetchError) {
    return new TransientNetworkError(`${error.type}: ${error.message}`);
  }
  if (error instanceof ZodError) {
    const issue = error.issues[0];
    const path = issue ? issue.path.join('.') : '';
    return new SerializationError(`Unexpected payload${path ? ` at ${path}` : ''}: ${issue ? issue.message : error.message}`);
  }
  if (error instanceof SyntaxError) {
    return new SerializationError(`Invalid JSON: ${error.message}`);
  }
  if (error instanceof Error) {
    if (error.name === 'AbortError') {
      return new TransientNetworkError(`Request aborted: ${error.message}`);
    }
    return new UpstreamProtocolError(error.message);
  }
  return new UpstreamProtocolError(String(error));
}

export function toConnectorError(error: unknown): ConnectorError {
  const normalized = toVolumeAggregatorError(error);
  const result: ConnectorError = { kind: normalized.kind, message: normalized.message };
  if (normalized.status !== undefined) {
    result.status = normalized.status;
  }
  return result;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

interface ErrorStat {
  count: number;
  lastError: Date;
  lastKind: ErrorKind;
}

/**
 * Tracks per-platform failures so health checks can report which upstreams are degraded.
 */
export class VolumeAggregatorErrorHandler {
  private errorStats: Map<PlatformId, ErrorStat> = new Map();

  record(platform: PlatformId, error: ConnectorError, at: Date = new Date()): void {
    const current = this.errorStats.get(platform);
    this.errorStats.set(platform, {
      count: (current ? current.count : 0) + 1,
      lastError: at,
      lastKind: error.kind
    });
  }

  getErrorStats(): Partial<Record<PlatformId, ErrorStat>> {
    return Object.fromEntries(this.errorStats.entries());
  }

  reset(): void {
    this.errorStats.clear();
  }
}
