import crypto from 'crypto';

export type QueryValue = string | number | boolean;
export type QueryParams = Record<string, QueryValue | null | undefined>;

/** Drops absent values and stringifies the rest. */
export function compactParams(params: QueryParams): Record<string, string> {
  const result: Record<string, string> = {};
  for (const [key, value] of Object.entries(params)) {
    if (value !== undefined && value !== null) {
      result[key] = String(value);
    }
  }
  return result;
}

/**
 * `k1=v1&k2=v2` with keys in lexicographic order. Values are not URL-encoded:
 * the exchange signs the raw text.
 */
export function canonicalQuery(params: QueryParams): string {
  const compact = compactParams(params);
  return Object.keys(compact)
    .sort()
    .map(key => `${key}=${compact[key]}`)
    .join('&');
}

export function hmacSha256Hex(secret: string, payload: string): string {
  return crypto.createHmac('sha256', secret).update(payload).digest('hex');
}

/** HMAC-SHA256 over `canonicalQuery|timestamp`. */
export function signRequest(secret: string, params: QueryParams, timestamp: number): string {
  return hmacSha256Hex(secret, `${canonicalQuery(params)}|${timestamp}`);
}

export function hmacAuthHeaders(
  apiKey: string,
  apiSecret: string,
  params: QueryParams,
  timestamp: number
): Record<string, string> {
  return {
    'x-api-key': apiKey,
    'x-api-signature': signRequest(apiSecret, params, timestamp),
    'x-api-timestamp': String(timestamp)
  };
}
