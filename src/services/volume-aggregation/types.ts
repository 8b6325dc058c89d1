export type PlatformId = 'bybit' | 'hyperliquid' | 'woox' | 'paradex';

export const PLATFORM_IDS: readonly PlatformId[] = ['bybit', 'hyperliquid', 'woox', 'paradex'];

export type ErrorKind =
  | 'transient_network'
  | 'rate_limited'
  | 'upstream_protocol'
  | 'auth'
  | 'parameter'
  | 'serialization'
  | 'price_unavailable';

/** Milliseconds since the epoch. Injected wherever time matters so tests can move it. */
export type Clock = () => number;

export type Sleep = (ms: number) => Promise<void>;

export interface DailyVolumeRecord {
  platform: PlatformId;
  symbol: string;
  /** UTC calendar day, YYYY-MM-DD */
  date: string;
  open: number;
  high: number;
  low: number;
  close: number;
  volumeQuoteUsd: number;
}

export interface ExchangeVolumeInfo {
  platform: PlatformId;
  /** Market symbol, or a scope label such as WOOX_CONFIGURED_MARKETS */
  symbol: string;
  volume24hUsd: number;
  timestamp: Date;
  error?: string;
  errorKind?: ErrorKind;
}

export interface AggregatedVolume {
  totalVolume24hUsd: number;
  lastUpdated: Date;
  platforms: ExchangeVolumeInfo[];
}

export interface AggregatedHistoricalPoint {
  date: string;
  totalVolumeUsd: number;
}

export interface Credential {
  platform: PlatformId;
  apiKey: string;
  apiSecret?: string;
  jwtToken?: string;
  starknetAccount?: string;
  starknetPrivateKey?: string;
}

export interface ConnectorError {
  kind: ErrorKind;
  message: string;
  status?: number;
}

export interface HistoricalFetchResult {
  records: DailyVolumeRecord[];
  error?: ConnectorError;
}

export type FetchStatus = 'success' | 'partial_success' | 'error';

export interface PlatformFetchResult {
  platform: PlatformId;
  status: FetchStatus;
  fetched: number;
  stored: number;
  errors: string[];
  message?: string;
}

export function isPlatformId(value: string): value is PlatformId {
  return PLATFORM_IDS.some(platform => platform === value);
}
