import * as dotenv from 'dotenv';
import logger from '../utils/logger';
import { PriceFallbackPolicy } from '../services/volume-aggregation/PriceService';
import { PLATFORM_IDS, PlatformId } from '../services/volume-aggregation/types';

dotenv.config();

export interface PlatformConfig {
  endpoint: string;
  /** requests per second */
  rateLimit: number;
  symbols: string[];
  enabled: boolean;
}

export interface VolumeAggregatorConfig {
  platforms: Record<PlatformId, PlatformConfig>;
  http: {
    timeoutMs: number;
  };
  retry: {
    maxRetries: number;
    retryDelayMs: number;
    maxPages: number;
  };
  aggregation: {
    platformTimeoutMs: number;
    historicalFetchDays: number;
  };
  cache: {
    ttl: {
      current: number;
      historical: number;
      price: number;
    };
    maxSize: number;
    redisUrl?: string;
  };
  price: {
    endpoint: string;
    apiKey?: string;
    fallbackPolicy: PriceFallbackPolicy;
  };
  woox: {
    archiveBoundaryDays: number;
  };
  paradex: {
    signatureTtlSeconds: number;
    chainId?: string;
  };
  database: {
    supabaseUrl?: string;
    supabaseKey?: string;
  };
  logLevel: string;
}

export interface ConfigHealth {
  status: 'healthy' | 'warning' | 'error';
  issues: string[];
  recommendations: string[];
}

const PLATFORM_DEFAULTS: Record<PlatformId, Omit<PlatformConfig, 'enabled'>> = {
  bybit: {
    endpoint: 'https://api.bybit.com',
    rateLimit: 10,
    symbols: ['BTCUSDT', 'ETHUSDT']
  },
  hyperliquid: {
    endpoint: 'https://api.hyperliquid.xyz',
    rateLimit: 10,
    symbols: ['BTC', 'ETH']
  },
  woox: {
    endpoint: 'https://api.woox.io',
    rateLimit: 5, // private endpoints allow 5 req/s
    symbols: ['PERP_BTC_USDT', 'PERP_ETH_USDT']
  },
  paradex: {
    endpoint: 'https://api.prod.paradex.trade',
    rateLimit: 10,
    symbols: ['BTC-USD-PERP', 'ETH-USD-PERP']
  }
};

export class VolumeAggregatorConfigManager {
  private config: VolumeAggregatorConfig;

  constructor(private readonly env: NodeJS.ProcessEnv = process.env) {
    this.config = this.buildConfiguration();
    this.validateConfiguration();
  }

  private buildConfiguration(): VolumeAggregatorConfig {
    return {
      platforms: {
        bybit: this.buildPlatformConfig('bybit'),
        hyperliquid: this.buildPlatformConfig('hyperliquid'),
        woox: this.buildPlatformConfig('woox'),
        paradex: this.buildPlatformConfig('paradex')
      },
      http: {
        timeoutMs: this.parseNumber('REQUEST_TIMEOUT', 30000)
      },
      retry: {
        maxRetries: this.parseNumber('MAX_RETRIES', 3),
        retryDelayMs: this.parseNumber('RETRY_DELAY', 5000),
        maxPages: this.parseNumber('MAX_PAGES', 200)
      },
      aggregation: {
        platformTimeoutMs: this.parseNumber('PLATFORM_TIMEOUT', 120000),
        historicalFetchDays: this.parseNumber('HISTORICAL_DATA_FETCH_DAYS', 30)
      },
      cache: {
        ttl: {
          current: this.parseNumber('CACHE_TTL_CURRENT', 300), // 5 minutes
          historical: this.parseNumber('CACHE_TTL_HISTORICAL', 3600), // 1 hour
          price: this.parseNumber('CACHE_TTL_PRICE', 300)
        },
        maxSize: this.parseNumber('CACHE_MAX_SIZE', 10000),
        redisUrl: this.env.REDIS_URL || undefined
      },
      price: {
        endpoint: this.env.COINGECKO_ENDPOINT || 'https://api.coingecko.com/api/v3',
        apiKey: this.env.COINGECKO_API_KEY || undefined,
        fallbackPolicy: this.parseFallbackPolicy(this.env.PRICE_FALLBACK_POLICY)
      },
      woox: {
        archiveBoundaryDays: this.parseNumber('WOOX_ARCHIVE_BOUNDARY_DAYS', 90)
      },
      paradex: {
        signatureTtlSeconds: this.parseNumber('PARADEX_SIGNATURE_TTL', 86400), // 24 hours
        chainId: this.env.PARADEX_CHAIN_ID || undefined
      },
      database: {
        supabaseUrl: this.env.SUPABASE_URL || undefined,
        supabaseKey: this.env.SUPABASE_SERVICE_ROLE_KEY || undefined
      },
      logLevel: this.env.LOG_LEVEL || 'info'
    };
  }

  private buildPlatformConfig(platform: PlatformId): PlatformConfig {
    const prefix = platform.toUpperCase();
    const defaults = PLATFORM_DEFAULTS[platform];
    return {
      endpoint: this.env[`${prefix}_ENDPOINT`] || defaults.endpoint,
      rateLimit: this.parseNumber(`${prefix}_RATE_LIMIT`, defaults.rateLimit),
      symbols: this.parseList(this.env[`${prefix}_SYMBOLS`], defaults.symbols),
      enabled: this.parseBool(this.env[`ENABLE_${prefix}`], true)
    };
  }

  private validateConfiguration(): void {
    const errors: string[] = [];

    for (const [name, platform] of Object.entries(this.config.platforms)) {
      if (platform.enabled && (!(platform.rateLimit > 0) || platform.rateLimit > 100)) {
        errors.push(`Invalid rate limit for ${name}: ${platform.rateLimit}`);
      }
      if (!/^https?:\/\//.test(platform.endpoint)) {
        errors.push(`Invalid endpoint for ${name}: ${platform.endpoint}`);
      }
    }

    if (!(this.config.cache.maxSize > 0)) {
      errors.push(`Invalid cache max size: ${this.config.cache.maxSize}`);
    }

    for (const [type, ttl] of Object.entries(this.config.cache.ttl)) {
      if (!(ttl > 0)) {
        errors.push(`Invalid cache TTL for ${type}: ${ttl}`);
      }
    }

    if (!(this.config.retry.maxRetries >= 0) || this.config.retry.maxRetries > 10) {
      errors.push(`Invalid max retries: ${this.config.retry.maxRetries}`);
    }
    if (!(this.config.retry.retryDelayMs >= 0) || this.config.retry.retryDelayMs > 60000) {
      errors.push(`Invalid retry delay: ${this.config.retry.retryDelayMs}`);
    }
    if (!(this.config.retry.maxPages >= 1)) {
      errors.push(`Invalid max pages: ${this.config.retry.maxPages}`);
    }
    if (!(this.config.http.timeoutMs >= 1000) || this.config.http.timeoutMs > 120000) {
      errors.push(`Invalid timeout: ${this.config.http.timeoutMs}`);
    }
    if (!(this.config.aggregation.historicalFetchDays >= 1)) {
      errors.push(`Invalid historical fetch days: ${this.config.aggregation.historicalFetchDays}`);
    }
    if (!(this.config.aggregation.platformTimeoutMs >= 1000) || this.config.aggregation.platformTimeoutMs > 600000) {
      errors.push(`Invalid platform timeout: ${this.config.aggregation.platformTimeoutMs}`);
    }
    if (!(this.config.woox.archiveBoundaryDays >= 1) || this.config.woox.archiveBoundaryDays > 3650) {
      errors.push(`Invalid WOO X archive boundary days: ${this.config.woox.archiveBoundaryDays}`);
    }

    const signatureTtl = this.config.paradex.signatureTtlSeconds;
    if (!(signatureTtl > 0) || signatureTtl > 7 * 24 * 60 * 60) {
      errors.push(`Invalid Paradex signature TTL: ${signatureTtl} (platform maximum is 7 days)`);
    }

    if (this.enabledPlatforms().length === 0) {
      errors.push('At least one platform must be enabled');
    }

    if (errors.length > 0) {
      logger.error('Configuration validation failed:', errors);
      throw new Error(`Configuration validation failed: ${errors.join(', ')}`);
    }

    logger.info('Configuration validated successfully', {
      enabledPlatforms: this.enabledPlatforms(),
      cacheTtl: this.config.cache.ttl,
      retry: this.config.retry
    });
  }

  private parseNumber(name: string, defaultValue: number): number {
    const raw = this.env[name];
    if (raw === undefined || raw.trim() === '') return defaultValue;
    return Number(raw);
  }

  private parseBool(value: string | undefined, defaultValue: boolean): boolean {
    if (value === undefined || value === '') return defaultValue;
    return value.toLowerCase() === 'true' || value === '1';
  }

  private parseList(value: string | undefined, defaultValue: string[]): string[] {
    if (value === undefined) return [...defaultValue];
    return value
      .split(',')
      .map(item => item.trim())
      .filter(item => item.length > 0);
  }

  private parseFallbackPolicy(value: string | undefined): PriceFallbackPolicy {
    if (value === undefined || value === '' || value === 'default_to_one') return 'default_to_one';
    if (value === 'fail_fast') return 'fail_fast';
    throw new Error(`Configuration validation failed: unknown PRICE_FALLBACK_POLICY ${value}`);
  }

  getConfiguration(): VolumeAggregatorConfig {
    return this.config;
  }

  getPlatformConfig(platform: PlatformId): PlatformConfig {
    return this.config.platforms[platform];
  }

  enabledPlatforms(): PlatformId[] {
    return PLATFORM_IDS.filter(platform => this.config.platforms[platform].enabled);
  }

  isPlatformEnabled(platform: PlatformId): boolean {
    return this.config.platforms[platform].enabled;
  }

  async healthCheck(): Promise<ConfigHealth> {
    const issues: string[] = [];
    const recommendations: string[] = [];

    const missingSymbols = this.enabledPlatforms().filter(
      platform => this.config.platforms[platform].symbols.length === 0
    );
    if (missingSymbols.length > 0) {
      issues.push(`No symbols configured for: ${missingSymbols.join(', ')}`);
    }

    if (!this.config.database.supabaseUrl || !this.config.database.supabaseKey) {
      recommendations.push('SUPABASE_URL/SUPABASE_SERVICE_ROLE_KEY unset; historical records are kept in memory only');
    }
    if (!this.config.cache.redisUrl) {
      recommendations.push('REDIS_URL unset; cache is process-local');
    }
    if (this.config.cache.ttl.current > 600) {
      recommendations.push(`Long current-volume TTL (${this.config.cache.ttl.current}s) may reduce data freshness`);
    }

    let status: ConfigHealth['status'] = 'healthy';
    if (issues.length > 0) status = 'error';
    else if (recommendations.length > 0) status = 'warning';

    return { status, issues, recommendations };
  }
}
