import jwt from 'jsonwebtoken';
import logger from '../../../utils/logger';
import { CacheService } from '../CacheService';
import { AuthError } from '../ErrorHandler';
import { HttpClient } from '../HttpClient';
import { paradexAuthResponseSchema, paradexSystemConfigSchema, tokenEntrySchema } from '../schemas';
import { Clock, Credential } from '../types';
import { buildAuthTypedData, encodeChainId, formatSignatureHeader, signTypedData } from './typedDataSigner';

export interface ParadexAuthenticatorOptions {
  http: HttpClient;
  cache: CacheService;
  /** Lifetime of the signed auth request; the platform caps it at 7 days. */
  signatureTtlSeconds: number;
  /** Clear-text chain name; fetched from /v1/system/config when absent. */
  chainId?: string;
  clock?: Clock;
  skewSeconds?: number;
}

const MAX_SIGNATURE_TTL_SECONDS = 7 * 24 * 60 * 60;
const DEFAULT_TOKEN_LIFETIME_SECONDS = 5 * 60;

/**
 * Exchanges a Stark-signed auth request for a JWT and keeps the token in the
 * cache until shortly before it expires.
 */
export class ParadexAuthenticator {
  private readonly clock: Clock;
  private readonly skewSeconds: number;
  private chainIdLookup: Promise<string> | null = null;

  constructor(private readonly options: ParadexAuthenticatorOptions) {
    if (options.signatureTtlSeconds <= 0 || options.signatureTtlSeconds > MAX_SIGNATURE_TTL_SECONDS) {
      throw new Error(`Paradex signature TTL must be within (0, ${MAX_SIGNATURE_TTL_SECONDS}] seconds`);
    }
    this.clock = options.clock ?? Date.now;
    this.skewSeconds = options.skewSeconds ?? 30;
  }

  /** Whether the credential can produce a bearer token at all. */
  canAuthenticate(credential: Credential | null | undefined): boolean {
    if (!credential) {
      return false;
    }
    return Boolean(credential.jwtToken || (credential.starknetAccount && credential.starknetPrivateKey));
  }

  async bearerToken(credential: Credential): Promise<string> {
    if (credential.jwtToken) {
      return credential.jwtToken;
    }

    const account = credential.starknetAccount;
    const privateKey = credential.starknetPrivateKey;
    if (!account || !privateKey) {
      throw new AuthError('Paradex credential needs a JWT or a Starknet account and private key');
    }

    // Reuse a cached token until it is within the skew of expiry
    const key = this.cacheKey(account);
    const cached = await this.options.cache.get(key, tokenEntrySchema);
    if (cached && cached.expiresAt - this.skewSeconds * 1000 > this.clock()) {
      return cached.token;
    }

    // Sign in again and cache for the remaining lifetime
    const token = await this.authenticate(account, privateKey);
    const expiresAt = this.tokenExpiry(token);
    const ttlSeconds = Math.floor((expiresAt - this.clock()) / 1000) - this.skewSeconds;
    if (ttlSeconds > 0) {
      await this.options.cache.set(key, { token, expiresAt }, ttlSeconds);
    }
    return token;
  }

  /** Drops a cached token, e.g. after the platform rejected it. */
  async invalidate(credential: Credential): Promise<void> {
    if (credential.starknetAccount) {
      await this.options.cache.delete(this.cacheKey(credential.starknetAccount));
    }
  }

  async resolveChainId(): Promise<string> {
    if (this.options.chainId) {
      return encodeChainId(this.options.chainId);
    }
    if (!this.chainIdLookup) {
      this.chainIdLookup = this.fetchChainId();
    }
    try {
      return await this.chainIdLookup;
    } catch (error) {
      // Forget failed lookups so the next call retries
      this.chainIdLookup = null;
      throw error;
    }
  }

  private async fetchChainId(): Promise<string> {
    const raw = await this.options.http.requestJson({ path: '/v1/system/config' });
    const config = paradexSystemConfigSchema.parse(raw);
    return encodeChainId(config.starknet_chain_id);
  }

  private async authenticate(account: string, privateKey: string): Promise<string> {
    const chainId = await this.resolveChainId();
    const timestamp = Math.floor(this.clock() / 1000);
    const expiration = timestamp + this.options.signatureTtlSeconds;

    const data = buildAuthTypedData(chainId, {
      method: 'POST',
      path: '/v1/auth',
      body: '',
      timestamp,
      expiration
    });
    const signature = signTypedData(data, account, privateKey);

    const raw = await this.options.http.requestJson({
      method: 'POST',
      path: '/v1/auth',
      headers: {
        'PARADEX-STARKNET-ACCOUNT': account,
        'PARADEX-STARKNET-SIGNATURE': formatSignatureHeader(signature),
        'PARADEX-TIMESTAMP': String(timestamp),
        'PARADEX-SIGNATURE-EXPIRATION': String(expiration)
      }
    });

    const parsed = paradexAuthResponseSchema.safeParse(raw);
    if (!parsed.success) {
      throw new AuthError('Paradex auth response carried no jwt_token');
    }
    logger.info('Obtained Paradex JWT', { account });
    return parsed.data.jwt_token;
  }

  private tokenExpiry(token: string): number {
    const decoded = jwt.decode(token);
    if (decoded && typeof decoded === 'object' && typeof decoded.exp === 'number') {
      return decoded.exp * 1000;
    }
    return this.clock() + DEFAULT_TOKEN_LIFETIME_SECONDS * 1000;
  }

  private cacheKey(account: string): string {
    return `paradex:jwt:${account.toLowerCase()}`;
  }
}
