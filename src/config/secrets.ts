/**
 * Secrets Configuration
 * Exchange credentials read from the environment. Values are never logged.
 */

import * as dotenv from 'dotenv';
import logger from '../utils/logger';
import { Credential, PLATFORM_IDS, PlatformId } from '../services/volume-aggregation/types';

dotenv.config();

export interface CredentialProvider {
  getCredential(platform: PlatformId): Promise<Credential | null>;
}

/**
 * Builds credentials from `<PLATFORM>_API_KEY` / `<PLATFORM>_API_SECRET`, plus
 * `PARADEX_JWT`, `PARADEX_ACCOUNT_ADDRESS` and `PARADEX_PRIVATE_KEY`.
 */
export class EnvCredentialProvider implements CredentialProvider {
  constructor(private readonly env: NodeJS.ProcessEnv = process.env) {}

  async getCredential(platform: PlatformId): Promise<Credential | null> {
    return this.readCredential(platform);
  }

  readCredential(platform: PlatformId): Credential | null {
    const prefix = platform.toUpperCase();
    const apiKey = this.env[`${prefix}_API_KEY`] || '';
    const apiSecret = this.env[`${prefix}_API_SECRET`] || undefined;

    if (platform === 'paradex') {
      const jwtToken = this.env.PARADEX_JWT || undefined;
      const starknetAccount = this.env.PARADEX_ACCOUNT_ADDRESS || undefined;
      const starknetPrivateKey = this.env.PARADEX_PRIVATE_KEY || undefined;
      if (!jwtToken && !(starknetAccount && starknetPrivateKey)) {
        return null;
      }
      return { platform, apiKey: apiKey || starknetAccount || '', jwtToken, starknetAccount, starknetPrivateKey };
    }

    if (!apiKey) {
      return null;
    }
    return { platform, apiKey, apiSecret };
  }
}

export class SecretsManager implements CredentialProvider {
  private static instance: SecretsManager | undefined;
  private credentials: Map<PlatformId, Credential> = new Map();

  constructor(private readonly source: EnvCredentialProvider = new EnvCredentialProvider()) {
    this.loadSecrets();
  }

  static getInstance(): SecretsManager {
    if (!SecretsManager.instance) {
      SecretsManager.instance = new SecretsManager();
    }
    return SecretsManager.instance;
  }

  private loadSecrets(): void {
    for (const platform of PLATFORM_IDS) {
      const credential = this.source.readCredential(platform);
      if (credential) {
        this.credentials.set(platform, credential);
        logger.info(`${platform} credentials loaded`);
      } else {
        logger.debug(`${platform} credentials not found in environment`);
      }
    }
  }

  async getCredential(platform: PlatformId): Promise<Credential | null> {
    return this.credentials.get(platform) ?? null;
  }

  /**
   * Update credentials (runtime update)
   */
  updateCredential(credential: Credential): void {
    this.credentials.set(credential.platform, credential);
    logger.info(`${credential.platform} credentials updated`);
  }

  /**
   * Platforms whose fills need credentials but have none
   */
  missingCredentials(required: PlatformId[]): PlatformId[] {
    const missing = required.filter(platform => !this.credentials.has(platform));
    if (missing.length > 0) {
      logger.warn(`Missing credentials: ${missing.join(', ')}`);
    }
    return missing;
  }

  /**
   * Clear sensitive data from memory
   */
  clearSecrets(): void {
    this.credentials.clear();
    logger.info('Secrets cleared from memory');
  }
}
