import logger from '../../../utils/logger';
import { DAY_MS } from '../DataNormalizer';
import { AuthError, toConnectorError } from '../ErrorHandler';
import { PaginationResult } from '../PaginationEngine';
import { ParadexFill, paradexFillSchema, paradexFillsEnvelopeSchema } from '../schemas';
import { ParadexAuthenticator } from '../signing/ParadexAuthenticator';
import { Credential, ExchangeVolumeInfo, HistoricalFetchResult, PlatformId } from '../types';
import { BaseExchangeConnector, ConnectorDependencies } from './ExchangeConnector';

const PAGE_SIZE = 5000;

/**
 * Account fills from Paradex. Requests carry a JWT obtained by signing a
 * Starknet typed-data auth request.
 */
export class ParadexConnector extends BaseExchangeConnector {
  readonly requiresCredential = true;

  constructor(deps: ConnectorDependencies, private readonly authenticator: ParadexAuthenticator) {
    super(deps);
  }

  platformName(): PlatformId {
    return 'paradex';
  }

  protected scopeLabel(): string {
    return 'PARADEX_ACCOUNT_TOTAL';
  }

  /**
   * Fills for one market, or the whole account when `market` is omitted. A
   * token the platform rejects is dropped and reissued once.
   */
  async fetchFills(
    credential: Credential,
    start: number,
    end: number,
    market?: string
  ): Promise<PaginationResult<ParadexFill>> {
    const token = await this.authenticator.bearerToken(credential);
    const result = await this.fetchFillPages(token, start, end, market);

    if (result.error?.kind === 'auth' && !credential.jwtToken) {
      logger.warn('Paradex rejected the cached token, re-authenticating');
      await this.authenticator.invalidate(credential);
      const fresh = await this.authenticator.bearerToken(credential);
      return this.fetchFillPages(fresh, start, end, market);
    }
    return result;
  }

  protected async fetchDaily(
    symbol: string,
    start: Date,
    end: Date,
    credential: Credential | null
  ): Promise<HistoricalFetchResult> {
    const account = this.requireCredential(credential);
    const result = await this.fetchFills(account, this.windowStart(start), end.getTime(), symbol);

    const fills = result.items.map(fill => ({ price: fill.price, size: fill.size, timestamp: fill.created_at }));
    const records = this.normalizer.aggregateFillsByDay('paradex', symbol, fills);
    const { quote } = this.normalizer.parseMarket('paradex', symbol);
    const converted = await this.convertRecords(records, quote, start, end);

    return result.error ? { records: converted, error: toConnectorError(result.error) } : { records: converted };
  }

  protected async fetch24h(credential: Credential | null): Promise<ExchangeVolumeInfo> {
    const account = this.requireCredential(credential);
    const end = this.clock();
    const result = await this.fetchFills(account, end - DAY_MS, end);

    const notionalByMarket = new Map<string, number>();
    for (const fill of result.items) {
      notionalByMarket.set(fill.market, (notionalByMarket.get(fill.market) ?? 0) + fill.price * fill.size);
    }

    let total = 0;
    for (const [market, notional] of notionalByMarket) {
      total += notional * (await this.quoteToUsd(market));
    }

    return this.volumeInfo(this.scopeLabel(), total, result.error);
  }

  private requireCredential(credential: Credential | null): Credential {
    if (!credential || !this.authenticator.canAuthenticate(credential)) {
      throw new AuthError('Paradex JWT or Starknet account credentials are required');
    }
    return credential;
  }

  private fetchFillPages(
    token: string,
    start: number,
    end: number,
    market?: string
  ): Promise<PaginationResult<ParadexFill>> {
    return this.paginate<ParadexFill, string>({
      label: `paradex list-fills ${market ?? 'account'}`,
      initialCursor: '',
      identity: fill => fill.id,
      timestamp: fill => fill.created_at,
      fetchPage: async cursor => {
        const raw = await this.http.requestJson({
          path: '/v1/account/list-fills',
          query: {
            market,
            start_at: start,
            end_at: end,
            page_size: PAGE_SIZE,
            cursor: cursor || undefined
          },
          headers: { Authorization: `Bearer ${token}` }
        });
        const envelope = paradexFillsEnvelopeSchema.parse(raw);
        const fills = this.parseItems(paradexFillSchema, envelope.results, `paradex fills ${market ?? 'account'}`);
        return { items: fills, nextCursor: envelope.next || null };
      }
    });
  }
}
