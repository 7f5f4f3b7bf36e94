import Bottleneck from 'bottleneck';
import { z } from 'zod';
import { fetchWithRetry } from '../utils/fetchWithRetry.ts';
import { log as rootLog, type Logger } from '../utils/logger.ts';
import type { FetchLike, PriceProvider } from './interfaces.ts';

const TokenPriceResponse = z.record(
  z.string(),
  z.object({ usd: z.number().nonnegative().optional() }),
);

export class CoinGeckoPriceProvider implements PriceProvider {
  readonly source = 'coingecko';

  private baseUrl: string;
  private apiKey: string | undefined;
  private platforms: Record<number, string>;
  private limiter: Bottleneck;
  private maxRetries: number;
  private initialBackoffMs: number;
  private fetchImpl: FetchLike;
  private log: Logger;

  constructor({
    baseUrl,
    apiKey,
    platforms,
    maxRetries = 3,
    initialBackoffMs = 1000,
    maxConcurrent = 1,
    minTime = 1200,
    fetch: fetchImpl = fetch,
    log = rootLog.child('coingecko'),
  }: {
    baseUrl: string;
    apiKey?: string;
    /** chain id → CoinGecko asset platform id */
    platforms: Record<number, string>;
    maxRetries?: number;
    initialBackoffMs?: number;
    maxConcurrent?: number;
    minTime?: number;
    fetch?: FetchLike;
    log?: Logger;
  }) {
    this.baseUrl = baseUrl.replace(/\/+$/, '');
    this.apiKey = apiKey;
    this.platforms = platforms;
    this.maxRetries = maxRetries;
    this.initialBackoffMs = initialBackoffMs;
    this.fetchImpl = fetchImpl;
    this.log = log;
    this.limiter = new Bottleneck({
      maxConcurrent,
      minTime, // space out the calls to stay under the public rate limit
    });
  }

  async getTokenPrices(
    networkId: number,
    addresses: readonly string[],
    signal?: AbortSignal,
  ): Promise<Record<string, number>> {
    const platform = this.platforms[networkId];
    if (!platform) {
      this.log.debug(`no price platform for network ${networkId}`);
      return {};
    }
    if (addresses.length === 0) return {};

    const query = new URLSearchParams({
      contract_addresses: addresses.map((a) => a.toLowerCase()).join(','),
      vs_currencies: 'usd',
    });
    const url = `${this.baseUrl}/simple/token_price/${platform}?${query.toString()}`;
    const headers: Record<string, string> = { Accept: 'application/json' };
    if (this.apiKey) headers['x-cg-demo-api-key'] = this.apiKey;

    const apiCall = () =>
      this.limiter.schedule(() => this.fetchImpl(url, { headers, signal }));
    const response = await fetchWithRetry(apiCall, this.maxRetries, this.initialBackoffMs, signal);
    if (!response.ok) {
      throw new Error(`CoinGecko token_price failed with HTTP ${response.status}`);
    }

    const parsed = TokenPriceResponse.safeParse(await response.json());
    if (!parsed.success) {
      throw new Error(`unexpected CoinGecko response: ${z.prettifyError(parsed.error)}`);
    }

    const prices: Record<string, number> = {};
    for (const [address, quote] of Object.entries(parsed.data)) {
      if (quote.usd !== undefined) prices[address.toLowerCase()] = quote.usd;
    }
    return prices;
  }
}
