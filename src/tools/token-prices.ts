import type { Baggage } from '../baggage/baggage.ts';
import { RAW_DATA, TOKEN_METADATA, TOKEN_PRICES } from '../baggage/keys.ts';
import type { Cache } from '../cache/cache.ts';
import { TTL, cacheKeys } from '../cache/keys.ts';
import type { PriceProvider } from '../services/interfaces.ts';
import { TokenPrice } from '../types/transaction.ts';
import { TOKEN_METADATA_ENRICHER } from './token-metadata.ts';
import {
  addRagItem,
  createRagContext,
  tryLookup,
  type RagContext,
  type Tool,
  type ToolContext,
} from './tool.ts';

export const ERC20_PRICE_LOOKUP = 'erc20_price_lookup';

export function formatPrice(price: number): string {
  return price < 0.01 ? `$${price.toFixed(6)}` : `$${price.toFixed(2)}`;
}

/** Current USD prices for the ERC20 tokens found by the metadata step. */
export class Erc20PriceLookup implements Tool {
  readonly name = ERC20_PRICE_LOOKUP;
  readonly description = 'Fetches current USD prices for the ERC20 tokens in the transaction';
  readonly dependencies: readonly string[] = [TOKEN_METADATA_ENRICHER];

  constructor(
    private provider: PriceProvider,
    private cache: Cache,
    private now: () => number = Date.now,
  ) {}

  async process(ctx: ToolContext, baggage: Baggage): Promise<void> {
    const raw = baggage.get(RAW_DATA);
    const metadata = baggage.get(TOKEN_METADATA) ?? {};
    const prices: Record<string, TokenPrice> = {};

    const tokens = Object.values(metadata)
      .filter((m) => m.type === 'ERC20')
      .map((m) => m.address);
    if (!raw || tokens.length === 0) {
      baggage.set(TOKEN_PRICES, prices);
      return;
    }

    const misses: string[] = [];
    for (const address of tokens) {
      const cached = await this.cache.getJSON(
        cacheKeys.tokenPrice(raw.networkId, address),
        TokenPrice,
      );
      if (cached) prices[address] = cached;
      else misses.push(address);
    }

    if (misses.length > 0) {
      const lookup = await tryLookup(ctx, `${this.provider.source} price lookup`, () =>
        this.provider.getTokenPrices(raw.networkId, misses, ctx.signal),
      );
      const quotes: Record<string, number> = lookup.ok ? lookup.value : {};
      for (const address of misses) {
        const usd = quotes[address];
        if (usd === undefined) continue;
        const price: TokenPrice = {
          contract: address,
          price: usd,
          currency: 'usd',
          source: this.provider.source,
          lastUpdatedMs: this.now(),
        };
        await this.cache.setJSON(cacheKeys.tokenPrice(raw.networkId, address), price, TTL.tokenPrice);
        prices[address] = price;
      }
    }

    baggage.set(TOKEN_PRICES, prices);
    ctx.log.debug(`priced ${Object.keys(prices).length}/${tokens.length} tokens`);
  }

  getPromptContext(_ctx: ToolContext, baggage: Baggage): string {
    const metadata = baggage.get(TOKEN_METADATA);
    const prices = baggage.get(TOKEN_PRICES);
    if (!metadata || !prices) return '';

    const lines: string[] = [];
    for (const [address, price] of Object.entries(prices)) {
      const m = metadata[address];
      if (!m) continue;
      lines.push(`- ${m.name} (${m.symbol}): ${formatPrice(price.price)} USD per token`);
    }
    if (lines.length === 0) return '';
    return ['Token Prices:', ...lines].join('\n');
  }

  getRagContext(_ctx: ToolContext, baggage: Baggage): RagContext {
    const rag = createRagContext();
    const metadata = baggage.get(TOKEN_METADATA) ?? {};
    for (const [address, price] of Object.entries(baggage.get(TOKEN_PRICES) ?? {})) {
      const symbol = metadata[address]?.symbol ?? address;
      addRagItem(rag, {
        id: `price:${address}`,
        type: 'price',
        title: `${symbol} price`,
        content: `${symbol} traded at ${formatPrice(price.price)} USD according to ${price.source}.`,
        metadata: { address, price: price.price, source: price.source },
        keywords: [symbol, 'price', 'usd'],
        relevance: 0.5,
      });
    }
    return rag;
  }
}
