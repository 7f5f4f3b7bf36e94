import type { Baggage } from '../baggage/baggage.ts';
import { RAW_DATA, TOKEN_METADATA, TRANSFERS } from '../baggage/keys.ts';
import type { Cache } from '../cache/cache.ts';
import { TTL, cacheKeys } from '../cache/keys.ts';
import type { TokenMetadataSource } from '../services/interfaces.ts';
import { TokenMetadata } from '../types/transaction.ts';
import { TOKEN_TRANSFER_EXTRACTOR } from './token-transfers.ts';
import {
  addRagItem,
  createRagContext,
  tryLookup,
  type RagContext,
  type Tool,
  type ToolContext,
} from './tool.ts';

export const TOKEN_METADATA_ENRICHER = 'token_metadata_enricher';

export class TokenMetadataEnricher implements Tool {
  readonly name = TOKEN_METADATA_ENRICHER;
  readonly description = 'Looks up name, symbol and decimals for every token contract in the transfers';
  readonly dependencies: readonly string[] = [TOKEN_TRANSFER_EXTRACTOR];

  constructor(
    private source: TokenMetadataSource,
    private cache: Cache,
  ) {}

  async process(ctx: ToolContext, baggage: Baggage): Promise<void> {
    const raw = baggage.get(RAW_DATA);
    const transfers = baggage.get(TRANSFERS) ?? [];
    const metadata: Record<string, TokenMetadata> = {};
    if (!raw || transfers.length === 0) {
      baggage.set(TOKEN_METADATA, metadata);
      return;
    }

    // first transfer seen per contract decides the standard
    const contracts = new Map<string, 'ERC20' | 'ERC721'>();
    for (const t of transfers) {
      if (!contracts.has(t.contract)) contracts.set(t.contract, t.type);
    }

    for (const [address, standard] of contracts) {
      const key = cacheKeys.tokenMetadata(raw.networkId, address);
      const cached = await this.cache.getJSON(key, TokenMetadata);
      if (cached) {
        metadata[address] = cached;
        continue;
      }

      const lookup = await tryLookup(ctx, `metadata lookup for ${address}`, () =>
        this.source.getTokenMetadata(raw.networkId, address, ctx.signal),
      );
      const fetched = lookup.ok ? lookup.value : null;
      // placeholders are never cached, so a failed lookup is retried next run
      if (!fetched) {
        if (lookup.ok) ctx.log.debug(`no metadata for ${address}`);
        metadata[address] = {
          address,
          name: 'Unknown Token',
          symbol: 'UNKNOWN',
          decimals: 0,
          type: standard,
        };
        continue;
      }

      const resolved: TokenMetadata = {
        ...fetched,
        address,
        type: fetched.type === 'unknown' ? standard : fetched.type,
      };
      await this.cache.setJSON(key, resolved, TTL.tokenMetadata);
      metadata[address] = resolved;
    }

    baggage.set(TOKEN_METADATA, metadata);
    await ctx.report(`resolved metadata for ${Object.keys(metadata).length} tokens`);
  }

  getPromptContext(_ctx: ToolContext, baggage: Baggage): string {
    const metadata = Object.values(baggage.get(TOKEN_METADATA) ?? {});
    const lines = metadata
      .filter((m) => m.type === 'ERC20')
      .map((m) => `- ${m.name} (${m.symbol}): ${m.type} with ${m.decimals} decimals`);
    if (lines.length === 0) return '';
    return ['Token Metadata:', ...lines].join('\n');
  }

  getRagContext(_ctx: ToolContext, baggage: Baggage): RagContext {
    const rag = createRagContext();
    for (const m of Object.values(baggage.get(TOKEN_METADATA) ?? {})) {
      if (m.symbol === 'UNKNOWN') continue;
      addRagItem(rag, {
        id: `token:${m.address}`,
        type: 'token',
        title: `${m.name} (${m.symbol})`,
        content: `${m.name} (${m.symbol}) is an ${m.type} token at ${m.address} with ${m.decimals} decimals.`,
        metadata: { address: m.address, symbol: m.symbol, decimals: m.decimals, type: m.type },
        keywords: [m.symbol, m.name, m.address],
        relevance: 0.8,
      });
    }
    return rag;
  }
}
