import { z } from 'zod';
import type { Baggage } from '../baggage/baggage.ts';
import { NAMES, TRANSACTION_CONTEXT, TRANSFERS } from '../baggage/keys.ts';
import type { Cache } from '../cache/cache.ts';
import { TTL, cacheKeys } from '../cache/keys.ts';
import type { NameResolver } from '../services/interfaces.ts';
import { TOKEN_TRANSFER_EXTRACTOR } from './token-transfers.ts';
import {
  addRagItem,
  createRagContext,
  shortenAddress,
  tryLookup,
  type RagContext,
  type Tool,
  type ToolContext,
} from './tool.ts';
import { TRANSACTION_CONTEXT_PROVIDER } from './transaction-context.ts';

export const NAME_RESOLVER = 'name_resolver';

const ZERO_ADDRESS = '0x0000000000000000000000000000000000000000';

// negative lookups are cached too, as { name: null }
const CachedName = z.object({ name: z.string().nullable() });

/** Reverse-resolves every address the transaction touches. */
export class NameResolverTool implements Tool {
  readonly name = NAME_RESOLVER;
  readonly description = 'Resolves human-readable names for the addresses in the transaction';
  readonly dependencies: readonly string[] = [TRANSACTION_CONTEXT_PROVIDER, TOKEN_TRANSFER_EXTRACTOR];

  constructor(
    private resolver: NameResolver,
    private cache: Cache,
  ) {}

  async process(ctx: ToolContext, baggage: Baggage): Promise<void> {
    const names: Record<string, string> = {};

    for (const address of collectAddresses(baggage)) {
      const key = cacheKeys.ensName(address);
      const cached = await this.cache.getJSON(key, CachedName);
      let name: string | null;
      if (cached) {
        name = cached.name;
      } else {
        const lookup = await tryLookup(ctx, `name lookup for ${address}`, () =>
          this.resolver.lookupAddress(address, ctx.signal),
        );
        if (!lookup.ok) continue;
        name = lookup.value;
        await this.cache.setJSON(key, { name }, TTL.ensName);
      }
      if (name) names[address] = name;
    }

    baggage.set(NAMES, names);
    await ctx.report(`resolved ${Object.keys(names).length} names`);
  }

  getPromptContext(_ctx: ToolContext, baggage: Baggage): string {
    const names = Object.entries(baggage.get(NAMES) ?? {});
    if (names.length === 0) return '';
    return [
      '### Names Resolved:',
      ...names.map(([address, name]) => `- ${shortenAddress(address)}: ${name}`),
    ].join('\n');
  }

  getRagContext(_ctx: ToolContext, baggage: Baggage): RagContext {
    const rag = createRagContext();
    for (const [address, name] of Object.entries(baggage.get(NAMES) ?? {})) {
      addRagItem(rag, {
        id: `name:${address}`,
        type: 'address',
        title: name,
        content: `${address} is known as ${name}.`,
        metadata: { address, name },
        keywords: [name, address],
        relevance: 0.7,
      });
    }
    return rag;
  }
}

/** Sender, recipient and transfer parties, lower-cased, in first-seen order. */
export function collectAddresses(baggage: Baggage): string[] {
  const seen = new Set<string>();
  const add = (address: string | undefined) => {
    if (!address) return;
    const lower = address.toLowerCase();
    if (lower !== ZERO_ADDRESS) seen.add(lower);
  };

  const context = baggage.get(TRANSACTION_CONTEXT);
  add(context?.sender);
  add(context?.recipient);
  for (const t of baggage.get(TRANSFERS) ?? []) {
    add(t.from);
    add(t.to);
  }
  return Array.from(seen);
}
