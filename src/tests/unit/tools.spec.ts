import { describe, it, expect, vi } from 'vitest';
import { Baggage } from '../../baggage/baggage.ts';
import {
  NAMES,
  RAW_DATA,
  TOKEN_METADATA,
  TOKEN_PRICES,
  TRANSACTION_CONTEXT,
  TRANSFERS,
  TRANSFER_VALUES,
} from '../../baggage/keys.ts';
import { SimpleCache } from '../../cache/cache.ts';
import { MemoryConnector } from '../../cache/memory-connector.ts';
import { MonetaryValueEnricher, toDisplayAmount } from '../../tools/monetary-values.ts';
import { NameResolverTool } from '../../tools/name-resolver.ts';
import { TokenMetadataEnricher } from '../../tools/token-metadata.ts';
import { Erc20PriceLookup, formatPrice } from '../../tools/token-prices.ts';
import { TRANSFER_TOPIC } from '../../abi/erc20.ts';
import { TokenTransferExtractor, decodeTransfer } from '../../tools/token-transfers.ts';
import { shortenAddress, tryLookup, type Tool } from '../../tools/tool.ts';
import type { NameResolver, PriceProvider, TokenMetadataSource } from '../../services/interfaces.ts';
import { TransactionContextProvider } from '../../tools/transaction-context.ts';
import { SYSTEM_PROMPT, TransactionExplainer } from '../../tools/transaction-explainer.ts';
import {
  FakeLlm,
  FakeNameResolver,
  FakePriceProvider,
  FakeTokenSource,
} from '../_utils/fakeServices.ts';
import { testContext } from '../_utils/fakeTools.ts';
import {
  NFT,
  NFT_META,
  RECEIVER,
  SENDER,
  TOKEN,
  USDC_META,
  ZERO,
  addressTopic,
  makeRawTransaction,
  uintWord,
} from '../_utils/fixtures.ts';

const ctx = testContext();

function aborted() {
  const controller = new AbortController();
  controller.abort(new Error('stop'));
  return testContext(controller.signal);
}

function seeded(): Baggage {
  const baggage = new Baggage();
  baggage.set(RAW_DATA, makeRawTransaction());
  return baggage;
}

function memoryCache() {
  return new SimpleCache(new MemoryConnector(), { prefix: 'test' });
}

describe('TransactionContextProvider', () => {
  it('extracts the receipt summary', async () => {
    const baggage = seeded();
    await new TransactionContextProvider().process(ctx, baggage);

    expect(baggage.get(TRANSACTION_CONTEXT)).toEqual({
      sender: SENDER,
      recipient: TOKEN,
      gasUsed: '21000',
      status: '0x1',
      blockNumber: 16,
      timestampMs: 1_677_721_600_000,
    });
  });

  it('renders the prompt section', async () => {
    const tool = new TransactionContextProvider();
    const baggage = seeded();
    await tool.process(ctx, baggage);

    expect(tool.getPromptContext(ctx, baggage)).toBe(
      [
        '### TRANSACTION CONTEXT:',
        `- TRANSACTION SENDER: ${SENDER} (the address that initiated this transaction)`,
        `- Contract Called: ${TOKEN}`,
        '- Total Gas Used: 21000',
        '- Status: Success',
        '- Timestamp: 2023-03-02T01:46:40.000Z',
      ].join('\n'),
    );
    expect(tool.getRagContext(ctx, baggage).items.map((i) => i.id)).toEqual([
      `address:${SENDER}`,
    ]);
  });

  it('fails without raw data', async () => {
    await expect(new TransactionContextProvider().process(ctx, new Baggage())).rejects.toThrow(
      'raw transaction data missing from baggage',
    );
  });
});

describe('decodeTransfer', () => {
  it('ignores logs that are not Transfer events', () => {
    expect(
      decodeTransfer({ address: TOKEN, topics: [uintWord(1n)], data: '0x' }, 0),
    ).toBeNull();
    // ERC20-shaped but without an amount
    expect(
      decodeTransfer(
        { address: TOKEN, topics: [TRANSFER_TOPIC, addressTopic(SENDER), addressTopic(RECEIVER)], data: '0x' },
        0,
      ),
    ).toBeNull();
  });

  it('falls back to the log position when the index is missing', () => {
    const transfer = decodeTransfer(
      {
        address: TOKEN.toUpperCase().replace('0X', '0x'),
        topics: [TRANSFER_TOPIC.toUpperCase().replace('0X', '0x'), addressTopic(SENDER), addressTopic(RECEIVER)],
        data: uintWord(7n),
      },
      5,
    );

    expect(transfer).toEqual({
      type: 'ERC20',
      contract: TOKEN,
      from: SENDER,
      to: RECEIVER,
      amount: '7',
      logIndex: 5,
    });
  });
});

describe('TokenTransferExtractor', () => {
  it('decodes ERC20 amounts and ERC721 token ids', async () => {
    const baggage = seeded();
    const tool = new TokenTransferExtractor();
    await tool.process(ctx, baggage);

    expect(baggage.get(TRANSFERS)).toEqual([
      { type: 'ERC20', contract: TOKEN, from: SENDER, to: RECEIVER, amount: '1500000', logIndex: 0 },
      { type: 'ERC721', contract: NFT, from: ZERO, to: SENDER, tokenId: '42', logIndex: 1 },
    ]);
    expect(tool.getPromptContext(ctx, baggage)).toBe(
      [
        '### Basic Token Transfers:',
        '',
        'Transfer #1:',
        '- Type: ERC20',
        `- Contract: ${TOKEN}`,
        `- From: ${SENDER}`,
        `- To: ${RECEIVER}`,
        '- Raw Amount: 1500000',
        '',
        'Transfer #2:',
        '- Type: ERC721',
        `- Contract: ${NFT}`,
        `- From: ${ZERO}`,
        `- To: ${SENDER}`,
        '- Token ID: 42',
      ].join('\n'),
    );
  });

  it('writes an empty list when nothing matches', async () => {
    const raw = makeRawTransaction();
    raw.logs = [];
    const baggage = new Baggage();
    baggage.set(RAW_DATA, raw);

    await new TokenTransferExtractor().process(ctx, baggage);
    expect(baggage.get(TRANSFERS)).toEqual([]);
    expect(baggage.has(TRANSFERS)).toBe(true);
  });
});

describe('TokenMetadataEnricher', () => {
  it('resolves each contract once and caches source results', async () => {
    const cache = memoryCache();
    const source = new FakeTokenSource({ [TOKEN]: USDC_META, [NFT]: NFT_META });
    const tool = new TokenMetadataEnricher(source, cache);

    const baggage = seeded();
    await new TokenTransferExtractor().process(ctx, baggage);
    await tool.process(ctx, baggage);

    expect(source.calls).toEqual([TOKEN, NFT]);
    expect(baggage.get(TOKEN_METADATA)).toEqual({
      [TOKEN]: USDC_META,
      [NFT]: { ...NFT_META, type: 'ERC721' },
    });
    expect(tool.getPromptContext(ctx, baggage)).toBe(
      'Token Metadata:\n- Test Dollar (TUSD): ERC20 with 6 decimals',
    );

    const again = seeded();
    await new TokenTransferExtractor().process(ctx, again);
    await tool.process(ctx, again);
    expect(source.calls).toEqual([TOKEN, NFT]);
    expect(again.get(TOKEN_METADATA)).toEqual(baggage.get(TOKEN_METADATA));
  });

  it('uses a placeholder for contracts without metadata and does not cache it', async () => {
    const cache = memoryCache();
    const source = new FakeTokenSource({});
    const baggage = seeded();
    await new TokenTransferExtractor().process(ctx, baggage);
    await new TokenMetadataEnricher(source, cache).process(ctx, baggage);

    expect(baggage.get(TOKEN_METADATA)?.[TOKEN]).toEqual({
      address: TOKEN,
      name: 'Unknown Token',
      symbol: 'UNKNOWN',
      decimals: 0,
      type: 'ERC20',
    });
    expect(await cache.has(`token-meta:1:${TOKEN}`)).toBe(false);
  });

  it('falls back to a placeholder when a lookup fails and retries it next run', async () => {
    const cache = memoryCache();
    let failures = 0;
    const source: TokenMetadataSource = {
      getTokenMetadata: async (_networkId, address) => {
        if (address === TOKEN) {
          failures++;
          throw new Error('node timeout');
        }
        return { ...NFT_META };
      },
    };
    const warn = vi.spyOn(ctx.log, 'warn').mockImplementation(() => {});
    const baggage = seeded();
    await new TokenTransferExtractor().process(ctx, baggage);
    await new TokenMetadataEnricher(source, cache).process(ctx, baggage);

    expect(baggage.get(TOKEN_METADATA)?.[TOKEN]?.symbol).toBe('UNKNOWN');
    expect(baggage.get(TOKEN_METADATA)?.[NFT]?.symbol).toBe('PETS');
    expect(warn).toHaveBeenCalledTimes(1);
    expect(await cache.has(`token-meta:1:${TOKEN}`)).toBe(false);
    expect(await cache.has(`token-meta:1:${NFT}`)).toBe(true);

    await new TokenMetadataEnricher(source, cache).process(ctx, baggage);
    expect(failures).toBe(2);
    warn.mockRestore();
  });

  it('writes an empty record when there were no transfers', async () => {
    const baggage = seeded();
    await new TokenMetadataEnricher(new FakeTokenSource({}), memoryCache()).process(ctx, baggage);

    expect(baggage.get(TOKEN_METADATA)).toEqual({});
  });
});

describe('Erc20PriceLookup', () => {
  async function priced(provider: FakePriceProvider, cache = memoryCache()) {
    const baggage = seeded();
    await new TokenTransferExtractor().process(ctx, baggage);
    await new TokenMetadataEnricher(
      new FakeTokenSource({ [TOKEN]: USDC_META, [NFT]: NFT_META }),
      cache,
    ).process(ctx, baggage);
    const tool = new Erc20PriceLookup(provider, cache, () => 1234);
    await tool.process(ctx, baggage);
    return { baggage, tool };
  }

  it('prices ERC20 tokens only and caches the quotes', async () => {
    const cache = memoryCache();
    const provider = new FakePriceProvider({ [TOKEN]: 2 });
    const { baggage, tool } = await priced(provider, cache);

    expect(provider.calls).toEqual([[TOKEN]]);
    expect(baggage.get(TOKEN_PRICES)).toEqual({
      [TOKEN]: {
        contract: TOKEN,
        price: 2,
        currency: 'usd',
        source: 'fake-prices',
        lastUpdatedMs: 1234,
      },
    });
    expect(tool.getPromptContext(ctx, baggage)).toBe(
      'Token Prices:\n- Test Dollar (TUSD): $2.00 USD per token',
    );

    await priced(provider, cache);
    expect(provider.calls).toHaveLength(1);
  });

  it('leaves unpriced tokens out', async () => {
    const { baggage, tool } = await priced(new FakePriceProvider({}));

    expect(baggage.get(TOKEN_PRICES)).toEqual({});
    expect(tool.getPromptContext(ctx, baggage)).toBe('');
  });

  it('leaves every token unpriced when the provider is down', async () => {
    const down: PriceProvider = {
      source: 'down',
      getTokenPrices: async () => {
        throw new Error('HTTP 503');
      },
    };
    const warn = vi.spyOn(ctx.log, 'warn').mockImplementation(() => {});
    const baggage = seeded();
    await new TokenTransferExtractor().process(ctx, baggage);
    await new TokenMetadataEnricher(new FakeTokenSource({ [TOKEN]: USDC_META }), memoryCache()).process(
      ctx,
      baggage,
    );
    await new Erc20PriceLookup(down, memoryCache()).process(ctx, baggage);

    expect(baggage.get(TOKEN_PRICES)).toEqual({});
    expect(warn).toHaveBeenCalledWith('down price lookup failed, skipping:', expect.any(Error));
    warn.mockRestore();
  });

  it('formats tiny prices with six decimals', () => {
    expect(formatPrice(0.000123)).toBe('$0.000123');
    expect(formatPrice(1234.5)).toBe('$1234.50');
  });
});

describe('MonetaryValueEnricher', () => {
  it('converts amounts by decimals and multiplies by price', async () => {
    const baggage = seeded();
    const cache = memoryCache();
    await new TokenTransferExtractor().process(ctx, baggage);
    await new TokenMetadataEnricher(
      new FakeTokenSource({ [TOKEN]: USDC_META }),
      cache,
    ).process(ctx, baggage);
    await new Erc20PriceLookup(new FakePriceProvider({ [TOKEN]: 2 }), cache).process(ctx, baggage);

    const tool = new MonetaryValueEnricher();
    await tool.process(ctx, baggage);

    expect(baggage.get(TRANSFER_VALUES)).toEqual([
      { logIndex: 0, contract: TOKEN, symbol: 'TUSD', displayAmount: '1.5', usdValue: 3 },
    ]);
    expect(tool.getPromptContext(ctx, baggage)).toBe(
      '### Transfer Values:\n- 1.5 TUSD ($3.00)\n- Total USD moved: $3.00',
    );
  });

  it('keeps the raw amount when metadata is absent', async () => {
    const baggage = seeded();
    await new TokenTransferExtractor().process(ctx, baggage);
    const tool = new MonetaryValueEnricher();
    await tool.process(ctx, baggage);

    expect(baggage.get(TRANSFER_VALUES)).toEqual([
      { logIndex: 0, contract: TOKEN, symbol: 'UNKNOWN', displayAmount: '1500000', usdValue: null },
    ]);
    expect(tool.getPromptContext(ctx, baggage)).toBe(
      '### Transfer Values:\n- 1500000 UNKNOWN (no price data)',
    );
  });

  it('handles 18-decimal amounts exactly', () => {
    expect(toDisplayAmount('1234500000000000000', 18)).toBe('1.2345');
    expect(toDisplayAmount('1', 18)).toBe('0.000000000000000001');
    expect(toDisplayAmount('0', 6)).toBe('0');
  });
});

describe('NameResolverTool', () => {
  it('resolves each address once, skipping the zero address, and caches misses too', async () => {
    const cache = memoryCache();
    const resolver = new FakeNameResolver({ [SENDER]: 'alice.eth' });
    const tool = new NameResolverTool(resolver, cache);

    const baggage = seeded();
    await new TransactionContextProvider().process(ctx, baggage);
    await new TokenTransferExtractor().process(ctx, baggage);
    await tool.process(ctx, baggage);

    expect(resolver.lookups).toEqual([SENDER, TOKEN, RECEIVER]);
    expect(baggage.get(NAMES)).toEqual({ [SENDER]: 'alice.eth' });
    expect(tool.getPromptContext(ctx, baggage)).toBe(
      `### Names Resolved:\n- ${shortenAddress(SENDER)}: alice.eth`,
    );
    expect(shortenAddress(SENDER)).toBe('0x1111...1111');

    await tool.process(ctx, baggage);
    expect(resolver.lookups).toHaveLength(3);
  });

  it('skips an address whose lookup fails without caching it', async () => {
    const cache = memoryCache();
    const lookups: string[] = [];
    const resolver: NameResolver = {
      lookupAddress: async (address) => {
        lookups.push(address);
        if (address === TOKEN) throw new Error('resolver down');
        return address === SENDER ? 'alice.eth' : null;
      },
    };
    const warn = vi.spyOn(ctx.log, 'warn').mockImplementation(() => {});
    const tool = new NameResolverTool(resolver, cache);
    const baggage = seeded();
    await new TransactionContextProvider().process(ctx, baggage);
    await new TokenTransferExtractor().process(ctx, baggage);

    await tool.process(ctx, baggage);
    expect(baggage.get(NAMES)).toEqual({ [SENDER]: 'alice.eth' });

    await tool.process(ctx, baggage);
    expect(lookups).toEqual([SENDER, TOKEN, RECEIVER, TOKEN]);
    warn.mockRestore();
  });
});

describe('tryLookup', () => {
  it('reports failures as skipped items', async () => {
    const warn = vi.spyOn(ctx.log, 'warn').mockImplementation(() => {});
    const failure = new Error('boom');

    expect(await tryLookup(ctx, 'thing', async () => 7)).toEqual({ ok: true, value: 7 });
    expect(
      await tryLookup(ctx, 'thing', async () => {
        throw failure;
      }),
    ).toEqual({ ok: false, error: failure });
    expect(warn).toHaveBeenCalledWith('thing failed, skipping:', failure);
    warn.mockRestore();
  });

  it('rethrows once the run is cancelled', async () => {
    await expect(
      tryLookup(aborted(), 'thing', async () => {
        throw new Error('aborted fetch');
      }),
    ).rejects.toThrow('aborted fetch');
  });
});

describe('TransactionExplainer', () => {
  it('depends on its context providers and sends their sections to the LLM', async () => {
    const llm = new FakeLlm('Sent 1.5 TUSD.');
    const providers: Tool[] = [new TransactionContextProvider(), new TokenTransferExtractor()];
    const tool = new TransactionExplainer(llm, providers);
    expect(tool.dependencies).toEqual(['transaction_context_provider', 'token_transfer_extractor']);

    const baggage = seeded();
    for (const p of providers) await p.process(ctx, baggage);
    await tool.process(ctx, baggage);

    expect(llm.requests).toHaveLength(1);
    const [request] = llm.requests;
    expect(request.system).toBe(SYSTEM_PROMPT);
    expect(request.prompt).toBe(
      [
        `Explain transaction ${makeRawTransaction().txHash} on network 1.`,
        providers[0].getPromptContext(ctx, baggage),
        providers[1].getPromptContext(ctx, baggage),
      ].join('\n\n'),
    );
    expect(tool.getPromptContext(ctx, baggage)).toBe('### Explanation:\nSent 1.5 TUSD.');
  });

  it('fails on an empty completion', async () => {
    const tool = new TransactionExplainer(new FakeLlm(''), []);
    await expect(tool.process(ctx, seeded())).rejects.toThrow('LLM returned an empty explanation');
  });
});

describe('export hooks on an empty baggage', () => {
  it('return empty strings and empty retrieval sets', () => {
    const cache = memoryCache();
    const tools: Tool[] = [
      new TransactionContextProvider(),
      new TokenTransferExtractor(),
      new TokenMetadataEnricher(new FakeTokenSource({}), cache),
      new Erc20PriceLookup(new FakePriceProvider({}), cache),
      new MonetaryValueEnricher(),
      new NameResolverTool(new FakeNameResolver({}), cache),
      new TransactionExplainer(new FakeLlm(), []),
    ];
    const empty = new Baggage();

    for (const tool of tools) {
      expect(tool.getPromptContext(ctx, empty)).toBe('');
      expect(tool.getRagContext(ctx, empty).items).toEqual([]);
    }
  });
});
