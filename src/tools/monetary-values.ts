import Big from 'big.js';
import type { Baggage } from '../baggage/baggage.ts';
import { TOKEN_METADATA, TOKEN_PRICES, TRANSFERS, TRANSFER_VALUES } from '../baggage/keys.ts';
import type { TransferValue } from '../types/transaction.ts';
import { TOKEN_METADATA_ENRICHER } from './token-metadata.ts';
import { ERC20_PRICE_LOOKUP } from './token-prices.ts';
import { TOKEN_TRANSFER_EXTRACTOR } from './token-transfers.ts';
import { createRagContext, type RagContext, type Tool, type ToolContext } from './tool.ts';

export const MONETARY_VALUE_ENRICHER = 'monetary_value_enricher';

/** raw integer amount → whole-token decimal string, e.g. ("1500000", 6) → "1.5" */
export function toDisplayAmount(rawAmount: string, decimals: number): string {
  return new Big(rawAmount).div(new Big(10).pow(decimals)).toFixed();
}

export function formatUsd(value: number): string {
  return `$${value.toFixed(2)}`;
}

export class MonetaryValueEnricher implements Tool {
  readonly name = MONETARY_VALUE_ENRICHER;
  readonly description = 'Converts raw ERC20 amounts to token units and USD values';
  readonly dependencies: readonly string[] = [
    TOKEN_TRANSFER_EXTRACTOR,
    TOKEN_METADATA_ENRICHER,
    ERC20_PRICE_LOOKUP,
  ];

  async process(ctx: ToolContext, baggage: Baggage): Promise<void> {
    const transfers = baggage.get(TRANSFERS) ?? [];
    const metadata = baggage.get(TOKEN_METADATA) ?? {};
    const prices = baggage.get(TOKEN_PRICES) ?? {};

    const values: TransferValue[] = [];
    for (const t of transfers) {
      if (t.type !== 'ERC20' || t.amount === undefined) continue;

      const token = metadata[t.contract];
      const price = prices[t.contract];
      // without decimals the raw amount is the best we can show
      const displayAmount = token ? toDisplayAmount(t.amount, token.decimals) : t.amount;
      const usdValue =
        token && price
          ? new Big(displayAmount).times(price.price).round(2).toNumber()
          : null;

      values.push({
        logIndex: t.logIndex,
        contract: t.contract,
        symbol: token?.symbol ?? 'UNKNOWN',
        displayAmount,
        usdValue,
      });
    }

    baggage.set(TRANSFER_VALUES, values);
    const priced = values.filter((v) => v.usdValue !== null).length;
    ctx.log.debug(`valued ${priced}/${values.length} ERC20 transfers`);
  }

  getPromptContext(_ctx: ToolContext, baggage: Baggage): string {
    const values = baggage.get(TRANSFER_VALUES);
    if (!values || values.length === 0) return '';

    const lines = values.map((v) => {
      const usd = v.usdValue === null ? 'no price data' : formatUsd(v.usdValue);
      return `- ${v.displayAmount} ${v.symbol} (${usd})`;
    });
    const total = values.reduce((sum, v) => sum.plus(v.usdValue ?? 0), new Big(0));
    if (values.some((v) => v.usdValue !== null)) {
      lines.push(`- Total USD moved: ${formatUsd(total.toNumber())}`);
    }
    return ['### Transfer Values:', ...lines].join('\n');
  }

  getRagContext(): RagContext {
    return createRagContext();
  }
}
