import type { Baggage } from '../baggage/baggage.ts';
import { RAW_DATA, TRANSFERS } from '../baggage/keys.ts';
import { TRANSFER_TOPIC, events } from '../abi/erc20.ts';
import type { RawLog, TokenTransfer } from '../types/transaction.ts';
import { hexToNumber } from '../utils/hex.ts';
import { createRagContext, type RagContext, type Tool, type ToolContext } from './tool.ts';

export const TOKEN_TRANSFER_EXTRACTOR = 'token_transfer_extractor';

/**
 * ERC20 and ERC721 share the Transfer signature; ERC721 indexes the token id
 * as a fourth topic, ERC20 carries the amount in data. Logs that do not
 * decode as either are not transfers.
 */
export function decodeTransfer(entry: RawLog, position: number): TokenTransfer | null {
  const topics = entry.topics.map((t) => t.toLowerCase());
  if (topics[0] !== TRANSFER_TOPIC) return null;

  const record = { topics, data: entry.data };
  const contract = entry.address.toLowerCase();
  const logIndex = entry.logIndex ? hexToNumber(entry.logIndex) : position;

  try {
    if (topics.length === 4) {
      const { from, to, tokenId } = events.NftTransfer.decode(record);
      return {
        type: 'ERC721',
        contract,
        from: from.toLowerCase(),
        to: to.toLowerCase(),
        tokenId: tokenId.toString(),
        logIndex,
      };
    }
    // ERC20 needs at least one data word for the amount
    if (topics.length === 3 && entry.data.length >= 66) {
      const { from, to, value } = events.Transfer.decode(record);
      return {
        type: 'ERC20',
        contract,
        from: from.toLowerCase(),
        to: to.toLowerCase(),
        amount: value.toString(),
        logIndex,
      };
    }
  } catch {
    return null;
  }
  return null;
}

export class TokenTransferExtractor implements Tool {
  readonly name = TOKEN_TRANSFER_EXTRACTOR;
  readonly description = 'Decodes ERC20 and ERC721 Transfer events from the transaction logs';
  readonly dependencies: readonly string[] = [];

  async process(ctx: ToolContext, baggage: Baggage): Promise<void> {
    const raw = baggage.get(RAW_DATA);
    if (!raw) throw new Error('raw transaction data missing from baggage');

    const transfers = raw.logs.flatMap((entry, i) => decodeTransfer(entry, i) ?? []);
    baggage.set(TRANSFERS, transfers);
    await ctx.report(`found ${transfers.length} token transfers`);
  }

  getPromptContext(_ctx: ToolContext, baggage: Baggage): string {
    const transfers = baggage.get(TRANSFERS);
    if (!transfers || transfers.length === 0) return '';

    const sections = transfers.map((t, i) => {
      const lines = [
        `Transfer #${i + 1}:`,
        `- Type: ${t.type}`,
        `- Contract: ${t.contract}`,
        `- From: ${t.from}`,
        `- To: ${t.to}`,
      ];
      if (t.amount !== undefined) lines.push(`- Raw Amount: ${t.amount}`);
      if (t.tokenId !== undefined) lines.push(`- Token ID: ${t.tokenId}`);
      return lines.join('\n');
    });
    return ['### Basic Token Transfers:', ...sections].join('\n\n');
  }

  // transfers are specific to one transaction; nothing worth indexing
  getRagContext(): RagContext {
    return createRagContext();
  }
}
