import type { Baggage } from '../baggage/baggage.ts';
import { RAW_DATA, TRANSACTION_CONTEXT } from '../baggage/keys.ts';
import type { TransactionContext } from '../types/transaction.ts';
import { hexToNumber } from '../utils/hex.ts';
import {
  addRagItem,
  createRagContext,
  type RagContext,
  type Tool,
  type ToolContext,
} from './tool.ts';

export const TRANSACTION_CONTEXT_PROVIDER = 'transaction_context_provider';

function formatStatus(status: string): string {
  switch (status) {
    case '0x1':
      return 'Success';
    case '0x0':
      return 'Failed';
    default:
      return status;
  }
}

/** Lifts sender, recipient, gas and status out of the raw receipt. */
export class TransactionContextProvider implements Tool {
  readonly name = TRANSACTION_CONTEXT_PROVIDER;
  readonly description = 'Extracts sender, recipient, gas usage and status from the raw transaction';
  readonly dependencies: readonly string[] = [];

  async process(ctx: ToolContext, baggage: Baggage): Promise<void> {
    const raw = baggage.get(RAW_DATA);
    if (!raw) throw new Error('raw transaction data missing from baggage');

    const { receipt, block } = raw;
    const context: TransactionContext = {
      sender: receipt.from.toLowerCase(),
      recipient: receipt.to?.toLowerCase(),
      gasUsed: BigInt(receipt.gasUsed).toString(),
      status: receipt.status,
      blockNumber: receipt.blockNumber ? hexToNumber(receipt.blockNumber) : undefined,
      timestampMs: block ? hexToNumber(block.timestamp) * 1000 : undefined,
    };
    baggage.set(TRANSACTION_CONTEXT, context);
    ctx.log.debug(`sender ${context.sender}, status ${formatStatus(receipt.status)}`);
  }

  getPromptContext(_ctx: ToolContext, baggage: Baggage): string {
    const context = baggage.get(TRANSACTION_CONTEXT);
    if (!context) return '';

    const lines = ['### TRANSACTION CONTEXT:'];
    if (context.sender) {
      lines.push(
        `- TRANSACTION SENDER: ${context.sender} (the address that initiated this transaction)`,
      );
    }
    if (context.recipient) lines.push(`- Contract Called: ${context.recipient}`);
    if (context.gasUsed) lines.push(`- Total Gas Used: ${context.gasUsed}`);
    if (context.status) lines.push(`- Status: ${formatStatus(context.status)}`);
    if (context.timestampMs !== undefined) {
      lines.push(`- Timestamp: ${new Date(context.timestampMs).toISOString()}`);
    }
    return lines.join('\n');
  }

  getRagContext(_ctx: ToolContext, baggage: Baggage): RagContext {
    const rag = createRagContext();
    const context = baggage.get(TRANSACTION_CONTEXT);
    if (!context?.sender) return rag;

    addRagItem(rag, {
      id: `address:${context.sender}`,
      type: 'address',
      title: 'Transaction sender',
      content: `${context.sender} initiated the transaction${context.recipient ? ` calling ${context.recipient}` : ''}.`,
      metadata: { address: context.sender, role: 'sender' },
      keywords: ['sender', context.sender],
      relevance: 0.6,
    });
    return rag;
  }
}
