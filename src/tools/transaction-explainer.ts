import type { Baggage } from '../baggage/baggage.ts';
import { EXPLANATION, RAW_DATA } from '../baggage/keys.ts';
import { assemblePromptContext } from '../context/prompt.ts';
import type { LlmClient } from '../services/interfaces.ts';
import { createRagContext, type RagContext, type Tool, type ToolContext } from './tool.ts';

export const TRANSACTION_EXPLAINER = 'transaction_explainer';

export const SYSTEM_PROMPT = [
  'You are a blockchain transaction analyzer.',
  'Provide a VERY SHORT, precise summary of what this transaction accomplished.',
  'Keep it under 30 words. Use shortened addresses (0xabcd...1234) or names when known.',
  'Mention token amounts and USD values when they are given. Do not speculate beyond the data.',
].join(' ');

/**
 * Asks the LLM for a one-line summary built from the prompt sections of
 * `contextProviders`. Those providers become this tool's dependencies, so
 * everything they render has been written by the time it runs.
 */
export class TransactionExplainer implements Tool {
  readonly name = TRANSACTION_EXPLAINER;
  readonly description = 'Generates a natural-language explanation of the transaction';
  readonly dependencies: readonly string[];

  constructor(
    private llm: LlmClient,
    private contextProviders: readonly Tool[],
  ) {
    this.dependencies = contextProviders.map((t) => t.name);
  }

  buildPrompt(ctx: ToolContext, baggage: Baggage): string {
    const raw = baggage.get(RAW_DATA);
    const header = raw
      ? `Explain transaction ${raw.txHash} on network ${raw.networkId}.`
      : 'Explain this transaction.';
    const context = assemblePromptContext(ctx, baggage, this.contextProviders);
    return context ? `${header}\n\n${context}` : header;
  }

  async process(ctx: ToolContext, baggage: Baggage): Promise<void> {
    const prompt = this.buildPrompt(ctx, baggage);
    ctx.log.debug(`prompt is ${prompt.length} chars`);

    const response = await this.llm.complete({
      system: SYSTEM_PROMPT,
      prompt,
      signal: ctx.signal,
    });
    if (!response.text) throw new Error('LLM returned an empty explanation');

    baggage.set(EXPLANATION, {
      summary: response.text,
      model: response.model,
      tokensUsed: response.tokensUsed,
    });
  }

  getPromptContext(_ctx: ToolContext, baggage: Baggage): string {
    const explanation = baggage.get(EXPLANATION);
    return explanation ? `### Explanation:\n${explanation.summary}` : '';
  }

  getRagContext(): RagContext {
    return createRagContext();
  }
}
