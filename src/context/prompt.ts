// Combines every tool's export hooks after (or during) a run
import type { Baggage } from '../baggage/baggage.ts';
import { createRagContext, type RagContext, type Tool, type ToolContext } from '../tools/tool.ts';

/** Non-empty prompt sections from `tools`, in the order given, separated by blank lines. */
export function assemblePromptContext(
  ctx: ToolContext,
  baggage: Baggage,
  tools: readonly Tool[],
): string {
  return tools
    .map((tool) => tool.getPromptContext(ctx, baggage).trim())
    .filter((section) => section.length > 0)
    .join('\n\n');
}

/**
 * Retrieval fragments from `tools`. Items sharing an id are merged, keeping
 * the most relevant one; the result is sorted by relevance, highest first.
 */
export function collectRagContext(
  ctx: ToolContext,
  baggage: Baggage,
  tools: readonly Tool[],
): RagContext {
  const byId = new Map<string, RagContext['items'][number]>();
  for (const tool of tools) {
    for (const item of tool.getRagContext(ctx, baggage).items) {
      const existing = byId.get(item.id);
      if (!existing || item.relevance > existing.relevance) byId.set(item.id, item);
    }
  }
  const items = Array.from(byId.values()).sort((a, b) => b.relevance - a.relevance);
  return createRagContext(items);
}
