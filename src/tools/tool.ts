/**
 * @fileoverview Capability contract every analysis step implements.
 *
 * A tool declares its identity and dependencies up front, does its work in
 * `process` (writing results into the baggage under its documented keys), and
 * exposes two read-only renderers that downstream assemblers call after the
 * main pass: one for LLM prompts and one for retrieval indexes.
 */

import type { Baggage } from '../baggage/baggage.ts';
import type { Logger } from '../utils/logger.ts';

// ------------------------------------------------------------
// RETRIEVAL FRAGMENTS
// ------------------------------------------------------------

export interface RagContextItem {
  id: string; // unique identifier for vector storage
  type: string; // "token", "protocol", "address", ...
  title: string;
  content: string; // main text to embed
  metadata: Record<string, unknown>;
  keywords: string[];
  relevance: number; // base relevance score, 0..1
}

export interface RagContext {
  items: RagContextItem[];
}

export function createRagContext(items: RagContextItem[] = []): RagContext {
  return { items: [...items] };
}

export function addRagItem(rag: RagContext, item: RagContextItem): void {
  rag.items.push(item);
}

// ------------------------------------------------------------
// TOOL CONTRACT
// ------------------------------------------------------------

/** Per-invocation context handed to every tool call. */
export interface ToolContext {
  signal: AbortSignal;
  log: Logger;
  /** Coarse progress note for operators; never affects the run. */
  report(message: string): Promise<void>;
}

export interface Tool {
  readonly name: string;
  readonly description: string;
  readonly dependencies: readonly string[];

  /**
   * Does the tool's work once per run. Throwing fails the whole run.
   */
  process(ctx: ToolContext, baggage: Baggage): Promise<void>;

  /** Must not write to the baggage or throw; returns '' when there is nothing to say. */
  getPromptContext(ctx: ToolContext, baggage: Baggage): string;

  /** Must not write to the baggage or throw; returns an empty set when data is missing. */
  getRagContext(ctx: ToolContext, baggage: Baggage): RagContext;
}

export function shortenAddress(address: string): string {
  if (address.length < 12) return address;
  return `${address.slice(0, 6)}...${address.slice(-4)}`;
}

export type LookupResult<T> = { ok: true; value: T } | { ok: false; error: unknown };

/**
 * Runs one per-item enrichment lookup. A failure is logged and returned as
 * `ok: false` so the tool can skip the item; once the run is cancelled the
 * error is rethrown instead.
 */
export async function tryLookup<T>(
  ctx: ToolContext,
  what: string,
  lookup: () => Promise<T>,
): Promise<LookupResult<T>> {
  try {
    return { ok: true, value: await lookup() };
  } catch (error) {
    if (ctx.signal.aborted) throw error;
    ctx.log.warn(`${what} failed, skipping:`, error);
    return { ok: false, error };
  }
}
