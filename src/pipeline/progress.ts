// Coarse per-tool progress reporting for external observers (UIs, SSE streams).
//
// The sink is optional and untrusted: anything it throws or rejects with is
// logged and dropped, so a broken observer can never change a run's outcome.

import { log as rootLog, type Logger } from '../utils/logger.ts';

export type ComponentStatus = 'initiated' | 'running' | 'finished' | 'error';

export type ComponentGroup = 'data' | 'decoding' | 'enrichment' | 'analysis' | 'finishing';

export interface ComponentUpdate {
  id: string; // tool name
  group: ComponentGroup;
  title: string;
  status: ComponentStatus;
  description: string;
  timestampMs: number;
  startTimeMs: number;
  durationMs: number; // 0 until the component leaves 'running'
}

export type ProgressEvent =
  | { type: 'component_update'; component: ComponentUpdate; timestampMs: number }
  | { type: 'complete'; timestampMs: number }
  | { type: 'error'; error: string; timestampMs: number };

export type ProgressSink = (event: ProgressEvent) => void | Promise<void>;

export interface ToolPresentation {
  group: ComponentGroup;
  title: string;
}

export const DEFAULT_PRESENTATION: Record<string, ToolPresentation> = {
  transaction_context_provider: { group: 'data', title: 'Processing Transaction Data' },
  token_transfer_extractor: { group: 'decoding', title: 'Extracting Token Transfers' },
  token_metadata_enricher: { group: 'enrichment', title: 'Fetching Token Metadata' },
  erc20_price_lookup: { group: 'enrichment', title: 'Fetching Token Prices' },
  monetary_value_enricher: { group: 'enrichment', title: 'Calculating USD Values' },
  name_resolver: { group: 'enrichment', title: 'Resolving Names' },
  transaction_explainer: { group: 'analysis', title: 'Generating Explanation' },
};

/** "token_price_lookup" -> "Token Price Lookup" */
export function titleFromName(name: string): string {
  return name
    .split(/[_\s-]+/)
    .filter((w) => w.length > 0)
    .map((w) => w[0].toUpperCase() + w.slice(1))
    .join(' ');
}

export class ProgressTracker {
  private components = new Map<string, ComponentUpdate>();
  private readonly presentation: Record<string, ToolPresentation>;
  private readonly log: Logger;

  constructor(
    private readonly sink: ProgressSink,
    opts: { presentation?: Record<string, ToolPresentation>; log?: Logger } = {},
  ) {
    this.presentation = { ...DEFAULT_PRESENTATION, ...opts.presentation };
    this.log = opts.log ?? rootLog.child('progress');
  }

  async update(id: string, status: ComponentStatus, description: string): Promise<void> {
    const now = Date.now();
    const previous = this.components.get(id);
    const startTimeMs = previous?.startTimeMs ?? now;
    const presentation = this.presentation[id] ?? {
      group: 'analysis',
      title: titleFromName(id),
    };

    const component: ComponentUpdate = {
      id,
      group: presentation.group,
      title: presentation.title,
      status,
      description,
      timestampMs: now,
      startTimeMs,
      durationMs: status === 'finished' || status === 'error' ? now - startTimeMs : 0,
    };
    this.components.set(id, component);
    await this.emit({ type: 'component_update', component, timestampMs: now });
  }

  async complete(): Promise<void> {
    await this.emit({ type: 'complete', timestampMs: Date.now() });
  }

  async fail(error: Error): Promise<void> {
    await this.emit({ type: 'error', error: error.message, timestampMs: Date.now() });
  }

  getAllComponents(): ComponentUpdate[] {
    return Array.from(this.components.values());
  }

  private async emit(event: ProgressEvent): Promise<void> {
    try {
      await this.sink(event);
    } catch (error) {
      this.log.warn(`progress sink failed on ${event.type} event, ignoring:`, error);
    }
  }
}
