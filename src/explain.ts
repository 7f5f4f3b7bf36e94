// Explain service: one fresh pipeline and baggage per transaction

import { Baggage, type DisciplineViolation } from './baggage/baggage.ts';
import { EXPLANATION, NAMES, RAW_DATA, TRANSFER_VALUES } from './baggage/keys.ts';
import type { Cache } from './cache/cache.ts';
import { TTL, cacheKeys } from './cache/keys.ts';
import { collectRagContext } from './context/prompt.ts';
import { ToolPipeline, type RunReport } from './pipeline/pipeline.ts';
import type { ProgressSink } from './pipeline/progress.ts';
import type {
  LlmClient,
  NameResolver,
  PriceProvider,
  TokenMetadataSource,
  TransactionSource,
} from './services/interfaces.ts';
import { MonetaryValueEnricher } from './tools/monetary-values.ts';
import { NameResolverTool } from './tools/name-resolver.ts';
import { TokenMetadataEnricher } from './tools/token-metadata.ts';
import { Erc20PriceLookup } from './tools/token-prices.ts';
import { TokenTransferExtractor } from './tools/token-transfers.ts';
import type { RagContext, Tool } from './tools/tool.ts';
import { TransactionContextProvider } from './tools/transaction-context.ts';
import { TransactionExplainer } from './tools/transaction-explainer.ts';
import {
  RawTransactionData,
  type Explanation,
  type TransferValue,
} from './types/transaction.ts';
import { log as rootLog, type Logger } from './utils/logger.ts';

export interface ExplainDeps {
  cache: Cache;
  transactions: TransactionSource;
  tokens: TokenMetadataSource;
  prices: PriceProvider;
  llm: LlmClient;
  /** name_resolver is only registered when a resolver is given */
  names?: NameResolver;
  progress?: ProgressSink;
  enforceDiscipline?: boolean;
  log?: Logger;
}

export interface ExplainRequest {
  txHash: string;
  networkId: number;
  signal?: AbortSignal;
}

export interface ExplainResult {
  txHash: string;
  networkId: number;
  explanation: Explanation;
  transfers: TransferValue[];
  names: Record<string, string>;
  ragContext: RagContext;
  report: RunReport;
  violations: DisciplineViolation[];
}

export function buildTools(deps: ExplainDeps): Tool[] {
  const providers: Tool[] = [
    new TransactionContextProvider(),
    new TokenTransferExtractor(),
    new TokenMetadataEnricher(deps.tokens, deps.cache),
    new Erc20PriceLookup(deps.prices, deps.cache),
    new MonetaryValueEnricher(),
  ];
  if (deps.names) providers.push(new NameResolverTool(deps.names, deps.cache));
  return [...providers, new TransactionExplainer(deps.llm, providers)];
}

export function buildPipeline(deps: ExplainDeps): ToolPipeline {
  const pipeline = new ToolPipeline({
    log: deps.log?.child('pipeline'),
    progress: deps.progress,
    enforceDiscipline: deps.enforceDiscipline,
  });
  pipeline.registerAll(buildTools(deps));
  return pipeline;
}

/** Raw receipt, logs and block for a mined transaction; cached once fetched. */
export async function loadRawTransaction(
  deps: Pick<ExplainDeps, 'cache' | 'transactions'>,
  networkId: number,
  txHash: string,
  signal?: AbortSignal,
): Promise<RawTransactionData> {
  const key = cacheKeys.txContext(networkId, txHash);
  const cached = await deps.cache.getJSON(key, RawTransactionData);
  if (cached) return cached;

  const raw = await deps.transactions.fetchTransaction(networkId, txHash, signal);
  await deps.cache.setJSON(key, raw, TTL.txContext);
  return raw;
}

export async function explainTransaction(
  deps: ExplainDeps,
  req: ExplainRequest,
): Promise<ExplainResult> {
  const log = deps.log ?? rootLog.child('explain');
  const txHash = req.txHash.toLowerCase();

  const raw = await loadRawTransaction(deps, req.networkId, txHash, req.signal);
  const pipeline = buildPipeline(deps);
  const baggage = new Baggage({}, log.child('baggage'));
  baggage.set(RAW_DATA, raw);

  const report = await pipeline.execute(baggage, { signal: req.signal });

  const explanation = baggage.get(EXPLANATION);
  if (!explanation) throw new Error(`no explanation produced for ${txHash}`);

  const ragContext = collectRagContext(pipeline.exportContext(req.signal), baggage, pipeline.getTools());
  log.info(`explained ${txHash} in ${report.durationMs}ms`);

  return {
    txHash,
    networkId: req.networkId,
    explanation,
    transfers: baggage.get(TRANSFER_VALUES) ?? [],
    names: baggage.get(NAMES) ?? {},
    ragContext,
    report,
    violations: baggage.getViolations(),
  };
}
