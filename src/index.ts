// Main project index - organized exports

// Pipeline
export { ToolPipeline } from './pipeline/pipeline.ts';
export type {
  PipelineOptions,
  ExecuteOptions,
  PipelineState,
  PlanEntry,
  RunReport,
  StepReport,
} from './pipeline/pipeline.ts';
export * from './pipeline/errors.ts';
export { buildDependencyGraph, validateDependencies, ancestorsOf } from './pipeline/graph.ts';
export type { DependencyGraph, ToolDescriptor } from './pipeline/graph.ts';
export { topoSort } from './pipeline/topo.ts';
export { ProgressTracker, DEFAULT_PRESENTATION } from './pipeline/progress.ts';
export type { ProgressEvent, ProgressSink, ComponentUpdate } from './pipeline/progress.ts';

// Shared context
export { Baggage, BaggageValueError, baggageKey } from './baggage/baggage.ts';
export type { BaggageKey, DisciplineViolation } from './baggage/baggage.ts';
export * as baggageKeys from './baggage/keys.ts';

// Cache
export * from './cache/index.ts';

// Tools and context assembly
export * from './tools/index.ts';
export { assemblePromptContext, collectRagContext } from './context/prompt.ts';

// Collaborators
export type * from './services/interfaces.ts';
export { JsonRpcClient, JsonRpcError } from './services/rpc.ts';
export { EnsNameResolver } from './services/ens.ts';
export { CoinGeckoPriceProvider } from './services/coingecko.ts';
export { OpenAiChatClient } from './services/openai.ts';

// Service
export { explainTransaction, buildPipeline, buildTools, loadRawTransaction } from './explain.ts';
export type { ExplainDeps, ExplainRequest, ExplainResult } from './explain.ts';

// Config
export { loadConfig } from './config/load.ts';
export { AppConfig } from './config/schema.ts';
