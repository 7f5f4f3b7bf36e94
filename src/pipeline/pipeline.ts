// Tool pipeline: registration with eager ordering, and a single-pass,
// fail-fast executor over one shared baggage.
//
// Debug logging shows the execution plan before each run; info logging shows
// each step with its duration. Set LOG_LEVEL=debug to see the plan.

import { Baggage } from '../baggage/baggage.ts';
import type { Tool, ToolContext } from '../tools/tool.ts';
import { log as rootLog, type Logger } from '../utils/logger.ts';
import {
  DuplicateToolError,
  EmptyPipelineError,
  PipelineBusyError,
  PipelineCancelledError,
  PipelineError,
  ToolExecutionError,
  describeCause,
} from './errors.ts';
import { ancestorsOf, buildDependencyGraph, validateDependencies } from './graph.ts';
import { ProgressTracker, type ProgressSink, type ToolPresentation } from './progress.ts';
import { topoSort } from './topo.ts';

export type PipelineState = 'not_started' | 'running' | 'completed' | 'failed';

export interface StepReport {
  name: string;
  startedAtMs: number;
  durationMs: number;
  outcome: 'ok' | 'failed';
}

export interface RunReport {
  state: 'completed' | 'failed';
  order: string[];
  steps: StepReport[];
  durationMs: number;
}

export interface PlanEntry {
  position: number; // 1-based
  name: string;
  dependencies: string[];
}

export interface PipelineOptions {
  log?: Logger;
  /** Receives per-tool phase events; failures of the sink are ignored. */
  progress?: ProgressSink;
  presentation?: Record<string, ToolPresentation>;
  /** Record reads of keys written outside a tool's dependency closure. */
  enforceDiscipline?: boolean;
}

export interface ExecuteOptions {
  signal?: AbortSignal;
}

export class ToolPipeline {
  private tools = new Map<string, Tool>();
  private order: string[] = [];
  private ancestors = new Map<string, Set<string>>();
  private state: PipelineState = 'not_started';
  private lastReport: RunReport | null = null;
  private readonly log: Logger;

  constructor(private readonly opts: PipelineOptions = {}) {
    this.log = opts.log ?? rootLog.child('pipeline');
  }

  // ------------------------------------------------------------
  // REGISTRATION
  // ------------------------------------------------------------

  /**
   * Adds one tool and recomputes the execution order. A rejected
   * registration leaves the previous tool set and order in place.
   */
  register(tool: Tool): void {
    this.registerAll([tool]);
  }

  /**
   * Adds several tools at once. The batch is validated as a whole, so tools
   * inside it may be listed before their dependencies.
   */
  registerAll(tools: Iterable<Tool>): void {
    const candidate = new Map(this.tools);
    for (const tool of tools) {
      if (candidate.has(tool.name)) throw new DuplicateToolError(tool.name);
      candidate.set(tool.name, tool);
    }

    const order = topoSort(buildDependencyGraph(candidate));

    this.tools = candidate;
    this.order = order;
    this.ancestors = new Map(order.map((name) => [name, ancestorsOf(candidate, name)]));
    this.log.debug(`registered ${candidate.size} tools, order: ${order.join(' -> ')}`);
  }

  // ------------------------------------------------------------
  // INTROSPECTION
  // ------------------------------------------------------------

  getExecutionOrder(): string[] {
    return [...this.order];
  }

  hasTool(name: string): boolean {
    return this.tools.has(name);
  }

  getTool(name: string): Tool | undefined {
    return this.tools.get(name);
  }

  /** Tools in execution order. */
  getTools(): Tool[] {
    return this.order.flatMap((name) => this.tools.get(name) ?? []);
  }

  getProcessorCount(): number {
    return this.tools.size;
  }

  getState(): PipelineState {
    return this.state;
  }

  getLastReport(): RunReport | null {
    return this.lastReport;
  }

  validateAllDependencies(): PipelineError | null {
    try {
      validateDependencies(this.tools);
      return null;
    } catch (error) {
      if (error instanceof PipelineError) return error;
      throw error;
    }
  }

  describeExecutionPlan(): PlanEntry[] {
    return this.order.map((name, i) => ({
      position: i + 1,
      name,
      dependencies: [...(this.tools.get(name)?.dependencies ?? [])],
    }));
  }

  // ------------------------------------------------------------
  // EXECUTION
  // ------------------------------------------------------------

  /**
   * Runs every tool once, in order, against `baggage`.
   *
   * @throws ToolExecutionError for the first tool that fails; writes made by
   *   tools that already finished stay in the baggage
   * @throws PipelineCancelledError when the signal aborts between tools
   */
  async execute(baggage: Baggage, options: ExecuteOptions = {}): Promise<RunReport> {
    if (this.order.length === 0) throw new EmptyPipelineError();
    if (this.state === 'running') throw new PipelineBusyError();

    const signal = options.signal ?? new AbortController().signal;
    const tracker = this.opts.progress
      ? new ProgressTracker(this.opts.progress, {
          presentation: this.opts.presentation,
          log: this.log.child('progress'),
        })
      : null;
    const order = [...this.order];
    const steps: StepReport[] = [];
    const runStart = Date.now();

    this.state = 'running';
    this.logPlan();

    try {
      for (const [i, name] of order.entries()) {
        const tool = this.tools.get(name);
        if (!tool) throw new PipelineError(`tool ${name} not found`);
        if (signal.aborted) throw new PipelineCancelledError(name, signal.reason);

        await tracker?.update(name, 'initiated', 'Preparing to start...');
        await tracker?.update(name, 'running', tool.description);
        this.log.info(`[${i + 1}/${order.length}] ${name}: ${tool.description}`);

        const startedAtMs = Date.now();
        baggage.enter(name, this.opts.enforceDiscipline ? this.ancestorsFor(name) : null);
        try {
          await tool.process(this.contextFor(name, signal, tracker), baggage);
        } catch (error) {
          const durationMs = Date.now() - startedAtMs;
          steps.push({ name, startedAtMs, durationMs, outcome: 'failed' });
          this.log.error(`${name} failed after ${durationMs}ms: ${describeCause(error)}`);
          await tracker?.update(name, 'error', `Failed: ${describeCause(error)}`);
          throw new ToolExecutionError(name, error);
        } finally {
          baggage.exit();
        }

        const durationMs = Date.now() - startedAtMs;
        steps.push({ name, startedAtMs, durationMs, outcome: 'ok' });
        await tracker?.update(name, 'finished', `Completed in ${durationMs}ms`);
        this.log.info(`${name} completed in ${durationMs}ms`);
      }
    } catch (error) {
      this.state = 'failed';
      this.lastReport = { state: 'failed', order, steps, durationMs: Date.now() - runStart };
      await tracker?.fail(error instanceof Error ? error : new Error(String(error)));
      throw error;
    }

    this.state = 'completed';
    this.lastReport = { state: 'completed', order, steps, durationMs: Date.now() - runStart };
    await tracker?.complete();
    this.log.info(
      `pipeline completed in ${this.lastReport.durationMs}ms: ${baggage.size} baggage keys across ${order.length} tools`,
    );
    return this.lastReport;
  }

  /** Context handed to export hooks outside of a run. */
  exportContext(signal: AbortSignal = new AbortController().signal): ToolContext {
    return {
      signal,
      log: this.log,
      report: async () => {},
    };
  }

  private contextFor(
    name: string,
    signal: AbortSignal,
    tracker: ProgressTracker | null,
  ): ToolContext {
    const log = this.log.child(name);
    return {
      signal,
      log,
      report: async (message) => {
        log.debug(message);
        await tracker?.update(name, 'running', message);
      },
    };
  }

  private ancestorsFor(name: string): Set<string> {
    return this.ancestors.get(name) ?? new Set();
  }

  private logPlan(): void {
    this.log.debug(`execution order (${this.order.length} tools):`);
    for (const entry of this.describeExecutionPlan()) {
      const deps =
        entry.dependencies.length === 0
          ? 'no dependencies'
          : `depends on: ${entry.dependencies.join(', ')}`;
      this.log.debug(`  ${entry.position}. ${entry.name} (${deps})`);
    }
  }
}
