// Error taxonomy for pipeline construction and execution.
//
// Construction errors (duplicate, missing dependency, cycle) are thrown from
// register()/registerAll() and leave the pipeline untouched. Execution errors
// wrap the failing tool's error in `cause`.

export class PipelineError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'PipelineError';
  }
}

export class DuplicateToolError extends PipelineError {
  constructor(readonly toolName: string) {
    super(`tool ${toolName} is already registered`);
    this.name = 'DuplicateToolError';
  }
}

export class MissingDependencyError extends PipelineError {
  constructor(
    readonly toolName: string,
    readonly dependency: string,
  ) {
    super(`tool ${toolName} depends on ${dependency}, but ${dependency} is not registered`);
    this.name = 'MissingDependencyError';
  }
}

export class CycleError extends PipelineError {
  /**
   * @param members - every tool the scheduler could not reach
   * @param cycle - one concrete cycle, first node repeated at the end
   */
  constructor(
    readonly members: string[],
    readonly cycle: string[],
  ) {
    const path = cycle.length > 0 ? ` (${cycle.join(' -> ')})` : '';
    super(`circular dependency detected among tools: ${members.join(', ')}${path}`);
    this.name = 'CycleError';
  }
}

export class EmptyPipelineError extends PipelineError {
  constructor() {
    super('no tools registered or execution order not calculated');
    this.name = 'EmptyPipelineError';
  }
}

export class PipelineBusyError extends PipelineError {
  constructor() {
    super('pipeline is already running');
    this.name = 'PipelineBusyError';
  }
}

export class ToolExecutionError extends PipelineError {
  constructor(
    readonly toolName: string,
    cause: unknown,
  ) {
    super(`tool ${toolName} failed: ${describeCause(cause)}`, { cause });
    this.name = 'ToolExecutionError';
  }
}

export class PipelineCancelledError extends PipelineError {
  constructor(
    readonly toolName: string,
    reason?: unknown,
  ) {
    super(`pipeline cancelled before tool ${toolName}`, { cause: reason });
    this.name = 'PipelineCancelledError';
  }
}

export function describeCause(cause: unknown): string {
  return cause instanceof Error ? cause.message : String(cause);
}
