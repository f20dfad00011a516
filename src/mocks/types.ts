import type { EvaluationItem, MockingStrategy } from '../types.js';
import type { ExecutionCollector } from '../tracing/collector.js';
import type { Tracer } from '../tracing/tracer.js';

/** An intercepted call, as presented to a mocker */
export interface MockedCall {
  name: string;
  description?: string;
  inputSchema?: unknown;
  outputSchema?: unknown;
  args: unknown[];
  kwargs: Record<string, unknown>;
}

export type MockParams = Record<string, unknown>;

export interface MockedCallRecord {
  name: string;
  args: unknown[];
  kwargs: Record<string, unknown>;
  response: unknown;
}

/**
 * State scoped to one evaluation item's execution.
 */
export interface ExecutionContext {
  executionId: string;
  runId: string;
  evalSetId: string;
  item: EvaluationItem;
  strategy?: MockingStrategy;
  mocker?: Mocker;
  tracer: Tracer;
  collector: ExecutionCollector;
  /** Mocked calls answered so far, oldest first */
  history: MockedCallRecord[];
}

export interface Mocker {
  readonly type: MockingStrategy['type'];
  /**
   * Produce a response for the call or throw NoMockFoundError when this
   * mocker does not cover it.
   */
  respond(call: MockedCall, params: MockParams, context: ExecutionContext): Promise<unknown>;
}
