/**
 * Per-item execution: inputs, agent invocation, scoring, reporting.
 *
 *   start -> agent-invoked -> suspended
 *                          -> evaluators-run -> reported
 *
 * A thrown runtime, a faulted status, a timeout or a failure while preparing
 * the inputs all end in the same place: every referenced evaluator gets a
 * zero Error result and the error payload stands in for the output.
 */

import type { LimitFunction } from 'p-limit';
import { AgentExecutionError, EvalError, errorMessage } from '../errors.js';
import type { Evaluator } from '../evaluators/base.js';
import type { EventBus } from '../events/event-bus.js';
import type { LlmClient } from '../llm/client.js';
import type { MockResponseCache } from '../mocks/cache.js';
import { runInExecution } from '../mocks/context.js';
import { createMocker } from '../mocks/factory.js';
import { generateInputs } from '../mocks/input-generator.js';
import type { ExecutionContext } from '../mocks/types.js';
import { withInputs } from '../parser.js';
import { itemScore } from '../scorer/aggregator.js';
import type { SpanCheckpointStore } from '../tracing/checkpoint.js';
import { withCheckpointedSpan } from '../tracing/checkpoint.js';
import type { ExecutionCollector } from '../tracing/collector.js';
import type { Tracer } from '../tracing/tracer.js';
import type {
  AgentErrorPayload,
  AgentExecution,
  EvalItemResult,
  EvaluationItem,
  EvaluationSet,
  RunResult,
  Trigger,
} from '../types.js';
import type { AgentRuntimeResult, RuntimeFactory } from './agent-runtime.js';

export interface ItemRunnerOptions {
  runId: string;
  evalSet: EvaluationSet;
  evaluators: Map<string, Evaluator>;
  runtimeFactory: RuntimeFactory;
  entrypoint: string;
  bus: EventBus;
  tracer: Tracer;
  collector: ExecutionCollector;
  checkpoints: SpanCheckpointStore;
  llm: LlmClient;
  mockerModel: string;
  inputGeneratorModel: string;
  cache?: MockResponseCache;
  resume: boolean;
  /** 0 disables the timeout */
  agentTimeoutMs: number;
}

export function toErrorPayload(error: unknown): AgentErrorPayload {
  const code = error instanceof EvalError ? error.code : 'AGENT_EXECUTION_FAILED';
  return {
    code,
    title: code === 'AGENT_TIMEOUT' ? 'Agent execution timed out' : 'Agent execution failed',
    detail: errorMessage(error),
  };
}

function errorResult(evaluator: Evaluator, message: string): EvalItemResult {
  return {
    evaluatorId: evaluator.id,
    evaluatorName: evaluator.name,
    result: { score: 0, scoreType: 'error', details: { error: message }, evaluationTimeMs: 0 },
  };
}

function resultTriggers(result: AgentRuntimeResult): Trigger[] {
  if (result.triggers && result.triggers.length > 0) return result.triggers;
  return result.trigger ? [result.trigger] : [];
}

export class ItemRunner {
  constructor(private readonly options: ItemRunnerOptions) {}

  /**
   * Process one item. Only the agent invocation goes through the gate.
   */
  async run(item: EvaluationItem, gate: LimitFunction): Promise<RunResult> {
    const { tracer, checkpoints, collector, resume } = this.options;

    try {
      return await withCheckpointedSpan(
        tracer,
        checkpoints,
        'evaluation',
        {
          key: item.id,
          resume,
          executionId: item.id,
          attributes: { 'eval.item.id': item.id, 'eval.item.name': item.name, 'eval.run.id': this.options.runId },
        },
        async () => {
          let prepared: EvaluationItem;
          try {
            prepared = await this.prepare(item);
          } catch (error) {
            if (!resume) await this.publishCreated(item);
            return this.fault(item, error);
          }
          return runInExecution(this.createContext(prepared), () => this.process(prepared, gate));
        },
      );
    } finally {
      // The item's own span ends after process() drained its telemetry. It is
      // checkpointed for resume but deliberately left out of the reported trace.
      collector.drain(item.id);
    }
  }

  /**
   * Zero-score faulted result for an item that failed outside the agent
   * invocation. Published like any finished item so the results file has it.
   */
  async fault(item: EvaluationItem, reason: unknown): Promise<RunResult> {
    const { bus, runId, evalSet } = this.options;
    const error = toErrorPayload(reason);
    const evaluatorResults = this.referencedEvaluators(item)
      .map(([evaluator]) => errorResult(evaluator, `Item faulted: ${error.detail}`));

    const result: RunResult = {
      itemId: item.id,
      itemName: item.name,
      status: 'faulted',
      success: false,
      score: 0,
      inputs: item.inputs,
      output: error,
      evaluatorResults,
      triggers: [],
      executionTimeMs: 0,
      error,
      logs: [],
    };

    await bus.publish(
      'run-updated',
      {
        runId,
        evalSetId: evalSet.id,
        itemId: item.id,
        itemName: item.name,
        status: 'faulted',
        success: false,
        score: 0,
        output: error,
        evaluatorResults,
        executionTimeMs: 0,
        spans: [],
        logs: [],
        error,
      },
      false,
    );

    return result;
  }

  private async publishCreated(item: EvaluationItem): Promise<void> {
    const { bus, runId, evalSet } = this.options;
    await bus.publish('run-created', {
      runId,
      evalSetId: evalSet.id,
      itemId: item.id,
      itemName: item.name,
      inputs: item.inputs,
    });
  }

  /**
   * Generate and freeze the inputs. A resumed item keeps the set's inputs:
   * the runtime receives none.
   */
  private async prepare(item: EvaluationItem): Promise<EvaluationItem> {
    const inputs = this.options.resume
      ? item.inputs
      : await generateInputs(item, {
        llm: this.options.llm,
        model: this.options.inputGeneratorModel,
        evalSetId: this.options.evalSet.id,
        cache: this.options.cache,
      });
    return withInputs(item, Object.freeze({ ...inputs }));
  }

  private createContext(item: EvaluationItem): ExecutionContext {
    return {
      executionId: item.id,
      runId: this.options.runId,
      evalSetId: this.options.evalSet.id,
      item,
      strategy: item.mockingStrategy,
      mocker: createMocker(item.mockingStrategy, {
        llm: this.options.llm,
        model: this.options.mockerModel,
        cache: this.options.cache,
      }),
      tracer: this.options.tracer,
      collector: this.options.collector,
      history: [],
    };
  }

  private async process(item: EvaluationItem, gate: LimitFunction): Promise<RunResult> {
    const { bus, runId, evalSet, collector } = this.options;

    if (!this.options.resume) await this.publishCreated(item);

    const started = performance.now();
    const invocation = await gate(() => this.invoke(item));
    const executionTimeMs = performance.now() - started;
    const telemetry = collector.drain(item.id);

    if (invocation.status === 'suspended') {
      return {
        itemId: item.id,
        itemName: item.name,
        status: 'suspended',
        success: true,
        score: 0,
        inputs: item.inputs,
        output: invocation.output ?? null,
        evaluatorResults: [],
        triggers: resultTriggers(invocation),
        executionTimeMs,
        logs: telemetry.logs,
      };
    }

    const faulted = invocation.status === 'faulted';
    const error = faulted
      ? invocation.error ?? { code: 'AGENT_EXECUTION_FAILED', title: 'Agent execution failed', detail: 'unknown error' }
      : undefined;
    const output = error ?? invocation.output ?? null;

    const evaluatorResults = error
      ? this.referencedEvaluators(item).map(([evaluator]) => errorResult(evaluator, `Agent faulted: ${error.detail}`))
      : await this.evaluate(item, {
        inputs: item.inputs,
        output,
        trace: telemetry.spans,
        expectedAgentBehavior: item.expectedAgentBehavior,
      });

    const result: RunResult = {
      itemId: item.id,
      itemName: item.name,
      status: invocation.status,
      success: !faulted,
      score: itemScore(evaluatorResults),
      inputs: item.inputs,
      output,
      evaluatorResults,
      triggers: [],
      executionTimeMs,
      error,
      logs: telemetry.logs,
    };

    await bus.publish(
      'run-updated',
      {
        runId,
        evalSetId: evalSet.id,
        itemId: item.id,
        itemName: item.name,
        status: result.status,
        success: result.success,
        score: result.score,
        output,
        evaluatorResults,
        executionTimeMs,
        spans: telemetry.spans,
        logs: telemetry.logs,
        error,
      },
      false,
    );

    return result;
  }

  private async invoke(item: EvaluationItem): Promise<AgentRuntimeResult> {
    const { runtimeFactory, entrypoint, runId, resume } = this.options;
    const runtime = await runtimeFactory.newRuntime(entrypoint, item.id);

    const execution = this.options.tracer.withSpan(
      'agent',
      () => runtime.execute(resume ? undefined : { ...item.inputs }, { resume, runId, executionId: item.id }),
    );
    let timedOut = false;

    try {
      return await this.withTimeout(execution, item.id);
    } catch (error) {
      timedOut = error instanceof EvalError && error.code === 'AGENT_TIMEOUT';
      return { status: 'faulted', error: toErrorPayload(error) };
    } finally {
      // A timed-out invocation keeps its gate slot and its runtime until it settles
      await execution.catch((error: unknown) => {
        if (timedOut) console.warn(`  Item ${item.id} failed after timing out: ${errorMessage(error)}`);
      });
      await runtime.dispose?.();
    }
  }

  private async withTimeout(execution: Promise<AgentRuntimeResult>, itemId: string): Promise<AgentRuntimeResult> {
    const timeout = this.options.agentTimeoutMs;
    if (timeout <= 0) return execution;

    let timer: NodeJS.Timeout | undefined;
    const timeoutPromise = new Promise<never>((_, reject) => {
      timer = setTimeout(
        () => reject(new AgentExecutionError(`Item ${itemId} timed out after ${timeout}ms`, 'AGENT_TIMEOUT')),
        timeout,
      );
    });

    try {
      return await Promise.race([execution, timeoutPromise]);
    } finally {
      clearTimeout(timer);
    }
  }

  /**
   * Evaluators named by the item's criteria, in criteria order.
   */
  private referencedEvaluators(item: EvaluationItem): Array<[Evaluator, unknown]> {
    const referenced: Array<[Evaluator, unknown]> = [];
    for (const [id, criteria] of Object.entries(item.evaluationCriteria)) {
      const evaluator = this.options.evaluators.get(id);
      if (evaluator) referenced.push([evaluator, criteria]);
    }
    return referenced;
  }

  private async evaluate(item: EvaluationItem, execution: AgentExecution): Promise<EvalItemResult[]> {
    const results: EvalItemResult[] = [];
    for (const [evaluator, criteria] of this.referencedEvaluators(item)) {
      try {
        results.push({
          evaluatorId: evaluator.id,
          evaluatorName: evaluator.name,
          result: await evaluator.evaluate(execution, criteria),
        });
      } catch (error) {
        results.push(errorResult(evaluator, errorMessage(error)));
      }
    }
    return results;
  }
}
