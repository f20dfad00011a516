/**
 * Evaluation runtime entry point.
 *
 * Loads an evaluation set and its evaluators, runs every item against the
 * agent, and reports progress through the event bus:
 *
 *   load set + evaluators (fail fast)
 *   -> open the set-run trace scope (restored on resume)
 *   -> dispatch items -> flush mock cache -> publish set summary
 *   -> drain the bus, close the results file
 */

import { randomUUID } from 'crypto';
import * as path from 'path';
import { loadConfigSync, type EvalConfig } from '../config.js';
import type { Evaluator } from '../evaluators/base.js';
import { loadEvaluators } from '../evaluators/registry.js';
import { EventBus } from '../events/event-bus.js';
import { ResultFileWriter } from '../events/result-writer.js';
import { VercelAiLlmClient, type LlmClient } from '../llm/client.js';
import { MockResponseCache } from '../mocks/cache.js';
import { loadEvaluationSet } from '../parser.js';
import { SET_RUN_CHECKPOINT_KEY, SpanCheckpointStore, withCheckpointedSpan } from '../tracing/checkpoint.js';
import { ExecutionCollector } from '../tracing/collector.js';
import { Tracer } from '../tracing/tracer.js';
import type { AgentStatus, EvaluationSet, SetRunResult, Trigger } from '../types.js';
import type { RuntimeFactory } from './agent-runtime.js';
import { Dispatcher, assertResumable } from './dispatcher.js';
import { ItemRunner } from './item-runner.js';

export interface EvalRuntimeOptions {
  /** Path to the evaluation set file (JSON or YAML) */
  evalSetPath: string;
  /** Passed to the runtime factory for every item */
  entrypoint: string;
  runtimeFactory: RuntimeFactory;
  /** Reuse the run id of a suspended run when resuming */
  runId?: string;
  /** Restrict the run to these item ids */
  itemIds?: string[];
  resume?: boolean;
  config?: EvalConfig;
  llm?: LlmClient;
  bus?: EventBus;
}

export interface RuntimeResult {
  output: SetRunResult;
  status: AgentStatus;
  triggers: Trigger[];
}

export class EvalRuntime {
  readonly runId: string;
  readonly bus: EventBus;
  private readonly config: EvalConfig;
  private readonly llm: LlmClient;
  private readonly resume: boolean;

  constructor(private readonly options: EvalRuntimeOptions) {
    this.runId = options.runId ?? randomUUID();
    this.bus = options.bus ?? new EventBus();
    this.config = options.config ?? loadConfigSync();
    this.llm = options.llm ?? new VercelAiLlmClient();
    this.resume = options.resume ?? false;
  }

  async execute(): Promise<RuntimeResult> {
    const evalSet = await loadEvaluationSet(this.options.evalSetPath, this.options.itemIds);
    const evaluators = await this.loadEvaluators(evalSet);
    assertResumable(evalSet, this.resume);

    const writer = this.config.resultsFile ? new ResultFileWriter(this.config.resultsFile) : undefined;
    const detach = writer?.attach(this.bus);

    try {
      const output = await this.run(evalSet, evaluators);
      return { output, status: output.status, triggers: output.triggers };
    } finally {
      await this.bus.drain();
      detach?.();
      await writer?.close();
    }
  }

  private async loadEvaluators(evalSet: EvaluationSet): Promise<Map<string, Evaluator>> {
    const dir = this.config.evaluatorsDir
      ?? path.join(path.dirname(path.resolve(this.options.evalSetPath)), '..', 'evaluators');
    return loadEvaluators(dir, evalSet.evaluatorRefs, { llm: this.llm, judgeModel: this.config.judgeModel });
  }

  private async run(evalSet: EvaluationSet, evaluators: Map<string, Evaluator>): Promise<SetRunResult> {
    const collector = new ExecutionCollector();
    const tracer = new Tracer(collector);
    const checkpoints = new SpanCheckpointStore(this.options.runtimeFactory.getStorage(), this.runId);
    const cache = this.config.enableMockCache ? new MockResponseCache(this.config.mockCacheDir) : undefined;

    const runner = new ItemRunner({
      runId: this.runId,
      evalSet,
      evaluators,
      runtimeFactory: this.options.runtimeFactory,
      entrypoint: this.options.entrypoint,
      bus: this.bus,
      tracer,
      collector,
      checkpoints,
      llm: this.llm,
      mockerModel: this.config.mockerModel,
      inputGeneratorModel: this.config.inputGeneratorModel,
      cache,
      resume: this.resume,
      agentTimeoutMs: this.config.agentTimeoutMs,
    });
    const dispatcher = new Dispatcher(runner, {
      runId: this.runId,
      workers: this.config.workers,
      resume: this.resume,
    });

    return withCheckpointedSpan(
      tracer,
      checkpoints,
      'evaluation_set',
      {
        key: SET_RUN_CHECKPOINT_KEY,
        resume: this.resume,
        attributes: { 'eval.set.id': evalSet.id, 'eval.run.id': this.runId },
      },
      async () => {
        if (!this.resume) {
          await this.bus.publish('set-run-created', {
            runId: this.runId,
            evalSetId: evalSet.id,
            evalSetName: evalSet.name,
            evaluatorIds: evalSet.evaluatorRefs,
            itemIds: evalSet.items.map((item) => item.id),
          });
        }

        const result = await dispatcher.executeSet(evalSet);

        if (cache) {
          const written = await cache.flush();
          if (this.config.verbose && written > 0) {
            console.log(`  Cached ${written} mocked response(s) in ${this.config.mockCacheDir}`);
          }
        }

        if (result.status !== 'suspended') {
          await this.bus.publish('set-run-updated', {
            runId: this.runId,
            evalSetId: evalSet.id,
            status: result.status,
            success: result.success,
            score: result.score,
            evaluatorAverages: result.evaluatorAverages,
            triggers: result.triggers,
          });
        }

        return result;
      },
    );
  }
}
