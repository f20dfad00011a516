/**
 * Runs every item of a set concurrently behind one admission gate.
 *
 * At most `workers` agent invocations are in flight; scoring and event
 * publication are not throttled. A failure while processing one item
 * becomes a faulted zero-score result and never cancels its siblings.
 */

import pLimit from 'p-limit';
import { ResumeError, errorMessage } from '../errors.js';
import { collectTriggers, evaluatorAverages, overallStatus, setScore } from '../scorer/aggregator.js';
import type { EvaluationSet, RunResult, SetRunResult } from '../types.js';
import type { ItemRunner } from './item-runner.js';

export interface DispatcherOptions {
  runId: string;
  workers: number;
  resume: boolean;
}

export function assertResumable(set: EvaluationSet, resume: boolean): void {
  if (resume && set.items.length > 1) {
    throw new ResumeError(
      `Resume is only supported for a single evaluation item, got ${set.items.length}. Select one item to resume.`,
    );
  }
}

export class Dispatcher {
  constructor(
    private readonly runner: ItemRunner,
    private readonly options: DispatcherOptions,
  ) {}

  async executeSet(set: EvaluationSet): Promise<SetRunResult> {
    assertResumable(set, this.options.resume);

    const gate = pLimit(Math.max(1, this.options.workers));
    const startedAt = new Date().toISOString();

    const settled = await Promise.allSettled(set.items.map((item) => this.runner.run(item, gate)));

    const items = await Promise.all(settled.map(async (outcome, i) => {
      if (outcome.status === 'fulfilled') return outcome.value;
      const item = set.items[i];
      console.warn(`  Item ${item.id} failed: ${errorMessage(outcome.reason)}`);
      return this.runner.fault(item, outcome.reason);
    }));

    return summarizeSetRun(this.options.runId, set, items, startedAt);
  }
}

export function summarizeSetRun(runId: string, set: EvaluationSet, items: RunResult[], startedAt: string): SetRunResult {
  return {
    runId,
    evalSetId: set.id,
    evalSetName: set.name,
    status: overallStatus(items),
    success: items.every((item) => item.success),
    score: setScore(items),
    evaluatorAverages: evaluatorAverages(items),
    items,
    triggers: collectTriggers(items),
    startedAt,
    finishedAt: new Date().toISOString(),
  };
}
