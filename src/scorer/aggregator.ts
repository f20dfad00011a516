/**
 * Score aggregation for evaluation runs.
 *
 * Booleans count as 0/1, numerical scores are clamped to [0, 1] and error
 * results count as 0. Items average their evaluator scores; the set averages
 * the items that were not suspended.
 */

import type {
  AgentStatus,
  EvalItemResult,
  EvaluationResult,
  EvaluatorAverage,
  RunResult,
  Trigger,
} from '../types.js';

export function coerceScore(result: Pick<EvaluationResult, 'score' | 'scoreType'>): number {
  if (result.scoreType === 'error') return 0;
  if (typeof result.score === 'boolean') return result.score ? 1 : 0;
  if (!Number.isFinite(result.score)) return 0;
  return Math.min(1, Math.max(0, result.score));
}

function mean(values: number[]): number {
  return values.length > 0 ? values.reduce((sum, v) => sum + v, 0) / values.length : 0;
}

export function itemScore(results: EvalItemResult[]): number {
  return mean(results.map((r) => coerceScore(r.result)));
}

export function setScore(items: RunResult[]): number {
  return mean(items.filter((item) => item.status !== 'suspended').map((item) => item.score));
}

/**
 * Average each evaluator over the items that ran it, in first-seen order.
 */
export function evaluatorAverages(items: RunResult[]): EvaluatorAverage[] {
  const buckets = new Map<string, { name: string; scores: number[] }>();
  for (const item of items) {
    for (const r of item.evaluatorResults) {
      const bucket = buckets.get(r.evaluatorId);
      if (bucket) bucket.scores.push(coerceScore(r.result));
      else buckets.set(r.evaluatorId, { name: r.evaluatorName, scores: [coerceScore(r.result)] });
    }
  }

  return [...buckets.entries()].map(([evaluatorId, { name, scores }]) => ({
    evaluatorId,
    evaluatorName: name,
    averageScore: mean(scores),
    count: scores.length,
  }));
}

/**
 * Any suspended item makes the run suspended, even over faults.
 */
export function overallStatus(items: RunResult[]): AgentStatus {
  if (items.some((item) => item.status === 'suspended')) return 'suspended';
  if (items.some((item) => item.status === 'faulted')) return 'faulted';
  return 'successful';
}

export function collectTriggers(items: RunResult[]): Trigger[] {
  return items.flatMap((item) => item.triggers);
}
