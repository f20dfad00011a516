/**
 * Deterministic output evaluators: exact match, contains and JSON
 * similarity. No model calls.
 */

import { z } from 'zod';
import type { AgentExecution, ScoreOutcome } from '../types.js';
import { canonicalJson, canonicalize, isPlainObject } from '../utils/json.js';
import { BaseEvaluator, type EvaluatorDefinition } from './base.js';

const expectedOutputCriteria = z.object({
  expectedOutput: z.unknown(),
});

type ExpectedOutputCriteria = z.infer<typeof expectedOutputCriteria>;

// ============================================
// Exact match
// ============================================

export class ExactMatchEvaluator extends BaseEvaluator<ExpectedOutputCriteria> {
  protected readonly criteriaSchema = expectedOutputCriteria;

  protected async score(execution: AgentExecution, criteria: ExpectedOutputCriteria): Promise<ScoreOutcome> {
    const actual = this.targetOutput(execution.output);
    const expected = this.targetExpected(criteria.expectedOutput);
    const matched = canonicalJson(actual) === canonicalJson(expected);

    return {
      score: matched,
      scoreType: 'boolean',
      details: matched ? undefined : { expected, actual },
    };
  }
}

// ============================================
// Contains
// ============================================

const containsConfigSchema = z.object({
  caseSensitive: z.boolean().default(false),
  negated: z.boolean().default(false),
});

const containsCriteria = z.object({
  searchText: z.string(),
});

type ContainsCriteria = z.infer<typeof containsCriteria>;

export class ContainsEvaluator extends BaseEvaluator<ContainsCriteria> {
  protected readonly criteriaSchema = containsCriteria;
  private readonly options: z.infer<typeof containsConfigSchema>;

  constructor(definition: EvaluatorDefinition) {
    super(definition);
    this.options = containsConfigSchema.parse(definition.config ?? {});
  }

  protected async score(execution: AgentExecution, criteria: ContainsCriteria): Promise<ScoreOutcome> {
    const target = this.targetOutput(execution.output);
    let haystack = typeof target === 'string' ? target : canonicalJson(target);
    let needle = criteria.searchText;

    if (!this.options.caseSensitive) {
      haystack = haystack.toLowerCase();
      needle = needle.toLowerCase();
    }

    const found = haystack.includes(needle);
    return {
      score: this.options.negated ? !found : found,
      scoreType: 'boolean',
    };
  }
}

// ============================================
// JSON similarity
// ============================================

/**
 * Structural similarity in [0, 1], measured against the expected value:
 * objects average over expected keys, arrays over expected positions,
 * numbers score by relative distance, everything else must be equal.
 */
export function jsonSimilarity(expected: unknown, actual: unknown): number {
  if (isPlainObject(expected)) {
    if (!isPlainObject(actual)) return 0;
    const keys = Object.keys(expected);
    if (keys.length === 0) return Object.keys(actual).length === 0 ? 1 : 0;
    const total = keys.reduce((sum, key) => sum + (key in actual ? jsonSimilarity(expected[key], actual[key]) : 0), 0);
    return total / keys.length;
  }

  if (Array.isArray(expected)) {
    if (!Array.isArray(actual)) return 0;
    if (expected.length === 0) return actual.length === 0 ? 1 : 0;
    const total = expected.reduce<number>(
      (sum, item, i) => sum + (i < actual.length ? jsonSimilarity(item, actual[i]) : 0),
      0,
    );
    return total / expected.length;
  }

  if (typeof expected === 'number') {
    if (typeof actual !== 'number') return 0;
    if (expected === actual) return 1;
    const scale = Math.max(Math.abs(expected), Math.abs(actual));
    return Math.max(0, 1 - Math.abs(expected - actual) / scale);
  }

  return expected === actual ? 1 : 0;
}

export class JsonSimilarityEvaluator extends BaseEvaluator<ExpectedOutputCriteria> {
  protected readonly criteriaSchema = expectedOutputCriteria;

  protected async score(execution: AgentExecution, criteria: ExpectedOutputCriteria): Promise<ScoreOutcome> {
    // Numbers are already floats here; canonical form only fixes key order
    const expected = canonicalize(this.targetExpected(criteria.expectedOutput));
    const actual = canonicalize(this.targetOutput(execution.output));
    const similarity = jsonSimilarity(expected, actual);

    return {
      score: similarity,
      scoreType: 'numerical',
      details: { similarity },
    };
  }
}
