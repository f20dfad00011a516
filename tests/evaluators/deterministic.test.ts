import { describe, it, expect } from 'vitest';
import {
  ContainsEvaluator,
  ExactMatchEvaluator,
  JsonSimilarityEvaluator,
  jsonSimilarity,
} from '../../src/evaluators/deterministic.js';
import type { AgentExecution } from '../../src/types.js';

function execution(output: unknown): AgentExecution {
  return { inputs: {}, output, trace: [], expectedAgentBehavior: '' };
}

describe('ExactMatchEvaluator', () => {
  it('ignores key order', async () => {
    const evaluator = new ExactMatchEvaluator({ id: 'exact', category: 'deterministic', type: 'equals' });
    const result = await evaluator.evaluate(execution({ b: 2, a: 1 }), { expectedOutput: { a: 1, b: 2 } });

    expect(result.score).toBe(true);
    expect(result.scoreType).toBe('boolean');
    expect(result.details).toBeUndefined();
    expect(result.evaluationTimeMs).toBeGreaterThanOrEqual(0);
  });

  it('reports expected and actual on mismatch', async () => {
    const evaluator = new ExactMatchEvaluator({ id: 'exact', category: 'deterministic', type: 'equals' });
    const result = await evaluator.evaluate(execution({ a: 1 }), { expectedOutput: { a: 2 } });

    expect(result.score).toBe(false);
    expect(result.details).toEqual({ expected: { a: 2 }, actual: { a: 1 } });
  });

  it('compares only the targeted output key', async () => {
    const evaluator = new ExactMatchEvaluator({
      id: 'exact',
      category: 'deterministic',
      type: 'equals',
      targetOutputKey: 'answer',
    });

    const fromObject = await evaluator.evaluate(execution({ answer: 42, debug: 'x' }), { expectedOutput: { answer: 42 } });
    const fromScalar = await evaluator.evaluate(execution({ answer: 42 }), { expectedOutput: 42 });

    expect(fromObject.score).toBe(true);
    expect(fromScalar.score).toBe(true);
  });

  it('falls back to default criteria for null criteria', async () => {
    const evaluator = new ExactMatchEvaluator({
      id: 'exact',
      category: 'deterministic',
      type: 'equals',
      defaultCriteria: { expectedOutput: 'ok' },
    });

    expect((await evaluator.evaluate(execution('ok'), null)).score).toBe(true);
  });

  it('rejects null criteria without defaults', async () => {
    const evaluator = new ExactMatchEvaluator({ id: 'exact', category: 'deterministic', type: 'equals' });
    await expect(evaluator.evaluate(execution('ok'), null)).rejects.toMatchObject({ code: 'MISSING_CRITERIA' });
  });
});

describe('ContainsEvaluator', () => {
  it('is case-insensitive by default', async () => {
    const evaluator = new ContainsEvaluator({ id: 'contains', category: 'deterministic', type: 'contains' });
    const result = await evaluator.evaluate(execution('The forecast is SUNNY'), { searchText: 'sunny' });
    expect(result.score).toBe(true);
  });

  it('honours case sensitivity and negation', async () => {
    const evaluator = new ContainsEvaluator({
      id: 'contains',
      category: 'deterministic',
      type: 'contains',
      config: { caseSensitive: true, negated: true },
    });

    expect((await evaluator.evaluate(execution('SUNNY'), { searchText: 'sunny' })).score).toBe(true);
    expect((await evaluator.evaluate(execution('sunny'), { searchText: 'sunny' })).score).toBe(false);
  });

  it('searches the JSON form of structured output', async () => {
    const evaluator = new ContainsEvaluator({ id: 'contains', category: 'deterministic', type: 'contains' });
    const result = await evaluator.evaluate(execution({ city: 'Lisbon' }), { searchText: '"city":"lisbon"' });
    expect(result.score).toBe(true);
  });

  it('rejects criteria without searchText', async () => {
    const evaluator = new ContainsEvaluator({ id: 'contains', category: 'deterministic', type: 'contains' });
    await expect(evaluator.evaluate(execution('x'), { text: 'x' })).rejects.toThrow(
      'Invalid criteria for evaluator contains: searchText: Required',
    );
  });
});

describe('jsonSimilarity', () => {
  it('is 1 for equal structures', () => {
    expect(jsonSimilarity({ a: [1, 'x'], b: { c: true } }, { b: { c: true }, a: [1, 'x'] })).toBe(1);
  });

  it('averages over expected keys', () => {
    expect(jsonSimilarity({ a: 1, b: 2 }, { a: 1, b: 3, extra: 9 })).toBeCloseTo((1 + 2 / 3) / 2);
  });

  it('scores numbers by relative distance', () => {
    expect(jsonSimilarity(10, 8)).toBeCloseTo(0.8);
    expect(jsonSimilarity(1, -1)).toBe(0);
    expect(jsonSimilarity(2, 2.0)).toBe(1);
  });

  it('handles missing keys, type mismatches and empty containers', () => {
    expect(jsonSimilarity({ a: 1, b: 1 }, { a: 1 })).toBe(0.5);
    expect(jsonSimilarity([1, 2], 'x')).toBe(0);
    expect(jsonSimilarity([], [])).toBe(1);
    expect(jsonSimilarity({}, { a: 1 })).toBe(0);
  });
});

describe('JsonSimilarityEvaluator', () => {
  it('returns a numerical score', async () => {
    const evaluator = new JsonSimilarityEvaluator({ id: 'sim', category: 'deterministic', type: 'json-similarity' });
    const result = await evaluator.evaluate(execution({ items: [1, 2, 3, 4] }), { expectedOutput: { items: [1, 2, 3, 5] } });

    expect(result.scoreType).toBe('numerical');
    expect(result.score).toBeCloseTo((3 + 0.8) / 4);
  });
});
