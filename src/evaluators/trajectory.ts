/**
 * Trajectory evaluators: checks over the tool calls recorded in the
 * execution's spans (order, counts and arguments).
 *
 * Tool spans carry `tool.name`, `input.value` (object or JSON string) and
 * `output.value` attributes.
 */

import { z } from 'zod';
import type { AgentExecution, ScoreOutcome, SpanRecord } from '../types.js';
import { deepEqual, isPlainObject } from '../utils/json.js';
import { BaseEvaluator, type EvaluatorDefinition } from './base.js';

export interface ToolCall {
  name: string;
  args: Record<string, unknown>;
}

function parseToolInput(value: unknown): Record<string, unknown> {
  if (isPlainObject(value)) return value;
  if (typeof value === 'string') {
    try {
      const parsed: unknown = JSON.parse(value);
      return isPlainObject(parsed) ? parsed : {};
    } catch {
      return {};
    }
  }
  return {};
}

export function extractToolCalls(spans: SpanRecord[]): ToolCall[] {
  const calls: ToolCall[] = [];
  for (const span of spans) {
    const name = span.attributes['tool.name'];
    if (typeof name === 'string' && name) {
      calls.push({ name, args: parseToolInput(span.attributes['input.value']) });
    }
  }
  return calls;
}

const strictConfigSchema = z.object({
  strict: z.boolean().default(false),
});

// ============================================
// Order
// ============================================

function longestCommonSubsequence(a: string[], b: string[]): string[] {
  const dp: number[][] = Array.from({ length: a.length + 1 }, () => new Array<number>(b.length + 1).fill(0));
  for (let i = 1; i <= a.length; i++) {
    for (let j = 1; j <= b.length; j++) {
      dp[i][j] = a[i - 1] === b[j - 1] ? dp[i - 1][j - 1] + 1 : Math.max(dp[i - 1][j], dp[i][j - 1]);
    }
  }

  const lcs: string[] = [];
  let i = a.length;
  let j = b.length;
  while (i > 0 && j > 0) {
    if (a[i - 1] === b[j - 1]) {
      lcs.push(a[i - 1]);
      i--;
      j--;
    } else if (dp[i - 1][j] > dp[i][j - 1]) {
      i--;
    } else {
      j--;
    }
  }
  return lcs.reverse();
}

/**
 * LCS length over the expected length; strict mode accepts exact matches only.
 */
export function toolCallOrderScore(actual: string[], expected: string[], strict: boolean): { score: number; lcs: string[] } {
  if (expected.length === 0 && actual.length === 0) return { score: 1, lcs: [] };
  if (expected.length === 0 || actual.length === 0) return { score: 0, lcs: [] };
  if (deepEqual(actual, expected)) return { score: 1, lcs: [...actual] };
  if (strict) return { score: 0, lcs: [] };

  const lcs = longestCommonSubsequence(actual, expected);
  return { score: lcs.length / expected.length, lcs };
}

const orderCriteria = z.object({
  toolCallsOrder: z.array(z.string()),
});

type OrderCriteria = z.infer<typeof orderCriteria>;

export class ToolCallOrderEvaluator extends BaseEvaluator<OrderCriteria> {
  protected readonly criteriaSchema = orderCriteria;
  private readonly strict: boolean;

  constructor(definition: EvaluatorDefinition) {
    super(definition);
    this.strict = strictConfigSchema.parse(definition.config ?? {}).strict;
  }

  protected async score(execution: AgentExecution, criteria: OrderCriteria): Promise<ScoreOutcome> {
    const actual = extractToolCalls(execution.trace).map((c) => c.name);
    const { score, lcs } = toolCallOrderScore(actual, criteria.toolCallsOrder, this.strict);
    return {
      score,
      scoreType: 'numerical',
      details: { actual, expected: criteria.toolCallsOrder, lcs },
    };
  }
}

// ============================================
// Count
// ============================================

const comparators = {
  '>': (a: number, b: number) => a > b,
  '<': (a: number, b: number) => a < b,
  '>=': (a: number, b: number) => a >= b,
  '<=': (a: number, b: number) => a <= b,
  '=': (a: number, b: number) => a === b,
  '==': (a: number, b: number) => a === b,
  '!=': (a: number, b: number) => a !== b,
} as const;

const comparatorSchema = z.enum(['>', '<', '>=', '<=', '=', '==', '!=']);

const countCriteria = z.object({
  toolCallsCount: z.record(z.tuple([comparatorSchema, z.number().int().nonnegative()])),
});

type CountCriteria = z.infer<typeof countCriteria>;

export function toolCallCountScore(
  actual: Map<string, number>,
  expected: CountCriteria['toolCallsCount'],
  strict: boolean,
): { score: number; explained: Record<string, string> } {
  const entries = Object.entries(expected);
  if (entries.length === 0 && actual.size === 0) return { score: 1, explained: {} };
  if (entries.length === 0 || actual.size === 0) return { score: 0, explained: {} };

  const explained: Record<string, string> = {};
  let matched = 0;
  for (const [tool, [comparator, count]] of entries) {
    const actualCount = actual.get(tool) ?? 0;
    const ok = comparators[comparator](actualCount, count);
    explained[tool] = `actual ${actualCount}, expected ${comparator} ${count}`;
    if (strict && !ok) {
      return { score: 0, explained: { [tool]: explained[tool] } };
    }
    if (ok) matched++;
  }
  return { score: matched / entries.length, explained };
}

export class ToolCallCountEvaluator extends BaseEvaluator<CountCriteria> {
  protected readonly criteriaSchema = countCriteria;
  private readonly strict: boolean;

  constructor(definition: EvaluatorDefinition) {
    super(definition);
    this.strict = strictConfigSchema.parse(definition.config ?? {}).strict;
  }

  protected async score(execution: AgentExecution, criteria: CountCriteria): Promise<ScoreOutcome> {
    const counts = new Map<string, number>();
    for (const call of extractToolCalls(execution.trace)) {
      counts.set(call.name, (counts.get(call.name) ?? 0) + 1);
    }
    const { score, explained } = toolCallCountScore(counts, criteria.toolCallsCount, this.strict);
    return { score, scoreType: 'numerical', details: explained };
  }
}

// ============================================
// Arguments
// ============================================

const argsConfigSchema = strictConfigSchema.extend({
  subset: z.boolean().default(false),
});

const argsCriteria = z.object({
  toolCalls: z.array(z.object({
    name: z.string(),
    args: z.record(z.unknown()).default({}),
  })),
});

type ArgsCriteria = z.infer<typeof argsCriteria>;

function argsMatch(actual: Record<string, unknown>, expected: Record<string, unknown>, subset: boolean): boolean {
  const expectedKeys = Object.keys(expected);
  if (!subset && Object.keys(actual).length !== expectedKeys.length) return false;
  return expectedKeys.every((key) => key in actual && deepEqual(actual[key], expected[key]));
}

/**
 * Order-insensitive: each expected call is matched to an unused actual call
 * with the same name and matching arguments.
 */
export function toolCallArgsScore(actual: ToolCall[], expected: ToolCall[], strict: boolean, subset: boolean): number {
  if (expected.length === 0 && actual.length === 0) return 1;
  if (expected.length === 0 || actual.length === 0) return 0;

  const used = new Set<number>();
  let matched = 0;
  for (const want of expected) {
    const index = actual.findIndex(
      (call, i) => !used.has(i) && call.name === want.name && argsMatch(call.args, want.args, subset),
    );
    if (index !== -1) {
      used.add(index);
      matched++;
    }
  }

  if (strict) return matched === expected.length ? 1 : 0;
  return matched / expected.length;
}

export class ToolCallArgsEvaluator extends BaseEvaluator<ArgsCriteria> {
  protected readonly criteriaSchema = argsCriteria;
  private readonly options: z.infer<typeof argsConfigSchema>;

  constructor(definition: EvaluatorDefinition) {
    super(definition);
    this.options = argsConfigSchema.parse(definition.config ?? {});
  }

  protected async score(execution: AgentExecution, criteria: ArgsCriteria): Promise<ScoreOutcome> {
    const actual = extractToolCalls(execution.trace);
    const score = toolCallArgsScore(actual, criteria.toolCalls, this.options.strict, this.options.subset);
    return {
      score,
      scoreType: 'numerical',
      details: { actual, expected: criteria.toolCalls },
    };
  }
}
