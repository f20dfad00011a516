/**
 * LLM-as-judge evaluators.
 *
 * The judge prompt is a template with {{Placeholder}} slots that are
 * checked when the evaluator is built. The model answers through a forced
 * `submit_score` tool call returning a 0-100 score and a justification;
 * the score is normalized to [0, 1].
 */

import { z } from 'zod';
import { EvalUserError } from '../errors.js';
import type { LlmClient } from '../llm/client.js';
import type { AgentExecution, ScoreOutcome } from '../types.js';
import { isPlainObject } from '../utils/json.js';
import { BaseEvaluator, type EvaluatorDefinition } from './base.js';
import { extractToolCalls } from './trajectory.js';

export const OUTPUT_JUDGE_PROMPT = `You are an expert evaluator of AI agent outputs. Compare the actual output with the expected output and judge how well it matches in meaning and completeness. Minor formatting differences do not matter.

## Expected output
{{ExpectedOutput}}

## Actual output
{{ActualOutput}}

Score from 0 (completely wrong) to 100 (fully correct) and justify the score briefly.`;

export const TRAJECTORY_JUDGE_PROMPT = `You are an expert evaluator of AI agent behavior. Judge whether the agent's run follows the expected behavior: the tools it chose, their order and arguments, and its final answer.

## Expected agent behavior
{{ExpectedAgentBehavior}}

## Agent run history
{{AgentRunHistory}}

Score from 0 (did not follow the expected behavior) to 100 (followed it exactly) and justify the score briefly.`;

const judgeConfigSchema = z.object({
  prompt: z.string().min(1).optional(),
  model: z.string().optional(),
  temperature: z.number().min(0).max(2).default(0),
  outputTruncation: z.number().int().positive().default(5000),
});

const submitScoreSchema = z.object({
  score: z.number().min(0).max(100),
  justification: z.string(),
});

export interface JudgeDependencies {
  llm: LlmClient;
  /** Used unless the definition names its own model */
  model: string;
}

export function isEmptyExpected(value: unknown): boolean {
  if (value === undefined || value === null) return true;
  if (typeof value === 'string') return value.trim() === '';
  if (Array.isArray(value)) return value.length === 0;
  if (isPlainObject(value)) return Object.keys(value).length === 0;
  return false;
}

function render(value: unknown, limit: number): string {
  const text = typeof value === 'string' ? value : JSON.stringify(value, null, 2) ?? '';
  return text.length > limit ? `${text.slice(0, limit)}\n...(truncated)` : text;
}

abstract class LlmJudgeEvaluator<TCriteria> extends BaseEvaluator<TCriteria> {
  protected readonly template: string;
  protected readonly options: z.infer<typeof judgeConfigSchema>;

  constructor(
    definition: EvaluatorDefinition,
    private readonly deps: JudgeDependencies,
    defaultPrompt: string,
    placeholders: string[],
  ) {
    super(definition);
    const parsed = judgeConfigSchema.safeParse(definition.config ?? {});
    if (!parsed.success) {
      throw new EvalUserError(`Invalid config for evaluator ${definition.id}: ${parsed.error.message}`, 'INVALID_EVALUATOR');
    }
    this.options = parsed.data;
    this.template = this.options.prompt ?? defaultPrompt;

    const missing = placeholders.filter((p) => !this.template.includes(`{{${p}}}`));
    if (missing.length > 0) {
      throw new EvalUserError(
        `Prompt of evaluator ${definition.id} is missing placeholder(s): ${missing.map((p) => `{{${p}}}`).join(', ')}`,
        'INVALID_EVALUATOR',
      );
    }
  }

  protected fill(values: Record<string, unknown>): string {
    let prompt = this.template;
    for (const [key, value] of Object.entries(values)) {
      prompt = prompt.split(`{{${key}}}`).join(render(value, this.options.outputTruncation));
    }
    return prompt;
  }

  protected async judge(prompt: string): Promise<ScoreOutcome> {
    const model = this.options.model ?? this.deps.model;
    try {
      const verdict = await this.deps.llm.callTool({
        model,
        prompt,
        toolName: 'submit_score',
        description: 'Submit the evaluation score (0-100) with a short justification',
        schema: submitScoreSchema,
        temperature: this.options.temperature,
      });
      return {
        score: verdict.score / 100,
        scoreType: 'numerical',
        details: { justification: verdict.justification },
      };
    } catch (error) {
      return {
        score: 0,
        scoreType: 'error',
        details: { error: `Judge call failed: ${error instanceof Error ? error.message : String(error)}` },
      };
    }
  }
}

// ============================================
// Output judge
// ============================================

const outputCriteria = z.object({
  expectedOutput: z.unknown(),
});

type OutputCriteria = z.infer<typeof outputCriteria>;

export class LlmJudgeOutputEvaluator extends LlmJudgeEvaluator<OutputCriteria> {
  protected readonly criteriaSchema = outputCriteria;

  constructor(definition: EvaluatorDefinition, deps: JudgeDependencies) {
    super(definition, deps, OUTPUT_JUDGE_PROMPT, ['ActualOutput', 'ExpectedOutput']);
  }

  protected async score(execution: AgentExecution, criteria: OutputCriteria): Promise<ScoreOutcome> {
    const expected = this.targetExpected(criteria.expectedOutput);
    if (isEmptyExpected(expected)) {
      throw new EvalUserError(`Evaluator ${this.id} requires a non-empty expectedOutput`, 'MISSING_CRITERIA');
    }

    return this.judge(this.fill({
      ActualOutput: this.targetOutput(execution.output),
      ExpectedOutput: expected,
    }));
  }
}

// ============================================
// Trajectory judge
// ============================================

const trajectoryCriteria = z.object({
  expectedAgentBehavior: z.string().optional(),
});

type TrajectoryCriteria = z.infer<typeof trajectoryCriteria>;

export function formatRunHistory(execution: AgentExecution): string {
  const calls = extractToolCalls(execution.trace);
  const lines = calls.map((call, i) => `${i + 1}. ${call.name}(${JSON.stringify(call.args)})`);
  return [
    `Inputs: ${JSON.stringify(execution.inputs)}`,
    'Tool calls:',
    lines.length > 0 ? lines.join('\n') : '(none)',
    `Final output: ${JSON.stringify(execution.output)}`,
  ].join('\n');
}

export class LlmJudgeTrajectoryEvaluator extends LlmJudgeEvaluator<TrajectoryCriteria> {
  protected readonly criteriaSchema = trajectoryCriteria;

  constructor(definition: EvaluatorDefinition, deps: JudgeDependencies) {
    super(definition, deps, TRAJECTORY_JUDGE_PROMPT, ['ExpectedAgentBehavior', 'AgentRunHistory']);
  }

  // An item may list this evaluator with null criteria and rely on its expectedAgentBehavior
  parseCriteria(criteria: unknown): TrajectoryCriteria {
    if ((criteria === null || criteria === undefined) && this.definition.defaultCriteria === undefined) {
      return {};
    }
    return super.parseCriteria(criteria);
  }

  protected async score(execution: AgentExecution, criteria: TrajectoryCriteria): Promise<ScoreOutcome> {
    const expected = criteria.expectedAgentBehavior ?? execution.expectedAgentBehavior;
    if (isEmptyExpected(expected)) {
      throw new EvalUserError(`Evaluator ${this.id} requires an expected agent behavior`, 'MISSING_CRITERIA');
    }

    return this.judge(this.fill({
      ExpectedAgentBehavior: expected,
      AgentRunHistory: formatRunHistory(execution),
    }));
  }
}
