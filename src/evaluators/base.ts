/**
 * Evaluator contract and shared base class.
 *
 * Built-in and user-supplied ("custom") evaluators extend BaseEvaluator:
 * they parse the item's criteria into their own shape and return a score.
 * Timing, default criteria and output targeting live here.
 */

import type { z } from 'zod';
import { EvalUserError } from '../errors.js';
import type { AgentExecution, EvaluationResult, ScoreOutcome } from '../types.js';
import { isPlainObject } from '../utils/json.js';

export interface EvaluatorDefinition {
  id: string;
  name?: string;
  description?: string;
  category: string;
  type: string;
  /** Top-level key of the agent output to compare; "*" means the whole output */
  targetOutputKey?: string;
  /** Used when an item lists this evaluator with null criteria */
  defaultCriteria?: unknown;
  config?: Record<string, unknown>;
}

export interface Evaluator {
  readonly id: string;
  readonly name: string;
  evaluate(execution: AgentExecution, criteria: unknown): Promise<EvaluationResult>;
}

export abstract class BaseEvaluator<TCriteria> implements Evaluator {
  readonly id: string;
  readonly name: string;
  protected readonly definition: EvaluatorDefinition;

  constructor(definition: EvaluatorDefinition) {
    this.definition = definition;
    this.id = definition.id;
    this.name = definition.name ?? definition.id;
  }

  // Input side is left open so schemas may use .default()
  protected abstract readonly criteriaSchema: z.ZodType<TCriteria, z.ZodTypeDef, unknown>;

  protected abstract score(execution: AgentExecution, criteria: TCriteria): Promise<ScoreOutcome>;

  /**
   * Resolve null criteria to the defaults and validate them.
   */
  parseCriteria(criteria: unknown): TCriteria {
    const raw = criteria ?? this.definition.defaultCriteria;
    if (raw === undefined || raw === null) {
      throw new EvalUserError(`Evaluator ${this.id} has no criteria and no default criteria`, 'MISSING_CRITERIA');
    }
    const parsed = this.criteriaSchema.safeParse(raw);
    if (!parsed.success) {
      throw new EvalUserError(
        `Invalid criteria for evaluator ${this.id}: ${parsed.error.issues.map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`).join('; ')}`,
        'INVALID_CRITERIA',
      );
    }
    return parsed.data;
  }

  async evaluate(execution: AgentExecution, criteria: unknown): Promise<EvaluationResult> {
    const start = performance.now();
    const outcome = await this.score(execution, this.parseCriteria(criteria));
    return { ...outcome, evaluationTimeMs: performance.now() - start };
  }

  /**
   * The part of the agent output this evaluator looks at.
   */
  protected targetOutput(output: unknown): unknown {
    const key = this.definition.targetOutputKey ?? '*';
    if (key === '*') return output;
    return isPlainObject(output) ? output[key] : undefined;
  }

  /**
   * Same targeting, applied to expected outputs written as objects.
   */
  protected targetExpected(expected: unknown): unknown {
    const key = this.definition.targetOutputKey ?? '*';
    if (key === '*' || !isPlainObject(expected) || !(key in expected)) return expected;
    return expected[key];
  }
}

export type EvaluatorClass = new (definition: EvaluatorDefinition) => BaseEvaluator<unknown>;

export function isEvaluatorClass(value: unknown): value is EvaluatorClass {
  return typeof value === 'function' && value.prototype instanceof BaseEvaluator;
}
