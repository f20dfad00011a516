import { z } from 'zod';
import { BaseEvaluator } from '../../../src/evaluators/base.js';
import type { ScoreOutcome } from '../../../src/types.js';

const anything = z.unknown();

export class AlwaysPass extends BaseEvaluator<unknown> {
  protected readonly criteriaSchema = anything;

  protected async score(): Promise<ScoreOutcome> {
    return { score: true, scoreType: 'boolean' };
  }
}

export class AlwaysFail extends BaseEvaluator<unknown> {
  protected readonly criteriaSchema = anything;

  protected async score(): Promise<ScoreOutcome> {
    return { score: false, scoreType: 'boolean' };
  }
}
