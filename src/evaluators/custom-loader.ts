/**
 * Loads user-supplied evaluators from a module path.
 *
 * The module must export exactly one class extending BaseEvaluator
 * (default or named export); anything else fails the load.
 */

import * as path from 'path';
import { pathToFileURL } from 'url';
import { EvalUserError } from '../errors.js';
import { isEvaluatorClass, type EvaluatorClass } from './base.js';

export async function loadCustomEvaluatorClass(modulePath: string, baseDir = process.cwd()): Promise<EvaluatorClass> {
  const resolved = path.resolve(baseDir, modulePath);

  let mod: Record<string, unknown>;
  try {
    mod = await import(pathToFileURL(resolved).href);
  } catch (error) {
    throw new EvalUserError(
      `Cannot load custom evaluator module ${resolved}: ${error instanceof Error ? error.message : String(error)}`,
      'INVALID_EVALUATOR',
      { cause: error },
    );
  }

  const candidates = [...new Set(Object.values(mod).filter(isEvaluatorClass))];
  if (candidates.length !== 1) {
    // Subclasses are recognised by identity: a class built against dist/ does not extend the src/ BaseEvaluator
    const hint = candidates.length === 0
      ? '. Evaluator classes must extend BaseEvaluator from the same copy of the engine that loads them (src/ or dist/)'
      : '';
    throw new EvalUserError(
      `Custom evaluator module ${resolved} must export exactly one evaluator class, found ${candidates.length}${hint}`,
      'INVALID_EVALUATOR',
    );
  }
  return candidates[0];
}
