/**
 * Evaluator registry.
 *
 * Builds evaluators from definition files by (category, type). Every
 * problem (unknown combination, bad config, unresolved reference) is raised
 * here, before any agent runs.
 *
 * Definition file (JSON or YAML), one per evaluator:
 *   { "id": "order", "category": "trajectory", "type": "tool-call-order",
 *     "config": { "strict": false } }
 */

import yaml from 'js-yaml';
import * as fs from 'fs/promises';
import * as path from 'path';
import { z } from 'zod';
import { EvalUserError } from '../errors.js';
import type { LlmClient } from '../llm/client.js';
import type { Evaluator, EvaluatorDefinition } from './base.js';
import { loadCustomEvaluatorClass } from './custom-loader.js';
import { ContainsEvaluator, ExactMatchEvaluator, JsonSimilarityEvaluator } from './deterministic.js';
import { LlmJudgeOutputEvaluator, LlmJudgeTrajectoryEvaluator } from './llm-judge.js';
import { ToolCallArgsEvaluator, ToolCallCountEvaluator, ToolCallOrderEvaluator } from './trajectory.js';

export interface EvaluatorDependencies {
  llm: LlmClient;
  judgeModel: string;
  /** Custom evaluator paths resolve against this directory */
  baseDir?: string;
}

type BuiltinFactory = (definition: EvaluatorDefinition, deps: EvaluatorDependencies) => Evaluator;

const BUILTIN_EVALUATORS: Record<string, Record<string, BuiltinFactory>> = {
  deterministic: {
    'equals': (def) => new ExactMatchEvaluator(def),
    'contains': (def) => new ContainsEvaluator(def),
    'json-similarity': (def) => new JsonSimilarityEvaluator(def),
  },
  'llm-as-judge': {
    output: (def, deps) => new LlmJudgeOutputEvaluator(def, { llm: deps.llm, model: deps.judgeModel }),
    trajectory: (def, deps) => new LlmJudgeTrajectoryEvaluator(def, { llm: deps.llm, model: deps.judgeModel }),
  },
  trajectory: {
    'tool-call-order': (def) => new ToolCallOrderEvaluator(def),
    'tool-call-count': (def) => new ToolCallCountEvaluator(def),
    'tool-call-args': (def) => new ToolCallArgsEvaluator(def),
  },
};

export const CUSTOM_CATEGORY = 'custom';

export const evaluatorDefinitionSchema = z.object({
  id: z.string().min(1),
  name: z.string().optional(),
  description: z.string().optional(),
  category: z.string().min(1),
  type: z.string().min(1),
  targetOutputKey: z.string().optional(),
  defaultCriteria: z.unknown().optional(),
  config: z.record(z.unknown()).optional(),
});

/**
 * Build one evaluator. Custom evaluators use `type` as the module path.
 */
export async function createEvaluator(definition: EvaluatorDefinition, deps: EvaluatorDependencies): Promise<Evaluator> {
  if (definition.category === CUSTOM_CATEGORY) {
    const EvaluatorType = await loadCustomEvaluatorClass(definition.type, deps.baseDir);
    return new EvaluatorType(definition);
  }

  const factory = BUILTIN_EVALUATORS[definition.category]?.[definition.type];
  if (!factory) {
    throw new EvalUserError(
      `Unknown evaluator type '${definition.category}/${definition.type}' for evaluator ${definition.id}`,
      'UNKNOWN_EVALUATOR_TYPE',
    );
  }

  try {
    return factory(definition, deps);
  } catch (error) {
    if (error instanceof EvalUserError) throw error;
    throw new EvalUserError(
      `Invalid evaluator ${definition.id}: ${error instanceof Error ? error.message : String(error)}`,
      'INVALID_EVALUATOR',
      { cause: error },
    );
  }
}

const DEFINITION_EXTENSIONS = new Set(['.json', '.yaml', '.yml']);

/**
 * Read every evaluator definition in a directory.
 */
export async function readEvaluatorDefinitions(dir: string): Promise<EvaluatorDefinition[]> {
  let entries: string[];
  try {
    entries = await fs.readdir(dir);
  } catch (error) {
    throw new EvalUserError(`Cannot read evaluators directory: ${dir}`, 'EVALUATORS_DIR_NOT_FOUND', { cause: error });
  }

  const definitions: EvaluatorDefinition[] = [];
  for (const entry of entries.sort()) {
    if (!DEFINITION_EXTENSIONS.has(path.extname(entry))) continue;
    const filePath = path.join(dir, entry);

    let doc: unknown;
    try {
      doc = yaml.load(await fs.readFile(filePath, 'utf-8'));
    } catch (error) {
      throw new EvalUserError(`Cannot parse evaluator file ${filePath}`, 'INVALID_EVALUATOR', { cause: error });
    }

    const parsed = evaluatorDefinitionSchema.safeParse(doc);
    if (!parsed.success) {
      throw new EvalUserError(
        `Invalid evaluator file ${filePath}: ${parsed.error.issues.map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`).join('; ')}`,
        'INVALID_EVALUATOR',
      );
    }
    definitions.push(parsed.data);
  }
  return definitions;
}

/**
 * Build the evaluators an evaluation set references, keyed by id.
 * Fails naming every reference that has no definition.
 */
export async function loadEvaluators(
  dir: string,
  refs: string[],
  deps: Omit<EvaluatorDependencies, 'baseDir'>,
): Promise<Map<string, Evaluator>> {
  const definitions = await readEvaluatorDefinitions(dir);
  const byId = new Map<string, EvaluatorDefinition>();
  for (const definition of definitions) {
    if (byId.has(definition.id)) {
      throw new EvalUserError(`Duplicate evaluator id '${definition.id}' in ${dir}`, 'INVALID_EVALUATOR');
    }
    byId.set(definition.id, definition);
  }

  const missing = refs.filter((ref) => !byId.has(ref));
  if (missing.length > 0) {
    throw new EvalUserError(`Could not find the following evaluators: ${missing.join(', ')}`, 'UNKNOWN_EVALUATOR');
  }

  const evaluators = new Map<string, Evaluator>();
  for (const ref of refs) {
    const definition = byId.get(ref);
    if (definition) {
      evaluators.set(ref, await createEvaluator(definition, { ...deps, baseDir: dir }));
    }
  }
  return evaluators;
}
