/**
 * Loader for evaluation set files.
 *
 * Evaluation sets are JSON or YAML documents (JSON is read through the YAML
 * parser) with the layout:
 *
 * ```yaml
 * id: weather-set
 * name: Weather agent
 * version: "1.0"
 * evaluatorRefs: [exact-match, tool-order]
 * evaluations:
 *   - id: sunny
 *     name: Sunny day
 *     inputs: { city: Lisbon }
 *     evaluationCriterias:
 *       exact-match: { expectedOutput: { forecast: sunny } }
 *       tool-order: null
 *     expectedAgentBehavior: Calls get_forecast once
 * ```
 */

import yaml from 'js-yaml';
import * as fs from 'fs/promises';
import { z } from 'zod';
import { EvalUserError } from './errors.js';
import type { EvaluationItem, EvaluationSet, MockingStrategy } from './types.js';

// ============================================
// Raw file structures
// ============================================

const mockAnswerSchema = z.object({
  type: z.enum(['return', 'raise']),
  value: z.unknown(),
});

const mockBehaviorSchema = z.object({
  function: z.string().min(1),
  arguments: z.object({
    args: z.array(z.unknown()).optional(),
    kwargs: z.record(z.unknown()).optional(),
  }).optional(),
  then: z.array(mockAnswerSchema).min(1),
});

const mockingStrategySchema = z.discriminatedUnion('type', [
  z.object({
    type: z.literal('llm'),
    prompt: z.string().min(1),
    toolsToSimulate: z.array(z.object({ name: z.string().min(1) })).default([]),
    model: z.string().optional(),
  }),
  z.object({
    type: z.literal('behavior'),
    behaviors: z.array(mockBehaviorSchema),
  }),
]);

const rawItemSchema = z.object({
  id: z.string().min(1),
  name: z.string().optional(),
  inputs: z.record(z.unknown()).default({}),
  evaluationCriterias: z.record(z.unknown()).default({}),
  expectedAgentBehavior: z.string().default(''),
  mockingStrategy: mockingStrategySchema.optional(),
  inputMockingStrategy: z.object({
    prompt: z.string().min(1),
    model: z.string().optional(),
  }).optional(),
});

const rawSetSchema = z.object({
  id: z.string().min(1),
  name: z.string().optional(),
  version: z.union([z.string(), z.number()]).default('1.0'),
  evaluatorRefs: z.array(z.string().min(1)).default([]),
  evaluations: z.array(rawItemSchema),
  batchSize: z.number().int().positive().default(10),
  timeoutMinutes: z.number().positive().default(20),
});

type RawSet = z.infer<typeof rawSetSchema>;
type RawItem = z.infer<typeof rawItemSchema>;

// ============================================
// Parser
// ============================================

function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => {
    const where = issue.path.length > 0 ? issue.path.join('.') : '(root)';
    return `${where}: ${issue.message}`;
  });
}

function parseDocument(content: string, source: string): unknown {
  try {
    return yaml.load(content);
  } catch (e) {
    throw new EvalUserError(
      `Invalid evaluation set ${source}: ${e instanceof Error ? e.message : String(e)}`,
      'INVALID_EVAL_SET',
    );
  }
}

function toItem(raw: RawItem): EvaluationItem {
  const item: EvaluationItem = {
    id: raw.id,
    name: raw.name ?? raw.id,
    inputs: raw.inputs,
    evaluationCriteria: raw.evaluationCriterias,
    expectedAgentBehavior: raw.expectedAgentBehavior,
  };
  const strategy: MockingStrategy | undefined = raw.mockingStrategy;
  if (strategy) item.mockingStrategy = strategy;
  if (raw.inputMockingStrategy) item.inputMockingStrategy = raw.inputMockingStrategy;
  return item;
}

/**
 * Structural checks the schema cannot express.
 */
function crossCheck(raw: RawSet): string[] {
  const errors: string[] = [];
  const refs = new Set(raw.evaluatorRefs);
  const seen = new Set<string>();

  raw.evaluations.forEach((item, i) => {
    if (seen.has(item.id)) {
      errors.push(`evaluations.${i}: Duplicate item id '${item.id}'`);
    }
    seen.add(item.id);

    for (const evaluatorId of Object.keys(item.evaluationCriterias)) {
      if (!refs.has(evaluatorId)) {
        errors.push(`evaluations.${i}: Criteria reference evaluator '${evaluatorId}' missing from evaluatorRefs`);
      }
    }
  });

  return errors;
}

/**
 * Parse evaluation set content into an EvaluationSet.
 */
export function parseEvaluationSet(content: string, source = '<inline>'): EvaluationSet {
  const parsed = rawSetSchema.safeParse(parseDocument(content, source));
  if (!parsed.success) {
    throw new EvalUserError(
      `Invalid evaluation set ${source}:\n  - ${formatIssues(parsed.error).join('\n  - ')}`,
      'INVALID_EVAL_SET',
    );
  }

  const raw = parsed.data;
  const problems = crossCheck(raw);
  if (problems.length > 0) {
    throw new EvalUserError(
      `Invalid evaluation set ${source}:\n  - ${problems.join('\n  - ')}`,
      'INVALID_EVAL_SET',
    );
  }

  return {
    id: raw.id,
    name: raw.name ?? raw.id,
    version: String(raw.version),
    evaluatorRefs: raw.evaluatorRefs,
    items: raw.evaluations.map(toItem),
    batchSize: raw.batchSize,
    timeoutMinutes: raw.timeoutMinutes,
  };
}

/**
 * Narrow a set to the given item ids, keeping set order.
 * Fails naming every requested id that is not in the set.
 */
export function selectItems(set: EvaluationSet, ids: string[]): EvaluationSet {
  const known = new Set(set.items.map((item) => item.id));
  const missing = ids.filter((id) => !known.has(id));
  if (missing.length > 0) {
    throw new EvalUserError(
      `Unknown evaluation id(s) in selection: ${missing.join(', ')}`,
      'UNKNOWN_EVAL_ID',
    );
  }

  const wanted = new Set(ids);
  return { ...set, items: set.items.filter((item) => wanted.has(item.id)) };
}

/**
 * Copy an item with its inputs replaced.
 */
export function withInputs(item: EvaluationItem, inputs: Record<string, unknown>): EvaluationItem {
  return { ...item, inputs };
}

/**
 * Load an evaluation set from disk, optionally narrowed to a selection of ids.
 */
export async function loadEvaluationSet(filePath: string, ids?: string[]): Promise<EvaluationSet> {
  let content: string;
  try {
    content = await fs.readFile(filePath, 'utf-8');
  } catch (e) {
    throw new EvalUserError(`Cannot read evaluation set: ${filePath}`, 'EVAL_SET_NOT_FOUND', { cause: e });
  }

  const set = parseEvaluationSet(content, filePath);
  return ids && ids.length > 0 ? selectItems(set, ids) : set;
}

// ============================================
// Validation
// ============================================

/**
 * Validate an evaluation set file and return any errors.
 */
export async function validateEvaluationSetFile(filePath: string): Promise<string[]> {
  let content: string;
  try {
    content = await fs.readFile(filePath, 'utf-8');
  } catch {
    return [`Cannot read file: ${filePath}`];
  }

  let doc: unknown;
  try {
    doc = yaml.load(content);
  } catch (e) {
    return [`Invalid YAML/JSON: ${e instanceof Error ? e.message : String(e)}`];
  }

  if (doc === undefined || doc === null) {
    return ['File is empty'];
  }

  const parsed = rawSetSchema.safeParse(doc);
  if (!parsed.success) {
    return formatIssues(parsed.error);
  }

  const errors = crossCheck(parsed.data);
  if (parsed.data.evaluations.length === 0) {
    errors.push('evaluations: At least one evaluation is required');
  }
  return errors;
}

// ============================================
// Template Generation
// ============================================

/**
 * Generate a YAML template for a new evaluation set.
 */
export function createEvaluationSetTemplate(setName: string, numItems = 3): string {
  const prefix = setName.slice(0, 2).toLowerCase();

  const items = Array.from({ length: numItems }, (_, i) => {
    const itemId = `${prefix}-${String(i + 1).padStart(3, '0')}`;
    return `  - id: ${itemId}
    name: "TODO: Describe case ${i + 1}"
    inputs:
      query: "TODO: Agent input"
    evaluationCriterias:
      exact-match:
        expectedOutput: "TODO: Expected output"
    expectedAgentBehavior: "TODO: What the agent should do"`;
  });

  return `id: ${setName}
name: ${setName}
version: "1.0"
evaluatorRefs:
  - exact-match
evaluations:
${items.join('\n\n')}
`;
}
