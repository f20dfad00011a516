/**
 * LLM-generated agent inputs for items with an input mocking strategy.
 */

import { z } from 'zod';
import { MockResponseGenerationError } from '../errors.js';
import type { LlmClient } from '../llm/client.js';
import type { EvaluationItem } from '../types.js';
import { parseJsonResponse } from '../utils/json.js';
import type { MockResponseCache } from './cache.js';

const INPUT_PROMPT_TEMPLATE = `Generate the input for one run of an AI agent under evaluation.

## Instructions
{instructions}

## Example input (shape to follow)
{example}

## Expected agent behavior
{expectedBehavior}

Respond with a single JSON object holding the input fields. No commentary.`;

const generatedInputsSchema = z.record(z.unknown());

export interface InputGeneratorOptions {
  llm: LlmClient;
  model: string;
  evalSetId: string;
  cache?: MockResponseCache;
}

/**
 * Returns the item's inputs unchanged when it has no input mocking strategy.
 */
export async function generateInputs(
  item: EvaluationItem,
  options: InputGeneratorOptions,
): Promise<Record<string, unknown>> {
  const strategy = item.inputMockingStrategy;
  if (!strategy) return item.inputs;

  const model = strategy.model ?? options.model;
  const prompt = INPUT_PROMPT_TEMPLATE
    .replace('{instructions}', strategy.prompt)
    .replace('{example}', JSON.stringify(item.inputs, null, 2))
    .replace('{expectedBehavior}', item.expectedAgentBehavior || '(none)');

  const generate = async (): Promise<unknown> => {
    const text = await options.llm.generateText({ model, prompt, temperature: 0 });
    const parsed = generatedInputsSchema.safeParse(parseJsonResponse(text));
    if (!parsed.success) {
      throw new MockResponseGenerationError(`Generated input for ${item.id} is not a JSON object`);
    }
    return parsed.data;
  };

  const value = options.cache
    ? await options.cache.getOrCompute(
      {
        mockerType: 'input',
        setId: options.evalSetId,
        itemId: item.id,
        functionName: 'generate_inputs',
        signature: { prompt: strategy.prompt, model, example: item.inputs },
      },
      generate,
    )
    : await generate();

  return generatedInputsSchema.parse(value);
}
