/**
 * LLM mocker. Synthesizes responses for simulated tools from a
 * natural-language description of how they should behave.
 */

import { MockResponseGenerationError, NoMockFoundError } from '../errors.js';
import type { LlmClient } from '../llm/client.js';
import type { LlmMockingStrategy } from '../types.js';
import { parseJsonResponse } from '../utils/json.js';
import type { MockResponseCache } from './cache.js';
import { isToolSimulated } from './context.js';
import type { ExecutionContext, MockedCall, MockParams, Mocker } from './types.js';

const SYSTEM_PROMPT = `You simulate tools for an AI agent under evaluation.
Reply with the tool's response only: a JSON value when the tool returns structured data, plain text otherwise. No commentary.`;

const MOCK_PROMPT_TEMPLATE = `## Simulation instructions
{instructions}

## Tool
Name: {toolName}
Description: {description}
Input schema: {inputSchema}
Output schema: {outputSchema}

## Call
Arguments: {args}

## Test case
Inputs: {inputs}
Expected agent behavior: {expectedBehavior}

## Earlier simulated calls in this run
{history}

Produce the response this tool returns for the call above.`;

export interface LlmMockerOptions {
  llm: LlmClient;
  /** Used unless the strategy names its own model */
  model: string;
  cache?: MockResponseCache;
}

function stringify(value: unknown): string {
  return value === undefined ? '(none)' : JSON.stringify(value);
}

export class LlmMocker implements Mocker {
  readonly type = 'llm' as const;

  constructor(
    private readonly strategy: LlmMockingStrategy,
    private readonly options: LlmMockerOptions,
  ) {}

  buildPrompt(call: MockedCall, context: ExecutionContext): string {
    const history = context.history.length > 0
      ? context.history
        .map((h, i) => `${i + 1}. ${h.name}(${JSON.stringify({ args: h.args, kwargs: h.kwargs })}) -> ${JSON.stringify(h.response)}`)
        .join('\n')
      : '(none)';

    return MOCK_PROMPT_TEMPLATE
      .replace('{instructions}', this.strategy.prompt)
      .replace('{toolName}', call.name)
      .replace('{description}', call.description ?? '(none)')
      .replace('{inputSchema}', stringify(call.inputSchema))
      .replace('{outputSchema}', stringify(call.outputSchema))
      .replace('{args}', JSON.stringify({ args: call.args, kwargs: call.kwargs }))
      .replace('{inputs}', JSON.stringify(context.item.inputs))
      .replace('{expectedBehavior}', context.item.expectedAgentBehavior || '(none)')
      .replace('{history}', history);
  }

  async respond(call: MockedCall, params: MockParams, context: ExecutionContext): Promise<unknown> {
    if (!isToolSimulated(call.name, context)) {
      throw new NoMockFoundError(`Tool ${call.name} is not simulated`);
    }

    const model = this.strategy.model ?? this.options.model;
    const generate = async (): Promise<unknown> => {
      let text: string;
      try {
        text = await this.options.llm.generateText({
          model,
          system: SYSTEM_PROMPT,
          prompt: this.buildPrompt(call, context),
          temperature: 0,
        });
      } catch (error) {
        throw new MockResponseGenerationError(`Failed to simulate ${call.name}`, { cause: error });
      }
      const parsed = parseJsonResponse(text);
      return parsed === undefined ? text : parsed;
    };

    if (!this.options.cache) return generate();

    return this.options.cache.getOrCompute(
      {
        mockerType: this.type,
        setId: context.evalSetId,
        itemId: context.item.id,
        functionName: call.name,
        signature: {
          strategy: { prompt: this.strategy.prompt, model },
          function: call.name,
          params,
          args: call.args,
          kwargs: call.kwargs,
        },
      },
      generate,
    );
  }
}
