/**
 * LLM access for judges, mockers and input generators.
 *
 * Everything that talks to a model goes through the LlmClient interface so
 * tests can swap in a fake. The default implementation uses the Vercel AI
 * SDK and resolves "provider:model" strings:
 *   "openai:gpt-4.1-mini", "anthropic:claude-sonnet-4-5", "google:gemini-2.0-flash"
 */

import { generateText, tool, type LanguageModel } from 'ai';
import { createAnthropic } from '@ai-sdk/anthropic';
import { createGoogleGenerativeAI } from '@ai-sdk/google';
import { createOpenAI } from '@ai-sdk/openai';
import type { z } from 'zod';

export interface TextRequest {
  model: string;
  system?: string;
  prompt: string;
  temperature?: number;
  maxTokens?: number;
}

export interface ToolCallRequest<T> {
  model: string;
  system?: string;
  prompt: string;
  toolName: string;
  description: string;
  schema: z.ZodType<T, z.ZodTypeDef, unknown>;
  temperature?: number;
}

export interface LlmClient {
  generateText(request: TextRequest): Promise<string>;
  /** Force a single structured tool call and return its validated arguments */
  callTool<T>(request: ToolCallRequest<T>): Promise<T>;
}

// ============================================
// Model Resolution
// ============================================

/**
 * Resolve a model string like "openai:gpt-4.1-mini" into a Vercel AI SDK
 * LanguageModel instance. A bare model name defaults to OpenAI.
 */
export function resolveModel(modelString: string): LanguageModel {
  const colonIdx = modelString.indexOf(':');
  if (colonIdx === -1) {
    return createOpenAI()(modelString);
  }

  const provider = modelString.slice(0, colonIdx);
  const model = modelString.slice(colonIdx + 1);

  switch (provider) {
    case 'openai':
      return createOpenAI()(model);
    case 'anthropic':
      return createAnthropic()(model);
    case 'google':
      return createGoogleGenerativeAI()(model);
    default:
      throw new Error(
        `Unknown provider "${provider}". Supported: openai, anthropic, google. ` +
        `Use format "provider:model" (e.g. "openai:gpt-4.1-mini").`,
      );
  }
}

// ============================================
// Client
// ============================================

export class VercelAiLlmClient implements LlmClient {
  async generateText(request: TextRequest): Promise<string> {
    const result = await generateText({
      model: resolveModel(request.model),
      system: request.system,
      prompt: request.prompt,
      temperature: request.temperature,
      maxOutputTokens: request.maxTokens,
    });
    return result.text;
  }

  async callTool<T>(request: ToolCallRequest<T>): Promise<T> {
    const result = await generateText({
      model: resolveModel(request.model),
      system: request.system,
      prompt: request.prompt,
      temperature: request.temperature,
      tools: {
        [request.toolName]: tool({
          description: request.description,
          inputSchema: request.schema,
        }),
      },
      toolChoice: { type: 'tool', toolName: request.toolName },
    });

    const call = result.toolCalls.find((c) => c.toolName === request.toolName);
    if (!call) {
      throw new Error(`Model ${request.model} did not call ${request.toolName}`);
    }
    return request.schema.parse(call.input);
  }
}
