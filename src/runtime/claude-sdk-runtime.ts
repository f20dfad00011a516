/**
 * Claude Agent SDK runtime.
 *
 * Runs an evaluation item against an agent built on the Claude Agent SDK.
 * The item inputs become the prompt (the `prompt` field, or the inputs as
 * JSON). Tool uses are recorded as tool spans for trajectory evaluators.
 *
 * Permissions go through the canUseTool callback:
 * - tools the item's mocking strategy simulates are denied, and the deny
 *   message carries the mocked response back to the model;
 * - configured approval tools interrupt the session, which suspends the
 *   item. The SDK session id is persisted so a later process can resume it.
 */

import { query, type PermissionResult } from '@anthropic-ai/claude-agent-sdk';
import { z } from 'zod';
import { AgentExecutionError, MockedCallError, NoMockFoundError } from '../errors.js';
import { currentExecution, getMockedResponse, isToolSimulated, normalizeToolName } from '../mocks/context.js';
import type { Trigger } from '../types.js';
import { isAssistantMessage, isResultMessage, isSystemMessage, isTextBlock, isToolUseBlock } from '../types.js';
import type { AgentRuntime, AgentRuntimeResult, ExecuteOptions, RuntimeFactory, RuntimeStorage } from './agent-runtime.js';
import { InMemoryStorage } from './storage.js';

export const SESSION_NAMESPACE = 'agent_session';

export interface ClaudeSdkRuntimeOptions {
  cwd?: string;
  model?: string;
  /** Appended to the claude_code system prompt preset */
  appendSystemPrompt?: string;
  /** Tools the agent may use without asking */
  allowedTools?: string[];
  /** Tools that need an external approval; calling one suspends the item */
  approvalTools?: string[];
  /** Sent when a suspended session is resumed */
  resumePrompt?: string;
  maxTurns?: number;
}

const DEFAULT_RESUME_PROMPT = 'The pending action was approved. Continue.';

function promptFromInput(input: Record<string, unknown>): string {
  return typeof input.prompt === 'string' ? input.prompt : JSON.stringify(input, null, 2);
}

function denyMessage(response: unknown): string {
  return typeof response === 'string' ? response : JSON.stringify(response);
}

export class ClaudeSdkRuntime implements AgentRuntime {
  constructor(
    private readonly options: ClaudeSdkRuntimeOptions,
    private readonly storage: RuntimeStorage,
  ) {}

  async execute(input: Record<string, unknown> | undefined, options: ExecuteOptions): Promise<AgentRuntimeResult> {
    let sessionId: string | undefined;
    if (options.resume) {
      const saved = z.string().safeParse(
        await this.storage.getValue(options.runId, SESSION_NAMESPACE, options.executionId),
      );
      if (!saved.success) {
        throw new AgentExecutionError(`No saved agent session for item ${options.executionId}`, 'RESUME_SESSION_MISSING');
      }
      sessionId = saved.data;
    }

    const prompt = options.resume || !input
      ? this.options.resumePrompt ?? DEFAULT_RESUME_PROMPT
      : promptFromInput(input);

    const approvalTools = new Set((this.options.approvalTools ?? []).map(normalizeToolName));
    const triggers: Trigger[] = [];
    const execution = currentExecution();

    const canUseTool = async (
      toolName: string,
      toolInput: Record<string, unknown>,
      context: { signal: AbortSignal; toolUseID?: string },
    ): Promise<PermissionResult> => {
      if (approvalTools.has(normalizeToolName(toolName))) {
        triggers.push({ type: 'tool_approval', key: context.toolUseID ?? toolName, payload: { tool: toolName, input: toolInput } });
        return { behavior: 'deny', message: `${toolName} requires approval`, interrupt: true };
      }

      if (!isToolSimulated(toolName, execution)) {
        return { behavior: 'allow', updatedInput: toolInput };
      }

      try {
        const response = await getMockedResponse({ name: toolName, args: [], kwargs: toolInput });
        return { behavior: 'deny', message: denyMessage(response) };
      } catch (error) {
        if (error instanceof NoMockFoundError) return { behavior: 'allow', updatedInput: toolInput };
        if (error instanceof MockedCallError) return { behavior: 'deny', message: `Error: ${error.message}` };
        throw error;
      }
    };

    let output = '';
    let isError = false;

    const q = query({
      prompt,
      options: {
        cwd: this.options.cwd,
        model: this.options.model,
        systemPrompt: { type: 'preset', preset: 'claude_code', append: this.options.appendSystemPrompt },
        allowedTools: this.options.allowedTools,
        permissionMode: 'default',
        canUseTool,
        maxTurns: this.options.maxTurns,
        resume: sessionId,
      },
    });

    for await (const message of q) {
      if (isSystemMessage(message) && message.session_id && message.session_id !== sessionId) {
        sessionId = message.session_id;
        await this.storage.setValue(options.runId, SESSION_NAMESPACE, options.executionId, sessionId);
      }

      if (isAssistantMessage(message)) {
        for (const block of message.message.content) {
          if (isTextBlock(block)) {
            output += block.text;
          }

          if (isToolUseBlock(block) && execution) {
            const span = execution.tracer.startSpan(block.name, {
              attributes: {
                'tool.name': block.name,
                'tool.use_id': block.id,
                'input.value': block.input,
                'mocked': isToolSimulated(block.name, execution),
              },
            });
            span.setStatus('ok');
            span.end();
          }
        }
      }

      if (isResultMessage(message)) {
        isError = message.is_error;
        if (message.result) {
          output = message.result;
        }
      }
    }

    if (triggers.length > 0) {
      return { status: 'suspended', triggers };
    }

    if (isError) {
      return {
        status: 'faulted',
        output,
        error: { code: 'AGENT_RESULT_ERROR', title: 'Agent session ended with an error', detail: output || 'unknown error' },
      };
    }

    return { status: 'successful', output };
  }
}

export class ClaudeSdkRuntimeFactory implements RuntimeFactory {
  constructor(
    private readonly options: ClaudeSdkRuntimeOptions = {},
    private readonly storage: RuntimeStorage = new InMemoryStorage(),
  ) {}

  getStorage(): RuntimeStorage {
    return this.storage;
  }

  /**
   * The entrypoint names the model; an empty entrypoint keeps the configured one.
   */
  async newRuntime(entrypoint: string): Promise<AgentRuntime> {
    return new ClaudeSdkRuntime({ ...this.options, model: entrypoint || this.options.model }, this.storage);
  }
}
