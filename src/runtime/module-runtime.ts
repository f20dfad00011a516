/**
 * Runs an agent exported as a plain async function.
 *
 * Entrypoint format: "path/to/agent.ts" (default export, or an export named
 * `agent`) or "path/to/agent.ts#exportName".
 *
 *   export default async function agent(input, ctx) {
 *     if (!ctx.resume) {
 *       await ctx.setState('draft', input);
 *       return suspend({ type: 'approval', key: 'publish' });
 *     }
 *     return { published: await ctx.getState('draft') };
 *   }
 */

import * as path from 'path';
import { pathToFileURL } from 'url';
import { EvalError, EvalUserError, errorMessage } from '../errors.js';
import type { Trigger } from '../types.js';
import type { AgentRuntime, AgentRuntimeResult, ExecuteOptions, RuntimeFactory, RuntimeStorage } from './agent-runtime.js';
import { InMemoryStorage } from './storage.js';

export const AGENT_STATE_NAMESPACE = 'agent_state';

/**
 * Returned by an agent to pause until an external action completes.
 */
export class SuspendSignal {
  constructor(readonly triggers: Trigger[]) {}
}

export function suspend(...triggers: Trigger[]): SuspendSignal {
  return new SuspendSignal(triggers);
}

export interface AgentFunctionContext {
  resume: boolean;
  runId: string;
  executionId: string;
  /** State that survives a suspension, scoped to this run and item */
  getState(key: string): Promise<unknown>;
  setState(key: string, value: unknown): Promise<void>;
}

export type AgentFunction = (
  input: Record<string, unknown> | undefined,
  context: AgentFunctionContext,
) => unknown;

function parseEntrypoint(entrypoint: string): { modulePath: string; exportName?: string } {
  const hash = entrypoint.lastIndexOf('#');
  if (hash === -1) return { modulePath: entrypoint };
  return { modulePath: entrypoint.slice(0, hash), exportName: entrypoint.slice(hash + 1) };
}

function isAgentFunction(value: unknown): value is AgentFunction {
  return typeof value === 'function';
}

export class ModuleAgentRuntime implements AgentRuntime {
  constructor(
    private readonly fn: AgentFunction,
    private readonly storage: RuntimeStorage,
  ) {}

  async execute(input: Record<string, unknown> | undefined, options: ExecuteOptions): Promise<AgentRuntimeResult> {
    const stateKey = (key: string) => `${options.executionId}:${key}`;
    const context: AgentFunctionContext = {
      resume: options.resume,
      runId: options.runId,
      executionId: options.executionId,
      getState: (key) => this.storage.getValue(options.runId, AGENT_STATE_NAMESPACE, stateKey(key)),
      setState: (key, value) => this.storage.setValue(options.runId, AGENT_STATE_NAMESPACE, stateKey(key), value),
    };

    try {
      const output = await this.fn(input, context);
      if (output instanceof SuspendSignal) {
        return { status: 'suspended', triggers: output.triggers };
      }
      return { status: 'successful', output };
    } catch (error) {
      return {
        status: 'faulted',
        error: {
          code: error instanceof EvalError ? error.code : 'AGENT_ERROR',
          title: 'Agent raised an error',
          detail: errorMessage(error),
        },
      };
    }
  }
}

export class ModuleRuntimeFactory implements RuntimeFactory {
  private readonly loaded = new Map<string, Promise<AgentFunction>>();

  constructor(
    private readonly storage: RuntimeStorage = new InMemoryStorage(),
    private readonly baseDir = process.cwd(),
  ) {}

  getStorage(): RuntimeStorage {
    return this.storage;
  }

  async newRuntime(entrypoint: string): Promise<AgentRuntime> {
    let pending = this.loaded.get(entrypoint);
    if (!pending) {
      pending = this.load(entrypoint);
      this.loaded.set(entrypoint, pending);
    }
    return new ModuleAgentRuntime(await pending, this.storage);
  }

  private async load(entrypoint: string): Promise<AgentFunction> {
    const { modulePath, exportName } = parseEntrypoint(entrypoint);
    const resolved = path.resolve(this.baseDir, modulePath);

    let mod: Record<string, unknown>;
    try {
      mod = await import(pathToFileURL(resolved).href);
    } catch (error) {
      throw new EvalUserError(`Cannot load agent module ${resolved}: ${errorMessage(error)}`, 'INVALID_ENTRYPOINT', {
        cause: error,
      });
    }

    const candidate = exportName ? mod[exportName] : mod.default ?? mod.agent;
    if (!isAgentFunction(candidate)) {
      throw new EvalUserError(
        `Agent module ${resolved} has no function export ${exportName ? `'${exportName}'` : "'default' or 'agent'"}`,
        'INVALID_ENTRYPOINT',
      );
    }
    return candidate;
  }
}
