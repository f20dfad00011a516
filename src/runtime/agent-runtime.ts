/**
 * Agent runtime interface: the boundary between the evaluation engine and
 * whatever actually runs the agent.
 *
 * A RuntimeFactory builds one runtime per evaluation item. The runtime
 * reports suspension through its status; on a later process the engine asks
 * the same factory for a runtime and calls execute() with `resume: true` and
 * no input, and the runtime reads whatever it persisted through the
 * factory's storage.
 */

import type { AgentErrorPayload, AgentStatus, Trigger } from '../types.js';

export interface RuntimeStorage {
  getValue(runId: string, namespace: string, key: string): Promise<unknown>;
  setValue(runId: string, namespace: string, key: string, value: unknown): Promise<void>;
}

export interface ExecuteOptions {
  resume: boolean;
  /** Evaluation run the invocation belongs to */
  runId: string;
  /** Evaluation item id; spans and logs are collected under it */
  executionId: string;
}

export interface AgentRuntimeResult {
  output?: unknown;
  status: AgentStatus;
  error?: AgentErrorPayload;
  trigger?: Trigger;
  triggers?: Trigger[];
}

export interface AgentRuntime {
  execute(input: Record<string, unknown> | undefined, options: ExecuteOptions): Promise<AgentRuntimeResult>;
  dispose?(): Promise<void>;
}

export interface RuntimeFactory {
  newRuntime(entrypoint: string, runtimeId: string): Promise<AgentRuntime>;
  getStorage(): RuntimeStorage;
}
