/**
 * Execution scope for mocking and telemetry.
 *
 * Each evaluation item runs inside its own AsyncLocalStorage scope, so
 * concurrent items never see each other's mocking strategy or spans.
 * Agent code and runtime adapters reach the scope through the helpers
 * below instead of through globals.
 */

import { AsyncLocalStorage } from 'async_hooks';
import type { z } from 'zod';
import { MockResponseGenerationError, NoMockFoundError } from '../errors.js';
import { isPlainObject } from '../utils/json.js';
import type { LogRecord } from '../types.js';
import type { ExecutionContext, MockedCall, MockParams } from './types.js';

const scope = new AsyncLocalStorage<ExecutionContext>();

export function runInExecution<T>(context: ExecutionContext, fn: () => Promise<T>): Promise<T> {
  return scope.run(context, fn);
}

export function currentExecution(): ExecutionContext | undefined {
  return scope.getStore();
}

/** Underscores and spaces are interchangeable in tool names */
export function normalizeToolName(name: string): string {
  return name.trim().replace(/ /g, '_');
}

/**
 * Whether the active strategy covers the tool. Never produces a value, so
 * runtimes can call it before deciding to consult the mocker.
 */
export function isToolSimulated(toolName: string, context = currentExecution()): boolean {
  const strategy = context?.strategy;
  if (!strategy) return false;

  const wanted = normalizeToolName(toolName);
  const names = strategy.type === 'llm'
    ? strategy.toolsToSimulate.map((t) => t.name)
    : strategy.behaviors.map((b) => b.function);
  return names.some((name) => normalizeToolName(name) === wanted);
}

/**
 * Ask the active mocker for a response.
 *
 * @throws NoMockFoundError when there is no execution scope, no mocker,
 * or the mocker does not cover the call
 */
export async function getMockedResponse(call: MockedCall, params: MockParams = {}): Promise<unknown> {
  const context = currentExecution();
  if (!context?.mocker) {
    throw new NoMockFoundError(`No mocker available for ${call.name}`);
  }

  const response = await context.mocker.respond(call, params, context);
  context.history.push({ name: call.name, args: call.args, kwargs: call.kwargs, response });
  return response;
}

/**
 * Record a log line against the current execution. Outside an execution
 * scope the line is dropped.
 */
export function recordExecutionLog(level: LogRecord['level'], message: string): void {
  const context = currentExecution();
  if (!context) return;
  context.collector.addLog({
    timestamp: new Date().toISOString(),
    level,
    message,
    executionId: context.executionId,
  });
}

function toolInput(args: unknown[]): Record<string, unknown> {
  if (args.length === 1 && isPlainObject(args[0])) return args[0];
  return { args };
}

export interface MockableOptions<R> {
  description?: string;
  /** Mocked responses are validated against this schema */
  output: z.ZodType<R, z.ZodTypeDef, unknown>;
  params?: MockParams;
}

/**
 * Wrap an async tool so that, inside an execution scope, it is recorded as
 * a tool span and answered by the mocker when one applies. Falls back to
 * the real function when no mock is found.
 */
export function mockable<TArgs extends unknown[], R>(
  name: string,
  fn: (...args: TArgs) => Promise<R>,
  options: MockableOptions<R>,
): (...args: TArgs) => Promise<R> {
  return async (...args: TArgs): Promise<R> => {
    const context = currentExecution();
    if (!context) return fn(...args);

    return context.tracer.withSpan(name, async (span) => {
      span.setAttribute('tool.name', name);
      span.setAttribute('input.value', toolInput(args));

      let mocked: { value: R } | undefined;
      try {
        const response = await getMockedResponse(
          { name, description: options.description, args, kwargs: {} },
          options.params,
        );
        const parsed = options.output.safeParse(response);
        if (!parsed.success) {
          throw new MockResponseGenerationError(
            `Mocked response for ${name} does not match its output schema: ${parsed.error.message}`,
          );
        }
        mocked = { value: parsed.data };
      } catch (error) {
        if (!(error instanceof NoMockFoundError)) throw error;
      }

      span.setAttribute('mocked', mocked !== undefined);
      const result = mocked ? mocked.value : await fn(...args);
      span.setAttribute('output.value', result);
      return result;
    });
  };
}
