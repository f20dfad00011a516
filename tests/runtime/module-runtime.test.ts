import { describe, it, expect } from 'vitest';
import * as path from 'path';
import { fileURLToPath } from 'url';
import {
  AGENT_STATE_NAMESPACE,
  ModuleAgentRuntime,
  ModuleRuntimeFactory,
  SuspendSignal,
} from '../../src/runtime/module-runtime.js';
import { InMemoryStorage } from '../../src/runtime/storage.js';
import { EvalUserError } from '../../src/errors.js';

const agents = path.join(path.dirname(fileURLToPath(import.meta.url)), '..', 'fixtures', 'agents');
const options = { resume: false, runId: 'run-1', executionId: 'item-1' };

describe('ModuleAgentRuntime', () => {
  it('maps return values, suspensions and exceptions to statuses', async () => {
    const storage = new InMemoryStorage();

    expect(await new ModuleAgentRuntime(async () => 'done', storage).execute({}, options)).toEqual({
      status: 'successful',
      output: 'done',
    });
    expect(await new ModuleAgentRuntime(() => new SuspendSignal([{ type: 'approval' }]), storage).execute({}, options))
      .toEqual({ status: 'suspended', triggers: [{ type: 'approval' }] });
    expect(await new ModuleAgentRuntime(() => {
      throw new EvalUserError('bad input', 'BAD_INPUT');
    }, storage).execute({}, options)).toEqual({
      status: 'faulted',
      error: { code: 'BAD_INPUT', title: 'Agent raised an error', detail: 'bad input' },
    });
  });

  it('scopes agent state to the run and item', async () => {
    const storage = new InMemoryStorage();
    const runtime = new ModuleAgentRuntime(async (_input, ctx) => {
      await ctx.setState('step', 2);
      return ctx.getState('step');
    }, storage);

    expect((await runtime.execute({}, options)).output).toBe(2);
    expect(await storage.getValue('run-1', AGENT_STATE_NAMESPACE, 'item-1:step')).toBe(2);
  });
});

describe('ModuleRuntimeFactory', () => {
  it('loads named exports', async () => {
    const factory = new ModuleRuntimeFactory();
    const runtime = await factory.newRuntime(`${path.join(agents, 'approval-agent.ts')}#failingAgent`);

    expect(await runtime.execute({}, options)).toEqual({
      status: 'faulted',
      error: { code: 'AGENT_ERROR', title: 'Agent raised an error', detail: 'upstream unavailable' },
    });
  });

  it('resolves entrypoints against its base directory', async () => {
    const factory = new ModuleRuntimeFactory(new InMemoryStorage(), agents);
    const runtime = await factory.newRuntime('weather-agent.ts');

    expect((await runtime.execute({ city: 'Faro' }, options)).output).toEqual({
      city: 'Faro',
      forecast: 'no data for Faro',
      summary: 'Faro: no data for Faro',
    });
  });

  it('rejects exports that are not functions', async () => {
    const factory = new ModuleRuntimeFactory(new InMemoryStorage(), agents);

    await expect(factory.newRuntime('approval-agent.ts#notAnAgent')).rejects.toThrow(
      `Agent module ${path.join(agents, 'approval-agent.ts')} has no function export 'notAnAgent'`,
    );
    await expect(factory.newRuntime('approval-agent.ts')).rejects.toMatchObject({ code: 'INVALID_ENTRYPOINT' });
  });

  it('rejects modules that cannot be loaded', async () => {
    const factory = new ModuleRuntimeFactory(new InMemoryStorage(), agents);
    await expect(factory.newRuntime('missing-agent.ts')).rejects.toMatchObject({ code: 'INVALID_ENTRYPOINT' });
  });
});
