import { describe, it, expect, vi, afterEach } from 'vitest';
import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import { Dispatcher } from '../../src/runtime/dispatcher.js';
import { ItemRunner, toErrorPayload } from '../../src/runtime/item-runner.js';
import { AgentExecutionError, ResumeError } from '../../src/errors.js';
import type { Evaluator } from '../../src/evaluators/base.js';
import { ExactMatchEvaluator } from '../../src/evaluators/deterministic.js';
import { EventBus, type EvalEventType } from '../../src/events/event-bus.js';
import { ResultFileWriter } from '../../src/events/result-writer.js';
import { SpanCheckpointStore } from '../../src/tracing/checkpoint.js';
import { ExecutionCollector } from '../../src/tracing/collector.js';
import { Tracer } from '../../src/tracing/tracer.js';
import type { EvaluationSet } from '../../src/types.js';
import { FakeLlmClient, FakeRuntimeFactory, makeItem, makeSet, sleep, type FakeAgent } from '../helpers/fakes.js';

const exact = new ExactMatchEvaluator({ id: 'exact', name: 'Exact', category: 'deterministic', type: 'equals' });

const echo: FakeAgent = (input) => ({ status: 'successful', output: input?.query });

interface Harness {
  factory: FakeRuntimeFactory;
  bus: EventBus;
  events: Array<[EvalEventType, string]>;
  dispatcher: Dispatcher;
}

function harness(
  set: EvaluationSet,
  agent: FakeAgent,
  options: {
    workers?: number;
    delayMs?: number;
    resume?: boolean;
    agentTimeoutMs?: number;
    evaluators?: Evaluator[];
    llm?: FakeLlmClient;
  } = {},
): Harness {
  const factory = new FakeRuntimeFactory(agent, options.delayMs ?? 0);
  const bus = new EventBus();
  const events: Array<[EvalEventType, string]> = [];
  bus.subscribe('run-created', (event) => {
    events.push(['run-created', event.itemId]);
  });
  bus.subscribe('run-updated', (event) => {
    events.push(['run-updated', event.itemId]);
  });

  const collector = new ExecutionCollector();
  const resume = options.resume ?? false;
  const runner = new ItemRunner({
    runId: 'run-1',
    evalSet: set,
    evaluators: new Map((options.evaluators ?? [exact]).map((e) => [e.id, e])),
    runtimeFactory: factory,
    entrypoint: 'agent',
    bus,
    tracer: new Tracer(collector),
    collector,
    checkpoints: new SpanCheckpointStore(factory.storage, 'run-1'),
    llm: options.llm ?? new FakeLlmClient(),
    mockerModel: 'openai:mocker',
    inputGeneratorModel: 'openai:gen',
    resume,
    agentTimeoutMs: options.agentTimeoutMs ?? 0,
  });

  return {
    factory,
    bus,
    events,
    dispatcher: new Dispatcher(runner, { runId: 'run-1', workers: options.workers ?? 1, resume }),
  };
}

describe('Dispatcher', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('keeps at most `workers` agent invocations in flight', async () => {
    const set = makeSet(['a', 'b', 'c', 'd', 'e'].map((id) => makeItem(id)));
    const { factory, dispatcher } = harness(set, echo, { workers: 2, delayMs: 20 });

    const result = await dispatcher.executeSet(set);

    expect(factory.maxActive).toBe(2);
    expect(factory.invocations).toHaveLength(5);
    expect(factory.disposed).toBe(5);
    expect(result.items.map((i) => i.itemId)).toEqual(['a', 'b', 'c', 'd', 'e']);
  });

  it('returns results in set order whatever the finishing order', async () => {
    const set = makeSet([makeItem('slow'), makeItem('fast')]);
    const agent: FakeAgent = async (input) => {
      await sleep(input?.query === 'slow' ? 40 : 1);
      return { status: 'successful', output: input?.query };
    };
    const { dispatcher } = harness(set, agent, { workers: 2 });

    const result = await dispatcher.executeSet(set);

    expect(result.items.map((i) => i.output)).toEqual(['slow', 'fast']);
  });

  it('scores successful items with their referenced evaluators', async () => {
    const set = makeSet([
      makeItem('a', { evaluationCriteria: { exact: { expectedOutput: 'a' }, unknown: null } }),
      makeItem('b', { evaluationCriteria: { exact: { expectedOutput: 'nope' } } }),
    ]);
    const { bus, events, dispatcher } = harness(set, echo);

    const result = await dispatcher.executeSet(set);
    await bus.drain();

    expect(result.items.map((i) => i.score)).toEqual([1, 0]);
    expect(result.items[0].evaluatorResults.map((r) => r.evaluatorName)).toEqual(['Exact']);
    expect(result.score).toBe(0.5);
    expect(result.status).toBe('successful');
    expect(result.success).toBe(true);
    expect(result.evaluatorAverages).toEqual([
      { evaluatorId: 'exact', evaluatorName: 'Exact', averageScore: 0.5, count: 2 },
    ]);
    expect(events.filter(([type]) => type === 'run-updated')).toHaveLength(2);
  });

  it('passes frozen inputs and the run identity to the runtime', async () => {
    const set = makeSet([makeItem('a', { inputs: { city: 'Lisbon' } })]);
    const { factory, dispatcher } = harness(set, echo);

    await dispatcher.executeSet(set);

    expect(factory.runtimeIds).toEqual(['a']);
    expect(factory.invocations[0]).toEqual({
      input: { city: 'Lisbon' },
      options: { resume: false, runId: 'run-1', executionId: 'a' },
    });
  });

  it('records evaluator failures as error results', async () => {
    const broken: Evaluator = {
      id: 'broken',
      name: 'Broken',
      evaluate: async () => {
        throw new Error('judge offline');
      },
    };
    const set = makeSet([makeItem('a', { evaluationCriteria: { broken: {}, exact: { expectedOutput: 'a' } } })]);
    const { dispatcher } = harness(set, echo, { evaluators: [broken, exact] });

    const [item] = (await dispatcher.executeSet(set)).items;

    expect(item.evaluatorResults[0]).toEqual({
      evaluatorId: 'broken',
      evaluatorName: 'Broken',
      result: { score: 0, scoreType: 'error', details: { error: 'judge offline' }, evaluationTimeMs: 0 },
    });
    expect(item.score).toBe(0.5);
    expect(item.success).toBe(true);
  });

  it('gives every evaluator an error result when the agent faults', async () => {
    const set = makeSet([makeItem('a', { evaluationCriteria: { exact: { expectedOutput: 'a' } } }), makeItem('b')]);
    const agent: FakeAgent = (input) => input?.query === 'a'
      ? { status: 'faulted', error: { code: 'TOOL_FAILED', title: 'Tool failed', detail: 'boom' } }
      : { status: 'successful', output: 'ok' };
    const { dispatcher } = harness(set, agent, { workers: 2 });

    const result = await dispatcher.executeSet(set);
    const [faulted, ok] = result.items;

    expect(faulted.status).toBe('faulted');
    expect(faulted.success).toBe(false);
    expect(faulted.output).toEqual({ code: 'TOOL_FAILED', title: 'Tool failed', detail: 'boom' });
    expect(faulted.evaluatorResults[0].result).toEqual({
      score: 0,
      scoreType: 'error',
      details: { error: 'Agent faulted: boom' },
      evaluationTimeMs: 0,
    });
    expect(ok.status).toBe('successful');
    expect(result.status).toBe('faulted');
    expect(result.success).toBe(false);
  });

  it('turns runtime exceptions into faulted items', async () => {
    const set = makeSet([makeItem('a')]);
    const agent: FakeAgent = () => {
      throw new Error('connection reset');
    };
    const { factory, dispatcher } = harness(set, agent);

    const [item] = (await dispatcher.executeSet(set)).items;

    expect(item.error).toEqual({ code: 'AGENT_EXECUTION_FAILED', title: 'Agent execution failed', detail: 'connection reset' });
    expect(factory.disposed).toBe(1);
  });

  it('times out slow invocations', async () => {
    const set = makeSet([makeItem('a')]);
    const { factory, dispatcher } = harness(set, echo, { delayMs: 200, agentTimeoutMs: 20 });

    const [item] = (await dispatcher.executeSet(set)).items;

    expect(item.status).toBe('faulted');
    expect(item.error).toEqual({
      code: 'AGENT_TIMEOUT',
      title: 'Agent execution timed out',
      detail: 'Item a timed out after 20ms',
    });
    expect(factory.disposed).toBe(1);
  });

  it('reports the agent span but not the item span', async () => {
    const set = makeSet([makeItem('a')]);
    const { bus, dispatcher } = harness(set, echo);
    const reported: string[][] = [];
    bus.subscribe('run-updated', (event) => {
      reported.push(event.spans.map((span) => span.name));
    });

    await dispatcher.executeSet(set);
    await bus.drain();

    expect(reported).toEqual([['agent']]);
  });

  it('holds the worker slot until a timed-out invocation settles', async () => {
    const set = makeSet(['a', 'b', 'c'].map((id) => makeItem(id)));
    const { factory, dispatcher } = harness(set, echo, { workers: 1, delayMs: 200, agentTimeoutMs: 20 });

    const result = await dispatcher.executeSet(set);

    expect(factory.maxActive).toBe(1);
    expect(factory.invocations).toHaveLength(3);
    expect(factory.disposed).toBe(3);
    expect(result.items.map((i) => i.error?.code)).toEqual(['AGENT_TIMEOUT', 'AGENT_TIMEOUT', 'AGENT_TIMEOUT']);
  });

  it('reports items whose input generation fails', async () => {
    const dir = await fs.mkdtemp(path.join(os.tmpdir(), 'dispatcher-'));
    try {
      const set = makeSet([
        makeItem('a', {
          inputMockingStrategy: { prompt: 'Vary the query' },
          evaluationCriteria: { exact: { expectedOutput: 'a' } },
        }),
        makeItem('b', { evaluationCriteria: { exact: { expectedOutput: 'b' } } }),
      ]);
      const llm = new FakeLlmClient({ text: () => 'not json' });
      const { factory, bus, events, dispatcher } = harness(set, echo, { workers: 2, llm });
      const writer = new ResultFileWriter(path.join(dir, 'results.json'));
      writer.attach(bus);

      const result = await dispatcher.executeSet(set);
      await bus.drain();
      await writer.close();

      const [failed, ok] = result.items;
      const error = {
        code: 'MOCK_GENERATION_FAILED',
        title: 'Agent execution failed',
        detail: 'Generated input for a is not a JSON object',
      };
      expect(failed).toMatchObject({ status: 'faulted', success: false, score: 0, output: error, error });
      expect(failed.evaluatorResults).toEqual([{
        evaluatorId: 'exact',
        evaluatorName: 'Exact',
        result: {
          score: 0,
          scoreType: 'error',
          details: { error: 'Item faulted: Generated input for a is not a JSON object' },
          evaluationTimeMs: 0,
        },
      }]);
      expect(ok.score).toBe(1);
      expect(factory.runtimeIds).toEqual(['b']);
      expect(result.evaluatorAverages).toEqual([
        { evaluatorId: 'exact', evaluatorName: 'Exact', averageScore: 0.5, count: 2 },
      ]);
      expect(events.filter(([, id]) => id === 'a')).toEqual([['run-created', 'a'], ['run-updated', 'a']]);

      const file = await writer.read();
      expect(Object.keys(file?.items ?? {}).sort()).toEqual(['a', 'b']);
      expect(file?.items.a).toMatchObject({
        state: 'completed',
        status: 'faulted',
        success: false,
        score: 0,
        inputs: { query: 'a' },
        error,
      });
    } finally {
      await fs.rm(dir, { recursive: true, force: true });
    }
  });

  it('publishes a faulted result when an item fails outside the runner', async () => {
    vi.spyOn(console, 'warn').mockImplementation(() => {});
    const set = makeSet([makeItem('a', { evaluationCriteria: { exact: { expectedOutput: 'a' } } })]);
    const { factory, bus, events, dispatcher } = harness(set, echo);
    vi.spyOn(factory.storage, 'setValue').mockRejectedValue(new Error('disk full'));

    const [item] = (await dispatcher.executeSet(set)).items;
    await bus.drain();

    expect(item.error).toEqual({ code: 'AGENT_EXECUTION_FAILED', title: 'Agent execution failed', detail: 'disk full' });
    expect(item.evaluatorResults.map((r) => r.result.details)).toEqual([{ error: 'Item faulted: disk full' }]);
    expect(events).toEqual([['run-updated', 'a']]);
    expect(console.warn).toHaveBeenCalledWith('  Item a failed: disk full');
  });

  it('skips evaluators and the update event for suspended items', async () => {
    const set = makeSet([makeItem('a', { evaluationCriteria: { exact: { expectedOutput: 'a' } } })]);
    const agent: FakeAgent = () => ({ status: 'suspended', trigger: { type: 'approval', key: 'publish' } });
    const { bus, events, dispatcher } = harness(set, agent);

    const result = await dispatcher.executeSet(set);
    await bus.drain();
    const [item] = result.items;

    expect(item).toMatchObject({ status: 'suspended', success: true, score: 0, evaluatorResults: [] });
    expect(item.triggers).toEqual([{ type: 'approval', key: 'publish' }]);
    expect(result.status).toBe('suspended');
    expect(result.triggers).toEqual([{ type: 'approval', key: 'publish' }]);
    expect(events).toEqual([['run-created', 'a']]);
  });

  it('resumes a single item without input or a creation event', async () => {
    const set = makeSet([makeItem('a')]);
    const agent: FakeAgent = (_input, options) => ({ status: 'successful', output: options.resume ? 'resumed' : 'fresh' });
    const { factory, bus, events, dispatcher } = harness(set, agent, { resume: true });

    const [item] = (await dispatcher.executeSet(set)).items;
    await bus.drain();

    expect(item.output).toBe('resumed');
    expect(item.inputs).toEqual({ query: 'a' });
    expect(factory.invocations[0].input).toBeUndefined();
    expect(events).toEqual([['run-updated', 'a']]);
  });

  it('refuses to resume more than one item', async () => {
    const set = makeSet([makeItem('a'), makeItem('b')]);
    const { factory, dispatcher } = harness(set, echo, { resume: true });

    await expect(dispatcher.executeSet(set)).rejects.toBeInstanceOf(ResumeError);
    expect(factory.invocations).toHaveLength(0);
  });
});

describe('toErrorPayload', () => {
  it('keeps engine error codes', () => {
    expect(toErrorPayload(new AgentExecutionError('no session', 'RESUME_SESSION_MISSING'))).toEqual({
      code: 'RESUME_SESSION_MISSING',
      title: 'Agent execution failed',
      detail: 'no session',
    });
  });
});
