import { describe, it, expect } from 'vitest';
import {
  SET_RUN_CHECKPOINT_KEY,
  SPAN_CHECKPOINT_NAMESPACE,
  SpanCheckpointStore,
  withCheckpointedSpan,
} from '../../src/tracing/checkpoint.js';
import { ExecutionCollector } from '../../src/tracing/collector.js';
import { Tracer } from '../../src/tracing/tracer.js';
import { InMemoryStorage } from '../../src/runtime/storage.js';

describe('SpanCheckpointStore', () => {
  it('ignores malformed records', async () => {
    const storage = new InMemoryStorage();
    const store = new SpanCheckpointStore(storage, 'run-1');
    await storage.setValue('run-1', SPAN_CHECKPOINT_NAMESPACE, 'item-1', { traceId: 'abc', spanId: 'def' });

    expect(await store.load('item-1')).toBeUndefined();
    expect(await store.load('item-2')).toBeUndefined();
  });
});

describe('withCheckpointedSpan', () => {
  it('saves the span context under the run', async () => {
    const storage = new InMemoryStorage();
    const collector = new ExecutionCollector();
    const tracer = new Tracer(collector);
    const store = new SpanCheckpointStore(storage, 'run-1');

    const context = await withCheckpointedSpan(
      tracer,
      store,
      'evaluation_set',
      { key: SET_RUN_CHECKPOINT_KEY, resume: false },
      async (span) => span.context,
    );

    expect(await storage.getValue('run-1', SPAN_CHECKPOINT_NAMESPACE, SET_RUN_CHECKPOINT_KEY)).toEqual(context);
  });

  it('continues the saved trace when resuming', async () => {
    const storage = new InMemoryStorage();

    // First process: the item suspends
    const firstCollector = new ExecutionCollector();
    const first = await withCheckpointedSpan(
      new Tracer(firstCollector),
      new SpanCheckpointStore(storage, 'run-1'),
      'evaluation',
      { key: 'item-1', resume: false, executionId: 'item-1' },
      async (span) => span.context,
    );

    // Second process: resumed with a fresh tracer
    const secondCollector = new ExecutionCollector();
    await withCheckpointedSpan(
      new Tracer(secondCollector),
      new SpanCheckpointStore(storage, 'run-1'),
      'evaluation',
      { key: 'item-1', resume: true, executionId: 'item-1' },
      async () => undefined,
    );

    const [resumed] = secondCollector.drain('item-1').spans;
    expect(resumed.traceId).toBe(first.traceId);
    expect(resumed.parentSpanId).toBe(first.spanId);
    expect(resumed.executionId).toBe('item-1');
  });

  it('starts a new trace when there is nothing to resume', async () => {
    const collector = new ExecutionCollector();
    await withCheckpointedSpan(
      new Tracer(collector),
      new SpanCheckpointStore(new InMemoryStorage(), 'run-1'),
      'evaluation',
      { key: 'item-1', resume: true, executionId: 'item-1' },
      async () => undefined,
    );

    const [span] = collector.drain('item-1').spans;
    expect(span.parentSpanId).toBeUndefined();
    expect(span.status).toBe('ok');
  });
});
