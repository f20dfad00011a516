/**
 * Span-context checkpoints for suspend/resume.
 *
 * Each trace scope (the set run, and every item) writes its {traceId, spanId}
 * under (runId, "eval_parent_span", itemId | "eval_set_run") when it opens
 * and again when it closes. A resumed process reads the record back and
 * parents its new spans on it, so the run keeps a single trace.
 */

import { z } from 'zod';
import type { RuntimeStorage } from '../runtime/agent-runtime.js';
import type { SpanContextRecord } from '../types.js';
import type { ActiveSpan, Tracer } from './tracer.js';

export const SPAN_CHECKPOINT_NAMESPACE = 'eval_parent_span';
export const SET_RUN_CHECKPOINT_KEY = 'eval_set_run';

const spanContextSchema = z.object({
  traceId: z.string().regex(/^[0-9a-f]{32}$/),
  spanId: z.string().regex(/^[0-9a-f]{16}$/),
});

export class SpanCheckpointStore {
  constructor(
    private readonly storage: RuntimeStorage,
    private readonly runId: string,
  ) {}

  async save(key: string, context: SpanContextRecord): Promise<void> {
    await this.storage.setValue(this.runId, SPAN_CHECKPOINT_NAMESPACE, key, {
      traceId: context.traceId,
      spanId: context.spanId,
    });
  }

  /**
   * Returns undefined when nothing valid was saved under the key.
   */
  async load(key: string): Promise<SpanContextRecord | undefined> {
    const value = await this.storage.getValue(this.runId, SPAN_CHECKPOINT_NAMESPACE, key);
    const parsed = spanContextSchema.safeParse(value);
    return parsed.success ? parsed.data : undefined;
  }
}

export interface CheckpointedScopeOptions {
  key: string;
  resume: boolean;
  executionId?: string;
  attributes?: Record<string, unknown>;
}

/**
 * Run fn in a span whose context is checkpointed on entry and exit. When
 * resuming, the span is parented on the previously saved context.
 */
export async function withCheckpointedSpan<T>(
  tracer: Tracer,
  store: SpanCheckpointStore,
  name: string,
  options: CheckpointedScopeOptions,
  fn: (span: ActiveSpan) => Promise<T>,
): Promise<T> {
  let parent: ActiveSpan | undefined;
  if (options.resume) {
    const saved = await store.load(options.key);
    if (saved) {
      parent = tracer.restoreParent(saved, options.executionId);
    }
  }

  return tracer.withSpan(
    name,
    async (span) => {
      await store.save(options.key, span.context);
      try {
        return await fn(span);
      } finally {
        await store.save(options.key, span.context);
      }
    },
    { parent, executionId: options.executionId, attributes: options.attributes },
  );
}
