/**
 * Minimal span tracer.
 *
 * Spans carry W3C-sized identifiers (32 hex trace id, 16 hex span id) and
 * are tagged with the execution id of the evaluation item that produced
 * them. Finished spans go to the ExecutionCollector; nothing is exported.
 */

import { AsyncLocalStorage } from 'async_hooks';
import { randomBytes } from 'crypto';
import type { SpanContextRecord, SpanRecord } from '../types.js';
import type { ExecutionCollector } from './collector.js';

let startSequence = 0;

export function newTraceId(): string {
  return randomBytes(16).toString('hex');
}

export function newSpanId(): string {
  return randomBytes(8).toString('hex');
}

export interface ActiveSpan {
  readonly context: SpanContextRecord;
  readonly executionId?: string;
  readonly recording: boolean;
  setAttribute(key: string, value: unknown): void;
  setStatus(status: 'ok' | 'error'): void;
  end(): void;
}

class RecordingSpan implements ActiveSpan {
  readonly recording = true;
  private readonly record: SpanRecord;
  private readonly order = ++startSequence;
  private ended = false;

  constructor(
    private readonly collector: ExecutionCollector,
    name: string,
    parent: ActiveSpan | undefined,
    executionId: string | undefined,
    attributes: Record<string, unknown>,
  ) {
    this.record = {
      traceId: parent?.context.traceId ?? newTraceId(),
      spanId: newSpanId(),
      parentSpanId: parent?.context.spanId,
      name,
      executionId,
      startTime: new Date().toISOString(),
      status: 'unset',
      attributes: { ...attributes },
    };
  }

  get context(): SpanContextRecord {
    return { traceId: this.record.traceId, spanId: this.record.spanId };
  }

  get executionId(): string | undefined {
    return this.record.executionId;
  }

  setAttribute(key: string, value: unknown): void {
    this.record.attributes[key] = value;
  }

  setStatus(status: 'ok' | 'error'): void {
    this.record.status = status;
  }

  end(): void {
    if (this.ended) return;
    this.ended = true;
    this.record.endTime = new Date().toISOString();
    this.collector.addSpan({ ...this.record, attributes: { ...this.record.attributes } }, this.order);
  }
}

/**
 * Stand-in parent rebuilt from a persisted checkpoint. Never recorded.
 */
class NonRecordingSpan implements ActiveSpan {
  readonly recording = false;

  constructor(readonly context: SpanContextRecord, readonly executionId?: string) {}

  setAttribute(): void {}
  setStatus(): void {}
  end(): void {}
}

export interface SpanOptions {
  attributes?: Record<string, unknown>;
  executionId?: string;
  /** Explicit parent; defaults to the active span */
  parent?: ActiveSpan;
}

export class Tracer {
  private readonly active = new AsyncLocalStorage<ActiveSpan>();

  constructor(private readonly collector: ExecutionCollector) {}

  currentSpan(): ActiveSpan | undefined {
    return this.active.getStore();
  }

  startSpan(name: string, options: SpanOptions = {}): ActiveSpan {
    const parent = options.parent ?? this.currentSpan();
    return new RecordingSpan(
      this.collector,
      name,
      parent,
      options.executionId ?? parent?.executionId,
      options.attributes ?? {},
    );
  }

  /**
   * Run fn inside a new active span. The span is marked as failed when fn
   * throws and is always ended.
   */
  async withSpan<T>(name: string, fn: (span: ActiveSpan) => Promise<T>, options: SpanOptions = {}): Promise<T> {
    const span = this.startSpan(name, options);
    try {
      const result = await this.active.run(span, () => fn(span));
      span.setStatus('ok');
      return result;
    } catch (error) {
      span.setStatus('error');
      span.setAttribute('error.message', error instanceof Error ? error.message : String(error));
      throw error;
    } finally {
      span.end();
    }
  }

  /**
   * Build a non-recording parent from a persisted context so new spans join
   * the original trace.
   */
  restoreParent(context: SpanContextRecord, executionId?: string): ActiveSpan {
    return new NonRecordingSpan({ traceId: context.traceId, spanId: context.spanId }, executionId);
  }
}
