/**
 * Per-execution buffer of finished spans and agent log records.
 */

import type { LogRecord, SpanRecord } from '../types.js';

const UNSCOPED = '';

export interface CollectedTelemetry {
  spans: SpanRecord[];
  logs: LogRecord[];
}

interface OrderedSpan {
  order: number;
  span: SpanRecord;
}

export class ExecutionCollector {
  private readonly spans = new Map<string, OrderedSpan[]>();
  private readonly logs = new Map<string, LogRecord[]>();

  /**
   * @param order - start sequence of the span; spans are pushed when they end
   */
  addSpan(span: SpanRecord, order = 0): void {
    const key = span.executionId ?? UNSCOPED;
    const bucket = this.spans.get(key);
    if (bucket) bucket.push({ order, span });
    else this.spans.set(key, [{ order, span }]);
  }

  addLog(log: LogRecord): void {
    const key = log.executionId ?? UNSCOPED;
    const bucket = this.logs.get(key);
    if (bucket) bucket.push(log);
    else this.logs.set(key, [log]);
  }

  /**
   * Return everything recorded for the execution and forget it.
   * Spans come back in start order.
   */
  drain(executionId: string): CollectedTelemetry {
    const spans = this.spans.get(executionId) ?? [];
    const logs = this.logs.get(executionId) ?? [];
    this.spans.delete(executionId);
    this.logs.delete(executionId);
    return {
      spans: [...spans].sort((a, b) => a.order - b.order).map((entry) => entry.span),
      logs,
    };
  }
}
