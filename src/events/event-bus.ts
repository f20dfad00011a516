/**
 * In-process progress event bus.
 *
 * Subscribers (result file writer, console reporter, any remote reporter)
 * are independent: a failing subscriber is logged and never affects the
 * run or the other subscribers.
 */

import type {
  AgentErrorPayload,
  AgentStatus,
  EvalItemResult,
  EvaluatorAverage,
  LogRecord,
  SpanRecord,
  Trigger,
} from '../types.js';

// ============================================
// Event payloads
// ============================================

export interface SetRunCreatedEvent {
  runId: string;
  evalSetId: string;
  evalSetName: string;
  evaluatorIds: string[];
  itemIds: string[];
}

export interface RunCreatedEvent {
  runId: string;
  evalSetId: string;
  itemId: string;
  itemName: string;
  inputs: Record<string, unknown>;
}

export interface RunUpdatedEvent {
  runId: string;
  evalSetId: string;
  itemId: string;
  itemName: string;
  status: AgentStatus;
  success: boolean;
  score: number;
  output: unknown;
  evaluatorResults: EvalItemResult[];
  executionTimeMs: number;
  spans: SpanRecord[];
  logs: LogRecord[];
  error?: AgentErrorPayload;
}

export interface SetRunUpdatedEvent {
  runId: string;
  evalSetId: string;
  status: AgentStatus;
  success: boolean;
  score: number;
  evaluatorAverages: EvaluatorAverage[];
  triggers: Trigger[];
}

export interface EvalEventMap {
  'set-run-created': SetRunCreatedEvent;
  'run-created': RunCreatedEvent;
  'run-updated': RunUpdatedEvent;
  'set-run-updated': SetRunUpdatedEvent;
}

export type EvalEventType = keyof EvalEventMap;

export type EvalEventHandler<K extends EvalEventType> = (payload: EvalEventMap[K]) => void | Promise<void>;

type HandlerMap = { [K in EvalEventType]: Array<EvalEventHandler<K>> };

// ============================================
// Bus
// ============================================

export class EventBus {
  private readonly handlers: HandlerMap = {
    'set-run-created': [],
    'run-created': [],
    'run-updated': [],
    'set-run-updated': [],
  };
  private readonly pending = new Set<Promise<void>>();

  /**
   * Returns an unsubscribe function.
   */
  subscribe<K extends EvalEventType>(type: K, handler: EvalEventHandler<K>): () => void {
    const list: Array<EvalEventHandler<K>> = this.handlers[type];
    list.push(handler);
    return () => {
      const index = list.indexOf(handler);
      if (index !== -1) list.splice(index, 1);
    };
  }

  /**
   * Deliver an event to every subscriber. With waitForCompletion false the
   * delivery runs in the background until drain().
   */
  async publish<K extends EvalEventType>(type: K, payload: EvalEventMap[K], waitForCompletion = true): Promise<void> {
    const handlers: Array<EvalEventHandler<K>> = [...this.handlers[type]];
    const delivery = Promise.all(handlers.map((handler) => this.invoke(type, handler, payload))).then(() => undefined);

    if (waitForCompletion) {
      await delivery;
      return;
    }

    const tracked: Promise<void> = delivery.then(() => {
      this.pending.delete(tracked);
    });
    this.pending.add(tracked);
  }

  private async invoke<K extends EvalEventType>(
    type: K,
    handler: EvalEventHandler<K>,
    payload: EvalEventMap[K],
  ): Promise<void> {
    try {
      await handler(payload);
    } catch (error) {
      console.warn(`  Warning: ${type} subscriber failed: ${error instanceof Error ? error.message : String(error)}`);
    }
  }

  /**
   * Wait for every background delivery, including ones started while
   * draining.
   */
  async drain(): Promise<void> {
    while (this.pending.size > 0) {
      await Promise.all([...this.pending]);
    }
  }
}
