/**
 * Local results file, kept up to date as items finish.
 *
 * Every event is a read-modify-write of one JSON document, serialized
 * through a single-slot limiter. After close() further writes are rejected.
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import pLimit from 'p-limit';
import { z } from 'zod';
import type { AgentErrorPayload, AgentStatus, EvalItemResult, EvaluatorAverage, Trigger } from '../types.js';
import type { EventBus, RunCreatedEvent, RunUpdatedEvent, SetRunCreatedEvent, SetRunUpdatedEvent } from './event-bus.js';

export interface ResultFileItem {
  itemId: string;
  itemName: string;
  state: 'running' | 'completed';
  inputs: Record<string, unknown>;
  status?: AgentStatus;
  success?: boolean;
  score?: number;
  output?: unknown;
  evaluatorResults?: EvalItemResult[];
  executionTimeMs?: number;
  error?: AgentErrorPayload;
}

export interface ResultFileSummary {
  status: AgentStatus;
  success: boolean;
  score: number;
  evaluatorAverages: EvaluatorAverage[];
  triggers: Trigger[];
}

export interface ResultFile {
  runId: string;
  evalSetId: string;
  evalSetName?: string;
  evaluatorIds: string[];
  createdAt: string;
  updatedAt: string;
  items: Record<string, ResultFileItem>;
  summary?: ResultFileSummary;
}

// Only the envelope is checked; item bodies are our own output
const resultFileSchema = z.object({
  runId: z.string(),
  evalSetId: z.string(),
  evalSetName: z.string().optional(),
  evaluatorIds: z.array(z.string()),
  createdAt: z.string(),
  updatedAt: z.string(),
  items: z.record(z.custom<ResultFileItem>((value) => typeof value === 'object' && value !== null)),
  summary: z.custom<ResultFileSummary>((value) => typeof value === 'object' && value !== null).optional(),
});

export class ResultFileWriter {
  private readonly lock = pLimit(1);
  private closed = false;

  constructor(readonly filePath: string) {}

  /**
   * Subscribe to the bus; returns a function that unsubscribes everything.
   */
  attach(bus: EventBus): () => void {
    const unsubscribers = [
      bus.subscribe('set-run-created', (event) => this.onSetRunCreated(event)),
      bus.subscribe('run-created', (event) => this.onRunCreated(event)),
      bus.subscribe('run-updated', (event) => this.onRunUpdated(event)),
      bus.subscribe('set-run-updated', (event) => this.onSetRunUpdated(event)),
    ];
    return () => unsubscribers.forEach((unsubscribe) => unsubscribe());
  }

  async onSetRunCreated(event: SetRunCreatedEvent): Promise<void> {
    await this.update(event.runId, event.evalSetId, (file) => {
      file.evalSetName = event.evalSetName;
      file.evaluatorIds = event.evaluatorIds;
    });
  }

  async onRunCreated(event: RunCreatedEvent): Promise<void> {
    await this.update(event.runId, event.evalSetId, (file) => {
      file.items[event.itemId] = {
        itemId: event.itemId,
        itemName: event.itemName,
        state: 'running',
        inputs: event.inputs,
      };
    });
  }

  async onRunUpdated(event: RunUpdatedEvent): Promise<void> {
    await this.update(event.runId, event.evalSetId, (file) => {
      const previous = file.items[event.itemId];
      file.items[event.itemId] = {
        itemId: event.itemId,
        itemName: event.itemName,
        state: 'completed',
        inputs: previous?.inputs ?? {},
        status: event.status,
        success: event.success,
        score: event.score,
        output: event.output,
        evaluatorResults: event.evaluatorResults,
        executionTimeMs: event.executionTimeMs,
        error: event.error,
      };
    });
  }

  async onSetRunUpdated(event: SetRunUpdatedEvent): Promise<void> {
    await this.update(event.runId, event.evalSetId, (file) => {
      file.summary = {
        status: event.status,
        success: event.success,
        score: event.score,
        evaluatorAverages: event.evaluatorAverages,
        triggers: event.triggers,
      };
    });
  }

  /**
   * Wait for queued writes, then reject any later ones.
   */
  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    await this.lock(async () => undefined);
  }

  async read(): Promise<ResultFile | undefined> {
    let content: string;
    try {
      content = await fs.readFile(this.filePath, 'utf-8');
    } catch {
      return undefined;
    }
    let data: unknown;
    try {
      data = JSON.parse(content);
    } catch (error) {
      throw new Error(`Corrupt results file: ${this.filePath}`, { cause: error });
    }
    const parsed = resultFileSchema.safeParse(data);
    if (!parsed.success) {
      throw new Error(`Corrupt results file: ${this.filePath}`);
    }
    return parsed.data;
  }

  private async update(runId: string, evalSetId: string, mutate: (file: ResultFile) => void): Promise<void> {
    if (this.closed) {
      throw new Error(`Results file ${this.filePath} is closed`);
    }

    await this.lock(async () => {
      const now = new Date().toISOString();
      const existing = await this.read();
      // A file left by a different run is replaced
      const file: ResultFile = existing && existing.runId === runId
        ? existing
        : { runId, evalSetId, evaluatorIds: [], createdAt: now, updatedAt: now, items: {} };

      mutate(file);
      file.updatedAt = now;

      await fs.mkdir(path.dirname(this.filePath), { recursive: true });
      await fs.writeFile(this.filePath, JSON.stringify(file, null, 2));
    });
  }
}
