/**
 * Key-value storage backends for runtime state that must outlive a process
 * (span checkpoints, agent session ids).
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import pLimit from 'p-limit';
import { z } from 'zod';
import type { RuntimeStorage } from './agent-runtime.js';

function storageKey(runId: string, namespace: string, key: string): string {
  return `${runId}/${namespace}/${key}`;
}

export class InMemoryStorage implements RuntimeStorage {
  private readonly values = new Map<string, unknown>();

  async getValue(runId: string, namespace: string, key: string): Promise<unknown> {
    return this.values.get(storageKey(runId, namespace, key));
  }

  async setValue(runId: string, namespace: string, key: string, value: unknown): Promise<void> {
    this.values.set(storageKey(runId, namespace, key), value);
  }
}

const stateFileSchema = z.record(z.unknown());

/**
 * JSON file store. Every write rewrites the whole file; writes are
 * serialized so concurrent items cannot lose each other's updates.
 */
export class FileStorage implements RuntimeStorage {
  private readonly lock = pLimit(1);

  constructor(private readonly filePath: string) {}

  private async readAll(): Promise<Record<string, unknown>> {
    let content: string;
    try {
      content = await fs.readFile(this.filePath, 'utf-8');
    } catch {
      return {};
    }
    let data: unknown;
    try {
      data = JSON.parse(content);
    } catch (error) {
      throw new Error(`Corrupt state file: ${this.filePath}`, { cause: error });
    }
    const parsed = stateFileSchema.safeParse(data);
    if (!parsed.success) {
      throw new Error(`Corrupt state file: ${this.filePath}`);
    }
    return parsed.data;
  }

  async getValue(runId: string, namespace: string, key: string): Promise<unknown> {
    const all = await this.lock(() => this.readAll());
    return all[storageKey(runId, namespace, key)];
  }

  async setValue(runId: string, namespace: string, key: string, value: unknown): Promise<void> {
    await this.lock(async () => {
      const all = await this.readAll();
      all[storageKey(runId, namespace, key)] = value;
      await fs.mkdir(path.dirname(this.filePath), { recursive: true });
      await fs.writeFile(this.filePath, JSON.stringify(all, null, 2));
    });
  }
}
