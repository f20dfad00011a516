/**
 * Mock response cache.
 *
 * Entries are keyed by the sha256 of the canonical JSON call signature and
 * laid out as <mockerType>/<setId>/<itemId>/<function>/<hash>.json. Within a
 * run every lookup of the same key shares one computation, including
 * concurrent ones. With a directory configured, misses are looked up on
 * disk first and newly computed entries are written back by flush(), which
 * the engine calls once after all items have finished.
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import { z } from 'zod';
import { canonicalJson, sha256 } from '../utils/json.js';

export interface CacheKey {
  mockerType: string;
  setId: string;
  itemId: string;
  functionName: string;
  signature: unknown;
}

const cacheFileSchema = z.object({ response: z.unknown() });

function safeSegment(segment: string): string {
  return segment.replace(/[^A-Za-z0-9._-]/g, '_') || '_';
}

export function cacheEntryPath(key: CacheKey): string {
  return [
    safeSegment(key.mockerType),
    safeSegment(key.setId),
    safeSegment(key.itemId),
    safeSegment(key.functionName),
    `${sha256(canonicalJson(key.signature))}.json`,
  ].join('/');
}

export class MockResponseCache {
  private readonly entries = new Map<string, Promise<unknown>>();
  private readonly unsaved = new Map<string, unknown>();

  /**
   * @param dir - persist entries here; in-memory only when omitted
   */
  constructor(private readonly dir?: string) {}

  get size(): number {
    return this.entries.size;
  }

  getOrCompute(key: CacheKey, compute: () => Promise<unknown>): Promise<unknown> {
    const id = cacheEntryPath(key);
    const existing = this.entries.get(id);
    if (existing) return existing;

    const pending = this.resolve(id, compute);
    this.entries.set(id, pending);
    return pending;
  }

  private async resolve(id: string, compute: () => Promise<unknown>): Promise<unknown> {
    try {
      const persisted = await this.readPersisted(id);
      if (persisted) return persisted.response;

      const value = await compute();
      this.unsaved.set(id, value);
      return value;
    } catch (error) {
      // Failed computations are retried on the next lookup
      this.entries.delete(id);
      throw error;
    }
  }

  private async readPersisted(id: string): Promise<{ response: unknown } | undefined> {
    if (!this.dir) return undefined;

    let data: unknown;
    try {
      data = JSON.parse(await fs.readFile(path.join(this.dir, id), 'utf-8'));
    } catch {
      // Missing or unreadable entries count as misses
      return undefined;
    }

    const parsed = cacheFileSchema.safeParse(data);
    return parsed.success && 'response' in parsed.data ? { response: parsed.data.response } : undefined;
  }

  /**
   * Write entries computed since the last flush. Returns how many were
   * written.
   */
  async flush(): Promise<number> {
    if (!this.dir || this.unsaved.size === 0) return 0;

    const dir = this.dir;
    const batch = [...this.unsaved.entries()];
    this.unsaved.clear();

    await Promise.all(batch.map(async ([id, response]) => {
      const filePath = path.join(dir, id);
      await fs.mkdir(path.dirname(filePath), { recursive: true });
      await fs.writeFile(filePath, JSON.stringify({ response }, null, 2));
    }));

    return batch.length;
  }
}
