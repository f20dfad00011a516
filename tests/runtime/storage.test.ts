import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import { FileStorage, InMemoryStorage } from '../../src/runtime/storage.js';

describe('InMemoryStorage', () => {
  it('scopes values by run and namespace', async () => {
    const storage = new InMemoryStorage();
    await storage.setValue('run-1', 'agent_state', 'k', 1);

    expect(await storage.getValue('run-1', 'agent_state', 'k')).toBe(1);
    expect(await storage.getValue('run-2', 'agent_state', 'k')).toBeUndefined();
    expect(await storage.getValue('run-1', 'other', 'k')).toBeUndefined();
  });
});

describe('FileStorage', () => {
  let dir: string;
  let filePath: string;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'state-'));
    filePath = path.join(dir, 'state', 'runtime.json');
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it('survives a new instance', async () => {
    await new FileStorage(filePath).setValue('run-1', 'agent_session', 'item-1', 'session-abc');

    const reopened = new FileStorage(filePath);
    expect(await reopened.getValue('run-1', 'agent_session', 'item-1')).toBe('session-abc');
    expect(await reopened.getValue('run-1', 'agent_session', 'item-2')).toBeUndefined();
  });

  it('keeps every concurrent write', async () => {
    const storage = new FileStorage(filePath);
    await Promise.all(
      Array.from({ length: 10 }, (_, i) => storage.setValue('run-1', 'ns', `key-${i}`, i)),
    );

    const stored = JSON.parse(await fs.readFile(filePath, 'utf-8'));
    expect(Object.keys(stored)).toHaveLength(10);
    expect(stored['run-1/ns/key-7']).toBe(7);
  });

  it('rejects a corrupt state file', async () => {
    await fs.mkdir(path.dirname(filePath), { recursive: true });
    await fs.writeFile(filePath, 'not json');

    await expect(new FileStorage(filePath).getValue('run-1', 'ns', 'k')).rejects.toThrow(
      `Corrupt state file: ${filePath}`,
    );
  });
});
