import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, readdir, readFile, rm, writeFile } from 'fs/promises';
import os from 'os';
import path from 'path';
import { FileCheckpointStore, initialCheckpoint } from '@tessera/crawler';

let dir: string;

beforeEach(async () => {
  dir = await mkdtemp(path.join(os.tmpdir(), 'tessera-checkpoint-'));
});

afterEach(async () => {
  await rm(dir, { recursive: true, force: true });
});

describe('FileCheckpointStore', () => {
  it('starts from zero when no file exists', async () => {
    const store = new FileCheckpointStore(path.join(dir, 'state.json'));
    await expect(store.load()).resolves.toEqual({
      offset: 0,
      totalEnriched: 0,
      totalFailed: 0,
      lastRunTimestamp: null,
    });
  });

  it('saves through a temp file and loads what it saved', async () => {
    const file = path.join(dir, 'nested', 'state.json');
    const store = new FileCheckpointStore(file);
    const checkpoint = {
      offset: 30,
      totalEnriched: 25,
      totalFailed: 5,
      lastRunTimestamp: '2026-01-02T03:04:05.000Z',
    };

    await store.save(checkpoint);

    await expect(store.load()).resolves.toEqual(checkpoint);
    expect(JSON.parse(await readFile(file, 'utf-8'))).toEqual(checkpoint);
    expect(await readdir(path.join(dir, 'nested'))).toEqual(['state.json']);
  });

  it('keeps the last of several concurrent saves', async () => {
    const store = new FileCheckpointStore(path.join(dir, 'state.json'));
    await Promise.all(
      [1, 2, 3, 4, 5].map((offset) => store.save({ ...initialCheckpoint(), offset })),
    );
    expect((await store.load()).offset).toBe(5);
  });

  it('falls back to zero for a corrupt or invalid file', async () => {
    const file = path.join(dir, 'state.json');
    const store = new FileCheckpointStore(file);

    await writeFile(file, '{"offset": 12', 'utf-8');
    await expect(store.load()).resolves.toEqual(initialCheckpoint());

    await writeFile(file, JSON.stringify({ offset: -1 }), 'utf-8');
    await expect(store.load()).resolves.toEqual(initialCheckpoint());
  });

  it('resets the offset but keeps the totals', async () => {
    const store = new FileCheckpointStore(path.join(dir, 'state.json'));
    await store.save({ offset: 40, totalEnriched: 38, totalFailed: 2, lastRunTimestamp: null });

    const reset = await store.reset();

    expect(reset).toEqual({ offset: 0, totalEnriched: 38, totalFailed: 2, lastRunTimestamp: null });
    await expect(store.load()).resolves.toEqual(reset);
  });
});
