import { describe, it, expect, beforeEach } from 'vitest';
import { RunNotFoundError, RunTransitionError } from '@tessera/core';
import { CrawlRunRegistry } from '@tessera/crawler';
import { MemoryCrawlRunStore } from './helpers/memory-stores';

let store: MemoryCrawlRunStore;
let registry: CrawlRunRegistry;

beforeEach(() => {
  store = new MemoryCrawlRunStore();
  registry = new CrawlRunRegistry(store);
});

describe('CrawlRunRegistry', () => {
  it('creates runs in the running state', async () => {
    const run = await registry.create('nightly', {
      productTypes: ['Barrier Reverse Convertible'],
      currencies: ['CHF'],
      symbols: [],
    });
    expect(run).toMatchObject({ name: 'nightly', status: 'running', completed: 0, endedAt: null });
    expect(await registry.pollStop(run.id)).toBeNull();
  });

  it('pauses, resumes and completes', async () => {
    const run = await registry.create('r');

    expect((await registry.pause(run.id)).status).toBe('paused');
    expect(await registry.pollStop(run.id)).toBe('paused');
    expect((await registry.resume(run.id)).status).toBe('running');

    const done = await registry.complete(run.id);
    expect(done.status).toBe('completed');
    expect(done.endedAt).toBeInstanceOf(Date);
  });

  it('rejects transitions the state machine does not allow', async () => {
    const run = await registry.create('r');
    await registry.pause(run.id);

    await expect(registry.pause(run.id)).rejects.toThrow(
      `Crawl run ${run.id} cannot move from paused to paused`,
    );
    await expect(registry.complete(run.id)).rejects.toBeInstanceOf(RunTransitionError);

    await registry.cancel(run.id);
    await expect(registry.resume(run.id)).rejects.toBeInstanceOf(RunTransitionError);
    expect((await registry.require(run.id)).status).toBe('cancelled');
  });

  it('stores a truncated error when failing', async () => {
    const run = await registry.create('r');
    const failed = await registry.fail(run.id, 'x'.repeat(600));
    expect(failed.status).toBe('failed');
    expect(failed.lastError).toHaveLength(500);
  });

  it('leaves a run another writer already stopped', async () => {
    const run = await registry.create('r');
    await registry.cancel(run.id);

    await expect(registry.tryFail(run.id, 'late failure')).resolves.toBe('cancelled');
    const current = await registry.require(run.id);
    expect(current.status).toBe('cancelled');
    expect(current.lastError).toBeNull();
  });

  it('reports unknown runs', async () => {
    await expect(registry.pause('no-such-run')).rejects.toBeInstanceOf(RunNotFoundError);
    await expect(registry.require('no-such-run')).rejects.toThrow(
      'Crawl run no-such-run not found',
    );
    expect(await registry.pollStop('no-such-run')).toBe('missing');
  });

  it('counts successes and errors', async () => {
    const run = await registry.create('r');
    await registry.setTotal(run.id, 10);
    await registry.recordSuccess(run.id);
    await registry.recordSuccess(run.id, 3);
    await registry.recordError(run.id, 'bad item');

    expect(await registry.require(run.id)).toMatchObject({
      total: 10,
      completed: 4,
      errorsCount: 1,
      lastError: 'bad item',
      status: 'running',
    });
  });

  it('saves the pager position', async () => {
    const run = await registry.create('r');
    await registry.saveCheckpoint(run.id, { completedSegments: ['A'], segment: 'BA', offset: 50 });
    expect(await registry.require(run.id)).toMatchObject({
      completedSegments: ['A'],
      checkpointSegment: 'BA',
      checkpointOffset: 50,
    });
  });

  it('sees a status change made by another process', async () => {
    const run = await registry.create('r');
    store.force(run.id, 'cancelled');
    expect(await registry.pollStop(run.id)).toBe('cancelled');
  });
});
