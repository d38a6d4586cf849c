import { mkdir, readFile, rename, writeFile } from 'node:fs/promises';
import { dirname } from 'node:path';
import { enrichCheckpointSchema, type EnrichCheckpoint } from '@tessera/schemas';
import { describeError } from '@tessera/core';
import { crawlLog } from './logs';

const LOG = 'Checkpoint';

export interface CheckpointStore {
  load(): Promise<EnrichCheckpoint>;
  save(checkpoint: EnrichCheckpoint): Promise<void>;
  /** Offset back to 0; cumulative totals are kept. */
  reset(): Promise<EnrichCheckpoint>;
}

export function initialCheckpoint(): EnrichCheckpoint {
  return enrichCheckpointSchema.parse({});
}

/** JSON file checkpoint. Writes go to a temp file first and are renamed into place. */
export class FileCheckpointStore implements CheckpointStore {
  // Saves are chained so two writers never share the temp file.
  private writes: Promise<void> = Promise.resolve();

  constructor(private path: string) {}

  async load(): Promise<EnrichCheckpoint> {
    let raw: string;
    try {
      raw = await readFile(this.path, 'utf-8');
    } catch (err) {
      if (err instanceof Error && 'code' in err && err.code === 'ENOENT') {
        return initialCheckpoint();
      }
      throw err;
    }
    try {
      const parsed = enrichCheckpointSchema.safeParse(JSON.parse(raw));
      if (parsed.success) return parsed.data;
      crawlLog(LOG, `Ignoring invalid checkpoint ${this.path}`, {
        level: 'warn',
        detail: parsed.error.issues[0]?.message,
      });
    } catch (err) {
      crawlLog(LOG, `Ignoring unreadable checkpoint ${this.path}`, {
        level: 'warn',
        detail: describeError(err),
      });
    }
    return initialCheckpoint();
  }

  save(checkpoint: EnrichCheckpoint): Promise<void> {
    const write = this.writes.then(() => this.write(checkpoint));
    this.writes = write.catch(() => undefined);
    return write;
  }

  private async write(checkpoint: EnrichCheckpoint): Promise<void> {
    await mkdir(dirname(this.path), { recursive: true });
    const tmp = `${this.path}.${process.pid}.tmp`;
    await writeFile(tmp, `${JSON.stringify(checkpoint, null, 2)}\n`, 'utf-8');
    await rename(tmp, this.path);
  }

  async reset(): Promise<EnrichCheckpoint> {
    const current = await this.load();
    const next = { ...current, offset: 0 };
    await this.save(next);
    crawlLog(LOG, 'Enrichment offset reset to 0');
    return next;
  }
}

/** In-memory checkpoint for tests and one-off runs. */
export class MemoryCheckpointStore implements CheckpointStore {
  saves = 0;
  constructor(private checkpoint: EnrichCheckpoint = initialCheckpoint()) {}

  async load(): Promise<EnrichCheckpoint> {
    return { ...this.checkpoint };
  }

  async save(checkpoint: EnrichCheckpoint): Promise<void> {
    this.checkpoint = { ...checkpoint };
    this.saves++;
  }

  async reset(): Promise<EnrichCheckpoint> {
    this.checkpoint = { ...this.checkpoint, offset: 0 };
    return { ...this.checkpoint };
  }
}
