import { describe, it, expect, vi, afterEach } from 'vitest';
import { closeQuietly } from '../scripts/run-script';

afterEach(() => {
  process.exitCode = undefined;
  vi.restoreAllMocks();
});

describe('closeQuietly', () => {
  it('reports a failed close and marks the exit code', async () => {
    const errors = vi.spyOn(console, 'error').mockImplementation(() => {});

    await expect(
      closeQuietly(async () => {
        throw new Error('pool already ended');
      }),
    ).resolves.toBeUndefined();

    expect(errors).toHaveBeenCalledWith('pool already ended');
    expect(process.exitCode).toBe(1);
  });

  it('leaves the exit code alone when the close succeeds', async () => {
    const close = vi.fn(async () => {});
    await closeQuietly(close);
    expect(close).toHaveBeenCalledTimes(1);
    expect(process.exitCode).toBeUndefined();
  });
});
