import { describe, it, expect } from 'vitest';
import { withTimeout } from '../lib/timeout.js';

describe('withTimeout', () => {
  it('resolves with the task result inside the deadline', async () => {
    await expect(withTimeout(async () => 'done', 1_000, 'too slow')).resolves.toBe('done');
  });

  it('rejects with the message and aborts the task signal', async () => {
    const seen: { signal?: AbortSignal } = {};

    await expect(
      withTimeout(
        (signal) => {
          seen.signal = signal;
          return new Promise<never>(() => {});
        },
        10,
        'too slow',
      ),
    ).rejects.toThrow('too slow');
    expect(seen.signal?.aborted).toBe(true);
  });

  it('passes task errors through', async () => {
    await expect(
      withTimeout(async () => {
        throw new Error('task failed');
      }, 1_000, 'too slow'),
    ).rejects.toThrow('task failed');
  });
});
