import { describe, it, expect } from 'vitest';
import { StageExecutor } from '../agents/stage-executor.js';
import { InMemoryTraceSink, TraceContext } from '../agents/trace.js';

function newTrace() {
  return new TraceContext(new InMemoryTraceSink(), 'run-1');
}

describe('StageExecutor', () => {
  it('normalizes a successful result inside a closed span', async () => {
    const trace = newTrace();
    const result = await new StageExecutor().execute(
      'write',
      { kind: 'write', model: 'm-1', timeoutMs: 1_000, run: async () => '{"summary":"Done"}' },
      trace,
    );

    expect(result).toMatchObject({
      stage: 'write',
      success: true,
      model: 'm-1',
      data: { kind: 'write', tier: 'strict', summary: 'Done' },
    });
    expect(Object.isFrozen(result)).toBe(true);

    const span = trace.snapshot()[1];
    expect(span).toMatchObject({
      name: 'write_execution',
      metadata: { stage: 'write', kind: 'write', model: 'm-1' },
      data: { status: 'success', model: 'm-1', tier: 'strict' },
      error: null,
    });
    expect(span?.endedAt).not.toBeNull();
  });

  it('turns a thrown error into a failed result and marks the span', async () => {
    const trace = newTrace();
    const result = await new StageExecutor().execute(
      'analysis',
      {
        kind: 'analysis',
        model: 'm-1',
        timeoutMs: 1_000,
        run: async () => {
          throw new Error('upstream 500');
        },
      },
      trace,
    );

    expect(result).toMatchObject({ stage: 'analysis', success: false, error: 'upstream 500', model: 'm-1' });
    const span = trace.snapshot()[1];
    expect(span).toMatchObject({ error: { message: 'upstream 500', model: 'm-1' }, data: { status: 'error' } });
    expect(span?.endedAt).not.toBeNull();
  });

  it('fails a stage that outlives its deadline and aborts its signal', async () => {
    const seen: { signal?: AbortSignal } = {};
    const trace = newTrace();
    const result = await new StageExecutor().execute(
      'trend',
      {
        kind: 'trend',
        timeoutMs: 20,
        run: (signal) => {
          seen.signal = signal;
          return new Promise(() => {});
        },
      },
      trace,
    );

    expect(result).toMatchObject({ success: false, error: 'Stage trend timed out after 20ms' });
    expect(seen.signal?.aborted).toBe(true);
    expect(trace.snapshot()[1]?.endedAt).not.toBeNull();
  });

  it('stamps the category on fetch records', async () => {
    const result = await new StageExecutor().execute(
      'fetch',
      { kind: 'fetch', timeoutMs: 1_000, category: 'science', run: async () => ({ articles: [] }) },
      newTrace(),
    );

    expect(result).toMatchObject({ success: true, data: { kind: 'fetch', category: 'science', articles: [] } });
  });
});
