import { describe, it, expect } from 'vitest';
import pino from 'pino';
import { InMemoryTraceSink, LoggerTraceSink, NoopTraceSink, TraceContext } from '../agents/trace.js';

describe('TraceContext with InMemoryTraceSink', () => {
  it('records a root span and its children with run metadata', () => {
    const trace = new TraceContext(new InMemoryTraceSink(), 'run-1', { category: 'science' });
    const child = trace.startChild('fetch_execution', { stage: 'fetch' });
    child.setData({ status: 'success' });
    child.close();
    trace.root.close();

    const [root, span] = trace.snapshot();
    expect(root).toMatchObject({ name: 'pipeline_run', parentId: null, metadata: { runId: 'run-1', category: 'science' } });
    expect(span).toMatchObject({
      name: 'fetch_execution',
      parentId: trace.root.id,
      metadata: { runId: 'run-1', stage: 'fetch' },
      data: { status: 'success' },
      error: null,
    });
    expect(span?.endedAt).not.toBeNull();
    expect(span?.durationMs).toBeGreaterThanOrEqual(0);
  });

  it('ignores writes after close', () => {
    const trace = new TraceContext(new InMemoryTraceSink(), 'run-1');
    const child = trace.startChild('write_execution');
    child.setData({ status: 'success' });
    child.close();
    child.setData({ late: true });
    child.setError({ message: 'late' });

    expect(trace.snapshot()[1]).toMatchObject({ data: { status: 'success' }, error: null });
  });

  it('merges error fields', () => {
    const trace = new TraceContext(new InMemoryTraceSink(), 'run-1');
    const child = trace.startChild('trend_execution');
    child.setError({ message: 'boom' });
    child.setError({ model: 'm-1' });

    expect(trace.snapshot()[1]?.error).toEqual({ message: 'boom', model: 'm-1' });
  });

  it('keeps runs sharing a sink apart', () => {
    const sink = new InMemoryTraceSink();
    const first = new TraceContext(sink, 'run-a');
    const second = new TraceContext(sink, 'run-b');
    first.startChild('fetch_execution');

    expect(first.snapshot()).toHaveLength(2);
    expect(second.snapshot().map((s) => s.name)).toEqual(['pipeline_run']);
    expect(sink.spans()).toHaveLength(3);
  });
});

describe('NoopTraceSink', () => {
  it('records nothing', () => {
    const trace = new TraceContext(new NoopTraceSink(), 'run-1');
    const child = trace.startChild('fetch_execution');
    child.setData({ status: 'success' });
    child.close();

    expect(trace.root.id).toBe('noop');
    expect(trace.snapshot()).toEqual([]);
  });
});

describe('LoggerTraceSink', () => {
  it('logs each span once when it closes', () => {
    const lines: string[] = [];
    const log = pino({ level: 'debug' }, { write: (line: string) => { lines.push(line); } });
    const trace = new TraceContext(new LoggerTraceSink(log), 'run-2');

    const child = trace.startChild('trend_execution');
    child.setError({ message: 'boom' });
    child.close();
    child.close();
    trace.root.close();

    const entries: unknown[] = lines.map((line) => JSON.parse(line));
    expect(entries).toEqual([
      expect.objectContaining({
        msg: 'span trend_execution closed with error',
        span: expect.objectContaining({ name: 'trend_execution', error: { message: 'boom' } }),
      }),
      expect.objectContaining({ msg: 'span pipeline_run closed' }),
    ]);
    expect(trace.snapshot()).toEqual([]);
  });
});
