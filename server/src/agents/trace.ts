/**
 * Trace spine: hierarchical span bookkeeping for pipeline runs.
 *
 * A TraceContext is created per run and passed explicitly to the coordinator
 * and executor. Each stage writes only to its own span; the context owns the
 * root `pipeline_run` span.
 */

import { randomUUID } from 'node:crypto';
import type { Logger } from '../lib/logger.js';
import type { SpanRecord } from './types.js';

export interface SpanHandle {
  readonly id: string;
  setData(data: Record<string, unknown>): void;
  setError(error: Record<string, unknown>): void;
  /** Idempotent; later calls are ignored. */
  close(): void;
}

export interface TraceSink {
  startSpan(name: string, metadata: Record<string, unknown>, parentId?: string): SpanHandle;
  /** Snapshot of recorded spans. Sinks that keep nothing return []. */
  spans(): SpanRecord[];
}

// ─── In-memory sink ──────────────────────────────────────────────────

class RecordingSpan implements SpanHandle {
  readonly id = randomUUID();
  private readonly record: SpanRecord;
  private readonly startedMs = Date.now();
  private closed = false;

  constructor(
    name: string,
    metadata: Record<string, unknown>,
    parentId: string | undefined,
    private readonly onClose?: (record: SpanRecord) => void,
  ) {
    this.record = {
      id: this.id,
      parentId: parentId ?? null,
      name,
      metadata: { ...metadata },
      data: {},
      error: null,
      startedAt: new Date(this.startedMs).toISOString(),
      endedAt: null,
      durationMs: null,
    };
  }

  setData(data: Record<string, unknown>): void {
    if (this.closed) return;
    Object.assign(this.record.data, data);
  }

  setError(error: Record<string, unknown>): void {
    if (this.closed) return;
    this.record.error = { ...(this.record.error ?? {}), ...error };
  }

  close(): void {
    if (this.closed) return;
    this.closed = true;
    const ended = Date.now();
    this.record.endedAt = new Date(ended).toISOString();
    this.record.durationMs = ended - this.startedMs;
    this.onClose?.(this.snapshot());
  }

  snapshot(): SpanRecord {
    return {
      ...this.record,
      metadata: { ...this.record.metadata },
      data: { ...this.record.data },
      error: this.record.error ? { ...this.record.error } : null,
    };
  }
}

export class InMemoryTraceSink implements TraceSink {
  private readonly recorded: RecordingSpan[] = [];

  startSpan(name: string, metadata: Record<string, unknown>, parentId?: string): SpanHandle {
    const span = new RecordingSpan(name, metadata, parentId);
    this.recorded.push(span);
    return span;
  }

  spans(): SpanRecord[] {
    return this.recorded.map((span) => span.snapshot());
  }
}

// ─── No-op sink ──────────────────────────────────────────────────────

const NOOP_SPAN: SpanHandle = {
  id: 'noop',
  setData: () => {},
  setError: () => {},
  close: () => {},
};

export class NoopTraceSink implements TraceSink {
  startSpan(): SpanHandle {
    return NOOP_SPAN;
  }

  spans(): SpanRecord[] {
    return [];
  }
}

// ─── Logger sink ─────────────────────────────────────────────────────

/** Debug-logs every span when it closes; keeps nothing in memory. */
export class LoggerTraceSink implements TraceSink {
  constructor(private readonly log: Logger) {}

  startSpan(name: string, metadata: Record<string, unknown>, parentId?: string): SpanHandle {
    return new RecordingSpan(name, metadata, parentId, (record) => {
      if (record.error) {
        this.log.debug({ span: record }, `span ${record.name} closed with error`);
      } else {
        this.log.debug({ span: record }, `span ${record.name} closed`);
      }
    });
  }

  spans(): SpanRecord[] {
    return [];
  }
}

// ─── Per-run context ─────────────────────────────────────────────────

export class TraceContext {
  readonly root: SpanHandle;

  constructor(
    private readonly sink: TraceSink,
    readonly runId: string,
    metadata: Record<string, unknown> = {},
  ) {
    this.root = sink.startSpan('pipeline_run', { runId, ...metadata });
  }

  /** Child span of the run's root span. */
  startChild(name: string, metadata: Record<string, unknown> = {}): SpanHandle {
    return this.sink.startSpan(name, { runId: this.runId, ...metadata }, this.root.id);
  }

  /** Spans recorded by the sink for this run only. */
  snapshot(): SpanRecord[] {
    return this.sink
      .spans()
      .filter((span) => span.id === this.root.id || span.parentId === this.root.id);
  }
}
