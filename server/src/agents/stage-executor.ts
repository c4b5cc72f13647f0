/**
 * StageExecutor: runs one stage invocation under a deadline inside its own
 * `{stage}_execution` span, normalizes the raw result and returns a frozen
 * StageResult. It never throws: every error becomes a failed result.
 */

import logger, { type Logger } from '../lib/logger.js';
import { withTimeout } from '../lib/timeout.js';
import { normalize } from './normalizer/index.js';
import type { TraceContext } from './trace.js';
import type { RecordKind, StageName, StageResult } from './types.js';

export interface StageInvocation {
  /** Record shape the raw result is normalized into. */
  kind: RecordKind;
  /** Resolved model id for model-backed stages. */
  model?: string;
  timeoutMs: number;
  /** Category stamped on fetch records. */
  category?: string;
  run(signal: AbortSignal): Promise<unknown>;
}

export class StageExecutor {
  constructor(private readonly log: Logger = logger) {}

  async execute(stage: StageName, invocation: StageInvocation, trace: TraceContext): Promise<StageResult> {
    const span = trace.startChild(`${stage}_execution`, {
      stage,
      kind: invocation.kind,
      ...(invocation.model ? { model: invocation.model } : {}),
    });
    const started = Date.now();
    const { model } = invocation;

    try {
      const raw = await withTimeout(
        (signal) => invocation.run(signal),
        invocation.timeoutMs,
        `Stage ${stage} timed out after ${invocation.timeoutMs}ms`,
      );
      const data = normalize(invocation.kind, raw, { category: invocation.category });
      const durationMs = Date.now() - started;
      span.setData({ status: 'success', model, tier: data.tier, rule: data.rule, durationMs });
      this.log.info({ stage, model, tier: data.tier, durationMs }, 'Stage completed');
      const result: StageResult = { stage, success: true, data, model, durationMs };
      return Object.freeze(result);
    } catch (err) {
      const message = err instanceof Error && err.message ? err.message : String(err) || 'Unknown error';
      const durationMs = Date.now() - started;
      span.setError({ message, model });
      span.setData({ status: 'error', durationMs });
      this.log.warn({ stage, model, error: message, durationMs }, 'Stage failed');
      const result: StageResult = { stage, success: false, error: message, model, durationMs };
      return Object.freeze(result);
    } finally {
      span.close();
    }
  }
}
