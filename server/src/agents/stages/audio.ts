import type { StageInvocation } from '../stage-executor.js';
import type { StageDeps } from './shared.js';

/** Best effort: a service that produces no file still completes the stage. */
export function audioStage(deps: StageDeps, summary: string, voice: string, timeoutMs: number): StageInvocation {
  return {
    kind: 'audio',
    timeoutMs,
    run: async (signal) => ({ audioFile: await deps.speech.synthesize(summary, voice, signal) }),
  };
}
