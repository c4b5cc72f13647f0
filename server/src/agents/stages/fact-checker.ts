import type { StageInvocation } from '../stage-executor.js';
import type { FetchRecord, PipelineRequest } from '../types.js';
import { JSON_ONLY, askModel, articlesBlock, type StageDeps } from './shared.js';

function systemPrompt(maxClaims: number): string {
  return `You are a fact-checker. Pick at most ${maxClaims} concrete, checkable claims from the articles
and assess each one against what is known and what the articles themselves support.
Use "Verified", "Partially verified", "Unverified" or "Disputed" as the assessment and
"high", "medium" or "low" as the confidence.

${JSON_ONLY}
Shape:
{
  "verifications": [
    { "claim": "...", "assessment": "...", "explanation": "...", "confidence": "...", "sources": ["..."] }
  ],
  "summary": "<one or two sentences on overall reliability>"
}`;
}

export function factCheckerStage(
  deps: StageDeps,
  request: PipelineRequest,
  fetch: FetchRecord,
  model: string,
  timeoutMs: number,
): StageInvocation {
  const user = `Articles:\n${articlesBlock(fetch)}`;
  return {
    kind: 'fact_check',
    model,
    timeoutMs,
    run: (signal) => askModel(deps, systemPrompt(request.maxFactClaims), user, { model, signal }),
  };
}
