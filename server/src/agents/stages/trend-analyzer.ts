import type { StageInvocation } from '../stage-executor.js';
import type { FetchRecord } from '../types.js';
import { JSON_ONLY, askModel, articlesBlock, type StageDeps } from './shared.js';

const SYSTEM = `You identify trends across a set of news articles: recurring themes, shifts and
developments that more than one story points to. Rate each trend's strength as
"strong", "moderate" or "emerging" and reference the supporting articles by title.

${JSON_ONLY}
Shape:
{
  "trends": [
    { "name": "...", "description": "...", "strength": "...", "supportingArticles": ["..."], "timeframe": "..." }
  ],
  "metaTrends": ["<a theme that ties several trends together>"],
  "summary": "<one or two sentences on the overall direction>"
}`;

export function trendAnalyzerStage(
  deps: StageDeps,
  fetch: FetchRecord,
  model: string,
  timeoutMs: number,
): StageInvocation {
  const user = `Category: ${fetch.category}\n\nArticles:\n${articlesBlock(fetch)}`;
  return {
    kind: 'trend',
    model,
    timeoutMs,
    run: (signal) => askModel(deps, SYSTEM, user, { model, signal }),
  };
}
