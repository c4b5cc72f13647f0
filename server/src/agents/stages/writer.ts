import type { StageInvocation } from '../stage-executor.js';
import type { FetchRecord, PipelineRequest } from '../types.js';
import { JSON_ONLY, askModel, articlesBlock, type StageDeps } from './shared.js';

const STYLE_GUIDANCE: Record<PipelineRequest['summaryStyle'], string> = {
  formal: 'Write in a formal, neutral newsroom register.',
  conversational: 'Write in a warm, conversational tone, as if briefing a friend over coffee.',
  brief: 'Be brief: a short paragraph and at most five bullet points.',
};

function systemPrompt(style: PipelineRequest['summaryStyle']): string {
  return `You write the final daily news digest from the articles and research notes you are given.
Use only that material; do not add facts. If market data is present, mention it once.
${STYLE_GUIDANCE[style]}

${JSON_ONLY}
Shape:
{ "summary": "<the finished digest as Markdown, with a '## Summary' section and a '### Key Points' list>" }`;
}

export function writerStage(
  deps: StageDeps,
  request: PipelineRequest,
  fetch: FetchRecord,
  context: string,
  model: string,
  timeoutMs: number,
): StageInvocation {
  const user = `Category: ${request.category}\n\nArticles:\n${articlesBlock(fetch)}\n\nResearch notes:\n\n${context}`;
  return {
    kind: 'write',
    model,
    timeoutMs,
    run: (signal) => askModel(deps, systemPrompt(request.summaryStyle), user, { model, signal }),
  };
}
