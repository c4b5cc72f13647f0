import type { StageInvocation } from '../stage-executor.js';
import type { FetchRecord, PipelineRequest } from '../types.js';
import { JSON_ONLY, askModel, articlesBlock, type StageDeps } from './shared.js';

const DEPTH_GUIDANCE: Record<PipelineRequest['analysisDepth'], string> = {
  basic: 'Keep the analysis short: the two or three most important takeaways.',
  moderate: 'Cover the main themes, how the stories relate and what they mean for readers.',
  deep: 'Go deep: connect the stories, weigh second-order effects and note what remains uncertain.',
};

function systemPrompt(depth: PipelineRequest['analysisDepth']): string {
  return `You are a senior news analyst. Read the articles and explain what they mean together.
${DEPTH_GUIDANCE[depth]}

${JSON_ONLY}
Shape:
{
  "insights": "<a few paragraphs of analysis>",
  "trends": ["<short trend statement>", "..."],
  "implications": ["<who is affected and how>", "..."],
  "summary": "<two sentence synopsis of the analysis>"
}`;
}

export function analystStage(
  deps: StageDeps,
  request: PipelineRequest,
  fetch: FetchRecord,
  model: string,
  timeoutMs: number,
): StageInvocation {
  const user = `Category: ${fetch.category}\n\nArticles:\n${articlesBlock(fetch)}`;
  return {
    kind: 'analysis',
    model,
    timeoutMs,
    run: (signal) => askModel(deps, systemPrompt(request.analysisDepth), user, { model, signal }),
  };
}
