import type { StageInvocation } from '../stage-executor.js';
import type { ArticleRaw, PipelineRequest } from '../types.js';
import { JSON_ONLY, askModel, type StageDeps } from './shared.js';

const SYSTEM = `You are a news editor preparing a daily briefing.
You receive raw headlines from a news service and turn them into a clean, readable digest.
Keep every article you are given, in the same order, and never invent articles or URLs.

${JSON_ONLY}
Shape:
{
  "category": "<category>",
  "summary": "<two or three sentence overview of the headlines>",
  "articles": [
    { "title": "...", "description": "<one or two sentences>", "url": "...", "source": "...", "publishedAt": "..." }
  ],
  "markdown": "<the digest as Markdown: one '## N. [Title](url)' heading per article, its description, then '*Source: ... | Published: ...*'>"
}`;

function describeSelection(request: PipelineRequest): string {
  const parts = [`Category: ${request.category}`];
  if (request.query) parts.push(`Search query: ${request.query}`);
  if (request.country) parts.push(`Country: ${request.country}`);
  if (request.sources) parts.push(`Sources: ${request.sources}`);
  return parts.join('\n');
}

export function buildFetchPrompt(request: PipelineRequest, articles: readonly ArticleRaw[]): string {
  return [
    describeSelection(request),
    '',
    `Articles (${articles.length}):`,
    JSON.stringify(articles, null, 2),
  ].join('\n');
}

/**
 * Fetch headlines, then have the model shape them into the digest envelope.
 * An empty headline list skips the model and yields an envelope with no
 * articles, which the coordinator treats as an aborted run.
 */
export function fetchStage(deps: StageDeps, request: PipelineRequest, model: string, timeoutMs: number): StageInvocation {
  return {
    kind: 'fetch',
    model,
    timeoutMs,
    category: request.category,
    run: async (signal) => {
      const articles = await deps.news.fetch({
        category: request.category,
        count: request.count,
        country: request.country,
        sources: request.sources,
        query: request.query,
        page: request.page,
        signal,
      });
      if (articles.length === 0) {
        return { category: request.category, articles: [], summary: 'The news service returned no articles.' };
      }
      return askModel(deps, SYSTEM, buildFetchPrompt(request, articles), { model, signal });
    },
  };
}
