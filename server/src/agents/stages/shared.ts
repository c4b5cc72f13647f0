import { complete } from '../../lib/llm.js';
import type { LLMProvider } from '../../lib/llm-provider.js';
import type { NewsService } from '../../lib/news.js';
import type { QuoteService } from '../../lib/quotes.js';
import type { SpeechService } from '../../lib/speech.js';
import type { FetchRecord } from '../types.js';

/** Collaborators and call settings every stage invocation draws on. */
export interface StageDeps {
  llm: LLMProvider;
  news: NewsService;
  quotes: QuoteService;
  speech: SpeechService;
  temperature: number;
  maxTokens: number;
  maxAttempts: number;
}

export interface ModelCall {
  model: string;
  signal: AbortSignal;
}

/** One completion; an empty reply is an error so the stage fails visibly. */
export async function askModel(deps: StageDeps, system: string, user: string, call: ModelCall): Promise<string> {
  const text = await complete(deps.llm, system, user, {
    model: call.model,
    temperature: deps.temperature,
    maxTokens: deps.maxTokens,
    maxAttempts: deps.maxAttempts,
    signal: call.signal,
  });
  if (!text.trim()) {
    throw new Error(`Model ${call.model} returned an empty response`);
  }
  return text;
}

/** Numbered article list the analysis stages read. */
export function articlesBlock(fetch: FetchRecord): string {
  return fetch.articles
    .map((a, i) => {
      const lines = [`${i + 1}. ${a.title}`, `   Source: ${a.source}`];
      if (a.publishedAt) lines.push(`   Published: ${a.publishedAt}`);
      lines.push(`   ${a.description}`);
      if (a.url) lines.push(`   URL: ${a.url}`);
      return lines.join('\n');
    })
    .join('\n\n');
}

export const JSON_ONLY = 'Respond with a single JSON object and nothing else. Do not wrap it in markdown fences.';
