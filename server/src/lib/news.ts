import { z } from 'zod';
import type { ArticleRaw } from '../agents/types.js';
import logger from './logger.js';

export interface NewsQuery {
  category: string;
  count: number;
  country?: string;
  sources?: string;
  query?: string;
  page?: number;
  signal?: AbortSignal;
}

export interface NewsService {
  fetch(params: NewsQuery): Promise<ArticleRaw[]>;
}

const NewsApiResponseSchema = z.object({
  status: z.string().optional(),
  articles: z
    .array(
      z.object({
        title: z.string().nullish(),
        description: z.string().nullish(),
        url: z.string().nullish(),
        source: z.object({ name: z.string().nullish() }).nullish(),
        publishedAt: z.string().nullish(),
      }),
    )
    .default([]),
});

/**
 * Build the `top-headlines` query string. NewsAPI rejects `sources` mixed with
 * `country` or `category`, so `sources` wins when given.
 */
export function buildHeadlineParams(params: NewsQuery, apiKey: string): URLSearchParams {
  const search = new URLSearchParams({
    apiKey,
    pageSize: String(Math.max(1, Math.min(Math.trunc(params.count), 10))),
    language: 'en',
  });

  if (params.sources) {
    search.set('sources', params.sources);
  } else {
    if (params.category && params.category !== 'all') search.set('category', params.category);
    if (params.country) search.set('country', params.country.toLowerCase());
  }
  if (params.query) search.set('q', params.query);
  if (params.page && params.page > 0) search.set('page', String(params.page));
  return search;
}

export class NewsApiClient implements NewsService {
  private readonly baseUrl: string;

  constructor(
    private readonly apiKey: string | undefined,
    baseUrl = 'https://newsapi.org/v2',
  ) {
    this.baseUrl = baseUrl.replace(/\/$/, '');
  }

  async fetch(params: NewsQuery): Promise<ArticleRaw[]> {
    if (!this.apiKey) {
      logger.error('Cannot fetch news: NEWS_API_KEY is not set');
      return [];
    }

    const url = `${this.baseUrl}/top-headlines?${buildHeadlineParams(params, this.apiKey).toString()}`;
    logger.info({ category: params.category, count: params.count }, 'Fetching headlines');

    try {
      const response = await fetch(url, { signal: params.signal });
      if (!response.ok) {
        const body = await response.text().catch(() => '');
        logger.error({ status: response.status, body: body.slice(0, 300) }, 'News API request failed');
        return [];
      }

      const parsed = NewsApiResponseSchema.safeParse(await response.json());
      if (!parsed.success) {
        logger.error({ issues: parsed.error.issues.slice(0, 3) }, 'News API returned an unexpected payload');
        return [];
      }

      const articles = parsed.data.articles.map((a) => ({
        title: a.title ?? 'No title',
        description: a.description ?? 'No description',
        url: a.url ?? '',
        source: a.source?.name ?? 'Unknown source',
        publishedAt: a.publishedAt ?? '',
      }));
      logger.info({ count: articles.length }, 'Fetched headlines');
      return articles;
    } catch (err) {
      // Aborts belong to the caller's deadline; let the stage record them.
      if (params.signal?.aborted) throw err;
      logger.error({ error: err instanceof Error ? err.message : String(err) }, 'Error fetching news');
      return [];
    }
  }
}
