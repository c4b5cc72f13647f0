/**
 * Shared types for the digest pipeline.
 *
 * The request schema lives here as well so the HTTP route, the CLI and the
 * coordinator validate against one definition.
 */

import { z } from 'zod';

// ─── Stages ──────────────────────────────────────────────────────────

export type StageName = 'fetch' | 'analysis' | 'fact_check' | 'trend' | 'quote' | 'write' | 'audio';

/** Stages whose invocation includes a language-model call and so resolve a model. */
export const MODEL_STAGES = ['fetch', 'analysis', 'fact_check', 'trend', 'write'] as const;
export type ModelStage = typeof MODEL_STAGES[number];

/** Stages run concurrently between fetch and write, in scheduling order. */
export type AnalysisStage = 'analysis' | 'fact_check' | 'trend' | 'quote';

export type CoordinatorState = 'init' | 'fetching' | 'analyzing' | 'failed' | 'writing' | 'audio' | 'done';

// ─── Request ─────────────────────────────────────────────────────────

export const NEWS_CATEGORIES = [
  'business',
  'entertainment',
  'general',
  'health',
  'science',
  'sports',
  'technology',
] as const;

export const VOICES = ['alloy', 'echo', 'fable', 'onyx', 'nova', 'shimmer'] as const;

export const PipelineRequestSchema = z.object({
  category: z.enum(NEWS_CATEGORIES).default('general'),
  count: z.number().int().min(1).max(10).default(5),
  query: z.string().trim().min(1).max(500).optional(),
  country: z.string().trim().regex(/^[A-Za-z]{2}$/, 'country must be a 2-letter ISO code').optional(),
  sources: z.string().trim().min(1).max(500).optional(),
  page: z.number().int().min(1).optional(),
  ticker: z.string().trim().regex(/^[A-Za-z0-9.^=-]{1,15}$/, 'ticker must be a stock symbol').optional(),
  modelOverrides: z
    .object({
      fetch: z.string().optional(),
      analysis: z.string().optional(),
      fact_check: z.string().optional(),
      trend: z.string().optional(),
      write: z.string().optional(),
    })
    .strict()
    .default({}),
  defaultModel: z.string().trim().min(1).optional(),
  temperature: z.number().min(0).max(2).optional(),
  generateAudio: z.boolean().default(false),
  voice: z.enum(VOICES).default('alloy'),
  summaryStyle: z.enum(['formal', 'conversational', 'brief']).default('conversational'),
  analysisDepth: z.enum(['basic', 'moderate', 'deep']).default('moderate'),
  useFactChecker: z.boolean().default(true),
  useTrendAnalyzer: z.boolean().default(true),
  maxFactClaims: z.number().int().min(1).max(20).default(5),
});

/** What callers send; every field with a default may be omitted. */
export type PipelineRequestInput = z.input<typeof PipelineRequestSchema>;

export type PipelineRequest = Readonly<z.output<typeof PipelineRequestSchema>>;

export type ModelOverrides = Partial<Record<ModelStage, string>>;

// ─── Collaborator payloads ───────────────────────────────────────────

export interface ArticleRaw {
  title: string;
  description: string;
  url: string;
  source: string;
  publishedAt: string;
}

export interface StockQuote {
  symbol: string;
  companyName: string;
  currency: string;
  currentPrice: number;
  dayHigh: number | null;
  dayLow: number | null;
  previousClose: number | null;
  openPrice: number | null;
  volume: number | null;
  fiftyTwoWeekHigh: number | null;
  fiftyTwoWeekLow: number | null;
}

export interface QuoteLookupError {
  error: string;
  symbol: string;
}

// ─── Normalized records ──────────────────────────────────────────────

/** Which tier of the normalization cascade produced a record. */
export type ExtractionTier = 'strict' | 'pattern' | 'raw';

export interface Article {
  title: string;
  description: string;
  url: string;
  source: string;
  publishedAt: string;
}

export interface Verification {
  claim: string;
  assessment: string;
  explanation: string;
  confidence: string;
  sources: string[];
}

export interface Trend {
  name: string;
  description: string;
  strength: string;
  supportingArticles: string[];
  timeframe: string;
}

interface RecordBase {
  summary: string;
  tier: ExtractionTier;
  /** Name of the pattern rule that fired, for pattern-tier records. */
  rule?: string;
}

export interface FetchRecord extends RecordBase {
  kind: 'fetch';
  category: string;
  articles: Article[];
  markdown: string;
}

export interface AnalysisRecord extends RecordBase {
  kind: 'analysis';
  insights: string;
  trends: string[];
  implications: string[];
}

export interface FactCheckRecord extends RecordBase {
  kind: 'fact_check';
  verifications: Verification[];
}

export interface TrendRecord extends RecordBase {
  kind: 'trend';
  trends: Trend[];
  metaTrends: string[];
}

export interface WriteRecord extends RecordBase {
  kind: 'write';
}

export interface QuoteRecord extends RecordBase {
  kind: 'quote';
  quote: StockQuote | null;
}

export interface AudioRecord extends RecordBase {
  kind: 'audio';
  audioFile: string | null;
}

export type NormalizedRecord =
  | FetchRecord
  | AnalysisRecord
  | FactCheckRecord
  | TrendRecord
  | WriteRecord
  | QuoteRecord
  | AudioRecord;

export type RecordKind = NormalizedRecord['kind'];

export type RecordOf<K extends RecordKind> = Extract<NormalizedRecord, { kind: K }>;

// ─── Stage results ───────────────────────────────────────────────────

export type StageResult =
  | {
      readonly stage: StageName;
      readonly success: true;
      readonly data: NormalizedRecord;
      readonly model?: string;
      readonly durationMs: number;
    }
  | {
      readonly stage: StageName;
      readonly success: false;
      readonly error: string;
      readonly model?: string;
      readonly durationMs: number;
    };

// ─── Trace ───────────────────────────────────────────────────────────

export interface SpanRecord {
  id: string;
  parentId: string | null;
  name: string;
  metadata: Record<string, unknown>;
  data: Record<string, unknown>;
  error: Record<string, unknown> | null;
  startedAt: string;
  endedAt: string | null;
  durationMs: number | null;
}

// ─── Output ──────────────────────────────────────────────────────────

export type PipelineStatus = 'complete' | 'degraded' | 'failed';

export interface PipelineOutput {
  readonly runId: string;
  readonly status: PipelineStatus;
  readonly state: CoordinatorState;
  readonly category: string;
  /** Writer summary; empty when the write stage failed or never ran. */
  readonly summary: string;
  readonly markdown?: string;
  readonly analysis?: string;
  readonly factCheck?: string;
  readonly trends?: string;
  readonly quote?: StockQuote;
  readonly audioFile?: string;
  /** Why the run failed or which sections are missing. */
  readonly message?: string;
  readonly stageResults: readonly StageResult[];
  readonly spans: readonly SpanRecord[];
}
