/**
 * Zod envelopes for stage output validation (the strict tier of the
 * normalizer).
 *
 * Keys are camelCased before validation, so `published_at` and
 * `publishedAt` are equivalent. Each envelope requires the key that makes
 * the record meaningful and defaults everything else. Malformed list items
 * are dropped individually rather than failing the whole envelope.
 */

import { z } from 'zod';

// ─── Shared helpers ───────────────────────────────────────────────────

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** Best-effort text for a list item: strings, numbers or `{name|title|text}` objects. */
export function itemText(value: unknown): string {
  if (typeof value === 'string') return value.trim();
  if (typeof value === 'number' || typeof value === 'boolean') return String(value);
  if (isPlainObject(value)) {
    for (const key of ['name', 'title', 'text', 'claim']) {
      const candidate = value[key];
      if (typeof candidate === 'string' && candidate.trim()) return candidate.trim();
    }
  }
  return '';
}

function hasText(value: unknown): boolean {
  return (typeof value === 'string' && value.trim() !== '') || typeof value === 'number';
}

/**
 * Preprocessor for list entries whose identifying text is missing: the entry
 * keeps `fallback` when any of `evidence` carries text, and is rejected
 * (so the lenient list skips it) when nothing does.
 */
function fillMissingText(key: string, fallback: string, evidence: readonly string[]) {
  return (value: unknown): unknown => {
    if (!isPlainObject(value) || hasText(value[key])) return value;
    return evidence.some((field) => hasText(value[field])) ? { ...value, [key]: fallback } : null;
  };
}

/** Array whose unreadable entries are skipped. */
function lenientArray<T extends z.ZodTypeAny>(item: T) {
  return z.array(z.unknown()).transform((items) =>
    items.flatMap((entry): Array<z.output<T>> => {
      const parsed = item.safeParse(entry);
      return parsed.success ? [parsed.data] : [];
    }),
  );
}

const StringList = z
  .union([z.array(z.unknown()), z.string()])
  .transform((value) =>
    (typeof value === 'string' ? value.split(/[,;]\s*/) : value).map(itemText).filter(Boolean),
  );

const Text = z.union([z.string(), z.number()]).transform((v) => String(v).trim());

// ─── fetch ────────────────────────────────────────────────────────────

export const ArticleSchema = z.preprocess(
  fillMissingText('title', 'No title', ['url', 'description']),
  z
    .object({
      title: z.string().trim().min(1),
      description: z.string().nullish().transform((v) => v?.trim() || 'No description'),
      url: z.string().nullish().transform((v) => v?.trim() ?? ''),
      source: z
        .union([z.string(), z.object({ name: z.string().nullish() }).passthrough()])
        .nullish()
        .transform((v) => (typeof v === 'string' ? v : v?.name) || 'Unknown source'),
      publishedAt: z.string().nullish().transform((v) => v ?? ''),
    })
    .passthrough(),
);

export const FetchEnvelopeSchema = z
  .object({
    articles: lenientArray(ArticleSchema),
    summary: z.string().optional(),
    markdown: z.string().optional(),
    category: z.string().optional(),
  })
  .passthrough();

// ─── analysis ─────────────────────────────────────────────────────────

export const AnalysisEnvelopeSchema = z
  .object({
    insights: z.string().trim().min(1),
    trends: StringList.optional().default([]),
    implications: StringList.optional().default([]),
    summary: z.string().optional(),
  })
  .passthrough();

// ─── fact_check ───────────────────────────────────────────────────────

export const VerificationSchema = z.preprocess(
  fillMissingText('claim', '', ['assessment', 'explanation']),
  z
    .object({
      claim: z.string().trim(),
      assessment: Text.optional().default('Unverified'),
      explanation: Text.optional().default(''),
      confidence: Text.optional().default('unknown'),
      sources: StringList.optional().default([]),
    })
    .passthrough(),
);

export const FactCheckEnvelopeSchema = z
  .object({
    verifications: lenientArray(VerificationSchema),
    summary: z.string().optional(),
  })
  .passthrough();

// ─── trend ────────────────────────────────────────────────────────────

export const TrendSchema = z.preprocess(
  (value) => {
    if (!isPlainObject(value) || typeof value.name === 'string') return value;
    return { ...value, name: value.trend ?? value.title };
  },
  z
    .object({
      name: z.string().trim().min(1),
      description: Text.optional().default(''),
      strength: Text.optional().default('unknown'),
      supportingArticles: StringList.optional().default([]),
      timeframe: Text.optional().default(''),
    })
    .passthrough(),
);

export const TrendEnvelopeSchema = z
  .object({
    trends: lenientArray(TrendSchema),
    metaTrends: StringList.optional().default([]),
    summary: z.string().optional(),
  })
  .passthrough();

// ─── write ────────────────────────────────────────────────────────────

export const WriteEnvelopeSchema = z
  .object({
    summary: z.string().trim().min(1),
  })
  .passthrough();

// ─── quote ────────────────────────────────────────────────────────────

const NullableNumber = z.number().nullish().transform((v) => v ?? null);

export const QuoteEnvelopeSchema = z
  .object({
    symbol: z.string().trim().min(1),
    currentPrice: z.number(),
    companyName: z.string().nullish().transform((v) => v || 'N/A'),
    currency: z.string().nullish().transform((v) => v || 'USD'),
    dayHigh: NullableNumber,
    dayLow: NullableNumber,
    previousClose: NullableNumber,
    openPrice: NullableNumber,
    volume: NullableNumber,
    fiftyTwoWeekHigh: NullableNumber,
    fiftyTwoWeekLow: NullableNumber,
    summary: z.string().optional(),
  })
  .passthrough();

// ─── audio ────────────────────────────────────────────────────────────

export const AudioEnvelopeSchema = z
  .object({
    audioFile: z.string().nullable(),
    summary: z.string().optional(),
  })
  .passthrough();

// ─── Key normalization ────────────────────────────────────────────────

function camelKey(key: string): string {
  return key.replace(/[_-]+([a-z0-9])/g, (_, ch: string) => ch.toUpperCase());
}

/** Recursively camelCase object keys so snake_case envelopes validate too. */
export function camelizeKeys(value: unknown): unknown {
  if (Array.isArray(value)) return value.map(camelizeKeys);
  if (!isPlainObject(value)) return value;
  const out: Record<string, unknown> = {};
  for (const [key, entry] of Object.entries(value)) {
    out[camelKey(key)] = camelizeKeys(entry);
  }
  return out;
}
