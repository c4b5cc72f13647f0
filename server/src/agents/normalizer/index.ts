/**
 * Output normalizer. Turns a stage's raw output into a typed record.
 *
 * Three tiers, first success wins:
 *   1. strict:  the output (or the JSON repaired out of it) validates
 *                against the kind's envelope schema
 *   2. pattern: the kind's ordered rule list; first rule with entries wins
 *   3. raw:     empty collections, summary = trimmed text
 *
 * `normalize` never throws. The tier that fired is recorded on the record.
 */

import type { z } from 'zod';
import { repairJSON } from '../../lib/json-repair.js';
import logger from '../../lib/logger.js';
import {
  AnalysisEnvelopeSchema,
  AudioEnvelopeSchema,
  FactCheckEnvelopeSchema,
  FetchEnvelopeSchema,
  QuoteEnvelopeSchema,
  TrendEnvelopeSchema,
  WriteEnvelopeSchema,
  camelizeKeys,
} from '../schemas/digest-schemas.js';
import {
  articleDigest,
  describeQuote,
  renderArticlesMarkdown,
  trendDigest,
  verificationDigest,
} from '../render.js';
import type { Article, NormalizedRecord, RecordKind, Trend, Verification } from '../types.js';
import {
  ANALYSIS_RULES,
  FACT_CHECK_RULES,
  FETCH_RULES,
  META_TREND_LABELS,
  TREND_RULES,
  WRITE_RULES,
  type PatternRule,
} from './rules.js';
import { dedupeBy, listField, section, urlKey } from './text.js';

/** Text form of any raw output. Non-string values are serialized. */
export function rawText(raw: unknown): string {
  if (typeof raw === 'string') return raw;
  if (raw === null || raw === undefined) return '';
  if (typeof raw === 'object') {
    try {
      return JSON.stringify(raw) ?? '';
    } catch {
      return String(raw);
    }
  }
  return String(raw);
}

function strictParse<S extends z.ZodTypeAny>(raw: unknown, envelope: S): z.output<S> | null {
  let candidate: unknown;
  if (typeof raw === 'string') {
    const repaired = repairJSON(raw);
    if (!repaired.ok) return null;
    candidate = repaired.value;
  } else if (typeof raw === 'object' && raw !== null) {
    candidate = raw;
  } else {
    return null;
  }
  const parsed = envelope.safeParse(camelizeKeys(candidate));
  return parsed.success ? parsed.data : null;
}

function firstMatchingRule<E>(
  kind: RecordKind,
  text: string,
  rules: ReadonlyArray<PatternRule<E>>,
  key?: (entry: E) => string,
): { rule: string; entries: E[] } | null {
  if (!text.trim()) return null;
  for (const rule of rules) {
    let entries: E[];
    try {
      entries = rule.extract(text);
    } catch (err) {
      logger.warn(
        { kind, rule: rule.name, error: err instanceof Error ? err.message : String(err) },
        'Extraction rule failed; skipping',
      );
      continue;
    }
    const unique = key ? dedupeBy(entries, key) : entries;
    if (unique.length > 0) return { rule: rule.name, entries: unique };
  }
  return null;
}

/** `## Summary` / `Summary:` section when present, else the whole text. */
function patternSummary(text: string): string {
  return section(text, ['Summary']) || text.trim();
}

function pick(summary: string | undefined, derived: string): string {
  const trimmed = summary?.trim();
  return trimmed ? trimmed : derived;
}

const articleKey = (a: Article) => (a.url ? urlKey(a.url) : a.title.toLowerCase());
const claimKey = (v: Verification) => v.claim.toLowerCase();
const trendKey = (t: Trend) => t.name.toLowerCase();

/** Tier-3 record: empty collections, summary = trimmed text. */
function rawRecord(kind: RecordKind, text: string, category = 'general'): NormalizedRecord {
  const summary = text.trim();
  switch (kind) {
    case 'fetch':
      return { kind, tier: 'raw', category, articles: [], markdown: summary, summary };
    case 'analysis':
      return { kind, tier: 'raw', insights: summary, trends: [], implications: [], summary };
    case 'fact_check':
      return { kind, tier: 'raw', verifications: [], summary };
    case 'trend':
      return { kind, tier: 'raw', trends: [], metaTrends: [], summary };
    case 'write':
      return { kind, tier: 'raw', summary };
    case 'quote':
      return { kind, tier: 'raw', quote: null, summary };
    case 'audio':
      return { kind, tier: 'raw', audioFile: null, summary };
  }
}

// ─── Per-kind cascades ────────────────────────────────────────────────

function normalizeFetch(raw: unknown, text: string, category: string): NormalizedRecord {
  const envelope = strictParse(raw, FetchEnvelopeSchema);
  if (envelope) {
    const articles = dedupeBy(
      envelope.articles.map((a) => ({
        title: a.title,
        description: a.description,
        url: a.url,
        source: a.source,
        publishedAt: a.publishedAt,
      })),
      articleKey,
    );
    const cat = envelope.category?.trim() || category;
    return {
      kind: 'fetch',
      tier: 'strict',
      category: cat,
      articles,
      markdown: envelope.markdown?.trim() || renderArticlesMarkdown(cat, articles),
      summary: pick(envelope.summary, articleDigest(articles)),
    };
  }

  const matched = firstMatchingRule('fetch', text, FETCH_RULES, articleKey);
  if (matched) {
    return {
      kind: 'fetch',
      tier: 'pattern',
      rule: matched.rule,
      category,
      articles: matched.entries,
      markdown: text.trim(),
      summary: patternSummary(text),
    };
  }

  return rawRecord('fetch', text, category);
}

function normalizeAnalysis(raw: unknown, text: string): NormalizedRecord {
  const envelope = strictParse(raw, AnalysisEnvelopeSchema);
  if (envelope) {
    return {
      kind: 'analysis',
      tier: 'strict',
      insights: envelope.insights,
      trends: envelope.trends,
      implications: envelope.implications,
      summary: pick(envelope.summary, envelope.insights),
    };
  }

  const matched = firstMatchingRule('analysis', text, ANALYSIS_RULES);
  const sections = matched?.entries[0];
  if (matched && sections) {
    return {
      kind: 'analysis',
      tier: 'pattern',
      rule: matched.rule,
      ...sections,
      summary: patternSummary(text),
    };
  }

  return rawRecord('analysis', text);
}

function normalizeFactCheck(raw: unknown, text: string): NormalizedRecord {
  const envelope = strictParse(raw, FactCheckEnvelopeSchema);
  if (envelope) {
    const verifications = dedupeBy(
      envelope.verifications.map((v) => ({
        claim: v.claim,
        assessment: v.assessment,
        explanation: v.explanation,
        confidence: v.confidence,
        sources: v.sources,
      })),
      claimKey,
    );
    return {
      kind: 'fact_check',
      tier: 'strict',
      verifications,
      summary: pick(envelope.summary, verificationDigest(verifications)),
    };
  }

  const matched = firstMatchingRule('fact_check', text, FACT_CHECK_RULES, claimKey);
  if (matched) {
    return {
      kind: 'fact_check',
      tier: 'pattern',
      rule: matched.rule,
      verifications: matched.entries,
      summary: patternSummary(text),
    };
  }

  return rawRecord('fact_check', text);
}

function normalizeTrend(raw: unknown, text: string): NormalizedRecord {
  const envelope = strictParse(raw, TrendEnvelopeSchema);
  if (envelope) {
    const trends = dedupeBy(
      envelope.trends.map((t) => ({
        name: t.name,
        description: t.description,
        strength: t.strength,
        supportingArticles: t.supportingArticles,
        timeframe: t.timeframe,
      })),
      trendKey,
    );
    return {
      kind: 'trend',
      tier: 'strict',
      trends,
      metaTrends: envelope.metaTrends,
      summary: pick(envelope.summary, trendDigest(trends)),
    };
  }

  const matched = firstMatchingRule('trend', text, TREND_RULES, trendKey);
  if (matched) {
    return {
      kind: 'trend',
      tier: 'pattern',
      rule: matched.rule,
      trends: matched.entries,
      metaTrends: listField(text, META_TREND_LABELS),
      summary: patternSummary(text),
    };
  }

  return rawRecord('trend', text);
}

function normalizeWrite(raw: unknown, text: string): NormalizedRecord {
  const envelope = strictParse(raw, WriteEnvelopeSchema);
  if (envelope) {
    return { kind: 'write', tier: 'strict', summary: envelope.summary };
  }

  const matched = firstMatchingRule('write', text, WRITE_RULES);
  const summary = matched?.entries[0];
  if (matched && summary) {
    return { kind: 'write', tier: 'pattern', rule: matched.rule, summary };
  }

  return rawRecord('write', text);
}

function normalizeQuote(raw: unknown, text: string): NormalizedRecord {
  const envelope = strictParse(raw, QuoteEnvelopeSchema);
  if (envelope) {
    const quote = {
      symbol: envelope.symbol,
      companyName: envelope.companyName,
      currency: envelope.currency,
      currentPrice: envelope.currentPrice,
      dayHigh: envelope.dayHigh,
      dayLow: envelope.dayLow,
      previousClose: envelope.previousClose,
      openPrice: envelope.openPrice,
      volume: envelope.volume,
      fiftyTwoWeekHigh: envelope.fiftyTwoWeekHigh,
      fiftyTwoWeekLow: envelope.fiftyTwoWeekLow,
    };
    return { kind: 'quote', tier: 'strict', quote, summary: pick(envelope.summary, describeQuote(quote)) };
  }
  return rawRecord('quote', text);
}

function normalizeAudio(raw: unknown, text: string): NormalizedRecord {
  const envelope = strictParse(raw, AudioEnvelopeSchema);
  if (envelope) {
    const derived = envelope.audioFile ? `Audio saved to ${envelope.audioFile}` : 'Audio was not generated.';
    return { kind: 'audio', tier: 'strict', audioFile: envelope.audioFile, summary: pick(envelope.summary, derived) };
  }
  return rawRecord('audio', text);
}

export interface NormalizeOptions {
  /** Category stamped on fetch records the output does not name. */
  category?: string;
}

function normalizeByKind(kind: RecordKind, raw: unknown, text: string, category: string): NormalizedRecord {
  switch (kind) {
    case 'fetch':
      return normalizeFetch(raw, text, category);
    case 'analysis':
      return normalizeAnalysis(raw, text);
    case 'fact_check':
      return normalizeFactCheck(raw, text);
    case 'trend':
      return normalizeTrend(raw, text);
    case 'write':
      return normalizeWrite(raw, text);
    case 'quote':
      return normalizeQuote(raw, text);
    case 'audio':
      return normalizeAudio(raw, text);
  }
}

export function normalize(kind: RecordKind, raw: unknown, options: NormalizeOptions = {}): NormalizedRecord {
  const category = options.category ?? 'general';
  let text = '';
  let record: NormalizedRecord;
  try {
    text = rawText(raw);
    record = normalizeByKind(kind, raw, text, category);
  } catch (err) {
    logger.warn({ kind, error: err instanceof Error ? err.message : String(err) }, 'Normalization failed; using raw text');
    record = rawRecord(kind, text, category);
  }

  if (record.tier !== 'strict') {
    logger.debug({ kind, tier: record.tier, rule: record.rule }, 'Stage output normalized below strict tier');
  }
  return record;
}
