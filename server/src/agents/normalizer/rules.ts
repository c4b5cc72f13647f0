/**
 * Pattern-tier extraction rules, one ordered list per record kind.
 *
 * Order is a tie-break policy: on text that several rules could read, the
 * earlier rule wins. Each rule is pure and independently testable.
 */

import type { Article, Trend, Verification } from '../types.js';
import { LABEL_PREFIX, anchors, clean, field, firstProseLine, listField, section } from './text.js';

export interface PatternRule<E> {
  readonly name: string;
  extract(text: string): E[];
}

export interface AnalysisSections {
  insights: string;
  trends: string[];
  implications: string[];
}

const LINK = String.raw`\[([^\]\n]+)\]\(([^)\s]+)\)`;

// ─── fetch ────────────────────────────────────────────────────────────

function firstUrl(block: string): string {
  const labelled = field(block, ['URL', 'Link']);
  const fromLabel = /\((https?:\/\/[^)\s]+)\)|(https?:\/\/\S+)/.exec(labelled);
  if (fromLabel) return fromLabel[1] ?? fromLabel[2] ?? '';
  const link = new RegExp(LINK).exec(block);
  if (link) return link[2] ?? '';
  return /https?:\/\/[^\s)>\]]+/.exec(block)?.[0] ?? '';
}

function sourceOf(block: string): string {
  return field(block, ['Source']) || 'Unknown source';
}

function articlesFrom(
  text: string,
  patterns: readonly RegExp[],
  read: (m: RegExpExecArray) => { title: string; url: string } | null,
  description?: string,
): Article[] {
  return anchors(text, patterns, read).map(({ value, block }) => ({
    title: value.title,
    url: value.url || firstUrl(block),
    description:
      description
      ?? (field(block, ['Description', 'Summary']) || firstProseLine(block) || 'No description'),
    source: sourceOf(block),
    publishedAt: field(block, ['Published At', 'Published', 'Date']),
  }));
}

function titleAndUrl(titleGroup: number, urlGroup: number, altTitleGroup?: number) {
  return (m: RegExpExecArray) => {
    const title = clean(m[titleGroup] ?? (altTitleGroup !== undefined ? m[altTitleGroup] : undefined) ?? '');
    return title ? { title, url: (m[urlGroup] ?? '').trim() } : null;
  };
}

export const FETCH_RULES: ReadonlyArray<PatternRule<Article>> = [
  {
    name: 'numbered-heading-link',
    extract: (text) =>
      articlesFrom(text, [new RegExp(String.raw`^##[ \t]+\d+[.)][ \t]*${LINK}`, 'm')], titleAndUrl(1, 2)),
  },
  {
    name: 'article-heading',
    extract: (text) =>
      articlesFrom(
        text,
        [
          new RegExp(String.raw`^#{2,3}[ \t]*Article[ \t]+\d+[ \t]*:[ \t]*\[([^\]\n]+)\](?:\(([^)\s]+)\))?`, 'im'),
          new RegExp(String.raw`^##[ \t]*\[([^\]\n]+)\](?:\(([^)\s]+)\))?[ \t]*$`, 'm'),
        ],
        titleAndUrl(1, 2),
      ),
  },
  {
    name: 'title-field',
    extract: (text) =>
      articlesFrom(
        text,
        [
          new RegExp(String.raw`^[ \t>+-]*\*\*Title:?\*\*:?[ \t]*(?:${LINK}|([^\n]+))$`, 'im'),
          new RegExp(String.raw`^[ \t>+-]*(?:\d+[.)][ \t]*)?\*\*${LINK}\*\*`, 'm'),
        ],
        titleAndUrl(1, 2, 3),
      ),
  },
  {
    name: 'headline-link',
    extract: (text) =>
      articlesFrom(
        text,
        [new RegExp(String.raw`^#{2,3}[ \t]*(?:\*\*)?[ \t]*(?:\d+[.)][ \t]*)?${LINK}`, 'm')],
        titleAndUrl(1, 2),
        'Extracted from headline',
      ),
  },
];

// ─── fact_check ───────────────────────────────────────────────────────

function verification(claim: string, fields: {
  assessment?: string;
  explanation?: string;
  confidence?: string;
  sources?: string[];
}): Verification {
  return {
    claim,
    assessment: fields.assessment || 'Unverified',
    explanation: fields.explanation ?? '',
    confidence: fields.confidence || 'unknown',
    sources: fields.sources ?? [],
  };
}

function tableCells(line: string): string[] {
  return line.trim().replace(/^\|/, '').replace(/\|$/, '').split('|').map((cell) => clean(cell));
}

function columnIndex(header: string[], pattern: RegExp): number {
  return header.findIndex((cell) => pattern.test(cell));
}

export const FACT_CHECK_RULES: ReadonlyArray<PatternRule<Verification>> = [
  {
    name: 'labelled-claims',
    extract: (text) =>
      anchors(
        text,
        [new RegExp(String.raw`^${LABEL_PREFIX}(?:\*\*)?Claim(?:[ \t]*#?\d+)?(?:\*\*)?[ \t]*:(?:\*\*)?[ \t]*(.+)$`, 'im')],
        (m) => clean(m[1] ?? '') || null,
      ).map(({ value, block }) =>
        verification(value, {
          assessment: field(block, ['Assessment', 'Verdict', 'Rating', 'Status']),
          explanation: field(block, ['Explanation', 'Reasoning']),
          confidence: field(block, ['Confidence']),
          sources: listField(block, ['Sources', 'Source']),
        }),
      ),
  },
  {
    name: 'claim-table',
    extract: (text) => {
      const lines = text.split('\n').map((line) => line.trim());
      const headerAt = lines.findIndex(
        (line) => line.startsWith('|') && tableCells(line).some((cell) => /^claims?$/i.test(cell)),
      );
      if (headerAt < 0) return [];

      const header = tableCells(lines[headerAt] ?? '');
      const col = {
        claim: columnIndex(header, /^claims?$/i),
        assessment: columnIndex(header, /assessment|verdict|rating|status/i),
        explanation: columnIndex(header, /explanation|reasoning|notes?/i),
        confidence: columnIndex(header, /confidence/i),
        sources: columnIndex(header, /sources?/i),
      };
      const cell = (row: string[], index: number) => (index >= 0 ? row[index] ?? '' : '');

      const out: Verification[] = [];
      for (const line of lines.slice(headerAt + 1)) {
        if (!line.startsWith('|')) break;
        if (/^\|[\s:|-]+\|?$/.test(line)) continue;
        const row = tableCells(line);
        const claim = cell(row, col.claim);
        if (!claim) continue;
        out.push(
          verification(claim, {
            assessment: cell(row, col.assessment),
            explanation: cell(row, col.explanation),
            confidence: cell(row, col.confidence),
            sources: cell(row, col.sources).split(/[,;]\s*/).map(clean).filter(Boolean),
          }),
        );
      }
      return out;
    },
  },
];

// ─── trend ────────────────────────────────────────────────────────────

function trendFrom(name: string, block: string, description: string): Trend {
  return {
    name,
    description,
    strength: field(block, ['Strength']) || 'unknown',
    supportingArticles: listField(block, ['Supporting Articles', 'Supporting Evidence', 'Articles']),
    timeframe: field(block, ['Timeframe', 'Time Frame']),
  };
}

export const TREND_RULES: ReadonlyArray<PatternRule<Trend>> = [
  {
    name: 'labelled-trends',
    extract: (text) =>
      anchors(
        text,
        [new RegExp(String.raw`^${LABEL_PREFIX}(?:\*\*)?Trend(?:[ \t]*#?\d+)?(?:\*\*)?[ \t]*:(?:\*\*)?[ \t]*(.+)$`, 'im')],
        (m) => clean(m[1] ?? '') || null,
      ).map(({ value, block }) => trendFrom(value, block, field(block, ['Description']))),
  },
  {
    name: 'heading-trends',
    extract: (text) =>
      anchors(text, [/^###[ \t]*(?:\d+[.)][ \t]*)?(.+)$/m], (m) => clean(m[1] ?? '') || null)
        .filter(({ block }) => field(block, ['Strength']) !== '')
        .map(({ value, block }) =>
          trendFrom(value, block, field(block, ['Description']) || firstProseLine(block)),
        ),
  },
];

export const META_TREND_LABELS = ['Meta-Trends', 'Meta Trends', 'Metatrends', 'Meta-Trend', 'Meta Trend'];

// ─── analysis ─────────────────────────────────────────────────────────

export const ANALYSIS_RULES: ReadonlyArray<PatternRule<AnalysisSections>> = [
  {
    name: 'labelled-sections',
    extract: (text) => {
      const trends = listField(text, ['Key Trends', 'Emerging Trends', 'Trends']);
      const implications = listField(text, ['Key Implications', 'Potential Implications', 'Implications']);
      if (trends.length === 0 && implications.length === 0) return [];
      const insights = section(text, ['Key Insights', 'Insights']) || text.trim();
      return [{ insights, trends, implications }];
    },
  },
];

// ─── write ────────────────────────────────────────────────────────────

export const WRITE_RULES: ReadonlyArray<PatternRule<string>> = [
  {
    name: 'summary-section',
    extract: (text) => {
      const summary = section(text, ['Summary', 'Executive Summary']);
      const points = listField(text, ['Key Points', 'Key Takeaways']);
      const parts = [summary, points.map((point) => `- ${point}`).join('\n')].filter(Boolean);
      return parts.length > 0 ? [parts.join('\n\n')] : [];
    },
  },
];
