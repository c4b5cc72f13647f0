/**
 * Plain-text and Markdown renderings of normalized records. Used for derived
 * summaries, the writer's context block and the output text sections.
 */

import type {
  AnalysisRecord,
  Article,
  FactCheckRecord,
  StockQuote,
  Trend,
  TrendRecord,
  Verification,
} from './types.js';

export function articleDigest(articles: readonly Article[]): string {
  if (articles.length === 0) return 'No articles found.';
  const noun = articles.length === 1 ? 'article' : 'articles';
  return `${articles.length} ${noun}: ${articles.map((a) => a.title).join('; ')}`;
}

export function renderArticlesMarkdown(category: string, articles: readonly Article[]): string {
  const heading = `# Top ${category} news`;
  const items = articles.map((article, i) => {
    const title = article.url ? `[${article.title}](${article.url})` : article.title;
    const meta = [`Source: ${article.source}`, article.publishedAt && `Published: ${article.publishedAt}`]
      .filter(Boolean)
      .join(' | ');
    return `## ${i + 1}. ${title}\n\n${article.description}\n\n*${meta}*`;
  });
  return [heading, ...items].join('\n\n');
}

function bullets(items: readonly string[]): string {
  return items.map((item) => `- ${item}`).join('\n');
}

export function renderAnalysis(record: AnalysisRecord): string {
  const parts = [record.insights];
  if (record.trends.length > 0) parts.push(`Trends:\n${bullets(record.trends)}`);
  if (record.implications.length > 0) parts.push(`Implications:\n${bullets(record.implications)}`);
  return parts.join('\n\n');
}

export function verificationDigest(verifications: readonly Verification[]): string {
  if (verifications.length === 0) return 'No claims were checked.';
  return verifications.map((v) => `${v.claim} (${v.assessment}, confidence ${v.confidence})`).join('; ');
}

export function renderFactCheck(record: FactCheckRecord): string {
  if (record.verifications.length === 0) return record.summary;
  const claims = record.verifications.map((v) => {
    const lines = [`Claim: ${v.claim}`, `Assessment: ${v.assessment}`, `Confidence: ${v.confidence}`];
    if (v.explanation) lines.push(`Explanation: ${v.explanation}`);
    if (v.sources.length > 0) lines.push(`Sources: ${v.sources.join(', ')}`);
    return lines.join('\n');
  });
  return [record.summary, ...claims].join('\n\n');
}

export function trendDigest(trends: readonly Trend[]): string {
  if (trends.length === 0) return 'No trends identified.';
  return trends.map((t) => `${t.name} (${t.strength})`).join('; ');
}

export function renderTrends(record: TrendRecord): string {
  if (record.trends.length === 0) return record.summary;
  const trends = record.trends.map((t) => {
    const lines = [`Trend: ${t.name}`, `Strength: ${t.strength}`];
    if (t.description) lines.push(`Description: ${t.description}`);
    if (t.timeframe) lines.push(`Timeframe: ${t.timeframe}`);
    if (t.supportingArticles.length > 0) lines.push(`Supporting Articles: ${t.supportingArticles.join(', ')}`);
    return lines.join('\n');
  });
  const meta = record.metaTrends.length > 0 ? [`Meta-Trends:\n${bullets(record.metaTrends)}`] : [];
  return [record.summary, ...trends, ...meta].join('\n\n');
}

function price(value: number | null, currency: string): string {
  return value === null ? 'n/a' : `${value.toFixed(2)} ${currency}`;
}

export function describeQuote(quote: StockQuote): string {
  const parts = [`${quote.symbol} (${quote.companyName}) last traded at ${price(quote.currentPrice, quote.currency)}`];
  if (quote.previousClose !== null) {
    const change = ((quote.currentPrice - quote.previousClose) / quote.previousClose) * 100;
    if (Number.isFinite(change)) {
      parts.push(`${change >= 0 ? '+' : ''}${change.toFixed(2)}% vs previous close`);
    }
  }
  if (quote.dayLow !== null && quote.dayHigh !== null) {
    parts.push(`day range ${price(quote.dayLow, quote.currency)} to ${price(quote.dayHigh, quote.currency)}`);
  }
  return `${parts.join(', ')}.`;
}
