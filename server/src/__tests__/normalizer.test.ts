import { describe, it, expect } from 'vitest';
import { normalize, rawText } from '../agents/normalizer/index.js';
import type { RecordKind } from '../agents/types.js';

const KINDS: RecordKind[] = ['fetch', 'analysis', 'fact_check', 'trend', 'write', 'quote', 'audio'];

// ─── Totality ────────────────────────────────────────────────────────

describe('normalize: totality', () => {
  const inputs: Array<[string, unknown]> = [
    ['empty string', ''],
    ['whitespace', '  \n\t '],
    ['number', 42],
    ['null', null],
    ['undefined', undefined],
    ['unrelated object', { unexpected: true }],
    ['array', ['a']],
  ];

  for (const kind of KINDS) {
    for (const [label, input] of inputs) {
      it(`returns a raw ${kind} record for ${label}`, () => {
        const record = normalize(kind, input);

        expect(record.kind).toBe(kind);
        expect(record.tier).toBe('raw');
        expect(record.summary).toBe(rawText(input).trim());
      });
    }
  }

  it('gives raw records empty collections', () => {
    expect(normalize('fetch', '', { category: 'science' })).toEqual({
      kind: 'fetch',
      tier: 'raw',
      category: 'science',
      articles: [],
      markdown: '',
      summary: '',
    });
    expect(normalize('trend', 'Nothing stood out.')).toEqual({
      kind: 'trend',
      tier: 'raw',
      trends: [],
      metaTrends: [],
      summary: 'Nothing stood out.',
    });
    expect(normalize('quote', 'n/a')).toEqual({ kind: 'quote', tier: 'raw', quote: null, summary: 'n/a' });
  });
});

describe('rawText', () => {
  it('serializes non-string values', () => {
    expect(rawText('text')).toBe('text');
    expect(rawText(null)).toBe('');
    expect(rawText(7)).toBe('7');
    expect(rawText({ a: 1 })).toBe('{"a":1}');
  });
});

// ─── Strict tier ─────────────────────────────────────────────────────

describe('normalize: strict tier', () => {
  it('defaults missing optional fields', () => {
    const record = normalize('fact_check', '{"verifications":[{"claim":"Rates rose"}]}');

    expect(record).toEqual({
      kind: 'fact_check',
      tier: 'strict',
      verifications: [
        { claim: 'Rates rose', assessment: 'Unverified', explanation: '', confidence: 'unknown', sources: [] },
      ],
      summary: 'Rates rose (Unverified, confidence unknown)',
    });
  });

  it('accepts snake_case keys and source objects', () => {
    const record = normalize(
      'fetch',
      '{"articles":[{"title":"A","published_at":"2024-01-02","source":{"name":"Wire"}}]}',
    );

    expect(record).toEqual({
      kind: 'fetch',
      tier: 'strict',
      category: 'general',
      articles: [{ title: 'A', description: 'No description', url: '', source: 'Wire', publishedAt: '2024-01-02' }],
      markdown: '# Top general news\n\n## 1. A\n\nNo description\n\n*Source: Wire | Published: 2024-01-02*',
      summary: '1 article: A',
    });
  });

  it('wins over pattern rules that would also match', () => {
    const raw = JSON.stringify({
      articles: [{ title: 'Strict title', url: 'https://example.test/s' }],
      markdown: '## 1. [Pattern title](https://example.test/p)',
    });
    const record = normalize('fetch', raw);

    expect(record.tier).toBe('strict');
    expect(record.kind === 'fetch' && record.articles.map((a) => a.title)).toEqual(['Strict title']);
  });

  it('reads JSON wrapped in prose and fences', () => {
    const record = normalize('write', 'Here you go:\n```json\n{"summary": "Digest body"}\n```');

    expect(record).toEqual({ kind: 'write', tier: 'strict', summary: 'Digest body' });
  });

  it('drops unreadable list entries individually', () => {
    const record = normalize('fact_check', { verifications: [{ claim: '  ' }, { claim: 'Valid' }, 'junk'] });

    expect(record.tier).toBe('strict');
    expect(record.kind === 'fact_check' && record.verifications.map((v) => v.claim)).toEqual(['Valid']);
  });

  it('deduplicates articles by URL, ignoring a trailing slash', () => {
    const record = normalize('fetch', {
      articles: [
        { title: 'A', url: 'https://x.test/a' },
        { title: 'A again', url: 'https://x.test/a/' },
      ],
    });

    expect(record.kind === 'fetch' && record.articles.map((a) => a.title)).toEqual(['A']);
  });

  it('titles untitled articles and drops entries with nothing to show', () => {
    const record = normalize(
      'fetch',
      '{"summary":"s","articles":[{"url":"https://x.test/a","description":"d","source":"S"},{"source":"T"}]}',
    );

    expect(record).toMatchObject({
      kind: 'fetch',
      tier: 'strict',
      articles: [{ title: 'No title', description: 'd', url: 'https://x.test/a', source: 'S', publishedAt: '' }],
      summary: 's',
    });
  });

  it('keeps URLs that differ in path case and merges host case', () => {
    const record = normalize('fetch', {
      articles: [
        { title: 'Upper path', url: 'https://x.test/A' },
        { title: 'Lower path', url: 'https://x.test/a' },
        { title: 'Upper host', url: 'https://X.TEST/a/' },
      ],
    });

    expect(record.kind === 'fetch' && record.articles.map((a) => a.title)).toEqual(['Upper path', 'Lower path']);
  });

  it('derives a summary for an empty article list', () => {
    const record = normalize('fetch', { articles: [] }, { category: 'health' });

    expect(record).toEqual({
      kind: 'fetch',
      tier: 'strict',
      category: 'health',
      articles: [],
      markdown: '# Top health news',
      summary: 'No articles found.',
    });
  });

  it('describes a quote', () => {
    const record = normalize('quote', {
      symbol: 'ACME',
      companyName: 'Acme Corp',
      currency: 'USD',
      currentPrice: 110,
      previousClose: 100,
      dayHigh: 112,
      dayLow: 108,
      openPrice: null,
      volume: 1000,
      fiftyTwoWeekHigh: null,
      fiftyTwoWeekLow: null,
    });

    expect(record.tier).toBe('strict');
    expect(record.summary).toBe('ACME (Acme Corp) last traded at 110.00 USD, +10.00% vs previous close, day range 108.00 USD to 112.00 USD.');
  });

  it('summarizes audio results', () => {
    expect(normalize('audio', { audioFile: null }).summary).toBe('Audio was not generated.');
    expect(normalize('audio', { audioFile: '/tmp/a.mp3' })).toEqual({
      kind: 'audio',
      tier: 'strict',
      audioFile: '/tmp/a.mp3',
      summary: 'Audio saved to /tmp/a.mp3',
    });
  });
});

// ─── Pattern tier ────────────────────────────────────────────────────

describe('normalize: pattern tier', () => {
  it('extracts numbered article headings with their fields', () => {
    const text = [
      '# Top technology news',
      '',
      '## 1. [Chip output climbs](https://news.test/chips)',
      '',
      'Foundries report record wafer starts.',
      '',
      '*Source: Tech Wire | Published: 2024-05-01*',
      '',
      '## 2. [Battery plant opens](https://news.test/battery)',
      '',
      'A new plant begins production.',
    ].join('\n');

    const record = normalize('fetch', text, { category: 'technology' });

    expect(record).toEqual({
      kind: 'fetch',
      tier: 'pattern',
      rule: 'numbered-heading-link',
      category: 'technology',
      articles: [
        {
          title: 'Chip output climbs',
          url: 'https://news.test/chips',
          description: 'Foundries report record wafer starts.',
          source: 'Tech Wire',
          publishedAt: '2024-05-01',
        },
        {
          title: 'Battery plant opens',
          url: 'https://news.test/battery',
          description: 'A new plant begins production.',
          source: 'Unknown source',
          publishedAt: '',
        },
      ],
      markdown: text,
      summary: text,
    });
  });

  it('deduplicates pattern-tier articles', () => {
    const record = normalize('fetch', '## 1. [A](https://x.test/a)\n\n## 2. [A copy](https://x.test/a/)');

    expect(record.kind === 'fetch' && record.articles.map((a) => a.title)).toEqual(['A']);
  });

  it('reads labelled claims', () => {
    const text = [
      'Claim 1: Unemployment fell to 3.9%',
      'Assessment: Verified',
      'Explanation: Matches the labour bureau release.',
      'Confidence: high',
      'Sources: Bureau of Labor Statistics, Reuters',
      '',
      'Claim 2: The bridge opened in 1990',
      'Verdict: Disputed',
      'Confidence: low',
    ].join('\n');

    const record = normalize('fact_check', text);

    expect(record).toMatchObject({ tier: 'pattern', rule: 'labelled-claims' });
    expect(record.kind === 'fact_check' && record.verifications).toEqual([
      {
        claim: 'Unemployment fell to 3.9%',
        assessment: 'Verified',
        explanation: 'Matches the labour bureau release.',
        confidence: 'high',
        sources: ['Bureau of Labor Statistics', 'Reuters'],
      },
      { claim: 'The bridge opened in 1990', assessment: 'Disputed', explanation: '', confidence: 'low', sources: [] },
    ]);
  });

  it('reads labelled trends and meta-trends', () => {
    const text = [
      'Trend 1: AI chip demand',
      'Description: Orders for accelerators keep rising.',
      'Strength: strong',
      'Supporting Articles: Chip output climbs; Battery plant opens',
      'Timeframe: next 12 months',
      '',
      'Trend 2: Grid investment',
      'Strength: moderate',
      '',
      'Meta-Trends:',
      '- Industrial policy',
      '- Electrification',
    ].join('\n');

    const record = normalize('trend', text);

    expect(record).toEqual({
      kind: 'trend',
      tier: 'pattern',
      rule: 'labelled-trends',
      trends: [
        {
          name: 'AI chip demand',
          description: 'Orders for accelerators keep rising.',
          strength: 'strong',
          supportingArticles: ['Chip output climbs', 'Battery plant opens'],
          timeframe: 'next 12 months',
        },
        { name: 'Grid investment', description: '', strength: 'moderate', supportingArticles: [], timeframe: '' },
      ],
      metaTrends: ['Industrial policy', 'Electrification'],
      summary: text,
    });
  });

  it('reads analysis sections', () => {
    const text = [
      '## Key Insights',
      'Energy stories dominate today.',
      '',
      '## Key Trends',
      '- Grid upgrades',
      '- Solar expansion',
      '',
      'Implications: higher capex, policy focus',
    ].join('\n');

    expect(normalize('analysis', text)).toEqual({
      kind: 'analysis',
      tier: 'pattern',
      rule: 'labelled-sections',
      insights: 'Energy stories dominate today.',
      trends: ['Grid upgrades', 'Solar expansion'],
      implications: ['higher capex', 'policy focus'],
      summary: text,
    });
  });

  it('reads a summary section with key points', () => {
    const text = [
      '## Summary',
      'Markets were calm and energy led the news.',
      '',
      '### Key Points',
      '- Oil steady',
      '- Grid spending up',
    ].join('\n');

    expect(normalize('write', text)).toEqual({
      kind: 'write',
      tier: 'pattern',
      rule: 'summary-section',
      summary: 'Markets were calm and energy led the news.\n\n- Oil steady\n- Grid spending up',
    });
  });

  it('falls back to raw for prose with no structure', () => {
    expect(normalize('write', 'Just a plain paragraph.')).toEqual({
      kind: 'write',
      tier: 'raw',
      summary: 'Just a plain paragraph.',
    });
  });
});
