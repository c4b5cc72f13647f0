/**
 * Coordinator unit tests
 *
 * Drives full runs against in-process fakes (no network, no model calls).
 *
 * Coverage:
 *   1.  Full run: stage order, rendered sections, quote, audio, spans
 *   2.  Writer context: which summaries reach the writer
 *   3.  Fan-out isolation: one failed analysis stage degrades, never aborts
 *   4.  Deterministic result order regardless of completion order
 *   5.  Fetch aborts: error, empty news list, unreadable output
 *   6.  Write and audio failures
 *   7.  Model resolution per stage
 *   8.  Request validation
 */

import { describe, it, expect } from 'vitest';
import { buildWriterContext, validatePipelineRequest } from '../agents/coordinator.js';
import { NoopTraceSink } from '../agents/trace.js';
import type { FetchRecord, StageResult } from '../agents/types.js';
import {
  FETCH_MARKDOWN,
  FakeNews,
  FakeQuotes,
  FakeSpeech,
  QUOTE,
  buildHarness,
  type Reply,
} from './support/fakes.js';

const stagesOf = (results: readonly StageResult[]) => results.map((r) => r.stage);

function delayed(ms: number, text: string, track?: { active: number; peak: number }): Reply {
  return async () => {
    if (track) {
      track.active += 1;
      track.peak = Math.max(track.peak, track.active);
    }
    await new Promise((resolve) => setTimeout(resolve, ms));
    if (track) track.active -= 1;
    return text;
  };
}

// ─── 1. Full run ─────────────────────────────────────────────────────

describe('PipelineCoordinator.run: full run', () => {
  it('runs every stage in order and renders each section', async () => {
    const { coordinator, speech, quotes } = buildHarness();

    const output = await coordinator.run({
      category: 'technology',
      count: 2,
      ticker: 'ACME',
      generateAudio: true,
      voice: 'nova',
    });

    expect(output.status).toBe('complete');
    expect(output.state).toBe('done');
    expect(output.category).toBe('technology');
    expect(stagesOf(output.stageResults)).toEqual(['fetch', 'analysis', 'fact_check', 'trend', 'quote', 'write', 'audio']);
    expect(output.stageResults.every((r) => r.success)).toBe(true);

    expect(output.summary).toBe('## Summary\nChips and batteries lead the day.');
    expect(output.markdown).toBe(FETCH_MARKDOWN);
    expect(output.analysis).toBe('Supply chains are shifting.\n\nTrends:\n- Onshoring\n\nImplications:\n- Higher capex');
    expect(output.factCheck).toBe('Claims hold up.\n\nClaim: Record wafer starts\nAssessment: Verified\nConfidence: high');
    expect(output.trends).toBe(
      'Onshoring is accelerating.\n\nTrend: Onshoring\nStrength: strong\n\nMeta-Trends:\n- Industrial policy',
    );
    expect(output.quote).toEqual(QUOTE);
    expect(output.audioFile).toBe('/tmp/digest/news_summary_1714550400.mp3');
    expect(output.message).toBeUndefined();

    expect(quotes.symbols).toEqual(['ACME']);
    expect(speech.requests).toEqual([{ text: '## Summary\nChips and batteries lead the day.', voice: 'nova' }]);
  });

  it('freezes the output and every stage result', async () => {
    const { coordinator } = buildHarness();
    const output = await coordinator.run({});

    expect(Object.isFrozen(output)).toBe(true);
    expect(Object.isFrozen(output.stageResults)).toBe(true);
    expect(output.stageResults.every((r) => Object.isFrozen(r))).toBe(true);
  });

  it('records a root span with one child span per stage', async () => {
    const { coordinator } = buildHarness();
    const output = await coordinator.run({});

    const [root, ...children] = output.spans;
    expect(root?.name).toBe('pipeline_run');
    expect(root?.data).toMatchObject({ status: 'complete', state: 'done', stages: 5 });
    expect(root?.endedAt).not.toBeNull();
    expect(children.map((s) => s.name)).toEqual([
      'fetch_execution',
      'analysis_execution',
      'fact_check_execution',
      'trend_execution',
      'write_execution',
    ]);
    expect(children.every((s) => s.parentId === root?.id && s.endedAt !== null)).toBe(true);
  });

  it('returns no spans with a no-op trace sink', async () => {
    const { coordinator } = buildHarness({ createTraceSink: () => new NoopTraceSink() });
    const output = await coordinator.run({});

    expect(output.status).toBe('complete');
    expect(output.spans).toEqual([]);
  });

  it('skips disabled analysis stages', async () => {
    const { coordinator, llm } = buildHarness();
    const output = await coordinator.run({ useFactChecker: false, useTrendAnalyzer: false });

    expect(stagesOf(output.stageResults)).toEqual(['fetch', 'analysis', 'write']);
    expect(llm.calls.map((c) => c.stage)).toEqual(['fetch', 'analysis', 'write']);
    expect(output.factCheck).toBeUndefined();
    expect(output.trends).toBeUndefined();
  });

  it('passes the selection through to the news service', async () => {
    const news = new FakeNews();
    const { coordinator } = buildHarness({ news });
    await coordinator.run({ category: 'science', count: 3, country: 'gb', query: 'fusion', page: 2 });

    expect(news.queries).toHaveLength(1);
    expect(news.queries[0]).toMatchObject({
      category: 'science',
      count: 3,
      country: 'gb',
      query: 'fusion',
      page: 2,
      sources: undefined,
    });
  });
});

// ─── 2. Writer context ───────────────────────────────────────────────

describe('writer context', () => {
  it('carries the articles, the analyst insights and every successful summary in order', async () => {
    const { coordinator, llm } = buildHarness();
    await coordinator.run({ category: 'technology', ticker: 'ACME' });

    expect(llm.userFor('write')).toBe(
      [
        'Category: technology',
        '',
        'Articles:',
        '1. Chip output climbs',
        '   Source: Tech Wire',
        '   Published: 2024-05-01T08:00:00Z',
        '   Foundries report record wafer starts.',
        '   URL: https://news.test/chips',
        '',
        '2. Battery plant opens',
        '   Source: Energy Daily',
        '   Published: 2024-05-01T09:30:00Z',
        '   A new plant begins production.',
        '   URL: https://news.test/battery',
        '',
        'Research notes:',
        '',
        'News Summary:\nTwo stories on chips and batteries.',
        '',
        'Analysis:\nSupply chains are shifting.',
        '',
        'Fact Check:\nClaims hold up.',
        '',
        'Trends:\nOnshoring is accelerating.',
        '',
        'Market Data:\nACME (Acme Corp) last traded at 110.00 USD, +10.00% vs previous close, day range 108.00 USD to 112.00 USD.',
      ].join('\n'),
    );
  });

  it('buildWriterContext prefers analyst insights and leaves out failed stages', () => {
    const fetch: FetchRecord = {
      kind: 'fetch',
      tier: 'strict',
      category: 'general',
      articles: [],
      markdown: '',
      summary: 'Headlines.',
    };
    const results: StageResult[] = [
      { stage: 'analysis', success: true, data: { kind: 'analysis', tier: 'strict', insights: 'Long read.', trends: [], implications: [], summary: 'Read.' }, durationMs: 1 },
      { stage: 'trend', success: false, error: 'timed out', durationMs: 1 },
      { stage: 'fact_check', success: true, data: { kind: 'fact_check', tier: 'raw', verifications: [], summary: 'Checked.' }, durationMs: 1 },
    ];

    expect(buildWriterContext(fetch, results)).toBe(
      'News Summary:\nHeadlines.\n\nAnalysis:\nLong read.\n\nFact Check:\nChecked.',
    );
  });

  it('buildWriterContext falls back to the analysis summary without insights', () => {
    const fetch: FetchRecord = {
      kind: 'fetch',
      tier: 'strict',
      category: 'general',
      articles: [],
      markdown: '',
      summary: 'Headlines.',
    };
    const results: StageResult[] = [
      { stage: 'analysis', success: true, data: { kind: 'analysis', tier: 'raw', insights: '', trends: [], implications: [], summary: 'Read.' }, durationMs: 1 },
    ];

    expect(buildWriterContext(fetch, results)).toBe('News Summary:\nHeadlines.\n\nAnalysis:\nRead.');
  });
});

// ─── 3. Fan-out isolation ────────────────────────────────────────────

describe('analysis fan-out', () => {
  it('degrades when the trend stage fails and keeps it out of the writer context', async () => {
    const { coordinator, llm } = buildHarness({ replies: { trend: new Error('trend model down') } });
    const output = await coordinator.run({});

    expect(output.status).toBe('degraded');
    expect(output.state).toBe('done');
    const trend = output.stageResults.find((r) => r.stage === 'trend');
    expect(trend).toMatchObject({ success: false, error: 'trend model down', model: 'test-model' });
    expect(output.stageResults.filter((r) => r.stage !== 'trend').every((r) => r.success)).toBe(true);
    expect(output.trends).toBeUndefined();
    expect(output.analysis).toBeDefined();
    expect(output.summary).toBe('## Summary\nChips and batteries lead the day.');
    expect(output.message).toBe('Missing sections: trend.');

    expect(llm.userFor('write')).toContain('Fact Check:\nClaims hold up.');
    expect(llm.userFor('write')).not.toContain('Trends:');
  });

  it('lists every missing section in schedule order', async () => {
    const { coordinator } = buildHarness({
      replies: { fact_check: new Error('no'), analysis: new Error('no') },
    });
    const output = await coordinator.run({});

    expect(output.status).toBe('degraded');
    expect(output.message).toBe('Missing sections: analysis, fact_check.');
  });

  it('records a stage timeout as a failed result', async () => {
    const { coordinator } = buildHarness({
      stageTimeoutMs: 100,
      replies: { trend: () => new Promise<string>(() => {}) },
    });
    const output = await coordinator.run({});

    const trend = output.stageResults.find((r) => r.stage === 'trend');
    expect(trend).toMatchObject({ success: false, error: 'Stage trend timed out after 100ms' });
    expect(output.status).toBe('degraded');
  });

  it('fails the quote stage on a lookup error', async () => {
    const quotes = new FakeQuotes({ error: 'Failed to fetch data for ZZZZ: no price data', symbol: 'ZZZZ' });
    const { coordinator, llm } = buildHarness({ quotes });
    const output = await coordinator.run({ ticker: 'ZZZZ' });

    expect(output.stageResults.find((r) => r.stage === 'quote')).toMatchObject({
      success: false,
      error: 'Failed to fetch data for ZZZZ: no price data',
    });
    expect(output.quote).toBeUndefined();
    expect(output.message).toBe('Missing sections: quote.');
    expect(llm.userFor('write')).not.toContain('Market Data:');
  });
});

// ─── 4. Deterministic order ──────────────────────────────────────────

describe('result order', () => {
  it('keeps schedule order while the stages run concurrently', async () => {
    const track = { active: 0, peak: 0 };
    const { coordinator } = buildHarness({
      replies: {
        analysis: delayed(40, JSON.stringify({ insights: 'Slow insight.' }), track),
        fact_check: delayed(0, JSON.stringify({ verifications: [] }), track),
        trend: delayed(15, JSON.stringify({ trends: [] }), track),
      },
    });
    const output = await coordinator.run({});

    expect(stagesOf(output.stageResults)).toEqual(['fetch', 'analysis', 'fact_check', 'trend', 'write']);
    expect(track.peak).toBe(3);
    expect(output.status).toBe('complete');
  });
});

// ─── 5. Fetch aborts ─────────────────────────────────────────────────

describe('fetch abort', () => {
  it('fails the run when the fetch stage errors', async () => {
    const { coordinator, llm } = buildHarness({ replies: { fetch: new Error('fetch model down') } });
    const output = await coordinator.run({});

    expect(output.status).toBe('failed');
    expect(output.state).toBe('failed');
    expect(output.message).toBe('Fetch stage failed: fetch model down');
    expect(stagesOf(output.stageResults)).toEqual(['fetch']);
    expect(output.summary).toBe('');
    expect(llm.calls.map((c) => c.stage)).toEqual(['fetch']);
    expect(output.spans[0]?.error).toEqual({ message: 'Fetch stage failed: fetch model down' });
  });

  it('fails the run without a model call when the news service returns nothing', async () => {
    const { coordinator, llm } = buildHarness({ news: new FakeNews([]) });
    const output = await coordinator.run({});

    expect(output.status).toBe('failed');
    expect(output.message).toBe('No articles could be extracted from the fetch stage; the run was aborted.');
    expect(output.stageResults).toHaveLength(1);
    expect(output.stageResults[0]?.success).toBe(true);
    expect(llm.calls).toEqual([]);
  });

  it('fails the run when the fetch output has no readable articles', async () => {
    const { coordinator } = buildHarness({ replies: { fetch: 'Sorry, there is no news today.' } });
    const output = await coordinator.run({});

    expect(output.status).toBe('failed');
    expect(output.stageResults[0]).toMatchObject({ stage: 'fetch', success: true, data: { tier: 'raw' } });
  });

  it('continues when the fetch output leaves an article untitled', async () => {
    const { coordinator, llm } = buildHarness({
      replies: {
        fetch: JSON.stringify({ summary: 's', articles: [{ url: 'https://x.test/a', description: 'd', source: 'S' }] }),
      },
    });
    const output = await coordinator.run({ category: 'technology' });

    expect(output.status).toBe('complete');
    expect(llm.userFor('write')).toContain('1. No title\n   Source: S\n   d\n   URL: https://x.test/a');
  });

  it('continues on pattern-tier fetch output', async () => {
    const { coordinator } = buildHarness({
      replies: { fetch: '## 1. [Chip output climbs](https://news.test/chips)\n\nFoundries report record wafer starts.' },
    });
    const output = await coordinator.run({ category: 'technology' });

    expect(output.status).toBe('complete');
    expect(output.stageResults[0]).toMatchObject({
      stage: 'fetch',
      success: true,
      data: { kind: 'fetch', tier: 'pattern', rule: 'numbered-heading-link', category: 'technology' },
    });
  });
});

// ─── 6. Write and audio ──────────────────────────────────────────────

describe('write and audio stages', () => {
  it('finishes degraded without a summary when the writer fails', async () => {
    const { coordinator, speech } = buildHarness({ replies: { write: new Error('writer down') } });
    const output = await coordinator.run({ generateAudio: true });

    expect(output.status).toBe('degraded');
    expect(output.state).toBe('done');
    expect(output.summary).toBe('');
    expect(output.markdown).toBeUndefined();
    expect(output.analysis).toBeDefined();
    expect(output.message).toBe('Write stage failed: writer down. The digest summary is unavailable.');
    expect(stagesOf(output.stageResults)).not.toContain('audio');
    expect(speech.requests).toEqual([]);
  });

  it('treats a missing audio file as a completed stage', async () => {
    const { coordinator } = buildHarness({ speech: new FakeSpeech(null) });
    const output = await coordinator.run({ generateAudio: true });

    expect(output.status).toBe('complete');
    expect(output.audioFile).toBeUndefined();
    expect(output.stageResults.find((r) => r.stage === 'audio')).toMatchObject({
      success: true,
      data: { kind: 'audio', audioFile: null, summary: 'Audio was not generated.' },
    });
  });

  it('degrades on an audio error but keeps the digest', async () => {
    const { coordinator } = buildHarness({ speech: new FakeSpeech(new Error('tts down')) });
    const output = await coordinator.run({ generateAudio: true });

    expect(output.status).toBe('degraded');
    expect(output.summary).toBe('## Summary\nChips and batteries lead the day.');
    expect(output.message).toBe('Missing sections: audio.');
  });
});

// ─── 7. Model resolution ─────────────────────────────────────────────

describe('model selection', () => {
  it('uses per-stage overrides and the default elsewhere', async () => {
    const { coordinator, llm } = buildHarness();
    const output = await coordinator.run({ modelOverrides: { analysis: 'analysis-model', write: '  ' }, ticker: 'ACME' });

    expect(llm.modelFor('analysis')).toBe('analysis-model');
    expect(llm.modelFor('write')).toBe('test-model');
    expect(llm.modelFor('fetch')).toBe('test-model');
    const models = Object.fromEntries(output.stageResults.map((r) => [r.stage, r.model]));
    expect(models).toEqual({
      fetch: 'test-model',
      analysis: 'analysis-model',
      fact_check: 'test-model',
      trend: 'test-model',
      quote: undefined,
      write: 'test-model',
    });
  });

  it('uses the request default model over the configured one', async () => {
    const { coordinator, llm } = buildHarness();
    await coordinator.run({ defaultModel: 'request-model', useFactChecker: false, useTrendAnalyzer: false });

    expect(llm.calls.map((c) => c.params.model)).toEqual(['request-model', 'request-model', 'request-model']);
  });
});

// ─── 8. Request validation ───────────────────────────────────────────

describe('validatePipelineRequest', () => {
  it('fills defaults and freezes the request', () => {
    const result = validatePipelineRequest({});

    expect(result.success).toBe(true);
    if (!result.success) return;
    expect(result.data).toEqual({
      category: 'general',
      count: 5,
      modelOverrides: {},
      generateAudio: false,
      voice: 'alloy',
      summaryStyle: 'conversational',
      analysisDepth: 'moderate',
      useFactChecker: true,
      useTrendAnalyzer: true,
      maxFactClaims: 5,
    });
    expect(Object.isFrozen(result.data)).toBe(true);
  });

  it('rejects a negative count with a path', () => {
    const result = validatePipelineRequest({ count: -1 });

    expect(result.success).toBe(false);
    if (result.success) return;
    expect(result.issues).toHaveLength(1);
    expect(result.issues[0]?.path).toBe('count');
  });

  it('rejects unknown override stages and unknown categories', () => {
    const result = validatePipelineRequest({ category: 'weather', modelOverrides: { summarize: 'x' } });

    expect(result.success).toBe(false);
    if (result.success) return;
    expect(result.issues.map((i) => i.path).sort()).toEqual(['category', 'modelOverrides']);
  });

  it('makes run reject before any stage runs', async () => {
    const { coordinator, llm } = buildHarness();

    await expect(coordinator.run({ count: -1 })).rejects.toThrow('Invalid pipeline request: count:');
    expect(llm.calls).toEqual([]);
  });
});
