/**
 * Pipeline Coordinator
 *
 * Drives one digest run through its stage graph:
 *   fetch → concurrent analysis fan-out → write → optional audio.
 *
 * States: init → fetching → (analyzing | failed) → writing → (audio | done) → done.
 * A fetch failure, or a fetch that yields no articles, is the only abort.
 * Every other stage failure is recorded and the run continues degraded.
 * Stage invocations, and every LLM call, live in ./stages.
 */

import { randomUUID } from 'node:crypto';
import { getConfig, type DigestConfig } from '../lib/config.js';
import { createProvider, getDefaultModel } from '../lib/llm.js';
import type { LLMProvider } from '../lib/llm-provider.js';
import logger, { createRunLogger, type Logger } from '../lib/logger.js';
import { NewsApiClient, type NewsService } from '../lib/news.js';
import { YahooQuoteClient, type QuoteService } from '../lib/quotes.js';
import { OpenAISpeechClient, type SpeechService } from '../lib/speech.js';
import { ModelResolver } from './model-resolver.js';
import { renderAnalysis, renderFactCheck, renderTrends } from './render.js';
import { StageExecutor, type StageInvocation } from './stage-executor.js';
import { analystStage } from './stages/analyst.js';
import { audioStage } from './stages/audio.js';
import { factCheckerStage } from './stages/fact-checker.js';
import { fetchStage } from './stages/fetch.js';
import { quoteStage } from './stages/quote.js';
import type { StageDeps } from './stages/shared.js';
import { trendAnalyzerStage } from './stages/trend-analyzer.js';
import { writerStage } from './stages/writer.js';
import { InMemoryTraceSink, NoopTraceSink, TraceContext, type TraceSink } from './trace.js';
import {
  PipelineRequestSchema,
  type AnalysisStage,
  type CoordinatorState,
  type FetchRecord,
  type NormalizedRecord,
  type PipelineOutput,
  type PipelineRequest,
  type PipelineRequestInput,
  type PipelineStatus,
  type RecordOf,
  type StageName,
  type StageResult,
} from './types.js';

// ─── Public API ───────────────────────────────────────────────────────

export interface CoordinatorDeps {
  llm: LLMProvider;
  news: NewsService;
  quotes: QuoteService;
  speech: SpeechService;
  /** Model used by every model-backed stage without an override. */
  defaultModel: string;
  /** Fresh sink per run; defaults to an in-memory sink. */
  createTraceSink?: () => TraceSink;
  stageTimeoutMs?: number;
  maxAttempts?: number;
  temperature?: number;
  maxTokens?: number;
  logger?: Logger;
}

const DEFAULT_STAGE_TIMEOUT_MS = 120_000;

const TRANSITIONS: Record<CoordinatorState, readonly CoordinatorState[]> = {
  init: ['fetching', 'failed'],
  fetching: ['analyzing', 'failed'],
  analyzing: ['writing'],
  writing: ['audio', 'done'],
  audio: ['done'],
  failed: [],
  done: [],
};

/** Labels for analysis-stage summaries in the writer's context block. */
const CONTEXT_LABELS: Record<AnalysisStage, string> = {
  analysis: 'Analysis',
  fact_check: 'Fact Check',
  trend: 'Trends',
  quote: 'Market Data',
};

function isAnalysisStage(stage: StageName): stage is AnalysisStage {
  return stage in CONTEXT_LABELS;
}

/** The analyst's full insights; every other stage contributes its summary. */
function contextText(record: NormalizedRecord): string {
  if (record.kind === 'analysis' && record.insights.trim()) return record.insights.trim();
  return record.summary.trim();
}

/**
 * Writer research notes: the fetch summary followed by each successful
 * analysis stage's contribution, in result order. Failed stages contribute
 * nothing.
 */
export function buildWriterContext(fetch: FetchRecord, results: readonly StageResult[]): string {
  const blocks = [`News Summary:\n${fetch.summary}`];
  for (const result of results) {
    if (!result.success || !isAnalysisStage(result.stage)) continue;
    const text = contextText(result.data);
    if (text) blocks.push(`${CONTEXT_LABELS[result.stage]}:\n${text}`);
  }
  return blocks.join('\n\n');
}

export type RequestValidation =
  | { success: true; data: PipelineRequest }
  | { success: false; issues: Array<{ path: string; message: string }> };

export function validatePipelineRequest(input: unknown): RequestValidation {
  const parsed = PipelineRequestSchema.safeParse(input);
  if (parsed.success) return { success: true, data: Object.freeze(parsed.data) };
  return {
    success: false,
    issues: parsed.error.issues.map((issue) => ({ path: issue.path.join('.'), message: issue.message })),
  };
}

function recordOf<K extends NormalizedRecord['kind']>(
  results: readonly StageResult[],
  stage: StageName,
  kind: K,
): RecordOf<K> | null {
  const result = results.find((r) => r.stage === stage);
  if (!result?.success) return null;
  const { data } = result;
  return isKind(data, kind) ? data : null;
}

function isKind<K extends NormalizedRecord['kind']>(record: NormalizedRecord, kind: K): record is RecordOf<K> {
  return record.kind === kind;
}

function failedResult(stage: StageName, reason: unknown): StageResult {
  const error = reason instanceof Error ? reason.message : String(reason);
  const result: StageResult = { stage, success: false, error: error || 'Unknown error', durationMs: 0 };
  return Object.freeze(result);
}

// ─── Coordinator ──────────────────────────────────────────────────────

interface RunState {
  readonly runId: string;
  readonly log: Logger;
  readonly trace: TraceContext;
  readonly results: StageResult[];
  state: CoordinatorState;
}

export class PipelineCoordinator {
  private readonly executor: StageExecutor;
  private readonly createTraceSink: () => TraceSink;
  private readonly stageTimeoutMs: number;
  private readonly log: Logger;

  constructor(private readonly deps: CoordinatorDeps) {
    this.log = deps.logger ?? logger;
    this.executor = new StageExecutor(this.log);
    this.createTraceSink = deps.createTraceSink ?? (() => new InMemoryTraceSink());
    this.stageTimeoutMs = deps.stageTimeoutMs ?? DEFAULT_STAGE_TIMEOUT_MS;
  }

  /**
   * Run the pipeline. Rejects only for an invalid request, before any stage
   * runs; every other failure is reported in the returned output.
   */
  async run(input: PipelineRequestInput): Promise<PipelineOutput> {
    const validation = validatePipelineRequest(input);
    if (!validation.success) {
      const detail = validation.issues.map((i) => (i.path ? `${i.path}: ${i.message}` : i.message)).join('; ');
      throw new Error(`Invalid pipeline request: ${detail}`);
    }
    const request = validation.data;

    const runId = randomUUID();
    const run: RunState = {
      runId,
      log: this.deps.logger
        ? this.deps.logger.child({ runId, category: request.category })
        : createRunLogger(runId, { category: request.category }),
      trace: new TraceContext(this.createTraceSink(), runId, {
        category: request.category,
        count: request.count,
      }),
      results: [],
      state: 'init',
    };

    try {
      return await this.drive(run, request);
    } catch (err) {
      // Stage errors never reach here; this guards the coordinator's own logic.
      const message = err instanceof Error ? err.message : String(err);
      run.log.error({ error: message }, 'Pipeline coordinator error');
      if (TRANSITIONS[run.state].includes('failed')) this.transition(run, 'failed');
      return this.finish(run, request, `Pipeline error: ${message}`, true);
    }
  }

  private async drive(run: RunState, request: PipelineRequest): Promise<PipelineOutput> {
    const resolver = new ModelResolver(request.modelOverrides, request.defaultModel ?? this.deps.defaultModel);
    const stageDeps: StageDeps = {
      llm: this.deps.llm,
      news: this.deps.news,
      quotes: this.deps.quotes,
      speech: this.deps.speech,
      temperature: request.temperature ?? this.deps.temperature ?? 0.3,
      maxTokens: this.deps.maxTokens ?? 4096,
      maxAttempts: this.deps.maxAttempts ?? 3,
    };
    const timeout = this.stageTimeoutMs;

    // fetching
    this.transition(run, 'fetching');
    const fetchResult = await this.execute(run, 'fetch', fetchStage(stageDeps, request, resolver.resolve('fetch'), timeout));
    const fetch = recordOf(run.results, 'fetch', 'fetch');

    if (!fetchResult.success || !fetch || fetch.articles.length === 0) {
      this.transition(run, 'failed');
      const message = fetchResult.success
        ? 'No articles could be extracted from the fetch stage; the run was aborted.'
        : `Fetch stage failed: ${fetchResult.error}`;
      return this.finish(run, request, message);
    }
    if (fetch.tier !== 'strict') {
      run.log.warn({ tier: fetch.tier, rule: fetch.rule, articles: fetch.articles.length }, 'Fetch output recovered below strict tier');
    }

    // analyzing: independent stages, settle-all, results kept in schedule order
    this.transition(run, 'analyzing');
    const scheduled: Array<{ stage: AnalysisStage; invocation: StageInvocation }> = [
      { stage: 'analysis', invocation: analystStage(stageDeps, request, fetch, resolver.resolve('analysis'), timeout) },
    ];
    if (request.useFactChecker) {
      scheduled.push({
        stage: 'fact_check',
        invocation: factCheckerStage(stageDeps, request, fetch, resolver.resolve('fact_check'), timeout),
      });
    }
    if (request.useTrendAnalyzer) {
      scheduled.push({
        stage: 'trend',
        invocation: trendAnalyzerStage(stageDeps, fetch, resolver.resolve('trend'), timeout),
      });
    }
    if (request.ticker) {
      scheduled.push({ stage: 'quote', invocation: quoteStage(stageDeps, request.ticker, timeout) });
    }

    run.log.info({ stages: scheduled.map((s) => s.stage) }, 'Running analysis stages');
    const settled = await Promise.allSettled(
      scheduled.map(({ stage, invocation }) => this.executor.execute(stage, invocation, run.trace)),
    );
    const analysisResults = settled.map((outcome, i) =>
      outcome.status === 'fulfilled' ? outcome.value : failedResult(scheduled[i]?.stage ?? 'analysis', outcome.reason),
    );
    run.results.push(...analysisResults);

    // writing
    this.transition(run, 'writing');
    const context = buildWriterContext(fetch, analysisResults);
    const writeResult = await this.execute(
      run,
      'write',
      writerStage(stageDeps, request, fetch, context, resolver.resolve('write'), timeout),
    );

    if (!writeResult.success) {
      this.transition(run, 'done');
      return this.finish(run, request, `Write stage failed: ${writeResult.error}. The digest summary is unavailable.`);
    }

    // audio (best effort)
    if (request.generateAudio) {
      this.transition(run, 'audio');
      await this.execute(run, 'audio', audioStage(stageDeps, writeResult.data.summary, request.voice, timeout));
    }

    this.transition(run, 'done');
    return this.finish(run, request);
  }

  private async execute(run: RunState, stage: StageName, invocation: StageInvocation): Promise<StageResult> {
    const result = await this.executor.execute(stage, invocation, run.trace);
    run.results.push(result);
    return result;
  }

  private transition(run: RunState, next: CoordinatorState): void {
    if (!TRANSITIONS[run.state].includes(next)) {
      throw new Error(`Illegal pipeline transition ${run.state} → ${next}`);
    }
    run.log.info({ from: run.state, to: next }, 'Pipeline state transition');
    run.state = next;
  }

  private finish(run: RunState, request: PipelineRequest, message?: string, aborted = false): PipelineOutput {
    const { results } = run;
    const failed = results.filter((r) => !r.success);
    const status: PipelineStatus =
      aborted || run.state === 'failed' ? 'failed' : failed.length > 0 ? 'degraded' : 'complete';

    const notes = message ? [message] : [];
    if (status === 'degraded') {
      const missing = failed.filter((r) => r.stage !== 'write').map((r) => r.stage);
      if (missing.length > 0) notes.push(`Missing sections: ${missing.join(', ')}.`);
    }

    const write = recordOf(results, 'write', 'write');
    const fetch = recordOf(results, 'fetch', 'fetch');
    const analysis = recordOf(results, 'analysis', 'analysis');
    const factCheck = recordOf(results, 'fact_check', 'fact_check');
    const trends = recordOf(results, 'trend', 'trend');
    const quote = recordOf(results, 'quote', 'quote')?.quote;
    const audioFile = recordOf(results, 'audio', 'audio')?.audioFile;

    run.trace.root.setData({ status, state: run.state, stages: results.length });
    if (status === 'failed') run.trace.root.setError({ message: notes.join(' ') });
    run.trace.root.close();

    run.log.info(
      { status, state: run.state, failed: failed.map((r) => r.stage) },
      'Pipeline run finished',
    );

    return Object.freeze({
      runId: run.runId,
      status,
      state: run.state,
      category: request.category,
      summary: write?.summary ?? '',
      ...(write && fetch ? { markdown: fetch.markdown } : {}),
      ...(analysis ? { analysis: renderAnalysis(analysis) } : {}),
      ...(factCheck ? { factCheck: renderFactCheck(factCheck) } : {}),
      ...(trends ? { trends: renderTrends(trends) } : {}),
      ...(quote ? { quote } : {}),
      ...(audioFile ? { audioFile } : {}),
      ...(notes.length > 0 ? { message: notes.join(' ') } : {}),
      stageResults: Object.freeze([...results]),
      spans: run.trace.snapshot(),
    });
  }
}

// ─── Factory ──────────────────────────────────────────────────────────

/** Coordinator wired to the configured collaborators. */
export function createCoordinator(config: DigestConfig = getConfig(), overrides: Partial<CoordinatorDeps> = {}): PipelineCoordinator {
  return new PipelineCoordinator({
    llm: overrides.llm ?? createProvider(config),
    news: overrides.news ?? new NewsApiClient(config.NEWS_API_KEY, config.NEWS_API_URL),
    quotes: overrides.quotes ?? new YahooQuoteClient(config.QUOTE_API_URL),
    speech:
      overrides.speech
      ?? new OpenAISpeechClient({
        apiKey: config.OPENAI_API_KEY,
        baseUrl: config.OPENAI_BASE_URL,
        model: config.TTS_MODEL,
        outputDir: config.OUTPUT_DIR,
      }),
    defaultModel: overrides.defaultModel ?? getDefaultModel(config),
    createTraceSink:
      overrides.createTraceSink
      ?? (config.ENABLE_TRACING ? () => new InMemoryTraceSink() : () => new NoopTraceSink()),
    stageTimeoutMs: overrides.stageTimeoutMs ?? config.STAGE_TIMEOUT_MS,
    maxAttempts: overrides.maxAttempts ?? config.LLM_MAX_ATTEMPTS,
    temperature: overrides.temperature ?? config.DIGEST_TEMPERATURE,
    maxTokens: overrides.maxTokens ?? config.MAX_TOKENS,
    logger: overrides.logger,
  });
}
