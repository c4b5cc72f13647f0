#!/usr/bin/env node
import { parseArgs } from 'node:util';
import { fileURLToPath } from 'node:url';
import path from 'node:path';
import { createCoordinator, validatePipelineRequest } from './agents/coordinator.js';
import { LoggerTraceSink } from './agents/trace.js';
import type { PipelineOutput } from './agents/types.js';
import { getConfig } from './lib/config.js';
import logger from './lib/logger.js';
import { saveFullReport, saveMarkdownReport } from './lib/report-writer.js';

const USAGE = `Usage: digest [options]

Selection
  --category <name>       business | entertainment | general | health | science | sports | technology
  --count <n>             number of articles (1-10, default 5)
  --query <text>          keyword search
  --country <code>        2-letter country code
  --sources <ids>         comma-separated source ids (overrides country/category)
  --page <n>              result page
  --ticker <symbol>       add market data for a stock symbol

Models
  --model <id>            default model for every stage
  --model-<stage> <id>    override for fetch | analysis | fact-check | trend | write
  --temperature <n>       0-2

Output
  --style <name>          formal | conversational | brief
  --depth <name>          basic | moderate | deep
  --max-claims <n>        claims to fact-check (1-20, default 5)
  --no-fact-check         skip the fact-check stage
  --no-trends             skip the trend stage
  --audio                 synthesize the summary to an mp3
  --voice <name>          alloy | echo | fable | onyx | nova | shimmer
  --save                  write Markdown and full-text reports
  --output-dir <dir>      report directory (default OUTPUT_DIR)
  --json                  print the full output as JSON
  --trace-log             debug-log every trace span
  -h, --help              show this help`;

const OPTIONS = {
  category: { type: 'string' },
  count: { type: 'string' },
  query: { type: 'string' },
  country: { type: 'string' },
  sources: { type: 'string' },
  page: { type: 'string' },
  ticker: { type: 'string' },
  model: { type: 'string' },
  'model-fetch': { type: 'string' },
  'model-analysis': { type: 'string' },
  'model-fact-check': { type: 'string' },
  'model-trend': { type: 'string' },
  'model-write': { type: 'string' },
  temperature: { type: 'string' },
  style: { type: 'string' },
  depth: { type: 'string' },
  'max-claims': { type: 'string' },
  'no-fact-check': { type: 'boolean', default: false },
  'no-trends': { type: 'boolean', default: false },
  audio: { type: 'boolean', default: false },
  voice: { type: 'string' },
  save: { type: 'boolean', default: false },
  'output-dir': { type: 'string' },
  json: { type: 'boolean', default: false },
  'trace-log': { type: 'boolean', default: false },
  help: { type: 'boolean', short: 'h', default: false },
} as const;

export interface CliOptions {
  /** Unvalidated request fields; see validatePipelineRequest. */
  request: Record<string, unknown>;
  save: boolean;
  outputDir?: string;
  json: boolean;
  traceLog: boolean;
  help: boolean;
}

function toNumber(value: string | undefined): number | undefined {
  return value === undefined ? undefined : Number(value);
}

/**
 * Build a request from CLI flags. Values are passed through as typed
 * (numbers parsed, enums untouched) so request validation reports bad input.
 */
export function parseCliArgs(argv: string[]): CliOptions {
  const { values } = parseArgs({ args: argv, options: OPTIONS, strict: true, allowPositionals: false });

  const modelOverrides: Record<string, string> = {};
  const stageFlags = [
    ['fetch', values['model-fetch']],
    ['analysis', values['model-analysis']],
    ['fact_check', values['model-fact-check']],
    ['trend', values['model-trend']],
    ['write', values['model-write']],
  ] as const;
  for (const [stage, model] of stageFlags) {
    if (model !== undefined) modelOverrides[stage] = model;
  }

  const request: Record<string, unknown> = {
    category: values.category,
    count: toNumber(values.count),
    query: values.query,
    country: values.country,
    sources: values.sources,
    page: toNumber(values.page),
    ticker: values.ticker,
    modelOverrides,
    defaultModel: values.model,
    temperature: toNumber(values.temperature),
    summaryStyle: values.style,
    analysisDepth: values.depth,
    maxFactClaims: toNumber(values['max-claims']),
    useFactChecker: !values['no-fact-check'],
    useTrendAnalyzer: !values['no-trends'],
    generateAudio: values.audio,
    voice: values.voice,
  };

  return {
    request,
    save: values.save,
    outputDir: values['output-dir'],
    json: values.json,
    traceLog: values['trace-log'],
    help: values.help,
  };
}

/** Fixed-width stage table for terminal output. */
export function formatStageTable(output: PipelineOutput): string {
  const rows = output.stageResults.map((r) => [
    r.stage,
    r.success ? 'ok' : 'FAILED',
    r.model ?? '-',
    `${r.durationMs}ms`,
    r.success ? r.data.tier : r.error,
  ]);
  const header = ['stage', 'status', 'model', 'time', 'detail'];
  const widths = header.map((h, i) => Math.max(h.length, ...rows.map((row) => (row[i] ?? '').length)));
  const line = (cells: string[]) => cells.map((cell, i) => cell.padEnd(widths[i] ?? 0)).join('  ').trimEnd();
  return [line(header), line(widths.map((w) => '-'.repeat(w))), ...rows.map(line)].join('\n');
}

export async function main(argv = process.argv.slice(2)): Promise<number> {
  let options: CliOptions;
  try {
    options = parseCliArgs(argv);
  } catch (err) {
    process.stderr.write(`${err instanceof Error ? err.message : String(err)}\n\n${USAGE}\n`);
    return 2;
  }
  if (options.help) {
    process.stdout.write(`${USAGE}\n`);
    return 0;
  }

  const validation = validatePipelineRequest(options.request);
  if (!validation.success) {
    const lines = validation.issues.map((i) => `  ${i.path || 'request'}: ${i.message}`);
    process.stderr.write(`Invalid options:\n${lines.join('\n')}\n`);
    return 2;
  }

  const config = getConfig();
  const coordinator = createCoordinator(config, {
    createTraceSink: options.traceLog ? () => new LoggerTraceSink(logger) : undefined,
  });
  const output = await coordinator.run(validation.data);

  if (options.json) {
    process.stdout.write(`${JSON.stringify(output, null, 2)}\n`);
  } else {
    const sections = [
      `# Daily digest: ${output.category} (${output.status})`,
      output.summary || '(no summary)',
      output.message ? `Note: ${output.message}` : '',
      output.audioFile ? `Audio: ${output.audioFile}` : '',
      formatStageTable(output),
    ].filter(Boolean);
    process.stdout.write(`${sections.join('\n\n')}\n`);
  }

  if (options.save && output.status !== 'failed') {
    const dir = options.outputDir ?? config.OUTPUT_DIR;
    const saved = [await saveFullReport(output, dir, output.category)];
    if (output.markdown) saved.push(await saveMarkdownReport(output.markdown, dir, output.category));
    process.stdout.write(`Saved: ${saved.join(', ')}\n`);
  }

  return output.status === 'failed' ? 1 : 0;
}

function isMainModule(): boolean {
  const entry = process.argv[1];
  if (!entry) return false;
  return path.resolve(entry) === path.resolve(fileURLToPath(import.meta.url));
}

if (isMainModule()) {
  main().then(
    (code) => {
      process.exitCode = code;
    },
    (err: unknown) => {
      logger.error({ err }, 'digest failed');
      process.exitCode = 1;
    },
  );
}
