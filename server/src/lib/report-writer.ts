import { mkdir, writeFile } from 'node:fs/promises';
import path from 'node:path';
import type { PipelineOutput } from '../agents/types.js';
import logger from './logger.js';

function reportFileName(base: string, category: string, extension: string, now: Date): string {
  const safeCategory = category.replace(/[\s/]/g, '_');
  return `${base}_${safeCategory}_${Math.floor(now.getTime() / 1000)}.${extension}`;
}

async function writeReport(dir: string, fileName: string, content: string): Promise<string> {
  await mkdir(dir, { recursive: true });
  const filePath = path.join(dir, fileName);
  await writeFile(filePath, content, 'utf8');
  logger.info({ filePath }, 'Report saved');
  return filePath;
}

export async function saveMarkdownReport(
  markdown: string,
  dir: string,
  category: string,
  now = new Date(),
): Promise<string> {
  return writeReport(dir, reportFileName('news_report', category, 'md', now), markdown);
}

/** Plain-text rendering of a pipeline output, one section per populated field. */
export function renderFullReport(output: PipelineOutput, category: string): string {
  const sections = [`Full Report Summary for Category: ${category}`];
  if (output.summary) sections.push(`Summary:\n${output.summary}`);
  if (output.analysis) sections.push(`Analysis:\n${output.analysis}`);
  if (output.factCheck) sections.push(`Fact Check:\n${output.factCheck}`);
  if (output.trends) sections.push(`Trends:\n${output.trends}`);
  if (output.quote) sections.push(`Financial Data:\n${JSON.stringify(output.quote, null, 2)}`);
  if (output.message) sections.push(`Notes:\n${output.message}`);

  const stageLines = output.stageResults.map((result) =>
    result.success ? `  - ${result.stage}: Success` : `  - ${result.stage}: Failed: ${result.error}`,
  );
  sections.push(`Stage Results:\n${stageLines.join('\n')}`);
  return sections.join('\n\n') + '\n';
}

export async function saveFullReport(
  output: PipelineOutput,
  dir: string,
  category: string,
  now = new Date(),
): Promise<string> {
  return writeReport(
    dir,
    reportFileName('full_report_summary', category, 'txt', now),
    renderFullReport(output, category),
  );
}
