import { mkdir, writeFile } from 'node:fs/promises';
import path from 'node:path';
import logger from './logger.js';

export interface SpeechService {
  /** Returns the written file path, or null when synthesis was not possible. */
  synthesize(text: string, voice: string, signal?: AbortSignal): Promise<string | null>;
}

export interface SpeechClientOptions {
  apiKey: string | undefined;
  baseUrl: string;
  model: string;
  outputDir: string;
  now?: () => Date;
}

/** Audio endpoints cap input at 4096 characters. */
const MAX_SPEECH_CHARS = 4096;

/** Strip Markdown syntax so headings and links read naturally aloud. */
export function prepareTextForSpeech(markdown: string): string {
  const text = markdown
    .replace(/^#{1,6}\s+(.+)$/gm, '$1.')
    .replace(/\[([^\]]+)\]\([^)]+\)/g, '$1')
    .replace(/\*\*([^*]+)\*\*/g, '$1')
    .replace(/\*([^*]+)\*/g, '$1')
    .replace(/^[*+-]\s+/gm, '- ')
    .replace(/[\\`]/g, '')
    .trim();
  if (text.length <= MAX_SPEECH_CHARS) return text;
  const ending = '... That concludes this summary.';
  return text.slice(0, MAX_SPEECH_CHARS - ending.length) + ending;
}

function dateFolder(date: Date): string {
  const pad = (n: number) => String(n).padStart(2, '0');
  return `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}`;
}

/** OpenAI-compatible `/audio/speech` client writing mp3 files under `output/YYYY-MM-DD/`. */
export class OpenAISpeechClient implements SpeechService {
  private readonly baseUrl: string;
  private readonly now: () => Date;

  constructor(private readonly options: SpeechClientOptions) {
    this.baseUrl = options.baseUrl.replace(/\/$/, '');
    this.now = options.now ?? (() => new Date());
  }

  async synthesize(text: string, voice: string, signal?: AbortSignal): Promise<string | null> {
    if (!this.options.apiKey) {
      logger.error('Cannot generate audio: OPENAI_API_KEY is not set');
      return null;
    }

    const input = prepareTextForSpeech(text);
    if (!input) return null;

    const now = this.now();
    const dir = path.join(this.options.outputDir, dateFolder(now));
    const filePath = path.join(dir, `news_summary_${Math.floor(now.getTime() / 1000)}.mp3`);

    try {
      logger.info({ voice, chars: input.length }, 'Generating speech');
      const response = await fetch(`${this.baseUrl}/audio/speech`, {
        method: 'POST',
        headers: {
          'Content-Type': 'application/json',
          'Authorization': `Bearer ${this.options.apiKey}`,
        },
        body: JSON.stringify({ model: this.options.model, voice, input }),
        signal,
      });
      if (!response.ok) {
        const body = await response.text().catch(() => '');
        logger.error({ status: response.status, body: body.slice(0, 300) }, 'Speech API request failed');
        return null;
      }

      const audio = Buffer.from(await response.arrayBuffer());
      await mkdir(dir, { recursive: true });
      await writeFile(filePath, audio);
      logger.info({ filePath, bytes: audio.byteLength }, 'Audio saved');
      return filePath;
    } catch (err) {
      if (signal?.aborted) throw err;
      logger.error({ error: err instanceof Error ? err.message : String(err) }, 'Error generating speech');
      return null;
    }
  }
}
