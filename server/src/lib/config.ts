import { z } from 'zod';
import logger from './logger.js';

// ─── Environment schema ──────────────────────────────────────────────

const booleanFlag = z
  .string()
  .optional()
  .transform((v) => v?.trim().toLowerCase() === 'true');

const positiveInt = (fallback: number) =>
  z
    .string()
    .optional()
    .transform((raw) => {
      const parsed = Number.parseInt(raw ?? '', 10);
      return Number.isFinite(parsed) && parsed > 0 ? parsed : fallback;
    });

const EnvSchema = z.object({
  NODE_ENV: z.enum(['development', 'test', 'production']).catch('development'),
  PORT: positiveInt(3001),

  /** `openai` talks to any OpenAI-compatible endpoint; `anthropic` uses the SDK. */
  LLM_PROVIDER: z.enum(['openai', 'anthropic']).optional().catch(undefined),
  OPENAI_API_KEY: z.string().min(1).optional(),
  OPENAI_BASE_URL: z.string().url().default('https://api.openai.com/v1'),
  ANTHROPIC_API_KEY: z.string().min(1).optional(),

  /** Pipeline-wide default model; per-stage overrides come with each request. */
  DIGEST_MODEL: z.string().min(1).optional(),
  DIGEST_TEMPERATURE: z.coerce.number().min(0).max(2).catch(0.3),
  MAX_TOKENS: positiveInt(4096),

  NEWS_API_KEY: z.string().min(1).optional(),
  NEWS_API_URL: z.string().url().default('https://newsapi.org/v2'),
  QUOTE_API_URL: z.string().url().default('https://query1.finance.yahoo.com/v8/finance/chart'),
  TTS_MODEL: z.string().min(1).default('tts-1'),

  STAGE_TIMEOUT_MS: positiveInt(120_000),
  LLM_MAX_ATTEMPTS: positiveInt(3),
  ENABLE_TRACING: booleanFlag,
  OUTPUT_DIR: z.string().min(1).default('output'),
  /** Comma-separated CORS origins for the HTTP server. */
  ALLOWED_ORIGINS: z.string().optional(),
});

export type DigestConfig = z.infer<typeof EnvSchema>;

let cachedConfig: DigestConfig | null = null;

/**
 * Parse and cache configuration from the process environment.
 * Empty strings are treated as unset so `.env` placeholders do not trip validation.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): DigestConfig {
  if (cachedConfig) return cachedConfig;

  const cleaned: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    if (typeof value === 'string' && value.trim() !== '') {
      cleaned[key] = value;
    }
  }

  const result = EnvSchema.safeParse(cleaned);
  if (!result.success) {
    logger.error({ issues: result.error.flatten().fieldErrors }, 'Invalid configuration');
    throw new Error('Invalid configuration');
  }

  cachedConfig = result.data;
  return cachedConfig;
}

export function getConfig(): DigestConfig {
  return cachedConfig ?? loadConfig();
}

/** Reset configuration cache (for testing) */
export function resetConfig(): void {
  cachedConfig = null;
}

/**
 * The provider that will serve completions: explicit LLM_PROVIDER wins,
 * otherwise whichever API key is present, preferring OpenAI-compatible.
 */
export function resolveProviderName(config: DigestConfig = getConfig()): 'openai' | 'anthropic' {
  if (config.LLM_PROVIDER) return config.LLM_PROVIDER;
  return config.OPENAI_API_KEY || !config.ANTHROPIC_API_KEY ? 'openai' : 'anthropic';
}
