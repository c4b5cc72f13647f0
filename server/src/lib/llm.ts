import { AnthropicProvider, OpenAICompatibleProvider, type LLMProvider } from './llm-provider.js';
import { ANTHROPIC_DEFAULT_MODEL } from './anthropic.js';
import { getConfig, resolveProviderName, type DigestConfig } from './config.js';
import logger from './logger.js';
import { withRetry } from './retry.js';

export const OPENAI_DEFAULT_MODEL = 'gpt-4o';

// ─── Provider factory ────────────────────────────────────────────────

export function createProvider(config: DigestConfig = getConfig()): LLMProvider {
  if (resolveProviderName(config) === 'anthropic') {
    return new AnthropicProvider(config.ANTHROPIC_API_KEY);
  }
  if (!config.OPENAI_API_KEY) {
    throw new Error('OPENAI_API_KEY environment variable is required when LLM_PROVIDER=openai');
  }
  return new OpenAICompatibleProvider({
    apiKey: config.OPENAI_API_KEY,
    baseUrl: config.OPENAI_BASE_URL,
  });
}

/**
 * Pipeline default model: DIGEST_MODEL when set, otherwise the active
 * provider's flagship.
 */
export function getDefaultModel(config: DigestConfig = getConfig()): string {
  if (config.DIGEST_MODEL) return config.DIGEST_MODEL;
  return resolveProviderName(config) === 'anthropic' ? ANTHROPIC_DEFAULT_MODEL : OPENAI_DEFAULT_MODEL;
}

// ─── Completion helper ───────────────────────────────────────────────

export interface CompleteOptions {
  model: string;
  temperature?: number;
  maxTokens?: number;
  maxAttempts?: number;
  signal?: AbortSignal;
}

/**
 * Single system+user completion with transient-error retries.
 * Returns the raw text; shaping it is the normalizer's job.
 */
export async function complete(
  provider: LLMProvider,
  system: string,
  user: string,
  options: CompleteOptions,
): Promise<string> {
  const response = await withRetry(
    () => provider.chat({
      model: options.model,
      system,
      messages: [{ role: 'user', content: user }],
      max_tokens: options.maxTokens ?? 4096,
      temperature: options.temperature,
      signal: options.signal,
    }),
    {
      maxAttempts: options.maxAttempts ?? 3,
      signal: options.signal,
      onRetry: (attempt, error) => {
        logger.warn({ model: options.model, attempt, error: error.message }, 'LLM call retry');
      },
    },
  );

  logger.debug(
    { model: options.model, provider: provider.name, ...response.usage },
    'LLM completion finished',
  );
  return response.text;
}
