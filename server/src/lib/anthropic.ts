import Anthropic from '@anthropic-ai/sdk';

let anthropicClient: Anthropic | null = null;
let clientKey: string | null = null;

/**
 * Lazily create the Anthropic client so modules can be imported in test/dev
 * environments even when Anthropic credentials are not configured.
 */
export function getAnthropicClient(apiKey = process.env.ANTHROPIC_API_KEY): Anthropic {
  if (!apiKey) {
    throw new Error('ANTHROPIC_API_KEY environment variable is required when LLM_PROVIDER=anthropic');
  }
  if (!anthropicClient || clientKey !== apiKey) {
    anthropicClient = new Anthropic({ apiKey, maxRetries: 0 });
    clientKey = apiKey;
  }
  return anthropicClient;
}

export const ANTHROPIC_DEFAULT_MODEL = 'claude-3-5-sonnet-latest';
