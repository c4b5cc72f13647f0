import type Anthropic from '@anthropic-ai/sdk';
import { z } from 'zod';
import { getAnthropicClient } from './anthropic.js';

// ─── Shared interfaces ───────────────────────────────────────────────

export interface ChatParams {
  model: string;
  system: string;
  messages: ChatMessage[];
  max_tokens: number;
  temperature?: number;
  signal?: AbortSignal;
}

export interface ChatMessage {
  role: 'user' | 'assistant';
  content: string;
}

export interface ChatResponse {
  text: string;
  usage: { input_tokens: number; output_tokens: number };
}

export interface LLMProvider {
  readonly name: string;
  chat(params: ChatParams): Promise<ChatResponse>;
}

/** Hard ceiling for a single completion, independent of any stage deadline. */
const CHAT_TIMEOUT_MS = 180_000;

export function createCombinedAbortSignal(
  callerSignal: AbortSignal | undefined,
  timeoutMs: number,
): { signal: AbortSignal; cleanup: () => void } {
  const timeoutController = new AbortController();
  const combinedController = new AbortController();
  const timeout = setTimeout(() => {
    timeoutController.abort(new Error(`Timed out after ${timeoutMs}ms`));
  }, timeoutMs);
  timeout.unref?.();

  const abortCombined = (reason?: unknown) => {
    if (combinedController.signal.aborted) return;
    combinedController.abort(reason);
  };

  const onCallerAbort = () => abortCombined(callerSignal?.reason);
  const onTimeoutAbort = () => abortCombined(timeoutController.signal.reason);

  if (callerSignal) {
    if (callerSignal.aborted) {
      onCallerAbort();
    } else {
      callerSignal.addEventListener('abort', onCallerAbort, { once: true });
    }
  }
  timeoutController.signal.addEventListener('abort', onTimeoutAbort, { once: true });

  const cleanup = () => {
    clearTimeout(timeout);
    callerSignal?.removeEventListener('abort', onCallerAbort);
    timeoutController.signal.removeEventListener('abort', onTimeoutAbort);
  };

  return { signal: combinedController.signal, cleanup };
}

// ─── Anthropic provider ──────────────────────────────────────────────

export class AnthropicProvider implements LLMProvider {
  readonly name = 'anthropic';

  constructor(private readonly apiKey?: string) {}

  async chat(params: ChatParams): Promise<ChatResponse> {
    const anthropic = getAnthropicClient(this.apiKey);
    const messages: Anthropic.MessageParam[] = params.messages.map((m) => ({
      role: m.role,
      content: m.content,
    }));
    const response = await anthropic.messages.create(
      {
        model: params.model,
        max_tokens: params.max_tokens,
        system: params.system,
        messages,
        ...(params.temperature !== undefined && { temperature: params.temperature }),
      },
      { signal: params.signal, timeout: CHAT_TIMEOUT_MS },
    );

    let text = '';
    for (const block of response.content) {
      if (block.type === 'text') {
        text += block.text;
      }
    }

    return {
      text,
      usage: {
        input_tokens: response.usage?.input_tokens ?? 0,
        output_tokens: response.usage?.output_tokens ?? 0,
      },
    };
  }
}

// ─── OpenAI-compatible provider ──────────────────────────────────────

interface OpenAICompatibleConfig {
  apiKey: string;
  baseUrl: string;
}

export class OpenAICompatibleProvider implements LLMProvider {
  readonly name = 'openai';
  private apiKey: string;
  private baseUrl: string;

  constructor(config: OpenAICompatibleConfig) {
    this.apiKey = config.apiKey;
    this.baseUrl = config.baseUrl.replace(/\/$/, '');
  }

  async chat(params: ChatParams): Promise<ChatResponse> {
    const { signal: combinedSignal, cleanup: cleanupCombinedSignal } = createCombinedAbortSignal(
      params.signal,
      CHAT_TIMEOUT_MS,
    );
    try {
      const response = await fetch(`${this.baseUrl}/chat/completions`, {
        method: 'POST',
        headers: {
          'Content-Type': 'application/json',
          'Authorization': `Bearer ${this.apiKey}`,
        },
        body: JSON.stringify(this.buildRequestBody(params)),
        signal: combinedSignal,
      });

      if (!response.ok) {
        const errText = await response.text().catch(() => '');
        const err = new Error(`LLM API error ${response.status}: ${errText.slice(0, 500)}`);
        throw Object.assign(err, { status: response.status, headers: response.headers });
      }

      const parsed = OpenAIChatResponseSchema.safeParse(await response.json());
      if (!parsed.success) {
        throw new Error('LLM API returned an unexpected response shape');
      }
      const data = parsed.data;
      return {
        text: data.choices?.[0]?.message?.content ?? '',
        usage: {
          input_tokens: data.usage?.prompt_tokens ?? 0,
          output_tokens: data.usage?.completion_tokens ?? 0,
        },
      };
    } finally {
      cleanupCombinedSignal();
    }
  }

  private buildRequestBody(params: ChatParams): Record<string, unknown> {
    const body: Record<string, unknown> = {
      model: params.model,
      max_tokens: params.max_tokens,
      messages: [
        { role: 'system', content: params.system },
        ...params.messages,
      ],
    };
    if (params.temperature !== undefined) {
      body.temperature = params.temperature;
    }
    return body;
  }
}

// ─── OpenAI-compatible response shape (internal) ─────────────────────

const OpenAIChatResponseSchema = z.object({
  choices: z
    .array(z.object({ message: z.object({ content: z.string().nullish() }).optional() }))
    .optional(),
  usage: z
    .object({
      prompt_tokens: z.number().optional(),
      completion_tokens: z.number().optional(),
    })
    .optional(),
});
