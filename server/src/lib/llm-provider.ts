import Anthropic from '@anthropic-ai/sdk';
import { z } from 'zod';
import type { LLMConfig } from './config.js';
import { CredentialError } from './errors.js';
import { createAnthropicClient, extractResponseText } from './anthropic.js';
import { HttpStatusError } from './retry.js';

// ─── Shared interfaces ───────────────────────────────────────────────

export interface ChatMessage {
  role: 'user' | 'assistant';
  content: string;
}

export interface ChatParams {
  system: string;
  messages: ChatMessage[];
  max_tokens: number;
  temperature?: number;
}

export interface ChatResponse {
  text: string;
  usage: { input_tokens: number; output_tokens: number };
}

export interface LLMProvider {
  readonly name: string;
  readonly model: string;
  chat(params: ChatParams): Promise<ChatResponse>;
}

// ─── Azure OpenAI provider (chat completions over REST) ──────────────

const chatCompletionSchema = z.object({
  choices: z
    .array(
      z.object({
        message: z
          .object({ content: z.string().nullish() })
          .nullish(),
      }),
    )
    .default([]),
  usage: z
    .object({
      prompt_tokens: z.number().nullish(),
      completion_tokens: z.number().nullish(),
    })
    .nullish(),
});

interface AzureOpenAIConfig {
  endpoint: string;
  apiKey: string;
  apiVersion: string;
  deployment: string;
  timeoutMs: number;
}

export class AzureOpenAIProvider implements LLMProvider {
  readonly name = 'azure-openai';
  readonly model: string;

  constructor(
    private readonly config: AzureOpenAIConfig,
    private readonly fetchImpl: typeof fetch = fetch,
  ) {
    this.model = config.deployment;
  }

  async chat(params: ChatParams): Promise<ChatResponse> {
    const url = `${this.config.endpoint}/openai/deployments/${encodeURIComponent(this.config.deployment)}`
      + `/chat/completions?api-version=${encodeURIComponent(this.config.apiVersion)}`;
    const response = await this.fetchImpl(url, {
      method: 'POST',
      headers: {
        'Content-Type': 'application/json',
        'api-key': this.config.apiKey,
      },
      body: JSON.stringify({
        messages: [
          { role: 'system', content: params.system },
          ...params.messages,
        ],
        max_tokens: params.max_tokens,
        ...(params.temperature !== undefined && { temperature: params.temperature }),
      }),
      signal: AbortSignal.timeout(this.config.timeoutMs),
    });

    if (!response.ok) {
      const errText = await response.text().catch(() => '');
      throw new HttpStatusError(
        `Azure OpenAI API error ${response.status}: ${errText.slice(0, 500)}`,
        response.status,
        response.headers.get('retry-after'),
      );
    }

    const data = chatCompletionSchema.parse(await response.json());
    return {
      text: data.choices[0]?.message?.content ?? '',
      usage: {
        input_tokens: data.usage?.prompt_tokens ?? 0,
        output_tokens: data.usage?.completion_tokens ?? 0,
      },
    };
  }
}

// ─── Anthropic provider ──────────────────────────────────────────────

export class AnthropicProvider implements LLMProvider {
  readonly name = 'anthropic';
  private client: Anthropic | null = null;

  constructor(
    private readonly apiKey: string | undefined,
    readonly model: string,
    private readonly timeoutMs: number,
  ) {}

  async chat(params: ChatParams): Promise<ChatResponse> {
    this.client ??= createAnthropicClient(this.apiKey, this.timeoutMs);
    const response = await this.client.messages.create({
      model: this.model,
      max_tokens: params.max_tokens,
      system: params.system,
      messages: params.messages,
      ...(params.temperature !== undefined && { temperature: params.temperature }),
    });

    return {
      text: extractResponseText(response),
      usage: {
        input_tokens: response.usage?.input_tokens ?? 0,
        output_tokens: response.usage?.output_tokens ?? 0,
      },
    };
  }
}

// ─── Provider factory ────────────────────────────────────────────────

export function createProvider(config: LLMConfig, fetchImpl: typeof fetch = fetch): LLMProvider {
  if (config.provider === 'anthropic') {
    return new AnthropicProvider(config.anthropic.apiKey, config.anthropic.model, config.timeoutMs);
  }

  const { endpoint, apiKey, apiVersion, deployment } = config.azure;
  if (!endpoint || !apiKey) {
    throw new CredentialError(
      'AZURE_OPENAI_ENDPOINT and AZURE_OPENAI_API_KEY are required when LLM_PROVIDER=azure-openai',
    );
  }
  return new AzureOpenAIProvider(
    { endpoint, apiKey, apiVersion, deployment, timeoutMs: config.timeoutMs },
    fetchImpl,
  );
}
