import defaultLogger, { type Logger } from '../lib/logger.js';
import type { LLMConfig } from '../lib/config.js';
import { createProvider, type LLMProvider } from '../lib/llm-provider.js';
import { withRetry, type RetryOptions } from '../lib/retry.js';
import { ANALYSIS_SYSTEM_PROMPT, buildAnalysisUserPrompt } from './prompts.js';

const MAX_RESUME_CHARS = 30_000;
const ANALYSIS_MAX_TOKENS = 2000;
const ANALYSIS_TEMPERATURE = 0.3;

/** Cuts `text` to at most `maxChars` UTF-16 units without splitting a surrogate pair. */
export function truncateResumeText(text: string, maxChars = MAX_RESUME_CHARS): string {
  if (text.length <= maxChars) return text;
  const lastKept = text.charCodeAt(maxChars - 1);
  const end = lastKept >= 0xd800 && lastKept <= 0xdbff ? maxChars - 1 : maxChars;
  return text.slice(0, end);
}

/** The language-model capability the pipeline depends on. */
export interface ResumeInference {
  infer(text: string, targetRole: string, logger?: Logger): Promise<string>;
}

export interface LLMResumeInferenceDeps {
  /** Overrides provider construction from config. */
  provider?: LLMProvider;
  retry?: Pick<RetryOptions, 'maxAttempts' | 'baseDelay' | 'sleep'>;
}

/**
 * Sends the segmented resume and target role to the configured chat model and
 * returns the raw assistant text. The provider is built on first use so a
 * missing key surfaces as a CredentialError for that call only.
 */
export class LLMResumeInference implements ResumeInference {
  private provider: LLMProvider | null;

  constructor(
    private readonly config: LLMConfig,
    private readonly deps: LLMResumeInferenceDeps = {},
  ) {
    this.provider = deps.provider ?? null;
  }

  async infer(text: string, targetRole: string, logger: Logger = defaultLogger): Promise<string> {
    this.provider ??= createProvider(this.config);
    const provider = this.provider;
    const resumeText = truncateResumeText(text);
    if (resumeText.length < text.length) {
      logger.warn({ chars: text.length, sentChars: resumeText.length }, 'Resume text truncated before analysis');
    }

    const startedAt = Date.now();
    const response = await withRetry(
      () => provider.chat({
        system: ANALYSIS_SYSTEM_PROMPT,
        messages: [{ role: 'user', content: buildAnalysisUserPrompt(targetRole, resumeText) }],
        max_tokens: ANALYSIS_MAX_TOKENS,
        temperature: ANALYSIS_TEMPERATURE,
      }),
      {
        ...this.deps.retry,
        onRetry: (attempt, error) => {
          logger.warn({ provider: provider.name, attempt, error: error.message }, 'Retrying analysis request');
        },
      },
    );

    logger.info(
      {
        provider: provider.name,
        model: provider.model,
        chars: response.text.length,
        input_tokens: response.usage.input_tokens,
        output_tokens: response.usage.output_tokens,
        latency_ms: Date.now() - startedAt,
      },
      'Model reply received',
    );
    return response.text.trim();
  }
}
