import Anthropic from '@anthropic-ai/sdk';
import { CredentialError } from './errors.js';

export function createAnthropicClient(apiKey: string | undefined, timeoutMs: number): Anthropic {
  if (!apiKey) {
    throw new CredentialError('ANTHROPIC_API_KEY is required when LLM_PROVIDER=anthropic');
  }
  // withRetry owns retries.
  return new Anthropic({ apiKey, timeout: timeoutMs, maxRetries: 0 });
}

/**
 * Concatenate the text blocks of an Anthropic response.
 */
export function extractResponseText(response: Anthropic.Message): string {
  return response.content
    .map((block) => (block.type === 'text' ? block.text : ''))
    .join('');
}
