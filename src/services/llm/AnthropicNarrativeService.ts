import Anthropic from '@anthropic-ai/sdk';
import { config } from '../../config/index.js';
import { logger } from '../../utils/logger.js';
import { NarrativeUnavailableError } from '../../utils/errors.js';
import type { CompletionOptions, NarrativeService } from './NarrativeService.interface.js';
import type { NarrativePrompt } from '../narrative/types.js';

export function toNarrativeError(error: unknown): NarrativeUnavailableError {
  if (error instanceof NarrativeUnavailableError) return error;

  if (error instanceof Anthropic.APIConnectionTimeoutError || error instanceof Anthropic.APIUserAbortError) {
    return new NarrativeUnavailableError('Anthropic request timed out', 'timeout', true, error);
  }
  if (error instanceof Anthropic.APIConnectionError) {
    return new NarrativeUnavailableError('Anthropic connection failed', 'provider_error', true, error);
  }
  if (error instanceof Anthropic.APIError) {
    const status = error.status;
    const transient = status === undefined || status === 429 || status >= 500;
    return new NarrativeUnavailableError(`Anthropic API error (${status ?? 'no status'})`, 'provider_error', transient, error);
  }

  return new NarrativeUnavailableError('Anthropic request failed', 'provider_error', false, error);
}

export class AnthropicNarrativeService implements NarrativeService {
  readonly provider = 'anthropic';
  private client: Anthropic;

  constructor() {
    this.client = new Anthropic({
      apiKey: config.llm.apiKey,
      timeout: config.llm.timeoutMs,
      maxRetries: 0,
    });
  }

  async testConnection(): Promise<boolean> {
    try {
      await this.client.messages.create({
        model: config.llm.model,
        max_tokens: 10,
        messages: [{ role: 'user', content: 'test' }],
      });
      return true;
    } catch {
      return false;
    }
  }

  async complete(prompt: NarrativePrompt, options: CompletionOptions): Promise<string> {
    try {
      logger.debug(
        { provider: this.provider, locale: options.locale, promptLength: prompt.userPrompt.length },
        'Sending narrative request'
      );

      const message = await this.client.messages.create(
        {
          model: config.llm.model,
          max_tokens: config.llm.maxTokens,
          temperature: Math.min(config.llm.temperature, 1),
          system: prompt.systemPrompt,
          messages: [{ role: 'user', content: prompt.userPrompt }],
        },
        { signal: options.signal }
      );

      const text = message.content
        .map(block => (block.type === 'text' ? block.text : ''))
        .join('')
        .trim();

      if (!text) {
        throw new NarrativeUnavailableError('Empty response from Anthropic', 'empty_response', false);
      }

      return text;
    } catch (error) {
      throw toNarrativeError(error);
    }
  }
}
