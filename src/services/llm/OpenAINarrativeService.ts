import OpenAI from 'openai';
import { config } from '../../config/index.js';
import { logger } from '../../utils/logger.js';
import { NarrativeUnavailableError } from '../../utils/errors.js';
import type { CompletionOptions, NarrativeService } from './NarrativeService.interface.js';
import type { NarrativePrompt } from '../narrative/types.js';
import { OpenAIClientFactory, type OpenAICompatibleProvider } from './OpenAIClientFactory.js';

export function toNarrativeError(provider: string, error: unknown): NarrativeUnavailableError {
  if (error instanceof NarrativeUnavailableError) return error;

  if (error instanceof OpenAI.APIConnectionTimeoutError || error instanceof OpenAI.APIUserAbortError) {
    return new NarrativeUnavailableError(`${provider} request timed out`, 'timeout', true, error);
  }
  if (error instanceof OpenAI.APIConnectionError) {
    return new NarrativeUnavailableError(`${provider} connection failed`, 'provider_error', true, error);
  }
  if (error instanceof OpenAI.APIError) {
    const status = error.status;
    const transient = status === undefined || status === 429 || status >= 500;
    return new NarrativeUnavailableError(`${provider} API error (${status ?? 'no status'})`, 'provider_error', transient, error);
  }

  return new NarrativeUnavailableError(`${provider} request failed`, 'provider_error', false, error);
}

/** Serves OpenAI and OpenRouter; the client factory picks the base URL. */
export class OpenAINarrativeService implements NarrativeService {
  readonly provider: string;
  private client: OpenAI;

  constructor(provider: OpenAICompatibleProvider = 'openai', client: OpenAI = OpenAIClientFactory.getClient(provider)) {
    this.provider = provider;
    this.client = client;
  }

  async testConnection(): Promise<boolean> {
    try {
      await this.client.models.list();
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

      const startTime = Date.now();
      const completion = await this.client.chat.completions.create(
        {
          model: config.llm.model,
          messages: [
            { role: 'system', content: prompt.systemPrompt },
            { role: 'user', content: prompt.userPrompt },
          ],
          temperature: config.llm.temperature,
          max_tokens: config.llm.maxTokens,
        },
        { signal: options.signal }
      );

      logger.debug(
        { duration: `${Date.now() - startTime}ms`, tokensUsed: completion.usage?.total_tokens },
        'Received narrative response'
      );

      const content = completion.choices[0]?.message?.content?.trim();
      if (!content) {
        throw new NarrativeUnavailableError(`Empty response from ${this.provider}`, 'empty_response', false);
      }

      return content;
    } catch (error) {
      throw toNarrativeError(this.provider, error);
    }
  }
}
