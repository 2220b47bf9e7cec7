import OpenAI from 'openai';
import { config } from '../../config/index.js';

export type OpenAICompatibleProvider = 'openai' | 'openrouter';

const BASE_URLS: Record<OpenAICompatibleProvider, string | undefined> = {
  openai: undefined,
  openrouter: 'https://openrouter.ai/api/v1',
};

export class OpenAIClientFactory {
  private static clients = new Map<OpenAICompatibleProvider, OpenAI>();

  static getClient(provider: OpenAICompatibleProvider): OpenAI {
    const existing = this.clients.get(provider);
    if (existing) {
      return existing;
    }

    // NarrativeGenerator owns retries and the per-attempt deadline.
    const client = new OpenAI({
      apiKey: config.llm.apiKey,
      baseURL: BASE_URLS[provider],
      timeout: config.llm.timeoutMs,
      maxRetries: 0,
    });

    this.clients.set(provider, client);
    return client;
  }

  static reset(): void {
    this.clients.clear();
  }
}
