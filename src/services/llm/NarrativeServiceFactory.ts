import { config } from '../../config/index.js';
import { logger } from '../../utils/logger.js';
import type { NarrativeService } from './NarrativeService.interface.js';
import { OpenAINarrativeService } from './OpenAINarrativeService.js';
import { AnthropicNarrativeService } from './AnthropicNarrativeService.js';

export class NarrativeServiceFactory {
  private static instance: NarrativeService | null = null;

  /** `null` when narrative generation is disabled; callers fall back. */
  static createNarrativeService(): NarrativeService | null {
    if (this.instance) {
      return this.instance;
    }

    switch (config.llm.provider) {
      case 'openai':
        logger.info('Initializing OpenAI narrative service');
        this.instance = new OpenAINarrativeService('openai');
        break;
      case 'openrouter':
        logger.info('Initializing OpenRouter narrative service');
        this.instance = new OpenAINarrativeService('openrouter');
        break;
      case 'anthropic':
        logger.info('Initializing Anthropic narrative service');
        this.instance = new AnthropicNarrativeService();
        break;
      case 'disabled':
        logger.warn('LLM provider disabled; reports will use the fallback narrative');
        return null;
    }

    return this.instance;
  }

  static reset(): void {
    this.instance = null;
  }
}
