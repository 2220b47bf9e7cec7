import { logger } from '../../utils/logger.js';
import { NarrativeUnavailableError, type NarrativeFailureReason } from '../../utils/errors.js';
import type { NarrativeService } from '../llm/NarrativeService.interface.js';
import type { MetricsBundle } from '../metrics/types.js';
import type { NarrativeBuilder } from './NarrativeBuilder.js';
import type {
  NarrativeFallbackReason,
  NarrativeLocale,
  NarrativePrompt,
  NarrativeResult,
} from './types.js';

export interface NarrativeGeneratorOptions {
  timeoutMs: number;
  /** 0 or 1; transient failures only. */
  maxRetries: number;
}

function toUnavailable(error: unknown): NarrativeUnavailableError {
  if (error instanceof NarrativeUnavailableError) return error;
  return new NarrativeUnavailableError(
    error instanceof Error ? error.message : 'Unknown narrative failure',
    'provider_error',
    false,
    error
  );
}

/**
 * Best-effort narrative. Always resolves: either the provider's text or the
 * fallback built from the metrics, tagged with why the fallback was used.
 */
export class NarrativeGenerator {
  constructor(
    private service: NarrativeService | null,
    private builder: NarrativeBuilder,
    private options: NarrativeGeneratorOptions
  ) {}

  async generate(metrics: MetricsBundle, locale: NarrativeLocale): Promise<NarrativeResult> {
    const service = this.service;
    if (!service) {
      return this.fallback(metrics, locale, 'disabled');
    }

    const prompt = this.builder.buildPrompt(metrics, locale);
    const maxAttempts = 1 + Math.min(Math.max(this.options.maxRetries, 0), 1);
    let reason: NarrativeFailureReason = 'provider_error';

    for (let attempt = 1; attempt <= maxAttempts; attempt++) {
      try {
        const text = (await this.attempt(service, prompt, locale)).trim();
        if (text.length === 0) {
          throw new NarrativeUnavailableError('Empty narrative response', 'empty_response', false);
        }

        logger.info(
          { provider: service.provider, attempt, length: text.length },
          'Narrative generated'
        );
        return { source: 'generated', text };
      } catch (error) {
        const failure = toUnavailable(error);
        reason = failure.reason;
        const willRetry = failure.transient && attempt < maxAttempts;

        logger.warn(
          { provider: service.provider, attempt, reason, willRetry, error: failure.message },
          'Narrative generation failed'
        );

        if (!willRetry) break;
      }
    }

    return this.fallback(metrics, locale, reason);
  }

  private async attempt(
    service: NarrativeService,
    prompt: NarrativePrompt,
    locale: NarrativeLocale
  ): Promise<string> {
    const controller = new AbortController();
    let timer: NodeJS.Timeout | undefined;

    const timeout = new Promise<never>((_, reject) => {
      timer = setTimeout(() => {
        controller.abort();
        reject(
          new NarrativeUnavailableError(
            `Narrative request timed out after ${this.options.timeoutMs}ms`,
            'timeout',
            true
          )
        );
      }, this.options.timeoutMs);
    });

    try {
      return await Promise.race([service.complete(prompt, { locale, signal: controller.signal }), timeout]);
    } finally {
      clearTimeout(timer);
    }
  }

  private fallback(
    metrics: MetricsBundle,
    locale: NarrativeLocale,
    reason: NarrativeFallbackReason
  ): NarrativeResult {
    return { source: 'fallback', text: this.builder.buildFallback(metrics, locale), reason };
  }
}
