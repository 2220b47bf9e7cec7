import type { NarrativeLocale, NarrativePrompt } from '../narrative/types.js';

export interface CompletionOptions {
  locale: NarrativeLocale;
  signal: AbortSignal;
}

export interface NarrativeService {
  readonly provider: string;
  /** Rejects with `NarrativeUnavailableError` on any provider failure. */
  complete(prompt: NarrativePrompt, options: CompletionOptions): Promise<string>;
  testConnection(): Promise<boolean>;
}
