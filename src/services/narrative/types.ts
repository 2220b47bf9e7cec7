import type { NarrativeFailureReason } from '../../utils/errors.js';

export type NarrativeLocale = 'en' | 'th';

export interface NarrativePrompt {
  systemPrompt: string;
  userPrompt: string;
}

export type NarrativeFallbackReason = NarrativeFailureReason | 'disabled';

export type NarrativeResult =
  | { source: 'generated'; text: string }
  | { source: 'fallback'; text: string; reason: NarrativeFallbackReason };
