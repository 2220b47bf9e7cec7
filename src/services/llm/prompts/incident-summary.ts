import type { NarrativeLocale } from '../../narrative/types.js';

export const PRESERVED_TECHNICAL_TERMS = [
  'SLA',
  'High',
  'Medium',
  'Low',
  'Resolved',
  'Unresolved',
  'Priority',
  'Status',
  'ID',
] as const;

export const INCIDENT_SUMMARY_SYSTEM_PROMPT = `You are an expert incident analyst.

Your task is to turn aggregated incident metrics into a short executive summary for an operations report.

CRITICAL RULES:
- Use only the figures provided; never invent numbers, incidents or causes
- Quote rates and durations exactly as given
- Write plain paragraphs, no headings, no tables, no Markdown lists
- Keep the summary under 300 words`;

const LANGUAGE_INSTRUCTIONS: Record<NarrativeLocale, string> = {
  en: 'Write the summary in English.',
  th: `Write the summary in Thai. Keep these technical terms in English: ${PRESERVED_TECHNICAL_TERMS.join(', ')}.`,
};

export const INCIDENT_SUMMARY_USER_PROMPT = (digest: string, locale: NarrativeLocale) => `
Analyze the following incident report data:

${digest}

Please provide:
1. A brief overview of the incident landscape
2. Key observations about priorities and categories
3. Notable trends in resolution and SLA compliance
4. Any significant patterns or concerns
5. Recommendations for improvement

${LANGUAGE_INSTRUCTIONS[locale]}
`;
