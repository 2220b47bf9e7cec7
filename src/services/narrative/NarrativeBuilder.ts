import { fixed, percent } from '../../utils/format.js';
import type { BreakdownRow, MetricsBundle } from '../metrics/types.js';
import {
  INCIDENT_SUMMARY_SYSTEM_PROMPT,
  INCIDENT_SUMMARY_USER_PROMPT,
} from '../llm/prompts/incident-summary.js';
import type { NarrativeLocale, NarrativePrompt } from './types.js';

export const MAX_PROMPT_CHARS = 4000;
export const MAX_KEY_CHARS = 40;
export const TOP_BREACH_LIMIT = 5;

const TRUNCATION_MARKER = '\n[truncated]';

function truncateKey(key: string): string {
  const flat = key.replace(/\s+/g, ' ').trim();
  return flat.length > MAX_KEY_CHARS ? `${flat.substring(0, MAX_KEY_CHARS - 3)}...` : flat;
}

/** Rows with at least one breach, most breaches first; ties keep table order. */
export function topBreaches(rows: readonly BreakdownRow[], limit = TOP_BREACH_LIMIT): BreakdownRow[] {
  return rows
    .map((row, index) => ({ row, index }))
    .filter(({ row }) => row.breached > 0)
    .sort((a, b) => b.row.breached - a.row.breached || a.index - b.index)
    .slice(0, limit)
    .map(({ row }) => row);
}

function breachLines(rows: readonly BreakdownRow[]): string {
  const top = topBreaches(rows);
  if (top.length === 0) return '- none';
  return top.map(row => `- ${truncateKey(row.key)}: ${row.breached} breached of ${row.total}`).join('\n');
}

/**
 * Builds the summary prompt and the deterministic fallback text. Only metric
 * figures and group names reach the prompt; incident titles and descriptions
 * never do.
 */
export class NarrativeBuilder {
  buildDigest(metrics: MetricsBundle): string {
    const { totals, sla } = metrics;
    const priorityLines = metrics.byPriority.map(
      row =>
        `- ${truncateKey(row.key)}: total ${row.total}, resolved ${row.resolved}, ` +
        `breached ${row.breached}, pending ${row.pending}, compliance ${percent(row.complianceRate)}%`
    );

    return [
      `Incident Analysis (as of ${metrics.asOf}):`,
      `- Total Incidents: ${totals.total}`,
      `- Resolved: ${totals.resolved}`,
      `- Unresolved: ${totals.unresolved}`,
      `- Resolution Rate: ${percent(metrics.resolutionRate)}%`,
      `- Average Resolution Time: ${fixed(metrics.averageResolutionHours)} hours`,
      `- SLA Compliance Rate: ${percent(sla.complianceRate)}% ` +
        `(Within SLA: ${sla.withinSla}, Breached: ${sla.breached}, Pending: ${sla.pending})`,
      '',
      'Priority Breakdown:',
      priorityLines.length > 0 ? priorityLines.join('\n') : '- none',
      '',
      'Top SLA Breaches by Category:',
      breachLines(metrics.byCategory),
      '',
      'Top SLA Breaches by Department:',
      breachLines(metrics.byDepartment),
    ].join('\n');
  }

  buildPrompt(metrics: MetricsBundle, locale: NarrativeLocale): NarrativePrompt {
    let userPrompt = INCIDENT_SUMMARY_USER_PROMPT(this.buildDigest(metrics), locale);
    if (userPrompt.length > MAX_PROMPT_CHARS) {
      userPrompt = userPrompt.substring(0, MAX_PROMPT_CHARS - TRUNCATION_MARKER.length) + TRUNCATION_MARKER;
    }
    return { systemPrompt: INCIDENT_SUMMARY_SYSTEM_PROMPT, userPrompt };
  }

  buildFallback(metrics: MetricsBundle, locale: NarrativeLocale): string {
    const { totals, sla } = metrics;
    const asOfDate = metrics.asOf.substring(0, 10);
    const avg = fixed(metrics.averageResolutionHours);
    const rate = percent(sla.complianceRate);
    const worst = topBreaches(metrics.byCategory, 1)[0];

    if (locale === 'th') {
      if (totals.total === 0) {
        return `ไม่มีเหตุการณ์ที่รายงาน ณ วันที่ ${asOfDate}`;
      }
      const sentences = [
        `จากเหตุการณ์ทั้งหมด ${totals.total} รายการ ณ วันที่ ${asOfDate} ได้รับการแก้ไข (Resolved) แล้ว ${totals.resolved} รายการ และยังไม่ได้รับการแก้ไข (Unresolved) ${totals.unresolved} รายการ`,
        `เวลาเฉลี่ยในการแก้ไขคือ ${avg} ชั่วโมง`,
        `อัตราการปฏิบัติตาม SLA อยู่ที่ ${rate}% (ภายใน SLA ${sla.withinSla} รายการ เกิน SLA ${sla.breached} รายการ รอดำเนินการ ${sla.pending} รายการ)`,
      ];
      if (worst) {
        sentences.push(`หมวดหมู่ที่เกิน SLA มากที่สุดคือ ${truncateKey(worst.key)} (${worst.breached} รายการ)`);
      }
      return sentences.join(' ');
    }

    if (totals.total === 0) {
      return `No incidents were reported as of ${asOfDate}.`;
    }
    const sentences = [
      `Of the ${totals.total} incidents analysed as of ${asOfDate}, ${totals.resolved} were resolved and ${totals.unresolved} remain unresolved.`,
      `Average resolution time was ${avg} hours.`,
      `SLA compliance stood at ${rate}% (${sla.withinSla} within SLA, ${sla.breached} breached, ${sla.pending} pending).`,
    ];
    if (worst) {
      sentences.push(`The ${truncateKey(worst.key)} category recorded the most SLA breaches (${worst.breached}).`);
    }
    return sentences.join(' ');
  }
}
