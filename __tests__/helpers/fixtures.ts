import type { IncidentRecord } from '../../src/domain/entities/Incident.js';
import { DEFAULT_SLA_THRESHOLDS } from '../../src/domain/sla.js';
import { ArtifactNotFoundError } from '../../src/utils/errors.js';
import { MetricsAggregator } from '../../src/services/metrics/MetricsAggregator.js';
import type { MetricsBundle } from '../../src/services/metrics/types.js';
import type { CompletionOptions, NarrativeService } from '../../src/services/llm/NarrativeService.interface.js';
import type { NarrativePrompt } from '../../src/services/narrative/types.js';
import { ReportMetadataBuilder } from '../../src/services/report/ReportMetadataBuilder.js';
import type { ArtifactMetadata } from '../../src/services/report/types.js';
import type { ArtifactPage, ListOptions, ReportStorage } from '../../src/services/storage/ReportStorage.interface.js';

export const at = (iso: string): Date => new Date(iso);

export function incident(overrides: Partial<IncidentRecord> = {}): IncidentRecord {
  return {
    id: 'INC-0',
    title: 'Untitled',
    description: '',
    status: 'Open',
    priority: 'High',
    department: 'IT',
    category: 'Network',
    createdAt: at('2025-01-01T00:00:00Z'),
    resolvedAt: null,
    ...overrides,
  };
}

/** One High incident resolved after 2h, one High incident still open. */
export function scenarioRecords(): IncidentRecord[] {
  return [
    incident({
      id: 'INC-1',
      title: 'Disk full',
      status: 'Resolved',
      resolvedAt: at('2025-01-01T02:00:00Z'),
    }),
    incident({ id: 'INC-2', title: 'Login page down', status: 'Open' }),
  ];
}

export const scenarioRaw = () => [
  {
    ID: 'INC-1',
    Title: 'Disk full',
    Description: 'Root volume at 100%',
    Status: 'Resolved',
    Priority: 'High',
    Department: 'IT',
    Category: 'Network',
    Created_Date: '2025-01-01T00:00',
    Resolution_Date: '2025-01-01T02:00',
    SLA_Status: 'Within SLA',
  },
  {
    ID: 'INC-2',
    Title: 'Login page down',
    Description: 'SSO returns 500',
    Status: 'Open',
    Priority: 'High',
    Department: 'IT',
    Category: 'Network',
    Created_Date: '2025-01-01T00:00',
    Resolution_Date: null,
    SLA_Status: 'Within SLA',
  },
];

export function scenarioMetrics(asOfIso = '2025-01-01T10:00:00Z'): MetricsBundle {
  return new MetricsAggregator(DEFAULT_SLA_THRESHOLDS).aggregate(scenarioRecords(), { asOf: at(asOfIso) });
}

export class FakeNarrativeService implements NarrativeService {
  readonly provider = 'fake';
  calls = 0;
  signals: AbortSignal[] = [];
  prompts: NarrativePrompt[] = [];

  constructor(private behaviour: (attempt: number) => Promise<string>) {}

  async complete(prompt: NarrativePrompt, options: CompletionOptions): Promise<string> {
    this.calls++;
    this.prompts.push(prompt);
    this.signals.push(options.signal);
    return this.behaviour(this.calls);
  }

  async testConnection(): Promise<boolean> {
    return true;
  }
}

export const neverResolves = (): Promise<string> => new Promise<string>(() => undefined);

export class InMemoryStorage implements ReportStorage {
  readonly files = new Map<string, Buffer>();
  private metadata = new ReportMetadataBuilder();

  async init(): Promise<void> {}

  async store(name: string, content: Buffer): Promise<ArtifactMetadata> {
    this.files.set(name, content);
    return this.metadata.build(name, this.metadata.parseName(name) ?? new Date(0), content.length);
  }

  async retrieve(name: string): Promise<Buffer> {
    const content = this.files.get(name);
    if (!content) throw new ArtifactNotFoundError(`Report not found: ${name}`, name);
    return content;
  }

  async list(options: ListOptions): Promise<ArtifactPage> {
    const items = Array.from(this.files, ([name, content]) =>
      this.metadata.build(name, this.metadata.parseName(name) ?? new Date(0), content.length)
    ).sort((a, b) => b.createdAt.localeCompare(a.createdAt) || b.name.localeCompare(a.name));
    return {
      items: items.slice(options.offset, options.offset + options.limit),
      total: items.length,
      limit: options.limit,
      offset: options.offset,
    };
  }

  async testConnection(): Promise<boolean> {
    return true;
  }
}
