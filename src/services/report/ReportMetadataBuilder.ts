import { parseTimestamp } from '../validation/timestamps.js';
import type { ArtifactMetadata } from './types.js';

export const ARTIFACT_PREFIX = 'incident_report';

const NAME_PATTERN = new RegExp(`^${ARTIFACT_PREFIX}_(\\d{8})_(\\d{6})(?:_[A-Za-z0-9-]+)?\\.[A-Za-z0-9]+$`);

const MIME_TYPES: Record<string, string> = {
  pdf: 'application/pdf',
  md: 'text/markdown; charset=utf-8',
};

export interface ArtifactNameOptions {
  extension: string;
  /** Collision suffix supplied by the storage layer. */
  suffix?: string;
}

const pad = (n: number, width = 2): string => String(n).padStart(width, '0');

/**
 * Names and describes generated artifacts. Names carry the UTC generation
 * second and are not unique within it unless a suffix is given.
 */
export class ReportMetadataBuilder {
  buildName(generatedAt: Date, options: ArtifactNameOptions): string {
    const date = `${generatedAt.getUTCFullYear()}${pad(generatedAt.getUTCMonth() + 1)}${pad(generatedAt.getUTCDate())}`;
    const time = `${pad(generatedAt.getUTCHours())}${pad(generatedAt.getUTCMinutes())}${pad(generatedAt.getUTCSeconds())}`;
    const suffix = options.suffix ? `_${options.suffix}` : '';
    return `${ARTIFACT_PREFIX}_${date}_${time}${suffix}.${options.extension}`;
  }

  build(name: string, generatedAt: Date, sizeBytes: number | null = null): ArtifactMetadata {
    return {
      name,
      sizeBytes,
      createdAt: generatedAt.toISOString(),
      mimeType: this.mimeTypeFor(name),
    };
  }

  parseName(name: string): Date | null {
    const match = NAME_PATTERN.exec(name);
    if (!match) return null;

    const [, date, time] = match;
    return parseTimestamp(
      `${date.substring(0, 4)}-${date.substring(4, 6)}-${date.substring(6, 8)}T` +
        `${time.substring(0, 2)}:${time.substring(2, 4)}:${time.substring(4, 6)}Z`
    );
  }

  mimeTypeFor(name: string): string {
    const extension = name.substring(name.lastIndexOf('.') + 1).toLowerCase();
    return MIME_TYPES[extension] ?? 'application/octet-stream';
  }
}
