import type { ArtifactMetadata } from '../report/types.js';

export interface ListOptions {
  limit: number;
  offset: number;
}

export interface ArtifactPage {
  items: ArtifactMetadata[];
  total: number;
  limit: number;
  offset: number;
}

export interface ReportStorage {
  init(): Promise<void>;
  store(name: string, content: Buffer): Promise<ArtifactMetadata>;
  retrieve(name: string): Promise<Buffer>;
  /** Newest first. */
  list(options: ListOptions): Promise<ArtifactPage>;
  testConnection(): Promise<boolean>;
}
