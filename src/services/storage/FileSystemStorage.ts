import { mkdir, writeFile, readFile, readdir, stat, access } from 'fs/promises';
import { constants } from 'fs';
import { join } from 'path';
import { config } from '../../config/index.js';
import { logger } from '../../utils/logger.js';
import { ArtifactNotFoundError, ReportStorageError } from '../../utils/errors.js';
import { ReportMetadataBuilder } from '../report/ReportMetadataBuilder.js';
import type { ArtifactMetadata } from '../report/types.js';
import type { ArtifactPage, ListOptions, ReportStorage } from './ReportStorage.interface.js';

const SAFE_NAME = /^[A-Za-z0-9_-][A-Za-z0-9._-]*$/;

function isNotFound(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

export class FileSystemStorage implements ReportStorage {
  constructor(
    private basePath: string = config.storage.reportPath,
    private metadata: ReportMetadataBuilder = new ReportMetadataBuilder()
  ) {}

  async init(): Promise<void> {
    try {
      await mkdir(this.basePath, { recursive: true });
      logger.info({ path: this.basePath }, 'Report storage initialized');
    } catch (error) {
      logger.error({ error, path: this.basePath }, 'Failed to initialize storage');
      throw new ReportStorageError('Storage initialization failed', error);
    }
  }

  async store(name: string, content: Buffer): Promise<ArtifactMetadata> {
    const path = this.resolve(name);
    try {
      await writeFile(path, new Uint8Array(content));
      logger.debug({ name, size: content.length }, 'Report stored');
      return this.metadata.build(name, this.metadata.parseName(name) ?? new Date(), content.length);
    } catch (error) {
      logger.error({ error, name }, 'Failed to store report');
      throw new ReportStorageError('Report storage failed', error);
    }
  }

  async retrieve(name: string): Promise<Buffer> {
    const path = this.resolve(name);
    try {
      const content = await readFile(path);
      logger.debug({ name, size: content.length }, 'Report retrieved');
      return content;
    } catch (error) {
      if (isNotFound(error)) {
        throw new ArtifactNotFoundError(`Report not found: ${name}`, name);
      }
      logger.error({ error, name }, 'Failed to retrieve report');
      throw new ReportStorageError('Report retrieval failed', error);
    }
  }

  async list(options: ListOptions): Promise<ArtifactPage> {
    try {
      const names = (await readdir(this.basePath)).filter(name => this.metadata.parseName(name) !== null);

      const items = await Promise.all(
        names.map(async name => {
          const info = await stat(join(this.basePath, name));
          return this.metadata.build(name, this.metadata.parseName(name) ?? info.mtime, info.size);
        })
      );

      items.sort((a, b) => b.createdAt.localeCompare(a.createdAt) || b.name.localeCompare(a.name));

      return {
        items: items.slice(options.offset, options.offset + options.limit),
        total: items.length,
        limit: options.limit,
        offset: options.offset,
      };
    } catch (error) {
      if (isNotFound(error)) {
        return { items: [], total: 0, limit: options.limit, offset: options.offset };
      }
      logger.error({ error, path: this.basePath }, 'Failed to list reports');
      throw new ReportStorageError('Report listing failed', error);
    }
  }

  async testConnection(): Promise<boolean> {
    try {
      await access(this.basePath, constants.W_OK);
      return true;
    } catch {
      return false;
    }
  }

  private resolve(name: string): string {
    if (!SAFE_NAME.test(name)) {
      throw new ArtifactNotFoundError(`Invalid report name: ${name}`, name);
    }
    return join(this.basePath, name);
  }
}
