import type { DocumentRenderer } from './DocumentRenderer.interface.js';
import type { ReportDocument } from '../report/types.js';

export class MarkdownRenderer implements DocumentRenderer {
  readonly mimeType = 'text/markdown; charset=utf-8';
  readonly extension = 'md';

  async render(document: ReportDocument): Promise<Buffer> {
    return Buffer.from(document.text, 'utf-8');
  }
}
