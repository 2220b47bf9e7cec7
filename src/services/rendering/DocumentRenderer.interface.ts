import type { ReportDocument } from '../report/types.js';

export interface DocumentRenderer {
  readonly mimeType: string;
  readonly extension: string;
  /** Rejects with `DocumentRenderError` when conversion fails. */
  render(document: ReportDocument): Promise<Buffer>;
}
