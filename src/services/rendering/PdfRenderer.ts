import PDFDocument from 'pdfkit';
import { logger } from '../../utils/logger.js';
import { DocumentRenderError } from '../../utils/errors.js';
import { parseTableRow } from '../report/tables.js';
import type { DocumentRenderer } from './DocumentRenderer.interface.js';
import type { ReportDocument } from '../report/types.js';

type PdfDoc = PDFKit.PDFDocument;

interface Fonts {
  regular: string;
  bold: string;
  table: string;
}

const MM = 72 / 25.4;
const MARGIN = 25 * MM;
const MAX_CELL_CHARS = 28;
const SEPARATOR_ROW = /^\|(\s*:?-{3,}:?\s*\|)+$/;
// Standard PDF fonts cover WinAnsi only.
const OUTSIDE_LATIN1 = /[^\u0000-\u00FF\u2013\u2014\u2018-\u201D\u2022\u2026]/;

export interface PdfRendererOptions {
  /** TTF/OTF font for body text; needed for scripts outside Latin-1, e.g. Thai. */
  fontPath?: string;
}

/** Widest cell per column, capped at `MAX_CELL_CHARS`. */
export function columnWidths(cells: readonly (readonly string[])[]): number[] {
  const widths: number[] = [];
  for (const row of cells) {
    row.forEach((cell, col) => {
      widths[col] = Math.min(MAX_CELL_CHARS, Math.max(widths[col] ?? 0, cell.length));
    });
  }
  return widths;
}

const stripInline = (text: string): string => text.replace(/\*\*(.+?)\*\*/g, '$1').replace(/^_(.+)_$/, '$1');

/**
 * Lays out the assembled Markdown report on A4 pages: headings, bullets,
 * rules, paragraphs, and pipe tables set in a fixed-width font.
 */
export class PdfRenderer implements DocumentRenderer {
  readonly mimeType = 'application/pdf';
  readonly extension = 'pdf';

  constructor(private options: PdfRendererOptions = {}) {}

  async render(document: ReportDocument): Promise<Buffer> {
    return new Promise<Buffer>((resolve, reject) => {
      try {
        const doc = new PDFDocument({
          size: 'A4',
          margin: MARGIN,
          info: { Title: document.header.title },
        });
        const chunks: Buffer[] = [];

        doc.on('data', (chunk: Buffer) => chunks.push(chunk));
        doc.on('end', () => {
          const buffer = Buffer.concat(chunks);
          logger.debug({ size: buffer.length }, 'PDF rendered');
          resolve(buffer);
        });
        doc.on('error', (error: unknown) => {
          reject(new DocumentRenderError('PDF conversion failed', error));
        });

        if (!this.options.fontPath && OUTSIDE_LATIN1.test(document.text)) {
          logger.warn(
            { title: document.header.title },
            'Report text is outside Latin-1 and no PDF font is configured; set REPORT_PDF_FONT_PATH to render it legibly'
          );
        }

        const fonts = this.registerFonts(doc);
        this.writeContent(doc, document.text, fonts);

        doc.end();
      } catch (error) {
        logger.error({ error }, 'Failed to render PDF report');
        reject(new DocumentRenderError('PDF conversion failed', error));
      }
    });
  }

  private registerFonts(doc: PdfDoc): Fonts {
    if (this.options.fontPath) {
      doc.registerFont('Body', this.options.fontPath);
      return { regular: 'Body', bold: 'Body', table: 'Body' };
    }
    return { regular: 'Helvetica', bold: 'Helvetica-Bold', table: 'Courier' };
  }

  private writeContent(doc: PdfDoc, text: string, fonts: Fonts): void {
    const lines = text.split(/\r?\n/);
    let table: string[] = [];

    const flushTable = () => {
      if (table.length > 0) {
        this.writeTable(doc, table, fonts.table);
        table = [];
      }
    };

    for (const raw of lines) {
      const line = raw.trimEnd();

      if (line.trimStart().startsWith('|')) {
        table.push(line.trim());
        continue;
      }
      flushTable();

      if (line.startsWith('# ')) {
        doc.font(fonts.bold).fontSize(20).text(stripInline(line.substring(2)), { align: 'center' });
        doc.moveDown(0.5);
      } else if (line.startsWith('## ')) {
        doc.moveDown(0.5);
        doc.font(fonts.bold).fontSize(14).text(stripInline(line.substring(3)));
        doc.moveDown(0.3);
      } else if (line.startsWith('- ')) {
        doc.font(fonts.regular).fontSize(10).text(`•  ${stripInline(line.substring(2))}`, { indent: 10 });
      } else if (/^-{3,}$/.test(line)) {
        const y = doc.y + 4;
        doc.moveTo(MARGIN, y).lineTo(doc.page.width - MARGIN, y).stroke();
        doc.moveDown(0.8);
      } else if (line.length === 0) {
        doc.moveDown(0.4);
      } else {
        doc.font(fonts.regular).fontSize(10).text(stripInline(line));
      }
    }
    flushTable();
  }

  private writeTable(doc: PdfDoc, rows: string[], font: string): void {
    const cells = rows.filter(row => !SEPARATOR_ROW.test(row)).map(parseTableRow);
    const widths = columnWidths(cells);
    const columnCount = widths.length;

    const format = (row: string[]) =>
      widths
        .map((width, col) => {
          const cell = row[col] ?? '';
          return (cell.length > width ? `${cell.substring(0, width - 1)}~` : cell).padEnd(width);
        })
        .join(' | ');

    doc.font(font).fontSize(columnCount > 8 ? 5.5 : 7);
    const bottom = doc.page.height - MARGIN;
    // Unwrapped text neither advances y nor breaks pages on its own.
    cells.forEach((row, index) => {
      if (doc.y + doc.currentLineHeight(true) > bottom) doc.addPage();
      doc.text(format(row), MARGIN, doc.y, { lineBreak: false });
      doc.moveDown(index === 0 ? 1.6 : 1.3);
    });
    doc.x = MARGIN;
    doc.fontSize(10).moveDown(0.5);
  }
}
