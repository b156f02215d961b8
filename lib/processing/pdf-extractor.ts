/**
 * PDF Text Extraction Service
 *
 * Uses PDF.js (legacy Node build) to turn a statement PDF into ordered
 * page lines. Image-only documents are rejected: OCR is not supported.
 */

import { readFile } from 'node:fs/promises';
import type {
  PDFDocumentProxy,
  TextItem,
  TextMarkedContent,
} from 'pdfjs-dist/types/src/display/api';
import { ExtractionError } from '@/lib/errors';
import type { PageLines } from '@/types/statement';

// ============================================
// Types
// ============================================

/**
 * Result of PDF text extraction.
 */
export interface PDFExtractionResult {
  /** Trimmed, non-empty lines per page */
  pageLines: PageLines;

  /** Number of pages in the PDF */
  pageCount: number;

  /** Extraction time in milliseconds */
  extractionTimeMs: number;
}

/**
 * A file path or the raw bytes of a PDF.
 */
export type PDFSource = string | Uint8Array;

// ============================================
// Constants
// ============================================

/**
 * Vertical distance (in PDF units) that starts a new line.
 */
const LINE_Y_TOLERANCE = 2;

// ============================================
// Error Class
// ============================================

/**
 * Custom error for PDF extraction failures.
 */
export class PDFExtractionError extends ExtractionError {
  constructor(message: string, code: string = 'PDF_EXTRACTION_ERROR') {
    super(message, code, false);
    this.name = 'PDFExtractionError';
    Object.setPrototypeOf(this, PDFExtractionError.prototype);
  }
}

// ============================================
// Line grouping
// ============================================

function isTextItem(item: TextItem | TextMarkedContent): item is TextItem {
  return 'str' in item;
}

/**
 * Join text items into page text, breaking lines on the EOL flag or a
 * change in Y position.
 */
export function joinTextItems(items: Array<TextItem | TextMarkedContent>): string {
  const textItems = items.filter(isTextItem);

  return textItems
    .map((item, idx) => {
      let text = item.str;
      if (item.hasEOL) {
        text += '\n';
      } else if (idx < textItems.length - 1) {
        const next = textItems[idx + 1];
        const y = Number(item.transform[5]);
        const nextY = Number(next?.transform[5]);
        text += next && Math.abs(y - nextY) > LINE_Y_TOLERANCE ? '\n' : ' ';
      }
      return text;
    })
    .join('')
    .trim();
}

/**
 * Split page text into trimmed, non-empty lines.
 */
export function splitPageLines(pageText: string): string[] {
  return pageText
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line.length > 0);
}

// ============================================
// PDFExtractor Class
// ============================================

type PDFJSModule = typeof import('pdfjs-dist/legacy/build/pdf.mjs');

/**
 * PDF text extraction service using PDF.js.
 */
class PDFExtractorService {
  private pdfjs: PDFJSModule | null = null;

  /**
   * Load PDF.js. The legacy build runs under Node without a worker file.
   */
  async initialize(): Promise<PDFJSModule> {
    if (!this.pdfjs) {
      this.pdfjs = await import('pdfjs-dist/legacy/build/pdf.mjs');
    }
    return this.pdfjs;
  }

  /**
   * Extract page lines from a PDF file path or its bytes.
   */
  async extractText(source: PDFSource): Promise<PDFExtractionResult> {
    const startTime = performance.now();

    const data = await this.readSource(source);
    const pdfjs = await this.initialize();

    let pdfDoc: PDFDocumentProxy;
    try {
      pdfDoc = await pdfjs.getDocument({
        data,
        isEvalSupported: false,
        useSystemFonts: false,
      }).promise;
    } catch (error) {
      throw new PDFExtractionError(
        `Unable to open PDF: ${error instanceof Error ? error.message : String(error)}`,
        'INVALID_PDF'
      );
    }

    try {
      const pageCount = pdfDoc.numPages;
      const pageLines: PageLines = [];

      for (let pageNum = 1; pageNum <= pageCount; pageNum++) {
        const page = await pdfDoc.getPage(pageNum);
        const textContent = await page.getTextContent();
        pageLines.push(splitPageLines(joinTextItems(textContent.items)));
      }

      if (pageLines.every((lines) => lines.length === 0)) {
        throw new PDFExtractionError(
          'No text could be extracted from the PDF. Scanned statements are not supported.',
          'NO_TEXT_CONTENT'
        );
      }

      return {
        pageLines,
        pageCount,
        extractionTimeMs: performance.now() - startTime,
      };
    } finally {
      await pdfDoc.destroy();
    }
  }

  private async readSource(source: PDFSource): Promise<Uint8Array> {
    if (typeof source !== 'string') {
      // PDF.js rejects Node Buffers, so always hand it a plain Uint8Array
      return new Uint8Array(source);
    }

    try {
      return new Uint8Array(await readFile(source));
    } catch (error) {
      throw new PDFExtractionError(
        `Unable to read ${source}: ${error instanceof Error ? error.message : String(error)}`,
        'FILE_READ_ERROR'
      );
    }
  }
}

// ============================================
// Singleton Export
// ============================================

/**
 * Singleton instance of the PDF extractor.
 */
export const pdfExtractor = new PDFExtractorService();

/**
 * Convenience function to extract text from a PDF.
 */
export async function extractPDFText(source: PDFSource): Promise<PDFExtractionResult> {
  return pdfExtractor.extractText(source);
}
