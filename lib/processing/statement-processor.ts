/**
 * Statement Processor
 *
 * Runs one document through the pipeline:
 *
 *   page lines → bank detection → bank parser → finalizer → CSV + summary
 *
 * Every failure is returned as a result with an `error` field; nothing
 * thrown by a parser or the extractor escapes these functions.
 */

import { basename } from 'node:path';
import { generateCsv, generateSummary } from '@/lib/export';
import { handleError } from '@/lib/errors';
import type {
  BankType,
  PageLines,
  StatementProcessingFailure,
  StatementProcessingOptions,
  StatementProcessingResult,
} from '@/types/statement';
import { parseAllianceStatement } from './alliance-parser';
import { resolveBankType } from './bank-detector';
import { parseCimbStatement } from './cimb-parser';
import { parseCreditCardStatement } from './credit-card-parser';
import { parseMaybankStatement } from './maybank-parser';
import { extractPDFText, splitPageLines, type PDFSource } from './pdf-extractor';
import type { TransactionDraft } from './transaction-draft';
import { finalizeTransactions } from './transaction-finalizer';

// ============================================
// Helpers
// ============================================

/**
 * Accept either page line arrays or raw page texts.
 */
export function normalizePages(pages: ReadonlyArray<string | readonly string[]>): PageLines {
  return pages.map((page) =>
    typeof page === 'string' ? splitPageLines(page) : page.map((line) => line.trim())
  );
}

function elapsedSeconds(startTime: number): number {
  return Math.round(performance.now() - startTime) / 1000;
}

function failureResult(error: string, startTime: number): StatementProcessingFailure {
  return {
    error,
    bankType: null,
    transactions: [],
    csv: '',
    summary: {},
    processingTimeSeconds: elapsedSeconds(startTime),
  };
}

/**
 * Run the parser for a bank.
 */
function parseForBank(
  bankType: BankType,
  pages: PageLines,
  options: StatementProcessingOptions
): TransactionDraft[] {
  switch (bankType) {
    case 'maybank':
      return parseMaybankStatement(pages);
    case 'cimb':
      return parseCimbStatement(pages);
    case 'alliance':
      return parseAllianceStatement(pages);
    case 'credit_card':
      return parseCreditCardStatement(pages, {
        filename: options.filename,
        referenceDate: options.referenceDate,
      });
    default: {
      const unreachable: never = bankType;
      throw new Error(`Unsupported bank type: ${String(unreachable)}`);
    }
  }
}

// ============================================
// Statement Processor
// ============================================

class StatementProcessorService {
  /**
   * Process already-extracted page text.
   */
  processPages(
    pages: ReadonlyArray<string | readonly string[]>,
    options: StatementProcessingOptions = {}
  ): StatementProcessingResult {
    const startTime = performance.now();

    try {
      const pageLines = normalizePages(pages);
      const fullText = pageLines.map((lines) => lines.join('\n')).join('\n');
      const bankType = resolveBankType(options.bankHint, fullText);

      const drafts = parseForBank(bankType, pageLines, options);
      const transactions = finalizeTransactions(bankType, drafts);

      console.log(
        `[StatementProcessor] ${bankType}: ${transactions.length} transactions from ${pageLines.length} pages`
      );

      return {
        bankType,
        transactions,
        csv: generateCsv(transactions, bankType),
        summary: generateSummary(transactions),
        processingTimeSeconds: elapsedSeconds(startTime),
      };
    } catch (error) {
      console.error('[StatementProcessor] Failed to process statement:', error);
      return failureResult(handleError(error), startTime);
    }
  }

  /**
   * Extract a PDF (path or bytes) and process it.
   */
  async processFile(
    source: PDFSource,
    options: StatementProcessingOptions = {}
  ): Promise<StatementProcessingResult> {
    const startTime = performance.now();

    try {
      const extraction = await extractPDFText(source);
      console.log(
        `[StatementProcessor] Extracted ${extraction.pageCount} pages in ${Math.round(extraction.extractionTimeMs)}ms`
      );
      const filename =
        options.filename ?? (typeof source === 'string' ? basename(source) : undefined);

      return this.processPages(extraction.pageLines, { ...options, filename });
    } catch (error) {
      console.error('[StatementProcessor] Failed to extract statement:', error);
      return failureResult(handleError(error), startTime);
    }
  }
}

// ============================================
// Singleton Export
// ============================================

/**
 * Singleton instance of the statement processor.
 */
export const statementProcessor = new StatementProcessorService();

/**
 * Convenience function to process extracted pages.
 */
export function processStatementPages(
  pages: ReadonlyArray<string | readonly string[]>,
  options?: StatementProcessingOptions
): StatementProcessingResult {
  return statementProcessor.processPages(pages, options);
}

/**
 * Convenience function to process a PDF file.
 */
export async function processStatementFile(
  source: PDFSource,
  options?: StatementProcessingOptions
): Promise<StatementProcessingResult> {
  return statementProcessor.processFile(source, options);
}
