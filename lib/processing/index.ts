/**
 * Statement Processing Module - Barrel Export
 */

// ============================================
// PDF Extractor
// ============================================

export {
  pdfExtractor,
  extractPDFText,
  joinTextItems,
  splitPageLines,
  PDFExtractionError,
  type PDFExtractionResult,
  type PDFSource,
} from './pdf-extractor';

// ============================================
// Bank Detection
// ============================================

export {
  detectBankType,
  bankTypeFromHint,
  resolveBankType,
  isBankType,
} from './bank-detector';

// ============================================
// Parsers
// ============================================

export { parseMaybankStatement } from './maybank-parser';
export { parseCimbStatement } from './cimb-parser';
export { parseAllianceStatement } from './alliance-parser';
export {
  parseCreditCardStatement,
  resolveStatementYear,
  extractStatementDate,
  readCardContext,
  type CreditCardStatementOptions,
} from './credit-card-parser';
export { TransactionDraft, type CardContext } from './transaction-draft';

// ============================================
// Finalizer & Processor
// ============================================

export { finalizeTransactions } from './transaction-finalizer';
export {
  statementProcessor,
  processStatementPages,
  processStatementFile,
  normalizePages,
} from './statement-processor';
