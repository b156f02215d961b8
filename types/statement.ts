/**
 * Statement Processing Types
 *
 * Types for turning extracted bank statement text into normalized
 * transaction records, CSV output and summary statistics.
 */

// ============================================
// Bank Identification
// ============================================

/**
 * Statement layouts the parsing engine understands.
 */
export type BankType = 'maybank' | 'cimb' | 'alliance' | 'credit_card';

/**
 * Supported bank keys, in detection/fallback order.
 */
export const SUPPORTED_BANK_TYPES: readonly BankType[] = [
  'maybank',
  'cimb',
  'alliance',
  'credit_card',
] as const;

/**
 * Bank used whenever detection or a caller hint cannot decide.
 */
export const DEFAULT_BANK_TYPE: BankType = 'maybank';

/**
 * Direction of money movement.
 */
export type TransactionType = 'debit' | 'credit';

// ============================================
// Transaction Record (emitted)
// ============================================

/**
 * A single finalized transaction.
 *
 * Field names are snake_case because records are emitted as-is in JSON
 * responses and as CSV column headers.
 */
export interface TransactionRecord {
  /** Transaction date (YYYY-MM-DD) */
  date: string;

  /** Posting date (YYYY-MM-DD), credit card only */
  posting_date?: string;

  /** Free text, possibly assembled from several statement lines */
  description: string;

  /**
   * Signed amount: negative = outflow, positive = inflow.
   * Credit card records carry an unsigned magnitude instead and rely on
   * `transaction_type` for direction.
   */
  amount: number;

  /** Running balance after the transaction, null when the statement omits it */
  balance?: number | null;

  transaction_type: TransactionType;

  /** Parser that produced the record */
  bank: BankType;

  /** Cheque / reference number (CIMB) */
  cheque_no?: string;

  /** Card product name active when the line was read (credit card) */
  card_type?: string;

  /** Masked or full card number active when the line was read (credit card) */
  card_number?: string;

  /** Foreign currency and other annotations joined with "; " (credit card) */
  notes?: string;

  /** Statement date from page 1 (credit card) */
  statement_date?: string;
}

/**
 * Column names a record can contribute to CSV output.
 */
export type TransactionColumn = Exclude<keyof TransactionRecord, 'bank'>;

// ============================================
// Summary
// ============================================

export interface StatementDateRange {
  start_date: string;
  end_date: string;
}

/**
 * Aggregate statistics for a populated transaction list.
 */
export interface PopulatedStatementSummary {
  total_transactions: number;
  credit_count: number;
  debit_count: number;
  /** Sum of credit magnitudes, 2dp */
  total_credits: number;
  /** Sum of debit magnitudes, 2dp */
  total_debits: number;
  /** total_credits - total_debits, 2dp */
  net_amount: number;
  date_range: StatementDateRange;
}

/**
 * Summary object; empty when there are no transactions.
 */
export type StatementSummary = PopulatedStatementSummary | Record<string, never>;

// ============================================
// Processing Result
// ============================================

export interface StatementProcessingSuccess {
  bankType: BankType;
  transactions: TransactionRecord[];
  csv: string;
  summary: StatementSummary;
  processingTimeSeconds: number;
}

export interface StatementProcessingFailure {
  error: string;
  bankType: null;
  transactions: [];
  csv: '';
  summary: Record<string, never>;
  processingTimeSeconds: number;
}

/**
 * Outcome of processing one document. A failure is distinguished from an
 * empty success by the presence of `error`.
 */
export type StatementProcessingResult =
  | StatementProcessingSuccess
  | StatementProcessingFailure;

// ============================================
// Options
// ============================================

/**
 * Options accepted by the statement processor.
 */
export interface StatementProcessingOptions {
  /**
   * Bank key or bank account name supplied by the caller. Bypasses
   * detection when recognized; unrecognized hints fall back to Maybank.
   */
  bankHint?: string | null;

  /** Original filename; the credit card parser reads the statement year from it */
  filename?: string;

  /**
   * Clock used when no statement year can be found in the filename.
   * Defaults to the current date.
   */
  referenceDate?: Date;
}

/**
 * Extracted text: one array of trimmed lines per page.
 */
export type PageLines = string[][];

/**
 * Type guard for failure results.
 */
export function isProcessingFailure(
  result: StatementProcessingResult
): result is StatementProcessingFailure {
  return 'error' in result;
}
