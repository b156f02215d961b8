/**
 * Export Service
 *
 * Serializes finalized transaction records as CSV and computes the
 * summary statistics returned alongside them.
 */

import { compareAsc, format, parseISO } from 'date-fns';
import type {
  BankType,
  PopulatedStatementSummary,
  StatementSummary,
  TransactionColumn,
  TransactionRecord,
} from '@/types/statement';

// ============================================
// Columns
// ============================================

/**
 * Column order for credit card statements.
 */
export const CREDIT_CARD_COLUMNS: readonly TransactionColumn[] = [
  'posting_date',
  'date',
  'description',
  'amount',
  'transaction_type',
  'card_type',
  'card_number',
  'notes',
  'statement_date',
];

/**
 * Column order for bank account statements.
 */
export const ACCOUNT_COLUMNS: readonly TransactionColumn[] = [
  'date',
  'description',
  'amount',
  'balance',
  'transaction_type',
];

const DECIMAL_COLUMNS: ReadonlySet<TransactionColumn> = new Set(['amount', 'balance']);

/**
 * Columns written for a bank: its column order, restricted to the fields
 * at least one record carries.
 */
export function resolveColumns(
  records: readonly TransactionRecord[],
  bankType: BankType
): TransactionColumn[] {
  const order = bankType === 'credit_card' ? CREDIT_CARD_COLUMNS : ACCOUNT_COLUMNS;
  return order.filter((column) =>
    records.some((record) => record[column] !== undefined)
  );
}

// ============================================
// Helpers
// ============================================

/**
 * Escape a CSV value.
 */
export function escapeCSV(value: string | number | null | undefined): string {
  if (value === null || value === undefined) {
    return '';
  }
  const str = String(value);
  // If contains comma, newline, or quote, wrap in quotes and escape internal quotes
  if (str.includes(',') || str.includes('\n') || str.includes('\r') || str.includes('"')) {
    return `"${str.replace(/"/g, '""')}"`;
  }
  return str;
}

function formatCell(record: TransactionRecord, column: TransactionColumn): string {
  const value = record[column];
  if (typeof value === 'number' && DECIMAL_COLUMNS.has(column)) {
    return escapeCSV(value.toFixed(2));
  }
  return escapeCSV(value);
}

function round2(value: number): number {
  return Math.round(value * 100) / 100;
}

// ============================================
// CSV
// ============================================

/**
 * Generate CSV text for a bank's records. Returns an empty string when
 * there are no records.
 */
export function generateCsv(
  records: readonly TransactionRecord[],
  bankType: BankType
): string {
  if (records.length === 0) {
    return '';
  }

  const columns = resolveColumns(records, bankType);
  const rows: string[] = [columns.join(',')];

  for (const record of records) {
    rows.push(columns.map((column) => formatCell(record, column)).join(','));
  }

  return `${rows.join('\n')}\n`;
}

// ============================================
// Summary
// ============================================

/**
 * Aggregate counts, totals and the date range. Both totals are sums of
 * magnitudes, so debits count the same whether their amounts are signed
 * or not. Returns `{}` for an empty list.
 */
export function generateSummary(records: readonly TransactionRecord[]): StatementSummary {
  if (records.length === 0) {
    return {};
  }

  let creditCount = 0;
  let debitCount = 0;
  let totalCredits = 0;
  let totalDebits = 0;

  for (const record of records) {
    if (record.transaction_type === 'credit') {
      creditCount++;
      totalCredits += Math.abs(record.amount);
    } else {
      debitCount++;
      totalDebits += Math.abs(record.amount);
    }
  }

  const dates = records
    .map((record) => parseISO(record.date))
    .sort(compareAsc);
  const first = dates[0];
  const last = dates[dates.length - 1];

  const summary: PopulatedStatementSummary = {
    total_transactions: records.length,
    credit_count: creditCount,
    debit_count: debitCount,
    total_credits: round2(totalCredits),
    total_debits: round2(totalDebits),
    net_amount: round2(round2(totalCredits) - round2(totalDebits)),
    date_range: {
      start_date: first ? format(first, 'yyyy-MM-dd') : '',
      end_date: last ? format(last, 'yyyy-MM-dd') : '',
    },
  };

  return summary;
}
