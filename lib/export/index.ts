/**
 * Export Module
 *
 * CSV and summary output for finalized transaction records.
 */

export {
  generateCsv,
  generateSummary,
  resolveColumns,
  escapeCSV,
  CREDIT_CARD_COLUMNS,
  ACCOUNT_COLUMNS,
} from './export-service';
