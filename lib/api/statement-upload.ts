/**
 * Upload handling shared by the statement API routes.
 */

import { v4 as uuidv4 } from 'uuid';
import { handleError, RequestValidationError } from '@/lib/errors';
import { processStatementFile } from '@/lib/processing';
import {
  isProcessingFailure,
  type BankType,
  type StatementSummary,
  type TransactionRecord,
} from '@/types/statement';

// ============================================
// Types
// ============================================

export interface StatementUpload {
  filename: string;
  bytes: Uint8Array;
}

/**
 * `data` payload of a successful parse response.
 */
export interface ParsedStatementData {
  processing_id: string;
  bank_detected: BankType;
  transactions: TransactionRecord[];
  transaction_count: number;
  csv: string;
  summary: StatementSummary;
  processing_time: number;
  processed_at: string;
}

export type UploadOutcome =
  | { success: true; data: ParsedStatementData }
  | { success: false; processingId: string; error: string };

// ============================================
// Validation
// ============================================

function isPdf(file: File): boolean {
  return file.name.toLowerCase().endsWith('.pdf') || file.type === 'application/pdf';
}

/**
 * Validate a form field holding an uploaded statement and read its bytes.
 */
export async function readStatementUpload(
  entry: FormDataEntryValue | null,
  maxBytes: number
): Promise<StatementUpload> {
  if (entry === null || typeof entry === 'string') {
    throw new RequestValidationError('A PDF file must be uploaded');
  }
  if (!isPdf(entry)) {
    throw new RequestValidationError('Only PDF files are supported');
  }
  if (entry.size === 0) {
    throw new RequestValidationError('File is empty');
  }
  if (entry.size > maxBytes) {
    throw new RequestValidationError(
      `File exceeds the maximum upload size of ${maxBytes} bytes`
    );
  }

  return {
    filename: entry.name,
    bytes: new Uint8Array(await entry.arrayBuffer()),
  };
}

/**
 * Read an optional text field, treating blanks as absent.
 */
export function readTextField(entry: FormDataEntryValue | null): string | null {
  if (typeof entry !== 'string') return null;
  const value = entry.trim();
  return value ? value : null;
}

// ============================================
// Processing
// ============================================

/**
 * Process one uploaded statement under a fresh processing id.
 */
export async function processUpload(
  upload: StatementUpload,
  bankHint: string | null
): Promise<UploadOutcome> {
  const processingId = uuidv4();
  console.log(`[StatementUpload] Processing ${upload.filename} (${processingId})`);

  try {
    const result = await processStatementFile(upload.bytes, {
      bankHint,
      filename: upload.filename,
    });

    if (isProcessingFailure(result)) {
      return { success: false, processingId, error: result.error };
    }

    return {
      success: true,
      data: {
        processing_id: processingId,
        bank_detected: result.bankType,
        transactions: result.transactions,
        transaction_count: result.transactions.length,
        csv: result.csv,
        summary: result.summary,
        processing_time: result.processingTimeSeconds,
        processed_at: new Date().toISOString(),
      },
    };
  } catch (error) {
    return { success: false, processingId, error: handleError(error) };
  }
}
