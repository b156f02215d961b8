/**
 * API Route: Batch Statement Parser
 *
 * Accepts several statement PDFs under the `files` field. Each file is
 * validated and processed on its own; one bad file never fails the batch.
 */

import { NextRequest, NextResponse } from 'next/server';
import { v4 as uuidv4 } from 'uuid';
import {
  processUpload,
  readStatementUpload,
  readTextField,
  type ParsedStatementData,
} from '@/lib/api/statement-upload';
import { loadServiceConfig } from '@/lib/config';
import { handleError, RequestValidationError } from '@/lib/errors';

export const runtime = 'nodejs';

type BatchFileResult =
  | { file_index: number; filename: string; success: true; data: ParsedStatementData }
  | { file_index: number; filename: string; success: false; error: string };

function filenameOf(entry: FormDataEntryValue): string {
  return typeof entry === 'string' ? '' : entry.name;
}

export async function POST(request: NextRequest) {
  try {
    const config = loadServiceConfig();

    let form: FormData;
    try {
      form = await request.formData();
    } catch {
      throw new RequestValidationError('Expected multipart/form-data');
    }

    const entries = form.getAll('files');
    if (entries.length === 0) {
      throw new RequestValidationError('At least one file must be uploaded');
    }
    if (entries.length > config.maxBatchFiles) {
      throw new RequestValidationError(
        `Maximum ${config.maxBatchFiles} files allowed per batch`
      );
    }

    const bankHint = readTextField(form.get('bankType'));
    const batchId = uuidv4();
    const results: BatchFileResult[] = [];

    for (const [index, entry] of entries.entries()) {
      const filename = filenameOf(entry);
      try {
        const upload = await readStatementUpload(entry, config.maxUploadBytes);
        const outcome = await processUpload(upload, bankHint);

        results.push(
          outcome.success
            ? { file_index: index, filename, success: true, data: outcome.data }
            : { file_index: index, filename, success: false, error: outcome.error }
        );
      } catch (error) {
        results.push({
          file_index: index,
          filename,
          success: false,
          error: handleError(error),
        });
      }
    }

    let successfulFiles = 0;
    let totalTransactions = 0;
    for (const result of results) {
      if (result.success) {
        successfulFiles++;
        totalTransactions += result.data.transaction_count;
      }
    }

    console.log(
      `[ParseStatement API] Batch ${batchId}: ${successfulFiles}/${entries.length} files parsed`
    );

    return NextResponse.json({
      success: true,
      message: 'Batch processing completed',
      data: {
        batch_id: batchId,
        total_files: entries.length,
        successful_files: successfulFiles,
        failed_files: entries.length - successfulFiles,
        total_transactions: totalTransactions,
        results,
        processed_at: new Date().toISOString(),
      },
    });
  } catch (error) {
    if (error instanceof RequestValidationError) {
      return NextResponse.json(
        { success: false, error: error.message },
        { status: error.status }
      );
    }

    console.error('[ParseStatement API] Batch error:', error);
    return NextResponse.json(
      { success: false, error: handleError(error) },
      { status: 500 }
    );
  }
}
