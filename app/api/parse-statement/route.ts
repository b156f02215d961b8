/**
 * API Route: Statement Parser
 *
 * Accepts one bank statement PDF as multipart form data and returns the
 * parsed transactions, CSV and summary.
 *
 * Form fields:
 * - file: the statement PDF
 * - bankType: optional bank key or bank account name; skips detection
 */

import { NextRequest, NextResponse } from 'next/server';
import {
  processUpload,
  readStatementUpload,
  readTextField,
} from '@/lib/api/statement-upload';
import { loadServiceConfig } from '@/lib/config';
import { handleError, RequestValidationError } from '@/lib/errors';

export const runtime = 'nodejs';

export async function POST(request: NextRequest) {
  try {
    const config = loadServiceConfig();

    let form: FormData;
    try {
      form = await request.formData();
    } catch {
      throw new RequestValidationError('Expected multipart/form-data');
    }

    const upload = await readStatementUpload(form.get('file'), config.maxUploadBytes);
    const bankHint = readTextField(form.get('bankType'));

    const outcome = await processUpload(upload, bankHint);

    if (!outcome.success) {
      console.warn(
        `[ParseStatement API] ${upload.filename} failed (${outcome.processingId}): ${outcome.error}`
      );
      return NextResponse.json(
        { success: false, processing_id: outcome.processingId, error: outcome.error },
        { status: 422 }
      );
    }

    console.log(
      `[ParseStatement API] ${upload.filename}: ${outcome.data.transaction_count} transactions (${outcome.data.bank_detected})`
    );

    return NextResponse.json({
      success: true,
      message: 'PDF processed successfully',
      data: outcome.data,
    });
  } catch (error) {
    if (error instanceof RequestValidationError) {
      return NextResponse.json(
        { success: false, error: error.message },
        { status: error.status }
      );
    }

    console.error('[ParseStatement API] Error:', error);
    return NextResponse.json(
      { success: false, error: handleError(error) },
      { status: 500 }
    );
  }
}
