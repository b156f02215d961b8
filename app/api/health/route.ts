import { NextResponse } from 'next/server';

/**
 * GET /api/health
 */
export async function GET() {
  return NextResponse.json({
    status: 'healthy',
    timestamp: new Date().toISOString(),
  });
}
