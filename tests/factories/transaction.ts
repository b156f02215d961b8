/**
 * Test Data Factories
 *
 * Factory functions for transaction records and uploaded files.
 * Uses partial overrides pattern for flexible test data creation.
 */

import type { TransactionRecord } from '@/types/statement';

// ============================================
// Transaction Factory
// ============================================

/**
 * Creates a TransactionRecord with default values.
 * Override any field by passing a partial object.
 */
export function createTransactionRecord(
  overrides?: Partial<TransactionRecord>
): TransactionRecord {
  return {
    date: '2024-01-15',
    description: 'Test Merchant',
    amount: -42.5,
    balance: 957.5,
    transaction_type: 'debit',
    bank: 'cimb',
    ...overrides,
  };
}

/**
 * Creates records on consecutive days, alternating debit and credit.
 */
export function createTransactionRecords(
  count: number,
  baseOverrides?: Partial<TransactionRecord>
): TransactionRecord[] {
  return Array.from({ length: count }, (_, index) => {
    const isCredit = index % 2 === 1;
    const magnitude = 10 + index * 5;

    return createTransactionRecord({
      date: `2024-02-${String(index + 1).padStart(2, '0')}`,
      description: `Merchant ${index + 1}`,
      amount: isCredit ? magnitude : -magnitude,
      balance: 1000 + index,
      transaction_type: isCredit ? 'credit' : 'debit',
      ...baseOverrides,
    });
  });
}

// ============================================
// Mock File Factory
// ============================================

/**
 * Creates a mock File object for testing.
 */
export function createMockFile(
  filename: string,
  mimeType: string,
  content: string = '%PDF-1.4 test content'
): File {
  const blob = new Blob([content], { type: mimeType });
  return new File([blob], filename, { type: mimeType });
}
