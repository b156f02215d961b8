/**
 * Unit Tests for Transaction Finalizer
 */

import { describe, it, expect } from 'vitest';
import { TransactionDraft } from './transaction-draft';
import { finalizeTransactions } from './transaction-finalizer';

function completeDraft(
  date: string,
  description: string,
  amount: number,
  balance: number | null = null
): TransactionDraft {
  const draft = new TransactionDraft(date, description);
  draft.setAmounts(amount, balance);
  draft.complete();
  return draft;
}

describe('finalizeTransactions', () => {
  describe('cimb', () => {
    it('chains balance comparisons from record to record', () => {
      const records = finalizeTransactions('cimb', [
        completeDraft('2024-01-01', 'A', 100, 500),
        completeDraft('2024-01-02', 'B', 40, 460),
        completeDraft('2024-01-03', 'C', 60, 520),
      ]);

      expect(records.map((r) => [r.transaction_type, r.amount])).toEqual([
        ['credit', 100],
        ['debit', -40],
        ['credit', 60],
      ]);
    });

    it('makes a zero first amount a debit', () => {
      const records = finalizeTransactions('cimb', [completeDraft('2024-01-01', 'A', 0, 500)]);

      expect(records[0]?.transaction_type).toBe('debit');
      expect(records[0]?.amount).toBe(0);
    });

    it('drops drafts that are still open', () => {
      const open = new TransactionDraft('2024-01-01', 'OPEN');

      expect(finalizeTransactions('cimb', [open])).toEqual([]);
    });

    it('compares against the last kept record', () => {
      const open = new TransactionDraft('2024-01-02', 'OPEN');
      const records = finalizeTransactions('cimb', [
        completeDraft('2024-01-01', 'A', 100, 500),
        open,
        completeDraft('2024-01-03', 'C', 20, 480),
      ]);

      expect(records.map((r) => r.amount)).toEqual([100, -20]);
    });
  });

  describe('alliance', () => {
    it('signs amounts by transaction type', () => {
      const debit = completeDraft('2024-01-01', 'DEBIT', 25, 75);
      const credit = completeDraft('2024-01-02', ' CREDIT ', 10, 85);
      credit.transactionType = 'credit';

      const records = finalizeTransactions('alliance', [debit, credit]);

      expect(records.map((r) => [r.description, r.amount])).toEqual([
        ['DEBIT', -25],
        ['CREDIT', 10],
      ]);
    });

    it('keeps open drafts that have amounts', () => {
      const draft = new TransactionDraft('2024-01-01', 'OPEN');
      draft.setAmounts(5, null);

      expect(finalizeTransactions('alliance', [draft])).toHaveLength(1);
    });

    it('drops drafts without amounts', () => {
      expect(
        finalizeTransactions('alliance', [new TransactionDraft('2024-01-01', 'TEXT')])
      ).toEqual([]);
    });
  });

  describe('maybank', () => {
    it('drops empty shells', () => {
      const empty = new TransactionDraft('2024-01-01');

      expect(finalizeTransactions('maybank', [empty])).toEqual([]);
    });
  });

  describe('credit_card', () => {
    it('emits magnitudes and omits empty optional fields', () => {
      const draft = completeDraft('2024-03-04', 'SHOP', -30);
      draft.postingDate = '2024-03-05';

      expect(finalizeTransactions('credit_card', [draft])).toEqual([
        {
          date: '2024-03-04',
          posting_date: '2024-03-05',
          description: 'SHOP',
          amount: 30,
          transaction_type: 'debit',
          bank: 'credit_card',
        },
      ]);
    });
  });
});
