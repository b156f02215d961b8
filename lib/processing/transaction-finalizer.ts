/**
 * Transaction Finalizer
 *
 * Turns a parser's drafts into emitted records: drops incomplete drafts,
 * settles amount signs and transaction types, and trims text.
 */

import type { BankType, TransactionRecord } from '@/types/statement';
import type { TransactionDraft } from './transaction-draft';

// ============================================
// Helpers
// ============================================

function negative(value: number): number {
  return value === 0 ? 0 : -Math.abs(value);
}

function baseRecord(draft: TransactionDraft, bank: BankType, amount: number): TransactionRecord {
  return {
    date: draft.date,
    description: draft.description.trim(),
    amount,
    balance: draft.balance,
    transaction_type: draft.transactionType,
    bank,
  };
}

// ============================================
// Per-bank finalization
// ============================================

function finalizeMaybank(drafts: TransactionDraft[]): TransactionRecord[] {
  const records: TransactionRecord[] = [];
  for (const draft of drafts) {
    if (draft.isEmpty() || draft.amount === null) continue;
    records.push(baseRecord(draft, 'maybank', draft.amount));
  }
  return records;
}

/**
 * CIMB does not print direction. The first record is a credit when its
 * balance exceeds balance minus amount; every later record is a credit
 * when its balance rose from the previous record's balance. One missing
 * or out-of-order balance skews every comparison after it.
 */
function finalizeCimb(drafts: TransactionDraft[]): TransactionRecord[] {
  const records: TransactionRecord[] = [];
  let previousBalance: number | null = null;

  for (const draft of drafts) {
    if (draft.stillParsing || draft.amount === null || draft.balance === null) {
      continue;
    }

    const { amount, balance } = draft;
    const isCredit =
      previousBalance === null
        ? balance > balance - amount
        : balance > previousBalance;

    const record = baseRecord(draft, 'cimb', 0);
    if (previousBalance === null) {
      record.amount = isCredit ? amount : negative(amount);
    } else {
      record.amount = isCredit ? Math.abs(amount) : negative(amount);
    }
    record.transaction_type = isCredit ? 'credit' : 'debit';

    const chequeNo = draft.chequeNo;
    if (chequeNo) record.cheque_no = chequeNo;

    records.push(record);
    previousBalance = balance;
  }

  return records;
}

function finalizeAlliance(drafts: TransactionDraft[]): TransactionRecord[] {
  const records: TransactionRecord[] = [];
  for (const draft of drafts) {
    if (!draft.hasAmounts || draft.amount === null) continue;

    const amount =
      draft.transactionType === 'debit' ? negative(draft.amount) : Math.abs(draft.amount);
    records.push(baseRecord(draft, 'alliance', amount));
  }
  return records;
}

/**
 * Card amounts are emitted as magnitudes; direction lives in
 * `transaction_type`.
 */
function finalizeCreditCard(drafts: TransactionDraft[]): TransactionRecord[] {
  const records: TransactionRecord[] = [];
  for (const draft of drafts) {
    if (draft.isEmpty() || draft.amount === null) continue;

    const record: TransactionRecord = {
      date: draft.date,
      description: draft.description.trim(),
      amount: Math.abs(draft.amount),
      transaction_type: draft.transactionType,
      bank: 'credit_card',
    };
    if (draft.postingDate) record.posting_date = draft.postingDate;
    if (draft.card.cardType) record.card_type = draft.card.cardType;
    if (draft.card.cardNumber) record.card_number = draft.card.cardNumber;
    if (draft.notes) record.notes = draft.notes;
    if (draft.statementDate) record.statement_date = draft.statementDate;

    records.push(record);
  }
  return records;
}

// ============================================
// Entry point
// ============================================

/**
 * Finalize the drafts produced by one bank's parser.
 */
export function finalizeTransactions(
  bankType: BankType,
  drafts: TransactionDraft[]
): TransactionRecord[] {
  switch (bankType) {
    case 'maybank':
      return finalizeMaybank(drafts);
    case 'cimb':
      return finalizeCimb(drafts);
    case 'alliance':
      return finalizeAlliance(drafts);
    case 'credit_card':
      return finalizeCreditCard(drafts);
    default: {
      const unreachable: never = bankType;
      throw new Error(`Unsupported bank type: ${String(unreachable)}`);
    }
  }
}
