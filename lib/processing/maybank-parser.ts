/**
 * Maybank statement parser.
 *
 * Maybank prints each transaction on one line:
 *
 *   DD/MM/YYYY ... amount ... balance description
 *
 * A line that does not match is held as a pending fragment and prefixed to
 * the next line only.
 */

import type { PageLines } from '@/types/statement';
import { AMOUNT_SOURCE, containsAny, parseAmount, parseSlashDate } from './parser-utils';
import { TransactionDraft } from './transaction-draft';

const SECTION_START = ['URUSNIAGA AKAUN', 'ACCOUNT TRANSACTIONS'];
const SECTION_END = ['ENDING BALANCE', 'BAKI AKHIR'];

const TRANSACTION_PATTERN = new RegExp(
  `(\\d{2}\\/\\d{2}\\/\\d{4}).*?(${AMOUNT_SOURCE}).*?(${AMOUNT_SOURCE})(.+)`
);
const DATE_ANYWHERE = /\d{2}\/\d{2}\/\d{4}/;

export function parseMaybankStatement(pages: PageLines): TransactionDraft[] {
  const drafts: TransactionDraft[] = [];

  for (const page of pages) {
    let inSection = false;
    let pending = '';

    for (const rawLine of page) {
      const line = rawLine.trim();

      if (containsAny(line, SECTION_START)) {
        inSection = true;
        continue;
      }
      if (containsAny(line, SECTION_END)) {
        inSection = false;
        continue;
      }
      if (!inSection || !line) continue;

      // The pattern starts at the date and the fragment never holds one, so
      // the fragment never reaches a description.
      const candidate = pending ? `${pending} ${line}` : line;
      pending = '';

      const match = candidate.match(TRANSACTION_PATTERN);
      if (!match) {
        if (!DATE_ANYWHERE.test(line)) pending = line;
        continue;
      }

      const date = parseSlashDate(match[1] ?? '');
      const amount = parseAmount(match[2] ?? '');
      const balance = parseAmount(match[3] ?? '');
      if (!date || amount === null || balance === null) continue;

      const draft = new TransactionDraft(date, match[4] ?? '');
      draft.setAmounts(amount, balance);
      // Amounts are read unsigned, so anything non-zero is a debit here.
      draft.transactionType = amount > 0 ? 'debit' : 'credit';
      draft.complete();
      drafts.push(draft);
    }
  }

  return drafts;
}
