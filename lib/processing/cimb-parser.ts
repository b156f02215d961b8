/**
 * CIMB statement parser.
 *
 * CIMB prints a multi-line table. A transaction starts with a DD/MM/YYYY
 * date; the amount and running balance are the two trailing decimals of
 * either the start line or a later line. Direction is not printed and is
 * inferred from balance deltas during finalization.
 */

import type { PageLines } from '@/types/statement';
import { AMOUNT_SOURCE, containsAny, parseAmount, parseSlashDate } from './parser-utils';
import { TransactionDraft } from './transaction-draft';

const SECTION_START = [
  'Date Description Cheque / Ref No',
  'Date Description Cheque/Ref No',
  'Tarikh Diskripsi No Cek / Ruj',
];
const SECTION_END = ['ENDING BALANCE', 'CLOSING BALANCE', 'BAKI AKHIR', 'BAKI PENUTUP'];
const UNITS_LINE = '(RM) (RM) (RM) (RM)';

const TRANSACTION_START = /^(\d{2}\/\d{2}\/\d{4})\s+(.*)$/;
const TRAILING_AMOUNTS = new RegExp(`^(.*?)\\s*(${AMOUNT_SOURCE})\\s+(${AMOUNT_SOURCE})$`);
const TRAILING_REFERENCE = /^(.*?)\s*\b((?=[A-Za-z0-9]*\d)[A-Za-z0-9]{8,})$/;
const CHEQUE_FRAGMENT = /^\d{1,7}$/;

const SKIP_PATTERNS: RegExp[] = [
  /^\s*$/,
  /PRIVATE TRANSACTION/i,
];

/**
 * Split a trailing reference/cheque token off a description.
 */
function splitReference(text: string): { description: string; reference: string | null } {
  const match = text.match(TRAILING_REFERENCE);
  if (!match) return { description: text, reference: null };
  return { description: match[1] ?? '', reference: match[2] ?? null };
}

/**
 * Try to read "... amount balance" from a line into the draft.
 * Returns false when the line has no trailing amount pair.
 */
function applyTrailingAmounts(draft: TransactionDraft, text: string): boolean {
  const match = text.match(TRAILING_AMOUNTS);
  if (!match) return false;

  const amount = parseAmount(match[2] ?? '');
  const balance = parseAmount(match[3] ?? '');
  if (amount === null || balance === null) return false;

  const { description, reference } = splitReference(match[1] ?? '');
  draft.appendDescription(description);
  if (reference) draft.appendChequeNo(reference);

  draft.setAmounts(amount, balance);
  draft.complete();
  return true;
}

export function parseCimbStatement(pages: PageLines): TransactionDraft[] {
  const drafts: TransactionDraft[] = [];
  let current: TransactionDraft | null = null;

  const closeCurrent = () => {
    if (current && !current.isEmpty()) drafts.push(current);
    current = null;
  };

  for (const page of pages) {
    let inSection = false;

    for (const rawLine of page) {
      const line = rawLine.trim();

      if (containsAny(line, SECTION_START)) {
        inSection = true;
        continue;
      }
      if (line.includes(UNITS_LINE)) continue;
      if (containsAny(line, SECTION_END)) {
        inSection = false;
        continue;
      }
      if (!inSection) continue;

      const start = line.match(TRANSACTION_START);
      if (start) {
        const date = parseSlashDate(start[1] ?? '');
        if (!date) continue;

        closeCurrent();
        const draft = new TransactionDraft(date);
        const remainder = (start[2] ?? '').trim();
        if (!applyTrailingAmounts(draft, remainder)) {
          draft.appendDescription(remainder);
        }
        current = draft;
        continue;
      }

      if (!current || !current.stillParsing) continue;
      if (SKIP_PATTERNS.some((pattern) => pattern.test(line))) continue;

      if (applyTrailingAmounts(current, line)) continue;

      if (CHEQUE_FRAGMENT.test(line)) {
        current.appendChequeNo(line);
      } else {
        current.appendDescription(line);
      }
    }
  }

  closeCurrent();
  return drafts;
}
