/**
 * Credit card statement parser.
 *
 * Transactions are printed as
 *
 *   DD/MM DD/MM description [amount [CR]]
 *
 * with the posting date first. The year is not printed, so it comes from
 * the statement context. Lines below a transaction may carry its amount
 * and foreign currency notes.
 */

import type { PageLines } from '@/types/statement';
import {
  AMOUNT_SOURCE,
  BARE_AMOUNT_PATTERN,
  containsAny,
  monthFromName,
  parseAmount,
  parseSlashDate,
  toIsoDate,
} from './parser-utils';
import { TransactionDraft, type CardContext } from './transaction-draft';

// ============================================
// Constants
// ============================================

const SECTION_START = ['Posting Date /', 'Transaction Date /'];
const SECTION_END = ['TOTAL CREDIT THIS MONTH', 'SUB TOTAL/JUMLAH'];

const TRANSACTION_START = new RegExp(
  `^(\\d{2})\\/(\\d{2})\\s+(\\d{2})\\/(\\d{2})\\s+(.+?)(?:\\s+(${AMOUNT_SOURCE})(\\s*CR)?)?$`,
  'i'
);

const STATEMENT_DATE_PATTERN =
  /(?:STATEMENT DATE|TARIKH PENYATA)[^0-9]*(\d{2}\/\d{2}\/\d{4}|\d{1,2}\s+[A-Za-z]{3}\s+\d{4})/i;

const CARD_MARKER =
  /\b(?:cardholder name|card holder name|nama pemegang kad|principal card|supplementary card|kad utama|kad tambahan)\b/i;
const CARD_NUMBER_SOURCE = '\\d{4}[\\s-]?[\\dX*]{4}[\\s-]?[\\dX*]{4}[\\s-]?\\d{4}';
const LABELLED_CARD_NUMBER = new RegExp(
  `(?:Card Number|Card No\\.?|No\\.? Kad)\\s*[:\\-]?\\s*(${CARD_NUMBER_SOURCE})`,
  'i'
);
const NAMED_CARD_NUMBER = new RegExp(`^(.+?)\\s*:\\s*(${CARD_NUMBER_SOURCE})`, 'i');
const CARD_NETWORK = /\b(VISA|MASTERCARD|AMERICAN EXPRESS|AMEX)\b/i;
const CARD_LOOKAHEAD = 3;

const AMOUNT_LOOKAHEAD = 2;
const NOTE_LOOKAHEAD = 3;
const NOTE_MIN_LENGTH = 10;

const FOREIGN_CURRENCY_NOTE =
  /\b(?:USD|SGD|EUR|GBP|AUD|JPY|THB|IDR|CNY|HKD|TRANSACTED AMOUNT|EXCHANGE RATE|FOREIGN CURRENCY|MATA WANG ASING)\b/i;

const NOTE_BOILERPLATE: RegExp[] = [
  /^(?:page|muka surat)\b/i,
  /^(?:sub total|total|jumlah)\b/i,
  /^(?:posting date|transaction date|tarikh)\b/i,
  /^(?:previous balance|baki terdahulu|new balance|baki baru)\b/i,
  /^(?:minimum payment|bayaran minimum|payment due date)\b/i,
];

const TRANSACTED_USD = new RegExp(`TRANSACTED AMOUNT\\s+USD\\s+(${AMOUNT_SOURCE})`, 'i');

// ============================================
// Statement context
// ============================================

export interface CreditCardStatementOptions {
  /** Original filename; the first 4-digit run is the statement year */
  filename?: string;

  /** Supplies the year when the filename has none */
  referenceDate?: Date;
}

/**
 * Statement year: first 4-digit run in the filename, else the year of
 * the reference date (today by default).
 */
export function resolveStatementYear(options: CreditCardStatementOptions = {}): number {
  const fromName = options.filename?.match(/\d{4}/);
  if (fromName) return Number(fromName[0]);

  return (options.referenceDate ?? new Date()).getFullYear();
}

/**
 * Read the statement date printed on the first page.
 */
export function extractStatementDate(firstPage: readonly string[]): string | undefined {
  const match = firstPage.join('\n').match(STATEMENT_DATE_PATTERN);
  const printed = match?.[1];
  if (!printed) return undefined;

  if (printed.includes('/')) return parseSlashDate(printed) ?? undefined;

  const parts = printed.split(/\s+/);
  const month = monthFromName(parts[1] ?? '');
  if (month === null) return undefined;
  return toIsoDate(Number(parts[0]), month, Number(parts[2])) ?? undefined;
}

/**
 * Read the card context that starts at a cardholder marker line.
 * Returns null when no card number follows within a few lines.
 */
export function readCardContext(lines: readonly string[], markerIndex: number): CardContext | null {
  const window = lines.slice(markerIndex, markerIndex + CARD_LOOKAHEAD + 1);

  for (const line of window) {
    const labelled = line.match(LABELLED_CARD_NUMBER);
    if (labelled) {
      const network = window.join(' ').match(CARD_NETWORK);
      return {
        cardType: network?.[1]?.toUpperCase(),
        cardNumber: labelled[1],
      };
    }

    const named = line.match(NAMED_CARD_NUMBER);
    if (named) {
      return { cardType: named[1]?.trim(), cardNumber: named[2] };
    }
  }

  return null;
}

// ============================================
// Scanner
// ============================================

function isNoteLine(line: string): boolean {
  if (FOREIGN_CURRENCY_NOTE.test(line)) return true;
  return (
    line.length > NOTE_MIN_LENGTH &&
    !NOTE_BOILERPLATE.some((pattern) => pattern.test(line))
  );
}

function endsNoteScan(line: string): boolean {
  return (
    TRANSACTION_START.test(line) ||
    containsAny(line, SECTION_END) ||
    CARD_MARKER.test(line)
  );
}

export function parseCreditCardStatement(
  pages: PageLines,
  options: CreditCardStatementOptions = {}
): TransactionDraft[] {
  const drafts: TransactionDraft[] = [];
  const year = resolveStatementYear(options);
  const statementDate = extractStatementDate(pages[0] ?? []);
  let card: CardContext = {};

  for (const rawPage of pages) {
    const page = rawPage.map((line) => line.trim());
    let inSection = false;

    for (let i = 0; i < page.length; i++) {
      const line = page[i] ?? '';

      if (CARD_MARKER.test(line)) {
        card = readCardContext(page, i) ?? card;
        continue;
      }
      if (containsAny(line, SECTION_START)) {
        inSection = true;
        continue;
      }
      if (containsAny(line, SECTION_END)) {
        inSection = false;
        continue;
      }
      if (!inSection || !line) continue;

      const start = line.match(TRANSACTION_START);
      if (!start) continue;

      const postingDate = toIsoDate(Number(start[1]), Number(start[2]), year);
      const transactionDate = toIsoDate(Number(start[3]), Number(start[4]), year);
      if (!postingDate || !transactionDate) continue;

      const draft = new TransactionDraft(transactionDate, start[5] ?? '');
      let amountText = start[6];
      let isCredit = Boolean(start[7]);
      let last = i;

      // Amount printed on one of the next lines
      if (!amountText) {
        const skipped: string[] = [];
        for (let j = i + 1; j <= i + AMOUNT_LOOKAHEAD && j < page.length; j++) {
          const next = page[j] ?? '';
          const bare = next.match(BARE_AMOUNT_PATTERN);
          if (bare) {
            amountText = bare[1];
            isCredit = Boolean(bare[2]);
            last = j;
            break;
          }
          if (endsNoteScan(next)) break;
          skipped.push(next);
        }
        if (!amountText) continue;
        skipped.forEach((text) => draft.appendDescription(text));
      }

      const amount = parseAmount(amountText);
      if (amount === null) continue;

      for (let j = last + 1; j <= last + NOTE_LOOKAHEAD && j < page.length; j++) {
        const next = page[j] ?? '';
        if (!next) continue;
        if (endsNoteScan(next) || !isNoteLine(next)) break;
        draft.addNote(next);
        last = j;
      }

      draft.replaceDescription((description) =>
        description.replace(TRANSACTED_USD, '(USD $1)')
      );
      draft.postingDate = postingDate;
      draft.statementDate = statementDate;
      draft.card = { ...card };
      draft.setAmounts(isCredit ? amount : -amount);
      draft.transactionType = isCredit ? 'credit' : 'debit';
      draft.complete();
      drafts.push(draft);

      i = last;
    }
  }

  return drafts;
}
