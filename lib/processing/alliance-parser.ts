/**
 * Alliance Bank statement parser.
 *
 * Alliance statements come in several layouts, so each line is tried
 * against three date formats and four amount layouts. A record stays open
 * after its amounts are found: the lines below the amount line are
 * trailing description text.
 */

import type { PageLines, TransactionType } from '@/types/statement';
import {
  AMOUNT_SOURCE,
  containsAny,
  expandYear,
  monthFromName,
  parseAmount,
  toIsoDate,
} from './parser-utils';
import { TransactionDraft } from './transaction-draft';

// ============================================
// Markers
// ============================================

const SECTION_START = [
  'Date Transaction Description',
  'Date Description',
  'Tarikh Keterangan',
  'Tarikh Transaksi',
  'Tarikh Urusniaga',
  'TRANSACTION DETAILS',
  'BUTIRAN TRANSAKSI',
];
const GENERIC_HEADER_COLUMNS = ['Transaction', 'Amount', 'Balance', 'Description'];
const SECTION_END = ['ENDING BALANCE', 'CLOSING BALANCE', 'BAKI AKHIR', 'BAKI PENUTUP'];

const SKIP_PATTERNS: RegExp[] = [
  /^(CR|DR)$/i,
  /^(\(RM\)\s*)+$/i,
  /^page\s+\d+(\s+of\s+\d+)?$/i,
  /^muka surat\s+\d+(\s+dari(pada)?\s+\d+)?$/i,
  /^\d+\s*\/\s*\d+$/,
];

// ============================================
// Dates
// ============================================

interface DateMatch {
  /** ISO date, null when the printed date is not a real calendar date */
  date: string | null;
  remainder: string;
}

/**
 * Date formats, tried in order.
 */
const DATE_FORMATS: Array<{
  pattern: RegExp;
  toDate: (match: RegExpMatchArray) => string | null;
}> = [
  {
    // 05/03/2024, 05/03/24
    pattern: /^(\d{2})\/(\d{2})\/(\d{4}|\d{2})\b\s*(.*)$/,
    toDate: (m) =>
      toIsoDate(Number(m[1]), Number(m[2]), expandYear(m[3] ?? '')),
  },
  {
    // 050324, 05032024
    pattern: /^(\d{6,8})(?![\d.,])\s*(.*)$/,
    toDate: (m) => {
      const digits = m[1] ?? '';
      if (digits.length === 7) return null;
      return toIsoDate(
        Number(digits.slice(0, 2)),
        Number(digits.slice(2, 4)),
        expandYear(digits.slice(4))
      );
    },
  },
  {
    // 5 Mar 2024
    pattern: /^(\d{1,2})\s+([A-Za-z]{3,})\s+(\d{4})\b\s*(.*)$/,
    toDate: (m) => {
      const month = monthFromName(m[2] ?? '');
      return month === null ? null : toIsoDate(Number(m[1]), month, Number(m[3]));
    },
  },
];

function matchTransactionDate(line: string): DateMatch | null {
  for (const { pattern, toDate } of DATE_FORMATS) {
    const match = line.match(pattern);
    if (match) {
      return { date: toDate(match), remainder: (match[match.length - 1] ?? '').trim() };
    }
  }
  return null;
}

// ============================================
// Amounts
// ============================================

// An amount never starts in the middle of a number.
const AMT = `(?<![\\d,.])(${AMOUNT_SOURCE})`;
const ENDS_WITH_AMOUNT = new RegExp(`${AMOUNT_SOURCE}$`);
const STARTS_WITH_AMOUNT = new RegExp(`^${AMOUNT_SOURCE}`);

function directionFromMarker(
  marker: string | undefined,
  line: string
): TransactionType {
  if (marker) return marker.toUpperCase() === 'CR' ? 'credit' : 'debit';
  // Any "CR" in the line counts, including inside words such as CREDIT.
  return line.toUpperCase().includes('CR') ? 'credit' : 'debit';
}

/**
 * Amount layouts, tried in order; first handler to accept wins. A handler
 * returns false to pass the line on to the next layout.
 */
const AMOUNT_LAYOUTS: Array<{
  pattern: RegExp;
  apply: (draft: TransactionDraft, match: RegExpMatchArray, line: string) => boolean;
}> = [
  {
    // description amount balance [CR|DR]
    pattern: new RegExp(`^(.*?)\\s*${AMT}\\s+${AMT}\\s*(CR|DR)?\\s*$`, 'i'),
    apply: (draft, m, line) => {
      const description = (m[1] ?? '').trim();
      if (ENDS_WITH_AMOUNT.test(description)) return false;

      const amount = parseAmount(m[2] ?? '');
      const balance = parseAmount(m[3] ?? '');
      if (amount === null || balance === null) return false;

      draft.appendDescription(description);
      draft.setAmounts(Math.abs(amount), balance);
      draft.transactionType = directionFromMarker(m[4], line);
      return true;
    },
  },
  {
    // description withdrawal deposit balance [CR|DR]; columns give the direction
    pattern: new RegExp(`^(.*?)\\s*${AMT}\\s+${AMT}\\s+${AMT}\\s*(CR|DR)?\\s*$`, 'i'),
    apply: (draft, m) => {
      const withdrawal = parseAmount(m[2] ?? '');
      const deposit = parseAmount(m[3] ?? '');
      const balance = parseAmount(m[4] ?? '');
      if (withdrawal === null || deposit === null || balance === null) return false;

      draft.appendDescription(m[1] ?? '');
      if (withdrawal > 0) {
        draft.setAmounts(withdrawal, balance);
        draft.transactionType = 'debit';
      } else {
        draft.setAmounts(deposit, balance);
        draft.transactionType = 'credit';
      }
      return true;
    },
  },
  {
    // description amount balance trailing-text
    pattern: new RegExp(`^(.*?)\\s*${AMT}\\s+${AMT}\\s+(.+)$`),
    apply: (draft, m, line) => {
      const trailing = m[4] ?? '';
      if (STARTS_WITH_AMOUNT.test(trailing)) return false;

      const amount = parseAmount(m[2] ?? '');
      const balance = parseAmount(m[3] ?? '');
      if (amount === null || balance === null) return false;

      draft.appendDescription(m[1] ?? '');
      draft.appendDescription(trailing);
      draft.setAmounts(Math.abs(amount), balance);
      draft.transactionType = directionFromMarker(undefined, line);
      return true;
    },
  },
  {
    // description amount [CR|DR]
    pattern: new RegExp(`^(.*?)\\s*${AMT}\\s*(CR|DR)?\\s*$`, 'i'),
    apply: (draft, m, line) => {
      const amount = parseAmount(m[2] ?? '');
      if (amount === null) return false;

      draft.appendDescription(m[1] ?? '');
      draft.setAmounts(Math.abs(amount), null);
      draft.transactionType = directionFromMarker(m[3], line);
      return true;
    },
  },
];

function applyAmountLayouts(draft: TransactionDraft, text: string, line: string): boolean {
  for (const { pattern, apply } of AMOUNT_LAYOUTS) {
    const match = text.match(pattern);
    if (match && apply(draft, match, line)) return true;
  }
  return false;
}

// ============================================
// Scanner
// ============================================

function isSectionHeader(line: string): boolean {
  if (containsAny(line, SECTION_START)) return true;

  return line.includes('Date') && containsAny(line, GENERIC_HEADER_COLUMNS);
}

export function parseAllianceStatement(pages: PageLines): TransactionDraft[] {
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

      if (containsAny(line, SECTION_END)) {
        inSection = false;
        continue;
      }

      const dated = matchTransactionDate(line);
      if (!dated && isSectionHeader(line)) {
        inSection = true;
        continue;
      }

      if (!inSection || !line) continue;
      if (SKIP_PATTERNS.some((pattern) => pattern.test(line))) continue;

      if (dated) {
        if (!dated.date) continue;

        closeCurrent();
        const draft = new TransactionDraft(dated.date);
        if (!applyAmountLayouts(draft, dated.remainder, line)) {
          draft.appendDescription(dated.remainder);
        }
        current = draft;
        continue;
      }

      if (!current) continue;

      if (current.hasAmounts || !applyAmountLayouts(current, line, line)) {
        current.appendDescription(line);
      }
    }
  }

  closeCurrent();
  return drafts;
}
