/**
 * Bank Detector
 *
 * Picks the statement layout for a document from its extracted text.
 * Rules are evaluated in order and the first match wins:
 *
 * 1. Credit card indicator phrases (a card statement also names its
 *    issuing bank, so these are checked before bank names)
 * 2. Bank name keywords
 * 3. Card network + "statement" pairs
 * 4. Maybank
 */

import {
  DEFAULT_BANK_TYPE,
  SUPPORTED_BANK_TYPES,
  type BankType,
} from '@/types/statement';

// ============================================
// Constants
// ============================================

/**
 * Phrases that only appear on credit card statements.
 */
const CREDIT_CARD_INDICATORS = [
  'statement of credit card account',
  'tax invoice',
  'gst registration no',
  'penyata akaun kad kredit',
  'invois cukai',
  'no. pendaftaran gst',
];

/**
 * Bank name keywords. Order matters: first match wins.
 */
const BANK_KEYWORDS: Array<{ keywords: string[]; bank: BankType }> = [
  { keywords: ['maybank', 'malayan banking', 'maybank islamic'], bank: 'maybank' },
  { keywords: ['cimb', 'commerce international'], bank: 'cimb' },
  { keywords: ['alliance', 'alliance bank'], bank: 'alliance' },
];

/**
 * Generic keyword pairs that identify a card statement when no bank name did.
 */
const CARD_STATEMENT_PAIRS: Array<[string, string]> = [
  ['mastercard', 'statement'],
  ['visa', 'statement'],
  ['credit card', 'statement'],
];

/**
 * Substrings of a bank account name mapped to the parser that reads it.
 */
const ACCOUNT_NAME_HINTS: Array<{ fragment: string; bank: BankType }> = [
  { fragment: 'maybank', bank: 'maybank' },
  { fragment: 'cimb', bank: 'cimb' },
  { fragment: 'alliance', bank: 'alliance' },
  { fragment: 'credit', bank: 'credit_card' },
];

// ============================================
// Detection
// ============================================

/**
 * Detect the bank layout from the concatenated text of a document.
 */
export function detectBankType(text: string): BankType {
  const textLower = text.toLowerCase();

  if (CREDIT_CARD_INDICATORS.some((phrase) => textLower.includes(phrase))) {
    return 'credit_card';
  }

  for (const { keywords, bank } of BANK_KEYWORDS) {
    if (keywords.some((keyword) => textLower.includes(keyword))) {
      return bank;
    }
  }

  if (
    CARD_STATEMENT_PAIRS.some(
      ([first, second]) => textLower.includes(first) && textLower.includes(second)
    )
  ) {
    return 'credit_card';
  }

  return DEFAULT_BANK_TYPE;
}

/**
 * Check whether a string is one of the supported bank keys.
 */
export function isBankType(value: string): value is BankType {
  return SUPPORTED_BANK_TYPES.some((bank) => bank === value);
}

/**
 * Map a caller-supplied hint to a bank key.
 *
 * Accepts either a bank key (`"cimb"`, `"Credit Card"`) or a bank account
 * name (`"CIMB Bank Berhad"`). Returns null when the hint is empty.
 */
export function bankTypeFromHint(hint: string | null | undefined): BankType | null {
  const normalized = (hint ?? '').trim().toLowerCase();
  if (!normalized) return null;

  const asKey = normalized.replace(/[\s-]+/g, '_');
  if (isBankType(asKey)) return asKey;

  const byName = ACCOUNT_NAME_HINTS.find(({ fragment }) =>
    normalized.includes(fragment)
  );
  if (byName) return byName.bank;

  console.warn(
    `[BankDetector] Unsupported bank hint "${hint}", falling back to ${DEFAULT_BANK_TYPE}`
  );
  return DEFAULT_BANK_TYPE;
}

/**
 * Resolve the bank for a document: an explicit hint wins, otherwise the
 * text is inspected.
 */
export function resolveBankType(
  hint: string | null | undefined,
  text: string
): BankType {
  return bankTypeFromHint(hint) ?? detectBankType(text);
}
