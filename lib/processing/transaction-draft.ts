/**
 * In-progress transaction owned by a parser's scanning loop.
 *
 * A draft is started by a transaction-start line, filled in by the lines
 * that follow, and then either handed to the finalizer or dropped. Drafts
 * never outlive one parse and are never shared between parsers.
 */

import type { TransactionType } from '@/types/statement';
import { collapseWhitespace } from './parser-utils';

export interface CardContext {
  cardType?: string;
  cardNumber?: string;
}

export class TransactionDraft {
  private descriptionParts: string[] = [];
  private noteParts: string[] = [];
  private chequeParts: string[] = [];

  amount: number | null = null;
  balance: number | null = null;
  transactionType: TransactionType = 'debit';
  postingDate?: string;
  card: CardContext = {};
  statementDate?: string;

  /** At least one amount pattern has matched */
  hasAmounts = false;

  /** Still accepting continuation lines that may complete missing fields */
  stillParsing = true;

  constructor(
    readonly date: string,
    description: string = ''
  ) {
    this.appendDescription(description);
  }

  get description(): string {
    return collapseWhitespace(this.descriptionParts.join(' '));
  }

  get chequeNo(): string {
    return this.chequeParts.join('');
  }

  get notes(): string {
    return this.noteParts.join('; ');
  }

  appendDescription(text: string): void {
    const cleaned = text.trim();
    if (cleaned) this.descriptionParts.push(cleaned);
  }

  replaceDescription(transform: (description: string) => string): void {
    this.descriptionParts = [transform(this.description)];
  }

  appendChequeNo(fragment: string): void {
    const cleaned = fragment.trim();
    if (cleaned) this.chequeParts.push(cleaned);
  }

  addNote(note: string): void {
    const cleaned = collapseWhitespace(note);
    if (cleaned) this.noteParts.push(cleaned);
  }

  setAmounts(amount: number, balance: number | null = null): void {
    this.amount = amount;
    this.balance = balance;
    this.hasAmounts = true;
  }

  /** Stop accepting continuation lines. */
  complete(): void {
    this.stillParsing = false;
  }

  /** Neither a description nor a non-zero amount was collected. */
  isEmpty(): boolean {
    return !this.description && !this.amount;
  }
}
