/**
 * Unit Tests for Alliance Bank Parser
 */

import { describe, it, expect } from 'vitest';
import { parseAllianceStatement } from './alliance-parser';
import { finalizeTransactions } from './transaction-finalizer';

const HEADER = 'Date Transaction Description Cheque No Debit Credit Balance';

function parse(lines: string[]) {
  return finalizeTransactions('alliance', parseAllianceStatement([[HEADER, ...lines]]));
}

describe('parseAllianceStatement', () => {
  it('reads a CR marker as a credit', () => {
    const records = parse(['01/02/2024 TRANSFER FROM ACC 50.00 1,000.00 CR', 'ENDING BALANCE']);

    expect(records).toEqual([
      {
        date: '2024-02-01',
        description: 'TRANSFER FROM ACC',
        amount: 50,
        balance: 1000,
        transaction_type: 'credit',
        bank: 'alliance',
      },
    ]);
  });

  it('treats unmarked amounts as debits', () => {
    const records = parse(['02/02/2024 POS PURCHASE 25.90 974.10']);

    expect(records[0]?.transaction_type).toBe('debit');
    expect(records[0]?.amount).toBe(-25.9);
  });

  it('reads CR anywhere in an unmarked line as a credit', () => {
    const records = parse(['03/02/2024 INSTANT TRANSFER CREDIT 80.00 894.10']);

    expect(records[0]?.transaction_type).toBe('credit');
    expect(records[0]?.amount).toBe(80);
  });

  it('reads numeric DDMMYY dates', () => {
    const records = parse(['020224 POS PURCHASE 25.90 974.10', 'GROCER KL']);

    expect(records[0]?.date).toBe('2024-02-02');
    expect(records[0]?.description).toBe('POS PURCHASE GROCER KL');
  });

  it('reads DDMMYYYY and DD MMM YYYY dates', () => {
    const records = parse([
      '04022024 FEE 1.00 999.00',
      '5 Mar 2024 FEE 2.00 997.00',
    ]);

    expect(records.map((r) => r.date)).toEqual(['2024-02-04', '2024-03-05']);
  });

  it('reads two-digit years in slash dates', () => {
    const records = parse(['06/02/24 FEE 1.00 999.00']);

    expect(records[0]?.date).toBe('2024-02-06');
  });

  it('splits withdrawal, deposit and balance columns', () => {
    const records = parse([
      '05/03/2024 CASH DEPOSIT 0.00 500.00 1,474.10',
      '06/03/2024 CASH WITHDRAWAL 100.00 0.00 1,374.10',
    ]);

    expect(records.map((r) => [r.transaction_type, r.amount, r.balance])).toEqual([
      ['credit', 500, 1474.1],
      ['debit', -100, 1374.1],
    ]);
  });

  it('splits withdrawal, deposit and balance columns followed by a marker', () => {
    const records = parse([
      '04/02/2024 DEPOSIT 0.00 500.00 1,474.10 CR',
      '05/02/2024 CHEQUE 100.00 0.00 1,374.10 DR',
    ]);

    expect(records).toEqual([
      {
        date: '2024-02-04',
        description: 'DEPOSIT',
        amount: 500,
        balance: 1474.1,
        transaction_type: 'credit',
        bank: 'alliance',
      },
      {
        date: '2024-02-05',
        description: 'CHEQUE',
        amount: -100,
        balance: 1374.1,
        transaction_type: 'debit',
        bank: 'alliance',
      },
    ]);
  });

  it('does not read a third amount as trailing description text', () => {
    const records = parse(['08/03/2024 TRANSFER 40.00 1,334.10 25.00 X']);

    expect(records).toEqual([]);
  });

  it('keeps trailing text after an amount pair', () => {
    const records = parse(['07/03/2024 TRANSFER 40.00 1,334.10 TO JOHN']);

    expect(records[0]?.description).toBe('TRANSFER TO JOHN');
    expect(records[0]?.amount).toBe(-40);
    expect(records[0]?.balance).toBe(1334.1);
  });

  it('accepts a single amount without a balance', () => {
    const records = parse(['10/03/2024 SERVICE CHARGE 5.00 DR']);

    expect(records).toEqual([
      {
        date: '2024-03-10',
        description: 'SERVICE CHARGE',
        amount: -5,
        balance: null,
        transaction_type: 'debit',
        bank: 'alliance',
      },
    ]);
  });

  it('finds amounts on a continuation line', () => {
    const records = parse(['11/03/2024 INTERBANK GIRO', 'FROM JOHN 120.00 1,594.10 CR']);

    expect(records).toHaveLength(1);
    expect(records[0]?.description).toBe('INTERBANK GIRO FROM JOHN');
    expect(records[0]?.amount).toBe(120);
    expect(records[0]?.transaction_type).toBe('credit');
  });

  it('appends text after the amount line without re-reading amounts', () => {
    const records = parse(['12/03/2024 BILL PAYMENT 60.00 1,534.10', 'REF 99.00 INVOICE']);

    expect(records[0]?.amount).toBe(-60);
    expect(records[0]?.description).toBe('BILL PAYMENT REF 99.00 INVOICE');
  });

  it('skips boilerplate lines', () => {
    const records = parse([
      '13/03/2024 FEE 1.00 1,533.10',
      'CR',
      '(RM) (RM)',
      'Page 1 of 2',
    ]);

    expect(records[0]?.description).toBe('FEE');
  });

  it('drops records without any amount', () => {
    const records = parse(['14/03/2024 NOTE ONLY', 'ENDING BALANCE']);

    expect(records).toEqual([]);
  });

  it('discards lines whose date cannot be read', () => {
    const records = parse(['1234567 ODD 1.00 2.00', '32/03/2024 ODD 1.00 2.00']);

    expect(records).toEqual([]);
  });

  it('recognizes a generic column header', () => {
    const drafts = parseAllianceStatement([
      ['Posting Date Amount Balance', '15/03/2024 FEE 1.00 99.00'],
    ]);

    expect(drafts).toHaveLength(1);
  });

  it('keeps continuation lines that only contain header words in lower case or inside other words', () => {
    const records = parse([
      '01/02/2024 DUITNOW 50.00 1,000.00 CR',
      'MANDATE TRANSACTION REF 7781',
      'date updated amount',
    ]);

    expect(records).toHaveLength(1);
    expect(records[0]?.description).toBe(
      'DUITNOW MANDATE TRANSACTION REF 7781 date updated amount'
    );
  });

  it('does not reopen the section on a continuation line after it ends', () => {
    const records = parse([
      '01/02/2024 DUITNOW 50.00 1,000.00 CR',
      'ENDING BALANCE',
      'MANDATE TRANSACTION REF 7781',
      '02/02/2024 LATE FEE 1.00 999.00',
    ]);

    expect(records.map((r) => r.description)).toEqual(['DUITNOW']);
  });

  it('ignores transactions before the section header', () => {
    const drafts = parseAllianceStatement([['15/03/2024 FEE 1.00 99.00']]);

    expect(drafts).toEqual([]);
  });
});
