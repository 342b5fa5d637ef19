/**
 * Tests for row classification and line-item parsing.
 */
import { describe, it, expect } from 'vitest';
import { LineItemParser, classifyRow, type ParseOutcome } from '@warrant-ledger/register-parser';
import { JULY_REGISTER, candidateRow, testTables } from '../helpers/fixtures.js';

function record(outcome: ParseOutcome) {
  if (outcome.kind !== 'record') {
    throw new Error(`Expected a record, got ${outcome.kind}`);
  }
  return outcome.candidate;
}

describe('classifyRow', () => {
  const empty = { runningTotalMinor: 0, parsedCount: 0 };

  it('should recognise column headers', () => {
    expect(classifyRow('Check Number Check Date Vendor Name Fd-Objt Amount', empty)).toBe('header');
  });

  it('should recognise boilerplate footers', () => {
    expect(classifyRow('Page 2 of 14', empty)).toBe('footer');
    expect(classifyRow('Report of Checks Issued', empty)).toBe('footer');
  });

  it('should recognise subtotal keywords', () => {
    expect(classifyRow('Page Total 1,734.56', empty)).toBe('subtotal');
  });

  it('should not treat a dated, numbered row as a subtotal', () => {
    expect(classifyRow('0200012345 07/15/2024 TOTAL FILTRATION INC 500.00', empty)).toBeNull();
  });

  it('should recognise a bare amount equal to the page running total', () => {
    expect(classifyRow('350.00', { runningTotalMinor: 35000, parsedCount: 2 })).toBe('subtotal');
    expect(classifyRow('350.00', { runningTotalMinor: 35000, parsedCount: 0 })).toBeNull();
  });

  it('should recognise summary section markers', () => {
    expect(classifyRow('Total Number of Checks 412', empty)).toBe('summary-section');
    expect(classifyRow('FUND RECAP', empty)).toBe('summary-section');
  });
});

describe('LineItemParser', () => {
  it('should parse a full register row', () => {
    const parser = new LineItemParser(JULY_REGISTER, testTables());
    const candidate = record(
      parser.parseRow(
        candidateRow([
          [
            ['0200012345', 20],
            ['07/15/2024', 120],
            ['ACME SCHOOL SUPPLY', 200],
            ['01-4300', 380],
            ['1,234.56', 480],
          ],
        ])
      )
    );

    expect(candidate).toMatchObject({
      documentId: 'reg-2024-07',
      amountMinor: 123456,
      void: false,
      date: { iso: '2024-07-15', raw: '07/15/2024', precision: 'exact' },
      warrantNumber: '0200012345',
      accountCode: '01-4300',
      accountCodeStatus: 'known',
      category: 'Books and Supplies',
      payeeName: 'ACME SCHOOL SUPPLY',
    });
    expect(candidate.fieldConfidence).toEqual({ amount: 1, date: 1, warrant: 1, accountCode: 1, payee: 1 });
  });

  it('should default a missing date to the period end', () => {
    const parser = new LineItemParser(JULY_REGISTER, testTables());
    const candidate = record(parser.parseRow(candidateRow([[['ZUM SERVICES INC', 200], ['500.00', 480]]])));

    expect(candidate.date).toEqual({ iso: '2024-07-31', raw: null, precision: 'period' });
    expect(candidate.fieldConfidence.date).toBe(0.6);
    expect(candidate.accountCodeStatus).toBe('absent');
    expect(candidate.category).toBe('Uncategorized');
  });

  it('should make a cancelled check negative', () => {
    const parser = new LineItemParser(JULY_REGISTER, testTables());
    const candidate = record(
      parser.parseRow(
        candidateRow([
          [
            ['0200012347', 20],
            ['07/20/2024', 120],
            ['ACME SCHOOL SUPPLY', 200],
            ['Cancelled', 380],
            ['75.00', 480],
          ],
        ])
      )
    );

    expect(candidate.amountMinor).toBe(-7500);
    expect(candidate.void).toBe(true);
    expect(candidate.payeeName).toBe('ACME SCHOOL SUPPLY');
  });

  it('should fail a row with competing amounts', () => {
    const parser = new LineItemParser(JULY_REGISTER, testTables());
    const outcome = parser.parseRow(candidateRow([[['ACME', 200], ['100.00 250.00', 480]]], { rowIndex: 4 }));

    expect(outcome.kind).toBe('failure');
    if (outcome.kind === 'failure') {
      expect(outcome.failure).toMatchObject({
        kind: 'parse-failure',
        documentId: 'reg-2024-07',
        rowIndex: 4,
        reason: 'ambiguous-amount',
        rowText: 'ACME 100.00 250.00',
      });
    }
  });

  it('should skip a bare running-total row and reset the total per page', () => {
    const parser = new LineItemParser(JULY_REGISTER, testTables());
    parser.parseRow(candidateRow([[['ACME', 200], ['100.00', 480]]], { rowIndex: 0 }));
    parser.parseRow(candidateRow([[['ZUM', 200], ['250.00', 480]]], { rowIndex: 1 }));

    const subtotal = parser.parseRow(candidateRow([[['350.00', 480]]], { rowIndex: 2 }));
    expect(subtotal).toMatchObject({
      kind: 'skipped',
      skipped: { reason: 'subtotal', rowIndex: 2 },
      amountMinor: 35000,
      runningTotalMinor: 35000,
    });

    const nextPage = parser.parseRow(candidateRow([[['350.00', 480]]], { pageIndex: 2, rowIndex: 0 }));
    expect(nextPage.kind).toBe('record');
  });

  it('should skip every row after a summary section marker', () => {
    const parser = new LineItemParser(JULY_REGISTER, testTables());
    const marker = parser.parseRow(candidateRow([[['Total Number of Checks', 20], ['412', 200]]]));
    const after = parser.parseRow(candidateRow([[['01', 20], ['1,899.56', 480]]], { rowIndex: 1 }));

    expect(marker.kind === 'skipped' && marker.skipped.reason).toBe('summary-section');
    expect(after.kind === 'skipped' && after.skipped.reason).toBe('summary-section');
  });

  describe('split checks', () => {
    const acmeRow = candidateRow(
      [
        [
          ['0200012345', 20],
          ['07/15/2024', 120],
          ['ACME SCHOOL SUPPLY', 200],
          ['01-4300', 380],
          ['150.00', 480],
        ],
      ],
      { rowIndex: 0 }
    );

    it('should take the check amount printed on the last fund-object row', () => {
      const parser = new LineItemParser(JULY_REGISTER, testTables());
      record(parser.parseRow(acmeRow));
      const outcome = parser.parseRow(
        candidateRow(
          [
            [
              ['01-5800', 380],
              ['50.00', 480],
              ['200.00', 560],
            ],
          ],
          { rowIndex: 1 }
        )
      );

      expect(outcome.kind).toBe('expense-line');
      if (outcome.kind === 'expense-line') {
        expect(outcome.candidate).toMatchObject({
          rowIndex: 0,
          amountMinor: 20000,
          payeeName: 'ACME SCHOOL SUPPLY',
          accountCode: '01-4300',
          rowText: '0200012345 07/15/2024 ACME SCHOOL SUPPLY 01-4300 150.00 01-5800 50.00 200.00',
        });
        expect(outcome.candidate.expenseLines).toEqual([
          { rowIndex: 0, accountCode: '01-4300', expensedMinor: 15000 },
          { rowIndex: 1, accountCode: '01-5800', expensedMinor: 5000 },
        ]);
        expect(outcome.line).toEqual({ rowIndex: 1, accountCode: '01-5800', expensedMinor: 5000 });
      }
    });

    it('should sum expensed amounts when no check amount is printed', () => {
      const parser = new LineItemParser(JULY_REGISTER, testTables());
      record(parser.parseRow(acmeRow));
      parser.parseRow(candidateRow([[['01-5800', 380], ['25.00', 480]]], { rowIndex: 1 }));
      const last = parser.parseRow(candidateRow([[['01-5800', 380], ['10.00', 480]]], { rowIndex: 2 }));

      expect(last.kind === 'expense-line' && last.candidate.amountMinor).toBe(18500);

      const subtotal = parser.parseRow(candidateRow([[['185.00', 480]]], { rowIndex: 3 }));
      expect(subtotal).toMatchObject({ kind: 'skipped', amountMinor: 18500, runningTotalMinor: 18500 });
    });

    it('should not extend a check from the previous page', () => {
      const parser = new LineItemParser(JULY_REGISTER, testTables());
      record(parser.parseRow(acmeRow));
      const outcome = parser.parseRow(
        candidateRow([[['01-5800', 380], ['50.00', 480]]], { pageIndex: 2, rowIndex: 0 })
      );

      expect(outcome.kind).toBe('record');
      expect(outcome.kind === 'record' && outcome.candidate.payeeName).toBe('');
    });
  });

  it('should reject an invalid warrant pattern', () => {
    expect(() => new LineItemParser(JULY_REGISTER, testTables(), { warrantPattern: '(' })).toThrow(
      'Invalid warrant pattern'
    );
  });
});
