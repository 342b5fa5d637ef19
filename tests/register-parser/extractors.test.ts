/**
 * Tests for field extractor strategies.
 */
import { describe, it, expect } from 'vitest';
import {
  extractAccountCode,
  extractAmount,
  extractAmountSequence,
  extractDate,
  extractPayee,
  extractVoidMarker,
  extractWarrant,
  tokenizeRow,
} from '@warrant-ledger/register-parser';
import { candidateRow, testTables } from '../helpers/fixtures.js';

const NONE = new Set<number>();

function tokenized(...cells: Array<readonly [string, number]>) {
  return tokenizeRow(candidateRow([cells]));
}

describe('extractAmount', () => {
  it('should parse a plain amount with full confidence', () => {
    const result = extractAmount(tokenized(['ACME SUPPLY', 200], ['1,234.56', 450]));
    expect(result.value).toBe(123456);
    expect(result.confidence).toBe(1);
  });

  it('should take the rightmost line carrying an amount', () => {
    const result = extractAmount(tokenized(['ACME 100.00', 200], ['250.00', 450]));
    expect(result.value).toBe(25000);
  });

  it('should fail when one line holds two different amounts', () => {
    const result = extractAmount(tokenized(['ACME', 200], ['100.00 250.00', 450]));
    expect(result.value).toBeNull();
    expect(result.issue).toBe('ambiguous-amount');
  });

  it('should accept a repeated identical amount', () => {
    const result = extractAmount(tokenized(['ACME', 200], ['100.00 100.00', 450]));
    expect(result.value).toBe(10000);
    expect(result.consumed).toHaveLength(2);
  });

  it('should read parentheses as a reversal with reduced confidence', () => {
    const result = extractAmount(tokenized(['ACME', 200], ['(125.00)', 450]));
    expect(result.value).toBe(-12500);
    expect(result.confidence).toBe(0.9);
  });

  it('should reduce confidence when noise is glued to the amount', () => {
    const result = extractAmount(tokenized(['ACME', 200], ['=1,234.56', 450]));
    expect(result.value).toBe(123456);
    expect(result.confidence).toBe(0.9);
  });

  it('should report a row without an amount', () => {
    const result = extractAmount(tokenized(['ACME SUPPLY', 200]));
    expect(result.value).toBeNull();
    expect(result.issue).toBe('no-amount');
  });
});

describe('extractAmountSequence', () => {
  it('should list every amount in reading order', () => {
    const result = extractAmountSequence(tokenized(['01-5800', 380], ['50.00 200.00', 480]));
    expect(result.value).toEqual([5000, 20000]);
    expect(result.consumed).toEqual([1, 2]);
    expect(result.confidence).toBe(1);
  });

  it('should reduce confidence when any amount carries noise', () => {
    const result = extractAmountSequence(tokenized(['01-5800', 380], ['=50.00', 480]));
    expect(result.value).toEqual([5000]);
    expect(result.confidence).toBe(0.9);
  });
});

describe('extractDate', () => {
  it.each([
    ['07/15/2024', '2024-07-15'],
    ['7/5/24', '2024-07-05'],
    ['2024-07-15', '2024-07-15'],
    ['Jul 15, 2024', '2024-07-15'],
    ['15-Jul-24', '2024-07-15'],
    ['=07/15/2024', '2024-07-15'],
  ])('should parse %s', (text, iso) => {
    const result = extractDate(tokenized([text, 120], ['ACME', 200]), NONE);
    expect(result.value?.iso).toBe(iso);
    expect(result.confidence).toBe(1);
  });

  it('should flag a date-shaped token that is not a calendar date', () => {
    const result = extractDate(tokenized(['02/30/2024', 120]), NONE);
    expect(result.value).toEqual({ iso: null, raw: '02/30/2024' });
    expect(result.issue).toBe('invalid-date');
  });

  it('should return no value and period confidence when no date is printed', () => {
    const result = extractDate(tokenized(['ACME', 200]), NONE);
    expect(result.value).toBeNull();
    expect(result.confidence).toBe(0.6);
  });
});

describe('extractWarrant', () => {
  it('should accept a regular check number', () => {
    const result = extractWarrant(tokenized(['0200012345', 20]), NONE);
    expect(result.value).toBe('0200012345');
    expect(result.confidence).toBe(1);
  });

  it('should strip brace noise', () => {
    const result = extractWarrant(tokenized(['{0200012345}', 20]), NONE);
    expect(result.value).toBe('0200012345');
    expect(result.confidence).toBe(0.9);
  });

  it('should re-join and pad a split payroll deduction number', () => {
    const result = extractWarrant(tokenized(['DDP - 46', 20]), NONE);
    expect(result.value).toBe('DDP-00000046');
    expect(result.consumed).toHaveLength(3);
  });

  it('should accept a configured pattern', () => {
    const result = extractWarrant(tokenized(['CHK12345', 20]), NONE, /^(?:CHK\d{5})$/);
    expect(result.value).toBe('CHK12345');
  });

  it('should return null when there is no check number', () => {
    expect(extractWarrant(tokenized(['ACME', 200]), NONE).value).toBeNull();
  });
});

describe('extractAccountCode', () => {
  it('should resolve a known code to its table category', () => {
    const result = extractAccountCode(tokenized(['01-4300', 380]), NONE, testTables());
    expect(result.value).toEqual({ code: '01-4300', status: 'known', category: 'Books and Supplies' });
    expect(result.confidence).toBe(1);
  });

  it('should keep an unknown code and derive its family', () => {
    const result = extractAccountCode(tokenized(['01-5999', 380]), NONE, testTables());
    expect(result.value).toEqual({ code: '01-5999', status: 'unknown', category: 'Services and Operating' });
    expect(result.confidence).toBe(0.7);
  });
});

describe('extractVoidMarker', () => {
  it('should detect cancel and void markers', () => {
    expect(extractVoidMarker(tokenized(['Cancelled', 380]), NONE).value).toBe(true);
    expect(extractVoidMarker(tokenized(['VOID', 380]), NONE).value).toBe(true);
    expect(extractVoidMarker(tokenized(['ACME', 200]), NONE).value).toBe(false);
  });
});

describe('extractPayee', () => {
  it('should keep the alphabetic tokens no other strategy consumed', () => {
    const row = tokenizeRow(
      candidateRow([
        [
          ['0200012345', 20],
          ['+ACME SCHOOL', 200],
          ['1,234.56', 450],
        ],
        [['SUPPLY CO.', 200]],
      ])
    );
    const amount = extractAmount(row);
    const result = extractPayee(row, new Set(amount.consumed));
    expect(result.value).toBe('ACME SCHOOL SUPPLY CO.');
  });
});
