import { describe, it, expect } from 'vitest';
import { buildCanonicalLedger } from '@warrant-ledger/ledger';
import { CanonicalLedgerSchema, validateSchemaOutput, type DocumentDescriptor } from '@warrant-ledger/types';
import { makeRecord } from '../helpers/records.js';

const july: DocumentDescriptor = {
  documentId: 'reg-2024-07',
  documentType: 'register',
  fiscalYear: 2025,
  period: { start: '2024-07-01', end: '2024-07-31' },
  statedTotal: 1234.56,
};
const q1: DocumentDescriptor = {
  documentId: 'sum-q1',
  documentType: 'summary',
  fiscalYear: 2025,
  period: { start: '2024-07-01', end: '2024-09-30' },
};

const records = [
  makeRecord({ documentId: 'reg-2024-07', payeeName: 'ZUM', amountMinor: 700, transactionDate: '2024-07-20' }),
  makeRecord({ documentId: 'reg-2024-07', payeeName: 'ACME', amountMinor: 123456, transactionDate: '2024-07-15' }),
];

describe('buildCanonicalLedger', () => {
  const build = () =>
    buildCanonicalLedger(
      [
        { descriptor: q1, status: 'failed', recordCount: 0 },
        { descriptor: july, status: 'processed', recordCount: 2 },
      ],
      records
    );

  it('should sort records by date and documents by id', () => {
    const ledger = build();

    expect(ledger.records.map((r) => r.payeeName)).toEqual(['ACME', 'ZUM']);
    expect(ledger.documents).toEqual([
      {
        documentId: 'reg-2024-07',
        documentType: 'register',
        fiscalYear: 2025,
        period: { start: '2024-07-01', end: '2024-07-31' },
        status: 'processed',
        statedTotalMinor: 123456,
        statedCount: null,
        recordCount: 2,
      },
      {
        documentId: 'sum-q1',
        documentType: 'summary',
        fiscalYear: 2025,
        period: { start: '2024-07-01', end: '2024-09-30' },
        status: 'failed',
        statedTotalMinor: null,
        statedCount: null,
        recordCount: 0,
      },
    ]);
  });

  it('should satisfy both the zod model and the JSON schema', () => {
    const ledger = build();

    expect(CanonicalLedgerSchema.safeParse(ledger).success).toBe(true);
    expect(validateSchemaOutput('ledger', ledger)).toEqual({ valid: true, errors: [] });
  });

  it('should be identical across runs', () => {
    expect(JSON.stringify(build())).toBe(JSON.stringify(build()));
  });
});
