import { describe, it, expect } from 'vitest';
import { dateDistance, reconcileRecords, scorePair } from '@warrant-ledger/reconcile';
import type { ReportingPeriod } from '@warrant-ledger/types';
import { makeRecord } from '../helpers/records.js';

const Q1: ReportingPeriod = { start: '2024-07-01', end: '2024-09-30' };
const PERIODS = new Map<string, ReportingPeriod>([
  ['reg-2024-07', { start: '2024-07-01', end: '2024-07-31' }],
  ['sum-q1', Q1],
]);

describe('reconcileRecords', () => {
  describe('exact record ids', () => {
    it('should keep the highest-confidence copy as canonical', () => {
      const seed = { payeeName: 'ZUM SERVICES, INC.', amountMinor: 50000, transactionDate: '2024-07-16' };
      const low = makeRecord({ ...seed, documentId: 'reg-a', provenanceConfidence: 'medium', rowIndex: 4 });
      const high = makeRecord({ ...seed, documentId: 'reg-b', provenanceConfidence: 'high', rowIndex: 9 });

      const result = reconcileRecords([low, high]);

      expect(result.records).toHaveLength(1);
      expect(result.records[0]).toMatchObject({
        recordId: low.recordId,
        sourceDocumentId: 'reg-b',
        sourceDocumentIds: ['reg-a', 'reg-b'],
        provenanceConfidence: 'high',
        mergedRecordIds: [],
        flags: [],
      });
      expect(result.records[0]?.provenance.map((p) => [p.documentId, p.rowIndex])).toEqual([
        ['reg-a', 4],
        ['reg-b', 9],
      ]);
      expect(result.summary.exactDuplicatesMerged).toBe(1);
    });

    it('should break confidence ties by document id, then page and row', () => {
      const seed = { payeeName: 'ACME', amountMinor: 100, transactionDate: '2024-07-16' };
      const later = makeRecord({ ...seed, documentId: 'reg-a', pageIndex: 2, rowIndex: 1 });
      const earlier = makeRecord({ ...seed, documentId: 'reg-a', pageIndex: 1, rowIndex: 7 });
      const otherDoc = makeRecord({ ...seed, documentId: 'reg-0' });

      const result = reconcileRecords([later, earlier]);
      expect(result.records[0]?.provenance[0]).toMatchObject({ pageIndex: 1, rowIndex: 7 });

      const withOther = reconcileRecords([later, otherDoc]);
      expect(withOther.records[0]?.sourceDocumentId).toBe('reg-0');
    });

    it('should flag a record repeated inside one document', () => {
      const seed = {
        documentId: 'reg-a',
        payeeName: 'ACME',
        amountMinor: 2500,
        transactionDate: '2024-07-16',
        warrantNumber: '0200000001',
      };
      const first = makeRecord({ ...seed, pageIndex: 1, rowIndex: 12 });
      const repeat = makeRecord({ ...seed, pageIndex: 2, rowIndex: 0 });

      const result = reconcileRecords([first, repeat]);

      expect(result.records).toHaveLength(1);
      expect(result.records[0]?.flags).toEqual(['duplicate-in-document']);
      expect(result.records[0]?.provenance).toHaveLength(2);
      expect(result.duplicates).toEqual([{ recordId: first.recordId, documentId: 'reg-a', occurrences: 2 }]);
    });
  });

  describe('fuzzy matching', () => {
    it('should merge the same payment formatted differently in two documents', () => {
      const register = makeRecord({
        documentId: 'reg-2024-07',
        payeeName: 'ACME INC.',
        amountMinor: 123456,
        transactionDate: '2024-07-15',
        warrantNumber: '0200012345',
      });
      const summary = makeRecord({
        documentId: 'sum-q1',
        payeeName: 'Acme Inc',
        amountMinor: 123456,
        transactionDate: '2024-07-16',
        provenanceConfidence: 'medium',
      });
      expect(register.recordId).not.toBe(summary.recordId);

      const result = reconcileRecords([summary, register], { periods: PERIODS });

      expect(result.records).toHaveLength(1);
      expect(result.records[0]).toMatchObject({
        recordId: register.recordId,
        payeeName: 'ACME INC.',
        sourceDocumentId: 'reg-2024-07',
        sourceDocumentIds: ['reg-2024-07', 'sum-q1'],
        mergedRecordIds: [summary.recordId],
        flags: ['fuzzy-merged'],
      });
      expect(result.records[0]?.provenance.map((p) => p.documentId)).toEqual(['reg-2024-07', 'sum-q1']);
      expect(result.fuzzyMatches).toEqual([
        {
          canonicalRecordId: register.recordId,
          mergedRecordId: summary.recordId,
          score: 0.75,
          dateDistance: 1,
        },
      ]);
    });

    it('should match a period-dated record to a date inside its period', () => {
      const register = makeRecord({
        documentId: 'reg-2024-07',
        payeeName: 'BAYSIDE TRANSIT',
        amountMinor: 9000,
        transactionDate: '2024-07-25',
      });
      const summary = makeRecord({
        documentId: 'sum-q1',
        payeeName: 'Bayside Transit',
        amountMinor: 9000,
        transactionDate: '2024-09-30',
        datePrecision: 'period',
        provenanceConfidence: 'medium',
      });

      const result = reconcileRecords([register, summary], { periods: PERIODS });

      expect(result.records).toHaveLength(1);
      expect(result.fuzzyMatches[0]).toMatchObject({ dateDistance: 3, score: 0.25 });
    });

    it('should leave records unmerged when no candidate qualifies', () => {
      const base = { payeeName: 'ACME', amountMinor: 5000, transactionDate: '2024-07-15' };
      const records = [
        makeRecord({ ...base, documentId: 'reg-a', warrantNumber: '0200000001' }),
        makeRecord({ ...base, documentId: 'reg-b', warrantNumber: '0200000002' }),
        makeRecord({ ...base, documentId: 'reg-c', transactionDate: '2024-07-22' }),
        makeRecord({ ...base, documentId: 'reg-d', amountMinor: 5001 }),
      ];

      const result = reconcileRecords(records, { periods: PERIODS });

      expect(result.records).toHaveLength(4);
      expect(result.fuzzyMatches).toEqual([]);
      expect(result.ambiguities).toEqual([]);
    });

    it('should report a tie instead of guessing', () => {
      const register = makeRecord({
        documentId: 'reg-2024-07',
        payeeName: 'ACME',
        amountMinor: 5000,
        transactionDate: '2024-07-15',
        warrantNumber: '0200000001',
      });
      const before = makeRecord({ documentId: 'sum-q1', payeeName: 'Acme', amountMinor: 5000, transactionDate: '2024-07-14' });
      const after = makeRecord({ documentId: 'sum-q1', payeeName: 'Acme', amountMinor: 5000, transactionDate: '2024-07-16' });

      const result = reconcileRecords([register, before, after], { periods: new Map() });

      expect(result.records).toHaveLength(3);
      expect(result.fuzzyMatches).toEqual([]);
      expect(result.ambiguities).toEqual([
        {
          kind: 'reconciliation-ambiguity',
          recordId: register.recordId,
          candidateRecordIds: [before.recordId, after.recordId].sort(),
          score: 0.75,
          documentIds: ['reg-2024-07', 'sum-q1'],
          detail: '2 candidates tie at score 0.750 for ACME 2024-07-15',
        },
      ]);
    });
  });

  it('should produce the same output for any input order', () => {
    const records = [
      makeRecord({ documentId: 'reg-a', payeeName: 'ACME', amountMinor: 100, transactionDate: '2024-07-01' }),
      makeRecord({ documentId: 'reg-b', payeeName: 'Acme', amountMinor: 100, transactionDate: '2024-07-02' }),
      makeRecord({ documentId: 'reg-b', payeeName: 'ZUM', amountMinor: 700, transactionDate: '2024-07-09' }),
    ];

    const forward = reconcileRecords(records);
    const reversed = reconcileRecords([...records].reverse());

    expect(JSON.stringify(reversed)).toBe(JSON.stringify(forward));
  });
});

describe('scorePair', () => {
  const options = { dateToleranceDays: 3, periods: PERIODS };

  it('should add a bonus for equal warrant numbers', () => {
    const a = makeRecord({ documentId: 'reg-a', payeeName: 'ACME', amountMinor: 1, transactionDate: '2024-07-15', warrantNumber: '0200000009' });
    const b = makeRecord({ documentId: 'reg-b', payeeName: 'ACME', amountMinor: 1, transactionDate: '2024-07-15', warrantNumber: '0200000009' });

    expect(scorePair(a, b, options)).toEqual({ score: 1.5, dateDistance: 0 });
  });

  it('should never pair records from the same document', () => {
    const a = makeRecord({ documentId: 'reg-a', payeeName: 'ACME', amountMinor: 1, transactionDate: '2024-07-15' });
    const b = makeRecord({ documentId: 'reg-a', payeeName: 'ACME', amountMinor: 1, transactionDate: '2024-07-16' });

    expect(scorePair(a, b, options)).toBeNull();
  });

  it('should reject a period date when the other date falls outside the period', () => {
    const summary = makeRecord({
      documentId: 'sum-q1',
      payeeName: 'ACME',
      amountMinor: 1,
      transactionDate: '2024-09-30',
      datePrecision: 'period',
    });
    const october = makeRecord({ documentId: 'reg-b', payeeName: 'ACME', amountMinor: 1, transactionDate: '2024-10-01' });

    expect(dateDistance(summary, october, options)).toBeNull();
  });
});
