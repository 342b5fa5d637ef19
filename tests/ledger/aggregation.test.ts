import { describe, it, expect } from 'vitest';
import { buildAggregationIndex, findBucket, formatBucketKey, DEFAULT_GROUPING_RULES } from '@warrant-ledger/ledger';
import { makeRecord } from '../helpers/records.js';

const records = [
  makeRecord({
    documentId: 'reg-2024-07',
    payeeName: 'ZUM SERVICES, INC.',
    amountMinor: 50000,
    transactionDate: '2024-07-16',
    category: 'Services and Operating',
  }),
  makeRecord({
    documentId: 'reg-2024-08',
    payeeName: 'Zum Services Inc',
    amountMinor: 12345,
    transactionDate: '2024-08-02',
    category: 'Services and Operating',
    provenanceConfidence: 'low',
  }),
  makeRecord({
    documentId: 'reg-2024-07',
    payeeName: 'ACME SCHOOL SUPPLY',
    amountMinor: -7500,
    transactionDate: '2024-07-20',
    category: 'Books and Supplies',
    accountCode: '01-4300',
  }),
];

describe('buildAggregationIndex', () => {
  it('should total every bucket from its records to the cent', () => {
    const index = buildAggregationIndex(records);
    const byId = new Map(records.map((record) => [record.recordId, record]));

    for (const bucket of index.values()) {
      const sum = bucket.recordIds.reduce((total, id) => total + (byId.get(id)?.amountMinor ?? Number.NaN), 0);
      expect(sum).toBe(bucket.totalMinor);
      expect(bucket.recordCount).toBe(bucket.recordIds.length);
    }
  });

  it('should key buckets by rule and dimension values', () => {
    const index = buildAggregationIndex(records);
    const zum = index.get('payee+fiscalYear:payee=zum services inc|fiscalYear=2025');

    expect(zum).toMatchObject({
      rule: 'payee+fiscalYear',
      dimensions: { payee: 'zum services inc', fiscalYear: '2025' },
      totalMinor: 62345,
      recordCount: 2,
      minDate: '2024-07-16',
      maxDate: '2024-08-02',
      lowConfidenceTotalMinor: 12345,
      lowConfidenceCount: 1,
    });
    expect(index.get('fiscalYear+fiscalMonth:fiscalYear=2025|fiscalMonth=2024-07')?.totalMinor).toBe(42500);
    expect(index.get('category:category=Books and Supplies')?.totalMinor).toBe(-7500);
  });

  it('should emit buckets in key order', () => {
    const keys = [...buildAggregationIndex(records).keys()];
    expect(keys).toEqual([...keys].sort());
    expect(keys).toHaveLength(11);
  });

  it('should give the same buckets for any record order', () => {
    const forward = [...buildAggregationIndex(records).values()];
    const reversed = [...buildAggregationIndex([...records].reverse()).values()];
    expect(JSON.stringify(reversed)).toBe(JSON.stringify(forward));
  });

  it('should apply custom grouping rules', () => {
    const index = buildAggregationIndex(records, [{ name: 'code', dimensions: ['accountCode', 'document'] }]);

    expect([...index.keys()]).toEqual([
      'code:accountCode=(none)|document=reg-2024-07',
      'code:accountCode=(none)|document=reg-2024-08',
      'code:accountCode=01-4300|document=reg-2024-07',
    ]);
  });

  it('should return no buckets for no records', () => {
    expect(buildAggregationIndex([], DEFAULT_GROUPING_RULES).size).toBe(0);
  });
});

describe('findBucket', () => {
  it('should match dimensions in any order', () => {
    const index = buildAggregationIndex(records);
    const bucket = findBucket(index, [
      ['fiscalYear', '2025'],
      ['payee', 'zum services inc'],
    ]);

    expect(bucket?.key).toBe(formatBucketKey('payee+fiscalYear', [['payee', 'zum services inc'], ['fiscalYear', '2025']]));
    expect(findBucket(index, [['payee', 'nobody']])).toBeUndefined();
  });
});
