/**
 * Aggregation Index.
 *
 * A pure recomputation over the canonical record set: nothing is updated in
 * place, and buckets come back in key order with sorted record ids, so the
 * same records always serialize to the same bytes.
 */
import {
  compareDates,
  fiscalMonthOf,
  type AggregateBucket,
  type Dimension,
  type GroupingRule,
  type TransactionRecord,
} from '@warrant-ledger/types';

export type AggregationIndex = ReadonlyMap<string, AggregateBucket>;

export const DEFAULT_GROUPING_RULES: readonly GroupingRule[] = [
  { name: 'payee', dimensions: ['payee'] },
  { name: 'payee+fiscalYear', dimensions: ['payee', 'fiscalYear'] },
  { name: 'category', dimensions: ['category'] },
  { name: 'category+fiscalYear', dimensions: ['category', 'fiscalYear'] },
  { name: 'fiscalYear', dimensions: ['fiscalYear'] },
  { name: 'fiscalYear+fiscalMonth', dimensions: ['fiscalYear', 'fiscalMonth'] },
];

/** Stands in for a record without an account code */
export const NO_ACCOUNT_CODE = '(none)';

export function dimensionValue(record: TransactionRecord, dimension: Dimension): string {
  switch (dimension) {
    case 'payee':
      return record.payeeNormalized;
    case 'category':
      return record.category;
    case 'accountCode':
      return record.accountCode ?? NO_ACCOUNT_CODE;
    case 'fiscalYear':
      return String(record.fiscalYear);
    case 'fiscalMonth':
      return fiscalMonthOf(record.transactionDate);
    case 'document':
      return record.sourceDocumentId;
  }
}

/**
 * `rule:dim=value|dim=value`, dimensions in the rule's order.
 */
export function formatBucketKey(
  ruleName: string,
  dimensions: ReadonlyArray<readonly [Dimension, string]>
): string {
  return `${ruleName}:${dimensions.map(([dimension, value]) => `${dimension}=${value}`).join('|')}`;
}

interface BucketDraft {
  rule: string;
  dimensions: Record<string, string>;
  records: TransactionRecord[];
}

function finalizeBucket(key: string, draft: BucketDraft): AggregateBucket {
  const low = draft.records.filter((record) => record.provenanceConfidence === 'low');
  const dates = draft.records.map((record) => record.transactionDate).sort(compareDates);

  let totalMinor = 0;
  for (const record of draft.records) {
    totalMinor += record.amountMinor;
  }
  let lowConfidenceTotalMinor = 0;
  for (const record of low) {
    lowConfidenceTotalMinor += record.amountMinor;
  }

  return {
    key,
    rule: draft.rule,
    dimensions: draft.dimensions,
    totalMinor,
    recordCount: draft.records.length,
    recordIds: draft.records.map((record) => record.recordId).sort(),
    minDate: dates[0] ?? '',
    maxDate: dates[dates.length - 1] ?? '',
    lowConfidenceTotalMinor,
    lowConfidenceCount: low.length,
    lowConfidenceRecordIds: low.map((record) => record.recordId).sort(),
  };
}

/**
 * Group records into buckets under every rule.
 */
export function buildAggregationIndex(
  records: readonly TransactionRecord[],
  rules: readonly GroupingRule[] = DEFAULT_GROUPING_RULES
): AggregationIndex {
  const drafts = new Map<string, BucketDraft>();

  for (const rule of rules) {
    for (const record of records) {
      const values = rule.dimensions.map((dimension) => [dimension, dimensionValue(record, dimension)] as const);
      const key = formatBucketKey(rule.name, values);

      let draft = drafts.get(key);
      if (draft === undefined) {
        draft = { rule: rule.name, dimensions: Object.fromEntries(values), records: [] };
        drafts.set(key, draft);
      }
      draft.records.push(record);
    }
  }

  const index = new Map<string, AggregateBucket>();
  for (const key of [...drafts.keys()].sort()) {
    const draft = drafts.get(key);
    if (draft === undefined) continue;
    index.set(key, finalizeBucket(key, draft));
  }
  return index;
}

/**
 * Find the bucket whose rule has exactly these dimensions (in any order)
 * and whose values match.
 */
export function findBucket(
  index: AggregationIndex,
  query: ReadonlyArray<readonly [Dimension, string]>
): AggregateBucket | undefined {
  const wanted = new Map<string, string>(query);
  for (const bucket of index.values()) {
    const entries = Object.entries(bucket.dimensions);
    if (entries.length !== wanted.size) continue;
    if (entries.every(([dimension, value]) => wanted.get(dimension) === value)) {
      return bucket;
    }
  }
  return undefined;
}
