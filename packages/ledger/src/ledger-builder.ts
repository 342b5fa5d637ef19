import {
  LEDGER_SCHEMA_VERSION,
  PIPELINE_VERSION,
  compareDates,
  majorToMinor,
  type CanonicalLedger,
  type DocumentDescriptor,
  type GroupingRule,
  type LedgerDocument,
  type TransactionRecord,
} from '@warrant-ledger/types';
import { buildAggregationIndex, DEFAULT_GROUPING_RULES } from './aggregation.js';

export interface LedgerDocumentInput {
  descriptor: DocumentDescriptor;
  status: LedgerDocument['status'];
  /** Validated records the document produced before reconciliation */
  recordCount: number;
}

export interface BuildLedgerOptions {
  groupingRules?: readonly GroupingRule[];
}

export function compareRecords(a: TransactionRecord, b: TransactionRecord): number {
  return compareDates(a.transactionDate, b.transactionDate) || a.recordId.localeCompare(b.recordId);
}

function toLedgerDocument(input: LedgerDocumentInput): LedgerDocument {
  const { descriptor } = input;
  return {
    documentId: descriptor.documentId,
    documentType: descriptor.documentType,
    fiscalYear: descriptor.fiscalYear,
    period: descriptor.period,
    status: input.status,
    statedTotalMinor: descriptor.statedTotal !== undefined ? majorToMinor(descriptor.statedTotal) : null,
    statedCount: descriptor.statedCount ?? null,
    recordCount: input.recordCount,
  };
}

/**
 * Assemble the canonical ledger from reconciled records.
 *
 * Everything is derived from the inputs alone; no clock or run id goes in,
 * so identical inputs give an identical ledger.
 */
export function buildCanonicalLedger(
  documents: readonly LedgerDocumentInput[],
  records: readonly TransactionRecord[],
  options: BuildLedgerOptions = {}
): CanonicalLedger {
  const sortedRecords = [...records].sort(compareRecords);
  const index = buildAggregationIndex(sortedRecords, options.groupingRules ?? DEFAULT_GROUPING_RULES);

  return {
    schemaVersion: LEDGER_SCHEMA_VERSION,
    pipelineVersion: PIPELINE_VERSION,
    documents: documents
      .map(toLedgerDocument)
      .sort((a, b) => a.documentId.localeCompare(b.documentId)),
    records: sortedRecords,
    buckets: [...index.values()],
  };
}
