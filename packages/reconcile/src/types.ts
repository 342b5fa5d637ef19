import type { ReconciliationAmbiguity, ReportingPeriod, TransactionRecord } from '@warrant-ledger/types';

export interface ReconcileOptions {
  /** Days apart two records may be and still fuzzy-match */
  dateToleranceDays?: number;
  /** Reporting period per document id, for matching period-dated records */
  periods?: ReadonlyMap<string, ReportingPeriod>;
}

/**
 * The same record id seen more than once inside one document.
 */
export interface DuplicateOccurrence {
  recordId: string;
  documentId: string;
  occurrences: number;
}

export interface FuzzyMatch {
  canonicalRecordId: string;
  mergedRecordId: string;
  score: number;
  dateDistance: number;
}

export interface ReconcileResult {
  records: TransactionRecord[];
  fuzzyMatches: FuzzyMatch[];
  ambiguities: ReconciliationAmbiguity[];
  duplicates: DuplicateOccurrence[];
  summary: {
    inputRecords: number;
    outputRecords: number;
    exactDuplicatesMerged: number;
    fuzzyMerged: number;
    ambiguous: number;
  };
}
