export {
  buildAggregationIndex,
  dimensionValue,
  findBucket,
  formatBucketKey,
  DEFAULT_GROUPING_RULES,
  NO_ACCOUNT_CODE,
  type AggregationIndex,
} from './aggregation.js';
export {
  buildCanonicalLedger,
  compareRecords,
  type BuildLedgerOptions,
  type LedgerDocumentInput,
} from './ledger-builder.js';
export {
  checkControlTotal,
  checkControlTotals,
  DEFAULT_CONTROL_TOTAL_THRESHOLD,
  type ControlTotalCheck,
  type ControlTotalInput,
  type IntegrityCheckResult,
} from './integrity.js';
