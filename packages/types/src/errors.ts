/**
 * Failure taxonomy.
 *
 * Only acquisition failures and missing reference tables are thrown; every
 * other failure is returned as a record so a batch always completes.
 */

/**
 * Page text could not be acquired (OCR engine or text layer unavailable).
 * Document-scoped; retried when `retryable` is set.
 */
export class AcquisitionError extends Error {
  readonly documentId: string;
  readonly retryable: boolean;

  constructor(documentId: string, message: string, options: { retryable?: boolean; cause?: unknown } = {}) {
    super(message, options.cause !== undefined ? { cause: options.cause } : undefined);
    this.name = 'AcquisitionError';
    this.documentId = documentId;
    this.retryable = options.retryable ?? true;
  }
}

/**
 * Reference tables are missing or malformed. Fatal to the whole run.
 */
export class ReferenceTableError extends Error {
  readonly table: string;

  constructor(table: string, message: string) {
    super(`Reference table "${table}": ${message}`);
    this.name = 'ReferenceTableError';
    this.table = table;
  }
}

export type ParseFailureReason =
  | 'no-amount'
  | 'ambiguous-amount'
  | 'unparseable-amount';

/**
 * A row that could not yield a record. Kept for manual review.
 */
export interface ParseFailure {
  kind: 'parse-failure';
  documentId: string;
  pageIndex: number;
  rowIndex: number;
  rowText: string;
  reason: ParseFailureReason;
  detail: string;
}

export type ValidationRejectionReason =
  | 'invalid-amount'
  | 'invalid-date'
  | 'date-outside-fiscal-year'
  | 'empty-payee';

/**
 * A candidate record that violates a ledger invariant.
 */
export interface ValidationRejection {
  kind: 'validation-rejection';
  documentId: string;
  pageIndex: number;
  rowIndex: number;
  rowText: string;
  reason: ValidationRejectionReason;
  detail: string;
}

/**
 * Two or more equally good duplicate candidates; held for manual resolution.
 */
export interface ReconciliationAmbiguity {
  kind: 'reconciliation-ambiguity';
  recordId: string;
  candidateRecordIds: string[];
  score: number;
  documentIds: string[];
  detail: string;
}

/**
 * A claim cites a source the index cannot resolve.
 */
export interface ClaimResolutionGap {
  kind: 'claim-resolution-gap';
  claimId: string;
  source: string;
  detail: string;
}

/**
 * A whole document dropped out of the batch.
 */
export interface DocumentError {
  kind: 'document-error';
  documentId: string;
  stage: 'acquisition' | 'processing';
  error: string;
  attempts: number;
  timestamp: string;
}
