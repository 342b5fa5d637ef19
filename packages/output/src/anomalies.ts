/**
 * Error/anomaly side channel: everything a reviewer needs to triage by hand,
 * each entry carrying its document id and row text where it has one.
 */
import type { ControlTotalCheck } from '@warrant-ledger/ledger';
import type { DuplicateOccurrence, ReconcileResult } from '@warrant-ledger/reconcile';
import type { CheckSequenceGap, DocumentResult, PageSubtotal } from '@warrant-ledger/register-parser';
import type {
  ClaimResolutionGap,
  DocumentError,
  ParseFailure,
  ReconciliationAmbiguity,
  ValidationRejection,
} from '@warrant-ledger/types';

export const ANOMALY_REPORT_VERSION = '1.0.0';

export type DocumentCheckGap = CheckSequenceGap & { documentId: string };
export type DocumentSubtotalMismatch = PageSubtotal & { documentId: string };

export interface AnomalyReport {
  schemaVersion: string;
  summary: {
    unparsedRows: number;
    rejectedRecords: number;
    reconciliationAmbiguities: number;
    duplicatesInDocument: number;
    documentErrors: number;
    checkSequenceGaps: number;
    subtotalMismatches: number;
    controlTotalIssues: number;
    claimResolutionGaps: number;
  };
  unparsed: ParseFailure[];
  rejected: ValidationRejection[];
  ambiguities: ReconciliationAmbiguity[];
  duplicates: DuplicateOccurrence[];
  documentErrors: DocumentError[];
  checkGaps: DocumentCheckGap[];
  subtotalMismatches: DocumentSubtotalMismatch[];
  controlTotals: ControlTotalCheck[];
  claimGaps: ClaimResolutionGap[];
}

export interface AnomalyInput {
  documents: readonly DocumentResult[];
  documentErrors?: readonly DocumentError[];
  reconciliation?: Pick<ReconcileResult, 'ambiguities' | 'duplicates'>;
  controlTotals?: readonly ControlTotalCheck[];
  claimGaps?: readonly ClaimResolutionGap[];
}

export function buildAnomalyReport(input: AnomalyInput): AnomalyReport {
  const unparsed = input.documents.flatMap((document) => document.unparsed);
  const rejected = input.documents.flatMap((document) => document.rejected);
  const checkGaps = input.documents.flatMap((document) =>
    document.checkGaps.map((gap) => ({ documentId: document.descriptor.documentId, ...gap }))
  );
  const subtotalMismatches = input.documents.flatMap((document) =>
    document.pageSubtotals
      .filter((subtotal) => !subtotal.matchesRunningTotal)
      .map((subtotal) => ({ documentId: document.descriptor.documentId, ...subtotal }))
  );
  const controlTotals = [...(input.controlTotals ?? [])];
  const ambiguities = [...(input.reconciliation?.ambiguities ?? [])];
  const duplicates = [...(input.reconciliation?.duplicates ?? [])];
  const documentErrors = [...(input.documentErrors ?? [])];
  const claimGaps = [...(input.claimGaps ?? [])];

  return {
    schemaVersion: ANOMALY_REPORT_VERSION,
    summary: {
      unparsedRows: unparsed.length,
      rejectedRecords: rejected.length,
      reconciliationAmbiguities: ambiguities.length,
      duplicatesInDocument: duplicates.length,
      documentErrors: documentErrors.length,
      checkSequenceGaps: checkGaps.length,
      subtotalMismatches: subtotalMismatches.length,
      controlTotalIssues: controlTotals.filter((check) => !check.withinThreshold).length,
      claimResolutionGaps: claimGaps.length,
    },
    unparsed,
    rejected,
    ambiguities,
    duplicates,
    documentErrors,
    checkGaps,
    subtotalMismatches,
    controlTotals,
    claimGaps,
  };
}
