/**
 * Record validation and canonicalization.
 *
 * Invariant violations become rejections in the result; nothing here throws
 * for bad data.
 */
import {
  CONFIDENCE_THRESHOLDS,
  DEFAULT_FISCAL_CALENDAR,
  computeRecordId,
  fiscalYearRange,
  isValidISODate,
  isWithinFiscalYear,
  normalizePayee,
  type DocumentDescriptor,
  type FiscalCalendar,
  type ProvenanceConfidence,
  type RecordFlag,
  type TransactionRecord,
  type ValidationRejection,
  type ValidationRejectionReason,
} from '@warrant-ledger/types';
import type { CandidateRecord, ValidationOutcome } from './types.js';

export interface ValidatorOptions {
  fiscalToleranceDays?: number;
  fiscalCalendar?: FiscalCalendar;
}

const CONFIDENCE_RANK: Record<ProvenanceConfidence, number> = { low: 0, medium: 1, high: 2 };

/**
 * Map an OCR confidence to a provenance level, then cap it for the signals
 * that make a record less trustworthy than its pixels.
 *
 * Any field the parser had to repair or guess caps the level at medium; a
 * field below the low threshold drops it to low.
 */
export function deriveProvenanceConfidence(candidate: CandidateRecord): ProvenanceConfidence {
  if (candidate.degraded) return 'low';

  const weakestField = Math.min(...Object.values(candidate.fieldConfidence));
  if (weakestField < CONFIDENCE_THRESHOLDS.LOW) return 'low';

  let level: ProvenanceConfidence =
    candidate.ocrConfidence >= CONFIDENCE_THRESHOLDS.HIGH
      ? 'high'
      : candidate.ocrConfidence >= CONFIDENCE_THRESHOLDS.MEDIUM
        ? 'medium'
        : 'low';

  const capped =
    weakestField < 1 ||
    candidate.date.precision === 'period' ||
    candidate.accountCodeStatus === 'unknown' ||
    candidate.continuation;
  if (capped && CONFIDENCE_RANK[level] > CONFIDENCE_RANK.medium) {
    level = 'medium';
  }
  return level;
}

function collectFlags(candidate: CandidateRecord): RecordFlag[] {
  const flags: RecordFlag[] = [];
  if (candidate.date.precision === 'period') flags.push('period-date');
  if (candidate.accountCodeStatus === 'unknown') flags.push('unknown-account-code');
  if (candidate.continuation) flags.push('payee-continuation');
  if (candidate.degraded) flags.push('degraded-layout');
  if (candidate.void) flags.push('void');
  if (candidate.expenseLines.length > 0) flags.push('split-expense');
  return flags.sort();
}

export function validateCandidate(
  candidate: CandidateRecord,
  descriptor: DocumentDescriptor,
  options: ValidatorOptions = {}
): ValidationOutcome {
  const toleranceDays = options.fiscalToleranceDays ?? 0;
  const calendar = options.fiscalCalendar ?? DEFAULT_FISCAL_CALENDAR;

  const reject = (reason: ValidationRejectionReason, detail: string): ValidationOutcome => {
    const rejection: ValidationRejection = {
      kind: 'validation-rejection',
      documentId: candidate.documentId,
      pageIndex: candidate.pageIndex,
      rowIndex: candidate.rowIndex,
      rowText: candidate.rowText,
      reason,
      detail,
    };
    return { ok: false, rejection };
  };

  if (!Number.isSafeInteger(candidate.amountMinor) || candidate.amountMinor === 0) {
    return reject('invalid-amount', `Amount ${candidate.amountMinor} is not a non-zero whole number of cents`);
  }

  const date = candidate.date.iso;
  if (date === null || !isValidISODate(date)) {
    return reject('invalid-date', `"${candidate.date.raw ?? date ?? ''}" is not a calendar date`);
  }

  if (!isWithinFiscalYear(date, descriptor.fiscalYear, toleranceDays, calendar)) {
    const range = fiscalYearRange(descriptor.fiscalYear, calendar);
    return reject(
      'date-outside-fiscal-year',
      `${date} is outside FY${descriptor.fiscalYear} (${range.start}..${range.end}, tolerance ${toleranceDays}d)`
    );
  }

  const payeeNormalized = normalizePayee(candidate.payeeName);
  if (payeeNormalized === '') {
    return reject('empty-payee', 'No payee text left after field extraction');
  }

  const record: TransactionRecord = {
    recordId: computeRecordId({
      fiscalYear: descriptor.fiscalYear,
      payeeNormalized,
      amountMinor: candidate.amountMinor,
      transactionDate: date,
      warrantNumber: candidate.warrantNumber,
    }),
    sourceDocumentId: candidate.documentId,
    sourceDocumentIds: [candidate.documentId],
    fiscalYear: descriptor.fiscalYear,
    transactionDate: date,
    datePrecision: candidate.date.precision,
    payeeName: candidate.payeeName,
    payeeNormalized,
    amountMinor: candidate.amountMinor,
    warrantNumber: candidate.warrantNumber,
    accountCode: candidate.accountCode,
    accountCodeStatus: candidate.accountCodeStatus,
    category: candidate.category,
    provenanceConfidence: deriveProvenanceConfidence(candidate),
    provenance: [
      {
        documentId: candidate.documentId,
        pageIndex: candidate.pageIndex,
        rowIndex: candidate.rowIndex,
        rowText: candidate.rowText,
        ocrConfidence: candidate.ocrConfidence,
      },
    ],
    mergedRecordIds: [],
    flags: collectFlags(candidate),
  };

  return { ok: true, record };
}
