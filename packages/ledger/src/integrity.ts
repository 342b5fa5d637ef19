/**
 * Control-total integrity checks.
 *
 * Compares each document's validated records (net of voids) with the totals
 * printed on its cover letter. Discrepancies are reported, never fixed.
 */
import {
  formatCurrency,
  majorToMinor,
  type DocumentDescriptor,
  type TransactionRecord,
} from '@warrant-ledger/types';

export interface ControlTotalInput {
  descriptor: DocumentDescriptor;
  records: readonly TransactionRecord[];
}

export interface ControlTotalCheck {
  documentId: string;
  statedTotalMinor: number | null;
  parsedTotalMinor: number;
  deltaMinor: number | null;
  /** |parsed − stated| / stated × 100, two decimals */
  percentDifference: number | null;
  statedCount: number | null;
  parsedCount: number;
  countDelta: number | null;
  withinThreshold: boolean;
  severity: 'info' | 'warning' | 'error';
  message: string;
}

export interface IntegrityCheckResult {
  overallValid: boolean;
  documentsChecked: number;
  documentsWithIssues: number;
  results: ControlTotalCheck[];
  summary: {
    totalDiscrepancies: number;
    warnings: string[];
    thresholdPercent: number;
  };
}

/** Default tolerated percent difference from the stated total */
export const DEFAULT_CONTROL_TOTAL_THRESHOLD = 2;

function percentDifference(parsed: number, stated: number): number {
  if (stated === 0) return parsed === 0 ? 0 : 100;
  return Math.round((Math.abs(parsed - stated) / Math.abs(stated)) * 10000) / 100;
}

export function checkControlTotal(
  input: ControlTotalInput,
  thresholdPercent: number = DEFAULT_CONTROL_TOTAL_THRESHOLD
): ControlTotalCheck {
  const { descriptor, records } = input;

  let parsedTotalMinor = 0;
  for (const record of records) {
    parsedTotalMinor += record.amountMinor;
  }
  const parsedCount = records.length;

  const statedTotalMinor = descriptor.statedTotal !== undefined ? majorToMinor(descriptor.statedTotal) : null;
  const statedCount = descriptor.statedCount ?? null;

  const deltaMinor = statedTotalMinor !== null ? parsedTotalMinor - statedTotalMinor : null;
  const percent = statedTotalMinor !== null ? percentDifference(parsedTotalMinor, statedTotalMinor) : null;
  const countDelta = statedCount !== null ? parsedCount - statedCount : null;

  const withinThreshold = percent === null || percent <= thresholdPercent;
  const exact = deltaMinor === 0 && (countDelta === null || countDelta === 0);

  let message: string;
  if (statedTotalMinor === null) {
    message = `${descriptor.documentId}: no stated total; parsed ${formatCurrency(parsedTotalMinor)} over ${parsedCount} records`;
  } else {
    message =
      `${descriptor.documentId}: parsed ${formatCurrency(parsedTotalMinor)} vs stated ${formatCurrency(statedTotalMinor)} ` +
      `(${percent ?? 0}% diff)`;
    if (countDelta !== null && countDelta !== 0) {
      message += `, ${parsedCount} records vs ${statedCount ?? 0} stated`;
    }
  }

  return {
    documentId: descriptor.documentId,
    statedTotalMinor,
    parsedTotalMinor,
    deltaMinor,
    percentDifference: percent,
    statedCount,
    parsedCount,
    countDelta,
    withinThreshold,
    severity: !withinThreshold ? 'error' : exact || statedTotalMinor === null ? 'info' : 'warning',
    message,
  };
}

/**
 * Check every document that states a total or count.
 */
export function checkControlTotals(
  inputs: readonly ControlTotalInput[],
  thresholdPercent: number = DEFAULT_CONTROL_TOTAL_THRESHOLD
): IntegrityCheckResult {
  const results = inputs
    .filter((input) => input.descriptor.statedTotal !== undefined || input.descriptor.statedCount !== undefined)
    .map((input) => checkControlTotal(input, thresholdPercent));

  const documentsWithIssues = results.filter((result) => !result.withinThreshold).length;
  const discrepancies = results.filter((result) => result.severity !== 'info');

  const warnings: string[] = [];
  if (documentsWithIssues > 0) {
    warnings.push(`${documentsWithIssues} document(s) differ from their stated total by more than ${thresholdPercent}%`);
  }

  return {
    overallValid: documentsWithIssues === 0,
    documentsChecked: results.length,
    documentsWithIssues,
    results,
    summary: {
      totalDiscrepancies: discrepancies.length,
      warnings,
      thresholdPercent,
    },
  };
}
