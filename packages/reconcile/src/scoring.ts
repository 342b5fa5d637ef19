/**
 * Pairwise scoring for fuzzy duplicate candidates.
 */
import { compareDates, daysBetween, type ReportingPeriod, type TransactionRecord } from '@warrant-ledger/types';

export interface ScoreOptions {
  dateToleranceDays: number;
  periods: ReadonlyMap<string, ReportingPeriod>;
}

export interface PairScore {
  score: number;
  dateDistance: number;
}

function withinPeriod(date: string, period: ReportingPeriod): boolean {
  return compareDates(date, period.start) >= 0 && compareDates(date, period.end) <= 0;
}

function periodDateCovers(periodSide: TransactionRecord, other: TransactionRecord, options: ScoreOptions): boolean {
  if (periodSide.datePrecision !== 'period') return false;
  const period = options.periods.get(periodSide.sourceDocumentId);
  return period !== undefined && withinPeriod(other.transactionDate, period);
}

/**
 * Distance in days used for scoring, or null when the dates cannot match.
 *
 * A period-dated record only knows its payment happened inside its
 * document's period; it matches a date inside that period at exactly the
 * tolerance, the weakest acceptable distance.
 */
export function dateDistance(a: TransactionRecord, b: TransactionRecord, options: ScoreOptions): number | null {
  const tolerance = options.dateToleranceDays;

  if (a.datePrecision === 'period' || b.datePrecision === 'period') {
    const known = options.periods.has(a.sourceDocumentId) || options.periods.has(b.sourceDocumentId);
    if (known) {
      return periodDateCovers(a, b, options) || periodDateCovers(b, a, options) ? tolerance : null;
    }
  }

  const distance = Math.abs(daysBetween(a.transactionDate, b.transactionDate));
  return distance <= tolerance ? distance : null;
}

function sharesDocument(a: TransactionRecord, b: TransactionRecord): boolean {
  return a.sourceDocumentIds.some((documentId) => b.sourceDocumentIds.includes(documentId));
}

/**
 * Score two records as the same payment, or null when they are not
 * candidates at all.
 */
export function scorePair(a: TransactionRecord, b: TransactionRecord, options: ScoreOptions): PairScore | null {
  if (sharesDocument(a, b)) return null;
  if (a.payeeNormalized !== b.payeeNormalized) return null;
  if (a.amountMinor !== b.amountMinor) return null;
  if (a.fiscalYear !== b.fiscalYear) return null;

  const bothWarrants = a.warrantNumber !== null && b.warrantNumber !== null;
  if (bothWarrants && a.warrantNumber !== b.warrantNumber) return null;

  const distance = dateDistance(a, b, options);
  if (distance === null) return null;

  const score = 1 - distance / (options.dateToleranceDays + 1) + (bothWarrants ? 0.5 : 0);
  return { score, dateDistance: distance };
}
