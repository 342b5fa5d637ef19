import { segmentLines } from '@warrant-ledger/page-text';
import type { DocumentDescriptor, ParseFailure, RawLine, TransactionRecord, ValidationRejection } from '@warrant-ledger/types';
import { detectCheckGaps } from './check-sequence.js';
import { LineItemParser } from './line-item-parser.js';
import type {
  CandidateRecord,
  DocumentContext,
  DocumentResult,
  PageSubtotal,
  SkippedRow,
  SkipReason,
} from './types.js';
import { validateCandidate } from './validator.js';

export interface DocumentInput {
  descriptor: DocumentDescriptor;
  lines: readonly RawLine[];
}

/**
 * Segment, parse and validate one document.
 *
 * A parsed record is validated once the next row shows it is complete, so
 * fund-object rows of a split check can still extend it.
 *
 * Pure with respect to its input: no shared state, so documents can run
 * concurrently.
 */
export function processDocument(input: DocumentInput, context: DocumentContext): DocumentResult {
  const { descriptor } = input;
  const options = context.options ?? {};
  const parser = new LineItemParser(descriptor, context.referenceTables, {
    warrantPattern: options.warrantPattern,
  });

  const pages = segmentLines(input.lines, options);

  const records: TransactionRecord[] = [];
  const unparsed: ParseFailure[] = [];
  const rejected: ValidationRejection[] = [];
  const skipped: SkippedRow[] = [];
  const skippedCounts: Record<SkipReason, number> = {
    header: 0,
    footer: 0,
    subtotal: 0,
    'summary-section': 0,
  };
  const pageSubtotals: PageSubtotal[] = [];

  let pending: CandidateRecord | null = null;
  const flush = (): void => {
    if (pending === null) return;
    const validated = validateCandidate(pending, descriptor, {
      fiscalToleranceDays: options.fiscalToleranceDays ?? 0,
      fiscalCalendar: context.referenceTables.fiscalCalendar,
    });
    if (validated.ok) {
      records.push(validated.record);
    } else {
      rejected.push(validated.rejection);
    }
    pending = null;
  };

  for (const page of pages) {
    for (const row of page.rows) {
      const outcome = parser.parseRow(row);
      if (outcome.kind === 'expense-line') {
        pending = outcome.candidate;
        continue;
      }
      flush();

      switch (outcome.kind) {
        case 'skipped': {
          skipped.push(outcome.skipped);
          skippedCounts[outcome.skipped.reason]++;
          if (outcome.skipped.reason === 'subtotal') {
            pageSubtotals.push({
              pageIndex: row.pageIndex,
              rowIndex: row.rowIndex,
              amountMinor: outcome.amountMinor,
              runningTotalMinor: outcome.runningTotalMinor,
              matchesRunningTotal: outcome.amountMinor === outcome.runningTotalMinor,
            });
          }
          break;
        }
        case 'failure':
          unparsed.push(outcome.failure);
          break;
        case 'record':
          pending = outcome.candidate;
          break;
      }
    }
  }
  flush();

  return {
    descriptor,
    records,
    unparsed,
    rejected,
    skipped,
    skippedCounts,
    degradedPages: pages.filter((page) => page.degraded).map((page) => page.pageIndex),
    pageSubtotals,
    checkGaps: detectCheckGaps(records.map((record) => record.warrantNumber)),
    pageCount: pages.length,
    lineCount: input.lines.length,
  };
}
