import type { CandidateRow, PhysicalRow } from '@warrant-ledger/page-text';
import { createReferenceTables, type ReferenceTables } from '@warrant-ledger/register-parser';
import type { DocumentDescriptor } from '@warrant-ledger/types';
import { joinLineText } from '@warrant-ledger/page-text';
import { rowLines } from './lines.js';

export const JULY_REGISTER: DocumentDescriptor = {
  documentId: 'reg-2024-07',
  documentType: 'register',
  fiscalYear: 2025,
  period: { start: '2024-07-01', end: '2024-07-31' },
};

export function testTables(): ReferenceTables {
  return createReferenceTables({
    codes: {
      '01-4300': { description: 'Materials and Supplies', category: 'Books and Supplies' },
      '01-5800': { description: 'Professional Services', category: 'Services and Operating' },
    },
  });
}

type Cells = ReadonlyArray<readonly [string, number]>;

/**
 * Build a candidate row directly: the primary row's cells, then any
 * continuation rows' cells.
 */
export function candidateRow(
  rows: readonly Cells[],
  options: { pageIndex?: number; rowIndex?: number; confidence?: number; degraded?: boolean } = {}
): CandidateRow {
  const pageIndex = options.pageIndex ?? 1;
  const physical: PhysicalRow[] = rows.map((cells, index) => {
    const lines = rowLines(pageIndex, 50 + index * 12, cells, options.confidence ?? 0.95);
    return {
      pageIndex,
      physicalIndex: index,
      lines,
      text: joinLineText(lines),
      centerY: 55 + index * 12,
      confidence: options.confidence ?? 0.95,
    };
  });

  return {
    pageIndex,
    rowIndex: options.rowIndex ?? 0,
    rows: physical,
    text: physical.map((row) => row.text).join(' '),
    confidence: options.confidence ?? 0.95,
    continuation: physical.length > 1,
    degraded: options.degraded ?? false,
  };
}
