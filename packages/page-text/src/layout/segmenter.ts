/**
 * Layout segmenter: turns a document's RawLines into candidate register rows.
 */
import type { RawLine } from '@warrant-ledger/types';
import type { CandidateRow, Column, PageLayout, PageTextSource, PhysicalRow, SegmenterOptions } from '../types.js';
import { groupRows } from './rows.js';
import { inferColumns, occupiedColumns, singleColumn } from './columns.js';
import { hasAmountShape, hasDateShape, looksLikeHeaderOrFooter } from './shapes.js';

const DEFAULTS: Required<SegmenterOptions> = {
  rowGap: 8,
  columnTolerance: 12,
  minColumnSupport: 0.2,
};

function isDataRow(row: PhysicalRow): boolean {
  return hasAmountShape(row.text) || hasDateShape(row.text);
}

/**
 * A row that could be a wrapped payee: one column, alphabetic, and nothing
 * shaped like an amount or a date.
 */
function isTentativeContinuation(row: PhysicalRow, columns: readonly Column[]): boolean {
  return (
    occupiedColumns(row, columns).size === 1 &&
    /[A-Za-z]/.test(row.text) &&
    !isDataRow(row) &&
    !looksLikeHeaderOrFooter(row.text)
  );
}

function buildCandidate(rows: PhysicalRow[], rowIndex: number, degraded: boolean): CandidateRow {
  return {
    pageIndex: rows[0]?.pageIndex ?? 1,
    rowIndex,
    rows,
    text: rows.map((row) => row.text).join(' '),
    confidence: Math.min(...rows.map((row) => row.confidence)),
    continuation: rows.length > 1,
    degraded,
  };
}

/**
 * Segment one page.
 *
 * A run of tentative continuation rows directly under a data row is folded
 * into it only when the physical row after the run looks like data again.
 * Otherwise each row of the run stands alone. The page end closes any run.
 */
export function segmentPage(
  pageIndex: number,
  lines: readonly RawLine[],
  options: SegmenterOptions = {}
): PageLayout {
  const opts = { ...DEFAULTS, ...options };
  const physicalRows = groupRows(lines, opts.rowGap);

  const inferred = inferColumns(physicalRows, opts);
  const degraded = inferred.length === 0;
  const columns = degraded ? singleColumn(physicalRows.length) : inferred;

  const groups: PhysicalRow[][] = [];
  let i = 0;
  while (i < physicalRows.length) {
    const row = physicalRows[i];
    if (row === undefined) break;

    const previous = groups[groups.length - 1];
    const previousPrimary = previous?.[0];
    if (
      previous !== undefined &&
      previousPrimary !== undefined &&
      previous.length === 1 &&
      isDataRow(previousPrimary) &&
      isTentativeContinuation(row, columns)
    ) {
      let end = i;
      while (end < physicalRows.length) {
        const candidate = physicalRows[end];
        if (candidate === undefined || !isTentativeContinuation(candidate, columns)) break;
        end++;
      }

      const run = physicalRows.slice(i, end);
      const next = physicalRows[end];
      if (next !== undefined && isDataRow(next)) {
        previous.push(...run);
      } else {
        for (const tentative of run) {
          groups.push([tentative]);
        }
      }
      i = end;
      continue;
    }

    groups.push([row]);
    i++;
  }

  return {
    pageIndex,
    columns,
    degraded,
    rows: groups.map((group, rowIndex) => buildCandidate(group, rowIndex, degraded)),
  };
}

/**
 * Segment every page present in `lines`, in page order.
 */
export function segmentLines(lines: readonly RawLine[], options: SegmenterOptions = {}): PageLayout[] {
  const byPage = new Map<number, RawLine[]>();
  for (const line of lines) {
    const pageLines = byPage.get(line.pageIndex) ?? [];
    pageLines.push(line);
    byPage.set(line.pageIndex, pageLines);
  }

  return [...byPage.entries()]
    .sort(([a], [b]) => a - b)
    .map(([pageIndex, pageLines]) => segmentPage(pageIndex, pageLines, options));
}

/**
 * Read a source to the end.
 */
export async function collectLines(source: PageTextSource): Promise<RawLine[]> {
  const lines: RawLine[] = [];
  for await (const line of source.lines()) {
    lines.push(line);
  }
  return lines;
}

export async function segmentDocument(source: PageTextSource, options: SegmenterOptions = {}): Promise<PageLayout[]> {
  return segmentLines(await collectLines(source), options);
}
