/**
 * Row clustering for positioned page text.
 * Groups lines into physical rows based on vertical-centre proximity.
 */
import type { RawLine } from '@warrant-ledger/types';
import type { PhysicalRow } from '../types.js';

export function lineCenterY(line: RawLine): number {
  return line.bbox.y + line.bbox.height / 2;
}

/**
 * Group one page's lines into physical rows.
 *
 * A line joins the current row when its centre lies within `rowGap` of the
 * row's anchor (its first line); otherwise it starts a new row. Rows come
 * back top to bottom, lines inside a row left to right.
 */
export function groupRows(lines: readonly RawLine[], rowGap: number = 8): PhysicalRow[] {
  const sorted = [...lines].sort(
    (a, b) => lineCenterY(a) - lineCenterY(b) || a.bbox.x - b.bbox.x || a.lineIndex - b.lineIndex
  );

  const rows: PhysicalRow[] = [];
  let current: RawLine[] = [];
  let anchorY = 0;

  for (const line of sorted) {
    const centerY = lineCenterY(line);
    if (current.length > 0 && Math.abs(centerY - anchorY) > rowGap) {
      rows.push(createRow(current, rows.length, anchorY));
      current = [];
    }
    if (current.length === 0) {
      anchorY = centerY;
    }
    current.push(line);
  }

  // Don't forget the last row
  if (current.length > 0) {
    rows.push(createRow(current, rows.length, anchorY));
  }

  return rows;
}

function createRow(lines: RawLine[], physicalIndex: number, centerY: number): PhysicalRow {
  const sorted = [...lines].sort((a, b) => a.bbox.x - b.bbox.x || a.lineIndex - b.lineIndex);
  return {
    pageIndex: sorted[0]?.pageIndex ?? 1,
    physicalIndex,
    lines: sorted,
    text: joinLineText(sorted),
    centerY,
    confidence: Math.min(...sorted.map((line) => line.confidence)),
  };
}

export function joinLineText(lines: readonly RawLine[]): string {
  return lines
    .map((line) => line.text.trim())
    .filter((text) => text !== '')
    .join(' ');
}
