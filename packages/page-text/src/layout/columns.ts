/**
 * Column inference for register pages.
 * Columns are re-estimated on every page by clustering the left x-offsets of
 * its lines; scanned pages drift too much for a fixed template.
 */
import type { Column, PhysicalRow } from '../types.js';

export interface ColumnInferenceOptions {
  columnTolerance?: number;
  minColumnSupport?: number;
}

interface Cluster {
  left: number;
  rows: Set<number>;
}

/**
 * Infer columns by clustering X coordinates across a page's rows.
 *
 * Consecutive left edges closer than `columnTolerance` chain into one
 * cluster. A cluster becomes a column when at least `minColumnSupport` of the
 * page's rows (and never fewer than two) start a line inside it. An empty
 * result means the page has no usable column structure.
 */
export function inferColumns(rows: readonly PhysicalRow[], options: ColumnInferenceOptions = {}): Column[] {
  const columnTolerance = options.columnTolerance ?? 12;
  const minColumnSupport = options.minColumnSupport ?? 0.2;

  const positions: Array<{ x: number; row: number }> = [];
  for (const row of rows) {
    for (const line of row.lines) {
      positions.push({ x: line.bbox.x, row: row.physicalIndex });
    }
  }
  if (positions.length === 0) return [];

  positions.sort((a, b) => a.x - b.x);

  const clusters: Cluster[] = [];
  let current: Cluster | null = null;
  let prevX = Number.NEGATIVE_INFINITY;

  for (const { x, row } of positions) {
    if (current === null || x - prevX > columnTolerance) {
      current = { left: x, rows: new Set<number>() };
      clusters.push(current);
    }
    current.rows.add(row);
    prevX = x;
  }

  const required = Math.max(2, Math.ceil(minColumnSupport * rows.length));
  const supported = clusters.filter((cluster) => cluster.rows.size >= required);

  return supported.map((cluster, index) => {
    const next = supported[index + 1];
    return {
      index,
      left: cluster.left,
      right: next !== undefined ? next.left - 1 : Number.POSITIVE_INFINITY,
      support: cluster.rows.size,
    };
  });
}

/**
 * Column spanning the whole page, used when inference finds none.
 */
export function singleColumn(rowCount: number): Column[] {
  return [{ index: 0, left: Number.NEGATIVE_INFINITY, right: Number.POSITIVE_INFINITY, support: rowCount }];
}

/**
 * Map an x-offset to its column. Offsets left of the first column fall into
 * it; anything else goes to the last column starting at or before it.
 */
export function getColumnForX(x: number, columns: readonly Column[]): number {
  let result = 0;
  for (const column of columns) {
    if (x >= column.left) {
      result = column.index;
    }
  }
  return result;
}

/**
 * Distinct columns occupied by a row's lines.
 */
export function occupiedColumns(row: PhysicalRow, columns: readonly Column[]): Set<number> {
  return new Set(row.lines.map((line) => getColumnForX(line.bbox.x, columns)));
}
