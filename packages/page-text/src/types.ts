import type { RawLine } from '@warrant-ledger/types';

/**
 * Ordered, positioned text lines for every page of one document.
 *
 * A source is finite and restartable: every `lines()` call yields the whole
 * sequence again, so a failed attempt can be retried from the start.
 */
export interface PageTextSource {
  readonly documentId: string;
  lines(): AsyncIterable<RawLine>;
}

/**
 * Lines judged to share one baseline, sorted left to right.
 */
export interface PhysicalRow {
  pageIndex: number;
  /** Position of the row on its page (0-based, top to bottom) */
  physicalIndex: number;
  lines: RawLine[];
  text: string;
  /** Vertical centre of the row's anchor line */
  centerY: number;
  confidence: number;
}

/**
 * A column inferred from left-edge clustering.
 */
export interface Column {
  index: number;
  left: number;
  /** Next column's left − 1; unbounded for the last column */
  right: number;
  /** Number of physical rows with a line starting in this column */
  support: number;
}

/**
 * One logical register row: a primary physical row plus any payee
 * continuation rows that wrapped beneath it.
 */
export interface CandidateRow {
  pageIndex: number;
  /** Position among the page's candidate rows (0-based) */
  rowIndex: number;
  rows: PhysicalRow[];
  /** Text of every physical row, joined with single spaces */
  text: string;
  /** Minimum confidence over every constituent line */
  confidence: number;
  continuation: boolean;
  degraded: boolean;
}

export interface PageLayout {
  pageIndex: number;
  columns: Column[];
  degraded: boolean;
  rows: CandidateRow[];
}

export interface SegmenterOptions {
  /** Max distance between a line's vertical centre and its row's anchor */
  rowGap?: number;
  /** Max gap between consecutive left edges inside one column cluster */
  columnTolerance?: number;
  /** Share of the page's rows a cluster must reach to count as a column */
  minColumnSupport?: number;
}
