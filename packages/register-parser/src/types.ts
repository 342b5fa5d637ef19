import type {
  AccountCodeStatus,
  AccountCodeTable,
  DatePrecision,
  DocumentDescriptor,
  DocumentError,
  FiscalCalendar,
  ParseFailure,
  TransactionRecord,
  ValidationRejection,
} from '@warrant-ledger/types';
import type { CandidateRow, SegmenterOptions } from '@warrant-ledger/page-text';

// ─── Reference tables ────────────────────────────────────────────────────────

export interface ReferenceTables {
  accountCodes: AccountCodeTable;
  /** Compiled from `accountCodes.pattern` */
  codePattern: RegExp;
  fiscalCalendar: FiscalCalendar;
}

// ─── Extraction ──────────────────────────────────────────────────────────────

/**
 * A whitespace-delimited token of a candidate row.
 */
export interface Token {
  id: number;
  text: string;
  /** 0 for the primary physical row, 1+ for continuation rows */
  physicalRow: number;
  /** Index of the token's line in {@link TokenizedRow.lines} */
  lineOrder: number;
  /** Character offsets within the line text */
  start: number;
  end: number;
}

export interface TokenizedLine {
  text: string;
  x: number;
  physicalRow: number;
  order: number;
}

export interface TokenizedRow {
  row: CandidateRow;
  lines: TokenizedLine[];
  tokens: Token[];
}

/**
 * Typed optional result of one extractor strategy.
 */
export interface ExtractorResult<T> {
  value: T | null;
  confidence: number;
  consumed: number[];
  /** Machine-readable problem code, e.g. `ambiguous-amount` */
  issue?: string | undefined;
  detail?: string | undefined;
}

export interface ExtractedDate {
  /** Null when the text is date-shaped but not a real calendar date */
  iso: string | null;
  raw: string;
}

export interface ExtractedAccountCode {
  code: string;
  status: Exclude<AccountCodeStatus, 'absent'>;
  category: string;
}

// ─── Parse outcomes ──────────────────────────────────────────────────────────

export type SkipReason = 'header' | 'footer' | 'subtotal' | 'summary-section';

export interface FieldConfidence {
  amount: number;
  date: number;
  warrant: number;
  accountCode: number;
  payee: number;
}

/**
 * One fund-object line of a check whose expense is split across codes.
 */
export interface ExpenseLine {
  rowIndex: number;
  accountCode: string;
  expensedMinor: number;
}

/**
 * A parsed row, not yet validated.
 */
export interface CandidateRecord {
  documentId: string;
  pageIndex: number;
  rowIndex: number;
  rowText: string;
  ocrConfidence: number;
  degraded: boolean;
  continuation: boolean;
  amountMinor: number;
  void: boolean;
  date: {
    iso: string | null;
    raw: string | null;
    precision: DatePrecision;
  };
  warrantNumber: string | null;
  accountCode: string | null;
  accountCodeStatus: AccountCodeStatus;
  category: string;
  payeeName: string;
  fieldConfidence: FieldConfidence;
  /** Fund-object lines of a split check, first row included; empty otherwise */
  expenseLines: ExpenseLine[];
}

export interface SkippedRow {
  pageIndex: number;
  rowIndex: number;
  rowText: string;
  reason: SkipReason;
}

export type ParseOutcome =
  | { kind: 'record'; candidate: CandidateRecord }
  | {
      kind: 'skipped';
      skipped: SkippedRow;
      /** Amount printed on a subtotal row */
      amountMinor: number | null;
      /** Page running total when the row was classified */
      runningTotalMinor: number;
    }
  | { kind: 'failure'; failure: ParseFailure }
  /** A fund-object row folded into the open check; replaces its candidate */
  | { kind: 'expense-line'; candidate: CandidateRecord; line: ExpenseLine };

export type ValidationOutcome =
  | { ok: true; record: TransactionRecord }
  | { ok: false; rejection: ValidationRejection };

// ─── Document results ────────────────────────────────────────────────────────

export interface PageSubtotal {
  pageIndex: number;
  rowIndex: number;
  /** Amount printed on the subtotal row, when it carries one */
  amountMinor: number | null;
  /** Sum of rows parsed on the page before the subtotal row */
  runningTotalMinor: number;
  matchesRunningTotal: boolean;
}

export type CheckPrefix = '020' | '120' | 'DDP';

export interface CheckSequenceGap {
  prefix: CheckPrefix;
  previous: string;
  next: string;
  missing: string[];
}

export interface DocumentResult {
  descriptor: DocumentDescriptor;
  records: TransactionRecord[];
  unparsed: ParseFailure[];
  rejected: ValidationRejection[];
  skipped: SkippedRow[];
  skippedCounts: Record<SkipReason, number>;
  degradedPages: number[];
  pageSubtotals: PageSubtotal[];
  checkGaps: CheckSequenceGap[];
  pageCount: number;
  lineCount: number;
}

export interface ProcessingOptions extends SegmenterOptions {
  /** Days a transaction date may fall outside the document's fiscal year */
  fiscalToleranceDays?: number;
  /** Extra warrant/check number pattern (regex source) */
  warrantPattern?: string | undefined;
}

export interface DocumentContext {
  referenceTables: ReferenceTables;
  options?: ProcessingOptions;
}

export interface BatchResult {
  /** Per-document results for documents that completed, in input order */
  documents: DocumentResult[];
  documentErrors: DocumentError[];
  summary: {
    totalDocuments: number;
    documentsSucceeded: number;
    documentsFailed: number;
    totalRecords: number;
    totalUnparsed: number;
    totalRejected: number;
  };
}
