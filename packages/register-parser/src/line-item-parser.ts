import { hasDateShape, type CandidateRow } from '@warrant-ledger/page-text';
import { UNCATEGORIZED, type DocumentDescriptor, type ParseFailureReason } from '@warrant-ledger/types';
import {
  extractAccountCode,
  extractAmount,
  extractAmountSequence,
  extractDate,
  extractPayee,
  extractVoidMarker,
  extractWarrant,
  stripNoise,
  tokenizeRow,
  unconsumedTokens,
} from './extractors/index.js';
import { classifyRow, soleAmount, type PageTally } from './row-classifier.js';
import type { CandidateRecord, ExpenseLine, ParseOutcome, ReferenceTables } from './types.js';

export interface LineItemParserOptions {
  /** Extra warrant/check number pattern (regex source) */
  warrantPattern?: string | undefined;
}

const FAILURE_REASONS: ReadonlySet<string> = new Set<ParseFailureReason>([
  'no-amount',
  'ambiguous-amount',
  'unparseable-amount',
]);

function isFailureReason(issue: string | undefined): issue is ParseFailureReason {
  return issue !== undefined && FAILURE_REASONS.has(issue);
}

/**
 * The check a following fund-object row may still extend.
 */
interface OpenCheck {
  candidate: CandidateRecord;
  expensedMinor: number;
  /** Check amount printed on a later fund-object row */
  checkAmountMinor: number | null;
}

interface ParsedExpenseLine {
  line: ExpenseLine;
  checkAmountMinor: number | null;
  ocrConfidence: number;
  amountConfidence: number;
  accountCodeConfidence: number;
}

/**
 * Turns candidate rows of one document into candidate records.
 *
 * Stateful per document: page running totals reset at each page, and a
 * summary-section marker ends the register section for the rest of the
 * document. Feed rows in page order.
 *
 * A check split across fund-object codes prints one row per code. Rows with
 * a code and amounts but no check number, date or payee extend the check
 * above them on the same page: the check amount printed on a later row wins,
 * otherwise the expensed amounts are summed.
 */
export class LineItemParser {
  private readonly descriptor: DocumentDescriptor;
  private readonly tables: ReferenceTables;
  private readonly warrantPattern: RegExp | null;

  private currentPage = 0;
  private tally: PageTally = { runningTotalMinor: 0, parsedCount: 0 };
  private inSummarySection = false;
  private open: OpenCheck | null = null;

  constructor(descriptor: DocumentDescriptor, tables: ReferenceTables, options: LineItemParserOptions = {}) {
    this.descriptor = descriptor;
    this.tables = tables;
    this.warrantPattern = compileWarrantPattern(options.warrantPattern);
  }

  parseRow(row: CandidateRow): ParseOutcome {
    if (row.pageIndex !== this.currentPage) {
      this.currentPage = row.pageIndex;
      this.tally = { runningTotalMinor: 0, parsedCount: 0 };
      this.open = null;
    }

    const open = this.open;
    this.open = null;

    const skipped = { pageIndex: row.pageIndex, rowIndex: row.rowIndex, rowText: row.text };

    if (this.inSummarySection) {
      return {
        kind: 'skipped',
        skipped: { ...skipped, reason: 'summary-section' },
        amountMinor: null,
        runningTotalMinor: this.tally.runningTotalMinor,
      };
    }

    const reason = classifyRow(row.text, this.tally);
    if (reason === null && open !== null) {
      const expense = this.parseExpenseLine(row);
      if (expense !== null) {
        return this.extendCheck(open, expense, row.text);
      }
    }
    if (reason !== null) {
      if (reason === 'summary-section') {
        this.inSummarySection = true;
      }
      const amountMinor = reason === 'subtotal' ? soleAmount(row.text) : null;
      return {
        kind: 'skipped',
        skipped: { ...skipped, reason },
        amountMinor,
        runningTotalMinor: this.tally.runningTotalMinor,
      };
    }

    const outcome = this.extract(row);
    if (outcome.kind === 'record') {
      this.tally = {
        runningTotalMinor: this.tally.runningTotalMinor + outcome.candidate.amountMinor,
        parsedCount: this.tally.parsedCount + 1,
      };
      this.open = {
        candidate: outcome.candidate,
        expensedMinor: Math.abs(outcome.candidate.amountMinor),
        checkAmountMinor: null,
      };
    }
    return outcome;
  }

  /**
   * A fund-object row: one account code, one or two amounts (expensed, then
   * the check amount), and nothing else.
   */
  private parseExpenseLine(row: CandidateRow): ParsedExpenseLine | null {
    if (row.rows.length !== 1 || hasDateShape(row.text)) return null;

    const tokenized = tokenizeRow(row);
    const amounts = extractAmountSequence(tokenized);
    if (amounts.value === null || amounts.value.length > 2) return null;
    const [expensedMinor, checkAmountMinor] = amounts.value;
    if (expensedMinor === undefined) return null;

    const consumed = new Set(amounts.consumed);
    const code = extractAccountCode(tokenized, consumed, this.tables);
    if (code.value === null) return null;
    code.consumed.forEach((id) => consumed.add(id));

    const leftover = unconsumedTokens(tokenized, consumed).filter((token) => stripNoise(token.text) !== '');
    if (leftover.length > 0) return null;

    return {
      line: { rowIndex: row.rowIndex, accountCode: code.value.code, expensedMinor: Math.abs(expensedMinor) },
      checkAmountMinor: checkAmountMinor !== undefined ? Math.abs(checkAmountMinor) : null,
      ocrConfidence: row.confidence,
      amountConfidence: amounts.confidence,
      accountCodeConfidence: code.confidence,
    };
  }

  private extendCheck(open: OpenCheck, expense: ParsedExpenseLine, rowText: string): ParseOutcome {
    const { candidate } = open;
    const expensedMinor = open.expensedMinor + expense.line.expensedMinor;
    const checkAmountMinor = expense.checkAmountMinor ?? open.checkAmountMinor;
    const totalMinor = checkAmountMinor ?? expensedMinor;
    const amountMinor = candidate.void ? -totalMinor : totalMinor;

    const firstLine: ExpenseLine[] =
      candidate.expenseLines.length === 0 && candidate.accountCode !== null
        ? [{ rowIndex: candidate.rowIndex, accountCode: candidate.accountCode, expensedMinor: open.expensedMinor }]
        : [];

    const extended: CandidateRecord = {
      ...candidate,
      rowText: `${candidate.rowText} ${rowText}`,
      ocrConfidence: Math.min(candidate.ocrConfidence, expense.ocrConfidence),
      amountMinor,
      fieldConfidence: {
        ...candidate.fieldConfidence,
        amount: Math.min(candidate.fieldConfidence.amount, expense.amountConfidence),
        accountCode: Math.min(candidate.fieldConfidence.accountCode, expense.accountCodeConfidence),
      },
      expenseLines: [...firstLine, ...candidate.expenseLines, expense.line],
    };

    this.tally = {
      runningTotalMinor: this.tally.runningTotalMinor - candidate.amountMinor + amountMinor,
      parsedCount: this.tally.parsedCount,
    };
    this.open = { candidate: extended, expensedMinor, checkAmountMinor };

    return { kind: 'expense-line', candidate: extended, line: expense.line };
  }

  private extract(row: CandidateRow): ParseOutcome {
    const tokenized = tokenizeRow(row);
    const consumed = new Set<number>();
    const consume = (ids: number[]): void => ids.forEach((id) => consumed.add(id));

    const amount = extractAmount(tokenized);
    if (amount.value === null) {
      return {
        kind: 'failure',
        failure: {
          kind: 'parse-failure',
          documentId: this.descriptor.documentId,
          pageIndex: row.pageIndex,
          rowIndex: row.rowIndex,
          rowText: row.text,
          reason: isFailureReason(amount.issue) ? amount.issue : 'no-amount',
          detail: amount.detail ?? 'No amount',
        },
      };
    }
    consume(amount.consumed);

    const date = extractDate(tokenized, consumed);
    consume(date.consumed);

    const warrant = extractWarrant(tokenized, consumed, this.warrantPattern);
    consume(warrant.consumed);

    const code = extractAccountCode(tokenized, consumed, this.tables);
    consume(code.consumed);

    const voidMarker = extractVoidMarker(tokenized, consumed);
    consume(voidMarker.consumed);

    const payee = extractPayee(tokenized, consumed);

    const isVoid = voidMarker.value === true;
    const amountMinor = isVoid && amount.value > 0 ? -amount.value : amount.value;

    const candidate: CandidateRecord = {
      documentId: this.descriptor.documentId,
      pageIndex: row.pageIndex,
      rowIndex: row.rowIndex,
      rowText: row.text,
      ocrConfidence: row.confidence,
      degraded: row.degraded,
      continuation: row.continuation,
      amountMinor,
      void: isVoid || amount.value < 0,
      date:
        date.value === null
          ? { iso: this.descriptor.period.end, raw: null, precision: 'period' }
          : { iso: date.value.iso, raw: date.value.raw, precision: 'exact' },
      warrantNumber: warrant.value,
      accountCode: code.value?.code ?? null,
      accountCodeStatus: code.value?.status ?? 'absent',
      category: code.value?.category ?? UNCATEGORIZED,
      payeeName: payee.value ?? '',
      fieldConfidence: {
        amount: amount.confidence,
        date: date.value === null ? 0.6 : date.confidence,
        warrant: warrant.confidence,
        accountCode: code.confidence,
        payee: payee.confidence,
      },
      expenseLines: [],
    };

    return { kind: 'record', candidate };
  }
}

function compileWarrantPattern(source: string | undefined): RegExp | null {
  if (source === undefined || source === '') return null;
  try {
    return new RegExp(`^(?:${source})$`);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new Error(`Invalid warrant pattern "${source}": ${message}`);
  }
}
