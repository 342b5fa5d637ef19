/**
 * CSV Exporter Module
 *
 * Converts the canonical ledger to CSV for spreadsheet import.
 */

import { formatMinor, type CanonicalLedger, type TransactionRecord } from '@warrant-ledger/types';

/**
 * Options for CSV export
 */
export interface CsvExportOptions {
  /** Include header row (default: true) */
  includeHeader?: boolean;
  /** Field delimiter (default: ',') */
  delimiter?: string;
  /** Include account code and category columns (default: true) */
  includeCategories?: boolean;
  /** Include provenance columns (default: false) */
  includeProvenance?: boolean;
  /** Date format: 'iso' (YYYY-MM-DD) or 'us' (MM/DD/YYYY) (default: 'iso') */
  dateFormat?: 'iso' | 'us';
}

const BASE_COLUMNS = [
  'Date',
  'Date Precision',
  'Payee',
  'Amount',
  'Warrant Number',
  'Fiscal Year',
  'Confidence',
  'Flags',
] as const;

const CATEGORY_COLUMNS = ['Account Code', 'Category'] as const;

const PROVENANCE_COLUMNS = ['Record ID', 'Source Document', 'Source Documents', 'Pages', 'Merged Record IDs'] as const;

/**
 * Escape a value for CSV (handles quotes and delimiters)
 */
function escapeCsvValue(value: string | number | null | undefined, delimiter: string): string {
  if (value === null || value === undefined) {
    return '';
  }

  const str = String(value);
  const needsQuoting = str.includes(delimiter) || str.includes('"') || str.includes('\n') || str.includes('\r');

  if (needsQuoting) {
    return `"${str.replace(/"/g, '""')}"`;
  }

  return str;
}

function formatDate(isoDate: string, format: 'iso' | 'us'): string {
  if (format === 'us') {
    const parts = isoDate.split('-');
    if (parts.length === 3) {
      return `${parts[1]}/${parts[2]}/${parts[0]}`;
    }
  }
  return isoDate;
}

function resolveOptions(options: CsvExportOptions): Required<CsvExportOptions> {
  return {
    includeHeader: options.includeHeader ?? true,
    delimiter: options.delimiter ?? ',',
    includeCategories: options.includeCategories ?? true,
    includeProvenance: options.includeProvenance ?? false,
    dateFormat: options.dateFormat ?? 'iso',
  };
}

function buildHeaderRow(options: Required<CsvExportOptions>): string[] {
  const headers: string[] = [...BASE_COLUMNS];
  if (options.includeCategories) {
    headers.push(...CATEGORY_COLUMNS);
  }
  if (options.includeProvenance) {
    headers.push(...PROVENANCE_COLUMNS);
  }
  return headers;
}

function buildDataRow(record: TransactionRecord, options: Required<CsvExportOptions>): string[] {
  const row: string[] = [
    formatDate(record.transactionDate, options.dateFormat),
    record.datePrecision,
    record.payeeName,
    formatMinor(record.amountMinor),
    record.warrantNumber ?? '',
    String(record.fiscalYear),
    record.provenanceConfidence,
    record.flags.join(';'),
  ];

  if (options.includeCategories) {
    row.push(record.accountCode ?? '', record.category);
  }

  if (options.includeProvenance) {
    row.push(
      record.recordId,
      record.sourceDocumentId,
      record.sourceDocumentIds.join(';'),
      record.provenance.map((entry) => `${entry.documentId}#${entry.pageIndex}:${entry.rowIndex}`).join(';'),
      record.mergedRecordIds.join(';')
    );
  }

  return row;
}

function rowToCsvLine(row: string[], delimiter: string): string {
  return row.map((value) => escapeCsvValue(value, delimiter)).join(delimiter);
}

function compareRows(a: TransactionRecord, b: TransactionRecord): number {
  const dateCompare = a.transactionDate.localeCompare(b.transactionDate);
  if (dateCompare !== 0) return dateCompare;
  return a.recordId.localeCompare(b.recordId);
}

/**
 * Export records to CSV, sorted by date then record id.
 */
export function exportRecordsCsv(records: readonly TransactionRecord[], options: CsvExportOptions = {}): string {
  const opts = resolveOptions(options);
  const lines: string[] = [];

  if (opts.includeHeader) {
    lines.push(rowToCsvLine(buildHeaderRow(opts), opts.delimiter));
  }
  for (const record of [...records].sort(compareRows)) {
    lines.push(rowToCsvLine(buildDataRow(record, opts), opts.delimiter));
  }

  return lines.join('\n');
}

/**
 * Export the whole ledger to CSV format.
 */
export function exportCsv(ledger: CanonicalLedger, options: CsvExportOptions = {}): string {
  return exportRecordsCsv(ledger.records, options);
}

/**
 * Result of split-by-document export
 */
export interface SplitCsvResult {
  documentId: string;
  /** Suggested filename (e.g., 'reg-2024-07.csv') */
  filename: string;
  content: string;
}

/**
 * Export one CSV per ledger document, holding the records whose canonical
 * source is that document.
 */
export function exportCsvByDocument(ledger: CanonicalLedger, options: CsvExportOptions = {}): SplitCsvResult[] {
  return ledger.documents.map((document) => ({
    documentId: document.documentId,
    filename: `${document.documentId.replace(/[^\w.-]+/g, '_')}.csv`,
    content: exportRecordsCsv(
      ledger.records.filter((record) => record.sourceDocumentId === document.documentId),
      options
    ),
  }));
}
