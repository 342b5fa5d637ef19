/**
 * Deterministic ID Generation Utilities
 *
 * Record ids are derived from record content only, never from the run, so
 * re-running OCR or the pipeline over the same document yields the same ids.
 */

import { createHash } from 'crypto';

/**
 * Record data required for ID computation.
 */
export interface RecordIdInput {
  fiscalYear: number;
  payeeNormalized: string;
  amountMinor: number;
  transactionDate: string;
  warrantNumber: string | null;
}

function normalizeForHash(value: string | null | undefined): string {
  if (value === null || value === undefined) {
    return '';
  }
  return value.trim().replace(/\s+/g, ' ').toUpperCase();
}

/**
 * Compute a deterministic record ID.
 *
 * Uses SHA-256 of the canonical string:
 * fiscalYear | payeeNormalized | amountMinor | transactionDate [| warrantNumber]
 *
 * Output: "rec_" + first 24 hex chars of hash
 */
export function computeRecordId(input: RecordIdInput): string {
  const canonicalParts = [
    String(input.fiscalYear),
    normalizeForHash(input.payeeNormalized),
    String(input.amountMinor),
    input.transactionDate,
  ];
  if (input.warrantNumber !== null && input.warrantNumber !== '') {
    canonicalParts.push(normalizeForHash(input.warrantNumber));
  }

  return `rec_${sha256Hex(canonicalParts.join('|')).substring(0, 24)}`;
}

/**
 * Validate that a record ID is well-formed ("rec_" + 24 lowercase hex).
 */
export function isValidRecordId(id: string): boolean {
  return /^rec_[a-f0-9]{24}$/.test(id);
}

/**
 * Short content hash used for run ids and other derived identifiers.
 */
export function computeContentHash(content: string, prefix: string = 'run'): string {
  return `${prefix}_${sha256Hex(content).substring(0, 16)}`;
}

function sha256Hex(value: string): string {
  return createHash('sha256').update(value, 'utf8').digest('hex');
}
