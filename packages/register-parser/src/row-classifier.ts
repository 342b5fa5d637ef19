import { AMOUNT_TOKEN_PATTERN, hasDateShape, isFooterText, isHeaderText } from '@warrant-ledger/page-text';
import { tryParseAmountToMinor } from '@warrant-ledger/types';
import type { SkipReason } from './types.js';

const SUMMARY_SECTION_PATTERNS: readonly RegExp[] = [
  /\btotal number of checks\b/i,
  /\bfund recap\b/i,
  /\bnet issue\b/i,
];

const SUBTOTAL_KEYWORD = /\b(?:sub-?total|grand total|total|sum of)\b/i;

// Warrant numbers and other long digit runs never appear on subtotal rows
const IDENTIFIER_TOKEN = /^(?:\d{6,}|DDP-?\d+)$/i;

export interface PageTally {
  runningTotalMinor: number;
  parsedCount: number;
}

export function isSummarySectionMarker(text: string): boolean {
  return SUMMARY_SECTION_PATTERNS.some((pattern) => pattern.test(text));
}

/**
 * The single amount on a row whose only digit-bearing token is an amount.
 */
export function soleAmount(text: string): number | null {
  const numeric = text.split(/\s+/).filter((token) => /\d/.test(token));
  if (numeric.length !== 1) return null;
  const [token] = numeric;
  if (token === undefined) return null;

  AMOUNT_TOKEN_PATTERN.lastIndex = 0;
  const matches = [...token.matchAll(AMOUNT_TOKEN_PATTERN)];
  const match = matches[0];
  if (matches.length !== 1 || match === undefined) return null;
  return tryParseAmountToMinor(match[0].trim());
}

function isSubtotal(text: string, tally: PageTally): boolean {
  const tokens = text.split(/\s+/);
  if (SUBTOTAL_KEYWORD.test(text) && !hasDateShape(text) && !tokens.some((t) => IDENTIFIER_TOKEN.test(t))) {
    return true;
  }

  if (tally.parsedCount === 0) return false;
  const amount = soleAmount(text);
  return amount !== null && amount === tally.runningTotalMinor;
}

/**
 * Classify a row before field extraction. Returns the reason to skip it, or
 * null when it should be parsed as a line item.
 */
export function classifyRow(text: string, tally: PageTally): SkipReason | null {
  if (isSummarySectionMarker(text)) return 'summary-section';
  if (isHeaderText(text)) return 'header';
  if (isFooterText(text)) return 'footer';
  if (isSubtotal(text, tally)) return 'subtotal';
  return null;
}
