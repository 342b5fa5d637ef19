import { AMOUNT_TOKEN_PATTERN } from '@warrant-ledger/page-text';
import { parseAmountToMinor } from '@warrant-ledger/types';
import type { ExtractorResult, TokenizedLine, TokenizedRow } from '../types.js';

interface AmountMatch {
  text: string;
  start: number;
  end: number;
}

function findAmounts(text: string): AmountMatch[] {
  const matches: AmountMatch[] = [];
  for (const match of text.matchAll(AMOUNT_TOKEN_PATTERN)) {
    const start = match.index ?? 0;
    matches.push({ text: match[0].trim(), start, end: start + match[0].length });
  }
  return matches;
}

/**
 * Amount strategy.
 *
 * The rightmost line carrying a currency-shaped token holds the amount. Two
 * different amounts inside that one line cannot be told apart and fail the
 * row as ambiguous.
 */
export function extractAmount(row: TokenizedRow): ExtractorResult<number> {
  let chosen: { line: TokenizedLine; matches: AmountMatch[] } | null = null;

  for (const line of row.lines) {
    const matches = findAmounts(line.text);
    if (matches.length === 0) continue;
    if (chosen === null || line.x > chosen.line.x) {
      chosen = { line, matches };
    }
  }

  if (chosen === null) {
    return { value: null, confidence: 0, consumed: [], issue: 'no-amount', detail: 'No currency-shaped token' };
  }

  const { line, matches } = chosen;
  const consumed = row.tokens
    .filter((t) => t.lineOrder === line.order && matches.some((m) => t.start < m.end && t.end > m.start))
    .map((t) => t.id);

  const values = new Set<number>();
  for (const match of matches) {
    try {
      values.add(parseAmountToMinor(match.text));
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      return { value: null, confidence: 0, consumed, issue: 'unparseable-amount', detail: message };
    }
  }

  if (values.size > 1) {
    return {
      value: null,
      confidence: 0,
      consumed,
      issue: 'ambiguous-amount',
      detail: `Competing amounts on one line: ${matches.map((m) => m.text).join(', ')}`,
    };
  }

  const [value] = [...values];
  if (value === undefined) {
    return { value: null, confidence: 0, consumed, issue: 'no-amount' };
  }

  const parenthesized = matches.some((m) => m.text.startsWith('('));
  const noisy = matches.some((m) => coveringText(row, line, m) !== m.text);

  return { value, confidence: parenthesized || noisy ? 0.9 : 1, consumed };
}

/**
 * Text of the whole tokens a match touches; differs from the match when OCR
 * noise was glued onto the amount.
 */
function coveringText(row: TokenizedRow, line: TokenizedLine, match: AmountMatch): string {
  const touching = row.tokens.filter(
    (t) => t.lineOrder === line.order && t.start < match.end && t.end > match.start
  );
  const start = Math.min(...touching.map((t) => t.start));
  const end = Math.max(...touching.map((t) => t.end));
  return line.text.slice(start, end);
}

/**
 * Every amount in the row in reading order, for fund-object lines that carry
 * an expensed amount and sometimes the check total after it.
 */
export function extractAmountSequence(row: TokenizedRow): ExtractorResult<number[]> {
  const values: number[] = [];
  const consumed: number[] = [];
  let confidence = 1;

  for (const line of row.lines) {
    for (const match of findAmounts(line.text)) {
      try {
        values.push(parseAmountToMinor(match.text));
      } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        return { value: null, confidence: 0, consumed, issue: 'unparseable-amount', detail: message };
      }
      consumed.push(
        ...row.tokens
          .filter((t) => t.lineOrder === line.order && t.start < match.end && t.end > match.start)
          .map((t) => t.id)
      );
      if (match.text.startsWith('(') || coveringText(row, line, match) !== match.text) {
        confidence = 0.9;
      }
    }
  }

  if (values.length === 0) {
    return { value: null, confidence: 0, consumed: [], issue: 'no-amount' };
  }
  return { value: values, confidence, consumed };
}
