import { expandYear, isRealDate, monthNameToNumber, toISODate } from '@warrant-ledger/types';
import type { ExtractedDate, ExtractorResult, Token, TokenizedRow } from '../types.js';
import { stripNoise, unconsumedTokens } from './tokens.js';

const NUMERIC_DATE = /^(\d{1,2})\/(\d{1,2})\/(\d{4}|\d{2})$/;
const ISO_DATE = /^(\d{4})-(\d{2})-(\d{2})$/;
const DAY_MONTH_YEAR = /^(\d{1,2})-([A-Za-z]{3,9})\.?-(\d{4}|\d{2})$/;
const MONTH_WORD = /^([A-Za-z]{3,9})\.?$/;
const DAY_COMMA = /^(\d{1,2}),$/;
const FOUR_DIGIT_YEAR = /^(\d{4})$/;

interface DateMatch {
  year: number;
  month: number;
  day: number;
  raw: string;
  tokenIds: number[];
}

function matchAt(tokens: Token[], index: number): DateMatch | null {
  const token = tokens[index];
  if (token === undefined) return null;
  const text = stripNoise(token.text);

  const numeric = NUMERIC_DATE.exec(text);
  if (numeric !== null) {
    const [, m, d, y] = numeric;
    return { year: expandYear(y ?? ''), month: Number(m), day: Number(d), raw: text, tokenIds: [token.id] };
  }

  const iso = ISO_DATE.exec(text);
  if (iso !== null) {
    const [, y, m, d] = iso;
    return { year: Number(y), month: Number(m), day: Number(d), raw: text, tokenIds: [token.id] };
  }

  const dayMonth = DAY_MONTH_YEAR.exec(text);
  if (dayMonth !== null) {
    const [, d, name, y] = dayMonth;
    const month = monthNameToNumber(name ?? '');
    if (month !== null) {
      return { year: expandYear(y ?? ''), month, day: Number(d), raw: text, tokenIds: [token.id] };
    }
  }

  // "Mon D, YYYY" spans three tokens on one line
  const monthWord = MONTH_WORD.exec(text);
  const dayToken = tokens[index + 1];
  const yearToken = tokens[index + 2];
  if (monthWord !== null && dayToken !== undefined && yearToken !== undefined) {
    const month = monthNameToNumber(monthWord[1] ?? '');
    const day = DAY_COMMA.exec(dayToken.text);
    const year = FOUR_DIGIT_YEAR.exec(yearToken.text);
    if (
      month !== null &&
      day !== null &&
      year !== null &&
      dayToken.lineOrder === token.lineOrder &&
      yearToken.lineOrder === token.lineOrder
    ) {
      return {
        year: Number(year[1]),
        month,
        day: Number(day[1]),
        raw: `${text} ${dayToken.text} ${yearToken.text}`,
        tokenIds: [token.id, dayToken.id, yearToken.id],
      };
    }
  }

  return null;
}

/**
 * Date strategy. The first real date, left to right, wins. A date-shaped
 * token that is not a calendar date is reported when nothing better exists.
 */
export function extractDate(row: TokenizedRow, consumed: ReadonlySet<number>): ExtractorResult<ExtractedDate> {
  const tokens = unconsumedTokens(row, consumed);
  let invalid: DateMatch | null = null;

  for (let i = 0; i < tokens.length; i++) {
    const match = matchAt(tokens, i);
    if (match === null) continue;

    if (isRealDate(match.year, match.month, match.day)) {
      return {
        value: { iso: toISODate(match.year, match.month, match.day), raw: match.raw },
        confidence: 1,
        consumed: match.tokenIds,
      };
    }
    invalid ??= match;
  }

  if (invalid !== null) {
    return {
      value: { iso: null, raw: invalid.raw },
      confidence: 0,
      consumed: invalid.tokenIds,
      issue: 'invalid-date',
      detail: `"${invalid.raw}" is not a calendar date`,
    };
  }

  return { value: null, confidence: 0.6, consumed: [] };
}
