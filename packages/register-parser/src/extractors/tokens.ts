import type { CandidateRow } from '@warrant-ledger/page-text';
import type { Token, TokenizedRow } from '../types.js';

const NOISE_PREFIX = /^[=:+~{}|]+/;

/**
 * Strip OCR zebra-stripe artifacts from the start of a token.
 */
export function stripNoise(text: string): string {
  return text.replace(NOISE_PREFIX, '');
}

/**
 * Split a candidate row into tokens, primary row first, lines left to right.
 */
export function tokenizeRow(row: CandidateRow): TokenizedRow {
  const lines: TokenizedRow['lines'] = [];
  const tokens: Token[] = [];

  row.rows.forEach((physical, physicalRow) => {
    for (const line of physical.lines) {
      const order = lines.length;
      lines.push({ text: line.text, x: line.bbox.x, physicalRow, order });

      for (const match of line.text.matchAll(/\S+/g)) {
        const start = match.index ?? 0;
        tokens.push({
          id: tokens.length,
          text: match[0],
          physicalRow,
          lineOrder: order,
          start,
          end: start + match[0].length,
        });
      }
    }
  });

  return { row, lines, tokens };
}

export function unconsumedTokens(row: TokenizedRow, consumed: ReadonlySet<number>): Token[] {
  return row.tokens.filter((token) => !consumed.has(token.id));
}
