import { cleanDisplayName } from '@warrant-ledger/types';
import type { ExtractorResult, TokenizedRow } from '../types.js';
import { stripNoise, unconsumedTokens } from './tokens.js';

/**
 * Payee strategy: whatever alphabetic text the earlier strategies left, in
 * reading order (primary row, then continuation rows).
 */
export function extractPayee(row: TokenizedRow, consumed: ReadonlySet<number>): ExtractorResult<string> {
  const parts: string[] = [];
  const used: number[] = [];

  for (const token of unconsumedTokens(row, consumed)) {
    const text = stripNoise(token.text).replace(/[{}|~]+$/, '');
    if (!/\p{L}/u.test(text)) continue;
    parts.push(text);
    used.push(token.id);
  }

  return { value: cleanDisplayName(parts.join(' ')), confidence: 1, consumed: used };
}
