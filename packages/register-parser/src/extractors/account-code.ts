import type { ExtractedAccountCode, ExtractorResult, ReferenceTables, TokenizedRow } from '../types.js';
import { resolveCategory } from '../reference-tables.js';
import { stripNoise, unconsumedTokens } from './tokens.js';

/**
 * Account code strategy: the first token matching the table's code pattern.
 * Codes missing from the table are kept and reported as unknown.
 */
export function extractAccountCode(
  row: TokenizedRow,
  consumed: ReadonlySet<number>,
  tables: ReferenceTables
): ExtractorResult<ExtractedAccountCode> {
  for (const token of unconsumedTokens(row, consumed)) {
    const text = stripNoise(token.text);
    if (!tables.codePattern.test(text)) continue;

    const resolved = resolveCategory(text, tables);
    const status = resolved.status === 'known' ? 'known' : 'unknown';
    return {
      value: { code: text, status, category: resolved.category },
      confidence: status === 'known' ? 1 : 0.7,
      consumed: [token.id],
    };
  }

  return { value: null, confidence: 1, consumed: [] };
}
