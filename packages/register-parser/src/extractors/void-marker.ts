import type { ExtractorResult, TokenizedRow } from '../types.js';
import { unconsumedTokens } from './tokens.js';

const VOID_MARKER = /^(?:cancel(?:l?ed)?|void(?:ed)?)$/i;

/**
 * Void strategy: a cancel/void marker anywhere in the row.
 */
export function extractVoidMarker(row: TokenizedRow, consumed: ReadonlySet<number>): ExtractorResult<boolean> {
  const markers = unconsumedTokens(row, consumed).filter((t) =>
    VOID_MARKER.test(t.text.replace(/[^A-Za-z]/g, ''))
  );
  if (markers.length === 0) {
    return { value: false, confidence: 1, consumed: [] };
  }
  return { value: true, confidence: 1, consumed: markers.map((t) => t.id) };
}
