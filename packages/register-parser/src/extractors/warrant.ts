import type { ExtractorResult, Token, TokenizedRow } from '../types.js';
import { stripNoise, unconsumedTokens } from './tokens.js';

const STANDARD_WARRANT = /^(?:020\d{7}|120\d{7}|DDP-\d{8})$/;
const DDP_PARTIAL = /^DDP-?(\d{0,8})$/i;

function cleanWarrantToken(text: string): string {
  return stripNoise(text).replace(/[{}~]/g, '');
}

/**
 * Re-join a payroll deduction number that OCR split into pieces
 * ("DDP" "-" "46") and zero-pad it: DDP-00000046.
 */
function joinDdp(tokens: Token[], index: number): { value: string; tokenIds: number[] } | null {
  let joined = '';
  const tokenIds: number[] = [];

  for (let i = index; i < Math.min(tokens.length, index + 3); i++) {
    const token = tokens[i];
    if (token === undefined || (i > index && token.lineOrder !== tokens[index]?.lineOrder)) break;

    joined += cleanWarrantToken(token.text);
    tokenIds.push(token.id);

    const partial = DDP_PARTIAL.exec(joined);
    if (partial === null) return null;
    const digits = partial[1] ?? '';
    if (digits !== '') {
      return { value: `DDP-${digits.padStart(8, '0')}`, tokenIds };
    }
  }

  return null;
}

/**
 * Warrant/check number strategy: `020…` and `120…` ten-digit numbers,
 * `DDP-` payroll deduction numbers, and an optional configured pattern.
 */
export function extractWarrant(
  row: TokenizedRow,
  consumed: ReadonlySet<number>,
  extraPattern: RegExp | null = null
): ExtractorResult<string> {
  const tokens = unconsumedTokens(row, consumed).filter((t) => t.physicalRow === 0);

  for (let i = 0; i < tokens.length; i++) {
    const token = tokens[i];
    if (token === undefined) continue;
    const text = cleanWarrantToken(token.text);

    if (STANDARD_WARRANT.test(text) || (extraPattern !== null && extraPattern.test(text))) {
      return { value: text, confidence: text === token.text ? 1 : 0.9, consumed: [token.id] };
    }

    if (/^DDP/i.test(text)) {
      const ddp = joinDdp(tokens, i);
      if (ddp !== null) {
        const exact = ddp.tokenIds.length === 1 && ddp.value === token.text;
        return { value: ddp.value, confidence: exact ? 1 : 0.9, consumed: ddp.tokenIds };
      }
    }
  }

  return { value: null, confidence: 1, consumed: [] };
}
