/**
 * Token shapes shared by the segmenter and the register parser.
 */

/**
 * Currency-shaped token: optional `$`, thousands separators, exactly two
 * decimals, optional parentheses or a leading/trailing minus.
 */
export const AMOUNT_TOKEN_PATTERN =
  /(?<![\w.,])\(?-?\$?\s?(?:\d{1,3}(?:,\d{3})+|\d+)\.\d{2}-?\)?(?![\w.,])/g;

const MONTH_NAME = '(?:jan|feb|mar|apr|may|jun|jul|aug|sep|sept|oct|nov|dec)[a-z]*\\.?';

const DATE_SHAPES: readonly RegExp[] = [
  /\b\d{1,2}\/\d{1,2}\/\d{2,4}\b/,
  /\b\d{4}-\d{2}-\d{2}\b/,
  new RegExp(`\\b${MONTH_NAME}\\s+\\d{1,2},\\s*\\d{4}\\b`, 'i'),
  new RegExp(`\\b\\d{1,2}-${MONTH_NAME}-\\d{2,4}\\b`, 'i'),
];

export const HEADER_KEYWORDS: readonly string[] = [
  'check',
  'number',
  'date',
  'vendor',
  'payee',
  'amount',
  'fd-objt',
  'pay to the order',
];

const HEADER_KEYWORD_PATTERNS = HEADER_KEYWORDS.map(
  (keyword) => new RegExp(`(?:^|[^a-z])${keyword.replace(/-/g, '\\-')}(?![a-z])`, 'i')
);

export const FOOTER_PATTERNS: readonly RegExp[] = [
  /\bpage\s+\d+\s+of\s+\d+\b/i,
  /\bgenerated for\b/i,
  /\bboard report\b/i,
  /\breport of checks\b/i,
  /\bchecks dated\b/i,
  /\bpreceding checks\b/i,
];

export function hasAmountShape(text: string): boolean {
  AMOUNT_TOKEN_PATTERN.lastIndex = 0;
  const found = AMOUNT_TOKEN_PATTERN.test(text);
  AMOUNT_TOKEN_PATTERN.lastIndex = 0;
  return found;
}

export function hasDateShape(text: string): boolean {
  return DATE_SHAPES.some((pattern) => pattern.test(text));
}

export function countHeaderKeywords(text: string): number {
  return HEADER_KEYWORD_PATTERNS.filter((pattern) => pattern.test(text)).length;
}

/**
 * Column header row: two or more header keywords and no amount.
 */
export function isHeaderText(text: string): boolean {
  return countHeaderKeywords(text) >= 2 && !hasAmountShape(text);
}

export function isFooterText(text: string): boolean {
  return FOOTER_PATTERNS.some((pattern) => pattern.test(text));
}

export function looksLikeHeaderOrFooter(text: string): boolean {
  return isHeaderText(text) || isFooterText(text);
}
