/**
 * Normalize a payee name for matching and hashing.
 *
 * - Unicode NFKC, case-folded
 * - `&` spelled out as `and`
 * - periods, commas and apostrophes removed (`Acme, Inc.` → `acme inc`)
 * - any other punctuation becomes a space
 * - whitespace collapsed and trimmed
 *
 * The display string is kept separately on the record.
 */
export function normalizePayee(name: string): string {
  return name
    .normalize('NFKC')
    .toLowerCase()
    .replace(/&/g, ' and ')
    .replace(/[.,'’`"]/g, '')
    .replace(/[^\p{L}\p{N}\s]/gu, ' ')
    .replace(/\s+/g, ' ')
    .trim();
}

/**
 * Collapse whitespace in a display name without altering its case.
 */
export function cleanDisplayName(name: string): string {
  return name.replace(/\s+/g, ' ').trim();
}
