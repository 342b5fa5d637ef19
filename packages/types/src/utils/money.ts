/**
 * Currency helpers. All ledger arithmetic happens on signed integer minor
 * units (cents); decimals only appear at the parse and display boundaries.
 */

const AMOUNT_BODY = /^(\d{1,3}(?:,\d{3})+|\d+)\.(\d{2})$/;

/**
 * Parse a currency string into signed minor units.
 *
 * Accepts `$`, thousands separators, parentheses and leading or trailing
 * minus signs. Exactly two decimal digits are required.
 */
export function parseAmountToMinor(amountStr: string): number {
  const trimmed = amountStr.trim();
  const parenthesized = trimmed.startsWith('(') && trimmed.endsWith(')');
  const minusCount = (trimmed.match(/-/g) ?? []).length;

  const body = trimmed.replace(/[()$\s-]/g, '');
  const match = AMOUNT_BODY.exec(body);
  if (match === null || minusCount > 1) {
    throw new Error(`Unable to parse amount: ${amountStr}`);
  }

  const [, whole, cents] = match;
  if (whole === undefined || cents === undefined) {
    throw new Error(`Unable to parse amount: ${amountStr}`);
  }

  const minor = Number(whole.replace(/,/g, '')) * 100 + Number(cents);
  if (!Number.isSafeInteger(minor)) {
    throw new Error(`Amount out of range: ${amountStr}`);
  }

  const negative = parenthesized || minusCount === 1;
  return negative ? -minor : minor;
}

/**
 * Non-throwing variant of {@link parseAmountToMinor}.
 */
export function tryParseAmountToMinor(amountStr: string): number | null {
  try {
    return parseAmountToMinor(amountStr);
  } catch {
    return null;
  }
}

/**
 * Convert a major-unit number (e.g. a claim value of 38374008.5) to minor
 * units, rounding half away from zero.
 */
export function majorToMinor(amount: number): number {
  const scaled = Math.round(Math.abs(amount) * 100);
  return amount < 0 ? -scaled : scaled;
}

/**
 * Render minor units as a plain decimal string (`-1234.56`).
 */
export function formatMinor(minor: number): string {
  const abs = Math.abs(minor);
  const whole = Math.floor(abs / 100);
  const cents = String(abs % 100).padStart(2, '0');
  return `${minor < 0 ? '-' : ''}${whole}.${cents}`;
}

export function formatCurrency(minor: number): string {
  const abs = Math.abs(minor);
  const whole = Math.floor(abs / 100).toLocaleString('en-US');
  const cents = String(abs % 100).padStart(2, '0');
  return `${minor < 0 ? '-' : ''}$${whole}.${cents}`;
}

export function sumMinor(amounts: readonly number[]): number {
  let total = 0;
  for (const amount of amounts) {
    total += amount;
  }
  return total;
}
