/**
 * Date helpers for register parsing and the July 1 – June 30 fiscal calendar.
 */

export interface FiscalCalendar {
  /** Month (1-12) on which the fiscal year starts */
  startMonth: number;
  /** Day of month on which the fiscal year starts */
  startDay: number;
}

export const DEFAULT_FISCAL_CALENDAR: FiscalCalendar = {
  startMonth: 7,
  startDay: 1,
};

const MONTHS: Record<string, number> = {
  jan: 1,
  feb: 2,
  mar: 3,
  apr: 4,
  may: 5,
  jun: 6,
  jul: 7,
  aug: 8,
  sep: 9,
  sept: 9,
  oct: 10,
  nov: 11,
  dec: 12,
};

export function monthNameToNumber(monthName: string): number | null {
  return MONTHS[monthName.toLowerCase().replace(/\.$/, '')] ?? null;
}

export function isValidISODate(dateStr: string): boolean {
  const match = /^(\d{4})-(\d{2})-(\d{2})$/.exec(dateStr);
  if (match === null) return false;
  const [, y, m, d] = match;
  return isRealDate(Number(y), Number(m), Number(d));
}

export function isRealDate(year: number, month: number, day: number): boolean {
  if (month < 1 || month > 12 || day < 1) return false;
  const date = new Date(Date.UTC(year, month - 1, day));
  return (
    date.getUTCFullYear() === year &&
    date.getUTCMonth() === month - 1 &&
    date.getUTCDate() === day
  );
}

export function toISODate(year: number, month: number, day: number): string {
  return `${String(year).padStart(4, '0')}-${String(month).padStart(2, '0')}-${String(day).padStart(2, '0')}`;
}

/**
 * Expand a two-digit year. Registers in scope are all 21st century.
 */
export function expandYear(year: string): number {
  return year.length === 2 ? 2000 + Number(year) : Number(year);
}

export function compareDates(a: string, b: string): number {
  return a.localeCompare(b);
}

/**
 * Whole days between two ISO dates (b − a).
 */
export function daysBetween(a: string, b: string): number {
  const msPerDay = 24 * 60 * 60 * 1000;
  return Math.round((Date.parse(`${b}T00:00:00Z`) - Date.parse(`${a}T00:00:00Z`)) / msPerDay);
}

export function addDays(date: string, days: number): string {
  const d = new Date(`${date}T00:00:00Z`);
  d.setUTCDate(d.getUTCDate() + days);
  return d.toISOString().slice(0, 10);
}

/**
 * Inclusive date range covered by a fiscal year. Fiscal years are labelled by
 * the calendar year in which they end, so FY2025 runs 2024-07-01..2025-06-30.
 */
export function fiscalYearRange(
  fiscalYear: number,
  calendar: FiscalCalendar = DEFAULT_FISCAL_CALENDAR
): { start: string; end: string } {
  if (calendar.startMonth === 1 && calendar.startDay === 1) {
    return { start: toISODate(fiscalYear, 1, 1), end: toISODate(fiscalYear, 12, 31) };
  }
  const start = toISODate(fiscalYear - 1, calendar.startMonth, calendar.startDay);
  const end = addDays(toISODate(fiscalYear, calendar.startMonth, calendar.startDay), -1);
  return { start, end };
}

export function fiscalYearOf(
  date: string,
  calendar: FiscalCalendar = DEFAULT_FISCAL_CALENDAR
): number {
  const year = Number(date.slice(0, 4));
  const startOfThisYear = toISODate(year, calendar.startMonth, calendar.startDay);
  if (calendar.startMonth === 1 && calendar.startDay === 1) return year;
  return compareDates(date, startOfThisYear) >= 0 ? year + 1 : year;
}

/**
 * Whether a date falls inside the fiscal year, widened by `toleranceDays` on
 * both sides.
 */
export function isWithinFiscalYear(
  date: string,
  fiscalYear: number,
  toleranceDays: number = 0,
  calendar: FiscalCalendar = DEFAULT_FISCAL_CALENDAR
): boolean {
  const { start, end } = fiscalYearRange(fiscalYear, calendar);
  return (
    compareDates(date, addDays(start, -toleranceDays)) >= 0 &&
    compareDates(date, addDays(end, toleranceDays)) <= 0
  );
}

export function fiscalMonthOf(date: string): string {
  return date.slice(0, 7);
}
