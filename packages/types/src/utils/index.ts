export {
  PIPELINE_VERSION,
  LEDGER_SCHEMA_VERSION,
  REPORT_SCHEMA_VERSION,
  CONFIDENCE_THRESHOLDS,
  OBJECT_CODE_CATEGORIES,
  UNCATEGORIZED,
} from './constants.js';
export {
  DEFAULT_FISCAL_CALENDAR,
  monthNameToNumber,
  isValidISODate,
  isRealDate,
  toISODate,
  expandYear,
  compareDates,
  daysBetween,
  addDays,
  fiscalYearRange,
  fiscalYearOf,
  isWithinFiscalYear,
  fiscalMonthOf,
  type FiscalCalendar,
} from './date.js';
export {
  parseAmountToMinor,
  tryParseAmountToMinor,
  majorToMinor,
  formatMinor,
  formatCurrency,
  sumMinor,
} from './money.js';
export {
  computeRecordId,
  isValidRecordId,
  computeContentHash,
  type RecordIdInput,
} from './id-generator.js';
export { normalizePayee, cleanDisplayName } from './payee.js';
