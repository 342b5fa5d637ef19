export const PIPELINE_VERSION = '1.0.0';

export const LEDGER_SCHEMA_VERSION = '1.0.0';

export const REPORT_SCHEMA_VERSION = '1.0.0';

export const CONFIDENCE_THRESHOLDS = {
  HIGH: 0.9,
  MEDIUM: 0.7,
  LOW: 0.5,
} as const;

export const UNCATEGORIZED = 'Uncategorized';

/**
 * Object-code families keyed by leading digit, used when an account code is
 * not in the reference table.
 */
export const OBJECT_CODE_CATEGORIES: Readonly<Record<string, string>> = {
  '1': 'Certificated Salaries',
  '2': 'Classified Salaries',
  '3': 'Employee Benefits',
  '4': 'Books and Supplies',
  '5': 'Services and Operating',
  '6': 'Capital Outlay',
  '7': 'Other Outgo',
  '8': 'Revenue',
  '9': 'Fund Balance',
};
