import { readFile } from 'fs/promises';
import {
  AccountCodeTableSchema,
  DEFAULT_FISCAL_CALENDAR,
  FiscalCalendarSchema,
  OBJECT_CODE_CATEGORIES,
  ReferenceTableError,
  UNCATEGORIZED,
  type AccountCodeStatus,
} from '@warrant-ledger/types';
import type { ReferenceTables } from './types.js';

/**
 * Validate raw reference table data.
 *
 * @throws ReferenceTableError when either table is malformed
 */
export function createReferenceTables(accountCodes: unknown, fiscalCalendar?: unknown): ReferenceTables {
  const codes = AccountCodeTableSchema.safeParse(accountCodes);
  if (!codes.success) {
    throw new ReferenceTableError('account-codes', describeIssue(codes.error.issues));
  }

  let codePattern: RegExp;
  try {
    codePattern = new RegExp(codes.data.pattern);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new ReferenceTableError('account-codes', `invalid pattern: ${message}`);
  }

  let calendar = DEFAULT_FISCAL_CALENDAR;
  if (fiscalCalendar !== undefined) {
    const parsed = FiscalCalendarSchema.safeParse(fiscalCalendar);
    if (!parsed.success) {
      throw new ReferenceTableError('fiscal-calendar', describeIssue(parsed.error.issues));
    }
    calendar = parsed.data;
  }

  return { accountCodes: codes.data, codePattern, fiscalCalendar: calendar };
}

/**
 * Read and validate reference tables from JSON files.
 *
 * @throws ReferenceTableError when a file is missing, unreadable or malformed
 */
export async function loadReferenceTables(paths: {
  accountCodes: string;
  fiscalCalendar?: string | undefined;
}): Promise<ReferenceTables> {
  const accountCodes = await readJsonTable('account-codes', paths.accountCodes);
  const fiscalCalendar =
    paths.fiscalCalendar !== undefined ? await readJsonTable('fiscal-calendar', paths.fiscalCalendar) : undefined;
  return createReferenceTables(accountCodes, fiscalCalendar);
}

async function readJsonTable(table: string, path: string): Promise<unknown> {
  let content: string;
  try {
    content = await readFile(path, 'utf-8');
  } catch {
    throw new ReferenceTableError(table, `cannot read ${path}`);
  }
  try {
    return JSON.parse(content);
  } catch {
    throw new ReferenceTableError(table, `${path} is not valid JSON`);
  }
}

function describeIssue(issues: ReadonlyArray<{ path: ReadonlyArray<string | number>; message: string }>): string {
  const issue = issues[0];
  if (issue === undefined) return 'invalid table';
  return `/${issue.path.join('/')}: ${issue.message}`;
}

/**
 * Resolve an account code's category: the table entry when known, otherwise
 * the object-code family of the code's leading object digit.
 */
export function resolveCategory(
  code: string | null,
  tables: ReferenceTables
): { status: AccountCodeStatus; category: string } {
  if (code === null) {
    return { status: 'absent', category: UNCATEGORIZED };
  }

  const entry = tables.accountCodes.codes[code];
  if (entry !== undefined) {
    return { status: 'known', category: entry.category };
  }

  // Fund-object codes read "FF-OOOO"; the family is the object's first digit
  const objectPart = code.includes('-') ? code.slice(code.lastIndexOf('-') + 1) : code;
  const family = OBJECT_CODE_CATEGORIES[objectPart.charAt(0)];
  return { status: 'unknown', category: family ?? UNCATEGORIZED };
}
