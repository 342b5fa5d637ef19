/**
 * Command orchestration shared by the CLI actions.
 *
 * Nothing here logs or exits; progress flows out through the hooks so the
 * commands decide what reaches stderr.
 */
import { readFile } from 'fs/promises';
import { dirname, isAbsolute, resolve } from 'path';
import type { ZodType, ZodTypeDef } from 'zod';
import { createPageTextSource } from '@warrant-ledger/page-text';
import {
  loadReferenceTables,
  processBatch,
  type BatchDocument,
  type BatchResult,
  type ReferenceTables,
} from '@warrant-ledger/register-parser';
import { reconcileRecords, type ReconcileResult } from '@warrant-ledger/reconcile';
import {
  buildCanonicalLedger,
  checkControlTotals,
  type IntegrityCheckResult,
  type LedgerDocumentInput,
} from '@warrant-ledger/ledger';
import { buildAnomalyReport, type AnomalyReport } from '@warrant-ledger/output';
import { verifyClaims, type VerificationRun } from '@warrant-ledger/verifier';
import {
  BatchManifestSchema,
  CanonicalLedgerSchema,
  ClaimListSchema,
  ReferenceTableError,
  type BatchManifest,
  type CanonicalLedger,
  type Claim,
  type DocumentError,
  type PipelineConfig,
  type ReportingPeriod,
} from '@warrant-ledger/types';

export interface IngestHooks {
  onProgress?: (completed: number, total: number, documentId: string) => void;
  onRetry?: (documentId: string, attempt: number, error: Error, delayMs: number) => void;
  onDocumentError?: (error: DocumentError) => void;
}

export interface IngestResult {
  ledger: CanonicalLedger;
  anomalies: AnomalyReport;
  batch: BatchResult;
  reconciliation: ReconcileResult;
  integrity: IntegrityCheckResult;
}

export interface ReferenceTablePaths {
  accountCodes?: string | undefined;
  fiscalCalendar?: string | undefined;
}

/**
 * Read a JSON file and validate it with a zod schema. The error names the
 * file and the first failing path.
 */
export async function readJsonFile<T>(path: string, schema: ZodType<T, ZodTypeDef, unknown>, label: string): Promise<T> {
  let content: string;
  try {
    content = await readFile(path, 'utf-8');
  } catch {
    throw new Error(`Cannot read ${label} ${path}`);
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(content);
  } catch {
    throw new Error(`${label} ${path} is not valid JSON`);
  }

  const result = schema.safeParse(parsed);
  if (!result.success) {
    const issue = result.error.issues[0];
    const where = issue !== undefined ? `/${issue.path.join('/')}: ${issue.message}` : 'invalid';
    throw new Error(`Invalid ${label} ${path}: ${where}`);
  }
  return result.data;
}

export function loadManifest(path: string): Promise<BatchManifest> {
  return readJsonFile(path, BatchManifestSchema, 'manifest');
}

export function loadClaims(path: string): Promise<Claim[]> {
  return readJsonFile(path, ClaimListSchema, 'claim list');
}

export function loadLedger(path: string): Promise<CanonicalLedger> {
  return readJsonFile(path, CanonicalLedgerSchema, 'ledger');
}

function resolveFrom(baseDir: string, path: string): string {
  return isAbsolute(path) ? path : resolve(baseDir, path);
}

/**
 * Pair each manifest entry with the page text source it names. Relative
 * paths resolve against the manifest's directory.
 */
export function batchDocumentsFromManifest(manifest: BatchManifest, manifestPath: string): BatchDocument[] {
  const baseDir = dirname(resolve(manifestPath));
  return manifest.documents.map(({ source, ...descriptor }) => ({
    descriptor,
    source: createPageTextSource(descriptor.documentId, source, (path) => resolveFrom(baseDir, path)),
  }));
}

/**
 * Load reference tables. Paths given on the command line win over the
 * manifest's; manifest paths resolve against its directory.
 *
 * @throws ReferenceTableError when no account-code table is named
 */
export function loadManifestTables(
  manifest: BatchManifest,
  manifestPath: string,
  overrides: ReferenceTablePaths = {}
): Promise<ReferenceTables> {
  const baseDir = dirname(resolve(manifestPath));
  const fromManifest = manifest.referenceTables;

  const accountCodes =
    overrides.accountCodes ??
    (fromManifest !== undefined ? resolveFrom(baseDir, fromManifest.accountCodes) : undefined);
  if (accountCodes === undefined) {
    throw new ReferenceTableError('account-codes', 'no table path in the manifest or on the command line');
  }

  const fiscalCalendar =
    overrides.fiscalCalendar ??
    (fromManifest?.fiscalCalendar !== undefined ? resolveFrom(baseDir, fromManifest.fiscalCalendar) : undefined);

  return loadReferenceTables({ accountCodes, fiscalCalendar });
}

/**
 * Run extraction, reconciliation and aggregation over a batch of documents.
 */
export async function ingestDocuments(
  documents: readonly BatchDocument[],
  referenceTables: ReferenceTables,
  config: PipelineConfig,
  hooks: IngestHooks = {}
): Promise<IngestResult> {
  const batch = await processBatch(documents, {
    referenceTables,
    options: {
      rowGap: config.rowGap,
      columnTolerance: config.columnTolerance,
      minColumnSupport: config.minColumnSupport,
      fiscalToleranceDays: config.fiscalToleranceDays,
      warrantPattern: config.warrantPattern,
    },
    concurrency: config.concurrency,
    maxRetries: config.maxRetries,
    ...hooks,
  });

  const periods = new Map<string, ReportingPeriod>(
    documents.map((document) => [document.descriptor.documentId, document.descriptor.period])
  );
  const reconciliation = reconcileRecords(
    batch.documents.flatMap((document) => document.records),
    { dateToleranceDays: config.dateToleranceDays, periods }
  );

  const integrity = checkControlTotals(
    batch.documents.map((document) => ({ descriptor: document.descriptor, records: document.records })),
    config.controlTotalThresholdPercent
  );

  const processed = new Map(batch.documents.map((document) => [document.descriptor.documentId, document]));
  const ledgerDocuments: LedgerDocumentInput[] = documents.map(({ descriptor }) => {
    const result = processed.get(descriptor.documentId);
    return {
      descriptor,
      status: result !== undefined ? 'processed' : 'failed',
      recordCount: result?.records.length ?? 0,
    };
  });

  const ledger = buildCanonicalLedger(
    ledgerDocuments,
    reconciliation.records,
    config.groupingRules !== undefined ? { groupingRules: config.groupingRules } : {}
  );

  const anomalies = buildAnomalyReport({
    documents: batch.documents,
    documentErrors: batch.documentErrors,
    reconciliation,
    controlTotals: integrity.results,
  });

  return { ledger, anomalies, batch, reconciliation, integrity };
}

/**
 * Verify claims against a ledger, using the configured grouping rules when
 * they differ from the ledger's own buckets.
 */
export function verifyAgainstLedger(
  claims: readonly Claim[],
  ledger: CanonicalLedger,
  config: Pick<PipelineConfig, 'groupingRules'>
): VerificationRun {
  return verifyClaims(
    claims,
    ledger,
    config.groupingRules !== undefined ? { groupingRules: config.groupingRules } : {}
  );
}
