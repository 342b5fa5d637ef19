#!/usr/bin/env node
/* eslint-disable no-console */

// Load environment variables from .env file
import 'dotenv/config';

import { Command } from 'commander';
import { readFile } from 'fs/promises';
import { join, resolve } from 'path';
import {
  AVAILABLE_OUTPUT_KINDS,
  PIPELINE_VERSION,
  formatMinor,
  formatValidationErrors,
  isValidOutputKind,
  resolvePipelineConfig,
  sumMinor,
  validateSchemaOutput,
  type CanonicalLedger,
  type Claim,
  type PipelineConfig,
  type PipelineConfigInput,
} from '@warrant-ledger/types';
import {
  exportCsv,
  exportCsvByDocument,
  serializeJson,
  serializeLedger,
  serializeReport,
  writeTextFile,
} from '@warrant-ledger/output';
import {
  appendAuditEntry,
  createAuditEntry,
  diffRuns,
  readLastAuditEntry,
  type RunDiff,
} from '@warrant-ledger/verifier';
import {
  batchDocumentsFromManifest,
  ingestDocuments,
  loadClaims,
  loadLedger,
  loadManifest,
  loadManifestTables,
  verifyAgainstLedger,
  type IngestResult,
} from './pipeline.js';

const program = new Command();

// Helper to parse boolean env vars
const envBool = (key: string, defaultVal: boolean): boolean => {
  const val = process.env[key];
  if (val === undefined || val === '') return defaultVal;
  return val === 'true' || val === '1';
};

interface CommonOptions {
  outDir: string;
  verbose: boolean;
  pretty: boolean;
  config?: string;
  dateTolerance?: string;
  concurrency?: string;
}

interface IngestOptions extends CommonOptions {
  accountCodes?: string;
  fiscalCalendar?: string;
  csv: boolean;
  split: boolean;
}

interface VerifyOptions extends CommonOptions {
  auditLog?: string;
  diff: boolean;
}

type RunOptions = IngestOptions & VerifyOptions;

function parseIntegerOption(name: string, raw: string | undefined): number | undefined {
  if (raw === undefined) return undefined;
  const value = Number(raw);
  if (!Number.isInteger(value)) {
    throw new Error(`Invalid value for ${name}: "${raw}" is not an integer`);
  }
  return value;
}

async function resolveConfig(options: CommonOptions): Promise<PipelineConfig> {
  let file: unknown;
  if (options.config !== undefined) {
    const content = await readFile(resolve(options.config), 'utf-8');
    file = JSON.parse(content);
  }

  const cli: Partial<PipelineConfigInput> = {
    dateToleranceDays: parseIntegerOption('--date-tolerance', options.dateTolerance),
    concurrency: parseIntegerOption('--concurrency', options.concurrency),
  };
  const config = resolvePipelineConfig({ cli, file });

  if (options.verbose) {
    console.error(`[INFO] Pipeline version: ${PIPELINE_VERSION}`);
    console.error(`[INFO] Date tolerance: ${config.dateToleranceDays} day(s)`);
    console.error(`[INFO] Concurrency: ${config.concurrency}`);
    console.error(`[INFO] Control total threshold: ${config.controlTotalThresholdPercent}%`);
  }
  return config;
}

function withCommonOptions(command: Command): Command {
  return command
    .option('-o, --out-dir <directory>', 'Directory for output files', process.env['WL_OUTPUT_DIR'] ?? './out')
    .option('-v, --verbose', 'Enable verbose output', envBool('WL_VERBOSE', false))
    .option('--pretty', 'Pretty-print JSON output', envBool('WL_PRETTY', true))
    .option('--no-pretty', 'Disable pretty-printing')
    .option('-c, --config <file>', 'JSON config file', process.env['WL_CONFIG'])
    .option('--date-tolerance <days>', 'Days apart two records may be and still match')
    .option('--concurrency <n>', 'Documents processed at once');
}

function withIngestOptions(command: Command): Command {
  return command
    .option('--account-codes <file>', 'Account-code table (overrides the manifest)', process.env['WL_ACCOUNT_CODES'])
    .option('--fiscal-calendar <file>', 'Fiscal calendar (overrides the manifest)', process.env['WL_FISCAL_CALENDAR'])
    .option('--csv', 'Also write the ledger as CSV', envBool('WL_CSV', false))
    .option('--split', 'Write one CSV per document (with --csv)', envBool('WL_SPLIT', false));
}

function withVerifyOptions(command: Command): Command {
  return command
    .option('--audit-log <file>', 'Audit log path (default: <out-dir>/audit-log.jsonl)', process.env['WL_AUDIT_LOG'])
    .option('--diff', 'Compare with the previous run in the audit log', envBool('WL_DIFF', false));
}

function reportFailure(error: unknown, verbose: boolean): never {
  const message = error instanceof Error ? error.message : String(error);
  console.error(`[ERROR] ${message}`);
  if (verbose && error instanceof Error && error.stack !== undefined) {
    console.error(error.stack);
  }
  process.exit(1);
}

// ─── ingest ──────────────────────────────────────────────────────────────────

async function runIngest(manifestPath: string, options: IngestOptions, config: PipelineConfig): Promise<IngestResult> {
  const manifestFile = resolve(manifestPath);
  const manifest = await loadManifest(manifestFile);
  const referenceTables = await loadManifestTables(manifest, manifestFile, {
    accountCodes: options.accountCodes !== undefined ? resolve(options.accountCodes) : undefined,
    fiscalCalendar: options.fiscalCalendar !== undefined ? resolve(options.fiscalCalendar) : undefined,
  });

  console.error(`[INFO] Manifest: ${manifestFile}`);
  console.error(`[INFO] Documents: ${manifest.documents.length}`);
  if (options.verbose) {
    console.error(`[INFO] Account codes: ${Object.keys(referenceTables.accountCodes.codes).length}`);
  }

  const result = await ingestDocuments(batchDocumentsFromManifest(manifest, manifestFile), referenceTables, config, {
    onProgress: (completed, total, documentId) => {
      console.error(`[INFO] Processed ${completed}/${total}: ${documentId}`);
    },
    onRetry: (documentId, attempt, error, delayMs) => {
      console.error(`[WARN] ${documentId}: attempt ${attempt} failed (${error.message}), retrying in ${delayMs}ms`);
    },
    onDocumentError: (error) => {
      console.error(`[ERROR] ${error.documentId}: ${error.stage} failed after ${error.attempts} attempt(s): ${error.error}`);
    },
  });

  const { batch, reconciliation, integrity, anomalies } = result;

  for (const check of integrity.results) {
    if (check.severity === 'error') {
      console.error(`[WARN] Control total: ${check.message}`);
    } else if (options.verbose) {
      console.error(`[INFO] Control total: ${check.message}`);
    }
  }
  for (const ambiguity of reconciliation.ambiguities) {
    console.error(`[WARN] Ambiguous duplicate ${ambiguity.recordId}: ${ambiguity.detail}`);
  }

  console.error('');
  console.error('=== Ingest Summary ===');
  console.error(`Documents processed:     ${batch.summary.documentsSucceeded}/${batch.summary.totalDocuments}`);
  console.error(`Documents failed:        ${batch.summary.documentsFailed}`);
  console.error(`Records extracted:       ${batch.summary.totalRecords}`);
  console.error(`Rows unparsed:           ${batch.summary.totalUnparsed}`);
  console.error(`Records rejected:        ${batch.summary.totalRejected}`);
  console.error(`Exact duplicates merged: ${reconciliation.summary.exactDuplicatesMerged}`);
  console.error(`Fuzzy duplicates merged: ${reconciliation.summary.fuzzyMerged}`);
  console.error(`Ambiguous duplicates:    ${reconciliation.summary.ambiguous}`);
  console.error(`Ledger records:          ${result.ledger.records.length}`);
  console.error(`Ledger total:            ${formatMinor(sumMinor(result.ledger.records.map((r) => r.amountMinor)))}`);
  console.error(`Control total issues:    ${integrity.documentsWithIssues}`);
  console.error('======================');

  const outDir = resolve(options.outDir);
  const ledgerPath = join(outDir, 'ledger.json');
  await writeTextFile(ledgerPath, serializeLedger(result.ledger, { pretty: options.pretty }));
  console.error(`[INFO] Ledger written to: ${ledgerPath}`);

  const anomaliesPath = join(outDir, 'anomalies.json');
  await writeTextFile(anomaliesPath, serializeJson(anomalies, { pretty: options.pretty }));
  const anomalyCount = Object.values(anomalies.summary).reduce((sum, count) => sum + count, 0);
  console.error(`[INFO] Anomalies written to: ${anomaliesPath} (${anomalyCount} entries)`);

  if (options.csv) {
    await writeCsv(result.ledger, outDir, options.split);
  }

  return result;
}

async function writeCsv(ledger: CanonicalLedger, outDir: string, split: boolean): Promise<void> {
  if (split) {
    const files = exportCsvByDocument(ledger, { includeProvenance: true });
    for (const file of files) {
      await writeTextFile(join(outDir, file.filename), file.content);
    }
    console.error(`[INFO] Wrote ${files.length} CSV file(s) to: ${outDir}`);
    return;
  }

  const csvPath = join(outDir, 'ledger.csv');
  await writeTextFile(csvPath, exportCsv(ledger, { includeProvenance: true }));
  console.error(`[INFO] CSV written to: ${csvPath}`);
}

// ─── verify ──────────────────────────────────────────────────────────────────

function printDiff(diff: RunDiff): void {
  console.error('');
  console.error('=== Changes Since Last Run ===');
  for (const change of diff.changed) {
    const fields = change.fields
      .map((field) => `${field} ${String(change.previous[field])} -> ${String(change.current[field])}`)
      .join(', ');
    console.error(`  ~ ${change.claimId}: ${fields}`);
  }
  for (const claimId of diff.added) {
    console.error(`  + ${claimId}`);
  }
  for (const claimId of diff.removed) {
    console.error(`  - ${claimId}`);
  }
  console.error(`Unchanged: ${diff.unchanged}`);
  console.error('==============================');
}

async function runVerify(
  ledger: CanonicalLedger,
  claims: readonly Claim[],
  options: VerifyOptions,
  config: PipelineConfig
): Promise<boolean> {
  const { report, gaps } = verifyAgainstLedger(claims, ledger, config);

  for (const result of report.results) {
    if (result.verdict === 'verified') {
      if (options.verbose) console.error(`[INFO] ${result.claimId}: verified`);
    } else {
      console.error(`[WARN] ${result.claimId}: ${result.verdict}${result.reason !== null ? ` (${result.reason})` : ''}`);
    }
  }

  console.error('');
  console.error('=== Verification Summary ===');
  console.error(`Claims:        ${report.summary.total}`);
  console.error(`Verified:      ${report.summary.verified}`);
  console.error(`Mismatch:      ${report.summary.mismatch}`);
  console.error(`Unverifiable:  ${report.summary.unverifiable}`);
  console.error('============================');

  const outDir = resolve(options.outDir);
  const reportPath = join(outDir, 'verification-report.json');
  await writeTextFile(reportPath, serializeReport(report, { pretty: options.pretty }));
  console.error(`[INFO] Report written to: ${reportPath}`);

  if (gaps.length > 0) {
    const gapsPath = join(outDir, 'claim-gaps.json');
    await writeTextFile(gapsPath, serializeJson(gaps, { pretty: options.pretty }));
    console.error(`[INFO] Claim resolution gaps written to: ${gapsPath}`);
  }

  const auditLogPath = resolve(options.auditLog ?? join(outDir, 'audit-log.jsonl'));
  if (options.diff) {
    const previous = await readLastAuditEntry(auditLogPath);
    if (previous === null) {
      console.error('[INFO] No previous run in the audit log');
    } else {
      console.error(`[INFO] Comparing with run ${previous.runId} (${previous.recordedAt})`);
      printDiff(diffRuns(previous.results, report.results));
    }
  }

  const entry = createAuditEntry(report.results);
  await appendAuditEntry(auditLogPath, entry);
  console.error(`[INFO] Run ${entry.runId} appended to: ${auditLogPath}`);

  return report.summary.mismatch === 0 && report.summary.unverifiable === 0;
}

// ─── Commands ────────────────────────────────────────────────────────────────

program
  .name('warrant-ledger')
  .description('Extract warrant registers into a canonical ledger and verify claims against it')
  .version(PIPELINE_VERSION);

withIngestOptions(withCommonOptions(program.command('ingest')))
  .description('Build the canonical ledger and anomaly report from a batch manifest')
  .argument('<manifest>', 'Batch manifest (JSON)')
  .action(async (manifest: string, options: IngestOptions) => {
    try {
      const config = await resolveConfig(options);
      await runIngest(manifest, options, config);
    } catch (error) {
      reportFailure(error, options.verbose);
    }
  });

withVerifyOptions(withCommonOptions(program.command('verify')))
  .description('Verify a claim list against a canonical ledger')
  .argument('<ledger>', 'Canonical ledger (JSON)')
  .argument('<claims>', 'Claim list (JSON)')
  .option('--strict', 'Exit 2 when any claim is not verified', envBool('WL_STRICT', false))
  .action(async (ledgerPath: string, claimsPath: string, options: VerifyOptions & { strict: boolean }) => {
    try {
      const config = await resolveConfig(options);
      const ledger = await loadLedger(resolve(ledgerPath));
      const claims = await loadClaims(resolve(claimsPath));
      console.error(`[INFO] Verifying ${claims.length} claim(s) against ${ledger.records.length} record(s)`);
      const allVerified = await runVerify(ledger, claims, options, config);
      if (options.strict && !allVerified) {
        process.exit(2);
      }
    } catch (error) {
      reportFailure(error, options.verbose);
    }
  });

withVerifyOptions(withIngestOptions(withCommonOptions(program.command('run'))))
  .description('Ingest a batch manifest, then verify a claim list against the result')
  .argument('<manifest>', 'Batch manifest (JSON)')
  .argument('<claims>', 'Claim list (JSON)')
  .action(async (manifest: string, claimsPath: string, options: RunOptions) => {
    try {
      const config = await resolveConfig(options);
      const claims = await loadClaims(resolve(claimsPath));
      const { ledger } = await runIngest(manifest, options, config);
      await runVerify(ledger, claims, options, config);
    } catch (error) {
      reportFailure(error, options.verbose);
    }
  });

program
  .command('validate')
  .description('Validate a ledger or verification report against its JSON schema')
  .argument('<file>', 'JSON file to validate')
  .option('-k, --kind <kind>', `Output kind (${AVAILABLE_OUTPUT_KINDS.join(', ')})`, 'ledger')
  .option('-v, --verbose', 'Enable verbose output', envBool('WL_VERBOSE', false))
  .action(async (file: string, options: { kind: string; verbose: boolean }) => {
    try {
      // "report" is accepted as shorthand for the verification report
      const kind = options.kind === 'report' ? 'verification-report' : options.kind;
      if (!isValidOutputKind(kind)) {
        throw new Error(`Unknown kind "${options.kind}". Available kinds: ${AVAILABLE_OUTPUT_KINDS.join(', ')}`);
      }

      const path = resolve(file);
      const payload: unknown = JSON.parse(await readFile(path, 'utf-8'));
      const result = validateSchemaOutput(kind, payload);
      if (!result.valid) {
        console.error(`[ERROR] ${path} is not a valid ${kind}:`);
        console.error(formatValidationErrors(result.errors));
        process.exit(1);
      }
      console.error(`[INFO] ${path} is a valid ${kind}`);
    } catch (error) {
      reportFailure(error, options.verbose);
    }
  });

program.parse();
