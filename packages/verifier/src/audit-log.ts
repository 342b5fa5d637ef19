/**
 * Append-only audit log of verification runs (JSON Lines).
 *
 * A run id is a hash of the results alone, so rerunning the same claims
 * over the same ledger records the same run id again.
 */
import { appendFile, mkdir, readFile } from 'fs/promises';
import { dirname } from 'path';
import { z } from 'zod';
import { computeContentHash, VerificationResultSchema, type VerificationResult } from '@warrant-ledger/types';

export const AuditEntrySchema = z.object({
  runId: z.string().min(1),
  recordedAt: z.string().datetime(),
  results: z.array(VerificationResultSchema),
});
export type AuditEntry = z.infer<typeof AuditEntrySchema>;

export function computeRunId(results: readonly VerificationResult[]): string {
  return computeContentHash(JSON.stringify(results), 'run');
}

export function createAuditEntry(results: readonly VerificationResult[], recordedAt: Date = new Date()): AuditEntry {
  return {
    runId: computeRunId(results),
    recordedAt: recordedAt.toISOString(),
    results: [...results],
  };
}

export async function appendAuditEntry(path: string, entry: AuditEntry): Promise<void> {
  await mkdir(dirname(path), { recursive: true });
  await appendFile(path, `${JSON.stringify(entry)}\n`, 'utf-8');
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

/**
 * Read every entry, oldest first. A missing log is an empty log.
 */
export async function readAuditLog(path: string): Promise<AuditEntry[]> {
  let content: string;
  try {
    content = await readFile(path, 'utf-8');
  } catch (error) {
    if (isMissingFile(error)) return [];
    throw error;
  }

  const entries: AuditEntry[] = [];
  const lines = content.split('\n');
  for (const [index, line] of lines.entries()) {
    if (line.trim() === '') continue;
    let parsed: unknown;
    try {
      parsed = JSON.parse(line);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      throw new Error(`Audit log ${path} line ${index + 1}: ${message}`);
    }
    const result = AuditEntrySchema.safeParse(parsed);
    if (!result.success) {
      throw new Error(`Audit log ${path} line ${index + 1}: ${result.error.issues[0]?.message ?? 'invalid entry'}`);
    }
    entries.push(result.data);
  }
  return entries;
}

export async function readLastAuditEntry(path: string): Promise<AuditEntry | null> {
  const entries = await readAuditLog(path);
  return entries[entries.length - 1] ?? null;
}
