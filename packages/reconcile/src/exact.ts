import type { TransactionRecord } from '@warrant-ledger/types';
import { compareCanonical, mergeInto } from './canonical.js';
import type { DuplicateOccurrence } from './types.js';

export interface ExactMergeResult {
  records: TransactionRecord[];
  duplicates: DuplicateOccurrence[];
  merged: number;
}

/**
 * Merge records that share a record id. Identical content hashes are the
 * same payment by construction, so this pass never needs a score.
 */
export function mergeExactDuplicates(records: readonly TransactionRecord[]): ExactMergeResult {
  const groups = new Map<string, TransactionRecord[]>();
  for (const record of records) {
    const group = groups.get(record.recordId) ?? [];
    group.push(record);
    groups.set(record.recordId, group);
  }

  const merged: TransactionRecord[] = [];
  const duplicates: DuplicateOccurrence[] = [];
  let mergedCount = 0;

  for (const [recordId, group] of groups) {
    const [canonical, ...others] = [...group].sort(compareCanonical);
    if (canonical === undefined) continue;

    if (others.length === 0) {
      merged.push(canonical);
      continue;
    }
    mergedCount += others.length;

    const perDocument = new Map<string, number>();
    for (const entry of group.flatMap((record) => record.provenance)) {
      perDocument.set(entry.documentId, (perDocument.get(entry.documentId) ?? 0) + 1);
    }
    const repeated = [...perDocument.entries()].filter(([, count]) => count > 1);
    for (const [documentId, occurrences] of repeated) {
      duplicates.push({ recordId, documentId, occurrences });
    }

    merged.push(mergeInto(canonical, others, repeated.length > 0 ? ['duplicate-in-document'] : []));
  }

  duplicates.sort((a, b) => a.recordId.localeCompare(b.recordId) || a.documentId.localeCompare(b.documentId));
  return { records: merged, duplicates, merged: mergedCount };
}
