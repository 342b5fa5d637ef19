/**
 * Canonical-copy selection and provenance merging shared by the exact and
 * fuzzy passes.
 */
import type { ProvenanceConfidence, ProvenanceEntry, RecordFlag, TransactionRecord } from '@warrant-ledger/types';

const CONFIDENCE_RANK: Record<ProvenanceConfidence, number> = { high: 0, medium: 1, low: 2 };

function primaryEntry(record: TransactionRecord): ProvenanceEntry | undefined {
  return record.provenance.find((entry) => entry.documentId === record.sourceDocumentId) ?? record.provenance[0];
}

/**
 * Order records so the preferred canonical copy comes first: highest
 * confidence, then smaller document id, page and row.
 */
export function compareCanonical(a: TransactionRecord, b: TransactionRecord): number {
  const byConfidence = CONFIDENCE_RANK[a.provenanceConfidence] - CONFIDENCE_RANK[b.provenanceConfidence];
  if (byConfidence !== 0) return byConfidence;

  if (a.sourceDocumentId !== b.sourceDocumentId) {
    return a.sourceDocumentId < b.sourceDocumentId ? -1 : 1;
  }

  const pa = primaryEntry(a);
  const pb = primaryEntry(b);
  return (pa?.pageIndex ?? 0) - (pb?.pageIndex ?? 0) || (pa?.rowIndex ?? 0) - (pb?.rowIndex ?? 0);
}

export function compareProvenance(a: ProvenanceEntry, b: ProvenanceEntry): number {
  if (a.documentId !== b.documentId) {
    return a.documentId < b.documentId ? -1 : 1;
  }
  return a.pageIndex - b.pageIndex || a.rowIndex - b.rowIndex;
}

function sortedUnique<T extends string>(values: Iterable<T>): T[] {
  return [...new Set(values)].sort();
}

/**
 * Fold `others` into `canonical`. The canonical copy keeps its fields; every
 * document id, provenance entry, merged id and flag of the others is kept.
 */
export function mergeInto(
  canonical: TransactionRecord,
  others: readonly TransactionRecord[],
  extraFlags: readonly RecordFlag[] = [],
  absorbedIds: readonly string[] = []
): TransactionRecord {
  const all = [canonical, ...others];
  return {
    ...canonical,
    sourceDocumentIds: sortedUnique(all.flatMap((record) => record.sourceDocumentIds)),
    provenance: all.flatMap((record) => record.provenance).sort(compareProvenance),
    mergedRecordIds: sortedUnique([...all.flatMap((record) => record.mergedRecordIds), ...absorbedIds]),
    flags: sortedUnique([...all.flatMap((record) => record.flags), ...extraFlags]),
  };
}
