import { findBucket, type AggregationIndex } from '@warrant-ledger/ledger';
import { sumMinor, type CanonicalLedger, type TransactionRecord } from '@warrant-ledger/types';
import type { SourceRef } from './source-ref.js';

/**
 * What a cited source resolves to. `count` is null for facts that have no
 * record count of their own, such as a stated total without a stated count.
 */
export interface ResolvedSource {
  totalMinor: number | null;
  count: number | null;
  recordIds: string[];
  documentIds: string[];
  bucketKey: string | null;
}

export type Resolution = { ok: true; value: ResolvedSource } | { ok: false; detail: string };

export interface ResolverContext {
  ledger: CanonicalLedger;
  index: AggregationIndex;
}

function fromRecords(records: readonly TransactionRecord[]): ResolvedSource {
  return {
    totalMinor: sumMinor(records.map((record) => record.amountMinor)),
    count: records.length,
    recordIds: records.map((record) => record.recordId).sort(),
    documentIds: [...new Set(records.flatMap((record) => record.sourceDocumentIds))].sort(),
    bucketKey: null,
  };
}

export function resolveSource(ref: SourceRef, context: ResolverContext): Resolution {
  const { ledger, index } = context;

  switch (ref.kind) {
    case 'bucket': {
      const bucket = findBucket(index, ref.dimensions);
      if (bucket === undefined) {
        const wanted = ref.dimensions.map(([dimension, value]) => `${dimension}=${value}`).join(';');
        return { ok: false, detail: `No bucket for ${wanted}` };
      }
      const ids = new Set(bucket.recordIds);
      const records = ledger.records.filter((record) => ids.has(record.recordId));
      return {
        ok: true,
        value: {
          totalMinor: bucket.totalMinor,
          count: bucket.recordCount,
          recordIds: bucket.recordIds,
          documentIds: [...new Set(records.flatMap((record) => record.sourceDocumentIds))].sort(),
          bucketKey: bucket.key,
        },
      };
    }

    case 'document':
    case 'document-page':
    case 'stated-total': {
      const document = ledger.documents.find((entry) => entry.documentId === ref.documentId);
      if (document === undefined) {
        return { ok: false, detail: `Unknown document "${ref.documentId}"` };
      }

      if (ref.kind === 'stated-total') {
        if (document.statedTotalMinor === null) {
          return { ok: false, detail: `Document "${ref.documentId}" has no stated total` };
        }
        return {
          ok: true,
          value: {
            totalMinor: document.statedTotalMinor,
            count: document.statedCount,
            recordIds: [],
            documentIds: [document.documentId],
            bucketKey: null,
          },
        };
      }

      if (document.status === 'failed') {
        return { ok: false, detail: `Document "${ref.documentId}" failed to process` };
      }

      const records = ledger.records.filter((record) =>
        record.provenance.some(
          (entry) =>
            entry.documentId === ref.documentId && (ref.kind === 'document' || entry.pageIndex === ref.pageIndex)
        )
      );
      if (records.length === 0) {
        return {
          ok: false,
          detail:
            ref.kind === 'document-page'
              ? `No records on page ${ref.pageIndex} of "${ref.documentId}"`
              : `No records from "${ref.documentId}"`,
        };
      }
      return { ok: true, value: fromRecords(records) };
    }

    case 'record': {
      const record = ledger.records.find((entry) => entry.recordId === ref.recordId);
      if (record === undefined) {
        return { ok: false, detail: `Unknown record "${ref.recordId}"` };
      }
      return { ok: true, value: fromRecords([record]) };
    }
  }
}
