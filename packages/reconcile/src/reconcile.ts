/**
 * Deduplication and reconciliation across documents.
 *
 * Runs after every document of a batch is parsed. Exact record-id matches
 * merge unconditionally; other plausible duplicates merge only as mutual,
 * unique best matches. Ties are reported and left unmerged; a record with no
 * match is kept as is.
 */
import type { ReconciliationAmbiguity, TransactionRecord } from '@warrant-ledger/types';
import { compareCanonical, mergeInto } from './canonical.js';
import { mergeExactDuplicates } from './exact.js';
import { scorePair, type ScoreOptions } from './scoring.js';
import type { FuzzyMatch, ReconcileOptions, ReconcileResult } from './types.js';

const DEFAULT_DATE_TOLERANCE_DAYS = 3;

interface BestCandidates {
  score: number;
  dateDistance: number;
  recordIds: string[];
}

/**
 * Buckets records by the fields a fuzzy match requires to be equal, so
 * scoring only compares records that can possibly match.
 */
function blockKey(record: TransactionRecord): string {
  return `${record.fiscalYear}|${record.payeeNormalized}|${record.amountMinor}`;
}

function findBestCandidates(
  records: readonly TransactionRecord[],
  options: ScoreOptions
): Map<string, BestCandidates> {
  const blocks = new Map<string, TransactionRecord[]>();
  for (const record of records) {
    const key = blockKey(record);
    const block = blocks.get(key) ?? [];
    block.push(record);
    blocks.set(key, block);
  }

  const best = new Map<string, BestCandidates>();
  for (const block of blocks.values()) {
    for (const record of block) {
      for (const other of block) {
        if (other.recordId === record.recordId) continue;
        const pair = scorePair(record, other, options);
        if (pair === null) continue;

        const current = best.get(record.recordId);
        if (current === undefined || pair.score > current.score) {
          best.set(record.recordId, { score: pair.score, dateDistance: pair.dateDistance, recordIds: [other.recordId] });
        } else if (pair.score === current.score) {
          current.recordIds.push(other.recordId);
        }
      }
    }
  }

  for (const candidates of best.values()) {
    candidates.recordIds.sort();
  }
  return best;
}

export function reconcileRecords(
  records: readonly TransactionRecord[],
  options: ReconcileOptions = {}
): ReconcileResult {
  const scoreOptions: ScoreOptions = {
    dateToleranceDays: options.dateToleranceDays ?? DEFAULT_DATE_TOLERANCE_DAYS,
    periods: options.periods ?? new Map(),
  };

  const exact = mergeExactDuplicates(records);
  const byId = new Map(exact.records.map((record) => [record.recordId, record]));
  const best = findBestCandidates(exact.records, scoreOptions);

  const ambiguities: ReconciliationAmbiguity[] = [];
  const fuzzyMatches: FuzzyMatch[] = [];
  const absorbed = new Set<string>();
  const replaced = new Map<string, TransactionRecord>();

  const sortedIds = [...best.keys()].sort();
  for (const recordId of sortedIds) {
    const candidates = best.get(recordId);
    const record = byId.get(recordId);
    if (candidates === undefined || record === undefined) continue;

    if (candidates.recordIds.length > 1) {
      const tied = candidates.recordIds
        .map((id) => byId.get(id))
        .filter((other): other is TransactionRecord => other !== undefined);
      ambiguities.push({
        kind: 'reconciliation-ambiguity',
        recordId,
        candidateRecordIds: candidates.recordIds,
        score: candidates.score,
        documentIds: [...new Set([record, ...tied].flatMap((r) => r.sourceDocumentIds))].sort(),
        detail: `${candidates.recordIds.length} candidates tie at score ${candidates.score.toFixed(3)} for ${record.payeeName} ${record.transactionDate}`,
      });
      continue;
    }

    const [partnerId] = candidates.recordIds;
    if (partnerId === undefined || recordId > partnerId) continue;
    const partnerBest = best.get(partnerId);
    const partner = byId.get(partnerId);
    if (partnerBest === undefined || partner === undefined) continue;
    if (partnerBest.recordIds.length !== 1 || partnerBest.recordIds[0] !== recordId) continue;

    const [canonical, other] = [record, partner].sort(compareCanonical);
    if (canonical === undefined || other === undefined) continue;

    replaced.set(canonical.recordId, mergeInto(canonical, [other], ['fuzzy-merged'], [other.recordId]));
    absorbed.add(other.recordId);
    fuzzyMatches.push({
      canonicalRecordId: canonical.recordId,
      mergedRecordId: other.recordId,
      score: candidates.score,
      dateDistance: candidates.dateDistance,
    });
  }

  const output = exact.records
    .filter((record) => !absorbed.has(record.recordId))
    .map((record) => replaced.get(record.recordId) ?? record)
    .sort((a, b) => a.recordId.localeCompare(b.recordId));

  return {
    records: output,
    fuzzyMatches,
    ambiguities,
    duplicates: exact.duplicates,
    summary: {
      inputRecords: records.length,
      outputRecords: output.length,
      exactDuplicatesMerged: exact.merged,
      fuzzyMerged: fuzzyMatches.length,
      ambiguous: ambiguities.length,
    },
  };
}
