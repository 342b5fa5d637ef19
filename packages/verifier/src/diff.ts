import type { VerificationResult } from '@warrant-ledger/types';

export type ComparedField = 'verdict' | 'matchedValue' | 'delta';

export interface ClaimChange {
  claimId: string;
  fields: ComparedField[];
  previous: Pick<VerificationResult, ComparedField>;
  current: Pick<VerificationResult, ComparedField>;
}

export interface RunDiff {
  changed: ClaimChange[];
  added: string[];
  removed: string[];
  unchanged: number;
}

const COMPARED_FIELDS: readonly ComparedField[] = ['verdict', 'matchedValue', 'delta'];

function pick(result: VerificationResult): Pick<VerificationResult, ComparedField> {
  return { verdict: result.verdict, matchedValue: result.matchedValue, delta: result.delta };
}

/**
 * Compare two runs claim by claim. Changes follow the current run's order.
 */
export function diffRuns(
  previous: readonly VerificationResult[],
  current: readonly VerificationResult[]
): RunDiff {
  const before = new Map(previous.map((result) => [result.claimId, result]));
  const currentIds = new Set(current.map((result) => result.claimId));

  const changed: ClaimChange[] = [];
  const added: string[] = [];
  let unchanged = 0;

  for (const result of current) {
    const old = before.get(result.claimId);
    if (old === undefined) {
      added.push(result.claimId);
      continue;
    }
    const fields = COMPARED_FIELDS.filter((field) => old[field] !== result[field]);
    if (fields.length === 0) {
      unchanged++;
      continue;
    }
    changed.push({ claimId: result.claimId, fields, previous: pick(old), current: pick(result) });
  }

  const removed = previous.map((result) => result.claimId).filter((claimId) => !currentIds.has(claimId));

  return { changed, added, removed, unchanged };
}
