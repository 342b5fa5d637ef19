/**
 * Claim Verification Engine.
 *
 * Resolves each claim's cited source and compares the asserted value with
 * the resolved one. Verdicts and evidence only; narrative text is never
 * touched.
 */
import { buildAggregationIndex, type AggregationIndex } from '@warrant-ledger/ledger';
import {
  REPORT_SCHEMA_VERSION,
  majorToMinor,
  type CanonicalLedger,
  type Claim,
  type ClaimResolutionGap,
  type ClaimUnit,
  type GroupingRule,
  type ToleranceUsed,
  type VerificationReport,
  type VerificationResult,
} from '@warrant-ledger/types';
import { resolveSource, type ResolvedSource } from './resolver.js';
import { parseSourceRef } from './source-ref.js';

export interface VerifyOptions {
  /** Rebuild the index under these rules instead of using the ledger's buckets */
  groupingRules?: readonly GroupingRule[];
}

export interface VerificationRun {
  report: VerificationReport;
  gaps: ClaimResolutionGap[];
}

const UNIT_SCALE: Record<Exclude<ClaimUnit, 'COUNT'>, number> = {
  USD: 1,
  USD_THOUSANDS: 1_000,
  USD_MILLIONS: 1_000_000,
};

/**
 * Convert a value in the claim's unit to result units: minor units for
 * money, plain integers for counts.
 */
export function toResultUnits(value: number, unit: ClaimUnit): number {
  if (unit === 'COUNT') return value;
  return majorToMinor(value * UNIT_SCALE[unit]);
}

export function resolveTolerance(claim: Claim, assertedValue: number): ToleranceUsed {
  if ('percent' in claim.tolerance) {
    return {
      kind: 'percent',
      value: claim.tolerance.percent,
      allowed: (Math.abs(assertedValue) * claim.tolerance.percent) / 100,
    };
  }
  return {
    kind: 'absolute',
    value: claim.tolerance.absolute,
    allowed: Math.abs(toResultUnits(claim.tolerance.absolute, claim.unit)),
  };
}

function matchedValueFor(unit: ClaimUnit, resolved: ResolvedSource): number | null {
  return unit === 'COUNT' ? resolved.count : resolved.totalMinor;
}

export function indexFromLedger(ledger: CanonicalLedger, rules?: readonly GroupingRule[]): AggregationIndex {
  if (rules !== undefined) {
    return buildAggregationIndex(ledger.records, rules);
  }
  return new Map(ledger.buckets.map((bucket) => [bucket.key, bucket]));
}

export function verifyClaim(
  claim: Claim,
  ledger: CanonicalLedger,
  index: AggregationIndex
): { result: VerificationResult; gap: ClaimResolutionGap | null } {
  const assertedValue = toResultUnits(claim.value, claim.unit);
  const toleranceUsed = resolveTolerance(claim, assertedValue);

  const unverifiable = (detail: string) => {
    const gap: ClaimResolutionGap = { kind: 'claim-resolution-gap', claimId: claim.claimId, source: claim.source, detail };
    const result: VerificationResult = {
      claimId: claim.claimId,
      verdict: 'unverifiable',
      unit: claim.unit,
      assertedValue,
      matchedValue: null,
      delta: null,
      toleranceUsed,
      evidence: { source: claim.source, bucketKey: null, recordIds: [], documentIds: [] },
      reason: detail,
    };
    return { result, gap };
  };

  const parsed = parseSourceRef(claim.source);
  if (!parsed.ok) {
    return unverifiable(parsed.detail);
  }

  const resolution = resolveSource(parsed.ref, { ledger, index });
  if (!resolution.ok) {
    return unverifiable(resolution.detail);
  }

  const matchedValue = matchedValueFor(claim.unit, resolution.value);
  if (matchedValue === null) {
    return unverifiable(`Source "${claim.source}" has no ${claim.unit === 'COUNT' ? 'count' : 'amount'}`);
  }

  const delta = matchedValue - assertedValue;
  return {
    result: {
      claimId: claim.claimId,
      verdict: Math.abs(delta) <= toleranceUsed.allowed ? 'verified' : 'mismatch',
      unit: claim.unit,
      assertedValue,
      matchedValue,
      delta,
      toleranceUsed,
      evidence: {
        source: claim.source,
        bucketKey: resolution.value.bucketKey,
        recordIds: resolution.value.recordIds,
        documentIds: resolution.value.documentIds,
      },
      reason: null,
    },
    gap: null,
  };
}

/**
 * Verify every claim against the ledger. Results keep the claims' order.
 */
export function verifyClaims(
  claims: readonly Claim[],
  ledger: CanonicalLedger,
  options: VerifyOptions = {}
): VerificationRun {
  const index = indexFromLedger(ledger, options.groupingRules);

  const results: VerificationResult[] = [];
  const gaps: ClaimResolutionGap[] = [];
  for (const claim of claims) {
    const { result, gap } = verifyClaim(claim, ledger, index);
    results.push(result);
    if (gap !== null) gaps.push(gap);
  }

  return {
    report: {
      schemaVersion: REPORT_SCHEMA_VERSION,
      results,
      summary: {
        total: results.length,
        verified: results.filter((r) => r.verdict === 'verified').length,
        mismatch: results.filter((r) => r.verdict === 'mismatch').length,
        unverifiable: results.filter((r) => r.verdict === 'unverifiable').length,
      },
    },
    gaps,
  };
}
