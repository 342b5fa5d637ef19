export { parseSourceRef, type ParsedSourceRef, type SourceRef } from './source-ref.js';
export { resolveSource, type Resolution, type ResolvedSource, type ResolverContext } from './resolver.js';
export {
  verifyClaims,
  verifyClaim,
  indexFromLedger,
  resolveTolerance,
  toResultUnits,
  type VerificationRun,
  type VerifyOptions,
} from './verify.js';
export {
  appendAuditEntry,
  computeRunId,
  createAuditEntry,
  readAuditLog,
  readLastAuditEntry,
  AuditEntrySchema,
  type AuditEntry,
} from './audit-log.js';
export { diffRuns, type ClaimChange, type ComparedField, type RunDiff } from './diff.js';
