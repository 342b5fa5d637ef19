export { reconcileRecords } from './reconcile.js';
export { mergeExactDuplicates, type ExactMergeResult } from './exact.js';
export { scorePair, dateDistance, type PairScore, type ScoreOptions } from './scoring.js';
export { compareCanonical, compareProvenance, mergeInto } from './canonical.js';
export type { DuplicateOccurrence, FuzzyMatch, ReconcileOptions, ReconcileResult } from './types.js';
