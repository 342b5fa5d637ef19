// Types
export type {
  ReferenceTables,
  Token,
  TokenizedRow,
  ExtractorResult,
  ExtractedDate,
  ExtractedAccountCode,
  SkipReason,
  FieldConfidence,
  ExpenseLine,
  CandidateRecord,
  SkippedRow,
  ParseOutcome,
  ValidationOutcome,
  PageSubtotal,
  CheckPrefix,
  CheckSequenceGap,
  DocumentResult,
  ProcessingOptions,
  DocumentContext,
  BatchResult,
} from './types.js';

// Reference tables
export { createReferenceTables, loadReferenceTables, resolveCategory } from './reference-tables.js';

// Extraction
export * from './extractors/index.js';
export { classifyRow, isSummarySectionMarker, soleAmount, type PageTally } from './row-classifier.js';
export { LineItemParser, type LineItemParserOptions } from './line-item-parser.js';

// Validation
export { validateCandidate, deriveProvenanceConfidence, type ValidatorOptions } from './validator.js';

// Processing
export { detectCheckGaps } from './check-sequence.js';
export { processDocument, type DocumentInput } from './document-processor.js';
export { mapWithConcurrency } from './concurrency.js';
export { processBatch, type BatchDocument, type BatchProcessOptions } from './batch-processor.js';
