// Types
export type {
  PageTextSource,
  PhysicalRow,
  Column,
  CandidateRow,
  PageLayout,
  SegmenterOptions,
} from './types.js';

// Sources
export {
  InMemoryPageTextSource,
  JsonLinesSource,
  PdfTextLayerSource,
  TesseractTsvSource,
  createPageTextSource,
  parseTesseractTsv,
  textItemsToRawLines,
  type TesseractTsvOptions,
} from './sources/index.js';

// Retry
export { withRetry, isRetryableError, calculateDelay, type RetryOptions } from './retry.js';

// Layout
export { groupRows, lineCenterY, joinLineText } from './layout/rows.js';
export {
  inferColumns,
  singleColumn,
  getColumnForX,
  occupiedColumns,
  type ColumnInferenceOptions,
} from './layout/columns.js';
export {
  AMOUNT_TOKEN_PATTERN,
  HEADER_KEYWORDS,
  FOOTER_PATTERNS,
  hasAmountShape,
  hasDateShape,
  countHeaderKeywords,
  isHeaderText,
  isFooterText,
  looksLikeHeaderOrFooter,
} from './layout/shapes.js';
export { segmentPage, segmentLines, segmentDocument, collectLines } from './layout/segmenter.js';
