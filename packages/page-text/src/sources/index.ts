import type { DocumentSource } from '@warrant-ledger/types';
import type { PageTextSource } from '../types.js';
import { JsonLinesSource } from './json-lines.js';
import { PdfTextLayerSource } from './pdf-text-layer.js';
import { TesseractTsvSource, type TesseractTsvOptions } from './tesseract-tsv.js';

export { InMemoryPageTextSource } from './in-memory.js';
export { JsonLinesSource } from './json-lines.js';
export { PdfTextLayerSource, textItemsToRawLines } from './pdf-text-layer.js';
export { TesseractTsvSource, parseTesseractTsv, type TesseractTsvOptions } from './tesseract-tsv.js';

/**
 * Build the page text source a manifest entry describes.
 *
 * @param resolvePath - maps manifest-relative paths to absolute ones
 */
export function createPageTextSource(
  documentId: string,
  source: DocumentSource,
  resolvePath: (path: string) => string = (path) => path,
  options: TesseractTsvOptions = {}
): PageTextSource {
  switch (source.kind) {
    case 'pdf':
      return new PdfTextLayerSource(documentId, resolvePath(source.path));
    case 'tesseract-tsv':
      return new TesseractTsvSource(documentId, source.paths.map(resolvePath), options);
    case 'json-lines':
      return new JsonLinesSource(documentId, resolvePath(source.path));
  }
}
