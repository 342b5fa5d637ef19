import type { RawLine } from '@warrant-ledger/types';
import type { PageTextSource } from '../types.js';

/**
 * Array-backed source for programmatic use and tests.
 */
export class InMemoryPageTextSource implements PageTextSource {
  readonly documentId: string;
  private readonly data: readonly RawLine[];

  constructor(documentId: string, lines: readonly RawLine[]) {
    this.documentId = documentId;
    this.data = lines;
  }

  async *lines(): AsyncIterable<RawLine> {
    for (const line of this.data) {
      yield { ...line, bbox: { ...line.bbox } };
    }
  }
}
