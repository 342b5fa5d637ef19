import { describe, it, expect, vi } from 'vitest';
import { InMemoryPageTextSource, type PageTextSource } from '@warrant-ledger/page-text';
import { mapWithConcurrency, processBatch, type BatchDocument } from '@warrant-ledger/register-parser';
import { AcquisitionError, type DocumentDescriptor, type RawLine } from '@warrant-ledger/types';
import { JULY_REGISTER, testTables } from '../helpers/fixtures.js';
import { rowLines } from '../helpers/lines.js';

/**
 * Yields part of its lines, then fails, for the first `failures` reads.
 */
class FlakySource implements PageTextSource {
  readonly documentId: string;
  reads = 0;

  constructor(
    documentId: string,
    private readonly data: readonly RawLine[],
    private readonly failures: number
  ) {
    this.documentId = documentId;
  }

  async *lines(): AsyncIterable<RawLine> {
    this.reads++;
    for (const [index, line] of this.data.entries()) {
      if (this.reads <= this.failures && index === 1) {
        throw new AcquisitionError(this.documentId, 'OCR engine busy');
      }
      yield line;
    }
  }
}

class BrokenSource implements PageTextSource {
  constructor(readonly documentId: string) {}

  async *lines(): AsyncIterable<RawLine> {
    throw new AcquisitionError(this.documentId, 'Scan unreadable', {
      retryable: false,
      cause: new Error('bad header'),
    });
  }
}

function descriptor(documentId: string): DocumentDescriptor {
  return { ...JULY_REGISTER, documentId };
}

function registerLines(payee: string, amount: string): RawLine[] {
  return [
    ...rowLines(1, 40, [
      ['07/15/2024', 120],
      [payee, 200],
      [amount, 480],
    ]),
    ...rowLines(1, 60, [
      ['07/16/2024', 120],
      ['ZUM SERVICES', 200],
      ['20.00', 480],
    ]),
  ];
}

const FAST = { maxRetries: 3, retryDelayMs: 0 };

describe('processBatch', () => {
  it('should process every document in input order', async () => {
    const documents: BatchDocument[] = [
      { descriptor: descriptor('reg-a'), source: new InMemoryPageTextSource('reg-a', registerLines('ACME', '10.00')) },
      { descriptor: descriptor('reg-b'), source: new InMemoryPageTextSource('reg-b', registerLines('BAYSIDE', '30.00')) },
    ];

    const result = await processBatch(documents, { referenceTables: testTables(), concurrency: 2, ...FAST });

    expect(result.documents.map((d) => d.descriptor.documentId)).toEqual(['reg-a', 'reg-b']);
    expect(result.summary).toEqual({
      totalDocuments: 2,
      documentsSucceeded: 2,
      documentsFailed: 0,
      totalRecords: 4,
      totalUnparsed: 0,
      totalRejected: 0,
    });
  });

  it('should retry a transient acquisition failure without duplicating lines', async () => {
    const source = new FlakySource('reg-a', registerLines('ACME', '10.00'), 2);
    const onRetry = vi.fn();

    const result = await processBatch([{ descriptor: descriptor('reg-a'), source }], {
      referenceTables: testTables(),
      onRetry,
      ...FAST,
    });

    expect(source.reads).toBe(3);
    expect(onRetry).toHaveBeenCalledTimes(2);
    expect(onRetry.mock.calls[0]?.[0]).toBe('reg-a');
    expect(result.documents[0]?.lineCount).toBe(6);
    expect(result.documents[0]?.records).toHaveLength(2);
  });

  it('should drop a failed document and let its siblings complete', async () => {
    const onDocumentError = vi.fn();
    const onProgress = vi.fn();
    const documents: BatchDocument[] = [
      { descriptor: descriptor('reg-bad'), source: new BrokenSource('reg-bad') },
      { descriptor: descriptor('reg-ok'), source: new InMemoryPageTextSource('reg-ok', registerLines('ACME', '10.00')) },
    ];

    const result = await processBatch(documents, {
      referenceTables: testTables(),
      onDocumentError,
      onProgress,
      ...FAST,
    });

    expect(result.documents.map((d) => d.descriptor.documentId)).toEqual(['reg-ok']);
    expect(result.documentErrors).toHaveLength(1);
    expect(result.documentErrors[0]).toMatchObject({
      kind: 'document-error',
      documentId: 'reg-bad',
      stage: 'acquisition',
      error: 'Scan unreadable: bad header',
      attempts: 1,
    });
    expect(onDocumentError).toHaveBeenCalledTimes(1);
    expect(onProgress).toHaveBeenCalledTimes(2);
    expect(onProgress).toHaveBeenLastCalledWith(2, 2, expect.any(String));
  });

  it('should give up after the configured retries', async () => {
    const source = new FlakySource('reg-a', registerLines('ACME', '10.00'), 10);

    const result = await processBatch([{ descriptor: descriptor('reg-a'), source }], {
      referenceTables: testTables(),
      maxRetries: 2,
      retryDelayMs: 0,
    });

    expect(source.reads).toBe(3);
    expect(result.documentErrors[0]).toMatchObject({ stage: 'acquisition', attempts: 3, error: 'OCR engine busy' });
  });

  it('should report an invalid warrant pattern as a processing error', async () => {
    const result = await processBatch(
      [{ descriptor: descriptor('reg-a'), source: new InMemoryPageTextSource('reg-a', registerLines('ACME', '10.00')) }],
      { referenceTables: testTables(), options: { warrantPattern: '[' }, ...FAST }
    );

    expect(result.documentErrors[0]).toMatchObject({ documentId: 'reg-a', stage: 'processing', attempts: 1 });
  });
});

describe('mapWithConcurrency', () => {
  it('should keep input order and cap calls in flight', async () => {
    let inFlight = 0;
    let peak = 0;

    const results = await mapWithConcurrency([30, 5, 20, 1, 10], 2, async (delay, index) => {
      inFlight++;
      peak = Math.max(peak, inFlight);
      await new Promise((resolve) => setTimeout(resolve, delay));
      inFlight--;
      return index * 10;
    });

    expect(results).toEqual([0, 10, 20, 30, 40]);
    expect(peak).toBe(2);
  });

  it('should handle an empty list', async () => {
    await expect(mapWithConcurrency([], 4, async () => 1)).resolves.toEqual([]);
  });
});
