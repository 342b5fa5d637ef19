import { collectLines, withRetry, type PageTextSource } from '@warrant-ledger/page-text';
import {
  AcquisitionError,
  ReferenceTableError,
  type DocumentDescriptor,
  type DocumentError,
  type RawLine,
} from '@warrant-ledger/types';
import { mapWithConcurrency } from './concurrency.js';
import { processDocument } from './document-processor.js';
import type { BatchResult, DocumentContext, DocumentResult } from './types.js';

export interface BatchDocument {
  descriptor: DocumentDescriptor;
  source: PageTextSource;
}

export interface BatchProcessOptions extends DocumentContext {
  /** Documents processed at once */
  concurrency?: number;
  /** Retries for page text acquisition */
  maxRetries?: number;
  /** First retry delay; doubles per attempt */
  retryDelayMs?: number;
  onProgress?: (completed: number, total: number, documentId: string) => void;
  onDocumentError?: (error: DocumentError) => void;
  onRetry?: (documentId: string, attempt: number, error: Error, delayMs: number) => void;
}

type DocumentOutcome = { ok: true; result: DocumentResult } | { ok: false; error: DocumentError };

/**
 * Processes many documents into per-document results.
 *
 * Documents run concurrently and share nothing. A document whose text cannot
 * be acquired after retries is reported as a document error and dropped; its
 * siblings complete. Only a reference table failure aborts the batch.
 */
export async function processBatch(
  documents: readonly BatchDocument[],
  options: BatchProcessOptions
): Promise<BatchResult> {
  let completed = 0;

  const outcomes = await mapWithConcurrency(
    documents,
    options.concurrency ?? 4,
    async (document): Promise<DocumentOutcome> => {
      const outcome = await processOne(document, options);
      completed++;

      if (!outcome.ok && options.onDocumentError !== undefined) {
        options.onDocumentError(outcome.error);
      }
      if (options.onProgress !== undefined) {
        options.onProgress(completed, documents.length, document.descriptor.documentId);
      }
      return outcome;
    }
  );

  const results: DocumentResult[] = [];
  const documentErrors: DocumentError[] = [];
  for (const outcome of outcomes) {
    if (outcome.ok) {
      results.push(outcome.result);
    } else {
      documentErrors.push(outcome.error);
    }
  }

  return {
    documents: results,
    documentErrors,
    summary: {
      totalDocuments: documents.length,
      documentsSucceeded: results.length,
      documentsFailed: documentErrors.length,
      totalRecords: results.reduce((sum, r) => sum + r.records.length, 0),
      totalUnparsed: results.reduce((sum, r) => sum + r.unparsed.length, 0),
      totalRejected: results.reduce((sum, r) => sum + r.rejected.length, 0),
    },
  };
}

async function processOne(document: BatchDocument, options: BatchProcessOptions): Promise<DocumentOutcome> {
  const documentId = document.descriptor.documentId;
  let attempts = 0;

  let lines: RawLine[];
  try {
    // Lines are materialized per attempt, so a retry never duplicates them
    lines = await withRetry(
      (attempt) => {
        attempts = attempt;
        return collectLines(document.source);
      },
      {
        maxRetries: options.maxRetries ?? 3,
        initialDelayMs: options.retryDelayMs ?? 250,
        onRetry: (attempt, error, delayMs) => options.onRetry?.(documentId, attempt, error, delayMs),
      }
    );
  } catch (error) {
    return { ok: false, error: createDocumentError(documentId, 'acquisition', error, attempts) };
  }

  try {
    return { ok: true, result: processDocument({ descriptor: document.descriptor, lines }, options) };
  } catch (error) {
    if (error instanceof ReferenceTableError) {
      throw error;
    }
    return { ok: false, error: createDocumentError(documentId, 'processing', error, attempts) };
  }
}

/**
 * Creates a structured document error from an exception.
 */
function createDocumentError(
  documentId: string,
  stage: DocumentError['stage'],
  error: unknown,
  attempts: number
): DocumentError {
  const message = error instanceof Error ? error.message : String(error);
  const cause = error instanceof AcquisitionError && error.cause instanceof Error ? `: ${error.cause.message}` : '';
  return {
    kind: 'document-error',
    documentId,
    stage,
    error: `${message}${cause}`,
    attempts,
    timestamp: new Date().toISOString(),
  };
}
