import { readFile } from 'fs/promises';
import { z } from 'zod';
import { AcquisitionError, RawLineSchema, type RawLine } from '@warrant-ledger/types';
import type { PageTextSource } from '../types.js';

const RawLineListSchema = z.array(RawLineSchema);

/**
 * Reads a JSON array of RawLine objects, as written by an upstream OCR step.
 *
 * Read failures are retryable; a file that does not match the RawLine shape
 * is not.
 */
export class JsonLinesSource implements PageTextSource {
  readonly documentId: string;
  private readonly path: string;

  constructor(documentId: string, path: string) {
    this.documentId = documentId;
    this.path = path;
  }

  async *lines(): AsyncIterable<RawLine> {
    let content: string;
    try {
      content = await readFile(this.path, 'utf-8');
    } catch (error) {
      throw new AcquisitionError(this.documentId, `Unable to read ${this.path}`, { cause: error });
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(content);
    } catch (error) {
      throw new AcquisitionError(this.documentId, `Invalid JSON in ${this.path}`, {
        retryable: false,
        cause: error,
      });
    }

    const result = RawLineListSchema.safeParse(parsed);
    if (!result.success) {
      const issue = result.error.issues[0];
      const where = issue !== undefined ? ` at /${issue.path.join('/')}: ${issue.message}` : '';
      throw new AcquisitionError(this.documentId, `Malformed line data in ${this.path}${where}`, {
        retryable: false,
      });
    }

    yield* result.data;
  }
}
