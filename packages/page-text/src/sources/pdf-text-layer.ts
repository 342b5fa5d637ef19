/**
 * Text-layer adapter using pdfjs-dist.
 *
 * Registers exported straight from the finance system carry a text layer, so
 * no OCR is needed: each pdfjs text item becomes one RawLine with confidence 1.
 * pdfjs reports baselines with a bottom-left origin; y is flipped against the
 * page viewport so rows read top to bottom like OCR output.
 */
import { readFile } from 'fs/promises';
import { AcquisitionError, type RawLine } from '@warrant-ledger/types';
import type { PageTextSource } from '../types.js';

// Resolved at run time so pdfjs is only loaded for PDF sources
const PDFJS_MODULE = 'pdfjs-dist/legacy/build/pdf.mjs';

interface PdfjsTextItemLike {
  str: string;
  transform: number[];
  width?: number;
  height?: number;
}

interface PdfjsPage {
  getViewport(params: { scale: number }): { width: number; height: number };
  getTextContent(): Promise<{ items: unknown[] }>;
}

interface PdfjsDocument {
  numPages: number;
  getPage(pageNumber: number): Promise<PdfjsPage>;
  destroy(): Promise<void>;
}

interface PdfjsModule {
  getDocument(src: { data: Uint8Array; useSystemFonts?: boolean; isEvalSupported?: boolean }): {
    promise: Promise<PdfjsDocument>;
  };
}

function isPdfjsModule(mod: unknown): mod is PdfjsModule {
  return typeof mod === 'object' && mod !== null && 'getDocument' in mod && typeof mod.getDocument === 'function';
}

/**
 * Type guard to check if an item is a text item (not marked content).
 */
function isTextItem(item: unknown): item is PdfjsTextItemLike {
  return (
    typeof item === 'object' &&
    item !== null &&
    'str' in item &&
    typeof item.str === 'string' &&
    'transform' in item &&
    Array.isArray(item.transform)
  );
}

async function loadPdfjs(): Promise<PdfjsModule> {
  const mod: unknown = await import(PDFJS_MODULE);
  if (!isPdfjsModule(mod)) {
    throw new Error(`${PDFJS_MODULE} does not export getDocument`);
  }
  return mod;
}

/**
 * Convert the text items of one page into RawLines.
 */
export function textItemsToRawLines(items: unknown[], pageIndex: number, pageHeight: number): RawLine[] {
  const lines: RawLine[] = [];

  for (const item of items) {
    if (!isTextItem(item)) continue;

    const text = item.str.trim();
    if (text.length === 0) continue;

    // transform: [scaleX, skewX, skewY, scaleY, translateX, translateY]
    const transform = item.transform;
    const x = Number(transform[4]) || 0;
    const baseline = Number(transform[5]) || 0;
    const width = Number(item.width) || Math.abs(Number(transform[0]) || 1) * text.length * 0.6;
    const height = Number(item.height) || Math.abs(Number(transform[3]) || 12);

    lines.push({
      pageIndex,
      lineIndex: lines.length,
      text,
      bbox: { x, y: pageHeight - baseline - height, width, height },
      confidence: 1,
    });
  }

  return lines;
}

export class PdfTextLayerSource implements PageTextSource {
  readonly documentId: string;
  private readonly path: string;

  constructor(documentId: string, path: string) {
    this.documentId = documentId;
    this.path = path;
  }

  async *lines(): AsyncIterable<RawLine> {
    let data: Uint8Array;
    try {
      data = new Uint8Array(await readFile(this.path));
    } catch (error) {
      throw new AcquisitionError(this.documentId, `Unable to read ${this.path}`, { cause: error });
    }

    let pdfDocument: PdfjsDocument;
    try {
      const pdfjs = await loadPdfjs();
      pdfDocument = await pdfjs.getDocument({ data, useSystemFonts: true, isEvalSupported: false }).promise;
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      throw new AcquisitionError(this.documentId, `Unable to open ${this.path}: ${message}`, {
        retryable: false,
        cause: error,
      });
    }

    try {
      for (let pageNum = 1; pageNum <= pdfDocument.numPages; pageNum++) {
        const page = await pdfDocument.getPage(pageNum);
        const viewport = page.getViewport({ scale: 1 });
        const textContent = await page.getTextContent();
        yield* textItemsToRawLines(textContent.items, pageNum, viewport.height);
      }
    } finally {
      await pdfDocument.destroy();
    }
  }
}
