/**
 * Tesseract `image_to_data` TSV adapter.
 *
 * One TSV file per page. Word rows (level 5) are joined into RawLines along
 * Tesseract's own line grouping, split wherever the horizontal gap between
 * words is wide enough to be a column break.
 */
import { readFile } from 'fs/promises';
import { AcquisitionError, type RawLine } from '@warrant-ledger/types';
import type { PageTextSource } from '../types.js';

export interface TesseractTsvOptions {
  /** Gap, in average character widths, above which words start a new line */
  wordGapFactor?: number;
}

const DEFAULT_WORD_GAP_FACTOR = 2.5;

interface TsvWord {
  groupKey: string;
  left: number;
  top: number;
  width: number;
  height: number;
  conf: number;
  text: string;
}

const REQUIRED_COLUMNS = [
  'level',
  'block_num',
  'par_num',
  'line_num',
  'left',
  'top',
  'width',
  'height',
  'conf',
  'text',
] as const;

type TsvColumn = (typeof REQUIRED_COLUMNS)[number];

/**
 * Parse one page of Tesseract TSV into RawLines.
 *
 * @throws Error when the header row lacks a required column
 */
export function parseTesseractTsv(
  content: string,
  pageIndex: number,
  options: TesseractTsvOptions = {}
): RawLine[] {
  const wordGapFactor = options.wordGapFactor ?? DEFAULT_WORD_GAP_FACTOR;
  const rows = content.split(/\r?\n/).filter((row) => row.trim() !== '');
  const header = rows[0];
  if (header === undefined) return [];

  const headerCells = header.split('\t');
  const columnIndex = new Map<TsvColumn, number>();
  for (const column of REQUIRED_COLUMNS) {
    const index = headerCells.indexOf(column);
    if (index < 0) {
      throw new Error(`Tesseract TSV is missing the "${column}" column`);
    }
    columnIndex.set(column, index);
  }

  const cell = (cells: string[], column: TsvColumn): string => cells[columnIndex.get(column) ?? -1] ?? '';

  const groups = new Map<string, TsvWord[]>();
  for (const row of rows.slice(1)) {
    const cells = row.split('\t');
    if (cell(cells, 'level') !== '5') continue;

    const text = cell(cells, 'text').trim();
    const conf = Number(cell(cells, 'conf'));
    if (text === '' || !(conf > 0)) continue;

    const word: TsvWord = {
      groupKey: `${cell(cells, 'block_num')}.${cell(cells, 'par_num')}.${cell(cells, 'line_num')}`,
      left: Number(cell(cells, 'left')),
      top: Number(cell(cells, 'top')),
      width: Number(cell(cells, 'width')),
      height: Number(cell(cells, 'height')),
      conf,
      text,
    };
    const group = groups.get(word.groupKey) ?? [];
    group.push(word);
    groups.set(word.groupKey, group);
  }

  const lines: RawLine[] = [];
  for (const words of groups.values()) {
    const sorted = [...words].sort((a, b) => a.left - b.left);
    let current: TsvWord[] = [];

    for (const word of sorted) {
      const prev = current[current.length - 1];
      if (prev !== undefined) {
        const gap = word.left - (prev.left + prev.width);
        const avgCharWidth = prev.width / Math.max(prev.text.length, 1);
        if (gap > avgCharWidth * wordGapFactor) {
          lines.push(toRawLine(current, pageIndex, lines.length));
          current = [];
        }
      }
      current.push(word);
    }
    if (current.length > 0) {
      lines.push(toRawLine(current, pageIndex, lines.length));
    }
  }

  return lines;
}

function toRawLine(words: TsvWord[], pageIndex: number, lineIndex: number): RawLine {
  const left = Math.min(...words.map((w) => w.left));
  const top = Math.min(...words.map((w) => w.top));
  const right = Math.max(...words.map((w) => w.left + w.width));
  const bottom = Math.max(...words.map((w) => w.top + w.height));
  const minConf = Math.min(...words.map((w) => w.conf));

  return {
    pageIndex,
    lineIndex,
    text: words.map((w) => w.text).join(' '),
    bbox: { x: left, y: top, width: right - left, height: bottom - top },
    confidence: Math.min(1, Math.max(0, minConf / 100)),
  };
}

export class TesseractTsvSource implements PageTextSource {
  readonly documentId: string;
  private readonly paths: readonly string[];
  private readonly options: TesseractTsvOptions;

  constructor(documentId: string, paths: readonly string[], options: TesseractTsvOptions = {}) {
    this.documentId = documentId;
    this.paths = paths;
    this.options = options;
  }

  async *lines(): AsyncIterable<RawLine> {
    for (let i = 0; i < this.paths.length; i++) {
      const path = this.paths[i];
      if (path === undefined) continue;

      let content: string;
      try {
        content = await readFile(path, 'utf-8');
      } catch (error) {
        throw new AcquisitionError(this.documentId, `Unable to read OCR output ${path}`, { cause: error });
      }

      try {
        yield* parseTesseractTsv(content, i + 1, this.options);
      } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        throw new AcquisitionError(this.documentId, `${path}: ${message}`, { retryable: false, cause: error });
      }
    }
  }
}
