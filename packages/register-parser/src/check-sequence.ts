/**
 * Check-sequence gap detection.
 *
 * Checks are numbered sequentially per series. A short run of missing numbers
 * between two observed ones usually means rows OCR dropped; long jumps are a
 * new series or a new date range and are not reported.
 */
import type { CheckPrefix, CheckSequenceGap } from './types.js';

const MAX_REPORTED_GAP = 20;

const PREFIX_ORDER: readonly CheckPrefix[] = ['020', '120', 'DDP'];

function parseCheckNumber(value: string): { prefix: CheckPrefix; number: number } | null {
  if (/^(020|120)\d{7}$/.test(value)) {
    const prefix = value.startsWith('020') ? '020' : '120';
    return { prefix, number: Number(value) };
  }
  const ddp = /^DDP-(\d{8})$/.exec(value);
  if (ddp !== null) {
    return { prefix: 'DDP', number: Number(ddp[1]) };
  }
  return null;
}

function formatCheckNumber(prefix: CheckPrefix, value: number): string {
  return prefix === 'DDP' ? `DDP-${String(value).padStart(8, '0')}` : String(value).padStart(10, '0');
}

export function detectCheckGaps(warrantNumbers: ReadonlyArray<string | null>): CheckSequenceGap[] {
  const groups = new Map<CheckPrefix, Set<number>>();
  for (const value of warrantNumbers) {
    if (value === null) continue;
    const parsed = parseCheckNumber(value);
    if (parsed === null) continue;
    const group = groups.get(parsed.prefix) ?? new Set<number>();
    group.add(parsed.number);
    groups.set(parsed.prefix, group);
  }

  const gaps: CheckSequenceGap[] = [];
  for (const prefix of PREFIX_ORDER) {
    const numbers = [...(groups.get(prefix) ?? [])].sort((a, b) => a - b);

    for (let i = 0; i < numbers.length - 1; i++) {
      const current = numbers[i];
      const next = numbers[i + 1];
      if (current === undefined || next === undefined) continue;

      const gap = next - current;
      if (gap <= 1 || gap > MAX_REPORTED_GAP) continue;

      const missing: string[] = [];
      for (let n = current + 1; n < next; n++) {
        missing.push(formatCheckNumber(prefix, n));
      }
      gaps.push({
        prefix,
        previous: formatCheckNumber(prefix, current),
        next: formatCheckNumber(prefix, next),
        missing,
      });
    }
  }

  return gaps;
}
