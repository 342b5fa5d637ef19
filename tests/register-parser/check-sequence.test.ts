import { describe, it, expect } from 'vitest';
import { detectCheckGaps } from '@warrant-ledger/register-parser';

describe('detectCheckGaps', () => {
  it('should list short runs of missing numbers per series', () => {
    const gaps = detectCheckGaps([
      '0200000001',
      '0200000004',
      '0200000100',
      'DDP-00000012',
      'DDP-00000010',
      null,
      '1200000001',
    ]);

    expect(gaps).toEqual([
      { prefix: '020', previous: '0200000001', next: '0200000004', missing: ['0200000002', '0200000003'] },
      { prefix: 'DDP', previous: 'DDP-00000010', next: 'DDP-00000012', missing: ['DDP-00000011'] },
    ]);
  });

  it('should ignore repeated numbers and unknown formats', () => {
    expect(detectCheckGaps(['0200000001', '0200000001', '0200000002', 'CHK12345'])).toEqual([]);
  });
});
