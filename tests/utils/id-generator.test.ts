import { describe, it, expect } from 'vitest';
import { computeContentHash, computeRecordId, isValidRecordId, normalizePayee } from '@warrant-ledger/types';

const BASE = {
  fiscalYear: 2025,
  payeeNormalized: 'zum services inc',
  amountMinor: 50000,
  transactionDate: '2024-07-16',
  warrantNumber: '0200012346',
};

describe('id-generator', () => {
  describe('computeRecordId', () => {
    it('should be deterministic and well-formed', () => {
      const id = computeRecordId(BASE);

      expect(computeRecordId({ ...BASE })).toBe(id);
      expect(isValidRecordId(id)).toBe(true);
    });

    it('should ignore case and spacing in the hashed strings', () => {
      expect(computeRecordId({ ...BASE, payeeNormalized: '  ZUM   services INC ' })).toBe(computeRecordId(BASE));
    });

    it('should give payee spellings that normalize alike the same id', () => {
      const a = computeRecordId({ ...BASE, payeeNormalized: normalizePayee('ZUM SERVICES, INC.') });
      const b = computeRecordId({ ...BASE, payeeNormalized: normalizePayee('Zum Services Inc') });
      expect(a).toBe(b);
    });

    it('should change with any content field', () => {
      const id = computeRecordId(BASE);

      expect(computeRecordId({ ...BASE, amountMinor: 50001 })).not.toBe(id);
      expect(computeRecordId({ ...BASE, transactionDate: '2024-07-17' })).not.toBe(id);
      expect(computeRecordId({ ...BASE, fiscalYear: 2024 })).not.toBe(id);
      expect(computeRecordId({ ...BASE, warrantNumber: null })).not.toBe(id);
    });

    it('should treat an empty warrant number as absent', () => {
      expect(computeRecordId({ ...BASE, warrantNumber: '' })).toBe(computeRecordId({ ...BASE, warrantNumber: null }));
    });
  });

  describe('isValidRecordId', () => {
    it('should reject other shapes', () => {
      expect(isValidRecordId('rec_ABC')).toBe(false);
      expect(isValidRecordId('txn_0123456789abcdef01234567')).toBe(false);
    });
  });

  describe('computeContentHash', () => {
    it('should prefix a 16-character hash', () => {
      expect(computeContentHash('x')).toMatch(/^run_[a-f0-9]{16}$/);
      expect(computeContentHash('x', 'aud')).toMatch(/^aud_[a-f0-9]{16}$/);
      expect(computeContentHash('x')).not.toBe(computeContentHash('y'));
    });
  });
});
