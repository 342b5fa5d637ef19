import { describe, it, expect } from 'vitest';
import { buildCanonicalLedger } from '@warrant-ledger/ledger';
import { verifyClaims } from '@warrant-ledger/verifier';
import {
  AVAILABLE_OUTPUT_KINDS,
  ClaimListSchema,
  assertValidOutputKind,
  getSchema,
  getSchemaPath,
  isValidOutputKind,
  validateOutputOrThrow,
  validateSchemaOutput as validateOutput,
} from '@warrant-ledger/types';
import { JULY_REGISTER } from '../helpers/fixtures.js';
import { makeRecord } from '../helpers/records.js';

function sampleLedger() {
  return buildCanonicalLedger(
    [{ descriptor: { ...JULY_REGISTER, statedTotal: 5 }, status: 'processed', recordCount: 1 }],
    [makeRecord({ documentId: JULY_REGISTER.documentId, payeeName: 'ACME', amountMinor: 500, transactionDate: '2024-07-02' })]
  );
}

describe('schema-registry', () => {
  describe('output kinds', () => {
    it('should list the ledger and the verification report', () => {
      expect(AVAILABLE_OUTPUT_KINDS).toEqual(['ledger', 'verification-report']);
      expect(isValidOutputKind('ledger')).toBe(true);
      expect(isValidOutputKind('report')).toBe(false);
    });

    it('should throw for an unknown kind', () => {
      expect(() => assertValidOutputKind('statement')).toThrow('Invalid output kind: "statement"');
    });
  });

  describe('getSchema', () => {
    it('should load each schema file', () => {
      expect(getSchemaPath('ledger')).toMatch(/ledger\.v1\.schema\.json$/);
      expect(getSchema('ledger')).toHaveProperty('title', 'Canonical Payment Ledger');
      expect(getSchema('verification-report')).toHaveProperty('title', 'Claim Verification Report');
    });

    it('should return the cached object on repeat loads', () => {
      expect(getSchema('ledger')).toBe(getSchema('ledger'));
    });
  });

  describe('validateOutput', () => {
    it('should accept a built ledger', () => {
      expect(validateOutput('ledger', sampleLedger())).toEqual({ valid: true, errors: [] });
    });

    it('should report the path of each violation', () => {
      const ledger = sampleLedger();
      const broken = { ...ledger, schemaVersion: '0.9.0', extra: true };

      const result = validateOutput('ledger', broken);

      expect(result.valid).toBe(false);
      expect(result.errors.map((error) => error.keyword).sort()).toEqual(['additionalProperties', 'const']);
    });

    it('should accept a verification report', () => {
      const claims = ClaimListSchema.parse([{ claimId: 'c1', value: 5, source: 'bucket:payee=ACME' }]);
      const { report } = verifyClaims(claims, sampleLedger());

      expect(report.results[0]?.verdict).toBe('verified');
      expect(validateOutput('verification-report', report).valid).toBe(true);
    });
  });

  describe('validateOutputOrThrow', () => {
    it('should name the kind and the failing path', () => {
      expect(() => validateOutputOrThrow('verification-report', { schemaVersion: '1.0.0', results: [] })).toThrow(
        "Schema validation failed for verification-report:\n  /: must have required property 'summary' (required)"
      );
    });
  });
});
