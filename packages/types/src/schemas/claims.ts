import { z } from 'zod';

export const ClaimUnitSchema = z.enum(['USD', 'USD_THOUSANDS', 'USD_MILLIONS', 'COUNT']);
export type ClaimUnit = z.infer<typeof ClaimUnitSchema>;

export const ToleranceSchema = z.union([
  z.object({ absolute: z.number().nonnegative() }).strict(),
  z.object({ percent: z.number().nonnegative() }).strict(),
]);
export type Tolerance = z.infer<typeof ToleranceSchema>;

export const ClaimSchema = z.object({
  claimId: z.string().min(1),
  text: z.string().optional(),
  value: z.number(),
  unit: ClaimUnitSchema.default('USD'),
  /** Cited source reference, e.g. `bucket:payee=Zum Services, Inc.` */
  source: z.string().min(1),
  tolerance: ToleranceSchema.default({ absolute: 0 }),
});
export type Claim = z.infer<typeof ClaimSchema>;
export type ClaimInput = z.input<typeof ClaimSchema>;

export const ClaimListSchema = z.array(ClaimSchema);

export const VerdictSchema = z.enum(['verified', 'mismatch', 'unverifiable']);
export type Verdict = z.infer<typeof VerdictSchema>;

export const ToleranceUsedSchema = z.object({
  kind: z.enum(['absolute', 'percent']),
  /** Tolerance as stated on the claim */
  value: z.number(),
  /** Largest permitted |delta|, in result units (minor units or count) */
  allowed: z.number(),
});
export type ToleranceUsed = z.infer<typeof ToleranceUsedSchema>;

export const EvidenceSchema = z.object({
  source: z.string(),
  bucketKey: z.string().nullable(),
  recordIds: z.array(z.string()),
  documentIds: z.array(z.string()),
});
export type Evidence = z.infer<typeof EvidenceSchema>;

export const VerificationResultSchema = z.object({
  claimId: z.string().min(1),
  verdict: VerdictSchema,
  unit: ClaimUnitSchema,
  /** Asserted value in result units (minor units for money, plain for counts) */
  assertedValue: z.number(),
  matchedValue: z.number().nullable(),
  delta: z.number().nullable(),
  toleranceUsed: ToleranceUsedSchema,
  evidence: EvidenceSchema,
  reason: z.string().nullable(),
});
export type VerificationResult = z.infer<typeof VerificationResultSchema>;

export const VerificationReportSchema = z.object({
  schemaVersion: z.string(),
  results: z.array(VerificationResultSchema),
  summary: z.object({
    total: z.number().int().nonnegative(),
    verified: z.number().int().nonnegative(),
    mismatch: z.number().int().nonnegative(),
    unverifiable: z.number().int().nonnegative(),
  }),
});
export type VerificationReport = z.infer<typeof VerificationReportSchema>;
