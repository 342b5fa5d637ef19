import { z } from 'zod';

export const ISODateSchema = z.string().regex(/^\d{4}-\d{2}-\d{2}$/, 'Date must be in YYYY-MM-DD format');

// ─── Page text ───────────────────────────────────────────────────────────────

export const BoundingBoxSchema = z.object({
  x: z.number(),
  y: z.number(),
  width: z.number().nonnegative(),
  height: z.number().nonnegative(),
});
export type BoundingBox = z.infer<typeof BoundingBoxSchema>;

export const RawLineSchema = z.object({
  pageIndex: z.number().int().positive(),
  lineIndex: z.number().int().nonnegative(),
  text: z.string(),
  bbox: BoundingBoxSchema,
  confidence: z.number().min(0).max(1),
});
export type RawLine = z.infer<typeof RawLineSchema>;

// ─── Documents ───────────────────────────────────────────────────────────────

export const DocumentTypeSchema = z.enum(['register', 'summary']);
export type DocumentType = z.infer<typeof DocumentTypeSchema>;

export const ReportingPeriodSchema = z.object({
  start: ISODateSchema,
  end: ISODateSchema,
});
export type ReportingPeriod = z.infer<typeof ReportingPeriodSchema>;

export const DocumentDescriptorSchema = z.object({
  documentId: z.string().min(1),
  documentType: DocumentTypeSchema,
  fiscalYear: z.number().int(),
  period: ReportingPeriodSchema,
  /** Control total printed on the cover letter, in major units */
  statedTotal: z.number().optional(),
  /** Net item count printed on the cover letter */
  statedCount: z.number().int().nonnegative().optional(),
});
export type DocumentDescriptor = z.infer<typeof DocumentDescriptorSchema>;

export const DocumentSourceSchema = z.discriminatedUnion('kind', [
  z.object({ kind: z.literal('pdf'), path: z.string().min(1) }),
  z.object({ kind: z.literal('tesseract-tsv'), paths: z.array(z.string().min(1)).min(1) }),
  z.object({ kind: z.literal('json-lines'), path: z.string().min(1) }),
]);
export type DocumentSource = z.infer<typeof DocumentSourceSchema>;

export const ManifestDocumentSchema = DocumentDescriptorSchema.extend({
  source: DocumentSourceSchema,
});
export type ManifestDocument = z.infer<typeof ManifestDocumentSchema>;

export const BatchManifestSchema = z
  .object({
    documents: z.array(ManifestDocumentSchema).min(1),
    referenceTables: z
      .object({
        accountCodes: z.string().min(1),
        fiscalCalendar: z.string().min(1).optional(),
      })
      .optional(),
  })
  .superRefine((manifest, ctx) => {
    const seen = new Set<string>();
    manifest.documents.forEach((document, index) => {
      if (seen.has(document.documentId)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['documents', index, 'documentId'],
          message: `Duplicate documentId "${document.documentId}"`,
        });
      }
      seen.add(document.documentId);
    });
  });
export type BatchManifest = z.infer<typeof BatchManifestSchema>;

// ─── Reference tables ────────────────────────────────────────────────────────

export const AccountCodeEntrySchema = z.object({
  description: z.string().optional(),
  category: z.string().min(1),
});
export type AccountCodeEntry = z.infer<typeof AccountCodeEntrySchema>;

export const AccountCodeTableSchema = z.object({
  pattern: z.string().min(1).default('^\\d{2}-\\d{4}$'),
  codes: z.record(AccountCodeEntrySchema),
});
export type AccountCodeTable = z.infer<typeof AccountCodeTableSchema>;

export const FiscalCalendarSchema = z.object({
  startMonth: z.number().int().min(1).max(12),
  startDay: z.number().int().min(1).max(31),
});

// ─── Canonical records ───────────────────────────────────────────────────────

export const ProvenanceConfidenceSchema = z.enum(['high', 'medium', 'low']);
export type ProvenanceConfidence = z.infer<typeof ProvenanceConfidenceSchema>;

export const DatePrecisionSchema = z.enum(['exact', 'period']);
export type DatePrecision = z.infer<typeof DatePrecisionSchema>;

export const AccountCodeStatusSchema = z.enum(['known', 'unknown', 'absent']);
export type AccountCodeStatus = z.infer<typeof AccountCodeStatusSchema>;

export const RecordFlagSchema = z.enum([
  'period-date',
  'unknown-account-code',
  'payee-continuation',
  'degraded-layout',
  'void',
  'duplicate-in-document',
  'fuzzy-merged',
  'split-expense',
]);
export type RecordFlag = z.infer<typeof RecordFlagSchema>;

export const ProvenanceEntrySchema = z.object({
  documentId: z.string().min(1),
  pageIndex: z.number().int().positive(),
  rowIndex: z.number().int().nonnegative(),
  rowText: z.string(),
  ocrConfidence: z.number().min(0).max(1),
});
export type ProvenanceEntry = z.infer<typeof ProvenanceEntrySchema>;

export const TransactionRecordSchema = z.object({
  recordId: z.string().regex(/^rec_[a-f0-9]{24}$/),
  sourceDocumentId: z.string().min(1),
  sourceDocumentIds: z.array(z.string().min(1)).min(1),
  fiscalYear: z.number().int(),
  transactionDate: ISODateSchema,
  datePrecision: DatePrecisionSchema,
  payeeName: z.string().min(1),
  payeeNormalized: z.string().min(1),
  amountMinor: z.number().int(),
  warrantNumber: z.string().nullable(),
  accountCode: z.string().nullable(),
  accountCodeStatus: AccountCodeStatusSchema,
  category: z.string().min(1),
  provenanceConfidence: ProvenanceConfidenceSchema,
  provenance: z.array(ProvenanceEntrySchema).min(1),
  mergedRecordIds: z.array(z.string()),
  flags: z.array(RecordFlagSchema),
});
export type TransactionRecord = z.infer<typeof TransactionRecordSchema>;

// ─── Aggregation ─────────────────────────────────────────────────────────────

export const DimensionSchema = z.enum([
  'payee',
  'category',
  'accountCode',
  'fiscalYear',
  'fiscalMonth',
  'document',
]);
export type Dimension = z.infer<typeof DimensionSchema>;

export const GroupingRuleSchema = z.object({
  name: z.string().min(1),
  dimensions: z.array(DimensionSchema).min(1),
});
export type GroupingRule = z.infer<typeof GroupingRuleSchema>;

export const AggregateBucketSchema = z.object({
  key: z.string().min(1),
  rule: z.string().min(1),
  dimensions: z.record(z.string()),
  totalMinor: z.number().int(),
  recordCount: z.number().int().nonnegative(),
  recordIds: z.array(z.string()),
  minDate: ISODateSchema,
  maxDate: ISODateSchema,
  lowConfidenceTotalMinor: z.number().int(),
  lowConfidenceCount: z.number().int().nonnegative(),
  lowConfidenceRecordIds: z.array(z.string()),
});
export type AggregateBucket = z.infer<typeof AggregateBucketSchema>;

// ─── Ledger ──────────────────────────────────────────────────────────────────

export const LedgerDocumentSchema = z.object({
  documentId: z.string().min(1),
  documentType: DocumentTypeSchema,
  fiscalYear: z.number().int(),
  period: ReportingPeriodSchema,
  status: z.enum(['processed', 'failed']),
  statedTotalMinor: z.number().int().nullable(),
  statedCount: z.number().int().nullable(),
  recordCount: z.number().int().nonnegative(),
});
export type LedgerDocument = z.infer<typeof LedgerDocumentSchema>;

export const CanonicalLedgerSchema = z.object({
  schemaVersion: z.string(),
  pipelineVersion: z.string(),
  documents: z.array(LedgerDocumentSchema),
  records: z.array(TransactionRecordSchema),
  buckets: z.array(AggregateBucketSchema),
});
export type CanonicalLedger = z.infer<typeof CanonicalLedgerSchema>;
