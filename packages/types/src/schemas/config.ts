import { z } from 'zod';
import { GroupingRuleSchema } from './ledger.js';

export const PipelineConfigSchema = z.object({
  /** Max vertical distance between line centres on one physical row */
  rowGap: z.number().positive().default(8),
  /** Max horizontal distance between left edges in one column cluster */
  columnTolerance: z.number().positive().default(12),
  /** Share of a page's rows that must hit an x-cluster for it to be a column */
  minColumnSupport: z.number().min(0).max(1).default(0.2),
  /** Days a transaction date may fall outside its fiscal year */
  fiscalToleranceDays: z.number().int().nonnegative().default(0),
  /** Days apart two records may be and still fuzzy-match */
  dateToleranceDays: z.number().int().nonnegative().default(3),
  /** Documents processed at once */
  concurrency: z.number().int().positive().default(4),
  /** Retries for page text acquisition */
  maxRetries: z.number().int().nonnegative().default(3),
  /** Percent difference tolerated between parsed and stated control totals */
  controlTotalThresholdPercent: z.number().nonnegative().default(2),
  /** Extra warrant/check number pattern (regex source) */
  warrantPattern: z.string().min(1).optional(),
  groupingRules: z.array(GroupingRuleSchema).min(1).optional(),
});
export type PipelineConfig = z.infer<typeof PipelineConfigSchema>;
export type PipelineConfigInput = z.input<typeof PipelineConfigSchema>;

export const PipelineConfigFileSchema = PipelineConfigSchema.partial();

type NumericConfigKey =
  | 'rowGap'
  | 'columnTolerance'
  | 'minColumnSupport'
  | 'fiscalToleranceDays'
  | 'dateToleranceDays'
  | 'concurrency'
  | 'maxRetries'
  | 'controlTotalThresholdPercent';

export const CONFIG_ENV_KEYS: Readonly<Record<NumericConfigKey, string>> = {
  rowGap: 'WL_ROW_GAP',
  columnTolerance: 'WL_COLUMN_TOLERANCE',
  minColumnSupport: 'WL_MIN_COLUMN_SUPPORT',
  fiscalToleranceDays: 'WL_FISCAL_TOLERANCE_DAYS',
  dateToleranceDays: 'WL_DATE_TOLERANCE_DAYS',
  concurrency: 'WL_CONCURRENCY',
  maxRetries: 'WL_MAX_RETRIES',
  controlTotalThresholdPercent: 'WL_CONTROL_TOTAL_THRESHOLD',
};

function readEnvConfig(env: Record<string, string | undefined>): Partial<PipelineConfigInput> {
  const result: Partial<PipelineConfigInput> = {};
  for (const [key, envKey] of Object.entries(CONFIG_ENV_KEYS)) {
    const raw = env[envKey];
    if (raw === undefined || raw === '') continue;
    const value = Number(raw);
    if (Number.isNaN(value)) {
      throw new Error(`Invalid value for ${envKey}: "${raw}" is not a number`);
    }
    Object.assign(result, { [key]: value });
  }
  if (env['WL_WARRANT_PATTERN'] !== undefined && env['WL_WARRANT_PATTERN'] !== '') {
    result.warrantPattern = env['WL_WARRANT_PATTERN'];
  }
  return result;
}

function dropUndefined<T extends object>(value: T): Partial<T> {
  const result: Partial<T> = {};
  for (const [key, entry] of Object.entries(value)) {
    if (entry !== undefined) {
      Object.assign(result, { [key]: entry });
    }
  }
  return result;
}

/**
 * Resolve pipeline configuration from multiple sources with precedence:
 * 1. CLI flags
 * 2. Environment variables (WL_*)
 * 3. Config file contents
 * 4. Defaults
 */
export function resolvePipelineConfig(options: {
  cli?: Partial<PipelineConfigInput> | undefined;
  file?: unknown;
  env?: Record<string, string | undefined> | undefined;
} = {}): PipelineConfig {
  const fromFile = options.file === undefined ? {} : PipelineConfigFileSchema.parse(options.file);
  const fromEnv = readEnvConfig(options.env ?? process.env);
  const fromCli = options.cli === undefined ? {} : dropUndefined(options.cli);

  return PipelineConfigSchema.parse({
    ...dropUndefined(fromFile),
    ...fromEnv,
    ...fromCli,
  });
}
