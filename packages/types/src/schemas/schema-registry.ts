import Ajv from 'ajv';
import ajvFormats from 'ajv-formats';
import { readFileSync } from 'fs';
import { resolve, dirname } from 'path';
import { fileURLToPath } from 'url';

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

export type OutputKind = 'ledger' | 'verification-report';

export const AVAILABLE_OUTPUT_KINDS: readonly OutputKind[] = ['ledger', 'verification-report'] as const;

const SCHEMA_FILES: Readonly<Record<OutputKind, string>> = {
  ledger: 'ledger.v1.schema.json',
  'verification-report': 'verification-report.v1.schema.json',
};

const schemaCache = new Map<OutputKind, object>();

interface AjvErrorObject {
  instancePath: string;
  message?: string;
  keyword: string;
}

interface AjvValidateFunction {
  (data: unknown): boolean;
  errors?: AjvErrorObject[] | null;
}

interface AjvInstance {
  compile: (schema: object) => AjvValidateFunction;
}

type AjvConstructor = new (opts: object) => AjvInstance;
type FormatsPlugin = (ajv: AjvInstance) => unknown;

// ajv and ajv-formats are CommonJS; under ESM the callable may sit on `.default`
function interopDefault<T>(mod: unknown): T {
  const candidate =
    typeof mod === 'object' && mod !== null && 'default' in mod ? mod.default : mod;
  return candidate as T;
}

const AjvClass = interopDefault<AjvConstructor>(Ajv);
const addFormats = interopDefault<FormatsPlugin>(ajvFormats);

/**
 * Get the file path for an output schema
 */
export function getSchemaPath(kind: OutputKind): string {
  const schemaDir = resolve(__dirname, '../../schemas');
  return resolve(schemaDir, SCHEMA_FILES[kind]);
}

/**
 * Load and return the JSON schema for an output kind
 */
export function getSchema(kind: OutputKind): object {
  assertValidOutputKind(kind);

  const cached = schemaCache.get(kind);
  if (cached !== undefined) {
    return cached;
  }

  const schemaContent = readFileSync(getSchemaPath(kind), 'utf-8');
  const schema: unknown = JSON.parse(schemaContent);
  if (typeof schema !== 'object' || schema === null) {
    throw new Error(`Schema file for ${kind} does not hold a JSON object`);
  }
  schemaCache.set(kind, schema);
  return schema;
}

export function isValidOutputKind(kind: string): kind is OutputKind {
  return AVAILABLE_OUTPUT_KINDS.some((available) => available === kind);
}

export function assertValidOutputKind(kind: string): asserts kind is OutputKind {
  if (!isValidOutputKind(kind)) {
    throw new Error(
      `Invalid output kind: "${kind}". Available kinds: ${AVAILABLE_OUTPUT_KINDS.join(', ')}`
    );
  }
}

export interface ValidationResult {
  valid: boolean;
  errors: ValidationError[];
}

export interface ValidationError {
  path: string;
  message: string;
  keyword: string;
}

const validatorCache = new Map<OutputKind, AjvValidateFunction>();

function getValidator(kind: OutputKind): AjvValidateFunction {
  const cached = validatorCache.get(kind);
  if (cached !== undefined) {
    return cached;
  }

  const ajv = new AjvClass({
    allErrors: true,
    strict: false,
    validateFormats: true,
  });
  addFormats(ajv);

  const validate = ajv.compile(getSchema(kind));
  validatorCache.set(kind, validate);
  return validate;
}

/**
 * Validate an output payload against its JSON schema
 */
export function validateOutput(kind: OutputKind, payload: unknown): ValidationResult {
  assertValidOutputKind(kind);

  const validate = getValidator(kind);
  if (validate(payload)) {
    return { valid: true, errors: [] };
  }

  const errors: ValidationError[] = (validate.errors ?? []).map((err) => ({
    path: err.instancePath || '/',
    message: err.message ?? 'Unknown validation error',
    keyword: err.keyword,
  }));

  return { valid: false, errors };
}

/**
 * Validate output and throw an error if invalid
 */
export function validateOutputOrThrow(kind: OutputKind, payload: unknown): void {
  const result = validateOutput(kind, payload);
  if (!result.valid) {
    throw new Error(`Schema validation failed for ${kind}:\n${formatValidationErrors(result.errors)}`);
  }
}

export function formatValidationErrors(errors: ValidationError[]): string {
  return errors.map((e) => `  ${e.path}: ${e.message} (${e.keyword})`).join('\n');
}
