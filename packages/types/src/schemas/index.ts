export * from './ledger.js';
export * from './claims.js';
export * from './config.js';

export {
  getSchemaPath,
  getSchema,
  isValidOutputKind,
  assertValidOutputKind,
  validateOutput as validateSchemaOutput,
  validateOutputOrThrow,
  formatValidationErrors,
  AVAILABLE_OUTPUT_KINDS,
} from './schema-registry.js';

export type {
  OutputKind,
  ValidationResult as SchemaValidationResult,
  ValidationError as SchemaValidationError,
} from './schema-registry.js';
