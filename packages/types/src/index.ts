// Zod schemas and inferred types
export * from './schemas/index.js';

// Failure taxonomy
export * from './errors.js';

// Pure utils (date, money, payee, id, constants)
export * from './utils/index.js';
