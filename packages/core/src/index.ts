/**
 * @schemashift/core
 *
 * Shared types, errors and validation schemas for schemashift
 */

// Types
export * from './types/index.js';

// Errors
export * from './errors/index.js';

// Validation schemas
export * from './validation/index.js';

// Utilities
export * from './utils/index.js';
