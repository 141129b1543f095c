export { SchemashiftError, wrapError } from './schemashift-error.js';
export type { ErrorCode, SchemashiftErrorDetails } from './schemashift-error.js';
