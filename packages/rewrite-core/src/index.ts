/**
 * @schemashift/rewrite-core
 *
 * Schema and table name rewriting for SQL text and tagged metadata
 * documents.
 */

// Mapping rules
export { MappingRule, MappingTable } from './mapping/index.js';

// Reference matching and SQL rewriting
export {
  REFERENCE_SYNTAXES,
  matchReferences,
  parseDottedReference,
  formatReference,
  transformSql,
} from './matching/index.js';
export type { ReferenceSyntax, ReferenceMatch, SqlRewriteResult } from './matching/index.js';

// Tagged fields
export {
  StructuredFieldRewriter,
  rewriteTag,
  DEFAULT_TAG_CLASSES,
  TAG_CLASS_ORDER,
  resolveTagClasses,
} from './fields/index.js';
export type { FieldRewriteResult } from './fields/index.js';

// Engine
import { RewriteEngine as _RewriteEngine } from './engine/index.js';
export { RewriteEngine } from './engine/index.js';
export type {
  TextUnit,
  RewriteInput,
  RewrittenLog,
  RewriteOutput,
  RewriteEngineOptions,
} from './engine/index.js';

// Formatters
export { formatRewriteReport, formatBatchReport } from './formatters/index.js';

/**
 * Factory function to create a RewriteEngine with the default tag layout
 */
export function createRewriteEngine(): _RewriteEngine {
  return new _RewriteEngine();
}
