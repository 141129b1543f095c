export {
  REFERENCE_SYNTAXES,
  matchReferences,
  parseDottedReference,
  formatReference,
} from './reference-matcher.js';
export type { ReferenceSyntax, ReferenceMatch } from './reference-matcher.js';
export { transformSql } from './sql-rewriter.js';
export type { SqlRewriteResult } from './sql-rewriter.js';
