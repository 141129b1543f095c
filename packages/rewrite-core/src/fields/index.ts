export { StructuredFieldRewriter, rewriteTag } from './field-rewriter.js';
export type { FieldRewriteResult } from './field-rewriter.js';
export { DEFAULT_TAG_CLASSES, TAG_CLASS_ORDER, resolveTagClasses } from './tag-classes.js';
