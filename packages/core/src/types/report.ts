/**
 * Rewrite report types
 */

/** The three content contracts a tagged field can follow */
export type TagClass = 'sql' | 'reference' | 'schema';

/** Tag names per tag class */
export interface TagClassConfig {
  /** Tags whose content is an SQL fragment */
  sql: string[];
  /** Tags whose content is exactly `schema.table` */
  reference: string[];
  /** Tags whose content is a bare schema name */
  schema: string[];
}

/** Counts for one tag name */
export interface TagStats {
  tag: string;
  tagClass: TagClass;
  /** Tag occurrences found */
  scanned: number;
  /** Occurrences whose content changed */
  transformed: number;
  /** Individual name substitutions inside those occurrences */
  replacements: number;
}

/** One applied substitution, for diagnostics */
export interface ReferenceRewrite {
  from: string;
  to: string;
  bracketed: boolean;
}

/** Where a substitution happened: `<Tag>` in the document, or a log name */
export interface RewriteDiagnostic {
  location: string;
  from: string;
  to: string;
}

/** Counts for one auxiliary log text */
export interface LogStats {
  name: string;
  /** References recognized in the log */
  scanned: number;
  /** References rewritten */
  matches: number;
}

export type DocumentStatus = 'processed' | 'absent' | 'decode_failed';

export interface DocumentStats {
  status: DocumentStatus;
  matches: number;
  tags: TagStats[];
}

/** Summary of one engine run over a document and its logs */
export interface RewriteReport {
  success: boolean;
  totalMatches: number;
  document: DocumentStats;
  logs: LogStats[];
  logMatches: number;
}

/** Outcome of transforming one project file */
export interface TransformationResult {
  success: boolean;
  inputPath: string;
  outputPath?: string;
  /** Name of the transformer that handled the file */
  transformer?: string;
  transformationsApplied: number;
  error?: string;
  warnings: string[];
  report?: RewriteReport;
  rewrites?: RewriteDiagnostic[];
}

/** Outcome of a multi-file run */
export interface BatchReport {
  results: TransformationResult[];
  succeeded: number;
  failed: number;
  totalTransformations: number;
  /** Set when the input directory did not exist and was created */
  inputCreated: boolean;
}
