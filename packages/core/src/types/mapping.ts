/**
 * Mapping record types
 *
 * The persisted shape of a schema mapping file. Field names follow the
 * on-disk JSON format, which is shared with existing mapping files.
 */

/** Single source to target rule as stored on disk */
export interface MappingRuleConfig {
  /** Schema (library) name to match, case-insensitive */
  source_schema: string;
  /** Replacement schema name */
  target_schema: string;
  /** Restrict the rule to one table; absent means every table in the schema */
  source_table?: string | null;
  /** Replacement table name; absent keeps the original table name */
  target_table?: string | null;
}

/** Complete mapping file */
export interface MappingFile {
  mappings: MappingRuleConfig[];
}

/** A schema-qualified name */
export interface QualifiedName {
  schema: string;
  table: string;
}

export type MappingWarningKind = 'duplicate' | 'shadowed' | 'invalid_entry';

/** Non-fatal finding about a mapping table or mapping file */
export interface MappingWarning {
  kind: MappingWarningKind;
  /** Position of the offending rule or entry */
  index: number;
  message: string;
  /** Position of the earlier rule that wins, when there is one */
  shadowedBy?: number;
}
