/**
 * MappingRule
 *
 * A single source to target name translation, optionally scoped to one
 * table.
 */

import { mappingRuleSchema, sameName } from '@schemashift/core';
import type { MappingRuleConfig, QualifiedName } from '@schemashift/core';

export class MappingRule {
  readonly sourceSchema: string;
  readonly targetSchema: string;
  readonly sourceTable?: string;
  readonly targetTable?: string;

  constructor(config: MappingRuleConfig) {
    const parsed = mappingRuleSchema.parse(config);
    this.sourceSchema = parsed.source_schema;
    this.targetSchema = parsed.target_schema;
    this.sourceTable = parsed.source_table;
    this.targetTable = parsed.target_table;
    Object.freeze(this);
  }

  /** True when the rule covers every table of its schema */
  get schemaWide(): boolean {
    return this.sourceTable === undefined;
  }

  /**
   * Case-insensitive match on schema, and on table for table-scoped rules
   */
  matches(schema: string, table: string): boolean {
    if (!this.matchesSchema(schema)) {
      return false;
    }
    return this.sourceTable === undefined || sameName(this.sourceTable, table);
  }

  /**
   * Schema-only comparison that ignores any table scope
   */
  matchesSchema(schema: string): boolean {
    return sameName(this.sourceSchema, schema);
  }

  /**
   * Replacement for a matched name. The table keeps its original spelling
   * unless the rule names a target table.
   */
  resolve(_schema: string, table: string): QualifiedName {
    return {
      schema: this.targetSchema,
      table: this.targetTable ?? table,
    };
  }

  toConfig(): MappingRuleConfig {
    return {
      source_schema: this.sourceSchema,
      target_schema: this.targetSchema,
      source_table: this.sourceTable ?? null,
      target_table: this.targetTable ?? null,
    };
  }

  toString(): string {
    const source = `${this.sourceSchema}.${this.sourceTable ?? '*'}`;
    const target = `${this.targetSchema}.${this.targetTable ?? '*'}`;
    return `${source} -> ${target}`;
  }
}
