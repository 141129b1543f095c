/**
 * MappingTable
 *
 * Ordered, read-only collection of mapping rules. Resolution is a linear
 * first-match scan in declaration order; overlapping rules are legal and
 * the earlier one wins.
 */

import { sameName } from '@schemashift/core';
import type { MappingFile, MappingRuleConfig, MappingWarning } from '@schemashift/core';
import { MappingRule } from './mapping-rule.js';

export class MappingTable implements Iterable<MappingRule> {
  private readonly rules: readonly MappingRule[];

  constructor(rules: Iterable<MappingRule>) {
    this.rules = Object.freeze(Array.from(rules));
  }

  static empty(): MappingTable {
    return new MappingTable([]);
  }

  /**
   * Build a table from persisted records. Throws on the first invalid
   * record; use the archive package's mapping store for best-effort loading.
   */
  static fromConfig(records: MappingRuleConfig[]): MappingTable {
    return new MappingTable(records.map((record) => new MappingRule(record)));
  }

  get size(): number {
    return this.rules.length;
  }

  get isEmpty(): boolean {
    return this.rules.length === 0;
  }

  [Symbol.iterator](): Iterator<MappingRule> {
    return this.rules[Symbol.iterator]();
  }

  /** Rule at a declaration position */
  at(index: number): MappingRule | undefined {
    return this.rules[index];
  }

  /**
   * First rule whose scope covers (schema, table)
   */
  findFirst(schema: string, table: string): MappingRule | undefined {
    return this.rules.find((rule) => rule.matches(schema, table));
  }

  /**
   * First rule for a schema, regardless of any table scope
   */
  findFirstBySchema(schema: string): MappingRule | undefined {
    return this.rules.find((rule) => rule.matchesSchema(schema));
  }

  /**
   * Flag rules that can never fire because an earlier rule covers the same
   * scope. These are warnings; resolution still works by order.
   */
  findDuplicates(): MappingWarning[] {
    const warnings: MappingWarning[] = [];

    this.rules.forEach((rule, index) => {
      const earlier = this.rules.slice(0, index).findIndex((candidate) => {
        if (!sameName(candidate.sourceSchema, rule.sourceSchema)) return false;
        if (candidate.schemaWide) return true;
        return rule.sourceTable !== undefined && sameName(candidate.sourceTable ?? '', rule.sourceTable);
      });

      if (earlier === -1) return;

      const winner = this.rules[earlier];
      const kind = winner?.schemaWide && !rule.schemaWide ? 'shadowed' : 'duplicate';
      warnings.push({
        kind,
        index,
        shadowedBy: earlier,
        message:
          kind === 'shadowed'
            ? `Rule #${index + 1} (${rule.toString()}) is shadowed by schema-wide rule #${earlier + 1} (${String(winner)})`
            : `Rule #${index + 1} (${rule.toString()}) repeats the scope of rule #${earlier + 1} (${String(winner)})`,
      });
    });

    return warnings;
  }

  toConfig(): MappingFile {
    return { mappings: this.rules.map((rule) => rule.toConfig()) };
  }
}
