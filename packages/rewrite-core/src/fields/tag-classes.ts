/**
 * Tag class configuration
 *
 * Which XML elements of project.xml carry which kind of content.
 */

import type { TagClass, TagClassConfig } from '@schemashift/core';

/** Tag layout of Enterprise Guide project.xml documents */
export const DEFAULT_TAG_CLASSES: Readonly<TagClassConfig> = Object.freeze({
  // Task code and free text blocks hold complete SAS/SQL programs
  sql: ['TaskCode', 'Text'],
  // e.g. <Label>WORK.QUERY_FOR_ORDERS</Label>
  reference: ['Label', 'InputTableName'],
  // e.g. <LibraryName>WORK</LibraryName>
  schema: ['LibraryName'],
});

/** Processing order of the tag classes */
export const TAG_CLASS_ORDER: readonly TagClass[] = ['sql', 'reference', 'schema'];

/**
 * Fill in the default tag list for every class the caller left out
 */
export function resolveTagClasses(overrides?: Partial<TagClassConfig>): TagClassConfig {
  return {
    sql: [...(overrides?.sql ?? DEFAULT_TAG_CLASSES.sql)],
    reference: [...(overrides?.reference ?? DEFAULT_TAG_CLASSES.reference)],
    schema: [...(overrides?.schema ?? DEFAULT_TAG_CLASSES.schema)],
  };
}
