/**
 * Mapping Store
 *
 * Loads and saves mapping tables as JSON:
 *
 * {
 *   "mappings": [
 *     { "source_schema": "WORK", "target_schema": "bronze",
 *       "source_table": "QUERY_FOR_ORDERS", "target_table": "orders" },
 *     { "source_schema": "WORK", "target_schema": "bronze" }
 *   ]
 * }
 */

import { readFile, writeFile, mkdir } from 'node:fs/promises';
import { dirname } from 'node:path';
import {
  SchemashiftError,
  formatZodIssues,
  mappingFileEnvelopeSchema,
  mappingRuleSchema,
} from '@schemashift/core';
import type { MappingWarning } from '@schemashift/core';
import { MappingRule, MappingTable } from '@schemashift/rewrite-core';

export interface MappingLoadResult {
  table: MappingTable;
  /** Skipped entries; the remaining rules are still loaded */
  warnings: MappingWarning[];
}

/**
 * Parse mapping file content. A malformed entry is skipped with a warning;
 * a malformed envelope fails the whole load.
 */
export function parseMappingFile(content: string, filePath?: string): MappingLoadResult {
  let parsed: unknown;
  try {
    // Handle UTF-8 BOM (common on Windows) to avoid JSON.parse failures.
    parsed = JSON.parse(content.replace(/^\uFEFF/, ''));
  } catch (error) {
    throw new SchemashiftError({
      code: 'MAPPING_LOAD_FAILED',
      message: `Mapping file is not valid JSON: ${(error as Error).message}`,
      filePath,
      cause: error instanceof Error ? error : undefined,
    });
  }

  const envelope = mappingFileEnvelopeSchema.safeParse(parsed);
  if (!envelope.success) {
    throw new SchemashiftError({
      code: 'MAPPING_LOAD_FAILED',
      message: formatZodIssues('Invalid mapping file', envelope.error),
      filePath,
      suggestion: 'The file must be an object with a "mappings" array.',
    });
  }

  const rules: MappingRule[] = [];
  const warnings: MappingWarning[] = [];

  envelope.data.mappings.forEach((entry, index) => {
    const result = mappingRuleSchema.safeParse(entry);
    if (result.success) {
      rules.push(new MappingRule(result.data));
      return;
    }
    warnings.push({
      kind: 'invalid_entry',
      index,
      message: formatZodIssues(`Skipped mapping #${index + 1}`, result.error),
    });
  });

  return { table: new MappingTable(rules), warnings };
}

export async function loadMappingTable(filePath: string): Promise<MappingLoadResult> {
  let content: string;
  try {
    content = await readFile(filePath, 'utf-8');
  } catch (error) {
    const notFound = (error as NodeJS.ErrnoException).code === 'ENOENT';
    throw new SchemashiftError({
      code: 'MAPPING_LOAD_FAILED',
      message: notFound
        ? `Mapping file not found: ${filePath}`
        : `Cannot read mapping file: ${(error as Error).message}`,
      filePath,
      suggestion: notFound ? 'Create the file or pass --mappings <file>.' : undefined,
      cause: error instanceof Error ? error : undefined,
    });
  }

  return parseMappingFile(content, filePath);
}

export function serializeMappingTable(table: MappingTable): string {
  return `${JSON.stringify(table.toConfig(), null, 2)}\n`;
}

export async function saveMappingTable(table: MappingTable, filePath: string): Promise<void> {
  try {
    await mkdir(dirname(filePath), { recursive: true });
    await writeFile(filePath, serializeMappingTable(table), 'utf-8');
  } catch (error) {
    throw new SchemashiftError({
      code: 'MAPPING_SAVE_FAILED',
      message: `Failed to save mapping file: ${(error as Error).message}`,
      filePath,
      cause: error instanceof Error ? error : undefined,
    });
  }
}
