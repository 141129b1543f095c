/**
 * Zod schemas for mapping files and tag configuration
 */

import { z } from 'zod';

const nameSchema = z.string().trim().min(1);

/** Optional name; `null` and empty strings mean absent */
const optionalNameSchema = z
  .string()
  .trim()
  .nullable()
  .optional()
  .transform((value) => (value ? value : undefined));

/** Single mapping entry */
export const mappingRuleSchema = z.object({
  source_schema: nameSchema,
  target_schema: nameSchema,
  source_table: optionalNameSchema,
  target_table: optionalNameSchema,
});

/**
 * Mapping file envelope. Entries are validated one by one so a malformed
 * entry can be skipped without rejecting the whole file.
 */
export const mappingFileEnvelopeSchema = z.object({
  mappings: z.array(z.unknown()).default([]),
});

/** XML element name usable as a tag class member */
export const tagNameSchema = z
  .string()
  .regex(/^[A-Za-z_][A-Za-z0-9_.-]*$/, 'Must be a plain XML element name');

export const tagClassConfigSchema = z
  .object({
    sql: z.array(tagNameSchema).optional(),
    reference: z.array(tagNameSchema).optional(),
    schema: z.array(tagNameSchema).optional(),
  })
  .strict();

export type MappingRuleInput = z.infer<typeof mappingRuleSchema>;
export type TagClassConfigInput = z.infer<typeof tagClassConfigSchema>;

export function formatZodIssues(label: string, err: z.ZodError): string {
  const issues = err.issues
    .map((issue) => {
      const path = issue.path.length ? issue.path.join('.') : '(root)';
      return `- ${path}: ${issue.message}`;
    })
    .join('\n');
  return `${label}:\n${issues}`;
}
