import { describe, expect, it } from 'vitest';
import {
  SchemashiftError,
  escapeRegExp,
  execAll,
  mappingFileEnvelopeSchema,
  mappingRuleSchema,
  sameName,
  tagClassConfigSchema,
  wrapError,
} from '../src/index.js';

describe('mappingRuleSchema', () => {
  it('treats null and empty optional fields as absent', () => {
    const parsed = mappingRuleSchema.parse({
      source_schema: 'WORK',
      target_schema: 'bronze',
      source_table: null,
      target_table: '',
    });

    expect(parsed).toEqual({
      source_schema: 'WORK',
      target_schema: 'bronze',
      source_table: undefined,
      target_table: undefined,
    });
  });

  it('rejects entries without a target schema', () => {
    const result = mappingRuleSchema.safeParse({ source_schema: 'WORK' });
    expect(result.success).toBe(false);
  });

  it('rejects blank schema names', () => {
    const result = mappingRuleSchema.safeParse({ source_schema: '  ', target_schema: 'bronze' });
    expect(result.success).toBe(false);
  });

  it('defaults a missing mappings array to empty', () => {
    expect(mappingFileEnvelopeSchema.parse({})).toEqual({ mappings: [] });
  });
});

describe('tagClassConfigSchema', () => {
  it('accepts plain element names', () => {
    expect(tagClassConfigSchema.safeParse({ sql: ['TaskCode', 'Code_Block'] }).success).toBe(true);
  });

  it('rejects names that are not XML element names', () => {
    expect(tagClassConfigSchema.safeParse({ schema: ['<LibraryName>'] }).success).toBe(false);
    expect(tagClassConfigSchema.safeParse({ unknown: ['X'] }).success).toBe(false);
  });
});

describe('SchemashiftError', () => {
  it('formats an actionable message', () => {
    const error = new SchemashiftError({
      code: 'DECODE_FAILED',
      message: 'Document is not valid utf-8',
      filePath: 'in/report.egp',
      suggestion: 'Re-save the project.',
    });

    expect(error.toActionableMessage()).toBe(
      'Error [DECODE_FAILED]: Document is not valid utf-8\nFile: in/report.egp\nSuggested action: Re-save the project.'
    );
    expect(error.toJSON()).toMatchObject({ name: 'SchemashiftError', code: 'DECODE_FAILED' });
  });

  it('wraps unknown errors and passes SchemashiftError through', () => {
    const original = new SchemashiftError({ code: 'TIMEOUT', message: 'slow' });
    expect(wrapError(original)).toBe(original);

    const wrapped = wrapError(new Error('disk full'), 'out.egp', 'ARCHIVE_WRITE_FAILED');
    expect(wrapped.code).toBe('ARCHIVE_WRITE_FAILED');
    expect(wrapped.message).toBe('disk full');
    expect(wrapped.filePath).toBe('out.egp');

    expect(wrapError('boom').message).toBe('boom');
  });
});

describe('regex utilities', () => {
  it('escapes regex metacharacters', () => {
    expect(escapeRegExp('a.b[c]')).toBe('a\\.b\\[c\\]');
  });

  it('collects all matches with offsets', () => {
    const matches = execAll('(\\w)=(\\d)', '', 'a=1, b=2');
    expect(matches.map((m) => [m.index, m[1], m[2]])).toEqual([
      [0, 'a', '1'],
      [5, 'b', '2'],
    ]);
  });

  it('compares names case-insensitively', () => {
    expect(sameName('Work', 'WORK')).toBe(true);
    expect(sameName('WORK', 'WORK1')).toBe(false);
  });
});
