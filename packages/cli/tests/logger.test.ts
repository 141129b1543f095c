import { describe, expect, it } from 'vitest';
import { SchemashiftError } from '@schemashift/core';
import { Logger } from '../src/index.js';
import { captureStream } from './helpers.js';

describe('Logger', () => {
  it('writes text lines with fields', () => {
    const output = captureStream();
    new Logger({ stream: output.stream }).warn('Skipped entry', { index: 2, file: 'map.json' });

    expect(output.text()).toMatch(/^\[\S+\] WARN Skipped entry index=2 file=map\.json\n$/);
  });

  it('filters below the configured level', () => {
    const output = captureStream();
    const logger = new Logger({ level: 'warn', stream: output.stream });

    logger.debug('hidden');
    logger.info('hidden');
    logger.error('shown');

    expect(output.text()).toMatch(/^\[\S+\] ERROR shown\n$/);
  });

  it('writes one JSON object per line and serializes errors', () => {
    const output = captureStream();
    new Logger({ format: 'json', stream: output.stream }).error('Failed', {
      error: new SchemashiftError({ code: 'TIMEOUT', message: 'late' }),
    });

    const record: unknown = JSON.parse(output.text());
    expect(record).toEqual({
      ts: expect.any(String),
      level: 'error',
      msg: 'Failed',
      error: { name: 'SchemashiftError', message: 'late', code: 'TIMEOUT' },
    });
  });

  it('adds child fields to every record', () => {
    const output = captureStream();
    const child = new Logger({ format: 'json', stream: output.stream }).child({ file: 'a.egp' });

    child.info('Transformed', { replacements: 3 });

    expect(JSON.parse(output.text())).toMatchObject({ msg: 'Transformed', file: 'a.egp', replacements: 3 });
  });
});
