import { existsSync, mkdirSync, mkdtempSync, readdirSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { basename, join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import type { TransformationResult } from '@schemashift/core';
import type { IProjectTransformer } from '@schemashift/archive';
import { MappingTable } from '@schemashift/rewrite-core';
import {
  Logger,
  TransformerRegistry,
  createDefaultRegistry,
  discoverInputs,
  runBatch,
  summarizeBatch,
} from '../src/index.js';
import { captureStream, writeProject } from './helpers.js';

const table = MappingTable.fromConfig([
  { source_schema: 'WORK', target_schema: 'bronze', source_table: 'ORDERS', target_table: 'orders' },
]);

const quietLogger = (): Logger => new Logger({ level: 'error', stream: captureStream().stream });

/**
 * Transformer for `.fake` files that reports how many run at once. It
 * ignores abort signals and always writes its output.
 */
class TrackingTransformer implements IProjectTransformer {
  readonly name = 'fake';
  active = 0;
  peak = 0;

  constructor(private readonly work: () => Promise<void>) {}

  canHandle(filePath: string): boolean {
    return filePath.endsWith('.fake');
  }

  async transform(inputPath: string, outputPath: string): Promise<TransformationResult> {
    this.active++;
    this.peak = Math.max(this.peak, this.active);
    try {
      await this.work();
    } finally {
      this.active--;
    }
    writeFileSync(outputPath, 'done');
    return { success: true, inputPath, outputPath, transformationsApplied: 1, warnings: [] };
  }
}

describe('runBatch', () => {
  let dir: string;
  let inputDir: string;
  let outputDir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'schemashift-batch-'));
    inputDir = join(dir, 'input');
    outputDir = join(dir, 'output');
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('refuses an empty mapping table before touching any directory', async () => {
    await expect(
      runBatch({
        inputDir,
        outputDir,
        table: MappingTable.empty(),
        registry: createDefaultRegistry(),
        logger: quietLogger(),
      })
    ).rejects.toMatchObject({ code: 'EMPTY_MAPPING' });

    expect(existsSync(inputDir)).toBe(false);
    expect(existsSync(outputDir)).toBe(false);
  });

  it('creates a missing input directory and processes nothing', async () => {
    const report = await runBatch({
      inputDir,
      outputDir,
      table,
      registry: createDefaultRegistry(),
      logger: quietLogger(),
    });

    expect(existsSync(inputDir)).toBe(true);
    expect(report).toEqual({ results: [], succeeded: 0, failed: 0, totalTransformations: 0, inputCreated: true });
  });

  it('keeps going after a file fails', async () => {
    mkdirSync(inputDir);
    await writeProject(join(inputDir, 'a.egp'), 'WORK.ORDERS', 'set WORK.ORDERS;');
    writeFileSync(join(inputDir, 'b.egp'), 'not a zip');
    await writeProject(join(inputDir, 'c.egp'), 'SALES.ORDERS');
    writeFileSync(join(inputDir, 'notes.txt'), 'WORK.ORDERS');

    const report = await runBatch({
      inputDir,
      outputDir,
      table,
      registry: createDefaultRegistry(),
      logger: quietLogger(),
    });

    expect(report.results.map((r) => [basename(r.inputPath), r.success])).toEqual([
      ['a.egp', true],
      ['b.egp', false],
      ['c.egp', true],
    ]);
    expect(report.succeeded).toBe(2);
    expect(report.failed).toBe(1);
    expect(report.totalTransformations).toBe(2);
    expect(report.inputCreated).toBe(false);
    expect(existsSync(join(outputDir, 'a.egp'))).toBe(true);
    expect(existsSync(join(outputDir, 'b.egp'))).toBe(false);
    expect(existsSync(join(outputDir, 'notes.txt'))).toBe(false);
  });

  it('bounds the number of files in flight', async () => {
    mkdirSync(inputDir);
    for (const name of ['1.fake', '2.fake', '3.fake', '4.fake', '5.fake']) {
      writeFileSync(join(inputDir, name), '');
    }
    const transformer = new TrackingTransformer(() => new Promise((resolve) => setTimeout(resolve, 10)));
    const registry = new TransformerRegistry();
    registry.register(transformer);

    const report = await runBatch({
      inputDir,
      outputDir,
      table,
      registry,
      concurrency: 2,
      logger: quietLogger(),
    });

    expect(report.succeeded).toBe(5);
    expect(transformer.peak).toBe(2);
  });

  it('fails files that exceed the timeout without leaving output or freeing their slot early', async () => {
    mkdirSync(inputDir);
    for (const name of ['1.fake', '2.fake', '3.fake']) {
      writeFileSync(join(inputDir, name), '');
    }
    const transformer = new TrackingTransformer(() => new Promise((resolve) => setTimeout(resolve, 50)));
    const registry = new TransformerRegistry();
    registry.register(transformer);

    const report = await runBatch({
      inputDir,
      outputDir,
      table,
      registry,
      concurrency: 1,
      timeoutMs: 10,
      logger: quietLogger(),
    });

    expect(report.failed).toBe(3);
    expect(report.results.map((r) => r.error)).toEqual([
      'Timed out after 10ms',
      'Timed out after 10ms',
      'Timed out after 10ms',
    ]);
    expect(transformer.peak).toBe(1);
    expect(readdirSync(outputDir)).toEqual([]);
  });

  it('keeps the output of files that finish in time', async () => {
    mkdirSync(inputDir);
    writeFileSync(join(inputDir, 'quick.fake'), '');
    const registry = new TransformerRegistry();
    registry.register(new TrackingTransformer(async () => undefined));

    const report = await runBatch({ inputDir, outputDir, table, registry, timeoutMs: 1000, logger: quietLogger() });

    expect(report.succeeded).toBe(1);
    expect(readdirSync(outputDir)).toEqual(['quick.fake']);
  });

  it('logs warnings and failures per file', async () => {
    mkdirSync(inputDir);
    writeFileSync(join(inputDir, 'broken.egp'), 'not a zip');
    const output = captureStream();

    await runBatch({
      inputDir,
      outputDir,
      table,
      registry: createDefaultRegistry(),
      logger: new Logger({ level: 'error', format: 'json', stream: output.stream }),
    });

    const records: unknown[] = output
      .text()
      .trim()
      .split('\n')
      .map((line) => JSON.parse(line));
    expect(records).toHaveLength(1);
    expect(records[0]).toMatchObject({ level: 'error', msg: 'Transformation failed', file: 'broken.egp' });
  });
});

describe('discoverInputs', () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'schemashift-discover-'));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('lists supported files sorted by name, skipping directories', async () => {
    writeFileSync(join(dir, 'b.EGP'), '');
    writeFileSync(join(dir, 'a.egp'), '');
    writeFileSync(join(dir, 'readme.md'), '');
    mkdirSync(join(dir, 'nested.egp'));

    expect(await discoverInputs(dir, createDefaultRegistry())).toEqual([join(dir, 'a.egp'), join(dir, 'b.EGP')]);
  });
});

describe('summarizeBatch', () => {
  it('counts only successful replacements', () => {
    const report = summarizeBatch([
      { success: true, inputPath: 'a', transformationsApplied: 2, warnings: [] },
      { success: false, inputPath: 'b', transformationsApplied: 0, error: 'x', warnings: [] },
    ]);

    expect(report).toEqual({
      results: expect.any(Array),
      succeeded: 1,
      failed: 1,
      totalTransformations: 2,
      inputCreated: false,
    });
  });
});
