/**
 * Batch driver
 *
 * Transforms every supported file of an input directory into an output
 * directory. One file failing never stops the others.
 */

import { mkdir, readdir, rm } from 'node:fs/promises';
import { basename, join } from 'node:path';
import { SchemashiftError, wrapError } from '@schemashift/core';
import type { BatchReport, TransformationResult } from '@schemashift/core';
import type { IProjectTransformer } from '@schemashift/archive';
import type { MappingTable } from '@schemashift/rewrite-core';
import { Logger } from './logger.js';
import { Semaphore } from './semaphore.js';
import { withTimeout } from './timeout.js';
import type { TransformerRegistry } from './transformer-registry.js';

export interface BatchOptions {
  inputDir: string;
  outputDir: string;
  table: MappingTable;
  registry: TransformerRegistry;
  /** Files transformed at the same time (default: 1) */
  concurrency?: number;
  /** Per-file limit; an overdue file fails and leaves no output */
  timeoutMs?: number;
  logger?: Logger;
}

function isMissing(error: unknown): boolean {
  return (error as NodeJS.ErrnoException).code === 'ENOENT';
}

/**
 * Files directly inside `inputDir` that some transformer handles, sorted
 * by name
 */
export async function discoverInputs(
  inputDir: string,
  registry: TransformerRegistry
): Promise<string[]> {
  const entries = await readdir(inputDir, { withFileTypes: true });
  return entries
    .filter((entry) => entry.isFile())
    .map((entry) => entry.name)
    .sort()
    .map((name) => join(inputDir, name))
    .filter((filePath) => registry.resolve(filePath) !== undefined);
}

export function summarizeBatch(
  results: TransformationResult[],
  inputCreated = false
): BatchReport {
  const succeeded = results.filter((r) => r.success);
  return {
    results,
    succeeded: succeeded.length,
    failed: results.length - succeeded.length,
    totalTransformations: succeeded.reduce((sum, r) => sum + r.transformationsApplied, 0),
    inputCreated,
  };
}

/**
 * Run one transformer under the per-file timeout. A timed-out transformer
 * is aborted and still awaited, so the caller keeps its concurrency slot
 * until the work has settled; output it wrote anyway is removed.
 */
async function runTransformer(
  transformer: IProjectTransformer,
  inputPath: string,
  outputPath: string,
  options: BatchOptions,
  fileLogger: Logger
): Promise<TransformationResult> {
  const controller = new AbortController();
  const work = transformer.transform(inputPath, outputPath, options.table, {
    signal: controller.signal,
  });

  try {
    return await withTimeout(
      work,
      options.timeoutMs,
      () =>
        new SchemashiftError({
          code: 'TIMEOUT',
          message: `Timed out after ${options.timeoutMs}ms`,
          filePath: inputPath,
        })
    );
  } catch (error) {
    if (error instanceof SchemashiftError && error.code === 'TIMEOUT') {
      controller.abort(error);
      await work.then(
        () => undefined,
        (lateError: unknown) => fileLogger.debug('Abandoned transformation failed', { error: lateError })
      );
      await rm(outputPath, { force: true });
    }
    throw error;
  }
}

async function transformOne(
  inputPath: string,
  options: BatchOptions,
  logger: Logger
): Promise<TransformationResult> {
  const outputPath = join(options.outputDir, basename(inputPath));
  const fileLogger = logger.child({ file: basename(inputPath) });

  let result: TransformationResult;
  try {
    const transformer = options.registry.resolveOrThrow(inputPath);
    fileLogger.info('Transforming', { transformer: transformer.name });
    result = await runTransformer(transformer, inputPath, outputPath, options, fileLogger);
  } catch (error) {
    result = {
      success: false,
      inputPath,
      transformationsApplied: 0,
      error: wrapError(error, inputPath).message,
      warnings: [],
    };
  }

  for (const warning of result.warnings) {
    fileLogger.warn(warning);
  }
  for (const rewrite of result.rewrites ?? []) {
    fileLogger.debug('Rewrote reference', { ...rewrite });
  }

  if (result.success) {
    fileLogger.info('Transformed', {
      output: result.outputPath,
      replacements: result.transformationsApplied,
    });
  } else {
    fileLogger.error('Transformation failed', { error: result.error });
  }

  return result;
}

/**
 * Run the whole batch. Refuses to start with an empty mapping table.
 */
export async function runBatch(options: BatchOptions): Promise<BatchReport> {
  const logger = options.logger ?? new Logger();

  if (options.table.isEmpty) {
    throw new SchemashiftError({
      code: 'EMPTY_MAPPING',
      message: 'No mapping rules loaded',
      suggestion: 'Check the mapping file; every entry needs source_schema and target_schema.',
    });
  }

  let inputs: string[];
  try {
    inputs = await discoverInputs(options.inputDir, options.registry);
  } catch (error) {
    if (!isMissing(error)) {
      throw wrapError(error, options.inputDir, 'INPUT_NOT_FOUND');
    }
    await mkdir(options.inputDir, { recursive: true });
    logger.info('Created input directory; add project files and run again', {
      inputDir: options.inputDir,
    });
    return summarizeBatch([], true);
  }

  await mkdir(options.outputDir, { recursive: true });

  if (inputs.length === 0) {
    logger.warn('No supported project files found', {
      inputDir: options.inputDir,
      transformers: options.registry.listNames(),
    });
    return summarizeBatch([]);
  }

  logger.info(`Found ${inputs.length} project files`, { rules: options.table.size });

  const semaphore = new Semaphore(options.concurrency ?? 1);
  const results = await Promise.all(
    inputs.map((inputPath) => semaphore.run(() => transformOne(inputPath, options, logger)))
  );

  return summarizeBatch(results);
}
