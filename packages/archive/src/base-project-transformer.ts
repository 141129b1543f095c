/**
 * Base class for project transformers
 *
 * A transformer handles one container format: it knows which files it can
 * open and how to feed their text units through the rewrite engine.
 */

import { extname } from 'node:path';
import { wrapError } from '@schemashift/core';
import type { RewriteReport, RewriteDiagnostic, TagClassConfig, TransformationResult } from '@schemashift/core';
import { RewriteEngine, type MappingTable } from '@schemashift/rewrite-core';

export interface TransformOptions {
  /** Once aborted, the transformer stops before writing any output */
  signal?: AbortSignal;
}

export interface IProjectTransformer {
  /** Display name used in logs and reports */
  readonly name: string;

  /** Whether this transformer understands the file */
  canHandle(filePath: string): boolean;

  /**
   * Rewrite `inputPath` into `outputPath`. Failures are reported in the
   * result, never thrown.
   */
  transform(
    inputPath: string,
    outputPath: string,
    table: MappingTable,
    options?: TransformOptions
  ): Promise<TransformationResult>;
}

export interface ProjectTransformerOptions {
  /** Tag names per tag class for the metadata document */
  tagClasses?: Partial<TagClassConfig>;
}

export abstract class BaseProjectTransformer implements IProjectTransformer {
  abstract readonly name: string;
  /** Lower-case file extensions, including the dot */
  protected abstract readonly extensions: readonly string[];
  protected readonly engine: RewriteEngine;

  constructor(options: ProjectTransformerOptions = {}) {
    this.engine = new RewriteEngine({ tagClasses: options.tagClasses });
  }

  canHandle(filePath: string): boolean {
    return this.extensions.includes(extname(filePath).toLowerCase());
  }

  async transform(
    inputPath: string,
    outputPath: string,
    table: MappingTable,
    options: TransformOptions = {}
  ): Promise<TransformationResult> {
    try {
      options.signal?.throwIfAborted();
      return await this.transformFile(inputPath, outputPath, table, options);
    } catch (error) {
      return this.failure(inputPath, wrapError(error, inputPath).message);
    }
  }

  protected success(
    inputPath: string,
    outputPath: string,
    report: RewriteReport,
    warnings: string[],
    rewrites: RewriteDiagnostic[]
  ): TransformationResult {
    return {
      success: true,
      inputPath,
      outputPath,
      transformer: this.name,
      transformationsApplied: report.totalMatches,
      warnings,
      report,
      rewrites,
    };
  }

  protected failure(inputPath: string, error: string, warnings: string[] = []): TransformationResult {
    return {
      success: false,
      inputPath,
      transformer: this.name,
      transformationsApplied: 0,
      error,
      warnings,
    };
  }

  /**
   * Perform the transformation (implemented by subclasses). May throw; the
   * base class turns errors into failed results. Implementations check
   * `options.signal` before writing output.
   */
  protected abstract transformFile(
    inputPath: string,
    outputPath: string,
    table: MappingTable,
    options: TransformOptions
  ): Promise<TransformationResult>;
}
