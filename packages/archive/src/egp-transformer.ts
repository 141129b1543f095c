/**
 * EGP Transformer
 *
 * Rewrites SAS Enterprise Guide project archives: project.xml through the
 * structured-field rewriter and every .log entry through the SQL rewriter,
 * then repacks the archive.
 */

import type { MappingTable } from '@schemashift/rewrite-core';
import { wrapError } from '@schemashift/core';
import type { TransformationResult } from '@schemashift/core';
import { readArchive, writeArchive, type ArchiveEntries } from './archive.js';
import { decodeDocument, decodeLog, encodeDocument, encodeLog, type DecodedDocument } from './encoding.js';
import { BaseProjectTransformer, type TransformOptions } from './base-project-transformer.js';

export const PROJECT_DOCUMENT = 'project.xml';

function findDocument(entries: ArchiveEntries): string | undefined {
  return Array.from(entries.keys()).find((name) => name.toLowerCase() === PROJECT_DOCUMENT);
}

function isLog(name: string): boolean {
  return name.toLowerCase().endsWith('.log');
}

export class EgpTransformer extends BaseProjectTransformer {
  readonly name = 'egp';
  protected readonly extensions = ['.egp'] as const;

  protected async transformFile(
    inputPath: string,
    outputPath: string,
    table: MappingTable,
    options: TransformOptions
  ): Promise<TransformationResult> {
    const entries = await readArchive(inputPath);
    const warnings: string[] = [];

    const documentName = findDocument(entries);
    const documentBytes = documentName ? entries.get(documentName) : undefined;
    let decoded: DecodedDocument | undefined;

    if (documentBytes) {
      try {
        decoded = decodeDocument(documentBytes);
      } catch (error) {
        // Logs are independent of the document, so keep going.
        warnings.push(`${documentName ?? PROJECT_DOCUMENT}: ${wrapError(error).message}; left unchanged`);
      }
    } else {
      warnings.push(`${PROJECT_DOCUMENT} not found in archive`);
    }

    const logNames = Array.from(entries.keys()).filter(isLog);
    const output = this.engine.rewrite(
      {
        document: decoded?.text,
        documentDecodeFailed: documentBytes !== undefined && decoded === undefined,
        logs: logNames.map((name) => ({ name, text: decodeLog(entries.get(name) ?? new Uint8Array()) })),
      },
      table
    );

    const rewritten: ArchiveEntries = new Map(entries);
    if (documentName && decoded && output.document !== undefined && output.report.document.matches > 0) {
      rewritten.set(documentName, encodeDocument(output.document, decoded));
    }
    for (const log of output.logs) {
      if (log.changed) {
        rewritten.set(log.name, encodeLog(log.text));
      }
    }

    options.signal?.throwIfAborted();
    await writeArchive(rewritten, outputPath);

    return this.success(inputPath, outputPath, output.report, warnings, output.rewrites);
  }
}

/**
 * Factory function to create an EgpTransformer
 */
export function createEgpTransformer(
  options?: ConstructorParameters<typeof EgpTransformer>[0]
): EgpTransformer {
  return new EgpTransformer(options);
}
