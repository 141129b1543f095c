/**
 * RewriteEngine
 *
 * Pure text-in/text-out orchestration: the metadata document goes through
 * the structured-field rewriter, every auxiliary log through the SQL
 * rewriter. No file or archive I/O happens here.
 */

import type {
  DocumentStats,
  LogStats,
  RewriteDiagnostic,
  RewriteReport,
  TagClassConfig,
} from '@schemashift/core';
import type { MappingTable } from '../mapping/index.js';
import { transformSql } from '../matching/index.js';
import { StructuredFieldRewriter } from '../fields/index.js';

/** A named auxiliary text, such as a log file inside a project archive */
export interface TextUnit {
  name: string;
  text: string;
}

export interface RewriteInput {
  /** Decoded metadata document; omit when absent or undecodable */
  document?: string;
  /** Set when the document exists but could not be decoded */
  documentDecodeFailed?: boolean;
  logs?: readonly TextUnit[];
}

export interface RewrittenLog extends TextUnit {
  changed: boolean;
}

interface LogPass extends RewrittenLog {
  stats: LogStats;
  rewrites: RewriteDiagnostic[];
}

export interface RewriteOutput {
  document?: string;
  rewrites: RewriteDiagnostic[];
  logs: RewrittenLog[];
  report: RewriteReport;
}

export interface RewriteEngineOptions {
  /** Tag names per tag class (defaults to the Enterprise Guide layout) */
  tagClasses?: Partial<TagClassConfig>;
}

export class RewriteEngine {
  private readonly fieldRewriter: StructuredFieldRewriter;

  constructor(options: RewriteEngineOptions = {}) {
    this.fieldRewriter = new StructuredFieldRewriter(options.tagClasses);
  }

  get tagClasses(): TagClassConfig {
    return this.fieldRewriter.tagClasses;
  }

  /**
   * Rewrite a document and its logs. The table is only read, so one table
   * can serve concurrent calls.
   */
  rewrite(input: RewriteInput, table: MappingTable): RewriteOutput {
    const documentResult =
      input.document === undefined ? undefined : this.fieldRewriter.rewrite(input.document, table);

    const documentStats: DocumentStats = documentResult
      ? { status: 'processed', matches: documentResult.matchCount, tags: documentResult.tags }
      : {
          status: input.documentDecodeFailed ? 'decode_failed' : 'absent',
          matches: 0,
          tags: [],
        };

    const logs = (input.logs ?? []).map((log): LogPass => {
      const result = transformSql(log.text, table);
      return {
        name: log.name,
        text: result.text,
        changed: result.matchCount > 0,
        rewrites: result.rewrites.map(({ from, to }) => ({ location: log.name, from, to })),
        stats: { name: log.name, scanned: result.scanned, matches: result.matchCount },
      };
    });

    const logMatches = logs.reduce((sum, log) => sum + log.stats.matches, 0);

    return {
      document: documentResult?.text,
      rewrites: [...(documentResult?.rewrites ?? []), ...logs.flatMap((log) => log.rewrites)],
      logs: logs.map(({ name, text, changed }) => ({ name, text, changed })),
      report: {
        success: true,
        totalMatches: documentStats.matches + logMatches,
        document: documentStats,
        logs: logs.map((log) => log.stats),
        logMatches,
      },
    };
  }
}
