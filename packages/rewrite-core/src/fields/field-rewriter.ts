/**
 * Structured-Field Rewriter
 *
 * Rewrites schema/table names inside `<Tag>...</Tag>` regions of a markup
 * document. Each tag class has its own content contract:
 *
 * - sql: arbitrary SQL, handed to the SQL rewriter
 * - reference: exactly `schema.table` once trimmed
 * - schema: a bare schema name once trimmed
 *
 * Content that does not fit its contract, or has no matching rule, is left
 * byte-for-byte unchanged.
 */

import { escapeRegExp, execAll } from '@schemashift/core';
import type { RewriteDiagnostic, TagClass, TagClassConfig, TagStats } from '@schemashift/core';
import type { MappingTable } from '../mapping/index.js';
import { parseDottedReference, transformSql } from '../matching/index.js';
import { TAG_CLASS_ORDER, resolveTagClasses } from './tag-classes.js';

export interface FieldRewriteResult {
  text: string;
  /** Name substitutions across all tags */
  matchCount: number;
  /** Per-tag counts, in processing order */
  tags: TagStats[];
  rewrites: RewriteDiagnostic[];
}

interface ContentRewrite {
  content: string;
  replacements: number;
  rewrites: RewriteDiagnostic[];
}

interface TagOccurrence {
  start: number;
  end: number;
  open: string;
  close: string;
  rewrite?: ContentRewrite;
}

function tagPattern(tag: string, tagClass: TagClass): string {
  const name = escapeRegExp(tag);
  // SQL payloads may be empty or span lines; take the shortest content.
  // Single-value fields carry at least one character and no markup.
  const content = tagClass === 'sql' ? '([\\s\\S]*?)' : '([^<]+)';
  return `(<${name}>)${content}(</${name}>)`;
}

function rewriteSqlContent(tag: string, content: string, table: MappingTable): ContentRewrite | undefined {
  const result = transformSql(content, table);
  if (result.matchCount === 0) return undefined;

  return {
    content: result.text,
    replacements: result.matchCount,
    rewrites: result.rewrites.map(({ from, to }) => ({ location: `<${tag}>`, from, to })),
  };
}

function rewriteReferenceContent(
  tag: string,
  content: string,
  table: MappingTable
): ContentRewrite | undefined {
  const trimmed = content.trim();
  const reference = parseDottedReference(trimmed);
  if (!reference) return undefined;

  const rule = table.findFirst(reference.schema, reference.table);
  if (!rule) return undefined;

  const resolved = rule.resolve(reference.schema, reference.table);
  const next = `${resolved.schema}.${resolved.table}`;
  // A value that already names the target is left as written, padding included.
  if (next === trimmed) return undefined;

  return { content: next, replacements: 1, rewrites: [{ location: `<${tag}>`, from: trimmed, to: next }] };
}

/**
 * Schema-only fields match on the rule's schema alone, so a table-scoped
 * rule listed first also rewrites the bare library name.
 */
function rewriteSchemaContent(
  tag: string,
  content: string,
  table: MappingTable
): ContentRewrite | undefined {
  const trimmed = content.trim();
  const rule = table.findFirstBySchema(trimmed);
  if (!rule || rule.targetSchema === trimmed) return undefined;

  return {
    content: rule.targetSchema,
    replacements: 1,
    rewrites: [{ location: `<${tag}>`, from: trimmed, to: rule.targetSchema }],
  };
}

const CONTENT_REWRITERS: Record<
  TagClass,
  (tag: string, content: string, table: MappingTable) => ContentRewrite | undefined
> = {
  sql: rewriteSqlContent,
  reference: rewriteReferenceContent,
  schema: rewriteSchemaContent,
};

function collectOccurrences(
  text: string,
  tag: string,
  tagClass: TagClass,
  table: MappingTable
): TagOccurrence[] {
  return execAll(tagPattern(tag, tagClass), 'g', text).map((match) => {
    const [whole, open = '', content = '', close = ''] = match;
    return {
      start: match.index,
      end: match.index + whole.length,
      open,
      close,
      rewrite: CONTENT_REWRITERS[tagClass](tag, content, table),
    };
  });
}

function spliceOccurrences(text: string, occurrences: TagOccurrence[]): string {
  const { parts, cursor } = occurrences.reduce<{ parts: string[]; cursor: number }>(
    (acc, occurrence) => {
      if (!occurrence.rewrite) return acc;
      acc.parts.push(
        text.slice(acc.cursor, occurrence.start),
        occurrence.open,
        occurrence.rewrite.content,
        occurrence.close
      );
      return { parts: acc.parts, cursor: occurrence.end };
    },
    { parts: [], cursor: 0 }
  );
  parts.push(text.slice(cursor));
  return parts.join('');
}

function summarize(tag: string, tagClass: TagClass, occurrences: TagOccurrence[]): TagStats {
  return occurrences.reduce<TagStats>(
    (stats, occurrence) =>
      occurrence.rewrite
        ? {
            ...stats,
            transformed: stats.transformed + 1,
            replacements: stats.replacements + occurrence.rewrite.replacements,
          }
        : stats,
    { tag, tagClass, scanned: occurrences.length, transformed: 0, replacements: 0 }
  );
}

/**
 * Rewrite every occurrence of one tag
 */
export function rewriteTag(
  text: string,
  tag: string,
  tagClass: TagClass,
  table: MappingTable
): { text: string; stats: TagStats; rewrites: RewriteDiagnostic[] } {
  const occurrences = collectOccurrences(text, tag, tagClass, table);
  return {
    text: spliceOccurrences(text, occurrences),
    stats: summarize(tag, tagClass, occurrences),
    rewrites: occurrences.flatMap((o) => o.rewrite?.rewrites ?? []),
  };
}

export class StructuredFieldRewriter {
  readonly tagClasses: TagClassConfig;

  constructor(tagClasses?: Partial<TagClassConfig>) {
    this.tagClasses = resolveTagClasses(tagClasses);
  }

  /**
   * Rewrite all configured tags. SQL tags run first, then reference tags,
   * then schema tags; every tag pass scans the output of the previous one.
   */
  rewrite(document: string, table: MappingTable): FieldRewriteResult {
    const passes = TAG_CLASS_ORDER.flatMap((tagClass) =>
      this.tagClasses[tagClass].map((tag) => ({ tag, tagClass }))
    );

    return passes.reduce<FieldRewriteResult>(
      (acc, { tag, tagClass }) => {
        const pass = rewriteTag(acc.text, tag, tagClass, table);
        return {
          text: pass.text,
          matchCount: acc.matchCount + pass.stats.replacements,
          tags: [...acc.tags, pass.stats],
          rewrites: [...acc.rewrites, ...pass.rewrites],
        };
      },
      { text: document, matchCount: 0, tags: [], rewrites: [] }
    );
  }
}
