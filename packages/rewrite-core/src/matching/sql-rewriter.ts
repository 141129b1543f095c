/**
 * SQL Rewriter
 *
 * Substitutes every mapped schema-qualified reference in an SQL text.
 */

import type { ReferenceRewrite } from '@schemashift/core';
import type { MappingTable } from '../mapping/index.js';
import {
  REFERENCE_SYNTAXES,
  formatReference,
  matchReferences,
  type ReferenceSyntax,
} from './reference-matcher.js';

export interface SqlRewriteResult {
  /** Rewritten text */
  text: string;
  /** Substitutions applied across both syntaxes */
  matchCount: number;
  /** References recognized, mapped or not */
  scanned: number;
  /** Applied substitutions in text order per syntax */
  rewrites: ReferenceRewrite[];
}

interface PlannedReplacement {
  start: number;
  end: number;
  replacement: string;
  rewrite: ReferenceRewrite;
}

interface PassResult {
  text: string;
  scanned: number;
  rewrites: ReferenceRewrite[];
}

/**
 * One syntax pass over the current text. Spans come from distinct matches
 * of a single pattern, so they never overlap; applying them from the end
 * backwards keeps earlier offsets valid.
 */
function rewritePass(text: string, syntax: ReferenceSyntax, table: MappingTable): PassResult {
  let scanned = 0;
  const planned: PlannedReplacement[] = [];

  for (const match of matchReferences(text, syntax)) {
    scanned++;
    const rule = table.findFirst(match.schema, match.table);
    if (!rule) continue;

    const resolved = rule.resolve(match.schema, match.table);
    const replacement = formatReference(resolved.schema, resolved.table, match.bracketed);
    if (replacement === match.text) continue;

    planned.push({
      start: match.start,
      end: match.end,
      replacement,
      rewrite: { from: match.text, to: replacement, bracketed: match.bracketed },
    });
  }

  const rewritten = [...planned]
    .sort((a, b) => b.start - a.start)
    .reduce(
      (current, { start, end, replacement }) =>
        current.slice(0, start) + replacement + current.slice(end),
      text
    );

  return {
    text: rewritten,
    scanned,
    rewrites: planned.map((p) => p.rewrite),
  };
}

/**
 * Rewrite both reference syntaxes in `sql`. The bracketed pass runs on the
 * output of the plain pass with freshly computed matches.
 */
export function transformSql(sql: string, table: MappingTable): SqlRewriteResult {
  const initial: SqlRewriteResult = { text: sql, matchCount: 0, scanned: 0, rewrites: [] };

  return REFERENCE_SYNTAXES.reduce<SqlRewriteResult>((acc, syntax) => {
    const pass = rewritePass(acc.text, syntax, table);
    return {
      text: pass.text,
      matchCount: acc.matchCount + pass.rewrites.length,
      scanned: acc.scanned + pass.scanned,
      rewrites: [...acc.rewrites, ...pass.rewrites],
    };
  }, initial);
}
