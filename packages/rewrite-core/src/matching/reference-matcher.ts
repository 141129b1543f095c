/**
 * Reference Matcher
 *
 * Finds schema-qualified names in raw text. Two surface syntaxes are
 * recognized: `SCHEMA.TABLE` and `[SCHEMA].[TABLE]`, with optional
 * whitespace around the dot. The matcher only reports spans; deciding on a
 * replacement is the caller's job.
 */

export type ReferenceSyntax = 'plain' | 'bracketed';

/** Syntaxes in the order the SQL rewriter applies them */
export const REFERENCE_SYNTAXES: readonly ReferenceSyntax[] = ['plain', 'bracketed'];

const IDENTIFIER = '[A-Za-z_][A-Za-z0-9_]*';

const PATTERNS: Record<ReferenceSyntax, string> = {
  plain: `\\b(${IDENTIFIER})\\s*\\.\\s*(${IDENTIFIER})\\b`,
  bracketed: `\\[(${IDENTIFIER})\\]\\s*\\.\\s*\\[(${IDENTIFIER})\\]`,
};

/** Exact shape of a dotted-reference field; no whitespace allowed */
const DOTTED_REFERENCE = new RegExp(`^(${IDENTIFIER})\\.(${IDENTIFIER})$`);

export interface ReferenceMatch {
  /** Offset of the first character of the reference */
  start: number;
  /** Offset just past the reference */
  end: number;
  /** Schema as written in the text */
  schema: string;
  /** Table as written in the text */
  table: string;
  bracketed: boolean;
  /** The full matched text */
  text: string;
}

/**
 * Lazily yield the references of one syntax, left to right
 */
export function* matchReferences(
  text: string,
  syntax: ReferenceSyntax
): Generator<ReferenceMatch, void, undefined> {
  const pattern = new RegExp(PATTERNS[syntax], 'gi');
  let match: RegExpExecArray | null;

  while ((match = pattern.exec(text)) !== null) {
    const [whole, schema, table] = match;
    if (schema === undefined || table === undefined) continue;

    yield {
      start: match.index,
      end: match.index + whole.length,
      schema,
      table,
      bracketed: syntax === 'bracketed',
      text: whole,
    };
  }
}

/**
 * Parse a whole string as `identifier.identifier`. Returns undefined for
 * anything else, including surrounding whitespace.
 */
export function parseDottedReference(value: string): { schema: string; table: string } | undefined {
  const match = DOTTED_REFERENCE.exec(value);
  if (!match) return undefined;

  const [, schema, table] = match;
  if (schema === undefined || table === undefined) return undefined;
  return { schema, table };
}

/**
 * Format a resolved name in the bracket style of the source occurrence
 */
export function formatReference(schema: string, table: string, bracketed: boolean): string {
  return bracketed ? `[${schema}].[${table}]` : `${schema}.${table}`;
}
