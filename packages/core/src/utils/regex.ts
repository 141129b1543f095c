/**
 * Regular expression helpers
 */

/**
 * Escape a literal string for use inside a RegExp source
 */
export function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * Collect every match of `source` in `text`, left to right.
 *
 * A fresh global RegExp is compiled per call, so no `lastIndex` state leaks
 * between callers.
 */
export function execAll(source: string, flags: string, text: string): RegExpExecArray[] {
  const pattern = new RegExp(source, flags.includes('g') ? flags : `${flags}g`);
  const matches: RegExpExecArray[] = [];
  let match: RegExpExecArray | null;

  while ((match = pattern.exec(text)) !== null) {
    matches.push(match);
    if (match[0].length === 0) {
      pattern.lastIndex++;
    }
  }

  return matches;
}

/**
 * Case-insensitive name equality
 */
export function sameName(a: string, b: string): boolean {
  return a.toUpperCase() === b.toUpperCase();
}
