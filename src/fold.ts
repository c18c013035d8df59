/**
 * Fold detection helpers
 *
 * Quoted-printable values written by some vCard 2.1 producers (Outlook)
 * are folded with a trailing `=` soft break and no leading whitespace:
 *
 *   NOTE;QUOTED-PRINTABLE: This is an=0D=0A=
 *   annoyingly formatted=0D=0A=
 *   note=
 *
 *   END:VCARD
 *
 * The blank line above END is still part of the NOTE value, because the
 * line before it ends with `=`.
 */

import type { FoldStyle } from './types.js';

/** First line of a quoted-printable value that continues on the next line */
const QUOTED_PRINTABLE_FOLD = /^[^:]*QUOTED-PRINTABLE[^:]*:.*=$/i;

/**
 * True when the line declares QUOTED-PRINTABLE before its first colon and
 * ends with a soft line break.
 */
export function isQuotedPrintableFold(line: string): boolean {
  return QUOTED_PRINTABLE_FOLD.test(line);
}

export function detectFoldStyle(line: string): FoldStyle {
  return isQuotedPrintableFold(line) ? 'quoted-printable' : 'standard';
}

/** True for a continuation line (starts with a space or a tab) */
export function isFoldedLine(line: string): boolean {
  const first = line.charAt(0);
  return first === ' ' || first === '\t';
}

/** Remove the last character */
export function chop(line: string): string {
  return line.length > 0 ? line.slice(0, -1) : line;
}
