/**
 * folded-lines — logical line reader for vCard and iCalendar text
 *
 * Unfolds RFC 5545 / RFC 6350 folded lines and the quoted-printable soft
 * break folding written by vCard 2.1 producers, while keeping track of the
 * physical line each logical line started on.
 *
 * @example
 * ```ts
 * import { FoldedLineReader } from 'folded-lines';
 *
 * const reader = FoldedLineReader.fromFile('contacts.vcf');
 * try {
 *   for (const line of reader) {
 *     console.log(reader.lineNumber, line);
 *   }
 * } finally {
 *   reader.close();
 * }
 * ```
 */

// ── Reader ─────────────────────────────────────────────────────────────────
export { FoldedLineReader, unfoldLines } from './reader.js';
export { LineReadError } from './errors.js';

// ── Line sources ───────────────────────────────────────────────────────────
export { StringLineSource, FileLineSource } from './source.js';

// ── Fold detection (for advanced usage) ────────────────────────────────────
export { isQuotedPrintableFold, detectFoldStyle, isFoldedLine, chop } from './fold.js';

// ── Types ──────────────────────────────────────────────────────────────────
export type {
  LineSource,
  FileSourceOptions,
  FoldStyle,
  ReadWarning,
} from './types.js';
