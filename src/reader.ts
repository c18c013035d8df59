/**
 * Folded line reader — RFC 5545 / RFC 6350 §3.2 unfolding
 *
 * Design goals:
 *   - Tolerant: blank lines between folded lines are skipped, truncated
 *     input ends the current line instead of failing
 *   - Accurate diagnostics: every physical line is counted, so line numbers
 *     match what an editor shows
 *   - Outlook compatible: quoted-printable values folded with trailing `=`
 *     soft breaks are joined as well
 */

import { LineReadError } from './errors.js';
import { chop, detectFoldStyle, isFoldedLine } from './fold.js';
import { FileLineSource, StringLineSource } from './source.js';
import type { FileSourceOptions, LineSource, PendingLine, ReadWarning } from './types.js';

/**
 * Reads logical lines from text or a line source.
 *
 * @example
 * ```ts
 * const reader = new FoldedLineReader('NOTE:a\r\n b\r\nFN:Alice\r\n');
 * reader.readLine(); // 'NOTE:ab'
 * reader.lineNumber; // 1
 * reader.readLine(); // 'FN:Alice'
 * reader.lineNumber; // 3
 * reader.readLine(); // null
 * ```
 */
export class FoldedLineReader implements Iterable<string> {
  /** Recoverable problems found so far */
  readonly warnings: ReadWarning[] = [];

  private readonly source: LineSource;
  /** Line read by the previous call that starts the next logical line */
  private pending: PendingLine | undefined;
  private lineCount = 0;
  private startLine = 0;
  private closed = false;

  constructor(input: string | LineSource) {
    this.source = typeof input === 'string' ? new StringLineSource(input) : input;
  }

  /** Read a file with blocking reads. Call `close()` when done. */
  static fromFile(path: string, options?: FileSourceOptions): FoldedLineReader {
    return new FoldedLineReader(FileLineSource.open(path, options));
  }

  /**
   * Physical line (1-based, blank lines included) on which the last
   * logical line started. 0 until a line has been read.
   */
  get lineNumber(): number {
    return this.startLine;
  }

  /** Encoding of the underlying source, if known */
  get encoding(): string | undefined {
    return this.source.encoding;
  }

  /**
   * Read the next unfolded line.
   * @returns the logical line, or null at end of input
   * @throws LineReadError if the source fails or the reader is closed
   */
  readLine(): string | null {
    if (this.closed) {
      throw new LineReadError('Cannot read from a closed reader', this.lineCount);
    }

    const first = this.takeFirstLine();
    if (first === undefined) return null;

    this.startLine = first.lineNumber;
    switch (detectFoldStyle(first.text)) {
      case 'quoted-printable':
        return this.unfoldQuotedPrintable(chop(first.text));
      case 'standard':
        return this.unfoldStandard(first.text);
    }
  }

  /** Close the underlying source. Further reads throw. */
  close(): void {
    if (this.closed) return;
    this.closed = true;
    this.pending = undefined;
    this.source.close?.();
  }

  *[Symbol.iterator](): Generator<string, void, undefined> {
    for (let line = this.readLine(); line !== null; line = this.readLine()) {
      yield line;
    }
  }

  // ── Physical lines ───────────────────────────────────────────────────────

  private nextRawLine(): string | null {
    let line: string | null;
    try {
      line = this.source.readLine();
    } catch (err) {
      const lineNumber = this.lineCount + 1;
      throw new LineReadError(`Failed to read line ${lineNumber}`, lineNumber, { cause: err });
    }
    if (line !== null) this.lineCount++;
    return line;
  }

  /**
   * Some producers (iPhone exports) put empty lines between folded lines.
   * They are skipped here but still counted.
   */
  private nextNonBlankLine(): string | null {
    for (;;) {
      const line = this.nextRawLine();
      if (line === null || line.length > 0) return line;
    }
  }

  private takeFirstLine(): PendingLine | undefined {
    const pending = this.pending;
    if (pending !== undefined) {
      this.pending = undefined;
      return pending;
    }
    const text = this.nextNonBlankLine();
    return text === null ? undefined : { text, lineNumber: this.lineCount };
  }

  // ── Unfolding ────────────────────────────────────────────────────────────

  private unfoldStandard(first: string): string {
    let unfolded = first;
    for (;;) {
      const line = this.nextNonBlankLine();
      if (line === null) break;

      if (!isFoldedLine(line)) {
        this.pending = { text: line, lineNumber: this.lineCount };
        break;
      }
      unfolded += line.slice(1);
    }
    return unfolded;
  }

  /**
   * Blank lines are part of the value here, so lines are read raw. The value
   * ends at the first line without a trailing `=`, which is consumed.
   */
  private unfoldQuotedPrintable(first: string): string {
    let unfolded = first;
    for (;;) {
      const raw = this.nextRawLine();
      if (raw === null) {
        this.warnings.push({
          line: this.startLine,
          message: 'Quoted-printable value ends with a soft line break at end of input',
        });
        break;
      }

      // Some writers indent the continuation anyway
      const line = isFoldedLine(raw) ? raw.slice(1) : raw;
      if (!line.endsWith('=')) {
        unfolded += line;
        break;
      }
      unfolded += chop(line);
    }
    return unfolded;
  }
}

/** Unfold a whole text into its logical lines */
export function unfoldLines(input: string): string[] {
  return [...new FoldedLineReader(input)];
}
