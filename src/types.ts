/**
 * Core type definitions for the folded line reader
 */

// ── Line sources ───────────────────────────────────────────────────────────

/**
 * The underlying character stream a reader pulls physical lines from.
 * Reads are synchronous and may block.
 */
export interface LineSource {
  /** Character encoding of the stream, if known. Informational only. */
  readonly encoding?: string | undefined;

  /**
   * Next physical line without its terminator, or `null` at end of stream.
   * Keeps returning `null` once the stream is exhausted.
   */
  readLine(): string | null;

  /** Release the underlying resource */
  close?(): void;
}

/** Options for reading a file descriptor */
export interface FileSourceOptions {
  /** Byte-to-character encoding of the file (default: 'utf8') */
  encoding?: BufferEncoding;
  /** Number of bytes per read call (default: 65536) */
  chunkSize?: number;
}

// ── Folding ────────────────────────────────────────────────────────────────

/**
 * How the physical lines of one logical line are joined.
 *
 * `standard` is RFC 5545/6350 folding: continuation lines start with a
 * space or tab. `quoted-printable` is the vCard 2.1 writer quirk where each
 * line ends with a soft break (`=`) and the next line has no indent.
 */
export type FoldStyle = 'standard' | 'quoted-printable';

// ── Reader state ───────────────────────────────────────────────────────────

/** A physical line read ahead of time, with the line number it was read at */
export interface PendingLine {
  text: string;
  lineNumber: number;
}

/** A recoverable anomaly found while reading */
export interface ReadWarning {
  /** Start line of the logical line the warning is about */
  line: number;
  message: string;
}
