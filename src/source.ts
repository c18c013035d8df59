/**
 * Physical line sources
 *
 * Lines end at `\n`, `\r` or `\r\n`. A final line without a terminator is
 * still returned; a terminator at the very end does not add an empty line.
 */

import { closeSync, openSync, readSync } from 'node:fs';
import { StringDecoder } from 'node:string_decoder';
import type { FileSourceOptions, LineSource } from './types.js';

const LF = 0x0a;
const CR = 0x0d;

const DEFAULT_CHUNK_SIZE = 64 * 1024;

function findTerminator(text: string, from: number): number {
  for (let i = from; i < text.length; i++) {
    const code = text.charCodeAt(i);
    if (code === LF || code === CR) return i;
  }
  return -1;
}

// ── Base ───────────────────────────────────────────────────────────────────

/** Splits decoded text, delivered in chunks, into physical lines */
abstract class ChunkedLineSource implements LineSource {
  abstract readonly encoding: string | undefined;

  private text = '';
  private pos = 0;
  /** No terminator between `pos` and this index */
  private scanned = 0;
  private ended = false;
  /** A `\r` ended the previous line; drop a `\n` that directly follows */
  private skipLineFeed = false;

  /** Next piece of decoded text, or `null` when the input is exhausted */
  protected abstract nextChunk(): string | null;

  readLine(): string | null {
    for (;;) {
      if (this.skipLineFeed && this.pos < this.text.length) {
        if (this.text.charCodeAt(this.pos) === LF) this.pos++;
        this.skipLineFeed = false;
      }

      const end = findTerminator(this.text, Math.max(this.pos, this.scanned));
      if (end !== -1) {
        const line = this.text.slice(this.pos, end);
        this.skipLineFeed = this.text.charCodeAt(end) === CR;
        this.pos = end + 1;
        this.scanned = this.pos;
        return line;
      }
      this.scanned = this.text.length;

      if (this.ended) {
        if (this.pos >= this.text.length) return null;
        const line = this.text.slice(this.pos);
        this.pos = this.text.length;
        return line;
      }

      const chunk = this.nextChunk();
      if (chunk === null) {
        this.ended = true;
      } else {
        this.text = this.text.slice(this.pos) + chunk;
        this.scanned -= this.pos;
        this.pos = 0;
      }
    }
  }
}

// ── In-memory text ─────────────────────────────────────────────────────────

/** Reads lines from a string held in memory */
export class StringLineSource extends ChunkedLineSource {
  readonly encoding: string | undefined;
  private input: string | null;

  constructor(text: string, encoding?: string) {
    super();
    this.input = text;
    this.encoding = encoding;
  }

  /** Decode a buffer and read lines from the result */
  static fromBuffer(buffer: Buffer, encoding: BufferEncoding = 'utf8'): StringLineSource {
    return new StringLineSource(buffer.toString(encoding), encoding);
  }

  protected nextChunk(): string | null {
    const chunk = this.input;
    this.input = null;
    return chunk;
  }
}

// ── File descriptor ────────────────────────────────────────────────────────

function resolveChunkSize(options: FileSourceOptions): number {
  const chunkSize = options.chunkSize ?? DEFAULT_CHUNK_SIZE;
  if (!Number.isInteger(chunkSize) || chunkSize < 1) {
    throw new RangeError(`chunkSize must be a positive integer, got ${chunkSize}`);
  }
  return chunkSize;
}

/**
 * Reads lines from a file descriptor with blocking reads.
 * Characters split across two reads are decoded once both halves arrive.
 */
export class FileLineSource extends ChunkedLineSource {
  readonly encoding: BufferEncoding;
  private readonly decoder: StringDecoder;
  private readonly buffer: Buffer;
  private fd: number | null;

  constructor(fd: number, options: FileSourceOptions = {}) {
    super();
    const chunkSize = resolveChunkSize(options);
    this.fd = fd;
    this.encoding = options.encoding ?? 'utf8';
    this.decoder = new StringDecoder(this.encoding);
    this.buffer = Buffer.alloc(chunkSize);
  }

  /** Open a file for reading. Options are checked before the file is opened. */
  static open(path: string, options: FileSourceOptions = {}): FileLineSource {
    resolveChunkSize(options);
    const fd = openSync(path, 'r');
    try {
      return new FileLineSource(fd, options);
    } catch (err) {
      closeSync(fd);
      throw err;
    }
  }

  protected nextChunk(): string | null {
    if (this.fd === null) {
      throw new Error('File source is closed');
    }
    const bytesRead = readSync(this.fd, this.buffer, 0, this.buffer.length, null);
    if (bytesRead === 0) {
      const rest = this.decoder.end();
      return rest.length > 0 ? rest : null;
    }
    return this.decoder.write(this.buffer.subarray(0, bytesRead));
  }

  close(): void {
    if (this.fd === null) return;
    const fd = this.fd;
    this.fd = null;
    closeSync(fd);
  }
}
