import { Readable } from 'node:stream';

const encoder = new TextEncoder();

/**
 * Collected output of a successful render. Replayable: it can be iterated,
 * joined or piped as many times as the caller needs.
 */
export class OutputStream implements Iterable<string> {
  constructor(private readonly chunks: readonly string[]) {}

  [Symbol.iterator](): Iterator<string> {
    return this.chunks[Symbol.iterator]();
  }

  get chunkCount(): number {
    return this.chunks.length;
  }

  toString(): string {
    return this.chunks.join('');
  }

  toBytes(): Uint8Array {
    return encoder.encode(this.toString());
  }

  /** Byte stream for HTTP responses and file writers */
  toReadable(): Readable {
    return Readable.from(
      this.chunks.map((chunk) => Buffer.from(chunk, 'utf8')),
      { objectMode: false }
    );
  }
}
