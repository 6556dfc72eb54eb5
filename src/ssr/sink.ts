export interface RenderSink {
  write(html: string): void;
  end(): void;
}

/**
 * Buffers output in memory. Many small writes are batched into larger
 * chunks so large documents do not turn into hundreds of thousands of
 * array entries.
 */
export class StringSink implements RenderSink {
  private chunks: string[] = [];
  private bufferChunks: string[] = [];
  private bufferLen = 0;

  private static readonly FLUSH_THRESHOLD = 8 * 1024;

  write(html: string) {
    if (!html) return;
    this.bufferChunks.push(html);
    this.bufferLen += html.length;
    if (this.bufferLen >= StringSink.FLUSH_THRESHOLD) this.flush();
  }

  end() {
    this.flush();
  }

  toChunks(): string[] {
    this.flush();
    return this.chunks.slice();
  }

  toString() {
    this.flush();
    return this.chunks.join('');
  }

  private flush() {
    if (!this.bufferLen) return;
    this.chunks.push(this.bufferChunks.join(''));
    this.bufferChunks = [];
    this.bufferLen = 0;
  }
}

/** Forwards every write as it happens */
export class StreamSink implements RenderSink {
  constructor(
    private readonly onChunk: (html: string) => void,
    private readonly onComplete: () => void
  ) {}

  write(html: string) {
    if (html) this.onChunk(html);
  }

  end() {
    this.onComplete();
  }
}
