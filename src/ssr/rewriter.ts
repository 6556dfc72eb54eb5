/**
 * Document rewriter
 *
 * Streams markup chunks into a sink while filling insertion markers:
 * - hydration marker -> inline JSON script carrying the hydration payload
 * - asset marker     -> served reference of the named asset
 *
 * Chunks tagged with a marker are substituted directly. Other chunks are
 * scanned for the textual form (see markers.ts), which may be split across
 * chunks. Only a suffix that could still become a marker is held back,
 * never more than MAX_MARKER_LENGTH characters; everything else is written
 * through immediately.
 *
 * Structural problems (no hydration marker, two hydration markers, an
 * unterminated or unknown marker, an asset nobody can resolve) throw
 * RewriteFailedError. The sink is only ended after a clean end().
 */

import type { AssetResolver } from '../common/config';
import type { Marker } from '../common/tree';
import { RewriteFailedError } from '../common/errors';
import { invariant } from '../dev/invariant';
import { escapeAttr, escapeJsonForScript } from './escape';
import type { HydrationPayload } from './hydration';
import {
  MARKER_CLOSE,
  MARKER_OPEN,
  MAX_MARKER_LENGTH,
  parseMarkerBody,
} from './markers';
import type { MarkupChunk } from './render';
import type { RenderSink } from './sink';

export type RewriterOptions = {
  payload: HydrationPayload;
  assets: AssetResolver;
  hydrationElementId: string;
};

/** Length of the longest suffix of text[from:] that is a proper prefix of MARKER_OPEN */
function partialOpenLength(text: string, from: number): number {
  const max = Math.min(MARKER_OPEN.length - 1, text.length - from);
  for (let len = max; len > 0; len--) {
    if (text.endsWith(MARKER_OPEN.slice(0, len))) return len;
  }
  return 0;
}

function describe(text: string): string {
  const shown = text.length > 40 ? `${text.slice(0, 40)}...` : text;
  return JSON.stringify(shown);
}

export class DocumentRewriter {
  private pending = '';
  private hydrationWritten = false;
  private ended = false;
  private peakHeldBack = 0;

  constructor(
    private readonly sink: RenderSink,
    private readonly options: RewriterOptions
  ) {}

  /** Largest number of characters ever held back waiting for a marker */
  get maxHeldBack(): number {
    return this.peakHeldBack;
  }

  write(chunk: MarkupChunk): void {
    invariant(!this.ended, 'DocumentRewriter.write() after end()');
    if (chunk.marker) {
      this.flushPending('a marker chunk');
      this.emit(this.substitute(chunk.marker));
      return;
    }
    this.scan(chunk.markup);
  }

  end(): void {
    invariant(!this.ended, 'DocumentRewriter.end() called twice');
    this.ended = true;
    this.flushPending('the end of the document');
    if (!this.hydrationWritten) {
      throw new RewriteFailedError('document has no hydration marker');
    }
    this.sink.end();
  }

  private emit(html: string): void {
    if (html) this.sink.write(html);
  }

  private hold(text: string): void {
    this.pending = text;
    if (text.length > this.peakHeldBack) this.peakHeldBack = text.length;
  }

  /** Held-back text is literal unless it is an unfinished marker */
  private flushPending(interruptedBy: string): void {
    if (!this.pending) return;
    if (this.pending.startsWith(MARKER_OPEN)) {
      throw new RewriteFailedError(
        `unterminated marker ${describe(this.pending)} interrupted by ${interruptedBy}`
      );
    }
    this.emit(this.pending);
    this.pending = '';
  }

  private scan(input: string): void {
    const text = this.pending + input;
    this.pending = '';
    let pos = 0;

    for (;;) {
      const open = text.indexOf(MARKER_OPEN, pos);
      if (open === -1) {
        const keep = partialOpenLength(text, pos);
        this.emit(text.slice(pos, text.length - keep));
        if (keep > 0) this.hold(text.slice(text.length - keep));
        return;
      }

      this.emit(text.slice(pos, open));

      const bodyStart = open + MARKER_OPEN.length;
      const close = text.indexOf(MARKER_CLOSE, bodyStart);
      if (close === -1) {
        if (text.length - open >= MAX_MARKER_LENGTH) {
          throw new RewriteFailedError(
            `unterminated marker ${describe(text.slice(open))}`
          );
        }
        this.hold(text.slice(open));
        return;
      }

      const end = close + MARKER_CLOSE.length;
      if (end - open > MAX_MARKER_LENGTH) {
        throw new RewriteFailedError(
          `marker longer than ${MAX_MARKER_LENGTH} characters at ${describe(text.slice(open))}`
        );
      }

      const body = text.slice(bodyStart, close);
      const marker = parseMarkerBody(body);
      if (!marker) {
        throw new RewriteFailedError(`unknown marker ${JSON.stringify(body)}`);
      }
      this.emit(this.substitute(marker));
      pos = end;
    }
  }

  private substitute(marker: Marker): string {
    if (marker.type === 'hydration') {
      if (this.hydrationWritten) {
        throw new RewriteFailedError(
          'document has more than one hydration marker'
        );
      }
      this.hydrationWritten = true;
      const json = escapeJsonForScript(this.options.payload.toString());
      return `<script type="application/json" id="${this.options.hydrationElementId}">${json}</script>`;
    }

    let ref: string | undefined;
    try {
      ref = this.options.assets.resolve(marker.name);
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      throw new RewriteFailedError(
        `asset resolver failed for "${marker.name}": ${message}`
      );
    }
    if (typeof ref !== 'string' || ref === '') {
      throw new RewriteFailedError(`no asset named "${marker.name}"`);
    }
    return escapeAttr(ref);
  }
}

/** Rewrite a whole chunk sequence into a sink */
export function rewriteDocument(
  chunks: Iterable<MarkupChunk>,
  sink: RenderSink,
  options: RewriterOptions
): DocumentRewriter {
  const rewriter = new DocumentRewriter(sink, options);
  for (const chunk of chunks) rewriter.write(chunk);
  rewriter.end();
  return rewriter;
}
