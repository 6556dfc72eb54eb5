/**
 * Server-side rendering
 *
 * Resolve bridges, render markup, inline the hydration payload and asset
 * references. Use `render()` for a complete document, `renderToStream()` to
 * forward chunks as they are produced, `renderToStringSync()` for trees
 * without bridges.
 */

export {
  render,
  renderToStream,
  renderToStringSync,
  RenderSession,
  isComponentTree,
  toComponentTree,
} from './session';
export type {
  RenderInput,
  RenderOutcome,
  RenderResult,
  RenderStats,
  SessionFailure,
  SessionOutcome,
  SessionSuccess,
  StreamOptions,
} from './session';
export { createRenderer, prerender } from './create-renderer';
export type { Renderer } from './create-renderer';
export { createAssetResolver } from './assets';
export type { AssetResolverOptions } from './assets';
export {
  HydrationPayload,
  readHydrationPayload,
  serializeState,
} from './hydration';
export type { HydratedSlot, HydrationEntry } from './hydration';
export { OutputStream } from './output';
export { MarkupStream, renderMarkup, asResolvedTree } from './render';
export type { MarkupChunk } from './render';
export { DocumentRewriter, rewriteDocument } from './rewriter';
export type { RewriterOptions } from './rewriter';
export { StringSink, StreamSink } from './sink';
export type { RenderSink } from './sink';
export { escapeAttr, escapeText, escapeJsonForScript } from './escape';
export { formatMarker, MAX_MARKER_LENGTH } from './markers';
