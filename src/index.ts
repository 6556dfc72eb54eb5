/**
 * Stackable: server-side resolution and hydration pipeline
 *
 * Root exports cover tree authoring and the render entry points. Lower
 * layers (registry, scheduler, rewriter) are exported for callers that
 * drive a session by hand.
 */

// Tree authoring
export {
  raw,
  text,
  element,
  fragment,
  bridge,
  hydrationMarker,
  assetMarker,
  scriptAsset,
  styleAsset,
  buildTree,
  countBridges,
} from './tree/build';
export type { Child } from './tree/build';
export type {
  Attrs,
  BridgeMarkup,
  BridgeSpec,
  ComponentTree,
  Marker,
  NodeId,
  ResolveContext,
  ResolvedTree,
  TreeNode,
} from './common/tree';

// Configuration
export { resolveConfig, configFromEnv } from './common/config';
export type {
  AssetResolver,
  FailureMode,
  NodeState,
  RenderConfig,
  ResolvedRenderConfig,
  TransitionEvent,
} from './common/config';

// Errors
export {
  ResolutionError,
  RenderError,
  ResolutionFailedError,
  RewriteFailedError,
  SessionTimeoutError,
  SessionCancelledError,
} from './common/errors';
export type {
  RenderErrorKind,
  RenderFailure,
  ResolutionErrorKind,
} from './common/errors';
export {
  BridgeDuringSyncRenderError,
  InvalidConfigError,
  InvalidTreeError,
} from './common/ssr-errors';
export { InvariantError } from './dev/invariant';

// Resolution layer
export { StateRegistry } from './runtime/registry';
export type { RegistryEntry, SlotInfo } from './runtime/registry';
export {
  beginResolution,
  awaitResolution,
  ResolutionHandle,
} from './runtime/resolvable';
export type { BeginOptions, ResolutionOutcome } from './runtime/resolvable';
export {
  ResolutionScheduler,
  resolveTree,
  defaultFallback,
} from './runtime/scheduler';
export type {
  DegradedNode,
  SchedulerResult,
  SchedulerStats,
} from './runtime/scheduler';

// Rendering
export * from './ssr';
