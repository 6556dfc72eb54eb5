/**
 * Common call contracts: programming errors raised before or outside a
 * render session (these throw instead of being reported as outcomes)
 */

export class BridgeDuringSyncRenderError extends Error {
  readonly code = 'STACKABLE_BRIDGE_DURING_SYNC_RENDER';
  constructor(
    message = 'Synchronous rendering requires a tree without bridge nodes. Use render() or renderToStream() to resolve bridges first.'
  ) {
    super(message);
    this.name = 'BridgeDuringSyncRenderError';
    Object.setPrototypeOf(this, BridgeDuringSyncRenderError.prototype);
  }
}

export class InvalidTreeError extends Error {
  readonly code = 'STACKABLE_INVALID_TREE';
  constructor(message: string) {
    super(message);
    this.name = 'InvalidTreeError';
    Object.setPrototypeOf(this, InvalidTreeError.prototype);
  }
}

export class InvalidConfigError extends Error {
  readonly code = 'STACKABLE_INVALID_CONFIG';
  constructor(message: string) {
    super(message);
    this.name = 'InvalidConfigError';
    Object.setPrototypeOf(this, InvalidConfigError.prototype);
  }
}
