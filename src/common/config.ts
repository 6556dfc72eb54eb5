/**
 * Common call contracts: render configuration
 */

import type { ResolutionError } from './errors';
import type { NodeId } from './tree';
import { InvalidConfigError } from './ssr-errors';

export type FailureMode = 'fail-fast' | 'best-effort';

export const FAILURE_MODES = ['fail-fast', 'best-effort'] as const;

export type NodeState =
  | 'discovered'
  | 'resolving'
  | 'resolved'
  | 'failed'
  | 'timed-out'
  | 'cancelled';

export type TransitionEvent = {
  node: NodeId;
  slot: number;
  key: string;
  from: NodeState;
  to: NodeState;
  error?: ResolutionError;
};

/** Maps a logical asset name to the reference the page should load */
export type AssetResolver = {
  resolve(name: string): string | undefined;
};

export type RenderConfig = {
  /** Upper bound on bridge resolutions in flight at once */
  maxConcurrentResolutions?: number;
  /** Deadline for the whole resolution phase */
  globalTimeoutMs?: number;
  /** Deadline for each bridge, unless the bridge sets its own */
  perNodeTimeoutMs?: number;
  failureMode?: FailureMode;
  /** Extra attempts for bridges failing with `dependency-failed` */
  maxRetries?: number;
  assets?: AssetResolver;
  /** `id` of the inline script element carrying the hydration payload */
  hydrationElementId?: string;
  /** Cancels the session when aborted */
  signal?: AbortSignal;
  onTransition?: (event: TransitionEvent) => void;
};

export type ResolvedRenderConfig = {
  maxConcurrentResolutions: number;
  globalTimeoutMs: number;
  perNodeTimeoutMs: number | undefined;
  failureMode: FailureMode;
  maxRetries: number;
  assets: AssetResolver;
  hydrationElementId: string;
  signal: AbortSignal | undefined;
  onTransition: ((event: TransitionEvent) => void) | undefined;
};

export const DEFAULT_MAX_CONCURRENT_RESOLUTIONS = 8;
export const DEFAULT_GLOBAL_TIMEOUT_MS = 10_000;
export const DEFAULT_HYDRATION_ELEMENT_ID = '__STACKABLE_STATE__';

/** Largest delay setTimeout honours; longer ones fire after 1ms */
export const MAX_TIMEOUT_MS = 2_147_483_647;

const NO_ASSETS: AssetResolver = {
  resolve: () => undefined,
};

function checkInteger(name: string, value: number, min: number): number {
  if (!Number.isInteger(value) || value < min) {
    throw new InvalidConfigError(
      `${name} must be an integer >= ${min}, got ${String(value)}`
    );
  }
  return value;
}

function checkDuration(name: string, value: number): number {
  if (!Number.isFinite(value) || value <= 0 || value > MAX_TIMEOUT_MS) {
    throw new InvalidConfigError(
      `${name} must be a positive number of milliseconds up to ${MAX_TIMEOUT_MS}, got ${String(value)}`
    );
  }
  return value;
}

export function resolveConfig(config: RenderConfig = {}): ResolvedRenderConfig {
  if (!config || typeof config !== 'object') {
    throw new InvalidConfigError('render config must be an object');
  }

  const failureMode = config.failureMode ?? 'fail-fast';
  if (!FAILURE_MODES.includes(failureMode)) {
    throw new InvalidConfigError(
      `failureMode must be one of [${FAILURE_MODES.join(', ')}], got ${JSON.stringify(failureMode)}`
    );
  }

  const hydrationElementId =
    config.hydrationElementId ?? DEFAULT_HYDRATION_ELEMENT_ID;
  if (!/^[A-Za-z_][\w-]*$/.test(hydrationElementId)) {
    throw new InvalidConfigError(
      `hydrationElementId must be a plain identifier, got ${JSON.stringify(hydrationElementId)}`
    );
  }

  return {
    maxConcurrentResolutions: checkInteger(
      'maxConcurrentResolutions',
      config.maxConcurrentResolutions ?? DEFAULT_MAX_CONCURRENT_RESOLUTIONS,
      1
    ),
    globalTimeoutMs: checkDuration(
      'globalTimeoutMs',
      config.globalTimeoutMs ?? DEFAULT_GLOBAL_TIMEOUT_MS
    ),
    perNodeTimeoutMs:
      config.perNodeTimeoutMs === undefined
        ? undefined
        : checkDuration('perNodeTimeoutMs', config.perNodeTimeoutMs),
    failureMode,
    maxRetries: checkInteger('maxRetries', config.maxRetries ?? 0, 0),
    assets: config.assets ?? NO_ASSETS,
    hydrationElementId,
    signal: config.signal,
    onTransition: config.onTransition,
  };
}

function readNumber(
  env: Record<string, string | undefined>,
  name: string
): number | undefined {
  const raw = env[name];
  if (raw === undefined || raw.trim() === '') return undefined;
  const value = Number(raw);
  if (Number.isNaN(value)) {
    throw new InvalidConfigError(
      `${name} must be numeric, got ${JSON.stringify(raw)}`
    );
  }
  return value;
}

function isFailureMode(value: string): value is FailureMode {
  return FAILURE_MODES.some((mode) => mode === value);
}

/**
 * Read render settings from environment variables. Unset variables are left
 * out so they fall back to defaults (or to values merged in by the caller).
 */
export function configFromEnv(
  env: Record<string, string | undefined> = process.env
): RenderConfig {
  const out: RenderConfig = {};

  const max = readNumber(env, 'STACKABLE_MAX_CONCURRENT_RESOLUTIONS');
  if (max !== undefined) out.maxConcurrentResolutions = max;

  const globalTimeout = readNumber(env, 'STACKABLE_GLOBAL_TIMEOUT_MS');
  if (globalTimeout !== undefined) out.globalTimeoutMs = globalTimeout;

  const nodeTimeout = readNumber(env, 'STACKABLE_PER_NODE_TIMEOUT_MS');
  if (nodeTimeout !== undefined) out.perNodeTimeoutMs = nodeTimeout;

  const retries = readNumber(env, 'STACKABLE_MAX_RETRIES');
  if (retries !== undefined) out.maxRetries = retries;

  const mode = env.STACKABLE_FAILURE_MODE?.trim();
  if (mode) {
    if (!isFailureMode(mode)) {
      throw new InvalidConfigError(
        `STACKABLE_FAILURE_MODE must be one of [${FAILURE_MODES.join(', ')}], got ${JSON.stringify(mode)}`
      );
    }
    out.failureMode = mode;
  }

  return out;
}
