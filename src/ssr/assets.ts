/**
 * Asset resolution
 *
 * The embedding/bundling step produces a manifest from logical names
 * (`main.js`) to served files (`assets/main-3f9a.js`). The rewriter asks
 * the resolver for each asset marker it meets.
 */

import type { AssetResolver } from '../common/config';
import { InvalidConfigError } from '../common/ssr-errors';

const ABSOLUTE_URL_RE = /^[a-z][a-z0-9+.-]*:\/\//i;

export type AssetResolverOptions = {
  /** Public path the files are served from; defaults to `/` */
  base?: string;
};

function joinBase(base: string, ref: string): string {
  if (ABSOLUTE_URL_RE.test(ref) || ref.startsWith('//')) return ref;
  const trimmedBase = base.endsWith('/') ? base.slice(0, -1) : base;
  const trimmedRef = ref.startsWith('/') ? ref.slice(1) : ref;
  return `${trimmedBase}/${trimmedRef}`;
}

export function createAssetResolver(
  manifest: Record<string, string> | Map<string, string>,
  options: AssetResolverOptions = {}
): AssetResolver {
  const base = options.base ?? '/';
  const entries =
    manifest instanceof Map
      ? [...manifest.entries()]
      : Object.entries(manifest);

  const table = new Map<string, string>();
  for (const [name, ref] of entries) {
    if (typeof ref !== 'string' || ref === '') {
      throw new InvalidConfigError(`asset "${name}" has no served reference`);
    }
    table.set(name, joinBase(base, ref));
  }

  return {
    resolve(name: string): string | undefined {
      return table.get(name);
    },
  };
}
