/**
 * Textual insertion markers
 *
 *   <!--stackable:hydration-->
 *   <!--stackable:asset:NAME-->
 *
 * Markers may be written by hand in raw markup; the tree helpers emit the
 * same text and additionally tag the chunk so the rewriter can skip scanning.
 */

import type { Marker } from '../common/tree';

export const MARKER_OPEN = '<!--stackable:';
export const MARKER_CLOSE = '-->';

/**
 * Longest marker the rewriter will look ahead for. Bounds how much output a
 * partially received marker can hold back.
 */
export const MAX_MARKER_LENGTH = 256;

const ASSET_NAME_RE = /^[\w@][\w@./-]*$/;

export function isValidAssetName(name: string): boolean {
  return (
    ASSET_NAME_RE.test(name) &&
    MARKER_OPEN.length + 'asset:'.length + name.length + MARKER_CLOSE.length <=
      MAX_MARKER_LENGTH
  );
}

export function formatMarker(marker: Marker): string {
  return marker.type === 'hydration'
    ? `${MARKER_OPEN}hydration${MARKER_CLOSE}`
    : `${MARKER_OPEN}asset:${marker.name}${MARKER_CLOSE}`;
}

/** Parse a marker body (text between MARKER_OPEN and MARKER_CLOSE) */
export function parseMarkerBody(body: string): Marker | null {
  if (body === 'hydration') return { type: 'hydration' };
  if (body.startsWith('asset:')) {
    const name = body.slice('asset:'.length);
    return isValidAssetName(name) ? { type: 'asset', name } : null;
  }
  return null;
}
