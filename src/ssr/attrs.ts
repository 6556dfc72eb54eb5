/**
 * HTML attribute rendering for element nodes
 */

import type { Attrs } from '../common/tree';
import { escapeAttr, styleObjToCss } from './escape';

function isEventHandlerName(key: string): boolean {
  // onClick, onChange, ... (third char uppercase)
  return (
    key.length >= 3 &&
    key[0] === 'o' &&
    key[1] === 'n' &&
    key[2] >= 'A' &&
    key[2] <= 'Z'
  );
}

/**
 * Render attributes to an HTML string (with a leading space per attribute).
 * Event handlers, functions and `_internal` props never reach the markup;
 * client-side behaviour is attached during hydration.
 */
export function renderAttrs(attrs?: Attrs): string {
  if (!attrs) return '';

  let result = '';
  for (const [key, value] of Object.entries(attrs)) {
    if (key === 'key' || key === 'ref' || key === 'children') continue;
    if (key.startsWith('_') || isEventHandlerName(key)) continue;
    if (typeof value === 'function' || typeof value === 'symbol') continue;

    // Accept `className` for compatibility, emit `class`
    const attrName = key === 'className' ? 'class' : key;

    if (attrName === 'style') {
      const css = typeof value === 'string' ? value : styleObjToCss(value);
      if (css === null || css === '') continue;
      result += ` style="${escapeAttr(css)}"`;
      continue;
    }

    if (value === true) {
      result += ` ${attrName}`;
    } else if (value === false || value === null || value === undefined) {
      continue;
    } else {
      result += ` ${attrName}="${escapeAttr(String(value))}"`;
    }
  }
  return result;
}
