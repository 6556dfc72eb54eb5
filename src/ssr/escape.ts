/**
 * HTML escaping utilities
 *
 * Shared by the tree builder (text and attributes), the rewriter (asset
 * references) and the hydration payload (inline JSON). Stateless: no caches
 * survive between render sessions.
 */

// HTML5 void elements that don't have closing tags
export const VOID_ELEMENTS: ReadonlySet<string> = new Set([
  'area',
  'base',
  'br',
  'col',
  'embed',
  'hr',
  'img',
  'input',
  'link',
  'meta',
  'param',
  'source',
  'track',
  'wbr',
]);

const TEXT_ESCAPE_TEST_RE = /[&<>]/;
const TEXT_ESCAPE_RE = /[&<>]/g;
const ATTR_ESCAPE_TEST_RE = /[&"'<>]/;
const ATTR_ESCAPE_RE = /[&"'<>]/g;
const SCRIPT_JSON_RE = /[<>&\u2028\u2029]/g;

const CSS_UNSAFE_RE = /[{}<>\\]/g;
const CSS_DANGEROUS_FN_RE = /(?:url|expression|javascript)\s*\(/i;

function mapTextEscape(ch: string): string {
  switch (ch) {
    case '&':
      return '&amp;';
    case '<':
      return '&lt;';
    default:
      return '&gt;';
  }
}

function mapAttrEscape(ch: string): string {
  switch (ch) {
    case '&':
      return '&amp;';
    case '"':
      return '&quot;';
    case "'":
      return '&#x27;';
    case '<':
      return '&lt;';
    default:
      return '&gt;';
  }
}

function mapScriptJson(ch: string): string {
  return `\\u${ch.charCodeAt(0).toString(16).padStart(4, '0')}`;
}

/**
 * Escape HTML special characters in text content
 */
export function escapeText(text: string): string {
  if (!TEXT_ESCAPE_TEST_RE.test(text)) return text;
  return text.replace(TEXT_ESCAPE_RE, mapTextEscape);
}

/**
 * Escape HTML special characters in attribute values
 */
export function escapeAttr(value: string): string {
  if (!ATTR_ESCAPE_TEST_RE.test(value)) return value;
  return value.replace(ATTR_ESCAPE_RE, mapAttrEscape);
}

/**
 * Make JSON text safe to inline inside a <script> element. The result is
 * still valid JSON and parses to the same value.
 */
export function escapeJsonForScript(json: string): string {
  return json.replace(SCRIPT_JSON_RE, mapScriptJson);
}

function escapeCssValue(value: string): string {
  if (value.includes('(') && CSS_DANGEROUS_FN_RE.test(value)) return '';
  return value.replace(CSS_UNSAFE_RE, '');
}

/**
 * Convert a style object (camelCase keys) to a CSS declaration string
 */
export function styleObjToCss(value: unknown): string | null {
  if (!value || typeof value !== 'object') return null;
  let out = '';
  for (const [k, v] of Object.entries(value)) {
    if (v === null || v === undefined || v === false) continue;
    const prop = k.replace(/[A-Z]/g, (m) => `-${m.toLowerCase()}`);
    const safeValue = escapeCssValue(String(v));
    if (safeValue) out += `${prop}:${safeValue};`;
  }
  return out;
}
