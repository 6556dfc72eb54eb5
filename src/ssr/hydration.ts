/**
 * Hydration payload
 *
 * Resolved bridge values are stored as canonical JSON (sorted object keys,
 * no whitespace) so the same values always produce the same bytes. The
 * payload lists `[slot, key, value]` triples in slot order:
 *
 *   {"v":1,"slots":[[0,"user",{"id":1}],[1,"feed",[]]]}
 */

import { ResolutionError } from '../common/errors';
import type { RegistryEntry } from '../runtime/registry';

export const HYDRATION_PAYLOAD_VERSION = 1;

const encoder = new TextEncoder();

function fail(path: string, what: string): never {
  throw ResolutionError.internalFailure(
    `resolved value is not serializable: ${what} at ${path}`
  );
}

function hasToJSON(value: object): value is { toJSON(): unknown } {
  return 'toJSON' in value && typeof value.toJSON === 'function';
}

function serializeValue(
  value: unknown,
  path: string,
  stack: Set<object>
): string {
  switch (typeof value) {
    case 'string':
      return JSON.stringify(value);
    case 'boolean':
      return value ? 'true' : 'false';
    case 'number':
      if (!Number.isFinite(value)) fail(path, String(value));
      return JSON.stringify(value);
    case 'undefined':
      return fail(path, 'undefined');
    case 'bigint':
      return fail(path, 'bigint');
    case 'function':
      return fail(path, 'function');
    case 'symbol':
      return fail(path, 'symbol');
  }

  if (value === null || typeof value !== 'object') return 'null';
  if (stack.has(value)) fail(path, 'circular reference');
  if (
    value instanceof Map ||
    value instanceof Set ||
    value instanceof Promise
  ) {
    fail(path, value.constructor.name);
  }

  if (hasToJSON(value)) {
    return serializeValue(value.toJSON(), path, stack);
  }

  stack.add(value);
  try {
    if (Array.isArray(value)) {
      const parts: string[] = [];
      for (let i = 0; i < value.length; i++) {
        // A hole would come back as null on the client
        if (!(i in value)) fail(`${path}[${i}]`, 'array hole');
        const item: unknown = value[i];
        parts.push(serializeValue(item, `${path}[${i}]`, stack));
      }
      return `[${parts.join(',')}]`;
    }

    const parts: string[] = [];
    for (const key of Object.keys(value).sort()) {
      const item: unknown = Reflect.get(value, key);
      // Same as JSON: absent and undefined properties are indistinguishable
      if (item === undefined) continue;
      parts.push(
        `${JSON.stringify(key)}:${serializeValue(item, `${path}.${key}`, stack)}`
      );
    }
    return `{${parts.join(',')}}`;
  } finally {
    stack.delete(value);
  }
}

/**
 * Canonical JSON for a resolved bridge value. Throws an `internal-failure`
 * ResolutionError for values JSON cannot carry faithfully.
 */
export function serializeState(value: unknown): string {
  return serializeValue(value, '$', new Set());
}

export type HydrationEntry = Readonly<RegistryEntry>;

export class HydrationPayload {
  readonly version = HYDRATION_PAYLOAD_VERSION;
  readonly entries: readonly HydrationEntry[];
  private text: string | null = null;

  constructor(entries: readonly HydrationEntry[]) {
    this.entries = entries;
  }

  static empty(): HydrationPayload {
    return new HydrationPayload([]);
  }

  get size(): number {
    return this.entries.length;
  }

  slots(): number[] {
    return this.entries.map((e) => e.slot);
  }

  toString(): string {
    if (this.text === null) {
      const triples = this.entries.map(
        (e) => `[${e.slot},${JSON.stringify(e.key)},${e.state}]`
      );
      this.text = `{"v":${this.version},"slots":[${triples.join(',')}]}`;
    }
    return this.text;
  }

  toBytes(): Uint8Array {
    return encoder.encode(this.toString());
  }
}

export type HydratedSlot = {
  key: string;
  value: unknown;
};

function isRecord(value: unknown): value is Record<string, unknown> {
  return !!value && typeof value === 'object' && !Array.isArray(value);
}

/**
 * Decode a payload produced by HydrationPayload#toString (for example the
 * text content of the inline state script on the client).
 */
export function readHydrationPayload(text: string): Map<number, HydratedSlot> {
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (err) {
    throw new Error('hydration payload is not valid JSON', { cause: err });
  }
  if (!isRecord(parsed) || parsed.v !== HYDRATION_PAYLOAD_VERSION) {
    throw new Error(
      `unsupported hydration payload version: ${isRecord(parsed) ? String(parsed.v) : 'none'}`
    );
  }
  const slots = parsed.slots;
  if (!Array.isArray(slots)) {
    throw new Error('hydration payload is missing its slots array');
  }

  const out = new Map<number, HydratedSlot>();
  for (const entry of slots) {
    if (
      !Array.isArray(entry) ||
      entry.length !== 3 ||
      !Number.isInteger(entry[0]) ||
      typeof entry[1] !== 'string'
    ) {
      throw new Error(`malformed hydration entry: ${JSON.stringify(entry)}`);
    }
    const slot: number = entry[0];
    const key: string = entry[1];
    out.set(slot, { key, value: entry[2] });
  }
  return out;
}
