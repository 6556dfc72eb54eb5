/**
 * State registry for one render session
 *
 * Slots are allocated during discovery (pre-order) and filled as bridges
 * resolve, in whatever order that happens. Reads always come back in slot
 * order. Append-only: a slot is written at most once and nothing is written
 * after freeze().
 */

import { invariant } from '../dev/invariant';
import { InvalidTreeError } from '../common/ssr-errors';
import type { NodeId } from '../common/tree';
import { HydrationPayload } from '../ssr/hydration';

export type SlotInfo = {
  slot: number;
  node: NodeId;
  key: string;
};

export type RegistryEntry = SlotInfo & {
  /** Canonical JSON of the resolved value */
  state: string;
};

export class StateRegistry {
  private readonly slots: SlotInfo[] = [];
  private readonly states: Array<string | undefined> = [];
  private readonly keys = new Set<string>();
  private recorded = 0;
  private frozen = false;

  /** Reserve the next slot for a bridge node; returns its index */
  allocate(node: NodeId, key?: string): number {
    invariant(!this.frozen, 'allocate() after registry was frozen');
    const slot = this.slots.length;
    const k = key ?? `b${slot}`;
    if (this.keys.has(k)) {
      throw new InvalidTreeError(`duplicate bridge key "${k}" (node ${node})`);
    }
    this.keys.add(k);
    this.slots.push({ slot, node, key: k });
    this.states.push(undefined);
    return slot;
  }

  record(slot: number, state: string): void {
    invariant(!this.frozen, 'record() after registry was frozen', { slot });
    invariant(
      slot >= 0 && slot < this.slots.length,
      `record() for unallocated slot ${slot}`
    );
    invariant(
      this.states[slot] === undefined,
      `slot ${slot} was already recorded`
    );
    this.states[slot] = state;
    this.recorded++;
  }

  info(slot: number): SlotInfo {
    const info = this.slots[slot];
    invariant(info !== undefined, `unknown slot ${slot}`);
    return info;
  }

  get size(): number {
    return this.slots.length;
  }

  get recordedCount(): number {
    return this.recorded;
  }

  freeze(): void {
    this.frozen = true;
  }

  isFrozen(): boolean {
    return this.frozen;
  }

  /** Recorded entries in slot order; unresolved slots are omitted */
  entries(): RegistryEntry[] {
    const out: RegistryEntry[] = [];
    for (let i = 0; i < this.slots.length; i++) {
      const state = this.states[i];
      if (state !== undefined) out.push({ ...this.slots[i], state });
    }
    return out;
  }

  /** Hydration payload of everything recorded so far */
  toPayload(): HydrationPayload {
    return new HydrationPayload(this.entries());
  }

  allSlots(): readonly SlotInfo[] {
    return this.slots;
  }
}
