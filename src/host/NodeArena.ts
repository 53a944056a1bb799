/**
 * Node Arena
 *
 * Generational slot storage. An id packs a slot index and the generation the
 * slot had when the value was stored:
 *
 *   id = generation * SLOT_SPAN + slot
 *
 * Releasing a slot bumps its generation, so an id handed out earlier can be told
 * apart from one that was never issued. Slot 0 is never allocated (id 0 is the root).
 */

import type { ViewId } from '../shared';
import { StaleViewIdError, UnknownViewIdError } from './engine/types';

export const SLOT_SPAN = 2 ** 21;

interface Slot<T> {
  generation: number;
  value: T | null;
}

export class NodeArena<T> {
  private slots: Array<Slot<T>> = [{ generation: 0, value: null }];
  private freeList: number[] = [];
  private liveCount = 0;

  /**
   * Store a value produced by `create` for the id of a fresh slot
   */
  allocate(create: (id: ViewId) => T): ViewId {
    let slotIndex = this.freeList.pop();
    if (slotIndex === undefined) {
      slotIndex = this.slots.length;
      if (slotIndex >= SLOT_SPAN) {
        throw new RangeError(`Node arena is full (${SLOT_SPAN - 1} live nodes)`);
      }
      this.slots.push({ generation: 0, value: null });
    }
    const slot = this.slotAt(slotIndex);
    const id = slot.generation * SLOT_SPAN + slotIndex;
    try {
      slot.value = create(id);
    } catch (error) {
      // The id was never issued; the slot goes back at the same generation
      this.freeList.push(slotIndex);
      throw error;
    }
    this.liveCount++;
    return id;
  }

  /**
   * @throws StaleViewIdError when the id's slot has been released since
   * @throws UnknownViewIdError when the id was never issued
   */
  get(id: ViewId): T {
    const value = this.tryGet(id);
    if (value !== null) return value;
    if (this.isStale(id)) throw new StaleViewIdError(id);
    throw new UnknownViewIdError(id);
  }

  tryGet(id: ViewId): T | null {
    const decoded = decodeViewId(id);
    if (!decoded || decoded.slot === 0) return null;
    const slot = this.slots[decoded.slot];
    if (!slot || slot.generation !== decoded.generation) return null;
    return slot.value;
  }

  has(id: ViewId): boolean {
    return this.tryGet(id) !== null;
  }

  /**
   * Whether `id` was issued by this arena and has been released since
   */
  isStale(id: ViewId): boolean {
    const decoded = decodeViewId(id);
    if (!decoded || decoded.slot === 0) return false;
    const slot = this.slots[decoded.slot];
    if (!slot) return false;
    return decoded.generation < slot.generation;
  }

  /**
   * Release the slot behind `id`. Returns false when the id is not live.
   */
  release(id: ViewId): boolean {
    if (!this.has(id)) return false;
    const decoded = decodeViewId(id);
    if (!decoded) return false;
    const slot = this.slotAt(decoded.slot);
    slot.value = null;
    slot.generation++;
    this.freeList.push(decoded.slot);
    this.liveCount--;
    return true;
  }

  /**
   * Release every live slot
   */
  clear(): void {
    for (let index = 1; index < this.slots.length; index++) {
      const slot = this.slotAt(index);
      if (slot.value !== null) {
        slot.value = null;
        slot.generation++;
        this.freeList.push(index);
      }
    }
    this.liveCount = 0;
  }

  /**
   * Live values in slot order
   */
  *values(): IterableIterator<T> {
    for (const slot of this.slots) {
      if (slot.value !== null) yield slot.value;
    }
  }

  get size(): number {
    return this.liveCount;
  }

  private slotAt(index: number): Slot<T> {
    const slot = this.slots[index];
    if (!slot) {
      throw new RangeError(`Slot ${index} out of range`);
    }
    return slot;
  }
}

/**
 * Split an id into slot and generation; null for values that cannot be ids
 */
export function decodeViewId(id: ViewId): { slot: number; generation: number } | null {
  if (!Number.isSafeInteger(id) || id < 0) return null;
  return { slot: id % SLOT_SPAN, generation: Math.floor(id / SLOT_SPAN) };
}
