/**
 * Method Registry - Host Side
 *
 * Capability table for host closures that script code may call.
 * - Each closure gets the next index (append-only)
 * - The script-visible wrapper carries only that index
 * - Cleared as a whole when the evaluation context is torn down
 */

import { InvariantError } from '../host/engine/types';
import type { NativeFunctionArgs, NativeMethod } from './types';

interface MethodEntry {
  name: string;
  fn: NativeMethod;
}

export class MethodRegistry {
  private entries: MethodEntry[] = [];

  /**
   * Register a closure and return its index
   */
  register(name: string, fn: NativeMethod): number {
    const index = this.entries.length;
    this.entries.push({ name, fn });
    return index;
  }

  /**
   * Invoke the closure registered at `index`
   */
  invoke(index: number, args: NativeFunctionArgs): void {
    const entry = this.entries[index];
    if (!entry) {
      throw new InvariantError(`No native method registered at index ${index}`);
    }
    entry.fn(args);
  }

  /**
   * Check if an index is registered
   */
  has(index: number): boolean {
    return index >= 0 && index < this.entries.length;
  }

  /**
   * Name a closure was registered under (for diagnostics)
   */
  nameOf(index: number): string | undefined {
    return this.entries[index]?.name;
  }

  /**
   * Clear all entries
   */
  clear(): void {
    this.entries = [];
  }

  /**
   * Get registered method count
   */
  get size(): number {
    return this.entries.length;
  }
}
