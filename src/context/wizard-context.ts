/**
 * WizardContext: the shared state bag passed between steps.
 *
 * Each wizard instance owns exactly one context; it is the only channel
 * through which steps exchange data. Values are deep-copied on the way in
 * and out so no caller can mutate a slot behind the context's back.
 *
 * A slot marked finalized is immutable until reset() clears the context.
 *
 * @module context/wizard-context
 */

import { ImmutableFieldError, MissingFieldError, ContextSnapshotError } from '../errors/engine-errors.js';
import { ContextSnapshotSchema } from './types.js';
import type { ContextReader, ContextSnapshot, ContextValue } from './types.js';

export class WizardContext implements ContextReader {
  private slots = new Map<string, ContextValue>();
  private finalized = new Set<string>();

  constructor(initial?: ContextSnapshot) {
    if (initial) {
      this.restoreFromSnapshot(initial);
    }
  }

  get(key: string): ContextValue | undefined {
    const value = this.slots.get(key);
    return value === undefined ? undefined : structuredClone(value);
  }

  /**
   * Get a slot that must already exist.
   *
   * @throws {MissingFieldError} If the slot was never written
   */
  require(key: string): ContextValue {
    const value = this.get(key);
    if (value === undefined) {
      throw new MissingFieldError(key);
    }
    return value;
  }

  has(key: string): boolean {
    return this.slots.has(key);
  }

  /**
   * Write a slot.
   *
   * @throws {ImmutableFieldError} If the slot is finalized
   */
  set(key: string, value: ContextValue): void {
    if (this.finalized.has(key)) {
      throw new ImmutableFieldError(key);
    }
    this.slots.set(key, structuredClone(value));
  }

  /**
   * Freeze a written slot until the next reset.
   *
   * Finalizing an already finalized slot is a no-op.
   *
   * @throws {MissingFieldError} If the slot was never written
   */
  markFinalized(key: string): void {
    if (!this.slots.has(key)) {
      throw new MissingFieldError(key);
    }
    this.finalized.add(key);
  }

  isFinalized(key: string): boolean {
    return this.finalized.has(key);
  }

  keys(): string[] {
    return [...this.slots.keys()];
  }

  toSnapshot(): ContextSnapshot {
    const slots: Record<string, ContextValue> = {};
    for (const [key, value] of this.slots) {
      slots[key] = structuredClone(value);
    }
    return { slots, finalized: [...this.finalized] };
  }

  /**
   * Replace the whole context with a snapshot.
   *
   * The snapshot is validated first; on failure the current state is left
   * untouched. Finalized keys without a slot value are rejected.
   *
   * @throws {ContextSnapshotError} If the snapshot is malformed
   */
  restoreFromSnapshot(snapshot: unknown): void {
    const result = ContextSnapshotSchema.safeParse(snapshot);
    if (!result.success) {
      const issues = result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
      throw new ContextSnapshotError(`Invalid context snapshot:\n${issues.join('\n')}`, issues);
    }

    const { slots, finalized } = result.data;
    const orphans = finalized.filter((key) => !(key in slots));
    if (orphans.length > 0) {
      throw new ContextSnapshotError(
        `Invalid context snapshot: finalized keys without a value: ${orphans.join(', ')}`,
        orphans.map((key) => `finalized: ${key} has no slot`),
      );
    }

    this.slots = new Map(Object.entries(structuredClone(slots)));
    this.finalized = new Set(finalized);
  }

  /**
   * A view exposing only the read methods, for code that must not write:
   * onShow/onHide/validate and remote services.
   */
  readOnlyView(): ContextReader {
    return Object.freeze({
      get: (key: string) => this.get(key),
      require: (key: string) => this.require(key),
      has: (key: string) => this.has(key),
      isFinalized: (key: string) => this.isFinalized(key),
      keys: () => this.keys(),
      toSnapshot: () => this.toSnapshot(),
    });
  }

  /**
   * Explicit reset: drop every slot and every finalized mark.
   */
  reset(): void {
    this.slots.clear();
    this.finalized.clear();
  }
}
