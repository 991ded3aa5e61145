/**
 * IdempotencyGuard: per-step record of committed remote mutations.
 *
 * A flag only moves from false to true. The only ways back are reset()
 * for one step and resetAll(), which the controller calls when the
 * context is explicitly reset or destroyed. Nothing in navigation
 * clears a flag.
 *
 * Keyed by step id, never by navigation count or UI state, so repeated
 * forward navigation over a committed step cannot fire its mutation twice.
 */

import { z } from 'zod';

/** Serialized guard flags, as stored in a draft. */
export const GuardFlagsSchema = z.record(z.string(), z.boolean());

export type GuardFlags = z.infer<typeof GuardFlagsSchema>;

export class IdempotencyGuard {
  private committed = new Set<string>();

  hasCommitted(stepId: string): boolean {
    return this.committed.has(stepId);
  }

  markCommitted(stepId: string): void {
    this.committed.add(stepId);
  }

  reset(stepId: string): void {
    this.committed.delete(stepId);
  }

  resetAll(): void {
    this.committed.clear();
  }

  anyCommitted(): boolean {
    return this.committed.size > 0;
  }

  /** Committed step ids in the order they were committed. */
  committedSteps(): string[] {
    return [...this.committed];
  }

  /**
   * Flags for every known step id.
   *
   * Ids passed in `knownIds` appear with `false` when not committed, so a
   * draft records the full picture rather than only the true flags.
   */
  toFlags(knownIds: readonly string[] = []): GuardFlags {
    const flags: GuardFlags = {};
    for (const id of knownIds) {
      flags[id] = this.committed.has(id);
    }
    for (const id of this.committed) {
      flags[id] = true;
    }
    return flags;
  }

  /**
   * Replace all flags with those from a draft.
   */
  restoreFlags(flags: GuardFlags): void {
    this.committed = new Set(
      Object.entries(flags)
        .filter(([, value]) => value)
        .map(([id]) => id),
    );
  }
}
