/**
 * Scriptable RemoteStepService for controller tests.
 *
 * Counts calls, records the context it saw, replays queued results before
 * falling back to success with the configured identifiers, and can hold a
 * call open until released.
 */

import type { ContextReader, ContextRecord, ContextSnapshot } from '../../context/types.js';
import type { RemoteResult } from '../../errors/types.js';
import type { RemoteCallOptions, RemoteStepService } from '../../steps/types.js';

export class FakeRemoteService implements RemoteStepService {
  calls = 0;
  seen: ContextSnapshot[] = [];
  lastSignal: AbortSignal | null = null;

  private readonly queued: Array<RemoteResult | Error> = [];
  private gate: Promise<void> | null = null;
  private openGate: (() => void) | null = null;

  constructor(private readonly identifiers: ContextRecord) {}

  /** Queue results (or errors to throw) for the next calls. */
  respondWith(...results: Array<RemoteResult | Error>): this {
    this.queued.push(...results);
    return this;
  }

  /** Hold the next calls open until release(). */
  hold(): void {
    this.gate = new Promise<void>((resolve) => {
      this.openGate = resolve;
    });
  }

  release(): void {
    this.openGate?.();
    this.gate = null;
    this.openGate = null;
  }

  async execute(context: ContextReader, options: RemoteCallOptions): Promise<RemoteResult> {
    this.calls += 1;
    this.seen.push(context.toSnapshot());
    this.lastSignal = options.signal;

    if (this.gate) {
      await this.gate;
    }

    const next = this.queued.shift();
    if (next instanceof Error) throw next;
    return next ?? { success: true, identifiers: structuredClone(this.identifiers) };
  }
}
