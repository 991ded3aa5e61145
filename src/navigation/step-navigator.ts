/**
 * StepNavigator: sequencing and transition gating over a fixed step list.
 *
 * Forward transitions validate, then run the step's onNext and map its
 * tri-state outcome onto a navigation result. Backward transitions only
 * hide and show: they never validate and never call onNext, so they can
 * never trigger a remote mutation.
 *
 * The index is always within [0, N-1]. An advance on the last step does
 * not increment; it reports `ready-to-finish` and the controller decides
 * what finishing means.
 *
 * @module navigation/step-navigator
 */

import type { WizardContext } from '../context/wizard-context.js';
import type { IdempotencyGuard } from '../guard/idempotency-guard.js';
import type { FieldError, WizardFailure } from '../errors/types.js';
import { WizardStateError } from '../errors/engine-errors.js';
import { classifyThrown } from '../errors/error-classifier.js';
import { outcomeFromClassified } from '../steps/remote-operation.js';
import { VALID_STEP_TRANSITIONS } from '../steps/types.js';
import type { StepContract, StepOutcome, StepState, StepStatus } from '../steps/types.js';

// ============================================================================
// Results
// ============================================================================

export type NextResult =
  | { kind: 'moved'; from: number; to: number }
  | { kind: 'ready-to-finish' }
  | { kind: 'invalid'; errors: FieldError[] }
  | { kind: 'retry'; failure: WizardFailure }
  | { kind: 'fatal'; failure: WizardFailure };

export type BackResult = { kind: 'moved'; from: number; to: number } | { kind: 'stayed' };

// ============================================================================
// Navigator
// ============================================================================

export class StepNavigator {
  private index = 0;
  private statuses: StepStatus[];

  constructor(
    private readonly steps: readonly StepContract[],
    private readonly context: WizardContext,
    private readonly guard: IdempotencyGuard,
  ) {
    if (steps.length === 0) {
      throw new WizardStateError('A navigator needs at least one step');
    }
    this.statuses = steps.map((): StepStatus => 'not-started');
  }

  current(): number {
    return this.index;
  }

  canGoBack(): boolean {
    return this.index > 0;
  }

  isLast(): boolean {
    return this.index === this.steps.length - 1;
  }

  currentStep(): StepContract {
    return this.stepAt(this.index);
  }

  stepStates(): StepState[] {
    return this.statuses.map((status, index) => ({ index, status }));
  }

  completedCount(): number {
    return this.statuses.filter((s) => s === 'completed').length;
  }

  /**
   * Position as a percentage: 0 on the first step, 100 on the last.
   */
  progress(): number {
    if (this.steps.length <= 1) return 0;
    return Math.round((this.index / (this.steps.length - 1)) * 100);
  }

  /**
   * Show the current step. Runs setup on first activation.
   */
  activate(): void {
    const step = this.currentStep();
    step.setup();
    this.transition(this.index, 'active');
    step.onShow(this.context.readOnlyView());
  }

  /**
   * Attempt a forward transition from the current step.
   */
  async goNext(signal: AbortSignal): Promise<NextResult> {
    const step = this.currentStep();
    const from = this.index;

    let outcome: StepOutcome;
    try {
      const validation = step.validate(this.context.readOnlyView());
      if (!validation.valid) {
        return { kind: 'invalid', errors: validation.errors };
      }
      outcome = await step.onNext(this.context, { guard: this.guard, signal });
    } catch (err) {
      outcome = outcomeFromClassified(classifyThrown(err, step.id, signal));
    }

    switch (outcome.kind) {
      case 'retryWithErrors':
        return { kind: 'retry', failure: outcome.failure };
      case 'fatal':
        return { kind: 'fatal', failure: outcome.failure };
      case 'advance':
        break;
    }

    this.transition(from, 'completed');
    if (this.isLast()) {
      return { kind: 'ready-to-finish' };
    }

    step.onHide(this.context.readOnlyView());
    this.index = from + 1;
    this.activate();
    return { kind: 'moved', from, to: this.index };
  }

  /**
   * Move one step back. No-op on the first step.
   */
  goBack(): BackResult {
    return this.canGoBack() ? this.goTo(this.index - 1) : { kind: 'stayed' };
  }

  /**
   * Jump back to an earlier step, e.g. from a review step to the step that
   * owns a field. The current index is a no-op.
   */
  goTo(index: number): BackResult {
    if (!Number.isInteger(index) || index < 0 || index > this.index) {
      throw new WizardStateError(`Cannot jump to step ${index} from step ${this.index}`);
    }
    if (index === this.index) {
      return { kind: 'stayed' };
    }
    const from = this.index;
    this.currentStep().onHide(this.context.readOnlyView());
    this.index = index;
    this.activate();
    return { kind: 'moved', from, to: this.index };
  }

  /**
   * Jump to a saved index without running validate or onNext.
   *
   * Without saved statuses, steps before the index count as completed.
   */
  restore(index: number, statuses?: readonly StepStatus[]): void {
    if (!Number.isInteger(index) || index < 0 || index >= this.steps.length) {
      throw new WizardStateError(`Step index ${index} is out of range 0..${this.steps.length - 1}`);
    }

    if (statuses && statuses.length === this.steps.length) {
      this.statuses = [...statuses];
    } else {
      this.statuses = this.steps.map((_, i): StepStatus => (i < index ? 'completed' : 'not-started'));
    }
    this.index = index;
    this.activate();
  }

  /**
   * Back to the first step with every step not started. Does not show it.
   */
  reset(): void {
    this.index = 0;
    this.statuses = this.steps.map((): StepStatus => 'not-started');
  }

  private stepAt(index: number): StepContract {
    const step = this.steps[index];
    if (!step) {
      throw new WizardStateError(`No step at index ${index}`);
    }
    return step;
  }

  private transition(index: number, to: StepStatus): void {
    const from = this.statuses[index] ?? 'not-started';
    if (from === to) return;
    if (!VALID_STEP_TRANSITIONS[from].includes(to)) {
      throw new WizardStateError(`Invalid step transition: ${from} -> ${to}`);
    }
    this.statuses[index] = to;
  }
}
