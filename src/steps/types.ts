/**
 * Type definitions for wizard steps.
 *
 * Defines:
 * - StepStatus / StepState: per-step lifecycle position
 * - ValidationResult: output of a step's validate()
 * - StepOutcome: tri-state result of onNext()
 * - StepContract: the interface every step variant implements
 * - RemoteStepService: per-step side-effecting boundary
 * - StepDescriptor / FinishOperation / WizardDefinition: builder output
 *
 * @module steps/types
 */

import { z } from 'zod';
import type { ContextReader, ContextRecord, ContextValue } from '../context/types.js';
import type { WizardContext } from '../context/wizard-context.js';
import type { IdempotencyGuard } from '../guard/idempotency-guard.js';
import type { FieldError, RemoteResult, WizardFailure } from '../errors/types.js';

// ============================================================================
// Step state
// ============================================================================

export const STEP_STATUSES = ['not-started', 'active', 'completed'] as const;

export const StepStatusSchema = z.enum(STEP_STATUSES);

export type StepStatus = z.infer<typeof StepStatusSchema>;

export interface StepState {
  index: number;
  status: StepStatus;
}

/**
 * Allowed step status transitions.
 *
 * A completed step becomes active again when navigation returns to it;
 * nothing moves a step back to not-started except a navigator reset.
 */
export const VALID_STEP_TRANSITIONS: Record<StepStatus, readonly StepStatus[]> = {
  'not-started': ['active'],
  active: ['completed'],
  completed: ['active'],
};

// ============================================================================
// Validation and outcomes
// ============================================================================

export interface ValidationResult {
  valid: boolean;
  errors: FieldError[];
}

export type StepOutcome =
  | { kind: 'advance' }
  | { kind: 'retryWithErrors'; failure: WizardFailure }
  | { kind: 'fatal'; failure: WizardFailure };

/**
 * Per-call collaborators handed to onNext.
 *
 * The guard belongs to the wizard instance, the signal to the single
 * in-flight operation; it aborts when the wizard is cancelled.
 */
export interface StepExecution {
  guard: IdempotencyGuard;
  signal: AbortSignal;
}

// ============================================================================
// Step contract
// ============================================================================

export interface StepContract {
  readonly id: string;
  readonly title: string;
  readonly description: string;
  /** Context keys that earlier steps must have written and finalized. */
  readonly requires: readonly string[];
  /** True when onNext performs a remote mutation gated by the guard. */
  readonly remote: boolean;

  /** Runs once before the first activation. Idempotent, no side effects. */
  setup(): void;
  /** Runs on every activation. Reads the context, never writes it. */
  onShow(context: ContextReader): void;
  /** Pure: identical inputs give identical results. */
  validate(context: ContextReader): ValidationResult;
  onNext(context: WizardContext, execution: StepExecution): Promise<StepOutcome>;
  /** Bookkeeping on exit in either direction. No remote calls. */
  onHide(context: ContextReader): void;
  collectData(): ContextRecord;
  /** Write one field of the local editable copy. */
  edit(field: string, value: ContextValue): void;
}

// ============================================================================
// External boundary
// ============================================================================

export interface RemoteCallOptions {
  signal: AbortSignal;
}

/**
 * Side-effecting call made by a remote step (or the finish operation).
 *
 * Receives a read-only view of the context; returned identifiers are
 * written into the context by the engine.
 */
export interface RemoteStepService {
  execute(context: ContextReader, options: RemoteCallOptions): Promise<RemoteResult>;
}

// ============================================================================
// Wizard definition
// ============================================================================

export interface StepDescriptor {
  readonly id: string;
  /** Builds a fresh step; each wizard instance owns its own step objects. */
  create(): StepContract;
}

export interface FinishOperation {
  /** Guard key for the finish mutation. */
  readonly id: string;
  readonly service: RemoteStepService;
  /** Identifier keys to finalize after a successful finish. */
  readonly produces: readonly string[];
}

export interface WizardDefinition {
  readonly id: string;
  readonly title: string;
  /** Reference number prefix; null falls back to the configured prefix. */
  readonly referencePrefix: string | null;
  readonly steps: readonly StepDescriptor[];
  readonly finish: FinishOperation | null;
}
