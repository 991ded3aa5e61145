/**
 * Controller status, command results and options.
 *
 * @module controller/types
 */

import type { ContextRecord } from '../context/types.js';
import type { GuardFlags } from '../guard/idempotency-guard.js';
import type { FieldError, WizardFailure } from '../errors/types.js';
import type { DraftStore } from '../drafts/types.js';
import type { JournalSink } from '../journal/types.js';
import type { StepStatus } from '../steps/types.js';

// ============================================================================
// Status
// ============================================================================

/**
 * Wizard lifecycle.
 *
 * idle -> active -> completed | cancelled. `awaiting-auth` is a recoverable
 * halt left through reauthenticated(); `halted` follows an internal failure
 * and only allows saving, reset or cancel.
 */
export const WIZARD_STATUSES = ['idle', 'active', 'awaiting-auth', 'halted', 'completed', 'cancelled'] as const;

export type WizardStatus = (typeof WIZARD_STATUSES)[number];

// ============================================================================
// Command results
// ============================================================================

export type BusyResult = { kind: 'busy' };

export type FinishResult =
  | { kind: 'finished'; referenceNumber: string; identifiers: ContextRecord }
  | { kind: 'rejected'; reason: string }
  | { kind: 'retry'; failure: WizardFailure }
  | { kind: 'fatal'; failure: WizardFailure }
  | BusyResult;

export type NextCommandResult =
  | { kind: 'moved'; from: number; to: number }
  | { kind: 'invalid'; errors: FieldError[] }
  | FinishResult;

export type PreviousCommandResult = { kind: 'moved'; from: number; to: number } | { kind: 'stayed' } | BusyResult;

export type CancelResult =
  | { kind: 'cancelled'; committedSteps: string[] }
  | { kind: 'confirmation-required'; committedSteps: string[] };

export interface CancelOptions {
  /** Skip the confirmation for committed remote steps. */
  confirmed?: boolean;
}

// ============================================================================
// State view
// ============================================================================

export interface StepView {
  index: number;
  id: string;
  title: string;
  status: StepStatus;
  remote: boolean;
  committed: boolean;
}

export interface WizardStateView {
  wizardId: string;
  instanceId: string;
  referenceNumber: string;
  status: WizardStatus;
  currentIndex: number;
  currentStepId: string;
  steps: StepView[];
  guardFlags: GuardFlags;
  progress: number;
  lastFailure: WizardFailure | null;
  busy: boolean;
  draftSaved: boolean;
}

// ============================================================================
// Options
// ============================================================================

/**
 * Asked before cancelling a wizard that has committed remote steps.
 */
export type ConfirmCancel = (committedSteps: string[]) => boolean | Promise<boolean>;

export interface WizardControllerOptions {
  draftStore?: DraftStore;
  journal?: JournalSink;
  confirmCancel?: ConfirmCancel;
  /** Default true. When false, cancel never asks for confirmation. */
  requireCancelConfirmation?: boolean;
  /** Used when the wizard definition sets no prefix. */
  referencePrefix?: string;
  /** Instance id, also used as the draft id. Generated when omitted. */
  instanceId?: string;
  now?: () => Date;
}
