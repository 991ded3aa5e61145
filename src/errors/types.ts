/**
 * Type definitions for remote results and normalized wizard failures.
 *
 * Defines:
 * - RemoteResult: what a RemoteStepService returns
 * - WizardFailure: the normalized failure surfaced to the presentation layer
 * - CATEGORY_POLICY: how each remote category maps to kind, outcome and action
 *
 * @module errors/types
 */

import { z } from 'zod';
import type { ContextRecord } from '../context/types.js';

// ============================================================================
// Field errors
// ============================================================================

export const FieldErrorSchema = z.object({
  field: z.string(),
  message: z.string(),
});

export type FieldError = z.infer<typeof FieldErrorSchema>;

// ============================================================================
// Remote results
// ============================================================================

/** All failure categories a remote service may report. */
export const REMOTE_FAILURE_CATEGORIES = [
  'Validation',
  'Unauthorized',
  'Forbidden',
  'NotFound',
  'Conflict',
  'ServerError',
  'NetworkError',
  'Timeout',
] as const;

export const RemoteFailureCategorySchema = z.enum(REMOTE_FAILURE_CATEGORIES);

export type RemoteFailureCategory = z.infer<typeof RemoteFailureCategorySchema>;

export interface RemoteSuccess {
  success: true;
  /** Identifiers created or returned by the remote side, written into the context. */
  identifiers: ContextRecord;
}

export interface RemoteFailure {
  success: false;
  category: RemoteFailureCategory;
  message: string;
  fieldErrors?: FieldError[];
}

export type RemoteResult = RemoteSuccess | RemoteFailure;

// ============================================================================
// Normalized failures
// ============================================================================

export type FailureKind =
  | 'local-validation'
  | 'remote-validation'
  | 'conflict'
  | 'auth'
  | 'transient'
  | 'rejected'
  | 'cancelled'
  | 'internal';

/** Call to action shown alongside a failure. */
export type RecoveryAction =
  | 'correct-fields'
  | 'view-conflict'
  | 'reauthenticate'
  | 'retry'
  | 'contact-support'
  | 'none';

export interface WizardFailure {
  kind: FailureKind;
  /** Remote category, or null for failures that did not come from a service. */
  category: RemoteFailureCategory | null;
  /** Message for the user; remote messages are kept verbatim. */
  message: string;
  fieldErrors: FieldError[];
  action: RecoveryAction;
  /** Step (or finish operation) that produced the failure. */
  stepId: string;
}

/** Whether a failure leaves the wizard on the step for a retry, or halts it. */
export type FailureSeverity = 'retryWithErrors' | 'fatal';

export interface CategoryPolicy {
  kind: FailureKind;
  severity: FailureSeverity;
  action: RecoveryAction;
}

/**
 * Remote category to failure policy.
 *
 * Only Unauthorized halts the wizard; every other category keeps the
 * wizard on the current step with index and guard unchanged.
 */
export const CATEGORY_POLICY: Record<RemoteFailureCategory, CategoryPolicy> = {
  Validation: { kind: 'remote-validation', severity: 'retryWithErrors', action: 'correct-fields' },
  Conflict: { kind: 'conflict', severity: 'retryWithErrors', action: 'view-conflict' },
  Unauthorized: { kind: 'auth', severity: 'fatal', action: 'reauthenticate' },
  Forbidden: { kind: 'rejected', severity: 'retryWithErrors', action: 'contact-support' },
  NotFound: { kind: 'rejected', severity: 'retryWithErrors', action: 'contact-support' },
  ServerError: { kind: 'transient', severity: 'retryWithErrors', action: 'retry' },
  NetworkError: { kind: 'transient', severity: 'retryWithErrors', action: 'retry' },
  Timeout: { kind: 'transient', severity: 'retryWithErrors', action: 'retry' },
};
