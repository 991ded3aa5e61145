/**
 * Normalizes remote failures and thrown errors into WizardFailure values.
 *
 * Every failure produced inside onNext or finish passes through here
 * before it reaches the navigator, so the navigator only ever sees a
 * classified failure with a severity.
 *
 * @module errors/error-classifier
 */

import { CATEGORY_POLICY, REMOTE_FAILURE_CATEGORIES } from './types.js';
import type {
  FailureSeverity,
  FieldError,
  RemoteFailure,
  RemoteFailureCategory,
  WizardFailure,
} from './types.js';

/**
 * Error a service may throw instead of returning a failed RemoteResult.
 *
 * Lets services built on exception-based HTTP clients report a category
 * without having to wrap every call in a result object.
 */
export class RemoteCallError extends Error {
  override name = 'RemoteCallError' as const;

  constructor(
    public readonly category: RemoteFailureCategory,
    message: string,
    public readonly fieldErrors: FieldError[] = [],
  ) {
    super(message);
  }
}

export interface ClassifiedFailure {
  severity: FailureSeverity;
  failure: WizardFailure;
}

/** Node socket error codes that mean the request never got an answer. */
const NETWORK_ERROR_CODES = new Set([
  'ECONNREFUSED',
  'ECONNRESET',
  'ENOTFOUND',
  'EAI_AGAIN',
  'EHOSTUNREACH',
  'ENETUNREACH',
  'EPIPE',
]);

const TIMEOUT_ERROR_CODES = new Set(['ETIMEDOUT', 'ESOCKETTIMEDOUT', 'UND_ERR_CONNECT_TIMEOUT']);

export function isRemoteFailureCategory(value: string): value is RemoteFailureCategory {
  return (REMOTE_FAILURE_CATEGORIES as readonly string[]).includes(value);
}

/**
 * Classify a failed RemoteResult.
 */
export function classifyRemoteFailure(result: RemoteFailure, stepId: string): ClassifiedFailure {
  const policy = CATEGORY_POLICY[result.category];
  return {
    severity: policy.severity,
    failure: {
      kind: policy.kind,
      category: result.category,
      message: result.message,
      fieldErrors: result.fieldErrors ?? [],
      action: policy.action,
      stepId,
    },
  };
}

function errorCode(err: Error): string | undefined {
  if ('code' in err && typeof err.code === 'string') {
    return err.code;
  }
  if (err.cause instanceof Error) {
    return errorCode(err.cause);
  }
  return undefined;
}

/**
 * Classify anything thrown out of a step or service call.
 *
 * - RemoteCallError keeps its category
 * - an aborted wizard signal means the wizard was cancelled
 * - TimeoutError, socket timeouts and an AbortError the service raised on
 *   its own are transient Timeout failures
 * - socket-level errors and `fetch failed` are transient NetworkError failures
 * - anything else is an internal failure and halts the wizard
 */
export function classifyThrown(err: unknown, stepId: string, signal?: AbortSignal): ClassifiedFailure {
  if (err instanceof RemoteCallError) {
    return classifyRemoteFailure(
      { success: false, category: err.category, message: err.message, fieldErrors: err.fieldErrors },
      stepId,
    );
  }

  const error = err instanceof Error ? err : new Error(String(err));

  if (signal?.aborted) {
    return { severity: 'fatal', failure: cancelledFailure(stepId) };
  }

  const code = errorCode(error);

  if (
    error.name === 'TimeoutError' ||
    error.name === 'AbortError' ||
    (code !== undefined && TIMEOUT_ERROR_CODES.has(code))
  ) {
    return classifyRemoteFailure({ success: false, category: 'Timeout', message: error.message }, stepId);
  }

  if ((code !== undefined && NETWORK_ERROR_CODES.has(code)) || error.message === 'fetch failed') {
    return classifyRemoteFailure({ success: false, category: 'NetworkError', message: error.message }, stepId);
  }

  return {
    severity: 'fatal',
    failure: {
      kind: 'internal',
      category: null,
      message: error.message,
      fieldErrors: [],
      action: 'contact-support',
      stepId,
    },
  };
}

/** Failure for a response that arrived after the wizard was cancelled. */
export function cancelledFailure(stepId: string): WizardFailure {
  return {
    kind: 'cancelled',
    category: null,
    message: 'The wizard was cancelled before the operation completed',
    fieldErrors: [],
    action: 'none',
    stepId,
  };
}

/**
 * Failure built from local validation errors.
 *
 * Never persisted: it only describes why the navigator stayed put.
 */
export function localValidationFailure(errors: FieldError[], stepId: string): WizardFailure {
  return {
    kind: 'local-validation',
    category: null,
    message: errors.map((e) => `${e.field}: ${e.message}`).join('\n'),
    fieldErrors: errors,
    action: 'correct-fields',
    stepId,
  };
}
