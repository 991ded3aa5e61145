/**
 * Shared execution of a guarded remote mutation.
 *
 * Used by RemoteStep.onNext and by the controller's finish operation, so
 * both apply the same order: call, discard if cancelled, classify a
 * failure, or on success mark the guard, write the returned identifiers
 * and finalize the declared keys.
 *
 * The caller checks the guard before calling this.
 *
 * @module steps/remote-operation
 */

import type { WizardContext } from '../context/wizard-context.js';
import type { RemoteResult } from '../errors/types.js';
import { cancelledFailure, classifyRemoteFailure, classifyThrown } from '../errors/error-classifier.js';
import type { ClassifiedFailure } from '../errors/error-classifier.js';
import type { RemoteStepService, StepExecution, StepOutcome } from './types.js';

export interface RemoteOperation {
  /** Guard key. */
  id: string;
  service: RemoteStepService;
  /** Keys to finalize after success: returned identifiers and step fields. */
  finalizes: readonly string[];
}

export function outcomeFromClassified(classified: ClassifiedFailure): StepOutcome {
  return classified.severity === 'fatal'
    ? { kind: 'fatal', failure: classified.failure }
    : { kind: 'retryWithErrors', failure: classified.failure };
}

export async function runRemoteOperation(
  operation: RemoteOperation,
  context: WizardContext,
  execution: StepExecution,
): Promise<StepOutcome> {
  const { guard, signal } = execution;

  let result: RemoteResult;
  try {
    result = await operation.service.execute(context.readOnlyView(), { signal });
  } catch (err) {
    return outcomeFromClassified(classifyThrown(err, operation.id, signal));
  }

  if (signal.aborted) {
    return { kind: 'fatal', failure: cancelledFailure(operation.id) };
  }

  if (!result.success) {
    return outcomeFromClassified(classifyRemoteFailure(result, operation.id));
  }

  // The remote record exists from here on; mark before any write can throw.
  guard.markCommitted(operation.id);

  for (const [key, value] of Object.entries(result.identifiers)) {
    if (!context.isFinalized(key)) {
      context.set(key, value);
    }
  }
  for (const key of operation.finalizes) {
    context.markFinalized(key);
  }

  return { kind: 'advance' };
}
