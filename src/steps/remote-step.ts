/**
 * RemoteStep: a step whose onNext performs a side-effecting remote call.
 *
 * onNext order:
 * 1. guard already committed -> return advance, no call, stored context wins
 * 2. reject changes to finalized fields
 * 3. write editable fields into the context
 * 4. run the remote operation (see runRemoteOperation)
 *
 * @module steps/remote-step
 */

import type { WizardContext } from '../context/wizard-context.js';
import { localValidationFailure } from '../errors/error-classifier.js';
import { runRemoteOperation } from './remote-operation.js';
import { WizardStep } from './wizard-step.js';
import type { WizardStepOptions } from './wizard-step.js';
import type { RemoteStepService, StepExecution, StepOutcome } from './types.js';

export interface RemoteStepOptions extends WizardStepOptions {
  service: RemoteStepService;
  /** Identifier keys returned by the service to finalize after success. */
  produces?: readonly string[];
}

export class RemoteStep extends WizardStep {
  override readonly remote = true;

  protected readonly service: RemoteStepService;
  protected readonly produces: readonly string[];

  constructor(options: RemoteStepOptions) {
    super(options);
    this.service = options.service;
    this.produces = [...(options.produces ?? [])];
  }

  override async onNext(context: WizardContext, execution: StepExecution): Promise<StepOutcome> {
    if (execution.guard.hasCommitted(this.id)) {
      return { kind: 'advance' };
    }

    const locked = this.lockedFieldErrors(context);
    if (locked.length > 0) {
      return { kind: 'retryWithErrors', failure: localValidationFailure(locked, this.id) };
    }

    this.writeFields(context);

    return runRemoteOperation(
      { id: this.id, service: this.service, finalizes: [...this.finalizes, ...this.produces] },
      context,
      execution,
    );
  }
}
