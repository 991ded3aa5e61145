/**
 * Builder for wizard definitions.
 *
 * Produces a frozen WizardDefinition whose step list is fixed before any
 * controller starts. Steps are registered as descriptors with a factory,
 * so every wizard instance gets its own step objects and local state.
 *
 * ```typescript
 * const intake = defineWizard('office-intake', { referencePrefix: 'SRV' })
 *   .step('select-entity', () => new WizardStep({ ... }))
 *   .step('create-unit', () => new RemoteStep({ ... }))
 *   .finish({ id: 'submit', service: submitService })
 *   .build();
 * ```
 *
 * @module steps/wizard-builder
 */

import { WizardDefinitionError } from '../errors/engine-errors.js';
import type { FinishOperation, RemoteStepService, StepContract, StepDescriptor, WizardDefinition } from './types.js';

/** Guard key used for the finish operation when none is given. */
export const DEFAULT_FINISH_ID = 'finish';

export interface WizardBuilderOptions {
  title?: string;
  referencePrefix?: string;
}

export interface FinishOptions {
  id?: string;
  service: RemoteStepService;
  produces?: readonly string[];
}

export class WizardBuilder {
  private readonly steps: StepDescriptor[] = [];
  private finishOperation: FinishOperation | null = null;

  constructor(
    private readonly id: string,
    private readonly options: WizardBuilderOptions = {},
  ) {}

  /**
   * Append a step. The factory must return a step whose id matches.
   */
  step(id: string, create: () => StepContract): this {
    if (this.steps.some((s) => s.id === id)) {
      throw new WizardDefinitionError(`Duplicate step id "${id}" in wizard "${this.id}"`);
    }

    const stepId = id;
    const wizardId = this.id;
    this.steps.push(
      Object.freeze({
        id: stepId,
        create(): StepContract {
          const step = create();
          if (step.id !== stepId) {
            throw new WizardDefinitionError(
              `Step factory for "${stepId}" in wizard "${wizardId}" returned a step with id "${step.id}"`,
            );
          }
          return step;
        },
      }),
    );
    return this;
  }

  finish(options: FinishOptions): this {
    this.finishOperation = Object.freeze({
      id: options.id ?? DEFAULT_FINISH_ID,
      service: options.service,
      produces: Object.freeze([...(options.produces ?? [])]),
    });
    return this;
  }

  build(): WizardDefinition {
    if (this.steps.length === 0) {
      throw new WizardDefinitionError(`Wizard "${this.id}" has no steps`);
    }
    if (this.finishOperation && this.steps.some((s) => s.id === this.finishOperation?.id)) {
      throw new WizardDefinitionError(
        `Finish id "${this.finishOperation.id}" collides with a step id in wizard "${this.id}"`,
      );
    }

    return Object.freeze({
      id: this.id,
      title: this.options.title ?? this.id,
      referencePrefix: this.options.referencePrefix ?? null,
      steps: Object.freeze([...this.steps]),
      finish: this.finishOperation,
    });
  }
}

export function defineWizard(id: string, options: WizardBuilderOptions = {}): WizardBuilder {
  return new WizardBuilder(id, options);
}
