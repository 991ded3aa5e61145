/**
 * Step contract, base step classes and the wizard builder.
 *
 * @module steps
 */

export { STEP_STATUSES, StepStatusSchema, VALID_STEP_TRANSITIONS } from './types.js';
export type {
  StepStatus,
  StepState,
  ValidationResult,
  StepOutcome,
  StepExecution,
  StepContract,
  RemoteCallOptions,
  RemoteStepService,
  StepDescriptor,
  FinishOperation,
  WizardDefinition,
} from './types.js';

export { validationResult, mergeValidationResults, requirementErrors, requireValue } from './validation.js';

export { WizardStep } from './wizard-step.js';
export type { WizardStepOptions, FieldValidator } from './wizard-step.js';

export { RemoteStep } from './remote-step.js';
export type { RemoteStepOptions } from './remote-step.js';

export { runRemoteOperation, outcomeFromClassified } from './remote-operation.js';
export type { RemoteOperation } from './remote-operation.js';

export { WizardBuilder, defineWizard, DEFAULT_FINISH_ID } from './wizard-builder.js';
export type { WizardBuilderOptions, FinishOptions } from './wizard-builder.js';
