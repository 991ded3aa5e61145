/**
 * Wizard controller.
 *
 * @module controller
 */

export { WizardController } from './wizard-controller.js';
export { WIZARD_STATUSES } from './types.js';
export type {
  WizardStatus,
  BusyResult,
  FinishResult,
  NextCommandResult,
  PreviousCommandResult,
  CancelResult,
  CancelOptions,
  StepView,
  WizardStateView,
  ConfirmCancel,
  WizardControllerOptions,
} from './types.js';
