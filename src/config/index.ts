/**
 * Wizard engine configuration.
 *
 * @module config
 */

export {
  WizardConfigSchema,
  DraftsConfigSchema,
  JournalConfigSchema,
  CancelConfigSchema,
  ReferenceConfigSchema,
  DEFAULT_WIZARD_CONFIG,
} from './schema.js';
export type { WizardConfig } from './schema.js';
export { readWizardConfig, validateWizardConfig, DEFAULT_CONFIG_PATH } from './reader.js';
export type { ConfigValidation } from './reader.js';
