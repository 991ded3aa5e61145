/**
 * Wizard context module.
 *
 * @module context
 */

export { WizardContext } from './wizard-context.js';
export { ContextValueSchema, ContextSnapshotSchema } from './types.js';
export type { ContextValue, ContextRecord, ContextSnapshot, ContextReader } from './types.js';
export {
  DEFAULT_REFERENCE_PREFIX,
  generateReferenceNumber,
  isReferenceNumber,
} from './reference-number.js';
