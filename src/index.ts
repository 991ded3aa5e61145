// Context
export {
  WizardContext,
  ContextValueSchema,
  ContextSnapshotSchema,
  DEFAULT_REFERENCE_PREFIX,
  generateReferenceNumber,
  isReferenceNumber,
} from './context/index.js';
export type { ContextValue, ContextRecord, ContextSnapshot, ContextReader } from './context/index.js';

// Idempotency guard
export { IdempotencyGuard, GuardFlagsSchema } from './guard/index.js';
export type { GuardFlags } from './guard/index.js';

// Errors
export * from './errors/index.js';

// Steps and wizard definitions
export * from './steps/index.js';

// Navigation
export { StepNavigator } from './navigation/index.js';
export type { NextResult, BackResult } from './navigation/index.js';

// Controller
export * from './controller/index.js';

// Drafts
export * from './drafts/index.js';

// Journal
export * from './journal/index.js';

// Configuration
export * from './config/index.js';

// Runtime wiring
export { createWizardRuntime, loadWizardRuntime, runtimeOptions, createWizard } from './runtime.js';
export type { WizardRuntime } from './runtime.js';
