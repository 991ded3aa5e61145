/**
 * Error taxonomy and classification.
 *
 * @module errors
 */

export {
  ImmutableFieldError,
  MissingFieldError,
  ContextSnapshotError,
  WizardStateError,
  WizardDefinitionError,
  DraftNotFoundError,
  DraftCorruptError,
  UnsafeDraftIdError,
  WizardConfigError,
} from './engine-errors.js';

export {
  FieldErrorSchema,
  REMOTE_FAILURE_CATEGORIES,
  RemoteFailureCategorySchema,
  CATEGORY_POLICY,
} from './types.js';
export type {
  FieldError,
  RemoteFailureCategory,
  RemoteSuccess,
  RemoteFailure,
  RemoteResult,
  FailureKind,
  RecoveryAction,
  WizardFailure,
  FailureSeverity,
  CategoryPolicy,
} from './types.js';

export {
  RemoteCallError,
  classifyRemoteFailure,
  classifyThrown,
  cancelledFailure,
  localValidationFailure,
  isRemoteFailureCategory,
} from './error-classifier.js';
export type { ClassifiedFailure } from './error-classifier.js';

export { categoryFromHttpStatus, extractFieldErrors, failureFromHttpResponse } from './http-mapping.js';
