/**
 * Thrown error types for the wizard engine.
 *
 * Remote failures never use these: they travel as WizardFailure values
 * inside a StepOutcome. The classes here cover misuse of the engine
 * (writing a finalized slot, issuing a command in the wrong state) and
 * corrupt persisted input (snapshots, drafts, config).
 *
 * @module errors/engine-errors
 */

/**
 * Raised by WizardContext.set() when the slot has been finalized.
 */
export class ImmutableFieldError extends Error {
  override name = 'ImmutableFieldError' as const;

  constructor(public readonly key: string) {
    super(`Context field "${key}" is finalized and cannot be changed until the context is reset`);
  }
}

/**
 * Raised when a context slot is read or finalized before it was written.
 */
export class MissingFieldError extends Error {
  override name = 'MissingFieldError' as const;

  constructor(public readonly key: string) {
    super(`Context field "${key}" has not been written`);
  }
}

/**
 * Raised when a context snapshot fails schema validation on restore.
 */
export class ContextSnapshotError extends Error {
  override name = 'ContextSnapshotError' as const;

  constructor(message: string, public readonly issues: string[] = []) {
    super(message);
  }
}

/**
 * Raised when a controller command is not allowed in the wizard's current status.
 */
export class WizardStateError extends Error {
  override name = 'WizardStateError' as const;

  constructor(message: string, public readonly status?: string) {
    super(message);
  }
}

/**
 * Raised by the wizard builder for empty wizards or duplicate step ids.
 */
export class WizardDefinitionError extends Error {
  override name = 'WizardDefinitionError' as const;

  constructor(message: string) {
    super(message);
  }
}

export class DraftNotFoundError extends Error {
  override name = 'DraftNotFoundError' as const;

  constructor(public readonly draftId: string) {
    super(`Draft not found: ${draftId}`);
  }
}

/**
 * Raised when a stored draft cannot be parsed or fails schema validation.
 */
export class DraftCorruptError extends Error {
  override name = 'DraftCorruptError' as const;

  constructor(
    message: string,
    public readonly source?: string,
    public readonly issues: string[] = [],
  ) {
    super(message);
  }
}

/**
 * Raised when a draft id cannot be used as a file name (empty, traversal,
 * separators, null bytes).
 */
export class UnsafeDraftIdError extends Error {
  override name = 'UnsafeDraftIdError' as const;

  constructor(public readonly draftId: string, reason: string) {
    super(`Unsafe draft id "${draftId}": ${reason}`);
  }
}

/**
 * Raised when the config file is not valid JSON or fails schema validation.
 */
export class WizardConfigError extends Error {
  override name = 'WizardConfigError' as const;

  constructor(message: string, public readonly issues: string[] = []) {
    super(message);
  }
}
