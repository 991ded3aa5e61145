/**
 * WizardStep: base implementation of the step contract for local steps.
 *
 * Handles the lifecycle plumbing every step shares:
 * - setup() runs initialize() exactly once
 * - onShow() pulls required inputs from the context on every activation and
 *   seeds the editable fields from the context on the first activation only,
 *   so re-entries keep the user's local edits
 * - validate() gates on required context keys, then on field rules
 * - onNext() writes the editable fields into the context and finalizes the
 *   declared keys
 *
 * Finalized fields are never overwritten. Re-submitting an unchanged value
 * is a no-op; a changed value is reported as a field error.
 *
 * @module steps/wizard-step
 */

import { isDeepStrictEqual } from 'node:util';
import type { ContextReader, ContextRecord, ContextValue } from '../context/types.js';
import type { WizardContext } from '../context/wizard-context.js';
import type { FieldError } from '../errors/types.js';
import { localValidationFailure } from '../errors/error-classifier.js';
import { requirementErrors, validationResult } from './validation.js';
import type { StepContract, StepExecution, StepOutcome, ValidationResult } from './types.js';

/** Field rule: returns errors for the step's current data. Must be pure. */
export type FieldValidator = (data: ContextRecord, context: ContextReader) => FieldError[];

export interface WizardStepOptions {
  id: string;
  title?: string;
  description?: string;
  /** Context keys earlier steps must have written and finalized. */
  requires?: readonly string[];
  /** Editable fields and their initial values. */
  fields?: ContextRecord;
  /** Field keys to finalize in the context once onNext succeeds. */
  finalizes?: readonly string[];
  validate?: FieldValidator;
}

export class WizardStep implements StepContract {
  readonly id: string;
  readonly title: string;
  readonly description: string;
  readonly requires: readonly string[];
  readonly remote: boolean = false;

  protected readonly finalizes: readonly string[];
  protected data: ContextRecord;
  /** Values pulled from the context for display; refreshed on every onShow. */
  protected inputs: ContextRecord = {};

  private readonly fieldValidator: FieldValidator | undefined;
  private initialized = false;
  private seeded = false;
  private shows = 0;
  private hides = 0;

  constructor(options: WizardStepOptions) {
    this.id = options.id;
    this.title = options.title ?? options.id;
    this.description = options.description ?? '';
    this.requires = [...(options.requires ?? [])];
    this.finalizes = [...(options.finalizes ?? [])];
    this.data = structuredClone(options.fields ?? {});
    this.fieldValidator = options.validate;
  }

  // --------------------------------------------------------------------------
  // Lifecycle
  // --------------------------------------------------------------------------

  setup(): void {
    if (this.initialized) return;
    this.initialize();
    this.initialized = true;
  }

  /** One-time preparation hook for subclasses. Must not have side effects. */
  protected initialize(): void {}

  onShow(context: ContextReader): void {
    this.setup();

    const inputs: ContextRecord = {};
    for (const key of this.requires) {
      const value = context.get(key);
      if (value !== undefined) inputs[key] = value;
    }
    this.inputs = inputs;

    if (!this.seeded) {
      for (const key of Object.keys(this.data)) {
        const value = context.get(key);
        if (value !== undefined) this.data[key] = value;
      }
      this.seeded = true;
    }

    this.shows += 1;
  }

  onHide(_context: ContextReader): void {
    this.hides += 1;
  }

  /** How many times the step has been shown and hidden. */
  get activations(): { shown: number; hidden: number } {
    return { shown: this.shows, hidden: this.hides };
  }

  // --------------------------------------------------------------------------
  // Data
  // --------------------------------------------------------------------------

  collectData(): ContextRecord {
    return structuredClone(this.data);
  }

  /**
   * Read a value pulled in from the context by the last onShow.
   */
  input(key: string): ContextValue | undefined {
    const value = this.inputs[key];
    return value === undefined ? undefined : structuredClone(value);
  }

  edit(field: string, value: ContextValue): void {
    if (!(field in this.data)) {
      throw new Error(`Unknown field "${field}" for step "${this.id}"`);
    }
    this.data[field] = structuredClone(value);
  }

  update(patch: ContextRecord): void {
    for (const [field, value] of Object.entries(patch)) {
      this.edit(field, value);
    }
  }

  // --------------------------------------------------------------------------
  // Validation
  // --------------------------------------------------------------------------

  validate(context: ContextReader): ValidationResult {
    return validationResult([
      ...requirementErrors(context, this.requires),
      ...this.validateFields(this.data, context),
    ]);
  }

  /** Field rules. Subclasses may override; the default uses the `validate` option. */
  protected validateFields(data: ContextRecord, context: ContextReader): FieldError[] {
    return this.fieldValidator ? this.fieldValidator(data, context) : [];
  }

  // --------------------------------------------------------------------------
  // Transition
  // --------------------------------------------------------------------------

  async onNext(context: WizardContext, _execution: StepExecution): Promise<StepOutcome> {
    const locked = this.lockedFieldErrors(context);
    if (locked.length > 0) {
      return { kind: 'retryWithErrors', failure: localValidationFailure(locked, this.id) };
    }

    this.writeFields(context);
    for (const key of this.finalizes) {
      context.markFinalized(key);
    }
    return { kind: 'advance' };
  }

  /**
   * Errors for finalized context fields whose local value has changed.
   */
  protected lockedFieldErrors(context: ContextReader): FieldError[] {
    const errors: FieldError[] = [];
    for (const [field, value] of Object.entries(this.data)) {
      if (context.isFinalized(field) && !isDeepStrictEqual(context.get(field), value)) {
        errors.push({ field, message: 'has already been committed and can no longer be changed' });
      }
    }
    return errors;
  }

  /**
   * Write every editable field, skipping finalized ones.
   *
   * Call lockedFieldErrors() first: skipped fields are assumed unchanged.
   */
  protected writeFields(context: WizardContext): void {
    for (const [field, value] of Object.entries(this.data)) {
      if (!context.isFinalized(field)) {
        context.set(field, value);
      }
    }
  }
}
