/**
 * WizardController: the orchestrator one presentation layer talks to.
 *
 * Owns the wizard instance's context, guard, step objects and navigator.
 * Commands run one at a time: while a forward transition or finish is in
 * flight, next/previous/finish return `busy`, saveDraft waits for it to
 * settle, and cancel aborts it. A response that arrives after cancel is
 * discarded by the remote operation and never applied.
 *
 * Remote failures come back as values. Thrown errors are reserved for
 * misuse (a command in the wrong status) and corrupt drafts.
 *
 * @module controller/wizard-controller
 */

import { randomUUID } from 'node:crypto';
import { WizardContext } from '../context/wizard-context.js';
import type { ContextReader, ContextRecord } from '../context/types.js';
import { DEFAULT_REFERENCE_PREFIX, generateReferenceNumber } from '../context/reference-number.js';
import { IdempotencyGuard } from '../guard/idempotency-guard.js';
import { DraftNotFoundError, WizardStateError } from '../errors/engine-errors.js';
import { cancelledFailure, localValidationFailure } from '../errors/error-classifier.js';
import type { WizardFailure } from '../errors/types.js';
import type { DraftRecord, DraftStore } from '../drafts/types.js';
import type { JournalEvent, JournalSink } from '../journal/types.js';
import { StepNavigator } from '../navigation/step-navigator.js';
import { runRemoteOperation } from '../steps/remote-operation.js';
import type { StepContract, StepOutcome, WizardDefinition } from '../steps/types.js';
import type {
  CancelOptions,
  CancelResult,
  ConfirmCancel,
  FinishResult,
  NextCommandResult,
  PreviousCommandResult,
  WizardControllerOptions,
  WizardStateView,
  WizardStatus,
} from './types.js';

interface JournalFields {
  stepId?: string;
  stepIndex?: number;
  details?: Record<string, unknown>;
}

export class WizardController {
  private readonly context = new WizardContext();
  private readonly guard = new IdempotencyGuard();
  private readonly steps: readonly StepContract[];
  private readonly navigator: StepNavigator;

  private readonly draftStore: DraftStore | undefined;
  private readonly journal: JournalSink | undefined;
  private readonly confirmCancel: ConfirmCancel | undefined;
  private readonly requireCancelConfirmation: boolean;
  private readonly now: () => Date;

  private status: WizardStatus = 'idle';
  private instanceId: string;
  private referenceNumber: string;
  private createdAt: string | null = null;
  private draftSaved = false;
  private lastFailure: WizardFailure | null = null;

  private readonly abortController = new AbortController();
  private inFlight: Promise<unknown> | null = null;
  /** Set once finish has committed remotely and is completing locally. */
  private completing = false;

  constructor(
    private readonly definition: WizardDefinition,
    options: WizardControllerOptions = {},
  ) {
    this.steps = definition.steps.map((descriptor) => descriptor.create());
    this.navigator = new StepNavigator(this.steps, this.context, this.guard);

    this.draftStore = options.draftStore;
    this.journal = options.journal;
    this.confirmCancel = options.confirmCancel;
    this.requireCancelConfirmation = options.requireCancelConfirmation ?? true;
    this.now = options.now ?? (() => new Date());

    this.instanceId = options.instanceId ?? randomUUID();
    this.referenceNumber = generateReferenceNumber(
      definition.referencePrefix ?? options.referencePrefix ?? DEFAULT_REFERENCE_PREFIX,
      this.instanceId,
      this.now(),
    );
  }

  // --------------------------------------------------------------------------
  // Read access
  // --------------------------------------------------------------------------

  get wizardStatus(): WizardStatus {
    return this.status;
  }

  get reference(): string {
    return this.referenceNumber;
  }

  /** Draft id used by saveDraft; the instance id. */
  get draftId(): string {
    return this.instanceId;
  }

  /** The step currently shown, for the presentation layer to edit. */
  currentStep(): StepContract {
    return this.navigator.currentStep();
  }

  contextView(): ContextReader {
    return this.context.readOnlyView();
  }

  state(): WizardStateView {
    const states = this.navigator.stepStates();
    return {
      wizardId: this.definition.id,
      instanceId: this.instanceId,
      referenceNumber: this.referenceNumber,
      status: this.status,
      currentIndex: this.navigator.current(),
      currentStepId: this.navigator.currentStep().id,
      steps: this.steps.map((step, index) => ({
        index,
        id: step.id,
        title: step.title,
        status: states[index]?.status ?? 'not-started',
        remote: step.remote,
        committed: this.guard.hasCommitted(step.id),
      })),
      guardFlags: this.guard.toFlags(this.guardKeys()),
      progress: this.navigator.progress(),
      lastFailure: this.lastFailure,
      busy: this.inFlight !== null,
      draftSaved: this.draftSaved,
    };
  }

  // --------------------------------------------------------------------------
  // Navigation
  // --------------------------------------------------------------------------

  async start(): Promise<void> {
    this.assertStatus('start', ['idle']);
    this.createdAt = this.now().toISOString();
    this.navigator.activate();
    this.status = 'active';
    await this.log('started', { stepId: this.navigator.currentStep().id, stepIndex: 0 });
  }

  /**
   * Forward transition. On the last step this runs finish().
   */
  async next(): Promise<NextCommandResult> {
    if (this.inFlight) return { kind: 'busy' };
    this.assertStatus('next', ['active']);
    return this.track(() => this.runNext());
  }

  /**
   * Backward transition. Never validates and never triggers a remote call.
   */
  async previous(): Promise<PreviousCommandResult> {
    if (this.inFlight) return { kind: 'busy' };
    this.assertStatus('previous', ['active']);

    const result = this.navigator.goBack();
    if (result.kind === 'moved') {
      this.lastFailure = null;
      await this.log('back', { stepId: this.steps[result.from]?.id, stepIndex: result.from, details: { to: result.to } });
    }
    return result;
  }

  /**
   * Jump back to an earlier step. Like previous(), never validates and
   * never triggers a remote call.
   *
   * @throws {WizardStateError} If the index is ahead of the current step
   */
  async goTo(index: number): Promise<PreviousCommandResult> {
    if (this.inFlight) return { kind: 'busy' };
    this.assertStatus('goTo', ['active']);

    const result = this.navigator.goTo(index);
    if (result.kind === 'moved') {
      this.lastFailure = null;
      await this.log('back', { stepId: this.steps[result.from]?.id, stepIndex: result.from, details: { to: result.to } });
    }
    return result;
  }

  /**
   * Complete the wizard. Rejected until the last step is completed and,
   * for a remote last step, its mutation has committed.
   */
  async finish(): Promise<FinishResult> {
    if (this.inFlight) return { kind: 'busy' };
    this.assertStatus('finish', ['active']);
    return this.track(() => this.runFinish());
  }

  /**
   * Leave the awaiting-auth halt. The failed step can then be retried.
   */
  async reauthenticated(): Promise<void> {
    this.assertStatus('reauthenticated', ['awaiting-auth']);
    this.status = 'active';
    this.lastFailure = null;
    await this.log('reauthenticated', this.currentFields());
  }

  // --------------------------------------------------------------------------
  // Cancel and reset
  // --------------------------------------------------------------------------

  /**
   * Abandon the wizard. With committed remote steps this needs a
   * confirmation, from the argument or the confirmCancel callback.
   */
  async cancel(options: CancelOptions = {}): Promise<CancelResult> {
    // A finish that already committed remotely is allowed to complete.
    while (this.completing && this.inFlight) {
      await Promise.allSettled([this.inFlight]);
    }
    this.assertStatus('cancel', ['idle', 'active', 'awaiting-auth', 'halted']);

    const committedSteps = this.guard.committedSteps();
    if (committedSteps.length > 0 && this.requireCancelConfirmation && !options.confirmed) {
      const confirmed = this.confirmCancel ? await this.confirmCancel(committedSteps) : false;
      if (!confirmed) {
        return { kind: 'confirmation-required', committedSteps };
      }
    }

    const fields = this.currentFields();
    const deleteDraft = this.draftSaved;
    this.abortController.abort();
    this.status = 'cancelled';
    this.draftSaved = false;
    this.destroy();

    await this.log('cancelled', { ...fields, details: { committedSteps } });
    if (this.draftStore && deleteDraft) {
      await this.draftStore.delete(this.instanceId);
    }
    return { kind: 'cancelled', committedSteps };
  }

  /**
   * Explicit reset: clears the context, every guard flag and the navigator,
   * then shows the first step again. Committed remote records are not undone.
   */
  async reset(): Promise<void> {
    if (this.inFlight) {
      throw new WizardStateError('Cannot reset while an operation is in flight', this.status);
    }
    this.assertStatus('reset', ['active', 'awaiting-auth', 'halted']);

    const committedSteps = this.guard.committedSteps();
    this.destroy();
    this.navigator.activate();
    this.status = 'active';
    await this.log('reset', { stepIndex: 0, details: { committedSteps } });
  }

  // --------------------------------------------------------------------------
  // Drafts
  // --------------------------------------------------------------------------

  /**
   * Persist the wizard. Waits for an in-flight operation to settle first.
   *
   * @returns The draft id (stable across saves)
   */
  async saveDraft(): Promise<string> {
    const store = this.requireDraftStore();
    while (this.inFlight) {
      await Promise.allSettled([this.inFlight]);
    }
    this.assertStatus('saveDraft', ['active', 'awaiting-auth', 'halted']);

    await store.save(this.buildDraft(false));
    this.draftSaved = true;
    await this.log('draft-saved', this.currentFields());
    return this.instanceId;
  }

  /**
   * Resume from a saved draft without re-running validate or onNext.
   *
   * @throws {DraftNotFoundError} If the store has no such draft
   * @throws {WizardStateError} If the draft is completed, belongs to another
   *         wizard or points past the last step
   */
  async loadDraft(id: string): Promise<void> {
    const store = this.requireDraftStore();
    this.assertStatus('loadDraft', ['idle']);

    const record = await store.load(id);
    if (!record) {
      throw new DraftNotFoundError(id);
    }
    if (record.wizardId !== this.definition.id) {
      throw new WizardStateError(
        `Draft ${id} belongs to wizard "${record.wizardId}", not "${this.definition.id}"`,
        this.status,
      );
    }
    if (record.completed) {
      throw new WizardStateError(`Draft ${id} is completed and cannot be resumed`, this.status);
    }
    if (record.currentStepIndex >= this.steps.length) {
      throw new WizardStateError(
        `Draft ${id} is at step ${record.currentStepIndex} but wizard "${this.definition.id}" has ${this.steps.length} steps`,
        this.status,
      );
    }

    this.context.restoreFromSnapshot(record.contextSnapshot);
    this.guard.restoreFlags(record.guardFlags);
    this.navigator.restore(record.currentStepIndex, record.stepStatuses);

    this.instanceId = record.id;
    this.referenceNumber = record.referenceNumber;
    this.createdAt = record.createdAt;
    this.draftSaved = true;
    this.status = 'active';
    await this.log('draft-loaded', this.currentFields());
  }

  // --------------------------------------------------------------------------
  // Internals
  // --------------------------------------------------------------------------

  private async runNext(): Promise<NextCommandResult> {
    const step = this.navigator.currentStep();
    const stepIndex = this.navigator.current();
    const skipped = step.remote && this.guard.hasCommitted(step.id);

    const result = await this.navigator.goNext(this.abortController.signal);
    if (this.status === 'cancelled') {
      return this.cancelledResult(step.id);
    }

    switch (result.kind) {
      case 'invalid':
        this.lastFailure = localValidationFailure(result.errors, step.id);
        await this.log('invalid', { stepId: step.id, stepIndex, details: { errors: result.errors } });
        return result;
      case 'retry':
        this.lastFailure = result.failure;
        await this.log('retry', { stepId: step.id, stepIndex, details: this.failureDetails(result.failure) });
        return result;
      case 'fatal':
        this.halt(result.failure);
        await this.log('fatal', { stepId: step.id, stepIndex, details: this.failureDetails(result.failure) });
        return result;
      case 'moved':
      case 'ready-to-finish':
        break;
    }

    this.lastFailure = null;
    if (skipped) {
      await this.log('step-skipped', { stepId: step.id, stepIndex });
    }
    await this.log('advanced', { stepId: step.id, stepIndex });
    if (this.status === 'cancelled') {
      return this.cancelledResult(step.id);
    }

    if (result.kind === 'ready-to-finish') {
      return this.runFinish();
    }
    return result;
  }

  private async runFinish(): Promise<FinishResult> {
    const lastIndex = this.steps.length - 1;
    const last = this.steps[lastIndex];
    const lastState = this.navigator.stepStates()[lastIndex];

    if (!this.navigator.isLast()) {
      return { kind: 'rejected', reason: 'Finish is only available on the last step' };
    }
    if (!last || lastState?.status !== 'completed') {
      return { kind: 'rejected', reason: 'The last step has not been completed' };
    }
    if (last.remote && !this.guard.hasCommitted(last.id)) {
      return { kind: 'rejected', reason: `Step "${last.id}" has not committed its remote operation` };
    }

    const operation = this.definition.finish;
    if (operation && !this.guard.hasCommitted(operation.id)) {
      const outcome: StepOutcome = await runRemoteOperation(
        { id: operation.id, service: operation.service, finalizes: operation.produces },
        this.context,
        { guard: this.guard, signal: this.abortController.signal },
      );
      if (this.status === 'cancelled') {
        return this.cancelledResult(operation.id);
      }
      if (outcome.kind === 'retryWithErrors') {
        this.lastFailure = outcome.failure;
        await this.log('retry', { stepId: operation.id, details: this.failureDetails(outcome.failure) });
        return { kind: 'retry', failure: outcome.failure };
      }
      if (outcome.kind === 'fatal') {
        this.halt(outcome.failure);
        await this.log('fatal', { stepId: operation.id, details: this.failureDetails(outcome.failure) });
        return { kind: 'fatal', failure: outcome.failure };
      }
    }

    const identifiers: ContextRecord = {};
    for (const key of operation?.produces ?? []) {
      const value = this.context.get(key);
      if (value !== undefined) identifiers[key] = value;
    }

    this.completing = true;
    try {
      if (this.draftStore && this.draftSaved) {
        await this.draftStore.save(this.buildDraft(true));
      }
      this.status = 'completed';
      this.lastFailure = null;
      this.destroy();
    } finally {
      this.completing = false;
    }
    await this.log('finished', { stepIndex: lastIndex, details: { identifiers } });
    return { kind: 'finished', referenceNumber: this.referenceNumber, identifiers };
  }

  private cancelledResult(stepId: string): FinishResult {
    return { kind: 'fatal', failure: cancelledFailure(stepId) };
  }

  private async track<T>(operation: () => Promise<T>): Promise<T> {
    const running = operation();
    this.inFlight = running;
    try {
      return await running;
    } finally {
      this.inFlight = null;
    }
  }

  private halt(failure: WizardFailure): void {
    this.lastFailure = failure;
    if (failure.kind === 'auth') {
      this.status = 'awaiting-auth';
    } else if (failure.kind !== 'cancelled') {
      this.status = 'halted';
    }
  }

  private destroy(): void {
    this.context.reset();
    this.guard.resetAll();
    this.navigator.reset();
    this.lastFailure = null;
  }

  private buildDraft(completed: boolean): DraftRecord {
    const now = this.now().toISOString();
    return {
      id: this.instanceId,
      wizardId: this.definition.id,
      referenceNumber: this.referenceNumber,
      contextSnapshot: this.context.toSnapshot(),
      currentStepIndex: this.navigator.current(),
      guardFlags: this.guard.toFlags(this.guardKeys()),
      stepStatuses: this.navigator.stepStates().map((s) => s.status),
      createdAt: this.createdAt ?? now,
      updatedAt: now,
      completed,
    };
  }

  private guardKeys(): string[] {
    const keys = this.steps.filter((s) => s.remote).map((s) => s.id);
    if (this.definition.finish) keys.push(this.definition.finish.id);
    return keys;
  }

  private requireDraftStore(): DraftStore {
    if (!this.draftStore) {
      throw new WizardStateError('No draft store configured for this wizard', this.status);
    }
    return this.draftStore;
  }

  private assertStatus(command: string, allowed: readonly WizardStatus[]): void {
    if (!allowed.includes(this.status)) {
      throw new WizardStateError(`Cannot ${command} while the wizard is ${this.status}`, this.status);
    }
  }

  private currentFields(): JournalFields {
    return { stepId: this.navigator.currentStep().id, stepIndex: this.navigator.current() };
  }

  private failureDetails(failure: WizardFailure): Record<string, unknown> {
    return { kind: failure.kind, category: failure.category, message: failure.message, action: failure.action };
  }

  private async log(event: JournalEvent, fields: JournalFields = {}): Promise<void> {
    if (!this.journal) return;
    try {
      await this.journal.record({
        event,
        wizardId: this.definition.id,
        instanceId: this.instanceId,
        referenceNumber: this.referenceNumber,
        ...fields,
      });
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      console.warn(`Failed to write wizard journal entry "${event}": ${message}`);
    }
  }
}
