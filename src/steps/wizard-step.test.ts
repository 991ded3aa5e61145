import { describe, it, expect } from 'vitest';
import { WizardContext } from '../context/wizard-context.js';
import { IdempotencyGuard } from '../guard/idempotency-guard.js';
import { WizardStep } from './wizard-step.js';
import { requireValue } from './validation.js';
import type { StepExecution } from './types.js';

function execution(): StepExecution {
  return { guard: new IdempotencyGuard(), signal: new AbortController().signal };
}

function entityStep(): WizardStep {
  return new WizardStep({
    id: 'select-entity',
    title: 'Select entity',
    fields: { entityId: '' },
    finalizes: ['entityId'],
    validate: (data) => requireValue('entityId', data.entityId),
  });
}

describe('WizardStep', () => {
  it('defaults title and description', () => {
    const step = new WizardStep({ id: 'notes' });
    expect(step.title).toBe('notes');
    expect(step.description).toBe('');
    expect(step.remote).toBe(false);
  });

  it('edits only declared fields', () => {
    const step = entityStep();
    step.edit('entityId', 'E1');
    expect(step.collectData()).toEqual({ entityId: 'E1' });
    expect(() => step.edit('unitId', 'U1')).toThrow('Unknown field "unitId" for step "select-entity"');
  });

  it('returns copies from collectData', () => {
    const step = new WizardStep({ id: 'tags', fields: { tags: ['a'] } });
    const data = step.collectData();
    data.tags = ['changed'];
    expect(step.collectData()).toEqual({ tags: ['a'] });
  });

  it('runs field rules in validate', () => {
    const step = entityStep();
    const context = new WizardContext();

    expect(step.validate(context.readOnlyView())).toEqual({
      valid: false,
      errors: [{ field: 'entityId', message: 'is required' }],
    });

    step.edit('entityId', 'E1');
    expect(step.validate(context.readOnlyView())).toEqual({ valid: true, errors: [] });
  });

  it('validate is repeatable and leaves the context untouched', () => {
    const step = entityStep();
    const context = new WizardContext();
    step.edit('entityId', 'E1');

    const first = step.validate(context.readOnlyView());
    const second = step.validate(context.readOnlyView());

    expect(second).toEqual(first);
    expect(context.keys()).toEqual([]);
  });

  it('reports required keys that are missing or not finalized', () => {
    const step = new WizardStep({ id: 'unit', requires: ['entityId', 'buildingId'] });
    const context = new WizardContext();
    context.set('entityId', 'E1');

    expect(step.validate(context.readOnlyView()).errors).toEqual([
      { field: 'entityId', message: 'has not been confirmed by an earlier step' },
      { field: 'buildingId', message: 'is required from an earlier step' },
    ]);
  });

  it('pulls inputs on show and seeds fields only on first show', () => {
    const step = new WizardStep({ id: 'unit', requires: ['entityId'], fields: { unitLabel: '' } });
    const context = new WizardContext();
    context.set('entityId', 'E1');
    context.set('unitLabel', 'Ground floor');

    step.onShow(context.readOnlyView());
    expect(step.input('entityId')).toBe('E1');
    expect(step.collectData()).toEqual({ unitLabel: 'Ground floor' });

    step.edit('unitLabel', 'First floor');
    step.onHide(context.readOnlyView());
    step.onShow(context.readOnlyView());

    expect(step.collectData()).toEqual({ unitLabel: 'First floor' });
    expect(step.activations).toEqual({ shown: 2, hidden: 1 });
  });

  it('writes fields and finalizes declared keys on next', async () => {
    const step = entityStep();
    const context = new WizardContext();
    step.edit('entityId', 'E1');

    const outcome = await step.onNext(context, execution());

    expect(outcome).toEqual({ kind: 'advance' });
    expect(context.get('entityId')).toBe('E1');
    expect(context.isFinalized('entityId')).toBe(true);
  });

  it('accepts an unchanged finalized field on a second next', async () => {
    const step = entityStep();
    const context = new WizardContext();
    step.edit('entityId', 'E1');
    await step.onNext(context, execution());

    const outcome = await step.onNext(context, execution());
    expect(outcome).toEqual({ kind: 'advance' });
    expect(context.toSnapshot()).toEqual({ slots: { entityId: 'E1' }, finalized: ['entityId'] });
  });

  it('refuses to change a finalized field', async () => {
    const step = entityStep();
    const context = new WizardContext();
    step.edit('entityId', 'E1');
    await step.onNext(context, execution());

    step.edit('entityId', 'E2');
    const outcome = await step.onNext(context, execution());

    expect(outcome).toEqual({
      kind: 'retryWithErrors',
      failure: {
        kind: 'local-validation',
        category: null,
        message: 'entityId: has already been committed and can no longer be changed',
        fieldErrors: [{ field: 'entityId', message: 'has already been committed and can no longer be changed' }],
        action: 'correct-fields',
        stepId: 'select-entity',
      },
    });
    expect(context.get('entityId')).toBe('E1');
  });

  it('calls initialize once across repeated setup', () => {
    class CountingStep extends WizardStep {
      initializations = 0;
      protected override initialize(): void {
        this.initializations += 1;
      }
    }
    const step = new CountingStep({ id: 'count' });
    step.setup();
    step.setup();
    step.onShow(new WizardContext().readOnlyView());
    expect(step.initializations).toBe(1);
  });
});
