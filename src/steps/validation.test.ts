import { describe, it, expect } from 'vitest';
import { WizardContext } from '../context/wizard-context.js';
import { mergeValidationResults, requireValue, requirementErrors, validationResult } from './validation.js';

describe('validationResult', () => {
  it('is valid without errors', () => {
    expect(validationResult()).toEqual({ valid: true, errors: [] });
  });

  it('merges in order', () => {
    const merged = mergeValidationResults(
      validationResult([{ field: 'a', message: 'is required' }]),
      validationResult(),
      validationResult([{ field: 'b', message: 'is too long' }]),
    );
    expect(merged).toEqual({
      valid: false,
      errors: [
        { field: 'a', message: 'is required' },
        { field: 'b', message: 'is too long' },
      ],
    });
  });
});

describe('requireValue', () => {
  it.each([undefined, null, '', '   ', []])('flags %j as empty', (value) => {
    expect(requireValue('name', value)).toEqual([{ field: 'name', message: 'is required' }]);
  });

  it.each(['x', 0, false, ['a'], {}])('accepts %j', (value) => {
    expect(requireValue('name', value)).toEqual([]);
  });

  it('uses a custom message', () => {
    expect(requireValue('unitId', '', 'select a unit')).toEqual([{ field: 'unitId', message: 'select a unit' }]);
  });
});

describe('requirementErrors', () => {
  it('passes once every key is finalized', () => {
    const context = new WizardContext();
    context.set('entityId', 'E1');
    context.markFinalized('entityId');
    expect(requirementErrors(context.readOnlyView(), ['entityId'])).toEqual([]);
  });
});
