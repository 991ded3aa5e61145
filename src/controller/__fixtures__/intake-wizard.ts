/**
 * Three-step office intake wizard used by the controller tests.
 *
 * 0. link-entity (remote): links the surveyed entity, produces entityId
 * 1. create-unit (remote): creates the unit under the entity, produces unitId
 * 2. review (local): operator confirms; finish submits the survey
 */

import { requireValue } from '../../steps/validation.js';
import { RemoteStep } from '../../steps/remote-step.js';
import { WizardStep } from '../../steps/wizard-step.js';
import { defineWizard } from '../../steps/wizard-builder.js';
import type { WizardDefinition } from '../../steps/types.js';
import { FakeRemoteService } from './fake-service.js';

export interface IntakeServices {
  linkEntity: FakeRemoteService;
  createUnit: FakeRemoteService;
  submit: FakeRemoteService;
}

export function intakeServices(): IntakeServices {
  return {
    linkEntity: new FakeRemoteService({ entityId: 'E1' }),
    createUnit: new FakeRemoteService({ unitId: 'U1' }),
    submit: new FakeRemoteService({ submissionId: 'S1' }),
  };
}

export function intakeWizard(services: IntakeServices): WizardDefinition {
  return defineWizard('office-intake', { title: 'Office intake', referencePrefix: 'SRV' })
    .step(
      'link-entity',
      () =>
        new RemoteStep({
          id: 'link-entity',
          title: 'Link entity',
          fields: { entityRef: '' },
          validate: (data) => requireValue('entityRef', data.entityRef),
          service: services.linkEntity,
          produces: ['entityId'],
        }),
    )
    .step(
      'create-unit',
      () =>
        new RemoteStep({
          id: 'create-unit',
          title: 'Create unit',
          requires: ['entityId'],
          fields: { unitLabel: '' },
          validate: (data) => requireValue('unitLabel', data.unitLabel),
          service: services.createUnit,
          produces: ['unitId'],
        }),
    )
    .step(
      'review',
      () =>
        new WizardStep({
          id: 'review',
          title: 'Review',
          requires: ['entityId', 'unitId'],
          fields: { confirmed: false },
          finalizes: ['confirmed'],
          validate: (data) => (data.confirmed === true ? [] : [{ field: 'confirmed', message: 'must be confirmed' }]),
        }),
    )
    .finish({ id: 'submit', service: services.submit, produces: ['submissionId'] })
    .build();
}
