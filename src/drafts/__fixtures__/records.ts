import type { DraftRecord } from '../types.js';

export function draftRecord(overrides: Partial<DraftRecord> = {}): DraftRecord {
  return {
    id: 'draft-1',
    wizardId: 'office-intake',
    referenceNumber: 'SRV-20260118153045-DRAF',
    contextSnapshot: {
      slots: { entityId: 'E1', unitId: 'U1', unitLabel: 'Ground floor' },
      finalized: ['entityId', 'unitId'],
    },
    currentStepIndex: 2,
    guardFlags: { 'link-entity': true, 'create-unit': true },
    stepStatuses: ['completed', 'completed', 'active'],
    createdAt: '2026-01-18T15:30:45.000Z',
    updatedAt: '2026-01-18T15:40:00.000Z',
    completed: false,
    ...overrides,
  };
}
