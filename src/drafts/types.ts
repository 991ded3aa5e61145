/**
 * Draft record schema and the DraftStore boundary.
 *
 * A draft is a resumable snapshot of one wizard instance: its context,
 * current step index, guard flags and step statuses. Records are validated
 * with Zod on every read. `.passthrough()` keeps unknown fields written by
 * newer versions.
 *
 * @module drafts/types
 */

import { z } from 'zod';
import { ContextSnapshotSchema } from '../context/types.js';
import { GuardFlagsSchema } from '../guard/idempotency-guard.js';
import { StepStatusSchema } from '../steps/types.js';

// ============================================================================
// Zod Schemas
// ============================================================================

export const DraftRecordSchema = z.object({
  id: z.string().min(1),
  wizardId: z.string().min(1),
  referenceNumber: z.string(),
  contextSnapshot: ContextSnapshotSchema,
  currentStepIndex: z.number().int().min(0),
  guardFlags: GuardFlagsSchema,
  /** Optional so records written without statuses still load. */
  stepStatuses: z.array(StepStatusSchema).optional(),
  createdAt: z.string(),
  updatedAt: z.string(),
  completed: z.boolean().default(false),
}).passthrough();

// ============================================================================
// TypeScript Types
// ============================================================================

export type DraftRecord = z.infer<typeof DraftRecordSchema>;

/** Listing view of a draft, without the context payload. */
export interface DraftSummary {
  id: string;
  wizardId: string;
  referenceNumber: string;
  currentStepIndex: number;
  committedSteps: string[];
  createdAt: string;
  updatedAt: string;
  completed: boolean;
}

/**
 * Persistence boundary for drafts.
 */
export interface DraftStore {
  /** Insert or replace the record under its id. Returns the id. */
  save(record: DraftRecord): Promise<string>;
  load(id: string): Promise<DraftRecord | null>;
  /** Returns false when no draft had that id. */
  delete(id: string): Promise<boolean>;
  /** Summaries, most recently updated first. */
  list(): Promise<DraftSummary[]>;
}

export function summarizeDraft(record: DraftRecord): DraftSummary {
  return {
    id: record.id,
    wizardId: record.wizardId,
    referenceNumber: record.referenceNumber,
    currentStepIndex: record.currentStepIndex,
    committedSteps: Object.entries(record.guardFlags)
      .filter(([, committed]) => committed)
      .map(([stepId]) => stepId),
    createdAt: record.createdAt,
    updatedAt: record.updatedAt,
    completed: record.completed,
  };
}

export function byMostRecent(a: DraftSummary, b: DraftSummary): number {
  return b.updatedAt.localeCompare(a.updatedAt) || a.id.localeCompare(b.id);
}
