/**
 * Journal entry schema.
 *
 * @module journal/types
 */

import { z } from 'zod';

export const JOURNAL_EVENTS = [
  'started',
  'advanced',
  'back',
  'invalid',
  'retry',
  'fatal',
  'step-skipped',
  'finished',
  'cancelled',
  'draft-saved',
  'draft-loaded',
  'reset',
  'reauthenticated',
] as const;

export const JournalEventSchema = z.enum(JOURNAL_EVENTS);

/** Fields the caller supplies; the journal adds the timestamp. */
export const JournalRecordSchema = z.object({
  event: JournalEventSchema,
  wizardId: z.string(),
  instanceId: z.string(),
  referenceNumber: z.string(),
  stepId: z.string().optional(),
  stepIndex: z.number().int().optional(),
  details: z.record(z.string(), z.unknown()).optional(),
});

/** One line of the journal (passthrough for forward compat) */
export const JournalEntrySchema = JournalRecordSchema.extend({
  timestamp: z.string(),
}).passthrough();

export type JournalEvent = z.infer<typeof JournalEventSchema>;
export type JournalRecord = z.infer<typeof JournalRecordSchema>;
export type JournalEntry = z.infer<typeof JournalEntrySchema>;

/**
 * Where the controller sends its events.
 */
export interface JournalSink {
  record(entry: JournalRecord): Promise<void>;
}

export interface ReadJournalOptions {
  wizardId?: string;
  instanceId?: string;
  event?: JournalEvent;
  /** Keep only the last N matching entries. */
  limit?: number;
}
