/**
 * Wizard event journal.
 *
 * @module journal
 */

export { JOURNAL_EVENTS, JournalEventSchema, JournalRecordSchema, JournalEntrySchema } from './types.js';
export type { JournalEvent, JournalEntry, JournalRecord, JournalSink, ReadJournalOptions } from './types.js';
export { WizardJournal, MemoryJournal, NoopJournal, DEFAULT_JOURNAL_PATH } from './wizard-journal.js';
