/**
 * Draft records and draft stores.
 *
 * @module drafts
 */

export { DraftRecordSchema, summarizeDraft, byMostRecent } from './types.js';
export type { DraftRecord, DraftSummary, DraftStore } from './types.js';
export { serializeDraft, parseDraft } from './draft-serializer.js';
export { checkDraftId, draftFilePath } from './draft-id.js';
export type { DraftIdCheck } from './draft-id.js';
export { InMemoryDraftStore } from './in-memory-draft-store.js';
export { FileDraftStore } from './file-draft-store.js';
