/**
 * Process-local DraftStore. Records are deep-copied on save and load.
 *
 * @module drafts/in-memory-draft-store
 */

import { byMostRecent, summarizeDraft } from './types.js';
import type { DraftRecord, DraftStore, DraftSummary } from './types.js';

export class InMemoryDraftStore implements DraftStore {
  private readonly records = new Map<string, DraftRecord>();

  async save(record: DraftRecord): Promise<string> {
    this.records.set(record.id, structuredClone(record));
    return record.id;
  }

  async load(id: string): Promise<DraftRecord | null> {
    const record = this.records.get(id);
    return record ? structuredClone(record) : null;
  }

  async delete(id: string): Promise<boolean> {
    return this.records.delete(id);
  }

  async list(): Promise<DraftSummary[]> {
    return [...this.records.values()].map(summarizeDraft).sort(byMostRecent);
  }

  get size(): number {
    return this.records.size;
  }
}
