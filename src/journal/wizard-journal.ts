/**
 * Append-only JSONL journal of wizard events.
 *
 * Every controller command that changes wizard state appends one line with
 * a timestamp, the wizard and instance ids, the reference number and the
 * step involved. Entries are validated on read; malformed lines are skipped
 * with a warning.
 *
 * @module journal/wizard-journal
 */

import { appendFile, mkdir, readFile } from 'node:fs/promises';
import { dirname, join } from 'node:path';
import { isNotFoundError } from '../errors/fs.js';
import { JournalEntrySchema } from './types.js';
import type { JournalEntry, JournalRecord, JournalSink, ReadJournalOptions } from './types.js';

export const DEFAULT_JOURNAL_PATH = join('.wizard', 'journal.jsonl');

export class WizardJournal implements JournalSink {
  private writeQueue: Promise<void> = Promise.resolve();

  constructor(private readonly logPath: string = DEFAULT_JOURNAL_PATH) {}

  get path(): string {
    return this.logPath;
  }

  /**
   * Append an entry with an ISO timestamp. Writes are serialized.
   */
  async record(entry: JournalRecord): Promise<void> {
    const line = JSON.stringify({ timestamp: new Date().toISOString(), ...entry }) + '\n';

    const write = this.writeQueue.then(async () => {
      await mkdir(dirname(this.logPath), { recursive: true });
      await appendFile(this.logPath, line, 'utf-8');
    });
    this.writeQueue = write.catch(() => undefined);
    await write;
  }

  async read(options: ReadJournalOptions = {}): Promise<JournalEntry[]> {
    await this.writeQueue;

    let content: string;
    try {
      content = await readFile(this.logPath, 'utf-8');
    } catch (err) {
      if (isNotFoundError(err)) return [];
      throw err;
    }

    const entries: JournalEntry[] = [];
    for (const line of content.split(/\r?\n/)) {
      if (!line.trim()) continue;

      let parsed: unknown;
      try {
        parsed = JSON.parse(line);
      } catch {
        console.warn('Skipping malformed line in wizard journal');
        continue;
      }

      const result = JournalEntrySchema.safeParse(parsed);
      if (!result.success) {
        console.warn('Skipping invalid wizard journal entry');
        continue;
      }

      const entry = result.data;
      if (options.wizardId && entry.wizardId !== options.wizardId) continue;
      if (options.instanceId && entry.instanceId !== options.instanceId) continue;
      if (options.event && entry.event !== options.event) continue;
      entries.push(entry);
    }

    if (options.limit !== undefined && options.limit >= 0) {
      return options.limit === 0 ? [] : entries.slice(-options.limit);
    }
    return entries;
  }
}

/** Sink that discards every entry. Used when the journal is disabled in config. */
export class NoopJournal implements JournalSink {
  async record(_entry: JournalRecord): Promise<void> {}
}

/** Sink that keeps entries in memory, for tests and embedding callers. */
export class MemoryJournal implements JournalSink {
  readonly entries: JournalEntry[] = [];

  async record(entry: JournalRecord): Promise<void> {
    this.entries.push({ timestamp: new Date().toISOString(), ...entry });
  }

  events(): string[] {
    return this.entries.map((e) => e.event);
  }
}
