/**
 * DraftStore that keeps one YAML file per draft in a directory.
 *
 * Writes are serialized through a promise queue so that a save and a
 * delete issued back to back land in order. Files that fail to parse are
 * skipped by list() with a warning; load() of such a file throws.
 *
 * @module drafts/file-draft-store
 */

import { mkdir, readFile, readdir, rm, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { DraftCorruptError } from '../errors/engine-errors.js';
import { isNotFoundError } from '../errors/fs.js';
import { draftFilePath } from './draft-id.js';
import { parseDraft, serializeDraft } from './draft-serializer.js';
import { byMostRecent, summarizeDraft } from './types.js';
import type { DraftRecord, DraftStore, DraftSummary } from './types.js';

const DRAFT_EXTENSION = '.yaml';

export class FileDraftStore implements DraftStore {
  private writeQueue: Promise<void> = Promise.resolve();

  constructor(private readonly dir: string = join('.wizard', 'drafts')) {}

  async save(record: DraftRecord): Promise<string> {
    const filePath = draftFilePath(this.dir, record.id, DRAFT_EXTENSION);
    const content = serializeDraft(record);

    await this.enqueue(async () => {
      await mkdir(this.dir, { recursive: true });
      await writeFile(filePath, content, 'utf-8');
    });
    return record.id;
  }

  /**
   * @throws {DraftCorruptError} If the file exists but is not a valid draft
   */
  async load(id: string): Promise<DraftRecord | null> {
    const filePath = draftFilePath(this.dir, id, DRAFT_EXTENSION);
    await this.writeQueue;

    let content: string;
    try {
      content = await readFile(filePath, 'utf-8');
    } catch (err) {
      if (isNotFoundError(err)) return null;
      throw err;
    }
    return parseDraft(content, filePath);
  }

  async delete(id: string): Promise<boolean> {
    const filePath = draftFilePath(this.dir, id, DRAFT_EXTENSION);
    let existed = true;

    await this.enqueue(async () => {
      try {
        await rm(filePath);
      } catch (err) {
        if (!isNotFoundError(err)) throw err;
        existed = false;
      }
    });
    return existed;
  }

  async list(): Promise<DraftSummary[]> {
    await this.writeQueue;

    let names: string[];
    try {
      names = await readdir(this.dir);
    } catch (err) {
      if (isNotFoundError(err)) return [];
      throw err;
    }

    const summaries: DraftSummary[] = [];
    for (const name of names.filter((n) => n.endsWith(DRAFT_EXTENSION)).sort()) {
      const filePath = join(this.dir, name);
      try {
        const record = parseDraft(await readFile(filePath, 'utf-8'), filePath);
        summaries.push(summarizeDraft(record));
      } catch (err) {
        if (!(err instanceof DraftCorruptError)) throw err;
        console.warn(`Skipping invalid draft file: ${filePath}`);
      }
    }
    return summaries.sort(byMostRecent);
  }

  /**
   * Run a write after every earlier write has settled. A failed write
   * rejects its own caller and does not block later writes.
   */
  private async enqueue(task: () => Promise<void>): Promise<void> {
    const run = this.writeQueue.then(task);
    this.writeQueue = run.catch(() => undefined);
    await run;
  }
}
