import { describe, it, expect, afterEach, vi } from 'vitest';
import { mkdtempSync, rmSync, readFileSync, appendFileSync } from 'node:fs';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { MemoryJournal, NoopJournal, WizardJournal } from './wizard-journal.js';
import type { JournalRecord } from './types.js';

const tempDirs: string[] = [];

function createTempDir(): string {
  const dir = mkdtempSync(join(tmpdir(), 'wizard-journal-'));
  tempDirs.push(dir);
  return dir;
}

function record(overrides: Partial<JournalRecord> = {}): JournalRecord {
  return {
    event: 'advanced',
    wizardId: 'office-intake',
    instanceId: 'inst-1',
    referenceNumber: 'SRV-20260118153045-INST',
    stepId: 'link-entity',
    stepIndex: 0,
    ...overrides,
  };
}

describe('WizardJournal', () => {
  afterEach(() => {
    for (const dir of tempDirs) {
      rmSync(dir, { recursive: true, force: true });
    }
    tempDirs.length = 0;
    vi.restoreAllMocks();
  });

  it('appends one JSON line per entry with a timestamp', async () => {
    const path = join(createTempDir(), 'logs', 'journal.jsonl');
    const journal = new WizardJournal(path);

    await journal.record(record());
    await journal.record(record({ event: 'back', stepIndex: 1 }));

    const lines = readFileSync(path, 'utf-8').trim().split('\n');
    expect(lines).toHaveLength(2);
    const first: unknown = JSON.parse(lines[0] ?? '');
    expect(first).toMatchObject({ event: 'advanced', stepId: 'link-entity' });
    expect(first).toHaveProperty('timestamp');
  });

  it('keeps entry order under concurrent writes', async () => {
    const journal = new WizardJournal(join(createTempDir(), 'journal.jsonl'));

    await Promise.all([0, 1, 2, 3, 4].map((stepIndex) => journal.record(record({ stepIndex }))));

    const entries = await journal.read();
    expect(entries.map((e) => e.stepIndex)).toEqual([0, 1, 2, 3, 4]);
  });

  it('returns nothing for a missing file', async () => {
    expect(await new WizardJournal(join(createTempDir(), 'absent.jsonl')).read()).toEqual([]);
  });

  it('filters by wizard, instance and event, then limits', async () => {
    const journal = new WizardJournal(join(createTempDir(), 'journal.jsonl'));
    await journal.record(record({ event: 'started' }));
    await journal.record(record({ event: 'advanced', stepIndex: 0 }));
    await journal.record(record({ event: 'advanced', stepIndex: 1 }));
    await journal.record(record({ wizardId: 'other', event: 'advanced' }));
    await journal.record(record({ instanceId: 'inst-2', event: 'advanced' }));

    expect(await journal.read({ wizardId: 'other' })).toHaveLength(1);
    expect(await journal.read({ instanceId: 'inst-2' })).toHaveLength(1);

    const advanced = await journal.read({ wizardId: 'office-intake', instanceId: 'inst-1', event: 'advanced' });
    expect(advanced.map((e) => e.stepIndex)).toEqual([0, 1]);

    const last = await journal.read({ limit: 2 });
    expect(last.map((e) => e.instanceId)).toEqual(['inst-1', 'inst-2']);
    expect(await journal.read({ limit: 0 })).toEqual([]);
  });

  it('skips malformed and invalid lines with a warning', async () => {
    const path = join(createTempDir(), 'journal.jsonl');
    const journal = new WizardJournal(path);
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});

    await journal.record(record());
    appendFileSync(path, '{not json\n', 'utf-8');
    appendFileSync(path, JSON.stringify({ event: 'unknown-event' }) + '\n', 'utf-8');

    expect(await journal.read()).toHaveLength(1);
    expect(warn).toHaveBeenCalledWith('Skipping malformed line in wizard journal');
    expect(warn).toHaveBeenCalledWith('Skipping invalid wizard journal entry');
  });
});

describe('MemoryJournal', () => {
  it('keeps entries in order', async () => {
    const journal = new MemoryJournal();
    await journal.record(record({ event: 'started' }));
    await journal.record(record({ event: 'advanced' }));
    expect(journal.events()).toEqual(['started', 'advanced']);
  });
});

describe('NoopJournal', () => {
  it('accepts entries without keeping them', async () => {
    const journal = new NoopJournal();
    await expect(journal.record(record({ event: 'started' }))).resolves.toBeUndefined();
    expect(Object.keys(journal)).toEqual([]);
  });
});
