import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { mkdtemp, rm } from 'node:fs/promises';
import { join } from 'node:path';
import { tmpdir } from 'node:os';

vi.mock('@clack/prompts', () => ({
  log: {
    message: vi.fn(),
    error: vi.fn(),
    warn: vi.fn(),
    success: vi.fn(),
    info: vi.fn(),
  },
  intro: vi.fn(),
  outro: vi.fn(),
  confirm: vi.fn(),
  isCancel: vi.fn((value: unknown) => typeof value === 'symbol'),
  cancel: vi.fn(),
}));

import * as p from '@clack/prompts';
import { FileDraftStore } from '../../drafts/file-draft-store.js';
import { draftRecord } from '../../drafts/__fixtures__/records.js';
import { draftsCommand } from './drafts.js';

const mockConfirm = vi.mocked(p.confirm);

let tempDir: string;
let dirFlag: string;
let store: FileDraftStore;

function captureLog() {
  const logs: string[] = [];
  const spy = vi.spyOn(console, 'log').mockImplementation((...args: unknown[]) => {
    logs.push(args.map(String).join(' '));
  });
  return { logs, spy };
}

beforeEach(async () => {
  vi.clearAllMocks();
  tempDir = await mkdtemp(join(tmpdir(), 'drafts-cli-test-'));
  dirFlag = `--dir=${tempDir}`;
  store = new FileDraftStore(tempDir);
});

afterEach(async () => {
  vi.restoreAllMocks();
  await rm(tempDir, { recursive: true, force: true });
});

// ============================================================================
// Dispatch
// ============================================================================

describe('draftsCommand - dispatch', () => {
  it('shows help with no subcommand', async () => {
    const { logs } = captureLog();
    expect(await draftsCommand([])).toBe(0);
    expect(logs.join('\n')).toContain('wizard-engine drafts - Manage saved wizard drafts');
  });

  it('returns 1 for an unknown subcommand', async () => {
    captureLog();
    expect(await draftsCommand(['frobnicate'])).toBe(1);
  });
});

// ============================================================================
// list
// ============================================================================

describe('draftsCommand - list', () => {
  it('prints an empty list when the directory does not exist', async () => {
    const { logs } = captureLog();
    const code = await draftsCommand(['list', `--dir=${join(tempDir, 'missing')}`]);

    expect(code).toBe(0);
    expect(JSON.parse(logs.join('\n'))).toEqual({ drafts: [] });
  });

  it('lists resumable drafts, most recent first', async () => {
    await store.save(draftRecord({ id: 'older', updatedAt: '2026-01-18T10:00:00.000Z' }));
    await store.save(draftRecord({ id: 'newer', updatedAt: '2026-01-18T11:00:00.000Z' }));
    await store.save(draftRecord({ id: 'done', completed: true }));

    const { logs } = captureLog();
    const code = await draftsCommand(['ls', dirFlag]);

    expect(code).toBe(0);
    const output = JSON.parse(logs.join('\n')) as { drafts: Array<{ id: string }> };
    expect(output.drafts.map((d) => d.id)).toEqual(['newer', 'older']);
  });

  it('includes completed drafts with --all', async () => {
    await store.save(draftRecord({ id: 'open' }));
    await store.save(draftRecord({ id: 'done', completed: true }));

    const { logs } = captureLog();
    await draftsCommand(['list', '--all', dirFlag]);

    const output = JSON.parse(logs.join('\n')) as { drafts: Array<{ id: string }> };
    expect(output.drafts.map((d) => d.id).sort()).toEqual(['done', 'open']);
  });

  it('prints a message for an empty pretty list', async () => {
    const code = await draftsCommand(['list', '--pretty', dirFlag]);
    expect(code).toBe(0);
    expect(p.log.message).toHaveBeenCalledWith('No saved drafts.');
  });
});

// ============================================================================
// show
// ============================================================================

describe('draftsCommand - show', () => {
  it('prints the draft record', async () => {
    await store.save(draftRecord());

    const { logs } = captureLog();
    const code = await draftsCommand(['show', 'draft-1', dirFlag]);

    expect(code).toBe(0);
    expect(JSON.parse(logs.join('\n'))).toEqual({ draft: draftRecord() });
  });

  it('returns 1 for a missing draft', async () => {
    const { logs } = captureLog();
    const code = await draftsCommand(['show', 'nope', dirFlag]);

    expect(code).toBe(1);
    expect(JSON.parse(logs.join('\n'))).toEqual({ error: 'Draft not found: nope' });
  });

  it('returns 1 without an id', async () => {
    const { logs } = captureLog();
    expect(await draftsCommand(['show', dirFlag])).toBe(1);
    expect(JSON.parse(logs.join('\n'))).toEqual({ error: 'Usage: wizard-engine drafts show <id>' });
  });

  it('rejects an unsafe id', async () => {
    const { logs } = captureLog();
    expect(await draftsCommand(['show', 'a..b', dirFlag])).toBe(1);
    expect(JSON.parse(logs.join('\n'))).toEqual({
      error: 'Unsafe draft id "a..b": id contains path traversal sequence: ..',
    });
  });
});

// ============================================================================
// delete
// ============================================================================

describe('draftsCommand - delete', () => {
  it('asks before deleting a draft with committed steps', async () => {
    await store.save(draftRecord());
    mockConfirm.mockResolvedValue(true);
    const { logs } = captureLog();

    const code = await draftsCommand(['delete', 'draft-1', dirFlag]);

    expect(code).toBe(0);
    expect(mockConfirm).toHaveBeenCalledWith({
      message: 'Draft draft-1 has committed remote steps (link-entity, create-unit). Delete anyway?',
      initialValue: false,
    });
    expect(JSON.parse(logs.join('\n'))).toEqual({ deleted: 'draft-1' });
    expect(await store.load('draft-1')).toBeNull();
  });

  it('keeps the draft when the confirmation is declined', async () => {
    await store.save(draftRecord());
    mockConfirm.mockResolvedValue(false);

    const code = await draftsCommand(['rm', 'draft-1', dirFlag]);

    expect(code).toBe(1);
    expect(p.cancel).toHaveBeenCalledWith('Cancelled');
    expect(await store.load('draft-1')).not.toBeNull();
  });

  it('keeps the draft when the prompt is cancelled', async () => {
    await store.save(draftRecord());
    mockConfirm.mockResolvedValue(Symbol('clack:cancel'));

    expect(await draftsCommand(['rm', 'draft-1', dirFlag])).toBe(1);
    expect(await store.load('draft-1')).not.toBeNull();
  });

  it('skips the prompt with --yes', async () => {
    await store.save(draftRecord());
    captureLog();

    expect(await draftsCommand(['delete', 'draft-1', '--yes', dirFlag])).toBe(0);
    expect(mockConfirm).not.toHaveBeenCalled();
  });

  it('skips the prompt when nothing was committed', async () => {
    await store.save(draftRecord({ guardFlags: { 'link-entity': false } }));
    captureLog();

    expect(await draftsCommand(['delete', 'draft-1', dirFlag])).toBe(0);
    expect(mockConfirm).not.toHaveBeenCalled();
  });
});
