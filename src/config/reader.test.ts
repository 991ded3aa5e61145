import { describe, it, expect, afterEach } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { WizardConfigError } from '../errors/engine-errors.js';
import { readWizardConfig, validateWizardConfig } from './reader.js';
import { DEFAULT_WIZARD_CONFIG } from './schema.js';

const tempDirs: string[] = [];

function createTempDir(): string {
  const dir = mkdtempSync(join(tmpdir(), 'wizard-config-'));
  tempDirs.push(dir);
  return dir;
}

describe('readWizardConfig', () => {
  afterEach(() => {
    for (const dir of tempDirs) {
      rmSync(dir, { recursive: true, force: true });
    }
    tempDirs.length = 0;
  });

  it('returns defaults when the file is missing', async () => {
    const config = await readWizardConfig(join(createTempDir(), 'config.json'));
    expect(config).toEqual({
      drafts: { dir: '.wizard/drafts' },
      journal: { enabled: true, path: '.wizard/journal.jsonl' },
      cancel: { require_confirmation: true },
      reference: { prefix: 'WIZ' },
    });
  });

  it('fills missing fields around partial overrides', async () => {
    const path = join(createTempDir(), 'config.json');
    writeFileSync(path, JSON.stringify({ journal: { enabled: false }, reference: { prefix: 'SRV' } }), 'utf-8');

    const config = await readWizardConfig(path);

    expect(config.journal).toEqual({ enabled: false, path: '.wizard/journal.jsonl' });
    expect(config.reference.prefix).toBe('SRV');
    expect(config.drafts).toEqual(DEFAULT_WIZARD_CONFIG.drafts);
  });

  it('throws on invalid JSON', async () => {
    const path = join(createTempDir(), 'config.json');
    writeFileSync(path, '{ nope', 'utf-8');
    await expect(readWizardConfig(path)).rejects.toThrow(`Invalid JSON in config file: ${path}`);
  });

  it('throws with field paths on schema failure', async () => {
    const path = join(createTempDir(), 'config.json');
    writeFileSync(path, JSON.stringify({ reference: { prefix: 'not-valid!' }, cancel: { require_confirmation: 'yes' } }), 'utf-8');

    let caught: unknown;
    try {
      await readWizardConfig(path);
    } catch (err) {
      caught = err;
    }

    expect(caught).toBeInstanceOf(WizardConfigError);
    expect(caught).toMatchObject({
      issues: [
        'cancel.require_confirmation: Expected boolean, received string',
        'reference.prefix: must be 1-8 letters or digits',
      ],
    });
  });
});

describe('validateWizardConfig', () => {
  it('accepts an empty object', () => {
    expect(validateWizardConfig({})).toEqual({ valid: true, config: DEFAULT_WIZARD_CONFIG });
  });

  it('rejects a non-object', () => {
    expect(validateWizardConfig([])).toEqual({ valid: false, errors: [': Expected object, received array'] });
  });
});
