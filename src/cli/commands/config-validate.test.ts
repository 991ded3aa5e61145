/**
 * Tests for the config validate CLI command.
 *
 * Covers:
 * - Missing config file (exit 0 with message)
 * - Invalid JSON and unreadable files (exit 1)
 * - Valid and invalid configs in report and JSON modes
 * - Help flag and custom config path
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { configValidateCommand } from './config-validate.js';

vi.mock('node:fs/promises', () => ({
  readFile: vi.fn(),
}));

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
}));

import { readFile } from 'node:fs/promises';
import * as p from '@clack/prompts';

const mockReadFile = vi.mocked(readFile);

function fsError(code: string, message: string): NodeJS.ErrnoException {
  const err: NodeJS.ErrnoException = new Error(message);
  err.code = code;
  return err;
}

describe('configValidateCommand', () => {
  let logs: string[];

  beforeEach(() => {
    vi.clearAllMocks();
    logs = [];
    vi.spyOn(console, 'log').mockImplementation((...args: unknown[]) => {
      logs.push(args.map(String).join(' '));
    });
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  // ============================================================================
  // Missing or unreadable file
  // ============================================================================

  describe('missing config file', () => {
    it('returns exit 0 and reports defaults', async () => {
      mockReadFile.mockRejectedValue(fsError('ENOENT', 'no such file'));

      expect(await configValidateCommand([])).toBe(0);
      expect(p.log.info).toHaveBeenCalledWith('No config file found at .wizard/config.json. Using defaults.');
    });

    it('reads from .wizard/config.json by default', async () => {
      mockReadFile.mockRejectedValue(fsError('ENOENT', 'no such file'));

      await configValidateCommand([]);
      expect(mockReadFile).toHaveBeenCalledWith('.wizard/config.json', 'utf-8');
    });

    it('returns exit 1 when the file cannot be read', async () => {
      mockReadFile.mockRejectedValue(fsError('EACCES', 'permission denied'));

      expect(await configValidateCommand(['--json'])).toBe(1);
      expect(JSON.parse(logs.join('\n'))).toEqual({
        valid: false,
        errors: ['Could not read config: permission denied'],
      });
    });
  });

  describe('invalid JSON', () => {
    it('returns exit 1 for unparseable JSON', async () => {
      mockReadFile.mockResolvedValue('{ not json');

      expect(await configValidateCommand([])).toBe(1);
      expect(p.log.error).toHaveBeenCalledWith('Invalid JSON in config file');
    });
  });

  // ============================================================================
  // Validation
  // ============================================================================

  describe('valid config', () => {
    it('returns exit 0 for an empty object', async () => {
      mockReadFile.mockResolvedValue('{}');

      expect(await configValidateCommand([])).toBe(0);
      expect(p.log.message).toHaveBeenCalledWith('  reference.prefix: WIZ');
    });

    it('outputs the resolved config as JSON', async () => {
      mockReadFile.mockResolvedValue(JSON.stringify({ reference: { prefix: 'SRV' }, cancel: { require_confirmation: false } }));

      expect(await configValidateCommand(['--json'])).toBe(0);
      expect(JSON.parse(logs.join('\n'))).toEqual({
        valid: true,
        errors: [],
        config: {
          drafts: { dir: '.wizard/drafts' },
          journal: { enabled: true, path: '.wizard/journal.jsonl' },
          cancel: { require_confirmation: false },
          reference: { prefix: 'SRV' },
        },
      });
    });
  });

  describe('invalid config', () => {
    it('returns exit 1 with one line per issue', async () => {
      mockReadFile.mockResolvedValue(JSON.stringify({ reference: { prefix: 'NOT-VALID' }, journal: { enabled: 'yes' } }));

      expect(await configValidateCommand(['--json'])).toBe(1);
      const output = JSON.parse(logs.join('\n')) as { valid: boolean; errors: string[] };
      expect(output.valid).toBe(false);
      expect(output.errors).toContain('reference.prefix: must be 1-8 letters or digits');
      expect(output.errors).toContain('journal.enabled: Expected boolean, received string');
    });

    it('reports errors through clack without --json', async () => {
      mockReadFile.mockResolvedValue(JSON.stringify({ drafts: { dir: '' } }));

      expect(await configValidateCommand([])).toBe(1);
      expect(p.log.error).toHaveBeenCalledWith('Errors (1):');
    });
  });

  // ============================================================================
  // Flags
  // ============================================================================

  describe('help flag', () => {
    it('returns exit 0 without reading the file', async () => {
      expect(await configValidateCommand(['--help'])).toBe(0);
      expect(await configValidateCommand(['-h'])).toBe(0);
      expect(mockReadFile).not.toHaveBeenCalled();
    });
  });

  describe('custom config path (--config)', () => {
    it('reads from the given path', async () => {
      mockReadFile.mockResolvedValue('{}');

      await configValidateCommand(['--config=/tmp/other.json']);
      expect(mockReadFile).toHaveBeenCalledWith('/tmp/other.json', 'utf-8');
    });
  });
});
