import { resolve, sep } from 'node:path';
import { UnsafeDraftIdError } from '../errors/engine-errors.js';

// ============================================================================
// Draft id safety
// ============================================================================
// Draft ids become file names in FileDraftStore and arrive from the CLI,
// so they are checked before any path is built from them.

export interface DraftIdCheck {
  valid: boolean;
  error?: string;
}

export function checkDraftId(id: string): DraftIdCheck {
  if (id === '') {
    return { valid: false, error: 'id is empty' };
  }

  if (id.includes('\0')) {
    return { valid: false, error: 'id contains null byte' };
  }

  if (id.startsWith('.')) {
    return { valid: false, error: 'id starts with a dot' };
  }

  if (id.includes('/') || id.includes('\\')) {
    return { valid: false, error: 'id contains a path separator' };
  }

  if (id.includes('..')) {
    return { valid: false, error: 'id contains path traversal sequence: ..' };
  }

  return { valid: true };
}

/**
 * Resolve the file for a draft id inside the store directory.
 *
 * @throws {UnsafeDraftIdError} If the id is unsafe or the path escapes the directory
 */
export function draftFilePath(dir: string, id: string, extension = '.yaml'): string {
  const check = checkDraftId(id);
  if (!check.valid) {
    throw new UnsafeDraftIdError(id, check.error ?? 'invalid id');
  }

  const base = resolve(dir);
  const file = resolve(base, `${id}${extension}`);
  if (!file.startsWith(base + sep)) {
    throw new UnsafeDraftIdError(id, `path escapes draft directory "${base}"`);
  }
  return file;
}
