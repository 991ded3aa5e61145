import { describe, it, expect } from 'vitest';
import { join, resolve } from 'node:path';
import { UnsafeDraftIdError } from '../errors/engine-errors.js';
import { checkDraftId, draftFilePath } from './draft-id.js';

describe('checkDraftId', () => {
  it('accepts uuids and plain names', () => {
    expect(checkDraftId('0b7c1e9a-5d2f-4c1a-9f61-2a3b4c5d6e7f')).toEqual({ valid: true });
    expect(checkDraftId('intake_2026')).toEqual({ valid: true });
  });

  it.each([
    ['', 'id is empty'],
    ['a\0b', 'id contains null byte'],
    ['.hidden', 'id starts with a dot'],
    ['..', 'id starts with a dot'],
    ['a/b', 'id contains a path separator'],
    ['a\\b', 'id contains a path separator'],
    ['a..b', 'id contains path traversal sequence: ..'],
  ])('rejects %j', (id, error) => {
    expect(checkDraftId(id)).toEqual({ valid: false, error });
  });
});

describe('draftFilePath', () => {
  it('resolves inside the directory', () => {
    expect(draftFilePath('drafts', 'draft-1')).toBe(resolve(join('drafts', 'draft-1.yaml')));
  });

  it('throws for unsafe ids', () => {
    expect(() => draftFilePath('drafts', '../escape')).toThrow(UnsafeDraftIdError);
    expect(() => draftFilePath('drafts', '../escape')).toThrow('Unsafe draft id "../escape": id starts with a dot');
  });
});
