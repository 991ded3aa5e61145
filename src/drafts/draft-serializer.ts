/**
 * YAML (de)serialization of draft records.
 *
 * Drafts are written as sorted, human-readable YAML and loaded with the
 * JSON schema (no custom tags), then validated with DraftRecordSchema.
 *
 * @module drafts/draft-serializer
 */

import yaml from 'js-yaml';
import { DraftCorruptError } from '../errors/engine-errors.js';
import { DraftRecordSchema } from './types.js';
import type { DraftRecord } from './types.js';

export function serializeDraft(record: DraftRecord): string {
  return yaml.dump(record, {
    indent: 2,
    lineWidth: 120,
    noRefs: true,
    sortKeys: true,
  });
}

/**
 * Parse and validate a serialized draft.
 *
 * @param source - File path or other label used in error messages
 * @throws {DraftCorruptError} On invalid YAML or a schema violation
 */
export function parseDraft(content: string, source?: string): DraftRecord {
  const label = source ?? 'draft';

  let raw: unknown;
  try {
    raw = yaml.load(content, { schema: yaml.JSON_SCHEMA });
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new DraftCorruptError(`Invalid YAML in ${label}: ${reason}`, source);
  }

  const result = DraftRecordSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new DraftCorruptError(`Invalid draft in ${label}:\n${issues.join('\n')}`, source, issues);
  }
  return result.data;
}
