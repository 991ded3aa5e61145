/**
 * Config file reader with Zod validation.
 *
 * Missing file = all defaults. Invalid JSON or a schema failure throws
 * WizardConfigError with one `path: message` line per issue.
 *
 * @module config/reader
 */

import { readFile } from 'node:fs/promises';
import { join } from 'node:path';
import { WizardConfigError } from '../errors/engine-errors.js';
import { isNotFoundError } from '../errors/fs.js';
import { DEFAULT_WIZARD_CONFIG, WizardConfigSchema } from './schema.js';
import type { WizardConfig } from './schema.js';

/** Default path for the config file. */
export const DEFAULT_CONFIG_PATH = join('.wizard', 'config.json');

export type ConfigValidation = { valid: true; config: WizardConfig } | { valid: false; errors: string[] };

/**
 * Read and validate the config file.
 *
 * @throws {WizardConfigError} On invalid JSON or validation failure
 */
export async function readWizardConfig(configPath: string = DEFAULT_CONFIG_PATH): Promise<WizardConfig> {
  let content: string;
  try {
    content = await readFile(configPath, 'utf-8');
  } catch (err) {
    if (isNotFoundError(err)) {
      return structuredClone(DEFAULT_WIZARD_CONFIG);
    }
    throw err;
  }

  let raw: unknown;
  try {
    raw = JSON.parse(content);
  } catch {
    throw new WizardConfigError(`Invalid JSON in config file: ${configPath}`);
  }

  const validation = validateWizardConfig(raw);
  if (!validation.valid) {
    throw new WizardConfigError(`Config validation failed:\n${validation.errors.join('\n')}`, validation.errors);
  }
  return validation.config;
}

/**
 * Validate raw input against the config schema (no I/O).
 */
export function validateWizardConfig(raw: unknown): ConfigValidation {
  const result = WizardConfigSchema.safeParse(raw);
  if (result.success) {
    return { valid: true, config: result.data };
  }
  return {
    valid: false,
    errors: result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
  };
}
