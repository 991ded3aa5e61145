/**
 * CLI command: `wizard-engine config validate`
 *
 * Reads the wizard config file, validates it against the config schema
 * and displays a report.
 *
 * Exit codes:
 * - 0: Config is valid, or absent (defaults apply)
 * - 1: Unreadable file, invalid JSON or schema errors
 *
 * @module cli/commands/config-validate
 */

import * as p from '@clack/prompts';
import pc from 'picocolors';
import { readFile } from 'node:fs/promises';
import { validateWizardConfig, DEFAULT_CONFIG_PATH, DEFAULT_WIZARD_CONFIG } from '../../config/index.js';
import type { WizardConfig } from '../../config/index.js';
import { isNotFoundError } from '../../errors/fs.js';
import { extractFlag, hasFlag, wantsHelp } from '../flags.js';

interface ValidationReport {
  valid: boolean;
  errors: string[];
  config?: WizardConfig;
  message?: string;
}

/**
 * Execute the `config validate` CLI command.
 *
 * @param args - CLI arguments after `config validate`
 * @returns Exit code (0 = ok, 1 = errors found)
 */
export async function configValidateCommand(args: string[]): Promise<number> {
  if (wantsHelp(args)) {
    showHelp();
    return 0;
  }

  const jsonMode = hasFlag(args, 'json');
  const configPath = extractFlag(args, 'config') ?? DEFAULT_CONFIG_PATH;

  let content: string;
  try {
    content = await readFile(configPath, 'utf-8');
  } catch (err) {
    if (isNotFoundError(err)) {
      const message = `No config file found at ${configPath}. Using defaults.`;
      if (jsonMode) {
        output({ valid: true, errors: [], config: DEFAULT_WIZARD_CONFIG, message });
      } else {
        p.log.info(message);
      }
      return 0;
    }
    const message = `Could not read config: ${err instanceof Error ? err.message : String(err)}`;
    if (jsonMode) {
      output({ valid: false, errors: [message] });
    } else {
      p.log.error(message);
    }
    return 1;
  }

  let raw: unknown;
  try {
    raw = JSON.parse(content);
  } catch {
    if (jsonMode) {
      output({ valid: false, errors: ['Invalid JSON in config file'] });
    } else {
      p.log.error('Invalid JSON in config file');
    }
    return 1;
  }

  const result = validateWizardConfig(raw);
  const report: ValidationReport = result.valid
    ? { valid: true, errors: [], config: result.config }
    : { valid: false, errors: result.errors };

  if (jsonMode) {
    output(report);
  } else {
    displayReport(report, configPath);
  }
  return report.valid ? 0 : 1;
}

function output(report: ValidationReport): void {
  console.log(JSON.stringify(report, null, 2));
}

function displayReport(report: ValidationReport, configPath: string): void {
  p.intro(pc.bgCyan(pc.black(' Config Validation Report ')));
  p.log.message(`Source: ${configPath}`);

  if (!report.valid) {
    p.log.error(`Errors (${report.errors.length}):`);
    for (const error of report.errors) {
      p.log.message(`  ${pc.red('x')} ${error}`);
    }
    p.outro(pc.red(`Summary: ${report.errors.length} error(s)`));
    return;
  }

  if (report.config) {
    p.log.message(`  drafts.dir: ${report.config.drafts.dir}`);
    p.log.message(`  journal: ${report.config.journal.enabled ? report.config.journal.path : pc.dim('disabled')}`);
    p.log.message(`  cancel.require_confirmation: ${String(report.config.cancel.require_confirmation)}`);
    p.log.message(`  reference.prefix: ${report.config.reference.prefix}`);
  }
  p.outro(pc.green('Configuration is valid. No issues found.'));
}

function showHelp(): void {
  console.log(`
wizard-engine config validate - Validate wizard engine configuration

Usage:
  wizard-engine config validate [options]

Options:
  --config=PATH   Path to config file (default: .wizard/config.json)
  --json          Output results as JSON
  --help, -h      Show this help message

Exit Codes:
  0   Config is valid, or missing (defaults apply)
  1   Config has errors

Examples:
  wizard-engine config validate
  wizard-engine config validate --json --config=/path/to/config.json
`);
}
