/**
 * Top-level command dispatch for the `wizard-engine` binary.
 *
 * @module cli/run
 */

import { createRequire } from 'node:module';
import * as p from '@clack/prompts';
import pc from 'picocolors';
import { draftsCommand } from './commands/drafts.js';
import { journalCommand } from './commands/journal.js';
import { configValidateCommand } from './commands/config-validate.js';

function printVersion(): void {
  const require = createRequire(import.meta.url);
  const pkg: { name: string; version: string } = require('../../package.json');

  console.log(`${pkg.name}  v${pkg.version}`);
  console.log(`Node.js        ${process.version}`);
  console.log(`Platform       ${process.platform} ${process.arch}`);
}

export function showHelp(): void {
  console.log(`
${pc.bold('wizard-engine')} - Inspect resumable wizard drafts and events

Usage:
  wizard-engine <command> [options]

Commands:
  drafts, d         List, show and delete saved drafts
  journal, j        Show wizard journal events
  config validate   Validate .wizard/config.json

Options:
  --help, -h        Show this help message
  --version, -V     Show version information

Run 'wizard-engine <command> --help' for command options.
`);
}

/**
 * Dispatch a command line (without the node and script arguments).
 *
 * @returns Exit code
 */
export async function runCli(args: string[]): Promise<number> {
  const [command, ...rest] = args;

  if (command === '--version' || command === '-V') {
    printVersion();
    return 0;
  }

  switch (command) {
    case 'drafts':
    case 'd':
      return draftsCommand(rest);

    case 'journal':
    case 'j':
      return journalCommand(rest);

    case 'config': {
      const [sub, ...configArgs] = rest;
      if (sub === 'validate') {
        return configValidateCommand(configArgs);
      }
      p.log.error(sub ? `Unknown config subcommand: ${sub}` : 'Missing config subcommand');
      p.log.message(`Usage: wizard-engine config validate [--config=PATH] [--json]`);
      return 1;
    }

    case undefined:
    case 'help':
    case '-h':
    case '--help':
      showHelp();
      return 0;

    default:
      p.log.error(`Unknown command: ${command}`);
      showHelp();
      return 1;
  }
}
