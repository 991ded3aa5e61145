/**
 * CLI command: `wizard-engine journal`
 *
 * Reads the wizard event journal and prints matching entries, oldest
 * first. JSON by default, --pretty for one line per entry.
 *
 * @module cli/commands/journal
 */

import * as p from '@clack/prompts';
import pc from 'picocolors';
import { WizardJournal, JournalEventSchema, JOURNAL_EVENTS } from '../../journal/index.js';
import type { JournalEntry, ReadJournalOptions } from '../../journal/index.js';
import { readWizardConfig, DEFAULT_CONFIG_PATH } from '../../config/index.js';
import { extractFlag, hasFlag, reportError, wantsHelp } from '../flags.js';

function showHelp(): void {
  console.log(`
wizard-engine journal - Show wizard events

Usage:
  wizard-engine journal [options]
  wizard-engine j [options]

Options:
  --path=PATH        Journal file (default: journal.path from config)
  --config=PATH      Config file (default: .wizard/config.json)
  --wizard=ID        Only entries for this wizard definition
  --instance=ID      Only entries for this wizard instance
  --event=NAME       Only this event (${JOURNAL_EVENTS.join(', ')})
  --limit=N          Only the last N matching entries
  --pretty           Human-readable output

Examples:
  wizard-engine journal --wizard=office-intake --pretty
  wizard-engine j --event=fatal --limit=20
`);
}

/**
 * Build read options from flags. Returns an error message on bad input.
 */
function parseOptions(args: string[]): ReadJournalOptions | string {
  const options: ReadJournalOptions = {};

  const wizardId = extractFlag(args, 'wizard');
  if (wizardId) options.wizardId = wizardId;

  const instanceId = extractFlag(args, 'instance');
  if (instanceId) options.instanceId = instanceId;

  const event = extractFlag(args, 'event');
  if (event !== undefined) {
    const parsed = JournalEventSchema.safeParse(event);
    if (!parsed.success) {
      return `Unknown event "${event}". Expected one of: ${JOURNAL_EVENTS.join(', ')}`;
    }
    options.event = parsed.data;
  }

  const limit = extractFlag(args, 'limit');
  if (limit !== undefined) {
    const n = Number(limit);
    if (!Number.isInteger(n) || n < 0) {
      return `--limit must be a non-negative integer, got "${limit}"`;
    }
    options.limit = n;
  }

  return options;
}

function formatEntry(entry: JournalEntry): string {
  const step = entry.stepId ? ` ${entry.stepId}` : '';
  return `${pc.dim(entry.timestamp)} ${pc.bold(entry.event)} ${entry.referenceNumber}${step}`;
}

/**
 * Execute the `journal` CLI command.
 *
 * @param args - CLI arguments after `journal`
 * @returns Exit code (0 = ok, 1 = bad flags or unreadable journal)
 */
export async function journalCommand(args: string[]): Promise<number> {
  if (wantsHelp(args)) {
    showHelp();
    return 0;
  }

  const options = parseOptions(args);
  if (typeof options === 'string') {
    return reportError(options);
  }

  try {
    let logPath = extractFlag(args, 'path');
    if (!logPath) {
      const config = await readWizardConfig(extractFlag(args, 'config') ?? DEFAULT_CONFIG_PATH);
      logPath = config.journal.path;
    }

    const entries = await new WizardJournal(logPath).read(options);

    if (hasFlag(args, 'pretty')) {
      if (entries.length === 0) {
        p.log.message('No journal entries.');
      } else {
        for (const entry of entries) {
          p.log.message(formatEntry(entry));
        }
      }
    } else {
      console.log(JSON.stringify({ entries }, null, 2));
    }
    return 0;
  } catch (err) {
    return reportError(err);
  }
}
