/**
 * CLI subcommand handler for saved wizard drafts.
 *
 * Subcommands:
 * - list: Show saved drafts, most recent first
 * - show: Print one draft record
 * - delete: Remove a draft (asks first when it has committed remote steps)
 *
 * JSON output by default; --pretty for human-readable output. Failures
 * print `{ error }` JSON and exit 1.
 *
 * @module cli/commands/drafts
 */

import * as p from '@clack/prompts';
import pc from 'picocolors';
import { FileDraftStore, summarizeDraft } from '../../drafts/index.js';
import type { DraftSummary } from '../../drafts/index.js';
import { readWizardConfig, DEFAULT_CONFIG_PATH } from '../../config/index.js';
import { extractFlag, hasFlag, positionalArgs, reportError } from '../flags.js';

// ============================================================================
// Store resolution
// ============================================================================

/**
 * --dir wins; otherwise the drafts dir from the config file.
 */
async function resolveStore(args: string[]): Promise<FileDraftStore> {
  const dir = extractFlag(args, 'dir');
  if (dir) return new FileDraftStore(dir);
  const config = await readWizardConfig(extractFlag(args, 'config') ?? DEFAULT_CONFIG_PATH);
  return new FileDraftStore(config.drafts.dir);
}

// ============================================================================
// Help text
// ============================================================================

function showDraftsHelp(): void {
  console.log(`
wizard-engine drafts - Manage saved wizard drafts

Usage:
  wizard-engine drafts <subcommand> [options]
  wizard-engine d <subcommand> [options]

Subcommands:
  list, ls         List saved drafts (resumable only, unless --all)
  show <id>        Print a draft record
  delete, rm <id>  Delete a draft

Options:
  --dir=PATH       Drafts directory (default: drafts.dir from config)
  --config=PATH    Config file (default: .wizard/config.json)
  --all            Include completed drafts in list
  --yes            Delete without asking, even with committed steps
  --pretty         Human-readable output

Examples:
  wizard-engine drafts list --pretty
  wizard-engine d show a3f2c9d0-1111-2222
  wizard-engine drafts delete a3f2c9d0-1111-2222 --yes
`);
}

// ============================================================================
// List subcommand
// ============================================================================

async function handleList(args: string[]): Promise<number> {
  try {
    const store = await resolveStore(args);
    const all = await store.list();
    const drafts = hasFlag(args, 'all') ? all : all.filter((d) => !d.completed);

    if (hasFlag(args, 'pretty')) {
      if (drafts.length === 0) {
        p.log.message('No saved drafts.');
      } else {
        p.log.message(pc.bold(`Drafts (${drafts.length}):`));
        for (const draft of drafts) {
          p.log.message(formatSummary(draft));
        }
      }
    } else {
      console.log(JSON.stringify({ drafts }, null, 2));
    }
    return 0;
  } catch (err) {
    return reportError(err);
  }
}

function formatSummary(draft: DraftSummary): string {
  const state = draft.completed ? pc.green('completed') : `step ${draft.currentStepIndex + 1}`;
  const committed = draft.committedSteps.length > 0
    ? pc.dim(` committed: ${draft.committedSteps.join(', ')}`)
    : '';
  return `  ${draft.id}  ${draft.referenceNumber}  ${draft.wizardId}  ${state}  ${pc.dim(draft.updatedAt)}${committed}`;
}

// ============================================================================
// Show subcommand
// ============================================================================

async function handleShow(args: string[]): Promise<number> {
  const id = positionalArgs(args)[0];
  if (!id) {
    return reportError('Usage: wizard-engine drafts show <id>');
  }

  try {
    const store = await resolveStore(args);
    const record = await store.load(id);
    if (!record) {
      return reportError(`Draft not found: ${id}`);
    }

    if (hasFlag(args, 'pretty')) {
      const summary = summarizeDraft(record);
      p.log.message(pc.bold(`${record.referenceNumber} (${record.wizardId})`));
      p.log.message(formatSummary(summary));
      for (const [key, value] of Object.entries(record.contextSnapshot.slots)) {
        const locked = record.contextSnapshot.finalized.includes(key) ? pc.dim(' (locked)') : '';
        p.log.message(`    ${key}: ${JSON.stringify(value)}${locked}`);
      }
    } else {
      console.log(JSON.stringify({ draft: record }, null, 2));
    }
    return 0;
  } catch (err) {
    return reportError(err);
  }
}

// ============================================================================
// Delete subcommand
// ============================================================================

async function handleDelete(args: string[]): Promise<number> {
  const id = positionalArgs(args)[0];
  if (!id) {
    return reportError('Usage: wizard-engine drafts delete <id>');
  }

  try {
    const store = await resolveStore(args);
    const record = await store.load(id);
    if (!record) {
      return reportError(`Draft not found: ${id}`);
    }

    const { committedSteps } = summarizeDraft(record);
    if (committedSteps.length > 0 && !record.completed && !hasFlag(args, 'yes')) {
      const confirmed = await p.confirm({
        message: `Draft ${id} has committed remote steps (${committedSteps.join(', ')}). Delete anyway?`,
        initialValue: false,
      });
      if (p.isCancel(confirmed) || !confirmed) {
        p.cancel('Cancelled');
        return 1;
      }
    }

    await store.delete(id);
    console.log(JSON.stringify({ deleted: id }, null, 2));
    return 0;
  } catch (err) {
    return reportError(err);
  }
}

// ============================================================================
// Dispatch
// ============================================================================

/**
 * Execute the `drafts` CLI command.
 *
 * @param args - CLI arguments after `drafts`
 * @returns Exit code
 */
export async function draftsCommand(args: string[]): Promise<number> {
  const [subcommand, ...rest] = args;

  switch (subcommand) {
    case 'list':
    case 'ls':
      return handleList(rest);
    case 'show':
      return handleShow(rest);
    case 'delete':
    case 'rm':
      return handleDelete(rest);
    case undefined:
    case 'help':
    case '--help':
    case '-h':
      showDraftsHelp();
      return 0;
    default:
      showDraftsHelp();
      return 1;
  }
}
