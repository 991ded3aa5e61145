/**
 * Wiring from a config file to controller options.
 *
 * @module runtime
 */

import { FileDraftStore } from './drafts/file-draft-store.js';
import type { DraftStore } from './drafts/types.js';
import { WizardJournal, NoopJournal } from './journal/wizard-journal.js';
import type { JournalSink } from './journal/types.js';
import { readWizardConfig, DEFAULT_CONFIG_PATH } from './config/reader.js';
import type { WizardConfig } from './config/schema.js';
import { WizardController } from './controller/wizard-controller.js';
import type { WizardControllerOptions } from './controller/types.js';
import type { WizardDefinition } from './steps/types.js';

export interface WizardRuntime {
  config: WizardConfig;
  draftStore: DraftStore;
  journal: JournalSink;
}

/**
 * Create the stores a controller needs from a validated config.
 */
export function createWizardRuntime(config: WizardConfig): WizardRuntime {
  return {
    config,
    draftStore: new FileDraftStore(config.drafts.dir),
    journal: config.journal.enabled ? new WizardJournal(config.journal.path) : new NoopJournal(),
  };
}

/**
 * Read the config file and create a runtime from it.
 *
 * @throws {WizardConfigError} On invalid JSON or validation failure
 */
export async function loadWizardRuntime(configPath: string = DEFAULT_CONFIG_PATH): Promise<WizardRuntime> {
  return createWizardRuntime(await readWizardConfig(configPath));
}

export function runtimeOptions(runtime: WizardRuntime): WizardControllerOptions {
  return {
    draftStore: runtime.draftStore,
    journal: runtime.journal,
    requireCancelConfirmation: runtime.config.cancel.require_confirmation,
    referencePrefix: runtime.config.reference.prefix,
  };
}

/**
 * Build a controller for one wizard instance. Overrides win over the
 * options derived from the runtime.
 */
export function createWizard(
  definition: WizardDefinition,
  runtime: WizardRuntime,
  overrides: WizardControllerOptions = {},
): WizardController {
  return new WizardController(definition, { ...runtimeOptions(runtime), ...overrides });
}
