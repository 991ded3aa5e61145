/**
 * Zod schema for the wizard engine config file (`.wizard/config.json`).
 *
 * Every field has a `.default()` so that `WizardConfigSchema.parse({})`
 * returns a complete config. Nested sections use `.default(() => ({ ... }))`
 * factories so that an absent section is filled in as a whole.
 *
 * @module config/schema
 */

import { z } from 'zod';

// ============================================================================
// Sections
// ============================================================================

export const DraftsConfigSchema = z.object({
  dir: z.string().min(1).default('.wizard/drafts'),
});

export const JournalConfigSchema = z.object({
  enabled: z.boolean().default(true),
  path: z.string().min(1).default('.wizard/journal.jsonl'),
});

/**
 * require_confirmation: cancelling a wizard with committed remote steps
 * needs an explicit confirmation.
 */
export const CancelConfigSchema = z.object({
  require_confirmation: z.boolean().default(true),
});

/**
 * Fallback prefix for reference numbers when a wizard definition does not
 * set one. Letters and digits only.
 */
export const ReferenceConfigSchema = z.object({
  prefix: z
    .string()
    .regex(/^[A-Za-z0-9]{1,8}$/, 'must be 1-8 letters or digits')
    .default('WIZ'),
});

// ============================================================================
// Composite schema
// ============================================================================

export const WizardConfigSchema = z.object({
  drafts: DraftsConfigSchema.default(() => ({ dir: '.wizard/drafts' })),
  journal: JournalConfigSchema.default(() => ({
    enabled: true,
    path: '.wizard/journal.jsonl',
  })),
  cancel: CancelConfigSchema.default(() => ({ require_confirmation: true })),
  reference: ReferenceConfigSchema.default(() => ({ prefix: 'WIZ' })),
});

export type WizardConfig = z.infer<typeof WizardConfigSchema>;

export const DEFAULT_WIZARD_CONFIG: WizardConfig = WizardConfigSchema.parse({});
