/**
 * Type definitions for the wizard context.
 *
 * Context slots hold JSON-like values only, so that every snapshot can be
 * written to a draft and read back without loss:
 * - ContextValue: scalar, array or nested record
 * - ContextSnapshot: slot values plus the ordered list of finalized keys
 *
 * @module context/types
 */

import { z } from 'zod';

// ============================================================================
// ContextValue
// ============================================================================

export type ContextValue =
  | string
  | number
  | boolean
  | null
  | ContextValue[]
  | { [key: string]: ContextValue };

export type ContextRecord = Record<string, ContextValue>;

/**
 * Recursive schema for a single context value.
 *
 * Numbers must be finite: NaN and Infinity do not survive JSON or YAML.
 */
export const ContextValueSchema: z.ZodType<ContextValue> = z.lazy(() =>
  z.union([
    z.string(),
    z.number().finite(),
    z.boolean(),
    z.null(),
    z.array(ContextValueSchema),
    z.record(z.string(), ContextValueSchema),
  ]),
);

// ============================================================================
// ContextSnapshot
// ============================================================================

/**
 * Schema for a serialized context.
 *
 * Required: slots
 * Optional with defaults: finalized ([])
 */
export const ContextSnapshotSchema = z.object({
  slots: z.record(z.string(), ContextValueSchema),
  finalized: z.array(z.string()).default(() => []),
});

export type ContextSnapshot = z.infer<typeof ContextSnapshotSchema>;

/**
 * Read-only view of a context, handed to remote services and presentation code.
 */
export interface ContextReader {
  get(key: string): ContextValue | undefined;
  require(key: string): ContextValue;
  has(key: string): boolean;
  isFinalized(key: string): boolean;
  keys(): string[];
  toSnapshot(): ContextSnapshot;
}
