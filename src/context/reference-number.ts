/**
 * Human-readable reference numbers for wizard instances.
 *
 * Format: `{PREFIX}-{YYYYMMDDHHMMSS}-{XXXX}` where XXXX is the first four
 * characters of the instance id, upper-cased. Example: `SRV-20260118153045-A3F2`.
 *
 * @module context/reference-number
 */

/** Prefix used when a wizard definition does not supply one. */
export const DEFAULT_REFERENCE_PREFIX = 'WIZ';

const REFERENCE_PATTERN = /^[A-Z0-9]+-\d{14}-[A-Z0-9]{4}$/;

function pad(value: number): string {
  return String(value).padStart(2, '0');
}

/**
 * Build a reference number from a prefix, a timestamp and an instance id.
 *
 * The timestamp uses local time, matching what a clerk sees on the wall clock.
 * Non-alphanumeric characters are stripped from the id before slicing.
 */
export function generateReferenceNumber(
  prefix: string,
  instanceId: string,
  now: Date = new Date(),
): string {
  const stamp =
    `${now.getFullYear()}${pad(now.getMonth() + 1)}${pad(now.getDate())}` +
    `${pad(now.getHours())}${pad(now.getMinutes())}${pad(now.getSeconds())}`;
  const shortId = instanceId.replace(/[^a-zA-Z0-9]/g, '').slice(0, 4).toUpperCase().padEnd(4, '0');
  const cleanPrefix = prefix.replace(/[^a-zA-Z0-9]/g, '').toUpperCase() || DEFAULT_REFERENCE_PREFIX;
  return `${cleanPrefix}-${stamp}-${shortId}`;
}

export function isReferenceNumber(value: string): boolean {
  return REFERENCE_PATTERN.test(value);
}
