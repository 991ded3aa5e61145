/**
 * Argument parsing helpers shared by the CLI commands.
 *
 * @module cli/flags
 */

/**
 * Extract a flag value from args in --key=value format.
 */
export function extractFlag(args: string[], flag: string): string | undefined {
  const prefix = `--${flag}=`;
  const arg = args.find((a) => a.startsWith(prefix));
  return arg ? arg.slice(prefix.length) : undefined;
}

/**
 * Check if a boolean flag is present in args.
 */
export function hasFlag(args: string[], flag: string): boolean {
  return args.includes(`--${flag}`);
}

/**
 * Arguments that are not flags.
 */
export function positionalArgs(args: string[]): string[] {
  return args.filter((a) => !a.startsWith('-'));
}

export function wantsHelp(args: string[]): boolean {
  return args.includes('--help') || args.includes('-h');
}

/**
 * Print `{ error }` as JSON and return exit code 1.
 */
export function reportError(err: unknown): number {
  console.log(JSON.stringify({
    error: err instanceof Error ? err.message : String(err),
  }, null, 2));
  return 1;
}
