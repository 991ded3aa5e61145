#!/usr/bin/env node
import * as p from '@clack/prompts';
import { runCli } from './cli/run.js';

async function main() {
  const exitCode = await runCli(process.argv.slice(2));
  if (exitCode !== 0) {
    process.exit(exitCode);
  }
}

main().catch((err: unknown) => {
  p.log.error(err instanceof Error ? err.message : String(err));
  process.exit(1);
});
