#!/usr/bin/env node
/**
 * @fileoverview drive-replicate entry point.
 *
 * Usage:
 *   npm run replicate [-- --plan path/to/plan.json]
 *   npm run auth
 */

import { validateConfig } from './config.js';
import { USAGE, UsageError, parseArgs } from './cli/args.js';
import { runAuthorization, runReplication } from './cli/commands.js';
import { describeError } from './utils/errors.js';
import { initObservability } from './utils/observability/index.js';

async function main(args: string[]): Promise<void> {
  initObservability();
  const options = parseArgs(args);

  switch (options.command) {
    case 'help':
      console.log(USAGE);
      return;
    case 'auth':
      await runAuthorization(options.account);
      return;
    case 'run':
      validateConfig();
      await runReplication({ planPath: options.planPath, account: options.account });
      return;
  }
}

main(process.argv.slice(2)).catch((error: unknown) => {
  console.error(`Error: ${describeError(error)}`);
  if (error instanceof UsageError) {
    console.error(USAGE);
  }
  process.exit(1);
});
