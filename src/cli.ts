#!/usr/bin/env node

import { resolveDashboardEnv } from './config/env-config.js';
import { logger } from './cli/logger.js';
import { runCli } from './cli/main.js';
import { createNodeRuntime } from './cli/runtime.js';
import { errorMessage } from './utils/error-utils.js';
import { getAppVersion } from './utils/version.js';

async function main(): Promise<void> {
  const code = await runCli(process.argv, {
    cliVersion: getAppVersion(),
    runtime: createNodeRuntime(),
    env: resolveDashboardEnv()
  });
  // `serve` keeps the event loop alive after parsing; only failures set the code.
  if (code !== 0) {
    process.exitCode = code;
  }
}

main().catch((error: unknown) => {
  logger.error(errorMessage(error));
  process.exit(1);
});
