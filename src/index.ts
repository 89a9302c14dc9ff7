#!/usr/bin/env node

/**
 * rg-purge
 *
 * Delete Azure resource groups across every subscription visible to the
 * signed-in account, keeping any group that matches an exclusion pattern.
 *
 * Usage:
 *   rg-purge --exclude rg-prod 'rg-.*-keep' --workers 10
 *   rg-purge --dry-run
 */

import { main } from "./cli";
import { errorMessage } from "./errors";

main().then(
  (code) => {
    process.exitCode = code;
  },
  (err: unknown) => {
    console.error(`Fatal error: ${errorMessage(err)}`);
    process.exitCode = 1;
  },
);
