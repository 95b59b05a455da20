#!/usr/bin/env node
/**
 * Review Harvester entry point
 *
 * Usage:
 *   review-harvester -k "laptop bag" -s 5 -p 3 -m 2
 *   review-harvester --interactive
 *   review-harvester login --manual
 */

import "dotenv/config";

import { createCli } from "@/cli/createCli";

createCli()
  .parseAsync(process.argv)
  .catch(() => {
    // already reported on stderr by the command handler
    process.exitCode = 1;
  });
