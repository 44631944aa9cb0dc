#!/usr/bin/env node

/**
 * shortcut-args CLI - normalize shorthand route predicate and filter arguments
 */

import { createProgram } from "./program.js";
import { logger } from "../utils/logger.js";

/**
 * CLI entry point
 */
async function main(): Promise<void> {
  await createProgram().parseAsync(process.argv);
}

main().catch((error: unknown) => {
  const message = error instanceof Error ? error.message : String(error);
  logger.error("Unexpected error", { error: message });
  console.error(
    JSON.stringify(
      {
        status: "error",
        error: {
          code: "UNEXPECTED_ERROR",
          message,
        },
      },
      null,
      2,
    ),
  );
  process.exit(1);
});
