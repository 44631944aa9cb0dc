/**
 * Program definition, kept apart from the entry point so it can be driven in-process
 */

import { Command } from "commander";
import { createHintsCommand } from "./commands/hints.js";
import { createNormalizeCommand } from "./commands/normalize.js";

const pkg = {
  name: "shortcut-args",
  version: "0.1.0",
  description: "Normalize shorthand route predicate and filter arguments into typed configuration",
};

/**
 * Main CLI program
 */
export function createProgram(): Command {
  const program = new Command();

  program
    .name(pkg.name)
    .description(pkg.description)
    .version(pkg.version)
    .option("--log-level <level>", "Logging verbosity: error, warn, info, debug");

  program.addCommand(createNormalizeCommand());
  program.addCommand(createHintsCommand());

  return program;
}
