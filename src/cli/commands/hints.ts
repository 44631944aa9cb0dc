/**
 * Hints command - list the field hints of known shortcuts
 */

import { Command } from "commander";
import { createDefaultCatalog } from "../../lib/catalog/index.js";
import type { ShortcutDescriptor } from "../../lib/catalog/types.js";
import type { ShortcutKind } from "../../types/route.js";
import { ValidationError } from "../../utils/errors.js";
import type { HintsCommandOptions } from "../config/types.js";
import { failCommand } from "../errors.js";

function parseKind(kind: string | undefined): ShortcutKind | undefined {
  if (kind === undefined || kind === "predicate" || kind === "filter") {
    return kind;
  }
  throw new ValidationError(`Invalid kind: ${kind}. Must be predicate or filter`);
}

export function listHints(options: HintsCommandOptions): ShortcutDescriptor[] {
  const kind = parseKind(options.kind);
  const descriptors = createDefaultCatalog().list(kind);
  if (options.name === undefined) {
    return descriptors;
  }
  const name = options.name.toLowerCase();
  return descriptors.filter((descriptor) => descriptor.name.toLowerCase() === name);
}

export function createHintsCommand(): Command {
  return new Command("hints")
    .description("List built-in shortcut field hints")
    .option("--kind <kind>", "Only list predicate or filter shortcuts")
    .option("--name <name>", "Only list the shortcut with this name")
    .action((options: HintsCommandOptions) => {
      try {
        const shortcuts = listHints(options);
        console.log(JSON.stringify({ status: "success", phase: "hints", shortcuts }, null, 2));
      } catch (error) {
        failCommand(error, "hints");
      }
    });
}
