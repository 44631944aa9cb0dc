/**
 * Normalize command - expand shortcut arguments of every route in a file
 */

import { Command } from "commander";
import { mkdir, writeFile } from "fs/promises";
import { dirname } from "path";
import { createDefaultCatalog } from "../../lib/catalog/index.js";
import { TemplateExpressionResolver } from "../../lib/expression/index.js";
import { InMemoryServiceRegistry } from "../../lib/registry/index.js";
import { normalizeRoutes } from "../../lib/routes/index.js";
import type { NormalizedRoute } from "../../types/route.js";
import { loadNormalizeOptions } from "../../utils/config-loader.js";
import { FileIOError } from "../../utils/errors.js";
import { logger } from "../../utils/logger.js";
import { parseRouteFile } from "../config/parser.js";
import type { GlobalOptions, NormalizeCommandOptions, RouteFileConfig } from "../config/types.js";
import { failCommand } from "../errors.js";

/**
 * Run the whole pipeline for an already-parsed route file
 */
export function normalizeRouteFile(
  config: RouteFileConfig,
  options: { coerce: boolean },
): NormalizedRoute[] {
  const catalog = createDefaultCatalog();
  for (const descriptor of config.shortcuts ?? []) {
    if (catalog.get(descriptor.kind, descriptor.name)) {
      logger.warn("Overriding built-in shortcut", {
        kind: descriptor.kind,
        name: descriptor.name,
      });
    }
    catalog.register(descriptor);
  }

  return normalizeRoutes(config.routes, {
    catalog,
    resolver: new TemplateExpressionResolver(),
    registry: new InMemoryServiceRegistry(config.services ?? {}),
    coerce: options.coerce,
  });
}

export async function writeOutput(outputPath: string, output: string): Promise<void> {
  try {
    await mkdir(dirname(outputPath), { recursive: true });
    await writeFile(outputPath, output, "utf8");
  } catch (error) {
    throw new FileIOError(`Failed to write output: ${outputPath}`, { outputPath }, {
      cause: error,
    });
  }
}

export function createNormalizeCommand(): Command {
  return new Command("normalize")
    .description("Normalize shortcut predicates and filters of a route file")
    .argument("<file>", "Route file (.yaml, .yml or .json)")
    .option("--output <path>", "Write the result to a file instead of stdout")
    .option("--coerce", "Convert arguments to their declared field types")
    .option("--no-coerce", "Keep normalized arguments as strings")
    .action(async (file: string, options: NormalizeCommandOptions, command: Command) => {
      try {
        const globals = command.optsWithGlobals<GlobalOptions>();
        const cliOptions = { coerce: options.coerce, logLevel: globals.logLevel };

        // --log-level already holds while the file is parsed; its options merge in after
        logger.setLevel(loadNormalizeOptions(cliOptions).logLevel);
        const config = parseRouteFile(file);
        const resolved = loadNormalizeOptions(cliOptions, config.options);
        logger.setLevel(resolved.logLevel);

        const routes = normalizeRouteFile(config, resolved);
        const output = JSON.stringify(
          { status: "success", phase: "normalize", routes },
          null,
          2,
        );

        if (options.output && options.output !== "stdout") {
          await writeOutput(options.output, output);
          logger.info("Normalized routes written", { path: options.output });
        } else {
          console.log(output);
        }
      } catch (error) {
        failCommand(error, "normalize");
      }
    });
}
