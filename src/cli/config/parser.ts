/**
 * Route file parser - supports JSON and YAML
 */

import { readFileSync } from "fs";
import AjvModule from "ajv";
import { parse as parseYaml } from "yaml";
import type { RouteFileConfig } from "./types.js";
import { ROUTE_FILE_SCHEMA } from "./schema.js";
import { logger } from "../../utils/logger.js";
import { FileIOError, ValidationError } from "../../utils/errors.js";

const Ajv = AjvModule.default;

const ajv = new Ajv({
  allErrors: true, // Collect all validation errors
  allowUnionTypes: true,
});
const validateRouteFile = ajv.compile<RouteFileConfig>(ROUTE_FILE_SCHEMA);

/**
 * Validate an already-parsed document against the route file schema
 */
export function validateRouteFileContent(content: unknown, source = "<input>"): RouteFileConfig {
  if (validateRouteFile(content)) {
    return content;
  }

  const errors = (validateRouteFile.errors ?? []).map((error) => {
    const path = error.instancePath || "/";
    return `${path} ${error.message ?? "is invalid"}`;
  });

  throw new ValidationError(`Invalid route file: ${source}`, { errors });
}

/**
 * Parse route file text; the format follows the file extension
 */
export function parseRouteFileContent(content: string, filePath: string): RouteFileConfig {
  const isYaml = filePath.endsWith(".yaml") || filePath.endsWith(".yml");
  const isJson = filePath.endsWith(".json");

  if (!isYaml && !isJson) {
    throw new ValidationError(
      `Unsupported route file format: ${filePath}. Must be .json, .yaml, or .yml`,
      { filePath },
    );
  }

  let parsed: unknown;
  try {
    parsed = isYaml ? parseYaml(content) : JSON.parse(content);
  } catch (error) {
    throw new ValidationError(`Failed to parse route file: ${filePath}`, { filePath }, {
      cause: error,
    });
  }

  return validateRouteFileContent(parsed, filePath);
}

/**
 * Read and parse a route file (JSON or YAML)
 */
export function parseRouteFile(filePath: string): RouteFileConfig {
  logger.info("Parsing route file", { filePath });

  let content: string;
  try {
    content = readFileSync(filePath, "utf-8");
  } catch (error) {
    throw new FileIOError(`Failed to read route file: ${filePath}`, { filePath }, {
      cause: error,
    });
  }

  const config = parseRouteFileContent(content, filePath);

  logger.info("Route file parsed successfully", {
    routes: config.routes.length,
    customShortcuts: config.shortcuts?.length ?? 0,
    services: Object.keys(config.services ?? {}).length,
  });

  return config;
}
