/**
 * shortcut-args: normalize shorthand route predicate and filter arguments
 *
 * @packageDocumentation
 */

// Core types
export * from "./types/index.js";

// Modules
export * from "./lib/normalizer/index.js";
export * from "./lib/tokenizer/index.js";
export * from "./lib/expression/index.js";
export * from "./lib/registry/index.js";
export * from "./lib/catalog/index.js";
export * from "./lib/binder/index.js";
export * from "./lib/routes/index.js";

// Utilities
export * from "./utils/errors.js";
export * from "./utils/logger.js";
export * from "./utils/name-utils.js";
