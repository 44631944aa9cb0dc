// Core re-exports for the shortcut-args type system
// This file provides a single import point for all project types

export * from "./shortcut.js";
export * from "./route.js";
