/**
 * Field hints for the built-in gateway predicates and filters
 */

import type { ShortcutDescriptor } from "./types.js";

export const DEFAULT_PREDICATES: readonly ShortcutDescriptor[] = [
  { kind: "predicate", name: "After", mode: "DEFAULT", fieldOrder: ["datetime"] },
  { kind: "predicate", name: "Before", mode: "DEFAULT", fieldOrder: ["datetime"] },
  {
    kind: "predicate",
    name: "Between",
    mode: "DEFAULT",
    fieldOrder: ["datetime1", "datetime2"],
  },
  { kind: "predicate", name: "Cookie", mode: "DEFAULT", fieldOrder: ["name", "regexp"] },
  { kind: "predicate", name: "Header", mode: "DEFAULT", fieldOrder: ["header", "regexp"] },
  {
    kind: "predicate",
    name: "Host",
    mode: "GATHER_LIST",
    fieldOrder: ["patterns"],
    fieldTypes: { patterns: "list" },
  },
  {
    kind: "predicate",
    name: "Method",
    mode: "GATHER_LIST",
    fieldOrder: ["methods"],
    fieldTypes: { methods: "list" },
  },
  {
    kind: "predicate",
    name: "Path",
    mode: "GATHER_LIST_TAIL_FLAG",
    fieldOrder: ["patterns", "matchTrailingSlash"],
    fieldTypes: { patterns: "list", matchTrailingSlash: "boolean" },
  },
  { kind: "predicate", name: "Query", mode: "DEFAULT", fieldOrder: ["param", "regexp"] },
  {
    kind: "predicate",
    name: "RemoteAddr",
    mode: "GATHER_LIST",
    fieldOrder: ["sources"],
    fieldTypes: { sources: "list" },
  },
  {
    kind: "predicate",
    name: "Weight",
    mode: "DEFAULT",
    fieldOrder: ["group", "weight"],
    fieldTypes: { weight: "number" },
  },
  {
    kind: "predicate",
    name: "XForwardedRemoteAddr",
    mode: "GATHER_LIST",
    fieldOrder: ["sources"],
    fieldTypes: { sources: "list" },
  },
];

export const DEFAULT_FILTERS: readonly ShortcutDescriptor[] = [
  { kind: "filter", name: "AddRequestHeader", mode: "DEFAULT", fieldOrder: ["name", "value"] },
  { kind: "filter", name: "AddRequestParameter", mode: "DEFAULT", fieldOrder: ["name", "value"] },
  { kind: "filter", name: "AddResponseHeader", mode: "DEFAULT", fieldOrder: ["name", "value"] },
  {
    kind: "filter",
    name: "DedupeResponseHeader",
    mode: "DEFAULT",
    fieldOrder: ["name", "strategy"],
  },
  { kind: "filter", name: "PrefixPath", mode: "DEFAULT", fieldOrder: ["prefix"] },
  { kind: "filter", name: "RedirectTo", mode: "DEFAULT", fieldOrder: ["status", "url"] },
  { kind: "filter", name: "RemoveRequestHeader", mode: "DEFAULT", fieldOrder: ["name"] },
  { kind: "filter", name: "RemoveResponseHeader", mode: "DEFAULT", fieldOrder: ["name"] },
  {
    kind: "filter",
    name: "RewritePath",
    mode: "DEFAULT",
    fieldOrder: ["regexp", "replacement"],
  },
  { kind: "filter", name: "SetPath", mode: "DEFAULT", fieldOrder: ["template"] },
  { kind: "filter", name: "SetRequestHeader", mode: "DEFAULT", fieldOrder: ["name", "value"] },
  { kind: "filter", name: "SetResponseHeader", mode: "DEFAULT", fieldOrder: ["name", "value"] },
  { kind: "filter", name: "SetStatus", mode: "DEFAULT", fieldOrder: ["status"] },
  {
    kind: "filter",
    name: "StripPrefix",
    mode: "DEFAULT",
    fieldOrder: ["parts"],
    fieldTypes: { parts: "number" },
  },
];
