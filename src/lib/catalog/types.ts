/**
 * Shortcut catalog types
 */

import type { FieldHintProvider, NormalizationMode } from "../../types/shortcut.js";
import type { ShortcutKind } from "../../types/route.js";

export type FieldType = "string" | "boolean" | "number" | "list";

export const FIELD_TYPES: readonly FieldType[] = ["string", "boolean", "number", "list"];

export interface ShortcutDescriptor extends FieldHintProvider {
  name: string;
  kind: ShortcutKind;
  mode: NormalizationMode;
  fieldTypes?: Record<string, FieldType>;
}
