/**
 * Synthetic argument names for unnamed shorthand arguments
 */

export const GENERATED_NAME_PREFIX = "_genkey_";

export function generateName(index: number): string {
  return GENERATED_NAME_PREFIX + index;
}

export function isGeneratedName(key: string): boolean {
  return key.startsWith(GENERATED_NAME_PREFIX);
}
