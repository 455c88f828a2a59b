/**
 * Text Utilities
 */

/** Matches `form[12]` and `Form[12]` references in corpus content */
const FORM_REFERENCE_PATTERN = /[Ff]orm\[([0-9]+)\]/g;

/**
 * Unicode canonical decomposition (NFD), applied to all stored user text
 */
export function normalize(value: string): string {
  return value.normalize('NFD');
}

/**
 * Ids of the forms referenced in corpus content, in reference order.
 * Repeated references are kept.
 */
export function getFormReferences(content: string | null | undefined): number[] {
  if (!content) return [];
  return Array.from(content.matchAll(FORM_REFERENCE_PATTERN), (match) => Number(match[1]));
}

/**
 * Order-preserving de-duplication
 */
export function unique<T>(values: readonly T[]): T[] {
  return Array.from(new Set(values));
}
