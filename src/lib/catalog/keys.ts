/**
 * Lookup key shared by the catalog and the battle log: lower-cased, accents
 * stripped after NFD decomposition, surrounding whitespace trimmed.
 */
export function sanitizeKey(value: string): string {
  return value
    .normalize("NFD")
    .replace(/[\p{M}]+/gu, "")
    .toLowerCase()
    .trim();
}

export function isBlank(value: string | null | undefined): boolean {
  return value === undefined || value === null || value.trim().length === 0;
}
