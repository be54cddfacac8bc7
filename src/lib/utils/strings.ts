/** Narrow unknown input to a non-empty string. */
export function isNonEmptyString(value: unknown): value is string {
  return typeof value === 'string' && value.length > 0;
}

/** Escape a literal so it can be embedded in a RegExp / $regex pattern. */
export function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/** "mOBILE" -> "Mobile" */
export function toTitleCase(value: string): string {
  return value
    .toLowerCase()
    .replace(/(^|\s)([a-z])/g, (_m, sep: string, ch: string) => sep + ch.toUpperCase());
}
