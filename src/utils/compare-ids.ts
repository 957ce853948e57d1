/**
 * Numeric order of canonical decimal ids (no sign, no leading zeros) without
 * going through `number`, which cannot hold a 64-bit snowflake.
 */
export function compareIds(a: string, b: string): number {
  if (a.length !== b.length) return a.length - b.length;
  if (a === b) return 0;
  return a < b ? -1 : 1;
}
