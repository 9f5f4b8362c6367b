/** Written into text columns that were NULL or blank. */
export const TEXT_SENTINEL = 'Unknown';

/** Written into numeric columns that were NULL. */
export const NUMERIC_SENTINEL = 0;

// Same set as the standardizer's TRIM(col, char(32, 9, 10, 13)).
const BLANK_EDGES = /^[ \t\n\r]+|[ \t\n\r]+$/g;

/** Strips space, tab, newline and carriage return from both ends. */
export function trimBlank(value: string): string {
  return value.replace(BLANK_EDGES, '');
}

/** True for null, blank and already-standardized text values. */
export function isMissingText(raw: string | null | undefined): boolean {
  if (raw === null || raw === undefined) {
    return true;
  }
  const trimmed = trimBlank(raw);
  return trimmed === '' || trimmed === TEXT_SENTINEL;
}
