const INTEGER = /^[+-]?\d+$/;

/**
 * Extracts the frame ordinal embedded in a sheet frame key.
 *
 * The editor names hash entries `"{title} {frame}.{extension}"`, so the ordinal is the
 * text between the last space and the last dot (e.g. `"hero 12.aseprite"` -> 12).
 * A key with no dot uses everything after the last space. Keys whose ordinal is not
 * entirely a signed decimal integer ("1a", "1.5", "") count as 0.
 */
export function frameOrdinal(key: string): number {
  const first = key.lastIndexOf(' ') + 1;
  let last = key.lastIndexOf('.');
  if (last < first) last = key.length;

  const text = key.substring(first, last);
  return INTEGER.test(text) ? Number(text) : 0;
}

/**
 * Comparator ordering frame keys by their numeric ordinal.
 * Lexical order would put "sprite 10" before "sprite 2".
 */
export function compareFrameKeys(a: string, b: string): number {
  return frameOrdinal(a) - frameOrdinal(b);
}

/**
 * Returns a new array of frame keys sorted by ordinal. The sort is stable, so keys
 * sharing an ordinal keep their declared order.
 */
export function sortFrameKeys(keys: Iterable<string>): string[] {
  return [...keys].sort(compareFrameKeys);
}
