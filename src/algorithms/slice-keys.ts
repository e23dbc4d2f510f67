import { type Slice, type SliceKey } from '../types/slice.js';

/**
 * Returns the key of `slice` in effect at `frameIndex`: the key with the greatest
 * frame not after `frameIndex`. Before the first key the slice does not exist yet,
 * so the result is null.
 */
export function sliceKeyAt(slice: Slice, frameIndex: number): SliceKey | null {
  let found: SliceKey | null = null;
  for (const key of slice.keys) {
    if (key.frame > frameIndex) continue;
    if (found === null || key.frame >= found.frame) found = key;
  }
  return found;
}

/**
 * Resolves every slice at `frameIndex`, skipping slices that have no key yet.
 */
export function sliceKeysAt(
  slices: readonly Slice[],
  frameIndex: number,
): Array<{ slice: Slice; key: SliceKey }> {
  const result: Array<{ slice: Slice; key: SliceKey }> = [];
  for (const slice of slices) {
    const key = sliceKeyAt(slice, frameIndex);
    if (key !== null) result.push({ slice, key });
  }
  return result;
}
