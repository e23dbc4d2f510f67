/**
 * Core types for sprite sheet Slices.
 *
 * A Slice is a named rectangle drawn in the editor (hit boxes, anchors, nine-slice
 * borders). Its shape may change over time: each key takes effect at its frame and
 * stays in effect until the next key.
 */

export interface SliceRect {
    readonly x: number;
    readonly y: number;
    readonly w: number;
    readonly h: number;
}

export interface SliceKey extends SliceRect {
    /** Frame index at which this key's bounds take effect */
    readonly frame: number;
    /** Nine-slice center rectangle, relative to the bounds */
    readonly center?: SliceRect;
    /** Pivot point, relative to the bounds */
    readonly pivot?: { readonly x: number; readonly y: number };
}

export interface Slice {
    /** Slice name. Several slices may share one. */
    readonly name: string;
    /** Free-form user data attached in the editor */
    readonly data: string;
    /** RGBA color packed as 0xRRGGBBAA, or 0 when absent */
    readonly color: number;
    /** Keys in declared order */
    readonly keys: readonly SliceKey[];
}
