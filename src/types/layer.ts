/**
 * Core types for sprite sheet Layers.
 *
 * Layers are informational only: playback never reads them. Group nesting is
 * recorded by name in `group` rather than by nesting objects.
 */

export interface Layer {
    /** Display name of the layer */
    readonly name: string;
    /** Opacity level (0 = transparent, 255 = fully opaque) */
    readonly opacity: number;
    /** Blend mode name as the editor wrote it, e.g. "normal", "multiply" */
    readonly blendMode: string;
    /** Name of the enclosing group layer, if nested. */
    readonly group?: string;
}
