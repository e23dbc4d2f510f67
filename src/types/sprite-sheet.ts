import type { Frame } from './frame.js';
import type { Tag } from './tag.js';
import type { Layer } from './layer.js';
import type { Slice } from './slice.js';

/**
 * Core type for a decoded sprite sheet.
 * Immutable once decoded; any number of players may share one instance.
 */
export interface SpriteSheet {
    /** Location of the sheet bitmap, separators normalized to "/" */
    readonly imagePath: string;
    /** Sheet bitmap width in pixels */
    readonly width: number;
    /** Sheet bitmap height in pixels */
    readonly height: number;
    /** Width of a single frame cell */
    readonly frameWidth: number;
    /** Height of a single frame cell */
    readonly frameHeight: number;

    /** Frames ordered by their numeric ordinal */
    readonly frames: readonly Frame[];
    /** Tags by name, in declaration order. Always contains the whole-sheet tag "". */
    readonly tags: ReadonlyMap<string, Tag>;
    /** Layers in declared order */
    readonly layers: readonly Layer[];
    /** Slices in declared order */
    readonly slices: readonly Slice[];
}
