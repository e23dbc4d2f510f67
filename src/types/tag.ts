/**
 * Core types for sprite sheet Tags.
 *
 * Tags label contiguous frame ranges that play as named animations ("idle", "walk").
 */

/**
 * Playback direction declared on a tag.
 * `pingpong_reverse` is the mirrored ping-pong newer editor versions export:
 * it starts on the last frame and moves backward first.
 */
export type Direction = 'forward' | 'reverse' | 'pingpong' | 'pingpong_reverse';

export const DIRECTIONS: readonly Direction[] = ['forward', 'reverse', 'pingpong', 'pingpong_reverse'];

/**
 * A label applied to a contiguous sequence of frames.
 */
export interface Tag {
    /** Name of the sequence. The empty name is the whole-sheet tag. */
    readonly name: string;
    /** 0-based index of the first frame in the sequence */
    readonly start: number;
    /** 0-based index of the last frame in the sequence (inclusive) */
    readonly end: number;
    /** Playback progression */
    readonly direction: Direction;
}

/**
 * Whether playback of this tag begins on its last frame, moving backward.
 */
export function startsReversed(direction: Direction): boolean {
    return direction === 'reverse' || direction === 'pingpong_reverse';
}

/**
 * Whether the tag bounces between its ends instead of wrapping.
 */
export function isPingPong(direction: Direction): boolean {
    return direction === 'pingpong' || direction === 'pingpong_reverse';
}
