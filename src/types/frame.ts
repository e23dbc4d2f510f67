/**
 * Core types for sprite sheet Frames.
 *
 * A Frame is one cell of the sheet bitmap, shown for a fixed time during playback.
 */

export interface Frame {
  /** Left edge of the frame's rectangle inside the sheet bitmap */
  readonly x: number;
  /** Top edge of the frame's rectangle inside the sheet bitmap */
  readonly y: number;
  /** Display time in seconds (the sheet stores milliseconds) */
  readonly duration: number;
}
