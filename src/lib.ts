export type { Frame } from './types/frame.js';
export type { Tag, Direction } from './types/tag.js';
export type { Layer } from './types/layer.js';
export type { Slice, SliceKey, SliceRect } from './types/slice.js';
export type { SpriteSheet } from './types/sprite-sheet.js';

export { DIRECTIONS, startsReversed, isPingPong } from './types/tag.js';
export { decodeSpriteSheet, parseSliceColor, loadSheetFile, resolveImagePath } from './io/index.js';
export { frameOrdinal, compareFrameKeys, sortFrameKeys } from './algorithms/frame-order.js';
export { tagContains, touchingTags, hitTags, leftTags } from './algorithms/tag-contact.js';
export { sliceKeyAt, sliceKeysAt } from './algorithms/slice-keys.js';
export {
  PlayerClass,
  NO_FRAME,
  type PlayerOptions,
  type FrameCoords,
  type UVCoords,
  type LoopCallback,
  type FrameChangeCallback,
  type TagCallback,
} from './classes/player.js';
export { MalformedDocumentError, TagNotFoundError } from './errors.js';
