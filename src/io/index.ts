export { decodeSpriteSheet, parseSliceColor } from './sheet-decode.js';
export { loadSheetFile, resolveImagePath } from './sheet-io.js';
