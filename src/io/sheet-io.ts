import * as fs from 'fs/promises';
import * as path from 'path';
import { type SpriteSheet } from '../types/sprite-sheet.js';
import { decodeSpriteSheet } from './sheet-decode.js';
import * as errors from '../errors.js';

/**
 * Loads and decodes a sprite sheet metadata file.
 * The image path is rebased onto the metadata file's directory, since the editor
 * writes it relative to the JSON; the decoded frames and tags are untouched.
 *
 * @param filePath - Path to the exported JSON file
 * @returns The decoded SpriteSheet
 */
export async function loadSheetFile(filePath: string): Promise<SpriteSheet> {
    let text: string;
    try {
        text = await fs.readFile(filePath, 'utf8');
    } catch (error: unknown) {
        if (isErrnoException(error) && error.code === 'ENOENT') {
            throw new Error(errors.sheetFileNotFound(filePath).content[0].text);
        }
        throw error;
    }

    const sheet = decodeSpriteSheet(text);
    return { ...sheet, imagePath: resolveImagePath(filePath, sheet.imagePath) };
}

/**
 * Resolves a sheet's image path against the directory of its metadata file.
 * Absolute image paths are kept as they are.
 */
export function resolveImagePath(sheetFilePath: string, imagePath: string): string {
    if (imagePath === '' || path.isAbsolute(imagePath)) return imagePath;
    return path.join(path.dirname(sheetFilePath), imagePath).replace(/\\/g, '/');
}

function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
    return error instanceof Error && 'code' in error;
}
