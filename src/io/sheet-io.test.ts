import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs/promises';
import * as path from 'path';
import * as os from 'os';
import { fileURLToPath } from 'url';
import { loadSheetFile, resolveImagePath } from './sheet-io.js';
import { MalformedDocumentError } from '../errors.js';

const __dirname = path.dirname(fileURLToPath(import.meta.url));
const FIXTURES = path.join(__dirname, '__fixtures__');

describe('sheet-io', () => {
    let tempDir: string;

    beforeEach(async () => {
        tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'sheet-io-'));
    });

    afterEach(async () => {
        await fs.rm(tempDir, { recursive: true, force: true });
    });

    it('loads the checked-in fixture', async () => {
        const sheet = await loadSheetFile(path.join(FIXTURES, 'hero.json'));

        expect(sheet.frames).toHaveLength(6);
        expect(sheet.frames[5]).toEqual({ x: 80, y: 0, duration: 0.25 });
        expect([...sheet.tags.keys()]).toEqual(['', 'idle', 'walk', 'hit']);
        expect(sheet.imagePath).toBe(path.join(FIXTURES, 'hero.png'));
        expect(sheet.slices[0].color).toBe(0xff0000ff);
    });

    it('rebases the image path onto the metadata directory', async () => {
        const dir = path.join(tempDir, 'sprites');
        await fs.mkdir(dir);
        const filePath = path.join(dir, 'slime.json');
        await fs.writeFile(filePath, JSON.stringify({
            frames: { 'slime 0.png': { frame: { x: 0, y: 0, w: 8, h: 8 }, duration: 100 } },
            meta: { image: 'sheets/slime.png' },
        }), 'utf8');

        const sheet = await loadSheetFile(filePath);

        expect(sheet.imagePath).toBe(path.join(dir, 'sheets', 'slime.png'));
        expect(sheet.frames).toEqual([{ x: 0, y: 0, duration: 0.1 }]);
    });

    it('reports a missing file with the catalogue message', async () => {
        const missing = path.join(tempDir, 'missing.json');
        await expect(loadSheetFile(missing)).rejects.toThrow(`Sprite sheet file not found: ${missing}`);
    });

    it('propagates decode failures', async () => {
        const filePath = path.join(tempDir, 'broken.json');
        await fs.writeFile(filePath, '{"meta": {"image": "x.png"}}', 'utf8');
        await expect(loadSheetFile(filePath)).rejects.toBeInstanceOf(MalformedDocumentError);
    });
});

describe('resolveImagePath', () => {
    it('joins relative image paths onto the sheet directory', () => {
        expect(resolveImagePath('/game/art/hero.json', 'hero.png')).toBe('/game/art/hero.png');
        expect(resolveImagePath('/game/art/hero.json', '../png/hero.png')).toBe('/game/png/hero.png');
    });

    it('keeps absolute and empty image paths', () => {
        expect(resolveImagePath('/game/art/hero.json', '/cache/hero.png')).toBe('/cache/hero.png');
        expect(resolveImagePath('/game/art/hero.json', '')).toBe('');
    });
});
