import { z } from 'zod';
import { type SpriteSheet } from '../types/sprite-sheet.js';
import { type Frame } from '../types/frame.js';
import { type Tag, type Direction, DIRECTIONS } from '../types/tag.js';
import { type Layer } from '../types/layer.js';
import { type Slice, type SliceKey, type SliceRect } from '../types/slice.js';
import { sortFrameKeys } from '../algorithms/frame-order.js';
import { MalformedDocumentError } from '../errors.js';

// ---------------------------------------------------------------------------
// Zod document schemas
// ---------------------------------------------------------------------------

const rectSchema = z.object({
    x: z.number(),
    y: z.number(),
    w: z.number(),
    h: z.number(),
});

/** A frame entry. Position and duration are required; everything else degrades. */
const frameEntrySchema = z.object({
    frame: z.object({
        x: z.number(),
        y: z.number(),
        w: z.number().catch(0),
        h: z.number().catch(0),
    }),
    sourceSize: z.object({ w: z.number(), h: z.number() }).optional().catch(undefined),
    duration: z.number(),
});

const rootSchema = z.object({
    frames: z.union([z.array(z.unknown()), z.record(z.string(), z.unknown())]),
    meta: z.object({
        image: z.string(),
        size: z.object({ w: z.number(), h: z.number() }).optional().catch(undefined),
        frameTags: z.array(z.unknown()).catch([]),
        layers: z.array(z.unknown()).catch([]),
        slices: z.array(z.unknown()).catch([]),
    }),
});

const tagSchema = z.object({
    name: z.string(),
    from: z.number().int(),
    to: z.number().int(),
    direction: z.string().catch('forward'),
});

const layerSchema = z.object({
    name: z.string().catch(''),
    opacity: z.number().catch(255),
    blendMode: z.string().catch('normal'),
    group: z.string().optional().catch(undefined),
});

const sliceKeySchema = z.object({
    frame: z.number().int(),
    bounds: rectSchema,
    center: rectSchema.optional().catch(undefined),
    pivot: z.object({ x: z.number(), y: z.number() }).optional().catch(undefined),
});

const sliceSchema = z.object({
    name: z.string().catch(''),
    data: z.string().catch(''),
    color: z.unknown(),
    keys: z.array(z.unknown()).catch([]),
});

type FrameEntry = z.infer<typeof frameEntrySchema>;

// ---------------------------------------------------------------------------
// Decoding
// ---------------------------------------------------------------------------

/**
 * Decodes sprite sheet metadata (the editor's JSON export, "Hash" or "Array" mode)
 * into an immutable SpriteSheet.
 *
 * Pure: no file access and no path resolution. Only a missing `frames`/`meta`
 * section, a missing image reference or a frame with non-numeric position or
 * duration fail the decode; optional sections fall back to defaults.
 *
 * @throws MalformedDocumentError
 */
export function decodeSpriteSheet(text: string): SpriteSheet {
    let parsed: unknown;
    try {
        parsed = JSON.parse(text);
    } catch (e: unknown) {
        throw new MalformedDocumentError(`invalid JSON. ${e instanceof Error ? e.message : String(e)}`);
    }

    const root = rootSchema.safeParse(parsed);
    if (!root.success) {
        throw new MalformedDocumentError(describeIssue(root.error));
    }
    const { meta } = root.data;

    const entries = decodeFrameEntries(root.data.frames);
    const frames: Frame[] = entries.map((entry) => ({
        x: entry.frame.x,
        y: entry.frame.y,
        duration: entry.duration / 1000,
    }));

    // Frame cells are uniform, so the first one sets the size for the whole sheet.
    const first = entries.at(0);
    const frameWidth = first ? first.sourceSize?.w ?? first.frame.w : 0;
    const frameHeight = first ? first.sourceSize?.h ?? first.frame.h : 0;

    let width = meta.size?.w;
    let height = meta.size?.h;
    if (width === undefined || height === undefined) {
        width = entries.reduce((max, e) => Math.max(max, e.frame.x + e.frame.w), 0);
        height = entries.reduce((max, e) => Math.max(max, e.frame.y + e.frame.h), 0);
    }

    return {
        imagePath: meta.image.replace(/\\/g, '/'),
        width,
        height,
        frameWidth,
        frameHeight,
        frames,
        tags: decodeTags(meta.frameTags, frames.length),
        layers: decodeLayers(meta.layers),
        slices: decodeSlices(meta.slices),
    };
}

/**
 * "Hash" mode keys frames by name and needs the ordinal sort; "Array" mode is
 * already in frame order.
 */
function decodeFrameEntries(raw: unknown[] | Record<string, unknown>): FrameEntry[] {
    if (Array.isArray(raw)) {
        return raw.map((value, i) => parseFrameEntry(value, `frames.${String(i)}`));
    }
    return sortFrameKeys(Object.keys(raw)).map((key) => parseFrameEntry(raw[key], `frames.${key}`));
}

function parseFrameEntry(value: unknown, where: string): FrameEntry {
    const result = frameEntrySchema.safeParse(value);
    if (!result.success) {
        throw new MalformedDocumentError(`${where}: ${describeIssue(result.error)}`);
    }
    return result.data;
}

/**
 * Builds the tag table. The whole-sheet tag "" goes in first so it is always
 * selectable; a declared tag of the same name replaces it, and later duplicates
 * replace earlier ones.
 */
function decodeTags(raw: unknown[], frameCount: number): Map<string, Tag> {
    const tags = new Map<string, Tag>();
    tags.set('', { name: '', start: 0, end: frameCount - 1, direction: 'forward' });

    for (const value of raw) {
        const result = tagSchema.safeParse(value);
        if (!result.success) continue;
        const { name, from, to, direction } = result.data;
        tags.set(name, { name, start: from, end: to, direction: toDirection(direction) });
    }
    return tags;
}

function toDirection(value: string): Direction {
    return DIRECTIONS.find((d) => d === value) ?? 'forward';
}

function decodeLayers(raw: unknown[]): Layer[] {
    const layers: Layer[] = [];
    for (const value of raw) {
        const result = layerSchema.safeParse(value);
        if (!result.success) continue;
        const { name, opacity, blendMode, group } = result.data;
        layers.push(group === undefined ? { name, opacity, blendMode } : { name, opacity, blendMode, group });
    }
    return layers;
}

function decodeSlices(raw: unknown[]): Slice[] {
    const slices: Slice[] = [];
    for (const value of raw) {
        const result = sliceSchema.safeParse(value);
        if (!result.success) continue;

        const keys: SliceKey[] = [];
        for (const keyValue of result.data.keys) {
            const key = sliceKeySchema.safeParse(keyValue);
            if (!key.success) continue;
            keys.push(toSliceKey(key.data));
        }

        slices.push({
            name: result.data.name,
            data: result.data.data,
            color: parseSliceColor(result.data.color),
            keys,
        });
    }
    return slices;
}

function toSliceKey(data: z.infer<typeof sliceKeySchema>): SliceKey {
    const key: { frame: number; center?: SliceRect; pivot?: { x: number; y: number } } & SliceRect = {
        frame: data.frame,
        ...data.bounds,
    };
    if (data.center !== undefined) key.center = data.center;
    if (data.pivot !== undefined) key.pivot = data.pivot;
    return key;
}

/**
 * Parses a slice color such as "#0000ffff" into 0xRRGGBBAA.
 * Anything that is not 1-8 hex digits (after an optional "#") yields 0.
 */
export function parseSliceColor(value: unknown): number {
    if (typeof value !== 'string') return 0;
    const hex = value.startsWith('#') ? value.slice(1) : value;
    if (!/^[0-9a-fA-F]{1,8}$/.test(hex)) return 0;
    return parseInt(hex, 16);
}

function describeIssue(error: z.ZodError): string {
    const issue = error.issues.at(0);
    if (issue === undefined) return 'unknown structure error';
    const where = issue.path.length > 0 ? issue.path.join('.') : 'document';
    return `${where}: ${issue.message}`;
}
