import { type SpriteSheet } from '../types/sprite-sheet.js';
import { type Frame } from '../types/frame.js';
import { type Tag, startsReversed, isPingPong } from '../types/tag.js';
import { type Slice, type SliceKey } from '../types/slice.js';
import { tagContains, touchingTags, hitTags, leftTags } from '../algorithms/tag-contact.js';
import { sliceKeyAt, sliceKeysAt } from '../algorithms/slice-keys.js';
import { TagNotFoundError } from '../errors.js';

/** Frame index meaning "no previous frame". */
export const NO_FRAME = -1;

/**
 * A frame rectangle as two opposite corners, ready to use as a blit sub-rectangle.
 * All four values are -1 when no tag is selected.
 */
export interface FrameCoords {
    x1: number;
    y1: number;
    x2: number;
    y2: number;
}

/**
 * The frame's top-left corner normalized to the sheet size. -1 when no tag is selected.
 */
export interface UVCoords {
    u: number;
    v: number;
}

export type LoopCallback = () => void;
export type FrameChangeCallback = (frameIndex: number) => void;
export type TagCallback = (tag: Tag) => void;

export interface PlayerOptions {
    /** Multiplier applied to every update's elapsed time (default 1) */
    playSpeed?: number;
    onLoop?: LoopCallback | null;
    onFrameChange?: FrameChangeCallback | null;
    onTagEnter?: TagCallback | null;
    onTagExit?: TagCallback | null;
}

/**
 * Playback cursor over a shared, read-only SpriteSheet.
 *
 * Advances a current frame through the selected tag according to its direction and
 * raises loop, frame-change and tag enter/exit notifications synchronously from
 * `play()` and `update()`. Callbacks must not call `update()` on the same player.
 */
export class PlayerClass {
    /** Multiplier applied to elapsed time inside `update()` */
    public playSpeed: number;

    /** Called once per completed cycle (a full there-and-back for ping-pong tags) */
    public onLoop: LoopCallback | null;
    /** Called whenever `update()` moves to a different frame index */
    public onFrameChange: FrameChangeCallback | null;
    /** Called for every tag the playback position enters */
    public onTagEnter: TagCallback | null;
    /** Called for every tag the playback position leaves */
    public onTagExit: TagCallback | null;

    private readonly _sheet: SpriteSheet;
    private _currentTag: Tag | null = null;
    private _frameIndex = 0;
    private _prevFrameIndex = NO_FRAME;
    private _frameCounter = 0;
    private _playDirection: 1 | -1 = 1;
    private _finishedAnimation = false;

    constructor(sheet: SpriteSheet, options: PlayerOptions = {}) {
        this._sheet = sheet;
        this.playSpeed = options.playSpeed ?? 1;
        this.onLoop = options.onLoop ?? null;
        this.onFrameChange = options.onFrameChange ?? null;
        this.onTagEnter = options.onTagEnter ?? null;
        this.onTagExit = options.onTagExit ?? null;
    }

    // ------------------------------------------------------------------------
    // Getters
    // ------------------------------------------------------------------------

    get sheet(): SpriteSheet {
        return this._sheet;
    }

    /** The selected tag, or null when nothing has been played yet */
    get currentTag(): Tag | null {
        return this._currentTag;
    }

    get frameIndex(): number {
        return this._frameIndex;
    }

    /** Frame index before the most recent step, or NO_FRAME */
    get prevFrameIndex(): number {
        return this._prevFrameIndex;
    }

    /** Seconds accumulated on the current frame */
    get frameCounter(): number {
        return this._frameCounter;
    }

    /** Instantaneous step direction; differs from the tag's direction mid ping-pong */
    get playDirection(): 1 | -1 {
        return this._playDirection;
    }

    /** True after an update that completed at least one loop */
    get finishedAnimation(): boolean {
        return this._finishedAnimation;
    }

    // ------------------------------------------------------------------------
    // Playback
    // ------------------------------------------------------------------------

    /**
     * Selects a tag and restarts playback from its first frame (its last frame for
     * reverse tags). Playing the tag that is already selected does nothing.
     * The empty name plays the whole sheet.
     *
     * @throws TagNotFoundError when the sheet has no such tag; the player is left unchanged.
     */
    play(tagName: string): void {
        const tag = this._sheet.tags.get(tagName);
        if (tag === undefined) {
            throw new TagNotFoundError(tagName);
        }
        if (tag === this._currentTag) return;

        this._prevFrameIndex = this._currentTag === null ? NO_FRAME : this._frameIndex;
        this._currentTag = tag;
        this._frameCounter = 0;
        this._finishedAnimation = false;

        if (startsReversed(tag.direction)) {
            this._playDirection = -1;
            this._frameIndex = tag.end;
        } else {
            this._playDirection = 1;
            this._frameIndex = tag.start;
        }

        this.emitTagTransitions();
    }

    /**
     * Advances playback by `deltaSeconds` (scaled by `playSpeed`).
     * Each frame boundary crossed raises its step's notifications in order.
     * When the pending time spans two or more full cycles of the tag, every
     * cycle but the last is folded away with a single loop notification, and
     * only the last one is stepped. A non-finite elapsed time is ignored.
     */
    update(deltaSeconds: number): void {
        const tag = this._currentTag;
        if (tag === null) return;

        const elapsed = deltaSeconds * this.playSpeed;
        if (!Number.isFinite(elapsed)) return;

        this._finishedAnimation = false;
        this._prevFrameIndex = this._frameIndex;
        this._frameCounter += elapsed;

        if (!this.hasPlayableDuration(tag)) {
            this._frameCounter = 0;
            return;
        }

        const cycle = this.cycleDuration(tag);
        if (cycle > 0 && this._frameCounter >= 2 * cycle) {
            // Dropping whole cycles leaves the final frame unchanged; the kept
            // cycle absorbs a ping-pong's opening step.
            this._frameCounter = cycle + (this._frameCounter % cycle);
            this._finishedAnimation = true;
            this.onLoop?.();
        }

        let frame = this._sheet.frames.at(this._frameIndex);
        while (frame !== undefined && this._frameCounter >= frame.duration) {
            this._frameCounter -= frame.duration;
            this.step(tag);
            frame = this._sheet.frames.at(this._frameIndex);
        }
    }

    /**
     * Jumps to a frame relative to the selected tag's first frame, clamped to the tag,
     * and restarts that frame's timer. Does nothing when no tag is selected.
     */
    setFrame(indexWithinTag: number): void {
        const tag = this._currentTag;
        if (tag === null) return;

        const target = tag.start + Math.trunc(indexWithinTag);
        this._frameIndex = Math.min(Math.max(target, tag.start), tag.end);
        this._frameCounter = 0;
    }

    /**
     * Clears the selection. The next `play()` counts as a fresh start.
     */
    stop(): void {
        this._currentTag = null;
        this._frameIndex = 0;
        this._prevFrameIndex = NO_FRAME;
        this._frameCounter = 0;
        this._playDirection = 1;
        this._finishedAnimation = false;
    }

    private step(tag: Tag): void {
        const from = this._frameIndex;
        this._prevFrameIndex = from;
        this._frameIndex += this._playDirection;

        const looped = this.applyBoundary(tag);

        if (this._frameIndex !== from) {
            this.onFrameChange?.(this._frameIndex);
        }
        this.emitTagTransitions();
        if (looped) {
            this._finishedAnimation = true;
            this.onLoop?.();
        }
    }

    /**
     * Brings a just-stepped frame index back inside the tag.
     * @returns whether a loop was completed
     */
    private applyBoundary(tag: Tag): boolean {
        const { start, end } = tag;

        if (isPingPong(tag.direction)) {
            // A forward ping-pong completes its cycle on returning past `start`;
            // the mirrored variant completes it on returning past `end`.
            const loopsAtStart = tag.direction === 'pingpong';
            if (this._frameIndex > end) {
                this._frameIndex = clamp(end - 1, start, end);
                this._playDirection = -1;
                return !loopsAtStart;
            }
            if (this._frameIndex < start) {
                this._frameIndex = clamp(start + 1, start, end);
                this._playDirection = 1;
                return loopsAtStart;
            }
            return false;
        }

        if (this._frameIndex > end || this._frameIndex < start) {
            const span = end - start + 1;
            this._frameIndex = start + ((((this._frameIndex - start) % span) + span) % span);
            return true;
        }
        return false;
    }

    /**
     * Raises exit notifications, then enter notifications, for the move from
     * `prevFrameIndex` to `frameIndex`.
     */
    private emitTagTransitions(): void {
        const tags = [...this._sheet.tags.values()];
        const exited = leftTags(tags, this._prevFrameIndex, this._frameIndex);
        const entered = hitTags(tags, this._prevFrameIndex, this._frameIndex);

        for (const tag of exited) this.onTagExit?.(tag);
        for (const tag of entered) this.onTagEnter?.(tag);
    }

    /**
     * A tag whose frames all last zero seconds would step forever.
     */
    private hasPlayableDuration(tag: Tag): boolean {
        for (let i = tag.start; i <= tag.end; i++) {
            const frame = this._sheet.frames.at(i);
            if (frame !== undefined && frame.duration > 0) return true;
        }
        return false;
    }

    /**
     * Time taken by one repetition of the tag's frame sequence, or 0 when the
     * tag reaches past the sheet's frames.
     */
    private cycleDuration(tag: Tag): number {
        const durations: number[] = [];
        for (let i = tag.start; i <= tag.end; i++) {
            const frame = this._sheet.frames.at(i);
            if (frame === undefined) return 0;
            durations.push(frame.duration);
        }

        const once = durations.reduce((sum, d) => sum + d, 0);
        if (!isPingPong(tag.direction)) return once;
        if (durations.length === 1) return 2 * once;
        // Ping-pong shows the inner frames on the way out and again on the way back.
        return once + durations.slice(1, -1).reduce((sum, d) => sum + d, 0);
    }

    // ------------------------------------------------------------------------
    // Queries
    // ------------------------------------------------------------------------

    /** Whether the named tag is the current selection */
    isPlaying(tagName: string): boolean {
        return this._currentTag !== null && this._currentTag.name === tagName;
    }

    /** The frame under the cursor, or null when no tag is selected */
    currentFrame(): Frame | null {
        if (this._currentTag === null) return null;
        return this._sheet.frames.at(this._frameIndex) ?? null;
    }

    currentFrameCoords(): FrameCoords {
        const frame = this.currentFrame();
        if (frame === null) return { x1: -1, y1: -1, x2: -1, y2: -1 };
        return {
            x1: frame.x,
            y1: frame.y,
            x2: frame.x + this._sheet.frameWidth,
            y2: frame.y + this._sheet.frameHeight,
        };
    }

    currentUVCoords(): UVCoords {
        const frame = this.currentFrame();
        if (frame === null || this._sheet.width <= 0 || this._sheet.height <= 0) {
            return { u: -1, v: -1 };
        }
        return { u: frame.x / this._sheet.width, v: frame.y / this._sheet.height };
    }

    /** Tags whose range contains the current frame. Empty when no tag is selected. */
    touchingTags(): Tag[] {
        if (this._currentTag === null) return [];
        return touchingTags(this._sheet.tags.values(), this._frameIndex);
    }

    touchingTag(tagName: string): boolean {
        const tag = this.lookupSelectedTag(tagName);
        return tag !== null && tagContains(tag, this._frameIndex);
    }

    /** Tags entered by the most recent step or selection */
    hitTags(): Tag[] {
        if (this._currentTag === null) return [];
        return hitTags(this._sheet.tags.values(), this._prevFrameIndex, this._frameIndex);
    }

    hitTag(tagName: string): boolean {
        const tag = this.lookupSelectedTag(tagName);
        return tag !== null && tagContains(tag, this._frameIndex) && !tagContains(tag, this._prevFrameIndex);
    }

    /** Tags left by the most recent step or selection */
    leftTags(): Tag[] {
        if (this._currentTag === null) return [];
        return leftTags(this._sheet.tags.values(), this._prevFrameIndex, this._frameIndex);
    }

    leftTag(tagName: string): boolean {
        const tag = this.lookupSelectedTag(tagName);
        return tag !== null && tagContains(tag, this._prevFrameIndex) && !tagContains(tag, this._frameIndex);
    }

    /** Every slice's key in effect at the current frame */
    currentSliceKeys(): Array<{ slice: Slice; key: SliceKey }> {
        if (this._currentTag === null) return [];
        return sliceKeysAt(this._sheet.slices, this._frameIndex);
    }

    /**
     * The key in effect at the current frame for the first slice named `sliceName`
     * that has one, or null.
     */
    sliceKey(sliceName: string): SliceKey | null {
        if (this._currentTag === null) return null;
        for (const slice of this._sheet.slices) {
            if (slice.name !== sliceName) continue;
            const key = sliceKeyAt(slice, this._frameIndex);
            if (key !== null) return key;
        }
        return null;
    }

    private lookupSelectedTag(tagName: string): Tag | null {
        if (this._currentTag === null) return null;
        return this._sheet.tags.get(tagName) ?? null;
    }
}

function clamp(value: number, min: number, max: number): number {
    return Math.min(Math.max(value, min), max);
}
