import { type Tag } from '../types/tag.js';

/**
 * Tag containment queries.
 *
 * Every function here is recomputed from raw frame indices on each call. The player
 * uses the same functions to raise its enter/exit notifications, so the notifications
 * and the queries can never disagree.
 */

/**
 * Whether `frameIndex` lies inside the tag's inclusive range.
 * The "no previous frame" sentinel (-1) is never inside a tag.
 */
export function tagContains(tag: Tag, frameIndex: number): boolean {
    return frameIndex >= tag.start && frameIndex <= tag.end;
}

/**
 * Tags whose range contains `frameIndex`, in tag order.
 */
export function touchingTags(tags: Iterable<Tag>, frameIndex: number): Tag[] {
    const result: Tag[] = [];
    for (const tag of tags) {
        if (tagContains(tag, frameIndex)) result.push(tag);
    }
    return result;
}

/**
 * Tags touched at `frameIndex` that were not touched at `prevFrameIndex`.
 */
export function hitTags(tags: Iterable<Tag>, prevFrameIndex: number, frameIndex: number): Tag[] {
    const result: Tag[] = [];
    for (const tag of tags) {
        if (tagContains(tag, frameIndex) && !tagContains(tag, prevFrameIndex)) result.push(tag);
    }
    return result;
}

/**
 * Tags touched at `prevFrameIndex` that are no longer touched at `frameIndex`.
 */
export function leftTags(tags: Iterable<Tag>, prevFrameIndex: number, frameIndex: number): Tag[] {
    const result: Tag[] = [];
    for (const tag of tags) {
        if (tagContains(tag, prevFrameIndex) && !tagContains(tag, frameIndex)) result.push(tag);
    }
    return result;
}
