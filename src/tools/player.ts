import { z } from 'zod';
import { type McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { getWorkspace, type WorkspacePlayer } from '../classes/workspace.js';
import { TagNotFoundError } from '../errors.js';
import * as errors from '../errors.js';

// ---------------------------------------------------------------------------
// Zod input schema
// ---------------------------------------------------------------------------

const playerInputSchema = {
    action: z.enum([
        'create', 'destroy', 'state',
        'play', 'update', 'set_frame', 'set_speed', 'stop',
    ]).describe('Player action to perform'),
    player_id: z.string().optional().describe('Target player id'),
    sheet_name: z.string().optional().describe('Loaded sheet to play (create)'),
    tag: z.string().optional().describe('Tag to play; "" plays the whole sheet (play)'),
    delta_seconds: z.number().nonnegative().optional().describe('Elapsed time to advance by (update)'),
    frame_index: z.number().int().optional().describe('Frame index relative to the tag start (set_frame)'),
    play_speed: z.number().nonnegative().optional().describe('Elapsed time multiplier (create, set_speed)'),
};

// ---------------------------------------------------------------------------
// Register
// ---------------------------------------------------------------------------

type Workspace = ReturnType<typeof getWorkspace>;

export function registerPlayerTool(server: McpServer): void {
    server.registerTool(
        'player',
        {
            title: 'Player',
            description: 'Create animation players over loaded sheets, select tags, advance time, and query the current frame rectangle, tag contacts and slices.',
            inputSchema: playerInputSchema,
        },
        (args) => {
            const workspace = getWorkspace();

            switch (args.action) {
                case 'create': return handleCreate(workspace, args.player_id, args.sheet_name, args.play_speed);
                case 'destroy': return handleDestroy(workspace, args.player_id);
                case 'state': return handleState(workspace, args.player_id);

                case 'play': return handlePlay(workspace, args.player_id, args.tag);
                case 'update': return handleUpdate(workspace, args.player_id, args.delta_seconds);
                case 'set_frame': return handleSetFrame(workspace, args.player_id, args.frame_index);
                case 'set_speed': return handleSetSpeed(workspace, args.player_id, args.play_speed);
                case 'stop': return handleStop(workspace, args.player_id);

                default:
                    return errors.invalidArgument(`Unknown player action: ${String(args.action)}`);
            }
        },
    );
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

export function requirePlayer(workspace: Workspace, playerId: string | undefined): WorkspacePlayer | ReturnType<typeof errors.domainError> {
    if (!playerId) return errors.invalidArgument('player requires "player_id".');
    const entry = workspace.players.get(playerId);
    if (!entry) return errors.playerNotFound(playerId);
    return entry;
}

export function isError(val: unknown): val is { isError: true } {
    return typeof val === 'object' && val !== null && 'isError' in val;
}

function ok(data: object) {
    return { content: [{ type: 'text' as const, text: JSON.stringify(data) }] };
}

/** Snapshot of everything a renderer reads each tick. */
function describeState(entry: WorkspacePlayer) {
    const { player } = entry;
    return {
        player_id: entry.id,
        sheet: entry.sheetName,
        tag: player.currentTag?.name ?? null,
        frame_index: player.frameIndex,
        prev_frame_index: player.prevFrameIndex,
        frame_counter: player.frameCounter,
        play_direction: player.playDirection,
        play_speed: player.playSpeed,
        finished_animation: player.finishedAnimation,
        frame_rect: player.currentFrameCoords(),
        uv: player.currentUVCoords(),
        touching_tags: player.touchingTags().map((t) => t.name),
        hit_tags: player.hitTags().map((t) => t.name),
        left_tags: player.leftTags().map((t) => t.name),
        slices: player.currentSliceKeys().map(({ slice, key }) => ({ name: slice.name, data: slice.data, ...key })),
    };
}

/** State plus the notifications raised since the last call. */
function stateWithEvents(workspace: Workspace, entry: WorkspacePlayer) {
    return ok({ ...describeState(entry), events: workspace.drainEvents(entry.id) });
}

// ---------------------------------------------------------------------------
// Lifecycle actions
// ---------------------------------------------------------------------------

function handleCreate(workspace: Workspace, playerId: string | undefined, sheetName: string | undefined, playSpeed: number | undefined) {
    if (!playerId) return errors.invalidArgument('player create requires "player_id".');
    if (!sheetName) return errors.invalidArgument('player create requires "sheet_name".');
    if (workspace.players.has(playerId)) return errors.playerAlreadyExists(playerId);
    if (!workspace.loadedSheets.has(sheetName)) return errors.sheetNotLoaded(sheetName);

    const entry = workspace.createPlayer(playerId, sheetName, playSpeed);
    return ok(describeState(entry));
}

function handleDestroy(workspace: Workspace, playerId: string | undefined) {
    const entry = requirePlayer(workspace, playerId);
    if (isError(entry)) return entry;

    workspace.destroyPlayer(entry.id);
    return ok({ message: `Player '${entry.id}' destroyed.` });
}

function handleState(workspace: Workspace, playerId: string | undefined) {
    const entry = requirePlayer(workspace, playerId);
    if (isError(entry)) return entry;

    return ok(describeState(entry));
}

// ---------------------------------------------------------------------------
// Playback actions
// ---------------------------------------------------------------------------

function handlePlay(workspace: Workspace, playerId: string | undefined, tag: string | undefined) {
    const entry = requirePlayer(workspace, playerId);
    if (isError(entry)) return entry;
    if (tag === undefined) return errors.invalidArgument('player play requires "tag".');

    try {
        entry.player.play(tag);
    } catch (e: unknown) {
        if (e instanceof TagNotFoundError) return errors.tagNotFound(e.tagName);
        throw e;
    }
    return stateWithEvents(workspace, entry);
}

function handleUpdate(workspace: Workspace, playerId: string | undefined, deltaSeconds: number | undefined) {
    const entry = requirePlayer(workspace, playerId);
    if (isError(entry)) return entry;
    if (deltaSeconds === undefined) return errors.invalidArgument('player update requires "delta_seconds".');
    if (entry.player.currentTag === null) return errors.noTagSelected(entry.id);

    entry.player.update(deltaSeconds);
    return stateWithEvents(workspace, entry);
}

function handleSetFrame(workspace: Workspace, playerId: string | undefined, frameIndex: number | undefined) {
    const entry = requirePlayer(workspace, playerId);
    if (isError(entry)) return entry;
    if (frameIndex === undefined) return errors.invalidArgument('player set_frame requires "frame_index".');
    if (entry.player.currentTag === null) return errors.noTagSelected(entry.id);

    entry.player.setFrame(frameIndex);
    return ok(describeState(entry));
}

function handleSetSpeed(workspace: Workspace, playerId: string | undefined, playSpeed: number | undefined) {
    const entry = requirePlayer(workspace, playerId);
    if (isError(entry)) return entry;
    if (playSpeed === undefined) return errors.invalidArgument('player set_speed requires "play_speed".');

    entry.player.playSpeed = playSpeed;
    return ok(describeState(entry));
}

function handleStop(workspace: Workspace, playerId: string | undefined) {
    const entry = requirePlayer(workspace, playerId);
    if (isError(entry)) return entry;

    entry.player.stop();
    return stateWithEvents(workspace, entry);
}
