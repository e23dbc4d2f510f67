import { type SpriteSheet } from '../types/sprite-sheet.js';
import { type Tag } from '../types/tag.js';
import { loadSheetFile } from '../io/index.js';
import { PlayerClass } from './player.js';
import * as errors from '../errors.js';

/**
 * A player notification, queued in the order it was raised.
 */
export type PlayerEvent =
    | { type: 'loop' }
    | { type: 'frame_change'; frame: number }
    | { type: 'tag_enter'; tag: string }
    | { type: 'tag_exit'; tag: string };

/**
 * A player owned by the workspace, with its pending notifications.
 */
export interface WorkspacePlayer {
    id: string;
    sheetName: string;
    player: PlayerClass;
    events: PlayerEvent[];
}

/**
 * In-memory playback session singleton.
 * Holds decoded sheets by name and the players created over them.
 * Not persisted to disk; players are rebuilt from their sheets each session.
 */
export class WorkspaceClass {
    private static _instance: WorkspaceClass | null = null;

    /** Decoded sheets keyed by their logical name. */
    public readonly loadedSheets: Map<string, SpriteSheet> = new Map();

    /** File each sheet was loaded from. */
    private readonly _sheetPaths: Map<string, string> = new Map();

    /** Players keyed by id. */
    public readonly players: Map<string, WorkspacePlayer> = new Map();

    private constructor() {
        // Singleton: use WorkspaceClass.instance()
    }

    /**
     * Returns the singleton WorkspaceClass instance.
     */
    static instance(): WorkspaceClass {
        if (WorkspaceClass._instance === null) {
            WorkspaceClass._instance = new WorkspaceClass();
        }
        return WorkspaceClass._instance;
    }

    /**
     * Resets the singleton for testing. Clears all state.
     */
    static reset(): void {
        WorkspaceClass._instance = null;
    }

    // ------------------------------------------------------------------------
    // Sheet Lifecycle
    // ------------------------------------------------------------------------

    /**
     * Returns a loaded sheet by name. Throws if not loaded.
     */
    getSheet(name: string): SpriteSheet {
        const sheet = this.loadedSheets.get(name);
        if (sheet === undefined) {
            throw new Error(errors.sheetNotLoaded(name).content[0].text);
        }
        return sheet;
    }

    /**
     * Loads and decodes a sheet file under a logical name, replacing any sheet
     * already loaded under that name. Existing players keep the sheet they were
     * created with.
     */
    async loadSheet(name: string, path: string): Promise<SpriteSheet> {
        const sheet = await loadSheetFile(path);
        this.loadedSheets.set(name, sheet);
        this._sheetPaths.set(name, path);
        return sheet;
    }

    /**
     * Removes a sheet. Refuses while any player still plays it.
     */
    unloadSheet(name: string): void {
        if (!this.loadedSheets.has(name)) {
            throw new Error(errors.sheetNotLoaded(name).content[0].text);
        }
        const users = [...this.players.values()].filter((p) => p.sheetName === name).map((p) => p.id);
        if (users.length > 0) {
            throw new Error(errors.sheetInUse(name, users).content[0].text);
        }
        this.loadedSheets.delete(name);
        this._sheetPaths.delete(name);
    }

    // ------------------------------------------------------------------------
    // Player Lifecycle
    // ------------------------------------------------------------------------

    /**
     * Creates a player over a loaded sheet. Its notifications are queued on the
     * returned entry until drained with `drainEvents()`.
     */
    createPlayer(id: string, sheetName: string, playSpeed?: number): WorkspacePlayer {
        if (this.players.has(id)) {
            throw new Error(errors.playerAlreadyExists(id).content[0].text);
        }
        const sheet = this.getSheet(sheetName);

        const events: PlayerEvent[] = [];
        const player = new PlayerClass(sheet, {
            playSpeed,
            onLoop: () => events.push({ type: 'loop' }),
            onFrameChange: (frame: number) => events.push({ type: 'frame_change', frame }),
            onTagEnter: (tag: Tag) => events.push({ type: 'tag_enter', tag: tag.name }),
            onTagExit: (tag: Tag) => events.push({ type: 'tag_exit', tag: tag.name }),
        });

        const entry: WorkspacePlayer = { id, sheetName, player, events };
        this.players.set(id, entry);
        return entry;
    }

    /**
     * Returns a player entry by id. Throws if it does not exist.
     */
    getPlayer(id: string): WorkspacePlayer {
        const entry = this.players.get(id);
        if (entry === undefined) {
            throw new Error(errors.playerNotFound(id).content[0].text);
        }
        return entry;
    }

    destroyPlayer(id: string): void {
        this.getPlayer(id);
        this.players.delete(id);
    }

    /**
     * Returns and clears the queued notifications of a player.
     */
    drainEvents(id: string): PlayerEvent[] {
        const entry = this.getPlayer(id);
        return entry.events.splice(0, entry.events.length);
    }

    // ------------------------------------------------------------------------
    // Session Info
    // ------------------------------------------------------------------------

    /**
     * Returns a summary of the current workspace state.
     */
    info() {
        const sheets: Array<{ name: string; path: string | null; frames: number; tags: number }> = [];
        for (const [name, sheet] of this.loadedSheets) {
            sheets.push({
                name,
                path: this._sheetPaths.get(name) ?? null,
                frames: sheet.frames.length,
                tags: sheet.tags.size,
            });
        }

        return {
            loadedSheets: sheets,
            players: [...this.players.values()].map((p) => ({
                id: p.id,
                sheet: p.sheetName,
                tag: p.player.currentTag?.name ?? null,
                frameIndex: p.player.frameIndex,
            })),
        };
    }
}

/**
 * Module-level accessor for the workspace singleton.
 * Tool handlers import this function to get the workspace.
 */
export function getWorkspace(): WorkspaceClass {
    return WorkspaceClass.instance();
}
