/**
 * Shared error catalogue for sprite sheet domain errors.
 *
 * The factory functions return the structured MCP error response shape directly,
 * allowing tool handlers to do:
 *   return errors.sheetNotLoaded(name);
 *
 * The library layer throws the typed errors at the bottom of this module instead;
 * their messages come from the same catalogue.
 */

/**
 * The standard MCP error response shape for domain errors.
 * Tool handlers return this object. The LLM reads the text and can self-correct.
 */
export interface DomainErrorResponse {
    isError: true;
    content: Array<{ type: 'text'; text: string }>;
}

/**
 * Base helper to construct a DomainErrorResponse from a message string.
 */
export function domainError(message: string): DomainErrorResponse {
    return {
        isError: true,
        content: [{ type: 'text', text: message }],
    };
}

export function invalidArgument(message: string): DomainErrorResponse {
    return domainError(`Invalid argument: ${message}`);
}

// ----------------------------------------------------------------------------
// decoding
// ----------------------------------------------------------------------------

export function malformedDocument(reason: string): DomainErrorResponse {
    return domainError(`Malformed sprite sheet document: ${reason}`);
}

export function sheetFileNotFound(path: string): DomainErrorResponse {
    return domainError(`Sprite sheet file not found: ${path}`);
}

// ----------------------------------------------------------------------------
// sheet
// ----------------------------------------------------------------------------

export function sheetNotLoaded(name: string): DomainErrorResponse {
    return domainError(`Sheet '${name}' is not loaded in the workspace.`);
}

export function sheetInUse(name: string, playerIds: string[]): DomainErrorResponse {
    return domainError(`Sheet '${name}' is still used by player(s): ${playerIds.join(', ')}. Destroy them first.`);
}

// ----------------------------------------------------------------------------
// player
// ----------------------------------------------------------------------------

export function tagNotFound(tagName: string): DomainErrorResponse {
    return domainError(`Tag '${tagName}' not found in sprite sheet.`);
}

export function playerNotFound(id: string): DomainErrorResponse {
    return domainError(`Player '${id}' does not exist in the workspace.`);
}

export function playerAlreadyExists(id: string): DomainErrorResponse {
    return domainError(`Player '${id}' already exists. Destroy it first or pick another id.`);
}

export function noTagSelected(id: string): DomainErrorResponse {
    return domainError(`Player '${id}' has no tag selected. Call player play first.`);
}

// ----------------------------------------------------------------------------
// Typed errors thrown by the library
// ----------------------------------------------------------------------------

/**
 * The decoder could not establish the minimum sheet structure.
 */
export class MalformedDocumentError extends Error {
    readonly reason: string;

    constructor(reason: string) {
        super(malformedDocument(reason).content[0].text);
        this.name = 'MalformedDocumentError';
        this.reason = reason;
    }
}

/**
 * A play request named a tag the sheet does not declare.
 */
export class TagNotFoundError extends Error {
    readonly tagName: string;

    constructor(tagName: string) {
        super(tagNotFound(tagName).content[0].text);
        this.name = 'TagNotFoundError';
        this.tagName = tagName;
    }
}
