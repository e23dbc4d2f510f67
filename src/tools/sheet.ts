import { z } from 'zod';
import { type McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { getWorkspace } from '../classes/workspace.js';
import { MalformedDocumentError } from '../errors.js';
import * as errors from '../errors.js';

/**
 * Zod input schema for the `sheet` tool.
 *
 * Actions: load, unload, info, list, slices
 */
const sheetInputSchema = {
  action: z
    .enum(['load', 'unload', 'info', 'list', 'slices'])
    .describe('Action to perform on decoded sprite sheets'),
  sheet_name: z
    .string()
    .optional()
    .describe('Logical sheet name (required for load, unload, info, slices)'),
  path: z
    .string()
    .optional()
    .describe('Path to the exported sprite sheet JSON (required for load)'),
};

/**
 * Registers the `sheet` tool on the MCP server.
 */
export function registerSheetTool(server: McpServer): void {
  server.registerTool(
    'sheet',
    {
      title: 'Sheet',
      description:
        'Load exported sprite sheet metadata (frames, tags, layers, slices) and inspect what was decoded.',
      inputSchema: sheetInputSchema,
    },
    async (args) => {
      const workspace = getWorkspace();

      switch (args.action) {
        case 'load':
          return handleLoad(workspace, args.sheet_name, args.path);
        case 'unload':
          return handleUnload(workspace, args.sheet_name);
        case 'info':
          return handleInfo(workspace, args.sheet_name);
        case 'list':
          return ok(workspace.info());
        case 'slices':
          return handleSlices(workspace, args.sheet_name);
        default:
          return errors.invalidArgument(`Unknown sheet action: ${String(args.action)}`);
      }
    },
  );
}

// ---------------------------------------------------------------------------
// Action handlers
// ---------------------------------------------------------------------------

type Workspace = ReturnType<typeof getWorkspace>;

function ok(data: object) {
  return { content: [{ type: 'text' as const, text: JSON.stringify(data) }] };
}

async function handleLoad(workspace: Workspace, sheetName: string | undefined, path: string | undefined) {
  if (!sheetName) {
    return errors.invalidArgument('sheet load requires "sheet_name".');
  }
  if (!path) {
    return errors.invalidArgument('sheet load requires "path".');
  }

  try {
    const sheet = await workspace.loadSheet(sheetName, path);
    return ok({
      message: `Sheet '${sheetName}' loaded.`,
      frames: sheet.frames.length,
      tags: [...sheet.tags.keys()],
    });
  } catch (e: unknown) {
    if (e instanceof MalformedDocumentError) {
      return errors.malformedDocument(e.reason);
    }
    const msg = e instanceof Error ? e.message : String(e);
    return errors.domainError(msg);
  }
}

function handleUnload(workspace: Workspace, sheetName: string | undefined) {
  if (!sheetName) {
    return errors.invalidArgument('sheet unload requires "sheet_name".');
  }

  try {
    workspace.unloadSheet(sheetName);
  } catch (e: unknown) {
    const msg = e instanceof Error ? e.message : String(e);
    return errors.domainError(msg);
  }
  return ok({ message: `Sheet '${sheetName}' unloaded.` });
}

function handleInfo(workspace: Workspace, sheetName: string | undefined) {
  if (!sheetName) {
    return errors.invalidArgument('sheet info requires "sheet_name".');
  }
  const sheet = workspace.loadedSheets.get(sheetName);
  if (!sheet) return errors.sheetNotLoaded(sheetName);

  return ok({
    name: sheetName,
    imagePath: sheet.imagePath,
    width: sheet.width,
    height: sheet.height,
    frameWidth: sheet.frameWidth,
    frameHeight: sheet.frameHeight,
    frames: sheet.frames,
    tags: [...sheet.tags.values()],
    layers: sheet.layers,
  });
}

function handleSlices(workspace: Workspace, sheetName: string | undefined) {
  if (!sheetName) {
    return errors.invalidArgument('sheet slices requires "sheet_name".');
  }
  const sheet = workspace.loadedSheets.get(sheetName);
  if (!sheet) return errors.sheetNotLoaded(sheetName);

  return ok({ slices: sheet.slices });
}
