import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { registerSheetTool } from './tools/sheet.js';
import { registerPlayerTool } from './tools/player.js';

export const SERVER_INFO = {
  name: 'sprite-sheet-player',
  version: '1.0.0',
};

/**
 * Builds the MCP server with every tool registered, ready to connect to a transport.
 */
export function createServer(): McpServer {
  const server = new McpServer(SERVER_INFO);
  registerSheetTool(server);
  registerPlayerTool(server);
  return server;
}
