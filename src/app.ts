import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type { AppConfig } from './config.js';
import { registerRiotTools } from './routes/tools.routes.js';
import RiotApiService from './services/riotApi.service.js';
import RiotToolsService from './services/riotTools.service.js';

export const SERVER_NAME = 'riot';
export const SERVER_VERSION = '1.0.0';

export function createServer(
  config: AppConfig,
  riotApi: RiotApiService = new RiotApiService({ apiKey: config.riotApiKey }),
): McpServer {
  const server = new McpServer({
    name: SERVER_NAME,
    version: SERVER_VERSION
  });

  registerRiotTools(server, new RiotToolsService(riotApi));
  return server;
}
