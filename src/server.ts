#!/usr/bin/env node
import dotenv from 'dotenv';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { createServer } from './app.js';
import { loadConfig } from './config.js';
import { errorMessage } from './utils/errors.js';
import { logger, setLogLevel } from './utils/logger.js';

dotenv.config();

async function main(): Promise<void> {
  // API 키가 없으면 시작하지 않음
  const config = loadConfig();
  setLogLevel(config.logLevel);

  const server = createServer(config);
  const transport = new StdioServerTransport();

  const shutdown = (signal: string) => {
    logger.info('SERVER_STOP', `received ${signal}, closing`);
    server.close().then(
      () => process.exit(0),
      (error: unknown) => {
        logger.error('SERVER_STOP', errorMessage(error));
        process.exit(1);
      },
    );
  };
  process.on('SIGINT', () => shutdown('SIGINT'));
  process.on('SIGTERM', () => shutdown('SIGTERM'));

  await server.connect(transport);
  logger.info('SERVER_START', '🚀 Riot MCP server is running on stdio');
}

main().catch((error: unknown) => {
  logger.error('SERVER_FATAL', errorMessage(error));
  process.exit(1);
});
