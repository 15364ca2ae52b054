#!/usr/bin/env node

import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { loadConfig } from './config/index.js';
import { ZoomClient, clientOptionsFromConfig } from './providers/zoom/client.js';
import { SERVER_NAME, SERVER_VERSION, buildServer } from './server.js';
import { createZoomTools } from './tools/zoom-tools.js';
import { mcpLogger as logger } from './utils/logger.js';

async function main() {
  logger.info(`Starting ${SERVER_NAME} v${SERVER_VERSION}...`);

  const config = loadConfig();
  // Throws ConfigurationError when credentials or the license limit are missing.
  const zoomClient = new ZoomClient(clientOptionsFromConfig(config));

  const zoomTools = createZoomTools(zoomClient);
  const server = buildServer(zoomTools);
  const toolNames = Object.keys(zoomTools);
  logger.info(`Registered ${toolNames.length} tools`);

  const transport = new StdioServerTransport();
  await server.connect(transport);

  logger.info(`${SERVER_NAME} is running on stdio transport`);
  logger.info(`  Zoom tools (${toolNames.length}): ${toolNames.join(', ')}`);
  logger.info(
    config.zoom.recycleLicenses
      ? `License recycling enabled (limit ${config.zoom.licensesCount} paid users)`
      : 'License recycling disabled'
  );
}

// Handle uncaught errors
process.on('uncaughtException', (error) => {
  logger.fatal({ err: error }, 'Uncaught exception');
  process.exit(1);
});

process.on('unhandledRejection', (reason) => {
  logger.fatal({ err: reason }, 'Unhandled rejection');
  process.exit(1);
});

main().catch((error: unknown) => {
  logger.fatal({ err: error }, 'Fatal error');
  process.exit(1);
});
