import pino from 'pino';

// stdout belongs to the MCP stdio transport, so logs go to stderr.
export const mcpLogger = pino(
  {
    name: 'zoom-lms-connector',
    level: process.env.LOG_LEVEL || 'info'
  },
  pino.destination(2)
);

export type Logger = typeof mcpLogger;
