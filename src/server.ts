/**
 * MCP server exposing the timekeep commands as tools over stdio
 */

import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import {
  CallToolRequestSchema,
  ListToolsRequestSchema,
} from '@modelcontextprotocol/sdk/types.js';

import { logger } from './utils/logger.js';
import { handleToolCall, getToolDefinitions } from './tools/index.js';

export const SERVER_NAME = 'timekeep';
export const SERVER_VERSION = '0.1.0';

export function createServer(): Server {
  const server = new Server(
    {
      name: SERVER_NAME,
      version: SERVER_VERSION,
    },
    {
      capabilities: {
        tools: {},
      },
    }
  );

  server.setRequestHandler(ListToolsRequestSchema, async () => {
    return {
      tools: getToolDefinitions(),
    };
  });

  server.setRequestHandler(CallToolRequestSchema, async (request) => {
    const { name, arguments: args } = request.params;

    logger.debug(`Tool call: ${name}`, args);

    const result = await handleToolCall(name, args ?? {});
    if (!result.success) {
      logger.error(`Tool error: ${name}`, { code: result.code, error: result.error });
    }
    return {
      content: [
        {
          type: 'text',
          text: JSON.stringify(result, null, 2),
        },
      ],
      isError: !result.success,
    };
  });

  return server;
}

/**
 * Serve until stdin closes or the process is signalled
 */
export async function startServer(): Promise<void> {
  const server = createServer();
  const transport = new StdioServerTransport();

  const shutdown = async (): Promise<void> => {
    logger.info('Shutting down...');
    await server.close();
    process.exit(0);
  };
  const onSignal = (): void => {
    shutdown().catch((error: unknown) => {
      logger.error('Shutdown failed', error);
      process.exit(1);
    });
  };
  process.on('SIGINT', onSignal);
  process.on('SIGTERM', onSignal);

  await server.connect(transport);
  logger.info('Server connected with stdio transport');
}
