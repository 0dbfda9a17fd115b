#!/usr/bin/env -S npx tsx
import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { bootstrap } from './bootstrap';
import { closeDbConnection } from './db/client';
import { registerAllTools } from './tools';

const SERVER_NAME = 'cohort-registry';
const SERVER_VERSION = '1.0.0';

bootstrap();

const server = new McpServer({
  name: SERVER_NAME,
  version: SERVER_VERSION,
});

registerAllTools(server);

process.on('exit', closeDbConnection);
process.on('SIGINT', () => process.exit(0));
process.on('SIGTERM', () => process.exit(0));

const transport = new StdioServerTransport();
await server.connect(transport);
console.error(`[${SERVER_NAME}] MCP server ${SERVER_VERSION} listening on stdio`);
