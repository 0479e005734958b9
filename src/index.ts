#!/usr/bin/env node

import './utils/stdioHygiene.js';

import { fileURLToPath } from 'url';
import { realpathSync } from 'fs';
import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import {
  CallToolRequestSchema,
  ListToolsRequestSchema,
} from '@modelcontextprotocol/sdk/types.js';

import { getTools, handleToolCall, type ToolExposureMode } from './tools/index.js';
import { isCliCommand, runCli } from './cli.js';
import { SUMFILE_TOOL_MODE_ENV } from './config.js';
import { log } from './utils/log.js';

function toolModeFromEnv(): ToolExposureMode {
  return process.env[SUMFILE_TOOL_MODE_ENV] === 'full' ? 'full' : 'standard';
}

export function createServer(mode: ToolExposureMode = toolModeFromEnv()): Server {
  const server = new Server(
    {
      name: 'sumfile-mcp',
      version: '0.1.0',
    },
    {
      capabilities: {
        tools: {},
      },
    }
  );

  server.setRequestHandler(ListToolsRequestSchema, async () => {
    return { tools: getTools(mode) };
  });

  server.setRequestHandler(CallToolRequestSchema, async (request) => {
    return handleToolCall(request.params.name, request.params.arguments ?? {}, mode);
  });

  return server;
}

async function main() {
  const command = process.argv[2];
  if (isCliCommand(command)) {
    await runCli(command, process.argv.slice(3));
    return;
  }

  const transport = new StdioServerTransport();
  await createServer().connect(transport);
  log.info(`Server started (${toolModeFromEnv()} tools)`);
}

const isExecutedAsScript = (() => {
  try {
    const entryPath = process.argv[1] ? realpathSync(process.argv[1]) : '';
    const modulePath = fileURLToPath(import.meta.url);
    return entryPath === modulePath;
  } catch {
    return false;
  }
})();

if (isExecutedAsScript) {
  main().catch(err => {
    log.error('Fatal:', err instanceof Error ? err.message : err);
    process.exitCode = 1;
  });
}
