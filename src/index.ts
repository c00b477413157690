#!/usr/bin/env node

import { fileURLToPath } from 'url';
import { realpathSync } from 'fs';
import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import {
  CallToolRequestSchema,
  ListToolsRequestSchema,
} from '@modelcontextprotocol/sdk/types.js';

import { getTools, handleToolCall, type ToolExposureMode } from './tools/index.js';
import { runReadCli } from './cli/readCli.js';
import { routeConsoleToStderr } from './utils/stdioHygiene.js';
import { getPackageVersion } from './version.js';

export const LVM_TOOL_MODE_ENV = 'LVM_TOOL_MODE';

export function resolveToolMode(raw: string | undefined): ToolExposureMode {
  return raw?.trim().toLowerCase() === 'full' ? 'full' : 'standard';
}

function createServer(mode: ToolExposureMode): Server {
  const server = new Server(
    {
      name: 'lvm-mcp',
      version: getPackageVersion(),
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

async function main(): Promise<void> {
  routeConsoleToStderr();

  if (process.argv[2] === 'read') {
    await runReadCli(process.argv.slice(3));
    return;
  }

  const mode = resolveToolMode(process.env[LVM_TOOL_MODE_ENV]);
  const transport = new StdioServerTransport();
  await createServer(mode).connect(transport);
  console.error(`[lvm-mcp] Server started (${mode} tools)`);
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
  main().catch((err: unknown) => {
    console.error('[lvm-mcp] Fatal:', err instanceof Error ? err.message : String(err));
    process.exitCode = 1;
  });
}
