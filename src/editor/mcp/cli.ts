#!/usr/bin/env node
import { readFileSync } from 'node:fs';
import { layoutConfigFromEnv, resolveLayoutConfig } from '../../config';
import { describeError } from '../../errors';
import type { EditorLogEvent } from '../editorTypes';
import { LadderApplicationService } from '../ladderApplicationService';
import { LadderEditor } from '../ladderEditor';
import { createLadderMcpServer } from './server';

const defaultPort = Number.parseInt(process.env.LADDER_MCP_PORT ?? '8125', 10);
const defaultHost = process.env.LADDER_MCP_HOST ?? '127.0.0.1';
const defaultEndpoint = process.env.LADDER_MCP_ENDPOINT ?? '/mcp';

const args = process.argv.slice(2);
const portArg = args.find(arg => arg.startsWith('--port='));
const hostArg = args.find(arg => arg.startsWith('--host='));
const endpointArg = args.find(arg => arg.startsWith('--endpoint='));
const l5xArg = args.find(arg => arg.startsWith('--l5x='));
const routineArg = args.find(arg => arg.startsWith('--routine='));

const port = portArg ? Number.parseInt(portArg.split('=')[1] ?? '', 10) : defaultPort;
const host = hostArg ? hostArg.split('=')[1] || defaultHost : defaultHost;
const endpointCandidate = endpointArg ? endpointArg.split('=')[1] || defaultEndpoint : defaultEndpoint;
const endpoint: `/${string}` = endpointCandidate.startsWith('/') ? `/${endpointCandidate.slice(1)}` : `/${endpointCandidate}`;

const log = (event: EditorLogEvent): void => {
  process.stderr.write(`${event.level.toUpperCase()} ${event.scope}: ${event.message}\n`);
};

async function main(): Promise<void> {
  const editor = new LadderEditor({
    config: resolveLayoutConfig(layoutConfigFromEnv()),
    logger: log
  });
  const ladderApp = new LadderApplicationService(editor);

  if (l5xArg) {
    const file = l5xArg.slice('--l5x='.length);
    ladderApp.loadL5x(readFileSync(file, 'utf8'), routineArg?.slice('--routine='.length));
  }

  const mcpServer = createLadderMcpServer(ladderApp, {
    endpoint,
    host,
    port: Number.isFinite(port) ? port : defaultPort
  });

  const shutdown = async (): Promise<void> => {
    await mcpServer.stop().catch(error => {
      log({ level: 'warn', scope: 'mcp', message: `Stop failed: ${describeError(error)}` });
    });
    editor.dispose();
    process.exit(0);
  };

  process.on('SIGINT', () => {
    void shutdown();
  });
  process.on('SIGTERM', () => {
    void shutdown();
  });

  await mcpServer.start();
  process.stderr.write(`[MCP] Ladder editor MCP server started on http://${host}:${port}${endpoint}\n`);
  process.stderr.write(`[REST] Ladder editor REST API available at http://${host}:${port}/api/v1\n`);
}

void main().catch(error => {
  process.stderr.write(`[MCP] Failed to start ladder editor MCP server: ${describeError(error)}\n`);
  process.exit(1);
});
