#!/usr/bin/env node

import process from 'node:process';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { getConfig } from './config.js';
import { createServer } from './server.js';
import { processDirectory } from './tools/svg/files.js';
import { logToStderr, setLogLevel } from './utils/logger.js';

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

async function runExtractSvgs(dir: string): Promise<void> {
  const result = await processDirectory(dir, getConfig().svg);
  logToStderr('info', `Processed ${result.processed.length} markdown files, extracted ${result.figures} figures`);
}

async function runServer() {
  const config = getConfig();
  setLogLevel(config.logLevel);

  // Batch mode: `text-plugins extract-svgs [dir]`
  if (process.argv[2] === 'extract-svgs') {
    await runExtractSvgs(process.argv[3] ?? process.cwd());
    return;
  }

  process.on('uncaughtException', (error) => {
    logToStderr('error', `Uncaught exception: ${describeError(error)}`);
    process.exit(1);
  });

  process.on('unhandledRejection', (reason) => {
    logToStderr('error', `Unhandled rejection: ${describeError(reason)}`);
    process.exit(1);
  });

  const server = createServer();
  const transport = new StdioServerTransport();

  logToStderr('info', 'Connecting server...');
  await server.connect(transport);
  logToStderr('info', 'Server connected successfully');
}

runServer().catch((error: unknown) => {
  logToStderr('error', `FATAL ERROR: ${describeError(error)}`);
  if (error instanceof Error && error.stack) {
    logToStderr('debug', error.stack);
  }
  process.exit(1);
});
