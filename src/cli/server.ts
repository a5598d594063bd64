#!/usr/bin/env node
/**
 * echo-probe-server entry point
 */

import { loadConfig, SERVER_DEFAULTS } from '../config.js';
import { Logger } from '../logger.js';
import { DatagramEchoServer, StreamEchoServer } from '../server/index.js';
import { parseServerArgs } from './args.js';

async function main(): Promise<void> {
  const args = parseServerArgs(process.argv.slice(2));
  const config = loadConfig(process.env, SERVER_DEFAULTS);
  const logger = new Logger('echo-probe-server', config.logLevel);

  const settings = {
    host: config.host,
    port: args.port ?? config.port,
    logLevel: config.logLevel,
  };

  const server =
    args.transport === 'tcp'
      ? new StreamEchoServer({ ...settings, readTimeoutMs: config.readTimeoutMs })
      : new DatagramEchoServer(settings);

  // Graceful shutdown
  const shutdown = async (signal: string) => {
    logger.info(`Received ${signal}, shutting down gracefully...`);
    await server.stop();
    process.exit(0);
  };
  process.on('SIGINT', () => {
    shutdown('SIGINT').catch((err: unknown) => {
      logger.error('Shutdown failed', err);
      process.exit(1);
    });
  });
  process.on('SIGTERM', () => {
    shutdown('SIGTERM').catch((err: unknown) => {
      logger.error('Shutdown failed', err);
      process.exit(1);
    });
  });

  await server.start();

  if (server instanceof DatagramEchoServer) {
    const exit = await server.closed;
    process.exit(exit === 'failed' ? 1 : 0);
  }
}

main().catch((err: unknown) => {
  console.error('Failed to start server:', err instanceof Error ? err.message : String(err));
  process.exit(1);
});
