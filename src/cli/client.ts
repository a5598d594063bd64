#!/usr/bin/env node
/**
 * echo-probe client entry point
 */

import { loadConfig } from '../config.js';
import { Logger } from '../logger.js';
import { connectDatagram, connectStream } from '../transport/index.js';
import { MeasurementDriver, type MeasurementChannel } from '../measurement/driver.js';
import { DEFAULT_PLAN } from '../measurement/plan.js';
import { formatReport } from '../measurement/report.js';
import { parseClientArgs } from './args.js';

async function main(): Promise<void> {
  const args = parseClientArgs(process.argv.slice(2));
  const config = loadConfig();
  const logger = new Logger('echo-probe', config.logLevel);

  const endpoint = {
    host: args.host ?? config.host,
    port: args.port ?? config.port,
    readTimeoutMs: config.readTimeoutMs,
    logLevel: config.logLevel,
  };

  const channel: MeasurementChannel =
    args.transport === 'tcp'
      ? await connectStream({ ...endpoint, connectTimeoutMs: config.connectTimeoutMs })
      : await connectDatagram(endpoint);

  const shutdown = async (signal: string) => {
    logger.warn(`Received ${signal}, closing connection...`);
    await channel.close();
    process.exit(130);
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

  const driver = new MeasurementDriver({ timeResolutionMs: config.timeResolutionMs, logger });
  const report = await driver.run(channel, DEFAULT_PLAN);

  for (const line of formatReport(report)) {
    console.log(line);
  }
}

main().catch((err: unknown) => {
  console.error(err instanceof Error ? err.message : String(err));
  process.exit(1);
});
