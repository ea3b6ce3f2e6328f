#!/usr/bin/env node

/**
 * keyhintsd
 *
 * Execution daemon entry point: owns the input device and serves command
 * requests on a local socket until SIGINT/SIGTERM or a fatal device failure.
 */

import { parseDaemonArgs } from './args.js';
import { initConfig } from '../config/index.js';
import { DaemonServer, YdotoolDevice } from '../daemon/index.js';
import { formatErrorReport } from '../shared/errors/index.js';
import { createLogger, getLogger } from '../shared/services/logging.service.js';

const logger = createLogger('keyhintsd');

const USAGE = `Usage: keyhintsd [--socket <path>] [--screen <W>x<H>] [--scale <n>]
                 [--config <path>] [--log-level <level>]`;

async function main(): Promise<number> {
  const args = parseDaemonArgs(process.argv.slice(2));
  if (args.help) {
    console.error(USAGE);
    return 0;
  }
  if (args.logLevel) {
    getLogger().setMinLevel(args.logLevel);
  }

  const config = initConfig({ configPath: args.configPath });
  const daemonConfig = config.daemon;

  const server = new DaemonServer(
    {
      socketPath: args.socketPath ?? config.socketPath,
      maxFrameBytes: daemonConfig.maxFrameBytes,
    },
    {
      scaleFactor: args.scaleFactor ?? daemonConfig.scaleFactor,
      screen: args.screen ?? daemonConfig.screen,
      writeStallMs: daemonConfig.writeStallMs,
      settleMs: daemonConfig.settleMs,
      buttonPauseMs: daemonConfig.buttonPauseMs,
      stepPauseMs: daemonConfig.stepPauseMs,
    },
    new YdotoolDevice()
  );

  const exitCode = await new Promise<number>((resolve, reject) => {
    const shutdown = (signal: string, code: number): void => {
      logger.info('Shutting down', { signal });
      server.stop().then(() => resolve(code), reject);
    };

    process.once('SIGINT', () => shutdown('SIGINT', 0));
    process.once('SIGTERM', () => shutdown('SIGTERM', 0));
    server.once('fatal', () => shutdown('fatal', 1));

    server.start().catch(reject);
  });

  return exitCode;
}

main().then(
  (code) => {
    process.exitCode = code;
  },
  (error: unknown) => {
    console.error(formatErrorReport(error));
    process.exitCode = 1;
  }
);
