#!/usr/bin/env node

/**
 * keyhints
 *
 * Hint driver entry point: scans, prints the label table, reads keystrokes
 * from the terminal and dispatches committed actions to keyhintsd.
 */

import { parseHintsArgs } from './args.js';
import { formatLabelTable, formatOutcome } from './output.js';
import { initConfig, type KeyhintsConfig } from '../config/index.js';
import { CommandClient, ensureDaemonRunning } from '../client/index.js';
import { ActionDispatcher } from '../dispatch/index.js';
import { HintEngine } from '../engine/index.js';
import { ARROW_KEY_DIRECTIONS } from '../hints/index.js';
import { FallbackScanner, JsonElementScanner } from '../scanning/index.js';
import { TerminalKeystrokeSource } from '../keys/index.js';
import { formatErrorReport } from '../shared/errors/index.js';
import { getLogger } from '../shared/services/logging.service.js';
import type { Point } from '../shared/types/index.js';

const USAGE = `Usage: keyhints --elements <file> [--elements <file> ...] [--socket <path>]
                [--config <path>] [--log-level <level>]

Terminals send Ctrl+h as Backspace and Ctrl+j, Ctrl+m as Enter, so labels
starting with h, j or m cannot take the Ctrl binding.`;

function screenCentre(config: KeyhintsConfig): Point {
  const screen = config.daemon.screen;
  return screen ? { x: Math.floor(screen.width / 2), y: Math.floor(screen.height / 2) } : { x: 0, y: 0 };
}

async function main(): Promise<number> {
  const args = parseHintsArgs(process.argv.slice(2));
  if (args.help || args.elementFiles.length === 0) {
    console.error(USAGE);
    return args.help ? 0 : 1;
  }
  if (args.logLevel) {
    getLogger().setMinLevel(args.logLevel);
  }

  const config = initConfig({ configPath: args.configPath });
  const socketPath = args.socketPath ?? config.socketPath;

  ensureDaemonRunning(socketPath);

  const client = new CommandClient({ socketPath, maxFrameBytes: config.daemon.maxFrameBytes });
  const engine = new HintEngine(
    new FallbackScanner(args.elementFiles.map((file) => new JsonElementScanner(file))),
    new ActionDispatcher(client, { movePixels: config.mouse.movePixels }),
    {
      allocator: {
        alphabet: config.alphabet,
        minLength: config.minLabelLength,
        maxLength: config.maxLabelLength,
      },
      session: {
        directionKeys: { ...config.mouse.directionKeys, ...ARROW_KEY_DIRECTIONS },
        maxRepeat: config.mouse.maxRepeat,
        bindings: config.modifiers,
      },
      origin: screenCentre(config),
    }
  );

  engine.on('session-started', ({ labels, truncated }) => {
    console.error(formatLabelTable(labels, truncated));
  });
  engine.on('action-dispatched', ({ outcome }) => {
    console.error(formatOutcome(outcome));
  });

  const source = new TerminalKeystrokeSource(process.stdin);
  try {
    const summary = await engine.run(source);
    const failed = summary.outcomes.some((outcome) => outcome.response.outcome !== 'ok');
    return failed ? 1 : 0;
  } finally {
    source.close();
    await client.close();
  }
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
