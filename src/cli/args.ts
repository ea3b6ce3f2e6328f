/**
 * CLI Argument Parsing
 *
 * Parses command-line arguments for the daemon and the hint driver. Flags
 * override the configuration file and the environment.
 */

import type { ScreenSize } from '../shared/schemas/index.js';
import { isLogLevel, type LogLevel } from '../shared/services/logging.service.js';

/**
 * Options shared by both executables
 */
export interface CommonArgs {
  /** Daemon socket path */
  socketPath?: string;

  /** Configuration file (default: $XDG_CONFIG_HOME/keyhints/config.json) */
  configPath?: string;

  /** Minimum log level */
  logLevel?: LogLevel;

  /** Print usage and exit */
  help: boolean;
}

/**
 * keyhintsd arguments
 */
export interface DaemonArgs extends CommonArgs {
  /** Display bounds for range checks */
  screen?: ScreenSize;

  /** Logical -> device pixel multiplier */
  scaleFactor?: number;
}

/**
 * keyhints arguments
 */
export interface HintsArgs extends CommonArgs {
  /** JSON files of scanned elements, tried in order */
  elementFiles: string[];
}

const COMMON_ARG_NAMES = ['socket', 'config', 'log-level', 'help'];

/** Known CLI argument base names for validation */
const DAEMON_ARG_NAMES = new Set([...COMMON_ARG_NAMES, 'screen', 'scale']);
const HINTS_ARG_NAMES = new Set([...COMMON_ARG_NAMES, 'elements']);

/**
 * Check if an argument is a known CLI flag (handles --arg and --arg=value forms).
 */
function isKnownArg(arg: string, known: ReadonlySet<string>): boolean {
  if (!arg.startsWith('--')) return true; // Not a flag, skip validation
  const baseName = arg.slice(2).split('=')[0];
  return known.has(baseName);
}

/**
 * Parse "1920x1080"
 */
export function parseScreenSize(value: string): ScreenSize | undefined {
  const match = /^(\d+)x(\d+)$/.exec(value.trim());
  if (!match) {
    return undefined;
  }
  const width = Number.parseInt(match[1], 10);
  const height = Number.parseInt(match[2], 10);
  if (width <= 0 || height <= 0) {
    return undefined;
  }
  return { width, height };
}

/**
 * Expand --flag=value into ['--flag', 'value']
 */
function splitInlineValues(argv: string[]): string[] {
  return argv.flatMap((arg) => {
    const eq = arg.indexOf('=');
    return arg.startsWith('--') && eq > 2 ? [arg.slice(0, eq), arg.slice(eq + 1)] : [arg];
  });
}

/**
 * Apply one shared flag; returns the number of extra argv entries consumed,
 * or -1 when the flag is not a shared one
 */
function parseCommonArg(args: CommonArgs, arg: string, value: string | undefined): number {
  if (arg === '--help' || arg === '-h') {
    args.help = true;
    return 0;
  }
  if (arg === '--socket' && value) {
    args.socketPath = value;
    return 1;
  }
  if (arg === '--config' && value) {
    args.configPath = value;
    return 1;
  }
  if (arg === '--log-level' && value) {
    if (isLogLevel(value)) {
      args.logLevel = value;
    } else {
      console.warn(`Warning: Unknown log level "${value}" - ignored`);
    }
    return 1;
  }
  return -1;
}

/**
 * Parse keyhintsd arguments.
 *
 * @param argv - Command line arguments (process.argv.slice(2))
 */
export function parseDaemonArgs(argv: string[]): DaemonArgs {
  const args: DaemonArgs = { help: false };
  const items = splitInlineValues(argv);

  for (let i = 0; i < items.length; i++) {
    const arg = items[i];
    const value = items[i + 1];

    const consumed = parseCommonArg(args, arg, value);
    if (consumed >= 0) {
      i += consumed;
    } else if (arg === '--screen' && value) {
      const screen = parseScreenSize(value);
      if (screen) {
        args.screen = screen;
      } else {
        console.warn(`Warning: Invalid screen size "${value}" (expected WIDTHxHEIGHT) - ignored`);
      }
      i++;
    } else if (arg === '--scale' && value) {
      const scale = Number(value);
      if (Number.isFinite(scale) && scale > 0) {
        args.scaleFactor = scale;
      } else {
        console.warn(`Warning: Invalid scale factor "${value}" - ignored`);
      }
      i++;
    } else if (!isKnownArg(arg, DAEMON_ARG_NAMES)) {
      // Warn about unknown arguments to catch typos like --sokcet
      console.warn(`Warning: Unknown argument "${arg}" - ignored`);
    }
  }

  return args;
}

/**
 * Parse keyhints arguments.
 *
 * @param argv - Command line arguments (process.argv.slice(2))
 */
export function parseHintsArgs(argv: string[]): HintsArgs {
  const args: HintsArgs = { help: false, elementFiles: [] };
  const items = splitInlineValues(argv);

  for (let i = 0; i < items.length; i++) {
    const arg = items[i];
    const value = items[i + 1];

    const consumed = parseCommonArg(args, arg, value);
    if (consumed >= 0) {
      i += consumed;
    } else if (arg === '--elements' && value) {
      args.elementFiles.push(value);
      i++;
    } else if (!isKnownArg(arg, HINTS_ARG_NAMES)) {
      console.warn(`Warning: Unknown argument "${arg}" - ignored`);
    }
  }

  return args;
}
