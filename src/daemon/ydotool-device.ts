/**
 * ydotool Input Device
 *
 * Injects pointer events through the ydotool client, which forwards them to
 * a running ydotoold that owns /dev/uinput.
 */

import { execFile } from 'child_process';
import { access } from 'fs/promises';
import { constants } from 'fs';
import type { MouseButton } from '../shared/types/index.js';
import { DeviceError } from '../shared/errors/index.js';
import { createLogger } from '../shared/services/logging.service.js';
import type { InputDevice, InputEvent } from './input-device.interface.js';

const logger = createLogger('YdotoolDevice');

/** ydotool click codes: low nibble selects the button, 0x40 = down, 0x80 = up */
const BUTTON_CODES: Record<MouseButton, number> = {
  left: 0x00,
  right: 0x01,
  middle: 0x02,
};
const DOWN_FLAG = 0x40;
const UP_FLAG = 0x80;

/**
 * Runs one ydotool invocation; rejects with the child process error
 */
export type YdotoolRunner = (binary: string, args: string[], env: NodeJS.ProcessEnv) => Promise<void>;

export interface YdotoolDeviceConfig {
  /** ydotool executable (default: "ydotool" on PATH) */
  binary?: string;
  /** ydotoold socket (default: $YDOTOOL_SOCKET or /run/user/<uid>/.ydotool_socket) */
  socketPath?: string;
  runner?: YdotoolRunner;
}

/**
 * Default runner: execFile, with stderr folded into the error message
 */
export const execYdotool: YdotoolRunner = (binary, args, env) =>
  new Promise((resolve, reject) => {
    execFile(binary, args, { env }, (error, _stdout, stderr) => {
      if (!error) {
        resolve();
        return;
      }
      const detail = String(stderr).trim();
      if (detail) {
        error.message = `${error.message}: ${detail}`;
      }
      reject(error);
    });
  });

function isMissingExecutable(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

/**
 * Resolve the ydotoold socket the way the ydotool client does
 */
export function defaultYdotoolSocket(): string {
  if (process.env.YDOTOOL_SOCKET) {
    return process.env.YDOTOOL_SOCKET;
  }
  const uid = process.getuid?.() ?? 1000;
  return `/run/user/${uid}/.ydotool_socket`;
}

/**
 * Command-line arguments for one event
 */
export function ydotoolArgs(event: InputEvent): string[] {
  switch (event.type) {
    case 'move-absolute':
      return ['mousemove', '--absolute', '-x', String(event.x), '-y', String(event.y)];
    case 'move-relative':
      return ['mousemove', '-x', String(event.dx), '-y', String(event.dy)];
    case 'wheel':
      return ['mousemove', '--wheel', '-x', String(event.dx), '-y', String(event.dy)];
    case 'button': {
      const flag = event.state === 'down' ? DOWN_FLAG : UP_FLAG;
      const code = BUTTON_CODES[event.button] | flag;
      return ['click', `0x${code.toString(16).padStart(2, '0')}`];
    }
  }
}

export class YdotoolDevice implements InputDevice {
  readonly name = 'ydotool';

  private readonly binary: string;
  private readonly socketPath: string;
  private readonly runner: YdotoolRunner;
  private _isOpen = false;

  constructor(config: YdotoolDeviceConfig = {}) {
    this.binary = config.binary ?? 'ydotool';
    this.socketPath = config.socketPath ?? defaultYdotoolSocket();
    this.runner = config.runner ?? execYdotool;
  }

  get isOpen(): boolean {
    return this._isOpen;
  }

  async open(): Promise<void> {
    try {
      await access(this.socketPath, constants.R_OK | constants.W_OK);
    } catch (error) {
      this._isOpen = false;
      throw DeviceError.unavailable(
        `${this.name} (${this.socketPath})`,
        error instanceof Error ? error : undefined,
      );
    }
    this._isOpen = true;
    logger.info('Input device opened', { socketPath: this.socketPath });
  }

  async write(events: readonly InputEvent[]): Promise<void> {
    if (!this._isOpen) {
      throw DeviceError.unavailable(this.name);
    }
    for (const event of events) {
      await this.run(ydotoolArgs(event));
    }
  }

  close(): Promise<void> {
    if (this._isOpen) {
      logger.info('Input device closed', { socketPath: this.socketPath });
    }
    this._isOpen = false;
    return Promise.resolve();
  }

  private async run(args: string[]): Promise<void> {
    try {
      await this.runner(this.binary, args, { ...process.env, YDOTOOL_SOCKET: this.socketPath });
    } catch (error) {
      const cause = error instanceof Error ? error : new Error(String(error));

      if (isMissingExecutable(error)) {
        // The injection tool itself is gone
        throw DeviceError.lost(this.binary, cause);
      }

      // ydotoold went away or refused us; recoverable once it is back
      this._isOpen = false;
      logger.warning('ydotool command failed', { args, error: cause.message });
      throw DeviceError.unavailable(this.name, cause);
    }
  }
}
