/**
 * Command Executor
 *
 * Translates decoded command requests into low-level input events and writes
 * them to the injection device. Only the execution queue calls execute(), so
 * the device never sees interleaved requests.
 */

import { DeviceError, ErrorCode, RangeCheckError } from '../shared/errors/index.js';
import { createLogger } from '../shared/services/logging.service.js';
import type { Direction } from '../shared/types/index.js';
import {
  OK_RESPONSE,
  errorResponse,
  type CommandRequest,
  type CommandResponse,
} from '../protocol/index.js';
import type { InputDevice, InputEvent } from './input-device.interface.js';
import type { CommandExecutorConfig } from './daemon.types.js';

const logger = createLogger('CommandExecutor');

/**
 * A batch of events written together, followed by a pause
 */
export interface ExecutionStep {
  events: InputEvent[];
  pauseAfterMs: number;
}

/** evdev wheel deltas per notch */
const WHEEL_DELTAS: Record<Direction, { dx: number; dy: number }> = {
  up: { dx: 0, dy: 1 },
  down: { dx: 0, dy: -1 },
  left: { dx: -1, dy: 0 },
  right: { dx: 1, dy: 0 },
};

/**
 * Device coordinates are whole pixels
 */
function scaled(value: number, scale: number): number {
  return Math.round(value * scale);
}

/**
 * Build the ordered steps that carry out a request
 */
export function planExecution(request: CommandRequest, config: CommandExecutorConfig): ExecutionStep[] {
  const scale = config.scaleFactor;
  const steps: ExecutionStep[] = [];

  switch (request.type) {
    case 'click': {
      if (request.absolute) {
        steps.push({
          events: [{ type: 'move-absolute', x: scaled(request.x, scale), y: scaled(request.y, scale) }],
          pauseAfterMs: config.settleMs,
        });
      } else if (request.x !== 0 || request.y !== 0) {
        steps.push({
          events: [{ type: 'move-relative', dx: scaled(request.x, scale), dy: scaled(request.y, scale) }],
          pauseAfterMs: config.settleMs,
        });
      }
      request.buttonStates.forEach((state, index) => {
        steps.push({
          events: [{ type: 'button', button: request.button, state }],
          pauseAfterMs: index < request.buttonStates.length - 1 ? config.buttonPauseMs : 0,
        });
      });
      break;
    }
    case 'move':
      for (let i = 0; i < request.steps; i++) {
        steps.push({
          events: [{ type: 'move-relative', dx: scaled(request.dx, scale), dy: scaled(request.dy, scale) }],
          pauseAfterMs: i < request.steps - 1 ? config.stepPauseMs : 0,
        });
      }
      break;
    case 'scroll': {
      const delta = WHEEL_DELTAS[request.direction];
      for (let i = 0; i < request.steps; i++) {
        steps.push({
          events: [{ type: 'wheel', dx: delta.dx, dy: delta.dy }],
          pauseAfterMs: i < request.steps - 1 ? config.stepPauseMs : 0,
        });
      }
      break;
    }
    case 'move-to':
      steps.push({
        events: [{ type: 'move-absolute', x: scaled(request.x, scale), y: scaled(request.y, scale) }],
        pauseAfterMs: 0,
      });
      break;
  }

  return steps;
}

/**
 * Reject absolute targets outside the configured display
 *
 * @throws RangeCheckError
 */
export function checkBounds(request: CommandRequest, config: CommandExecutorConfig): void {
  const screen = config.screen;
  if (!screen) {
    return;
  }

  const absolute =
    request.type === 'move-to' || (request.type === 'click' && request.absolute);
  if (!absolute) {
    return;
  }

  if (request.x < 0 || request.y < 0 || request.x >= screen.width || request.y >= screen.height) {
    throw new RangeCheckError(
      `Target (${request.x}, ${request.y}) is outside the ${screen.width}x${screen.height} display`,
      { x: request.x, y: request.y, screen },
    );
  }
}

function sleep(ms: number): Promise<void> {
  if (ms <= 0) {
    return Promise.resolve();
  }
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export class CommandExecutor {
  constructor(
    private readonly device: InputDevice,
    private readonly config: CommandExecutorConfig,
  ) {}

  /**
   * Execute one request against the device.
   *
   * Recoverable failures become error responses. Fatal device failures
   * (device lost, stalled write) are thrown.
   *
   * @throws DeviceError with DEVICE_LOST or DEVICE_STALLED
   */
  async execute(request: CommandRequest): Promise<CommandResponse> {
    try {
      checkBounds(request, this.config);
    } catch (error) {
      if (error instanceof RangeCheckError) {
        logger.warning('Rejected out-of-range request', error.details);
        return errorResponse('out-of-range');
      }
      throw error;
    }

    if (!this.device.isOpen) {
      try {
        await this.device.open();
      } catch (error) {
        if (DeviceError.isDeviceError(error) && error.code === ErrorCode.DEVICE_UNAVAILABLE) {
          logger.error('Input device unavailable', error);
          return errorResponse('device-unavailable');
        }
        throw error;
      }
    }

    const steps = planExecution(request, this.config);
    logger.debug('Executing request', {
      type: request.type,
      steps: steps.length,
      ...(request.type === 'click' ? { repeat: request.repeat } : {}),
    });

    try {
      for (const step of steps) {
        await this.writeWithWatchdog(step.events);
        await sleep(step.pauseAfterMs);
      }
    } catch (error) {
      if (DeviceError.isDeviceError(error) && !error.isFatal) {
        logger.error('Device write failed', error, { type: request.type });
        return errorResponse('device-unavailable');
      }
      if (DeviceError.isDeviceError(error)) {
        throw error;
      }
      // Unknown failure from a device implementation: isolate it to this request
      logger.error(
        'Unexpected device failure',
        error instanceof Error ? error : new Error(String(error)),
        { type: request.type },
      );
      return errorResponse('device-unavailable');
    }

    return OK_RESPONSE;
  }

  private async writeWithWatchdog(events: InputEvent[]): Promise<void> {
    let timer: ReturnType<typeof setTimeout> | undefined;
    const stalled = new Promise<never>((_resolve, reject) => {
      timer = setTimeout(
        () => reject(DeviceError.stalled(this.device.name, this.config.writeStallMs)),
        this.config.writeStallMs,
      );
    });

    try {
      await Promise.race([this.device.write(events), stalled]);
    } finally {
      clearTimeout(timer);
    }
  }
}
