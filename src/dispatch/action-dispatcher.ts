/**
 * Action Dispatcher
 *
 * Translates a committed Action into exactly one command request and hands it
 * to the transport. Click-family actions target the centre of the element's
 * bounding box.
 */

import { centerOf, directionVector } from '../shared/types/index.js';
import { createLogger } from '../shared/services/logging.service.js';
import type { Action } from '../hints/index.js';
import type { ButtonState, CommandRequest } from '../protocol/index.js';
import type { CommandTransport } from '../client/index.js';
import type { DispatchOutcome, DispatcherOptions } from './dispatch.types.js';

const logger = createLogger('ActionDispatcher');

export const DEFAULT_MOVE_PIXELS = 10;

/**
 * One Down/Up pair per click unit
 */
export function clickStates(repeat: number): ButtonState[] {
  const states: ButtonState[] = [];
  for (let i = 0; i < Math.max(1, repeat); i++) {
    states.push('down', 'up');
  }
  return states;
}

/**
 * Build the command request for an action
 */
export function buildCommandRequest(
  action: Action,
  options: DispatcherOptions = {},
): CommandRequest {
  const movePixels = options.movePixels ?? DEFAULT_MOVE_PIXELS;

  switch (action.kind) {
    case 'click': {
      const { x, y } = centerOf(action.target.boundingBox);
      return {
        type: 'click',
        x,
        y,
        button: action.button,
        buttonStates: clickStates(action.repeat),
        repeat: Math.max(1, action.repeat),
        absolute: true,
      };
    }
    case 'double-click': {
      const { x, y } = centerOf(action.target.boundingBox);
      return {
        type: 'click',
        x,
        y,
        button: 'left',
        buttonStates: clickStates(2),
        repeat: 2,
        absolute: true,
      };
    }
    case 'drag': {
      const { x, y } = centerOf(action.target.boundingBox);
      return { type: 'click', x, y, button: action.button, buttonStates: ['down'], repeat: 1, absolute: true };
    }
    case 'release': {
      if (!action.target) {
        // Release wherever the pointer currently is
        return { type: 'click', x: 0, y: 0, button: action.button, buttonStates: ['up'], repeat: 1, absolute: false };
      }
      const { x, y } = centerOf(action.target.boundingBox);
      return { type: 'click', x, y, button: action.button, buttonStates: ['up'], repeat: 1, absolute: true };
    }
    case 'hover': {
      const { x, y } = centerOf(action.target.boundingBox);
      return { type: 'move-to', x, y };
    }
    case 'move': {
      const vector = directionVector(action.direction);
      return {
        type: 'move',
        dx: vector.x * movePixels,
        dy: vector.y * movePixels,
        steps: Math.max(1, action.steps),
      };
    }
    case 'scroll':
      return { type: 'scroll', direction: action.direction, steps: Math.max(1, action.steps) };
  }
}

/**
 * Sends committed actions to the daemon.
 *
 * @example
 * ```typescript
 * const dispatcher = new ActionDispatcher(new CommandClient({ socketPath }));
 * const outcome = await dispatcher.dispatch({ kind: 'hover', target: element });
 * ```
 */
export class ActionDispatcher {
  constructor(
    private readonly transport: CommandTransport,
    private readonly options: DispatcherOptions = {},
  ) {}

  /**
   * Send exactly one request for the action. Transport failures propagate;
   * nothing is retried.
   *
   * @throws TransportError when the daemon cannot be reached
   */
  async dispatch(action: Action): Promise<DispatchOutcome> {
    const request = buildCommandRequest(action, this.options);
    logger.debug('Dispatching action', { action: action.kind, request: request.type });

    const response = await this.transport.send(request);
    if (response.outcome === 'error') {
      logger.warning('Daemon rejected request', { action: action.kind, kind: response.kind });
    }

    return { action, request, response };
  }
}
