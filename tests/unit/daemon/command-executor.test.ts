/**
 * CommandExecutor Unit Tests
 */

import { describe, it, expect, beforeEach } from 'vitest';
import {
  CommandExecutor,
  checkBounds,
  planExecution,
} from '../../../src/daemon/command-executor.js';
import type { CommandExecutorConfig } from '../../../src/daemon/daemon.types.js';
import { DeviceError, ErrorCode, RangeCheckError } from '../../../src/shared/errors/index.js';
import { RecordingInputDevice } from '../../mocks/recording-input-device.mock.js';
import { catchAsyncError, catchError } from '../../helpers/test-utils.js';

const TIMED: CommandExecutorConfig = {
  scaleFactor: 1,
  writeStallMs: 1000,
  settleMs: 50,
  buttonPauseMs: 25,
  stepPauseMs: 10,
};

const INSTANT: CommandExecutorConfig = {
  ...TIMED,
  settleMs: 0,
  buttonPauseMs: 0,
  stepPauseMs: 0,
};

describe('planExecution', () => {
  it('should position, settle, then run each button transition', () => {
    const steps = planExecution(
      { type: 'click', x: 10, y: 20, button: 'left', buttonStates: ['down', 'up'], repeat: 1, absolute: true },
      TIMED
    );

    expect(steps).toEqual([
      { events: [{ type: 'move-absolute', x: 10, y: 20 }], pauseAfterMs: 50 },
      { events: [{ type: 'button', button: 'left', state: 'down' }], pauseAfterMs: 25 },
      { events: [{ type: 'button', button: 'left', state: 'up' }], pauseAfterMs: 0 },
    ]);
  });

  it('should skip positioning for an in-place relative click', () => {
    const steps = planExecution(
      { type: 'click', x: 0, y: 0, button: 'right', buttonStates: ['up'], repeat: 1, absolute: false },
      TIMED
    );

    expect(steps).toEqual([{ events: [{ type: 'button', button: 'right', state: 'up' }], pauseAfterMs: 0 }]);
  });

  it('should offset a relative click before the buttons', () => {
    const steps = planExecution(
      { type: 'click', x: 5, y: -3, button: 'left', buttonStates: ['down'], repeat: 1, absolute: false },
      TIMED
    );

    expect(steps[0]).toEqual({ events: [{ type: 'move-relative', dx: 5, dy: -3 }], pauseAfterMs: 50 });
  });

  it('should repeat relative moves per step', () => {
    const steps = planExecution({ type: 'move', dx: 10, dy: 0, steps: 3 }, TIMED);

    expect(steps.map((step) => step.pauseAfterMs)).toEqual([10, 10, 0]);
    expect(steps.every((step) => step.events[0].type === 'move-relative')).toBe(true);
  });

  it('should emit one wheel notch per scroll step', () => {
    expect(planExecution({ type: 'scroll', direction: 'up', steps: 2 }, TIMED)).toEqual([
      { events: [{ type: 'wheel', dx: 0, dy: 1 }], pauseAfterMs: 10 },
      { events: [{ type: 'wheel', dx: 0, dy: 1 }], pauseAfterMs: 0 },
    ]);
    expect(planExecution({ type: 'scroll', direction: 'left', steps: 1 }, TIMED)).toEqual([
      { events: [{ type: 'wheel', dx: -1, dy: 0 }], pauseAfterMs: 0 },
    ]);
  });

  it('should apply the scale factor to coordinates', () => {
    expect(planExecution({ type: 'move-to', x: 10, y: 20 }, { ...TIMED, scaleFactor: 2 })).toEqual([
      { events: [{ type: 'move-absolute', x: 20, y: 40 }], pauseAfterMs: 0 },
    ]);
  });

  it('should round scaled coordinates to whole device pixels', () => {
    const config = { ...TIMED, scaleFactor: 1.5 };

    expect(planExecution({ type: 'move-to', x: 101, y: 7 }, config)).toEqual([
      { events: [{ type: 'move-absolute', x: 152, y: 11 }], pauseAfterMs: 0 },
    ]);
    expect(planExecution({ type: 'move', dx: -3, dy: 5, steps: 1 }, config)).toEqual([
      { events: [{ type: 'move-relative', dx: -4, dy: 8 }], pauseAfterMs: 0 },
    ]);
  });
});

describe('checkBounds', () => {
  const bounded: CommandExecutorConfig = { ...TIMED, screen: { width: 100, height: 50 } };

  it('should accept targets inside the display', () => {
    expect(() => checkBounds({ type: 'move-to', x: 99, y: 49 }, bounded)).not.toThrow();
  });

  it('should reject targets on or past the edge', () => {
    const error = catchError(() => checkBounds({ type: 'move-to', x: 100, y: 10 }, bounded));
    expect(error).toBeInstanceOf(RangeCheckError);
    expect(() => checkBounds({ type: 'move-to', x: -1, y: 10 }, bounded)).toThrow(RangeCheckError);
  });

  it('should skip relative requests', () => {
    expect(() => checkBounds({ type: 'move', dx: 5000, dy: 0, steps: 1 }, bounded)).not.toThrow();
  });

  it('should skip checks without known bounds', () => {
    expect(() => checkBounds({ type: 'move-to', x: 5000, y: 5000 }, TIMED)).not.toThrow();
  });
});

describe('CommandExecutor', () => {
  let device: RecordingInputDevice;
  let executor: CommandExecutor;

  beforeEach(() => {
    device = new RecordingInputDevice();
    executor = new CommandExecutor(device, INSTANT);
  });

  it('should write events in request order', async () => {
    const response = await executor.execute({
      type: 'click',
      x: 120,
      y: 210,
      button: 'left',
      buttonStates: ['down', 'up', 'down', 'up'],
      repeat: 2,
      absolute: true,
    });

    expect(response).toEqual({ outcome: 'ok' });
    expect(device.events).toEqual([
      { type: 'move-absolute', x: 120, y: 210 },
      { type: 'button', button: 'left', state: 'down' },
      { type: 'button', button: 'left', state: 'up' },
      { type: 'button', button: 'left', state: 'down' },
      { type: 'button', button: 'left', state: 'up' },
    ]);
  });

  it('should open the device on first use', async () => {
    await executor.execute({ type: 'move-to', x: 1, y: 1 });
    await executor.execute({ type: 'move-to', x: 2, y: 2 });

    expect(device.openCalls).toBe(1);
  });

  it('should answer device-unavailable and retry the open on the next request', async () => {
    device = new RecordingInputDevice({ openFailures: 1 });
    executor = new CommandExecutor(device, INSTANT);

    expect(await executor.execute({ type: 'move-to', x: 1, y: 1 })).toEqual({
      outcome: 'error',
      kind: 'device-unavailable',
    });
    expect(await executor.execute({ type: 'move-to', x: 1, y: 1 })).toEqual({ outcome: 'ok' });
    expect(device.openCalls).toBe(2);
    expect(device.events).toEqual([{ type: 'move-absolute', x: 1, y: 1 }]);
  });

  it('should answer out-of-range without touching the device', async () => {
    executor = new CommandExecutor(device, { ...INSTANT, screen: { width: 100, height: 100 } });

    expect(await executor.execute({ type: 'move-to', x: 150, y: 5 })).toEqual({
      outcome: 'error',
      kind: 'out-of-range',
    });
    expect(device.events).toEqual([]);
    expect(device.openCalls).toBe(0);
  });

  it('should answer device-unavailable when a write fails recoverably', async () => {
    device.writeMode = 'unavailable';

    expect(await executor.execute({ type: 'scroll', direction: 'down', steps: 1 })).toEqual({
      outcome: 'error',
      kind: 'device-unavailable',
    });
  });

  it('should throw when the device is lost', async () => {
    device.writeMode = 'lost';

    const error = await catchAsyncError(() => executor.execute({ type: 'move-to', x: 1, y: 1 }));
    expect(DeviceError.isDeviceError(error)).toBe(true);
    if (DeviceError.isDeviceError(error)) {
      expect(error.code).toBe(ErrorCode.DEVICE_LOST);
      expect(error.isFatal).toBe(true);
    }
  });

  it('should throw when a write stalls', async () => {
    device.writeMode = 'hang';
    executor = new CommandExecutor(device, { ...INSTANT, writeStallMs: 20 });

    const error = await catchAsyncError(() => executor.execute({ type: 'move-to', x: 1, y: 1 }));
    expect(DeviceError.isDeviceError(error)).toBe(true);
    if (DeviceError.isDeviceError(error)) {
      expect(error.code).toBe(ErrorCode.DEVICE_STALLED);
    }
  });
});
