/**
 * Input Device Interface
 *
 * Low-level pointer events and the contract of a kernel input-injection
 * device. The daemon owns exactly one device for its whole lifetime.
 */

import type { MouseButton } from '../shared/types/index.js';
import type { ButtonState } from '../protocol/index.js';

/**
 * One low-level injection event. Coordinates are device pixels (already scaled).
 * Wheel values follow evdev: positive dy scrolls up, positive dx scrolls right.
 */
export type InputEvent =
  | { type: 'move-absolute'; x: number; y: number }
  | { type: 'move-relative'; dx: number; dy: number }
  | { type: 'button'; button: MouseButton; state: ButtonState }
  | { type: 'wheel'; dx: number; dy: number };

export interface InputDevice {
  /** Human-readable device name for logs and errors */
  readonly name: string;

  readonly isOpen: boolean;

  /**
   * Acquire the device
   *
   * @throws DeviceError with DEVICE_UNAVAILABLE when it cannot be opened
   */
  open(): Promise<void>;

  /**
   * Write events in order; resolves once the device accepted all of them
   *
   * @throws DeviceError with DEVICE_UNAVAILABLE (recoverable) or DEVICE_LOST (fatal)
   */
  write(events: readonly InputEvent[]): Promise<void>;

  /**
   * Release the device; safe to call when not open
   */
  close(): Promise<void>;
}
