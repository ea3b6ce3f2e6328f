/**
 * Keystroke Types
 */

/**
 * Named non-character keys understood by the matcher
 */
export type NamedKey =
  | 'Escape'
  | 'Enter'
  | 'Backspace'
  | 'Shift'
  | 'Alt'
  | 'Control'
  | 'ArrowUp'
  | 'ArrowDown'
  | 'ArrowLeft'
  | 'ArrowRight';

/**
 * One raw keystroke: the key plus the modifier flags held while it was pressed.
 *
 * `key` is either a single character or a NamedKey.
 */
export interface KeyEvent {
  key: string;
  shift?: boolean;
  alt?: boolean;
  ctrl?: boolean;
}

/**
 * Source of keystrokes for one hint session.
 *
 * `keys()` may be called once per session; each call yields a fresh,
 * lazily produced, unbounded sequence that ends when the source is closed.
 */
export interface KeystrokeSource {
  keys(): AsyncIterable<KeyEvent>;
  close(): void;
}
