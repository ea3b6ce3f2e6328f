/**
 * Terminal Keystroke Source
 *
 * Reads raw-mode terminal input and turns the byte stream into key events.
 * A terminal cannot report a bare modifier press, so Shift is inferred from
 * uppercase letters, Alt from an ESC prefix and Ctrl from control codes.
 */

import type { Readable } from 'stream';
import type { KeyEvent, KeystrokeSource } from './keys.types.js';

const ESC = '\x1b';

const CSI_KEYS: Readonly<Record<string, string>> = {
  A: 'ArrowUp',
  B: 'ArrowDown',
  C: 'ArrowRight',
  D: 'ArrowLeft',
};

/**
 * Split one chunk of terminal input into key events
 */
export function parseTerminalInput(chunk: string): KeyEvent[] {
  const events: KeyEvent[] = [];
  let i = 0;

  while (i < chunk.length) {
    const ch = chunk[i];

    if (ch === ESC) {
      const next = chunk[i + 1];
      if (next === undefined) {
        events.push({ key: 'Escape' });
        i += 1;
      } else if ((next === '[' || next === 'O') && CSI_KEYS[chunk[i + 2] ?? '']) {
        events.push({ key: CSI_KEYS[chunk[i + 2]] });
        i += 3;
      } else if (next === ESC) {
        events.push({ key: 'Escape' });
        i += 1;
      } else {
        events.push({ ...keyFor(next), alt: true });
        i += 2;
      }
      continue;
    }

    events.push(keyFor(ch));
    i += 1;
  }

  return events;
}

function keyFor(ch: string): KeyEvent {
  const code = ch.charCodeAt(0);

  if (ch === '\r' || ch === '\n') return { key: 'Enter' };
  if (code === 0x7f || code === 0x08) return { key: 'Backspace' };
  // Ctrl-C aborts like Escape
  if (code === 0x03) return { key: 'Escape' };
  if (code >= 0x01 && code <= 0x1a) {
    return { key: String.fromCharCode(code + 0x60), ctrl: true };
  }

  return { key: ch };
}

/**
 * Terminal input stream with the subset of tty.ReadStream the source needs
 */
export type TerminalInput = Readable & {
  isTTY?: boolean;
  setRawMode?: (mode: boolean) => unknown;
};

/**
 * Keystrokes from a terminal (normally process.stdin)
 */
export class TerminalKeystrokeSource implements KeystrokeSource {
  private closed = false;
  private wake: (() => void) | null = null;
  private readonly queue: KeyEvent[] = [];
  private readonly onData = (data: Buffer | string): void => {
    this.queue.push(...parseTerminalInput(typeof data === 'string' ? data : data.toString('utf8')));
    this.notify();
  };
  private readonly onEnd = (): void => {
    this.close();
  };

  constructor(private readonly input: TerminalInput) {}

  async *keys(): AsyncIterable<KeyEvent> {
    this.attach();
    try {
      while (!this.closed) {
        const event = this.queue.shift();
        if (event) {
          yield event;
          continue;
        }
        await new Promise<void>((resolve) => {
          this.wake = resolve;
        });
      }
    } finally {
      this.detach();
    }
  }

  close(): void {
    if (this.closed) {
      return;
    }
    this.closed = true;
    this.detach();
    this.notify();
  }

  private attach(): void {
    if (this.input.isTTY && this.input.setRawMode) {
      this.input.setRawMode(true);
    }
    this.input.on('data', this.onData);
    this.input.on('end', this.onEnd);
    this.input.resume();
  }

  private detach(): void {
    this.input.off('data', this.onData);
    this.input.off('end', this.onEnd);
    if (this.input.isTTY && this.input.setRawMode) {
      this.input.setRawMode(false);
    }
    this.input.pause();
  }

  private notify(): void {
    const wake = this.wake;
    this.wake = null;
    wake?.();
  }
}
