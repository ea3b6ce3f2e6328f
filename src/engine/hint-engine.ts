/**
 * Hint Engine
 *
 * Drives one hint session at a time: scan, label, feed keystrokes, dispatch
 * every committed action. Starting a new session discards the previous one.
 */

import { EventEmitter } from 'events';
import { createLogger } from '../shared/services/logging.service.js';
import { HintSession, labelElements, type SessionStep } from '../hints/index.js';
import type { ActionDispatcher, DispatchOutcome } from '../dispatch/index.js';
import type { ElementScanner } from '../scanning/index.js';
import type { KeyEvent, KeystrokeSource } from '../keys/index.js';
import type { HintEngineConfig, HintEngineEvents, SessionSummary } from './engine.types.js';

const logger = createLogger('HintEngine');

/**
 * Type-safe EventEmitter for HintEngine
 */
interface HintEngineEmitter {
  on<K extends keyof HintEngineEvents>(event: K, listener: (data: HintEngineEvents[K]) => void): this;
  once<K extends keyof HintEngineEvents>(event: K, listener: (data: HintEngineEvents[K]) => void): this;
  emit<K extends keyof HintEngineEvents>(event: K, data: HintEngineEvents[K]): boolean;
  off<K extends keyof HintEngineEvents>(event: K, listener: (data: HintEngineEvents[K]) => void): this;
}

/**
 * @example
 * ```typescript
 * const engine = new HintEngine(scanner, dispatcher, { allocator: { alphabet: 'asdf' } });
 * engine.on('session-started', ({ labels }) => showLabels(labels));
 * const summary = await engine.run(new TerminalKeystrokeSource(process.stdin));
 * ```
 */
export class HintEngine extends EventEmitter implements HintEngineEmitter {
  private session: HintSession | null = null;
  private outcomes: DispatchOutcome[] = [];

  constructor(
    private readonly scanner: ElementScanner,
    private readonly dispatcher: ActionDispatcher,
    private readonly config: HintEngineConfig
  ) {
    super();
  }

  get activeSession(): HintSession | null {
    return this.session;
  }

  /**
   * Scan and label a fresh session
   *
   * @throws ScanError when scanning fails
   */
  async startSession(): Promise<HintSession> {
    if (this.session?.openDrag) {
      logger.warning('New session started while a drag is held');
    }
    this.session = null;
    this.outcomes = [];

    const elements = await this.scanner.scan();
    const { labels, truncated } = labelElements(
      elements,
      this.config.allocator,
      this.config.origin ?? { x: 0, y: 0 }
    );
    if (truncated > 0) {
      logger.info('Dropped elements that did not fit the label space', {
        scanned: elements.length,
        truncated,
      });
    }

    const session = new HintSession(labels, this.config.session);
    this.session = session;
    this.emit('session-started', { labels: session.labels, truncated });
    return session;
  }

  /**
   * Feed one keystroke to the active session, dispatching whatever it commits
   *
   * @throws TransportError when a committed action cannot reach the daemon
   */
  async handleKey(event: KeyEvent): Promise<SessionStep> {
    const session = this.session;
    if (!session) {
      return { kind: 'ignored' };
    }

    const step = session.handleKey(event);

    switch (step.kind) {
      case 'rejected':
        logger.debug('Key rejected', { key: event.key, reason: step.reason });
        this.emit('key-rejected', { key: event.key, reason: step.reason });
        break;
      case 'action':
        try {
          await this.send(step.action);
        } catch (error) {
          this.end(session);
          throw error;
        }
        if (step.done) {
          this.end(session);
        }
        break;
      case 'cancelled':
        try {
          if (step.release) {
            await this.send(step.release);
          }
        } finally {
          this.end(session);
        }
        break;
      case 'pending':
      case 'ignored':
        break;
    }

    return step;
  }

  /**
   * Run a whole session against a keystroke source
   */
  async run(source: KeystrokeSource): Promise<SessionSummary> {
    const session = await this.startSession();
    if (session.isEmpty) {
      return this.end(session);
    }

    for await (const event of source.keys()) {
      await this.handleKey(event);
      if (session.status !== 'active') {
        break;
      }
    }

    // A source that runs dry cancels the session, letting go of any held drag
    if (session.status === 'active') {
      await this.handleKey({ key: 'Escape' });
    }
    return {
      status: session.status === 'committed' ? 'committed' : 'cancelled',
      outcomes: [...this.outcomes],
    };
  }

  private async send(action: Parameters<ActionDispatcher['dispatch']>[0]): Promise<void> {
    const outcome = await this.dispatcher.dispatch(action);
    this.outcomes.push(outcome);
    this.emit('action-dispatched', { outcome });
  }

  private end(session: HintSession): SessionSummary {
    const status = session.status === 'committed' ? 'committed' : 'cancelled';
    const summary: SessionSummary = { status, outcomes: [...this.outcomes] };
    if (this.session === session) {
      this.session = null;
      this.emit('session-ended', summary);
    }
    return summary;
  }
}
