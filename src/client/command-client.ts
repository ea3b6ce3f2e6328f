/**
 * Command Client
 *
 * UI-side end of the command protocol. Keeps one connection to the daemon
 * and performs strict request-then-response exchanges over it.
 */

import { createConnection, type Socket } from 'net';
import { existsSync } from 'fs';
import { TransportError, ErrorCode, ProtocolError } from '../shared/errors/index.js';
import { createLogger } from '../shared/services/logging.service.js';
import {
  decodeResponse,
  encodeFrame,
  encodeRequest,
  FrameDecoder,
  type CommandRequest,
  type CommandResponse,
} from '../protocol/index.js';

const logger = createLogger('CommandClient');

/**
 * Anything that can carry a command request to the daemon
 */
export interface CommandTransport {
  send(request: CommandRequest): Promise<CommandResponse>;
  close(): Promise<void>;
}

export interface CommandClientConfig {
  socketPath: string;
  maxFrameBytes?: number;
}

interface PendingExchange {
  resolve: (response: CommandResponse) => void;
  reject: (error: Error) => void;
}

/**
 * Map a socket error to a TransportError with an actionable message
 */
export function toTransportError(error: NodeJS.ErrnoException, socketPath: string): TransportError {
  switch (error.code) {
    case 'ENOENT':
      return new TransportError(
        `Daemon socket not found at ${socketPath}. Start keyhintsd first.`,
        ErrorCode.SOCKET_NOT_FOUND,
        { socketPath },
        error,
      );
    case 'ECONNREFUSED':
      return new TransportError(
        `Daemon at ${socketPath} refused the connection. Is keyhintsd running?`,
        ErrorCode.CONNECTION_REFUSED,
        { socketPath },
        error,
      );
    default:
      return new TransportError(
        `Connection to daemon at ${socketPath} failed: ${error.message}`,
        ErrorCode.CONNECTION_CLOSED,
        { socketPath, errno: error.code },
        error,
      );
  }
}

/**
 * Fail fast when the daemon's socket does not exist
 *
 * @throws TransportError with SOCKET_NOT_FOUND
 */
export function ensureDaemonRunning(socketPath: string): void {
  if (!existsSync(socketPath)) {
    throw new TransportError(
      `Daemon socket not found at ${socketPath}. Start keyhintsd first.`,
      ErrorCode.SOCKET_NOT_FOUND,
      { socketPath },
    );
  }
}

/**
 * Client for the execution daemon.
 *
 * @example
 * ```typescript
 * const client = new CommandClient({ socketPath: '/tmp/keyhints.socket' });
 * const response = await client.send({ type: 'move-to', x: 100, y: 200 });
 * await client.close();
 * ```
 */
export class CommandClient implements CommandTransport {
  private readonly socketPath: string;
  private readonly maxFrameBytes?: number;

  private socket: Socket | null = null;
  private decoder: FrameDecoder | null = null;
  private pending: PendingExchange | null = null;
  /** Serializes exchanges: one request in flight per connection */
  private tail: Promise<unknown> = Promise.resolve();

  constructor(config: CommandClientConfig) {
    this.socketPath = config.socketPath;
    this.maxFrameBytes = config.maxFrameBytes;
  }

  get isConnected(): boolean {
    return this.socket !== null;
  }

  /**
   * Send one request and wait for its response.
   *
   * Never retries: a transport failure is reported to the caller.
   *
   * @throws TransportError when the daemon cannot be reached or the connection drops
   */
  send(request: CommandRequest): Promise<CommandResponse> {
    const exchange = this.tail.then(() => this.exchange(encodeRequest(request), request.type));
    this.tail = exchange.catch(() => undefined);
    return exchange;
  }

  async close(): Promise<void> {
    const socket = this.socket;
    if (!socket) {
      return;
    }
    this.socket = null;
    if (socket.destroyed) {
      return;
    }
    await new Promise<void>((resolve) => {
      socket.once('close', () => resolve());
      socket.end();
    });
  }

  private async exchange(payload: Buffer, type: CommandRequest['type']): Promise<CommandResponse> {
    const socket = await this.connect();

    return new Promise<CommandResponse>((resolve, reject) => {
      this.pending = { resolve, reject };
      logger.debug('Sending request', { type, bytes: payload.length });
      socket.write(encodeFrame(payload));
    });
  }

  private connect(): Promise<Socket> {
    if (this.socket) {
      return Promise.resolve(this.socket);
    }

    return new Promise<Socket>((resolve, reject) => {
      const socket = createConnection({ path: this.socketPath });

      const onConnectError = (error: NodeJS.ErrnoException): void => {
        reject(toTransportError(error, this.socketPath));
      };

      socket.once('error', onConnectError);
      socket.once('connect', () => {
        socket.off('error', onConnectError);
        this.attach(socket);
        logger.debug('Connected to daemon', { socketPath: this.socketPath });
        resolve(socket);
      });
    });
  }

  private attach(socket: Socket): void {
    this.socket = socket;
    this.decoder = new FrameDecoder(this.maxFrameBytes);

    socket.on('data', (chunk: Buffer) => this.onData(chunk));
    socket.on('error', (error: NodeJS.ErrnoException) => {
      this.fail(toTransportError(error, this.socketPath));
    });
    socket.on('close', () => {
      if (this.socket === socket) {
        this.socket = null;
      }
      this.fail(
        new TransportError('Daemon closed the connection', ErrorCode.CONNECTION_CLOSED, {
          socketPath: this.socketPath,
        }),
      );
    });
  }

  private onData(chunk: Buffer): void {
    if (!this.decoder) {
      return;
    }

    let frames: Buffer[];
    try {
      frames = this.decoder.push(chunk);
    } catch (error) {
      this.fail(error instanceof Error ? error : new Error(String(error)));
      this.socket?.destroy();
      return;
    }

    for (const frame of frames) {
      const pending = this.pending;
      if (!pending) {
        logger.warning('Dropping unsolicited response frame', { bytes: frame.length });
        continue;
      }
      this.pending = null;
      try {
        pending.resolve(decodeResponse(frame));
      } catch (error) {
        pending.reject(
          error instanceof ProtocolError ? error : new ProtocolError(String(error), ErrorCode.MALFORMED_FRAME),
        );
      }
    }
  }

  private fail(error: Error): void {
    const pending = this.pending;
    this.pending = null;
    pending?.reject(error);
  }
}
