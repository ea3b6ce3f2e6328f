/**
 * Daemon Server
 *
 * Listens on a local socket, decodes framed requests from any number of
 * connections and funnels them through one execution queue into the
 * injection device.
 */

import { EventEmitter } from 'events';
import { createServer, type Server, type Socket } from 'net';
import { existsSync, unlinkSync } from 'fs';
import { DeviceError, ErrorCode, ProtocolError } from '../shared/errors/index.js';
import { createLogger } from '../shared/services/logging.service.js';
import {
  decodeRequest,
  encodeFrame,
  encodeResponse,
  errorResponse,
  FrameDecoder,
  type CommandResponse,
} from '../protocol/index.js';
import { ExecutionQueue } from './execution-queue.js';
import { CommandExecutor } from './command-executor.js';
import type { InputDevice } from './input-device.interface.js';
import type {
  CommandExecutorConfig,
  DaemonServerConfig,
  DaemonServerEvents,
} from './daemon.types.js';

const logger = createLogger('DaemonServer');

/**
 * Type-safe EventEmitter for DaemonServer
 */
interface DaemonServerEmitter {
  on<K extends keyof DaemonServerEvents>(
    event: K,
    listener: (data: DaemonServerEvents[K]) => void,
  ): this;
  once<K extends keyof DaemonServerEvents>(
    event: K,
    listener: (data: DaemonServerEvents[K]) => void,
  ): this;
  emit<K extends keyof DaemonServerEvents>(event: K, data: DaemonServerEvents[K]): boolean;
  off<K extends keyof DaemonServerEvents>(
    event: K,
    listener: (data: DaemonServerEvents[K]) => void,
  ): this;
}

/**
 * Map a decode failure to the response kind reported to the client
 */
function decodeFailureResponse(error: unknown): CommandResponse {
  if (error instanceof ProtocolError && error.code === ErrorCode.UNSUPPORTED_VERSION) {
    return errorResponse('unsupported-version');
  }
  return errorResponse('malformed');
}

/**
 * Manages the daemon's listening socket and connections.
 *
 * @example
 * ```typescript
 * const daemon = new DaemonServer(
 *   { socketPath: '/tmp/keyhints.socket', maxFrameBytes: 65536 },
 *   { scaleFactor: 1, writeStallMs: 5000, settleMs: 50, buttonPauseMs: 25, stepPauseMs: 10 },
 *   new YdotoolDevice(),
 * );
 *
 * daemon.on('fatal', ({ error }) => {
 *   console.error(error.message);
 *   process.exitCode = 1;
 * });
 *
 * await daemon.start();
 * // ...
 * await daemon.stop();
 * ```
 */
export class DaemonServer extends EventEmitter implements DaemonServerEmitter {
  private readonly config: DaemonServerConfig;
  private readonly device: InputDevice;
  private readonly executor: CommandExecutor;
  private readonly queue = new ExecutionQueue();
  private readonly connections = new Map<number, Socket>();
  /** Tail of each connection's frame chain */
  private readonly chains = new Map<number, Promise<void>>();

  private server: Server | null = null;
  private nextConnectionId = 1;
  private _isStopping = false;
  private deviceReleased = false;
  private fatalError: DeviceError | null = null;

  constructor(config: DaemonServerConfig, executorConfig: CommandExecutorConfig, device: InputDevice) {
    super();
    this.config = config;
    this.device = device;
    this.executor = new CommandExecutor(device, executorConfig);
  }

  get socketPath(): string {
    return this.config.socketPath;
  }

  get connectionCount(): number {
    return this.connections.size;
  }

  get isListening(): boolean {
    return this.server?.listening ?? false;
  }

  /**
   * Open the device and start listening.
   *
   * A device that cannot be opened is not fatal: requests are answered with
   * device-unavailable and the open is retried on each request.
   */
  async start(): Promise<void> {
    if (this.server) {
      return;
    }

    try {
      await this.device.open();
    } catch (error) {
      if (DeviceError.isDeviceError(error) && !error.isFatal) {
        logger.error('Input device could not be opened; serving with device unavailable', error);
      } else {
        throw error;
      }
    }

    if (existsSync(this.config.socketPath)) {
      logger.info('Removing stale socket', { socketPath: this.config.socketPath });
      unlinkSync(this.config.socketPath);
    }

    const server = createServer((socket) => this.accept(socket));
    this.server = server;

    await new Promise<void>((resolve, reject) => {
      const onError = (error: Error): void => {
        this.server = null;
        reject(error);
      };
      server.once('error', onError);
      server.listen(this.config.socketPath, () => {
        server.off('error', onError);
        resolve();
      });
    });

    server.on('error', (error) => {
      logger.error('Listener error', error);
    });

    logger.info('Daemon listening', { socketPath: this.config.socketPath });
    this.emit('listening', { socketPath: this.config.socketPath });
  }

  /**
   * Stop accepting connections and reading, let requests already received
   * finish, release the device and remove the socket.
   */
  async stop(): Promise<void> {
    if (this._isStopping) {
      return;
    }
    this._isStopping = true;

    const server = this.server;
    this.server = null;

    const closed = server
      ? new Promise<void>((resolve) => server.close(() => resolve()))
      : Promise.resolve();

    for (const socket of this.connections.values()) {
      socket.pause();
    }

    // Requests already received still run: button presses cannot be taken back
    if (!this.fatalError) {
      await Promise.all(this.chains.values());
      await this.queue.onIdle();
    }

    for (const socket of this.connections.values()) {
      socket.end();
      socket.destroy();
    }
    await closed;

    this.deviceReleased = true;
    await this.device.close();

    if (existsSync(this.config.socketPath)) {
      unlinkSync(this.config.socketPath);
    }

    logger.info('Daemon stopped', { socketPath: this.config.socketPath });
    this.emit('closed', { socketPath: this.config.socketPath });
  }

  private accept(socket: Socket): void {
    if (this._isStopping) {
      socket.destroy();
      return;
    }

    const connectionId = this.nextConnectionId++;
    const decoder = new FrameDecoder(this.config.maxFrameBytes);
    // Set once the byte stream can no longer be trusted
    let unreadable = false;

    this.connections.set(connectionId, socket);
    this.chains.set(connectionId, Promise.resolve());
    logger.debug('Connection accepted', { connectionId });

    socket.on('data', (chunk: Buffer) => {
      if (unreadable) {
        return;
      }

      let frames: Buffer[];
      try {
        frames = decoder.push(chunk);
      } catch (error) {
        // Oversized frame: the byte stream cannot be resynchronised
        unreadable = true;
        socket.pause();
        logger.warning('Closing connection after unreadable frame', {
          connectionId,
          error: error instanceof Error ? error.message : String(error),
        });
        this.appendToChain(connectionId, () => {
          this.respond(socket, connectionId, errorResponse('malformed'));
          socket.end(() => socket.destroy());
        });
        return;
      }

      for (const frame of frames) {
        this.appendToChain(connectionId, () => this.handleFrame(socket, connectionId, frame));
      }
    });

    socket.on('error', (error) => {
      logger.debug('Connection error', { connectionId, error: error.message });
    });

    socket.on('close', () => {
      this.connections.delete(connectionId);
      logger.debug('Connection closed', { connectionId });
      // Frames already received still run; forget the chain once they have
      const tail = this.chains.get(connectionId);
      void tail?.then(() => this.chains.delete(connectionId));
    });
  }

  /**
   * Frames of one connection are answered strictly in order
   */
  private appendToChain(connectionId: number, step: () => void | Promise<void>): void {
    const tail = this.chains.get(connectionId) ?? Promise.resolve();
    const next = tail.then(step).catch((error: unknown) => {
      logger.error(
        'Connection handler failed',
        error instanceof Error ? error : new Error(String(error)),
        { connectionId },
      );
    });
    this.chains.set(connectionId, next);
  }

  private async handleFrame(socket: Socket, connectionId: number, frame: Buffer): Promise<void> {
    if (this.fatalError) {
      socket.destroy();
      return;
    }
    if (this.deviceReleased) {
      this.respond(socket, connectionId, errorResponse('device-unavailable'));
      return;
    }

    let response: CommandResponse;
    try {
      const request = decodeRequest(frame);
      this.emit('request', { connectionId, type: request.type });
      response = await this.queue.enqueue(() => this.executeUnlessFatal(request));
    } catch (error) {
      if (DeviceError.isDeviceError(error) && error.isFatal) {
        this.onFatal(error);
        socket.destroy();
        return;
      }
      logger.warning('Rejected malformed request', {
        connectionId,
        error: error instanceof Error ? error.message : String(error),
      });
      response = decodeFailureResponse(error);
    }

    this.respond(socket, connectionId, response);
  }

  private executeUnlessFatal(request: Parameters<CommandExecutor['execute']>[0]): Promise<CommandResponse> {
    if (this.fatalError) {
      return Promise.reject(this.fatalError);
    }
    return this.executor.execute(request);
  }

  private respond(socket: Socket, connectionId: number, response: CommandResponse): void {
    this.emit('response', { connectionId, response });
    if (socket.destroyed || !socket.writable) {
      // Client left; the request has still been carried out
      logger.debug('Client gone before response', { connectionId });
      return;
    }
    socket.write(encodeFrame(encodeResponse(response)));
  }

  private onFatal(error: DeviceError): void {
    if (this.fatalError) {
      return;
    }
    this.fatalError = error;
    logger.critical('Input device failure is unrecoverable; shutting down', error);
    this.emit('fatal', { error });
  }
}
