/**
 * DaemonServer Unit Tests
 *
 * Runs the server on a real Unix socket in the OS temp directory against a
 * recording device.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { existsSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { DaemonServer } from '../../../src/daemon/daemon-server.js';
import type { CommandExecutorConfig } from '../../../src/daemon/daemon.types.js';
import { CommandClient } from '../../../src/client/command-client.js';
import { encodeRequest } from '../../../src/protocol/codec.js';
import type { ClickRequest } from '../../../src/protocol/protocol.types.js';
import type { DeviceError } from '../../../src/shared/errors/index.js';
import { ErrorCode, TransportError } from '../../../src/shared/errors/index.js';
import { RecordingInputDevice } from '../../mocks/recording-input-device.mock.js';
import { connectRaw } from '../../helpers/raw-socket.js';
import { catchAsyncError, tempSocketPath } from '../../helpers/test-utils.js';

const EXECUTOR_CONFIG: CommandExecutorConfig = {
  scaleFactor: 1,
  writeStallMs: 1000,
  settleMs: 0,
  buttonPauseMs: 0,
  stepPauseMs: 0,
};

describe('DaemonServer', () => {
  let socketPath: string;
  let device: RecordingInputDevice;
  let server: DaemonServer;
  let clients: CommandClient[];

  function createServer(options: { maxFrameBytes?: number } = {}): DaemonServer {
    return new DaemonServer(
      { socketPath, maxFrameBytes: options.maxFrameBytes ?? 65536 },
      EXECUTOR_CONFIG,
      device
    );
  }

  function createClient(): CommandClient {
    const client = new CommandClient({ socketPath });
    clients.push(client);
    return client;
  }

  beforeEach(() => {
    socketPath = tempSocketPath(tmpdir(), 'daemon');
    device = new RecordingInputDevice();
    clients = [];
    server = createServer();
  });

  afterEach(async () => {
    await Promise.all(clients.map((client) => client.close()));
    await server.stop();
  });

  describe('lifecycle', () => {
    it('should create the socket on start and remove it on stop', async () => {
      const listening: string[] = [];
      server.on('listening', ({ socketPath: path }) => listening.push(path));

      await server.start();
      expect(existsSync(socketPath)).toBe(true);
      expect(server.isListening).toBe(true);
      expect(listening).toEqual([socketPath]);
      expect(device.openCalls).toBe(1);

      await server.stop();
      expect(existsSync(socketPath)).toBe(false);
      expect(device.closeCalls).toBe(1);
    });

    it('should replace a stale socket file', async () => {
      writeFileSync(socketPath, '');

      await server.start();
      const response = await createClient().send({ type: 'move-to', x: 1, y: 1 });

      expect(response).toEqual({ outcome: 'ok' });
    });

    it('should keep serving when the device cannot be opened', async () => {
      device = new RecordingInputDevice({ openFailures: 2 });
      server = createServer();
      await server.start();
      const client = createClient();

      expect(await client.send({ type: 'move-to', x: 1, y: 1 })).toEqual({
        outcome: 'error',
        kind: 'device-unavailable',
      });
      expect(await client.send({ type: 'move-to', x: 1, y: 1 })).toEqual({ outcome: 'ok' });
    });
  });

  describe('requests', () => {
    beforeEach(async () => {
      await server.start();
    });

    it('should execute a request and answer Ok', async () => {
      const response = await createClient().send({
        type: 'click',
        x: 50,
        y: 60,
        button: 'left',
        buttonStates: ['down', 'up'],
        repeat: 1,
        absolute: true,
      });

      expect(response).toEqual({ outcome: 'ok' });
      expect(device.events).toEqual([
        { type: 'move-absolute', x: 50, y: 60 },
        { type: 'button', button: 'left', state: 'down' },
        { type: 'button', button: 'left', state: 'up' },
      ]);
    });

    it('should answer Malformed and keep the connection open', async () => {
      const connection = await connectRaw(socketPath);

      connection.sendPayload(Buffer.from([0x01, 0x09]));
      expect(await connection.nextResponse()).toEqual({ outcome: 'error', kind: 'malformed' });

      connection.sendPayload(encodeRequest({ type: 'move-to', x: 3, y: 4 }));
      expect(await connection.nextResponse()).toEqual({ outcome: 'ok' });
      expect(device.events).toEqual([{ type: 'move-absolute', x: 3, y: 4 }]);

      connection.end();
    });

    it('should keep a malformed request on one connection from affecting another', async () => {
      const first = await connectRaw(socketPath);
      const second = await connectRaw(socketPath);

      first.sendPayload(Buffer.from([0x01, 0x09]));
      second.sendPayload(encodeRequest({ type: 'move-to', x: 7, y: 8 }));

      expect(await first.nextResponse()).toEqual({ outcome: 'error', kind: 'malformed' });
      expect(await second.nextResponse()).toEqual({ outcome: 'ok' });
      expect(device.events).toEqual([{ type: 'move-absolute', x: 7, y: 8 }]);

      first.end();
      second.end();
    });

    it('should answer UnsupportedVersion for another protocol version', async () => {
      const connection = await connectRaw(socketPath);

      connection.sendPayload(Buffer.from([0x02, 0x03, 0, 0, 0, 0, 0, 0, 0, 0]));
      expect(await connection.nextResponse()).toEqual({ outcome: 'error', kind: 'unsupported-version' });

      connection.end();
    });

    it('should answer responses in request order on one connection', async () => {
      const connection = await connectRaw(socketPath);

      connection.sendPayload(encodeRequest({ type: 'move-to', x: 1, y: 1 }));
      connection.sendPayload(Buffer.from([0x01]));
      connection.sendPayload(encodeRequest({ type: 'move-to', x: 2, y: 2 }));

      expect(await connection.nextResponse()).toEqual({ outcome: 'ok' });
      expect(await connection.nextResponse()).toEqual({ outcome: 'error', kind: 'malformed' });
      expect(await connection.nextResponse()).toEqual({ outcome: 'ok' });

      connection.end();
    });

    it('should emit request and response events', async () => {
      const types: string[] = [];
      server.on('request', ({ type }) => types.push(type));
      const responses: string[] = [];
      server.on('response', ({ response }) => responses.push(response.outcome));

      await createClient().send({ type: 'scroll', direction: 'up', steps: 1 });

      expect(types).toEqual(['scroll']);
      expect(responses).toEqual(['ok']);
    });
  });

  it('should answer Malformed and close the connection for an oversized frame', async () => {
    server = createServer({ maxFrameBytes: 16 });
    await server.start();
    const connection = await connectRaw(socketPath);

    const header = Buffer.alloc(4);
    header.writeUInt32LE(1000, 0);
    connection.write(header);

    expect(await connection.nextResponse()).toEqual({ outcome: 'error', kind: 'malformed' });
    await connection.closed;
    expect(device.events).toEqual([]);
  });

  it('should not execute anything sent after an oversized frame header', async () => {
    server = createServer({ maxFrameBytes: 16 });
    await server.start();
    const connection = await connectRaw(socketPath);

    const header = Buffer.alloc(4);
    header.writeUInt32LE(1000, 0);
    connection.write(header);
    expect(await connection.nextResponse()).toEqual({ outcome: 'error', kind: 'malformed' });

    connection.sendPayload(encodeRequest({ type: 'move-to', x: 666, y: 666 }));
    await connection.closed;

    expect(await createClient().send({ type: 'move-to', x: 1, y: 1 })).toEqual({ outcome: 'ok' });
    expect(device.events).toEqual([{ type: 'move-absolute', x: 1, y: 1 }]);
  });

  it('should finish received requests on stop and ignore later frames', async () => {
    device = new RecordingInputDevice({ writeDelayMs: 20 });
    server = createServer();
    await server.start();
    const connection = await connectRaw(socketPath);

    const requested = new Promise<void>((resolve) => {
      server.once('request', () => resolve());
    });
    connection.sendPayload(encodeRequest({ type: 'move-to', x: 1, y: 1 }));
    await requested;

    const stopping = server.stop();
    connection.sendPayload(encodeRequest({ type: 'move-to', x: 2, y: 2 }));

    expect(await connection.nextResponse()).toEqual({ outcome: 'ok' });
    await stopping;

    expect(device.events).toEqual([{ type: 'move-absolute', x: 1, y: 1 }]);
    expect(device.openCalls).toBe(1);
    expect(device.closeCalls).toBe(1);
  });

  it('should never interleave requests from different connections', async () => {
    device = new RecordingInputDevice({ writeDelayMs: 5 });
    server = createServer();
    await server.start();

    const click = (x: number): ClickRequest => ({
      type: 'click',
      x,
      y: x,
      button: 'left',
      buttonStates: ['down', 'up'],
      repeat: 1,
      absolute: true,
    });

    const responses = await Promise.all([
      createClient().send(click(1)),
      createClient().send(click(2)),
      createClient().send(click(3)),
    ]);

    expect(responses).toEqual([{ outcome: 'ok' }, { outcome: 'ok' }, { outcome: 'ok' }]);
    expect(device.events).toHaveLength(9);
    for (let group = 0; group < 3; group++) {
      const [move, down, up] = device.events.slice(group * 3, group * 3 + 3);
      expect(move.type).toBe('move-absolute');
      expect(down).toEqual({ type: 'button', button: 'left', state: 'down' });
      expect(up).toEqual({ type: 'button', button: 'left', state: 'up' });
    }
  });

  it('should stop serving after a fatal device failure', async () => {
    device.writeMode = 'lost';
    await server.start();

    const fatal = new Promise<DeviceError>((resolve) => {
      server.once('fatal', ({ error }) => resolve(error));
    });

    const error = await catchAsyncError(() => createClient().send({ type: 'move-to', x: 1, y: 1 }));

    expect((await fatal).code).toBe(ErrorCode.DEVICE_LOST);
    expect(error).toBeInstanceOf(TransportError);
    if (error instanceof TransportError) {
      expect(error.code).toBe(ErrorCode.CONNECTION_CLOSED);
    }
  });
});
