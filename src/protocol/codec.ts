/**
 * Binary Codec
 *
 * Versioned little-endian encoding of command requests and responses.
 *
 * Request payload:  [version u8][tag u8][body]
 *   0 click   x i32, y i32, button u8, n u32, n x state u8, repeat u32, absolute u8
 *   1 move    dx i32, dy i32, steps u32
 *   2 scroll  direction u8, steps u32
 *   3 move-to x i32, y i32
 *
 * Response payload: [version u8][0 = ok | 1 = error][kind u8 when error]
 */

import { ProtocolError, ErrorCode } from '../shared/errors/index.js';
import type { Direction, MouseButton } from '../shared/types/index.js';
import {
  PROTOCOL_VERSION,
  type ButtonState,
  type CommandErrorKind,
  type CommandRequest,
  type CommandResponse,
} from './protocol.types.js';
import { CommandRequestSchema } from './protocol.schemas.js';

const REQUEST_TAGS = ['click', 'move', 'scroll', 'move-to'] as const;
const BUTTONS: readonly MouseButton[] = ['left', 'right', 'middle'];
const BUTTON_STATES: readonly ButtonState[] = ['down', 'up'];
const DIRECTIONS: readonly Direction[] = ['up', 'down', 'left', 'right'];
const ERROR_KINDS: readonly CommandErrorKind[] = [
  'malformed',
  'device-unavailable',
  'out-of-range',
  'unsupported-version',
];

/**
 * Cursor over a payload; every read is bounds-checked
 */
class PayloadReader {
  private offset = 0;

  constructor(private readonly buffer: Buffer) {}

  private ensure(bytes: number, field: string): void {
    if (this.offset + bytes > this.buffer.length) {
      throw new ProtocolError(`Payload truncated while reading ${field}`, ErrorCode.MALFORMED_FRAME, {
        offset: this.offset,
        length: this.buffer.length,
      });
    }
  }

  u8(field: string): number {
    this.ensure(1, field);
    const value = this.buffer.readUInt8(this.offset);
    this.offset += 1;
    return value;
  }

  u32(field: string): number {
    this.ensure(4, field);
    const value = this.buffer.readUInt32LE(this.offset);
    this.offset += 4;
    return value;
  }

  i32(field: string): number {
    this.ensure(4, field);
    const value = this.buffer.readInt32LE(this.offset);
    this.offset += 4;
    return value;
  }

  /**
   * Look up an enum value by its wire index
   */
  oneOf<T>(values: readonly T[], field: string): T {
    const index = this.u8(field);
    if (index >= values.length) {
      throw new ProtocolError(`Invalid ${field} value ${index}`, ErrorCode.MALFORMED_FRAME, {
        field,
        value: index,
      });
    }
    return values[index];
  }

  get remaining(): number {
    return this.buffer.length - this.offset;
  }

  finish(): void {
    if (this.remaining !== 0) {
      throw new ProtocolError(`Payload has ${this.remaining} trailing bytes`, ErrorCode.MALFORMED_FRAME, {
        trailing: this.remaining,
      });
    }
  }
}

/**
 * Growable payload builder
 */
class PayloadWriter {
  private readonly chunks: Buffer[] = [];

  u8(value: number): this {
    const chunk = Buffer.alloc(1);
    chunk.writeUInt8(value, 0);
    this.chunks.push(chunk);
    return this;
  }

  u32(value: number): this {
    const chunk = Buffer.alloc(4);
    chunk.writeUInt32LE(value, 0);
    this.chunks.push(chunk);
    return this;
  }

  i32(value: number): this {
    const chunk = Buffer.alloc(4);
    chunk.writeInt32LE(value, 0);
    this.chunks.push(chunk);
    return this;
  }

  toBuffer(): Buffer {
    return Buffer.concat(this.chunks);
  }
}

/**
 * Validate a request's semantic constraints
 *
 * @throws ProtocolError with MALFORMED_FRAME listing the failing fields
 */
export function validateRequest(request: unknown): CommandRequest {
  const parsed = CommandRequestSchema.safeParse(request);
  if (!parsed.success) {
    throw new ProtocolError('Request failed validation', ErrorCode.MALFORMED_FRAME, {
      issues: parsed.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`),
    });
  }
  return parsed.data;
}

export function encodeRequest(request: CommandRequest): Buffer {
  const valid = validateRequest(request);
  const writer = new PayloadWriter().u8(PROTOCOL_VERSION).u8(REQUEST_TAGS.indexOf(valid.type));

  switch (valid.type) {
    case 'click':
      writer.i32(valid.x).i32(valid.y).u8(BUTTONS.indexOf(valid.button)).u32(valid.buttonStates.length);
      for (const state of valid.buttonStates) {
        writer.u8(BUTTON_STATES.indexOf(state));
      }
      writer.u32(valid.repeat).u8(valid.absolute ? 1 : 0);
      break;
    case 'move':
      writer.i32(valid.dx).i32(valid.dy).u32(valid.steps);
      break;
    case 'scroll':
      writer.u8(DIRECTIONS.indexOf(valid.direction)).u32(valid.steps);
      break;
    case 'move-to':
      writer.i32(valid.x).i32(valid.y);
      break;
  }

  return writer.toBuffer();
}

function readVersion(reader: PayloadReader): void {
  const version = reader.u8('version');
  if (version !== PROTOCOL_VERSION) {
    throw new ProtocolError(
      `Unsupported protocol version ${version} (expected ${PROTOCOL_VERSION})`,
      ErrorCode.UNSUPPORTED_VERSION,
      { version, expected: PROTOCOL_VERSION },
    );
  }
}

/**
 * Decode a request payload
 *
 * @throws ProtocolError with MALFORMED_FRAME or UNSUPPORTED_VERSION
 */
export function decodeRequest(payload: Buffer): CommandRequest {
  const reader = new PayloadReader(payload);
  readVersion(reader);
  const type = reader.oneOf(REQUEST_TAGS, 'request tag');

  let raw: Record<string, unknown>;
  switch (type) {
    case 'click': {
      const x = reader.i32('x');
      const y = reader.i32('y');
      const button = reader.oneOf(BUTTONS, 'button');
      const count = reader.u32('button state count');
      if (count > reader.remaining) {
        throw new ProtocolError(
          `Button state count ${count} exceeds payload size`,
          ErrorCode.MALFORMED_FRAME,
          { count, remaining: reader.remaining },
        );
      }
      const buttonStates: ButtonState[] = [];
      for (let i = 0; i < count; i++) {
        buttonStates.push(reader.oneOf(BUTTON_STATES, 'button state'));
      }
      const repeat = reader.u32('repeat');
      const absoluteByte = reader.u8('absolute');
      if (absoluteByte > 1) {
        throw new ProtocolError(`Invalid absolute flag ${absoluteByte}`, ErrorCode.MALFORMED_FRAME);
      }
      raw = { type, x, y, button, buttonStates, repeat, absolute: absoluteByte === 1 };
      break;
    }
    case 'move':
      raw = { type, dx: reader.i32('dx'), dy: reader.i32('dy'), steps: reader.u32('steps') };
      break;
    case 'scroll':
      raw = { type, direction: reader.oneOf(DIRECTIONS, 'direction'), steps: reader.u32('steps') };
      break;
    case 'move-to':
      raw = { type, x: reader.i32('x'), y: reader.i32('y') };
      break;
  }

  reader.finish();
  return validateRequest(raw);
}

export function encodeResponse(response: CommandResponse): Buffer {
  const writer = new PayloadWriter().u8(PROTOCOL_VERSION);
  if (response.outcome === 'ok') {
    return writer.u8(0).toBuffer();
  }
  return writer.u8(1).u8(ERROR_KINDS.indexOf(response.kind)).toBuffer();
}

/**
 * Decode a response payload
 *
 * @throws ProtocolError with MALFORMED_FRAME or UNSUPPORTED_VERSION
 */
export function decodeResponse(payload: Buffer): CommandResponse {
  const reader = new PayloadReader(payload);
  readVersion(reader);
  const outcome = reader.u8('outcome');

  let response: CommandResponse;
  if (outcome === 0) {
    response = { outcome: 'ok' };
  } else if (outcome === 1) {
    response = { outcome: 'error', kind: reader.oneOf(ERROR_KINDS, 'error kind') };
  } else {
    throw new ProtocolError(`Invalid outcome ${outcome}`, ErrorCode.MALFORMED_FRAME, { outcome });
  }

  reader.finish();
  return response;
}
