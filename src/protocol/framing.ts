/**
 * Length-Prefixed Framing
 *
 * Each frame is a 4-byte little-endian payload length followed by the payload.
 */

import { ProtocolError, ErrorCode } from '../shared/errors/index.js';
import { DEFAULT_MAX_FRAME_BYTES, FRAME_HEADER_BYTES } from './protocol.types.js';

export function encodeFrame(payload: Buffer): Buffer {
  const header = Buffer.alloc(FRAME_HEADER_BYTES);
  header.writeUInt32LE(payload.length, 0);
  return Buffer.concat([header, payload]);
}

/**
 * Incremental frame reassembler for a byte stream.
 *
 * @example
 * ```typescript
 * const decoder = new FrameDecoder();
 * socket.on('data', (chunk) => {
 *   for (const payload of decoder.push(chunk)) {
 *     handle(payload);
 *   }
 * });
 * ```
 */
export class FrameDecoder {
  private buffered: Buffer = Buffer.alloc(0);

  constructor(private readonly maxFrameBytes: number = DEFAULT_MAX_FRAME_BYTES) {}

  /**
   * Bytes received but not yet returned as a frame
   */
  get pendingBytes(): number {
    return this.buffered.length;
  }

  /**
   * Append received bytes and return every frame now complete, in order.
   *
   * @throws ProtocolError with FRAME_TOO_LARGE when a header announces more
   *   than maxFrameBytes; the stream cannot be resynchronised after that
   */
  push(chunk: Buffer): Buffer[] {
    this.buffered = this.buffered.length === 0 ? chunk : Buffer.concat([this.buffered, chunk]);
    const frames: Buffer[] = [];

    while (this.buffered.length >= FRAME_HEADER_BYTES) {
      const length = this.buffered.readUInt32LE(0);
      if (length > this.maxFrameBytes) {
        this.buffered = Buffer.alloc(0);
        throw new ProtocolError(
          `Frame of ${length} bytes exceeds limit of ${this.maxFrameBytes}`,
          ErrorCode.FRAME_TOO_LARGE,
          { length, maxFrameBytes: this.maxFrameBytes },
        );
      }
      if (this.buffered.length < FRAME_HEADER_BYTES + length) {
        break;
      }
      frames.push(this.buffered.subarray(FRAME_HEADER_BYTES, FRAME_HEADER_BYTES + length));
      this.buffered = this.buffered.subarray(FRAME_HEADER_BYTES + length);
    }

    return frames;
  }

  reset(): void {
    this.buffered = Buffer.alloc(0);
  }
}
