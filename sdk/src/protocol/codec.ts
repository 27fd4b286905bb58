/**
 * Frame codec
 *
 * Wire format (one frame per message):
 *
 *   offset  size  field
 *   0       2     magic 0xD5 0x7E
 *   2       1     version (PROTOCOL_VERSION)
 *   3       4     payload length, big-endian
 *   7       2     header check: first 2 bytes of SHA-256(bytes 0-6)
 *   9       4     checksum: first 4 bytes of SHA-256(payload)
 *   13      n     payload: UTF-8 JSON of a ProtocolMessage
 *
 * The decoder is resumable: feeding the stream in any split pattern produces
 * the same results as feeding it in one piece. On a bad header or checksum it
 * scans forward to the next magic and reports the skipped bytes once a new
 * frame start is found. A damaged length is caught by the header check before
 * the decoder waits for the payload.
 */

import { createHash } from 'crypto';
import { ProtocolError } from './errors.js';
import { PROTOCOL_VERSION, ProtocolMessageSchema } from './messages.js';
import type { ProtocolMessage } from './messages.js';

const MAGIC_0 = 0xd5;
const MAGIC_1 = 0x7e;
const MAGIC = Buffer.from([MAGIC_0, MAGIC_1]);
const HEADER_CHECK_OFFSET = 7;
const CHECKSUM_OFFSET = 9;
const HEADER_BYTES = 13;

export const DEFAULT_MAX_FRAME_BYTES = 4 * 1024 * 1024;
export const DEFAULT_MAX_RESYNC_BYTES = 1024 * 1024;

export type DecodeResult =
  | { ok: true; message: ProtocolMessage }
  | { ok: false; error: ProtocolError };

export interface DecoderOptions {
  maxFrameBytes?: number;
  // Garbage tolerated since the last good frame before the stream is declared broken
  maxResyncBytes?: number;
}

function checksum(payload: Uint8Array): Buffer {
  return createHash('sha256').update(payload).digest().subarray(0, 4);
}

function headerCheck(header: Uint8Array): Buffer {
  return createHash('sha256').update(header.subarray(0, HEADER_CHECK_OFFSET)).digest().subarray(0, 2);
}

/**
 * Encode a message into a self-delimiting frame
 */
export function encodeFrame(
  message: ProtocolMessage,
  maxFrameBytes: number = DEFAULT_MAX_FRAME_BYTES
): Buffer {
  const payload = Buffer.from(JSON.stringify(message), 'utf8');
  if (payload.length > maxFrameBytes) {
    throw new ProtocolError(
      'frame_too_large',
      `Message ${message.type} is ${payload.length} bytes, limit is ${maxFrameBytes}`,
      false,
      { type: message.type, bytes: payload.length }
    );
  }

  const header = Buffer.alloc(HEADER_BYTES);
  header[0] = MAGIC_0;
  header[1] = MAGIC_1;
  header[2] = PROTOCOL_VERSION;
  header.writeUInt32BE(payload.length, 3);
  headerCheck(header).copy(header, HEADER_CHECK_OFFSET);
  checksum(payload).copy(header, CHECKSUM_OFFSET);

  return Buffer.concat([header, payload]);
}

export class FrameDecoder {
  private buffer: Buffer = Buffer.alloc(0);
  private pendingSkipped = 0;
  private skippedSinceGoodFrame = 0;
  private isBroken = false;
  private readonly maxFrameBytes: number;
  private readonly maxResyncBytes: number;

  constructor(options: DecoderOptions = {}) {
    this.maxFrameBytes = options.maxFrameBytes ?? DEFAULT_MAX_FRAME_BYTES;
    this.maxResyncBytes = options.maxResyncBytes ?? DEFAULT_MAX_RESYNC_BYTES;
  }

  /**
   * True once unrecoverable corruption was detected
   */
  get broken(): boolean {
    return this.isBroken;
  }

  /**
   * Bytes held back waiting for the rest of a frame
   */
  get buffered(): number {
    return this.buffer.length;
  }

  /**
   * Feed bytes from the transport; returns every message and error completed by them
   */
  push(chunk: Uint8Array): DecodeResult[] {
    if (this.isBroken) {
      throw new ProtocolError('stream_broken', 'Decoder is closed after unrecoverable corruption', true);
    }

    const buf = this.buffer.length > 0 ? Buffer.concat([this.buffer, chunk]) : Buffer.from(chunk);
    const results: DecodeResult[] = [];
    let offset = 0;

    const skip = (): void => {
      offset += 1;
      this.pendingSkipped += 1;
      this.skippedSinceGoodFrame += 1;
      if (this.skippedSinceGoodFrame > this.maxResyncBytes) {
        this.isBroken = true;
        results.push({
          ok: false,
          error: new ProtocolError(
            'stream_broken',
            `No valid frame found within ${this.maxResyncBytes} bytes`,
            true,
            { skipped: this.skippedSinceGoodFrame }
          ),
        });
      }
    };

    while (!this.isBroken) {
      const remaining = buf.length - offset;
      if (remaining === 0) break;

      if (buf[offset] !== MAGIC_0) {
        skip();
        continue;
      }
      if (remaining < 2) break;
      if (buf[offset + 1] !== MAGIC_1) {
        skip();
        continue;
      }

      // Candidate frame start: report whatever was skipped to get here
      this.flushSkipped(results);

      if (remaining < HEADER_BYTES) break;

      const version = buf[offset + 2];
      const length = buf.readUInt32BE(offset + 3);
      const header = buf.subarray(offset, offset + HEADER_BYTES);
      if (
        version !== PROTOCOL_VERSION ||
        !headerCheck(header).equals(header.subarray(HEADER_CHECK_OFFSET, CHECKSUM_OFFSET)) ||
        length > this.maxFrameBytes
      ) {
        skip();
        continue;
      }

      if (remaining < HEADER_BYTES + length) break;

      const payload = buf.subarray(offset + HEADER_BYTES, offset + HEADER_BYTES + length);
      if (!checksum(payload).equals(header.subarray(CHECKSUM_OFFSET))) {
        skip();
        continue;
      }

      offset += HEADER_BYTES + length;
      this.skippedSinceGoodFrame = 0;
      results.push(this.parsePayload(payload));
    }

    this.buffer = this.isBroken ? Buffer.alloc(0) : Buffer.from(buf.subarray(offset));
    return results;
  }

  /**
   * Signal end of stream; reports trailing garbage and truncated frames.
   * A frame still waiting for its payload can never complete, so any frames
   * queued behind it are recovered first.
   */
  end(): DecodeResult[] {
    const results: DecodeResult[] = [];
    if (this.isBroken) return results;

    let next = this.buffer.indexOf(MAGIC, 1);
    while (next > 0 && !this.isBroken) {
      const held = this.buffer;
      this.buffer = Buffer.alloc(0);
      this.pendingSkipped += next;
      this.skippedSinceGoodFrame += next;
      results.push(...this.push(held.subarray(next)));
      next = this.buffer.indexOf(MAGIC, 1);
    }
    if (this.isBroken) return results;

    this.flushSkipped(results);
    if (this.buffer.length > 0) {
      results.push({
        ok: false,
        error: new ProtocolError(
          'truncated_frame',
          `Stream ended inside a frame (${this.buffer.length} bytes buffered)`,
          false,
          { bytes: this.buffer.length }
        ),
      });
      this.buffer = Buffer.alloc(0);
    }
    return results;
  }

  private flushSkipped(results: DecodeResult[]): void {
    if (this.pendingSkipped === 0) return;
    results.push({
      ok: false,
      error: new ProtocolError(
        'frame_corrupt',
        `Skipped ${this.pendingSkipped} bytes while resynchronizing`,
        false,
        { skipped: this.pendingSkipped }
      ),
    });
    this.pendingSkipped = 0;
  }

  private parsePayload(payload: Buffer): DecodeResult {
    let raw: unknown;
    try {
      raw = JSON.parse(payload.toString('utf8'));
    } catch (err) {
      return {
        ok: false,
        error: new ProtocolError(
          'invalid_payload',
          `Frame payload is not JSON: ${err instanceof Error ? err.message : String(err)}`
        ),
      };
    }

    const parsed = ProtocolMessageSchema.safeParse(raw);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      const where = issue && issue.path.length > 0 ? ` at ${issue.path.join('.')}` : '';
      return {
        ok: false,
        error: new ProtocolError(
          'invalid_payload',
          `Frame payload is not a protocol message${where}: ${issue?.message ?? 'unknown issue'}`,
          false,
          { issues: parsed.error.issues.length }
        ),
      };
    }

    return { ok: true, message: parsed.data };
  }
}
