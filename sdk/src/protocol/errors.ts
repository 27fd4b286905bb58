/**
 * Protocol errors raised by the frame codec.
 *
 * Recoverable errors describe a single malformed frame (or run of garbage
 * bytes) and the decoder keeps going from the next frame start. Fatal errors
 * mean the stream can no longer be trusted and the connection must be closed.
 */

import type { WireErrorCode } from './messages.js';

export type ProtocolErrorCode = Extract<
  WireErrorCode,
  'frame_corrupt' | 'invalid_payload' | 'truncated_frame' | 'stream_broken' | 'frame_too_large'
>;

export class ProtocolError extends Error {
  public readonly code: ProtocolErrorCode;
  public readonly fatal: boolean;
  public readonly details?: Record<string, unknown>;

  constructor(
    code: ProtocolErrorCode,
    message: string,
    fatal: boolean = false,
    details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'ProtocolError';
    this.code = code;
    this.fatal = fatal;
    this.details = details;
    Error.captureStackTrace(this, this.constructor);
  }
}
