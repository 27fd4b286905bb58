/**
 * @devloop/sdk
 *
 * Wire protocol shared by devloop front-ends and the executor.
 *
 * Features:
 * - Typed protocol messages validated with zod
 * - Self-delimiting, checksummed frame codec with resynchronization
 * - Stream and WebSocket transports
 * - ExecutorClient for front-ends
 */

export * from './protocol/messages.js';
export { ProtocolError } from './protocol/errors.js';
export type { ProtocolErrorCode } from './protocol/errors.js';
export {
  encodeFrame,
  FrameDecoder,
  DEFAULT_MAX_FRAME_BYTES,
  DEFAULT_MAX_RESYNC_BYTES,
} from './protocol/codec.js';
export type { DecodeResult, DecoderOptions } from './protocol/codec.js';

export { BaseTransport } from './transport/types.js';
export type { Transport, DataListener, CloseListener } from './transport/types.js';
export { StreamTransport, createTransportPair } from './transport/stream.js';
export { WebSocketTransport } from './transport/websocket.js';

export { ExecutorClient } from './client.js';
export type { MessageHandler, ProtocolErrorHandler, RunCommandOptions } from './client.js';
